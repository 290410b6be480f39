#!/usr/bin/env node

/**
 * ctxpick CLI
 *
 * Pick files from a directory tree and flatten them into one LLM context block.
 */

import { Command } from 'commander';
import { existsSync, writeFileSync } from 'fs';
import { resolve } from 'path';
import { createRequire } from 'module';
import { loadConfig, CONFIG_TEMPLATE, DEFAULT_CONFIG_FILE, type CliConfig } from './config/config.js';
import { createDiscoveryConfig, parseList, DEFAULT_EXCLUDES, DEFAULT_EXTENSIONS, DEFAULT_VCS_DIR } from './discovery/config.js';
import { discover } from './discovery/discover.js';
import { formatFileMap } from './discovery/file-map.js';
import { ScanProgressReporter } from './discovery/progress.js';
import { generateContext } from './generate.js';
import { describeError, isQuietExit } from './lib/errors.js';
import { logger, setupLogger } from './lib/logger.js';
import { describeTarget } from './output/writer.js';

interface GenerateCliOptions {
    path: string;
    ext: string;
    exclude: string;
    vcsDir: string;
    gitignore: boolean;
    auto?: boolean;
    output?: string;
    clipboard?: boolean;
    prompt?: string;
    configPath?: string;
    verbose: number;
}

interface MapCliOptions {
    path: string;
    exclude: string;
    vcsDir: string;
    gitignore: boolean;
    verbose: number;
}

const require = createRequire(import.meta.url);
const pkg = require('../package.json') as { version: string };

const program = new Command();

function increaseVerbosity(_value: string, previous: number): number {
    return previous + 1;
}

/** Quiet outcomes exit 0 with a note; anything else is fatal. */
function handleError(error: unknown): never {
    if (isQuietExit(error)) {
        console.error(`ℹ️  ${error.message}`);
        process.exit(0);
    }
    console.error('Error:', describeError(error));
    process.exit(1);
}

program
    .name('ctxpick')
    .description('Flatten selected files into an LLM context block')
    .version(pkg.version);

/**
 * Generate command - discover, pick, assemble, write
 */
program
    .command('generate')
    .description('Select files and write them out as one context block')
    .option('-p, --path <dir>', 'Root directory to scan', '.')
    .option('-e, --ext <list>', 'Comma-separated extensions to include (empty: all)', DEFAULT_EXTENSIONS.join(','))
    .option('-x, --exclude <list>', 'Comma-separated substrings; matching paths are skipped', DEFAULT_EXCLUDES.join(','))
    .option('--vcs-dir <name>', 'Version-control directory to skip (empty: none)', DEFAULT_VCS_DIR)
    .option('--no-gitignore', 'Do not apply the root .gitignore')
    .option('-a, --auto', 'Include every discovered file without the picker')
    .option('-o, --output <file>', 'Write to a file instead of the console')
    .option('-c, --clipboard', 'Copy to the clipboard (takes precedence over --output)')
    .option('--prompt <text>', 'User instructions appended to the context')
    .option('--config-path <path>', 'Path to config JSON file')
    .option('-v, --verbose', 'More logging (repeatable: -v warn, -vv info, -vvv debug)', increaseVerbosity, 0)
    .action(async (options: GenerateCliOptions, command: Command) => {
        try {
            // Priority: CLI flags > config file > hardcoded defaults
            let config: CliConfig = {};
            if (options.configPath) {
                config = loadConfig(options.configPath);
            }
            const fromCli = (name: string) => command.getOptionValueSource(name) === 'cli';

            const verbosity = config.verbose !== undefined && !fromCli('verbose') ? config.verbose : options.verbose;
            setupLogger(verbosity);
            if (options.configPath) logger.info(`Config loaded from: ${resolve(options.configPath)}`);

            const root = config.path !== undefined && !fromCli('path') ? config.path : options.path;
            const extensions = config.extensions !== undefined && !fromCli('ext') ? config.extensions : parseList(options.ext);
            const exclude = config.exclude !== undefined && !fromCli('exclude') ? config.exclude : parseList(options.exclude);
            const vcsDir = config.vcsDir !== undefined && !fromCli('vcsDir') ? config.vcsDir : options.vcsDir;
            const gitignore = config.gitignore !== undefined && !fromCli('gitignore') ? config.gitignore : options.gitignore;
            const auto = config.auto !== undefined && !fromCli('auto') ? config.auto : options.auto ?? false;
            const output = config.output !== undefined && !fromCli('output') ? config.output : options.output;
            const clipboard = config.clipboard !== undefined && !fromCli('clipboard') ? config.clipboard : options.clipboard ?? false;
            const prompt = config.prompt !== undefined && !fromCli('prompt') ? config.prompt : options.prompt;

            const reporter = process.stderr.isTTY ? new ScanProgressReporter(process.stderr) : null;

            const result = await generateContext({
                root,
                extensions,
                exclude,
                vcsDir,
                gitignore,
                auto,
                output,
                clipboard,
                prompt,
                onProgress: reporter ? progress => reporter.update(progress) : undefined,
                onDiscovered: () => reporter?.finish(),
            });

            console.error(`✅ ${result.fileCount} files, ~${result.tokenCount} tokens → ${describeTarget(result.target)}`);
        } catch (error) {
            handleError(error);
        }
    });

/**
 * Map command - print the directory → files map only
 */
program
    .command('map')
    .description('Print the directory map of a tree (no extension filter)')
    .option('-p, --path <dir>', 'Root directory to scan', '.')
    .option('-x, --exclude <list>', 'Comma-separated substrings; matching paths are skipped', DEFAULT_EXCLUDES.join(','))
    .option('--vcs-dir <name>', 'Version-control directory to skip (empty: none)', DEFAULT_VCS_DIR)
    .option('--no-gitignore', 'Do not apply the root .gitignore')
    .option('-v, --verbose', 'More logging (repeatable)', increaseVerbosity, 0)
    .action((options: MapCliOptions) => {
        try {
            setupLogger(options.verbose);
            const config = createDiscoveryConfig({
                root: options.path,
                excludeSubstrings: parseList(options.exclude),
                vcsDirName: options.vcsDir,
                useIgnoreFile: options.gitignore,
            });
            const { fileMap } = discover(config);
            process.stdout.write(formatFileMap(fileMap));
        } catch (error) {
            handleError(error);
        }
    });

/**
 * Init command - create a starter config file
 */
program
    .command('init')
    .description('Create a starter config file')
    .argument('[path]', 'Output path for config file', DEFAULT_CONFIG_FILE)
    .action((outputPath: string) => {
        try {
            const absolutePath = resolve(outputPath);
            if (existsSync(absolutePath)) {
                console.error(`Error: File already exists: ${absolutePath}`);
                console.error('Delete it first or choose a different path.');
                process.exit(1);
            }
            const content = JSON.stringify(CONFIG_TEMPLATE, null, 2) + '\n';
            writeFileSync(absolutePath, content, 'utf-8');
            console.log(`Created config file: ${absolutePath}`);
            console.log(`Use it with: ctxpick generate --config-path ${outputPath}`);
        } catch (error) {
            handleError(error);
        }
    });

// Parse arguments and run
program.parseAsync().catch(handleError);
