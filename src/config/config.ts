/**
 * CLI Config File Support
 *
 * One JSON file can hold every generate option:
 * - Discovery (path, extensions, exclude, vcsDir, gitignore)
 * - Selection (auto)
 * - Output (output, clipboard, prompt)
 * - Misc (verbose)
 *
 * All fields optional. Priority: CLI flags > config file > hardcoded defaults.
 */

import { readFileSync, existsSync } from 'fs';
import { resolve, dirname, isAbsolute } from 'path';
import { logger } from '../lib/logger.js';
import { DEFAULT_EXCLUDES, DEFAULT_EXTENSIONS, DEFAULT_VCS_DIR } from '../discovery/config.js';

export interface CliConfig {
    // Discovery
    path?: string;
    extensions?: string[];
    exclude?: string[];
    vcsDir?: string;
    gitignore?: boolean;

    // Selection
    auto?: boolean;

    // Output
    output?: string;
    clipboard?: boolean;
    prompt?: string;

    // Misc
    /** 0 error, 1 warn, 2 info, 3 debug */
    verbose?: number;
}

export const DEFAULT_CONFIG_FILE = 'ctxpick.config.json';

const KNOWN_KEYS = new Set<string>([
    'path', 'extensions', 'exclude', 'vcsDir', 'gitignore',
    'auto',
    'output', 'clipboard', 'prompt',
    'verbose',
]);

// ── Validation helpers ──────────────────────────────────────────────────────

function assertString(obj: Record<string, unknown>, key: string): string {
    const val = obj[key];
    if (typeof val !== 'string') throw new Error(`Config "${key}" must be a string`);
    return val;
}

function assertNumber(obj: Record<string, unknown>, key: string): number {
    const val = obj[key];
    if (typeof val !== 'number' || Number.isNaN(val)) throw new Error(`Config "${key}" must be a number`);
    return val;
}

function assertBoolean(obj: Record<string, unknown>, key: string): boolean {
    const val = obj[key];
    if (typeof val !== 'boolean') throw new Error(`Config "${key}" must be a boolean`);
    return val;
}

function assertStringArray(obj: Record<string, unknown>, key: string): string[] {
    const val = obj[key];
    if (!Array.isArray(val)) throw new Error(`Config "${key}" must be an array of strings`);
    const strings: string[] = [];
    for (const item of val) {
        if (typeof item !== 'string') throw new Error(`Config "${key}" must be an array of strings`);
        strings.push(item);
    }
    return strings;
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// ── Main loader ─────────────────────────────────────────────────────────────

/**
 * Load and validate a CLI config file.
 *
 * - Resolves configPath relative to CWD
 * - A relative "path" resolves from the config file's directory
 * - Throws on missing file, invalid JSON or a wrongly typed value
 */
export function loadConfig(configPath: string): CliConfig {
    const absolutePath = resolve(configPath);

    if (!existsSync(absolutePath)) {
        throw new Error(`Config file not found: ${absolutePath}`);
    }

    let raw: string;
    try {
        raw = readFileSync(absolutePath, 'utf-8');
    } catch {
        throw new Error(`Failed to read config file: ${absolutePath}`);
    }

    let parsed: unknown;
    try {
        parsed = JSON.parse(raw);
    } catch {
        throw new Error(`Invalid JSON in config file: ${absolutePath}`);
    }

    if (!isRecord(parsed)) {
        throw new Error(`Config file must contain a JSON object: ${absolutePath}`);
    }

    const obj = parsed;

    // Warn about unknown keys
    const unknownKeys = Object.keys(obj).filter(k => !KNOWN_KEYS.has(k));
    if (unknownKeys.length > 0) {
        logger.warn(`Unknown config keys ignored: ${unknownKeys.join(', ')}`);
    }

    const config: CliConfig = {};
    const configDir = dirname(absolutePath);

    // Discovery
    if (obj.path !== undefined) {
        const p = assertString(obj, 'path');
        config.path = isAbsolute(p) ? p : resolve(configDir, p);
    }
    if (obj.extensions !== undefined) config.extensions = assertStringArray(obj, 'extensions');
    if (obj.exclude !== undefined) config.exclude = assertStringArray(obj, 'exclude');
    if (obj.vcsDir !== undefined) config.vcsDir = assertString(obj, 'vcsDir');
    if (obj.gitignore !== undefined) config.gitignore = assertBoolean(obj, 'gitignore');

    // Selection
    if (obj.auto !== undefined) config.auto = assertBoolean(obj, 'auto');

    // Output
    if (obj.output !== undefined) config.output = assertString(obj, 'output');
    if (obj.clipboard !== undefined) config.clipboard = assertBoolean(obj, 'clipboard');
    if (obj.prompt !== undefined) config.prompt = assertString(obj, 'prompt');

    // Misc
    if (obj.verbose !== undefined) {
        const v = assertNumber(obj, 'verbose');
        if (!Number.isInteger(v) || v < 0 || v > 3) {
            throw new Error('Config "verbose" must be an integer from 0 to 3');
        }
        config.verbose = v;
    }

    return config;
}

// ── Default template ────────────────────────────────────────────────────────

/**
 * Default config template for `init` command.
 * Shows every available option with its default.
 */
export const CONFIG_TEMPLATE: CliConfig = {
    // Discovery
    path: '.',
    extensions: [...DEFAULT_EXTENSIONS],
    exclude: [...DEFAULT_EXCLUDES],
    vcsDir: DEFAULT_VCS_DIR,
    gitignore: true,

    // Selection
    auto: false,

    // Output
    clipboard: false,

    // Misc
    verbose: 0,
};
