/**
 * Discovery - walks a root directory and collects candidate files.
 *
 * Per entry, in order:
 * 1. Exclude substrings + VCS dir: the entry's full path contains one → prune
 * 2. Ignore file (optional): the root's .gitignore says ignore → prune
 * 3. Symlinks are never followed or emitted; only regular files are candidates
 * 4. Extension allow-list decides whether a regular file is a match
 *
 * The file map records every visited regular file under its parent directory,
 * before the extension filter, for every visited directory.
 */

import { lstatSync, readdirSync, statSync, type Dirent } from 'fs';
import { extname, join } from 'path';
import { DiscoveryError, describeError } from '../lib/errors.js';
import { logger } from '../lib/logger.js';
import { IgnoreSet, toRelativePath } from '../ignore/ignore-set.js';
import type { DiscoveryConfig } from './config.js';

/** Directory full path → full paths of the regular files directly inside it */
export type FileMap = Map<string, string[]>;

export type SkipReason = 'excluded' | 'ignored' | 'unreadable';

export interface ScanProgress {
    /** Regular files considered so far */
    scanned: number;
    /** Of those, files that passed the extension filter */
    matched: number;
}

export interface DiscoveryOptions {
    /** Use this rule set instead of loading the root's ignore file */
    ignoreSet?: IgnoreSet;
    /** Called after every regular file is considered */
    onProgress?: (progress: ScanProgress) => void;
}

export interface DiscoveryResult {
    /** Matching files, in visitation order, without duplicates */
    paths: string[];
    fileMap: FileMap;
    scanned: number;
    /** Entries left out of the walk and why */
    skipped: { path: string; reason: SkipReason }[];
}

type EntryKind = 'file' | 'directory' | 'symlink' | 'other';

interface WalkContext {
    config: DiscoveryConfig;
    pruneSubstrings: string[];
    ignoreSet: IgnoreSet;
    matches: Set<string>;
    fileMap: FileMap;
    skipped: { path: string; reason: SkipReason }[];
    progress: ScanProgress;
    onProgress?: (progress: ScanProgress) => void;
}

/**
 * Check that the root exists and is a directory.
 */
export function validateRoot(root: string): void {
    let isDirectory: boolean;
    try {
        isDirectory = statSync(root).isDirectory();
    } catch (error) {
        throw new DiscoveryError(root, 'Path does not exist', error);
    }
    if (!isDirectory) {
        throw new DiscoveryError(root, 'Path is not a directory');
    }
}

/** True when the extension allow-list accepts this file name. */
export function matchesExtension(fileName: string, extensions: ReadonlySet<string>): boolean {
    if (extensions.size === 0) return true;
    const ext = extname(fileName);
    return ext.length > 1 && extensions.has(ext.slice(1));
}

function kindOf(entry: Dirent, fullPath: string): EntryKind {
    if (entry.isSymbolicLink()) return 'symlink';
    if (entry.isDirectory()) return 'directory';
    if (entry.isFile()) return 'file';

    // Some filesystems do not report a type in the directory listing
    const stats = lstatSync(fullPath);
    if (stats.isSymbolicLink()) return 'symlink';
    if (stats.isDirectory()) return 'directory';
    if (stats.isFile()) return 'file';
    return 'other';
}

function loadIgnoreSet(config: DiscoveryConfig): IgnoreSet {
    if (!config.useIgnoreFile) return IgnoreSet.empty();
    try {
        return IgnoreSet.load(config.root);
    } catch (error) {
        throw new DiscoveryError(config.root, 'Failed to read ignore file', error);
    }
}

function walkDir(currentPath: string, ctx: WalkContext, isRoot: boolean): void {
    let entries: Dirent[];
    try {
        entries = readdirSync(currentPath, { withFileTypes: true });
    } catch (error) {
        if (isRoot) throw new DiscoveryError(currentPath, 'Failed to read directory', error);
        logger.debug(`Skipping unreadable directory ${currentPath}: ${describeError(error)}`);
        ctx.skipped.push({ path: currentPath, reason: 'unreadable' });
        return;
    }

    ctx.fileMap.set(currentPath, ctx.fileMap.get(currentPath) ?? []);

    // Sort for deterministic output
    entries.sort((a, b) => a.name.localeCompare(b.name));

    for (const entry of entries) {
        const fullPath = join(currentPath, entry.name);

        if (ctx.pruneSubstrings.some(sub => fullPath.includes(sub))) {
            logger.debug(`Excluded by pattern: ${fullPath}`);
            ctx.skipped.push({ path: fullPath, reason: 'excluded' });
            continue;
        }

        let kind: EntryKind;
        try {
            kind = kindOf(entry, fullPath);
        } catch (error) {
            logger.debug(`Skipping unreadable entry ${fullPath}: ${describeError(error)}`);
            ctx.skipped.push({ path: fullPath, reason: 'unreadable' });
            continue;
        }

        if (kind === 'symlink' || kind === 'other') continue;

        const relPath = toRelativePath(fullPath, ctx.config.root);
        if (ctx.ignoreSet.shouldIgnoreRelative(relPath, kind === 'directory')) {
            ctx.skipped.push({ path: fullPath, reason: 'ignored' });
            continue;
        }

        if (kind === 'directory') {
            walkDir(fullPath, ctx, false);
            continue;
        }

        ctx.fileMap.get(currentPath)?.push(fullPath);

        const matched = matchesExtension(entry.name, ctx.config.extensions);
        ctx.progress.scanned++;
        if (matched) {
            ctx.progress.matched++;
            ctx.matches.add(fullPath);
            logger.debug(`Found matching file: ${fullPath}`);
        }
        ctx.onProgress?.({ ...ctx.progress });
    }
}

/**
 * Walk `config.root` and return the matching files plus the directory → files map.
 * Throws DiscoveryError when the root cannot be walked at all; anything that
 * fails below the root is skipped.
 */
export function discover(config: DiscoveryConfig, options: DiscoveryOptions = {}): DiscoveryResult {
    logger.info(`Listing files in: ${config.root}`);
    logger.debug(`Extensions: ${[...config.extensions].join(', ') || '(all)'}`);
    logger.debug(`Exclude substrings: ${config.excludeSubstrings.join(', ') || '(none)'}`);
    logger.debug(`VCS dir: ${config.vcsDirName || '(none)'}`);
    logger.debug(`Apply ignore file: ${config.useIgnoreFile}`);

    validateRoot(config.root);

    const pruneSubstrings = [...config.excludeSubstrings];
    if (config.vcsDirName) pruneSubstrings.push(config.vcsDirName);

    const ctx: WalkContext = {
        config,
        pruneSubstrings,
        ignoreSet: options.ignoreSet ?? loadIgnoreSet(config),
        matches: new Set<string>(),
        fileMap: new Map(),
        skipped: [],
        progress: { scanned: 0, matched: 0 },
        onProgress: options.onProgress,
    };

    walkDir(config.root, ctx, true);

    logger.info(`Found ${ctx.matches.size} matching files (${ctx.progress.scanned} scanned)`);

    return {
        paths: [...ctx.matches],
        fileMap: ctx.fileMap,
        scanned: ctx.progress.scanned,
        skipped: ctx.skipped,
    };
}
