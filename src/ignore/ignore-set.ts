/**
 * IgnoreSet - the rules of one root's ignore file.
 *
 * Rules form a set keyed by their raw line, so duplicates collapse and no
 * declaration order is kept. A matching negated rule therefore wins over every
 * plain match for the same path, wherever it was declared. This differs from
 * git, where the last matching line decides.
 */

import { existsSync, readFileSync, statSync } from 'fs';
import { isAbsolute, join, relative, sep } from 'path';
import { logger } from '../lib/logger.js';
import { matchesRule, parseRule, type PatternRule } from './pattern.js';

export const IGNORE_FILE_NAME = '.gitignore';

/** Root-relative path with "/" separators, or the path itself when it lies outside the root. */
export function toRelativePath(path: string, root: string): string {
    const rel = relative(root, path);
    const usable = rel && !rel.startsWith('..') && !isAbsolute(rel) ? rel : path;
    return sep === '/' ? usable : usable.split(sep).join('/');
}

export class IgnoreSet {
    private readonly byRaw = new Map<string, PatternRule>();

    private constructor(rules: Iterable<PatternRule>) {
        for (const rule of rules) {
            if (!this.byRaw.has(rule.raw)) this.byRaw.set(rule.raw, rule);
        }
    }

    static empty(): IgnoreSet {
        return new IgnoreSet([]);
    }

    /** Build a set from ignore-file lines; blanks and comments are dropped. */
    static fromLines(lines: Iterable<string>): IgnoreSet {
        const rules: PatternRule[] = [];
        for (const line of lines) {
            const rule = parseRule(line);
            if (rule) rules.push(rule);
        }
        return new IgnoreSet(rules);
    }

    /**
     * Load `<root>/.gitignore`. A missing file gives an empty set; an unreadable
     * one throws.
     */
    static load(root: string, fileName: string = IGNORE_FILE_NAME): IgnoreSet {
        const filePath = join(root, fileName);

        if (!existsSync(filePath) || !statSync(filePath).isFile()) {
            logger.debug(`No ${fileName} file found at: ${filePath}`);
            return IgnoreSet.empty();
        }

        logger.debug(`Parsing ${fileName} file at: ${filePath}`);
        const set = IgnoreSet.fromLines(readFileSync(filePath, 'utf-8').split(/\r?\n/));
        logger.info(`Loaded ${set.size} patterns from ${fileName}`);
        return set;
    }

    get size(): number {
        return this.byRaw.size;
    }

    get isEmpty(): boolean {
        return this.byRaw.size === 0;
    }

    has(raw: string): boolean {
        return this.byRaw.has(raw.trim());
    }

    rules(): PatternRule[] {
        return [...this.byRaw.values()];
    }

    /** Evaluate a path (absolute, or relative to the working directory) against the set. */
    shouldIgnore(path: string, root: string, isDirectory: boolean): boolean {
        if (this.isEmpty) return false;
        return this.shouldIgnoreRelative(toRelativePath(path, root), isDirectory);
    }

    /** Evaluate a root-relative, "/"-separated path against the set. */
    shouldIgnoreRelative(relPath: string, isDirectory: boolean): boolean {
        if (this.isEmpty) return false;

        let matchedNegated = false;
        let ignored = false;

        for (const rule of this.byRaw.values()) {
            if (rule.negated) {
                if (matchesRule(relPath, rule, isDirectory)) {
                    logger.debug(`Path ${relPath} matches negated pattern: ${rule.raw}`);
                    matchedNegated = true;
                }
                continue;
            }

            if (!matchedNegated && matchesRule(relPath, rule, isDirectory)) {
                logger.debug(`Path ${relPath} matches ignore pattern: ${rule.raw}`);
                ignored = true;
            }
        }

        return matchedNegated ? false : ignored;
    }
}
