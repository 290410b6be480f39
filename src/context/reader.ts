/**
 * File Reader - loads the text of selected files.
 */

import { existsSync, readFileSync, statSync } from 'fs';
import { ReadError, describeError } from '../lib/errors.js';
import { logger } from '../lib/logger.js';

export interface FileContext {
    path: string;
    content: string;
}

/** Reads one file; throws on failure. */
export type ContentReader = (path: string) => string;

/**
 * Read a file as UTF-8 text.
 * Missing paths, non-files and empty files give "". Any other failure throws ReadError.
 */
export function readFileContents(path: string): string {
    try {
        if (!existsSync(path)) {
            logger.warn(`File does not exist: ${path}`);
            return '';
        }

        const stats = statSync(path);
        if (!stats.isFile()) {
            logger.warn(`Not a file: ${path}`);
            return '';
        }
        if (stats.size === 0) {
            logger.debug(`File is empty: ${path}`);
            return '';
        }

        logger.debug(`Reading file contents: ${path}`);
        const content = readFileSync(path, 'utf-8');
        logger.debug(`Read ${content.length} characters from ${path}`);
        return content;
    } catch (error) {
        throw new ReadError(path, error);
    }
}

/** Like readFileContents, but a failure is logged and yields "". */
export function readFileLenient(path: string): string {
    try {
        return readFileContents(path);
    } catch (error) {
        logger.warn(describeError(error));
        return '';
    }
}

/**
 * Read every path with `reader`, skipping (with a warning) the ones that fail.
 */
export function readFiles(paths: readonly string[], reader: ContentReader = readFileContents): FileContext[] {
    const files: FileContext[] = [];

    for (const path of paths) {
        try {
            files.push({ path, content: reader(path) });
        } catch (error) {
            logger.warn(`Error reading file ${path}: ${describeError(error)}`);
        }
    }

    logger.info(`Successfully loaded ${files.length} files`);
    return files;
}
