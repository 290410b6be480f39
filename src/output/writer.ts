/**
 * Output sinks: file, console or clipboard, picked once from configuration.
 */

import { writeFileSync } from 'fs';
import { resolve } from 'path';
import clipboardy from 'clipboardy';
import { OutputError } from '../lib/errors.js';
import { logger } from '../lib/logger.js';

export type OutputTarget =
    | { kind: 'file'; path: string }
    | { kind: 'console' }
    | { kind: 'clipboard' };

export interface TextSink {
    write(chunk: string): boolean;
}

export const PREVIEW_LENGTH = 200;

/** The clipboard flag wins over an output path; neither means console. */
export function resolveOutputTarget(outputPath?: string, clipboard: boolean = false): OutputTarget {
    if (clipboard) return { kind: 'clipboard' };
    if (outputPath) return { kind: 'file', path: outputPath };
    return { kind: 'console' };
}

/** First `length` characters (code points, not UTF-16 units), with "..." when cut. */
export function preview(content: string, length: number = PREVIEW_LENGTH): string {
    const chars = [...content];
    return chars.length > length ? `${chars.slice(0, length).join('')}...` : content;
}

export function describeTarget(target: OutputTarget): string {
    switch (target.kind) {
        case 'file':
            return resolve(target.path);
        case 'console':
            return 'console';
        case 'clipboard':
            return 'clipboard';
    }
}

/**
 * Write the formatted context to its destination. Every failure is an OutputError.
 * `stdout` receives console output and the clipboard confirmation.
 */
export async function writeOutput(content: string, target: OutputTarget, stdout: TextSink = process.stdout): Promise<void> {
    switch (target.kind) {
        case 'file': {
            logger.debug(`Writing output to file: ${target.path}`);
            try {
                writeFileSync(target.path, content, 'utf-8');
            } catch (error) {
                throw new OutputError(`Failed to write ${target.path}`, error);
            }
            logger.info(`Output written to file: ${target.path}`);
            return;
        }

        case 'console': {
            logger.debug('Writing output to console');
            try {
                stdout.write(`${content}\n`);
            } catch (error) {
                throw new OutputError('Failed to write to console', error);
            }
            return;
        }

        case 'clipboard': {
            logger.debug('Writing output to clipboard');
            try {
                await clipboardy.write(content);
            } catch (error) {
                throw new OutputError('Failed to copy to clipboard', error);
            }
            logger.info(`Output copied to clipboard (size: ${Buffer.byteLength(content, 'utf-8')} bytes)`);
            stdout.write(`\n📋 Content copied to clipboard!\n\nPreview of copied content:\n\n${preview(content)}\n`);
            return;
        }
    }
}
