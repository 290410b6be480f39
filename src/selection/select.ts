/**
 * Selection entry point: auto-select everything, or run the picker, then load
 * the chosen files.
 */

import { logger } from '../lib/logger.js';
import { readFiles, readFileContents, type ContentReader, type FileContext } from '../context/reader.js';
import { runInteractiveSelection, type SessionOptions } from './session.js';

export type Picker = (paths: readonly string[]) => Promise<string[]>;

export interface RunSelectionOptions {
  /** false: take every path without asking */
  interactive: boolean;
  reader?: ContentReader;
  /** Replaces the terminal picker (default: runInteractiveSelection) */
  picker?: Picker;
  session?: SessionOptions;
}

/**
 * Resolve the paths to include and read them. Files that fail to read are
 * skipped with a warning. Rejects with SelectionCancelledError or
 * NoFilesSelectedError when the picker ends without a selection.
 */
export async function runSelection(paths: readonly string[], options: RunSelectionOptions): Promise<FileContext[]> {
  const reader = options.reader ?? readFileContents;

  if (paths.length === 0) {
    logger.info('No files to select');
    return [];
  }

  logger.debug(`Selecting from ${paths.length} available files`);

  if (!options.interactive) {
    logger.info(`Auto-selecting all ${paths.length} files`);
    return readFiles(paths, reader);
  }

  const picker = options.picker ?? ((candidates: readonly string[]) => runInteractiveSelection(candidates, options.session));
  const selected = await picker(paths);
  return readFiles(selected, reader);
}
