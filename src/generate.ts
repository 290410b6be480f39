/**
 * Generate pipeline:
 *
 * 1. Discover candidate files under the root
 * 2. Select (picker, or everything with auto)
 * 3. Read the selected files
 * 4. Assemble file map + contents + prompt
 * 5. Write to file, console or clipboard
 */

import { createDiscoveryConfig } from './discovery/config.js';
import { discover, type DiscoveryResult, type ScanProgress } from './discovery/discover.js';
import { formatFileMap } from './discovery/file-map.js';
import { buildContextOutput, formatOutput } from './context/assemble.js';
import type { ContentReader } from './context/reader.js';
import { NoFilesSelectedError } from './lib/errors.js';
import { logger } from './lib/logger.js';
import { resolveOutputTarget, writeOutput, type OutputTarget, type TextSink } from './output/writer.js';
import { runSelection, type Picker } from './selection/select.js';

export interface GenerateOptions {
  root: string;
  extensions: string[];
  exclude: string[];
  vcsDir: string;
  gitignore: boolean;
  /** Take every discovered file without the picker */
  auto: boolean;
  output?: string;
  clipboard?: boolean;
  prompt?: string;
  onProgress?: (progress: ScanProgress) => void;
  /** Called once the walk is done, before selection starts */
  onDiscovered?: (result: DiscoveryResult) => void;
  picker?: Picker;
  reader?: ContentReader;
  stdout?: TextSink;
}

export interface GenerateResult {
  fileCount: number;
  tokenCount: number;
  target: OutputTarget;
  /** The text that was written */
  content: string;
}

export async function generateContext(options: GenerateOptions): Promise<GenerateResult> {
  const config = createDiscoveryConfig({
    root: options.root,
    extensions: options.extensions,
    excludeSubstrings: options.exclude,
    vcsDirName: options.vcsDir,
    useIgnoreFile: options.gitignore,
  });

  const discovery = discover(config, { onProgress: options.onProgress });
  options.onDiscovered?.(discovery);

  const { paths, fileMap } = discovery;
  if (paths.length === 0) {
    throw new NoFilesSelectedError(`no matching files found in ${config.root}`);
  }

  const files = await runSelection(paths, {
    interactive: !options.auto,
    picker: options.picker,
    reader: options.reader,
  });
  if (files.length === 0) {
    throw new NoFilesSelectedError('no readable files selected');
  }

  const output = buildContextOutput(files, formatFileMap(fileMap), options.prompt);
  const content = formatOutput(output);
  logger.info(`Context assembled: ${files.length} files, ~${output.tokenCount} tokens`);

  const target = resolveOutputTarget(options.output, options.clipboard ?? false);
  await writeOutput(content, target, options.stdout);

  return { fileCount: files.length, tokenCount: output.tokenCount, target, content };
}
