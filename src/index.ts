// Ignore rules
export { parseRule, matchesRule, matchesPattern } from './ignore/pattern.js';
export type { PatternRule } from './ignore/pattern.js';
export { IgnoreSet, IGNORE_FILE_NAME, toRelativePath } from './ignore/ignore-set.js';

// Discovery
export { createDiscoveryConfig, parseList, DEFAULT_EXCLUDES, DEFAULT_EXTENSIONS, DEFAULT_VCS_DIR } from './discovery/config.js';
export type { DiscoveryConfig, DiscoveryConfigInput } from './discovery/config.js';
export { discover, validateRoot, matchesExtension } from './discovery/discover.js';
export type { DiscoveryOptions, DiscoveryResult, FileMap, ScanProgress, SkipReason } from './discovery/discover.js';
export { formatFileMap } from './discovery/file-map.js';
export { ScanProgressReporter } from './discovery/progress.js';

// Selection
export { SelectionTree, pathComponents } from './selection/tree.js';
export type { CursorMove, DirectoryNode, FileNode, FlattenedEntry, NodeId, TreeNode } from './selection/tree.js';
export { TreeController } from './selection/controller.js';
export type { SelectionAction, SelectionState } from './selection/controller.js';
export { runInteractiveSelection } from './selection/session.js';
export type { SessionOptions } from './selection/session.js';
export { runSelection } from './selection/select.js';
export type { Picker, RunSelectionOptions } from './selection/select.js';

// Reading + assembly
export { readFileContents, readFileLenient, readFiles } from './context/reader.js';
export type { ContentReader, FileContext } from './context/reader.js';
export { buildContextOutput, formatOutput, estimateTokens } from './context/assemble.js';
export type { ContextOutput } from './context/assemble.js';

// Output
export { writeOutput, resolveOutputTarget, preview } from './output/writer.js';
export type { OutputTarget, TextSink } from './output/writer.js';

// Config
export { loadConfig, CONFIG_TEMPLATE, DEFAULT_CONFIG_FILE } from './config/config.js';
export type { CliConfig } from './config/config.js';

// Pipeline
export { generateContext } from './generate.js';
export type { GenerateOptions, GenerateResult } from './generate.js';

// Errors + logging
export {
  CtxpickError,
  DiscoveryError,
  ReadError,
  SelectionCancelledError,
  NoFilesSelectedError,
  OutputError,
  isQuietExit,
  describeError,
} from './lib/errors.js';
export { logger, setupLogger } from './lib/logger.js';
export type { LogLevel } from './lib/logger.js';
