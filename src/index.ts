/**
 * projmap - structural project index
 *
 * Directory layout, per-file signatures, dependency and call graphs, kept up
 * to date with backups and atomic writes.
 *
 * @packageDocumentation
 */

// Main exports
export { updateIndex, type UpdateOptions, type UpdateResult, type UpdateStatus } from './pipeline.js';
export { buildIndex, stalenessThreshold, type BuildOptions, type BuildResult } from './indexer.js';
export {
  getConfig,
  setConfig,
  resetConfig,
  loadConfig,
  parseMaxBackups,
  getOutputPath,
  getBackupDir,
  getBackupLogPath,
  VERSION,
  type ProjmapConfig,
} from './config.js';

// Graphs
export { buildDependencyGraph, resolveImport, resolveRelativeBase, type ImportResolution } from './dependency-graph.js';
export { buildCallGraph, type CallGraphResult } from './call-graph.js';

// Size governor
export { compressIndexIfNeeded, measureIndex, type CompressionReport } from './compress.js';

// Change analysis
export {
  analyzeChanges,
  compareIndexes,
  getFileLevelChanges,
  readPriorIndex,
  toPriorIndex,
  formatChangeReport,
} from './diff.js';

// Backups and persistence
export { BackupSession, rotateBackups, loadBackupLog, formatBackupLog } from './backups.js';
export { safeSaveIndex, serializeIndex, stringifyIndex, type SaveResult } from './storage.js';

// Extraction
export { extractPythonSignatures } from './extractors/python.js';
export { extractJavaScriptSignatures } from './extractors/javascript.js';
export { extractShellSignatures } from './extractors/shell.js';
export { extractMarkdownStructure } from './extractors/markdown.js';

export { confirmUpdate } from './prompt.js';
export { formatSummary } from './summary.js';
export { IndexBuildError } from './errors.js';

// Types
export * from './types.js';
