/**
 * projmap Change Analyzer
 * Compares a freshly built index with the previous one and decides whether
 * the update needs confirmation
 */

import * as fs from 'fs';
import {
  ChangeAnalysis,
  ChangeData,
  FileLevelChanges,
  IndexStats,
  PriorIndex,
  ProjectIndex,
} from './types.js';
import { decodeStats, isRecord } from './storage.js';
import { errorMessage } from './errors.js';

// =============================================================================
// THRESHOLDS
// =============================================================================

export const SIGNIFICANCE_THRESHOLDS = {
  fileChange: 10,       // |new files - old files| above this is significant
  dirChange: 5,         // |new dirs - old dirs| above this is significant
  filesRemoved: 5,      // more removed files than this is significant
  parsedRatio: 0.2,     // parsed-file ratio shift above this is significant
};

// =============================================================================
// PRIOR INDEX
// =============================================================================

function countKeys(value: unknown): number {
  return isRecord(value) ? Object.keys(value).length : 0;
}

/**
 * Reduce a decoded snapshot to what the comparison needs
 */
export function decodePriorIndex(raw: unknown): PriorIndex {
  if (!isRecord(raw) || !isRecord(raw['files'])) {
    throw new Error('not a project index (missing "files")');
  }

  const files: PriorIndex['files'] = {};
  for (const [filePath, record] of Object.entries(raw['files'])) {
    const info = isRecord(record) ? record : {};
    files[filePath] = {
      functionCount: countKeys(info['functions']),
      classCount: countKeys(info['classes']),
    };
  }

  return { stats: decodeStats(raw['stats']), files };
}

/**
 * Read a previous snapshot from disk. Throws on I/O or decode errors.
 */
export async function readPriorIndex(filePath: string): Promise<PriorIndex> {
  const content = await fs.promises.readFile(filePath, 'utf-8');
  return decodePriorIndex(JSON.parse(content));
}

/**
 * The comparison view of an in-memory index
 */
export function toPriorIndex(index: ProjectIndex): PriorIndex {
  const files: PriorIndex['files'] = {};
  for (const [filePath, record] of Object.entries(index.files)) {
    files[filePath] = {
      functionCount: Object.keys(record.functions ?? {}).length,
      classCount: Object.keys(record.classes ?? {}).length,
    };
  }
  return { stats: index.stats, files };
}

// =============================================================================
// FILE-LEVEL CHANGES
// =============================================================================

/**
 * Added, removed and modified files. "Modified" compares function and class
 * counts only: a file whose bodies changed but whose counts did not is
 * reported as unmodified.
 */
export function getFileLevelChanges(previous: PriorIndex | null, current: ProjectIndex): FileLevelChanges {
  if (!previous) {
    return {
      files_added: Object.keys(current.files),
      files_removed: [],
      files_modified: [],
    };
  }

  const oldFiles = new Set(Object.keys(previous.files));
  const newFiles = new Set(Object.keys(current.files));
  const currentCounts = toPriorIndex(current).files;

  const changes: FileLevelChanges = { files_added: [], files_removed: [], files_modified: [] };

  for (const filePath of newFiles) {
    if (!oldFiles.has(filePath)) {
      changes.files_added.push(filePath);
      continue;
    }
    const before = previous.files[filePath];
    const after = currentCounts[filePath];
    if (before.functionCount !== after.functionCount || before.classCount !== after.classCount) {
      changes.files_modified.push(filePath);
    }
  }

  for (const filePath of oldFiles) {
    if (!newFiles.has(filePath)) {
      changes.files_removed.push(filePath);
    }
  }

  return changes;
}

// =============================================================================
// SIGNIFICANCE
// =============================================================================

function sumCounts(counts: Record<string, number>): number {
  return Object.values(counts).reduce((total, n) => total + n, 0);
}

function signed(n: number): string {
  return n >= 0 ? `+${n}` : `${n}`;
}

function percent(ratio: number): string {
  return `${(ratio * 100).toFixed(1)}%`;
}

/**
 * Parsed-file ratio: files counted as fully parsed over total files
 */
export function parsedRatio(stats: IndexStats): number {
  return stats.total_files > 0 ? sumCounts(stats.fully_parsed) / stats.total_files : 0;
}

/**
 * Compare against a previous index
 */
export function compareIndexes(previous: PriorIndex, current: ProjectIndex): ChangeAnalysis {
  const oldStats = previous.stats;
  const newStats = current.stats;

  const fileChange = newStats.total_files - oldStats.total_files;
  const dirChange = newStats.total_directories - oldStats.total_directories;
  const fileChanges = getFileLevelChanges(previous, current);

  const reasons: string[] = [];

  if (Math.abs(fileChange) > SIGNIFICANCE_THRESHOLDS.fileChange) {
    reasons.push(`Large file count change: ${Math.abs(fileChange)} files`);
  }

  if (Math.abs(dirChange) > SIGNIFICANCE_THRESHOLDS.dirChange) {
    reasons.push(`Large directory count change: ${Math.abs(dirChange)} directories`);
  }

  if (fileChanges.files_removed.length > SIGNIFICANCE_THRESHOLDS.filesRemoved) {
    reasons.push(`Many files removed: ${fileChanges.files_removed.length}`);
  }

  if (oldStats.total_files > 0 && newStats.total_files > 0) {
    const oldRatio = parsedRatio(oldStats);
    const newRatio = parsedRatio(newStats);
    if (Math.abs(newRatio - oldRatio) > SIGNIFICANCE_THRESHOLDS.parsedRatio) {
      reasons.push(`Parsing ratio changed: ${percent(oldRatio)} → ${percent(newRatio)}`);
    }
  }

  const significant = reasons.length > 0;
  const changeData: ChangeData = {
    old_stats: oldStats,
    new_stats: newStats,
    file_changes: fileChanges,
    significance_level: significant ? 'requires_confirmation' : 'auto_approved',
    notes: significant
      ? reasons.join('; ')
      : `Routine update: ${signed(fileChange)} files, ${signed(dirChange)} directories`,
  };

  return { significant, reasons, fileChange, dirChange, changeData };
}

/**
 * Analyze the new index against the snapshot at `previousPath`.
 * No previous snapshot, or one that cannot be read, is never significant:
 * every current file counts as added.
 */
export async function analyzeChanges(previousPath: string | null, current: ProjectIndex): Promise<ChangeAnalysis> {
  const initial = (notes: string): ChangeAnalysis => ({
    significant: false,
    reasons: [],
    fileChange: current.stats.total_files,
    dirChange: current.stats.total_directories,
    changeData: {
      old_stats: null,
      new_stats: current.stats,
      file_changes: getFileLevelChanges(null, current),
      significance_level: 'auto_approved',
      notes,
    },
  });

  if (!previousPath || !fs.existsSync(previousPath)) {
    return initial('Initial index creation');
  }

  let previous: PriorIndex;
  try {
    previous = await readPriorIndex(previousPath);
  } catch (error) {
    const message = errorMessage(error);
    console.warn(`Could not read previous index: ${message}`);
    return initial(`Could not read previous index: ${message}`);
  }

  return compareIndexes(previous, current);
}

// =============================================================================
// CLI FORMATTERS
// =============================================================================

function formatFileList(label: string, marker: string, files: string[]): string[] {
  if (files.length === 0) return [];

  const lines = [`  Files ${label}: ${files.length}`];
  const shown = files.length <= 5 ? files : files.slice(0, 3);
  for (const file of shown) {
    lines.push(`    ${marker} ${file}`);
  }
  if (files.length > 5) {
    lines.push(`    ... and ${files.length - 3} more`);
  }
  return lines;
}

/**
 * Human-readable comparison for the terminal
 */
export function formatChangeReport(analysis: ChangeAnalysis): string {
  const { changeData } = analysis;
  const lines: string[] = [];

  if (!changeData.old_stats) {
    lines.push(changeData.notes);
    lines.push(`  Files: ${changeData.file_changes.files_added.length} indexed`);
    return lines.join('\n');
  }

  const oldStats = changeData.old_stats;
  const newFiles = changeData.new_stats?.total_files ?? 0;
  const newDirs = changeData.new_stats?.total_directories ?? 0;

  lines.push('Statistics Comparison:');
  lines.push(`  Files: ${oldStats.total_files} → ${newFiles} (${signed(analysis.fileChange)})`);
  lines.push(`  Directories: ${oldStats.total_directories} → ${newDirs} (${signed(analysis.dirChange)})`);
  lines.push(...formatFileList('added', '+', changeData.file_changes.files_added));
  lines.push(...formatFileList('removed', '-', changeData.file_changes.files_removed));
  lines.push(...formatFileList('modified', '~', changeData.file_changes.files_modified));

  if (analysis.significant) {
    for (const reason of analysis.reasons) {
      lines.push(`! ${reason}`);
    }
  } else {
    lines.push('Changes look reasonable');
  }

  return lines.join('\n');
}
