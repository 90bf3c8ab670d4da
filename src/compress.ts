/**
 * projmap Size Governor
 * Keeps the serialized index under a size budget by dropping detail
 */

import { FileRecord, ProjectIndex } from './types.js';
import { stringifyIndex } from './storage.js';

export const TREE_LINE_LIMIT = 100;
export const TRUNCATION_MARKER = '... (truncated)';

export interface CompressionReport {
  originalSize: number;
  finalSize: number;
  treeTruncated: boolean;
  removedFiles: string[];
}

/**
 * Size in bytes of the pretty-printed index as it would be written
 */
export function measureIndex(index: ProjectIndex): number {
  return Buffer.byteLength(stringifyIndex(index), 'utf-8');
}

/**
 * Bring the index under `maxSize`:
 * 1. keep only the first 100 tree lines plus a truncation marker
 * 2. drop listed-only (unparsed) files one at a time
 * Parsed files are never dropped; when the budget still cannot be met the
 * oversized index is returned as-is.
 */
export function compressIndexIfNeeded(
  index: ProjectIndex,
  maxSize: number
): { index: ProjectIndex; report: CompressionReport } {
  const originalSize = measureIndex(index);
  const report: CompressionReport = {
    originalSize,
    finalSize: originalSize,
    treeTruncated: false,
    removedFiles: [],
  };

  if (originalSize <= maxSize) {
    return { index, report };
  }

  console.warn(`Index too large (${originalSize} bytes), compressing...`);

  let tree = index.project_structure.tree;
  if (tree.length > TREE_LINE_LIMIT) {
    tree = [...tree.slice(0, TREE_LINE_LIMIT), TRUNCATION_MARKER];
    report.treeTruncated = true;
  }

  const files: Record<string, FileRecord> = { ...index.files };
  const compressed: ProjectIndex = {
    ...index,
    project_structure: { ...index.project_structure, tree },
    files,
  };

  let size = measureIndex(compressed);
  const removable = Object.keys(files).filter((filePath) => !files[filePath].parsed);

  for (const filePath of removable) {
    if (size <= maxSize) break;
    delete files[filePath];
    report.removedFiles.push(filePath);
    size = measureIndex(compressed);
  }

  if (size > maxSize) {
    console.warn(`Index still ${size} bytes after compression; keeping all parsed files`);
  }

  report.finalSize = size;
  return { index: compressed, report };
}
