/**
 * projmap Storage System
 * Serialization and atomic, rollback-capable persistence of the project index
 */

import * as fs from 'fs';
import {
  ClassRecord,
  FileRecord,
  IndexStats,
  ProjectIndex,
  SerializedClass,
  SerializedFileRecord,
  SerializedIndex,
  SerializedSymbol,
  SymbolRecord,
} from './types.js';
import { getTempOutputPath } from './config.js';
import { errorMessage, hasErrorCode } from './errors.js';

// =============================================================================
// SERIALIZATION
// =============================================================================

function serializeSymbol(symbol: SymbolRecord): SerializedSymbol {
  if (symbol.kind === 'signature') {
    return symbol.signature;
  }
  const out: { signature: string; calls?: string[]; called_by?: string[] } = { signature: symbol.signature };
  if (symbol.calls) out.calls = symbol.calls;
  if (symbol.called_by) out.called_by = symbol.called_by;
  return out;
}

function serializeSymbols(symbols: Record<string, SymbolRecord>): Record<string, SerializedSymbol> {
  const out: Record<string, SerializedSymbol> = {};
  for (const [name, symbol] of Object.entries(symbols)) {
    out[name] = serializeSymbol(symbol);
  }
  return out;
}

function serializeClass(record: ClassRecord): SerializedClass {
  const out: SerializedClass = { methods: serializeSymbols(record.methods) };
  if (record.extends) out.extends = record.extends;
  return out;
}

export function serializeFileRecord(record: FileRecord): SerializedFileRecord {
  const out: SerializedFileRecord = { language: record.language, parsed: record.parsed };
  if (record.purpose) out.purpose = record.purpose;
  if (record.functions) out.functions = serializeSymbols(record.functions);
  if (record.classes) {
    const classes: Record<string, SerializedClass> = {};
    for (const [name, cls] of Object.entries(record.classes)) {
      classes[name] = serializeClass(cls);
    }
    out.classes = classes;
  }
  if (record.imports) out.imports = record.imports;
  return out;
}

/**
 * The on-disk shape of the index
 */
export function serializeIndex(index: ProjectIndex): SerializedIndex {
  const files: Record<string, SerializedFileRecord> = {};
  for (const [filePath, record] of Object.entries(index.files)) {
    files[filePath] = serializeFileRecord(record);
  }
  return { ...index, files };
}

export function stringifyIndex(index: ProjectIndex): string {
  return JSON.stringify(serializeIndex(index), null, 2);
}

// =============================================================================
// LOOSE DECODING
// =============================================================================

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function countMap(value: unknown): Record<string, number> {
  const out: Record<string, number> = {};
  if (!isRecord(value)) return out;
  for (const [key, count] of Object.entries(value)) {
    if (typeof count === 'number') out[key] = count;
  }
  return out;
}

function numberOr(value: unknown, fallback: number): number {
  return typeof value === 'number' ? value : fallback;
}

/**
 * Stats from a persisted index; missing fields read as zero
 */
export function decodeStats(value: unknown): IndexStats {
  const raw = isRecord(value) ? value : {};
  return {
    total_files: numberOr(raw['total_files'], 0),
    total_directories: numberOr(raw['total_directories'], 0),
    fully_parsed: countMap(raw['fully_parsed']),
    listed_only: countMap(raw['listed_only']),
    markdown_files: numberOr(raw['markdown_files'], 0),
  };
}

// =============================================================================
// PERSISTENCE
// =============================================================================

export interface SaveResult {
  success: boolean;
  error?: string;
  rolledBack: boolean;
  rollbackError?: string;
}

/**
 * Remove a temp file left by a failed write. Anything that is not a regular
 * file is left alone.
 */
async function discardTempFile(tempPath: string): Promise<void> {
  try {
    const stat = await fs.promises.stat(tempPath);
    if (stat.isFile()) {
      await fs.promises.unlink(tempPath);
    }
  } catch (error) {
    if (!hasErrorCode(error, 'ENOENT')) {
      console.warn(`Could not remove temp file ${tempPath}: ${errorMessage(error)}`);
    }
  }
}

/**
 * Write the index to a temp file beside `outputPath`, then rename it into
 * place. Readers see either the old file or the new one, never a partial
 * write. On failure the backup (if any) is copied back over `outputPath`;
 * a failed rollback is reported, not thrown.
 */
export async function safeSaveIndex(
  index: ProjectIndex,
  outputPath: string,
  backupPath: string | null
): Promise<SaveResult> {
  const tempPath = getTempOutputPath(outputPath);

  try {
    await fs.promises.writeFile(tempPath, stringifyIndex(index), 'utf-8');
    await fs.promises.rename(tempPath, outputPath);
    console.log(`Index saved: ${outputPath}`);
    return { success: true, rolledBack: false };
  } catch (error) {
    const message = errorMessage(error);
    console.error(`Failed to save index: ${message}`);
    await discardTempFile(tempPath);

    if (!backupPath || !fs.existsSync(backupPath)) {
      return { success: false, error: message, rolledBack: false };
    }

    try {
      await fs.promises.copyFile(backupPath, outputPath);
      console.log('Restored previous index from backup');
      return { success: false, error: message, rolledBack: true };
    } catch (restoreError) {
      const rollbackError = errorMessage(restoreError);
      console.error(`Rollback also failed: ${rollbackError}`);
      return { success: false, error: message, rolledBack: false, rollbackError };
    }
  }
}
