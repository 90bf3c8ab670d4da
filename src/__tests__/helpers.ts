/**
 * Shared test fixtures for projmap tests
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import type { FileRecord, IndexStats, ProjectIndex, ProjmapConfig, SymbolRecord } from '../types.js';

/**
 * Temp directory for one test; remove with `removeTempDir`
 */
export async function createTempDir(prefix = 'projmap-test-'): Promise<string> {
  return fs.promises.mkdtemp(path.join(os.tmpdir(), prefix));
}

export async function removeTempDir(dir: string): Promise<void> {
  await fs.promises.rm(dir, { recursive: true, force: true });
}

/**
 * Write a file under `root`, creating parent directories
 */
export async function writeProjectFile(root: string, relativePath: string, content: string): Promise<string> {
  const fullPath = path.join(root, relativePath);
  await fs.promises.mkdir(path.dirname(fullPath), { recursive: true });
  await fs.promises.writeFile(fullPath, content, 'utf-8');
  return fullPath;
}

export function sig(signature: string): SymbolRecord {
  return { kind: 'signature', signature };
}

export function calling(signature: string, calls: string[]): SymbolRecord {
  return { kind: 'call-graph', signature, calls };
}

/**
 * Create a mock FileRecord with sensible defaults
 */
export function createMockFile(overrides: Partial<FileRecord> = {}): FileRecord {
  return {
    language: 'python',
    parsed: true,
    ...overrides,
  };
}

export function createMockStats(overrides: Partial<IndexStats> = {}): IndexStats {
  return {
    total_files: 0,
    total_directories: 0,
    fully_parsed: {},
    listed_only: {},
    markdown_files: 0,
    ...overrides,
  };
}

/**
 * Create a mock ProjectIndex. `total_files` defaults to the number of records.
 */
export function createMockIndex(
  files: Record<string, FileRecord> = {},
  overrides: Partial<ProjectIndex> = {}
): ProjectIndex {
  return {
    indexed_at: '2026-01-15T10:00:00.000Z',
    root: '.',
    project_structure: { type: 'tree', root: '.', tree: ['.'] },
    documentation_map: {},
    directory_purposes: {},
    stats: createMockStats({ total_files: Object.keys(files).length }),
    files,
    dependency_graph: {},
    staleness_check: 0,
    ...overrides,
  };
}

/**
 * `count` parsed python files named `<prefix>0.py`, `<prefix>1.py`, ...
 * each defining one function
 */
export function createMockFiles(count: number, prefix = 'mod'): Record<string, FileRecord> {
  const files: Record<string, FileRecord> = {};
  for (let i = 0; i < count; i++) {
    files[`${prefix}${i}.py`] = createMockFile({ functions: { [`f${i}`]: sig('()') } });
  }
  return files;
}

export function createTestConfig(overrides: Partial<ProjmapConfig> = {}): ProjmapConfig {
  return {
    outputFile: 'PROJECT_INDEX.json',
    backupDir: '.project-index-backups',
    maxBackups: 10,
    maxLogEntries: 100,
    maxIndexSize: 1024 * 1024,
    maxFiles: 10000,
    maxTreeDepth: 5,
    verbose: false,
    ...overrides,
  };
}
