/**
 * Tests for serialization and atomic persistence
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'fs';
import * as path from 'path';
import { decodeStats, safeSaveIndex, serializeIndex, stringifyIndex } from '../storage.js';
import { calling, createMockFile, createMockIndex, createTempDir, removeTempDir, sig, writeProjectFile } from './helpers.js';

describe('serializeIndex', () => {
  it('writes signature-only symbols as bare strings and drops the kind tag', () => {
    const index = createMockIndex({
      'a.py': createMockFile({
        purpose: 'Entry point',
        functions: {
          main: { kind: 'call-graph', signature: '()', calls: ['helper'], called_by: ['run'] },
          helper: sig('(x)'),
        },
        classes: { Store: { methods: { save: calling('(self)', ['helper']) }, extends: 'Base' } },
        imports: ['./b'],
      }),
    });

    expect(serializeIndex(index).files['a.py']).toEqual({
      language: 'python',
      parsed: true,
      purpose: 'Entry point',
      functions: {
        main: { signature: '()', calls: ['helper'], called_by: ['run'] },
        helper: '(x)',
      },
      classes: { Store: { methods: { save: { signature: '(self)', calls: ['helper'] } }, extends: 'Base' } },
      imports: ['./b'],
    });
  });

  it('leaves out optional fields that are absent', () => {
    const index = createMockIndex({ 'x.go': createMockFile({ language: 'go', parsed: false }) });
    expect(serializeIndex(index).files['x.go']).toEqual({ language: 'go', parsed: false });
  });
});

describe('decodeStats', () => {
  it('reads missing fields as zero', () => {
    expect(decodeStats({ total_files: 4, fully_parsed: { python: 2, bad: 'x' } })).toEqual({
      total_files: 4,
      total_directories: 0,
      fully_parsed: { python: 2 },
      listed_only: {},
      markdown_files: 0,
    });
    expect(decodeStats(null).total_files).toBe(0);
  });
});

describe('safeSaveIndex', () => {
  let tempDir: string;
  let outputPath: string;

  beforeEach(async () => {
    tempDir = await createTempDir();
    outputPath = path.join(tempDir, 'PROJECT_INDEX.json');
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await removeTempDir(tempDir);
  });

  it('writes the snapshot and leaves no temp file behind', async () => {
    const index = createMockIndex({ 'a.py': createMockFile() });

    const result = await safeSaveIndex(index, outputPath, null);

    expect(result).toEqual({ success: true, rolledBack: false });
    expect(await fs.promises.readFile(outputPath, 'utf-8')).toBe(stringifyIndex(index));
    expect(fs.existsSync(`${outputPath}.tmp`)).toBe(false);
  });

  it('restores the previous snapshot from the backup when the write fails', async () => {
    const previous = '{"previous": true}\n';
    await fs.promises.writeFile(outputPath, previous, 'utf-8');
    const backupPath = await writeProjectFile(tempDir, 'backups/PROJECT_INDEX_20260101_000000.json', previous);
    // A directory in the way of the temp file makes the write fail
    await fs.promises.mkdir(`${outputPath}.tmp`);

    const result = await safeSaveIndex(createMockIndex(), outputPath, backupPath);

    expect(result.success).toBe(false);
    expect(result.rolledBack).toBe(true);
    expect(result.error).toBeDefined();
    expect(await fs.promises.readFile(outputPath, 'utf-8')).toBe(previous);
  });

  it('leaves the existing snapshot untouched when there is no backup', async () => {
    const previous = '{"previous": true}\n';
    await fs.promises.writeFile(outputPath, previous, 'utf-8');
    await fs.promises.mkdir(`${outputPath}.tmp`);

    const result = await safeSaveIndex(createMockIndex(), outputPath, null);

    expect(result.success).toBe(false);
    expect(result.rolledBack).toBe(false);
    expect(await fs.promises.readFile(outputPath, 'utf-8')).toBe(previous);
  });

  it('removes the temp file when the rename fails', async () => {
    // The output path is a non-empty directory, so the rename fails
    await writeProjectFile(tempDir, 'PROJECT_INDEX.json/keep.txt', 'x');

    const result = await safeSaveIndex(createMockIndex(), outputPath, null);

    expect(result.success).toBe(false);
    expect(fs.existsSync(`${outputPath}.tmp`)).toBe(false);
  });

  it('reports a failed rollback without throwing', async () => {
    await writeProjectFile(tempDir, 'PROJECT_INDEX.json/keep.txt', 'x');
    const backupPath = await writeProjectFile(tempDir, 'backup.json', '{}');

    const result = await safeSaveIndex(createMockIndex(), outputPath, backupPath);

    expect(result.success).toBe(false);
    expect(result.rolledBack).toBe(false);
    expect(result.rollbackError).toBeDefined();
  });
});
