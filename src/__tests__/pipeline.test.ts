/**
 * End-to-end tests for the update pipeline
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'fs';
import * as path from 'path';
import { updateIndex } from '../pipeline.js';
import { toPriorIndex } from '../diff.js';
import { loadBackupLog } from '../backups.js';
import { createTempDir, createTestConfig, removeTempDir, writeProjectFile } from './helpers.js';
import type { BackupLog } from '../types.js';

const APP_PY = `from .utils import helper


def main():
    return helper(1)
`;

const UTILS_PY = `def helper(x):
    return x * 2
`;

async function createProject(root: string): Promise<void> {
  await writeProjectFile(root, 'src/app.py', APP_PY);
  await writeProjectFile(root, 'src/utils.py', UTILS_PY);
  await writeProjectFile(root, 'README.md', '# Demo\n\n## Architecture\n');
}

describe('updateIndex', () => {
  let tempDir: string;
  let outputPath: string;
  const config = createTestConfig();
  const approve = vi.fn(async (_significant: boolean) => true);
  const decline = vi.fn(async (_significant: boolean) => false);

  async function readLog(): Promise<BackupLog> {
    return loadBackupLog(path.join(tempDir, '.project-index-backups'), tempDir, 10);
  }

  beforeEach(async () => {
    tempDir = await createTempDir();
    outputPath = path.join(tempDir, 'PROJECT_INDEX.json');
    await createProject(tempDir);
    approve.mockClear();
    decline.mockClear();
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await removeTempDir(tempDir);
  });

  it('creates the first snapshot without a backup', async () => {
    const result = await updateIndex(tempDir, { config, confirm: approve });

    expect(result.status).toBe('saved');
    expect(result.backup).toBeNull();
    expect(result.changeData.notes).toBe('Initial index creation');
    expect(approve).toHaveBeenCalledWith(false);
    expect(fs.existsSync(outputPath)).toBe(true);

    const log = await readLog();
    expect(log.entries).toHaveLength(1);
    expect(log.entries[0].backup_filename).toBeNull();
    expect(log.entries[0].operation_success).toBe(true);
  });

  it('persists resolved dependencies and both call directions', async () => {
    await updateIndex(tempDir, { config, confirm: approve });
    const saved: unknown = JSON.parse(await fs.promises.readFile(outputPath, 'utf-8'));

    expect(saved).toMatchObject({
      dependency_graph: { 'src/app.py': ['src/utils.py'] },
      stats: { total_files: 2, fully_parsed: { python: 2 }, markdown_files: 1 },
      files: {
        'src/app.py': {
          language: 'python',
          parsed: true,
          imports: ['./utils'],
          functions: { main: { signature: '()', calls: ['helper'] } },
        },
        'src/utils.py': {
          functions: { helper: { signature: '(x)', called_by: ['main'] } },
        },
      },
      documentation_map: {
        'README.md': { sections: ['Demo', 'Architecture'], architecture_hints: ['Architecture'] },
      },
    });
  });

  it('is idempotent across two runs without changes', async () => {
    const first = await updateIndex(tempDir, { config, confirm: approve });
    const second = await updateIndex(tempDir, { config, confirm: approve });

    expect(second.status).toBe('saved');
    expect(second.backup?.filename).toMatch(/^PROJECT_INDEX_\d{8}_\d{6}\.json$/);
    expect(approve).toHaveBeenLastCalledWith(false);
    expect(second.changeData.significance_level).toBe('auto_approved');
    expect(second.changeData.notes).toBe('Routine update: +0 files, +0 directories');
    expect(second.changeData.file_changes).toEqual({ files_added: [], files_removed: [], files_modified: [] });

    expect(first.index && toPriorIndex(first.index).files).toEqual(second.index && toPriorIndex(second.index).files);
  });

  it('keeps the snapshot byte-for-byte and logs a failure when the write fails', async () => {
    await updateIndex(tempDir, { config, confirm: approve });
    const before = await fs.promises.readFile(outputPath);
    await fs.promises.mkdir(`${outputPath}.tmp`);

    const result = await updateIndex(tempDir, { config, confirm: approve });

    expect(result.status).toBe('save-failed');
    expect((await fs.promises.readFile(outputPath)).equals(before)).toBe(true);

    const log = await readLog();
    const last = log.entries[log.entries.length - 1];
    expect(log.entries).toHaveLength(2);
    expect(last.operation_success).toBe(false);
    expect(last.notes).toMatch(/ \| Success: false$/);
  });

  it('asks before a significant change and leaves the snapshot alone when declined', async () => {
    await updateIndex(tempDir, { config, confirm: approve });
    const before = await fs.promises.readFile(outputPath, 'utf-8');
    for (let i = 0; i < 12; i++) {
      await writeProjectFile(tempDir, `extra/m${i}.py`, 'def f():\n    pass\n');
    }

    const result = await updateIndex(tempDir, { config, confirm: decline });

    expect(decline).toHaveBeenCalledWith(true);
    expect(result.status).toBe('declined');
    expect(result.changeData.significance_level).toBe('requires_confirmation');
    expect(await fs.promises.readFile(outputPath, 'utf-8')).toBe(before);

    const log = await readLog();
    expect(log.entries[1].notes).toBe('Large file count change: 12 files | Success: false');
  });

  it('fails the run when the project root cannot be read', async () => {
    const missing = path.join(tempDir, 'missing');

    const result = await updateIndex(missing, { config, confirm: approve });

    expect(result.status).toBe('build-failed');
    expect(result.changeData.significance_level).toBe('unknown');
    expect(result.changeData.notes).toMatch(/^Index build failed: Cannot read project root /);
    expect(approve).not.toHaveBeenCalled();
    expect(fs.existsSync(missing)).toBe(false);
  });

  it('applies the backup cap from the options', async () => {
    const backupDir = path.join(tempDir, '.project-index-backups');
    await fs.promises.mkdir(backupDir);
    for (let i = 0; i < 4; i++) {
      const filePath = await writeProjectFile(backupDir, `PROJECT_INDEX_20250101_00000${i}.json`, '{}');
      await fs.promises.utimes(filePath, 1_700_000_000 + i, 1_700_000_000 + i);
    }

    await updateIndex(tempDir, { config, confirm: approve, maxBackups: 2 });

    const backups = (await fs.promises.readdir(backupDir)).filter((f) => f !== 'PROJECT_INDEX_backups_log.json').sort();
    expect(backups).toEqual(['PROJECT_INDEX_20250101_000002.json', 'PROJECT_INDEX_20250101_000003.json']);
    expect((await readLog()).max_backups).toBe(2);
  });
});
