/**
 * projmap Backup & Log Manager
 * Timestamped snapshot backups, rotation, and the structured change log
 */

import * as fs from 'fs';
import * as path from 'path';
import {
  BackupEntry,
  BackupInfo,
  BackupLog,
  ChangeData,
  ProjmapConfig,
  SignificanceLevel,
} from './types.js';
import { BACKUP_LOG_FILENAME, BACKUP_PREFIX, getBackupDir, getBackupLogPath } from './config.js';
import { decodeStats, isRecord } from './storage.js';
import { errorMessage, hasErrorCode } from './errors.js';

const LOG_DESCRIPTION = 'Backup log for PROJECT_INDEX.json - tracks changes made by each index update';

const SIGNIFICANCE_LEVELS: readonly SignificanceLevel[] = [
  'auto_approved',
  'requires_confirmation',
  'pending',
  'unknown',
];

// =============================================================================
// NAMING
// =============================================================================

function pad(n: number): string {
  return String(n).padStart(2, '0');
}

/**
 * Local time as YYYYMMDD_HHMMSS
 */
export function formatBackupTimestamp(date: Date): string {
  const day = `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
  return `${day}_${time}`;
}

export function backupFilename(date: Date): string {
  return `${BACKUP_PREFIX}${formatBackupTimestamp(date)}.json`;
}

/**
 * Backup snapshots are `PROJECT_INDEX_*.json`; the log file shares the
 * prefix and is never one of them.
 */
export function isBackupFile(filename: string): boolean {
  return filename.startsWith(BACKUP_PREFIX)
    && filename.endsWith('.json')
    && filename !== BACKUP_LOG_FILENAME;
}

// =============================================================================
// LOG FILE
// =============================================================================

export function createBackupLog(projectRoot: string, maxBackups: number): BackupLog {
  return {
    log_version: '1.0',
    created_at: new Date().toISOString(),
    project_path: path.resolve(projectRoot),
    description: LOG_DESCRIPTION,
    max_backups: maxBackups,
    entries: [],
  };
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === 'string');
}

function decodeSignificance(value: unknown): SignificanceLevel {
  return SIGNIFICANCE_LEVELS.find((level) => level === value) ?? 'unknown';
}

function decodeCount(value: unknown): number {
  return typeof value === 'number' ? value : 0;
}

/**
 * Entries written by other versions may miss fields; keep what is there
 */
function decodeEntry(value: unknown): BackupEntry | null {
  if (!isRecord(value) || typeof value['timestamp'] !== 'string') {
    return null;
  }

  const changes = isRecord(value['changes']) ? value['changes'] : {};
  const fileChanges = isRecord(value['file_changes']) ? value['file_changes'] : {};
  const filename = value['backup_filename'];

  return {
    timestamp: value['timestamp'],
    backup_filename: typeof filename === 'string' ? filename : null,
    backup_size_bytes: decodeCount(value['backup_size_bytes']),
    previous_stats: isRecord(value['previous_stats']) ? decodeStats(value['previous_stats']) : null,
    new_stats: isRecord(value['new_stats']) ? decodeStats(value['new_stats']) : null,
    changes: {
      files_added: decodeCount(changes['files_added']),
      files_removed: decodeCount(changes['files_removed']),
      files_modified: decodeCount(changes['files_modified']),
      directories_added: decodeCount(changes['directories_added']),
    },
    file_changes: {
      files_added: isStringArray(fileChanges['files_added']) ? fileChanges['files_added'] : [],
      files_removed: isStringArray(fileChanges['files_removed']) ? fileChanges['files_removed'] : [],
      files_modified: isStringArray(fileChanges['files_modified']) ? fileChanges['files_modified'] : [],
    },
    significance_level: decodeSignificance(value['significance_level']),
    notes: typeof value['notes'] === 'string' ? value['notes'] : '',
    operation_success: value['operation_success'] === true,
  };
}

/**
 * Decode a persisted log. Throws when the document is not a log at all.
 */
export function decodeBackupLog(raw: unknown, fallback: BackupLog): BackupLog {
  if (!isRecord(raw) || !Array.isArray(raw['entries'])) {
    throw new Error('not a backup log (missing "entries")');
  }

  const entries: BackupEntry[] = [];
  for (const item of raw['entries']) {
    const entry = decodeEntry(item);
    if (entry) entries.push(entry);
  }

  return {
    log_version: '1.0',
    created_at: typeof raw['created_at'] === 'string' ? raw['created_at'] : fallback.created_at,
    project_path: typeof raw['project_path'] === 'string' ? raw['project_path'] : fallback.project_path,
    description: typeof raw['description'] === 'string' ? raw['description'] : fallback.description,
    max_backups: typeof raw['max_backups'] === 'number' ? raw['max_backups'] : fallback.max_backups,
    entries,
  };
}

/**
 * Load the log from a backup directory. A missing log starts fresh; an
 * unreadable one warns and starts fresh.
 */
export async function loadBackupLog(backupDir: string, projectRoot: string, maxBackups: number): Promise<BackupLog> {
  const fresh = createBackupLog(projectRoot, maxBackups);
  const logPath = getBackupLogPath(backupDir);

  if (!fs.existsSync(logPath)) {
    return fresh;
  }

  try {
    const content = await fs.promises.readFile(logPath, 'utf-8');
    return decodeBackupLog(JSON.parse(content), fresh);
  } catch (error) {
    console.warn(`Could not load backup log: ${errorMessage(error)}, creating new one`);
    return fresh;
  }
}

// =============================================================================
// ROTATION
// =============================================================================

/**
 * Keep the `maxBackups` most recently modified backups and delete the rest.
 * Returns the removed filenames, newest first.
 */
export async function rotateBackups(backupDir: string, maxBackups: number): Promise<string[]> {
  const removed: string[] = [];

  try {
    const names = (await fs.promises.readdir(backupDir)).filter(isBackupFile);
    const backups = await Promise.all(
      names.map(async (name) => {
        const stat = await fs.promises.stat(path.join(backupDir, name));
        return { name, mtimeMs: stat.mtimeMs };
      })
    );

    backups.sort((a, b) => b.mtimeMs - a.mtimeMs);

    for (const backup of backups.slice(maxBackups)) {
      try {
        await fs.promises.unlink(path.join(backupDir, backup.name));
        removed.push(backup.name);
        console.log(`Removed old backup: ${backup.name}`);
      } catch (error) {
        console.warn(`Could not remove ${backup.name}: ${errorMessage(error)}`);
      }
    }
  } catch (error) {
    console.warn(`Backup rotation failed: ${errorMessage(error)}`);
  }

  return removed;
}

// =============================================================================
// SESSION
// =============================================================================

/**
 * One run's view of the backup directory and its log
 */
export class BackupSession {
  private constructor(
    readonly backupDir: string,
    readonly log: BackupLog,
    private readonly maxLogEntries: number
  ) {}

  /**
   * Ensure the backup directory exists and load its log
   */
  static async open(projectRoot: string, config: ProjmapConfig): Promise<BackupSession> {
    const backupDir = getBackupDir(config, projectRoot);

    // Not recursive: a missing project root must stay missing
    try {
      await fs.promises.mkdir(backupDir);
    } catch (error) {
      if (!hasErrorCode(error, 'EEXIST')) {
        console.warn(`Could not create backup directory: ${errorMessage(error)}`);
      }
    }

    const log = await loadBackupLog(backupDir, projectRoot, config.maxBackups);
    log.max_backups = config.maxBackups;
    return new BackupSession(backupDir, log, config.maxLogEntries);
  }

  get logPath(): string {
    return getBackupLogPath(this.backupDir);
  }

  /**
   * Copy the current snapshot into the backup directory.
   * Returns null when there is nothing to back up or the copy fails.
   */
  async backupExisting(indexPath: string, now: Date = new Date()): Promise<BackupInfo | null> {
    if (!fs.existsSync(indexPath)) {
      console.log(`No existing ${path.basename(indexPath)} to back up`);
      return null;
    }

    const filename = backupFilename(now);
    const backupPath = path.join(this.backupDir, filename);

    try {
      await fs.promises.copyFile(indexPath, backupPath);
      const { size } = await fs.promises.stat(backupPath);
      console.log(`Backup created: ${filename} (${size.toLocaleString('en-US')} bytes)`);
      return { path: backupPath, filename, sizeBytes: size };
    } catch (error) {
      console.warn(`Backup failed: ${errorMessage(error)}`);
      return null;
    }
  }

  rotate(maxBackups: number): Promise<string[]> {
    return rotateBackups(this.backupDir, maxBackups);
  }

  /**
   * Append the outcome of this run to the log
   */
  record(backup: BackupInfo | null, changeData: ChangeData, success: boolean): BackupEntry {
    const { old_stats: oldStats, new_stats: newStats, file_changes: fileChanges } = changeData;

    const entry: BackupEntry = {
      timestamp: new Date().toISOString(),
      backup_filename: backup ? backup.filename : null,
      backup_size_bytes: backup ? backup.sizeBytes : 0,
      previous_stats: oldStats,
      new_stats: newStats,
      changes: {
        files_added: fileChanges.files_added.length,
        files_removed: fileChanges.files_removed.length,
        files_modified: fileChanges.files_modified.length,
        directories_added: newStats
          ? newStats.total_directories - (oldStats?.total_directories ?? 0)
          : 0,
      },
      file_changes: fileChanges,
      significance_level: changeData.significance_level,
      notes: success ? changeData.notes : `${changeData.notes} | Success: false`,
      operation_success: success,
    };

    this.log.entries.push(entry);
    if (this.log.entries.length > this.maxLogEntries) {
      this.log.entries = this.log.entries.slice(-this.maxLogEntries);
    }
    return entry;
  }

  /**
   * Persist the log. Failure warns and is reported through the return value.
   */
  async save(): Promise<boolean> {
    try {
      await fs.promises.writeFile(this.logPath, JSON.stringify(this.log, null, 2), 'utf-8');
      return true;
    } catch (error) {
      console.warn(`Could not save backup log: ${errorMessage(error)}`);
      return false;
    }
  }
}

// =============================================================================
// CLI FORMATTERS
// =============================================================================

/**
 * Printable view of the log header and its newest entries
 */
export function formatBackupLog(log: BackupLog, limit: number = 5): string {
  const lines: string[] = [];

  lines.push(`Backup Log for: ${log.project_path}`);
  lines.push(`Total entries: ${log.entries.length}`);
  lines.push(`Max backups: ${log.max_backups}`);

  if (log.entries.length === 0) {
    lines.push('');
    lines.push('No backup entries found');
    return lines.join('\n');
  }

  lines.push('');
  lines.push('Recent entries:');
  for (const entry of log.entries.slice(-limit)) {
    lines.push(`  ${entry.timestamp} - ${entry.backup_filename ?? '(no backup)'}`);
    lines.push(`    ${entry.notes || 'No notes'}`);
  }

  return lines.join('\n');
}
