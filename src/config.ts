/**
 * projmap Configuration System
 * Output paths, limits and runtime settings
 */

import * as path from 'path';
import { ProjmapConfig } from './types.js';

export type { ProjmapConfig };

export const VERSION = '0.3.0';

// =============================================================================
// DEFAULT CONFIGURATION
// =============================================================================

export const DEFAULT_MAX_BACKUPS = 10;

const DEFAULT_CONFIG: ProjmapConfig = {
  outputFile: 'PROJECT_INDEX.json',
  backupDir: '.project-index-backups',
  maxBackups: DEFAULT_MAX_BACKUPS,
  maxLogEntries: 100,
  maxIndexSize: 1024 * 1024,
  maxFiles: 10000,
  maxTreeDepth: 5,
  verbose: false,
};

export const BACKUP_LOG_FILENAME = 'PROJECT_INDEX_backups_log.json';
export const BACKUP_PREFIX = 'PROJECT_INDEX_';

// =============================================================================
// ENVIRONMENT VARIABLES
// =============================================================================

/**
 * Environment variables that override default config
 *
 * PROJMAP_OUTPUT: string - Snapshot filename
 * PROJMAP_BACKUP_DIR: string - Backup directory name
 * PROJMAP_MAX_BACKUPS: number - Backups kept by rotation (>= 1)
 * PROJMAP_MAX_LOG_ENTRIES: number - Entries kept in the backup log
 * PROJMAP_MAX_INDEX_SIZE: number - Serialized size budget in bytes
 * PROJMAP_MAX_FILES: number - Stop indexing after this many files
 * PROJMAP_MAX_TREE_DEPTH: number - Directory tree depth
 * PROJMAP_VERBOSE: 'true' | 'false' - Progress output
 */

function getEnvBoolean(key: string, defaultValue: boolean): boolean {
  const value = process.env[key];
  if (value === undefined) return defaultValue;
  return value.toLowerCase() === 'true';
}

function getEnvPositiveInt(key: string, defaultValue: number): number {
  const value = process.env[key];
  if (value === undefined) return defaultValue;
  const parsed = parseInt(value, 10);
  return isNaN(parsed) || parsed < 1 ? defaultValue : parsed;
}

// =============================================================================
// CONFIGURATION LOADING
// =============================================================================

/**
 * Load configuration from environment and defaults
 */
export function loadConfig(): ProjmapConfig {
  return {
    outputFile: process.env['PROJMAP_OUTPUT'] || DEFAULT_CONFIG.outputFile,
    backupDir: process.env['PROJMAP_BACKUP_DIR'] || DEFAULT_CONFIG.backupDir,
    maxBackups: getEnvPositiveInt('PROJMAP_MAX_BACKUPS', DEFAULT_CONFIG.maxBackups),
    maxLogEntries: getEnvPositiveInt('PROJMAP_MAX_LOG_ENTRIES', DEFAULT_CONFIG.maxLogEntries),
    maxIndexSize: getEnvPositiveInt('PROJMAP_MAX_INDEX_SIZE', DEFAULT_CONFIG.maxIndexSize),
    maxFiles: getEnvPositiveInt('PROJMAP_MAX_FILES', DEFAULT_CONFIG.maxFiles),
    maxTreeDepth: getEnvPositiveInt('PROJMAP_MAX_TREE_DEPTH', DEFAULT_CONFIG.maxTreeDepth),
    verbose: getEnvBoolean('PROJMAP_VERBOSE', DEFAULT_CONFIG.verbose),
  };
}

/**
 * Parse a --max-backups value. Anything that is not an integer >= 1
 * falls back to the default.
 */
export function parseMaxBackups(value: string): { value: number; valid: boolean } {
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    return { value: DEFAULT_MAX_BACKUPS, valid: false };
  }
  return parsed < 1
    ? { value: DEFAULT_MAX_BACKUPS, valid: true }
    : { value: parsed, valid: true };
}

// =============================================================================
// PATH RESOLUTION
// =============================================================================

/**
 * Get path to the persisted snapshot
 */
export function getOutputPath(config: ProjmapConfig, projectRoot?: string): string {
  return path.join(projectRoot || process.cwd(), config.outputFile);
}

/**
 * Temporary write target, adjacent to the snapshot so the rename stays on
 * one filesystem
 */
export function getTempOutputPath(outputPath: string): string {
  return `${outputPath}.tmp`;
}

/**
 * Get path to the backup directory
 */
export function getBackupDir(config: ProjmapConfig, projectRoot?: string): string {
  return path.join(projectRoot || process.cwd(), config.backupDir);
}

export function getBackupLogPath(backupDir: string): string {
  return path.join(backupDir, BACKUP_LOG_FILENAME);
}

// =============================================================================
// EXPORT CONFIG SINGLETON
// =============================================================================

let cachedConfig: ProjmapConfig | null = null;

/**
 * Get the current configuration (cached)
 */
export function getConfig(): ProjmapConfig {
  if (!cachedConfig) {
    cachedConfig = loadConfig();
  }
  return cachedConfig;
}

/**
 * Reset the cached configuration (for testing)
 */
export function resetConfig(): void {
  cachedConfig = null;
}

/**
 * Override configuration (for testing)
 */
export function setConfig(config: Partial<ProjmapConfig>): ProjmapConfig {
  cachedConfig = { ...loadConfig(), ...config };
  return cachedConfig;
}
