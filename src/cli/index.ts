#!/usr/bin/env node

/**
 * projmap CLI
 * Structural project index with safe, versioned updates
 */

import { Command } from 'commander';
import * as fs from 'fs';
import * as path from 'path';
import { VERSION, getBackupDir, getConfig, parseMaxBackups } from '../config.js';
import { formatBackupLog, loadBackupLog, rotateBackups } from '../backups.js';
import { updateIndex } from '../pipeline.js';
import { formatSummary } from '../summary.js';

interface CliOptions {
  maxBackups?: string;
  showBackupLog?: boolean;
  cleanupBackups?: boolean;
  verbose?: boolean;
}

const program = new Command();

program
  .name('projmap')
  .description('Build PROJECT_INDEX.json: project structure, signatures, dependency and call graphs')
  .version(VERSION)
  .argument('[path]', 'Project root', '.')
  .option('--max-backups <n>', 'Number of snapshot backups to keep')
  .option('--show-backup-log', 'Show the most recent backup log entries')
  .option('--cleanup-backups', 'Apply backup rotation and exit')
  .option('-v, --verbose', 'Show detailed progress');

// =============================================================================
// ACTIONS
// =============================================================================

function resolveMaxBackups(raw: string | undefined, fallback: number): number {
  if (raw === undefined) return fallback;
  const parsed = parseMaxBackups(raw);
  if (!parsed.valid) {
    console.warn(`Invalid --max-backups value, using default: ${parsed.value}`);
  }
  return parsed.value;
}

async function showBackupLog(projectRoot: string, maxBackups: number): Promise<void> {
  const backupDir = getBackupDir(getConfig(), projectRoot);
  if (!fs.existsSync(backupDir)) {
    console.log('No backup directory found');
    return;
  }
  const log = await loadBackupLog(backupDir, projectRoot, maxBackups);
  console.log(formatBackupLog(log));
}

async function cleanupBackups(projectRoot: string, maxBackups: number): Promise<void> {
  const backupDir = getBackupDir(getConfig(), projectRoot);
  if (!fs.existsSync(backupDir)) {
    console.log('No backup directory found');
    return;
  }
  console.log(`Cleaning up backups (keeping ${maxBackups} most recent)...`);
  const removed = await rotateBackups(backupDir, maxBackups);
  console.log(`Cleanup complete (${removed.length} removed)`);
}

async function runUpdate(projectRoot: string, maxBackups: number, verbose: boolean): Promise<boolean> {
  console.log(`projmap v${VERSION}`);
  console.log(`Building project index for ${projectRoot}...`);

  const result = await updateIndex(projectRoot, { maxBackups, verbose });

  switch (result.status) {
    case 'build-failed':
      return false;
    case 'declined':
      return false;
    case 'save-failed':
      console.error('Index was not updated; the previous snapshot is unchanged');
      return false;
    case 'saved':
      break;
  }

  if (result.index) {
    console.log('');
    console.log(formatSummary(result.index, result.skippedCount, projectRoot));
  }

  console.log('');
  console.log(`Saved to: ${result.outputPath}`);
  if (result.backup) {
    console.log(`Backup stored: ${result.backup.filename}`);
  }
  console.log('Use --show-backup-log to view change history');
  return true;
}

program.action(async (pathArg: string, options: CliOptions) => {
  const projectRoot = path.resolve(pathArg);
  const maxBackups = resolveMaxBackups(options.maxBackups, getConfig().maxBackups);

  try {
    if (options.showBackupLog) {
      await showBackupLog(projectRoot, maxBackups);
      return;
    }

    if (options.cleanupBackups) {
      await cleanupBackups(projectRoot, maxBackups);
      return;
    }

    const ok = await runUpdate(projectRoot, maxBackups, options.verbose === true || getConfig().verbose);
    if (!ok) {
      process.exit(1);
    }
  } catch (error) {
    console.error('Unexpected error:', error);
    process.exit(1);
  }
});

// =============================================================================
// PARSE AND RUN
// =============================================================================

program.parseAsync().catch((error: unknown) => {
  console.error('Error:', error);
  process.exit(1);
});
