/**
 * projmap Update Pipeline
 * backup -> rotate -> build -> compress -> analyze -> confirm -> save -> log
 */

import { BackupInfo, ChangeData, ProjectIndex, ProjmapConfig } from './types.js';
import { getConfig, getOutputPath } from './config.js';
import { BackupSession } from './backups.js';
import { buildIndex } from './indexer.js';
import { compressIndexIfNeeded } from './compress.js';
import { analyzeChanges, formatChangeReport } from './diff.js';
import { safeSaveIndex } from './storage.js';
import { confirmUpdate } from './prompt.js';
import { errorMessage } from './errors.js';

export type UpdateStatus = 'saved' | 'declined' | 'build-failed' | 'save-failed';

export interface UpdateOptions {
  config?: ProjmapConfig;
  maxBackups?: number;                                  // Overrides config.maxBackups
  confirm?: (significant: boolean) => Promise<boolean>;
  verbose?: boolean;
}

export interface UpdateResult {
  status: UpdateStatus;
  outputPath: string;
  index?: ProjectIndex;
  skippedCount: number;
  changeData: ChangeData;
  backup: BackupInfo | null;
  error?: string;
}

function failedChangeData(notes: string): ChangeData {
  return {
    old_stats: null,
    new_stats: null,
    file_changes: { files_added: [], files_removed: [], files_modified: [] },
    significance_level: 'unknown',
    notes,
  };
}

/**
 * Rebuild the index for `projectRoot` and replace the persisted snapshot.
 * Every run appends exactly one entry to the backup log.
 */
export async function updateIndex(projectRoot: string, options: UpdateOptions = {}): Promise<UpdateResult> {
  const baseConfig = options.config ?? getConfig();
  const config: ProjmapConfig = {
    ...baseConfig,
    maxBackups: options.maxBackups ?? baseConfig.maxBackups,
  };
  const verbose = options.verbose ?? config.verbose;
  const confirm = options.confirm ?? confirmUpdate;
  const outputPath = getOutputPath(config, projectRoot);

  const session = await BackupSession.open(projectRoot, config);

  // Step 1: back up the current snapshot and enforce the cap
  const backup = await session.backupExisting(outputPath);
  await session.rotate(config.maxBackups);

  const finish = async (
    status: UpdateStatus,
    changeData: ChangeData,
    extra: Partial<UpdateResult> = {}
  ): Promise<UpdateResult> => {
    session.record(backup, changeData, status === 'saved');
    await session.save();
    return { status, outputPath, skippedCount: 0, changeData, backup, ...extra };
  };

  // Step 2: build
  let index: ProjectIndex;
  let skippedCount: number;
  try {
    const built = await buildIndex(projectRoot, { config, verbose });
    index = compressIndexIfNeeded(built.index, config.maxIndexSize).index;
    skippedCount = built.skippedCount;
  } catch (error) {
    const message = errorMessage(error);
    console.error(`Failed to build index: ${message}`);
    return finish('build-failed', failedChangeData(`Index build failed: ${message}`), { error: message });
  }

  // Step 3: analyze against the snapshot still on disk
  const analysis = await analyzeChanges(outputPath, index);
  console.log(formatChangeReport(analysis));
  const { changeData } = analysis;

  // Step 4: confirm
  let approved: boolean;
  try {
    approved = await confirm(analysis.significant);
  } catch (error) {
    console.error(`Confirmation failed: ${errorMessage(error)}`);
    approved = false;
  }

  if (!approved) {
    console.log('Index update cancelled');
    return finish('declined', changeData, { index, skippedCount });
  }

  // Step 5: persist
  const saved = await safeSaveIndex(index, outputPath, backup ? backup.path : null);
  if (!saved.success) {
    return finish('save-failed', changeData, { index, skippedCount, error: saved.error });
  }

  return finish('saved', changeData, { index, skippedCount });
}
