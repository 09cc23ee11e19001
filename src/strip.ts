/**
 * Backup-and-strip: copies the package to its backup path, then replaces the
 * package with a rewritten copy that no longer contains the excluded directories.
 *
 * Callers must not run this concurrently with another strip or restore of the
 * same archive.
 */
import { copyFile, rm } from 'node:fs/promises';
import { rewriteArchive } from './rewrite.js';
import type { RewriteOutcome } from './rewrite.js';
import { pathExists, swapFile } from './file-swap.js';
import type { SwapOutcome } from './file-swap.js';
import { BackupExistsError, FormatError, IoError, NotFoundError, describeError } from './errors.js';
import type { SwapConfig } from './types/swap-config.js';
import type { StripResult, SwapWarning } from './types/results.js';

/**
 * What to do when a backup already exists. `warn` overwrites it, so a second
 * strip without a restore in between backs up the already-stripped archive.
 */
export type BackupOverwritePolicy = 'warn' | 'refuse';

export interface BackupAndStripOptions {
  readonly overwriteBackup?: BackupOverwritePolicy;
}

/** Best-effort removal used while unwinding a failed operation. */
async function discard(filePath: string, what: string): Promise<void> {
  try {
    await rm(filePath, { force: true });
  } catch (error) {
    console.warn(`⚠️  Could not remove ${what} '${filePath}': ${describeError(error)}`);
  }
}

/**
 * @throws {NotFoundError} If the archive does not exist (nothing is touched)
 * @throws {BackupExistsError} If a backup exists and the policy is `refuse`
 * @throws {IoError} If the backup copy, rewrite or final swap fails
 * @throws {FormatError} If the archive is not a ZIP container (backup is removed again)
 */
export async function backupAndStrip(config: SwapConfig, options: BackupAndStripOptions = {}): Promise<StripResult> {
  const { archivePath, backupPath, tempPath, exclusionPrefixes } = config;
  const overwriteBackup: BackupOverwritePolicy = options.overwriteBackup ?? 'warn';
  const warnings: SwapWarning[] = [];

  if (!(await pathExists(archivePath))) {
    throw new NotFoundError(`The file '${archivePath}' was not found.`, archivePath);
  }

  const backupOverwritten = await pathExists(backupPath);
  if (backupOverwritten) {
    if (overwriteBackup === 'refuse') {
      throw new BackupExistsError(
        `A backup file '${backupPath}' already exists. Restore it or remove it before stripping again.`,
        backupPath
      );
    }
    const message = `A backup file '${backupPath}' already exists. Overwriting...`;
    console.warn(`⚠️  ${message}`);
    warnings.push({ code: 'backup-overwritten', path: backupPath, message });
  }

  try {
    await copyFile(archivePath, backupPath);
  } catch (error) {
    throw new IoError(`Error creating backup file '${backupPath}': ${describeError(error)}`, backupPath, error);
  }
  console.log(`Backup created: '${backupPath}'`);

  let rewrite: RewriteOutcome;
  try {
    rewrite = await rewriteArchive(archivePath, tempPath, exclusionPrefixes);
  } catch (error) {
    await discard(tempPath, 'temporary archive');
    await discard(backupPath, 'backup');
    if (error instanceof FormatError) {
      throw error;
    }
    throw new IoError(
      `An error occurred while modifying '${archivePath}': ${describeError(error)}`,
      archivePath,
      error
    );
  }
  warnings.push(...rewrite.warnings);
  console.log(`Files removed from '${archivePath}' as requested.`);

  let swap: SwapOutcome;
  try {
    swap = await swapFile(archivePath, tempPath);
  } catch (error) {
    await discard(tempPath, 'temporary archive');
    throw error;
  }
  warnings.push(...swap.warnings);
  console.log(`The original file '${archivePath}' has been modified.`);

  return {
    archivePath,
    backupPath,
    keptEntries: rewrite.kept,
    removedEntries: rewrite.removed,
    placeholders: rewrite.placeholders,
    backupOverwritten,
    warnings,
  };
}
