/**
 * Restore: puts the backup back in place of the (stripped) archive.
 * The backup is consumed; it no longer exists at its own path afterwards.
 */
import { pathExists, swapFile } from './file-swap.js';
import { NotFoundError } from './errors.js';
import type { SwapConfig } from './types/swap-config.js';
import type { RestoreResult } from './types/results.js';

/**
 * @throws {NotFoundError} If there is no backup (nothing is touched)
 * @throws {IoError} If the archive cannot be moved aside or the backup cannot be
 *   moved in; the archive is left in place in both cases
 */
export async function restoreArchive(config: Pick<SwapConfig, 'archivePath' | 'backupPath'>): Promise<RestoreResult> {
  const { archivePath, backupPath } = config;

  if (!(await pathExists(backupPath))) {
    throw new NotFoundError(`The backup file '${backupPath}' was not found.`, backupPath);
  }

  if (await pathExists(archivePath)) {
    console.log(`Replacing existing '${archivePath}'...`);
  }

  const { replacedExisting, warnings } = await swapFile(archivePath, backupPath);
  console.log(`Restored from backup: '${archivePath}'`);

  return { archivePath, backupPath, replacedExisting, warnings };
}
