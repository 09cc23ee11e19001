import { pathExists } from './file-swap.js';
import type { SwapConfig } from './types/swap-config.js';
import type { ArchiveState, ArchiveStatus } from './types/results.js';

/**
 * Reports where an archive sits in the strip/restore cycle, judged only by
 * which of the two files exist.
 */
export async function inspectArchive(config: Pick<SwapConfig, 'archivePath' | 'backupPath'>): Promise<ArchiveStatus> {
  const { archivePath, backupPath } = config;
  const archiveExists = await pathExists(archivePath);
  const backupExists = await pathExists(backupPath);

  let state: ArchiveState;
  if (archiveExists) {
    state = backupExists ? 'stripped-with-backup' : 'original';
  } else {
    state = backupExists ? 'backup-only' : 'missing';
  }

  return { archivePath, backupPath, archiveExists, backupExists, state };
}
