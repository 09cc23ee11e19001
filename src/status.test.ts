import { writeFile } from 'node:fs/promises';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { deriveBackupPath } from './config.js';
import { inspectArchive } from './status.js';
import { makeScratchDir, removeScratchDir } from './test/index.js';

describe('inspectArchive', () => {
  let dir: string;
  let archivePath: string;
  let backupPath: string;

  beforeEach(async () => {
    dir = await makeScratchDir();
    archivePath = path.join(dir, 'MBAssets3.pk3');
    backupPath = deriveBackupPath(archivePath);
  });

  afterEach(async () => {
    await removeScratchDir(dir);
  });

  it('reports missing when neither file exists', async () => {
    await expect(inspectArchive({ archivePath, backupPath })).resolves.toEqual({
      archivePath,
      backupPath,
      archiveExists: false,
      backupExists: false,
      state: 'missing',
    });
  });

  it('reports original when only the archive exists', async () => {
    await writeFile(archivePath, 'pk3', 'utf8');
    await expect(inspectArchive({ archivePath, backupPath })).resolves.toMatchObject({ state: 'original' });
  });

  it('reports stripped-with-backup when both exist', async () => {
    await writeFile(archivePath, 'pk3', 'utf8');
    await writeFile(backupPath, 'pk3', 'utf8');
    await expect(inspectArchive({ archivePath, backupPath })).resolves.toMatchObject({ state: 'stripped-with-backup' });
  });

  it('reports backup-only when the archive is gone', async () => {
    await writeFile(backupPath, 'pk3', 'utf8');
    await expect(inspectArchive({ archivePath, backupPath })).resolves.toMatchObject({ state: 'backup-only' });
  });
});
