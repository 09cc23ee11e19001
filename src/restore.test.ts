import { readFile, readdir, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { deriveBackupPath } from './config.js';
import { NotFoundError } from './errors.js';
import { restoreArchive } from './restore.js';
import { makeScratchDir, removeScratchDir } from './test/index.js';

describe('restoreArchive', () => {
  let dir: string;
  let archivePath: string;
  let backupPath: string;

  beforeEach(async () => {
    dir = await makeScratchDir();
    archivePath = path.join(dir, 'MBAssets3.pk3');
    backupPath = deriveBackupPath(archivePath);
    vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await removeScratchDir(dir);
  });

  it('replaces the archive with the backup and consumes the backup', async () => {
    await writeFile(archivePath, 'stripped', 'utf8');
    await writeFile(backupPath, 'original', 'utf8');

    const result = await restoreArchive({ archivePath, backupPath });

    expect(result).toEqual({ archivePath, backupPath, replacedExisting: true, warnings: [] });
    await expect(readFile(archivePath, 'utf8')).resolves.toBe('original');
    expect(await readdir(dir)).toEqual(['MBAssets3.pk3']);
  });

  it('recovers an archive that only exists as a backup', async () => {
    await writeFile(backupPath, 'original', 'utf8');

    const result = await restoreArchive({ archivePath, backupPath });

    expect(result.replacedExisting).toBe(false);
    await expect(readFile(archivePath, 'utf8')).resolves.toBe('original');
  });

  it('reports NotFoundError and leaves the archive alone without a backup', async () => {
    await writeFile(archivePath, 'stripped', 'utf8');

    const error: unknown = await restoreArchive({ archivePath, backupPath }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(NotFoundError);
    expect(error).toMatchObject({ kind: 'not-found', path: backupPath });
    await expect(readFile(archivePath, 'utf8')).resolves.toBe('stripped');
    expect(await readdir(dir)).toEqual(['MBAssets3.pk3']);
  });
});
