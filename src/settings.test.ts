import { readFile, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { ConfigError } from './errors.js';
import { loadSettings, saveSettings } from './settings.js';
import { makeScratchDir, removeScratchDir } from './test/index.js';

describe('settings file', () => {
  let dir: string;
  let file: string;

  beforeEach(async () => {
    dir = await makeScratchDir();
    file = path.join(dir, 'config.json');
  });

  afterEach(async () => {
    await removeScratchDir(dir);
  });

  it('returns null when no settings file exists', async () => {
    await expect(loadSettings(file)).resolves.toBeNull();
  });

  it('writes the pk3_file key and reads it back', async () => {
    await saveSettings(file, { archivePath: 'MBAssets3.pk3' });

    await expect(readFile(file, 'utf8')).resolves.toBe('{"pk3_file":"MBAssets3.pk3"}');
    await expect(loadSettings(file)).resolves.toEqual({ archivePath: 'MBAssets3.pk3' });
  });

  it('rejects a file that is not JSON', async () => {
    await writeFile(file, 'pk3_file=MBAssets3.pk3', 'utf8');
    await expect(loadSettings(file)).rejects.toBeInstanceOf(ConfigError);
  });

  it('rejects an empty pk3_file', async () => {
    await writeFile(file, '{"pk3_file":""}', 'utf8');
    await expect(loadSettings(file)).rejects.toThrow('pk3_file: pk3_file must be a non-empty string');
  });

  it('refuses to save an empty archive path', async () => {
    await expect(saveSettings(file, { archivePath: '' })).rejects.toBeInstanceOf(ConfigError);
    await expect(loadSettings(file)).resolves.toBeNull();
  });
});
