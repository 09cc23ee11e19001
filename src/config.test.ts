import path from 'node:path';
import { describe, expect, it } from 'vitest';

import { deriveBackupPath, deriveTempPath, resolveSwapConfig } from './config.js';
import { ConfigError } from './errors.js';

describe('derived paths', () => {
  it('puts the backup beside the archive with a .bak suffix', () => {
    expect(deriveBackupPath('MBAssets3.pk3')).toBe('MBAssets3.pk3.bak');
  });

  it('prefixes the archive file name (not its directory) with temp_', () => {
    expect(deriveTempPath(path.join('base', 'MBAssets3.pk3'))).toBe(path.join('base', 'temp_MBAssets3.pk3'));
    expect(deriveTempPath('MBAssets3.pk3')).toBe('temp_MBAssets3.pk3');
  });
});

describe('resolveSwapConfig', () => {
  it('fills in derived paths', () => {
    const config = resolveSwapConfig({ archivePath: 'MBAssets3.pk3', exclusionPrefixes: ['a/'] });
    expect(config).toEqual({
      archivePath: 'MBAssets3.pk3',
      backupPath: 'MBAssets3.pk3.bak',
      tempPath: 'temp_MBAssets3.pk3',
      exclusionPrefixes: ['a/'],
    });
  });

  it('keeps explicit backup and temp paths', () => {
    const config = resolveSwapConfig({
      archivePath: 'x.pk3',
      backupPath: 'saved/x.pk3',
      tempPath: 'scratch.pk3',
      exclusionPrefixes: ['a/'],
    });
    expect(config.backupPath).toBe('saved/x.pk3');
    expect(config.tempPath).toBe('scratch.pk3');
  });

  it('drops repeated prefixes while keeping their order', () => {
    const config = resolveSwapConfig({ archivePath: 'x.pk3', exclusionPrefixes: ['b/', 'a/', 'b/'] });
    expect(config.exclusionPrefixes).toEqual(['b/', 'a/']);
  });

  it('rejects a blank archive path', () => {
    expect(() => resolveSwapConfig({ archivePath: '  ', exclusionPrefixes: ['a/'] })).toThrow(ConfigError);
  });

  it('rejects an empty prefix list', () => {
    expect(() => resolveSwapConfig({ archivePath: 'x.pk3', exclusionPrefixes: [] })).toThrow(
      'exclusionPrefixes: at least one exclusion prefix is required'
    );
  });

  it('rejects an empty prefix', () => {
    expect(() => resolveSwapConfig({ archivePath: 'x.pk3', exclusionPrefixes: [''] })).toThrow(
      'exclusionPrefixes.0: exclusion prefix must be a non-empty string'
    );
  });

  it('rejects a backup path equal to the archive path', () => {
    expect(() =>
      resolveSwapConfig({ archivePath: 'x.pk3', backupPath: 'x.pk3', exclusionPrefixes: ['a/'] })
    ).toThrow(ConfigError);
  });

  it('rejects a backup or temp path equal to the holding path', () => {
    const message = 'Archive, backup, temp and holding paths must all differ';
    expect(() =>
      resolveSwapConfig({ archivePath: 'x.pk3', backupPath: 'x.pk3.swap', exclusionPrefixes: ['a/'] })
    ).toThrow(message);
    expect(() =>
      resolveSwapConfig({ archivePath: 'x.pk3', tempPath: 'x.pk3.swap', exclusionPrefixes: ['a/'] })
    ).toThrow(message);
  });
});
