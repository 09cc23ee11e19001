#!/usr/bin/env node
/**
 * pk3-strip - CLI Interface
 *
 * Command-line interface for stripping and restoring a .pk3 asset package.
 */

import { Command } from 'commander';
import { resolve } from 'node:path';
import { backupAndStrip } from './strip.js';
import { restoreArchive } from './restore.js';
import { inspectArchive } from './status.js';
import { resolveSwapConfig } from './config.js';
import { DEFAULT_SETTINGS_FILE, loadSettings, saveSettings } from './settings.js';
import { DEFAULT_EXCLUSION_PREFIXES } from './constants/exclusion-prefixes.js';
import { ConfigError, describeError } from './errors.js';
import { hasWarnings } from './types/results.js';
import type { SwapWarning } from './types/results.js';

interface CommonOptions {
  config: string;
  backup?: string;
}

interface StripOptions extends CommonOptions {
  prefix?: string[];
  overwrite: boolean;
}

const program = new Command();

// Version is set at build time
const version = '0.1.0';

/**
 * Uses the archive given on the command line, falling back to the one stored
 * in the settings file.
 */
async function resolveArchive(archive: string | undefined, configFile: string): Promise<string> {
  if (archive) {
    return resolve(archive);
  }
  const settings = await loadSettings(resolve(configFile));
  if (!settings) {
    throw new ConfigError(`No PK3 file configured. Pass one, or run 'pk3-strip use <archive>' first.`);
  }
  console.log(`Using configured PK3 file: '${settings.archivePath}'`);
  return resolve(settings.archivePath);
}

function reportWarnings(warnings: readonly SwapWarning[]): void {
  console.log('');
  console.log(`⚠️  Completed with ${warnings.length} warning(s):`);
  for (const warning of warnings) {
    console.log(`  [${warning.code}] ${warning.message}`);
  }
}

program
  .name('pk3-strip')
  .description('Back up a .pk3 asset package, strip character and team configs from it, and restore it')
  .version(version);

program
  .command('strip')
  .alias('backup')
  .description('Copy the package to a backup, then remove the excluded directories from the original')
  .argument('[archive]', 'Path to the .pk3 file (defaults to the configured one)')
  .option('--backup <file>', 'Backup path (defaults to <archive>.bak)')
  .option('--prefix <prefix...>', 'Entry prefixes to strip (replaces the defaults)')
  .option('--no-overwrite', 'Refuse to overwrite an existing backup')
  .option('--config <file>', 'Settings file', DEFAULT_SETTINGS_FILE)
  .action(async (archive: string | undefined, options: StripOptions) => {
    try {
      const archivePath = await resolveArchive(archive, options.config);
      const config = resolveSwapConfig({
        archivePath,
        backupPath: options.backup ? resolve(options.backup) : undefined,
        exclusionPrefixes: options.prefix ?? DEFAULT_EXCLUSION_PREFIXES,
      });

      console.log(`Stripping package: ${config.archivePath}`);
      console.log(`Backup will be written to: ${config.backupPath}`);
      console.log('');

      const result = await backupAndStrip(config, { overwriteBackup: options.overwrite ? 'warn' : 'refuse' });

      console.log('');
      console.log(`Kept ${result.keptEntries.length} entries, removed ${result.removedEntries.length}.`);
      if (hasWarnings(result)) {
        reportWarnings(result.warnings);
      }
      console.log('✅ Strip completed successfully!');

    } catch (error) {
      console.error('❌ Strip failed:', describeError(error));
      process.exitCode = 1;
    }
  });

program
  .command('restore')
  .description('Replace the package with its backup')
  .argument('[archive]', 'Path to the .pk3 file (defaults to the configured one)')
  .option('--backup <file>', 'Backup path (defaults to <archive>.bak)')
  .option('--config <file>', 'Settings file', DEFAULT_SETTINGS_FILE)
  .action(async (archive: string | undefined, options: CommonOptions) => {
    try {
      const archivePath = await resolveArchive(archive, options.config);
      const config = resolveSwapConfig({
        archivePath,
        backupPath: options.backup ? resolve(options.backup) : undefined,
        exclusionPrefixes: DEFAULT_EXCLUSION_PREFIXES,
      });

      const result = await restoreArchive(config);

      if (hasWarnings(result)) {
        reportWarnings(result.warnings);
      }
      console.log('');
      console.log('✅ Restore completed successfully!');

    } catch (error) {
      console.error('❌ Restore failed:', describeError(error));
      process.exitCode = 1;
    }
  });

program
  .command('status')
  .description('Show whether the package is original, stripped, or only present as a backup')
  .argument('[archive]', 'Path to the .pk3 file (defaults to the configured one)')
  .option('--backup <file>', 'Backup path (defaults to <archive>.bak)')
  .option('--config <file>', 'Settings file', DEFAULT_SETTINGS_FILE)
  .action(async (archive: string | undefined, options: CommonOptions) => {
    try {
      const archivePath = await resolveArchive(archive, options.config);
      const config = resolveSwapConfig({
        archivePath,
        backupPath: options.backup ? resolve(options.backup) : undefined,
        exclusionPrefixes: DEFAULT_EXCLUSION_PREFIXES,
      });

      const status = await inspectArchive(config);
      console.log(`Archive: ${status.archivePath} (${status.archiveExists ? 'present' : 'missing'})`);
      console.log(`Backup:  ${status.backupPath} (${status.backupExists ? 'present' : 'missing'})`);
      console.log(`State:   ${status.state}`);

    } catch (error) {
      console.error('❌ Status failed:', describeError(error));
      process.exitCode = 1;
    }
  });

program
  .command('use')
  .description('Remember which .pk3 file the other commands work on')
  .argument('<archive>', 'Path to the .pk3 file')
  .option('--config <file>', 'Settings file', DEFAULT_SETTINGS_FILE)
  .action(async (archive: string, options: { config: string }) => {
    try {
      const configFile = resolve(options.config);
      await saveSettings(configFile, { archivePath: archive });
      console.log(`Configuration updated to '${archive}' in '${configFile}'.`);

    } catch (error) {
      console.error('❌ Saving configuration failed:', describeError(error));
      process.exitCode = 1;
    }
  });

await program.parseAsync();
