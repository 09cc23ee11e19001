/**
 * Builds the per-call SwapConfig, deriving the backup and temp paths the way
 * the tool always has: `<archive>.bak` and `temp_<archive>` beside the archive.
 */
import { basename, dirname, join } from 'node:path';
import { z, ZodError } from 'zod';
import { BACKUP_SUFFIX, TEMP_PREFIX } from './constants/exclusion-prefixes.js';
import { ConfigError } from './errors.js';
import { holdingPathFor } from './file-swap.js';
import type { SwapConfig, SwapConfigInput } from './types/swap-config.js';

const swapConfigSchema = z.object({
  archivePath: z.string().refine(s => s.trim().length > 0, { message: 'archive path must be a non-empty string' }),
  backupPath: z.string().min(1, { message: 'backup path must be a non-empty string' }).optional(),
  tempPath: z.string().min(1, { message: 'temp path must be a non-empty string' }).optional(),
  exclusionPrefixes: z
    .array(z.string().min(1, { message: 'exclusion prefix must be a non-empty string' }))
    .min(1, { message: 'at least one exclusion prefix is required' }),
});

export const formatZodError = (e: ZodError): string =>
  e.issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`).join('\n');

export function deriveBackupPath(archivePath: string): string {
  return `${archivePath}${BACKUP_SUFFIX}`;
}

export function deriveTempPath(archivePath: string): string {
  return join(dirname(archivePath), `${TEMP_PREFIX}${basename(archivePath)}`);
}

/**
 * Validates caller input and fills in derived paths.
 *
 * @throws {ConfigError} Listing every invalid field
 */
export function resolveSwapConfig(input: SwapConfigInput): SwapConfig {
  const parsed = swapConfigSchema.safeParse(input);
  if (!parsed.success) {
    throw new ConfigError(`Invalid swap configuration:\n${formatZodError(parsed.error)}`, parsed.error);
  }

  const { archivePath, backupPath, tempPath, exclusionPrefixes } = parsed.data;
  const config: SwapConfig = {
    archivePath,
    backupPath: backupPath ?? deriveBackupPath(archivePath),
    tempPath: tempPath ?? deriveTempPath(archivePath),
    exclusionPrefixes: [...new Set(exclusionPrefixes)],
  };

  // The swap parks the archive at its holding path, so that name is taken too.
  const paths = [config.archivePath, config.backupPath, config.tempPath, holdingPathFor(config.archivePath)];
  if (new Set(paths).size !== paths.length) {
    throw new ConfigError(
      `Archive, backup, temp and holding paths must all differ (archive: '${archivePath}')`
    );
  }
  return config;
}
