/**
 * pk3-strip - Main entry point
 *
 * Backs up a ZIP-based game asset package, strips configured directories from it
 * and restores it from the backup.
 */

export { backupAndStrip } from './strip.js';
export type { BackupAndStripOptions, BackupOverwritePolicy } from './strip.js';
export { restoreArchive } from './restore.js';
export { inspectArchive } from './status.js';

export { resolveSwapConfig, deriveBackupPath, deriveTempPath } from './config.js';
export { loadSettings, saveSettings, DEFAULT_SETTINGS_FILE } from './settings.js';
export type { Settings } from './settings.js';
export { isExcluded, placeholderName, planStrip } from './strip-plan.js';
export type { StripPlan } from './strip-plan.js';
export { DEFAULT_EXCLUSION_PREFIXES } from './constants/exclusion-prefixes.js';

export {
  ArchiveSwapError,
  NotFoundError,
  FormatError,
  IoError,
  ConfigError,
  BackupExistsError,
} from './errors.js';
export type { ArchiveSwapErrorKind } from './errors.js';

export { hasWarnings } from './types/results.js';
export type {
  StripResult,
  RestoreResult,
  ArchiveStatus,
  ArchiveState,
  SwapWarning,
  SwapWarningCode,
} from './types/results.js';
export type { SwapConfig, SwapConfigInput } from './types/swap-config.js';
