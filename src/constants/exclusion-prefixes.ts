/**
 * Directories stripped from the Movie Battles II asset package by default.
 * The engine itself has no defaults; only the CLI falls back to these.
 */
export const DEFAULT_EXCLUSION_PREFIXES: readonly string[] = [
  'ext_data/mb2/character/',
  'ext_data/mb2/teamconfig/',
] as const;

/** Suffix appended to a prefix to name its placeholder entry. */
export const PLACEHOLDER_NAME = '.keep';

export const BACKUP_SUFFIX = '.bak';
export const TEMP_PREFIX = 'temp_';
export const HOLDING_SUFFIX = '.swap';
