/**
 * Per-call configuration for the backup/strip/restore operations.
 * Built by `resolveSwapConfig`; never held as process-wide state.
 */
export interface SwapConfig {
  /** The package being managed. */
  readonly archivePath: string;
  /** Byte-for-byte copy taken before stripping. */
  readonly backupPath: string;
  /** Scratch file the rewritten archive is built in. */
  readonly tempPath: string;
  /** Entries whose name starts with any of these are removed. */
  readonly exclusionPrefixes: readonly string[];
}

export interface SwapConfigInput {
  readonly archivePath: string;
  readonly backupPath?: string;
  readonly tempPath?: string;
  readonly exclusionPrefixes: readonly string[];
}
