/**
 * Outcomes reported by the engine. Warnings are problems that were recovered
 * from locally; an operation that throws produced no result at all.
 */

export type SwapWarningCode =
  | 'entry-skipped'
  | 'placeholder-skipped'
  | 'backup-overwritten'
  | 'holding-file-left';

export interface SwapWarning {
  readonly code: SwapWarningCode;
  readonly path?: string;
  readonly message: string;
}

export interface StripResult {
  readonly archivePath: string;
  readonly backupPath: string;
  readonly keptEntries: readonly string[];
  readonly removedEntries: readonly string[];
  readonly placeholders: readonly string[];
  readonly backupOverwritten: boolean;
  readonly warnings: readonly SwapWarning[];
}

export interface RestoreResult {
  readonly archivePath: string;
  readonly backupPath: string;
  /** True when a (stripped) archive was present and got replaced. */
  readonly replacedExisting: boolean;
  readonly warnings: readonly SwapWarning[];
}

export type ArchiveState = 'original' | 'stripped-with-backup' | 'backup-only' | 'missing';

export interface ArchiveStatus {
  readonly archivePath: string;
  readonly backupPath: string;
  readonly archiveExists: boolean;
  readonly backupExists: boolean;
  readonly state: ArchiveState;
}

export function hasWarnings(result: { readonly warnings: readonly SwapWarning[] }): boolean {
  return result.warnings.length > 0;
}
