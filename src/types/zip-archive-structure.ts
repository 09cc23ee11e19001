/**
 * Snapshot of a ZIP archive read from disk, entries kept in central directory
 * order with repeated names listed as separate entries.
 */
import type { ArchiveEntry } from './archive-entry.js';

export interface ZipArchiveStructure {
  readonly filePath: string;
  readonly entries: readonly ArchiveEntry[];
  readonly totalSize: number;
}
