/**
 * A single named record inside a ZIP archive, with its content loaded lazily.
 */
export interface ArchiveEntry {
  readonly name: string;
  readonly dir: boolean;
  readonly date: Date;
  readonly comment: string;
  /** High byte of "version made by": 0 for MS-DOS, 3 for Unix. */
  readonly hostSystem: number;
  /** Raw external file attributes; the Unix mode sits in the upper 16 bits when hostSystem is 3. */
  readonly externalAttributes: number;
  /** Decompresses the entry; rejects when its stored data is unreadable. */
  readonly read: () => Promise<Buffer>;
}
