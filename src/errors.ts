/**
 * Error types raised by the archive swap engine.
 *
 * Every error carries a `kind` discriminant so callers can branch without
 * `instanceof` chains, and keeps the underlying failure as `cause`.
 */

export type ArchiveSwapErrorKind = 'not-found' | 'format' | 'io' | 'config' | 'backup-exists';

export class ArchiveSwapError extends Error {
  constructor(
    message: string,
    public readonly kind: ArchiveSwapErrorKind,
    public readonly cause?: unknown
  ) {
    super(message);
    this.name = 'ArchiveSwapError';
  }
}

/** An expected file (archive or backup) is missing. */
export class NotFoundError extends ArchiveSwapError {
  constructor(message: string, public readonly path: string) {
    super(message, 'not-found');
    this.name = 'NotFoundError';
  }
}

/** The archive bytes are not a readable ZIP container. */
export class FormatError extends ArchiveSwapError {
  constructor(message: string, public readonly path: string, cause?: unknown) {
    super(message, 'format', cause);
    this.name = 'FormatError';
  }
}

/** A copy, delete, rename or write failed at the filesystem level. */
export class IoError extends ArchiveSwapError {
  constructor(message: string, public readonly path: string, cause?: unknown) {
    super(message, 'io', cause);
    this.name = 'IoError';
  }
}

export class ConfigError extends ArchiveSwapError {
  constructor(message: string, cause?: unknown) {
    super(message, 'config', cause);
    this.name = 'ConfigError';
  }
}

/** Raised instead of overwriting an existing backup when the caller asked us not to. */
export class BackupExistsError extends ArchiveSwapError {
  constructor(message: string, public readonly path: string) {
    super(message, 'backup-exists');
    this.name = 'BackupExistsError';
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
