/**
 * Archive rewrite: copies every entry outside the exclusion prefixes into a new
 * archive, then appends one empty placeholder per prefix so each stripped
 * directory still shows up in the package.
 */
import { ZipArchive, ZipArchiveWriter } from './zip-archive.js';
import { isExcluded, placeholderName } from './strip-plan.js';
import { describeError } from './errors.js';
import type { ArchiveEntry } from './types/archive-entry.js';
import type { SwapWarning } from './types/results.js';

export interface RewriteOutcome {
  readonly kept: readonly string[];
  readonly removed: readonly string[];
  readonly placeholders: readonly string[];
  readonly warnings: readonly SwapWarning[];
}

/**
 * Copies entries into `writer`. Entries that fail to copy are logged and skipped.
 */
export async function rewriteEntries(
  entries: readonly ArchiveEntry[],
  exclusionPrefixes: readonly string[],
  writer: ZipArchiveWriter
): Promise<RewriteOutcome> {
  const kept: string[] = [];
  const removed: string[] = [];
  const placeholders: string[] = [];
  const warnings: SwapWarning[] = [];

  for (const entry of entries) {
    if (isExcluded(entry.name, exclusionPrefixes)) {
      removed.push(entry.name);
      continue;
    }

    try {
      await writer.copyEntry(entry);
      kept.push(entry.name);
    } catch (error) {
      const message = `Error copying file '${entry.name}': ${describeError(error)}`;
      console.warn(`⚠️  ${message}`);
      warnings.push({ code: 'entry-skipped', path: entry.name, message });
    }
  }

  for (const prefix of exclusionPrefixes) {
    const name = placeholderName(prefix);
    try {
      writer.addEmptyFile(name);
      placeholders.push(name);
      console.log(`Added placeholder file to: '${name}'`);
    } catch (error) {
      const message = `Error adding placeholder file '${name}': ${describeError(error)}`;
      console.warn(`⚠️  ${message}`);
      warnings.push({ code: 'placeholder-skipped', path: name, message });
    }
  }

  return { kept, removed, placeholders, warnings };
}

/**
 * Reads `sourcePath` and writes the stripped archive to `outputPath`.
 *
 * @throws {FormatError} If the source is not a ZIP container
 * @throws {IoError} If the source cannot be read or the output cannot be written
 */
export async function rewriteArchive(
  sourcePath: string,
  outputPath: string,
  exclusionPrefixes: readonly string[]
): Promise<RewriteOutcome> {
  const source = await ZipArchive.read({ filePath: sourcePath });
  console.log(`Rewriting ${source.entries.length} entries from: ${sourcePath}`);

  const writer = ZipArchive.writer();
  const outcome = await rewriteEntries(source.entries, exclusionPrefixes, writer);
  await writer.write(outputPath);
  return outcome;
}
