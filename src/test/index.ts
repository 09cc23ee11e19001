/**
 * Shared helpers for tests: scratch directories and in-memory ZIP fixtures.
 * Fixtures are built and inspected with fflate directly, independent of the
 * archive reader and writer under test.
 */
import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { Zip, ZipDeflate, ZipPassThrough, strFromU8, strToU8, unzipSync } from 'fflate';

export const makeScratchDir = (): Promise<string> =>
  mkdtemp(path.join(os.tmpdir(), 'pk3-strip-'));

export const removeScratchDir = (dir: string): Promise<void> =>
  rm(dir, { recursive: true, force: true });

export interface FixtureEntry {
  readonly name: string;
  readonly content?: string;
  readonly date?: Date;
  readonly comment?: string;
  /** Stores the entry as made on a Unix host with this file mode. */
  readonly unixMode?: number;
}

export type FixtureSpec = FixtureEntry | readonly [string, string];

const toFixture = (spec: FixtureSpec): FixtureEntry =>
  'name' in spec ? spec : { name: spec[0], content: spec[1] };

/** Builds a ZIP holding exactly the given entries, in order, repeats included. Names ending in "/" become directories. */
export function buildZip(specs: readonly FixtureSpec[]): Buffer {
  const chunks: Uint8Array[] = [];
  const zip = new Zip((error, chunk) => {
    if (error) throw error;
    chunks.push(chunk);
  });

  for (const spec of specs) {
    const entry = toFixture(spec);
    const data = strToU8(entry.content ?? '');
    const file = entry.name.endsWith('/') ? new ZipPassThrough(entry.name) : new ZipDeflate(entry.name, { level: 6 });
    file.mtime = entry.date ?? new Date(2020, 0, 1);
    if (entry.comment) file.comment = entry.comment;
    if (entry.unixMode !== undefined) {
      file.os = 3;
      file.attrs = (entry.unixMode << 16) >>> 0;
    }
    zip.add(file);
    file.push(data, true);
  }
  zip.end();
  return Buffer.concat(chunks);
}

export async function writeZip(filePath: string, specs: readonly FixtureSpec[]): Promise<Buffer> {
  const buffer = buildZip(specs);
  await writeFile(filePath, buffer);
  return buffer;
}

/** Entry names in central directory order, repeats included. */
export async function listEntryNames(filePath: string): Promise<string[]> {
  const names: string[] = [];
  unzipSync(await readFile(filePath), {
    filter: file => {
      names.push(file.name);
      return false;
    },
  });
  return names;
}

export async function readEntryText(filePath: string, name: string): Promise<string | null> {
  const files = unzipSync(await readFile(filePath), { filter: file => file.name === name });
  const data = files[name];
  return data ? strFromU8(data) : null;
}
