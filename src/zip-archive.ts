/**
 * ZIP container helpers for game asset packages (.pk3).
 *
 * Entries are indexed straight from the central directory so their order and
 * any repeated names survive; fflate does the inflating and deflating. Content
 * is only inflated when an entry is copied, so a damaged entry fails on its own.
 */
import { readFile, writeFile } from 'node:fs/promises';
import { Zip, ZipDeflate, ZipPassThrough, inflateSync, strFromU8 } from 'fflate';
import type { ArchiveEntry } from './types/archive-entry.js';
import type { ZipArchiveStructure } from './types/zip-archive-structure.js';
import { FormatError, IoError, describeError } from './errors.js';

const EOCD_SIGNATURE = 0x06054b50;
const CEN_SIGNATURE = 0x02014b50;
const LOC_SIGNATURE = 0x04034b50;
const EOCD_SIZE = 22;
const CEN_HEADER_SIZE = 46;
const LOC_HEADER_SIZE = 30;
const MAX_COMMENT_LENGTH = 0xffff;

const FLAG_ENCRYPTED = 0x0001;
const FLAG_UTF8 = 0x0800;
const METHOD_STORE = 0;
const METHOD_DEFLATE = 8;
const DOS_DIRECTORY_ATTRIBUTE = 0x10;
const HOST_UNIX = 3;
const DEFLATE_LEVEL = 6;

class ZipFormatProblem extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ZipFormatProblem';
  }
}

interface CentralDirectoryRecord {
  readonly name: string;
  readonly comment: string;
  readonly hostSystem: number;
  readonly flags: number;
  readonly compressionMethod: number;
  readonly date: Date;
  readonly compressedSize: number;
  readonly externalAttributes: number;
  readonly localHeaderOffset: number;
}

function decodeText(bytes: Uint8Array, flags: number): string {
  // Without the UTF-8 flag, names are code page bytes; read them one byte per char.
  return strFromU8(bytes, (flags & FLAG_UTF8) === 0);
}

/** DOS timestamps carry no zone; they are read and written as local time. */
function fromDosDateTime(date: number, time: number): Date {
  return new Date(
    ((date >> 9) & 0x7f) + 1980,
    ((date >> 5) & 0x0f) - 1,
    date & 0x1f,
    (time >> 11) & 0x1f,
    (time >> 5) & 0x3f,
    (time & 0x1f) * 2
  );
}

function findEndOfCentralDirectory(buffer: Buffer): number {
  const last = buffer.length - EOCD_SIZE;
  const first = Math.max(0, last - MAX_COMMENT_LENGTH);
  for (let offset = last; offset >= first; offset--) {
    if (buffer.readUInt32LE(offset) === EOCD_SIGNATURE && offset + EOCD_SIZE + buffer.readUInt16LE(offset + 20) <= buffer.length) {
      return offset;
    }
  }
  throw new ZipFormatProblem('end of central directory record not found');
}

function readCentralDirectory(buffer: Buffer): CentralDirectoryRecord[] {
  const eocd = findEndOfCentralDirectory(buffer);
  const entryCount = buffer.readUInt16LE(eocd + 10);
  const directorySize = buffer.readUInt32LE(eocd + 12);
  const directoryOffset = buffer.readUInt32LE(eocd + 16);

  if (entryCount === 0xffff || directorySize === 0xffffffff || directoryOffset === 0xffffffff) {
    throw new ZipFormatProblem('ZIP64 archives are not supported');
  }
  if (directoryOffset + directorySize > eocd) {
    throw new ZipFormatProblem('central directory extends beyond its end record');
  }

  const records: CentralDirectoryRecord[] = [];
  let cursor = directoryOffset;
  for (let index = 0; index < entryCount; index++) {
    if (cursor + CEN_HEADER_SIZE > eocd || buffer.readUInt32LE(cursor) !== CEN_SIGNATURE) {
      throw new ZipFormatProblem(`central directory entry ${index} is malformed`);
    }

    const flags = buffer.readUInt16LE(cursor + 8);
    const nameLength = buffer.readUInt16LE(cursor + 28);
    const extraLength = buffer.readUInt16LE(cursor + 30);
    const commentLength = buffer.readUInt16LE(cursor + 32);
    const nameStart = cursor + CEN_HEADER_SIZE;
    const commentStart = nameStart + nameLength + extraLength;
    const next = commentStart + commentLength;
    if (next > eocd) {
      throw new ZipFormatProblem(`central directory entry ${index} extends beyond the directory`);
    }

    records.push({
      name: decodeText(buffer.subarray(nameStart, nameStart + nameLength), flags),
      comment: decodeText(buffer.subarray(commentStart, next), flags),
      hostSystem: buffer.readUInt8(cursor + 5),
      flags,
      compressionMethod: buffer.readUInt16LE(cursor + 10),
      date: fromDosDateTime(buffer.readUInt16LE(cursor + 14), buffer.readUInt16LE(cursor + 12)),
      compressedSize: buffer.readUInt32LE(cursor + 20),
      externalAttributes: buffer.readUInt32LE(cursor + 38),
      localHeaderOffset: buffer.readUInt32LE(cursor + 42),
    });
    cursor = next;
  }
  return records;
}

/**
 * Locates and inflates one entry's data.
 * @throws {ZipFormatProblem} If the local header or data is damaged or unsupported
 */
function extractEntry(buffer: Buffer, record: CentralDirectoryRecord): Buffer {
  const offset = record.localHeaderOffset;
  if (offset + LOC_HEADER_SIZE > buffer.length || buffer.readUInt32LE(offset) !== LOC_SIGNATURE) {
    throw new ZipFormatProblem('local header is missing or corrupt');
  }
  if ((record.flags & FLAG_ENCRYPTED) !== 0) {
    throw new ZipFormatProblem('encrypted entries are not supported');
  }

  const dataStart = offset + LOC_HEADER_SIZE + buffer.readUInt16LE(offset + 26) + buffer.readUInt16LE(offset + 28);
  const dataEnd = dataStart + record.compressedSize;
  if (dataEnd > buffer.length) {
    throw new ZipFormatProblem('compressed data extends beyond the end of the file');
  }

  const data = buffer.subarray(dataStart, dataEnd);
  if (record.compressionMethod === METHOD_STORE) {
    return Buffer.from(data);
  }
  if (record.compressionMethod === METHOD_DEFLATE) {
    const inflated = inflateSync(data);
    return Buffer.from(inflated.buffer, inflated.byteOffset, inflated.byteLength);
  }
  throw new ZipFormatProblem(`unsupported compression method ${record.compressionMethod}`);
}

function toEntry(buffer: Buffer, record: CentralDirectoryRecord): ArchiveEntry {
  return {
    name: record.name,
    dir: record.name.endsWith('/') || (record.externalAttributes & DOS_DIRECTORY_ATTRIBUTE) !== 0,
    date: record.date,
    comment: record.comment,
    hostSystem: record.hostSystem,
    externalAttributes: record.externalAttributes,
    read: async () => extractEntry(buffer, record),
  };
}

/** The entry's Unix file mode, or null when it was not stored on a Unix host. */
export function unixMode(entry: Pick<ArchiveEntry, 'hostSystem' | 'externalAttributes'>): number | null {
  return entry.hostSystem === HOST_UNIX ? entry.externalAttributes >>> 16 : null;
}

/**
 * Accumulates entries for a new archive and writes it out in one go.
 * The output holds exactly the entries that were added, in that order;
 * parent directory entries are never synthesised.
 */
export class ZipArchiveWriter {
  private readonly chunks: Uint8Array[] = [];
  private failure: Error | null = null;
  private readonly names: string[] = [];
  private readonly zip: Zip = new Zip((error, chunk) => {
    if (error) {
      this.failure = error;
      return;
    }
    this.chunks.push(chunk);
  });

  /** Entry names in the order they were added. */
  get entryNames(): readonly string[] {
    return this.names;
  }

  /**
   * Copies an entry's name, content, date, comment, host system and attributes.
   * @throws Whatever the entry's decompression throws; nothing is added in that case.
   */
  async copyEntry(entry: ArchiveEntry): Promise<void> {
    const content: Buffer = entry.dir ? Buffer.alloc(0) : await entry.read();
    const file = content.length === 0 ? new ZipPassThrough(entry.name) : new ZipDeflate(entry.name, { level: DEFLATE_LEVEL });
    file.mtime = entry.date;
    file.os = entry.hostSystem;
    file.attrs = entry.externalAttributes;
    if (entry.comment) {
      file.comment = entry.comment;
    }
    this.zip.add(file);
    file.push(content, true);
    this.names.push(entry.name);
  }

  /** Adds a zero-byte file entry. */
  addEmptyFile(name: string): void {
    const file = new ZipPassThrough(name);
    file.mtime = new Date();
    this.zip.add(file);
    file.push(new Uint8Array(0), true);
    this.names.push(name);
  }

  async write(outputPath: string): Promise<void> {
    this.zip.end();
    if (this.failure) {
      throw new IoError(`Failed to build archive '${outputPath}': ${this.failure.message}`, outputPath, this.failure);
    }
    try {
      await writeFile(outputPath, Buffer.concat(this.chunks));
    } catch (error) {
      throw new IoError(`Failed to write archive '${outputPath}': ${describeError(error)}`, outputPath, error);
    }
  }
}

/**
 * Reading side of the ZIP helpers.
 */
export class ZipArchive {
  /**
   * Reads an archive from disk and lists its entries.
   *
   * @throws {IoError} If the file cannot be read
   * @throws {FormatError} If the bytes are not a ZIP container
   */
  static async read({ filePath }: { readonly filePath: string }): Promise<ZipArchiveStructure> {
    let buffer: Buffer;
    try {
      buffer = await readFile(filePath);
    } catch (error) {
      throw new IoError(`Failed to read archive '${filePath}': ${describeError(error)}`, filePath, error);
    }

    let records: CentralDirectoryRecord[];
    try {
      records = readCentralDirectory(buffer);
    } catch (error) {
      throw new FormatError(`'${filePath}' is not a valid ZIP file: ${describeError(error)}`, filePath, error);
    }

    return {
      filePath,
      entries: records.map(record => toEntry(buffer, record)),
      totalSize: buffer.length,
    };
  }

  static writer(): ZipArchiveWriter {
    return new ZipArchiveWriter();
  }
}
