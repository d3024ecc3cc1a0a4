/**
 * Zip archive reader
 *
 * Artifact bundles are served as zip archives. Only what the platform
 * produces is supported: stored and deflated entries, no encryption, no
 * ZIP64, single disk.
 */

import * as path from 'path';
import * as zlib from 'zlib';
import { Errors, describeError } from './errors';
import { crc32 } from '../utils/hash';
import { writeFile } from '../utils/fs';

const EOCD_SIGNATURE = 0x06054b50;
const CENTRAL_SIGNATURE = 0x02014b50;
const LOCAL_SIGNATURE = 0x04034b50;

const EOCD_SIZE = 22;
const CENTRAL_HEADER_SIZE = 46;
const LOCAL_HEADER_SIZE = 30;
const MAX_COMMENT_LENGTH = 0xffff;

const METHOD_STORED = 0;
const METHOD_DEFLATE = 8;

const FLAG_ENCRYPTED = 0x0001;

/**
 * A file entry extracted from an archive
 */
export interface ZipEntry {
  /** Path inside the archive, forward slashes */
  name: string;
  data: Buffer;
}

interface CentralRecord {
  name: string;
  flags: number;
  method: number;
  crc: number;
  compressedSize: number;
  uncompressedSize: number;
  localHeaderOffset: number;
}

/**
 * Parse a zip archive held in memory
 */
export class ZipReader {
  private data: Buffer;
  private archive: string;

  constructor(data: Buffer, archive: string) {
    this.data = data;
    this.archive = archive;
  }

  /**
   * Read every file entry, in central directory order. Directory entries are
   * skipped.
   */
  entries(): ZipEntry[] {
    const records = this.readCentralDirectory();
    const result: ZipEntry[] = [];

    for (const record of records) {
      if (record.name.endsWith('/')) continue;
      result.push({ name: record.name, data: this.readEntryData(record) });
    }

    return result;
  }

  private fail(details: string): never {
    throw Errors.archiveCorrupted(this.archive, details);
  }

  private findEndOfCentralDirectory(): number {
    const last = this.data.length - EOCD_SIZE;
    const first = Math.max(0, last - MAX_COMMENT_LENGTH);

    for (let offset = last; offset >= first; offset--) {
      if (this.data.readUInt32LE(offset) === EOCD_SIGNATURE) {
        return offset;
      }
    }

    return this.fail('end of central directory not found');
  }

  private readCentralDirectory(): CentralRecord[] {
    if (this.data.length < EOCD_SIZE) {
      this.fail('file is too small to be a zip archive');
    }

    const eocd = this.findEndOfCentralDirectory();
    const entryCount = this.data.readUInt16LE(eocd + 10);
    const directorySize = this.data.readUInt32LE(eocd + 12);
    const directoryOffset = this.data.readUInt32LE(eocd + 16);

    if (entryCount === 0xffff || directoryOffset === 0xffffffff) {
      this.fail('ZIP64 archives are not supported');
    }
    if (directoryOffset + directorySize > eocd) {
      this.fail('central directory overlaps its end record');
    }

    const records: CentralRecord[] = [];
    let offset = directoryOffset;

    for (let i = 0; i < entryCount; i++) {
      if (offset + CENTRAL_HEADER_SIZE > eocd || this.data.readUInt32LE(offset) !== CENTRAL_SIGNATURE) {
        this.fail(`bad central directory header for entry ${i}`);
      }

      const nameLength = this.data.readUInt16LE(offset + 28);
      const extraLength = this.data.readUInt16LE(offset + 30);
      const commentLength = this.data.readUInt16LE(offset + 32);
      const nameStart = offset + CENTRAL_HEADER_SIZE;

      records.push({
        flags: this.data.readUInt16LE(offset + 8),
        method: this.data.readUInt16LE(offset + 10),
        crc: this.data.readUInt32LE(offset + 16),
        compressedSize: this.data.readUInt32LE(offset + 20),
        uncompressedSize: this.data.readUInt32LE(offset + 24),
        localHeaderOffset: this.data.readUInt32LE(offset + 42),
        name: this.data.toString('utf8', nameStart, nameStart + nameLength).replace(/\\/g, '/'),
      });

      offset = nameStart + nameLength + extraLength + commentLength;
    }

    return records;
  }

  private readEntryData(record: CentralRecord): Buffer {
    if (record.flags & FLAG_ENCRYPTED) {
      this.fail(`entry '${record.name}' is encrypted`);
    }
    if (record.compressedSize === 0xffffffff || record.localHeaderOffset === 0xffffffff) {
      this.fail('ZIP64 archives are not supported');
    }

    const local = record.localHeaderOffset;
    if (local + LOCAL_HEADER_SIZE > this.data.length || this.data.readUInt32LE(local) !== LOCAL_SIGNATURE) {
      this.fail(`bad local header for entry '${record.name}'`);
    }

    // Local name/extra lengths may differ from the central copy
    const start =
      local + LOCAL_HEADER_SIZE + this.data.readUInt16LE(local + 26) + this.data.readUInt16LE(local + 28);
    const end = start + record.compressedSize;
    if (end > this.data.length) {
      this.fail(`entry '${record.name}' is truncated`);
    }

    const raw = this.data.subarray(start, end);
    let content: Buffer;

    switch (record.method) {
      case METHOD_STORED:
        content = Buffer.from(raw);
        break;
      case METHOD_DEFLATE:
        try {
          content = zlib.inflateRawSync(raw);
        } catch (error) {
          return this.fail(`entry '${record.name}' cannot be inflated: ${describeError(error)}`);
        }
        break;
      default:
        return this.fail(`entry '${record.name}' uses unsupported compression method ${record.method}`);
    }

    if (content.length !== record.uncompressedSize) {
      this.fail(`entry '${record.name}' has the wrong size`);
    }
    if (crc32(content) !== record.crc) {
      this.fail(`entry '${record.name}' failed its CRC check`);
    }

    return content;
  }
}

/**
 * Resolve an archive entry name below `destDir`, or null when the name is
 * absolute or climbs out of it.
 */
export function safeEntryPath(destDir: string, name: string): string | null {
  const normalized = path.posix.normalize(name);
  if (
    path.posix.isAbsolute(normalized) ||
    /^[A-Za-z]:/.test(normalized) ||
    normalized === '..' ||
    normalized.startsWith('../')
  ) {
    return null;
  }

  const root = path.resolve(destDir);
  const target = path.resolve(root, ...normalized.split('/'));
  const relative = path.relative(root, target);
  if (!relative || relative.startsWith('..') || path.isAbsolute(relative)) {
    return null;
  }
  return target;
}

/**
 * Extract every file of an archive into `destDir`. Existing files are
 * overwritten. Returns the written paths.
 */
export function extractZip(data: Buffer, destDir: string, archive: string): string[] {
  const entries = new ZipReader(data, archive).entries();
  const written: string[] = [];

  for (const entry of entries) {
    const target = safeEntryPath(destDir, entry.name);
    if (!target) {
      throw Errors.archiveCorrupted(archive, `entry '${entry.name}' points outside the target directory`);
    }
    writeFile(target, entry.data);
    written.push(target);
  }

  return written;
}
