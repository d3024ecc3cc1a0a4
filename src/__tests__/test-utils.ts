/**
 * Shared test helpers: temp dirs, in-memory zip archives, fake platform
 * services and a log capture.
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import * as zlib from 'zlib';
import { crc32 } from '../utils/hash';
import { Logger } from '../utils/logger';
import type { LogLevel } from '../utils/logger';
import type {
  ArtifactBundle,
  ArtifactFile,
  ArtifactSource,
  ReleaseUploader,
  RunQueryService,
  RunRecord,
} from '../core/types';

// =============================================================================
// Temp dirs
// =============================================================================

export function createTempDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), 'courier-test-'));
}

export function cleanupTempDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}

/**
 * Write files under `dir` and describe them the way fetch does
 */
export function writeArtifactFiles(dir: string, files: Record<string, string>): ArtifactFile[] {
  return Object.entries(files).map(([name, content]) => {
    const filePath = path.join(dir, name);
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(filePath, content);
    return { path: filePath, name: path.basename(filePath), size: Buffer.byteLength(content) };
  });
}

// =============================================================================
// Zip archives
// =============================================================================

export interface ZipFixtureEntry {
  name: string;
  content?: string | Buffer;
  method?: 'store' | 'deflate';
}

/**
 * Build a zip archive in memory. Directory entries end with '/'.
 */
export function createZip(entries: ZipFixtureEntry[]): Buffer {
  const parts: Buffer[] = [];
  const central: Buffer[] = [];
  let offset = 0;

  for (const entry of entries) {
    const name = Buffer.from(entry.name, 'utf8');
    const data = Buffer.isBuffer(entry.content) ? entry.content : Buffer.from(entry.content ?? '');
    const isDirectory = entry.name.endsWith('/');
    const method = isDirectory || entry.method === 'store' ? 0 : 8;
    const compressed = method === 8 ? zlib.deflateRawSync(data) : data;
    const crc = crc32(data);

    const local = Buffer.alloc(30);
    local.writeUInt32LE(0x04034b50, 0);
    local.writeUInt16LE(20, 4);
    local.writeUInt16LE(0, 6);
    local.writeUInt16LE(method, 8);
    local.writeUInt32LE(crc, 14);
    local.writeUInt32LE(compressed.length, 18);
    local.writeUInt32LE(data.length, 22);
    local.writeUInt16LE(name.length, 26);
    local.writeUInt16LE(0, 28);
    parts.push(local, name, compressed);

    const header = Buffer.alloc(46);
    header.writeUInt32LE(0x02014b50, 0);
    header.writeUInt16LE(20, 4);
    header.writeUInt16LE(20, 6);
    header.writeUInt16LE(0, 8);
    header.writeUInt16LE(method, 10);
    header.writeUInt32LE(crc, 16);
    header.writeUInt32LE(compressed.length, 20);
    header.writeUInt32LE(data.length, 24);
    header.writeUInt16LE(name.length, 28);
    header.writeUInt32LE(offset, 42);
    central.push(header, name);

    offset += local.length + name.length + compressed.length;
  }

  const directory = Buffer.concat(central);
  const end = Buffer.alloc(22);
  end.writeUInt32LE(0x06054b50, 0);
  end.writeUInt16LE(entries.length, 8);
  end.writeUInt16LE(entries.length, 10);
  end.writeUInt32LE(directory.length, 12);
  end.writeUInt32LE(offset, 16);

  return Buffer.concat([...parts, directory, end]);
}

// =============================================================================
// Fake services
// =============================================================================

export class FakeRunQuery implements RunQueryService {
  calls: Array<{ workflow: string; headSha?: string }> = [];

  constructor(private result: RunRecord[] | Error) {}

  async listRuns(workflow: string, options: { headSha?: string }): Promise<RunRecord[]> {
    this.calls.push({ workflow, headSha: options.headSha });
    if (this.result instanceof Error) throw this.result;
    return this.result;
  }
}

export interface FakeBundle {
  name: string;
  files: Record<string, string>;
  expired?: boolean;
  failDownload?: boolean;
  archive?: Buffer;
}

export class FakeArtifactSource implements ArtifactSource {
  listCalls: string[] = [];
  downloads: string[] = [];
  private runs = new Map<string, FakeBundle[]>();
  private listError?: Error;

  addRun(runId: string, bundles: FakeBundle[]): this {
    this.runs.set(runId, bundles);
    return this;
  }

  failListing(error: Error): this {
    this.listError = error;
    return this;
  }

  async listArtifacts(runId: string): Promise<ArtifactBundle[]> {
    this.listCalls.push(runId);
    if (this.listError) throw this.listError;
    const bundles = this.runs.get(runId) ?? [];
    return bundles.map((bundle, index) => ({
      id: `${runId}-${index}`,
      name: bundle.name,
      sizeInBytes: 0,
      expired: bundle.expired ?? false,
    }));
  }

  async downloadArchive(artifact: ArtifactBundle): Promise<Buffer> {
    this.downloads.push(artifact.name);
    const [runId, index] = artifact.id.split('-');
    const bundle = this.runs.get(runId)?.[Number(index)];
    if (!bundle) throw new Error(`unknown artifact ${artifact.id}`);
    if (bundle.failDownload) throw new Error('blob storage unavailable');
    return (
      bundle.archive ??
      createZip(Object.entries(bundle.files).map(([name, content]) => ({ name, content })))
    );
  }
}

/**
 * In-memory releases with clobber semantics
 */
export class FakeReleaseStore implements ReleaseUploader {
  calls: Array<{ tag: string; name: string }> = [];
  releases = new Map<string, Map<string, { id: string; content: string }>>();
  private failing = new Set<string>();
  private nextId = 1;

  addRelease(tag: string): this {
    this.releases.set(tag, new Map());
    return this;
  }

  failUploadsOf(name: string): this {
    this.failing.add(name);
    return this;
  }

  assetNames(tag: string): string[] {
    return [...(this.releases.get(tag)?.keys() ?? [])].sort();
  }

  async upload(tag: string, file: ArtifactFile): Promise<string> {
    this.calls.push({ tag, name: file.name });
    const assets = this.releases.get(tag);
    if (!assets) throw new Error(`release ${tag} not found`);
    if (this.failing.has(file.name)) throw new Error('upload rejected');

    const id = String(this.nextId++);
    assets.set(file.name, { id, content: fs.readFileSync(file.path, 'utf8') });
    return id;
  }
}

// =============================================================================
// Logging
// =============================================================================

export interface CapturedLine {
  level: LogLevel;
  message: string;
  fields: Record<string, unknown>;
}

/**
 * Logger writing JSON lines into memory
 */
export function captureLogger(level: LogLevel = 'debug'): { logger: Logger; lines: CapturedLine[] } {
  const lines: CapturedLine[] = [];
  const logger = new Logger({}, {
    level,
    format: 'json',
    sink: (lineLevel, line) => {
      const fields: Record<string, unknown> = JSON.parse(line);
      lines.push({ level: lineLevel, message: String(fields.message), fields });
    },
  });
  return { logger, lines };
}

/**
 * Run a function and return what it threw
 */
export function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error('expected function to throw');
}
