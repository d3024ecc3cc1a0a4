import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';

/**
 * Recursively create directories
 */
export function mkdirp(dirPath: string): void {
  fs.mkdirSync(dirPath, { recursive: true });
}

/**
 * Check if a path exists
 */
export function exists(filePath: string): boolean {
  return fs.existsSync(filePath);
}

/**
 * Read file as buffer
 */
export function readFile(filePath: string): Buffer {
  return fs.readFileSync(filePath);
}

/**
 * Read file as string
 */
export function readFileText(filePath: string): string {
  return fs.readFileSync(filePath, 'utf8');
}

/**
 * Write buffer to file, creating parent directories
 */
export function writeFile(filePath: string, data: Buffer | string): void {
  const dir = path.dirname(filePath);
  if (!exists(dir)) {
    mkdirp(dir);
  }
  fs.writeFileSync(filePath, data);
}

/**
 * Append text to a file
 */
export function appendFile(filePath: string, data: string): void {
  fs.appendFileSync(filePath, data);
}

/**
 * Get all files in a directory recursively, sorted by path
 */
export function walkDir(dir: string): string[] {
  const results: string[] = [];

  function walk(currentDir: string): void {
    const entries = fs.readdirSync(currentDir, { withFileTypes: true });

    for (const entry of entries) {
      const fullPath = path.join(currentDir, entry.name);

      if (entry.isDirectory()) {
        walk(fullPath);
      } else if (entry.isFile()) {
        results.push(fullPath);
      }
    }
  }

  walk(dir);
  return results.sort();
}

/**
 * Get file stats
 */
export function stat(filePath: string): fs.Stats {
  return fs.statSync(filePath);
}

/**
 * Check if path is a directory
 */
export function isDirectory(filePath: string): boolean {
  return exists(filePath) && fs.statSync(filePath).isDirectory();
}

/**
 * Create a fresh directory under the OS temp dir
 */
export function makeTempDir(prefix: string): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

/**
 * Remove a directory tree
 */
export function removeDir(dirPath: string): void {
  fs.rmSync(dirPath, { recursive: true, force: true });
}
