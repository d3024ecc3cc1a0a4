import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as path from 'path';
import { formatStepOutputs, writeStepOutputs } from '../outputs';
import { cleanupTempDir, createTempDir } from '../../__tests__/test-utils';

describe('formatStepOutputs', () => {
  it('should emit the run id and tag of a resolved target', () => {
    expect(formatStepOutputs({ kind: 'resolved', target: { runId: '42', tag: 'v1.2.0' } })).toBe(
      'ci_id=42\ntag=v1.2.0\n'
    );
  });

  it('should emit a zero run id when nothing was found', () => {
    expect(formatStepOutputs({ kind: 'not-found', commitSha: 'abc123', workflow: 'ci.yml' })).toBe('ci_id=0\n');
  });
});

describe('writeStepOutputs', () => {
  let dir: string;

  beforeEach(() => {
    dir = createTempDir();
  });

  afterEach(() => {
    cleanupTempDir(dir);
  });

  it('should append to the existing output file', () => {
    const outputPath = path.join(dir, 'output');
    fs.writeFileSync(outputPath, 'existing=1\n');

    writeStepOutputs(outputPath, { kind: 'resolved', target: { runId: '42', tag: 'v1.2.0' } });

    expect(fs.readFileSync(outputPath, 'utf8')).toBe('existing=1\nci_id=42\ntag=v1.2.0\n');
  });

  it('should do nothing without an output path', () => {
    writeStepOutputs(undefined, { kind: 'not-found', commitSha: 'abc123', workflow: 'ci.yml' });

    expect(fs.readdirSync(dir)).toEqual([]);
  });
});
