/**
 * Target Resolution Tests
 */

import { describe, it, expect } from 'vitest';
import { resolveTarget, findCompletedRun } from '../resolve';
import { ErrorCode } from '../errors';
import { FakeRunQuery, captureLogger } from '../../__tests__/test-utils';
import type { RunRecord } from '../types';

const HISTORY: RunRecord[] = [
  { id: '43', headSha: 'abc123', status: 'in_progress', conclusion: null },
  { id: '42', headSha: 'abc123', status: 'completed', conclusion: 'success' },
  { id: '40', headSha: 'abc123', status: 'completed', conclusion: 'success' },
  { id: '39', headSha: 'def456', status: 'completed', conclusion: 'success' },
];

describe('findCompletedRun', () => {
  it('should return the first completed run for the commit', () => {
    expect(findCompletedRun(HISTORY, 'abc123')?.id).toBe('42');
  });

  it('should ignore runs that are not completed', () => {
    const runs: RunRecord[] = [{ id: '1', headSha: 'abc123', status: 'queued', conclusion: null }];
    expect(findCompletedRun(runs, 'abc123')).toBeUndefined();
  });

  it('should accept completed runs regardless of conclusion', () => {
    const runs: RunRecord[] = [{ id: '7', headSha: 'abc123', status: 'completed', conclusion: 'failure' }];
    expect(findCompletedRun(runs, 'abc123')?.id).toBe('7');
  });
});

describe('resolveTarget', () => {
  it('should resolve a release to the completed run of its commit', async () => {
    const runs = new FakeRunQuery(HISTORY);

    const resolution = await resolveTarget(
      { kind: 'release', tag: 'v1.2.0', commitSha: 'abc123' },
      runs,
      { workflow: 'ci.yml' }
    );

    expect(resolution).toEqual({ kind: 'resolved', target: { runId: '42', tag: 'v1.2.0' } });
    expect(runs.calls).toEqual([{ workflow: 'ci.yml', headSha: 'abc123' }]);
  });

  it('should return manual targets unchanged without querying', async () => {
    const runs = new FakeRunQuery(HISTORY);

    const resolution = await resolveTarget(
      { kind: 'manual', tag: 'v1.2.0', runId: '42' },
      runs,
      { workflow: 'ci.yml' }
    );

    expect(resolution).toEqual({ kind: 'resolved', target: { runId: '42', tag: 'v1.2.0' } });
    expect(runs.calls).toHaveLength(0);
  });

  it('should return not-found when no run built the commit', async () => {
    const { logger, lines } = captureLogger();

    const resolution = await resolveTarget(
      { kind: 'release', tag: 'v2.0.0', commitSha: 'fff999' },
      new FakeRunQuery(HISTORY),
      { workflow: 'build.yml', logger }
    );

    expect(resolution).toEqual({ kind: 'not-found', commitSha: 'fff999', workflow: 'build.yml' });
    expect(lines.map(l => l.message)).toContain('No completed runs found');
  });

  it('should return not-found when the only run is still in progress', async () => {
    const runs = new FakeRunQuery([{ id: '43', headSha: 'abc123', status: 'in_progress', conclusion: null }]);

    const resolution = await resolveTarget(
      { kind: 'release', tag: 'v1.2.0', commitSha: 'abc123' },
      runs,
      { workflow: 'ci.yml' }
    );

    expect(resolution.kind).toBe('not-found');
  });

  it('should fail when the run query fails', async () => {
    const runs = new FakeRunQuery(new Error('socket hang up'));

    await expect(
      resolveTarget({ kind: 'release', tag: 'v1.2.0', commitSha: 'abc123' }, runs, { workflow: 'ci.yml' })
    ).rejects.toMatchObject({
      code: ErrorCode.RUN_QUERY_FAILED,
      context: { workflow: 'ci.yml', cause: 'socket hang up' },
    });
  });
});
