/**
 * Trigger Detection Tests
 */

import { describe, it, expect } from 'vitest';
import { detectTrigger, describeTrigger } from '../trigger';
import type { EventReader } from '../trigger';
import { ErrorCode } from '../errors';
import { captureError } from '../../__tests__/test-utils';

function eventFile(payload: unknown): EventReader {
  return () => JSON.stringify(payload);
}

const noEvent: EventReader = path => {
  throw new Error(`unexpected read of ${path}`);
};

describe('detectTrigger', () => {
  describe('from flags', () => {
    it('should build a manual trigger from tag and run id', () => {
      expect(detectTrigger({ tag: 'v1.2.0', actionId: '42' }, {}, noEvent)).toEqual({
        kind: 'manual',
        tag: 'v1.2.0',
        runId: '42',
      });
    });

    it('should build a release trigger from tag and sha', () => {
      expect(detectTrigger({ tag: 'v1.2.0', sha: 'abc123' }, {}, noEvent)).toEqual({
        kind: 'release',
        tag: 'v1.2.0',
        commitSha: 'abc123',
      });
    });

    it('should take flags over the runner event', () => {
      const trigger = detectTrigger(
        { tag: 'v1.2.0', actionId: '42' },
        { eventName: 'release', eventPath: '/event.json', sha: 'abc123' },
        noEvent
      );

      expect(trigger.kind).toBe('manual');
    });

    it('should reject a run id together with a sha', () => {
      const error = captureError(() => detectTrigger({ tag: 'v1', actionId: '42', sha: 'abc' }, {}, noEvent));

      expect(error).toHaveProperty('message', "Invalid argument '--sha': expected either --action-id or --sha, not both");
    });

    it('should require a tag with a run id', () => {
      const error = captureError(() => detectTrigger({ actionId: '42' }, {}, noEvent));

      expect(error).toHaveProperty('message', "Invalid argument '--action-id': expected to be used together with --tag");
    });

    it('should require a run id or sha with a tag', () => {
      const error = captureError(() => detectTrigger({ tag: 'v1' }, {}, noEvent));

      expect(error).toMatchObject({ code: ErrorCode.INVALID_ARGUMENT, context: { argument: '--tag' } });
    });
  });

  describe('from the runner event', () => {
    it('should read tag and run id of a manual dispatch', () => {
      const trigger = detectTrigger(
        {},
        { eventName: 'workflow_dispatch', eventPath: '/event.json' },
        eventFile({ inputs: { tag: 'v1.2.0', action_id: '42' } })
      );

      expect(trigger).toEqual({ kind: 'manual', tag: 'v1.2.0', runId: '42' });
    });

    it('should accept a numeric run id', () => {
      const trigger = detectTrigger(
        {},
        { eventName: 'workflow_dispatch', eventPath: '/event.json' },
        eventFile({ inputs: { tag: 'v1.2.0', action_id: 42 } })
      );

      expect(trigger).toEqual({ kind: 'manual', tag: 'v1.2.0', runId: '42' });
    });

    it('should read the tag of a release and the commit from the environment', () => {
      const trigger = detectTrigger(
        {},
        { eventName: 'release', eventPath: '/event.json', sha: 'abc123' },
        eventFile({ action: 'published', release: { tag_name: 'v1.2.0' } })
      );

      expect(trigger).toEqual({ kind: 'release', tag: 'v1.2.0', commitSha: 'abc123' });
    });

    it('should pass the payload path to the reader', () => {
      const paths: string[] = [];
      detectTrigger({}, { eventName: 'release', eventPath: '/tmp/event.json', sha: 'abc123' }, path => {
        paths.push(path);
        return '{"release":{"tag_name":"v1"}}';
      });

      expect(paths).toEqual(['/tmp/event.json']);
    });

    it('should require the commit for a release', () => {
      const error = captureError(() =>
        detectTrigger({}, { eventName: 'release', eventPath: '/event.json' }, eventFile({ release: { tag_name: 'v1' } }))
      );

      expect(error).toMatchObject({
        code: ErrorCode.EVENT_PAYLOAD_INVALID,
        context: { cause: 'GITHUB_SHA is not set' },
      });
    });

    it('should report missing payload fields', () => {
      const error = captureError(() =>
        detectTrigger({}, { eventName: 'workflow_dispatch', eventPath: '/event.json' }, eventFile({ inputs: { action_id: '42' } }))
      );

      expect(error).toMatchObject({
        code: ErrorCode.EVENT_PAYLOAD_INVALID,
        message: 'Cannot read trigger event payload at /event.json',
        context: { cause: 'inputs.tag: Required' },
      });
    });

    it('should report unreadable JSON', () => {
      const error = captureError(() =>
        detectTrigger({}, { eventName: 'release', eventPath: '/event.json', sha: 'abc' }, () => 'not json')
      );

      expect(error).toMatchObject({ code: ErrorCode.EVENT_PAYLOAD_INVALID });
    });

    it('should require an event path', () => {
      const error = captureError(() => detectTrigger({}, { eventName: 'release', sha: 'abc' }, noEvent));

      expect(error).toMatchObject({
        message: 'Cannot read trigger event payload',
        context: { cause: 'GITHUB_EVENT_PATH is not set' },
      });
    });

    it('should reject other events', () => {
      const error = captureError(() => detectTrigger({}, { eventName: 'push' }, noEvent));

      expect(error).toMatchObject({
        code: ErrorCode.UNSUPPORTED_EVENT,
        message: "Unsupported trigger event 'push'",
      });
    });

    it('should reject a missing event', () => {
      const error = captureError(() => detectTrigger({}, {}, noEvent));

      expect(error).toMatchObject({ code: ErrorCode.UNSUPPORTED_EVENT });
    });
  });
});

describe('describeTrigger', () => {
  it('should describe manual triggers', () => {
    expect(describeTrigger({ kind: 'manual', tag: 'v1.2.0', runId: '42' })).toBe(
      'manual invocation (tag v1.2.0, run 42)'
    );
  });

  it('should shorten the commit of release triggers', () => {
    expect(
      describeTrigger({ kind: 'release', tag: 'v1.2.0', commitSha: '0123456789abcdef0123' })
    ).toBe('release v1.2.0 at 0123456789ab');
  });
});
