/**
 * Trigger detection
 *
 * Works out whether this invocation is a manual dispatch (tag + run id
 * supplied) or a release event (tag + commit), from CLI flags first and the
 * runner's event payload otherwise.
 */

import { z } from 'zod';
import { Errors, describeError } from './errors';
import { readFileText } from '../utils/fs';
import type { CourierConfig } from './config';
import type { Trigger } from './types';

export interface TriggerFlags {
  tag?: string;
  actionId?: string;
  sha?: string;
}

export type EventReader = (eventPath: string) => string;

const runIdInput = z
  .union([z.string().min(1), z.number().int().nonnegative()])
  .transform(value => String(value));

const dispatchPayloadSchema = z.object({
  inputs: z.object({
    tag: z.string().min(1),
    action_id: runIdInput,
  }),
});

const releasePayloadSchema = z.object({
  release: z.object({
    tag_name: z.string().min(1),
  }),
});

function triggerFromFlags(flags: TriggerFlags): Trigger | null {
  const { tag, actionId, sha } = flags;

  if (!tag && !actionId && !sha) return null;

  if (actionId && sha) {
    throw Errors.invalidArgument('--sha', 'either --action-id or --sha, not both');
  }
  if (!tag) {
    throw Errors.invalidArgument(actionId ? '--action-id' : '--sha', 'to be used together with --tag');
  }
  if (actionId) {
    return { kind: 'manual', tag, runId: actionId };
  }
  if (sha) {
    return { kind: 'release', tag, commitSha: sha };
  }
  throw Errors.invalidArgument('--tag', 'to be used together with --action-id or --sha');
}

function readPayload<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  eventPath: string | undefined,
  readEvent: EventReader
): T {
  if (!eventPath) {
    throw Errors.invalidEventPayload(undefined, 'GITHUB_EVENT_PATH is not set');
  }

  let raw: unknown;
  try {
    raw = JSON.parse(readEvent(eventPath));
  } catch (error) {
    throw Errors.invalidEventPayload(eventPath, describeError(error));
  }

  const result = schema.safeParse(raw);
  if (!result.success) {
    const details = result.error.issues
      .map(issue => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw Errors.invalidEventPayload(eventPath, details);
  }
  return result.data;
}

/**
 * Determine the trigger of this invocation
 */
export function detectTrigger(
  flags: TriggerFlags,
  env: Pick<CourierConfig, 'eventName' | 'eventPath' | 'sha'>,
  readEvent: EventReader = readFileText
): Trigger {
  const explicit = triggerFromFlags(flags);
  if (explicit) return explicit;

  switch (env.eventName) {
    case 'workflow_dispatch': {
      const payload = readPayload(dispatchPayloadSchema, env.eventPath, readEvent);
      return { kind: 'manual', tag: payload.inputs.tag, runId: payload.inputs.action_id };
    }

    case 'release': {
      const payload = readPayload(releasePayloadSchema, env.eventPath, readEvent);
      if (!env.sha) {
        throw Errors.invalidEventPayload(env.eventPath, 'GITHUB_SHA is not set');
      }
      return { kind: 'release', tag: payload.release.tag_name, commitSha: env.sha };
    }

    default:
      throw Errors.unsupportedEvent(env.eventName);
  }
}

/**
 * Human-readable summary of a trigger for logs
 */
export function describeTrigger(trigger: Trigger): string {
  return trigger.kind === 'manual'
    ? `manual invocation (tag ${trigger.tag}, run ${trigger.runId})`
    : `release ${trigger.tag} at ${trigger.commitSha.slice(0, 12)}`;
}
