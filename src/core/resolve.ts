/**
 * Target resolution
 *
 * Turns a trigger into the (run id, tag) pair the rest of the pipeline
 * works on.
 */

import { Errors, describeError } from './errors';
import { Logger, silentLogger } from '../utils/logger';
import type { Resolution, RunQueryService, RunRecord, Trigger } from './types';

export interface ResolveOptions {
  /** Workflow whose runs produced the artifacts, e.g. "ci.yml" */
  workflow: string;
  logger?: Logger;
}

/**
 * First run in platform order that built `commitSha` and has finished.
 * Conclusion is ignored: a failed run still counts as completed.
 */
export function findCompletedRun(runs: RunRecord[], commitSha: string): RunRecord | undefined {
  return runs.find(run => run.headSha === commitSha && run.status === 'completed');
}

/**
 * Resolve the run whose artifacts should be published.
 *
 * Manual triggers are returned as given without querying anything. Release
 * triggers look up the build workflow's run history; when no completed run
 * exists for the commit the result is `not-found`, not an error.
 */
export async function resolveTarget(
  trigger: Trigger,
  runs: RunQueryService,
  options: ResolveOptions
): Promise<Resolution> {
  const log = options.logger ?? silentLogger();

  if (trigger.kind === 'manual') {
    log.info('Using run from manual invocation', { runId: trigger.runId, tag: trigger.tag });
    return { kind: 'resolved', target: { runId: trigger.runId, tag: trigger.tag } };
  }

  let history: RunRecord[];
  try {
    history = await runs.listRuns(options.workflow, { headSha: trigger.commitSha });
  } catch (error) {
    throw Errors.runQueryFailed(options.workflow, describeError(error));
  }

  log.debug('Fetched run history', { workflow: options.workflow, runs: history.length });

  const match = findCompletedRun(history, trigger.commitSha);
  if (!match) {
    log.info('No completed runs found', { workflow: options.workflow, sha: trigger.commitSha });
    return { kind: 'not-found', commitSha: trigger.commitSha, workflow: options.workflow };
  }

  log.info('Found completed run', { runId: match.id, conclusion: match.conclusion, tag: trigger.tag });
  return { kind: 'resolved', target: { runId: match.id, tag: trigger.tag } };
}
