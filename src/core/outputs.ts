/**
 * Step outputs
 *
 * Appends `key=value` lines to the runner's output file so later workflow
 * steps can read `ci_id` and `tag`. A `ci_id` of 0 marks "no run".
 */

import { appendFile } from '../utils/fs';
import type { Resolution } from './types';

export function formatStepOutputs(resolution: Resolution): string {
  if (resolution.kind === 'not-found') {
    return 'ci_id=0\n';
  }
  const { runId, tag } = resolution.target;
  return `ci_id=${runId}\ntag=${tag}\n`;
}

/**
 * Write outputs for a resolution. Does nothing outside a runner.
 */
export function writeStepOutputs(outputPath: string | undefined, resolution: Resolution): void {
  if (!outputPath) return;
  appendFile(outputPath, formatStepOutputs(resolution));
}
