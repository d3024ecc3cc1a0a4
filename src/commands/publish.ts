/**
 * Publish Command
 * Attach the artifacts of a CI run to a release
 *
 * Usage:
 * - courier publish                                  # Trigger from the runner's event
 * - courier publish --tag v1.2.0 --action-id 42      # Manual invocation
 * - courier publish --tag v1.2.0 --sha <commit>      # Replay a release event
 */

import * as path from 'path';
import { runPipeline } from '../core/pipeline';
import { detectTrigger, describeTrigger } from '../core/trigger';
import { writeStepOutputs } from '../core/outputs';
import { colors } from '../utils/colors';
import { booleanFlag, parseArgs, stringFlag } from './args';
import { getServices } from './context';
import type { ParsedArgs } from './args';
import type { CommandContext } from './context';
import type { PipelineOutcome } from '../core/pipeline';
import type { TriggerFlags } from '../core/trigger';
import type { PublishReport } from '../core/types';

export const PUBLISH_HELP = `
${colors.bold('courier publish')} - Attach CI artifacts to a release

${colors.bold('USAGE')}
  courier publish [options]

${colors.bold('TRIGGER')}
  Without flags the trigger is read from the runner (GITHUB_EVENT_NAME):
    release             Find the completed run of the release commit
    workflow_dispatch   Use the 'tag' and 'action_id' inputs

  -t, --tag <tag>         Release tag to upload to
  -a, --action-id <id>    Run whose artifacts to upload (manual mode)
  --sha <commit>          Commit to find a completed run for (release mode)

${colors.bold('OPTIONS')}
  -R, --repo <owner/name> Repository (defaults to GITHUB_REPOSITORY)
  -w, --workflow <file>   Build workflow to search (defaults to ci.yml)
  -d, --dir <path>        Extract artifacts here and keep them
  --keep                  Keep the temporary download directory
  -n, --dry-run           Download and list, but upload nothing

${colors.bold('EXAMPLES')}
  ${colors.dim('# In a release workflow')}
  courier publish

  ${colors.dim('# Re-publish the artifacts of run 42 to v1.2.0')}
  courier publish --tag v1.2.0 --action-id 42
`;

/**
 * Trigger-related flags shared with `courier resolve`
 */
export function triggerFlags(flags: ParsedArgs['flags']): TriggerFlags {
  return {
    tag: stringFlag(flags, 'tag'),
    actionId: stringFlag(flags, 'action-id'),
    sha: stringFlag(flags, 'sha'),
  };
}

/**
 * Print the upload summary. Failed uploads are reported but never change
 * the exit code.
 */
export function printReport(report: PublishReport): void {
  const uploaded = report.uploaded.length;

  if (report.failed.length === 0) {
    console.log(colors.green('✓') + ` Uploaded ${uploaded}/${report.attempted} asset(s) to ${colors.bold(report.tag)}`);
    return;
  }

  console.log(
    colors.yellow('!') +
      ` Uploaded ${uploaded}/${report.attempted} asset(s) to ${colors.bold(report.tag)}, ${report.failed.length} failed:`
  );
  for (const { file, error } of report.failed) {
    console.log(`  ${colors.red('✗')} ${file.name} ${colors.dim(error)}`);
  }
}

function printOutcome(outcome: PipelineOutcome): void {
  switch (outcome.status) {
    case 'no-run':
      console.log(
        colors.yellow('!') +
          ` No completed run of ${outcome.resolution.workflow} for ${outcome.resolution.commitSha}, nothing to publish`
      );
      break;

    case 'dry-run':
      console.log(colors.cyan('ℹ') + ` Dry run: ${outcome.files.length} file(s) would be uploaded to ${colors.bold(outcome.target.tag)}`);
      for (const file of outcome.files) {
        console.log(`  ${path.relative(outcome.workDir, file.path)} ${colors.dim(`(${file.size} bytes)`)}`);
      }
      console.log(colors.dim(`  Files kept in ${outcome.workDir}`));
      break;

    case 'published':
      if (outcome.files.length === 0) {
        console.log(colors.yellow('!') + ` Run ${outcome.target.runId} has no artifacts, nothing uploaded`);
        break;
      }
      printReport(outcome.report);
      break;
  }
}

/**
 * Handle `courier publish`. Resolves to the process exit code.
 */
export async function handlePublish(args: string[], ctx: CommandContext): Promise<number> {
  const { flags } = parseArgs(args);

  if (booleanFlag(flags, 'help')) {
    console.log(PUBLISH_HELP);
    return 0;
  }

  const trigger = detectTrigger(triggerFlags(flags), ctx.config, ctx.readEvent);
  const services = getServices(ctx, stringFlag(flags, 'repo'));
  const workflow = stringFlag(flags, 'workflow') ?? ctx.config.workflow;

  ctx.logger.info(`Publishing for ${describeTrigger(trigger)}`);

  const outcome = await runPipeline({
    trigger,
    services,
    workflow,
    workDir: stringFlag(flags, 'dir'),
    keep: booleanFlag(flags, 'keep'),
    dryRun: booleanFlag(flags, 'dry-run'),
    onResolved: resolution => writeStepOutputs(ctx.config.outputPath, resolution),
    logger: ctx.logger,
  });

  printOutcome(outcome);
  return 0;
}
