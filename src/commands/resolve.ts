/**
 * Resolve Command
 * Show which run's artifacts would be published, and record step outputs
 */

import { resolveTarget } from '../core/resolve';
import { detectTrigger } from '../core/trigger';
import { writeStepOutputs } from '../core/outputs';
import { colors } from '../utils/colors';
import { booleanFlag, parseArgs, stringFlag } from './args';
import { getServices } from './context';
import { triggerFlags } from './publish';
import type { CommandContext } from './context';
import type { Resolution } from '../core/types';

export const RESOLVE_HELP = `
${colors.bold('courier resolve')} - Find the run whose artifacts belong to a release

${colors.bold('USAGE')}
  courier resolve [--tag <tag> (--action-id <id> | --sha <commit>)] [options]

${colors.bold('OPTIONS')}
  -R, --repo <owner/name> Repository (defaults to GITHUB_REPOSITORY)
  -w, --workflow <file>   Build workflow to search (defaults to ci.yml)

Writes ci_id and tag to GITHUB_OUTPUT when running inside a workflow.
A ci_id of 0 means no completed run was found.
`;

export async function handleResolve(args: string[], ctx: CommandContext): Promise<number> {
  const { flags } = parseArgs(args);

  if (booleanFlag(flags, 'help')) {
    console.log(RESOLVE_HELP);
    return 0;
  }

  const trigger = detectTrigger(triggerFlags(flags), ctx.config, ctx.readEvent);
  const workflow = stringFlag(flags, 'workflow') ?? ctx.config.workflow;

  // Manual triggers never query, so they need no token
  const resolution: Resolution =
    trigger.kind === 'manual'
      ? { kind: 'resolved', target: { runId: trigger.runId, tag: trigger.tag } }
      : await resolveTarget(trigger, getServices(ctx, stringFlag(flags, 'repo')).runs, {
          workflow,
          logger: ctx.logger,
        });

  writeStepOutputs(ctx.config.outputPath, resolution);

  if (resolution.kind === 'not-found') {
    console.log(colors.yellow('!') + ` No completed run of ${resolution.workflow} for ${resolution.commitSha}`);
  } else {
    console.log(
      colors.green('✓') +
        ` Run ${colors.bold(resolution.target.runId)} → release ${colors.bold(resolution.target.tag)}`
    );
  }
  return 0;
}
