/**
 * Fetch Command
 * Download and merge every artifact of a run into a directory
 */

import * as path from 'path';
import { fetchArtifacts } from '../core/fetch';
import { Errors } from '../core/errors';
import { colors } from '../utils/colors';
import { booleanFlag, parseArgs, stringFlag } from './args';
import { getServices } from './context';
import type { CommandContext } from './context';

export const FETCH_HELP = `
${colors.bold('courier fetch')} - Download the artifacts of a run

${colors.bold('USAGE')}
  courier fetch <run-id> [options]

${colors.bold('OPTIONS')}
  -d, --dir <path>        Target directory (defaults to ./artifacts)
  -R, --repo <owner/name> Repository (defaults to GITHUB_REPOSITORY)

Artifacts are merged into one directory; a file present in several
artifacts keeps the copy from the last one.
`;

export async function handleFetch(args: string[], ctx: CommandContext): Promise<number> {
  const { flags, positional } = parseArgs(args);

  if (booleanFlag(flags, 'help')) {
    console.log(FETCH_HELP);
    return 0;
  }

  const runId = positional[0];
  if (!runId) {
    throw Errors.invalidArgument('<run-id>', 'the id of the run to download from');
  }

  const dir = path.resolve(stringFlag(flags, 'dir') ?? 'artifacts');
  const services = getServices(ctx, stringFlag(flags, 'repo'));
  const files = await fetchArtifacts(runId, services.artifacts, dir, ctx.logger);

  console.log(colors.green('✓') + ` Downloaded ${files.length} file(s) into ${colors.bold(dir)}`);
  return 0;
}
