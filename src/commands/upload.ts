/**
 * Upload Command
 * Attach local files to a release, replacing assets of the same name
 */

import * as path from 'path';
import { publishAssets } from '../core/publish';
import { listArtifactFiles } from '../core/fetch';
import { Errors } from '../core/errors';
import { colors } from '../utils/colors';
import { exists, isDirectory, stat } from '../utils/fs';
import { booleanFlag, parseArgs, stringFlag } from './args';
import { getServices } from './context';
import { printReport } from './publish';
import type { CommandContext } from './context';
import type { ArtifactFile } from '../core/types';

export const UPLOAD_HELP = `
${colors.bold('courier upload')} - Upload files to a release

${colors.bold('USAGE')}
  courier upload <tag> <file|dir>... [options]

${colors.bold('OPTIONS')}
  -R, --repo <owner/name> Repository (defaults to GITHUB_REPOSITORY)

Directories are uploaded recursively. Each file becomes an asset named
after its basename; an existing asset with that name is replaced.
A failed upload is reported and skipped.
`;

/**
 * Expand the given paths into files, directories recursively
 */
export function collectFiles(paths: string[]): ArtifactFile[] {
  const files: ArtifactFile[] = [];

  for (const input of paths) {
    const resolved = path.resolve(input);
    if (!exists(resolved)) {
      throw Errors.fileNotFound(input);
    }
    if (isDirectory(resolved)) {
      files.push(...listArtifactFiles(resolved));
    } else {
      files.push({ path: resolved, name: path.basename(resolved), size: stat(resolved).size });
    }
  }

  return files;
}

export async function handleUpload(args: string[], ctx: CommandContext): Promise<number> {
  const { flags, positional } = parseArgs(args);

  if (booleanFlag(flags, 'help')) {
    console.log(UPLOAD_HELP);
    return 0;
  }

  const [tag, ...paths] = positional;
  if (!tag || paths.length === 0) {
    throw Errors.invalidArgument('upload', '<tag> followed by at least one file');
  }

  const files = collectFiles(paths);
  const services = getServices(ctx, stringFlag(flags, 'repo'));
  const report = await publishAssets(tag, files, services.releases, ctx.logger);

  printReport(report);
  return 0;
}
