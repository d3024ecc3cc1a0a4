/**
 * Release asset pipeline
 *
 * Start → resolve → (no run → stop) → fetch → publish → done
 *
 * Resolve and fetch failures propagate and abort the run. Upload failures
 * are collected in the report.
 */

import { resolveTarget } from './resolve';
import { fetchArtifacts } from './fetch';
import { publishAssets } from './publish';
import { Logger, silentLogger } from '../utils/logger';
import { makeTempDir, removeDir } from '../utils/fs';
import type {
  ArtifactFile,
  PlatformServices,
  PublishReport,
  Resolution,
  ResolvedTarget,
  Trigger,
} from './types';

export interface PipelineOptions {
  trigger: Trigger;
  services: PlatformServices;
  workflow: string;
  /** Where artifacts are extracted. Defaults to a temp dir removed afterwards. */
  workDir?: string;
  /** Keep the default temp dir instead of removing it */
  keep?: boolean;
  /** Resolve and fetch, but upload nothing. The fetched files are kept. */
  dryRun?: boolean;
  /** Called once resolution is known, before anything is downloaded */
  onResolved?: (resolution: Resolution) => void;
  logger?: Logger;
}

export type PipelineOutcome =
  | { status: 'no-run'; resolution: Extract<Resolution, { kind: 'not-found' }> }
  | { status: 'dry-run'; target: ResolvedTarget; files: ArtifactFile[]; workDir: string }
  | { status: 'published'; target: ResolvedTarget; files: ArtifactFile[]; report: PublishReport };

export async function runPipeline(options: PipelineOptions): Promise<PipelineOutcome> {
  const log = options.logger ?? silentLogger();
  const { services } = options;

  const resolution = await resolveTarget(options.trigger, services.runs, {
    workflow: options.workflow,
    logger: log,
  });
  options.onResolved?.(resolution);

  if (resolution.kind === 'not-found') {
    return { status: 'no-run', resolution };
  }

  const { target } = resolution;
  const ownsDir = options.workDir === undefined;
  const workDir = options.workDir ?? makeTempDir('courier-');

  try {
    const files = await fetchArtifacts(target.runId, services.artifacts, workDir, log);

    if (options.dryRun) {
      for (const file of files) {
        log.info(`Would upload ${file.name} to ${target.tag}`);
      }
      return { status: 'dry-run', target, files, workDir };
    }

    const report = await publishAssets(target.tag, files, services.releases, log);
    return { status: 'published', target, files, report };
  } finally {
    if (ownsDir && !options.keep && !options.dryRun) {
      removeDir(workDir);
    } else {
      log.debug(`Artifacts kept in ${workDir}`);
    }
  }
}
