/**
 * Artifact retrieval
 *
 * Downloads every bundle of a run and merges their files into one
 * directory. Bundles are extracted in listing order, so when two bundles
 * carry the same path the later one wins.
 */

import * as path from 'path';
import { CourierError, Errors, describeError } from './errors';
import { extractZip } from './zip';
import { Logger, silentLogger } from '../utils/logger';
import { mkdirp, stat, walkDir } from '../utils/fs';
import type { ArtifactBundle, ArtifactFile, ArtifactSource } from './types';

/**
 * Describe the files currently under `dir`, sorted by path
 */
export function listArtifactFiles(dir: string): ArtifactFile[] {
  return walkDir(dir).map(filePath => ({
    path: filePath,
    name: path.basename(filePath),
    size: stat(filePath).size,
  }));
}

/**
 * Fetch all artifacts of `runId` into `dir`.
 *
 * Any listing, download or extraction failure aborts the fetch.
 */
export async function fetchArtifacts(
  runId: string,
  source: ArtifactSource,
  dir: string,
  logger?: Logger
): Promise<ArtifactFile[]> {
  const log = (logger ?? silentLogger()).child({ runId });

  let bundles: ArtifactBundle[];
  try {
    bundles = await source.listArtifacts(runId);
  } catch (error) {
    throw Errors.artifactDownloadFailed(runId, describeError(error));
  }

  mkdirp(dir);
  log.info(`Found ${bundles.length} artifact(s)`);

  for (const bundle of bundles) {
    if (bundle.expired) {
      log.warn(`Skipping expired artifact ${bundle.name}`, { artifactId: bundle.id });
      continue;
    }

    const timer = log.startTimer(`Downloaded ${bundle.name}`, { bytes: bundle.sizeInBytes });
    let archive: Buffer;
    try {
      archive = await source.downloadArchive(bundle);
    } catch (error) {
      throw Errors.artifactDownloadFailed(runId, describeError(error), bundle.name);
    }
    timer.end();

    try {
      const written = extractZip(archive, dir, bundle.name);
      log.debug(`Extracted ${written.length} file(s) from ${bundle.name}`);
    } catch (error) {
      if (error instanceof CourierError) throw error;
      throw Errors.artifactDownloadFailed(runId, describeError(error), bundle.name);
    }
  }

  const files = listArtifactFiles(dir);
  for (const file of files) {
    log.info(`${path.relative(dir, file.path)} (${file.size} bytes)`);
  }

  return files;
}
