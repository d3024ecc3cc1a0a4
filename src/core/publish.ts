/**
 * Release asset publishing
 *
 * Uploads run one at a time. A failed upload is logged and recorded; it
 * never stops the remaining files and never fails the invocation.
 */

import { describeError } from './errors';
import { Logger, silentLogger } from '../utils/logger';
import type { ArtifactFile, PublishReport, ReleaseUploader, UploadOutcome } from './types';

/**
 * Attach a single file, turning failure into a value
 */
export async function publishAsset(
  tag: string,
  file: ArtifactFile,
  uploader: ReleaseUploader
): Promise<UploadOutcome> {
  try {
    const assetId = await uploader.upload(tag, file);
    return { file, ok: true, assetId };
  } catch (error) {
    return { file, ok: false, error: describeError(error) };
  }
}

/**
 * Upload every file to the release for `tag`
 */
export async function publishAssets(
  tag: string,
  files: ArtifactFile[],
  uploader: ReleaseUploader,
  logger?: Logger
): Promise<PublishReport> {
  const log = (logger ?? silentLogger()).child({ tag });
  const report: PublishReport = { tag, attempted: 0, uploaded: [], failed: [] };

  for (const file of files) {
    log.info(`Uploading ${file.path}...`);
    report.attempted++;

    const outcome = await publishAsset(tag, file, uploader);
    if (outcome.ok) {
      report.uploaded.push(file);
      log.debug(`Uploaded ${file.name}`, { assetId: outcome.assetId });
    } else {
      report.failed.push({ file, error: outcome.error });
      log.warn('Something went wrong, skipping.', { file: file.name, error: outcome.error });
    }
  }

  return report;
}
