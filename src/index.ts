/**
 * release-courier
 *
 * Attach the build artifacts of a CI run to a published release.
 * The CLI lives in cli.ts; this module exposes the pipeline for programmatic use.
 */

export * from './core/types';
export { runPipeline } from './core/pipeline';
export type { PipelineOptions, PipelineOutcome } from './core/pipeline';
export { resolveTarget, findCompletedRun } from './core/resolve';
export { fetchArtifacts, listArtifactFiles } from './core/fetch';
export { publishAssets, publishAsset } from './core/publish';
export { detectTrigger, describeTrigger } from './core/trigger';
export type { TriggerFlags, EventReader } from './core/trigger';
export { writeStepOutputs, formatStepOutputs } from './core/outputs';
export { parseConfig, loadConfig, resetConfig } from './core/config';
export type { CourierConfig } from './core/config';
export { CourierError, ErrorCode, Errors } from './core/errors';
export { ZipReader, extractZip } from './core/zip';
export type { ZipEntry } from './core/zip';
export { GitHubClient, ApiError, nodeTransport } from './api/client';
export type { Transport, HttpRequest, HttpResponse } from './api/client';
export {
  GitHubRunQuery,
  GitHubArtifactSource,
  GitHubReleaseUploader,
  createGitHubServices,
  sanitizeAssetName,
} from './api/services';
export { Logger, logger } from './utils/logger';
export type { LogLevel, LogFormat, LogSink } from './utils/logger';
export { VERSION } from './version';
