/**
 * GitHub-backed implementations of the pipeline's service interfaces
 */

import { ApiError, DEFAULT_PAGE_SIZE, GitHubClient } from './client';
import type { Release } from './client';
import { Errors, describeError } from '../core/errors';
import { readFile } from '../utils/fs';
import type {
  ArtifactBundle,
  ArtifactFile,
  ArtifactSource,
  PlatformServices,
  ReleaseUploader,
  RunQueryService,
  RunRecord,
} from '../core/types';

/**
 * Workflow run history. Pages are fetched until a short page or `maxPages`.
 */
export class GitHubRunQuery implements RunQueryService {
  constructor(
    private client: GitHubClient,
    private repo: string,
    private maxPages: number = 10
  ) {}

  async listRuns(workflow: string, options: { headSha?: string } = {}): Promise<RunRecord[]> {
    const runs: RunRecord[] = [];

    for (let page = 1; page <= this.maxPages; page++) {
      const result = await this.client.listWorkflowRuns(this.repo, workflow, {
        headSha: options.headSha,
        page,
        perPage: DEFAULT_PAGE_SIZE,
      });

      for (const run of result.workflow_runs) {
        runs.push({
          id: String(run.id),
          headSha: run.head_sha,
          status: run.status ?? 'unknown',
          conclusion: run.conclusion,
        });
      }

      if (result.workflow_runs.length < DEFAULT_PAGE_SIZE) break;
    }

    return runs;
  }
}

/**
 * Artifacts of a run, downloaded as zip archives
 */
export class GitHubArtifactSource implements ArtifactSource {
  constructor(
    private client: GitHubClient,
    private repo: string
  ) {}

  async listArtifacts(runId: string): Promise<ArtifactBundle[]> {
    const bundles: ArtifactBundle[] = [];

    for (let page = 1; ; page++) {
      const result = await this.client.listRunArtifacts(this.repo, runId, {
        page,
        perPage: DEFAULT_PAGE_SIZE,
      });

      for (const artifact of result.artifacts) {
        bundles.push({
          id: String(artifact.id),
          name: artifact.name,
          sizeInBytes: artifact.size_in_bytes,
          expired: artifact.expired,
        });
      }

      if (result.artifacts.length < DEFAULT_PAGE_SIZE || bundles.length >= result.total_count) break;
    }

    return bundles;
  }

  async downloadArchive(artifact: ArtifactBundle): Promise<Buffer> {
    return this.client.downloadArtifact(this.repo, artifact.id);
  }
}

/**
 * The name GitHub stores for an uploaded asset. Accents are dropped and every
 * run of characters outside `A-Za-z0-9-_+@` becomes a single dot, so
 * `my app.zip` is stored as `my.app.zip`.
 */
export function sanitizeAssetName(name: string): string {
  let value = name.normalize('NFD').replace(/[\u0300-\u036f]/g, '');
  if (value.startsWith('.')) {
    value = `default${value}`;
  }
  return value
    .replace(/[^a-z0-9\-_+@]+/gi, '.')
    .replace(/^\.|\.$/g, '');
}

/**
 * Release uploads with clobber semantics: an existing asset with the same
 * stored name (compared case-insensitively) is deleted before the new one is
 * uploaded.
 */
export class GitHubReleaseUploader implements ReleaseUploader {
  constructor(
    private client: GitHubClient,
    private repo: string
  ) {}

  async upload(tag: string, file: ArtifactFile): Promise<string> {
    let release: Release;
    try {
      release = await this.client.getReleaseByTag(this.repo, tag);
    } catch (error) {
      if (error instanceof ApiError && error.status === 404) {
        throw Errors.releaseNotFound(tag);
      }
      throw error;
    }

    const data = readFile(file.path);

    try {
      const existing = await this.client.listReleaseAssets(this.repo, release.id);
      const stored = sanitizeAssetName(file.name).toLowerCase();
      const previous = existing.find(asset => asset.name.toLowerCase() === stored);
      if (previous) {
        await this.client.deleteReleaseAsset(this.repo, previous.id);
      }

      const asset = await this.client.uploadReleaseAsset(release.upload_url, file.name, data);
      return String(asset.id);
    } catch (error) {
      throw Errors.uploadFailed(file.name, tag, describeError(error));
    }
  }
}

/**
 * Wire all three services to one client
 */
export function createGitHubServices(
  client: GitHubClient,
  repo: string,
  options: { maxRunPages?: number } = {}
): PlatformServices {
  return {
    runs: new GitHubRunQuery(client, repo, options.maxRunPages),
    artifacts: new GitHubArtifactSource(client, repo),
    releases: new GitHubReleaseUploader(client, repo),
  };
}
