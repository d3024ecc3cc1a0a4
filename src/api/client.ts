/**
 * GitHub REST client
 *
 * Covers the endpoints courier needs: workflow runs, run artifacts and
 * release assets. Requests go through a Transport so tests can answer them
 * in-process; the default transport uses Node's http/https modules.
 */

import * as http from 'http';
import * as https from 'https';
import { z } from 'zod';
import { VERSION } from '../version';

// ============================================================================
// HTTP Transport
// ============================================================================

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE' | 'PATCH';

export interface HttpRequest {
  method: HttpMethod;
  url: string;
  headers: Record<string, string>;
  body?: Buffer;
}

export interface HttpResponse {
  status: number;
  headers: Record<string, string>;
  body: Buffer;
}

export type Transport = (request: HttpRequest) => Promise<HttpResponse>;

function flattenHeaders(headers: http.IncomingHttpHeaders): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [key, value] of Object.entries(headers)) {
    if (value === undefined) continue;
    result[key.toLowerCase()] = Array.isArray(value) ? value.join(', ') : value;
  }
  return result;
}

/**
 * Make an HTTP request with Node's http/https modules. Redirects are not
 * followed.
 */
export const nodeTransport: Transport = (request) => {
  return new Promise((resolve, reject) => {
    const parsedUrl = new URL(request.url);
    const isHttps = parsedUrl.protocol === 'https:';
    const client = isHttps ? https : http;

    const reqOptions: http.RequestOptions = {
      hostname: parsedUrl.hostname,
      port: parsedUrl.port || (isHttps ? 443 : 80),
      path: parsedUrl.pathname + parsedUrl.search,
      method: request.method,
      headers: request.headers,
    };

    const req = client.request(reqOptions, (res) => {
      const chunks: Buffer[] = [];
      res.on('data', (chunk: Buffer) => {
        chunks.push(chunk);
      });
      res.on('end', () => {
        resolve({
          status: res.statusCode || 0,
          headers: flattenHeaders(res.headers),
          body: Buffer.concat(chunks),
        });
      });
      res.on('error', reject);
    });

    req.on('error', reject);

    if (request.body) {
      req.write(request.body);
    }

    req.end();
  });
};

// ============================================================================
// API Types
// ============================================================================

const workflowRunSchema = z.object({
  id: z.number(),
  head_sha: z.string(),
  status: z.string().nullable(),
  conclusion: z.string().nullable(),
  run_number: z.number().optional(),
  created_at: z.string().optional(),
});

const workflowRunsPageSchema = z.object({
  total_count: z.number(),
  workflow_runs: z.array(workflowRunSchema),
});

const artifactSchema = z.object({
  id: z.number(),
  name: z.string(),
  size_in_bytes: z.number(),
  expired: z.boolean(),
});

const artifactsPageSchema = z.object({
  total_count: z.number(),
  artifacts: z.array(artifactSchema),
});

const releaseSchema = z.object({
  id: z.number(),
  tag_name: z.string(),
  upload_url: z.string(),
  draft: z.boolean().optional(),
});

const releaseAssetSchema = z.object({
  id: z.number(),
  name: z.string(),
  size: z.number(),
});

const errorBodySchema = z.object({ message: z.string() });

export type WorkflowRun = z.infer<typeof workflowRunSchema>;
export type WorkflowRunsPage = z.infer<typeof workflowRunsPageSchema>;
export type Artifact = z.infer<typeof artifactSchema>;
export type ArtifactsPage = z.infer<typeof artifactsPageSchema>;
export type Release = z.infer<typeof releaseSchema>;
export type ReleaseAsset = z.infer<typeof releaseAssetSchema>;

export interface PageOptions {
  page?: number;
  perPage?: number;
}

// ============================================================================
// Errors
// ============================================================================

/**
 * A failed API call. Status 0 means no HTTP response was received.
 */
export class ApiError extends Error {
  constructor(
    message: string,
    public readonly status: number
  ) {
    super(message);
    this.name = 'ApiError';
  }
}

const MAX_REDIRECTS = 5;
export const DEFAULT_PAGE_SIZE = 100;

// ============================================================================
// API Client Class
// ============================================================================

export interface GitHubClientOptions {
  apiUrl?: string;
  token?: string;
  transport?: Transport;
}

export class GitHubClient {
  private apiUrl: string;
  private token?: string;
  private transport: Transport;

  constructor(options: GitHubClientOptions = {}) {
    this.apiUrl = (options.apiUrl || 'https://api.github.com').replace(/\/$/, '');
    this.token = options.token;
    this.transport = options.transport ?? nodeTransport;
  }

  private headers(authenticated: boolean, extra: Record<string, string> = {}): Record<string, string> {
    const headers: Record<string, string> = {
      'Accept': 'application/vnd.github+json',
      'User-Agent': `release-courier/${VERSION}`,
      'X-GitHub-Api-Version': '2022-11-28',
      ...extra,
    };
    if (authenticated && this.token) {
      headers['Authorization'] = `Bearer ${this.token}`;
    }
    return headers;
  }

  private async send(
    method: HttpMethod,
    url: string,
    options: { body?: Buffer; headers?: Record<string, string>; authenticated?: boolean } = {}
  ): Promise<HttpResponse> {
    try {
      return await this.transport({
        method,
        url,
        headers: this.headers(options.authenticated ?? true, options.headers),
        body: options.body,
      });
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ECONNREFUSED') {
        throw new ApiError(`Cannot connect to ${new URL(url).host}`, 0);
      }
      throw new ApiError(error instanceof Error ? error.message : 'Unknown error', 0);
    }
  }

  private ensureOk(response: HttpResponse, method: HttpMethod, url: string): void {
    if (response.status >= 200 && response.status < 300) return;

    let message = `${method} ${new URL(url).pathname} failed with status ${response.status}`;
    try {
      const body = errorBodySchema.safeParse(JSON.parse(response.body.toString('utf8')));
      if (body.success) {
        message = `${body.data.message} (status ${response.status})`;
      }
    } catch {
      // Non-JSON error body; keep the generic message
    }
    throw new ApiError(message, response.status);
  }

  private async requestJson<T>(
    method: HttpMethod,
    url: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    options: { body?: Buffer; headers?: Record<string, string> } = {}
  ): Promise<T> {
    const response = await this.send(method, url, options);
    this.ensureOk(response, method, url);

    let parsed: unknown;
    try {
      parsed = JSON.parse(response.body.toString('utf8'));
    } catch {
      throw new ApiError(`Invalid JSON in response to ${method} ${new URL(url).pathname}`, response.status);
    }

    const result = schema.safeParse(parsed);
    if (!result.success) {
      throw new ApiError(
        `Unexpected response to ${method} ${new URL(url).pathname}: ${result.error.issues[0]?.message ?? 'invalid shape'}`,
        response.status
      );
    }
    return result.data;
  }

  private url(path: string, query: Record<string, string | number | undefined> = {}): string {
    const params = new URLSearchParams();
    for (const [key, value] of Object.entries(query)) {
      if (value !== undefined) params.set(key, String(value));
    }
    const search = params.toString();
    return `${this.apiUrl}${path}${search ? `?${search}` : ''}`;
  }

  // ==========================================================================
  // Actions
  // ==========================================================================

  /**
   * List runs of a workflow, newest first as the API returns them
   */
  async listWorkflowRuns(
    repo: string,
    workflow: string,
    options: PageOptions & { headSha?: string } = {}
  ): Promise<WorkflowRunsPage> {
    const url = this.url(`/repos/${repo}/actions/workflows/${encodeURIComponent(workflow)}/runs`, {
      head_sha: options.headSha,
      per_page: options.perPage ?? DEFAULT_PAGE_SIZE,
      page: options.page ?? 1,
    });
    return this.requestJson('GET', url, workflowRunsPageSchema);
  }

  /**
   * List artifacts stored by a run
   */
  async listRunArtifacts(repo: string, runId: string, options: PageOptions = {}): Promise<ArtifactsPage> {
    const url = this.url(`/repos/${repo}/actions/runs/${encodeURIComponent(runId)}/artifacts`, {
      per_page: options.perPage ?? DEFAULT_PAGE_SIZE,
      page: options.page ?? 1,
    });
    return this.requestJson('GET', url, artifactsPageSchema);
  }

  /**
   * Download an artifact's zip archive. The API answers with a redirect to
   * blob storage, which must be fetched without the API token.
   */
  async downloadArtifact(repo: string, artifactId: string): Promise<Buffer> {
    let url = this.url(`/repos/${repo}/actions/artifacts/${encodeURIComponent(artifactId)}/zip`);
    let authenticated = true;

    for (let hop = 0; hop <= MAX_REDIRECTS; hop++) {
      const response = await this.send('GET', url, { authenticated });

      if (response.status >= 300 && response.status < 400) {
        const location = response.headers['location'];
        if (!location) {
          throw new ApiError(`Redirect without location for artifact ${artifactId}`, response.status);
        }
        url = new URL(location, url).toString();
        authenticated = false;
        continue;
      }

      this.ensureOk(response, 'GET', url);
      return response.body;
    }

    throw new ApiError(`Too many redirects downloading artifact ${artifactId}`, 0);
  }

  // ==========================================================================
  // Releases
  // ==========================================================================

  async getReleaseByTag(repo: string, tag: string): Promise<Release> {
    const url = this.url(`/repos/${repo}/releases/tags/${encodeURIComponent(tag)}`);
    return this.requestJson('GET', url, releaseSchema);
  }

  /**
   * List every asset of a release (all pages)
   */
  async listReleaseAssets(repo: string, releaseId: number): Promise<ReleaseAsset[]> {
    const assets: ReleaseAsset[] = [];

    for (let page = 1; ; page++) {
      const url = this.url(`/repos/${repo}/releases/${releaseId}/assets`, {
        per_page: DEFAULT_PAGE_SIZE,
        page,
      });
      const batch = await this.requestJson('GET', url, z.array(releaseAssetSchema));
      assets.push(...batch);
      if (batch.length < DEFAULT_PAGE_SIZE) break;
    }

    return assets;
  }

  async deleteReleaseAsset(repo: string, assetId: number): Promise<void> {
    const url = this.url(`/repos/${repo}/releases/assets/${assetId}`);
    const response = await this.send('DELETE', url);
    this.ensureOk(response, 'DELETE', url);
  }

  /**
   * Upload raw bytes as a release asset.
   * `uploadUrl` is the release's `upload_url` template, e.g.
   * `https://uploads.github.com/repos/o/r/releases/1/assets{?name,label}`.
   */
  async uploadReleaseAsset(uploadUrl: string, name: string, data: Buffer): Promise<ReleaseAsset> {
    const base = uploadUrl.replace(/\{[^}]*\}$/, '');
    const url = `${base}?${new URLSearchParams({ name }).toString()}`;

    return this.requestJson('POST', url, releaseAssetSchema, {
      body: data,
      headers: {
        'Content-Type': 'application/octet-stream',
        'Content-Length': String(data.length),
      },
    });
  }
}
