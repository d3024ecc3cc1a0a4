/**
 * Core types for the release asset pipeline
 *
 * The pipeline talks to the CI platform only through the three service
 * interfaces declared here (run query, artifact source, release uploader).
 */

// =============================================================================
// Triggers & Resolution
// =============================================================================

/**
 * What started this invocation
 */
export type Trigger =
  | { kind: 'manual'; tag: string; runId: string }
  | { kind: 'release'; tag: string; commitSha: string };

export interface ResolvedTarget {
  readonly runId: string;
  readonly tag: string;
}

/**
 * Result of ResolveTarget. `not-found` means no completed run exists for the
 * commit and the pipeline ends without doing anything.
 */
export type Resolution =
  | { kind: 'resolved'; target: ResolvedTarget }
  | { kind: 'not-found'; commitSha: string; workflow: string };

// =============================================================================
// Platform records
// =============================================================================

/**
 * One execution of the build workflow
 */
export interface RunRecord {
  id: string;
  headSha: string;
  status: string;
  conclusion: string | null;
}

/**
 * A named bundle of files stored by one run
 */
export interface ArtifactBundle {
  id: string;
  name: string;
  sizeInBytes: number;
  expired: boolean;
}

/**
 * A file materialized in the working directory
 */
export interface ArtifactFile {
  /** Absolute path on disk */
  path: string;
  /** Basename, used as the release asset name */
  name: string;
  size: number;
}

// =============================================================================
// Publish results
// =============================================================================

export type UploadOutcome =
  | { file: ArtifactFile; ok: true; assetId: string }
  | { file: ArtifactFile; ok: false; error: string };

export interface PublishReport {
  tag: string;
  attempted: number;
  uploaded: ArtifactFile[];
  failed: Array<{ file: ArtifactFile; error: string }>;
}

// =============================================================================
// Services
// =============================================================================

export interface RunQueryService {
  /**
   * Runs of a workflow in platform order. `headSha` is a narrowing hint;
   * callers still filter the result themselves.
   */
  listRuns(workflow: string, options: { headSha?: string }): Promise<RunRecord[]>;
}

export interface ArtifactSource {
  listArtifacts(runId: string): Promise<ArtifactBundle[]>;
  /** Zip archive holding the bundle's files */
  downloadArchive(artifact: ArtifactBundle): Promise<Buffer>;
}

export interface ReleaseUploader {
  /**
   * Attach a file to the release for `tag`, replacing an asset of the same
   * name. Resolves to the new asset id.
   */
  upload(tag: string, file: ArtifactFile): Promise<string>;
}

export interface PlatformServices {
  runs: RunQueryService;
  artifacts: ArtifactSource;
  releases: ReleaseUploader;
}
