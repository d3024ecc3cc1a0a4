/**
 * Error handling for courier
 * Provides structured, actionable error messages
 */

/**
 * Error codes for different types of errors
 */
export enum ErrorCode {
  // Configuration and usage errors
  CONFIG_INVALID = 'CONFIG_INVALID',
  INVALID_ARGUMENT = 'INVALID_ARGUMENT',
  MISSING_TOKEN = 'MISSING_TOKEN',
  MISSING_REPOSITORY = 'MISSING_REPOSITORY',

  // Trigger errors
  UNSUPPORTED_EVENT = 'UNSUPPORTED_EVENT',
  EVENT_PAYLOAD_INVALID = 'EVENT_PAYLOAD_INVALID',

  // Pipeline errors
  RUN_QUERY_FAILED = 'RUN_QUERY_FAILED',
  ARTIFACT_DOWNLOAD_FAILED = 'ARTIFACT_DOWNLOAD_FAILED',
  ARCHIVE_CORRUPTED = 'ARCHIVE_CORRUPTED',
  RELEASE_NOT_FOUND = 'RELEASE_NOT_FOUND',
  UPLOAD_FAILED = 'UPLOAD_FAILED',

  // Operation errors
  FILE_NOT_FOUND = 'FILE_NOT_FOUND',
}

/**
 * Context information for errors
 */
export interface ErrorContext {
  [key: string]: unknown;
}

/**
 * Main error class for courier
 * Provides structured errors with suggestions and context
 */
export class CourierError extends Error {
  public readonly code: ErrorCode;
  public readonly suggestions: string[];
  public readonly context: ErrorContext;

  constructor(
    message: string,
    code: ErrorCode,
    suggestions: string[] = [],
    context: ErrorContext = {}
  ) {
    super(message);
    this.name = 'CourierError';
    this.code = code;
    this.suggestions = suggestions;
    this.context = context;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, CourierError);
    }
  }

  /**
   * Format error for display
   *
   * Output format:
   *   error: [Short, clear description]
   *
   *   hint: [Actionable suggestions]
   *     [Command or action]
   */
  format(colors: boolean = true): string {
    const red = colors ? '\x1b[31m' : '';
    const yellow = colors ? '\x1b[33m' : '';
    const cyan = colors ? '\x1b[36m' : '';
    const dim = colors ? '\x1b[2m' : '';
    const reset = colors ? '\x1b[0m' : '';

    let output = `${red}error${reset}: ${this.message}\n`;

    if (this.context.cause) {
      output += `${dim}  Cause: ${this.context.cause}${reset}\n`;
    }

    if (this.suggestions.length > 0) {
      output += `\n${yellow}hint${reset}:\n`;
      for (const suggestion of this.suggestions) {
        // Commands are highlighted, prose is dimmed
        if (suggestion.includes('#') || suggestion.startsWith('courier ') || suggestion.startsWith('export ')) {
          output += `  ${cyan}${suggestion}${reset}\n`;
        } else {
          output += `  ${dim}${suggestion}${reset}\n`;
        }
      }
    }

    return output;
  }

  /**
   * Create error as JSON for programmatic use
   */
  toJSON(): object {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      suggestions: this.suggestions,
      context: this.context,
    };
  }
}

/**
 * Extract a printable message from anything thrown
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

/**
 * Find similar strings using Levenshtein distance
 */
export function findSimilar(input: string, candidates: string[], maxDistance: number = 3): string[] {
  const results: { candidate: string; distance: number }[] = [];

  for (const candidate of candidates) {
    const distance = levenshteinDistance(input.toLowerCase(), candidate.toLowerCase());
    if (distance <= maxDistance) {
      results.push({ candidate, distance });
    }
  }

  return results
    .sort((a, b) => a.distance - b.distance)
    .slice(0, 3)
    .map(r => r.candidate);
}

/**
 * Calculate Levenshtein distance between two strings
 */
function levenshteinDistance(a: string, b: string): number {
  const matrix: number[][] = [];

  for (let i = 0; i <= b.length; i++) {
    matrix[i] = [i];
  }

  for (let j = 0; j <= a.length; j++) {
    matrix[0][j] = j;
  }

  for (let i = 1; i <= b.length; i++) {
    for (let j = 1; j <= a.length; j++) {
      if (b.charAt(i - 1) === a.charAt(j - 1)) {
        matrix[i][j] = matrix[i - 1][j - 1];
      } else {
        matrix[i][j] = Math.min(
          matrix[i - 1][j - 1] + 1, // substitution
          matrix[i][j - 1] + 1,     // insertion
          matrix[i - 1][j] + 1      // deletion
        );
      }
    }
  }

  return matrix[b.length][a.length];
}

/**
 * Factory functions for common errors
 */
export const Errors = {
  invalidConfig(issues: string[]): CourierError {
    return new CourierError(
      `Invalid environment configuration:\n${issues.map(i => `  - ${i}`).join('\n')}`,
      ErrorCode.CONFIG_INVALID,
      ['Check the variables listed above'],
      { issues }
    );
  },

  invalidArgument(arg: string, expected: string): CourierError {
    return new CourierError(
      `Invalid argument '${arg}': expected ${expected}`,
      ErrorCode.INVALID_ARGUMENT,
      ['courier help    # Show usage'],
      { argument: arg, expected }
    );
  },

  missingToken(): CourierError {
    return new CourierError(
      'No API token found',
      ErrorCode.MISSING_TOKEN,
      [
        'export GITHUB_TOKEN=<token>    # Provide a token with contents:write',
        'In a workflow, pass ${{ github.token }} as GH_TOKEN',
      ]
    );
  },

  missingRepository(): CourierError {
    return new CourierError(
      'No repository specified',
      ErrorCode.MISSING_REPOSITORY,
      [
        'courier publish --repo <owner>/<name>',
        'export GITHUB_REPOSITORY=<owner>/<name>',
      ]
    );
  },

  unsupportedEvent(eventName: string | undefined): CourierError {
    return new CourierError(
      eventName
        ? `Unsupported trigger event '${eventName}'`
        : 'Could not determine the trigger event',
      ErrorCode.UNSUPPORTED_EVENT,
      [
        'Run from a release or workflow_dispatch workflow',
        'courier publish --tag <tag> --action-id <run-id>    # Manual invocation',
      ],
      { eventName }
    );
  },

  invalidEventPayload(eventPath: string | undefined, details: string): CourierError {
    return new CourierError(
      `Cannot read trigger event payload${eventPath ? ` at ${eventPath}` : ''}`,
      ErrorCode.EVENT_PAYLOAD_INVALID,
      ['Check that GITHUB_EVENT_PATH points at the event JSON'],
      { eventPath, cause: details }
    );
  },

  runQueryFailed(workflow: string, cause: string): CourierError {
    return new CourierError(
      `Failed to query runs of workflow '${workflow}'`,
      ErrorCode.RUN_QUERY_FAILED,
      ['Check the workflow file name and the token permissions (actions:read)'],
      { workflow, cause }
    );
  },

  artifactDownloadFailed(runId: string, cause: string, artifact?: string): CourierError {
    return new CourierError(
      artifact
        ? `Failed to download artifact '${artifact}' of run ${runId}`
        : `Failed to list artifacts of run ${runId}`,
      ErrorCode.ARTIFACT_DOWNLOAD_FAILED,
      [`courier fetch ${runId}    # Retry the download alone`],
      { runId, artifact, cause }
    );
  },

  archiveCorrupted(archive: string, details: string): CourierError {
    return new CourierError(
      `Archive '${archive}' is corrupted: ${details}`,
      ErrorCode.ARCHIVE_CORRUPTED,
      [],
      { archive }
    );
  },

  releaseNotFound(tag: string): CourierError {
    return new CourierError(
      `No release found for tag '${tag}'`,
      ErrorCode.RELEASE_NOT_FOUND,
      ['Publish the release before uploading assets'],
      { tag }
    );
  },

  uploadFailed(name: string, tag: string, cause: string): CourierError {
    return new CourierError(
      `Failed to upload '${name}' to release '${tag}'`,
      ErrorCode.UPLOAD_FAILED,
      [],
      { name, tag, cause }
    );
  },

  fileNotFound(filePath: string): CourierError {
    return new CourierError(
      `File not found: ${filePath}`,
      ErrorCode.FILE_NOT_FOUND,
      [],
      { path: filePath }
    );
  },
};
