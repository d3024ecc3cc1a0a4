/**
 * Configuration & Environment Validation
 *
 * Validates the CI environment once and provides typed configuration
 * access to every command.
 */

import { z } from 'zod';
import { Errors } from './errors';

// =============================================================================
// Environment Schema
// =============================================================================

const REPOSITORY_PATTERN = /^[A-Za-z0-9_.-]+\/[A-Za-z0-9_.-]+$/;

const envSchema = z.object({
  // Authentication
  GITHUB_TOKEN: z.string().min(1).optional(),
  GH_TOKEN: z.string().min(1).optional(),

  // Platform
  GITHUB_REPOSITORY: z
    .string()
    .regex(REPOSITORY_PATTERN, 'must look like <owner>/<name>')
    .optional(),
  GITHUB_API_URL: z.string().url().default('https://api.github.com'),

  // Trigger (set by the runner)
  GITHUB_EVENT_NAME: z.string().optional(),
  GITHUB_EVENT_PATH: z.string().optional(),
  GITHUB_SHA: z.string().optional(),
  GITHUB_OUTPUT: z.string().optional(),

  // Behaviour
  COURIER_WORKFLOW: z.string().min(1).default('ci.yml'),
  COURIER_MAX_RUN_PAGES: z
    .string()
    .regex(/^\d+$/, 'must be a positive integer')
    .transform(Number)
    .refine(n => n > 0, 'must be a positive integer')
    .default('10'),

  // Logging
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error', 'fatal']).default('info'),
  LOG_FORMAT: z.enum(['pretty', 'json']).default('pretty'),
});

export type EnvConfig = z.infer<typeof envSchema>;

export interface CourierConfig {
  token?: string;
  repository?: string;
  apiUrl: string;
  eventName?: string;
  eventPath?: string;
  sha?: string;
  outputPath?: string;
  workflow: string;
  maxRunPages: number;
  logLevel: EnvConfig['LOG_LEVEL'];
  logFormat: EnvConfig['LOG_FORMAT'];
}

/**
 * Validate an environment and map it onto the config shape.
 * Throws CONFIG_INVALID listing every bad variable.
 */
export function parseConfig(env: Record<string, string | undefined>): CourierConfig {
  // Empty strings behave like unset variables (runners export blanks)
  const cleaned = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== '')
  );

  const result = envSchema.safeParse(cleaned);

  if (!result.success) {
    throw Errors.invalidConfig(
      result.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`)
    );
  }

  const data = result.data;

  return {
    token: data.GITHUB_TOKEN ?? data.GH_TOKEN,
    repository: data.GITHUB_REPOSITORY,
    apiUrl: data.GITHUB_API_URL.replace(/\/$/, ''),
    eventName: data.GITHUB_EVENT_NAME,
    eventPath: data.GITHUB_EVENT_PATH,
    sha: data.GITHUB_SHA,
    outputPath: data.GITHUB_OUTPUT,
    workflow: data.COURIER_WORKFLOW,
    maxRunPages: data.COURIER_MAX_RUN_PAGES,
    logLevel: data.LOG_LEVEL,
    logFormat: data.LOG_FORMAT,
  };
}

/**
 * Check an `<owner>/<name>` repository string
 */
export function isRepository(value: string): boolean {
  return REPOSITORY_PATTERN.test(value);
}

// =============================================================================
// Configuration Singleton
// =============================================================================

let config: CourierConfig | null = null;

/**
 * Load configuration from process.env, once
 */
export function loadConfig(): CourierConfig {
  if (config) return config;
  config = parseConfig(process.env);
  return config;
}

/**
 * Reset the cached configuration (for testing)
 */
export function resetConfig(): void {
  config = null;
}
