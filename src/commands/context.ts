/**
 * Command context
 *
 * Everything a command needs from the outside world. The CLI builds one from
 * the environment; tests build one around fake services.
 */

import { isRepository, loadConfig } from '../core/config';
import type { CourierConfig } from '../core/config';
import { Errors } from '../core/errors';
import { GitHubClient } from '../api/client';
import { createGitHubServices } from '../api/services';
import { Logger } from '../utils/logger';
import type { EventReader } from '../core/trigger';
import type { PlatformServices } from '../core/types';

export interface CommandContext {
  config: CourierConfig;
  logger: Logger;
  /** Overrides the GitHub-backed services */
  services?: PlatformServices;
  readEvent?: EventReader;
}

export function createContext(config: CourierConfig = loadConfig()): CommandContext {
  return {
    config,
    logger: new Logger({ service: 'courier' }, { level: config.logLevel, format: config.logFormat }),
  };
}

/**
 * Services for a repository, built on demand so commands that fail their
 * argument checks never need a token.
 */
export function getServices(ctx: CommandContext, repoOverride?: string): PlatformServices {
  if (ctx.services) return ctx.services;

  const repo = repoOverride ?? ctx.config.repository;
  if (!repo) {
    throw Errors.missingRepository();
  }
  if (!isRepository(repo)) {
    throw Errors.invalidArgument('--repo', '<owner>/<name>');
  }
  if (!ctx.config.token) {
    throw Errors.missingToken();
  }

  const client = new GitHubClient({ apiUrl: ctx.config.apiUrl, token: ctx.config.token });
  return createGitHubServices(client, repo, { maxRunPages: ctx.config.maxRunPages });
}
