export { handlePublish, PUBLISH_HELP } from './publish';
export { handleResolve, RESOLVE_HELP } from './resolve';
export { handleFetch, FETCH_HELP } from './fetch';
export { handleUpload, UPLOAD_HELP } from './upload';
export { parseArgs, hasHelpFlag } from './args';
export { createContext, getServices } from './context';
export type { CommandContext } from './context';

import { handlePublish, PUBLISH_HELP } from './publish';
import { handleResolve, RESOLVE_HELP } from './resolve';
import { handleFetch, FETCH_HELP } from './fetch';
import { handleUpload, UPLOAD_HELP } from './upload';
import type { CommandContext } from './context';

/** Resolves to the process exit code */
export type CommandHandler = (args: string[], ctx: CommandContext) => Promise<number>;

const COMMANDS: Record<string, CommandHandler> = {
  publish: handlePublish,
  resolve: handleResolve,
  fetch: handleFetch,
  upload: handleUpload,
};

export const COMMAND_NAMES = Object.keys(COMMANDS);

/**
 * Look up a subcommand by name; inherited properties never match
 */
export function findCommand(name: string): CommandHandler | undefined {
  return Object.hasOwn(COMMANDS, name) ? COMMANDS[name] : undefined;
}

const COMMAND_HELP: Record<string, string> = {
  publish: PUBLISH_HELP,
  resolve: RESOLVE_HELP,
  fetch: FETCH_HELP,
  upload: UPLOAD_HELP,
};

/**
 * Print help for a command. Returns false for unknown commands.
 */
export function printCommandHelp(command: string): boolean {
  if (!Object.hasOwn(COMMAND_HELP, command)) return false;
  const help = COMMAND_HELP[command];
  console.log(help);
  return true;
}
