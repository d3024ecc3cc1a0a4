#!/usr/bin/env node

import { COMMAND_NAMES, createContext, findCommand, printCommandHelp, hasHelpFlag } from './commands';
import { CourierError, findSimilar } from './core/errors';
import { isColorEnabled } from './utils/colors';
import { VERSION } from './version';

const HELP = `
courier - Attach CI build artifacts to a published release

Usage: courier <command> [<args>]

Commands:
  publish               Resolve the run, download its artifacts, upload them
  resolve               Show which run belongs to the release (writes step outputs)
  fetch <run-id>        Download and merge the artifacts of a run
  upload <tag> <file>…  Upload files to a release, replacing same-named assets
  help [<command>]      Show help

Environment:
  GITHUB_TOKEN / GH_TOKEN   API token (contents:write, actions:read)
  GITHUB_REPOSITORY         <owner>/<name>
  COURIER_WORKFLOW          Build workflow to search (default ci.yml)
  LOG_LEVEL, LOG_FORMAT     debug|info|warn|error, pretty|json

Exit status is non-zero only when the run lookup or the artifact download
fails. A release without a completed run and individual failed uploads are
reported as warnings.
`;

function reportError(error: unknown): void {
  if (error instanceof CourierError) {
    console.error(error.format(isColorEnabled()));
  } else if (error instanceof Error) {
    console.error(`error: ${error.message}`);
  } else {
    console.error(`error: ${String(error)}`);
  }
}

async function run(args: string[]): Promise<number> {
  const [command, ...rest] = args;

  if (!command || command === '--help' || command === '-h') {
    console.log(HELP);
    return 0;
  }

  if (command === '--version' || command === '-v') {
    console.log(`courier version ${VERSION}`);
    return 0;
  }

  if (command === 'help') {
    if (rest.length > 0 && printCommandHelp(rest[0])) {
      return 0;
    }
    console.log(HELP);
    return 0;
  }

  const handler = findCommand(command);
  if (!handler) {
    const similar = findSimilar(command, COMMAND_NAMES);
    console.error(`courier: '${command}' is not a courier command. See 'courier --help'.`);
    if (similar.length > 0) {
      console.error('\nDid you mean one of these?');
      for (const cmd of similar) {
        console.error(`  ${cmd}`);
      }
    }
    return 1;
  }

  if (hasHelpFlag(rest) && printCommandHelp(command)) {
    return 0;
  }

  return handler(rest, createContext());
}

function main(): void {
  run(process.argv.slice(2)).then(
    (code) => {
      process.exitCode = code;
    },
    (error: unknown) => {
      reportError(error);
      process.exitCode = 1;
    }
  );
}

main();
