/**
 * Argument parsing shared by the subcommands
 */

const SHORT_FLAGS: Record<string, string> = {
  h: 'help',
  t: 'tag',
  a: 'action-id',
  R: 'repo',
  w: 'workflow',
  d: 'dir',
  n: 'dry-run',
};

/** Flags that never take a value */
const BOOLEAN_FLAGS = new Set(['help', 'keep', 'dry-run', 'version']);

export interface ParsedArgs {
  flags: Record<string, string | boolean>;
  positional: string[];
}

/**
 * Parse `--key value`, `--key=value`, `-k value` and bare flags.
 * Everything after `--` is positional.
 */
export function parseArgs(args: string[]): ParsedArgs {
  const flags: Record<string, string | boolean> = {};
  const positional: string[] = [];

  let i = 0;
  while (i < args.length) {
    const arg = args[i];

    if (arg === '--') {
      positional.push(...args.slice(i + 1));
      break;
    }

    if (arg.startsWith('--') || (arg.startsWith('-') && arg.length === 2)) {
      let key = arg.startsWith('--') ? arg.slice(2) : SHORT_FLAGS[arg.slice(1)] ?? arg.slice(1);
      let inline: string | undefined;

      const eq = key.indexOf('=');
      if (eq !== -1) {
        inline = key.slice(eq + 1);
        key = key.slice(0, eq);
      }

      if (inline !== undefined) {
        flags[key] = inline;
        i++;
      } else if (!BOOLEAN_FLAGS.has(key) && i + 1 < args.length && !args[i + 1].startsWith('-')) {
        flags[key] = args[i + 1];
        i += 2;
      } else {
        flags[key] = true;
        i++;
      }
    } else {
      positional.push(arg);
      i++;
    }
  }

  return { flags, positional };
}

/**
 * Read a string-valued flag; a bare flag counts as missing
 */
export function stringFlag(flags: ParsedArgs['flags'], name: string): string | undefined {
  const value = flags[name];
  return typeof value === 'string' && value !== '' ? value : undefined;
}

export function booleanFlag(flags: ParsedArgs['flags'], name: string): boolean {
  return flags[name] === true || flags[name] === 'true';
}

export function hasHelpFlag(args: string[]): boolean {
  return args.includes('--help') || args.includes('-h');
}
