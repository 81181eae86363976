/**
 * @module args
 * Command-line argument parsing for the `switchboard` CLI.
 */

import { DEFAULT_HISTORY_CAPACITY } from '@switchboard/core';

/** Commands run in order against one session. */
export const COMMANDS = ['on', 'off', 'dispatch', 'undo', 'state'] as const;

export type CliCommand = (typeof COMMANDS)[number];

export interface CliOptions {
  /** History capacity. */
  capacity: number;
  /** Suppress device log lines. */
  quiet: boolean;
  /** Print `state` as JSON. */
  json: boolean;
  /** Print usage and exit. */
  help: boolean;
  commands: CliCommand[];
}

export const USAGE = [
  'usage: switchboard [--capacity <n>] [--quiet] [--json] <command>...',
  '',
  'commands:',
  '  on        select TurnOn and dispatch it',
  '  off       select TurnOff and dispatch it',
  '  dispatch  dispatch the selected action again',
  '  undo      revert the last dispatched action',
  '  state     print the light state and history',
].join('\n');

/** Malformed command line. */
export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

/** Plain decimal digits only. */
const DIGITS = /^\d+$/;

const COMMAND_SET: ReadonlySet<string> = new Set(COMMANDS);

function isCommand(value: string): value is CliCommand {
  return COMMAND_SET.has(value);
}

/**
 * Parse command-line arguments (without the node and script entries).
 * @throws UsageError on unknown options or commands, a bad capacity, or no commands.
 */
export function parseArgs(args: readonly string[]): CliOptions {
  const options: CliOptions = {
    capacity: DEFAULT_HISTORY_CAPACITY,
    quiet: false,
    json: false,
    help: false,
    commands: [],
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === '--capacity') {
      const value = args[i + 1];
      const parsed = value !== undefined && DIGITS.test(value) ? Number(value) : 0;
      if (parsed < 1 || !Number.isSafeInteger(parsed)) {
        throw new UsageError(`Invalid --capacity: "${value ?? ''}"`);
      }
      options.capacity = parsed;
      i++;
    } else if (arg === '--quiet' || arg === '-q') {
      options.quiet = true;
    } else if (arg === '--json') {
      options.json = true;
    } else if (arg === '--help' || arg === '-h') {
      options.help = true;
    } else if (arg.startsWith('-')) {
      throw new UsageError(`Unknown option: ${arg}`);
    } else if (isCommand(arg)) {
      options.commands.push(arg);
    } else {
      throw new UsageError(`Unknown command: ${arg}`);
    }
  }

  if (!options.help && options.commands.length === 0) {
    throw new UsageError('No commands given');
  }
  return options;
}
