/**
 * @module run
 * Runs parsed CLI commands against a single in-process session and maps
 * dispatcher errors to exit codes.
 */

import {
  TURN_OFF,
  TURN_ON,
  attachConsoleLogger,
  createSession,
  isDispatchError,
  snapshotSession,
} from '@switchboard/core';
import type { Session } from '@switchboard/core';
import { USAGE, UsageError, parseArgs } from './args';
import type { CliCommand, CliOptions } from './args';

export const EXIT_OK = 0;
/** NoActionSelected or EmptyHistory. */
export const EXIT_DISPATCH_ERROR = 1;
export const EXIT_USAGE = 2;

/** Output sinks, injectable for tests. */
export interface CliIo {
  out(line: string): void;
  err(line: string): void;
}

const consoleIo: CliIo = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
};

/**
 * Run the CLI.
 * @param args - Arguments after the script name.
 * @returns The process exit code.
 */
export function runCli(args: readonly string[], io: CliIo = consoleIo): number {
  let options: CliOptions;
  try {
    options = parseArgs(args);
  } catch (e) {
    if (e instanceof UsageError) {
      io.err(`error: ${e.message}`);
      io.err(USAGE);
      return EXIT_USAGE;
    }
    throw e;
  }

  if (options.help) {
    io.out(USAGE);
    return EXIT_OK;
  }

  const session = createSession({ capacity: options.capacity });
  if (!options.quiet) {
    attachConsoleLogger(session.bus, { log: (line) => io.out(line) });
  }

  for (const command of options.commands) {
    try {
      runCommand(session, command, options, io);
    } catch (e) {
      if (isDispatchError(e)) {
        io.err(`error: ${e.message}`);
        return EXIT_DISPATCH_ERROR;
      }
      throw e;
    }
  }
  return EXIT_OK;
}

function runCommand(session: Session, command: CliCommand, options: CliOptions, io: CliIo): void {
  const { dispatcher } = session;
  switch (command) {
    case 'on':
      dispatcher.setAction(TURN_ON);
      dispatcher.dispatch();
      break;
    case 'off':
      dispatcher.setAction(TURN_OFF);
      dispatcher.dispatch();
      break;
    case 'dispatch':
      dispatcher.dispatch();
      break;
    case 'undo':
      dispatcher.undoLast();
      break;
    case 'state':
      printState(session, options.json, io);
      break;
  }
}

function printState(session: Session, json: boolean, io: CliIo): void {
  const snapshot = snapshotSession(session);
  if (json) {
    io.out(JSON.stringify(snapshot));
    return;
  }
  io.out(`state: ${snapshot.isOn ? 'on' : 'off'}`);
  io.out(`history: ${snapshot.history.length > 0 ? snapshot.history.join(', ') : '(empty)'}`);
}
