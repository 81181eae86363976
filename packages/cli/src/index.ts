/**
 * @module cli
 * `switchboard` entry point.
 *
 * @example
 *   switchboard on off undo state
 */

import { runCli } from './run';

process.exitCode = runCli(process.argv.slice(2));
