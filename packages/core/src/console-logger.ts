/**
 * @module console-logger
 * Writes device and history events as tagged console lines, e.g. `[light] ON`.
 */

import type { EventBus } from '@switchboard/types';

/** Options for {@link attachConsoleLogger}. */
export interface ConsoleLoggerOptions {
  /** Also log selection and history events under the `[history]` tag. */
  verbose?: boolean;
  /** Line sink (default `console.log`). */
  log?: (line: string) => void;
}

/**
 * Subscribe a logger to `bus`.
 * @returns A function that removes every subscription it made.
 */
export function attachConsoleLogger(bus: EventBus, options: ConsoleLoggerOptions = {}): () => void {
  const log = options.log ?? ((line: string) => console.log(line));

  const unsubscribers = [
    bus.on('device:changed', ({ label, isOn }) => log(`[${label}] ${isOn ? 'ON' : 'OFF'}`)),
  ];

  if (options.verbose) {
    unsubscribers.push(
      bus.on('action:selected', ({ name }) => log(`[history] selected ${name}`)),
      bus.on('history:pushed', ({ name, size }) => log(`[history] pushed ${name} (${size})`)),
      bus.on('history:evicted', ({ name }) => log(`[history] evicted ${name}`)),
      bus.on('history:undone', ({ name, size }) => log(`[history] undid ${name} (${size})`)),
      bus.on('history:cleared', () => log('[history] cleared')),
    );
  }

  return () => {
    for (const unsubscribe of unsubscribers) {
      unsubscribe();
    }
  };
}
