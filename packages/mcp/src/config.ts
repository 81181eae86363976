/**
 * @module config
 * Environment configuration for the MCP server.
 */

/** Environment variable holding the history capacity. */
export const CAPACITY_ENV = 'SWITCHBOARD_HISTORY_CAPACITY';

/**
 * Read the history capacity from the environment.
 * Returns undefined when unset so the core default applies.
 * @throws Error unless the variable is blank or a positive decimal integer.
 */
export function readCapacity(env: Record<string, string | undefined>): number | undefined {
  const raw = env[CAPACITY_ENV];
  if (raw === undefined || raw.trim() === '') {
    return undefined;
  }
  const capacity = /^\d+$/.test(raw) ? Number(raw) : 0;
  if (capacity < 1 || !Number.isSafeInteger(capacity)) {
    throw new Error(`Invalid ${CAPACITY_ENV}: "${raw}"`);
  }
  return capacity;
}
