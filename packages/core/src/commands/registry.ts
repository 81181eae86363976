/**
 * @module commands/registry
 * Maps action keys typed by users ("on", "off") to the built-in actions.
 *
 * Used by the CLI and the MCP server so they need no direct imports of the
 * action classes.
 */

import type { Action, BinaryDevice } from '@switchboard/types';
import { TURN_OFF } from './turn-off';
import { TURN_ON } from './turn-on';

/** Canonical keys, in the order they are listed to users. */
export const ACTION_KEYS = ['on', 'off'] as const;

export type ActionKey = (typeof ACTION_KEYS)[number];

// Keys are matched lower-cased; display names are accepted too.
const ACTION_REGISTRY = new Map<string, Action<BinaryDevice>>([
  ['on', TURN_ON],
  ['off', TURN_OFF],
  ['turnon', TURN_ON],
  ['turnoff', TURN_OFF],
]);

/** Resolve a key to its action, or undefined when the key is unknown. */
export function resolveAction(key: string): Action<BinaryDevice> | undefined {
  return ACTION_REGISTRY.get(key.trim().toLowerCase());
}
