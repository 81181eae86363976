/**
 * @module commands
 * Re-exports the built-in actions and their registry.
 */

export { TurnOnAction, TURN_ON } from './turn-on';
export { TurnOffAction, TURN_OFF } from './turn-off';
export { ACTION_KEYS, resolveAction } from './registry';
export type { ActionKey } from './registry';
