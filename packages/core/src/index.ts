/**
 * @switchboard/core
 *
 * Undoable actions, the light switch they operate on, and the dispatcher
 * that keeps their history.
 *
 * @packageDocumentation
 */

// Target
export { LightSwitch } from './light-switch';
export type { LightSwitchOptions } from './light-switch';

// Built-in actions and registry
export {
  TurnOnAction,
  TurnOffAction,
  TURN_ON,
  TURN_OFF,
  ACTION_KEYS,
  resolveAction,
} from './commands';
export type { ActionKey } from './commands';

// History and dispatcher
export { BoundedHistory, DEFAULT_HISTORY_CAPACITY } from './bounded-history';
export { ActionDispatcher } from './dispatcher';
export type { ActionDispatcherOptions } from './dispatcher';

// Errors
export {
  DispatchError,
  NoActionSelectedError,
  EmptyHistoryError,
  isDispatchError,
} from './errors';

// Event bus and logging
export { EventBusImpl } from './event-bus';
export { attachConsoleLogger } from './console-logger';
export type { ConsoleLoggerOptions } from './console-logger';

// Sessions
export { createSession, snapshotSession } from './session';
export type { Session, SessionOptions, SessionSnapshot } from './session';
