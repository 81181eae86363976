/**
 * @switchboard/types
 *
 * Shared type definitions for Switchboard.
 * This package contains zero runtime code, only the interfaces and types
 * that serve as the contract between packages.
 *
 * @packageDocumentation
 */

// Actions and dispatchers
export type { Action, Dispatcher } from './action';

// Targets
export type { BinaryDevice } from './device';

// Errors
export type {
  DispatchErrorCode,
  DispatchOperation,
  EmptyHistoryCode,
  NoActionSelectedCode,
} from './errors';

// Events
export type { EventArgs, EventBus, EventCallback, EventMap } from './events';
