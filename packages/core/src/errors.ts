/**
 * @module errors
 * Recoverable errors raised by {@link ActionDispatcher}.
 */

import type { DispatchErrorCode, DispatchOperation } from '@switchboard/types';

/** Base class for dispatcher errors. Carries a stable code and the failing operation. */
export class DispatchError extends Error {
  readonly code: DispatchErrorCode;
  readonly op: DispatchOperation;

  constructor(code: DispatchErrorCode, op: DispatchOperation, message: string) {
    super(message);
    this.name = 'DispatchError';
    this.code = code;
    this.op = op;
  }
}

/** `dispatch()` was called before any action was selected. */
export class NoActionSelectedError extends DispatchError {
  constructor() {
    super('NO_ACTION_SELECTED', 'dispatch', 'No action selected');
    this.name = 'NoActionSelectedError';
  }
}

/** `undoLast()` was called with an empty history. */
export class EmptyHistoryError extends DispatchError {
  constructor() {
    super('EMPTY_HISTORY', 'undoLast', 'Nothing to undo');
    this.name = 'EmptyHistoryError';
  }
}

export function isDispatchError(value: unknown): value is DispatchError {
  return value instanceof DispatchError;
}
