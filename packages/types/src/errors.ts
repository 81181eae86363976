/**
 * @module errors
 * Error codes reported by a {@link Dispatcher}.
 */

/** `dispatch()` was called before any action was selected. */
export type NoActionSelectedCode = 'NO_ACTION_SELECTED';

/** `undoLast()` was called with nothing to revert. */
export type EmptyHistoryCode = 'EMPTY_HISTORY';

export type DispatchErrorCode = NoActionSelectedCode | EmptyHistoryCode;

/** Dispatcher operation an error was raised from. */
export type DispatchOperation = 'dispatch' | 'undoLast';
