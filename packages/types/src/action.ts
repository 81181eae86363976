/**
 * @module action
 * Action pattern types for single-step undo.
 * Each unit of work is an Action that can be applied to a target and reverted.
 */

/**
 * An immutable, reversible unit of work.
 *
 * @typeParam T - The target the action mutates.
 */
export interface Action<T> {
  /** Display name shown in history listings. */
  readonly name: string;
  /** Apply the forward effect. */
  execute(target: T): void;
  /** Apply the exact inverse of {@link Action.execute}. */
  undo(target: T): void;
}

/** Executes actions against a target and keeps a bounded undo history. */
export interface Dispatcher<T> {
  /** The target every action is applied to. */
  readonly target: T;
  /** Maximum number of actions kept in history. */
  readonly capacity: number;
  /** The action `dispatch()` will run, or null when none is selected. */
  readonly currentAction: Action<T> | null;
  /** Whether there is an action that can be undone. */
  readonly canUndo: boolean;
  /** Name of the next action to undo, or null. */
  readonly undoName: string | null;
  /** Names of the recorded actions, oldest first. */
  readonly entries: readonly string[];

  /** Select the action for the next dispatch. Does not touch the target. */
  setAction(action: Action<T>): void;
  /** Run the current action and record it. */
  dispatch(): void;
  /** Remove the newest recorded action and revert it. */
  undoLast(): Action<T>;
  /** Drop all recorded actions without reverting them. */
  clearHistory(): void;
}
