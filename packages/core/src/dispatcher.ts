/**
 * @module dispatcher
 * ActionDispatcher: runs the selected action against its target and keeps a
 * bounded history for single-step undo.
 *
 * @see {@link @switchboard/types#Dispatcher} for the interface contract
 */

import type { Action, Dispatcher, EventBus } from '@switchboard/types';
import { BoundedHistory } from './bounded-history';
import { EmptyHistoryError, NoActionSelectedError } from './errors';

/** Options for {@link ActionDispatcher}. */
export interface ActionDispatcherOptions {
  /** History capacity (default {@link DEFAULT_HISTORY_CAPACITY}). */
  capacity?: number;
  /** Bus that receives selection and history events. */
  bus?: EventBus;
}

/**
 * Concrete implementation of {@link Dispatcher}.
 *
 * Two phases only: idle (no current action) and pending (an action is
 * selected). The selected action stays selected after dispatch, so it can be
 * dispatched again. A failing `execute` records nothing.
 *
 * @typeParam T - Target type shared by every dispatched action.
 */
export class ActionDispatcher<T> implements Dispatcher<T> {
  readonly target: T;

  private current: Action<T> | null = null;
  private readonly history: BoundedHistory<Action<T>>;
  private readonly bus: EventBus | null;

  /**
   * @param target  - Subject every action is applied to.
   * @param options - Capacity and event bus.
   * @throws RangeError if `options.capacity` is below 1.
   */
  constructor(target: T, options: ActionDispatcherOptions = {}) {
    this.target = target;
    this.history = new BoundedHistory<Action<T>>(options.capacity);
    this.bus = options.bus ?? null;
  }

  /** @inheritdoc */
  get capacity(): number {
    return this.history.capacity;
  }

  /** @inheritdoc */
  get currentAction(): Action<T> | null {
    return this.current;
  }

  /** @inheritdoc */
  get canUndo(): boolean {
    return !this.history.isEmpty;
  }

  /** @inheritdoc */
  get undoName(): string | null {
    return this.history.peek()?.name ?? null;
  }

  /** @inheritdoc */
  get entries(): string[] {
    return this.history.toArray().map((action) => action.name);
  }

  /** @inheritdoc */
  setAction(action: Action<T>): void {
    this.current = action;
    this.bus?.emit('action:selected', { name: action.name });
  }

  /**
   * Run the current action, then append it to history.
   * @throws NoActionSelectedError if no action is selected.
   */
  dispatch(): void {
    const action = this.current;
    if (!action) {
      throw new NoActionSelectedError();
    }

    action.execute(this.target);

    const evicted = this.history.push(action);
    if (evicted) {
      this.bus?.emit('history:evicted', { name: evicted.name });
    }
    this.bus?.emit('history:pushed', { name: action.name, size: this.history.size });
  }

  /**
   * Remove the newest entry and revert it.
   * @returns The reverted action.
   * @throws EmptyHistoryError if there is nothing to undo.
   */
  undoLast(): Action<T> {
    const action = this.history.pop();
    if (!action) {
      throw new EmptyHistoryError();
    }

    action.undo(this.target);
    this.bus?.emit('history:undone', { name: action.name, size: this.history.size });
    return action;
  }

  /** @inheritdoc */
  clearHistory(): void {
    this.history.clear();
    this.bus?.emit('history:cleared');
  }
}
