import { describe, it, expect, vi } from 'vitest';
import type { Action, BinaryDevice } from '@switchboard/types';
import { ActionDispatcher } from './dispatcher';
import { EmptyHistoryError, NoActionSelectedError } from './errors';
import { EventBusImpl } from './event-bus';
import { LightSwitch } from './light-switch';
import { TURN_OFF, TURN_ON } from './commands';

/** Create a mock action with tracked execute/undo calls. */
function mockAction(name = 'test'): Action<BinaryDevice> & {
  execute: ReturnType<typeof vi.fn>;
  undo: ReturnType<typeof vi.fn>;
} {
  return {
    name,
    execute: vi.fn(),
    undo: vi.fn(),
  };
}

function setup(capacity?: number) {
  const light = new LightSwitch();
  const dispatcher = new ActionDispatcher<BinaryDevice>(light, { capacity });
  return { light, dispatcher };
}

describe('ActionDispatcher', () => {
  it('starts idle with empty history', () => {
    const { dispatcher } = setup();
    expect(dispatcher.currentAction).toBeNull();
    expect(dispatcher.canUndo).toBe(false);
    expect(dispatcher.undoName).toBeNull();
    expect(dispatcher.entries).toEqual([]);
    expect(dispatcher.capacity).toBe(10);
  });

  it('accepts a custom capacity', () => {
    expect(setup(4).dispatcher.capacity).toBe(4);
  });

  it('throws on capacity < 1', () => {
    expect(() => setup(0)).toThrow(RangeError);
  });

  describe('setAction', () => {
    it('stores the action without touching the target', () => {
      const { light, dispatcher } = setup();
      dispatcher.setAction(TURN_ON);
      expect(dispatcher.currentAction).toBe(TURN_ON);
      expect(light.isOn).toBe(false);
      expect(dispatcher.entries).toEqual([]);
    });

    it('replaces the previous selection', () => {
      const { dispatcher } = setup();
      dispatcher.setAction(TURN_ON);
      dispatcher.setAction(TURN_OFF);
      expect(dispatcher.currentAction).toBe(TURN_OFF);
    });
  });

  describe('dispatch', () => {
    it('throws NoActionSelectedError and changes nothing when idle', () => {
      const { light, dispatcher } = setup();
      expect(() => dispatcher.dispatch()).toThrow(NoActionSelectedError);
      expect(light.isOn).toBe(false);
      expect(dispatcher.entries).toEqual([]);
    });

    it('executes the current action against the target', () => {
      const { light, dispatcher } = setup();
      const action = mockAction();
      dispatcher.setAction(action);
      dispatcher.dispatch();
      expect(action.execute).toHaveBeenCalledOnce();
      expect(action.execute).toHaveBeenCalledWith(light);
    });

    it('keeps the action selected so it can be dispatched again', () => {
      const { dispatcher } = setup();
      dispatcher.setAction(TURN_ON);
      dispatcher.dispatch();
      dispatcher.dispatch();
      expect(dispatcher.currentAction).toBe(TURN_ON);
      expect(dispatcher.entries).toEqual(['TurnOn', 'TurnOn']);
    });

    it('records nothing when execute throws', () => {
      const { dispatcher } = setup();
      const action = mockAction('broken');
      action.execute.mockImplementation(() => {
        throw new Error('device jammed');
      });
      dispatcher.setAction(action);

      expect(() => dispatcher.dispatch()).toThrow('device jammed');
      expect(dispatcher.entries).toEqual([]);
    });

    it('history length equals the number of dispatches up to capacity', () => {
      for (let n = 0; n <= 10; n++) {
        const { dispatcher } = setup();
        for (let i = 0; i < n; i++) {
          dispatcher.setAction(i % 2 === 0 ? TURN_ON : TURN_OFF);
          dispatcher.dispatch();
        }
        expect(dispatcher.entries).toHaveLength(n);
      }
    });

    it('stays at capacity and evicts the oldest entries first', () => {
      const { dispatcher } = setup();
      for (let i = 0; i < 13; i++) {
        dispatcher.setAction(mockAction(`a${i}`));
        dispatcher.dispatch();
      }
      expect(dispatcher.entries).toEqual([
        'a3', 'a4', 'a5', 'a6', 'a7', 'a8', 'a9', 'a10', 'a11', 'a12',
      ]);
    });

    it('never reverts an evicted action', () => {
      const { dispatcher } = setup(2);
      const first = mockAction('first');
      dispatcher.setAction(first);
      dispatcher.dispatch();
      dispatcher.setAction(mockAction('second'));
      dispatcher.dispatch();
      dispatcher.setAction(mockAction('third'));
      dispatcher.dispatch();

      dispatcher.undoLast();
      dispatcher.undoLast();
      expect(dispatcher.canUndo).toBe(false);
      expect(first.undo).not.toHaveBeenCalled();
    });
  });

  describe('undoLast', () => {
    it('throws EmptyHistoryError and leaves the target unchanged', () => {
      const light = new LightSwitch({ initial: true });
      const dispatcher = new ActionDispatcher<BinaryDevice>(light);
      expect(() => dispatcher.undoLast()).toThrow(EmptyHistoryError);
      expect(light.isOn).toBe(true);
    });

    it('reverts the newest entry and returns it', () => {
      const { light, dispatcher } = setup();
      const action = mockAction('paint');
      dispatcher.setAction(action);
      dispatcher.dispatch();

      expect(dispatcher.undoLast()).toBe(action);
      expect(action.undo).toHaveBeenCalledWith(light);
      expect(dispatcher.entries).toEqual([]);
    });

    it('undoes in LIFO order', () => {
      const { dispatcher } = setup();
      const calls: string[] = [];
      const a: Action<BinaryDevice> = { name: 'A', execute: vi.fn(), undo: () => { calls.push('undo-A'); } };
      const b: Action<BinaryDevice> = { name: 'B', execute: vi.fn(), undo: () => { calls.push('undo-B'); } };
      dispatcher.setAction(a);
      dispatcher.dispatch();
      dispatcher.setAction(b);
      dispatcher.dispatch();

      dispatcher.undoLast();
      dispatcher.undoLast();
      expect(calls).toEqual(['undo-B', 'undo-A']);
    });

    it.each([
      { action: TURN_ON, initial: false },
      { action: TURN_ON, initial: true },
      { action: TURN_OFF, initial: false },
      { action: TURN_OFF, initial: true },
    ])('restores the state before $action.name (initial $initial)', ({ action, initial }) => {
      const light = new LightSwitch({ initial });
      const dispatcher = new ActionDispatcher<BinaryDevice>(light);
      dispatcher.setAction(action);
      dispatcher.dispatch();
      dispatcher.undoLast();
      expect(light.isOn).toBe(initial);
    });
  });

  it('exposes the next undo name', () => {
    const { dispatcher } = setup();
    dispatcher.setAction(TURN_ON);
    dispatcher.dispatch();
    dispatcher.setAction(TURN_OFF);
    dispatcher.dispatch();
    expect(dispatcher.undoName).toBe('TurnOff');
    dispatcher.undoLast();
    expect(dispatcher.undoName).toBe('TurnOn');
  });

  it('clearHistory drops entries without reverting them', () => {
    const { light, dispatcher } = setup();
    dispatcher.setAction(TURN_ON);
    dispatcher.dispatch();
    dispatcher.clearHistory();
    expect(dispatcher.entries).toEqual([]);
    expect(light.isOn).toBe(true);
    expect(() => dispatcher.undoLast()).toThrow(EmptyHistoryError);
  });

  it('runs the on/off/undo/undo scenario', () => {
    const { light, dispatcher } = setup();

    dispatcher.setAction(TURN_ON);
    dispatcher.dispatch();
    expect(light.isOn).toBe(true);
    expect(dispatcher.entries).toEqual(['TurnOn']);

    dispatcher.setAction(TURN_OFF);
    dispatcher.dispatch();
    expect(light.isOn).toBe(false);
    expect(dispatcher.entries).toEqual(['TurnOn', 'TurnOff']);

    dispatcher.undoLast();
    expect(light.isOn).toBe(true);
    expect(dispatcher.entries).toEqual(['TurnOn']);

    dispatcher.undoLast();
    expect(light.isOn).toBe(false);
    expect(dispatcher.entries).toEqual([]);
  });

  describe('events', () => {
    it('emits selection, eviction and push events in order', () => {
      const bus = new EventBusImpl();
      const dispatcher = new ActionDispatcher<BinaryDevice>(new LightSwitch(), { capacity: 1, bus });
      const events: string[] = [];
      bus.on('action:selected', ({ name }) => events.push(`selected:${name}`));
      bus.on('history:evicted', ({ name }) => events.push(`evicted:${name}`));
      bus.on('history:pushed', ({ name, size }) => events.push(`pushed:${name}:${size}`));

      dispatcher.setAction(TURN_ON);
      dispatcher.dispatch();
      dispatcher.setAction(TURN_OFF);
      dispatcher.dispatch();

      expect(events).toEqual([
        'selected:TurnOn',
        'pushed:TurnOn:1',
        'selected:TurnOff',
        'evicted:TurnOn',
        'pushed:TurnOff:1',
      ]);
    });

    it('emits history:undone and history:cleared', () => {
      const bus = new EventBusImpl();
      const dispatcher = new ActionDispatcher<BinaryDevice>(new LightSwitch(), { bus });
      const undone = vi.fn();
      const cleared = vi.fn();
      bus.on('history:undone', undone);
      bus.on('history:cleared', cleared);

      dispatcher.setAction(TURN_ON);
      dispatcher.dispatch();
      dispatcher.undoLast();
      dispatcher.clearHistory();

      expect(undone).toHaveBeenCalledWith({ name: 'TurnOn', size: 0 });
      expect(cleared).toHaveBeenCalledOnce();
    });
  });
});
