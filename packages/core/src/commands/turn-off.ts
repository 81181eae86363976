/**
 * @module commands/turn-off
 * Switches a binary device off; undo switches it back on.
 */

import type { Action, BinaryDevice } from '@switchboard/types';

export class TurnOffAction implements Action<BinaryDevice> {
  readonly name = 'TurnOff';

  constructor() {
    Object.freeze(this);
  }

  execute(device: BinaryDevice): void {
    device.applyOff();
  }

  undo(device: BinaryDevice): void {
    device.applyOn();
  }
}

/** Shared instance; the action holds no state. */
export const TURN_OFF: Action<BinaryDevice> = new TurnOffAction();
