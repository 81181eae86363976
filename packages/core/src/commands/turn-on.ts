/**
 * @module commands/turn-on
 * Switches a binary device on; undo switches it back off.
 */

import type { Action, BinaryDevice } from '@switchboard/types';

export class TurnOnAction implements Action<BinaryDevice> {
  readonly name = 'TurnOn';

  constructor() {
    Object.freeze(this);
  }

  execute(device: BinaryDevice): void {
    device.applyOn();
  }

  undo(device: BinaryDevice): void {
    device.applyOff();
  }
}

/** Shared instance; the action holds no state. */
export const TURN_ON: Action<BinaryDevice> = new TurnOnAction();
