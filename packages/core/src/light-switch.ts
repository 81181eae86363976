/**
 * @module light-switch
 * Binary on/off device, the target of the built-in actions.
 */

import type { BinaryDevice, EventBus } from '@switchboard/types';

/** Options for {@link LightSwitch}. */
export interface LightSwitchOptions {
  /** Name used in notifications (default "light"). */
  label?: string;
  /** Initial state (default off). */
  initial?: boolean;
  /** Bus that receives a `device:changed` event for every applied effect. */
  bus?: EventBus;
}

/**
 * A device holding a single boolean.
 *
 * Every `applyOn`/`applyOff` call emits `device:changed`, including calls
 * that leave the value as it was.
 */
export class LightSwitch implements BinaryDevice {
  readonly label: string;
  private state: boolean;
  private readonly bus: EventBus | null;

  constructor(options: LightSwitchOptions = {}) {
    this.label = options.label ?? 'light';
    this.state = options.initial ?? false;
    this.bus = options.bus ?? null;
  }

  get isOn(): boolean {
    return this.state;
  }

  applyOn(): void {
    this.set(true);
  }

  applyOff(): void {
    this.set(false);
  }

  private set(value: boolean): void {
    this.state = value;
    this.bus?.emit('device:changed', { label: this.label, isOn: value });
  }
}
