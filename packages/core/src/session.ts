/**
 * @module session
 * Wires a light switch, an event bus and a dispatcher together.
 * Both the CLI and the MCP server run on one session per process.
 */

import type { BinaryDevice, EventBus } from '@switchboard/types';
import { ActionDispatcher } from './dispatcher';
import { EventBusImpl } from './event-bus';
import { LightSwitch } from './light-switch';

export interface SessionOptions {
  /** History capacity (default 10). */
  capacity?: number;
  /** Device label (default "light"). */
  label?: string;
  /** Initial device state (default off). */
  initial?: boolean;
  /** Existing bus to publish on; a new one is created otherwise. */
  bus?: EventBus;
}

export interface Session {
  bus: EventBus;
  device: LightSwitch;
  dispatcher: ActionDispatcher<BinaryDevice>;
}

/** JSON-serializable view of a session. */
export interface SessionSnapshot {
  isOn: boolean;
  current: string | null;
  history: string[];
  capacity: number;
}

export function createSession(options: SessionOptions = {}): Session {
  const bus = options.bus ?? new EventBusImpl();
  const device = new LightSwitch({ label: options.label, initial: options.initial, bus });
  const dispatcher = new ActionDispatcher<BinaryDevice>(device, { capacity: options.capacity, bus });
  return { bus, device, dispatcher };
}

export function snapshotSession(session: Session): SessionSnapshot {
  const { device, dispatcher } = session;
  return {
    isOn: device.isOn,
    current: dispatcher.currentAction?.name ?? null,
    history: dispatcher.entries,
    capacity: dispatcher.capacity,
  };
}
