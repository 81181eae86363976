/**
 * @module device
 * The mutable subject actions operate on.
 */

/** A device with exactly two states. */
export interface BinaryDevice {
  /** Name used in notifications and log lines. */
  readonly label: string;
  /** Current state. */
  readonly isOn: boolean;
  /** Switch the device on. */
  applyOn(): void;
  /** Switch the device off. */
  applyOff(): void;
}
