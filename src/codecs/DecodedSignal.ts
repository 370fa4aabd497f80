import type { Message, Signal } from '../model/types';

/** A decoded signal with both numeric and textual representations. */
export interface DecodedSignal {
  name: string;
  /**
   * Raw value: sign-extended for signed signals, the IEEE-754 bit pattern
   * for float and double signals.
   */
  raw: bigint;
  /** Physical value (`raw * factor + offset` for integer kinds). */
  value: number;
  /** Value-table label for `raw`, if the signal has one. */
  label?: string;
  unit: string;
  signal: Signal;
}

/** A decoded message after the multiplexing filter. */
export interface DecodedMessage {
  message: Message;
  /** Raw multiplexor value, when the message is multiplexed. */
  multiplexorValue?: number;
  /** Present signals, in definition order. */
  signals: Record<string, DecodedSignal>;
}

/** Reduce a decoded message to `name → physical value`. */
export function physicalValues(decoded: DecodedMessage): Record<string, number> {
  const result: Record<string, number> = {};
  for (const [name, signal] of Object.entries(decoded.signals)) {
    result[name] = signal.value;
  }
  return result;
}

/** Reduce a decoded message to `name → label`, falling back to the physical value. */
export function labelledValues(decoded: DecodedMessage): Record<string, number | string> {
  const result: Record<string, number | string> = {};
  for (const [name, signal] of Object.entries(decoded.signals)) {
    result[name] = signal.label ?? signal.value;
  }
  return result;
}
