import type { BitBuffer } from '../BitBuffer';
import { ValueOutOfRangeError } from '../errors';
import {
  assertSignalFits,
  floatToRaw,
  floatWidth,
  motorolaOffset,
  rawBounds,
  rawToFloat,
  signExtend,
  toUnsigned,
} from '../helpers';
import type { Signal } from '../model/types';
import type { Codec } from './Codec';
import type { DecodedSignal } from './DecodedSignal';

/** A physical value, or a value-table label. */
export type SignalValue = number | string;

export interface SignalCodecOptions {
  /**
   * Apply `factor`/`offset`. When false, numbers passed to and returned from
   * the codec are raw values. Default true.
   */
  scaling?: boolean;
}

const FLOAT32_MAX = 3.4028234663852886e38;

/**
 * Codec for one signal of a message.
 *
 * Little-endian (Intel) signals: `startBit` is the LSB, value bits ascend
 * through the payload. Big-endian (Motorola) signals: `startBit` is the MSB
 * in DBC numbering, value bits descend toward bit 0 of each byte and continue
 * at bit 7 of the next byte.
 */
export class SignalCodec implements Codec<SignalValue, DecodedSignal> {
  readonly signal: Signal;
  private readonly scaling: boolean;
  private readonly labels: Map<string, number>;

  constructor(signal: Signal, options: SignalCodecOptions = {}) {
    this.signal = signal;
    this.scaling = options.scaling ?? true;
    this.labels = new Map();
    for (const [raw, label] of signal.valueTable ?? []) {
      this.labels.set(label, raw);
    }
  }

  /**
   * Read the signal's bits as an unsigned integer. The buffer cursor is left
   * where it was.
   *
   * @throws BitRangeExceededError if the span does not fit in the payload
   */
  extract(buffer: BitBuffer): bigint {
    const { signal } = this;
    assertSignalFits(signal, buffer.bitLength);
    if (signal.byteOrder === 'little') {
      return buffer.readLsbBits(signal.startBit, signal.bitLength);
    }
    const saved = buffer.offset;
    buffer.seek(motorolaOffset(signal.startBit));
    const raw = buffer.readBigBits(signal.bitLength);
    buffer.seek(saved);
    return raw;
  }

  /**
   * Write an unsigned bit pattern into the signal's span, leaving all other
   * bits untouched.
   *
   * @throws BitRangeExceededError if the span does not fit in the payload
   */
  inject(buffer: BitBuffer, raw: bigint): void {
    const { signal } = this;
    assertSignalFits(signal, buffer.bitLength);
    const pattern = toUnsigned(raw, signal.bitLength);
    if (signal.byteOrder === 'little') {
      buffer.writeLsbBits(signal.startBit, signal.bitLength, pattern);
      return;
    }
    const saved = buffer.offset;
    buffer.seek(motorolaOffset(signal.startBit));
    buffer.writeBigBits(pattern, signal.bitLength);
    buffer.seek(saved);
  }

  /** Extract and sign-extend (signed signals) the raw value. */
  decodeRaw(buffer: BitBuffer): bigint {
    const raw = this.extract(buffer);
    return this.signal.valueKind === 'signed' ? signExtend(raw, this.signal.bitLength) : raw;
  }

  /** Convert a raw value (as returned by {@link decodeRaw}) to its physical value. */
  toPhysical(raw: bigint): number {
    const width = floatWidth(this.signal.valueKind);
    if (width !== undefined) {
      return rawToFloat(raw, width);
    }
    if (!this.scaling) {
      return Number(raw);
    }
    return Number(raw) * this.signal.factor + this.signal.offset;
  }

  decode(buffer: BitBuffer): number {
    return this.toPhysical(this.decodeRaw(buffer));
  }

  decodeWithMetadata(buffer: BitBuffer): DecodedSignal {
    const { signal } = this;
    const raw = this.decodeRaw(buffer);
    const decoded: DecodedSignal = {
      name: signal.name,
      raw,
      value: this.toPhysical(raw),
      unit: signal.unit,
      signal,
    };
    const label = floatWidth(signal.valueKind) === undefined ? signal.valueTable?.get(Number(raw)) : undefined;
    if (label !== undefined) {
      decoded.label = label;
    }
    return decoded;
  }

  /**
   * Convert a physical value (or a value-table label) to the raw value to
   * inject: inverse scaling and rounding for integer kinds, IEEE-754 bit
   * pattern for float kinds.
   *
   * @throws ValueOutOfRangeError if the value is outside `[minimum, maximum]`,
   *   does not fit in `bitLength` bits, or names an unknown label
   */
  toRaw(value: SignalValue): bigint {
    const { signal } = this;

    if (typeof value === 'string') {
      const raw = this.labels.get(value);
      if (raw === undefined) {
        throw new ValueOutOfRangeError(`Signal '${signal.name}' has no value-table entry '${value}'`);
      }
      return this.checkRaw(BigInt(raw), value);
    }

    const physical = this.scaling || floatWidth(signal.valueKind) !== undefined
      ? value
      : value * signal.factor + signal.offset;
    this.checkPhysical(physical, value);

    const width = floatWidth(signal.valueKind);
    if (width !== undefined) {
      if (width === 32 && Number.isFinite(value) && Math.abs(value) > FLOAT32_MAX) {
        throw new ValueOutOfRangeError(`Signal '${signal.name}' value ${value} does not fit in a 32-bit float`);
      }
      return floatToRaw(value, width);
    }

    if (!this.scaling && !Number.isInteger(value)) {
      throw new ValueOutOfRangeError(`Signal '${signal.name}' raw value ${value} is not an integer`);
    }
    const scaled = this.scaling ? Math.round((value - signal.offset) / signal.factor) : value;
    if (!Number.isFinite(scaled)) {
      throw new ValueOutOfRangeError(`Signal '${signal.name}' value ${value} has no raw representation`);
    }
    return this.checkRaw(BigInt(scaled), value);
  }

  /**
   * Accept a raw value that is either in the signal's own range or an
   * unsigned bit pattern of its width (start values are stored that way).
   * Signed signals get the pattern back in two's complement.
   */
  fromStoredRaw(raw: number): bigint {
    const { signal } = this;
    if (!Number.isInteger(raw)) {
      throw new ValueOutOfRangeError(`Signal '${signal.name}' raw value ${raw} is not an integer`);
    }
    const big = BigInt(raw);
    const { min } = rawBounds(signal.valueKind, signal.bitLength);
    const patternMax = (1n << BigInt(signal.bitLength)) - 1n;
    if (big < min || big > patternMax) {
      throw new ValueOutOfRangeError(
        `Signal '${signal.name}' raw value ${raw} does not fit in ${signal.bitLength} bits`,
      );
    }
    return signal.valueKind === 'signed' ? signExtend(big, signal.bitLength) : big;
  }

  /** Convert and inject. The payload is not touched when conversion fails. */
  encode(buffer: BitBuffer, value: SignalValue): void {
    const raw = this.toRaw(value);
    this.inject(buffer, raw);
  }

  private checkPhysical(physical: number, given: number): void {
    const { signal } = this;
    if (Number.isNaN(physical)) {
      if (floatWidth(signal.valueKind) === undefined) {
        throw new ValueOutOfRangeError(`Signal '${signal.name}' value NaN has no raw representation`);
      }
      return;
    }
    if (signal.minimum !== undefined && physical < signal.minimum) {
      throw new ValueOutOfRangeError(
        `Expected signal '${signal.name}' value greater than or equal to ${signal.minimum}, but got ${given}`,
      );
    }
    if (signal.maximum !== undefined && physical > signal.maximum) {
      throw new ValueOutOfRangeError(
        `Expected signal '${signal.name}' value less than or equal to ${signal.maximum}, but got ${given}`,
      );
    }
  }

  private checkRaw(raw: bigint, given: SignalValue): bigint {
    const { signal } = this;
    const { min, max } = rawBounds(signal.valueKind, signal.bitLength);
    if (raw < min || raw > max) {
      throw new ValueOutOfRangeError(
        `Signal '${signal.name}' value ${String(given)} (raw ${raw}) does not fit in ${signal.bitLength} ` +
        `${signal.valueKind} bits [${min}, ${max}]`,
      );
    }
    return raw;
  }
}
