import { BitRangeExceededError } from './errors';
import type { Signal, SignalValueKind } from './model/types';

/**
 * MSB-first cursor offset of a Motorola start bit.
 *
 * DBC numbers bits LSB-first within each byte (bit 7 of byte 0 is start bit 7,
 * bit 0 of byte 1 is start bit 8), so the MSB of a big-endian signal at start
 * bit `s` sits at cursor offset `8 * (s / 8) + 7 - (s % 8)`.
 */
export function motorolaOffset(startBit: number): number {
  return 8 * (startBit >> 3) + (7 - (startBit & 7));
}

/** Inverse of {@link motorolaOffset}. */
export function motorolaStartBit(offset: number): number {
  return 8 * (offset >> 3) + (7 - (offset & 7));
}

/**
 * Whether the signal's span fits in `payloadBits`.
 * Little-endian spans run from `startBit` upward, big-endian spans run from
 * the Motorola offset of `startBit` forward in cursor order.
 */
export function signalFits(signal: Signal, payloadBits: number): boolean {
  const first = signal.byteOrder === 'big' ? motorolaOffset(signal.startBit) : signal.startBit;
  return signal.startBit >= 0 && first + signal.bitLength <= payloadBits;
}

/** Throw {@link BitRangeExceededError} unless {@link signalFits}. */
export function assertSignalFits(signal: Signal, payloadBits: number): void {
  if (!signalFits(signal, payloadBits)) {
    throw new BitRangeExceededError(
      `Signal '${signal.name}' (start ${signal.startBit}, length ${signal.bitLength}, ` +
      `${signal.byteOrder} endian) exceeds payload of ${payloadBits} bits`,
    );
  }
}

/**
 * LSB-first indices of every payload bit the signal occupies, in increasing
 * significance of the signal value.
 */
export function signalBitIndices(signal: Signal): number[] {
  const indices: number[] = [];
  if (signal.byteOrder === 'little') {
    for (let i = 0; i < signal.bitLength; i++) {
      indices.push(signal.startBit + i);
    }
    return indices;
  }
  const msb = motorolaOffset(signal.startBit);
  for (let i = signal.bitLength - 1; i >= 0; i--) {
    indices.push(motorolaStartBit(msb + i));
  }
  return indices;
}

/** Interpret the low `bits` bits of `raw` as two's complement. */
export function signExtend(raw: bigint, bits: number): bigint {
  const signBit = 1n << BigInt(bits - 1);
  const masked = raw & ((1n << BigInt(bits)) - 1n);
  return (masked & signBit) !== 0n ? masked - (1n << BigInt(bits)) : masked;
}

/** Two's complement bit pattern of `value` truncated to `bits` bits. */
export function toUnsigned(value: bigint, bits: number): bigint {
  return BigInt.asUintN(bits, value);
}

/** Smallest and largest raw value a signal of this kind and width can hold. */
export function rawBounds(valueKind: SignalValueKind, bitLength: number): { min: bigint; max: bigint } {
  if (valueKind === 'signed') {
    return {
      min: -(1n << BigInt(bitLength - 1)),
      max: (1n << BigInt(bitLength - 1)) - 1n,
    };
  }
  return { min: 0n, max: (1n << BigInt(bitLength)) - 1n };
}

/** Reinterpret a 32- or 64-bit pattern as an IEEE-754 number. */
export function rawToFloat(raw: bigint, bits: 32 | 64): number {
  const view = new DataView(new ArrayBuffer(8));
  if (bits === 32) {
    view.setUint32(0, Number(BigInt.asUintN(32, raw)));
    return view.getFloat32(0);
  }
  view.setBigUint64(0, BigInt.asUintN(64, raw));
  return view.getFloat64(0);
}

/** IEEE-754 bit pattern of `value` at 32 or 64 bits. */
export function floatToRaw(value: number, bits: 32 | 64): bigint {
  const view = new DataView(new ArrayBuffer(8));
  if (bits === 32) {
    view.setFloat32(0, value);
    return BigInt(view.getUint32(0));
  }
  view.setFloat64(0, value);
  return view.getBigUint64(0);
}

/** Width the IEEE kinds require, or undefined for integer kinds. */
export function floatWidth(valueKind: SignalValueKind): 32 | 64 | undefined {
  if (valueKind === 'float') return 32;
  if (valueKind === 'double') return 64;
  return undefined;
}
