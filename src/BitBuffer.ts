import { BitRangeExceededError } from './errors';

/**
 * Bit-level view over a fixed-size CAN frame payload.
 *
 * Two addressing schemes are supported:
 * - a cursor that walks bits MSB-first through the bytes (bit 7 of byte 0 is
 *   offset 0, bit 0 of byte 0 is offset 7, bit 7 of byte 1 is offset 8, ...),
 *   which is how big-endian (Motorola) signals are laid out;
 * - absolute LSB-first indices (bit 0 of byte 0 is index 0, bit 7 of byte 0 is
 *   index 7, bit 0 of byte 1 is index 8, ...), which is how little-endian
 *   (Intel) signals are laid out and how DBC numbers start bits.
 *
 * The payload never grows: reading or writing past the end throws
 * {@link BitRangeExceededError}.
 */
export class BitBuffer {
  private readonly _data: Uint8Array;
  private _offset: number;

  private constructor(data: Uint8Array) {
    this._data = data;
    this._offset = 0;
  }

  /** Allocate a zero-filled payload of `byteLength` bytes. */
  static alloc(byteLength: number): BitBuffer {
    if (!Number.isInteger(byteLength) || byteLength < 0) {
      throw new RangeError(`BitBuffer: byteLength must be a non-negative integer, got ${byteLength}`);
    }
    return new BitBuffer(new Uint8Array(byteLength));
  }

  /** Wrap a copy of existing bytes. */
  static from(data: ArrayLike<number>): BitBuffer {
    return new BitBuffer(Uint8Array.from(data));
  }

  /** Parse a hex string ("1234", "12 34" or "0x1234") into a payload. */
  static fromHex(hex: string): BitBuffer {
    return new BitBuffer(hexToBytes(hex));
  }

  /** Total number of bits in the payload. */
  get bitLength(): number {
    return this._data.length * 8;
  }

  get byteLength(): number {
    return this._data.length;
  }

  /** Current MSB-first cursor position in bits. */
  get offset(): number {
    return this._offset;
  }

  /** Bits remaining from cursor to end. */
  get remaining(): number {
    return this.bitLength - this._offset;
  }

  /** Write a single bit at the cursor. */
  writeBit(bit: 0 | 1): void {
    this.assertSpan(this._offset, 1);
    const byteIndex = this._offset >> 3;
    const bitIndex = 7 - (this._offset & 7);
    if (bit) {
      this._data[byteIndex] |= (1 << bitIndex);
    } else {
      this._data[byteIndex] &= ~(1 << bitIndex);
    }
    this._offset++;
  }

  /** Read a single bit at the cursor. */
  readBit(): 0 | 1 {
    this.assertSpan(this._offset, 1);
    const byteIndex = this._offset >> 3;
    const bitIndex = 7 - (this._offset & 7);
    this._offset++;
    return ((this._data[byteIndex] >> bitIndex) & 1) === 1 ? 1 : 0;
  }

  /** Write the lowest `count` bits of `value` at the cursor, MSB first. */
  writeBigBits(value: bigint, count: number): void {
    if (count === 0) return;
    this.assertSpan(this._offset, count);
    for (let i = count - 1; i >= 0; i--) {
      this.writeBit(((value >> BigInt(i)) & 1n) === 1n ? 1 : 0);
    }
  }

  /** Read `count` bits at the cursor, MSB first, as an unsigned bigint. */
  readBigBits(count: number): bigint {
    if (count === 0) return 0n;
    this.assertSpan(this._offset, count);
    let result = 0n;
    for (let i = 0; i < count; i++) {
      result = (result << 1n) | BigInt(this.readBit());
    }
    return result;
  }

  /**
   * Read `count` bits starting at LSB-first index `start`. Bit `start` becomes
   * bit 0 of the result. Does not move the cursor.
   */
  readLsbBits(start: number, count: number): bigint {
    if (count === 0) return 0n;
    this.assertSpan(start, count);
    let result = 0n;
    for (let i = count - 1; i >= 0; i--) {
      const index = start + i;
      const bit = (this._data[index >> 3] >> (index & 7)) & 1;
      result = (result << 1n) | BigInt(bit);
    }
    return result;
  }

  /**
   * Write the lowest `count` bits of `value` starting at LSB-first index
   * `start`. Bits outside the span are left untouched. Does not move the cursor.
   */
  writeLsbBits(start: number, count: number, value: bigint): void {
    if (count === 0) return;
    this.assertSpan(start, count);
    for (let i = 0; i < count; i++) {
      const index = start + i;
      const mask = 1 << (index & 7);
      if (((value >> BigInt(i)) & 1n) === 1n) {
        this._data[index >> 3] |= mask;
      } else {
        this._data[index >> 3] &= ~mask;
      }
    }
  }

  /** Return a copy of the payload bytes. */
  toUint8Array(): Uint8Array {
    return this._data.slice();
  }

  /** Return binary string representation, MSB first per byte. */
  toBinaryString(): string {
    return Array.from(this._data).map(b => b.toString(2).padStart(8, '0')).join('');
  }

  /** Return upper-case hex string representation. */
  toHex(): string {
    return bytesToHex(this._data);
  }

  /** Reset cursor to 0. */
  reset(): void {
    this._offset = 0;
  }

  /** Seek to absolute MSB-first bit offset. */
  seek(bitOffset: number): void {
    if (bitOffset < 0 || bitOffset > this.bitLength) {
      throw new BitRangeExceededError(`seek: offset ${bitOffset} out of range [0, ${this.bitLength}]`);
    }
    this._offset = bitOffset;
  }

  private assertSpan(start: number, count: number): void {
    if (start < 0 || start + count > this.bitLength) {
      throw new BitRangeExceededError(
        `BitBuffer: bits ${start}..${start + count - 1} exceed payload of ${this.bitLength} bits`,
      );
    }
  }
}

/** Parse a hex string ("1234", "12 34", "0x1234") into bytes. */
export function hexToBytes(hex: string): Uint8Array {
  const clean = hex.replace(/^0x/i, '').replace(/[\s:-]/g, '');
  if (clean.length % 2 !== 0 || /[^0-9a-fA-F]/.test(clean)) {
    throw new RangeError(`Invalid hex string: '${hex}'`);
  }
  const bytes = new Uint8Array(clean.length / 2);
  for (let i = 0; i < bytes.length; i++) {
    bytes[i] = parseInt(clean.substring(i * 2, i * 2 + 2), 16);
  }
  return bytes;
}

/** Format bytes as contiguous upper-case hex. */
export function bytesToHex(bytes: Uint8Array): string {
  return Array.from(bytes).map(b => b.toString(16).toUpperCase().padStart(2, '0')).join('');
}
