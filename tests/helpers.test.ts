import { BitRangeExceededError } from '../src/errors';
import {
  assertSignalFits,
  floatToRaw,
  floatWidth,
  motorolaOffset,
  motorolaStartBit,
  rawBounds,
  rawToFloat,
  signalBitIndices,
  signalFits,
  signExtend,
  toUnsigned,
} from '../src/helpers';
import type { Signal } from '../src/model/types';

function signal(overrides: Partial<Signal>): Signal {
  return {
    name: 'S',
    startBit: 0,
    bitLength: 8,
    byteOrder: 'little',
    valueKind: 'unsigned',
    factor: 1,
    offset: 0,
    unit: '',
    multiplexer: { kind: 'None' },
    receivers: [],
    attributes: [],
    ...overrides,
  };
}

describe('motorolaOffset', () => {
  it('maps DBC start bits to MSB-first offsets', () => {
    expect(motorolaOffset(7)).toBe(0);
    expect(motorolaOffset(0)).toBe(7);
    expect(motorolaOffset(15)).toBe(8);
    expect(motorolaOffset(8)).toBe(15);
    expect(motorolaOffset(39)).toBe(32);
  });

  it('is its own inverse', () => {
    for (const bit of [0, 3, 7, 12, 63]) {
      expect(motorolaStartBit(motorolaOffset(bit))).toBe(bit);
    }
  });
});

describe('signalBitIndices', () => {
  it('ascends from the start bit for little-endian signals', () => {
    expect(signalBitIndices(signal({ startBit: 4, bitLength: 4 }))).toEqual([4, 5, 6, 7]);
  });

  it('lists big-endian bits from least to most significant', () => {
    expect(signalBitIndices(signal({ startBit: 7, bitLength: 12, byteOrder: 'big' }))).toEqual([
      12, 13, 14, 15, 0, 1, 2, 3, 4, 5, 6, 7,
    ]);
  });
});

describe('signalFits', () => {
  it('checks big-endian spans in cursor order', () => {
    const s = signal({ startBit: 3, bitLength: 8, byteOrder: 'big' });
    expect(signalFits(s, 64)).toBe(true);
    expect(signalFits(s, 8)).toBe(false);
  });

  it('checks little-endian spans from the start bit', () => {
    expect(signalFits(signal({ startBit: 56, bitLength: 8 }), 64)).toBe(true);
    expect(signalFits(signal({ startBit: 60, bitLength: 8 }), 64)).toBe(false);
  });

  it('throws BitRangeExceededError from assertSignalFits', () => {
    expect(() => assertSignalFits(signal({ startBit: 4, bitLength: 8 }), 8)).toThrow(BitRangeExceededError);
  });
});

describe('two\'s complement', () => {
  it('sign-extends the top bit', () => {
    expect(signExtend(0b1000n, 4)).toBe(-8n);
    expect(signExtend(0b0111n, 4)).toBe(7n);
    expect(signExtend(0xffn, 8)).toBe(-1n);
  });

  it('truncates negative values to a bit pattern', () => {
    expect(toUnsigned(-1n, 8)).toBe(255n);
    expect(toUnsigned(-8n, 4)).toBe(8n);
  });

  it('computes raw bounds per kind', () => {
    expect(rawBounds('signed', 8)).toEqual({ min: -128n, max: 127n });
    expect(rawBounds('unsigned', 8)).toEqual({ min: 0n, max: 255n });
    expect(rawBounds('unsigned', 64)).toEqual({ min: 0n, max: 0xffffffffffffffffn });
  });
});

describe('IEEE-754', () => {
  it('converts 32-bit patterns', () => {
    expect(floatToRaw(1.5, 32)).toBe(0x3fc00000n);
    expect(rawToFloat(0x3fc00000n, 32)).toBe(1.5);
  });

  it('converts 64-bit patterns', () => {
    expect(floatToRaw(-2, 64)).toBe(0xc000000000000000n);
    expect(rawToFloat(0xc000000000000000n, 64)).toBe(-2);
  });

  it('reports the width of float kinds only', () => {
    expect(floatWidth('float')).toBe(32);
    expect(floatWidth('double')).toBe(64);
    expect(floatWidth('signed')).toBeUndefined();
  });
});
