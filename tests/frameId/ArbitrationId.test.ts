import { InvalidIdentifierError } from '../../src/errors';
import {
  decodeArbitrationId,
  encodeArbitrationId,
  formatFrameId,
  withSourceAddress,
} from '../../src/frameId/ArbitrationId';
import type { ArbitrationId } from '../../src/frameId/ArbitrationId';

describe('decodeArbitrationId', () => {
  it('returns plain ids under the standard scheme', () => {
    expect(decodeArbitrationId(0x7ff, false)).toEqual({ kind: 'Standard', id: 0x7ff });
    expect(decodeArbitrationId(0x18fef100, true)).toEqual({ kind: 'Extended', id: 0x18fef100 });
  });

  it('applies J1939 to extended ids only', () => {
    expect(decodeArbitrationId(0x18fef100, true, 'j1939').kind).toBe('J1939');
    expect(decodeArbitrationId(0x100, false, 'j1939')).toEqual({ kind: 'Standard', id: 0x100 });
  });

  it('selects the GM variant by frame format', () => {
    expect(decodeArbitrationId(0x10242001, true, 'gmParameterId').kind).toBe('GMParameterId');
    expect(decodeArbitrationId(0x5a3, false, 'gmParameterId').kind).toBe('GMParameterIdStandard');
  });

  it('rejects ids outside 11 or 29 bits', () => {
    expect(() => decodeArbitrationId(0x800, false)).toThrow(InvalidIdentifierError);
    expect(() => decodeArbitrationId(0x20000000, true)).toThrow(InvalidIdentifierError);
    expect(() => decodeArbitrationId(-1, true)).toThrow(InvalidIdentifierError);
    expect(() => decodeArbitrationId(1.5, false)).toThrow(InvalidIdentifierError);
  });
});

describe('encodeArbitrationId', () => {
  it('inverts decodeArbitrationId for every variant', () => {
    const cases: Array<[number, boolean, 'standard' | 'j1939' | 'gmParameterId']> = [
      [0x123, false, 'standard'],
      [0x1abcdef0, true, 'standard'],
      [0x18fef100, true, 'j1939'],
      [0x10242001, true, 'gmParameterId'],
      [0x5a3, false, 'gmParameterId'],
    ];
    for (const [raw, isExtended, scheme] of cases) {
      const id = decodeArbitrationId(raw, isExtended, scheme);
      expect(encodeArbitrationId(id)).toEqual({ frameId: raw, isExtended });
      expect(decodeArbitrationId(raw, isExtended, scheme)).toEqual(id);
    }
  });

  it('rejects out-of-range plain ids', () => {
    expect(() => encodeArbitrationId({ kind: 'Standard', id: 0x800 })).toThrow(InvalidIdentifierError);
  });
});

describe('withSourceAddress', () => {
  it('replaces the J1939 source address', () => {
    const id = withSourceAddress(decodeArbitrationId(0x18fef100, true, 'j1939'), 0x2a);
    expect(encodeArbitrationId(id).frameId).toBe(0x18fef12a);
  });

  it('replaces the GM source id', () => {
    const id = withSourceAddress(decodeArbitrationId(0x10242001, true, 'gmParameterId'), 0x0055);
    expect(encodeArbitrationId(id).frameId).toBe(0x10242055);
  });

  it('leaves plain ids unchanged', () => {
    const id: ArbitrationId = { kind: 'Standard', id: 0x100 };
    expect(withSourceAddress(id, 0x2a)).toBe(id);
  });

  it('rejects addresses that do not fit', () => {
    expect(() => withSourceAddress(decodeArbitrationId(0x18fef100, true, 'j1939'), 0x100)).toThrow(
      InvalidIdentifierError,
    );
  });
});

describe('formatFrameId', () => {
  it('pads to the frame format width', () => {
    expect(formatFrameId(0x7ff, false)).toBe('0x7FF');
    expect(formatFrameId(0x1f, false)).toBe('0x01F');
    expect(formatFrameId(0x18fef100, true)).toBe('0x18FEF100');
    expect(formatFrameId(0x100, true)).toBe('0x00000100');
  });
});
