import { InvalidIdentifierError } from '../../src/errors';
import {
  decodeGMParameterId,
  decodeGMParameterIdStandard,
  encodeGMParameterId,
  encodeGMParameterIdStandard,
} from '../../src/frameId/gmParameterId';

describe('GM parameter ids', () => {
  it('splits a 29-bit id into priority, parameter id and source id', () => {
    expect(decodeGMParameterId(0x10242001)).toEqual({
      kind: 'GMParameterId',
      priority: 4,
      parameterId: 0x121,
      sourceId: 0x001,
    });
  });

  it('encodes a 29-bit id', () => {
    expect(encodeGMParameterId({ kind: 'GMParameterId', priority: 4, parameterId: 0x121, sourceId: 1 })).toBe(
      0x10242001,
    );
  });

  it('splits an 11-bit id into request type and arbitration id', () => {
    expect(decodeGMParameterIdStandard(0x5a3)).toEqual({
      kind: 'GMParameterIdStandard',
      requestType: 5,
      arbitrationId: 0xa3,
    });
    expect(encodeGMParameterIdStandard({ kind: 'GMParameterIdStandard', requestType: 5, arbitrationId: 0xa3 })).toBe(
      0x5a3,
    );
  });

  it('rejects out-of-range fields', () => {
    expect(() =>
      encodeGMParameterId({ kind: 'GMParameterId', priority: 0, parameterId: 0x2000, sourceId: 0 }),
    ).toThrow(InvalidIdentifierError);
    expect(() =>
      encodeGMParameterIdStandard({ kind: 'GMParameterIdStandard', requestType: 8, arbitrationId: 0 }),
    ).toThrow(InvalidIdentifierError);
  });
});
