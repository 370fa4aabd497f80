import { StructuralInvariantViolationError, TypeMismatchError, UnknownObjectError } from '../../src/errors';
import { DatabaseBuilder } from '../../src/model/DatabaseBuilder';
import type { DatabaseSchema } from '../../src/model/DatabaseBuilder';

describe('DatabaseBuilder', () => {
  it('fills in signal defaults', () => {
    const db = DatabaseBuilder.build({
      messages: [{ name: 'Msg', frameId: 1, byteLength: 1, signals: [{ name: 'S', startBit: 0, bitLength: 8 }] }],
    });
    expect(db.getSignal('Msg', 'S')).toEqual({
      name: 'S',
      startBit: 0,
      bitLength: 8,
      byteOrder: 'little',
      valueKind: 'unsigned',
      factor: 1,
      offset: 0,
      minimum: undefined,
      maximum: undefined,
      unit: '',
      multiplexer: { kind: 'None' },
      receivers: [],
      valueTable: undefined,
      attributes: [],
      comment: undefined,
    });
  });

  it('fills in message defaults', () => {
    const db = DatabaseBuilder.build({
      messages: [
        { name: 'Short', frameId: 0x7ff, byteLength: 8 },
        { name: 'Long', frameId: 0x800, byteLength: 8 },
        { name: 'Forced', frameId: 0x10, isExtended: true, byteLength: 8 },
      ],
    });
    expect(db.messages.map(m => [m.name, m.isExtended])).toEqual([
      ['Short', false],
      ['Long', true],
      ['Forced', true],
    ]);
    expect(db.getMessage('Short')).toMatchObject({
      transmitter: null,
      additionalTransmitters: [],
      signals: [],
      signalGroups: [],
      attributes: [],
    });
  });

  it('fills in environment variable defaults', () => {
    const db = DatabaseBuilder.build({ environmentVariables: [{ name: 'Key' }] });
    expect(db.getEnvironmentVariable('Key')).toMatchObject({
      type: 'integer',
      minimum: 0,
      maximum: 0,
      unit: '',
      initialValue: 0,
      id: 0,
      access: 'unrestricted',
      accessNodes: [],
    });
  });

  it('keeps the version', () => {
    expect(DatabaseBuilder.build({ version: '3.0' }).version).toBe('3.0');
    expect(DatabaseBuilder.build({}).version).toBe('');
  });

  describe('value tables', () => {
    const schema: DatabaseSchema = {
      valueTables: { OnOff: { '0': 'Off', '1': 'On' } },
      messages: [{
        name: 'Msg',
        frameId: 1,
        byteLength: 1,
        signals: [
          { name: 'Named', startBit: 0, bitLength: 1, valueTable: 'OnOff' },
          { name: 'Inline', startBit: 1, bitLength: 2, valueTable: { '-1': 'Invalid', '2': 'Two' } },
        ],
      }],
    };

    it('resolves tables by name and inline', () => {
      const db = DatabaseBuilder.build(schema);
      expect(db.getSignal('Msg', 'Named').valueTable?.get(1)).toBe('On');
      const inline = db.getSignal('Msg', 'Inline').valueTable;
      expect(inline?.get(-1)).toBe('Invalid');
      expect(inline?.get(2)).toBe('Two');
    });

    it('rejects unknown table names', () => {
      expect(() => DatabaseBuilder.build({
        messages: [{
          name: 'Msg',
          frameId: 1,
          byteLength: 1,
          signals: [{ name: 'S', startBit: 0, bitLength: 1, valueTable: 'Missing' }],
        }],
      })).toThrow(UnknownObjectError);
    });

    it('rejects non-integer keys', () => {
      expect(() => DatabaseBuilder.build({ valueTables: { Bad: { x: 'Nope' } } }))
        .toThrow(StructuralInvariantViolationError);
      expect(() => DatabaseBuilder.build({ valueTables: { Bad: { '1.5': 'Nope' } } }))
        .toThrow(StructuralInvariantViolationError);
    });
  });

  describe('attributes', () => {
    const definitions: DatabaseSchema['attributeDefinitions'] = [
      { name: 'Layer', objectKind: 'Node', valueType: 'ENUM', values: ['None', 'Gateway'], defaultValue: 'None' },
      { name: 'Cycle', objectKind: 'Message', valueType: 'INT', minimum: 0, maximum: 1000 },
    ];

    it('normalizes ENUM indices to labels', () => {
      const db = DatabaseBuilder.build({
        attributeDefinitions: definitions,
        nodes: [{ name: 'Gw', attributes: { Layer: 1 } }],
      });
      const [attribute] = db.getNode('Gw').attributes;
      expect(attribute.value).toBe('Gateway');
      expect(attribute.definition.name).toBe('Layer');
    });

    it('rejects attributes without a definition', () => {
      expect(() => DatabaseBuilder.build({ nodes: [{ name: 'Gw', attributes: { Layer: 1 } }] }))
        .toThrow(UnknownObjectError);
    });

    it('rejects values of the wrong type', () => {
      expect(() => DatabaseBuilder.build({
        attributeDefinitions: definitions,
        messages: [{ name: 'Msg', frameId: 1, byteLength: 1, attributes: { Cycle: 'fast' } }],
      })).toThrow(TypeMismatchError);
    });

    it('attaches database attributes', () => {
      const db = DatabaseBuilder.build({
        attributeDefinitions: [{ name: 'BusType', objectKind: 'Database', valueType: 'STRING' }],
        attributes: { BusType: 'CAN FD' },
      });
      expect(db.resolver.resolve({ kind: 'Database' }, 'BusType')).toBe('CAN FD');
    });
  });

  it('copies signal groups', () => {
    const groups = [{ name: 'G', repetitions: 2, signalNames: ['S'] }];
    const db = DatabaseBuilder.build({
      messages: [{
        name: 'Msg',
        frameId: 1,
        byteLength: 1,
        signals: [{ name: 'S', startBit: 0, bitLength: 8 }],
        signalGroups: groups,
      }],
    });
    groups[0].signalNames.push('T');
    expect(db.getMessage('Msg').signalGroups).toEqual([{ name: 'G', repetitions: 2, signalNames: ['S'] }]);
  });
});
