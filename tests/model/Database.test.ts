import { StructuralInvariantViolationError, UnknownObjectError } from '../../src/errors';
import { DatabaseBuilder } from '../../src/model/DatabaseBuilder';
import type { DatabaseSchema, MessageSchema } from '../../src/model/DatabaseBuilder';

const network: DatabaseSchema = {
  nodes: [{ name: 'Body' }, { name: 'Cluster' }, { name: 'Logger' }],
  messages: [
    {
      name: 'Doors',
      frameId: 0x120,
      byteLength: 2,
      transmitter: 'Body',
      signals: [
        { name: 'FrontLeft', startBit: 0, bitLength: 1, receivers: ['Cluster', 'Logger'] },
        { name: 'FrontRight', startBit: 1, bitLength: 1, receivers: ['Cluster'] },
        { name: 'Count', startBit: 8, bitLength: 8 },
      ],
    },
    {
      name: 'Lights',
      frameId: 0x121,
      byteLength: 1,
      transmitter: 'Body',
      additionalTransmitters: ['Logger'],
      signals: [{ name: 'Beam', startBit: 0, bitLength: 2, receivers: ['Logger'], valueTable: 'BeamTable' }],
    },
    {
      name: 'Trip',
      frameId: 0x18fef100,
      byteLength: 4,
      transmitter: 'Cluster',
      signals: [{ name: 'Distance', startBit: 0, bitLength: 32, factor: 0.125, receivers: ['Logger'] }],
    },
  ],
  valueTables: { BeamTable: { '0': 'Off', '1': 'Low', '2': 'High' } },
};

function withAttributes(schema: DatabaseSchema, extra: Pick<DatabaseSchema, 'attributeDefinitions' | 'attributes'>): DatabaseSchema {
  return { ...schema, ...extra };
}

describe('Database', () => {
  const db = DatabaseBuilder.build(network);

  describe('lookups', () => {
    it('finds messages by name and by frame id', () => {
      expect(db.getMessage('Lights').frameId).toBe(0x121);
      expect(db.getMessage(0x120).name).toBe('Doors');
      expect(db.getMessage(0x18fef100).name).toBe('Trip');
    });

    it('throws for unknown objects', () => {
      expect(() => db.getMessage('Wipers')).toThrow(UnknownObjectError);
      expect(() => db.getMessage(0x7ff)).toThrow(UnknownObjectError);
      expect(() => db.getNode('Radio')).toThrow(UnknownObjectError);
      expect(() => db.getSignal('Doors', 'RearLeft')).toThrow(UnknownObjectError);
      expect(() => db.getValueTable('Missing')).toThrow(UnknownObjectError);
      expect(() => db.getEnvironmentVariable('Missing')).toThrow(UnknownObjectError);
    });

    it('reports node existence', () => {
      expect(db.hasNode('Body')).toBe(true);
      expect(db.hasNode('Radio')).toBe(false);
    });

    it('shares value tables by name', () => {
      expect(db.getSignal('Lights', 'Beam').valueTable).toBe(db.getValueTable('BeamTable'));
    });
  });

  describe('frame id mask', () => {
    const sourceAddressed: DatabaseSchema = {
      messages: [
        { name: 'EngineHours', frameId: 0x18fee500, byteLength: 8 },
        { name: 'VehicleDistance', frameId: 0x18fee000, byteLength: 8 },
      ],
    };

    it('applies the mask to lookups', () => {
      const masked = DatabaseBuilder.build(sourceAddressed, { frameIdMask: 0x1fffff00 });
      expect(masked.getMessage(0x18fee5ab).name).toBe('EngineHours');
      expect(masked.getMessage(0x18fee017).name).toBe('VehicleDistance');
    });

    it('rejects ids that collide under the mask in strict mode', () => {
      expect(() => DatabaseBuilder.build(sourceAddressed, { frameIdMask: 0x1fff0000 }))
        .toThrow(StructuralInvariantViolationError);
    });

    it('keeps the first message on a collision when not strict', () => {
      const loose = DatabaseBuilder.build(sourceAddressed, { frameIdMask: 0x1fff0000, strict: false });
      expect(loose.getMessage(0x18fee000).name).toBe('EngineHours');
    });
  });

  describe('transmit and receive relations', () => {
    it('lists transmitted messages, including additional transmitters', () => {
      expect(db.transmittedMessages('Body').map(m => m.name)).toEqual(['Doors', 'Lights']);
      expect(db.transmittedMessages('Logger').map(m => m.name)).toEqual(['Lights']);
      expect(db.transmittedMessages('Cluster').map(m => m.name)).toEqual(['Trip']);
    });

    it('answers transmits', () => {
      expect(db.transmits('Logger', 'Lights')).toBe(true);
      expect(db.transmits('Logger', 'Doors')).toBe(false);
    });

    it('lists received signals in definition order', () => {
      expect(db.receivedSignals('Cluster', 'Doors').map(s => s.name)).toEqual(['FrontLeft', 'FrontRight']);
      expect(db.receivedSignals('Logger', 'Doors').map(s => s.name)).toEqual(['FrontLeft']);
      expect(db.receivedSignals('Body', 'Doors')).toEqual([]);
    });

    it('lists received messages', () => {
      expect(db.receivedMessages('Logger').map(m => m.name)).toEqual(['Doors', 'Lights', 'Trip']);
      expect(db.receivedMessages('Body')).toEqual([]);
    });

    it('collects message receivers in first-seen order', () => {
      expect(db.messageReceivers('Doors')).toEqual(['Cluster', 'Logger']);
    });
  });

  describe('identifier scheme', () => {
    it('defaults to the plain layout', () => {
      expect(db.idScheme('Trip')).toBe('standard');
      expect(db.arbitrationId('Trip')).toEqual({ kind: 'Extended', id: 0x18fef100 });
      expect(db.arbitrationId('Doors')).toEqual({ kind: 'Standard', id: 0x120 });
    });

    it('uses J1939 when ProtocolType says so', () => {
      const j1939 = DatabaseBuilder.build(withAttributes(network, {
        attributeDefinitions: [{ name: 'ProtocolType', objectKind: 'Database', valueType: 'STRING', defaultValue: '' }],
        attributes: { ProtocolType: 'J1939' },
      }));
      expect(j1939.idScheme('Trip')).toBe('j1939');
      expect(j1939.arbitrationId('Trip')).toMatchObject({ kind: 'J1939', priority: 6, pgn: 0xfef1, sourceAddress: 0 });
      expect(j1939.arbitrationId('Doors')).toEqual({ kind: 'Standard', id: 0x120 });
    });

    it('uses GM parameter ids when UseGMParameterIDs is set', () => {
      const gm = DatabaseBuilder.build(withAttributes(network, {
        attributeDefinitions: [
          { name: 'UseGMParameterIDs', objectKind: 'Database', valueType: 'ENUM', values: ['No', 'Yes'] },
        ],
        attributes: { UseGMParameterIDs: 1 },
      }));
      expect(gm.idScheme('Doors')).toBe('gmParameterId');
      expect(gm.arbitrationId('Doors')).toEqual({ kind: 'GMParameterIdStandard', requestType: 1, arbitrationId: 0x20 });
      expect(gm.arbitrationId('Trip')).toEqual({
        kind: 'GMParameterId',
        priority: 6,
        parameterId: 0x7f7,
        sourceId: 0x1100,
      });
    });

    it('lets VFrameFormat J1939PG win over the database setting', () => {
      const schema = withAttributes(network, {
        attributeDefinitions: [
          { name: 'UseGMParameterIDs', objectKind: 'Database', valueType: 'INT', minimum: 0, maximum: 1 },
          {
            name: 'VFrameFormat',
            objectKind: 'Message',
            valueType: 'ENUM',
            values: ['StandardCAN', 'ExtendedCAN', 'J1939PG'],
            defaultValue: 'StandardCAN',
          },
        ],
        attributes: { UseGMParameterIDs: 1 },
      });
      const trip = schema.messages?.find(m => m.name === 'Trip');
      const messages: MessageSchema[] = (schema.messages ?? []).map(m =>
        m === trip ? { ...m, attributes: { VFrameFormat: 'J1939PG' } } : m,
      );
      const mixed = DatabaseBuilder.build({ ...schema, messages });
      expect(mixed.idScheme('Trip')).toBe('j1939');
      expect(mixed.idScheme('Doors')).toBe('gmParameterId');
    });
  });

  describe('encoding and decoding', () => {
    it('encodes and decodes by message name', () => {
      const data = db.encodeMessage('Trip', { Distance: 1000 });
      expect(Array.from(data)).toEqual([0x40, 0x1f, 0x00, 0x00]);
      expect(db.decodeMessage('Trip', data)).toEqual({ Distance: 1000 });
    });

    it('honours per-call options', () => {
      const data = db.encodeMessage('Doors', { FrontLeft: 1, FrontRight: 0, Count: 3 }, { padding: true });
      expect(Array.from(data)).toEqual([0xfd, 0x03]);
    });

    it('decodes a frame found by id', () => {
      const decoded = db.decodeFrame(0x121, [0x02]);
      expect(decoded.message.name).toBe('Lights');
      expect(decoded.signals.Beam.label).toBe('High');
    });

    it('caches one codec per message', () => {
      expect(db.codec('Doors')).toBe(db.codec(db.getMessage('Doors')));
    });
  });
});
