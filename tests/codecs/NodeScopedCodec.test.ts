import * as fs from 'fs';
import * as path from 'path';
import { NodeScopedCodec } from '../../src/codecs/NodeScopedCodec';
import { SignalNotOwnedByNodeError, UnknownObjectError } from '../../src/errors';
import { loadDbc } from '../../src/parser/toDatabase';

const FIXTURE_PATH = path.join(__dirname, '..', 'fixtures', 'vehicle.dbc');

describe('NodeScopedCodec', () => {
  const db = loadDbc(fs.readFileSync(FIXTURE_PATH, 'utf-8'));
  const codec = new NodeScopedCodec(db);
  const engineStatus = [0xa0, 0x0f, 0x3c, 0x03, 0, 0, 0, 0];

  describe('encodeForNode', () => {
    it('encodes a message the node transmits', () => {
      const data = codec.encodeForNode('Engine', 'EngineStatus', { EngineSpeed: 1000, CoolantTemp: 20, Gear: 'Drive' });
      expect(Array.from(data)).toEqual(engineStatus);
    });

    it('accepts additional transmitters', () => {
      const data = codec.encodeForNode('Dashboard', 'Diagnostics', { Mode: 1, Voltage: 12.5 });
      expect(Array.from(data)).toEqual([0x01, 0xe2, 0x04, 0, 0, 0, 0, 0]);
    });

    it('rejects a message the node does not transmit', () => {
      expect(() => codec.encodeForNode('Dashboard', 'EngineStatus', { EngineSpeed: 1000 }))
        .toThrow(SignalNotOwnedByNodeError);
    });

    it('rejects a signal outside the message', () => {
      expect(() => codec.encodeForNode('Engine', 'EngineStatus', { OilTemp: 90 }))
        .toThrow(SignalNotOwnedByNodeError);
    });

    it('rejects unknown nodes', () => {
      expect(() => codec.encodeForNode('Ghost', 'EngineStatus', {})).toThrow(UnknownObjectError);
    });
  });

  describe('encodeFrameForNode', () => {
    it('puts the node source address into a J1939 id', () => {
      const frame = codec.encodeFrameForNode('Engine', 'EngineTemp', { OilTemp: 90 });
      expect(frame.frameId).toBe(0x18feee21);
      expect(frame.isExtended).toBe(true);
      expect(frame.arbitrationId).toMatchObject({ kind: 'J1939', sourceAddress: 0x21, pgn: 0xfeee });
      expect(Array.from(frame.data)).toEqual([0x03, 0x84, 0, 0, 0, 0, 0, 0]);
    });

    it('leaves standard ids unchanged', () => {
      const frame = codec.encodeFrameForNode('Gateway', 'Diagnostics', { Mode: 2, Current: -1 });
      expect(frame.frameId).toBe(0x200);
      expect(frame.isExtended).toBe(false);
      expect(frame.arbitrationId).toEqual({ kind: 'Standard', id: 0x200 });
      expect(Array.from(frame.data)).toEqual([0x02, 0x9c, 0xff, 0, 0, 0, 0, 0]);
    });
  });

  describe('decodeForNode', () => {
    it('returns only the signals the node receives', () => {
      expect(codec.decodeForNode('Dashboard', 'EngineStatus', engineStatus))
        .toEqual({ EngineSpeed: 1000, CoolantTemp: 20, Gear: 3 });
      expect(codec.decodeForNode('Gateway', 'EngineStatus', engineStatus)).toEqual({ EngineSpeed: 1000 });
      expect(codec.decodeForNode('Engine', 'EngineStatus', engineStatus)).toEqual({});
    });

    it('applies multiplexing before filtering', () => {
      const data = [0x02, 0x9c, 0xff, 0, 0, 0, 0, 0];
      expect(codec.decodeForNode('Engine', 'Diagnostics', data)).toEqual({ Mode: 2, Current: -1, Ratio: 0 });
    });

    it('keeps the multiplexor value in the metadata', () => {
      const decoded = codec.decodeForNodeWithMetadata('Dashboard', 'Paged', [0x09, 0x32, 0, 0]);
      expect(decoded.multiplexorValue).toBe(9);
      expect(decoded.signals.Level.value).toBe(50);
      expect(Object.keys(decoded.signals)).toEqual(['Page', 'Level']);
    });
  });
});
