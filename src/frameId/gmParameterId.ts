import { InvalidIdentifierError } from '../errors';

/**
 * GMLAN 29-bit identifier.
 *
 * ```text
 *  28   26 25              13 12               0
 * +-------+------------------+------------------+
 * | prio  |   parameter id   |    source id     |
 * +-------+------------------+------------------+
 * ```
 */
export interface GMParameterId {
  kind: 'GMParameterId';
  priority: number;
  parameterId: number;
  sourceId: number;
}

/**
 * GMLAN 11-bit identifier: a 3-bit request type above an 8-bit
 * arbitration id.
 */
export interface GMParameterIdStandard {
  kind: 'GMParameterIdStandard';
  requestType: number;
  arbitrationId: number;
}

export function decodeGMParameterId(frameId: number): GMParameterId {
  return {
    kind: 'GMParameterId',
    priority: (frameId >>> 26) & 0x7,
    parameterId: (frameId >>> 13) & 0x1fff,
    sourceId: frameId & 0x1fff,
  };
}

export function encodeGMParameterId(id: GMParameterId): number {
  checkField('priority', id.priority, 0x7);
  checkField('parameter id', id.parameterId, 0x1fff);
  checkField('source id', id.sourceId, 0x1fff);
  return ((id.priority << 26) | (id.parameterId << 13) | id.sourceId) >>> 0;
}

export function decodeGMParameterIdStandard(frameId: number): GMParameterIdStandard {
  return {
    kind: 'GMParameterIdStandard',
    requestType: (frameId >>> 8) & 0x7,
    arbitrationId: frameId & 0xff,
  };
}

export function encodeGMParameterIdStandard(id: GMParameterIdStandard): number {
  checkField('request type', id.requestType, 0x7);
  checkField('arbitration id', id.arbitrationId, 0xff);
  return (id.requestType << 8) | id.arbitrationId;
}

function checkField(name: string, value: number, max: number): void {
  if (!Number.isInteger(value) || value < 0 || value > max) {
    throw new InvalidIdentifierError(`Expected GM ${name} 0..${max}, but got ${value}`);
  }
}
