import { InvalidIdentifierError } from '../errors';
import { decodeJ1939, encodeJ1939 } from './j1939';
import type { J1939Id } from './j1939';
import {
  decodeGMParameterId,
  encodeGMParameterId,
  decodeGMParameterIdStandard,
  encodeGMParameterIdStandard,
} from './gmParameterId';
import type { GMParameterId, GMParameterIdStandard } from './gmParameterId';

export const MAX_STANDARD_ID = 0x7ff;
export const MAX_EXTENDED_ID = 0x1fffffff;

/**
 * Which vendor layout applies to a message's identifier. Configured by the
 * database, never guessed from the bits.
 */
export type IdScheme = 'standard' | 'j1939' | 'gmParameterId';

export interface StandardId {
  kind: 'Standard';
  id: number;
}

export interface ExtendedId {
  kind: 'Extended';
  id: number;
}

/** Decoded arbitration identifier. */
export type ArbitrationId =
  | StandardId
  | ExtendedId
  | J1939Id
  | GMParameterId
  | GMParameterIdStandard;

/** A raw identifier together with its frame format. */
export interface RawFrameId {
  frameId: number;
  isExtended: boolean;
}

/**
 * Decode a raw identifier under the given scheme.
 *
 * @throws InvalidIdentifierError if `raw` does not fit in 11 bits (standard)
 *   or 29 bits (extended)
 */
export function decodeArbitrationId(raw: number, isExtended: boolean, scheme: IdScheme = 'standard'): ArbitrationId {
  const max = isExtended ? MAX_EXTENDED_ID : MAX_STANDARD_ID;
  if (!Number.isInteger(raw) || raw < 0 || raw > max) {
    throw new InvalidIdentifierError(
      `${isExtended ? 'Extended' : 'Standard'} frame id ${String(raw)} is not within 0..0x${max.toString(16).toUpperCase()}`,
    );
  }

  if (!isExtended) {
    return scheme === 'gmParameterId'
      ? decodeGMParameterIdStandard(raw)
      : { kind: 'Standard', id: raw };
  }

  switch (scheme) {
    case 'j1939':
      return decodeJ1939(raw);
    case 'gmParameterId':
      return decodeGMParameterId(raw);
    case 'standard':
      return { kind: 'Extended', id: raw };
  }
}

/** Inverse of {@link decodeArbitrationId}. */
export function encodeArbitrationId(id: ArbitrationId): RawFrameId {
  switch (id.kind) {
    case 'Standard':
      checkRaw(id.id, MAX_STANDARD_ID, 'Standard');
      return { frameId: id.id, isExtended: false };
    case 'Extended':
      checkRaw(id.id, MAX_EXTENDED_ID, 'Extended');
      return { frameId: id.id, isExtended: true };
    case 'J1939':
      return { frameId: encodeJ1939(id), isExtended: true };
    case 'GMParameterId':
      return { frameId: encodeGMParameterId(id), isExtended: true };
    case 'GMParameterIdStandard':
      return { frameId: encodeGMParameterIdStandard(id), isExtended: false };
  }
}

/**
 * Replace the sender part of a vendor identifier (J1939 source address, GM
 * source id). Other variants are returned unchanged.
 */
export function withSourceAddress(id: ArbitrationId, address: number): ArbitrationId {
  switch (id.kind) {
    case 'J1939': {
      const updated: J1939Id = { ...id, sourceAddress: address };
      encodeJ1939(updated);
      return updated;
    }
    case 'GMParameterId': {
      const updated: GMParameterId = { ...id, sourceId: address };
      encodeGMParameterId(updated);
      return updated;
    }
    default:
      return id;
  }
}

/** `0x1F3` for standard ids, `0x18FEF100` for extended ids. */
export function formatFrameId(frameId: number, isExtended: boolean): string {
  return '0x' + frameId.toString(16).toUpperCase().padStart(isExtended ? 8 : 3, '0');
}

function checkRaw(raw: number, max: number, label: string): void {
  if (!Number.isInteger(raw) || raw < 0 || raw > max) {
    throw new InvalidIdentifierError(
      `${label} frame id ${String(raw)} is not within 0..0x${max.toString(16).toUpperCase()}`,
    );
  }
}
