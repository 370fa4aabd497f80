import { InvalidIdentifierError } from '../errors';

/**
 * SAE J1939 view of a 29-bit identifier.
 *
 * ```text
 *  28   26 25  24  23      16 15      8 7       0
 * +-------+---+---+----------+---------+---------+
 * | prio  | R |DP |    PF    |   PS    |   SA    |
 * +-------+---+---+----------+---------+---------+
 * ```
 */
export interface J1939Id {
  kind: 'J1939';
  priority: number;
  reserved: number;
  dataPage: number;
  pduFormat: number;
  /** Destination address when `pduFormat < 240` (PDU1), group extension otherwise (PDU2). */
  pduSpecific: number;
  sourceAddress: number;
  pgn: number;
}

/** First PDU format of the broadcast (PDU2) range. */
export const PDU2_THRESHOLD = 240;

/** Largest 18-bit parameter group number. */
export const MAX_PGN = 0x3ffff;

export function isPdu2(pduFormat: number): boolean {
  return pduFormat >= PDU2_THRESHOLD;
}

/**
 * Parameter group number of the given fields. In PDU1 the PS byte is a
 * destination address and is left out of the PGN.
 */
export function computePgn(
  reserved: number,
  dataPage: number,
  pduFormat: number,
  pduSpecific: number,
): number {
  const groupExtension = isPdu2(pduFormat) ? pduSpecific : 0;
  return ((reserved & 1) << 17) | ((dataPage & 1) << 16) | ((pduFormat & 0xff) << 8) | (groupExtension & 0xff);
}

export function decodeJ1939(frameId: number): J1939Id {
  const priority = (frameId >>> 26) & 0x7;
  const reserved = (frameId >>> 25) & 0x1;
  const dataPage = (frameId >>> 24) & 0x1;
  const pduFormat = (frameId >>> 16) & 0xff;
  const pduSpecific = (frameId >>> 8) & 0xff;
  const sourceAddress = frameId & 0xff;
  return {
    kind: 'J1939',
    priority,
    reserved,
    dataPage,
    pduFormat,
    pduSpecific,
    sourceAddress,
    pgn: computePgn(reserved, dataPage, pduFormat, pduSpecific),
  };
}

/**
 * Raw 29-bit id of the fields.
 *
 * @throws InvalidIdentifierError if a field is out of range, or `pgn` is not
 *   the group number the reserved/data page/PF/PS fields give
 */
export function encodeJ1939(id: J1939Id): number {
  checkField('priority', id.priority, 0x7);
  checkField('reserved', id.reserved, 0x1);
  checkField('data page', id.dataPage, 0x1);
  checkField('PDU format', id.pduFormat, 0xff);
  checkField('PDU specific', id.pduSpecific, 0xff);
  checkField('source address', id.sourceAddress, 0xff);
  const pgn = computePgn(id.reserved, id.dataPage, id.pduFormat, id.pduSpecific);
  if (id.pgn !== pgn) {
    throw new InvalidIdentifierError(
      `PGN 0x${id.pgn.toString(16).toUpperCase()} does not match the identifier fields (0x${pgn.toString(16).toUpperCase()})`,
    );
  }
  return (
    ((id.priority << 26) |
      (id.reserved << 25) |
      (id.dataPage << 24) |
      (id.pduFormat << 16) |
      (id.pduSpecific << 8) |
      id.sourceAddress) >>> 0
  );
}

export interface J1939FromPgnOptions {
  priority?: number;
  sourceAddress?: number;
  /** Only used for PDU1 groups, where PS carries the destination. Defaults to 0xFF (global). */
  destinationAddress?: number;
}

/** Build a J1939 identifier for a parameter group. */
export function j1939FromPgn(pgn: number, options: J1939FromPgnOptions = {}): J1939Id {
  if (!Number.isInteger(pgn) || pgn < 0 || pgn > MAX_PGN) {
    throw new InvalidIdentifierError(
      `Expected a parameter group number 0..0x3FFFF, but got 0x${pgn.toString(16).toUpperCase()}`,
    );
  }
  const reserved = (pgn >>> 17) & 0x1;
  const dataPage = (pgn >>> 16) & 0x1;
  const pduFormat = (pgn >>> 8) & 0xff;
  if (!isPdu2(pduFormat) && (pgn & 0xff) !== 0) {
    throw new InvalidIdentifierError(
      `PDU1 parameter group 0x${pgn.toString(16).toUpperCase()} must have a zero group extension`,
    );
  }
  const pduSpecific = isPdu2(pduFormat) ? pgn & 0xff : options.destinationAddress ?? 0xff;
  const id: J1939Id = {
    kind: 'J1939',
    priority: options.priority ?? 6,
    reserved,
    dataPage,
    pduFormat,
    pduSpecific,
    sourceAddress: options.sourceAddress ?? 0,
    pgn,
  };
  encodeJ1939(id);
  return id;
}

function checkField(name: string, value: number, max: number): void {
  if (!Number.isInteger(value) || value < 0 || value > max) {
    throw new InvalidIdentifierError(`Expected J1939 ${name} 0..${max}, but got ${value}`);
  }
}
