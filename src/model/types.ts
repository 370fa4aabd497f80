/**
 * Object model of a CAN database.
 *
 * Objects reference each other by name (transmitters, receivers, multiplexor
 * signal), never by pointer; the {@link Database} keeps the indexes that
 * resolve those names.
 */

/** `little`: Intel, start bit is the LSB. `big`: Motorola, start bit is the MSB. */
export type ByteOrder = 'little' | 'big';

export type SignalValueKind = 'unsigned' | 'signed' | 'float' | 'double';

/** Inclusive range of multiplexor raw values. */
export interface MuxRange {
  lower: number;
  upper: number;
}

/** How a signal takes part in multiplexing. */
export type MultiplexerRole =
  | { kind: 'None' }
  | { kind: 'IsMultiplexor' }
  | { kind: 'MultiplexedBy'; switchValue: number }
  | { kind: 'MultiplexedByRange'; multiplexor: string; ranges: readonly MuxRange[] };

/** Raw value → label. */
export type ValueTable = ReadonlyMap<number, string>;

export type AttributeObjectKind = 'Node' | 'Message' | 'Signal' | 'EnvironmentVariable' | 'Database';

export type AttributeScalar = number | string;

interface AttributeDefinitionBase {
  readonly name: string;
  readonly objectKind: AttributeObjectKind;
}

export interface NumericAttributeDefinition extends AttributeDefinitionBase {
  readonly valueType: 'INT' | 'HEX' | 'FLOAT';
  readonly minimum?: number;
  readonly maximum?: number;
  readonly defaultValue?: number;
}

export interface StringAttributeDefinition extends AttributeDefinitionBase {
  readonly valueType: 'STRING';
  readonly defaultValue?: string;
}

/** Values of an ENUM attribute are stored as labels. */
export interface EnumAttributeDefinition extends AttributeDefinitionBase {
  readonly valueType: 'ENUM';
  readonly values: readonly string[];
  readonly defaultValue?: string;
}

export type AttributeDefinition =
  | NumericAttributeDefinition
  | StringAttributeDefinition
  | EnumAttributeDefinition;

export type AttributeValueType = AttributeDefinition['valueType'];

/** An attribute attached to an object. An absent `value` means "no override". */
export interface AttributeValue {
  readonly definition: AttributeDefinition;
  readonly value?: AttributeScalar;
}

export interface Signal {
  readonly name: string;
  readonly startBit: number;
  /** 1..64 */
  readonly bitLength: number;
  readonly byteOrder: ByteOrder;
  readonly valueKind: SignalValueKind;
  readonly factor: number;
  readonly offset: number;
  readonly minimum?: number;
  readonly maximum?: number;
  readonly unit: string;
  readonly multiplexer: MultiplexerRole;
  /** Names of receiving nodes. */
  readonly receivers: readonly string[];
  readonly valueTable?: ValueTable;
  readonly attributes: readonly AttributeValue[];
  readonly comment?: string;
}

export interface SignalGroup {
  readonly name: string;
  readonly repetitions: number;
  readonly signalNames: readonly string[];
}

export interface Message {
  readonly name: string;
  /** Raw arbitration id without the DBC extended-frame flag bit. */
  readonly frameId: number;
  readonly isExtended: boolean;
  /** Payload length in bytes (DLC). */
  readonly byteLength: number;
  /** Transmitting node name, or null when the message has no sender. */
  readonly transmitter: string | null;
  /** Further transmitters declared with BO_TX_BU_. */
  readonly additionalTransmitters: readonly string[];
  readonly signals: readonly Signal[];
  readonly signalGroups: readonly SignalGroup[];
  readonly attributes: readonly AttributeValue[];
  readonly comment?: string;
}

export interface Node {
  readonly name: string;
  readonly attributes: readonly AttributeValue[];
  readonly comment?: string;
}

export type EnvironmentVariableType = 'integer' | 'float' | 'string' | 'data';

export type EnvironmentVariableAccess = 'unrestricted' | 'read' | 'write' | 'readWrite';

export interface EnvironmentVariable {
  readonly name: string;
  readonly type: EnvironmentVariableType;
  readonly minimum: number;
  readonly maximum: number;
  readonly unit: string;
  readonly initialValue: number;
  readonly id: number;
  readonly access: EnvironmentVariableAccess;
  readonly accessNodes: readonly string[];
  readonly valueTable?: ValueTable;
  readonly attributes: readonly AttributeValue[];
  readonly comment?: string;
}

/** The object an attribute is resolved against. */
export type AttributeTarget =
  | { kind: 'Node'; node: Node }
  | { kind: 'Message'; message: Message }
  | { kind: 'Signal'; message: Message; signal: Signal }
  | { kind: 'EnvironmentVariable'; variable: EnvironmentVariable }
  | { kind: 'Database' };
