/**
 * AST types for parsed DBC files.
 */

import type { AttributeObjectKind, ByteOrder, MuxRange } from '../model/types';

/** A complete DBC file: its statements in source order. */
export interface DbcFile {
  statements: DbcStatement[];
}

export type DbcStatement =
  | DbcVersion
  | DbcNewSymbols
  | DbcBitTiming
  | DbcNodes
  | DbcValueTable
  | DbcMessage
  | DbcMessageTransmitters
  | DbcEnvironmentVariable
  | DbcEnvironmentVariableData
  | DbcComment
  | DbcAttributeDefinition
  | DbcAttributeDefault
  | DbcAttributeValue
  | DbcValueDescription
  | DbcSignalValueType
  | DbcSignalMultiplexValues
  | DbcSignalGroup
  | DbcUnknownStatement;

/** `VERSION "..."` */
export interface DbcVersion {
  kind: 'Version';
  version: string;
}

/** `NS_ :` followed by the new-symbol list. */
export interface DbcNewSymbols {
  kind: 'NewSymbols';
  symbols: string[];
}

/** `BS_: baudrate : btr1 , btr2` (usually empty). */
export interface DbcBitTiming {
  kind: 'BitTiming';
  baudrate?: number;
  btr1?: number;
  btr2?: number;
}

/** `BU_: node...` */
export interface DbcNodes {
  kind: 'Nodes';
  names: string[];
}

export interface DbcValueEntry {
  value: number;
  label: string;
}

/** `VAL_TABLE_ name value "label" ... ;` */
export interface DbcValueTable {
  kind: 'ValueTable';
  name: string;
  entries: DbcValueEntry[];
}

/** `M`, `mN` or `mNM` after a signal name. */
export interface DbcMultiplexIndicator {
  isMultiplexor: boolean;
  switchValue?: number;
}

/** `SG_ name [mux] : start|length@order sign (factor,offset) [min|max] "unit" receivers` */
export interface DbcSignal {
  name: string;
  multiplexer: DbcMultiplexIndicator | null;
  startBit: number;
  bitLength: number;
  byteOrder: ByteOrder;
  signed: boolean;
  factor: number;
  offset: number;
  minimum: number;
  maximum: number;
  unit: string;
  receivers: string[];
}

/** `BO_ id name: size transmitter` and its signals. */
export interface DbcMessage {
  kind: 'Message';
  /** Raw id; bit 31 marks an extended id. */
  id: number;
  name: string;
  size: number;
  transmitter: string;
  signals: DbcSignal[];
}

/** `BO_TX_BU_ id : node,...;` */
export interface DbcMessageTransmitters {
  kind: 'MessageTransmitters';
  id: number;
  transmitters: string[];
}

/** `EV_ name: type [min|max] "unit" initial id access nodes;` */
export interface DbcEnvironmentVariable {
  kind: 'EnvironmentVariable';
  name: string;
  /** 0 integer, 1 float, 2 string. */
  varType: number;
  minimum: number;
  maximum: number;
  unit: string;
  initialValue: number;
  id: number;
  /** `DUMMY_NODE_VECTOR<hex>` */
  access: string;
  accessNodes: string[];
}

/** `ENVVAR_DATA_ name : size;` marks a data environment variable. */
export interface DbcEnvironmentVariableData {
  kind: 'EnvironmentVariableData';
  name: string;
  size: number;
}

/** The object a comment or attribute value refers to. */
export type DbcObjectRef =
  | { kind: 'Database' }
  | { kind: 'Node'; name: string }
  | { kind: 'Message'; id: number }
  | { kind: 'Signal'; id: number; signal: string }
  | { kind: 'EnvironmentVariable'; name: string };

/** `CM_ [target] "text";` */
export interface DbcComment {
  kind: 'Comment';
  target: DbcObjectRef;
  text: string;
}

export type DbcAttributeType =
  | { valueType: 'INT' | 'HEX' | 'FLOAT'; minimum: number; maximum: number }
  | { valueType: 'STRING' }
  | { valueType: 'ENUM'; values: string[] };

/** `BA_DEF_ [object] "name" type;` */
export interface DbcAttributeDefinition {
  kind: 'AttributeDefinition';
  objectKind: AttributeObjectKind;
  name: string;
  type: DbcAttributeType;
}

/** `BA_DEF_DEF_ "name" value;` */
export interface DbcAttributeDefault {
  kind: 'AttributeDefault';
  name: string;
  value: number | string;
}

/** `BA_ "name" [target] value;` ENUM values are indices. */
export interface DbcAttributeValue {
  kind: 'AttributeValue';
  name: string;
  target: DbcObjectRef;
  value: number | string;
}

/** `VAL_ id signal value "label" ... ;` or `VAL_ envVar ...;` */
export interface DbcValueDescription {
  kind: 'ValueDescription';
  target: { kind: 'Signal'; id: number; signal: string } | { kind: 'EnvironmentVariable'; name: string };
  entries: DbcValueEntry[];
}

/** `SIG_VALTYPE_ id signal : type;` 1 float, 2 double. */
export interface DbcSignalValueType {
  kind: 'SignalValueType';
  id: number;
  signal: string;
  valueType: number;
}

/** `SG_MUL_VAL_ id signal multiplexor lo-hi, ...;` */
export interface DbcSignalMultiplexValues {
  kind: 'SignalMultiplexValues';
  id: number;
  signal: string;
  multiplexor: string;
  ranges: MuxRange[];
}

/** `SIG_GROUP_ id name repetitions : signal...;` */
export interface DbcSignalGroup {
  kind: 'SignalGroup';
  id: number;
  name: string;
  repetitions: number;
  signals: string[];
}

/** A statement the grammar does not interpret, kept as text. */
export interface DbcUnknownStatement {
  kind: 'Unknown';
  keyword: string;
  text: string;
}
