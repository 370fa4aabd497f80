export { BitBuffer, hexToBytes, bytesToHex } from './BitBuffer';
export {
  DbcError,
  InvalidIdentifierError,
  BitRangeExceededError,
  ValueOutOfRangeError,
  SignalNotOwnedByNodeError,
  NoAttributeValueError,
  TypeMismatchError,
  StructuralInvariantViolationError,
  UnknownObjectError,
  MissingSignalValueError,
  DbcParseError,
  isDbcError,
} from './errors';
export type { DbcErrorKind, SourceLocation } from './errors';
export {
  motorolaOffset,
  motorolaStartBit,
  signalBitIndices,
  signExtend,
  rawBounds,
} from './helpers';
export type {
  ByteOrder,
  SignalValueKind,
  MuxRange,
  MultiplexerRole,
  ValueTable,
  AttributeObjectKind,
  AttributeScalar,
  NumericAttributeDefinition,
  StringAttributeDefinition,
  EnumAttributeDefinition,
  AttributeDefinition,
  AttributeValueType,
  AttributeValue,
  Signal,
  SignalGroup,
  Message,
  Node,
  EnvironmentVariable,
  EnvironmentVariableType,
  EnvironmentVariableAccess,
  AttributeTarget,
} from './model/types';
export { Database } from './model/Database';
export type { DatabaseParts, DatabaseOptions } from './model/Database';
export { DatabaseBuilder } from './model/DatabaseBuilder';
export type {
  DatabaseSchema,
  NodeSchema,
  MessageSchema,
  SignalSchema,
  EnvironmentVariableSchema,
  AttributeValuesSchema,
  ValueTableSchema,
} from './model/DatabaseBuilder';
export { findMultiplexor, isActiveFor, canCoexist } from './model/multiplexing';
export {
  decodeArbitrationId,
  encodeArbitrationId,
  withSourceAddress,
  formatFrameId,
  MAX_STANDARD_ID,
  MAX_EXTENDED_ID,
} from './frameId/ArbitrationId';
export type { ArbitrationId, IdScheme, StandardId, ExtendedId, RawFrameId } from './frameId/ArbitrationId';
export { decodeJ1939, encodeJ1939, j1939FromPgn, computePgn, isPdu2 } from './frameId/j1939';
export type { J1939Id } from './frameId/j1939';
export {
  decodeGMParameterId,
  encodeGMParameterId,
  decodeGMParameterIdStandard,
  encodeGMParameterIdStandard,
} from './frameId/gmParameterId';
export type { GMParameterId, GMParameterIdStandard } from './frameId/gmParameterId';
export { AttributeResolver } from './attributes/AttributeResolver';
export type { AttributeSource } from './attributes/AttributeResolver';
export { checkAttributeValue } from './attributes/checkAttributeValue';
export { ATTR, J1939_FRAME_FORMAT } from './attributes/names';
export type { Codec } from './codecs/Codec';
export type { DecodedSignal, DecodedMessage } from './codecs/DecodedSignal';
export { physicalValues, labelledValues } from './codecs/DecodedSignal';
export { SignalCodec } from './codecs/SignalCodec';
export type { SignalValue, SignalCodecOptions } from './codecs/SignalCodec';
export { MessageCodec } from './codecs/MessageCodec';
export type { SignalValues, MessageCodecOptions } from './codecs/MessageCodec';
export { NodeScopedCodec } from './codecs/NodeScopedCodec';
export type { EncodedFrame } from './codecs/NodeScopedCodec';
export { parseDbc } from './parser/DbcParser';
export { convertDbcToSchema, loadDbc, NO_NODE } from './parser/toDatabase';
export type { DbcFile, DbcStatement } from './parser/types';
