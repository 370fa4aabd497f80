export { parseDbc } from './DbcParser';
export { convertDbcToSchema, loadDbc, NO_NODE } from './toDatabase';
export type {
  DbcFile,
  DbcStatement,
  DbcVersion,
  DbcNewSymbols,
  DbcBitTiming,
  DbcNodes,
  DbcValueEntry,
  DbcValueTable,
  DbcMultiplexIndicator,
  DbcSignal,
  DbcMessage,
  DbcMessageTransmitters,
  DbcEnvironmentVariable,
  DbcEnvironmentVariableData,
  DbcObjectRef,
  DbcComment,
  DbcAttributeType,
  DbcAttributeDefinition,
  DbcAttributeDefault,
  DbcAttributeValue,
  DbcValueDescription,
  DbcSignalValueType,
  DbcSignalMultiplexValues,
  DbcSignalGroup,
  DbcUnknownStatement,
} from './types';
