import { checkAttributeValue } from '../attributes/checkAttributeValue';
import { StructuralInvariantViolationError, UnknownObjectError } from '../errors';
import type { Database, DatabaseOptions } from '../model/Database';
import { DatabaseBuilder } from '../model/DatabaseBuilder';
import type {
  AttributeValuesSchema,
  DatabaseSchema,
  EnvironmentVariableSchema,
  MessageSchema,
  NodeSchema,
  SignalSchema,
  ValueTableSchema,
} from '../model/DatabaseBuilder';
import type {
  AttributeDefinition,
  EnvironmentVariableAccess,
  EnvironmentVariableType,
  MultiplexerRole,
  NumericAttributeDefinition,
  SignalValueKind,
} from '../model/types';
import { parseDbc } from './DbcParser';
import type {
  DbcAttributeDefinition,
  DbcEnvironmentVariable,
  DbcFile,
  DbcMessage,
  DbcObjectRef,
  DbcSignal,
  DbcSignalMultiplexValues,
  DbcStatement,
  DbcValueEntry,
} from './types';

/** Placeholder node name meaning "no node". */
export const NO_NODE = 'Vector__XXX';

/** Pseudo-message holding signals that belong to no message. */
const INDEPENDENT_SIGNALS_MESSAGE = 'VECTOR__INDEPENDENT_SIG_MSG';

const EXTENDED_FLAG = 0x80000000;

const ACCESS_TYPES: readonly EnvironmentVariableAccess[] = ['unrestricted', 'read', 'write', 'readWrite'];

/**
 * Convert a parsed DBC file to a {@link DatabaseSchema}.
 *
 * @throws UnknownObjectError if a statement refers to a message, signal, node
 *   or environment variable that is not declared
 * @throws StructuralInvariantViolationError for nested multiplexing
 */
export function convertDbcToSchema(file: DbcFile): DatabaseSchema {
  const schema: DatabaseSchema = {
    nodes: [],
    messages: [],
    attributeDefinitions: [],
    attributes: {},
    valueTables: {},
    environmentVariables: [],
  };
  const nodes = new Map<string, NodeSchema>();
  const messages = new Map<number, MessageSchema>();
  const environmentVariables = new Map<string, EnvironmentVariableSchema>();
  const definitions: DbcAttributeDefinition[] = [];
  const defaults = new Map<string, number | string>();
  const valueKinds = new Map<string, SignalValueKind>();
  const multiplexRanges = new Map<string, DbcSignalMultiplexValues>();
  // ids of pseudo messages; statements about their signals are dropped
  const skippedIds = new Set<number>();

  // First pass: declarations
  for (const statement of file.statements) {
    if (statement.kind === 'Message' && statement.name === INDEPENDENT_SIGNALS_MESSAGE) {
      skippedIds.add(statement.id);
    }
  }
  for (const statement of file.statements) {
    if (isSkipped(statement, skippedIds)) {
      continue;
    }
    switch (statement.kind) {
      case 'Version':
        schema.version = statement.version;
        break;
      case 'Nodes':
        for (const name of statement.names) {
          const node: NodeSchema = { name };
          nodes.set(name, node);
          schema.nodes?.push(node);
        }
        break;
      case 'ValueTable':
        if (schema.valueTables) {
          schema.valueTables[statement.name] = toValueTable(statement.entries);
        }
        break;
      case 'Message':
        messages.set(statement.id, convertMessage(statement));
        break;
      case 'EnvironmentVariable': {
        const variable = convertEnvironmentVariable(statement);
        environmentVariables.set(variable.name, variable);
        schema.environmentVariables?.push(variable);
        break;
      }
      case 'AttributeDefinition':
        definitions.push(statement);
        break;
      case 'AttributeDefault':
        defaults.set(statement.name, statement.value);
        break;
      case 'SignalValueType':
        if (statement.valueType === 1 || statement.valueType === 2) {
          valueKinds.set(signalKey(statement.id, statement.signal), statement.valueType === 1 ? 'float' : 'double');
        }
        break;
      case 'SignalMultiplexValues':
        multiplexRanges.set(signalKey(statement.id, statement.signal), statement);
        break;
      default:
        break;
    }
  }

  schema.attributeDefinitions = definitions.map(d => convertDefinition(d, defaults.get(d.name)));

  const lookup = new Lookup(nodes, messages, environmentVariables);

  // Second pass: everything that refers to a declaration
  for (const statement of file.statements) {
    if (isSkipped(statement, skippedIds)) {
      continue;
    }
    switch (statement.kind) {
      case 'EnvironmentVariableData':
        lookup.environmentVariable(statement.name).type = 'data';
        break;
      case 'MessageTransmitters': {
        const message = lookup.message(statement.id);
        const extra = statement.transmitters.filter(
          t => t !== NO_NODE && t !== message.transmitter && !message.additionalTransmitters?.includes(t),
        );
        message.additionalTransmitters = [...(message.additionalTransmitters ?? []), ...extra];
        break;
      }
      case 'Comment':
        if (statement.target.kind === 'Database') {
          break;
        }
        lookup.object(statement.target).comment = statement.text;
        break;
      case 'AttributeValue': {
        const attributes = statement.target.kind === 'Database'
          ? attributesOf(schema)
          : attributesOf(lookup.object(statement.target));
        attributes[statement.name] = statement.value;
        break;
      }
      case 'ValueDescription': {
        const table = toValueTable(statement.entries);
        if (statement.target.kind === 'Signal') {
          lookup.signal(statement.target.id, statement.target.signal).valueTable = table;
        } else {
          lookup.environmentVariable(statement.target.name).valueTable = table;
        }
        break;
      }
      case 'SignalGroup': {
        const message = lookup.message(statement.id);
        for (const name of statement.signals) {
          lookup.signal(statement.id, name);
        }
        message.signalGroups = [
          ...(message.signalGroups ?? []),
          { name: statement.name, repetitions: statement.repetitions, signalNames: statement.signals },
        ];
        break;
      }
      default:
        break;
    }
  }

  for (const [key, kind] of valueKinds) {
    const [id, name] = splitKey(key);
    lookup.signal(id, name).valueKind = kind;
  }
  for (const [key, statement] of multiplexRanges) {
    const [id, name] = splitKey(key);
    const signal = lookup.signal(id, name);
    lookup.signal(id, statement.multiplexor);
    if (signal.multiplexer?.kind === 'IsMultiplexor') {
      throw new StructuralInvariantViolationError(
        `Signal '${signal.name}' is both a multiplexor and multiplexed (nested multiplexing is not supported)`,
      );
    }
    signal.multiplexer = {
      kind: 'MultiplexedByRange',
      multiplexor: statement.multiplexor,
      ranges: statement.ranges.map(r => ({ lower: r.lower, upper: r.upper })),
    };
  }

  schema.messages = [...messages.values()];
  return schema;
}

/**
 * Parse DBC text and build a validated {@link Database}.
 *
 * @throws DbcParseError on syntax errors, and the build-time errors of
 *   {@link DatabaseBuilder.build}
 */
export function loadDbc(input: string, options: DatabaseOptions = {}): Database {
  return DatabaseBuilder.build(convertDbcToSchema(parseDbc(input)), options);
}

function convertMessage(message: DbcMessage): MessageSchema {
  const isExtended = message.id >= EXTENDED_FLAG;
  return {
    name: message.name,
    frameId: isExtended ? message.id - EXTENDED_FLAG : message.id,
    isExtended,
    byteLength: message.size,
    transmitter: message.transmitter === NO_NODE ? null : message.transmitter,
    additionalTransmitters: [],
    signals: message.signals.map(s => convertSignal(message, s)),
  };
}

function convertSignal(message: DbcMessage, signal: DbcSignal): SignalSchema {
  const converted: SignalSchema = {
    name: signal.name,
    startBit: signal.startBit,
    bitLength: signal.bitLength,
    byteOrder: signal.byteOrder,
    valueKind: signal.signed ? 'signed' : 'unsigned',
    factor: signal.factor,
    offset: signal.offset,
    unit: signal.unit,
    multiplexer: multiplexerRole(message, signal),
    receivers: signal.receivers.filter(r => r !== NO_NODE),
  };
  // [0|0] means no range
  if (signal.minimum !== 0 || signal.maximum !== 0) {
    converted.minimum = signal.minimum;
    converted.maximum = signal.maximum;
  }
  return converted;
}

function multiplexerRole(message: DbcMessage, signal: DbcSignal): MultiplexerRole {
  const indicator = signal.multiplexer;
  if (indicator === null) {
    return { kind: 'None' };
  }
  if (indicator.switchValue === undefined) {
    return { kind: 'IsMultiplexor' };
  }
  if (indicator.isMultiplexor) {
    throw new StructuralInvariantViolationError(
      `Signal '${message.name}.${signal.name}' is both a multiplexor and multiplexed (nested multiplexing is not supported)`,
    );
  }
  return { kind: 'MultiplexedBy', switchValue: indicator.switchValue };
}

function convertEnvironmentVariable(variable: DbcEnvironmentVariable): EnvironmentVariableSchema {
  // DUMMY_NODE_VECTOR<hex>: low two bits are the access type, 0x8000 marks a string
  const flags = parseInt(variable.access.replace(/^DUMMY_NODE_VECTOR/, ''), 16);
  const accessFlags = Number.isNaN(flags) ? 0 : flags;
  const types: readonly EnvironmentVariableType[] = ['integer', 'float', 'string'];
  return {
    name: variable.name,
    type: (accessFlags & 0x8000) !== 0 ? 'string' : types[variable.varType] ?? 'integer',
    minimum: variable.minimum,
    maximum: variable.maximum,
    unit: variable.unit,
    initialValue: variable.initialValue,
    id: variable.id,
    access: ACCESS_TYPES[accessFlags & 0x3],
    accessNodes: variable.accessNodes.filter(n => n !== NO_NODE),
  };
}

function convertDefinition(definition: DbcAttributeDefinition, defaultValue: number | string | undefined): AttributeDefinition {
  const { name, objectKind, type } = definition;
  switch (type.valueType) {
    case 'INT':
    case 'HEX':
    case 'FLOAT': {
      const base: NumericAttributeDefinition = {
        name,
        objectKind,
        valueType: type.valueType,
        minimum: type.minimum,
        maximum: type.maximum,
      };
      if (defaultValue === undefined) return base;
      const value = checkAttributeValue(base, defaultValue);
      return typeof value === 'number' ? { ...base, defaultValue: value } : base;
    }
    case 'STRING':
      if (defaultValue === undefined) return { name, objectKind, valueType: 'STRING' };
      return { name, objectKind, valueType: 'STRING', defaultValue: String(defaultValue) };
    case 'ENUM': {
      const base = { name, objectKind, valueType: 'ENUM' as const, values: type.values };
      if (defaultValue === undefined) return base;
      return { ...base, defaultValue: String(checkAttributeValue(base, defaultValue)) };
    }
  }
}

function toValueTable(entries: readonly DbcValueEntry[]): ValueTableSchema {
  const table: ValueTableSchema = {};
  for (const entry of entries) {
    table[String(entry.value)] = entry.label;
  }
  return table;
}

/** Whether the statement declares or refers to a message in `skippedIds`. */
function isSkipped(statement: DbcStatement, skippedIds: ReadonlySet<number>): boolean {
  switch (statement.kind) {
    case 'Message':
    case 'MessageTransmitters':
    case 'SignalValueType':
    case 'SignalMultiplexValues':
    case 'SignalGroup':
      return skippedIds.has(statement.id);
    case 'Comment':
    case 'AttributeValue':
    case 'ValueDescription': {
      const { target } = statement;
      return (target.kind === 'Message' || target.kind === 'Signal') && skippedIds.has(target.id);
    }
    default:
      return false;
  }
}

function signalKey(id: number, signal: string): string {
  return `${id}:${signal}`;
}

function splitKey(key: string): [number, string] {
  const index = key.indexOf(':');
  return [Number(key.slice(0, index)), key.slice(index + 1)];
}

function attributesOf(target: { attributes?: AttributeValuesSchema }): AttributeValuesSchema {
  const attributes = target.attributes ?? {};
  target.attributes = attributes;
  return attributes;
}

/** Resolves the references DBC statements make to declared objects. */
class Lookup {
  private readonly nodes: ReadonlyMap<string, NodeSchema>;
  private readonly messages: ReadonlyMap<number, MessageSchema>;
  private readonly environmentVariables: ReadonlyMap<string, EnvironmentVariableSchema>;

  constructor(
    nodes: ReadonlyMap<string, NodeSchema>,
    messages: ReadonlyMap<number, MessageSchema>,
    environmentVariables: ReadonlyMap<string, EnvironmentVariableSchema>,
  ) {
    this.nodes = nodes;
    this.messages = messages;
    this.environmentVariables = environmentVariables;
  }

  node(name: string): NodeSchema {
    const node = this.nodes.get(name);
    if (!node) {
      throw new UnknownObjectError(`Reference to undeclared node '${name}'`);
    }
    return node;
  }

  message(id: number): MessageSchema {
    const message = this.messages.get(id);
    if (!message) {
      throw new UnknownObjectError(`Reference to undeclared message ${id}`);
    }
    return message;
  }

  signal(id: number, name: string): SignalSchema {
    const message = this.message(id);
    const signal = message.signals?.find(s => s.name === name);
    if (!signal) {
      throw new UnknownObjectError(`Reference to undeclared signal '${message.name}.${name}'`);
    }
    return signal;
  }

  environmentVariable(name: string): EnvironmentVariableSchema {
    const variable = this.environmentVariables.get(name);
    if (!variable) {
      throw new UnknownObjectError(`Reference to undeclared environment variable '${name}'`);
    }
    return variable;
  }

  object(ref: Exclude<DbcObjectRef, { kind: 'Database' }>): NodeSchema | MessageSchema | SignalSchema | EnvironmentVariableSchema {
    switch (ref.kind) {
      case 'Node':
        return this.node(ref.name);
      case 'Message':
        return this.message(ref.id);
      case 'Signal':
        return this.signal(ref.id, ref.signal);
      case 'EnvironmentVariable':
        return this.environmentVariable(ref.name);
    }
  }
}
