import { checkAttributeValue } from '../attributes/checkAttributeValue';
import { StructuralInvariantViolationError, UnknownObjectError } from '../errors';
import { MAX_STANDARD_ID } from '../frameId/ArbitrationId';
import { Database } from './Database';
import type { DatabaseOptions } from './Database';
import type {
  AttributeDefinition,
  AttributeScalar,
  AttributeValue,
  ByteOrder,
  EnvironmentVariable,
  EnvironmentVariableAccess,
  EnvironmentVariableType,
  Message,
  MultiplexerRole,
  Node,
  Signal,
  SignalGroup,
  SignalValueKind,
  ValueTable,
} from './types';

/** Attribute name → value. ENUM values may be labels or indices. */
export type AttributeValuesSchema = Record<string, AttributeScalar>;

/** Raw value (as a decimal string key) → label. */
export type ValueTableSchema = Record<string, string>;

export interface SignalSchema {
  name: string;
  startBit: number;
  bitLength: number;
  /** Default `little`. */
  byteOrder?: ByteOrder;
  /** Default `unsigned`. */
  valueKind?: SignalValueKind;
  /** Default 1. */
  factor?: number;
  /** Default 0. */
  offset?: number;
  minimum?: number;
  maximum?: number;
  unit?: string;
  /** Default `{ kind: 'None' }`. */
  multiplexer?: MultiplexerRole;
  receivers?: string[];
  /** Name of a database value table, or an inline table. */
  valueTable?: string | ValueTableSchema;
  attributes?: AttributeValuesSchema;
  comment?: string;
}

export interface MessageSchema {
  name: string;
  frameId: number;
  /** Default: true when `frameId` does not fit in 11 bits. */
  isExtended?: boolean;
  byteLength: number;
  /** Default null (no sender). */
  transmitter?: string | null;
  additionalTransmitters?: string[];
  signals?: SignalSchema[];
  signalGroups?: SignalGroup[];
  attributes?: AttributeValuesSchema;
  comment?: string;
}

export interface NodeSchema {
  name: string;
  attributes?: AttributeValuesSchema;
  comment?: string;
}

export interface EnvironmentVariableSchema {
  name: string;
  type?: EnvironmentVariableType;
  minimum?: number;
  maximum?: number;
  unit?: string;
  initialValue?: number;
  id?: number;
  access?: EnvironmentVariableAccess;
  accessNodes?: string[];
  valueTable?: string | ValueTableSchema;
  attributes?: AttributeValuesSchema;
  comment?: string;
}

/**
 * JSON-serializable description of a CAN database. Objects refer to each
 * other and to attribute definitions by name.
 */
export interface DatabaseSchema {
  version?: string;
  nodes?: NodeSchema[];
  messages?: MessageSchema[];
  attributeDefinitions?: AttributeDefinition[];
  /** Values attached to the database itself. */
  attributes?: AttributeValuesSchema;
  valueTables?: Record<string, ValueTableSchema>;
  environmentVariables?: EnvironmentVariableSchema[];
}

/**
 * Builds a validated {@link Database} from a {@link DatabaseSchema}.
 */
export class DatabaseBuilder {
  private readonly definitions: Map<string, AttributeDefinition>;
  private readonly valueTables: Map<string, ValueTable>;

  private constructor(schema: DatabaseSchema) {
    this.definitions = new Map((schema.attributeDefinitions ?? []).map(d => [d.name, d]));
    this.valueTables = new Map();
    for (const [name, table] of Object.entries(schema.valueTables ?? {})) {
      this.valueTables.set(name, toValueTable(table, `value table '${name}'`));
    }
  }

  /**
   * @throws UnknownObjectError for references to undefined attributes or
   *   value tables
   * @throws StructuralInvariantViolationError (and the other build-time
   *   errors) from validation
   */
  static build(schema: DatabaseSchema, options: DatabaseOptions = {}): Database {
    const builder = new DatabaseBuilder(schema);
    return new Database(
      {
        version: schema.version,
        nodes: (schema.nodes ?? []).map(n => builder.node(n)),
        messages: (schema.messages ?? []).map(m => builder.message(m)),
        attributeDefinitions: schema.attributeDefinitions ?? [],
        attributes: builder.attributes(schema.attributes, 'database'),
        valueTables: builder.valueTables,
        environmentVariables: (schema.environmentVariables ?? []).map(v => builder.environmentVariable(v)),
      },
      options,
    );
  }

  private node(schema: NodeSchema): Node {
    return {
      name: schema.name,
      attributes: this.attributes(schema.attributes, `node '${schema.name}'`),
      comment: schema.comment,
    };
  }

  private message(schema: MessageSchema): Message {
    return {
      name: schema.name,
      frameId: schema.frameId,
      isExtended: schema.isExtended ?? schema.frameId > MAX_STANDARD_ID,
      byteLength: schema.byteLength,
      transmitter: schema.transmitter ?? null,
      additionalTransmitters: schema.additionalTransmitters ?? [],
      signals: (schema.signals ?? []).map(s => this.signal(s, schema.name)),
      signalGroups: (schema.signalGroups ?? []).map(g => ({
        name: g.name,
        repetitions: g.repetitions,
        signalNames: [...g.signalNames],
      })),
      attributes: this.attributes(schema.attributes, `message '${schema.name}'`),
      comment: schema.comment,
    };
  }

  private signal(schema: SignalSchema, messageName: string): Signal {
    const owner = `signal '${messageName}.${schema.name}'`;
    return {
      name: schema.name,
      startBit: schema.startBit,
      bitLength: schema.bitLength,
      byteOrder: schema.byteOrder ?? 'little',
      valueKind: schema.valueKind ?? 'unsigned',
      factor: schema.factor ?? 1,
      offset: schema.offset ?? 0,
      minimum: schema.minimum,
      maximum: schema.maximum,
      unit: schema.unit ?? '',
      multiplexer: schema.multiplexer ?? { kind: 'None' },
      receivers: schema.receivers ?? [],
      valueTable: this.valueTable(schema.valueTable, owner),
      attributes: this.attributes(schema.attributes, owner),
      comment: schema.comment,
    };
  }

  private environmentVariable(schema: EnvironmentVariableSchema): EnvironmentVariable {
    const owner = `environment variable '${schema.name}'`;
    return {
      name: schema.name,
      type: schema.type ?? 'integer',
      minimum: schema.minimum ?? 0,
      maximum: schema.maximum ?? 0,
      unit: schema.unit ?? '',
      initialValue: schema.initialValue ?? 0,
      id: schema.id ?? 0,
      access: schema.access ?? 'unrestricted',
      accessNodes: schema.accessNodes ?? [],
      valueTable: this.valueTable(schema.valueTable, owner),
      attributes: this.attributes(schema.attributes, owner),
      comment: schema.comment,
    };
  }

  private attributes(values: AttributeValuesSchema | undefined, owner: string): AttributeValue[] {
    return Object.entries(values ?? {}).map(([name, value]) => {
      const definition = this.definitions.get(name);
      if (!definition) {
        throw new UnknownObjectError(`Attribute '${name}' on ${owner} has no definition`);
      }
      return { definition, value: checkAttributeValue(definition, value) };
    });
  }

  private valueTable(ref: string | ValueTableSchema | undefined, owner: string): ValueTable | undefined {
    if (ref === undefined) {
      return undefined;
    }
    if (typeof ref === 'string') {
      const table = this.valueTables.get(ref);
      if (!table) {
        throw new UnknownObjectError(`${owner} refers to unknown value table '${ref}'`);
      }
      return table;
    }
    return toValueTable(ref, owner);
  }
}

function toValueTable(schema: ValueTableSchema, owner: string): ValueTable {
  const table = new Map<number, string>();
  for (const [key, label] of Object.entries(schema)) {
    const raw = Number(key);
    if (key.trim() === '' || !Number.isInteger(raw)) {
      throw new StructuralInvariantViolationError(`Value table of ${owner} has non-integer key '${key}'`);
    }
    table.set(raw, label);
  }
  return table;
}
