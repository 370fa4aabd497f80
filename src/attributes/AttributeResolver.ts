import { NoAttributeValueError, TypeMismatchError, UnknownObjectError } from '../errors';
import type {
  AttributeDefinition,
  AttributeObjectKind,
  AttributeScalar,
  AttributeTarget,
  AttributeValue,
} from '../model/types';

/** Where the resolver finds definitions and database-level values. */
export interface AttributeSource {
  readonly attributeDefinitions: readonly AttributeDefinition[];
  /** Values attached to the database itself. */
  readonly attributes: readonly AttributeValue[];
}

/**
 * Computes effective attribute values.
 *
 * Lookup is two-tier: an explicit value attached to the object wins,
 * otherwise the definition's default applies. The default therefore reaches
 * every object of the definition's kind, whether or not the object carries
 * any attribute of its own.
 */
export class AttributeResolver {
  private readonly source: AttributeSource;
  private readonly byName: Map<string, AttributeDefinition>;

  constructor(source: AttributeSource) {
    this.source = source;
    this.byName = new Map(source.attributeDefinitions.map(d => [d.name, d]));
  }

  /** Look up a definition by name. */
  definition(name: string): AttributeDefinition | undefined {
    return this.byName.get(name);
  }

  /**
   * Resolve one attribute of `target`.
   *
   * @throws TypeMismatchError if the definition belongs to another object kind
   * @throws NoAttributeValueError if neither an explicit value nor a default exists
   * @throws UnknownObjectError if the definition is given by a name that is not defined
   */
  resolve(target: AttributeTarget, definition: AttributeDefinition | string): AttributeScalar {
    const def = this.lookup(definition);
    if (def.objectKind !== target.kind) {
      throw new TypeMismatchError(
        `Attribute '${def.name}' is defined for ${def.objectKind} objects, not ${target.kind} '${targetName(target)}'`,
      );
    }

    const explicit = attributesOf(target, this.source).find(a => a.definition.name === def.name);
    if (explicit?.value !== undefined) {
      return explicit.value;
    }
    if (def.defaultValue !== undefined) {
      return def.defaultValue;
    }
    throw new NoAttributeValueError(
      `No value for attribute '${def.name}' on ${target.kind} '${targetName(target)}' and no default declared`,
    );
  }

  /**
   * Like {@link resolve}, but returns undefined when the attribute is not
   * defined or has no value.
   */
  tryResolve(target: AttributeTarget, name: string): AttributeScalar | undefined {
    const def = this.byName.get(name);
    if (!def || def.objectKind !== target.kind) {
      return undefined;
    }
    try {
      return this.resolve(target, def);
    } catch (e) {
      if (e instanceof NoAttributeValueError) {
        return undefined;
      }
      throw e;
    }
  }

  /** Numeric form of {@link tryResolve}; non-numeric values yield undefined. */
  tryResolveNumber(target: AttributeTarget, name: string): number | undefined {
    const value = this.tryResolve(target, name);
    return typeof value === 'number' ? value : undefined;
  }

  /**
   * Resolve every attribute defined for the target's kind. Definitions with
   * neither an explicit value nor a default are left out.
   */
  resolveAll(target: AttributeTarget): Record<string, AttributeScalar> {
    const result: Record<string, AttributeScalar> = {};
    for (const def of this.definitionsFor(target.kind)) {
      const value = this.tryResolve(target, def.name);
      if (value !== undefined) {
        result[def.name] = value;
      }
    }
    return result;
  }

  /**
   * Index of the resolved value in an ENUM definition's labels.
   *
   * @throws TypeMismatchError if the attribute is not an ENUM
   */
  resolveEnumIndex(target: AttributeTarget, definition: AttributeDefinition | string): number {
    const def = this.lookup(definition);
    if (def.valueType !== 'ENUM') {
      throw new TypeMismatchError(`Attribute '${def.name}' is ${def.valueType}, not ENUM`);
    }
    const value = this.resolve(target, def);
    return def.values.indexOf(String(value));
  }

  /**
   * Resolved value as display text: ENUM values are already labels, numbers
   * are formatted (HEX as `0x..`).
   */
  resolveLabel(target: AttributeTarget, definition: AttributeDefinition | string): string {
    const def = this.lookup(definition);
    const value = this.resolve(target, def);
    if (typeof value === 'number' && def.valueType === 'HEX') {
      return '0x' + value.toString(16).toUpperCase();
    }
    return String(value);
  }

  /** All definitions owned by the given object kind, in declaration order. */
  definitionsFor(kind: AttributeObjectKind): AttributeDefinition[] {
    return this.source.attributeDefinitions.filter(d => d.objectKind === kind);
  }

  private lookup(definition: AttributeDefinition | string): AttributeDefinition {
    if (typeof definition !== 'string') {
      return definition;
    }
    const def = this.byName.get(definition);
    if (!def) {
      throw new UnknownObjectError(`No attribute definition named '${definition}'`);
    }
    return def;
  }
}

function attributesOf(target: AttributeTarget, source: AttributeSource): readonly AttributeValue[] {
  switch (target.kind) {
    case 'Node':
      return target.node.attributes;
    case 'Message':
      return target.message.attributes;
    case 'Signal':
      return target.signal.attributes;
    case 'EnvironmentVariable':
      return target.variable.attributes;
    case 'Database':
      return source.attributes;
  }
}

function targetName(target: AttributeTarget): string {
  switch (target.kind) {
    case 'Node':
      return target.node.name;
    case 'Message':
      return target.message.name;
    case 'Signal':
      return `${target.message.name}.${target.signal.name}`;
    case 'EnvironmentVariable':
      return target.variable.name;
    case 'Database':
      return 'database';
  }
}
