import { StructuralInvariantViolationError, TypeMismatchError } from '../errors';
import { checkAttributeValue } from '../attributes/checkAttributeValue';
import { decodeArbitrationId } from '../frameId/ArbitrationId';
import { signalBitIndices, signalFits } from '../helpers';
import { canCoexist } from './multiplexing';
import type {
  AttributeDefinition,
  AttributeObjectKind,
  AttributeValue,
  EnvironmentVariable,
  Message,
  Node,
  Signal,
} from './types';

export interface ValidationInput {
  readonly nodes: readonly Node[];
  readonly messages: readonly Message[];
  readonly attributeDefinitions: readonly AttributeDefinition[];
  readonly attributes: readonly AttributeValue[];
  readonly environmentVariables: readonly EnvironmentVariable[];
}

/** Largest payload accepted (CAN FD). */
export const MAX_PAYLOAD_BYTES = 64;

/**
 * Check the structural invariants of a database.
 *
 * Always checked: unique names, signal spans, value widths, multiplexing
 * shape, attribute kinds and values. Only in strict mode: overlapping
 * signals and references to undeclared nodes.
 *
 * @throws StructuralInvariantViolationError, TypeMismatchError,
 *   ValueOutOfRangeError or InvalidIdentifierError on the first violation
 */
export function validateDatabase(input: ValidationInput, strict: boolean): void {
  const definitions = checkDefinitions(input.attributeDefinitions);
  checkAttributes(input.attributes, 'Database', 'database', definitions);

  const nodeNames = uniqueNames(input.nodes, 'node');
  for (const node of input.nodes) {
    checkAttributes(node.attributes, 'Node', node.name, definitions);
  }

  uniqueNames(input.messages, 'message');
  for (const message of input.messages) {
    validateMessage(message, definitions);
    if (strict) {
      checkOverlaps(message);
      const senders = message.transmitter === null
        ? message.additionalTransmitters
        : [message.transmitter, ...message.additionalTransmitters];
      checkNodeRefs(senders, nodeNames, `transmitter of message '${message.name}'`);
      for (const signal of message.signals) {
        checkNodeRefs(signal.receivers, nodeNames, `receiver of signal '${message.name}.${signal.name}'`);
      }
    }
  }

  uniqueNames(input.environmentVariables, 'environment variable');
  for (const variable of input.environmentVariables) {
    checkAttributes(variable.attributes, 'EnvironmentVariable', variable.name, definitions);
    if (strict) {
      checkNodeRefs(variable.accessNodes, nodeNames, `access node of environment variable '${variable.name}'`);
    }
  }
}

function validateMessage(message: Message, definitions: ReadonlyMap<string, AttributeDefinition>): void {
  decodeArbitrationId(message.frameId, message.isExtended);

  if (!Number.isInteger(message.byteLength) || message.byteLength < 0 || message.byteLength > MAX_PAYLOAD_BYTES) {
    throw violation(`Message '${message.name}' has invalid length ${message.byteLength}`);
  }

  checkAttributes(message.attributes, 'Message', message.name, definitions);
  uniqueNames(message.signals, `signal in message '${message.name}'`);

  const multiplexors = message.signals.filter(s => s.multiplexer.kind === 'IsMultiplexor');
  if (multiplexors.length > 1) {
    throw violation(
      `Message '${message.name}' has ${multiplexors.length} multiplexor signals: ${multiplexors.map(s => s.name).join(', ')}`,
    );
  }

  for (const signal of message.signals) {
    validateSignal(message, signal);
    checkAttributes(signal.attributes, 'Signal', `${message.name}.${signal.name}`, definitions);

    const role = signal.multiplexer;
    if (role.kind === 'MultiplexedBy' || role.kind === 'MultiplexedByRange') {
      if (multiplexors.length !== 1) {
        throw violation(`Signal '${message.name}.${signal.name}' is multiplexed but the message has no multiplexor`);
      }
      if (role.kind === 'MultiplexedByRange') {
        if (role.multiplexor !== multiplexors[0].name) {
          throw violation(
            `Signal '${message.name}.${signal.name}' is multiplexed by '${role.multiplexor}', ` +
            `but the message multiplexor is '${multiplexors[0].name}'`,
          );
        }
        if (role.ranges.length === 0 || role.ranges.some(r => r.lower > r.upper)) {
          throw violation(`Signal '${message.name}.${signal.name}' has an empty multiplexor range`);
        }
      }
    }
  }

  for (const group of message.signalGroups) {
    for (const name of group.signalNames) {
      if (!message.signals.some(s => s.name === name)) {
        throw violation(`Signal group '${group.name}' names unknown signal '${message.name}.${name}'`);
      }
    }
  }
}

function validateSignal(message: Message, signal: Signal): void {
  const label = `Signal '${message.name}.${signal.name}'`;
  if (!Number.isInteger(signal.bitLength) || signal.bitLength < 1 || signal.bitLength > 64) {
    throw violation(`${label} has invalid length ${signal.bitLength}`);
  }
  if (!Number.isInteger(signal.startBit)) {
    throw violation(`${label} has invalid start bit ${signal.startBit}`);
  }
  if (!signalFits(signal, message.byteLength * 8)) {
    throw violation(
      `${label} (start ${signal.startBit}, length ${signal.bitLength}, ${signal.byteOrder} endian) ` +
      `does not fit in ${message.byteLength} bytes`,
    );
  }
  if (signal.valueKind === 'float' && signal.bitLength !== 32) {
    throw violation(`${label} is a float and must be 32 bits, not ${signal.bitLength}`);
  }
  if (signal.valueKind === 'double' && signal.bitLength !== 64) {
    throw violation(`${label} is a double and must be 64 bits, not ${signal.bitLength}`);
  }
  if (!Number.isFinite(signal.factor) || signal.factor === 0 || !Number.isFinite(signal.offset)) {
    throw violation(`${label} has invalid scaling (${signal.factor}, ${signal.offset})`);
  }
}

function checkOverlaps(message: Message): void {
  const owners = new Map<number, Signal[]>();
  for (const signal of message.signals) {
    for (const index of signalBitIndices(signal)) {
      const others = owners.get(index) ?? [];
      const clash = others.find(o => canCoexist(o.multiplexer, signal.multiplexer));
      if (clash) {
        throw violation(
          `Signals '${clash.name}' and '${signal.name}' overlap at bit ${index} in message '${message.name}'`,
        );
      }
      others.push(signal);
      owners.set(index, others);
    }
  }
}

function checkDefinitions(definitions: readonly AttributeDefinition[]): Map<string, AttributeDefinition> {
  const byName = new Map<string, AttributeDefinition>();
  for (const def of definitions) {
    if (byName.has(def.name)) {
      throw violation(`Duplicate attribute definition '${def.name}'`);
    }
    if (def.defaultValue !== undefined) {
      checkStored(def, def.defaultValue);
    }
    byName.set(def.name, def);
  }
  return byName;
}

function checkAttributes(
  attributes: readonly AttributeValue[],
  kind: AttributeObjectKind,
  owner: string,
  definitions: ReadonlyMap<string, AttributeDefinition>,
): void {
  const seen = new Set<string>();
  for (const attribute of attributes) {
    const def = attribute.definition;
    if (definitions.get(def.name) !== def) {
      throw violation(`Attribute '${def.name}' on ${kind} '${owner}' has no matching definition`);
    }
    if (def.objectKind !== kind) {
      throw new TypeMismatchError(
        `Attribute '${def.name}' is defined for ${def.objectKind} objects but attached to ${kind} '${owner}'`,
      );
    }
    if (seen.has(def.name)) {
      throw violation(`Attribute '${def.name}' is set twice on ${kind} '${owner}'`);
    }
    seen.add(def.name);
    if (attribute.value !== undefined) {
      checkStored(def, attribute.value);
    }
  }
}

/** A stored value must already be in normalized form (ENUM as label). */
function checkStored(def: AttributeDefinition, value: number | string): void {
  if (checkAttributeValue(def, value) !== value) {
    throw new TypeMismatchError(`Attribute '${def.name}' stores ${JSON.stringify(value)} instead of its label`);
  }
}

function checkNodeRefs(names: readonly string[], declared: ReadonlySet<string>, role: string): void {
  for (const name of names) {
    if (!declared.has(name)) {
      throw violation(`Undeclared node '${name}' used as ${role}`);
    }
  }
}

function uniqueNames(items: ReadonlyArray<{ readonly name: string }>, what: string): Set<string> {
  const names = new Set<string>();
  for (const item of items) {
    if (names.has(item.name)) {
      throw violation(`Duplicate ${what} name '${item.name}'`);
    }
    names.add(item.name);
  }
  return names;
}

function violation(message: string): StructuralInvariantViolationError {
  return new StructuralInvariantViolationError(message);
}
