import { AttributeResolver } from '../attributes/AttributeResolver';
import { ATTR, J1939_FRAME_FORMAT } from '../attributes/names';
import { MessageCodec } from '../codecs/MessageCodec';
import type { MessageCodecOptions, SignalValues } from '../codecs/MessageCodec';
import type { DecodedMessage } from '../codecs/DecodedSignal';
import { StructuralInvariantViolationError, UnknownObjectError } from '../errors';
import { decodeArbitrationId, formatFrameId } from '../frameId/ArbitrationId';
import type { ArbitrationId, IdScheme } from '../frameId/ArbitrationId';
import { validateDatabase } from './validate';
import type {
  AttributeDefinition,
  AttributeValue,
  EnvironmentVariable,
  Message,
  Node,
  Signal,
  ValueTable,
} from './types';

export interface DatabaseParts {
  version?: string;
  nodes: readonly Node[];
  messages: readonly Message[];
  attributeDefinitions: readonly AttributeDefinition[];
  /** Values attached to the database itself. */
  attributes: readonly AttributeValue[];
  /** Named tables (`VAL_TABLE_`). */
  valueTables?: ReadonlyMap<string, ValueTable>;
  environmentVariables?: readonly EnvironmentVariable[];
}

export interface DatabaseOptions {
  /**
   * Also reject overlapping signals, references to undeclared nodes and
   * frame ids that collide under `frameIdMask`. Default true.
   */
  strict?: boolean;
  /** Applied to frame ids before lookup by id. Default 0xFFFFFFFF. */
  frameIdMask?: number;
}

/**
 * A validated, read-only CAN database with the indexes the codecs need.
 *
 * Transmit and receive relations are name-indexed maps built once from the
 * messages' transmitters and the signals' receivers.
 */
export class Database {
  readonly version: string;
  readonly nodes: readonly Node[];
  readonly messages: readonly Message[];
  readonly attributeDefinitions: readonly AttributeDefinition[];
  readonly attributes: readonly AttributeValue[];
  readonly valueTables: ReadonlyMap<string, ValueTable>;
  readonly environmentVariables: readonly EnvironmentVariable[];
  readonly strict: boolean;
  readonly frameIdMask: number;
  readonly resolver: AttributeResolver;

  private readonly nodesByName = new Map<string, Node>();
  private readonly messagesByName = new Map<string, Message>();
  private readonly messagesById = new Map<number, Message>();
  /** node → names of messages it transmits */
  private readonly txIndex = new Map<string, Set<string>>();
  /** node → message → names of signals it receives */
  private readonly rxIndex = new Map<string, Map<string, Set<string>>>();
  private readonly codecs = new Map<Message, MessageCodec>();

  constructor(parts: DatabaseParts, options: DatabaseOptions = {}) {
    this.version = parts.version ?? '';
    this.nodes = parts.nodes;
    this.messages = parts.messages;
    this.attributeDefinitions = parts.attributeDefinitions;
    this.attributes = parts.attributes;
    this.valueTables = parts.valueTables ?? new Map();
    this.environmentVariables = parts.environmentVariables ?? [];
    this.strict = options.strict ?? true;
    this.frameIdMask = options.frameIdMask ?? 0xffffffff;

    validateDatabase(this, this.strict);
    this.resolver = new AttributeResolver(this);

    for (const node of this.nodes) {
      this.nodesByName.set(node.name, node);
    }
    for (const message of this.messages) {
      this.messagesByName.set(message.name, message);
      this.indexFrameId(message);
      this.indexNodes(message);
    }
  }

  getNode(name: string): Node {
    const node = this.nodesByName.get(name);
    if (!node) {
      throw new UnknownObjectError(`No node named '${name}'`);
    }
    return node;
  }

  hasNode(name: string): boolean {
    return this.nodesByName.has(name);
  }

  /**
   * Look a message up by name, or by frame id after applying `frameIdMask`.
   *
   * @throws UnknownObjectError
   */
  getMessage(nameOrFrameId: string | number): Message {
    if (typeof nameOrFrameId === 'number') {
      const message = this.messagesById.get(this.mask(nameOrFrameId));
      if (!message) {
        throw new UnknownObjectError(`No message with frame id ${formatFrameId(nameOrFrameId >>> 0, true)}`);
      }
      return message;
    }
    const message = this.messagesByName.get(nameOrFrameId);
    if (!message) {
      throw new UnknownObjectError(`No message named '${nameOrFrameId}'`);
    }
    return message;
  }

  getSignal(message: Message | string, name: string): Signal {
    const msg = this.toMessage(message);
    const signal = msg.signals.find(s => s.name === name);
    if (!signal) {
      throw new UnknownObjectError(`Message '${msg.name}' has no signal '${name}'`);
    }
    return signal;
  }

  getValueTable(name: string): ValueTable {
    const table = this.valueTables.get(name);
    if (!table) {
      throw new UnknownObjectError(`No value table named '${name}'`);
    }
    return table;
  }

  getEnvironmentVariable(name: string): EnvironmentVariable {
    const variable = this.environmentVariables.find(v => v.name === name);
    if (!variable) {
      throw new UnknownObjectError(`No environment variable named '${name}'`);
    }
    return variable;
  }

  /** Messages the node sends, as transmitter or through `BO_TX_BU_`. */
  transmittedMessages(node: Node | string): Message[] {
    const names = this.txIndex.get(this.toNode(node).name);
    return this.messages.filter(m => names?.has(m.name) ?? false);
  }

  transmits(node: Node | string, message: Message | string): boolean {
    const msg = this.toMessage(message);
    return this.txIndex.get(this.toNode(node).name)?.has(msg.name) ?? false;
  }

  /** Signals of `message` the node receives, in definition order. */
  receivedSignals(node: Node | string, message: Message | string): Signal[] {
    const msg = this.toMessage(message);
    const names = this.rxIndex.get(this.toNode(node).name)?.get(msg.name);
    return msg.signals.filter(s => names?.has(s.name) ?? false);
  }

  /** Messages with at least one signal the node receives. */
  receivedMessages(node: Node | string): Message[] {
    const byMessage = this.rxIndex.get(this.toNode(node).name);
    return this.messages.filter(m => byMessage?.has(m.name) ?? false);
  }

  /** Union of the receivers of the message's signals, in first-seen order. */
  messageReceivers(message: Message | string): string[] {
    const msg = this.toMessage(message);
    const receivers = new Set<string>();
    for (const signal of msg.signals) {
      for (const name of signal.receivers) {
        receivers.add(name);
      }
    }
    return [...receivers];
  }

  /**
   * Identifier layout of a message: `VFrameFormat` = `J1939PG` on the
   * message, then `UseGMParameterIDs` = 1 on the database, then
   * `ProtocolType` = `J1939` on the database.
   */
  idScheme(message: Message | string): IdScheme {
    const msg = this.toMessage(message);
    const frameFormat = this.resolver.tryResolve({ kind: 'Message', message: msg }, ATTR.VFrameFormat);
    if (frameFormat === J1939_FRAME_FORMAT) {
      return 'j1939';
    }
    if (this.usesGMParameterIds()) {
      return 'gmParameterId';
    }
    if (this.resolver.tryResolve({ kind: 'Database' }, ATTR.ProtocolType) === 'J1939') {
      return 'j1939';
    }
    return 'standard';
  }

  arbitrationId(message: Message | string): ArbitrationId {
    const msg = this.toMessage(message);
    return decodeArbitrationId(msg.frameId, msg.isExtended, this.idScheme(msg));
  }

  /** Cached codec for a message with default options. */
  codec(message: Message | string): MessageCodec {
    const msg = this.toMessage(message);
    let codec = this.codecs.get(msg);
    if (!codec) {
      codec = new MessageCodec(msg, { resolver: this.resolver });
      this.codecs.set(msg, codec);
    }
    return codec;
  }

  encodeMessage(
    message: Message | string,
    values: SignalValues,
    options: Omit<MessageCodecOptions, 'resolver'> = {},
  ): Uint8Array {
    const msg = this.toMessage(message);
    const codec = options.scaling === undefined && options.padding === undefined
      ? this.codec(msg)
      : new MessageCodec(msg, { ...options, resolver: this.resolver });
    return codec.encodeBytes(values);
  }

  decodeMessage(message: Message | string, data: ArrayLike<number>): Record<string, number> {
    return this.codec(message).decodeBytes(data);
  }

  /** Find the message by frame id and decode its payload. */
  decodeFrame(frameId: number, data: ArrayLike<number>): DecodedMessage {
    return this.codec(this.getMessage(frameId)).decodeBytesWithMetadata(data);
  }

  private usesGMParameterIds(): boolean {
    const target = { kind: 'Database' } as const;
    const value = this.resolver.tryResolve(target, ATTR.UseGMParameterIDs);
    if (value === undefined) {
      return false;
    }
    const def = this.resolver.definition(ATTR.UseGMParameterIDs);
    if (def?.valueType === 'ENUM') {
      return this.resolver.resolveEnumIndex(target, def) === 1;
    }
    return value === 1;
  }

  private toNode(node: Node | string): Node {
    return typeof node === 'string' ? this.getNode(node) : node;
  }

  private toMessage(message: Message | string): Message {
    return typeof message === 'string' ? this.getMessage(message) : message;
  }

  private mask(frameId: number): number {
    return (frameId & this.frameIdMask) >>> 0;
  }

  private indexFrameId(message: Message): void {
    const key = this.mask(message.frameId);
    const existing = this.messagesById.get(key);
    if (existing && this.strict) {
      throw new StructuralInvariantViolationError(
        `Messages '${existing.name}' and '${message.name}' share frame id ` +
        `${formatFrameId(key, message.isExtended)} under mask 0x${this.frameIdMask.toString(16).toUpperCase()}`,
      );
    }
    if (!existing) {
      this.messagesById.set(key, message);
    }
  }

  private indexNodes(message: Message): void {
    const senders = message.transmitter === null
      ? message.additionalTransmitters
      : [message.transmitter, ...message.additionalTransmitters];
    for (const sender of senders) {
      let sent = this.txIndex.get(sender);
      if (!sent) {
        sent = new Set();
        this.txIndex.set(sender, sent);
      }
      sent.add(message.name);
    }
    for (const signal of message.signals) {
      for (const receiver of signal.receivers) {
        let byMessage = this.rxIndex.get(receiver);
        if (!byMessage) {
          byMessage = new Map();
          this.rxIndex.set(receiver, byMessage);
        }
        let names = byMessage.get(message.name);
        if (!names) {
          names = new Set();
          byMessage.set(message.name, names);
        }
        names.add(signal.name);
      }
    }
  }
}
