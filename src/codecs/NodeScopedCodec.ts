import { BitBuffer } from '../BitBuffer';
import { SignalNotOwnedByNodeError } from '../errors';
import { ATTR } from '../attributes/names';
import { encodeArbitrationId, withSourceAddress } from '../frameId/ArbitrationId';
import type { ArbitrationId } from '../frameId/ArbitrationId';
import type { Database } from '../model/Database';
import type { Message, Node } from '../model/types';
import type { DecodedMessage, DecodedSignal } from './DecodedSignal';
import { physicalValues } from './DecodedSignal';
import type { SignalValues } from './MessageCodec';

/** A payload ready to put on the bus. */
export interface EncodedFrame {
  frameId: number;
  isExtended: boolean;
  data: Uint8Array;
  arbitrationId: ArbitrationId;
}

/**
 * Encodes and decodes messages from one node's point of view: a node may
 * only write signals of messages it transmits, and sees only the signals it
 * receives.
 */
export class NodeScopedCodec {
  private readonly database: Database;

  constructor(database: Database) {
    this.database = database;
  }

  /**
   * @throws SignalNotOwnedByNodeError if the node does not transmit the
   *   message, or `values` names a signal outside it
   */
  encodeForNode(node: Node | string, message: Message | string, values: SignalValues): Uint8Array {
    const { msg } = this.checkSender(node, message, values);
    return this.database.codec(msg).encodeBytes(values);
  }

  /**
   * Like {@link encodeForNode}, and also returns the arbitration id with the
   * node's `TpTxIdentifier` as J1939 source address or GM source id.
   */
  encodeFrameForNode(node: Node | string, message: Message | string, values: SignalValues): EncodedFrame {
    const { sender, msg } = this.checkSender(node, message, values);
    const data = this.database.codec(msg).encodeBytes(values);

    let arbitrationId = this.database.arbitrationId(msg);
    const address = this.database.resolver.tryResolveNumber({ kind: 'Node', node: sender }, ATTR.TpTxIdentifier);
    if (address !== undefined) {
      arbitrationId = withSourceAddress(arbitrationId, address);
    }
    const { frameId, isExtended } = encodeArbitrationId(arbitrationId);
    return { frameId, isExtended, data, arbitrationId };
  }

  /** Physical values of the signals the node receives, after multiplexing. */
  decodeForNode(node: Node | string, message: Message | string, data: ArrayLike<number>): Record<string, number> {
    return physicalValues(this.decodeForNodeWithMetadata(node, message, data));
  }

  decodeForNodeWithMetadata(node: Node | string, message: Message | string, data: ArrayLike<number>): DecodedMessage {
    const msg = typeof message === 'string' ? this.database.getMessage(message) : message;
    const received = new Set(this.database.receivedSignals(node, msg).map(s => s.name));
    const decoded = this.database.codec(msg).decodeWithMetadata(BitBuffer.from(data));

    const signals: Record<string, DecodedSignal> = {};
    for (const [name, signal] of Object.entries(decoded.signals)) {
      if (received.has(name)) {
        signals[name] = signal;
      }
    }
    return { ...decoded, signals };
  }

  private checkSender(
    node: Node | string,
    message: Message | string,
    values: SignalValues,
  ): { sender: Node; msg: Message } {
    const sender = typeof node === 'string' ? this.database.getNode(node) : node;
    const msg = typeof message === 'string' ? this.database.getMessage(message) : message;
    if (!this.database.transmits(sender, msg)) {
      const names = Object.keys(values);
      throw new SignalNotOwnedByNodeError(
        `Node '${sender.name}' does not transmit message '${msg.name}'` +
        (names.length > 0 ? ` (signals ${names.join(', ')})` : ''),
      );
    }
    for (const name of Object.keys(values)) {
      if (!msg.signals.some(s => s.name === name)) {
        throw new SignalNotOwnedByNodeError(
          `Signal '${name}' is not part of message '${msg.name}' transmitted by node '${sender.name}'`,
        );
      }
    }
    return { sender, msg };
  }
}
