import { BitBuffer } from '../BitBuffer';
import { MissingSignalValueError, UnknownObjectError } from '../errors';
import type { AttributeResolver } from '../attributes/AttributeResolver';
import { ATTR } from '../attributes/names';
import { assertSignalFits, signalBitIndices } from '../helpers';
import { findMultiplexor, isActiveFor } from '../model/multiplexing';
import type { Message, Signal } from '../model/types';
import type { Codec } from './Codec';
import type { DecodedMessage, DecodedSignal } from './DecodedSignal';
import { physicalValues } from './DecodedSignal';
import { SignalCodec } from './SignalCodec';
import type { SignalValue } from './SignalCodec';

/** Signal name → physical value or label. */
export type SignalValues = Readonly<Record<string, SignalValue>>;

export interface MessageCodecOptions {
  /** See {@link SignalCodecOptions.scaling}. Default true. */
  scaling?: boolean;
  /** Set every payload bit no active signal covers to 1. Default false. */
  padding?: boolean;
  /** Used to look up `GenSigStartValue` for signals missing from an encode. */
  resolver?: AttributeResolver;
}

/**
 * Codec for a whole message payload, multiplexing included.
 *
 * Encoding computes every raw value before touching the buffer, so a failed
 * encode leaves the payload as it was.
 */
export class MessageCodec implements Codec<SignalValues, DecodedMessage> {
  readonly message: Message;
  private readonly codecs: Map<string, SignalCodec>;
  private readonly multiplexor: Signal | undefined;
  private readonly padding: boolean;
  private readonly resolver: AttributeResolver | undefined;

  constructor(message: Message, options: MessageCodecOptions = {}) {
    this.message = message;
    this.padding = options.padding ?? false;
    this.resolver = options.resolver;
    this.multiplexor = findMultiplexor(message);
    this.codecs = new Map(
      message.signals.map(s => [s.name, new SignalCodec(s, { scaling: options.scaling })]),
    );
  }

  /** Codec of one signal of the message. */
  signal(name: string): SignalCodec {
    const codec = this.codecs.get(name);
    if (!codec) {
      throw new UnknownObjectError(`Message '${this.message.name}' has no signal '${name}'`);
    }
    return codec;
  }

  /**
   * Signals present in a frame whose multiplexor reads `switchValue`.
   * Without a multiplexor every signal is active.
   */
  activeSignals(switchValue: number | undefined): Signal[] {
    return this.message.signals.filter(s => isActiveFor(s.multiplexer, switchValue));
  }

  /**
   * @throws UnknownObjectError if `values` names a signal the message lacks
   * @throws MissingSignalValueError if an active signal has neither a value
   *   nor a start value
   * @throws ValueOutOfRangeError if a value cannot be represented
   */
  encode(buffer: BitBuffer, values: SignalValues): void {
    for (const name of Object.keys(values)) {
      this.signal(name);
    }

    const switchValue = this.multiplexor ? this.multiplexorValue(this.multiplexor, values) : undefined;
    const active = this.activeSignals(switchValue);

    const raws: Array<[SignalCodec, bigint]> = [];
    for (const signal of active) {
      const codec = this.signal(signal.name);
      const value = values[signal.name];
      if (value !== undefined) {
        raws.push([codec, codec.toRaw(value)]);
        continue;
      }
      const start = this.startValue(signal);
      if (start === undefined) {
        throw new MissingSignalValueError(
          `No value for signal '${this.message.name}.${signal.name}' and no ${ATTR.GenSigStartValue} declared`,
        );
      }
      raws.push([codec, codec.fromStoredRaw(start)]);
    }

    for (const signal of active) {
      assertSignalFits(signal, buffer.bitLength);
    }

    if (this.padding) {
      const covered = new Set(active.flatMap(s => signalBitIndices(s)));
      for (let bit = 0; bit < buffer.bitLength; bit++) {
        if (!covered.has(bit)) {
          buffer.writeLsbBits(bit, 1, 1n);
        }
      }
    }
    for (const [codec, raw] of raws) {
      codec.inject(buffer, raw);
    }
  }

  decode(buffer: BitBuffer): Record<string, number> {
    return physicalValues(this.decodeWithMetadata(buffer));
  }

  decodeWithMetadata(buffer: BitBuffer): DecodedMessage {
    let switchValue: number | undefined;
    if (this.multiplexor) {
      switchValue = Number(this.signal(this.multiplexor.name).decodeRaw(buffer));
    }
    const signals: Record<string, DecodedSignal> = {};
    for (const signal of this.activeSignals(switchValue)) {
      signals[signal.name] = this.signal(signal.name).decodeWithMetadata(buffer);
    }
    const decoded: DecodedMessage = { message: this.message, signals };
    if (switchValue !== undefined) {
      decoded.multiplexorValue = switchValue;
    }
    return decoded;
  }

  /** Encode into a fresh zeroed payload of the message's length. */
  encodeBytes(values: SignalValues): Uint8Array {
    const buffer = BitBuffer.alloc(this.message.byteLength);
    this.encode(buffer, values);
    return buffer.toUint8Array();
  }

  encodeToHex(values: SignalValues): string {
    const buffer = BitBuffer.alloc(this.message.byteLength);
    this.encode(buffer, values);
    return buffer.toHex();
  }

  decodeBytes(data: ArrayLike<number>): Record<string, number> {
    return this.decode(BitBuffer.from(data));
  }

  decodeBytesWithMetadata(data: ArrayLike<number>): DecodedMessage {
    return this.decodeWithMetadata(BitBuffer.from(data));
  }

  decodeFromHex(hex: string): Record<string, number> {
    return this.decode(BitBuffer.fromHex(hex));
  }

  /** Raw multiplexor value selected by `values`, falling back to its start value. */
  private multiplexorValue(multiplexor: Signal, values: SignalValues): number | undefined {
    const given = values[multiplexor.name];
    const codec = this.signal(multiplexor.name);
    if (given !== undefined) {
      const raw = codec.toRaw(given);
      return Number(raw);
    }
    const start = this.startValue(multiplexor);
    return start === undefined ? undefined : Number(codec.fromStoredRaw(start));
  }

  private startValue(signal: Signal): number | undefined {
    return this.resolver?.tryResolveNumber(
      { kind: 'Signal', message: this.message, signal },
      ATTR.GenSigStartValue,
    );
  }
}
