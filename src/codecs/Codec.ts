import type { BitBuffer } from '../BitBuffer';

/**
 * Base interface for signal and message codecs.
 * @template T The value type this codec encodes/decodes.
 * @template D The decoded form carrying raw values and metadata.
 */
export interface Codec<T, D> {
  /** Encode a value into the payload. Throws if the value violates the definition. */
  encode(buffer: BitBuffer, value: T): void;

  /** Decode a value from the payload. */
  decode(buffer: BitBuffer): T;

  /** Decode with raw values, labels and layout metadata. */
  decodeWithMetadata(buffer: BitBuffer): D;
}
