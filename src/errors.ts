/**
 * Error hierarchy for the DBC model and codecs.
 *
 * Every failure raised by this library is a {@link DbcError}. Each kind has
 * its own subclass so callers can branch with `instanceof` or on `kind`.
 */

export type DbcErrorKind =
  | 'InvalidIdentifier'
  | 'BitRangeExceeded'
  | 'ValueOutOfRange'
  | 'SignalNotOwnedByNode'
  | 'NoAttributeValue'
  | 'TypeMismatch'
  | 'StructuralInvariantViolation'
  | 'UnknownObject'
  | 'MissingSignalValue'
  | 'ParseError';

export abstract class DbcError extends Error {
  abstract readonly kind: DbcErrorKind;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** Frame id wider than its declared 11 or 29 bits, or an id field out of range. */
export class InvalidIdentifierError extends DbcError {
  readonly kind = 'InvalidIdentifier' as const;
}

/** Signal span does not fit in the payload. */
export class BitRangeExceededError extends DbcError {
  readonly kind = 'BitRangeExceeded' as const;
}

/** Physical value outside [minimum, maximum], or raw value wider than the signal. */
export class ValueOutOfRangeError extends DbcError {
  readonly kind = 'ValueOutOfRange' as const;
}

export class SignalNotOwnedByNodeError extends DbcError {
  readonly kind = 'SignalNotOwnedByNode' as const;
}

/** Neither an explicit value nor a definition default exists. */
export class NoAttributeValueError extends DbcError {
  readonly kind = 'NoAttributeValue' as const;
}

/** Attribute value or target does not match its definition. */
export class TypeMismatchError extends DbcError {
  readonly kind = 'TypeMismatch' as const;
}

export class StructuralInvariantViolationError extends DbcError {
  readonly kind = 'StructuralInvariantViolation' as const;
}

/** Lookup by name or frame id found nothing. */
export class UnknownObjectError extends DbcError {
  readonly kind = 'UnknownObject' as const;
}

export class MissingSignalValueError extends DbcError {
  readonly kind = 'MissingSignalValue' as const;
}

export interface SourceLocation {
  line: number;
  column: number;
}

/** DBC text could not be parsed. */
export class DbcParseError extends DbcError {
  readonly kind = 'ParseError' as const;
  readonly location?: SourceLocation;

  constructor(message: string, location?: SourceLocation) {
    super(location ? `${message} (line ${location.line}, column ${location.column})` : message);
    this.location = location;
  }
}

/** Type guard: checks if a value is a DbcError, optionally of a given kind. */
export function isDbcError(value: unknown, kind?: DbcErrorKind): value is DbcError {
  return value instanceof DbcError && (kind === undefined || value.kind === kind);
}
