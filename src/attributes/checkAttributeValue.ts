import { TypeMismatchError, ValueOutOfRangeError } from '../errors';
import type { AttributeDefinition, AttributeScalar } from '../model/types';

/**
 * Validate a value against its definition and return it in stored form.
 * ENUM values may be given as a label or as an index into the label list and
 * are always returned as the label.
 *
 * @throws TypeMismatchError if the value's type does not match the definition
 * @throws ValueOutOfRangeError if a numeric value is outside the declared bounds
 *   or an ENUM index/label is unknown
 */
export function checkAttributeValue(definition: AttributeDefinition, value: AttributeScalar): AttributeScalar {
  switch (definition.valueType) {
    case 'INT':
    case 'HEX':
    case 'FLOAT': {
      if (typeof value !== 'number' || Number.isNaN(value)) {
        throw mismatch(definition, value);
      }
      if (definition.valueType !== 'FLOAT' && !Number.isInteger(value)) {
        throw mismatch(definition, value);
      }
      const { minimum, maximum } = definition;
      if (minimum === undefined || maximum === undefined) {
        return value;
      }
      // DBC writes `0 0` for "no bounds"
      const unbounded = minimum === 0 && maximum === 0;
      if (!unbounded && (value < minimum || value > maximum)) {
        throw new ValueOutOfRangeError(
          `Attribute '${definition.name}' value ${value} is outside [${minimum}, ${maximum}]`,
        );
      }
      return value;
    }

    case 'STRING':
      if (typeof value !== 'string') {
        throw mismatch(definition, value);
      }
      return value;

    case 'ENUM': {
      if (typeof value === 'number') {
        const label = Number.isInteger(value) ? definition.values[value] : undefined;
        if (label === undefined) {
          throw new ValueOutOfRangeError(
            `Attribute '${definition.name}' has no enumeration entry at index ${value}`,
          );
        }
        return label;
      }
      if (!definition.values.includes(value)) {
        throw new ValueOutOfRangeError(
          `Attribute '${definition.name}' value '${value}' is not one of ${definition.values.map(v => `'${v}'`).join(', ')}`,
        );
      }
      return value;
    }
  }
}

function mismatch(definition: AttributeDefinition, value: AttributeScalar): TypeMismatchError {
  return new TypeMismatchError(
    `Attribute '${definition.name}' expects a ${definition.valueType} value, but got ${JSON.stringify(value)}`,
  );
}
