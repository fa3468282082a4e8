import { buildMessage, ValidateBy, ValidationOptions } from 'class-validator';
import { Metadata } from '../../rag/types';

export function isMetadataFilter(value: unknown): value is Metadata {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return false;
  }
  return Object.values(value).every(
    (entry) => typeof entry === 'string' || typeof entry === 'boolean' || (typeof entry === 'number' && Number.isFinite(entry)),
  );
}

/**
 * Flat object whose values are strings, finite numbers or booleans.
 */
export function IsMetadataFilter(validationOptions?: ValidationOptions): PropertyDecorator {
  return ValidateBy(
    {
      name: 'isMetadataFilter',
      validator: {
        validate: (value: unknown) => isMetadataFilter(value),
        defaultMessage: buildMessage(
          (eachPrefix) => `${eachPrefix}$property must map keys to strings, numbers or booleans`,
          validationOptions,
        ),
      },
    },
    validationOptions,
  );
}
