/**
 * Branded Types Module - Type-safe ID wrappers with validation
 */

import type { EntityIdentifier } from '../types.js';

/**
 * Branded type utility
 *
 * @example
 * ```typescript
 * type PartId = Brand<string, 'PartId'>;
 * const partId: PartId = 'part-1' as PartId;
 * ```
 */
type Brand<T, TBrand> = T & { readonly __brand: TBrand };

/** Entity identifier as recorded in a log entry */
export type EntityId = Brand<string, 'EntityId'>;

/** Validation error thrown when ID creation fails */
export class IdValidationError extends Error {
  constructor(
    public readonly idType: string,
    public readonly value: string,
    message: string,
  ) {
    super(`[${idType}] ${message}: received "${value}"`);
    this.name = 'IdValidationError';
  }
}

/** @internal */
const isNonEmptyString = (value: string): boolean => {
  return value.trim() !== '';
};

/** @internal */
const validateNonEmptyString = (id: string, idType: string): void => {
  if (!id || !isNonEmptyString(id)) {
    throw new IdValidationError(idType, id, `${idType} cannot be empty or whitespace-only`);
  }
};

/**
 * Creates a validated EntityId from a storage identifier
 *
 * @throws {IdValidationError} If the identifier is empty or whitespace-only
 *
 * @example
 * ```typescript
 * createEntityId(42); // => '42'
 * createEntityId('part-1'); // => 'part-1'
 * createEntityId(''); // ❌ Throws IdValidationError
 * ```
 */
export const createEntityId = (id: EntityIdentifier): EntityId => {
  const value = String(id);
  validateNonEmptyString(value, 'EntityId');
  return value as EntityId;
};

/** Type guard for EntityId */
export const isEntityId = (value: unknown): value is EntityId => {
  return typeof value === 'string' && isNonEmptyString(value);
};

/** Unwraps a branded ID to its underlying string value */
export const unwrapId = (id: EntityId): string => {
  return id;
};
