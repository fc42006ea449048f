/**
 * Serialization Utilities for Change Sets
 *
 * Converts captured field values into the compact scalar form stored in a log
 * entry payload. Entity references become their identifiers and `Date` objects
 * become ISO strings; structured values are stored as JSON text.
 *
 * @example
 * ```typescript
 * toChangeSetValue(new Date('2025-01-01'));
 * // => '2025-01-01T00:00:00.000Z'
 *
 * toChangeSetValue(partEntity); // => 42 (the part's id)
 *
 * toChangeSetValue({ unit: 'pcs', tags: ['smd'] });
 * // => '{"unit":"pcs","tags":["smd"]}'
 * ```
 */

import { isTrackedEntity } from '../types.js';
import { coreLog } from './debug.js';

/** Scalar value stored in a change set */
export type ChangeSetValue = string | number | boolean | null;

const isPlainObject = (value: unknown): value is Record<string, unknown> => {
  if (typeof value !== 'object' || value === null) {
    return false;
  }

  if (Array.isArray(value) || value instanceof Date || value instanceof Map || value instanceof Set) {
    return false;
  }

  return true;
};

/** Stands in for a structure that contains itself */
export const CIRCULAR_MARKER = '[Circular]';

/**
 * Recursively replace Dates with ISO strings and entity references with their ids
 *
 * @remarks
 * Maps become arrays of `[key, value]` pairs and Sets become arrays, so their
 * contents survive JSON encoding. A structure reached again through its own
 * children is replaced by {@link CIRCULAR_MARKER}.
 *
 * @example
 * ```typescript
 * toSerializable({ createdAt: new Date('2025-01-01'), owner: userEntity });
 * // => { createdAt: '2025-01-01T00:00:00.000Z', owner: 'user-1' }
 * ```
 */
export const toSerializable = (value: unknown, ancestors: WeakSet<object> = new WeakSet()): unknown => {
  if (value === null || typeof value !== 'object') {
    return typeof value === 'bigint' ? value.toString() : value;
  }

  if (value instanceof Date) {
    return value.toISOString();
  }

  if (isTrackedEntity(value)) {
    return value.id ?? null;
  }

  if (ancestors.has(value)) {
    return CIRCULAR_MARKER;
  }

  ancestors.add(value);
  try {
    if (Array.isArray(value) || value instanceof Set) {
      return Array.from(value, (item: unknown) => toSerializable(item, ancestors));
    }

    if (value instanceof Map) {
      return Array.from(value, ([key, item]: [unknown, unknown]) => [
        toSerializable(key, ancestors),
        toSerializable(item, ancestors),
      ]);
    }

    if (isPlainObject(value)) {
      const converted: Record<string, unknown> = {};
      for (const key in value) {
        if (Object.hasOwn(value, key)) {
          converted[key] = toSerializable(value[key], ancestors);
        }
      }
      return converted;
    }

    return value;
  } finally {
    ancestors.delete(value);
  }
};

/** @internal */
const stringifyStructured = (value: unknown): string | undefined => {
  try {
    return JSON.stringify(value);
  } catch (error) {
    coreLog('Cannot serialize structured value, storing its string form: %s', error instanceof Error ? error.message : String(error));
    return String(value);
  }
};

/**
 * Convert a captured field value to a change-set value
 *
 * @returns The scalar form, or `undefined` when the value has no storable form
 *   (undefined, functions, symbols) and the field should be left out
 */
export const toChangeSetValue = (value: unknown): ChangeSetValue | undefined => {
  const serializable = toSerializable(value);

  if (
    serializable === null ||
    typeof serializable === 'string' ||
    typeof serializable === 'number' ||
    typeof serializable === 'boolean'
  ) {
    return serializable;
  }

  if (typeof serializable === 'object') {
    return stringifyStructured(serializable);
  }

  return undefined;
};
