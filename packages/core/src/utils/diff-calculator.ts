/**
 * Field-level diff calculation
 *
 * @module diff-calculator
 *
 * @remarks
 * Compares an entity's original snapshot with its current fields and reports
 * every field whose value changed. Association fields holding tracked entities are
 * compared by identity; other values by their serialized form.
 *
 * @example
 * ```typescript
 * const calculateDiff = createDiffCalculator(new Set(['lastModified']));
 *
 * calculateDiff(
 *   { name: 'R1', amount: 10, lastModified: '2025-01-01' },
 *   { name: 'R1', amount: 12, lastModified: '2025-01-02' },
 * );
 * // => { amount: { old: 10, new: 12 } }
 * ```
 */

import { isTrackedEntity } from '../types.js';
import { toSerializable } from './serialization.js';

/**
 * Represents a change in a single field
 */
export interface FieldChange {
  old: unknown;
  new: unknown;
}

/** Field name → (old, new) pair, as supplied by a unit of work for an in-place edit */
export type FieldChangeSet = Record<string, FieldChange>;

/**
 * Function type for calculating diffs between two states
 *
 * @returns Field-level changes; empty when nothing changed
 */
export type DiffCalculator = (
  before: Readonly<Record<string, unknown>>,
  after: Readonly<Record<string, unknown>>,
) => FieldChangeSet;

const areValuesEqual = (oldValue: unknown, newValue: unknown): boolean => {
  if (isTrackedEntity(oldValue) || isTrackedEntity(newValue)) {
    return oldValue === newValue;
  }
  // JSON encodes NaN and the infinities as null
  if (typeof oldValue === 'number' || typeof newValue === 'number') {
    return oldValue === newValue || (Number.isNaN(oldValue) && Number.isNaN(newValue));
  }
  return JSON.stringify(toSerializable(oldValue)) === JSON.stringify(toSerializable(newValue));
};

/**
 * Creates a diff calculator with ignored fields
 *
 * @remarks
 * A field missing on one side reads as `null` on that side.
 */
export const createDiffCalculator = (ignoredFields: ReadonlySet<string> = new Set()): DiffCalculator => {
  return (before, after): FieldChangeSet => {
    const changes: FieldChangeSet = {};
    const allFieldNames = new Set([...Object.keys(before), ...Object.keys(after)]);

    for (const fieldName of allFieldNames) {
      if (ignoredFields.has(fieldName)) {
        continue;
      }

      const oldValue = before[fieldName] ?? null;
      const newValue = after[fieldName] ?? null;

      if (!areValuesEqual(oldValue, newValue)) {
        changes[fieldName] = { old: oldValue, new: newValue };
      }
    }

    return changes;
  };
};
