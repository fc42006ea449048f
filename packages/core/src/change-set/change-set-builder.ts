/**
 * Change-Set Builder
 *
 * @module change-set/change-set-builder
 *
 * @remarks
 * Produces the redacted, size-bounded mapping of field → previous value stored
 * in edited and deleted log entries.
 *
 * - Deleted entity: the whole original snapshot is the candidate mapping.
 * - Edited entity: only the `old` half of each changed field; fields whose old
 *   value was null carry no information and are dropped.
 *
 * Candidates then pass the redaction policy, are converted to scalars and have
 * their strings cut to the maximum length.
 *
 * @example
 * ```typescript
 * const builder = createChangeSetBuilder({ policy });
 *
 * builder.build(user, { type: 'changes', changes: {
 *   name: { old: 'Alice', new: 'Alicia' },
 *   password: { old: 'test-secret', new: 'test-secret-2' },
 * } }, false);
 * // => { name: 'Alice' }
 * ```
 */

import { DEFAULTS } from '../constants.js';
import type { RedactionPolicy } from '../policy/redaction-policy.js';
import type { TrackedEntity } from '../types.js';
import type { FieldChangeSet } from '../utils/diff-calculator.js';
import { type ChangeSetValue, toChangeSetValue } from '../utils/serialization.js';
import { truncateString } from '../utils/truncate.js';

/** Field name → previous value */
export type ChangeSet = Record<string, ChangeSetValue>;

/**
 * Where previous values come from
 *
 * - `changes`: per-field (old, new) pairs for an in-place edit
 * - `snapshot`: the full original-value snapshot, for a deletion
 */
export type DiffSource =
  | { type: 'changes'; changes: Readonly<FieldChangeSet> }
  | { type: 'snapshot'; snapshot: Readonly<Record<string, unknown>> };

export interface ChangeSetBuilderOptions {
  policy: RedactionPolicy;
  /** @default 2000 */
  maxStringLength?: number;
  /** @default '...' */
  truncationMarker?: string;
}

export interface ChangeSetBuilder {
  build: (entity: TrackedEntity, source: DiffSource, wasDeleted: boolean) => ChangeSet;
}

/** @internal */
const previousValuesOf = (changes: Readonly<FieldChangeSet>): Record<string, unknown> => {
  const previous: Record<string, unknown> = {};
  for (const [fieldName, change] of Object.entries(changes)) {
    previous[fieldName] = change.old;
  }
  return previous;
};

/** @internal */
const candidateValues = (source: DiffSource, wasDeleted: boolean): Record<string, unknown> => {
  const candidates = source.type === 'snapshot' ? { ...source.snapshot } : previousValuesOf(source.changes);
  if (wasDeleted) {
    return candidates;
  }

  const informative: Record<string, unknown> = {};
  for (const [fieldName, value] of Object.entries(candidates)) {
    if (value !== null && value !== undefined) {
      informative[fieldName] = value;
    }
  }
  return informative;
};

export const createChangeSetBuilder = (options: ChangeSetBuilderOptions): ChangeSetBuilder => {
  const { policy } = options;
  const maxStringLength = options.maxStringLength ?? DEFAULTS.MAX_STRING_LENGTH;
  const truncationMarker = options.truncationMarker ?? DEFAULTS.TRUNCATION_MARKER;

  return {
    build: (entity: TrackedEntity, source: DiffSource, wasDeleted: boolean): ChangeSet => {
      const allowed = policy.filter(entity.kind, candidateValues(source, wasDeleted));

      const changeSet: ChangeSet = {};
      for (const [fieldName, rawValue] of Object.entries(allowed)) {
        const value = toChangeSetValue(rawValue);
        if (value === undefined) {
          continue;
        }
        changeSet[fieldName] =
          typeof value === 'string' ? truncateString(value, maxStringLength, truncationMarker) : value;
      }

      return changeSet;
    },
  };
};
