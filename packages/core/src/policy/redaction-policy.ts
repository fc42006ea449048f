/**
 * Field Redaction Policy
 *
 * @module policy/redaction-policy
 *
 * @remarks
 * Keeps sensitive fields out of audit logs. The blacklist maps an entity kind to
 * the field names that must never be persisted in a log entry; entries declared
 * for a kind also apply to every subtype registered under it.
 *
 * @example
 * ```typescript
 * const policy = createRedactionPolicy({ User: ['password', 'pw_reset_token'] }, registry);
 *
 * policy.shouldFieldBeSaved('AdminUser', 'password'); // => false (AdminUser extends User)
 * policy.filter('User', { name: 'Alice', password: 'test-secret' });
 * // => { name: 'Alice' }
 * ```
 */

import { closeOverKinds, type EntityKindRegistry } from '../domain/entity-kinds.js';

/** Entity kind → field names that must not appear in a log entry */
export type FieldBlacklist = Readonly<Record<string, readonly string[]>>;

export interface RedactionPolicy {
  /** True iff the kind (or an ancestor) has any blacklisted field */
  isRestricted: (kind: string) => boolean;

  /** False iff the field is blacklisted for the kind or any ancestor */
  shouldFieldBeSaved: (kind: string, fieldName: string) => boolean;

  /** Copy of the mapping without blacklisted keys, insertion order preserved */
  filter: <T>(kind: string, fields: Readonly<Record<string, T>>) => Record<string, T>;

  /** Field name list without blacklisted names, order preserved */
  filterFieldNames: (kind: string, fieldNames: readonly string[]) => string[];
}

/** @internal */
const NO_RESTRICTIONS: ReadonlySet<string> = new Set();

/**
 * Create a redaction policy
 *
 * @remarks
 * The subtype closure is computed here, once. Kinds absent from the blacklist
 * (and without a blacklisted ancestor) are fully allowed.
 */
export const createRedactionPolicy = (blacklist: FieldBlacklist, registry: EntityKindRegistry): RedactionPolicy => {
  const forbiddenByKind = new Map<string, ReadonlySet<string>>();
  for (const [kind, fields] of closeOverKinds(blacklist, registry)) {
    forbiddenByKind.set(kind, new Set(fields));
  }

  const forbiddenFieldsOf = (kind: string): ReadonlySet<string> => forbiddenByKind.get(kind) ?? NO_RESTRICTIONS;

  const shouldFieldBeSaved = (kind: string, fieldName: string): boolean => !forbiddenFieldsOf(kind).has(fieldName);

  return {
    isRestricted: (kind: string): boolean => forbiddenFieldsOf(kind).size > 0,

    shouldFieldBeSaved,

    filter: <T>(kind: string, fields: Readonly<Record<string, T>>): Record<string, T> => {
      const forbidden = forbiddenFieldsOf(kind);
      const result: Record<string, T> = {};
      for (const [fieldName, value] of Object.entries(fields)) {
        if (!forbidden.has(fieldName)) {
          result[fieldName] = value;
        }
      }
      return result;
    },

    filterFieldNames: (kind: string, fieldNames: readonly string[]): string[] => {
      return fieldNames.filter((fieldName) => shouldFieldBeSaved(kind, fieldName));
    },
  };
};
