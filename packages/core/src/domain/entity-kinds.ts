/**
 * Entity Kind Registry
 *
 * @module domain/entity-kinds
 *
 * @remarks
 * Tracked entity kinds and their single-inheritance hierarchy. Ancestor lists are
 * resolved once when the registry is built, so per-field policy checks are plain
 * lookups instead of runtime type inspection.
 *
 * @example
 * ```typescript
 * const registry = createEntityKindRegistry({
 *   User: {},
 *   AdminUser: { extends: 'User' },
 *   Part: {},
 * });
 *
 * registry.ancestorsOf('AdminUser'); // => ['AdminUser', 'User']
 * registry.isSubtypeOf('AdminUser', 'User'); // => true
 * ```
 */

import { isLogEntryKind } from '../constants.js';
import { AuditConfigurationError } from '../errors.js';

export interface EntityKindDefinition {
  /** Parent kind; fields redacted or associations whitelisted for it apply to this kind too */
  extends?: string;
}

export type EntityKindDefinitions = Readonly<Record<string, EntityKindDefinition>>;

export interface EntityKindRegistry {
  /** True when the kind was registered as a tracked kind */
  isTracked: (kind: string) => boolean;

  /**
   * The kind followed by its ancestors, nearest first
   *
   * @remarks
   * Unregistered kinds resolve to `[kind]`.
   */
  ancestorsOf: (kind: string) => readonly string[];

  isSubtypeOf: (kind: string, ancestor: string) => boolean;

  /** Registered kinds in definition order */
  kinds: () => string[];
}

/** @internal */
const resolveAncestors = (kind: string, definitions: EntityKindDefinitions): string[] => {
  const chain: string[] = [kind];
  let parent = definitions[kind]?.extends;

  while (parent !== undefined) {
    if (!Object.hasOwn(definitions, parent)) {
      throw new AuditConfigurationError(`Entity kind '${kind}' extends unknown kind '${parent}'.`, kind);
    }
    if (chain.includes(parent)) {
      throw new AuditConfigurationError(
        `Entity kind '${kind}' has a cyclic inheritance chain: ${[...chain, parent].join(' -> ')}.`,
        kind,
      );
    }
    chain.push(parent);
    parent = definitions[parent]?.extends;
  }

  return chain;
};

/**
 * Create an entity kind registry
 *
 * @throws {AuditConfigurationError} On unknown parents, inheritance cycles, or kinds named like log entry kinds
 */
export const createEntityKindRegistry = (definitions: EntityKindDefinitions): EntityKindRegistry => {
  const ancestorsByKind = new Map<string, readonly string[]>();

  for (const kind of Object.keys(definitions)) {
    if (isLogEntryKind(kind)) {
      throw new AuditConfigurationError(`'${kind}' is a log entry kind and cannot be tracked.`, kind);
    }
    ancestorsByKind.set(kind, Object.freeze(resolveAncestors(kind, definitions)));
  }

  return {
    isTracked: (kind: string): boolean => ancestorsByKind.has(kind),

    ancestorsOf: (kind: string): readonly string[] => ancestorsByKind.get(kind) ?? [kind],

    isSubtypeOf: (kind: string, ancestor: string): boolean => {
      return (ancestorsByKind.get(kind) ?? [kind]).includes(ancestor);
    },

    kinds: (): string[] => Array.from(ancestorsByKind.keys()),
  };
};

/**
 * Close a per-kind table over the kind hierarchy
 *
 * @remarks
 * Each registered kind (and every key of the table) receives the union of the
 * entries declared for itself and its ancestors, own entries first, duplicates removed.
 * Kinds with an empty union are left out of the result.
 *
 * @example
 * ```typescript
 * closeOverKinds({ User: ['password'] }, registry);
 * // => Map { 'User' => ['password'], 'AdminUser' => ['password'] }
 * ```
 */
export const closeOverKinds = (
  table: Readonly<Record<string, readonly string[]>>,
  registry: EntityKindRegistry,
): Map<string, readonly string[]> => {
  const closed = new Map<string, readonly string[]>();
  const kinds = new Set([...registry.kinds(), ...Object.keys(table)]);

  for (const kind of kinds) {
    const entries = new Set<string>();
    for (const ancestor of registry.ancestorsOf(kind)) {
      for (const entry of table[ancestor] ?? []) {
        entries.add(entry);
      }
    }
    if (entries.size > 0) {
      closed.set(kind, Object.freeze(Array.from(entries)));
    }
  }

  return closed;
};
