/**
 * Association Trigger Table
 *
 * @module policy/association-triggers
 *
 * @remarks
 * When an entity of a listed kind is deleted, the parent referenced by each listed
 * association loses an element from its inverse collection. Foreign keys live on
 * the child side, so plain field diffing of the parent never sees that removal; the
 * capture core emits a collection-element-deleted entry for it instead.
 *
 * @example
 * ```typescript
 * const triggers = createAssociationTriggerTable({ PartLot: ['part'], Attachment: ['element'] }, registry);
 *
 * triggers.associationsFor('PartLot'); // => ['part']
 * triggers.associationsFor('PartAttachment'); // => ['element'] (extends Attachment)
 * ```
 */

import { closeOverKinds, type EntityKindRegistry } from '../domain/entity-kinds.js';

/** Entity kind → association field names whose removal is logged on the parent */
export type AssociationTriggers = Readonly<Record<string, readonly string[]>>;

export interface AssociationTriggerTable {
  isWhitelisted: (kind: string) => boolean;
  associationsFor: (kind: string) => readonly string[];
}

export const createAssociationTriggerTable = (
  triggers: AssociationTriggers,
  registry: EntityKindRegistry,
): AssociationTriggerTable => {
  const associationsByKind = closeOverKinds(triggers, registry);

  return {
    isWhitelisted: (kind: string): boolean => associationsByKind.has(kind),
    associationsFor: (kind: string): readonly string[] => associationsByKind.get(kind) ?? [],
  };
};
