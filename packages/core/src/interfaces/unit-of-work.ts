/**
 * Unit-of-Work Interfaces
 *
 * Contract the storage engine exposes to the change-capture core.
 *
 * @packageDocumentation
 */

import type { TrackedEntity } from '../types.js';
import type { FieldChangeSet } from '../utils/diff-calculator.js';

/**
 * Association metadata of one entity field
 *
 * @example
 * ```typescript
 * // PartLot.part is the owning side; Part.partLots is the inverse collection
 * const mapping: AssociationMapping = { targetKind: 'Part', inversedBy: 'partLots' };
 * ```
 */
export interface AssociationMapping {
  targetKind: string;
  /** Name of the collection on the target that mirrors this association */
  inversedBy?: string | null;
}

/**
 * Storage engine unit of work, seen from the capture core
 *
 * @remarks
 * `pendingUpdates` and `pendingDeletes` are only meaningful while the pre-commit
 * scan runs. They may contain values that are not tracked entities (staged log
 * entries, for instance); the capture core filters them.
 *
 * Commit happens in two phases: phase 1 writes entity state and assigns
 * identifiers; `flush()` is phase 2 and writes whatever was staged during phase 1's
 * creation callbacks without running the capture hooks again.
 */
export interface UnitOfWork {
  pendingUpdates(): readonly unknown[];
  pendingDeletes(): readonly unknown[];

  /** (old, new) pairs of the fields changed on an entity scheduled for update */
  fieldChangeSet(entity: TrackedEntity): Readonly<FieldChangeSet>;

  /** Field values as they were when the entity was loaded or last committed */
  originalSnapshot(entity: TrackedEntity): Readonly<Record<string, unknown>>;

  associationMappings(kind: string): Readonly<Record<string, AssociationMapping>>;

  /** Recompute the write plan after the scan staged entries or read associations */
  recomputeChangeSets(): void;

  hasPendingWrites(): boolean;

  /** Phase 2: drain writes staged after the primary commit */
  flush(): Promise<void>;
}
