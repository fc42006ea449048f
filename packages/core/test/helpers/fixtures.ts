/**
 * Shared fixtures for core tests: a plain tracked entity and an in-memory unit of work
 */

import type { LogEntry } from '../../src/domain/log-entry.js';
import type { LogEntrySink } from '../../src/interfaces/event-logger.js';
import type { AssociationMapping, UnitOfWork } from '../../src/interfaces/unit-of-work.js';
import type { EntityIdentifier, TrackedEntity } from '../../src/types.js';
import type { FieldChangeSet } from '../../src/utils/diff-calculator.js';

export class TestEntity implements TrackedEntity {
  constructor(
    readonly kind: string,
    public fields: Record<string, unknown>,
    public id: EntityIdentifier | undefined = undefined,
  ) {}

  readFields(): Readonly<Record<string, unknown>> {
    return this.fields;
  }
}

export interface FakeUnitOfWorkInit {
  updates?: unknown[];
  deletes?: unknown[];
  changeSets?: Map<TrackedEntity, FieldChangeSet>;
  snapshots?: Map<TrackedEntity, Record<string, unknown>>;
  mappings?: Record<string, Record<string, AssociationMapping>>;
}

export interface FakeUnitOfWork extends UnitOfWork, LogEntrySink {
  /** Entries persisted and not yet part of a write plan */
  readonly staged: LogEntry[];
  /** Entries folded into the primary write plan by a recompute */
  readonly planned: LogEntry[];
  /** Entries written by the primary commit or a flush, in order */
  readonly written: LogEntry[];
  readonly calls: { recompute: number; flush: number };
  /** Stand-in for the engine's primary commit */
  commitPlanned: () => void;
}

export const createFakeUnitOfWork = (init: FakeUnitOfWorkInit = {}): FakeUnitOfWork => {
  const staged: LogEntry[] = [];
  const planned: LogEntry[] = [];
  const written: LogEntry[] = [];
  const calls = { recompute: 0, flush: 0 };

  return {
    staged,
    planned,
    written,
    calls,

    pendingUpdates: () => init.updates ?? [],
    pendingDeletes: () => init.deletes ?? [],
    fieldChangeSet: (entity) => init.changeSets?.get(entity) ?? {},
    originalSnapshot: (entity) => init.snapshots?.get(entity) ?? {},
    associationMappings: (kind) => init.mappings?.[kind] ?? {},

    recomputeChangeSets: () => {
      calls.recompute += 1;
      planned.push(...staged.splice(0));
    },

    hasPendingWrites: () => staged.length > 0,

    flush: async () => {
      calls.flush += 1;
      written.push(...staged.splice(0));
    },

    persist: (entry) => {
      staged.push(entry);
    },

    commitPlanned: () => {
      written.push(...planned.splice(0));
    },
  };
};

export const FIXED_NOW = new Date('2025-01-01T00:00:00.000Z');
