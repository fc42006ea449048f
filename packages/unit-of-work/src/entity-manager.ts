/**
 * In-Memory Entity Manager
 *
 * @module entity-manager
 *
 * @remarks
 * A unit of work over an in-process store. Mutations are collected until
 * `flush()`, which commits them in two phases:
 *
 * 1. **Primary commit**: the capture listener scans pending edits and deletes,
 *    the write plan is computed (updates by diffing each managed entity against
 *    its original snapshot), inserts receive identifiers, everything is applied,
 *    and `entityCreated` runs for each inserted entity.
 * 2. **Drain**: log entries staged during phase 1's creation callbacks are
 *    written. Only log entries are written here; the capture hooks do not run again.
 *
 * When a flush fails, entries logged during it are dropped and entries staged
 * before it started stay staged for the next flush.
 *
 * The manager is also the {@link LogEntrySink} of the event logger, so log entries
 * are stored next to the entities they describe.
 *
 * @example
 * ```typescript
 * const em = createEntityManager({ metadata });
 * const logger = createEventLogger({ sink: em, actorProvider: actors });
 * em.attachListener(createChangeCaptureListener({ registry, logger, comments }));
 *
 * em.persist(createRecordEntity('Part', { name: 'R1' }));
 * await em.flush();
 * em.findLogEntries(); // => [{ id: 1, entry: { kind: 'element_created', ... } }]
 * ```
 */

import {
  type ChangeCaptureListener,
  ContractViolationError,
  createDiffCalculator,
  type EntityIdentifier,
  type FieldChangeSet,
  type FlushCycle,
  isLogEntry,
  type LogEntry,
  type LogEntrySink,
  runFlushCycle,
  type TrackedEntity,
  type UnitOfWork,
} from '@entity-audit/core';
import { DuplicateIdentifierError } from './errors.js';
import { type EntityMetadata, validateMetadata } from './metadata.js';
import type { StorableEntity } from './record-entity.js';
import { uowLog } from './utils/debug.js';
import { createIdGenerator, type IdGenerator, type IdStrategy } from './utils/id-generator.js';

export interface EntityManagerOptions {
  metadata: EntityMetadata;

  /** Capture listener driving the flush hooks; can also be attached later */
  listener?: ChangeCaptureListener;

  /** Generator used for every kind, overriding the per-kind strategies */
  idGenerator?: IdGenerator;

  /**
   * Strategy for kinds whose metadata names none
   * @default 'cuid2'
   */
  defaultIdStrategy?: IdStrategy;
}

/** A written log entry with its storage identifier */
export interface StoredLogEntry {
  readonly id: number;
  readonly entry: LogEntry;
}

export interface EntityManager extends LogEntrySink {
  /** Schedule a new entity for insertion, or stage a log entry */
  persist(value: StorableEntity | LogEntry): void;

  /** Schedule a managed entity for deletion; a not yet inserted entity is simply dropped */
  remove(entity: StorableEntity): void;

  /** Start tracking an entity that is already stored (it must have an identifier) */
  manage(entity: StorableEntity): void;

  find(kind: string, id: EntityIdentifier): StorableEntity | undefined;

  findLogEntries(): readonly StoredLogEntry[];

  attachListener(listener: ChangeCaptureListener): void;

  /** Commit every pending change */
  flush(): Promise<void>;
}

interface WritePlan {
  inserts: StorableEntity[];
  updates: TrackedEntity[];
  deletes: TrackedEntity[];
  logEntries: LogEntry[];
}

const emptyPlan = (): WritePlan => ({ inserts: [], updates: [], deletes: [], logEntries: [] });

export const createEntityManager = (options: EntityManagerOptions): EntityManager => {
  const { metadata } = options;
  validateMetadata(metadata);

  let listener = options.listener;
  const calculateDiff = createDiffCalculator();
  const generatorsByKind = new Map<string, IdGenerator>();

  const scheduledInserts = new Set<StorableEntity>();
  const scheduledDeletes = new Set<TrackedEntity>();
  const snapshots = new Map<TrackedEntity, Readonly<Record<string, unknown>>>();
  const storedByKind = new Map<string, Map<string, StorableEntity>>();
  const stagedLogEntries: LogEntry[] = [];
  const logTable: StoredLogEntry[] = [];

  let plan = emptyPlan();
  let flushing = false;

  const nextId = (kind: string): EntityIdentifier => {
    if (options.idGenerator) {
      return options.idGenerator();
    }
    let generator = generatorsByKind.get(kind);
    if (!generator) {
      generator = createIdGenerator(metadata[kind]?.idStrategy ?? options.defaultIdStrategy ?? 'cuid2');
      generatorsByKind.set(kind, generator);
    }
    return generator();
  };

  const storedOfKind = (kind: string): Map<string, StorableEntity> => {
    let stored = storedByKind.get(kind);
    if (!stored) {
      stored = new Map();
      storedByKind.set(kind, stored);
    }
    return stored;
  };

  const snapshotOf = (entity: TrackedEntity): Readonly<Record<string, unknown>> => snapshots.get(entity) ?? {};

  const changeSetOf = (entity: TrackedEntity): FieldChangeSet => {
    return calculateDiff(snapshotOf(entity), entity.readFields());
  };

  const computeUpdates = (): TrackedEntity[] => {
    const updates: TrackedEntity[] = [];
    for (const [entity, snapshot] of snapshots) {
      if (scheduledDeletes.has(entity)) {
        continue;
      }
      if (Object.keys(calculateDiff(snapshot, entity.readFields())).length > 0) {
        updates.push(entity);
      }
    }
    return updates;
  };

  const writeLogEntries = (entries: readonly LogEntry[]): void => {
    for (const entry of entries) {
      logTable.push({ id: logTable.length + 1, entry });
    }
    if (entries.length > 0) {
      uowLog('Wrote %d log entries', entries.length);
    }
  };

  const recomputeChangeSets = (): void => {
    plan.inserts = Array.from(scheduledInserts);
    plan.updates = computeUpdates();
    plan.deletes = Array.from(scheduledDeletes);
    plan.logEntries.push(...stagedLogEntries.splice(0));
  };

  /** Rejects conflicting identifiers before anything is applied */
  const checkInserts = (inserts: readonly StorableEntity[]): void => {
    const claimed = new Set<string>();
    for (const entity of inserts) {
      if (entity.id === undefined) {
        continue;
      }
      const key = `${entity.kind}#${entity.id}`;
      if (storedOfKind(entity.kind).has(String(entity.id)) || claimed.has(key)) {
        throw new DuplicateIdentifierError(entity.kind, entity.id);
      }
      claimed.add(key);
    }
  };

  const store = (entity: StorableEntity, id: EntityIdentifier): void => {
    snapshots.set(entity, entity.readFields());
    storedOfKind(entity.kind).set(String(id), entity);
  };

  const commitPrimary = async (cycle: FlushCycle | null): Promise<void> => {
    const { inserts, updates, deletes, logEntries } = plan;
    checkInserts(inserts);

    for (const entity of inserts) {
      let id = entity.id;
      if (id === undefined) {
        const stored = storedOfKind(entity.kind);
        do {
          id = nextId(entity.kind);
        } while (stored.has(String(id)));
        entity.assignId(id);
      }
      store(entity, id);
      scheduledInserts.delete(entity);
    }
    for (const entity of updates) {
      snapshots.set(entity, entity.readFields());
    }
    for (const entity of deletes) {
      snapshots.delete(entity);
      if (entity.id !== undefined) {
        storedOfKind(entity.kind).delete(String(entity.id));
      }
      scheduledDeletes.delete(entity);
    }
    writeLogEntries(logEntries);
    uowLog('Committed %d inserts, %d updates, %d deletes', inserts.length, updates.length, deletes.length);

    for (const entity of inserts) {
      cycle?.entityCreated(entity);
    }
  };

  /** What the capture core sees during a flush */
  const unitOfWork: UnitOfWork = {
    pendingUpdates: () => computeUpdates(),
    pendingDeletes: () => Array.from(scheduledDeletes),
    fieldChangeSet: changeSetOf,
    originalSnapshot: snapshotOf,
    associationMappings: (kind: string) => metadata[kind]?.associations ?? {},
    recomputeChangeSets,
    hasPendingWrites: () => stagedLogEntries.length > 0,
    flush: async (): Promise<void> => {
      writeLogEntries(stagedLogEntries.splice(0));
    },
  };

  const flush = async (): Promise<void> => {
    if (flushing) {
      throw new ContractViolationError('flush', 'a flush is already running on this entity manager');
    }
    flushing = true;
    plan = emptyPlan();
    const stagedBefore = [...stagedLogEntries];
    const writtenBefore = logTable.length;

    try {
      if (listener) {
        await runFlushCycle(listener, unitOfWork, commitPrimary);
      } else {
        recomputeChangeSets();
        await commitPrimary(null);
      }
    } catch (error) {
      // Entries logged by the failed cycle describe changes that were never applied
      const written = new Set(logTable.slice(writtenBefore).map(({ entry }) => entry));
      stagedLogEntries.splice(0, stagedLogEntries.length, ...stagedBefore.filter((entry) => !written.has(entry)));
      uowLog('Flush failed: %s', error instanceof Error ? error.message : String(error));
      throw error;
    } finally {
      plan = emptyPlan();
      flushing = false;
    }
  };

  return {
    persist: (value: StorableEntity | LogEntry): void => {
      if (isLogEntry(value)) {
        stagedLogEntries.push(value);
        return;
      }
      if (snapshots.has(value)) {
        scheduledDeletes.delete(value);
        return;
      }
      scheduledInserts.add(value);
    },

    remove: (entity: StorableEntity): void => {
      if (scheduledInserts.delete(entity)) {
        return;
      }
      if (!snapshots.has(entity)) {
        throw new ContractViolationError('remove', `${entity.kind}#${entity.id} is not managed by this entity manager`);
      }
      scheduledDeletes.add(entity);
    },

    manage: (entity: StorableEntity): void => {
      if (entity.id === undefined) {
        throw new ContractViolationError('manage', `${entity.kind} has no identifier; use persist() for new entities`);
      }
      store(entity, entity.id);
    },

    find: (kind: string, id: EntityIdentifier): StorableEntity | undefined => {
      return storedByKind.get(kind)?.get(String(id));
    },

    findLogEntries: (): readonly StoredLogEntry[] => [...logTable],

    attachListener: (attached: ChangeCaptureListener): void => {
      listener = attached;
    },

    flush,
  };
};
