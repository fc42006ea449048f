/**
 * Change-Capture Listener
 *
 * @module capture/listener
 *
 * @remarks
 * Turns the pending mutations of a unit of work into log entries. The storage
 * engine opens one {@link FlushCycle} per flush and drives its hooks:
 *
 * 1. `scan()` before the write plan is final: edited and deleted entries are
 *    built and logged right away, since their targets already have identifiers.
 * 2. `entityCreated()` after each insert: created entries can only be built once
 *    the identifier exists, so they are logged here.
 * 3. `complete()` after the primary commit: entries staged in step 2 are still
 *    unwritten and are drained with one more flush of the unit of work.
 *
 * @example
 * ```typescript
 * const listener = createChangeCaptureListener({
 *   registry,
 *   logger,
 *   comments,
 *   fieldBlacklist: { User: ['password'] },
 *   associationTriggers: { PartLot: ['part'] },
 *   saveChangedData: true,
 * });
 *
 * await runFlushCycle(listener, unitOfWork, async (cycle) => {
 *   for (const entity of insertEntities()) cycle.entityCreated(entity);
 * });
 * ```
 */

import { createChangeSetBuilder, type DiffSource } from '../change-set/change-set-builder.js';
import { type CaptureOptions, resolveCaptureOptions } from '../config/options.js';
import { validateCaptureOptions } from '../config/validation.js';
import {
  createCollectionElementDeletedEntry,
  createElementCreatedEntry,
  createElementDeletedEntry,
  createElementEditedEntry,
  isChangeSetLogEntry,
  isLogEntry,
  type LogEntry,
  setChangedFields,
  setComment,
  setOldData,
} from '../domain/log-entry.js';
import { AuditConfigurationError, ContractViolationError } from '../errors.js';
import type { UnitOfWork } from '../interfaces/unit-of-work.js';
import { createAssociationTriggerTable } from '../policy/association-triggers.js';
import { createRedactionPolicy } from '../policy/redaction-policy.js';
import { isTrackedEntity, type TrackedEntity } from '../types.js';
import { captureLog } from '../utils/debug.js';
import type { ChangeCaptureListener, FlushCycle, FlushPhase } from './types.js';

/**
 * Create a change-capture listener
 *
 * @throws {AuditConfigurationError} If the configuration names unregistered kinds or unusable limits
 */
export const createChangeCaptureListener = (options: CaptureOptions): ChangeCaptureListener => {
  const config = resolveCaptureOptions(options);
  validateCaptureOptions(config);

  const { registry, logger, comments } = config;
  const policy = createRedactionPolicy(config.fieldBlacklist, registry);
  const triggers = createAssociationTriggerTable(config.associationTriggers, registry);
  const changeSetBuilder = createChangeSetBuilder({
    policy,
    maxStringLength: config.maxStringLength,
    truncationMarker: config.truncationMarker,
  });

  const isLoggable = (entity: unknown): entity is TrackedEntity => {
    return isTrackedEntity(entity) && !isLogEntry(entity) && registry.isTracked(entity.kind);
  };

  const saveChangeSet = (entity: TrackedEntity, entry: LogEntry, unitOfWork: UnitOfWork, wasDeleted = false): void => {
    if (!isChangeSetLogEntry(entry)) {
      throw new ContractViolationError(
        'saveChangeSet',
        `expected an element_edited or element_deleted entry, received '${entry.kind}'`,
      );
    }

    const source: DiffSource = wasDeleted
      ? { type: 'snapshot', snapshot: unitOfWork.originalSnapshot(entity) }
      : { type: 'changes', changes: unitOfWork.fieldChangeSet(entity) };

    setOldData(entry, changeSetBuilder.build(entity, source, wasDeleted));
  };

  const logElementEdited = (entity: TrackedEntity, unitOfWork: UnitOfWork, comment: string | null): void => {
    const entry = createElementEditedEntry(entity);
    if (config.saveChangedData) {
      saveChangeSet(entity, entry, unitOfWork);
    } else if (config.saveChangedFields) {
      const changedFields = Object.keys(unitOfWork.fieldChangeSet(entity));
      setChangedFields(entry, policy.filterFieldNames(entity.kind, changedFields));
    }
    setComment(entry, comment);
    logger.log(entry);
  };

  const logCollectionElementsDeleted = (entity: TrackedEntity, unitOfWork: UnitOfWork): void => {
    const associationNames = triggers.associationsFor(entity.kind);
    if (associationNames.length === 0) {
      return;
    }

    const mappings = unitOfWork.associationMappings(entity.kind);
    const fields = entity.readFields();

    for (const associationName of associationNames) {
      const mapping = mappings[associationName];
      if (!mapping) {
        throw new AuditConfigurationError(
          `Association trigger '${associationName}' is not an association of entity kind '${entity.kind}'.`,
          entity.kind,
        );
      }
      if (!Object.hasOwn(fields, associationName)) {
        throw new AuditConfigurationError(
          `Entity kind '${entity.kind}' does not expose the field '${associationName}' named by an association trigger.`,
          entity.kind,
        );
      }
      if (!mapping.inversedBy) {
        throw new AuditConfigurationError(
          `Association '${entity.kind}.${associationName}' has no inverse side to log a removed collection element on.`,
          entity.kind,
        );
      }

      const changed = fields[associationName];
      if (changed === null || changed === undefined) {
        continue;
      }
      if (!isTrackedEntity(changed)) {
        throw new AuditConfigurationError(
          `Association '${entity.kind}.${associationName}' does not hold a tracked entity.`,
          entity.kind,
        );
      }

      logger.log(createCollectionElementDeletedEntry(changed, mapping.inversedBy, entity));
    }
  };

  const logElementDeleted = (entity: TrackedEntity, unitOfWork: UnitOfWork, comment: string | null): void => {
    const entry = createElementDeletedEntry(entity);
    setComment(entry, comment);
    if (config.saveRemovedData || config.saveChangedData) {
      saveChangeSet(entity, entry, unitOfWork, true);
    }
    logger.log(entry);

    if (config.saveChangedData) {
      logCollectionElementsDeleted(entity, unitOfWork);
    }
  };

  const beginFlush = (unitOfWork: UnitOfWork): FlushCycle => {
    const comment = comments.getMessage();
    const created = new WeakSet<object>();
    let phase: FlushPhase = 'scanning';

    const expectPhase = (expected: FlushPhase, operation: string): void => {
      if (phase !== expected) {
        throw new ContractViolationError(operation, `called in phase '${phase}', expected '${expected}'`);
      }
    };

    const finish = (): void => {
      comments.clearMessage();
      phase = 'done';
    };

    return {
      get phase() {
        return phase;
      },

      comment,

      scan: (): void => {
        expectPhase('scanning', 'scan');

        const updates = unitOfWork.pendingUpdates().filter(isLoggable);
        const deletions = unitOfWork.pendingDeletes().filter(isLoggable);
        captureLog('Scanning %d updates and %d deletions', updates.length, deletions.length);

        for (const entity of updates) {
          logElementEdited(entity, unitOfWork, comment);
        }
        for (const entity of deletions) {
          logElementDeleted(entity, unitOfWork, comment);
        }

        unitOfWork.recomputeChangeSets();
        phase = 'awaiting-identifiers';
      },

      entityCreated: (entity: unknown): void => {
        expectPhase('awaiting-identifiers', 'entityCreated');
        if (!isLoggable(entity)) {
          return;
        }
        if (created.has(entity)) {
          throw new ContractViolationError('entityCreated', `${entity.kind}#${entity.id} was reported twice`);
        }
        created.add(entity);

        const entry = createElementCreatedEntry(entity);
        setComment(entry, comment);
        logger.log(entry);
      },

      complete: async (): Promise<void> => {
        expectPhase('awaiting-identifiers', 'complete');
        phase = 'draining-deferred';
        try {
          if (unitOfWork.hasPendingWrites()) {
            captureLog('Draining entries staged after the primary commit');
            await unitOfWork.flush();
          }
        } finally {
          finish();
        }
      },

      abort: (): void => {
        if (phase !== 'done') {
          captureLog('Aborting flush cycle in phase %s', phase);
        }
        finish();
      },
    };
  };

  return {
    isLoggable,
    beginFlush,
    saveChangeSet,
  };
};

/**
 * Run one flush cycle around the engine's primary commit
 *
 * @remarks
 * Scans, lets `commitPrimary` write entity state and report inserted entities,
 * then completes the cycle. If scanning or the primary commit throws, the cycle
 * is aborted (the comment is still cleared) and the error propagates unchanged.
 */
export const runFlushCycle = async (
  listener: ChangeCaptureListener,
  unitOfWork: UnitOfWork,
  commitPrimary: (cycle: FlushCycle) => Promise<void>,
): Promise<void> => {
  const cycle = listener.beginFlush(unitOfWork);
  try {
    cycle.scan();
    await commitPrimary(cycle);
  } catch (error) {
    cycle.abort();
    throw error;
  }
  await cycle.complete();
};
