/**
 * Change Capture Type Definitions
 *
 * Flow of one flush: scanning → awaiting-identifiers → draining-deferred → done
 *
 * @module capture/types
 */

import type { LogEntry } from '../domain/log-entry.js';
import type { UnitOfWork } from '../interfaces/unit-of-work.js';
import type { TrackedEntity } from '../types.js';

/**
 * Phase of a flush cycle
 *
 * - `scanning`: created, pre-commit scan not finished yet
 * - `awaiting-identifiers`: scan done; the engine commits primary state and reports each inserted entity
 * - `draining-deferred`: post-commit; entries staged by creation hooks are being written
 * - `done`: finished or aborted; the comment has been cleared
 */
export type FlushPhase = 'scanning' | 'awaiting-identifiers' | 'draining-deferred' | 'done';

/**
 * Hooks of one logical flush, invoked by the storage engine in order
 */
export interface FlushCycle {
  readonly phase: FlushPhase;

  /** Comment captured when the cycle began; shared by every entry of the flush */
  readonly comment: string | null;

  /** Pre-commit: log edits and deletes, then let the engine recompute its plan */
  scan(): void;

  /** Once per inserted entity, right after it received its identifier */
  entityCreated(entity: unknown): void;

  /** Post-commit: drain staged creation entries, then clear the comment */
  complete(): Promise<void>;

  /** Cleanup when the primary commit failed: clear the comment without draining */
  abort(): void;
}

export interface ChangeCaptureListener {
  /** True for tracked entities of a registered kind that are not log entries */
  isLoggable(entity: unknown): entity is TrackedEntity;

  beginFlush(unitOfWork: UnitOfWork): FlushCycle;

  /**
   * Attach the redacted previous values of `entity` to an edited or deleted entry
   *
   * @throws {ContractViolationError} For any other entry kind
   */
  saveChangeSet(entity: TrackedEntity, entry: LogEntry, unitOfWork: UnitOfWork, wasDeleted?: boolean): void;
}
