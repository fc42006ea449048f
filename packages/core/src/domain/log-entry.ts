/**
 * Log Entry Model
 *
 * @module domain/log-entry
 *
 * @remarks
 * Tagged variants sharing one envelope: target reference, severity level, and the
 * timestamp/actor pair the event logger fills in when it accepts the entry.
 * Kind-specific data lives in a compact payload to keep stored rows small:
 *
 * | Key | Kinds | Meaning |
 * |-----|-------|---------|
 * | `m` | all | reason-for-change comment |
 * | `i` | created | stock value at creation time |
 * | `i` | collection element deleted | id of the deleted element |
 * | `f` | edited | changed field names |
 * | `d` | edited, deleted | field → previous value |
 * | `n` | deleted | display name of the deleted element |
 * | `n` | collection element deleted | name of the collection the element left |
 * | `c` | collection element deleted | kind of the deleted element |
 *
 * Absent keys read as "not present".
 */

import { LOG_ENTRY_KIND, LOG_LEVEL, type LogEntryKind, type LogLevel } from '../constants.js';
import type { ChangeSet } from '../change-set/change-set-builder.js';
import type { AuditActor, TrackedEntity } from '../types.js';
import { createEntityId, type EntityId } from './branded-types.js';

interface CommentPayload {
  m?: string;
}

export interface ElementCreatedPayload extends CommentPayload {
  i?: string;
}

export interface ElementEditedPayload extends CommentPayload {
  f?: string[];
  d?: ChangeSet;
}

export interface ElementDeletedPayload extends CommentPayload {
  d?: ChangeSet;
  n?: string;
}

export interface CollectionElementDeletedPayload extends CommentPayload {
  n: string;
  c: string;
  i: EntityId | null;
}

interface LogEntryEnvelope<TKind extends LogEntryKind, TPayload> {
  readonly kind: TKind;
  readonly targetType: string;
  /** Null only when the target had no identifier yet */
  readonly targetId: EntityId | null;
  readonly level: LogLevel;
  /** Set by the event logger */
  timestamp: Date | null;
  /** Set by the event logger */
  actor: AuditActor | null;
  readonly payload: TPayload;
}

export type ElementCreatedLogEntry = LogEntryEnvelope<'element_created', ElementCreatedPayload>;
export type ElementEditedLogEntry = LogEntryEnvelope<'element_edited', ElementEditedPayload>;
export type ElementDeletedLogEntry = LogEntryEnvelope<'element_deleted', ElementDeletedPayload>;
export type CollectionElementDeletedLogEntry = LogEntryEnvelope<
  'collection_element_deleted',
  CollectionElementDeletedPayload
>;

export type LogEntry =
  | ElementCreatedLogEntry
  | ElementEditedLogEntry
  | ElementDeletedLogEntry
  | CollectionElementDeletedLogEntry;

/** Entries that can carry a previous-value change set */
export type ChangeSetLogEntry = ElementEditedLogEntry | ElementDeletedLogEntry;

const targetIdOf = (entity: TrackedEntity): EntityId | null => {
  return entity.id === undefined ? null : createEntityId(entity.id);
};

const envelope = <TKind extends LogEntryKind, TPayload>(
  kind: TKind,
  target: TrackedEntity,
  payload: TPayload,
): LogEntryEnvelope<TKind, TPayload> => ({
  kind,
  targetType: target.kind,
  targetId: targetIdOf(target),
  level: LOG_LEVEL.INFO,
  timestamp: null,
  actor: null,
  payload,
});

// ============================================================================
// Factories
// ============================================================================

/**
 * Entry for a newly inserted entity
 *
 * @remarks
 * Build it once the entity has its identifier. A creation stock value can be
 * attached with {@link setCreationStockValue} before the entry is logged.
 */
export const createElementCreatedEntry = (entity: TrackedEntity): ElementCreatedLogEntry => {
  return envelope<'element_created', ElementCreatedPayload>(LOG_ENTRY_KIND.CREATED, entity, {});
};

export const createElementEditedEntry = (entity: TrackedEntity): ElementEditedLogEntry => {
  return envelope<'element_edited', ElementEditedPayload>(LOG_ENTRY_KIND.EDITED, entity, {});
};

/** Entry for a deleted entity; records its `name` field when it has a string one */
export const createElementDeletedEntry = (entity: TrackedEntity): ElementDeletedLogEntry => {
  const name = entity.readFields().name;
  const payload: ElementDeletedPayload = typeof name === 'string' ? { n: name } : {};
  return envelope(LOG_ENTRY_KIND.DELETED, entity, payload);
};

/**
 * Entry recording that `deletedElement` left collection `collectionName` of `changedElement`
 *
 * @example
 * ```typescript
 * // A PartLot was deleted; its part lost an element of `partLots`
 * createCollectionElementDeletedEntry(part, 'partLots', partLot);
 * ```
 */
export const createCollectionElementDeletedEntry = (
  changedElement: TrackedEntity,
  collectionName: string,
  deletedElement: TrackedEntity,
): CollectionElementDeletedLogEntry => {
  return envelope<'collection_element_deleted', CollectionElementDeletedPayload>(
    LOG_ENTRY_KIND.COLLECTION_ELEMENT_DELETED,
    changedElement,
    {
      n: collectionName,
      c: deletedElement.kind,
      i: targetIdOf(deletedElement),
    },
  );
};

// ============================================================================
// Guards
// ============================================================================

const LOG_ENTRY_KIND_VALUES: ReadonlySet<unknown> = new Set<unknown>(Object.values(LOG_ENTRY_KIND));

/** Type guard for log entries, used to keep the capture core from logging its own output */
export const isLogEntry = (value: unknown): value is LogEntry => {
  return (
    typeof value === 'object' &&
    value !== null &&
    'kind' in value &&
    LOG_ENTRY_KIND_VALUES.has(value.kind) &&
    'payload' in value &&
    typeof value.payload === 'object' &&
    value.payload !== null
  );
};

export const isChangeSetLogEntry = (entry: LogEntry): entry is ChangeSetLogEntry => {
  return entry.kind === LOG_ENTRY_KIND.EDITED || entry.kind === LOG_ENTRY_KIND.DELETED;
};

// ============================================================================
// Payload accessors
// ============================================================================

/** Collection-element entries are never given a comment by the capture core */
export const supportsComment = (entry: LogEntry): entry is ElementCreatedLogEntry | ChangeSetLogEntry => {
  return entry.kind !== LOG_ENTRY_KIND.COLLECTION_ELEMENT_DELETED;
};

export const hasComment = (entry: LogEntry): boolean => entry.payload.m !== undefined;

export const getComment = (entry: LogEntry): string | null => entry.payload.m ?? null;

/** Sets (or, with `null`, removes) the comment of an entry */
export const setComment = <T extends LogEntry>(entry: T, comment: string | null): T => {
  if (comment === null) {
    delete entry.payload.m;
  } else {
    entry.payload.m = comment;
  }
  return entry;
};

export const getCreationStockValue = (entry: ElementCreatedLogEntry): string | null => entry.payload.i ?? null;

export const hasCreationStockValue = (entry: ElementCreatedLogEntry): boolean => entry.payload.i !== undefined;

export const setCreationStockValue = (entry: ElementCreatedLogEntry, value: string): ElementCreatedLogEntry => {
  entry.payload.i = value;
  return entry;
};

export const setChangedFields = (entry: ElementEditedLogEntry, fieldNames: readonly string[]): ElementEditedLogEntry => {
  entry.payload.f = [...fieldNames];
  return entry;
};

/** True when the entry knows which fields changed, through `f` or `d` */
export const hasChangedFieldsInfo = (entry: ElementEditedLogEntry): boolean => {
  return entry.payload.f !== undefined || entry.payload.d !== undefined;
};

/** Changed field names: the keys of `d` when present, else `f`, else empty */
export const getChangedFields = (entry: ElementEditedLogEntry): string[] => {
  if (entry.payload.d !== undefined) {
    return Object.keys(entry.payload.d);
  }
  return entry.payload.f ? [...entry.payload.f] : [];
};

export const setOldData = <T extends ChangeSetLogEntry>(entry: T, oldData: ChangeSet): T => {
  entry.payload.d = oldData;
  return entry;
};

export const hasOldDataInformation = (entry: ChangeSetLogEntry): boolean => entry.payload.d !== undefined;

export const getOldData = (entry: ChangeSetLogEntry): ChangeSet => entry.payload.d ?? {};

export const getOldName = (entry: ElementDeletedLogEntry): string | null => entry.payload.n ?? null;

export const getCollectionName = (entry: CollectionElementDeletedLogEntry): string => entry.payload.n;

export const getDeletedElementKind = (entry: CollectionElementDeletedLogEntry): string => entry.payload.c;

export const getDeletedElementId = (entry: CollectionElementDeletedLogEntry): EntityId | null => entry.payload.i;
