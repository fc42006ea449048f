/** @entity-audit/core - Storage-agnostic change capture for audit logging */

// Capture
export { createChangeCaptureListener, runFlushCycle } from './capture/listener.js';
export type { ChangeCaptureListener, FlushCycle, FlushPhase } from './capture/types.js';
// Change Set
export type {
  ChangeSet,
  ChangeSetBuilder,
  ChangeSetBuilderOptions,
  DiffSource,
} from './change-set/change-set-builder.js';
export { createChangeSetBuilder } from './change-set/change-set-builder.js';
// Comment Context
export type { CommentContext, CommentContextOptions } from './comment/comment-context.js';
export { createCommentContext } from './comment/comment-context.js';
// Config
export type { CaptureFlags, CaptureOptions, ResolvedCaptureOptions } from './config/index.js';
export { resolveCaptureOptions, validateCaptureOptions } from './config/index.js';
// Constants
export type { LogEntryKind, LogLevel } from './constants.js';
export { DEFAULTS, isLogEntryKind, LOG_ENTRY_KIND, LOG_ENTRY_KINDS, LOG_LEVEL } from './constants.js';
// Context Provider
export { ANONYMOUS_ACTOR, createAsyncLocalStorageProvider, resolveActor } from './context-provider.js';
// Domain - Branded Types
export type { EntityId } from './domain/branded-types.js';
export { createEntityId, IdValidationError, isEntityId, unwrapId } from './domain/branded-types.js';
// Domain - Entity Kinds
export type {
  EntityKindDefinition,
  EntityKindDefinitions,
  EntityKindRegistry,
} from './domain/entity-kinds.js';
export { closeOverKinds, createEntityKindRegistry } from './domain/entity-kinds.js';
// Domain - Log Entries
export type {
  ChangeSetLogEntry,
  CollectionElementDeletedLogEntry,
  CollectionElementDeletedPayload,
  ElementCreatedLogEntry,
  ElementCreatedPayload,
  ElementDeletedLogEntry,
  ElementDeletedPayload,
  ElementEditedLogEntry,
  ElementEditedPayload,
  LogEntry,
} from './domain/log-entry.js';
export {
  createCollectionElementDeletedEntry,
  createElementCreatedEntry,
  createElementDeletedEntry,
  createElementEditedEntry,
  getChangedFields,
  getCollectionName,
  getComment,
  getCreationStockValue,
  getDeletedElementId,
  getDeletedElementKind,
  getOldData,
  getOldName,
  hasChangedFieldsInfo,
  hasComment,
  hasCreationStockValue,
  hasOldDataInformation,
  isChangeSetLogEntry,
  isLogEntry,
  setChangedFields,
  setComment,
  setCreationStockValue,
  setOldData,
  supportsComment,
} from './domain/log-entry.js';
// Errors
export { AuditConfigurationError, ContractViolationError } from './errors.js';
// Interfaces
export type { AssociationMapping, EventLogger, LogEntrySink, UnitOfWork } from './interfaces/index.js';
// Event Logger
export type { EventLoggerOptions } from './logger/event-logger.js';
export { createEventLogger, validateEventLoggerOptions } from './logger/event-logger.js';
// Policy
export type { AssociationTriggers, AssociationTriggerTable } from './policy/association-triggers.js';
export { createAssociationTriggerTable } from './policy/association-triggers.js';
export type { FieldBlacklist, RedactionPolicy } from './policy/redaction-policy.js';
export { createRedactionPolicy } from './policy/redaction-policy.js';
// Types
export type {
  ActorCategory,
  AuditActor,
  AuditContext,
  AuditContextProvider,
  BuiltInActorCategory,
  EntityIdentifier,
  TrackedEntity,
} from './types.js';
export { isTrackedEntity } from './types.js';
// Utils - Debug
export { captureLog, coreLog, loggerLog } from './utils/debug.js';
// Utils - Diff Calculator
export type { DiffCalculator, FieldChange, FieldChangeSet } from './utils/diff-calculator.js';
export { createDiffCalculator } from './utils/diff-calculator.js';
// Utils - Serialization
export type { ChangeSetValue } from './utils/serialization.js';
export { CIRCULAR_MARKER, toChangeSetValue, toSerializable } from './utils/serialization.js';
// Utils - Truncation
export { truncateString } from './utils/truncate.js';
