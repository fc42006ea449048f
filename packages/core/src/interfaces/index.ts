/**
 * Core Interfaces
 *
 * Storage-agnostic contracts between the capture core and its collaborators.
 *
 * @packageDocumentation
 */

export type { EventLogger, LogEntrySink } from './event-logger.js';
export type { AssociationMapping, UnitOfWork } from './unit-of-work.js';
