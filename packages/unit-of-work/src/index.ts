/** @entity-audit/unit-of-work - In-process unit of work driving entity-audit change capture */

// Entity Manager
export type { EntityManager, EntityManagerOptions, StoredLogEntry } from './entity-manager.js';
export { createEntityManager } from './entity-manager.js';
// Errors
export { DuplicateIdentifierError } from './errors.js';
// Metadata
export type { EntityKindMetadata, EntityMetadata } from './metadata.js';
export { defineMetadata, validateMetadata } from './metadata.js';
// Record Entity
export type { StorableEntity } from './record-entity.js';
export { createRecordEntity, isStorableEntity, RecordEntity } from './record-entity.js';
// Utils
export { uowLog } from './utils/debug.js';
export type { IdGenerator, IdStrategy } from './utils/id-generator.js';
export { createIdGenerator } from './utils/id-generator.js';
