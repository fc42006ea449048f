/**
 * Entity Metadata
 *
 * @module metadata
 *
 * @remarks
 * Per-kind storage metadata: association mappings (read by the capture core when a
 * deleted child must be logged on its parent) and the identifier strategy.
 *
 * @example
 * ```typescript
 * const metadata = defineMetadata({
 *   Part: { idStrategy: 'increment' },
 *   PartLot: {
 *     idStrategy: 'increment',
 *     associations: { part: { targetKind: 'Part', inversedBy: 'partLots' } },
 *   },
 * });
 * ```
 */

import { type AssociationMapping, AuditConfigurationError } from '@entity-audit/core';
import type { IdStrategy } from './utils/id-generator.js';

export interface EntityKindMetadata {
  /** Association field name → mapping */
  associations?: Readonly<Record<string, AssociationMapping>>;
  /** @default 'cuid2' */
  idStrategy?: IdStrategy;
}

export type EntityMetadata = Readonly<Record<string, EntityKindMetadata>>;

/**
 * Validates association targets and inverse names
 *
 * @throws {AuditConfigurationError} If an association targets a kind without metadata
 *   or names an empty inverse collection
 */
export const validateMetadata = (metadata: EntityMetadata): void => {
  for (const [kind, kindMetadata] of Object.entries(metadata)) {
    for (const [fieldName, mapping] of Object.entries(kindMetadata.associations ?? {})) {
      if (!Object.hasOwn(metadata, mapping.targetKind)) {
        throw new AuditConfigurationError(
          `Association '${kind}.${fieldName}' targets kind '${mapping.targetKind}', which has no metadata.`,
          kind,
        );
      }
      if (mapping.inversedBy !== undefined && mapping.inversedBy !== null && mapping.inversedBy.trim() === '') {
        throw new AuditConfigurationError(`Association '${kind}.${fieldName}' has an empty inverse name.`, kind);
      }
    }
  }
};

/** Validate and return metadata unchanged */
export const defineMetadata = <T extends EntityMetadata>(metadata: T): T => {
  validateMetadata(metadata);
  return metadata;
};
