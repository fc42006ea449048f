/**
 * Configuration Validation
 *
 * Checks capture configuration against the registered entity kinds before the
 * listener is built.
 *
 * @module config/validation
 */

import type { EntityKindRegistry } from '../domain/entity-kinds.js';
import { AuditConfigurationError } from '../errors.js';
import type { ResolvedCaptureOptions } from './options.js';

/** @internal */
const validateKindTable = (
  table: Readonly<Record<string, readonly string[]>>,
  tableName: string,
  registry: EntityKindRegistry,
): void => {
  for (const [kind, names] of Object.entries(table)) {
    if (!registry.isTracked(kind)) {
      throw new AuditConfigurationError(
        `'${tableName}' names entity kind '${kind}', which is not registered. Registered kinds: ${registry.kinds().join(', ')}.`,
        kind,
      );
    }
    const empty = names.filter((name) => name.trim() === '');
    if (empty.length > 0) {
      throw new AuditConfigurationError(`'${tableName}' for entity kind '${kind}' contains an empty field name.`, kind);
    }
  }
};

/**
 * Validates resolved capture options
 *
 * @throws {AuditConfigurationError} If a table names an unregistered kind or the length limits are unusable
 */
export const validateCaptureOptions = (options: ResolvedCaptureOptions): void => {
  validateKindTable(options.fieldBlacklist, 'fieldBlacklist', options.registry);
  validateKindTable(options.associationTriggers, 'associationTriggers', options.registry);

  if (!Number.isInteger(options.maxStringLength) || options.maxStringLength <= options.truncationMarker.length) {
    throw new AuditConfigurationError(
      `'maxStringLength' must be an integer greater than the truncation marker length (${options.truncationMarker.length}). Received: ${options.maxStringLength}.`,
    );
  }
};
