/**
 * Capture Configuration
 *
 * @module config/options
 */

import type { CommentContext } from '../comment/comment-context.js';
import { DEFAULTS } from '../constants.js';
import type { EntityKindRegistry } from '../domain/entity-kinds.js';
import type { EventLogger } from '../interfaces/event-logger.js';
import type { AssociationTriggers } from '../policy/association-triggers.js';
import type { FieldBlacklist } from '../policy/redaction-policy.js';

/**
 * What an edit or delete records
 *
 * - `saveChangedFields`: names of the changed fields on edits
 * - `saveChangedData`: full redacted previous values on edits and deletes, plus
 *   collection-element-deleted entries; wins over `saveChangedFields`
 * - `saveRemovedData`: previous values on deletes
 */
export interface CaptureFlags {
  saveChangedFields: boolean;
  saveChangedData: boolean;
  saveRemovedData: boolean;
}

export interface CaptureOptions extends Partial<CaptureFlags> {
  /** Tracked entity kinds; anything else is never logged */
  registry: EntityKindRegistry;

  logger: EventLogger;

  comments: CommentContext;

  /** Fields never stored, per kind (applies to subtypes) */
  fieldBlacklist?: FieldBlacklist;

  /** Associations whose removal is logged on the parent, per kind (applies to subtypes) */
  associationTriggers?: AssociationTriggers;

  /** @default 2000 */
  maxStringLength?: number;

  /** @default '...' */
  truncationMarker?: string;
}

export interface ResolvedCaptureOptions extends CaptureFlags {
  registry: EntityKindRegistry;
  logger: EventLogger;
  comments: CommentContext;
  fieldBlacklist: FieldBlacklist;
  associationTriggers: AssociationTriggers;
  maxStringLength: number;
  truncationMarker: string;
}

/**
 * Fill in defaults for every optional capture setting
 *
 * @example
 * ```typescript
 * resolveCaptureOptions({ registry, logger, comments, saveChangedData: true });
 * // => { ..., saveChangedFields: false, saveChangedData: true, saveRemovedData: false,
 * //      maxStringLength: 2000, truncationMarker: '...', fieldBlacklist: {}, associationTriggers: {} }
 * ```
 */
export const resolveCaptureOptions = (options: CaptureOptions): ResolvedCaptureOptions => ({
  registry: options.registry,
  logger: options.logger,
  comments: options.comments,
  saveChangedFields: options.saveChangedFields ?? DEFAULTS.SAVE_CHANGED_FIELDS,
  saveChangedData: options.saveChangedData ?? DEFAULTS.SAVE_CHANGED_DATA,
  saveRemovedData: options.saveRemovedData ?? DEFAULTS.SAVE_REMOVED_DATA,
  fieldBlacklist: options.fieldBlacklist ?? {},
  associationTriggers: options.associationTriggers ?? {},
  maxStringLength: options.maxStringLength ?? DEFAULTS.MAX_STRING_LENGTH,
  truncationMarker: options.truncationMarker ?? DEFAULTS.TRUNCATION_MARKER,
});
