/** Constants and Configuration Values for Change Capture */

/** Kind of an emitted log entry */
export type LogEntryKind = 'element_created' | 'element_edited' | 'element_deleted' | 'collection_element_deleted';

/** Log entry kind constants */
export const LOG_ENTRY_KIND = {
  CREATED: 'element_created',
  EDITED: 'element_edited',
  DELETED: 'element_deleted',
  COLLECTION_ELEMENT_DELETED: 'collection_element_deleted',
} as const satisfies Record<string, LogEntryKind>;

/** Set of every log entry kind produced by the capture core */
export const LOG_ENTRY_KINDS: ReadonlySet<string> = new Set<LogEntryKind>([
  LOG_ENTRY_KIND.CREATED,
  LOG_ENTRY_KIND.EDITED,
  LOG_ENTRY_KIND.DELETED,
  LOG_ENTRY_KIND.COLLECTION_ELEMENT_DELETED,
]);

/** Type guard for log entry kind names */
export const isLogEntryKind = (kind: string): kind is LogEntryKind => {
  return LOG_ENTRY_KINDS.has(kind);
};

/**
 * Syslog severity levels (lower is more severe)
 */
export const LOG_LEVEL = {
  EMERGENCY: 0,
  ALERT: 1,
  CRITICAL: 2,
  ERROR: 3,
  WARNING: 4,
  NOTICE: 5,
  INFO: 6,
  DEBUG: 7,
} as const;

export type LogLevel = (typeof LOG_LEVEL)[keyof typeof LOG_LEVEL];

/** Default configuration values for change capture */
export const DEFAULTS = {
  SAVE_CHANGED_FIELDS: false,
  SAVE_CHANGED_DATA: false,
  SAVE_REMOVED_DATA: false,
  MAX_STRING_LENGTH: 2000,
  TRUNCATION_MARKER: '...',
  MAX_COMMENT_LENGTH: 255,
  MINIMUM_LOG_LEVEL: LOG_LEVEL.DEBUG,
} as const;
