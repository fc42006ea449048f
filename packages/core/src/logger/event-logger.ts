/**
 * Event Logger
 *
 * @module logger/event-logger
 *
 * @remarks
 * Accepts log entries from the capture core, stamps them with the acting user and
 * the current time, filters them by severity and kind, and stages the survivors
 * in a {@link LogEntrySink}.
 *
 * @example
 * ```typescript
 * const logger = createEventLogger({
 *   sink: entityManager,
 *   actorProvider: actors,
 *   kindBlacklist: ['collection_element_deleted'],
 * });
 *
 * logger.log(createElementCreatedEntry(part)); // => true, staged
 * ```
 */

import { DEFAULTS, type LogEntryKind, type LogLevel } from '../constants.js';
import { ANONYMOUS_ACTOR, resolveActor } from '../context-provider.js';
import type { LogEntry } from '../domain/log-entry.js';
import { AuditConfigurationError } from '../errors.js';
import type { EventLogger, LogEntrySink } from '../interfaces/event-logger.js';
import type { AuditActor, AuditContextProvider } from '../types.js';
import { loggerLog } from '../utils/debug.js';

export interface EventLoggerOptions {
  sink: LogEntrySink;

  /** Source of the acting user; entries get the anonymous actor when absent or empty */
  actorProvider?: AuditContextProvider;

  /** Actor used outside any actor context */
  anonymousActor?: AuditActor;

  /**
   * Least severe level that is still stored
   * @default LOG_LEVEL.DEBUG (everything)
   */
  minimumLevel?: LogLevel;

  /** Kinds that are never stored */
  kindBlacklist?: readonly LogEntryKind[];

  /** When non-empty, only these kinds are stored */
  kindWhitelist?: readonly LogEntryKind[];

  /** @default () => new Date() */
  clock?: () => Date;
}

/**
 * Rejects kinds that appear in both the blacklist and the whitelist
 *
 * @throws {AuditConfigurationError}
 */
export const validateEventLoggerOptions = (options: EventLoggerOptions): void => {
  const whitelist = new Set(options.kindWhitelist ?? []);
  const conflicts = (options.kindBlacklist ?? []).filter((kind) => whitelist.has(kind));
  if (conflicts.length > 0) {
    throw new AuditConfigurationError(
      `Log entry kinds cannot be both in 'kindBlacklist' and 'kindWhitelist'. Conflicting kinds: ${conflicts.join(', ')}.`,
    );
  }
};

export const createEventLogger = (options: EventLoggerOptions): EventLogger => {
  validateEventLoggerOptions(options);

  const { sink, actorProvider } = options;
  const anonymousActor = options.anonymousActor ?? ANONYMOUS_ACTOR;
  const minimumLevel = options.minimumLevel ?? DEFAULTS.MINIMUM_LOG_LEVEL;
  const blacklist = new Set<LogEntryKind>(options.kindBlacklist ?? []);
  const whitelist = new Set<LogEntryKind>(options.kindWhitelist ?? []);
  const clock = options.clock ?? (() => new Date());

  const shouldBeAdded = (entry: LogEntry): boolean => {
    if (entry.level > minimumLevel) {
      return false;
    }
    if (blacklist.has(entry.kind)) {
      return false;
    }
    return whitelist.size === 0 || whitelist.has(entry.kind);
  };

  const log = (entry: LogEntry): boolean => {
    entry.actor = resolveActor(actorProvider, anonymousActor);
    entry.timestamp = clock();

    if (!shouldBeAdded(entry)) {
      loggerLog('Skipping %s entry for %s#%s', entry.kind, entry.targetType, entry.targetId);
      return false;
    }

    sink.persist(entry);
    loggerLog('Staged %s entry for %s#%s', entry.kind, entry.targetType, entry.targetId);
    return true;
  };

  return {
    log,

    logAndFlush: async (entry: LogEntry): Promise<boolean> => {
      const added = log(entry);
      await sink.flush();
      return added;
    },

    shouldBeAdded,
  };
};
