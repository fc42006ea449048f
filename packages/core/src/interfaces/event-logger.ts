/**
 * Event Logger Interfaces
 *
 * @packageDocumentation
 */

import type { LogEntry } from '../domain/log-entry.js';

/**
 * Storage a log entry is staged in
 *
 * @remarks
 * Usually the same unit of work that holds the audited entities, so staged entries
 * are written by that unit of work's next commit.
 */
export interface LogEntrySink {
  persist(entry: LogEntry): void;
  flush(): Promise<void>;
}

export interface EventLogger {
  /**
   * Stamp actor and timestamp on the entry and stage it
   *
   * @returns False when the entry was filtered out by level or kind
   */
  log(entry: LogEntry): boolean;

  /** `log` followed by a flush of the sink */
  logAndFlush(entry: LogEntry): Promise<boolean>;

  shouldBeAdded(entry: LogEntry): boolean;
}
