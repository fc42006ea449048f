/**
 * Debug logging for the unit of work
 *
 * @example
 * ```bash
 * DEBUG=entity-audit:uow npm test
 * ```
 */

import type { Debugger } from 'debug';
import debug from 'debug';

/**
 * Debug logger for flush planning and commit
 */
export const uowLog: Debugger = debug('entity-audit:uow');
