/**
 * Debug logging utilities using the `debug` package
 *
 * Enable logging by setting the DEBUG environment variable.
 *
 * @example Environment variable configuration
 * ```bash
 * # Enable all audit logs
 * DEBUG=entity-audit:* node app.js
 *
 * # Enable specific namespaces
 * DEBUG=entity-audit:capture npm test
 * DEBUG=entity-audit:logger npm start
 * ```
 */

import type { Debugger } from 'debug';
import debug from 'debug';

/**
 * Debug logger for the flush-cycle hooks
 */
export const captureLog: Debugger = debug('entity-audit:capture');

/**
 * Debug logger for the event logger sink
 */
export const loggerLog: Debugger = debug('entity-audit:logger');

/**
 * Debug logger for value conversion and other core helpers
 */
export const coreLog: Debugger = debug('entity-audit:core');
