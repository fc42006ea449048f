/**
 * Error types raised by the change-capture core
 *
 * Storage failures are not wrapped; they propagate from the unit of work unchanged.
 */

/** A caller broke the contract of a capture operation (programming error, never retried) */
export class ContractViolationError extends Error {
  constructor(
    public readonly operation: string,
    message: string,
  ) {
    super(`[entity-audit] ${operation}: ${message}`);
    this.name = 'ContractViolationError';
  }
}

/** Capture configuration is inconsistent with the registered entity kinds or mappings */
export class AuditConfigurationError extends Error {
  constructor(
    message: string,
    public readonly entityKind?: string,
  ) {
    super(`Configuration error: ${message}`);
    this.name = 'AuditConfigurationError';
  }
}
