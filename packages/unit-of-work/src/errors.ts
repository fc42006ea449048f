import type { EntityIdentifier } from '@entity-audit/core';

/** Insert rejected because another stored entity of the same kind has the identifier */
export class DuplicateIdentifierError extends Error {
  constructor(
    public readonly entityKind: string,
    public readonly id: EntityIdentifier,
  ) {
    super(`[entity-audit] ${entityKind}#${id} already exists`);
    this.name = 'DuplicateIdentifierError';
  }
}
