/**
 * Record-backed tracked entity
 *
 * @module record-entity
 */

import { ContractViolationError, type EntityIdentifier, isTrackedEntity, type TrackedEntity } from '@entity-audit/core';

/**
 * Tracked entity the entity manager can store
 *
 * @remarks
 * `assignId` is called once, during the flush that inserts the entity.
 */
export interface StorableEntity extends TrackedEntity {
  assignId(id: EntityIdentifier): void;
}

export const isStorableEntity = (value: unknown): value is StorableEntity => {
  return isTrackedEntity(value) && 'assignId' in value && typeof value.assignId === 'function';
};

/**
 * Generic entity holding its fields in a plain record
 *
 * @example
 * ```typescript
 * const part = createRecordEntity('Part', { name: 'R1', category });
 * part.set('name', 'R1 0805');
 * part.readFields(); // => { name: 'R1 0805', category }
 * ```
 */
export class RecordEntity implements StorableEntity {
  private identifier: EntityIdentifier | undefined;
  private readonly fields: Record<string, unknown>;

  constructor(
    readonly kind: string,
    fields: Readonly<Record<string, unknown>> = {},
    id?: EntityIdentifier,
  ) {
    this.fields = { ...fields };
    this.identifier = id;
  }

  get id(): EntityIdentifier | undefined {
    return this.identifier;
  }

  assignId(id: EntityIdentifier): void {
    if (this.identifier !== undefined) {
      throw new ContractViolationError('assignId', `${this.kind}#${this.identifier} already has an identifier`);
    }
    this.identifier = id;
  }

  get(fieldName: string): unknown {
    return this.fields[fieldName];
  }

  set(fieldName: string, value: unknown): this {
    this.fields[fieldName] = value;
    return this;
  }

  /** Shallow copy of the current field values */
  readFields(): Readonly<Record<string, unknown>> {
    return { ...this.fields };
  }
}

export const createRecordEntity = (
  kind: string,
  fields: Readonly<Record<string, unknown>> = {},
  id?: EntityIdentifier,
): RecordEntity => new RecordEntity(kind, fields, id);
