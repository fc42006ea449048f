/**
 * Identifier Generation
 *
 * Identifiers are assigned during phase 1 of a flush, right before the creation
 * callbacks run.
 *
 * **Strategies:**
 * - `cuid2`: CUID v2 strings (default)
 * - `uuid`: UUID v4 strings
 * - `increment`: 1, 2, 3, ... per entity kind
 *
 * @example
 * ```typescript
 * const nextId = createIdGenerator('increment');
 * nextId(); // => 1
 * nextId(); // => 2
 * ```
 */

import { randomUUID } from 'node:crypto';
import { createId } from '@paralleldrive/cuid2';
import type { EntityIdentifier } from '@entity-audit/core';

export type IdStrategy = 'cuid2' | 'uuid' | 'increment';

/**
 * ID generator function type
 */
export type IdGenerator = () => EntityIdentifier;

/**
 * Create a fresh generator for a strategy
 *
 * @remarks
 * `increment` generators keep their own counter, so each kind gets its own sequence.
 */
export const createIdGenerator = (strategy: IdStrategy): IdGenerator => {
  switch (strategy) {
    case 'cuid2':
      return () => createId();
    case 'uuid':
      return () => randomUUID();
    case 'increment': {
      let last = 0;
      return () => {
        last += 1;
        return last;
      };
    }
  }
};
