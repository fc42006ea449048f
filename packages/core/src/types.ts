/**
 * Built-in actor categories for common use cases
 */
export type BuiltInActorCategory = 'model' | 'system' | 'external' | 'anonymous';

/**
 * Category of actor for high-level grouping
 *
 * Supports both built-in categories with TypeScript autocompletion and custom string values.
 */
export type ActorCategory = BuiltInActorCategory | (string & {});

/**
 * Represents the actor who performed a change
 */
export interface AuditActor {
  /** Category for high-level grouping (e.g., 'model', 'system', 'anonymous') */
  category: ActorCategory;
  /** Specific type of the actor (e.g., 'User', 'CronJob') */
  type: string;
  /** Unique identifier of the actor */
  id: string;
  /** Optional human-readable name of the actor */
  name?: string;
}

/**
 * Context information for the actor performing a flush
 *
 * @example
 * ```typescript
 * const context: AuditContext = {
 *   actor: { category: 'model', type: 'User', id: 'user-123', name: 'Alice' },
 *   request: { ipAddress: '192.168.1.1', path: '/parts/42' },
 * };
 * ```
 */
export interface AuditContext {
  /** The actor who performed the change */
  actor: AuditActor;

  /** Free-form request metadata (HTTP path, job name, trace id, ...) */
  request?: Record<string, unknown>;
}

/**
 * Framework-agnostic interface for actor context providers
 * Implementations should use AsyncLocalStorage or similar mechanism
 */
export interface AuditContextProvider {
  /**
   * Get the current audit context
   * @returns The current audit context or undefined if not set
   */
  getContext(): AuditContext | undefined;

  /**
   * Get the current audit context (throws if not available)
   *
   * @throws {Error} If context is not available
   */
  useContext(): AuditContext;

  /** Run a synchronous function with the given audit context */
  run<T>(context: AuditContext, fn: () => T): T;

  /** Run an asynchronous function with the given audit context */
  runAsync<T>(context: AuditContext, fn: () => Promise<T>): Promise<T>;
}

/** Identifier assigned to an entity by the storage engine */
export type EntityIdentifier = string | number;

/**
 * Readable-field capability every tracked entity kind implements
 *
 * @remarks
 * `id` stays `undefined` until the storage engine assigns it during commit.
 * `readFields()` returns the current field values; association fields hold other
 * tracked entities (or null).
 */
export interface TrackedEntity {
  readonly kind: string;
  readonly id: EntityIdentifier | undefined;
  readFields(): Readonly<Record<string, unknown>>;
}

/** Type guard for values exposing the readable-field capability */
export const isTrackedEntity = (value: unknown): value is TrackedEntity => {
  return (
    typeof value === 'object' &&
    value !== null &&
    'kind' in value &&
    typeof value.kind === 'string' &&
    'readFields' in value &&
    typeof value.readFields === 'function'
  );
};
