import { AsyncLocalStorage } from 'node:async_hooks';
import type { AuditActor, AuditContext, AuditContextProvider } from './types.js';

/** Actor recorded on entries flushed outside any actor context */
export const ANONYMOUS_ACTOR: Readonly<AuditActor> = Object.freeze({
  category: 'anonymous',
  type: 'Anonymous',
  id: 'anonymous',
});

/**
 * Resolve the actor to stamp on a log entry
 *
 * @returns The actor of the current context, or `fallback` when no context is active
 */
export const resolveActor = (
  provider: AuditContextProvider | undefined,
  fallback: Readonly<AuditActor> = ANONYMOUS_ACTOR,
): AuditActor => {
  const actor = provider?.getContext()?.actor ?? fallback;
  return { ...actor };
};

/**
 * Create an AsyncLocalStorage-based actor context provider
 *
 * The event logger reads the actor of every accepted entry from this provider.
 *
 * @example
 * ```typescript
 * const actors = createAsyncLocalStorageProvider();
 *
 * await actors.runAsync({ actor: { category: 'model', type: 'User', id: 'user-123' } }, async () => {
 *   await entityManager.flush(); // entries are attributed to user-123
 * });
 * ```
 */
export const createAsyncLocalStorageProvider = (): AuditContextProvider => {
  const storage = new AsyncLocalStorage<AuditContext>();

  return {
    getContext: () => storage.getStore(),

    useContext: (): AuditContext => {
      const context = storage.getStore();
      if (!context) {
        throw new Error(
          '[entity-audit] AuditContext is not available. ' +
            'Run the flush inside actors.run() or actors.runAsync() to attribute it to an actor.',
        );
      }
      return context;
    },

    run: <T>(context: AuditContext, fn: () => T): T => storage.run(context, fn),

    runAsync: <T>(context: AuditContext, fn: () => Promise<T>): Promise<T> => storage.run(context, fn),
  };
};
