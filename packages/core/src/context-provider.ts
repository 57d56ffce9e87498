import { AsyncLocalStorage } from 'node:async_hooks';
import type { RevisionContext, RevisionContextProvider } from './types.js';

/**
 * Create an AsyncLocalStorage-based revision context provider
 *
 * @example
 * ```typescript
 * const provider = createAsyncLocalStorageProvider();
 *
 * await provider.runAsync({ actor: { id: 'estimator-1' } }, async () => {
 *   // Saves made here are attributed to estimator-1
 *   await revisions.recordSave({ entityId: partId, before, after });
 * });
 * ```
 */
export const createAsyncLocalStorageProvider = (): RevisionContextProvider => {
  const storage = new AsyncLocalStorage<RevisionContext>();

  return {
    getContext: () => storage.getStore(),

    useContext: (): RevisionContext => {
      const context = storage.getStore();
      if (!context) {
        throw new Error(
          '[revision-log] RevisionContext is not available. ' +
            'Make sure you are running within a context provider (e.g., inside provider.runAsync()).',
        );
      }
      return context;
    },

    run: <T>(context: RevisionContext, fn: () => T): T => storage.run(context, fn),

    runAsync: <T>(context: RevisionContext, fn: () => Promise<T>): Promise<T> => storage.run(context, fn),
  };
};
