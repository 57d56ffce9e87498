/**
 * Represents the person or process a change is attributed to
 *
 * @example
 * ```typescript
 * const actor: RevisionActor = { id: 'estimator-1', name: 'Quote desk' };
 * ```
 */
export interface RevisionActor {
  /** Identity stored in `changedBy` */
  id: string;
  /** Optional human-readable name of the actor */
  name?: string;
}

/**
 * Ambient information for revision logging, bound to the current async scope
 *
 * @example
 * ```typescript
 * const context: RevisionContext = {
 *   actor: { id: 'estimator-1' },
 *   notes: 'Customer update, drawing rev C',
 * };
 * ```
 */
export interface RevisionContext {
  /** The actor who performs the save */
  actor: RevisionActor;
  /** Annotation applied to records that carry none of their own */
  notes?: string;
}

/**
 * Provider interface for managing the revision context
 */
export interface RevisionContextProvider {
  /**
   * Get the current context
   * @returns The current context, or undefined if not set
   */
  getContext: () => RevisionContext | undefined;

  /**
   * Get the current context (throws if not available)
   * @throws {Error} If the context is not available
   */
  useContext: () => RevisionContext;

  /**
   * Run a function with the given context
   */
  run: <T>(context: RevisionContext, fn: () => T) => T;

  /**
   * Run an async function with the given context
   */
  runAsync: <T>(context: RevisionContext, fn: () => Promise<T>) => Promise<T>;
}
