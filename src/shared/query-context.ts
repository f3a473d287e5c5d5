/**
 * Query Context - AsyncLocalStorage for request context propagation
 *
 * Lets slow query logging report which request (and which repository
 * operation) issued a query without threading the context through every call.
 *
 * ```typescript
 * await withQueryContext({ requestId }, async () => {
 *   await draftBoardService.getDraftBoard(leagueId); // queries inherit context
 * });
 * ```
 */

import { AsyncLocalStorage } from 'node:async_hooks';

export interface QueryContext {
  /** Unique request ID for HTTP requests */
  requestId?: string;
  /** Label for the current repository operation */
  label?: string;
  startedAt?: number;
}

export const queryContextStorage = new AsyncLocalStorage<QueryContext>();

/**
 * Get the current query context (or empty object if none).
 */
export function getQueryContext(): QueryContext {
  return queryContextStorage.getStore() ?? {};
}

/**
 * Run a function with a query context.
 * All database queries within the callback will have access to this context.
 */
export function withQueryContext<T>(context: QueryContext, fn: () => T): T {
  const fullContext: QueryContext = {
    ...context,
    startedAt: context.startedAt ?? Date.now(),
  };
  return queryContextStorage.run(fullContext, fn);
}

/**
 * Set a label for subsequent queries in the current context.
 */
export function setQueryLabel(label: string): void {
  const ctx = queryContextStorage.getStore();
  if (ctx) {
    ctx.label = label;
  }
}
