/**
 * AsyncLocalStorage Context Management
 *
 * Carries the correlation ID of the file being processed so that every
 * log line written while parsing one report can be tied together.
 */

import { AsyncLocalStorage } from 'node:async_hooks';
import { ulid } from 'ulid';

export interface RequestContext {
  correlationId: string;
  /** Source file name of the report being processed */
  documentId?: string;
  reportType?: string;
}

const asyncLocalStorage = new AsyncLocalStorage<RequestContext>();

/**
 * Get the current request context
 */
export function getContext(): RequestContext | undefined {
  return asyncLocalStorage.getStore();
}

/**
 * Get the correlation ID from the current context, or generate a new one
 */
export function getCorrelationId(): string {
  const context = getContext();
  return context?.correlationId || ulid();
}

/**
 * Run an async function within a new AsyncLocalStorage context
 */
export async function runWithContextAsync<T>(
  context: RequestContext,
  fn: () => Promise<T>
): Promise<T> {
  return asyncLocalStorage.run(context, fn);
}
