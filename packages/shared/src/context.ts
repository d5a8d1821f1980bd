/**
 * Request Context
 *
 * Carries the correlation id and declared content type of the upload being
 * processed through middleware, OCR and extraction without passing them around.
 */

import { AsyncLocalStorage } from 'node:async_hooks';
import { ulid } from 'ulid';

export interface RequestContext {
  correlationId: string;
  /** Declared content type of the document being processed */
  contentType?: string;
}

const store = new AsyncLocalStorage<RequestContext>();

export function getContext(): RequestContext | undefined {
  return store.getStore();
}

/**
 * Correlation id of the current request; outside a request each call gets a fresh ULID
 */
export function getCorrelationId(): string {
  return getContext()?.correlationId || ulid();
}

/**
 * Run fn with the given context. Async work started inside fn keeps it, so
 * an async fn's promise can be awaited by the caller.
 */
export function runWithContext<T>(context: RequestContext, fn: () => T): T {
  return store.run(context, fn);
}
