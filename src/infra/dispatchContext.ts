import { AsyncLocalStorage } from "node:async_hooks";
import { randomUUID } from "node:crypto";

/**
 * Correlation fields describing the transform dispatch currently running in
 * the async execution. The logger reads them to stamp every entry emitted by
 * the dispatcher and by the handler it invokes.
 */
export interface DispatchContext {
  readonly dispatchId: string;
  readonly entity: string;
  readonly transform: string;
  readonly startedAt: number;
}

const storage = new AsyncLocalStorage<DispatchContext>();

/** Builds a fresh context with a random dispatch identifier. */
export function createDispatchContext(
  entity: string,
  transform: string,
  clock: () => number = Date.now,
): DispatchContext {
  return { dispatchId: randomUUID(), entity, transform, startedAt: clock() };
}

/**
 * Executes the callback while exposing the dispatch context through
 * AsyncLocalStorage. Nested dispatches (a handler dispatching another
 * transform) shadow the outer context for their own duration.
 */
export function runWithDispatchContext<T>(context: DispatchContext, callback: () => T): T {
  return storage.run(context, callback);
}

/** Retrieves the dispatch context bound to the current async execution. */
export function getDispatchContext(): DispatchContext | undefined {
  return storage.getStore();
}
