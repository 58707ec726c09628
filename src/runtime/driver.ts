import type { ExecutionContext, ScopedResource } from "../entities/types.js";

/** Raised by {@link throwIfAborted} when the dispatch was cancelled. */
export class TransformAbortedError extends Error {
  public readonly code = "E-TRANSFORM-ABORTED";
  public readonly reason: unknown;

  constructor(reason: unknown) {
    super(reason instanceof Error ? reason.message : "transform aborted");
    this.name = "TransformAbortedError";
    this.reason = reason;
  }
}

/** Throws when the caller cancelled the dispatch carrying `context`. */
export function throwIfAborted(context: Pick<ExecutionContext, "signal">): void {
  if (context.signal?.aborted) {
    throw new TransformAbortedError(context.signal.reason);
  }
}

/**
 * Acquires an automation handle from the context's factory, hands it to
 * `use`, and closes it afterwards whatever `use` does. When `use` fails the
 * handle is still closed and the original error is rethrown; if closing fails
 * as well both errors surface in an `AggregateError`.
 *
 * ```ts
 * return withDriver(context, async (driver) => scrape(driver, input.getString("username")));
 * ```
 */
export async function withDriver<TDriver extends ScopedResource, T>(
  context: ExecutionContext<TDriver>,
  use: (driver: TDriver) => Promise<T> | T,
): Promise<T> {
  throwIfAborted(context);
  const driver = await context.driverFactory();
  let result: T;
  try {
    result = await use(driver);
  } catch (error) {
    try {
      await driver.close();
    } catch (closeError) {
      throw new AggregateError([error, closeError], "automation driver failed and could not be closed");
    }
    throw error;
  }
  await driver.close();
  return result;
}

/** Factory for handlers that never touch a browser. */
export function unavailableDriverFactory(): never {
  throw new Error("no automation driver is configured for this host");
}
