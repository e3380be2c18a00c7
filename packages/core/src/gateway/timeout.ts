import { GatewayError } from "../errors/catalog.js";

/**
 * Runs `fn` bounded by `timeoutMs`. When the bound is hit the signal handed
 * to `fn` is aborted and the caller gets a timeout `GatewayError` at once,
 * whether or not `fn` honours the signal. Other failures go through
 * `classify`; errors that already are `GatewayError` pass through.
 */
export async function withTimeout<T>(
  operation: string,
  timeoutMs: number,
  fn: (signal: AbortSignal) => Promise<T>,
  classify: (err: unknown, operation: string) => GatewayError,
): Promise<T> {
  const controller = new AbortController();
  let timer: ReturnType<typeof setTimeout> | undefined;

  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      controller.abort();
      reject(
        new GatewayError("timeout", `${operation} timed out after ${timeoutMs}ms`, {
          details: { operation, timeoutMs },
        }),
      );
    }, timeoutMs);
  });

  try {
    return await Promise.race([fn(controller.signal), deadline]);
  } catch (err) {
    if (err instanceof GatewayError) throw err;
    throw classify(err, operation);
  } finally {
    clearTimeout(timer);
  }
}
