import { NetworkError } from "@boardlink/shared";

/** Resolve after `ms`; reject with NETWORK_ABORTED if `signal` fires first */
export function delay(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new NetworkError("Wait aborted", "NETWORK_ABORTED"));
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(new NetworkError("Wait aborted", "NETWORK_ABORTED"));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

/**
 * Race `promise` against a timer.
 *
 * @throws NetworkError NETWORK_TIMEOUT
 */
export async function withTimeout<T>(
  promise: Promise<T>,
  ms: number,
  context: Record<string, unknown>,
): Promise<T> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      reject(
        new NetworkError(`Timed out after ${ms}ms`, "NETWORK_TIMEOUT", {
          ...context,
          timeoutMs: ms,
        }),
      );
    }, ms);
  });
  try {
    return await Promise.race([promise, timeout]);
  } finally {
    clearTimeout(timer);
  }
}
