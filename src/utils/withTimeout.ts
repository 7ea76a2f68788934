import { AppError } from "../errors/AppError";

/**
 * Rejects with a `timeout` AppError when `promise` has not settled within `ms`.
 * A missing `ms` leaves the promise unbounded.
 */
export function withTimeout<T>(promise: Promise<T>, ms: number | undefined, label = "operation"): Promise<T> {
  if (ms === undefined) {
    return promise;
  }
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new AppError("timeout", `${label} timed out after ${ms}ms`)), ms);
  });
  return Promise.race([promise, timeout]).finally(() => {
    if (timer) clearTimeout(timer);
  });
}
