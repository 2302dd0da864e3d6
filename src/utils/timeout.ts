import { TimeoutError } from "./errors.js";

/**
 * Race an operation against a timer. The underlying operation is not
 * cancelled; its eventual settlement is ignored once the timer wins.
 */
export async function withTimeout<T>(
  operation: Promise<T>,
  timeoutMs: number,
  label: string,
): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const expired = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new TimeoutError(label, timeoutMs)), timeoutMs);
  });

  try {
    return await Promise.race([operation, expired]);
  } finally {
    clearTimeout(timer);
  }
}
