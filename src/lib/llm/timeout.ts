import { LLMError } from "./errors";

/**
 * Races `promise` against a timer. Rejects with a timeout LLMError when the
 * timer fires first; the timer is cleared either way.
 */
export async function withTimeout<T>(promise: Promise<T>, ms: number, label: string): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new LLMError(`${label} timed out after ${ms}ms`, "timeout")), ms);
  });

  try {
    return await Promise.race([promise, timeout]);
  } finally {
    if (timer) clearTimeout(timer);
  }
}
