/**
 * Time source used by every wait in the strike lifecycle.
 *
 * Polling, holding and cooldowns all go through `sleep`, so a test clock can
 * advance time instantly and a future driver can swap in a cancellable one.
 */
export interface Clock {
  now(): number;
  sleep(ms: number): Promise<void>;
}

/**
 * Sleep for a specified duration
 */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep,
};

/**
 * Poll `probe` every `intervalMs` until it returns a value or `timeoutMs`
 * elapses. Returns null on timeout. A throwing probe counts as "not yet".
 */
export async function pollUntil<T>(
  probe: () => Promise<T | null>,
  options: {
    clock: Clock;
    intervalMs: number;
    timeoutMs: number;
    onProbeError?: (err: unknown) => void;
  },
): Promise<T | null> {
  const { clock, intervalMs, timeoutMs } = options;
  const start = clock.now();

  while (clock.now() - start < timeoutMs) {
    try {
      const value = await probe();
      if (value !== null) return value;
    } catch (err) {
      options.onProbeError?.(err);
    }
    await clock.sleep(intervalMs);
  }

  return null;
}
