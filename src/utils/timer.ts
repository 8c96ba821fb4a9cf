export interface Timed<T> {
  value: T;
  /** Wall-clock milliseconds, truncated. */
  durationMs: number;
}

/** Awaits `fn` and reports how long it took. A rejection propagates untimed. */
export async function timed<T>(fn: () => Promise<T>): Promise<Timed<T>> {
  const start = process.hrtime.bigint();
  const value = await fn();
  const durationMs = Number((process.hrtime.bigint() - start) / 1_000_000n);
  return { value, durationMs };
}
