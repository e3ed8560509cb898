export interface Timed<T> {
  value: T;
  elapsedMs: number;
}

/** Run `fn` and report how long it took, whether it resolved or threw. */
export async function withTiming<T>(
  fn: () => Promise<T>,
  onSettled?: (elapsedMs: number, error?: unknown) => void
): Promise<Timed<T>> {
  const startedAt = performance.now();
  try {
    const value = await fn();
    const elapsedMs = Math.round(performance.now() - startedAt);
    onSettled?.(elapsedMs);
    return { value, elapsedMs };
  } catch (error) {
    onSettled?.(Math.round(performance.now() - startedAt), error);
    throw error;
  }
}
