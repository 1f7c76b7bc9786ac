/**
 * Map `items` through `fn` with at most `width` calls in flight. Results keep
 * input order. The first rejection stops workers from taking new items and is
 * rethrown once the calls already running have settled.
 */
export async function mapPool<T, R>(
  items: readonly T[],
  width: number,
  fn: (item: T, index: number) => Promise<R>,
): Promise<R[]> {
  const results = new Array<R>(items.length);
  const state: { next: number; failure?: { error: unknown } } = { next: 0 };

  const worker = async () => {
    while (!state.failure && state.next < items.length) {
      const i = state.next++;
      try {
        results[i] = await fn(items[i], i);
      } catch (error) {
        state.failure ??= { error };
      }
    }
  };

  const n = Math.max(1, Math.min(width, items.length));
  await Promise.all(Array.from({ length: n }, worker));
  if (state.failure) throw state.failure.error;
  return results;
}
