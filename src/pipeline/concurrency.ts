export type Settled<T> = { ok: true; value: T } | { ok: false; error: unknown }

/**
 * Map over items with at most `limit` calls in flight. Results come back in
 * input order whatever order the calls finish in; every item settles, so a
 * caller can decide per item what a failure means.
 */
export async function mapSettledOrdered<T, R>(
  items: readonly T[],
  limit: number,
  fn: (item: T, index: number) => R | Promise<R>
): Promise<Settled<R>[]> {
  const results: Settled<R>[] = new Array(items.length)
  let next = 0

  const worker = async (): Promise<void> => {
    while (next < items.length) {
      const index = next++
      try {
        results[index] = { ok: true, value: await fn(items[index], index) }
      } catch (error) {
        results[index] = { ok: false, error }
      }
    }
  }

  const workers = Math.max(1, Math.min(limit, items.length))
  await Promise.all(Array.from({ length: workers }, () => worker()))
  return results
}
