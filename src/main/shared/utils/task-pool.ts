/**
 * Runs `worker` over `items` with at most `concurrency` calls in flight.
 * Once `signal` aborts no new item is started; calls already running are awaited.
 */
export async function runWithConcurrency<T>(
  items: readonly T[],
  concurrency: number,
  worker: (item: T) => Promise<void>,
  signal?: AbortSignal
): Promise<void> {
  let nextIndex = 0
  const runnerCount = Math.max(1, Math.min(concurrency, items.length))

  const runners = Array.from({ length: runnerCount }, async () => {
    while (nextIndex < items.length && !signal?.aborted) {
      const item = items[nextIndex]
      nextIndex += 1
      await worker(item)
    }
  })

  await Promise.all(runners)
}
