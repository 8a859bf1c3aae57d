/**
 * Worker Pool
 *
 * Bounded-parallel map. Workers pull from one shared iterator over the
 * input, so every item is claimed by exactly one worker.
 */

const DEFAULT_CONCURRENCY = 5

export interface WorkerPoolOptions<R> {
  /** Workers running at once (default 5) */
  readonly concurrency?: number | undefined
  /** Stop claiming items once aborted; items already running finish */
  readonly signal?: AbortSignal | undefined
  /** Called as each item finishes, with the running completion count */
  readonly onResult?: ((index: number, result: R, completed: number) => void) | undefined
}

/**
 * Run processor over items with at most `concurrency` in flight.
 *
 * Results keep input order. Items never claimed because of an abort are
 * undefined. A processor that throws rejects the whole pool.
 */
export async function runWorkerPool<T, R>(
  items: readonly T[],
  processor: (item: T, index: number) => Promise<R>,
  options: WorkerPoolOptions<R> = {}
): Promise<Array<R | undefined>> {
  const results = new Array<R | undefined>(items.length).fill(undefined)
  const queue = items.entries()
  let completed = 0

  async function worker(): Promise<void> {
    for (const [index, item] of queue) {
      if (options.signal?.aborted) return
      const result = await processor(item, index)
      results[index] = result
      completed++
      options.onResult?.(index, result, completed)
    }
  }

  const workerCount = Math.min(Math.max(1, options.concurrency ?? DEFAULT_CONCURRENCY), items.length)
  await Promise.all(Array.from({ length: workerCount }, () => worker()))
  return results
}
