/**
 * Worker Pool
 *
 * N workers pull tasks from a shared queue until it is empty. Results come
 * back in task order; a task that throws leaves a hole and its error is
 * collected instead of stopping the other workers.
 *
 * ```typescript
 * const { successes } = await runWorkerPool(queries, (query) => search(query), {
 *   concurrency: 3,
 *   onProgress: ({ completed, total }) => logger.progress(`${completed}/${total}`)
 * })
 * ```
 */

const DEFAULT_CONCURRENCY = 5

type TaskProcessor<T, R> = (task: T, index: number) => Promise<R>

export interface WorkerProgressInfo<R> {
  readonly index: number
  readonly total: number
  readonly completed: number
  readonly result: R
  readonly durationMs: number
}

export interface WorkerPoolOptions<R> {
  readonly concurrency?: number | undefined
  readonly onProgress?: ((info: WorkerProgressInfo<R>) => void) | undefined
  /** Workers stop claiming new tasks once this aborts */
  readonly signal?: AbortSignal | undefined
}

export interface WorkerPoolResult<R> {
  /** Results in task order (undefined for failed or unclaimed tasks) */
  readonly results: ReadonlyArray<R | undefined>
  readonly successes: R[]
  readonly errors: ReadonlyArray<{ readonly index: number; readonly error: Error }>
}

export async function runWorkerPool<T, R>(
  tasks: readonly T[],
  processor: TaskProcessor<T, R>,
  options: WorkerPoolOptions<R> = {}
): Promise<WorkerPoolResult<R>> {
  const results: Array<R | undefined> = new Array(tasks.length).fill(undefined)
  const settled: boolean[] = new Array(tasks.length).fill(false)
  const errors: Array<{ index: number; error: Error }> = []
  let nextIndex = 0
  let completed = 0

  async function worker(): Promise<void> {
    while (!options.signal?.aborted) {
      // Claiming is synchronous, so two workers never take the same task
      const index = nextIndex++
      if (index >= tasks.length) return
      const task = tasks[index]
      if (task === undefined) return

      const startTime = Date.now()
      try {
        const result = await processor(task, index)
        results[index] = result
        settled[index] = true
        completed++
        options.onProgress?.({
          index,
          total: tasks.length,
          completed,
          result,
          durationMs: Date.now() - startTime
        })
      } catch (e) {
        errors.push({ index, error: e instanceof Error ? e : new Error(String(e)) })
        completed++
      }
    }
  }

  const workerCount = Math.min(options.concurrency ?? DEFAULT_CONCURRENCY, tasks.length)
  await Promise.all(Array.from({ length: workerCount }, () => worker()))

  const successes: R[] = []
  results.forEach((result, index) => {
    if (settled[index] && result !== undefined) successes.push(result)
  })
  errors.sort((a, b) => a.index - b.index)
  return { results, successes, errors }
}
