/**
 * Parallel Processing Utilities
 *
 * Bounded worker pool for fanning async work out over a list of items.
 */

export interface ParallelOptions<R> {
  /** Maximum number of in-flight operations (default: 5) */
  concurrency?: number;
  /** Whether to stop dispatching after the first error (default: false) */
  stopOnError?: boolean;
  /**
   * Checked before each item is dispatched. Once it returns false no further
   * items start; items already in flight still settle.
   */
  shouldContinue?: () => boolean;
  /** Called as each item settles, in completion order */
  onSettled?: (outcome: ParallelOutcome<R>, index: number) => void;
}

export type ParallelOutcome<R> =
  | { status: 'fulfilled'; value: R }
  | { status: 'rejected'; error: Error }
  | { status: 'skipped' };

export interface ParallelResult<R> {
  /** Outcomes in the same order as the input items */
  outcomes: ParallelOutcome<R>[];
  successCount: number;
  errorCount: number;
  /** Items never dispatched because the pool was stopped */
  skippedCount: number;
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Run async operations over items with a concurrency limit
 *
 * @example
 * const { outcomes } = await parallelMap(records, async (record) => {
 *   return await processRecord(record);
 * }, { concurrency: 20 });
 */
export async function parallelMap<T, R>(
  items: readonly T[],
  fn: (item: T, index: number) => Promise<R>,
  options: ParallelOptions<R> = {}
): Promise<ParallelResult<R>> {
  const { concurrency = 5, stopOnError = false, shouldContinue, onSettled } = options;

  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new Error('Concurrency must be a positive integer');
  }

  const outcomes: ParallelOutcome<R>[] = items.map(() => ({ status: 'skipped' }));
  let successCount = 0;
  let errorCount = 0;
  let stopped = false;
  let nextIndex = 0;

  const worker = async (): Promise<void> => {
    while (!stopped) {
      // Claim the index before any await so workers never share an item
      const index = nextIndex;
      if (index >= items.length) {
        break;
      }
      if (shouldContinue && !shouldContinue()) {
        stopped = true;
        break;
      }
      nextIndex++;

      let outcome: ParallelOutcome<R>;
      try {
        outcome = { status: 'fulfilled', value: await fn(items[index], index) };
        successCount++;
      } catch (error) {
        outcome = { status: 'rejected', error: toError(error) };
        errorCount++;
        if (stopOnError) {
          stopped = true;
        }
      }

      outcomes[index] = outcome;
      onSettled?.(outcome, index);
    }
  };

  const workers: Promise<void>[] = [];
  const workerCount = Math.min(concurrency, items.length);

  for (let i = 0; i < workerCount; i++) {
    workers.push(worker());
  }

  await Promise.all(workers);

  return {
    outcomes,
    successCount,
    errorCount,
    skippedCount: items.length - successCount - errorCount,
  };
}
