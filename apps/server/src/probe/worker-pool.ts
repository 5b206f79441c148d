/**
 * Runs `worker` over `items` with at most `concurrency` calls in flight.
 * Results come back in submission order whatever order the calls finish in.
 * If a call rejects, no further items are started and the first error is
 * rethrown once the calls already running have settled.
 */
export const runPool = async <T, R>(
  items: readonly T[],
  concurrency: number,
  worker: (item: T, index: number) => Promise<R>
): Promise<R[]> => {
  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new RangeError(`Pool concurrency must be a positive integer, got ${concurrency}.`);
  }

  const results: R[] = new Array<R>(items.length);
  let nextIndex = 0;
  const failures: unknown[] = [];

  const lane = async (): Promise<void> => {
    while (failures.length === 0 && nextIndex < items.length) {
      const index = nextIndex;
      nextIndex += 1;

      try {
        results[index] = await worker(items[index], index);
      } catch (error) {
        failures.push(error);
      }
    }
  };

  const laneCount = Math.min(concurrency, items.length);
  await Promise.all(Array.from({ length: laneCount }, () => lane()));

  if (failures.length > 0) {
    throw failures[0];
  }

  return results;
};
