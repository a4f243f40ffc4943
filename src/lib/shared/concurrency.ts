/**
 * Bounded fan-out over a list of items.
 *
 * A fixed pool of workers pulls the next index from a shared cursor, so at
 * most `maxConcurrent` calls are in flight at any moment. Results keep the
 * input order; completion order is not guaranteed.
 *
 * Workers are expected to handle their own failures. A rejection rejects
 * the whole map once in-flight calls settle.
 */

export async function mapWithConcurrency<T, R>(
    items: readonly T[],
    maxConcurrent: number,
    worker: (item: T, index: number) => Promise<R>,
): Promise<R[]> {
    const results: R[] = new Array<R>(items.length);
    if (items.length === 0) return results;

    const poolSize = Math.max(1, Math.min(Math.floor(maxConcurrent) || 1, items.length));
    let cursor = 0;

    const runWorker = async (): Promise<void> => {
        while (cursor < items.length) {
            const index = cursor++;
            results[index] = await worker(items[index], index);
        }
    };

    const workers: Promise<void>[] = [];
    for (let i = 0; i < poolSize; i++) {
        workers.push(runWorker());
    }

    const settled = await Promise.allSettled(workers);
    const failure = settled.find((s): s is PromiseRejectedResult => s.status === 'rejected');
    if (failure) {
        throw failure.reason;
    }

    return results;
}

export function sleep(ms: number): Promise<void> {
    return new Promise(resolve => setTimeout(resolve, ms));
}
