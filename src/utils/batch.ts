/**
 * Map over items a chunk at a time, at most `concurrency` calls in flight.
 * Results keep the order of `items`, whatever order the calls settle in.
 */
export async function mapInChunks<T, R>(
    items: readonly T[],
    fn: (item: T, index: number) => Promise<R>,
    options: {
        concurrency?: number;
        onProgress?: (done: number, total: number) => void;
    } = {}
): Promise<R[]> {
    const concurrency = Math.max(1, Math.floor(options.concurrency ?? 1));
    const results: R[] = [];

    for (let i = 0; i < items.length; i += concurrency) {
        const chunk = items.slice(i, i + concurrency);
        const chunkResults = await Promise.all(chunk.map((item, j) => fn(item, i + j)));
        results.push(...chunkResults);

        if (options.onProgress) {
            options.onProgress(Math.min(i + concurrency, items.length), items.length);
        }
    }

    return results;
}

/**
 * Distinct values in first-seen order.
 */
export function unique<T>(items: Iterable<T>): T[] {
    return [...new Set(items)];
}
