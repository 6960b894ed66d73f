/**
 * Wait for every promise to settle, then reject with the first rejection if any.
 */
export async function settleAll<T>(promises: Iterable<Promise<T>>): Promise<T[]> {
    const values: T[] = []
    for (const r of await Promise.allSettled(promises)) {
        if (r.status === 'rejected') {
            throw r.reason
        }
        values.push(r.value)
    }
    return values
}
