/**
 * Adds value to an insertion-ordered set and evicts the oldest entries beyond limit.
 */
export function setAddBounded<T>(set: Set<T>, value: T, limit: number): void {
    set.delete(value);
    set.add(value);
    for (const oldest of set) {
        if (set.size <= limit) {
            break;
        }
        set.delete(oldest);
    }
}
