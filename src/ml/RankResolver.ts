export interface RankedValues {
    indices: number[];
    sorted: number[];
}

export class RankResolver {
    /**
     * Ascending sort together with its argsort.
     *
     * `values[indices[i]] === sorted[i]` for every i. Equal values keep their
     * original left-to-right order, so each tied slot takes the earliest index
     * not already used.
     */
    static sortAndArgsort(values: readonly number[]): RankedValues {
        const nanAt = values.findIndex(v => Number.isNaN(v));
        if (nanAt !== -1) {
            throw new RangeError(`Cannot rank NaN at position ${nanAt}`);
        }

        // Infinity - Infinity is NaN, which falls through to the index comparison
        const indices = values
            .map((_, i) => i)
            .sort((a, b) => (values[a] - values[b]) || (a - b));

        return { indices, sorted: indices.map(i => values[i]) };
    }

    /**
     * Reorder `items` by a permutation from `sortAndArgsort`.
     */
    static applyOrder<T>(items: readonly T[], indices: readonly number[]): T[] {
        return indices.map(i => items[i]);
    }
}
