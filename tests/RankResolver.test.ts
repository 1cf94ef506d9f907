import { describe, it, expect } from 'vitest';
import { RankResolver } from '../src/ml/RankResolver';

describe('RankResolver', () => {
    it('sortAndArgsort() sorts ascending and returns the permutation', () => {
        const { indices, sorted } = RankResolver.sortAndArgsort([1.1, 7.1, 4.1, 2.1]);
        expect(indices).toEqual([0, 3, 2, 1]);
        expect(sorted).toEqual([1.1, 2.1, 4.1, 7.1]);
    });

    it('breaks ties by earliest unused original index', () => {
        const { indices, sorted } = RankResolver.sortAndArgsort([3, 1, 3, 1, 2]);
        expect(indices).toEqual([1, 3, 4, 0, 2]);
        expect(sorted).toEqual([1, 1, 2, 3, 3]);
    });

    it('gives every slot a distinct index when all values are equal', () => {
        const { indices } = RankResolver.sortAndArgsort([5, 5, 5, 5]);
        expect(indices).toEqual([0, 1, 2, 3]);
    });

    it('handles empty and single-element input', () => {
        expect(RankResolver.sortAndArgsort([])).toEqual({ indices: [], sorted: [] });
        expect(RankResolver.sortAndArgsort([4.2])).toEqual({ indices: [0], sorted: [4.2] });
    });

    it('satisfies values[indices[i]] === sorted[i] and yields a permutation', () => {
        const values = [9.5, -1, 0, 3.25, Infinity, 3.25, -Infinity, 0.5];
        const { indices, sorted } = RankResolver.sortAndArgsort(values);

        indices.forEach((idx, i) => expect(values[idx]).toBe(sorted[i]));
        for (let i = 1; i < sorted.length; i++) {
            expect(sorted[i]).toBeGreaterThanOrEqual(sorted[i - 1]);
        }
        expect([...indices].sort((a, b) => a - b)).toEqual([0, 1, 2, 3, 4, 5, 6, 7]);
        expect(indices).toEqual([6, 1, 2, 7, 3, 5, 0, 4]);
    });

    it('does not mutate its input', () => {
        const values = [3, 2, 1];
        RankResolver.sortAndArgsort(values);
        expect(values).toEqual([3, 2, 1]);
    });

    it('throws RangeError on NaN', () => {
        expect(() => RankResolver.sortAndArgsort([1, NaN])).toThrowError(RangeError);
    });

    it('applyOrder() reorders items by a permutation', () => {
        expect(RankResolver.applyOrder(['a', 'b', 'c'], [2, 0, 1])).toEqual(['c', 'a', 'b']);
    });
});
