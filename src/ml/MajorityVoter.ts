import { InsufficientNeighborsError } from '../core/Errors';
import type { BinaryLabel } from '../core/Types';

export class MajorityVoter {
    /**
     * Majority label among the first `k` labels (nearest first).
     * With binary labels an odd `k` cannot tie.
     */
    static vote(labels: readonly BinaryLabel[], k: number): BinaryLabel {
        if (!Number.isInteger(k) || k < 1) {
            throw new RangeError(`Vote size must be a positive integer, got ${k}`);
        }
        if (labels.length < k) {
            throw new InsufficientNeighborsError(k, labels.length);
        }

        let ones = 0;
        let zeros = 0;
        for (let i = 0; i < k; i++) {
            if (labels[i] === 1) ones++;
            else zeros++;
        }
        return ones > zeros ? 1 : 0;
    }
}
