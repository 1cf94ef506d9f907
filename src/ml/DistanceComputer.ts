import { DimensionMismatchError } from '../core/Errors';
import type { Point, TrainingSet } from '../core/Types';

export class DistanceComputer {
    /**
     * Compute Euclidean distance between two numeric vectors.
     * @throws DimensionMismatchError if the vectors differ in length
     */
    static euclideanDistance(vec1: Point, vec2: Point): number {
        if (vec1.length !== vec2.length) {
            throw new DimensionMismatchError(vec1.length, vec2.length);
        }
        let sum = 0;
        for (let i = 0; i < vec1.length; i++) {
            const diff = vec1[i] - vec2[i];
            sum += diff * diff;
        }
        return Math.sqrt(sum);
    }

    /**
     * Distance from the query to every training point, in training-set order.
     * @throws DimensionMismatchError if any training point differs in dimension from the query
     */
    static distances(train: TrainingSet, query: Point): number[] {
        return train.map((point, idx) => {
            if (point.length !== query.length) {
                throw new DimensionMismatchError(query.length, point.length, idx);
            }
            return this.euclideanDistance(point, query);
        });
    }
}
