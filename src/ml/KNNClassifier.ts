// KNNClassifier.ts - k-nearest-neighbours binary classifier over named datasets

import { type KNNConfig, MAX_K, MIN_K, defaultConfig } from '../core/KNNConfig';
import { InsufficientNeighborsError, InvalidNeighborCountError } from '../core/Errors';
import type { DatasetRegistry } from '../core/DatasetRegistry';
import type { BinaryLabel, LabeledDataset, Neighbor, Point } from '../core/Types';
import { toyRegistry } from '../data/ToyDatasets';
import { DistanceComputer } from './DistanceComputer';
import { RankResolver } from './RankResolver';
import { MajorityVoter } from './MajorityVoter';

export class KNNClassifier {
    public readonly k: number;
    public readonly registry: DatasetRegistry;
    public readonly modelName: string;
    public readonly verbose: boolean;

    constructor(config: KNNConfig = {}) {
        const k = config.k ?? defaultConfig.k;
        if (!KNNClassifier.isValidK(k)) {
            throw new InvalidNeighborCountError(k);
        }
        this.k = k;
        this.registry = config.registry ?? toyRegistry;
        this.modelName = config.log?.modelName ?? defaultConfig.modelName;
        this.verbose = config.log?.verbose ?? defaultConfig.verbose;
    }

    static isValidK(k: number): boolean {
        return Number.isInteger(k) && k >= MIN_K && k <= MAX_K && k % 2 === 1;
    }

    /**
     * Predict the class of `query` from the named dataset.
     * Returns null, after a warning, when the registry has no such dataset.
     */
    public classify(datasetName: string, query: Point): BinaryLabel | null {
        const dataset = this.resolve(datasetName);
        if (!dataset) return null;

        if (this.verbose) console.log(`📂 ${this.modelName}: working with ${dataset.name} dataset.`);
        const label = this.classifyWith(dataset, query);
        if (this.verbose) console.log(`🏷️ ${this.modelName}: class of [${query.join(', ')}] is ${label}`);
        return label;
    }

    /**
     * Classify against a dataset that need not be in the registry.
     */
    public classifyWith(dataset: LabeledDataset, query: Point): BinaryLabel {
        const distances = DistanceComputer.distances(dataset.points, query);
        const { indices } = RankResolver.sortAndArgsort(distances);
        const sortedLabels = RankResolver.applyOrder(dataset.labels, indices);
        return MajorityVoter.vote(sortedLabels, this.k);
    }

    /**
     * The k nearest training points to `query`, nearest first.
     * Returns null when the registry has no such dataset.
     */
    public neighbors(datasetName: string, query: Point): Neighbor[] | null {
        const dataset = this.resolve(datasetName);
        if (!dataset) return null;

        const distances = DistanceComputer.distances(dataset.points, query);
        if (distances.length < this.k) {
            throw new InsufficientNeighborsError(this.k, distances.length);
        }
        const { indices, sorted } = RankResolver.sortAndArgsort(distances);
        return indices.slice(0, this.k).map((index, rank) => ({
            index,
            point: dataset.points[index],
            label: dataset.labels[index],
            distance: sorted[rank],
        }));
    }

    private resolve(datasetName: string): LabeledDataset | undefined {
        const dataset = this.registry.get(datasetName);
        if (!dataset) {
            const known = this.registry.names().map(n => `'${n}'`).join(', ');
            console.warn(`⚠️ ${this.modelName}: unknown dataset '${datasetName}'. Choose one of: ${known}.`);
        }
        return dataset;
    }
}
