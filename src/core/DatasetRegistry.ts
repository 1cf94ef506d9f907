// DatasetRegistry.ts - Immutable labeled datasets and the closed name -> dataset lookup

import { DatasetShapeError } from './Errors';
import { isBinaryLabel } from './Types';
import type { BinaryLabel, LabeledDataset, Point } from './Types';

/**
 * Validate and freeze a labeled dataset.
 * Every point must share one dimension and pair with a 0/1 label.
 */
export function createDataset(name: string, points: readonly Point[], labels: readonly number[]): LabeledDataset {
    if (points.length === 0) {
        throw new DatasetShapeError(`Dataset "${name}" has no points`);
    }
    if (points.length !== labels.length) {
        throw new DatasetShapeError(
            `Dataset "${name}" has ${points.length} points but ${labels.length} labels`
        );
    }

    const dimension = points[0].length;
    const frozenPoints = points.map((p, i) => {
        if (p.length !== dimension) {
            throw new DatasetShapeError(
                `Dataset "${name}" point ${i} has dimension ${p.length}, expected ${dimension}`
            );
        }
        return Object.freeze([...p]);
    });

    const frozenLabels: BinaryLabel[] = labels.map((l, i) => {
        if (!isBinaryLabel(l)) {
            throw new DatasetShapeError(`Dataset "${name}" label ${i} must be 0 or 1, got ${l}`);
        }
        return l;
    });

    return Object.freeze({
        name,
        points: Object.freeze(frozenPoints),
        labels: Object.freeze(frozenLabels),
    });
}

export class DatasetRegistry {
    private readonly datasets: ReadonlyMap<string, LabeledDataset>;

    constructor(datasets: readonly LabeledDataset[]) {
        const map = new Map<string, LabeledDataset>();
        for (const ds of datasets) {
            if (map.has(ds.name)) {
                throw new DatasetShapeError(`Duplicate dataset name "${ds.name}"`);
            }
            map.set(ds.name, ds);
        }
        this.datasets = map;
    }

    get(name: string): LabeledDataset | undefined {
        return this.datasets.get(name);
    }

    has(name: string): boolean {
        return this.datasets.has(name);
    }

    names(): string[] {
        return [...this.datasets.keys()];
    }
}
