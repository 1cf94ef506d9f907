// Types.ts - Shared data model for labeled point datasets

export type Point = readonly number[];

export type TrainingSet = readonly Point[];

export type BinaryLabel = 0 | 1;

export type LabelSet = readonly BinaryLabel[];

export interface LabeledDataset {
    readonly name: string;
    readonly points: TrainingSet;
    readonly labels: LabelSet;
}

export interface Neighbor {
    index: number;
    point: Point;
    label: BinaryLabel;
    distance: number;
}

export function isBinaryLabel(value: unknown): value is BinaryLabel {
    return value === 0 || value === 1;
}
