export { KNNClassifier } from './ml/KNNClassifier';
export { DistanceComputer } from './ml/DistanceComputer';
export { RankResolver } from './ml/RankResolver';
export type { RankedValues } from './ml/RankResolver';
export { MajorityVoter } from './ml/MajorityVoter';
export { DatasetRegistry, createDataset } from './core/DatasetRegistry';
export { evaluateClassifier } from './core/Evaluation';
export type { ConfusionMatrix, EvaluationResult } from './core/Evaluation';
export * from './core/Errors';
export { defaultConfig, MIN_K, MAX_K } from './core/KNNConfig';
export type { KNNConfig } from './core/KNNConfig';
export { isBinaryLabel } from './core/Types';
export type { BinaryLabel, LabelSet, LabeledDataset, Neighbor, Point, TrainingSet } from './core/Types';
export { cancerDataset, customerDataset, toyRegistry } from './data/ToyDatasets';
export { IO } from './utils/IO';
export type { CSVImportOptions } from './utils/IO';
