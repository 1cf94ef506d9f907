import type { KNNClassifier } from '../ml/KNNClassifier';
import type { BinaryLabel, LabeledDataset } from './Types';

export interface ConfusionMatrix {
    tp: number;
    tn: number;
    fp: number;
    fn: number;
}

export interface EvaluationResult {
    predictions: BinaryLabel[];
    accuracy: number;
    confusion: ConfusionMatrix;
}

/**
 * Classify every point of `examples` against `training` and score the predictions.
 */
export function evaluateClassifier(
    classifier: KNNClassifier,
    training: LabeledDataset,
    examples: LabeledDataset
): EvaluationResult {
    const confusion: ConfusionMatrix = { tp: 0, tn: 0, fp: 0, fn: 0 };

    const predictions = examples.points.map((point, i) => {
        const predicted = classifier.classifyWith(training, point);
        const actual = examples.labels[i];

        if (predicted === 1) {
            if (actual === 1) confusion.tp++;
            else confusion.fp++;
        } else {
            if (actual === 0) confusion.tn++;
            else confusion.fn++;
        }
        return predicted;
    });

    const correct = confusion.tp + confusion.tn;
    const accuracy = predictions.length === 0 ? 0 : correct / predictions.length;

    return { predictions, accuracy, confusion };
}
