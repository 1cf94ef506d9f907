import { describe, it, expect } from 'vitest';
import { DatasetRegistry, createDataset } from '../src/core/DatasetRegistry';
import { DatasetShapeError } from '../src/core/Errors';
import { cancerDataset, customerDataset, toyRegistry } from '../src/data/ToyDatasets';

describe('DatasetRegistry', () => {
    it('toyRegistry exposes the cancer and customer datasets', () => {
        expect(toyRegistry.names()).toEqual(['cancer', 'customer']);
        expect(toyRegistry.get('cancer')).toBe(cancerDataset);
        expect(toyRegistry.get('customer')).toBe(customerDataset);
        expect(toyRegistry.has('iris')).toBe(false);
        expect(toyRegistry.get('iris')).toBeUndefined();
    });

    it('toy datasets have 10 labeled 2-D points', () => {
        for (const ds of [cancerDataset, customerDataset]) {
            expect(ds.points.length).toBe(10);
            expect(ds.labels.length).toBe(10);
            ds.points.forEach(p => expect(p.length).toBe(2));
        }
        expect(cancerDataset.labels).toEqual([0, 1, 1, 1, 0, 0, 1, 0, 1, 0]);
        expect(customerDataset.labels).toEqual([1, 0, 0, 1, 1, 0, 1, 1, 1, 0]);
    });

    it('datasets are deeply frozen', () => {
        expect(Object.isFrozen(cancerDataset)).toBe(true);
        expect(Object.isFrozen(cancerDataset.points)).toBe(true);
        expect(Object.isFrozen(cancerDataset.points[0])).toBe(true);
        expect(Object.isFrozen(cancerDataset.labels)).toBe(true);
    });

    it('createDataset() copies its input', () => {
        const point = [1, 2];
        const ds = createDataset('copy', [point], [1]);
        point[0] = 99;
        expect(ds.points[0]).toEqual([1, 2]);
    });

    it('createDataset() rejects mismatched lengths', () => {
        expect(() => createDataset('x', [[1, 2], [3, 4]], [1]))
            .toThrowError('Dataset "x" has 2 points but 1 labels');
    });

    it('createDataset() rejects mixed dimensions', () => {
        expect(() => createDataset('x', [[1, 2], [3]], [1, 0]))
            .toThrowError('Dataset "x" point 1 has dimension 1, expected 2');
    });

    it('createDataset() rejects non-binary labels and empty data', () => {
        expect(() => createDataset('x', [[1, 2]], [2])).toThrowError(DatasetShapeError);
        expect(() => createDataset('x', [], [])).toThrowError('Dataset "x" has no points');
    });

    it('rejects duplicate dataset names', () => {
        expect(() => new DatasetRegistry([cancerDataset, cancerDataset]))
            .toThrowError('Duplicate dataset name "cancer"');
    });
});
