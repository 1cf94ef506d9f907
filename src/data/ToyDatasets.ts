// ToyDatasets.ts - Built-in 10x2 toy datasets with binary targets

import { DatasetRegistry, createDataset } from '../core/DatasetRegistry';

export const cancerDataset = createDataset(
    'cancer',
    [
        [1.4, 14.2], [7.3, 3.6], [15.8, 2.0], [7.0, 9.1], [13.9, 5.7],
        [16.6, 2.1], [18.1, 4.5], [8.1, 11.1], [11.9, 1.9], [12.8, 15.7],
    ],
    [0, 1, 1, 1, 0, 0, 1, 0, 1, 0]
);

export const customerDataset = createDataset(
    'customer',
    [
        [11.4, 4.2], [17.3, 13.6], [5.8, 22.0], [7.0, 1.1], [13.9, 5.7],
        [16.6, 9.1], [8.1, 1.5], [1.1, 11.1], [2.9, 19.9], [22.8, 15.7],
    ],
    [1, 0, 0, 1, 1, 0, 1, 1, 1, 0]
);

export const toyRegistry = new DatasetRegistry([cancerDataset, customerDataset]);
