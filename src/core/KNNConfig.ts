// KNNConfig.ts - Configuration interface and defaults for the KNN classifier

import type { DatasetRegistry } from './DatasetRegistry';

export interface KNNConfig {
    // Number of nearest neighbours that vote (odd, 1..15)
    k?: number;

    // Datasets the classifier can be asked about by name
    registry?: DatasetRegistry;

    // Logging
    log?: {
        modelName?: string,
        verbose?: boolean,
    }
}

export const MIN_K = 1;
export const MAX_K = 15;

export const defaultConfig = {
    k: 5,
    modelName: 'KNN Classifier',
    verbose: true,
};
