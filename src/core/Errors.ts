// Errors.ts - Fault types raised by the KNN classifier

export class KNNError extends Error {
    constructor(message: string) {
        super(message);
        this.name = new.target.name;
    }
}

export class InvalidNeighborCountError extends KNNError {
    constructor(public readonly k: unknown) {
        super(`k must be an odd integer between 1 and 15, got ${String(k)}`);
    }
}

export class DimensionMismatchError extends KNNError {
    constructor(public readonly expected: number, public readonly actual: number, public readonly index?: number) {
        super(index === undefined
            ? `Point has dimension ${actual}, expected ${expected}`
            : `Training point ${index} has dimension ${actual}, query has dimension ${expected}`);
    }
}

export class InsufficientNeighborsError extends KNNError {
    constructor(public readonly k: number, public readonly available: number) {
        super(`Cannot vote over ${k} neighbors: only ${available} labels available`);
    }
}

export class DatasetShapeError extends KNNError {}
