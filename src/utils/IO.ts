// IO.ts - Import/export utilities for labeled point datasets

import fs from 'fs';
import path from 'path';
import { parse } from 'csv-parse/sync';
import { createDataset } from '../core/DatasetRegistry';
import { DatasetShapeError } from '../core/Errors';
import type { LabeledDataset } from '../core/Types';

export interface CSVImportOptions {
    name?: string;
    hasHeader?: boolean;
    delimiter?: ',' | '\t';
}

export class IO {
    /**
     * Parse `x1,...,xD,label` rows. The last column is the 0/1 label.
     */
    static importCSV(csv: string, options: CSVImportOptions = {}): LabeledDataset {
        const { name = 'imported', hasHeader = true, delimiter = ',' } = options;

        const parsed: unknown = parse(csv, {
            delimiter,
            trim: true,
            skip_empty_lines: true,
            // ragged rows are rejected by createDataset with the row's index
            relax_column_count: true,
            from_line: hasHeader ? 2 : 1,
        });
        if (!Array.isArray(parsed)) {
            throw new DatasetShapeError(`Dataset "${name}": CSV did not parse into rows`);
        }

        const points: number[][] = [];
        const labels: number[] = [];
        parsed.forEach((row: unknown, i) => {
            if (!Array.isArray(row) || row.length < 2) {
                throw new DatasetShapeError(`Dataset "${name}" row ${i + 1}: expected at least one feature and a label`);
            }
            const values = row.map(cell => (cell === '' ? NaN : Number(cell)));
            const bad = values.findIndex(v => !Number.isFinite(v));
            if (bad !== -1) {
                throw new DatasetShapeError(`Dataset "${name}" row ${i + 1}: "${String(row[bad])}" is not a number`);
            }
            points.push(values.slice(0, -1));
            labels.push(values[values.length - 1]);
        });

        return createDataset(name, points, labels);
    }

    static exportCSV(dataset: LabeledDataset, includeHeader = true): string {
        const dimension = dataset.points[0]?.length ?? 0;
        const header = Array.from({ length: dimension }, (_, i) => `x${i + 1}`).concat('label').join(',');
        const rows = dataset.points.map((p, i) => [...p, dataset.labels[i]].join(','));
        return (includeHeader ? [header, ...rows] : rows).join('\n');
    }

    /**
     * Read a CSV dataset from disk. The dataset name defaults to the file's base name.
     */
    static loadCSVFile(filePath: string, options: CSVImportOptions = {}): LabeledDataset {
        const csv = fs.readFileSync(filePath, 'utf8');
        const name = options.name ?? path.basename(filePath, path.extname(filePath));
        return this.importCSV(csv, { ...options, name });
    }
}
