// src/index_codec/batching.ts
//
// Splits a resubmission into several scheduler submissions when the
// compressed spec would not fit on one command line.

import { ARRAY_LIMITS } from '../config';
import { compressIndices } from './codec';

export interface BatchOptions {
    maxSpecLength?: number;
    batchSize?: number;
}

export interface ArrayBatch {
    spec: string;
    count: number;
    first: number;
    last: number;
}

export function splitIntoBatches(indices: Iterable<number>, opts: BatchOptions = {}): ArrayBatch[] {
    const maxSpecLength = opts.maxSpecLength ?? ARRAY_LIMITS.MAX_SPEC_LENGTH;
    const batchSize = opts.batchSize ?? ARRAY_LIMITS.BATCH_SIZE;

    const sorted = [...new Set(indices)].sort((a, b) => a - b);
    if (sorted.length === 0) return [];

    const whole = compressIndices(sorted);
    if (whole.length <= maxSpecLength) {
        return [{ spec: whole, count: sorted.length, first: sorted[0], last: sorted[sorted.length - 1] }];
    }

    const batches: ArrayBatch[] = [];
    for (let start = 0; start < sorted.length; start += batchSize) {
        const chunk = sorted.slice(start, start + batchSize);
        batches.push({
            spec: compressIndices(chunk),
            count: chunk.length,
            first: chunk[0],
            last: chunk[chunk.length - 1],
        });
    }
    return batches;
}
