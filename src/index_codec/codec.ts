// src/index_codec/codec.ts

import { ARRAY_LIMITS } from '../config';
import { ErrorFactory } from '../structured_error';
import { type CompressionStrategy, DEFAULT_STRATEGIES } from './strategies';

function normalize(indices: Iterable<number>): number[] {
    const unique = new Set<number>();
    for (const value of indices) {
        if (!Number.isInteger(value) || value < 0) {
            throw ErrorFactory.codecInput(String(value), 'indices must be non-negative integers');
        }
        if (!Number.isSafeInteger(value)) {
            throw ErrorFactory.codecInput(String(value), 'index exceeds Number.MAX_SAFE_INTEGER');
        }
        unique.add(value);
    }
    return [...unique].sort((a, b) => a - b);
}

/**
 * Compress a set of task indices into Slurm array syntax.
 *
 * @example compressIndices([5, 6, 15, 16, 25, 26]) === '5-25:10,6-26:10'
 */
export function compressIndices(
    indices: Iterable<number>,
    strategies: readonly CompressionStrategy[] = DEFAULT_STRATEGIES
): string {
    const sorted = normalize(indices);
    const gaps: number[] = [];
    for (let i = 1; i < sorted.length; i++) gaps.push(sorted[i] - sorted[i - 1]);

    for (const strategy of strategies) {
        const rendered = strategy.tryCompress(sorted, gaps);
        if (rendered !== null) return rendered;
    }
    // a strategy list without a catch-all still has to produce a valid spec
    return sorted.join(',');
}

const LITERAL = /^(\d+)$/;

function parseIndex(digits: string, token: string): number {
    const value = parseInt(digits, 10);
    if (!Number.isSafeInteger(value)) {
        throw ErrorFactory.codecInput(token, 'index exceeds Number.MAX_SAFE_INTEGER');
    }
    return value;
}
const RANGE = /^(\d+)-(\d+)(?::(\d+))?$/;

/**
 * Expand an array spec (`a`, `a-b`, `a-b:s`, comma-separated, optional `%N`
 * throttle suffix) into its sorted, distinct indices.
 */
export function expandIndexSpec(spec: string): number[] {
    const body = spec.trim().replace(/%\d+$/, '');
    const out = new Set<number>();
    if (!body) return [];

    for (const raw of body.split(',')) {
        const token = raw.trim();
        if (!token) continue;

        const literal = LITERAL.exec(token);
        if (literal) {
            out.add(parseIndex(literal[1], token));
            continue;
        }

        const range = RANGE.exec(token);
        if (!range) {
            throw ErrorFactory.codecInput(token, 'expected a, a-b or a-b:s');
        }
        const start = parseIndex(range[1], token);
        const end = parseIndex(range[2], token);
        const stride = range[3] !== undefined ? parseIndex(range[3], token) : 1;

        if (end < start) throw ErrorFactory.codecInput(token, 'range end precedes start');
        if (stride <= 0) throw ErrorFactory.codecInput(token, 'stride must be positive');
        if (out.size + Math.floor((end - start) / stride) + 1 > ARRAY_LIMITS.MAX_EXPANDED_INDICES) {
            throw ErrorFactory.codecInput(token, `expands past ${ARRAY_LIMITS.MAX_EXPANDED_INDICES} indices`);
        }

        for (let v = start; v <= end; v += stride) out.add(v);
    }

    return [...out].sort((a, b) => a - b);
}

export function countIndices(spec: string): number {
    return expandIndexSpec(spec).length;
}
