// src/index_codec/strategies.ts
//
// Compression strategies for array-task index sets, tried in priority order.
// Each strategy sees the sorted, de-duplicated values and their consecutive
// gaps, and either renders a spec or returns null to defer to the next one.
// The order favors the shapes produced by uniform batches failing at regular
// offsets; it is a heuristic, not a shortest-encoding search.

export interface CompressionStrategy {
    readonly name: string;
    tryCompress(sorted: readonly number[], gaps: readonly number[]): string | null;
}

export const PERIOD_CANDIDATES = [2, 3, 4, 5] as const;
export const MODULO_STRIDES = [10, 5, 2] as const;
export const MODULO_MAX_CHARS_PER_INDEX = 2;

export function formatRange(start: number, end: number, stride: number): string {
    return stride === 1 ? `${start}-${end}` : `${start}-${end}:${stride}`;
}

function formatPair(a: number, b: number): string {
    return b === a + 1 ? `${a}-${b}` : `${a},${b}`;
}

/* -------------------------------------------------------------------------- */
/* 1. Trivial sizes                                                           */
/* -------------------------------------------------------------------------- */

export const trivialStrategy: CompressionStrategy = {
    name: 'trivial',
    tryCompress(sorted) {
        switch (sorted.length) {
            case 0: return '';
            case 1: return String(sorted[0]);
            case 2: return formatPair(sorted[0], sorted[1]);
            default: return null;
        }
    },
};

/* -------------------------------------------------------------------------- */
/* 2. One uniform stride across the whole set                                 */
/* -------------------------------------------------------------------------- */

export const uniformStrideStrategy: CompressionStrategy = {
    name: 'uniform-stride',
    tryCompress(sorted, gaps) {
        if (sorted.length < 3) return null;
        if (!gaps.every((g) => g === gaps[0])) return null;
        return formatRange(sorted[0], sorted[sorted.length - 1], gaps[0]);
    },
};

/* -------------------------------------------------------------------------- */
/* 3. Periodic gap pattern -> interleaved lanes                               */
/* -------------------------------------------------------------------------- */

export function detectPeriod(gaps: readonly number[]): number {
    for (const period of PERIOD_CANDIDATES) {
        if (gaps.length < period * 2 + 1) continue;
        let periodic = true;
        for (let i = period; i < gaps.length; i++) {
            if (gaps[i] !== gaps[i % period]) {
                periodic = false;
                break;
            }
        }
        if (periodic) return period;
    }
    return 0;
}

export const periodicLaneStrategy: CompressionStrategy = {
    name: 'periodic-lanes',
    tryCompress(sorted, gaps) {
        const period = detectPeriod(gaps);
        if (period < 2) return null;

        let totalStride = 0;
        for (let i = 0; i < period; i++) totalStride += gaps[i];

        const parts: string[] = [];
        for (let offset = 0; offset < period; offset++) {
            // lanes are taken by position, not by value
            const lane: number[] = [];
            for (let j = offset; j < sorted.length; j += period) lane.push(sorted[j]);

            const first = lane[0];
            const last = lane[lane.length - 1];
            if (lane.length >= 3) {
                parts.push(formatRange(first, last, totalStride));
            } else if (lane.length === 2) {
                parts.push(formatPair(first, last));
            } else {
                parts.push(String(first));
            }
        }
        return parts.join(',');
    },
};

/* -------------------------------------------------------------------------- */
/* 4. Grouping by value modulo a round stride                                 */
/* -------------------------------------------------------------------------- */

function compressGroup(group: readonly number[], stride: number): string[] {
    const out: string[] = [];
    let i = 0;
    while (i < group.length) {
        const start = group[i];
        let end = start;
        let j = i + 1;
        while (j < group.length && group[j] === end + stride) {
            end = group[j];
            j++;
        }
        if (j - i >= 2) {
            out.push(`${start}-${end}:${stride}`);
            i = j;
        } else {
            out.push(String(start));
            i++;
        }
    }
    return out;
}

export function compressByModulo(sorted: readonly number[], stride: number): string | null {
    if (sorted.length < stride * 3) return null;

    const groups = new Map<number, number[]>();
    for (const value of sorted) {
        const mod = value % stride;
        const group = groups.get(mod);
        if (group) group.push(value);
        else groups.set(mod, [value]);
    }

    let useful = 0;
    for (const group of groups.values()) {
        if (group.length >= 3) useful++;
    }
    if (useful < 2) return null;

    const parts: string[] = [];
    for (const mod of [...groups.keys()].sort((a, b) => a - b)) {
        const group = groups.get(mod) ?? [];
        parts.push(...compressGroup(group, stride));
    }

    const rendered = parts.join(',');
    return rendered.length < sorted.length * MODULO_MAX_CHARS_PER_INDEX ? rendered : null;
}

export const moduloGroupStrategy: CompressionStrategy = {
    name: 'modulo-groups',
    tryCompress(sorted) {
        for (const stride of MODULO_STRIDES) {
            const rendered = compressByModulo(sorted, stride);
            if (rendered !== null) return rendered;
        }
        return null;
    },
};

/* -------------------------------------------------------------------------- */
/* 5. Greedy left-to-right runs (always succeeds)                             */
/* -------------------------------------------------------------------------- */

export const greedyRunStrategy: CompressionStrategy = {
    name: 'greedy-runs',
    tryCompress(sorted) {
        const ranges: string[] = [];
        const count = sorted.length;
        let i = 0;

        while (i < count) {
            const start = sorted[i];
            if (i + 1 >= count) {
                ranges.push(String(start));
                i++;
                continue;
            }

            const stride = sorted[i + 1] - sorted[i];
            let end = start;
            let j = i + 1;
            while (j < count && sorted[j] === end + stride) {
                end = sorted[j];
                j++;
            }
            const runLength = j - i;

            if (runLength >= 3 || (runLength === 2 && stride === 1)) {
                ranges.push(formatRange(start, end, stride));
                i = j;
            } else {
                ranges.push(String(start));
                i++;
            }
        }

        return ranges.join(',');
    },
};

export const DEFAULT_STRATEGIES: readonly CompressionStrategy[] = [
    trivialStrategy,
    uniformStrideStrategy,
    periodicLaneStrategy,
    moduloGroupStrategy,
    greedyRunStrategy,
];
