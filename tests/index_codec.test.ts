import test from 'node:test';
import assert from 'node:assert/strict';

import {
    compressIndices,
    countIndices,
    detectPeriod,
    expandIndexSpec,
    greedyRunStrategy,
    moduloGroupStrategy,
    splitIntoBatches,
    trivialStrategy,
} from '../src/index_codec';
import { ERRORS, isEscalationError } from '../src/structured_error';

function range(start: number, end: number, stride = 1): number[] {
    const out: number[] = [];
    for (let v = start; v <= end; v += stride) out.push(v);
    return out;
}

test('compressIndices renders the literal cases', () => {
    assert.equal(compressIndices([]), '');
    assert.equal(compressIndices([7]), '7');
    assert.equal(compressIndices([3, 4]), '3-4');
    assert.equal(compressIndices([3, 9]), '3,9');
    assert.equal(compressIndices(range(0, 4)), '0-4');
    assert.equal(compressIndices([8, 18, 28, 38]), '8-38:10');
    assert.equal(compressIndices([5, 6, 15, 16, 25, 26]), '5-25:10,6-26:10');
});

test('compressIndices sorts and de-duplicates its input', () => {
    assert.equal(compressIndices([4, 3, 3, 4]), '3-4');
    assert.equal(compressIndices(new Set([2, 0, 1])), '0-2');
});

test('uniform gaps always produce one range', () => {
    assert.equal(compressIndices([1, 4, 7, 10, 13]), '1-13:3');
    assert.equal(compressIndices(range(100, 199)), '100-199');
});

test('modulo grouping handles a run followed by a stride-2 tail', () => {
    assert.equal(compressIndices([...range(0, 6), 8, 10]), '0-10:2,1-5:2');
    assert.equal(compressIndices([0, 2, 4, 6, 11, 13, 15, 17]), '0-6:2,11-17:2');
});

test('greedy runs cover irregular sets', () => {
    assert.equal(compressIndices([0, 1, 2, 3, 10, 20, 21]), '0-3,10,20-21');
    assert.equal(greedyRunStrategy.tryCompress([1, 5, 6], [4, 1]), '1,5-6');
});

test('individual strategies defer when their shape does not match', () => {
    assert.equal(trivialStrategy.tryCompress([1, 2, 3], [1, 1]), null);
    assert.equal(moduloGroupStrategy.tryCompress([1, 2, 3], [1, 1]), null);
    assert.equal(detectPeriod([1, 9, 1, 9, 1]), 2);
    assert.equal(detectPeriod([1, 1, 2]), 0);
});

test('compressIndices rejects negative and fractional indices', () => {
    assert.throws(() => compressIndices([-1]), (e) => isEscalationError(e, ERRORS.CODEC_INPUT_ERROR));
    assert.throws(() => compressIndices([1.5]), (e) => isEscalationError(e, ERRORS.CODEC_INPUT_ERROR));
});

test('expandIndexSpec reads literals, ranges, strides and throttles', () => {
    assert.deepEqual(expandIndexSpec(''), []);
    assert.deepEqual(expandIndexSpec('1,5,3'), [1, 3, 5]);
    assert.deepEqual(expandIndexSpec('0-4'), [0, 1, 2, 3, 4]);
    assert.deepEqual(expandIndexSpec('8-38:10'), [8, 18, 28, 38]);
    assert.deepEqual(expandIndexSpec('0-9%4'), range(0, 9));
    assert.deepEqual(expandIndexSpec(' 3 , 3 '), [3]);
    assert.equal(countIndices('5-25:10,6-26:10'), 6);
});

test('expandIndexSpec reports malformed tokens', () => {
    for (const bad of ['a', '5-3', '1-5:0', '1-', '-2']) {
        assert.throws(() => expandIndexSpec(bad), (e) => isEscalationError(e, ERRORS.CODEC_INPUT_ERROR), bad);
    }
});

test('indices past Number.MAX_SAFE_INTEGER are rejected, not expanded', () => {
    for (const bad of ['9007199254740992-9007199254740993', '9007199254740992', '0-10:99999999999999999999']) {
        assert.throws(
            () => expandIndexSpec(bad),
            (e) => isEscalationError(e, ERRORS.CODEC_INPUT_ERROR) && /MAX_SAFE_INTEGER/.test(e.message),
            bad
        );
    }
    assert.deepEqual(expandIndexSpec('9007199254740990-9007199254740991'), [9007199254740990, 9007199254740991]);
    assert.throws(() => compressIndices([2 ** 60]), (e) => isEscalationError(e, ERRORS.CODEC_INPUT_ERROR));
});

test('expand(compress(S)) returns S for every strategy branch', () => {
    const sets: number[][] = [
        [],
        [42],
        [3, 9],
        range(0, 49),
        range(7, 70, 7),
        [5, 6, 15, 16, 25, 26, 35, 36],
        [...range(0, 6), 8, 10],
        [0, 1, 2, 3, 10, 20, 21],
        [1, 2, 4, 8, 16, 32, 64],
    ];
    for (const set of sets) {
        assert.deepEqual(expandIndexSpec(compressIndices(set)), set);
    }
});

test('splitIntoBatches keeps a short spec whole', () => {
    assert.deepEqual(splitIntoBatches([3, 1, 2]), [{ spec: '1-3', count: 3, first: 1, last: 3 }]);
    assert.deepEqual(splitIntoBatches([]), []);
});

test('splitIntoBatches chunks when the spec exceeds the length limit', () => {
    const batches = splitIntoBatches(range(0, 9), { maxSpecLength: 2, batchSize: 4 });
    assert.deepEqual(
        batches.map((b) => [b.spec, b.count, b.first, b.last]),
        [
            ['0-3', 4, 0, 3],
            ['4-7', 4, 4, 7],
            ['8-9', 2, 8, 9],
        ]
    );
});
