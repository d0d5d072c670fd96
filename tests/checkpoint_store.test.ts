import test from 'node:test';
import assert from 'node:assert/strict';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

import { FileCheckpointStore, InMemoryCheckpointStore, stableStringify } from '../src/checkpoint_store';
import { ERRORS, isEscalationError } from '../src/structured_error';
import { makeRecord } from './fixtures';

function withTempDir(fn: (dir: string) => void): void {
    const tmp = fs.mkdtempSync(path.join(os.tmpdir(), 'checkpoint-store-'));
    try {
        fn(tmp);
    } finally {
        fs.rmSync(tmp, { recursive: true, force: true });
    }
}

function ioError(operation: string) {
    return (e: unknown): boolean =>
        isEscalationError(e, ERRORS.CHECKPOINT_IO_ERROR) && e.context.operation === operation;
}

test('stableStringify sorts keys at every depth', () => {
    assert.equal(stableStringify({ b: 1, a: { d: [1], c: null } }), '{"a":{"c":null,"d":[1]},"b":1}');
    assert.equal(stableStringify({ b: [true], a: 'x' }, 2), JSON.stringify({ a: 'x', b: [true] }, null, 2));
    assert.throws(() => stableStringify({ a: undefined }), /UNSUPPORTED_JSON_TYPE/);
    assert.throws(() => stableStringify(Number.NaN), /UNSUPPORTED_JSON_NUMBER/);
});

test('save then load returns the same record', () => {
    withTempDir((dir) => {
        const store = new FileCheckpointStore(dir);
        const record = makeRecord();
        store.save(record);

        assert.deepEqual(store.load('sweep'), record);
        assert.equal(store.exists('sweep'), true);
    });
});

test('checkpoint files are sorted JSON and leave no temp files behind', () => {
    withTempDir((dir) => {
        const store = new FileCheckpointStore(dir);
        store.save(makeRecord());
        store.save(makeRecord({ updated: '2026-01-05T11:00:00.000Z' }));

        assert.deepEqual(fs.readdirSync(dir), ['sweep.checkpoint.json']);
        const text = fs.readFileSync(path.join(dir, 'sweep.checkpoint.json'), 'utf-8');
        assert.ok(text.startsWith('{\n  "chain_id": "sweep",\n'));
        assert.ok(text.endsWith('}\n'));
        assert.equal(JSON.parse(text).updated, '2026-01-05T11:00:00.000Z');
    });
});

test('a missing checkpoint loads as null', () => {
    withTempDir((dir) => {
        assert.equal(new FileCheckpointStore(dir).load('nothing'), null);
    });
});

test('unreadable and invalid checkpoints raise CHECKPOINT_IO_ERROR', () => {
    withTempDir((dir) => {
        const store = new FileCheckpointStore(dir);

        fs.writeFileSync(path.join(dir, 'torn.checkpoint.json'), '{"chain_id": "torn",');
        assert.throws(() => store.load('torn'), ioError('read'));

        fs.writeFileSync(path.join(dir, 'partial.checkpoint.json'), JSON.stringify({ chain_id: 'partial' }));
        assert.throws(() => store.load('partial'), ioError('validate'));

        fs.writeFileSync(path.join(dir, 'moved.checkpoint.json'), JSON.stringify(makeRecord()));
        assert.throws(() => store.load('moved'), /file holds chain sweep, expected moved/);
    });
});

test('an unwritable directory raises CHECKPOINT_IO_ERROR on save', () => {
    withTempDir((dir) => {
        const blocker = path.join(dir, 'not-a-dir');
        fs.writeFileSync(blocker, 'x');
        assert.throws(() => new FileCheckpointStore(blocker).save(makeRecord()), ioError('write'));
    });
});

test('list returns sorted chain ids and skips unrelated files', () => {
    withTempDir((dir) => {
        const store = new FileCheckpointStore(dir);
        store.save(makeRecord({ chain_id: 'zeta' }));
        store.save(makeRecord({ chain_id: 'alpha' }));
        fs.writeFileSync(path.join(dir, 'notes.txt'), 'x');
        fs.writeFileSync(path.join(dir, 'bad id.checkpoint.json'), '{}');

        assert.deepEqual(store.list(), ['alpha', 'zeta']);
        assert.deepEqual(new FileCheckpointStore(path.join(dir, 'absent')).list(), []);
    });
});

test('chain ids that could escape the directory are rejected', () => {
    const store = new FileCheckpointStore(os.tmpdir());
    assert.throws(() => store.pathFor('../escape'), (e) => isEscalationError(e, ERRORS.INVALID_ARGUMENT));
});

test('the in-memory store copies records on the way in and out', () => {
    const store = new InMemoryCheckpointStore();
    const record = makeRecord();
    store.save(record);
    record.state.status = 'RUNNING';

    const loaded = store.load('sweep');
    assert.equal(loaded?.state.status, 'STARTING');
    if (loaded) loaded.script = 'changed.sh';
    assert.equal(store.load('sweep')?.script, 'job.sh');
    assert.deepEqual(store.list(), ['sweep']);
});
