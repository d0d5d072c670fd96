import test from 'node:test';
import assert from 'node:assert/strict';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import Database from 'better-sqlite3';

import { AuditStore, attachAuditTrail } from '../src/audit_store';
import { InMemoryCheckpointStore } from '../src/checkpoint_store';
import { EscalationEngine } from '../src/escalation_engine';
import type { TaskRecord } from '../src/scheduler_client';
import { createLogger } from '../src/logger';
import { FIXED_TIME, fixedClock, makeDefinition } from './fixtures';

const quiet = createLogger('audit-test');

function withAudit(fn: (store: AuditStore, dbPath: string) => void): void {
    const tmp = fs.mkdtempSync(path.join(os.tmpdir(), 'audit-store-'));
    const dbPath = path.join(tmp, 'nested', 'audit.db');
    const store = new AuditStore(dbPath, { clock: fixedClock, logger: quiet });
    try {
        fn(store, dbPath);
    } finally {
        store.close();
        fs.rmSync(tmp, { recursive: true, force: true });
    }
}

function task(taskId: number, state: string, node: string, elapsed: string, exitCode = 0): TaskRecord {
    return {
        job_key: `100_${taskId}`,
        array_job_id: 100,
        task_id: taskId,
        state,
        exit_code_raw: `${exitCode}:0`,
        exit_code: exitCode,
        signal: 0,
        max_rss: '512K',
        elapsed,
        timelimit: '00:05:00',
        node_list: node,
        submit: FIXED_TIME,
        start: FIXED_TIME,
        end: FIXED_TIME,
    };
}

const ROUND_TASKS: TaskRecord[] = [
    task(0, 'COMPLETED', 'node01', '00:00:40'),
    task(1, 'OUT_OF_MEMORY', 'node02', '00:01:02'),
    task(2, 'OUT_OF_MEMORY', 'node01', '00:00:50'),
    task(3, 'FAILED', 'node03', '00:00:10', 1),
    task(4, 'CANCELLED', 'node01', '00:00:05'),
];

function runSweep(store: AuditStore): EscalationEngine {
    const engine = new EscalationEngine(new InMemoryCheckpointStore(), { clock: fixedClock });
    attachAuditTrail(engine, store, {
        configText: 'levels: []\n',
        roundExtras: { outputPattern: '/logs/%A_%a.out' },
    });
    engine.createChain(makeDefinition());
    engine.recordRound('sweep', { jobIds: [100], handlerId: 0, arraySpec: '0-39', level: 0, memory: '1G' });
    engine.escalate('sweep', {
        nextLevel: 1,
        nextMemory: '4G',
        escalateSpec: '0-9',
        retryJobIds: [101],
        handlerId: 102,
        completedCount: 30,
        escalateCount: 10,
        oomCount: 10,
        timeoutCount: 0,
        failedCount: 0,
    });
    engine.markCompleted('sweep', 101, 40);
    return engine;
}

test('a fresh database is migrated to version 1', () => {
    withAudit((store, dbPath) => {
        assert.equal(store.schemaVersion(), 1);
        assert.ok(fs.existsSync(dbPath));
    });
});

test('engine transitions are mirrored as actions', () => {
    withAudit((store) => {
        runSweep(store);
        const actions = store.actions('sweep');

        assert.deepEqual(
            actions.map((a) => [a.action_type, a.job_id, a.memory_level, a.indices]),
            [
                ['SUBMIT', '100', 0, '0-39'],
                ['ESCALATE', '101', 1, '0-9'],
                ['COMPLETE', '101', 1, null],
            ]
        );
        assert.equal(actions[0].timestamp, FIXED_TIME);
        assert.equal(
            actions[1].details,
            '{"reason":"OOM","memory":"4G","oom_count":10,"timeout_count":0,"failed_count":0}'
        );
    });
});

test('rounds, chain row and config snapshot are written', () => {
    withAudit((store, dbPath) => {
        runSweep(store);

        const db = new Database(dbPath, { readonly: true });
        try {
            const rounds = db
                .prepare(
                    `SELECT round_num, job_id, level, partition, status, completed_count, escalate_indices, output_pattern
                     FROM rounds ORDER BY id`
                )
                .all();
            assert.deepEqual(rounds, [
                {
                    round_num: 1,
                    job_id: 100,
                    level: 0,
                    partition: 'devel',
                    status: 'ESCALATING',
                    completed_count: 30,
                    escalate_indices: '0-9',
                    output_pattern: '/logs/%A_%a.out',
                },
                {
                    round_num: 2,
                    job_id: 101,
                    level: 1,
                    partition: 'devel',
                    status: 'COMPLETED',
                    completed_count: 40,
                    escalate_indices: null,
                    output_pattern: '/logs/%A_%a.out',
                },
            ]);

            assert.deepEqual(
                db.prepare(`SELECT status, pending_indices, completed_count, time_limit FROM chains`).all(),
                [{ status: 'COMPLETED', pending_indices: '', completed_count: 40, time_limit: '00:10:00' }]
            );
            assert.deepEqual(db.prepare(`SELECT chain_id, config_yaml FROM configs`).all(), [
                { chain_id: 'sweep', config_yaml: 'levels: []\n' },
            ]);
        } finally {
            db.close();
        }
    });
});

test('a failed chain logs a FAIL action with its reason', () => {
    withAudit((store) => {
        const engine = new EscalationEngine(new InMemoryCheckpointStore(), { clock: fixedClock });
        attachAuditTrail(engine, store);
        engine.createChain(makeDefinition());
        engine.markFailed('sweep', '3,7', 'MEMORY');

        const [fail] = store.actions('sweep');
        assert.equal(fail.action_type, 'FAIL');
        assert.equal(fail.indices, '3,7');
        assert.equal(fail.details, '{"reason":"MEMORY","status":"FAILED_MAX_MEMORY"}');
    });
});

test('a detached trail stops recording', () => {
    withAudit((store) => {
        const engine = new EscalationEngine(new InMemoryCheckpointStore(), { clock: fixedClock });
        const detach = attachAuditTrail(engine, store);
        engine.createChain(makeDefinition());
        detach();
        engine.recordRound('sweep', { jobIds: [100], handlerId: 0, arraySpec: '0-39', level: 0, memory: '1G' });
        assert.deepEqual(store.actions('sweep'), []);
    });
});

test('saveTasks stores accounting rows with expanded log paths', () => {
    withAudit((store, dbPath) => {
        runSweep(store);
        assert.equal(store.saveTasks('sweep', 100, ROUND_TASKS), 5);
        assert.equal(store.saveTasks('sweep', 100, ROUND_TASKS), 5);

        const db = new Database(dbPath, { readonly: true });
        try {
            assert.deepEqual(
                db.prepare(`SELECT output_path, error_path FROM tasks WHERE task_id = 2`).get(),
                { output_path: '/logs/100_2.out', error_path: '' }
            );
        } finally {
            db.close();
        }
        assert.deepEqual(store.taskSummary('sweep'), { total: 5, completed: 1, oom: 2, timeout: 0, failed: 1 });
    });
});

test('saveTasks without a recorded round writes nothing', () => {
    withAudit((store) => {
        runSweep(store);
        assert.equal(store.saveTasks('sweep', 999, ROUND_TASKS), 0);
        assert.equal(store.saveTasks('sweep', 100, []), 0);
        assert.deepEqual(store.taskSummary('sweep'), { total: 0, completed: 0, oom: 0, timeout: 0, failed: 0 });
    });
});

test('reporting reads group the stored tasks', () => {
    withAudit((store) => {
        runSweep(store);
        store.saveTasks('sweep', 100, ROUND_TASKS);

        assert.deepEqual(store.statusDistribution('sweep', [100]), [
            { status: 'OUT_OF_MEMORY', count: 2 },
            { status: 'CANCELLED', count: 1 },
            { status: 'COMPLETED', count: 1 },
            { status: 'FAILED', count: 1 },
        ]);
        assert.deepEqual(store.runtimeRange('sweep', [100]), { total: 5, min: '00:00:05', max: '00:01:02' });
        assert.deepEqual(store.nodeDistribution('sweep', [100], 2), [
            { node: 'node01', count: 3 },
            { node: 'node02', count: 1 },
        ]);
        assert.deepEqual(store.failedTasks('sweep', 10), [
            { task_id: 3, status: 'FAILED', exit_code: 1, node: 'node03', elapsed: '00:00:10' },
            { task_id: 4, status: 'CANCELLED', exit_code: 0, node: 'node01', elapsed: '00:00:05' },
        ]);

        assert.deepEqual(store.statusDistribution('sweep', []), []);
        assert.deepEqual(store.runtimeRange('sweep', [101]), { total: 0, min: null, max: null });
    });
});

test('writes against unknown rows report false', () => {
    withAudit((store) => {
        assert.equal(store.updateRoundStatus('ghost', 1, 'COMPLETED'), false);
        assert.equal(store.completeChain('ghost', 0), false);
        assert.equal(store.logAction({ chainId: 'ghost', actionType: 'NOTE' }), true);
    });
});

test('write failures are logged and reported, never thrown', () => {
    const tmp = fs.mkdtempSync(path.join(os.tmpdir(), 'audit-store-'));
    try {
        const store = new AuditStore(path.join(tmp, 'audit.db'), { logger: quiet });
        store.close();
        assert.equal(store.logAction({ chainId: 'sweep', actionType: 'SUBMIT' }), false);
        assert.equal(store.saveTasks('sweep', 100, ROUND_TASKS), 0);

        const blocker = path.join(tmp, 'file');
        fs.writeFileSync(blocker, 'x');
        assert.equal(AuditStore.tryOpen(path.join(blocker, 'audit.db'), { logger: quiet }), null);
    } finally {
        fs.rmSync(tmp, { recursive: true, force: true });
    }
});
