import test from 'node:test';
import assert from 'node:assert/strict';

import {
    classifyOutcomes,
    decideAction,
    DEFAULT_RULES,
    parseReturnCode,
    type ClassificationRules,
} from '../src/outcome_classifier';

test('OUT_OF_MEMORY escalates with failure kind OOM', () => {
    const result = classifyOutcomes([{ task_id: 4, state: 'OUT_OF_MEMORY', exit_code: '0:125' }]);
    assert.deepEqual(result.escalate, [4]);
    assert.deepEqual(result.oom, [4]);
    assert.equal(result.outcomes[0].failure_kind, 'OOM');
    assert.equal(result.outcomes[0].action, 'ESCALATE');
});

test('COMPLETED always completes, even with an overriding exit code', () => {
    const rules: ClassificationRules = {
        stateRules: [{ pattern: 'COMPLETED', action: 'escalate' }],
        exitCodeRules: new Map([[0, 'escalate']]),
    };
    assert.equal(decideAction({ task_id: 0, state: 'COMPLETED', exit_code: '0:0' }, rules), 'COMPLETE');
});

test('an exit-code override beats a no_retry state rule', () => {
    // FAILED with 137 is the OOM killer under the default rules
    assert.equal(decideAction({ task_id: 1, state: 'FAILED', exit_code: '137:0' }, DEFAULT_RULES), 'ESCALATE');
    assert.equal(decideAction({ task_id: 1, state: 'FAILED', exit_code: '1:0' }, DEFAULT_RULES), 'NO_RETRY');
});

test('state rules apply in order, first match wins', () => {
    const rules: ClassificationRules = {
        stateRules: [
            { pattern: 'FAIL', action: 'no_retry' },
            { pattern: 'NODE_FAIL', action: 'escalate' },
        ],
        exitCodeRules: new Map(),
    };
    assert.equal(decideAction({ task_id: 0, state: 'NODE_FAIL', exit_code: '0:0' }, rules), 'NO_RETRY');
    assert.equal(decideAction({ task_id: 0, state: 'NODE_FAIL', exit_code: '0:0' }, DEFAULT_RULES), 'ESCALATE');
});

test('an unmatched state defaults to no_retry', () => {
    assert.equal(decideAction({ task_id: 0, state: 'REVOKED', exit_code: '' }, DEFAULT_RULES), 'NO_RETRY');
});

test('failure kind is tallied independently of the action', () => {
    const rules: ClassificationRules = {
        stateRules: [{ pattern: 'TIMEOUT', action: 'no_retry' }],
        exitCodeRules: new Map(),
    };
    const result = classifyOutcomes([{ task_id: 2, state: 'TIMEOUT', exit_code: '0:15' }], rules);
    assert.deepEqual(result.no_retry, [2]);
    assert.deepEqual(result.timeout, [2]);
    assert.equal(result.timeout_count, 1);
});

test('classifyOutcomes partitions a mixed round and sorts every list', () => {
    const result = classifyOutcomes([
        { task_id: 9, state: 'COMPLETED', exit_code: '0:0' },
        { task_id: 3, state: 'TIMEOUT', exit_code: '0:15' },
        { task_id: 7, state: 'OUT_OF_MEMORY', exit_code: '0:125' },
        { task_id: 1, state: 'OUT_OF_MEMORY', exit_code: '0:125' },
        { task_id: 5, state: 'FAILED', exit_code: '2:0' },
        { task_id: 0, state: 'COMPLETED', exit_code: '0:0' },
    ]);
    assert.deepEqual(result.completed, [0, 9]);
    assert.deepEqual(result.escalate, [1, 3, 7]);
    assert.deepEqual(result.no_retry, [5]);
    assert.deepEqual(result.oom, [1, 7]);
    assert.deepEqual(result.timeout, [3]);
    assert.equal(result.oom_count, 2);
    assert.equal(result.total, 6);
    assert.equal(result.outcomes[4].failure_kind, 'OTHER');
});

test('parseReturnCode reads the code before the signal', () => {
    assert.equal(parseReturnCode('137:0'), 137);
    assert.equal(parseReturnCode('2'), 2);
    assert.equal(parseReturnCode(''), null);
    assert.equal(parseReturnCode('x:1'), null);
});
