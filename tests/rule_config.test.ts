import test from 'node:test';
import assert from 'node:assert/strict';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

import { DEFAULT_CHECKPOINT_DIR } from '../src/config';
import { DEFAULT_RULES, classifyOutcomes } from '../src/outcome_classifier';
import { loadRuleConfig, parseRuleConfig, renderConfigShellVars, resolveCheckpointDir } from '../src/rule_config';
import { ERRORS, isEscalationError } from '../src/structured_error';

const FULL = `
levels:
  - { partition: devel, mem: 1G, time: "00:05:00" }
  - { mem: 4096, time: "00:10:00" }
state_handling:
  OUT_OF_MEMORY: escalate
  FAILED: no_retry
  exit_codes:
    137: escalate
    1: no_retry
tracker:
  base_dir: /data/tracker
  checkpoint_dir: /data/tracker/checkpoints
logging:
  enabled: true
  db_path: /data/tracker/audit.db
max_array_spec_len: 1000
timeout:
  sacct_delay: 2
cluster:
  name: test cluster
`;

const MINIMAL = `
levels:
  - { mem: 2G, time: "00:30:00" }
`;

const configError = (e: unknown): boolean => isEscalationError(e, ERRORS.CONFIG_ERROR);

test('a full document parses into levels, rules and sections', () => {
    const config = parseRuleConfig(FULL, 'ladder.yaml');

    assert.equal(config.source, 'ladder.yaml');
    assert.equal(config.text, FULL);
    assert.deepEqual(config.levels, [
        { partition: 'devel', memory: '1G', time: '00:05:00' },
        { partition: 'devel', memory: '4096', time: '00:10:00' },
    ]);
    assert.equal(config.customRules, true);
    assert.deepEqual(config.rules.stateRules, [
        { pattern: 'OUT_OF_MEMORY', action: 'escalate' },
        { pattern: 'FAILED', action: 'no_retry' },
    ]);
    assert.equal(config.rules.exitCodeRules.get(137), 'escalate');
    assert.equal(config.rules.exitCodeRules.get(1), 'no_retry');
    assert.equal(config.rules.exitCodeRules.size, 2);
    assert.deepEqual(config.logging, { enabled: true, dbPath: '/data/tracker/audit.db' });
    assert.equal(config.maxArraySpecLen, 1000);
    assert.equal(config.sacctDelay, 2);
});

test('without state_handling the built-in rules apply', () => {
    const config = parseRuleConfig(MINIMAL);
    assert.equal(config.customRules, false);
    assert.equal(config.rules, DEFAULT_RULES);
    assert.equal(config.levels[0].partition, 'devel');
    assert.deepEqual(config.tracker, {
        baseDir: undefined,
        checkpointDir: undefined,
        historyLog: undefined,
        outputDir: undefined,
    });
});

test('exit_codes alone keep the built-in state rules', () => {
    const config = parseRuleConfig(`${MINIMAL}state_handling:\n  exit_codes: { 1: escalate }\n`);
    assert.equal(config.customRules, true);
    assert.equal(config.rules.stateRules, DEFAULT_RULES.stateRules);
    assert.deepEqual([...config.rules.exitCodeRules], [[1, 'escalate']]);

    const result = classifyOutcomes(
        [
            { task_id: 3, state: 'OUT_OF_MEMORY', exit_code: '0:125' },
            { task_id: 4, state: 'FAILED', exit_code: '1:0' },
            { task_id: 5, state: 'CANCELLED', exit_code: '0:0' },
        ],
        config.rules
    );
    assert.deepEqual(result.escalate, [3, 4]);
    assert.deepEqual(result.no_retry, [5]);
});

test('JSON documents parse too', () => {
    const config = parseRuleConfig('{"levels": [{"mem": "8G", "time": "02:00:00", "partition": "long"}]}');
    assert.deepEqual(config.levels, [{ partition: 'long', memory: '8G', time: '02:00:00' }]);
});

test('malformed documents raise CONFIG_ERROR with the offending field', () => {
    const cases: Array<[string, RegExp]> = [
        ['levels: []\n', /non-empty "levels" list/],
        ['- a\n- b\n', /<inline> must contain a mapping/],
        ['levels: [\n', /failed to parse <inline>/],
        [`${MINIMAL}  - { mem: 4G }\n`, /levels\[1\] is missing "time"/],
        [`${MINIMAL}state_handling:\n  FAILED: retry\n`, /state_handling\.FAILED must be "escalate" or "no_retry", got "retry"/],
        [`${MINIMAL}state_handling:\n  exit_codes: { abc: escalate }\n`, /exit_codes key "abc" is not an integer/],
        [`${MINIMAL}logging:\n  enabled: "yes"\n`, /logging\.enabled must be true or false/],
        [`${MINIMAL}tracker: /tmp\n`, /"tracker" must be a mapping/],
        [`${MINIMAL}max_array_spec_len: -1\n`, /max_array_spec_len must be a non-negative number/],
    ];
    for (const [text, message] of cases) {
        assert.throws(() => parseRuleConfig(text), configError, text);
        assert.throws(() => parseRuleConfig(text), message, text);
    }
});

test('loadRuleConfig reads a file and reports unreadable paths', () => {
    const tmp = fs.mkdtempSync(path.join(os.tmpdir(), 'rule-config-'));
    try {
        const file = path.join(tmp, 'ladder.yaml');
        fs.writeFileSync(file, MINIMAL);
        assert.equal(loadRuleConfig(file).source, file);

        assert.throws(() => loadRuleConfig(path.join(tmp, 'absent.yaml')), /cannot read .*absent\.yaml/);
    } finally {
        fs.rmSync(tmp, { recursive: true, force: true });
    }
});

test('checkpoint directory precedence: flag, then config, then default', () => {
    const config = parseRuleConfig(FULL);
    assert.equal(resolveCheckpointDir(config, '/override'), '/override');
    assert.equal(resolveCheckpointDir(config), '/data/tracker/checkpoints');
    assert.equal(resolveCheckpointDir(parseRuleConfig(MINIMAL)), DEFAULT_CHECKPOINT_DIR);
    assert.equal(resolveCheckpointDir(null), DEFAULT_CHECKPOINT_DIR);
});

test('load-config variables list every level and only the sections that are set', () => {
    assert.deepEqual(renderConfigShellVars(parseRuleConfig(FULL)).lines(), [
        'PARTITION=devel',
        'MAX_LEVEL=1',
        'LEVELS_CONFIG=true',
        'LEVEL_0_PARTITION=devel',
        'LEVEL_0_MEM=1G',
        'LEVEL_0_TIME=00:05:00',
        'LEVEL_1_PARTITION=devel',
        'LEVEL_1_MEM=4096',
        'LEVEL_1_TIME=00:10:00',
        'SACCT_DELAY=2',
        'TRACKER_DIR=/data/tracker',
        'CHECKPOINT_DIR=/data/tracker/checkpoints',
        'LOGGING_ENABLED=true',
        'LOGGING_DB_PATH=/data/tracker/audit.db',
        'DB_PATH=/data/tracker/audit.db',
        'MAX_ARRAY_SPEC_LEN=1000',
        "CLUSTER_NAME='test cluster'",
    ]);

    assert.equal(
        renderConfigShellVars(parseRuleConfig(MINIMAL)).render(),
        'PARTITION=devel\nMAX_LEVEL=0\nLEVELS_CONFIG=true\nLEVEL_0_PARTITION=devel\nLEVEL_0_MEM=2G\nLEVEL_0_TIME=00:30:00\n'
    );
});
