import test from 'node:test';
import assert from 'node:assert/strict';

import { SchemaValidator, formatValidationErrors, type JsonSchema } from '../src/schema_validator';
import { assertChainRecord, isValidChainId } from '../src/checkpoint_store';
import { makeRecord } from './fixtures';

const TIER_LIST_SCHEMA: JsonSchema = {
    type: 'object',
    required: ['name', 'tiers'],
    properties: {
        name: { type: 'string', minLength: 1, pattern: '^[a-z]+$' },
        tiers: {
            type: 'array',
            minItems: 1,
            items: {
                type: 'object',
                required: ['mem'],
                properties: {
                    mem: { type: 'string' },
                    weight: { type: 'number', minimum: 0, maximum: 1 },
                    kind: { type: 'string', enum: ['cpu', 'gpu'] },
                },
            },
        },
    },
};

function validator(): SchemaValidator {
    const v = new SchemaValidator();
    v.registerSchema('tiers_v1', TIER_LIST_SCHEMA);
    return v;
}

test('a well-formed document passes', () => {
    const r = validator().validate({ name: 'ladder', tiers: [{ mem: '1G', weight: 0.5, kind: 'cpu' }] }, 'tiers_v1');
    assert.deepEqual(r, { valid: true, errors: [] });
});

test('integers satisfy number fields', () => {
    assert.ok(validator().validate({ name: 'ladder', tiers: [{ mem: '1G', weight: 1 }] }, 'tiers_v1').valid);
});

test('violations carry the path of the offending field', () => {
    const r = validator().validate({ name: 'Ladder', tiers: [{ weight: 2, kind: 'tpu' }] }, 'tiers_v1');
    assert.equal(r.valid, false);
    assert.deepEqual(
        r.errors.map((e) => e.path),
        ['.name', '.tiers[0].mem', '.tiers[0].weight', '.tiers[0].kind']
    );
});

test('minItems and wrong types are reported', () => {
    const r = validator().validate({ name: 'ladder', tiers: [] }, 'tiers_v1');
    assert.equal(formatValidationErrors(r.errors), '.tiers: Expected at least 1 item(s), got 0');

    const wrongType = validator().validate([], 'tiers_v1');
    assert.equal(formatValidationErrors(wrongType.errors), '<root>: Expected type object, got array');
});

test('an unknown schema id is an error, not a pass', () => {
    const r = new SchemaValidator().validate({}, 'missing');
    assert.equal(r.valid, false);
    assert.equal(r.errors[0].message, 'Schema not found: missing');
});

test('assertChainRecord accepts a fresh record and rejects ladder mismatches', () => {
    const record = makeRecord();
    assertChainRecord(record);

    assert.throws(() => assertChainRecord({ ...record, max_level: 5 }), /max_level: 5 does not match 3 ladder level/);
    assert.throws(
        () => assertChainRecord({ ...record, state: { ...record.state, current_level: 3 } }),
        /current_level: 3 exceeds max_level 2/
    );
    assert.throws(() => assertChainRecord({ ...record, mode: 'batch' }), /\.mode: Value must be one of: single, array/);
});

test('chain ids are restricted to filename-safe characters', () => {
    assert.ok(isValidChainId('sweep_2024-01.a'));
    assert.equal(isValidChainId('../etc'), false);
    assert.equal(isValidChainId(''), false);
});
