// src/checkpoint_store/schema.ts

import {
    CHAIN_STATUSES,
    type ChainRecord,
    ESCALATION_REASONS,
    ROUND_STATUSES,
} from '../chain_types';
import { type JsonSchema, SchemaValidator, formatValidationErrors } from '../schema_validator';

export const CHAIN_ID_PATTERN = '^[A-Za-z0-9._-]+$';

export const CHECKPOINT_SCHEMA_ID = 'chain_checkpoint_v1';

const TIER_SCHEMA: JsonSchema = {
    type: 'object',
    required: ['partition', 'memory', 'time'],
    properties: {
        partition: { type: 'string' },
        memory: { type: 'string', minLength: 1 },
        time: { type: 'string', minLength: 1 },
    },
};

const COUNT: JsonSchema = { type: 'integer', minimum: 0 };

const ROUND_SCHEMA: JsonSchema = {
    type: 'object',
    required: [
        'round', 'job_ids', 'handler_id', 'array_spec', 'level', 'memory', 'time', 'status', 'submitted',
        'completed_count', 'oom_count', 'timeout_count', 'failed_count', 'escalate_indices',
    ],
    properties: {
        round: { type: 'integer', minimum: 1 },
        job_ids: { type: 'array', items: COUNT },
        handler_id: COUNT,
        array_spec: { type: 'string' },
        level: COUNT,
        memory: { type: 'string' },
        time: { type: 'string' },
        status: { type: 'string', enum: ROUND_STATUSES },
        submitted: { type: 'string' },
        completed_count: COUNT,
        oom_count: COUNT,
        timeout_count: COUNT,
        failed_count: COUNT,
        escalate_indices: { type: 'string' },
    },
};

export const CHECKPOINT_SCHEMA: JsonSchema = {
    type: 'object',
    required: [
        'schema_version', 'chain_id', 'mode', 'partition', 'script', 'script_args', 'total_tasks',
        'original_array_spec', 'levels', 'max_level', 'created', 'updated', 'state', 'rounds',
    ],
    properties: {
        schema_version: { type: 'integer', minimum: 1 },
        chain_id: { type: 'string', pattern: CHAIN_ID_PATTERN },
        mode: { type: 'string', enum: ['single', 'array'] },
        partition: { type: 'string' },
        script: { type: 'string', minLength: 1 },
        script_args: { type: 'array', items: { type: 'string' } },
        total_tasks: COUNT,
        original_array_spec: { type: 'string' },
        levels: { type: 'array', minItems: 1, items: TIER_SCHEMA },
        max_level: COUNT,
        created: { type: 'string' },
        updated: { type: 'string' },
        state: {
            type: 'object',
            required: [
                'current_level', 'current_memory', 'current_time', 'status', 'pending_indices', 'failed_indices',
                'completed_count', 'failed_count', 'escalate_count', 'last_escalation_reason',
            ],
            properties: {
                current_level: COUNT,
                current_memory: { type: 'string' },
                current_time: { type: 'string' },
                status: { type: 'string', enum: CHAIN_STATUSES },
                pending_indices: { type: 'string' },
                failed_indices: { type: 'string' },
                completed_count: COUNT,
                failed_count: COUNT,
                escalate_count: COUNT,
                last_escalation_reason: { type: 'string', enum: ESCALATION_REASONS },
            },
        },
        rounds: { type: 'array', items: ROUND_SCHEMA },
    },
};

const validator = new SchemaValidator();
validator.registerSchema(CHECKPOINT_SCHEMA_ID, CHECKPOINT_SCHEMA);

export function isValidChainId(chainId: string): boolean {
    return new RegExp(CHAIN_ID_PATTERN).test(chainId);
}

/**
 * Throws with the list of violations when `value` is not a well-formed
 * checkpoint. Cross-field rules (ladder length, level bounds) are checked
 * here too since the schema subset cannot express them.
 */
export function assertChainRecord(value: unknown): asserts value is ChainRecord {
    const result = validator.validate(value, CHECKPOINT_SCHEMA_ID);
    if (!result.valid) {
        throw new Error(formatValidationErrors(result.errors));
    }
    checkLadderConsistency(value);
}

function checkLadderConsistency(value: unknown): void {
    if (typeof value !== 'object' || value === null) return;
    const maxLevel = 'max_level' in value ? value.max_level : undefined;
    const levels = 'levels' in value ? value.levels : undefined;
    const state = 'state' in value ? value.state : undefined;
    if (typeof maxLevel !== 'number' || !Array.isArray(levels)) return;

    if (maxLevel !== levels.length - 1) {
        throw new Error(`.max_level: ${maxLevel} does not match ${levels.length} ladder level(s)`);
    }
    if (typeof state === 'object' && state !== null && 'current_level' in state) {
        const level = state.current_level;
        if (typeof level === 'number' && level > maxLevel) {
            throw new Error(`.state.current_level: ${level} exceeds max_level ${maxLevel}`);
        }
    }
}
