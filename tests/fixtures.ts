// Shared builders for the test suites.

import type { ChainDefinition, ChainRecord, ResourceTier } from '../src/chain_types';

export const FIXED_TIME = '2026-01-05T10:00:00.000Z';

export const fixedClock = (): Date => new Date(FIXED_TIME);

export const LADDER: ResourceTier[] = [
    { partition: 'devel', memory: '1G', time: '00:05:00' },
    { partition: 'devel', memory: '4G', time: '00:10:00' },
    { partition: 'bigmem', memory: '16G', time: '01:00:00' },
];

export function makeDefinition(overrides: Partial<ChainDefinition> = {}): ChainDefinition {
    return {
        chain_id: 'sweep',
        script: 'job.sh',
        script_args: ['--input', 'data set.csv'],
        total_tasks: 40,
        original_array_spec: '0-39',
        levels: LADDER.map((tier) => ({ ...tier })),
        ...overrides,
    };
}

/** A freshly created array chain, as the engine would write it. */
export function makeRecord(overrides: Partial<ChainRecord> = {}): ChainRecord {
    return {
        schema_version: 1,
        mode: 'array',
        partition: 'devel',
        max_level: 2,
        created: FIXED_TIME,
        updated: FIXED_TIME,
        ...makeDefinition(),
        state: {
            current_level: 0,
            current_memory: '1G',
            current_time: '00:05:00',
            status: 'STARTING',
            pending_indices: '0-39',
            failed_indices: '',
            completed_count: 0,
            failed_count: 0,
            escalate_count: 0,
            last_escalation_reason: 'NONE',
        },
        rounds: [],
        ...overrides,
    };
}
