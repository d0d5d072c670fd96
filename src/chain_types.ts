/**
 * Chain record types shared by the engine, the checkpoint store and reporting.
 *
 * Field names are snake_case because they are the on-disk checkpoint format,
 * which operators read and occasionally hand-edit.
 */

export type ChainMode = 'single' | 'array';

export type ChainStatus =
    | 'STARTING'
    | 'RUNNING'
    | 'ESCALATING'
    | 'COMPLETED'
    | 'FAILED_MAX_MEMORY'
    | 'FAILED_MAX_TIME'
    | 'FAILED_MAX_LEVEL';

export type RoundStatus = 'RUNNING' | 'COMPLETED' | 'ESCALATING' | 'PENDING';

export type EscalationReason = 'NONE' | 'OOM' | 'TIMEOUT' | 'MIXED';

export type FailureReason = 'MEMORY' | 'TIME' | 'LEVEL';

export const CHAIN_STATUSES: readonly ChainStatus[] = [
    'STARTING', 'RUNNING', 'ESCALATING', 'COMPLETED', 'FAILED_MAX_MEMORY', 'FAILED_MAX_TIME', 'FAILED_MAX_LEVEL',
];
export const ROUND_STATUSES: readonly RoundStatus[] = ['RUNNING', 'COMPLETED', 'ESCALATING', 'PENDING'];
export const ESCALATION_REASONS: readonly EscalationReason[] = ['NONE', 'OOM', 'TIMEOUT', 'MIXED'];
export const FAILURE_REASONS: readonly FailureReason[] = ['MEMORY', 'TIME', 'LEVEL'];

const TERMINAL: ReadonlySet<ChainStatus> = new Set<ChainStatus>([
    'COMPLETED', 'FAILED_MAX_MEMORY', 'FAILED_MAX_TIME', 'FAILED_MAX_LEVEL',
]);

export function isTerminalStatus(status: ChainStatus): boolean {
    return TERMINAL.has(status);
}

export function isFailureReason(value: string): value is FailureReason {
    return FAILURE_REASONS.some((r) => r === value);
}

/** One rung of the resource ladder. */
export interface ResourceTier {
    partition: string;
    memory: string;
    time: string;
}

/** Immutable description of the work, supplied when the chain is created. */
export interface ChainDefinition {
    chain_id: string;
    script: string;
    script_args: string[];
    /** 0 for a single (non-array) job */
    total_tasks: number;
    original_array_spec: string;
    levels: ResourceTier[];
}

export interface ChainState {
    current_level: number;
    current_memory: string;
    current_time: string;
    status: ChainStatus;
    pending_indices: string;
    failed_indices: string;
    completed_count: number;
    failed_count: number;
    escalate_count: number;
    last_escalation_reason: EscalationReason;
}

export interface RoundRecord {
    round: number;
    job_ids: number[];
    /** 0 when no follow-up handler was submitted */
    handler_id: number;
    array_spec: string;
    level: number;
    memory: string;
    time: string;
    status: RoundStatus;
    submitted: string;
    completed_count: number;
    oom_count: number;
    timeout_count: number;
    failed_count: number;
    escalate_indices: string;
}

export interface ChainRecord extends ChainDefinition {
    schema_version: number;
    mode: ChainMode;
    partition: string;
    max_level: number;
    created: string;
    updated: string;
    state: ChainState;
    rounds: RoundRecord[];
}
