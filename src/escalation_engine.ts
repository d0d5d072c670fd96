/**
 * Escalation Engine - the checkpointed state machine behind a resubmission ladder
 *
 *   STARTING -> RUNNING -> ESCALATING -> RUNNING (next level) ...
 *                      \-> COMPLETED | FAILED_MAX_MEMORY | FAILED_MAX_TIME | FAILED_MAX_LEVEL
 *
 * Every mutation is load -> apply -> save of the whole record. There is no
 * locking: two overlapping operations on one chain lose the first write.
 *
 * Mutations return the saved record, or null when the operation was skipped
 * (missing chain, unreadable or unwritable checkpoint, terminal chain).
 * LEVEL_OUT_OF_RANGE and malformed arguments always throw.
 */

import { EventEmitter } from 'events';
import {
    type ChainDefinition,
    type ChainRecord,
    type ChainStatus,
    type EscalationReason,
    type FailureReason,
    type RoundRecord,
    isTerminalStatus,
} from './chain_types';
import type { CheckpointRepository } from './checkpoint_store/types';
import { isValidChainId } from './checkpoint_store/schema';
import { CHECKPOINT_SCHEMA_VERSION } from './config';
import { expandIndexSpec } from './index_codec';
import { createLogger, type Logger } from './logger';
import { ERRORS, ErrorFactory, describeError, isEscalationError } from './structured_error';

/* -------------------------------------------------------------------------- */
/* Operation inputs                                                           */
/* -------------------------------------------------------------------------- */

export interface CreateChainOptions {
    /** refuse with CHAIN_EXISTS instead of overwriting an existing checkpoint */
    rejectExisting?: boolean;
}

export interface RecordRoundInput {
    jobIds: number[];
    handlerId: number;
    arraySpec: string;
    level: number;
    memory: string;
}

export interface EscalateInput {
    nextLevel: number;
    nextMemory: string;
    /** compressed spec of the indices being retried */
    escalateSpec: string;
    retryJobIds: number[];
    handlerId: number;
    completedCount: number;
    escalateCount: number;
    oomCount: number;
    timeoutCount: number;
    failedCount: number;
}

/* -------------------------------------------------------------------------- */
/* Transition events                                                          */
/* -------------------------------------------------------------------------- */

export type TransitionEvent =
    | { kind: 'created'; record: ChainRecord; overwritten: boolean }
    | { kind: 'round_recorded'; record: ChainRecord; round: RoundRecord }
    | { kind: 'escalated'; record: ChainRecord; outcome: RoundRecord | null; retry: RoundRecord; input: EscalateInput }
    | { kind: 'completed'; record: ChainRecord; jobId: number; completedCount: number }
    | { kind: 'failed'; record: ChainRecord; reason: FailureReason; failedIndices: string };

export type TransitionKind = TransitionEvent['kind'];

export interface ChainListing {
    chainId: string;
    record: ChainRecord | null;
    error?: string;
}

export interface EscalationEngineOptions {
    logger?: Logger;
    clock?: () => Date;
}

export function escalationReasonOf(oomCount: number, timeoutCount: number): EscalationReason {
    if (oomCount > 0 && timeoutCount > 0) return 'MIXED';
    if (oomCount > 0) return 'OOM';
    if (timeoutCount > 0) return 'TIMEOUT';
    return 'NONE';
}

function assertCount(name: string, value: number): void {
    if (!Number.isInteger(value) || value < 0) {
        throw ErrorFactory.invalidArgument(`${name} must be a non-negative integer, got ${value}`, { [name]: value });
    }
}

function assertJobIds(name: string, ids: readonly number[]): void {
    for (const id of ids) assertCount(name, id);
}

const FAILURE_STATUS: Record<FailureReason, ChainStatus> = {
    MEMORY: 'FAILED_MAX_MEMORY',
    TIME: 'FAILED_MAX_TIME',
    LEVEL: 'FAILED_MAX_LEVEL',
};

type Mutation = (record: ChainRecord) => TransitionEvent | 'skip';

/* -------------------------------------------------------------------------- */
/* Engine                                                                     */
/* -------------------------------------------------------------------------- */

export interface EscalationEngine {
    on(event: 'transition', listener: (event: TransitionEvent) => void): this;
    once(event: 'transition', listener: (event: TransitionEvent) => void): this;
    off(event: 'transition', listener: (event: TransitionEvent) => void): this;
    emit(event: 'transition', payload: TransitionEvent): boolean;
}

export class EscalationEngine extends EventEmitter {
    private readonly log: Logger;
    private readonly clock: () => Date;

    constructor(private readonly store: CheckpointRepository, opts: EscalationEngineOptions = {}) {
        super();
        this.log = opts.logger ?? createLogger('engine');
        this.clock = opts.clock ?? (() => new Date());
    }

    private now(): string {
        return this.clock().toISOString();
    }

    /* ------------------------------------------------------------------------ */
    /* Create                                                                   */
    /* ------------------------------------------------------------------------ */

    createChain(def: ChainDefinition, opts: CreateChainOptions = {}): ChainRecord {
        this.validateDefinition(def);

        const overwritten = this.store.exists(def.chain_id);
        if (overwritten) {
            if (opts.rejectExisting) throw ErrorFactory.chainExists(def.chain_id);
            this.log.warn('Overwriting existing checkpoint', { chain_id: def.chain_id });
        }

        const first = def.levels[0];
        const ts = this.now();
        const record: ChainRecord = {
            schema_version: CHECKPOINT_SCHEMA_VERSION,
            chain_id: def.chain_id,
            mode: def.total_tasks > 0 ? 'array' : 'single',
            partition: first.partition,
            script: def.script,
            script_args: [...def.script_args],
            total_tasks: def.total_tasks,
            original_array_spec: def.original_array_spec,
            levels: def.levels.map((tier) => ({ ...tier })),
            max_level: def.levels.length - 1,
            created: ts,
            updated: ts,
            state: {
                current_level: 0,
                current_memory: first.memory,
                current_time: first.time,
                status: 'STARTING',
                pending_indices: def.original_array_spec,
                failed_indices: '',
                completed_count: 0,
                failed_count: 0,
                escalate_count: 0,
                last_escalation_reason: 'NONE',
            },
            rounds: [],
        };

        this.store.save(record);
        this.log.info('Chain created', {
            chain_id: record.chain_id,
            mode: record.mode,
            max_level: record.max_level,
            total_tasks: record.total_tasks,
        });
        this.emit('transition', { kind: 'created', record, overwritten });
        return record;
    }

    private validateDefinition(def: ChainDefinition): void {
        if (!isValidChainId(def.chain_id)) {
            throw ErrorFactory.invalidArgument(`Invalid chain id: ${JSON.stringify(def.chain_id)}`, {
                chain_id: def.chain_id,
            });
        }
        if (!def.script) throw ErrorFactory.invalidArgument('Chain script must not be empty');
        if (def.levels.length === 0) {
            throw ErrorFactory.invalidArgument('Resource ladder needs at least one level', { chain_id: def.chain_id });
        }
        def.levels.forEach((tier, i) => {
            if (!tier.memory || !tier.time) {
                throw ErrorFactory.invalidArgument(`Level ${i} needs both memory and time`, { level: i });
            }
        });
        assertCount('total_tasks', def.total_tasks);
        if (def.total_tasks === 0 && def.original_array_spec) {
            throw ErrorFactory.invalidArgument('An array spec requires total_tasks > 0', { chain_id: def.chain_id });
        }
        this.assertWithinTasks(def.chain_id, def.total_tasks, def.original_array_spec);
    }

    /** pending indices must stay inside [0, total_tasks) for array chains */
    private assertWithinTasks(chainId: string, totalTasks: number, spec: string): void {
        if (totalTasks === 0 || !spec) return;
        const indices = expandIndexSpec(spec);
        const last = indices[indices.length - 1];
        if (last !== undefined && last >= totalTasks) {
            throw ErrorFactory.invalidArgument(`Index ${last} is outside 0..${totalTasks - 1}`, {
                chain_id: chainId,
                spec,
            });
        }
    }

    /* ------------------------------------------------------------------------ */
    /* Transitions                                                              */
    /* ------------------------------------------------------------------------ */

    recordRound(chainId: string, input: RecordRoundInput): ChainRecord | null {
        assertJobIds('job_id', input.jobIds);
        assertCount('handler_id', input.handlerId);

        return this.modify(chainId, 'record-round', (record) => {
            const tier = record.levels[input.level];
            if (tier === undefined || !Number.isInteger(input.level)) {
                throw ErrorFactory.levelOutOfRange(chainId, input.level, record.max_level);
            }
            if (this.skipTerminal(record, 'record-round')) return 'skip';

            const round: RoundRecord = {
                round: record.rounds.length + 1,
                job_ids: [...input.jobIds],
                handler_id: input.handlerId,
                array_spec: input.arraySpec,
                level: input.level,
                memory: input.memory,
                time: tier.time,
                status: 'RUNNING',
                submitted: this.now(),
                completed_count: 0,
                oom_count: 0,
                timeout_count: 0,
                failed_count: 0,
                escalate_indices: '',
            };
            record.rounds.push(round);
            record.state.status = 'RUNNING';
            return { kind: 'round_recorded', record, round };
        });
    }

    escalate(chainId: string, input: EscalateInput): ChainRecord | null {
        assertJobIds('job_id', input.retryJobIds);
        assertCount('handler_id', input.handlerId);
        assertCount('completed_count', input.completedCount);
        assertCount('escalate_count', input.escalateCount);
        assertCount('oom_count', input.oomCount);
        assertCount('timeout_count', input.timeoutCount);
        assertCount('failed_count', input.failedCount);

        return this.modify(chainId, 'escalate', (record) => {
            const tier = record.levels[input.nextLevel];
            if (tier === undefined || !Number.isInteger(input.nextLevel)) {
                throw ErrorFactory.levelOutOfRange(chainId, input.nextLevel, record.max_level);
            }
            if (this.skipTerminal(record, 'escalate')) return 'skip';
            this.assertWithinTasks(chainId, record.total_tasks, input.escalateSpec);

            const state = record.state;
            state.current_level = input.nextLevel;
            state.current_memory = input.nextMemory;
            state.current_time = tier.time;
            state.pending_indices = input.escalateSpec;
            state.status = 'ESCALATING';
            state.escalate_count = input.escalateCount;
            state.failed_count = input.failedCount;
            state.last_escalation_reason = escalationReasonOf(input.oomCount, input.timeoutCount);

            const outcome = record.rounds.length > 0 ? record.rounds[record.rounds.length - 1] : null;
            if (outcome) {
                outcome.status = 'ESCALATING';
                outcome.completed_count = input.completedCount;
                outcome.oom_count = input.oomCount;
                outcome.timeout_count = input.timeoutCount;
                outcome.failed_count = input.failedCount;
                outcome.escalate_indices = input.escalateSpec;
            }

            const retry: RoundRecord = {
                round: record.rounds.length + 1,
                job_ids: [...input.retryJobIds],
                handler_id: input.handlerId,
                array_spec: input.escalateSpec,
                level: input.nextLevel,
                memory: input.nextMemory,
                time: tier.time,
                status: 'PENDING',
                submitted: this.now(),
                completed_count: 0,
                oom_count: 0,
                timeout_count: 0,
                failed_count: 0,
                escalate_indices: '',
            };
            record.rounds.push(retry);
            return { kind: 'escalated', record, outcome, retry, input };
        });
    }

    markCompleted(chainId: string, jobId: number, completedCount: number): ChainRecord | null {
        assertCount('job_id', jobId);
        assertCount('completed_count', completedCount);

        return this.modify(chainId, 'mark-completed', (record) => {
            // a repeated completion re-applies; any other terminal state is final
            if (record.state.status !== 'COMPLETED' && this.skipTerminal(record, 'mark-completed')) return 'skip';

            record.state.status = 'COMPLETED';
            record.state.completed_count = completedCount;
            record.state.pending_indices = '';

            const target =
                record.rounds.find((r) => r.job_ids.includes(jobId)) ??
                (record.rounds.length > 0 ? record.rounds[record.rounds.length - 1] : undefined);
            if (target) {
                target.status = 'COMPLETED';
                target.completed_count = completedCount;
            }
            return { kind: 'completed', record, jobId, completedCount };
        });
    }

    markFailed(chainId: string, failedIndices: string, reason: FailureReason): ChainRecord | null {
        return this.modify(chainId, 'mark-failed', (record) => {
            if (this.skipTerminal(record, 'mark-failed')) return 'skip';
            this.assertWithinTasks(chainId, record.total_tasks, failedIndices);

            record.state.status = FAILURE_STATUS[reason];
            record.state.failed_indices = failedIndices;
            record.state.pending_indices = failedIndices;
            return { kind: 'failed', record, reason, failedIndices };
        });
    }

    /* ------------------------------------------------------------------------ */
    /* Reads                                                                    */
    /* ------------------------------------------------------------------------ */

    /** Throws CHAIN_NOT_FOUND or CHECKPOINT_IO_ERROR; reads never degrade. */
    getChain(chainId: string): ChainRecord {
        const record = this.store.load(chainId);
        if (!record) throw ErrorFactory.chainNotFound(chainId);
        return record;
    }

    listChains(): ChainListing[] {
        return this.store.list().map((chainId): ChainListing => {
            try {
                return { chainId, record: this.getChain(chainId) };
            } catch (e) {
                if (!isEscalationError(e)) throw e;
                return { chainId, record: null, error: e.message };
            }
        });
    }

    /* ------------------------------------------------------------------------ */
    /* Internals                                                                */
    /* ------------------------------------------------------------------------ */

    private skipTerminal(record: ChainRecord, operation: string): boolean {
        if (!isTerminalStatus(record.state.status)) return false;
        this.log.warn('Chain is terminal, skipping', {
            chain_id: record.chain_id,
            operation,
            status: record.state.status,
        });
        return true;
    }

    private modify(chainId: string, operation: string, mutate: Mutation): ChainRecord | null {
        const applied = this.apply(chainId, operation, mutate);
        if (!applied) return null;

        const { record, event } = applied;
        this.log.info('Chain transition', {
            chain_id: chainId,
            operation,
            status: record.state.status,
            level: record.state.current_level,
            rounds: record.rounds.length,
        });
        this.emit('transition', event);
        return record;
    }

    private apply(
        chainId: string,
        operation: string,
        mutate: Mutation
    ): { record: ChainRecord; event: TransitionEvent } | null {
        try {
            const record = this.getChain(chainId);
            const event = mutate(record);
            if (event === 'skip') return null;
            record.updated = this.now();
            this.store.save(record);
            return { record, event };
        } catch (e) {
            if (isEscalationError(e, ERRORS.CHECKPOINT_IO_ERROR) || isEscalationError(e, ERRORS.CHAIN_NOT_FOUND)) {
                this.log.warn('Could not update checkpoint, skipping', {
                    chain_id: chainId,
                    operation,
                    code: e.code,
                    error: describeError(e),
                });
                return null;
            }
            throw e;
        }
    }
}
