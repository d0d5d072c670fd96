/**
 * Escalation Planner - decides the next step of a chain from one round's outcome
 *
 *   nothing to escalate        -> complete
 *   next level past the ladder -> fail (MEMORY | TIME | LEVEL)
 *   otherwise                  -> escalate to current_level + 1
 *
 * Planning is pure. applyPlan() records the decision once the driver has
 * submitted whatever the plan asked for.
 */

import type { ChainRecord, FailureReason, ResourceTier } from './chain_types';
import type { EscalationEngine } from './escalation_engine';
import { type ArrayBatch, type BatchOptions, compressIndices, splitIntoBatches } from './index_codec';
import type { ClassificationResult } from './outcome_classifier';
import { ShellVars } from './shell_vars';
import { ErrorFactory } from './structured_error';

export interface PlanCounts {
    completed: number;
    escalate: number;
    oom: number;
    timeout: number;
    failed: number;
}

export interface CompletePlan {
    kind: 'complete';
    completedCount: number;
    failedCount: number;
}

export interface FailPlan {
    kind: 'fail';
    reason: FailureReason;
    /** compressed indices that could not move up the ladder */
    failedSpec: string;
    counts: PlanCounts;
}

export interface EscalatePlan {
    kind: 'escalate';
    nextLevel: number;
    tier: ResourceTier;
    escalateSpec: string;
    batches: ArrayBatch[];
    counts: PlanCounts;
}

export type EscalationPlan = CompletePlan | FailPlan | EscalatePlan;

export interface RetrySubmission {
    jobIds: number[];
    handlerId: number;
}

function countsOf(c: ClassificationResult): PlanCounts {
    return {
        completed: c.completed.length,
        escalate: c.escalate.length,
        oom: c.oom_count,
        timeout: c.timeout_count,
        failed: c.no_retry.length,
    };
}

export function failureReasonOf(c: ClassificationResult): FailureReason {
    const oom = new Set(c.oom);
    const timeout = new Set(c.timeout);
    if (c.escalate.every((id) => oom.has(id))) return 'MEMORY';
    if (c.escalate.every((id) => timeout.has(id))) return 'TIME';
    return 'LEVEL';
}

export function planNextStep(
    record: ChainRecord,
    classification: ClassificationResult,
    opts: BatchOptions = {}
): EscalationPlan {
    if (classification.escalate.length === 0) {
        return {
            kind: 'complete',
            completedCount: classification.completed.length,
            failedCount: classification.no_retry.length,
        };
    }

    const counts = countsOf(classification);
    const nextLevel = record.state.current_level + 1;
    if (nextLevel > record.max_level) {
        return {
            kind: 'fail',
            reason: failureReasonOf(classification),
            failedSpec: compressIndices(classification.escalate),
            counts,
        };
    }

    return {
        kind: 'escalate',
        nextLevel,
        tier: record.levels[nextLevel],
        escalateSpec: compressIndices(classification.escalate),
        batches: splitIntoBatches(classification.escalate, opts),
        counts,
    };
}

/**
 * Record a plan on the chain. `analyzedJobId` is the job whose outcome was
 * planned; an escalation also needs the retry submission.
 */
export function applyPlan(
    engine: EscalationEngine,
    chainId: string,
    plan: EscalationPlan,
    analyzedJobId: number,
    submission?: RetrySubmission
): ChainRecord | null {
    switch (plan.kind) {
        case 'complete':
            return engine.markCompleted(chainId, analyzedJobId, plan.completedCount);
        case 'fail':
            return engine.markFailed(chainId, plan.failedSpec, plan.reason);
        case 'escalate':
            if (!submission || submission.jobIds.length === 0) {
                throw ErrorFactory.invalidArgument('An escalation plan needs the retry job id(s)', { chain_id: chainId });
            }
            return engine.escalate(chainId, {
                nextLevel: plan.nextLevel,
                nextMemory: plan.tier.memory,
                escalateSpec: plan.escalateSpec,
                retryJobIds: submission.jobIds,
                handlerId: submission.handlerId,
                completedCount: plan.counts.completed,
                escalateCount: plan.counts.escalate,
                oomCount: plan.counts.oom,
                timeoutCount: plan.counts.timeout,
                failedCount: plan.counts.failed,
            });
    }
}

export function renderPlanShellVars(plan: EscalationPlan, vars: ShellVars = new ShellVars()): ShellVars {
    vars.set('NEXT_ACTION', plan.kind);
    switch (plan.kind) {
        case 'complete':
            break;
        case 'fail':
            vars.set('FAIL_REASON', plan.reason);
            vars.set('FAILED_SPEC', plan.failedSpec);
            break;
        case 'escalate':
            vars.set('NEXT_LEVEL', plan.nextLevel);
            vars.set('NEXT_PARTITION', plan.tier.partition);
            vars.set('NEXT_MEM', plan.tier.memory);
            vars.set('NEXT_TIME', plan.tier.time);
            vars.set('ESCALATE_SPEC', plan.escalateSpec);
            vars.set('BATCH_COUNT', plan.batches.length);
            plan.batches.forEach((batch, i) => vars.set(`BATCH_${i}_SPEC`, batch.spec));
            break;
    }
    return vars;
}
