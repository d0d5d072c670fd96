/**
 * Outcome Classifier - turns per-task terminal states into retry decisions
 *
 * Precedence for a task that did not complete:
 *   1. exit-code override (numeric return code before the ':')
 *   2. first state rule whose pattern occurs in the scheduler state
 *   3. no_retry
 *
 * The failure kind (OOM / TIMEOUT / OTHER) is tallied separately for
 * reporting and never influences the action.
 */

import { DEFAULT_EXIT_CODE_RULES, DEFAULT_STATE_RULES } from './config';

/* -------------------------------------------------------------------------- */
/* Types                                                                      */
/* -------------------------------------------------------------------------- */

export type StateAction = 'escalate' | 'no_retry';

export type TaskAction = 'COMPLETE' | 'ESCALATE' | 'NO_RETRY';

export type FailureKind = 'NONE' | 'OOM' | 'TIMEOUT' | 'OTHER';

export interface StateRule {
    pattern: string;
    action: StateAction;
}

export type ExitCodeRules = ReadonlyMap<number, StateAction>;

export interface ClassificationRules {
    stateRules: readonly StateRule[];
    exitCodeRules: ExitCodeRules;
}

export interface RawTaskResult {
    task_id: number;
    state: string;
    /** `return_code:signal` as reported by accounting, or a bare return code */
    exit_code: string;
}

export interface TaskOutcome {
    task_id: number;
    state: string;
    exit_code: string;
    action: TaskAction;
    failure_kind: FailureKind;
}

export interface ClassificationResult {
    outcomes: TaskOutcome[];
    completed: number[];
    escalate: number[];
    no_retry: number[];
    oom: number[];
    timeout: number[];
    oom_count: number;
    timeout_count: number;
    total: number;
}

export const DEFAULT_RULES: ClassificationRules = {
    stateRules: DEFAULT_STATE_RULES,
    exitCodeRules: DEFAULT_EXIT_CODE_RULES,
};

/* -------------------------------------------------------------------------- */
/* Helpers                                                                    */
/* -------------------------------------------------------------------------- */

export function parseReturnCode(exitCode: string): number | null {
    const head = exitCode.split(':')[0].trim();
    if (!/^-?\d+$/.test(head)) return null;
    return parseInt(head, 10);
}

export function failureKindOf(state: string): FailureKind {
    if (state.includes('OUT_OF_MEMORY')) return 'OOM';
    if (state.includes('TIMEOUT')) return 'TIMEOUT';
    return 'OTHER';
}

function toTaskAction(action: StateAction): TaskAction {
    return action === 'escalate' ? 'ESCALATE' : 'NO_RETRY';
}

export function decideAction(result: RawTaskResult, rules: ClassificationRules): TaskAction {
    if (result.state.includes('COMPLETED')) return 'COMPLETE';

    const code = parseReturnCode(result.exit_code);
    if (code !== null) {
        const override = rules.exitCodeRules.get(code);
        if (override) return toTaskAction(override);
    }

    for (const rule of rules.stateRules) {
        if (result.state.includes(rule.pattern)) return toTaskAction(rule.action);
    }
    return 'NO_RETRY';
}

/* -------------------------------------------------------------------------- */
/* Classify                                                                   */
/* -------------------------------------------------------------------------- */

export function classifyOutcomes(
    results: readonly RawTaskResult[],
    rules: ClassificationRules = DEFAULT_RULES
): ClassificationResult {
    const outcomes: TaskOutcome[] = [];
    const completed: number[] = [];
    const escalate: number[] = [];
    const noRetry: number[] = [];
    const oom: number[] = [];
    const timeout: number[] = [];

    for (const result of results) {
        const action = decideAction(result, rules);
        const failureKind: FailureKind = action === 'COMPLETE' ? 'NONE' : failureKindOf(result.state);

        outcomes.push({
            task_id: result.task_id,
            state: result.state,
            exit_code: result.exit_code,
            action,
            failure_kind: failureKind,
        });

        if (action === 'COMPLETE') completed.push(result.task_id);
        else if (action === 'ESCALATE') escalate.push(result.task_id);
        else noRetry.push(result.task_id);

        if (failureKind === 'OOM') oom.push(result.task_id);
        else if (failureKind === 'TIMEOUT') timeout.push(result.task_id);
    }

    const asc = (a: number, b: number) => a - b;
    completed.sort(asc);
    escalate.sort(asc);
    noRetry.sort(asc);
    oom.sort(asc);
    timeout.sort(asc);

    return {
        outcomes,
        completed,
        escalate,
        no_retry: noRetry,
        oom,
        timeout,
        oom_count: oom.length,
        timeout_count: timeout.length,
        total: results.length,
    };
}
