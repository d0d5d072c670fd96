/**
 * Scheduler Client - read-only status queries against Slurm
 *
 * Only sacct and squeue are ever invoked. Every call is synchronous with a
 * timeout; a failed query is logged as SCHEDULER_QUERY_ERROR. State lookups
 * then read as "no data"; accounting returns null so analysis can refuse to
 * plan from nothing.
 */

import { spawnSync } from 'child_process';
import { LRUCache } from 'lru-cache';
import { SCHEDULER } from './config';
import { createLogger, type Logger } from './logger';
import type { RawTaskResult } from './outcome_classifier';
import { ErrorFactory, type EscalationError, describeError } from './structured_error';

/* -------------------------------------------------------------------------- */
/* Command runner                                                             */
/* -------------------------------------------------------------------------- */

export interface CommandResult {
    /** null when the process was killed or never started */
    status: number | null;
    stdout: string;
    stderr: string;
    error?: Error;
}

export type CommandRunner = (command: string, args: readonly string[], timeoutMs: number) => CommandResult;

export const spawnCommandRunner: CommandRunner = (command, args, timeoutMs) => {
    const result = spawnSync(command, [...args], { encoding: 'utf-8', timeout: timeoutMs });
    return {
        status: result.status,
        stdout: result.stdout ?? '',
        stderr: result.stderr ?? '',
        error: result.error,
    };
};

/* -------------------------------------------------------------------------- */
/* Records                                                                    */
/* -------------------------------------------------------------------------- */

export interface TaskRecord {
    /** JobID column as printed, e.g. `4711_3` */
    job_key: string;
    array_job_id: number;
    task_id: number;
    state: string;
    /** raw `rc:sig` column */
    exit_code_raw: string;
    exit_code: number | null;
    signal: number | null;
    max_rss: string;
    elapsed: string;
    timelimit: string;
    node_list: string;
    submit: string;
    start: string;
    end: string;
}

function parseIntOrNull(text: string | undefined): number | null {
    if (text === undefined || !/^-?\d+$/.test(text.trim())) return null;
    return parseInt(text.trim(), 10);
}

/**
 * One `--parsable2` accounting line. Pending array ranges (`4711_[0-9]`) and
 * lines without a state are dropped.
 */
export function parseAccountingLine(line: string): TaskRecord | null {
    const parts = line.split('|');
    if (parts.length < 3) return null;

    const jobKey = parts[0].trim();
    const state = parts[1].trim().split(/\s+/)[0];
    if (!jobKey || !state) return null;

    const underscore = jobKey.indexOf('_');
    let taskId = 0;
    if (underscore >= 0) {
        const suffix = parseIntOrNull(jobKey.slice(underscore + 1));
        if (suffix === null || suffix < 0) return null;
        taskId = suffix;
    }
    const arrayJobId = parseIntOrNull(underscore >= 0 ? jobKey.slice(0, underscore) : jobKey) ?? 0;

    const exitRaw = parts[2].trim();
    const [rc, sig] = exitRaw.split(':');

    return {
        job_key: jobKey,
        array_job_id: arrayJobId,
        task_id: taskId,
        state,
        exit_code_raw: exitRaw,
        exit_code: parseIntOrNull(rc),
        signal: parseIntOrNull(sig),
        max_rss: (parts[3] ?? '').trim(),
        elapsed: (parts[4] ?? '').trim(),
        timelimit: (parts[5] ?? '').trim(),
        node_list: (parts[6] ?? '').trim(),
        submit: (parts[7] ?? '').trim(),
        start: (parts[8] ?? '').trim(),
        end: (parts[9] ?? '').trim(),
    };
}

export function parseAccountingOutput(stdout: string): TaskRecord[] {
    const records: TaskRecord[] = [];
    for (const line of stdout.split('\n')) {
        if (!line.trim()) continue;
        const record = parseAccountingLine(line);
        if (record) records.push(record);
    }
    return records;
}

export function toRawTaskResults(records: readonly TaskRecord[]): RawTaskResult[] {
    return records.map((r) => ({ task_id: r.task_id, state: r.state, exit_code: r.exit_code_raw }));
}

/* -------------------------------------------------------------------------- */
/* Client                                                                     */
/* -------------------------------------------------------------------------- */

export interface SchedulerClientOptions {
    runner?: CommandRunner;
    timeoutMs?: number;
    logger?: Logger;
}

export class SchedulerClient {
    private readonly runner: CommandRunner;
    private readonly timeoutMs: number;
    private readonly log: Logger;

    // per-process; a status display queries the same jobs once per round
    private readonly accounting = new LRUCache<string, TaskRecord[]>({
        max: SCHEDULER.ACCOUNTING_CACHE_ENTRIES,
        ttl: SCHEDULER.ACCOUNTING_CACHE_TTL_MS,
    });

    constructor(opts: SchedulerClientOptions = {}) {
        this.runner = opts.runner ?? spawnCommandRunner;
        this.timeoutMs = opts.timeoutMs ?? SCHEDULER.QUERY_TIMEOUT_MS;
        this.log = opts.logger ?? createLogger('scheduler');
    }

    /** Per-task accounting for one or more (batched) array jobs; null when sacct failed. */
    queryAccounting(jobIds: readonly number[]): TaskRecord[] | null {
        if (jobIds.length === 0) return [];
        const key = jobIds.join(',');

        const cached = this.accounting.get(key);
        if (cached) return cached;

        const stdout = this.run('sacct', ['-n', '-X', '-j', key, '-o', SCHEDULER.ACCOUNTING_FIELDS, '--parsable2']);
        if (stdout === null) return null;

        const records = parseAccountingOutput(stdout);
        this.accounting.set(key, records);
        return records;
    }

    /** First word of every accounting line for the job (one per array task). */
    queryJobStates(jobId: number): string[] {
        const stdout = this.run('sacct', ['-nX', '-j', String(jobId), '-o', 'State%20']);
        if (stdout === null) return [];
        return stdout
            .split('\n')
            .map((line) => line.trim().split(/\s+/)[0])
            .filter((state) => state.length > 0);
    }

    /** Queue state (`PENDING`, `RUNNING`, ...) or null when the job has left the queue. */
    queryQueueState(jobId: number): string | null {
        const stdout = this.run('squeue', ['-j', String(jobId), '-h', '-o', '%T %r']);
        if (stdout === null) return null;
        const first = stdout.trim().split(/\s+/)[0];
        return first ? first : null;
    }

    clearCache(): void {
        this.accounting.clear();
    }

    private run(command: string, args: readonly string[]): string | null {
        const rendered = `${command} ${args.join(' ')}`;
        let result: CommandResult;
        try {
            result = this.runner(command, args, this.timeoutMs);
        } catch (e) {
            this.warn(ErrorFactory.schedulerQuery(rendered, describeError(e), e));
            return null;
        }

        if (result.error) {
            this.warn(ErrorFactory.schedulerQuery(rendered, result.error.message, result.error));
            return null;
        }
        if (result.status !== 0) {
            const reason = result.status === null ? 'terminated' : `exit ${result.status}`;
            const detail = result.stderr.trim();
            this.warn(ErrorFactory.schedulerQuery(rendered, detail ? `${reason}: ${detail}` : reason));
            return null;
        }
        return result.stdout;
    }

    private warn(err: EscalationError): void {
        this.log.warn(err.message, { code: err.code, ...err.context });
    }
}
