/**
 * Reporting - human-facing renderings of chain checkpoints
 *
 *   renderStatus          show-status text, optionally enriched with live queue state
 *   renderCheckpointList  list-checkpoints text
 *   renderMarkdownReport  generate-report markdown, optionally joined with the audit store
 *   renderResumeVars      load-checkpoint shell variables
 *
 * All renderers return strings; the CLI decides where they go.
 */

import type { ChainRecord, RoundRecord } from './chain_types';
import type { AuditStore } from './audit_store';
import { DEFAULT_TRACKER_DIR, DISPLAY_LIMITS } from './config';
import type { ChainListing } from './escalation_engine';
import { countIndices } from './index_codec';
import type { SchedulerClient } from './scheduler_client';
import { ShellVars } from './shell_vars';
import { ERRORS, isEscalationError } from './structured_error';

const RULE_WIDE = '='.repeat(50);
const RULE_THIN = '-'.repeat(50);
const RULE_LIST = '='.repeat(40);
const INDENT = ' '.repeat(11);

/* -------------------------------------------------------------------------- */
/* Helpers                                                                    */
/* -------------------------------------------------------------------------- */

/** Task count of a spec, or null when the stored spec does not parse. */
function specSize(spec: string): number | null {
    if (!spec) return 0;
    try {
        return countIndices(spec);
    } catch (e) {
        if (isEscalationError(e, ERRORS.CODEC_INPUT_ERROR)) return null;
        throw e;
    }
}

function truncate(text: string, max: number, suffix: string): string {
    return text.length > max ? text.slice(0, max) + suffix : text;
}

function jobDisplay(round: RoundRecord): string {
    const ids = round.job_ids;
    if (ids.length > 1) return `Jobs ${ids[0]}..${ids[ids.length - 1]} (${ids.length} batches)`;
    return `Job ${ids.length === 1 ? ids[0] : '?'}`;
}

function lastOutcomeRound(record: ChainRecord): RoundRecord | undefined {
    for (let i = record.rounds.length - 1; i >= 0; i--) {
        if (record.rounds[i].status === 'ESCALATING') return record.rounds[i];
    }
    return undefined;
}

/** `30 done | 10 escalating (8 OOM, 2 TIMEOUT) | 1 failed (not retried)` or null */
export function resultBreakdown(round: RoundRecord): string | null {
    const escalating = round.oom_count + round.timeout_count;
    const parts: string[] = [];
    if (round.completed_count) parts.push(`${round.completed_count} done`);
    if (escalating) {
        const detail: string[] = [];
        if (round.oom_count) detail.push(`${round.oom_count} OOM`);
        if (round.timeout_count) detail.push(`${round.timeout_count} TIMEOUT`);
        parts.push(`${escalating} escalating (${detail.join(', ')})`);
    }
    if (round.failed_count) parts.push(`${round.failed_count} failed (not retried)`);
    return parts.length > 0 ? parts.join(' | ') : null;
}

/* -------------------------------------------------------------------------- */
/* Status                                                                     */
/* -------------------------------------------------------------------------- */

export interface StatusOptions {
    /** adds handler queue state and live task counts */
    scheduler?: SchedulerClient;
    trackerDir?: string;
}

function handlerLine(scheduler: SchedulerClient, handlerId: number, batched: boolean): string | null {
    const dependency = batched ? 'afterany' : 'afternotok';
    const queued = scheduler.queryQueueState(handlerId);
    if (queued === 'PENDING') return `Failure Handler: Job ${handlerId} - WAITING (${dependency})`;
    if (queued === 'RUNNING') return `Failure Handler: Job ${handlerId} - RUNNING (escalating...)`;
    if (queued !== null) return `Failure Handler: Job ${handlerId} - ${queued}`;

    const [finished] = scheduler.queryJobStates(handlerId);
    if (finished === undefined) return null;
    if (finished.includes('COMPLETED')) return `Failure Handler: Job ${handlerId} - COMPLETED (escalated)`;
    if (finished.includes('CANCELLED')) return `Failure Handler: Job ${handlerId} - CANCELLED (all succeeded)`;
    return `Failure Handler: Job ${handlerId} - ${finished}`;
}

function liveLine(scheduler: SchedulerClient, round: RoundRecord, taskCount: number): string | null {
    const states = round.job_ids.flatMap((id) => scheduler.queryJobStates(id));
    if (states.length === 0) return null;

    const count = (pred: (s: string) => boolean) => states.filter(pred).length;
    const completed = count((s) => s.includes('COMPLETED'));
    const oom = count((s) => s.includes('OUT_OF_MEMORY'));
    const timeout = count((s) => s.includes('TIMEOUT'));
    const failed = count((s) => s.includes('FAILED') && !s.includes('NODE_FAIL'));
    const active = count((s) => s.includes('RUNNING') || s.includes('PENDING'));
    const remaining = taskCount - (completed + oom + timeout + failed + active);

    const remainingNote = remaining > 0 ? `, ${remaining} remaining` : '';
    const batchNote = round.job_ids.length > 1 ? ` (from ${round.job_ids.length} batches)` : '';
    return (
        `Current: ${completed} done, ${oom} OOM, ${timeout} TIMEOUT, ${failed} FAILED, ${active} active` +
        remainingNote +
        batchNote
    );
}

export function renderStatus(record: ChainRecord, opts: StatusOptions = {}): string {
    const out: string[] = [];
    const state = record.state;
    const trackerDir = opts.trackerDir ?? DEFAULT_TRACKER_DIR;

    out.push(RULE_WIDE, `Chain Status: ${record.chain_id}`, RULE_WIDE);
    out.push(`Mode:     ${record.mode}`);
    out.push(`Script:   ${record.script}`);
    if (record.script_args.length > 0) out.push(`Args:     ${record.script_args.join(' ')}`);
    if (record.original_array_spec) {
        out.push(`Array:    ${record.original_array_spec} (${record.total_tasks} tasks)`);
    }
    out.push(`Created:  ${record.created}`);
    out.push(`Updated:  ${record.updated}`);
    out.push('');

    out.push(`Status:   ${state.status}`);
    out.push(`Level:    ${state.current_level} / ${record.max_level}`);
    out.push(`Memory:   ${state.current_memory}`);
    out.push(`Time:     ${state.current_time}`);

    const outcome = state.status === 'ESCALATING' ? lastOutcomeRound(record) : undefined;
    if (outcome) {
        const escalating = outcome.oom_count + outcome.timeout_count;
        const failed = outcome.failed_count || state.failed_count;
        out.push('', 'Failures from last round:');
        if (escalating > 0) {
            out.push(`  Escalating:  ${escalating} tasks (OOM: ${outcome.oom_count}, TIMEOUT: ${outcome.timeout_count})`);
        }
        if (failed > 0) out.push(`  Not Retried: ${failed} tasks (code errors)`);
        out.push(`  Indices:     ${trackerDir}/indices/${record.chain_id}/`);
    }

    if (state.pending_indices) {
        out.push(`Pending:  ${truncate(state.pending_indices, DISPLAY_LIMITS.PENDING_CHARS, '...')}`);
    }
    out.push('');

    if (record.rounds.length === 0) {
        out.push('No rounds recorded yet.');
    } else {
        out.push('Rounds:', RULE_THIN);
        for (const round of record.rounds) {
            const taskCount = specSize(round.array_spec);
            const batched = round.job_ids.length > 1;

            out.push(`  Round ${round.round}: ${jobDisplay(round)} (Mem L${round.level}: ${round.memory}, Time: ${round.time})`);
            if (taskCount === null) out.push(`${INDENT}Tasks: ? (unreadable spec)`);
            else if (taskCount > 0) out.push(`${INDENT}Tasks: ${taskCount}`);
            out.push(`${INDENT}Status: ${round.status}`);

            if (opts.scheduler && round.handler_id > 0) {
                const line = handlerLine(opts.scheduler, round.handler_id, batched);
                if (line) out.push(INDENT + line);
            }

            if (batched) {
                const hint = truncate(
                    round.array_spec,
                    DISPLAY_LIMITS.ARRAY_HINT_CHARS,
                    `... (${round.array_spec.length} chars)`
                );
                out.push(`${INDENT}Array Indices: ${hint}`);
                out.push(`${INDENT}Indices folder: ${trackerDir}/indices/${record.chain_id}/`);
            }

            if (opts.scheduler) {
                const line = liveLine(opts.scheduler, round, taskCount ?? 0);
                if (line) out.push(INDENT + line);
            }

            const results = resultBreakdown(round);
            if (results) out.push(`${INDENT}Results: ${results}`);
            out.push('');
        }
    }

    out.push(RULE_WIDE);
    return out.join('\n') + '\n';
}

/* -------------------------------------------------------------------------- */
/* Listing                                                                    */
/* -------------------------------------------------------------------------- */

export function renderCheckpointList(listings: readonly ChainListing[]): string {
    const out: string[] = [RULE_LIST, 'Available Checkpoints', RULE_LIST];

    for (const { chainId, record, error } of listings) {
        if (!record) {
            out.push(`  Error reading ${chainId}: ${error ?? 'unknown error'}`);
            continue;
        }
        out.push(`  ${record.chain_id}`);
        out.push(`    Script:   ${record.script}`);
        out.push(`    Status:   ${record.state.status}`);
        out.push(`    Level:    ${record.state.current_level} (${record.state.current_memory})`);
        out.push(`    Rounds:   ${record.rounds.length}`);
        out.push(`    Updated:  ${record.updated}`);
        out.push('');
    }

    if (listings.length === 0) out.push('No checkpoints found.');
    else out.push(`Total: ${listings.length} checkpoint(s)`);
    out.push('', 'To resume: escalate load-checkpoint <chain_id>');
    return out.join('\n') + '\n';
}

/* -------------------------------------------------------------------------- */
/* Markdown report                                                            */
/* -------------------------------------------------------------------------- */

export interface ReportOptions {
    detailed?: boolean;
    generatedAt?: Date;
}

function formatGenerated(d: Date): string {
    const pad = (n: number) => String(n).padStart(2, '0');
    return (
        `${d.getFullYear()}-${pad(d.getMonth() + 1)}-${pad(d.getDate())} ` +
        `${pad(d.getHours())}:${pad(d.getMinutes())}:${pad(d.getSeconds())}`
    );
}

function totalFailed(record: ChainRecord): number {
    if (record.state.failed_count > 0) return record.state.failed_count;
    return record.rounds.reduce((sum, r) => sum + r.failed_count, 0);
}

function renderRoundsTable(record: ChainRecord, out: string[]): void {
    out.push('### Escalation Rounds', '');
    out.push('| Round | Job ID | Handler | Memory | Tasks | Done | OOM | Timeout | Failed | Status |');
    out.push('|-------|--------|---------|--------|-------|------|-----|---------|--------|--------|');
    for (const r of record.rounds) {
        const ids = r.job_ids;
        const job = ids.length > 1 ? `${ids[0]}..${ids[ids.length - 1]}` : ids.length === 1 ? String(ids[0]) : '?';
        const tasks = specSize(r.array_spec) ?? '?';
        out.push(
            `| ${r.round} | ${job} | ${r.handler_id} | ${r.memory} | ${tasks} | ${r.completed_count} | ` +
                `${r.oom_count} | ${r.timeout_count} | ${r.failed_count} | ${r.status} |`
        );
    }
    out.push('');
}

function renderTaskDetails(record: ChainRecord, audit: AuditStore, out: string[]): void {
    out.push('### Task Details (from database)', '');
    for (const r of record.rounds) {
        out.push(`#### Round ${r.round}: ${r.memory}`, '');

        const statuses = audit.statusDistribution(record.chain_id, r.job_ids);
        if (statuses.length > 0) {
            out.push('**Status Distribution:**', '', '| Status | Count |', '|--------|-------|');
            for (const s of statuses) out.push(`| ${s.status} | ${s.count} |`);
            out.push('');
        }

        const runtime = audit.runtimeRange(record.chain_id, r.job_ids);
        if (runtime.total > 0) {
            out.push(`**Runtime:** min=${runtime.min || 'N/A'}, max=${runtime.max || 'N/A'}`, '');
        }

        const nodes = audit.nodeDistribution(record.chain_id, r.job_ids, DISPLAY_LIMITS.REPORT_NODE_ROWS);
        if (nodes.length > 0) {
            out.push(`**Node Distribution (top ${DISPLAY_LIMITS.REPORT_NODE_ROWS}):**`, '', '| Node | Tasks |', '|------|-------|');
            for (const n of nodes) out.push(`| ${n.node} | ${n.count} |`);
            out.push('');
        }
    }
}

function renderTaskSummary(record: ChainRecord, audit: AuditStore, out: string[]): void {
    const stats = audit.taskSummary(record.chain_id);
    if (stats.total === 0) return;
    out.push('### Database Task Summary', '');
    out.push(`Total task records: ${stats.total}`);
    out.push(`- Completed: ${stats.completed}`);
    out.push(`- OOM: ${stats.oom}`);
    out.push(`- Timeout: ${stats.timeout}`);
    out.push(`- Failed: ${stats.failed}`);
    out.push('', '*Use `--detailed` for per-round breakdown*', '');
}

function renderFailedSection(record: ChainRecord, failed: number, audit: AuditStore | null, out: string[]): void {
    const failedIndices = record.state.failed_indices;
    if (failed === 0 && !failedIndices) return;

    out.push('### Failed Tasks (Not Retried)', '');
    out.push(`**${failed}** tasks failed with code errors and were not escalated.`, '');
    if (failedIndices) {
        const shown = truncate(
            failedIndices,
            DISPLAY_LIMITS.REPORT_INDICES_CHARS,
            `... (${failedIndices.length} chars total)`
        );
        out.push(`Failed task indices: \`${shown}\``, '');
    }

    if (!audit) return;
    const rows = audit.failedTasks(record.chain_id, DISPLAY_LIMITS.REPORT_FAILED_ROWS);
    if (rows.length === 0) return;
    out.push(`**Failed task details (first ${DISPLAY_LIMITS.REPORT_FAILED_ROWS}):**`, '');
    out.push('| Task ID | Status | Exit Code | Node | Elapsed |', '|---------|--------|-----------|------|---------|');
    for (const row of rows) {
        out.push(`| ${row.task_id} | ${row.status} | ${row.exit_code ?? 'N/A'} | ${row.node || 'N/A'} | ${row.elapsed || 'N/A'} |`);
    }
    out.push('');
}

function renderSummary(record: ChainRecord, failed: number, out: string[]): void {
    const status = record.state.status;
    const total = record.total_tasks;
    out.push('### Summary', '');
    if (status === 'COMPLETED') {
        if (failed > 0) {
            out.push(`**${total - failed}** of ${total} tasks completed. **${failed}** failed (not retried).`);
        } else {
            out.push(`All **${total}** tasks completed successfully.`);
        }
    } else if (status.startsWith('FAILED_MAX_')) {
        const stranded = specSize(record.state.failed_indices) ?? 0;
        out.push(`Chain failed (${status}) with ${stranded + failed} unrecoverable tasks.`);
    } else {
        out.push(`Chain status: ${status}`);
    }
    out.push('');
}

export function renderMarkdownReport(
    listings: readonly ChainListing[],
    audit: AuditStore | null,
    opts: ReportOptions = {}
): string {
    const out: string[] = ['# Escalation Report', '', `Generated: ${formatGenerated(opts.generatedAt ?? new Date())}`, ''];

    for (const { chainId, record, error } of listings) {
        if (!record) {
            out.push(`## Error reading ${chainId}`, `Could not read: ${error ?? 'unknown error'}`, '');
            continue;
        }

        out.push(`## Chain: ${record.chain_id}`, '');
        out.push('### Configuration', '', '| Setting | Value |', '|---------|-------|');
        out.push(`| Script | \`${record.script}\` |`);
        if (record.script_args.length > 0) out.push(`| Arguments | \`${record.script_args.join(' ')}\` |`);
        if (record.original_array_spec) {
            out.push(`| Array | \`${record.original_array_spec}\` (${record.total_tasks} tasks) |`);
        }
        out.push(`| Partition | ${record.partition} |`);
        out.push(`| Max Level | ${record.max_level} |`);
        out.push(`| Status | **${record.state.status}** |`);
        out.push(`| Created | ${record.created} |`);
        out.push(`| Updated | ${record.updated} |`);
        out.push('');

        if (record.rounds.length === 0) {
            out.push('*No rounds recorded yet.*', '', '---', '');
            continue;
        }

        renderRoundsTable(record, out);
        if (audit && opts.detailed) renderTaskDetails(record, audit, out);
        else if (audit) renderTaskSummary(record, audit, out);

        const failed = totalFailed(record);
        renderFailedSection(record, failed, audit, out);
        renderSummary(record, failed, out);
        out.push('---', '');
    }

    return out.join('\n') + '\n';
}

/* -------------------------------------------------------------------------- */
/* Resume variables                                                           */
/* -------------------------------------------------------------------------- */

export function renderResumeVars(record: ChainRecord, checkpointFile: string): ShellVars {
    const state = record.state;
    const jobChain = record.rounds.flatMap((r) => r.job_ids).join(',');

    return new ShellVars()
        .set('CHECKPOINT_FILE', checkpointFile)
        .set('CHAIN_ID', record.chain_id)
        .set('MODE', record.mode)
        .set('SCRIPT', record.script)
        .set('PARTITION', record.partition)
        .setArray('SCRIPT_ARGS', record.script_args)
        .set('ARRAY_SPEC', record.original_array_spec)
        .set('TOTAL_TASKS', record.total_tasks)
        .set('RESUME_LEVEL', state.current_level)
        .set('RESUME_MEMORY', state.current_memory)
        .set('RESUME_TIME', state.current_time)
        .set('RESUME_STATUS', state.status)
        .set('PENDING_INDICES', state.pending_indices)
        .set('MAX_LEVEL', record.max_level)
        .set('RESUME_CHAIN', jobChain);
}
