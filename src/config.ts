/**
 * Shared Configuration Constants
 *
 * Centralized defaults for the escalation engine.
 * Values can be overridden via environment variables.
 */

import type { StateRule, ExitCodeRules } from './outcome_classifier';

function envInt(name: string, fallback: number): number {
    const raw = process.env[name];
    if (!raw) return fallback;
    const parsed = parseInt(raw, 10);
    return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

// Tracker layout (overridden by the rule document's `tracker` section)
export const DEFAULT_TRACKER_DIR = process.env.ESCALATE_TRACKER_DIR || '/data/tracker';
export const DEFAULT_CHECKPOINT_DIR = process.env.ESCALATE_CHECKPOINT_DIR || `${DEFAULT_TRACKER_DIR}/checkpoints`;
export const DEFAULT_CONFIG_PATH = process.env.ESCALATE_CONFIG || '';

// Level partition when the rule document names none
export const DEFAULT_PARTITION = 'devel';

export const CHECKPOINT_FILE_SUFFIX = '.checkpoint.json';
export const CHECKPOINT_SCHEMA_VERSION = 1;

// Scheduler status queries (milliseconds)
export const SCHEDULER = {
    QUERY_TIMEOUT_MS: envInt('ESCALATE_SCHEDULER_TIMEOUT_MS', 5000),
    ACCOUNTING_CACHE_ENTRIES: 64,
    ACCOUNTING_CACHE_TTL_MS: 2000,
    ACCOUNTING_FIELDS: 'JobID,State,ExitCode,MaxRSS,Elapsed,Timelimit,NodeList,Submit,Start,End',
};

// Array submissions
export const ARRAY_LIMITS = {
    MAX_SPEC_LENGTH: envInt('ESCALATE_MAX_ARRAY_SPEC_LEN', 3000),
    BATCH_SIZE: envInt('ESCALATE_BATCH_SIZE', 500),
    MAX_EXPANDED_INDICES: 1_000_000,
};

// Truncation for human-facing output (characters)
export const DISPLAY_LIMITS = {
    PENDING_CHARS: 50,
    ARRAY_HINT_CHARS: 60,
    REPORT_INDICES_CHARS: 200,
    REPORT_FAILED_ROWS: 20,
    REPORT_NODE_ROWS: 10,
};

// Audit store (SQLite)
export const AUDIT = {
    BUSY_TIMEOUT_MS: 5000,
};

// Ordered: the first pattern contained in the scheduler state wins.
export const DEFAULT_STATE_RULES: readonly StateRule[] = [
    { pattern: 'OUT_OF_MEMORY', action: 'escalate' },
    { pattern: 'TIMEOUT', action: 'escalate' },
    { pattern: 'DEADLINE', action: 'escalate' },
    { pattern: 'PREEMPTED', action: 'escalate' },
    { pattern: 'BOOT_FAIL', action: 'escalate' },
    { pattern: 'NODE_FAIL', action: 'escalate' },
    { pattern: 'FAILED', action: 'no_retry' },
    { pattern: 'CANCELLED', action: 'no_retry' },
];

// 137 = SIGKILL from the OOM killer when the scheduler reports a plain FAILED
export const DEFAULT_EXIT_CODE_RULES: ExitCodeRules = new Map([[137, 'escalate']]);
