/**
 * Structured Logger for the escalation engine
 *
 * Features:
 * - Log levels: DEBUG, INFO, WARN, ERROR
 * - ISO timestamps on every entry
 * - Structured JSON output (JSONL) when ESCALATE_LOG_JSON=1
 * - Optional file output via ESCALATE_LOG_FILE
 * - Component name on every line
 * - Chain correlation (chain id, round, command) propagated through all entries
 *
 * Every line goes to stderr: stdout is reserved for the KEY=value lines the
 * shell driver parses.
 *
 * Environment:
 *   ESCALATE_LOG_LEVEL  = debug|info|warn|error (default: info)
 *   ESCALATE_LOG_JSON   = 1 (default: text)
 *   ESCALATE_LOG_FILE   = path (optional, appends)
 *   ESCALATE_DEBUG      = 1 (sets level to debug)
 */

import * as fs from 'fs';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

function isLogLevel(value: string): value is LogLevel {
    return value in LEVEL_ORDER;
}

const envLevel = (process.env.ESCALATE_LOG_LEVEL || 'info').toLowerCase();
const MIN_LEVEL: number = isLogLevel(envLevel) ? LEVEL_ORDER[envLevel] : LEVEL_ORDER.info;
const DEBUG_OVERRIDE = process.env.ESCALATE_DEBUG === '1' || process.env.ESCALATE_DEBUG === 'true';
const EFFECTIVE_MIN = DEBUG_OVERRIDE ? 0 : MIN_LEVEL;

const JSON_MODE = process.env.ESCALATE_LOG_JSON === '1';
let logFile = process.env.ESCALATE_LOG_FILE || '';

/* -------------------------------------------------------------------------- */
/* Chain Correlation Context (process-wide singleton)                         */
/* -------------------------------------------------------------------------- */

let _chainId: string = '';
let _round: number | null = null;
let _command: string = '';

/** Set the active correlation context. Called by the CLI once the target chain is known. */
export function setCorrelation(opts: { chainId?: string; round?: number | null; command?: string }): void {
    if (opts.chainId !== undefined) _chainId = opts.chainId;
    if (opts.round !== undefined) _round = opts.round;
    if (opts.command !== undefined) _command = opts.command;
}

export function clearCorrelation(): void {
    _chainId = '';
    _round = null;
    _command = '';
}

/* -------------------------------------------------------------------------- */
/* Core emit                                                                  */
/* -------------------------------------------------------------------------- */

function emit(level: LogLevel, component: string, message: string, data?: Record<string, unknown>): void {
    if (LEVEL_ORDER[level] < EFFECTIVE_MIN) return;

    const ts = new Date().toISOString();

    if (JSON_MODE) {
        const entry: Record<string, unknown> = { ts, level, component, msg: message };
        if (_chainId) entry.chain_id = _chainId;
        if (_round !== null) entry.round = _round;
        if (_command) entry.command = _command;
        if (data) entry.data = data;
        writeOutput(JSON.stringify(entry));
    } else {
        const ctx = _chainId ? ` [${_chainId}${_round !== null ? '#' + _round : ''}${_command ? ':' + _command : ''}]` : '';
        const prefix = `[${ts}] [${level.toUpperCase().padEnd(5)}] [${component}]${ctx}`;
        const line = data
            ? `${prefix} ${message} ${JSON.stringify(data)}`
            : `${prefix} ${message}`;
        writeOutput(line);
    }
}

function writeOutput(line: string): void {
    process.stderr.write(line + '\n');

    if (logFile) {
        try {
            fs.appendFileSync(logFile, line + '\n');
        } catch (e) {
            const reason = e instanceof Error ? e.message : String(e);
            process.stderr.write(`[logger] disabling ESCALATE_LOG_FILE (${logFile}): ${reason}\n`);
            logFile = '';
        }
    }
}

/* -------------------------------------------------------------------------- */
/* Logger interface                                                           */
/* -------------------------------------------------------------------------- */

export interface Logger {
    debug(msg: string, data?: Record<string, unknown>): void;
    info(msg: string, data?: Record<string, unknown>): void;
    warn(msg: string, data?: Record<string, unknown>): void;
    error(msg: string, data?: Record<string, unknown>): void;
    child(component: string): Logger;
}

export function createLogger(component: string): Logger {
    return {
        debug: (msg, data) => emit('debug', component, msg, data),
        info:  (msg, data) => emit('info',  component, msg, data),
        warn:  (msg, data) => emit('warn',  component, msg, data),
        error: (msg, data) => emit('error', component, msg, data),
        child: (sub) => createLogger(`${component}:${sub}`),
    };
}
