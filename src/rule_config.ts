/**
 * Rule Configuration - the YAML document that defines a resource ladder
 *
 *   levels:                 # required, ordered, level 0 first
 *     - { partition: devel, mem: 1G, time: "00:05:00" }
 *   state_handling:         # optional, ordered, first match wins
 *     OUT_OF_MEMORY: escalate
 *     FAILED: no_retry
 *     exit_codes: { 137: escalate }
 *   tracker: { base_dir, checkpoint_dir, history_log, output_dir }
 *   logging: { enabled, db_path }
 *   max_array_spec_len: 3000
 *   timeout: { sacct_delay: 2 }
 *   cluster: { name, partition, nodes }
 *
 * JSON documents parse too. Every problem is a CONFIG_ERROR.
 */

import * as fs from 'fs';
import * as YAML from 'yaml';
import type { ResourceTier } from './chain_types';
import { DEFAULT_CHECKPOINT_DIR, DEFAULT_PARTITION } from './config';
import { createLogger } from './logger';
import {
    type ClassificationRules,
    DEFAULT_RULES,
    type StateAction,
    type StateRule,
} from './outcome_classifier';
import { ShellVars } from './shell_vars';
import { ErrorFactory } from './structured_error';

const log = createLogger('rule-config');

/* -------------------------------------------------------------------------- */
/* Types                                                                      */
/* -------------------------------------------------------------------------- */

export interface TrackerConfig {
    baseDir?: string;
    checkpointDir?: string;
    historyLog?: string;
    outputDir?: string;
}

export interface AuditLoggingConfig {
    enabled?: boolean;
    dbPath?: string;
}

export interface ClusterConfig {
    name?: string;
    partition?: string;
    nodes?: string;
}

export interface RuleConfig {
    source: string;
    /** document as read, snapshotted into the audit store */
    text: string;
    levels: ResourceTier[];
    rules: ClassificationRules;
    /** false when state_handling was absent and the built-in rules apply */
    customRules: boolean;
    tracker: TrackerConfig;
    logging: AuditLoggingConfig;
    maxArraySpecLen?: number;
    sacctDelay?: number;
    cluster: ClusterConfig;
}

/* -------------------------------------------------------------------------- */
/* Field readers                                                              */
/* -------------------------------------------------------------------------- */

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function section(doc: Record<string, unknown>, key: string, source: string): Record<string, unknown> {
    const value = doc[key];
    if (value === undefined || value === null) return {};
    if (!isRecord(value)) throw ErrorFactory.config(`"${key}" must be a mapping`, { source });
    return value;
}

/** Scalars the YAML author may leave unquoted (`mem: 4096`, `nodes: 8`) */
function optionalText(obj: Record<string, unknown>, key: string, where: string, source: string): string | undefined {
    const value = obj[key];
    if (value === undefined || value === null) return undefined;
    if (typeof value === 'string') return value;
    if (typeof value === 'number') return String(value);
    throw ErrorFactory.config(`${where}.${key} must be a string`, { source });
}

function optionalNumber(obj: Record<string, unknown>, key: string, where: string, source: string): number | undefined {
    const value = obj[key];
    if (value === undefined || value === null) return undefined;
    if (typeof value === 'number' && Number.isFinite(value) && value >= 0) return value;
    throw ErrorFactory.config(`${where}.${key} must be a non-negative number`, { source });
}

function optionalBoolean(obj: Record<string, unknown>, key: string, where: string, source: string): boolean | undefined {
    const value = obj[key];
    if (value === undefined || value === null) return undefined;
    if (typeof value === 'boolean') return value;
    throw ErrorFactory.config(`${where}.${key} must be true or false`, { source });
}

function parseAction(value: unknown, where: string, source: string): StateAction {
    if (value === 'escalate' || value === 'no_retry') return value;
    throw ErrorFactory.config(`${where} must be "escalate" or "no_retry", got ${JSON.stringify(value)}`, { source });
}

/* -------------------------------------------------------------------------- */
/* Sections                                                                   */
/* -------------------------------------------------------------------------- */

function parseLevels(doc: Record<string, unknown>, source: string): ResourceTier[] {
    const raw = doc.levels;
    if (!Array.isArray(raw) || raw.length === 0) {
        throw ErrorFactory.config('config must have a non-empty "levels" list', { source });
    }

    return raw.map((entry: unknown, i): ResourceTier => {
        const where = `levels[${i}]`;
        if (!isRecord(entry)) throw ErrorFactory.config(`${where} must be a mapping`, { source });

        const memory = optionalText(entry, 'mem', where, source) ?? optionalText(entry, 'memory', where, source);
        const time = optionalText(entry, 'time', where, source);
        if (!memory) throw ErrorFactory.config(`${where} is missing "mem"`, { source });
        if (!time) throw ErrorFactory.config(`${where} is missing "time"`, { source });

        return {
            partition: optionalText(entry, 'partition', where, source) ?? DEFAULT_PARTITION,
            memory,
            time,
        };
    });
}

function parseRules(doc: Record<string, unknown>, source: string): { rules: ClassificationRules; custom: boolean } {
    const handling = section(doc, 'state_handling', source);

    const stateRules: StateRule[] = [];
    const exitCodeRules = new Map<number, StateAction>();

    for (const [key, value] of Object.entries(handling)) {
        if (key !== 'exit_codes') {
            stateRules.push({ pattern: key, action: parseAction(value, `state_handling.${key}`, source) });
            continue;
        }
        if (value === null || value === undefined) continue;
        if (!isRecord(value)) throw ErrorFactory.config('state_handling.exit_codes must be a mapping', { source });
        for (const [code, action] of Object.entries(value)) {
            if (!/^-?\d+$/.test(code)) {
                throw ErrorFactory.config(`state_handling.exit_codes key ${JSON.stringify(code)} is not an integer`, {
                    source,
                });
            }
            exitCodeRules.set(parseInt(code, 10), parseAction(action, `state_handling.exit_codes.${code}`, source));
        }
    }

    if (exitCodeRules.size === 0 && stateRules.length === 0) {
        return { rules: DEFAULT_RULES, custom: false };
    }
    // configured exit codes replace the built-in ones; state rules only when some are listed
    return {
        rules: { stateRules: stateRules.length > 0 ? stateRules : DEFAULT_RULES.stateRules, exitCodeRules },
        custom: true,
    };
}

/* -------------------------------------------------------------------------- */
/* Loading                                                                    */
/* -------------------------------------------------------------------------- */

export function parseRuleConfig(text: string, source = '<inline>'): RuleConfig {
    let parsed: unknown;
    try {
        parsed = YAML.parse(text);
    } catch (e) {
        throw ErrorFactory.config(`failed to parse ${source}: ${e instanceof Error ? e.message : String(e)}`, { source }, e);
    }
    if (!isRecord(parsed)) throw ErrorFactory.config(`${source} must contain a mapping`, { source });

    const levels = parseLevels(parsed, source);
    const { rules, custom } = parseRules(parsed, source);
    const tracker = section(parsed, 'tracker', source);
    const logging = section(parsed, 'logging', source);
    const timeout = section(parsed, 'timeout', source);
    const cluster = section(parsed, 'cluster', source);

    const config: RuleConfig = {
        source,
        text,
        levels,
        rules,
        customRules: custom,
        tracker: {
            baseDir: optionalText(tracker, 'base_dir', 'tracker', source),
            checkpointDir: optionalText(tracker, 'checkpoint_dir', 'tracker', source),
            historyLog: optionalText(tracker, 'history_log', 'tracker', source),
            outputDir: optionalText(tracker, 'output_dir', 'tracker', source),
        },
        logging: {
            enabled: optionalBoolean(logging, 'enabled', 'logging', source),
            dbPath: optionalText(logging, 'db_path', 'logging', source),
        },
        maxArraySpecLen: optionalNumber(parsed, 'max_array_spec_len', '<root>', source),
        sacctDelay: optionalNumber(timeout, 'sacct_delay', 'timeout', source),
        cluster: {
            name: optionalText(cluster, 'name', 'cluster', source),
            partition: optionalText(cluster, 'partition', 'cluster', source),
            nodes: optionalText(cluster, 'nodes', 'cluster', source),
        },
    };

    log.debug('Rule config loaded', {
        source,
        levels: levels.length,
        custom_rules: custom,
        state_rules: rules.stateRules.length,
    });
    return config;
}

export function loadRuleConfig(filePath: string): RuleConfig {
    let text: string;
    try {
        text = fs.readFileSync(filePath, 'utf-8');
    } catch (e) {
        throw ErrorFactory.config(
            `cannot read ${filePath}: ${e instanceof Error ? e.message : String(e)}`,
            { source: filePath },
            e
        );
    }
    return parseRuleConfig(text, filePath);
}

/** --checkpoint-dir wins, then tracker.checkpoint_dir, then the built-in default */
export function resolveCheckpointDir(config: RuleConfig | null, override?: string): string {
    return override || config?.tracker.checkpointDir || DEFAULT_CHECKPOINT_DIR;
}

/* -------------------------------------------------------------------------- */
/* Shell output                                                               */
/* -------------------------------------------------------------------------- */

/** The variables `load-config` prints for the driver; optional keys only when set. */
export function renderConfigShellVars(config: RuleConfig): ShellVars {
    const vars = new ShellVars();

    vars.set('PARTITION', config.levels[0].partition);
    vars.set('MAX_LEVEL', config.levels.length - 1);
    vars.set('LEVELS_CONFIG', true);
    config.levels.forEach((tier, i) => {
        vars.set(`LEVEL_${i}_PARTITION`, tier.partition);
        vars.set(`LEVEL_${i}_MEM`, tier.memory);
        vars.set(`LEVEL_${i}_TIME`, tier.time);
    });

    if (config.sacctDelay !== undefined) vars.set('SACCT_DELAY', config.sacctDelay);

    const { tracker, logging, cluster } = config;
    if (tracker.baseDir !== undefined) vars.set('TRACKER_DIR', tracker.baseDir);
    if (tracker.historyLog !== undefined) vars.set('HISTORY_LOG', tracker.historyLog);
    if (tracker.checkpointDir !== undefined) vars.set('CHECKPOINT_DIR', tracker.checkpointDir);
    if (tracker.outputDir !== undefined) vars.set('OUTPUT_DIR', tracker.outputDir);

    if (logging.enabled !== undefined) vars.set('LOGGING_ENABLED', logging.enabled);
    if (logging.dbPath !== undefined) {
        vars.set('LOGGING_DB_PATH', logging.dbPath);
        vars.set('DB_PATH', logging.dbPath);
    }

    if (config.maxArraySpecLen !== undefined) vars.set('MAX_ARRAY_SPEC_LEN', config.maxArraySpecLen);

    if (cluster.name !== undefined) vars.set('CLUSTER_NAME', cluster.name);
    if (cluster.partition !== undefined) vars.set('CLUSTER_PARTITION', cluster.partition);
    if (cluster.nodes !== undefined) vars.set('CLUSTER_NODES', cluster.nodes);

    return vars;
}
