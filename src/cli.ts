#!/usr/bin/env node
/**
 * CLI Entry Point for the escalation engine
 *
 * Every command the shell driver runs between scheduler submissions:
 * stdout carries KEY=value lines (or plain text for human commands),
 * stderr carries diagnostics and logs.
 *
 * Exit codes: 0 ok (including a skipped mutation), 1 configuration, read
 * or scheduler failure, 2 usage error.
 */

import * as path from 'path';
import { AuditStore, type RoundExtras, attachAuditTrail } from './audit_store';
import { isFailureReason } from './chain_types';
import type { ChainRecord, ChainDefinition } from './chain_types';
import { FileCheckpointStore } from './checkpoint_store';
import { CHECKPOINT_FILE_SUFFIX, DEFAULT_CONFIG_PATH } from './config';
import { type ChainListing, EscalationEngine } from './escalation_engine';
import { planNextStep, renderPlanShellVars } from './escalation_planner';
import { compressIndices, expandIndexSpec } from './index_codec';
import { clearCorrelation, createLogger, setCorrelation } from './logger';
import { DEFAULT_RULES, classifyOutcomes } from './outcome_classifier';
import { renderCheckpointList, renderMarkdownReport, renderResumeVars, renderStatus } from './report';
import { type RuleConfig, loadRuleConfig, renderConfigShellVars, resolveCheckpointDir } from './rule_config';
import { type CommandRunner, SchedulerClient, toRawTaskResults } from './scheduler_client';
import { ShellVars } from './shell_vars';
import { ERRORS, ErrorFactory, describeError, isEscalationError } from './structured_error';

const log = createLogger('cli');

export interface EscalateCLIOptions {
    stdout?: (text: string) => void;
    stderr?: (text: string) => void;
    /** scheduler command runner; defaults to spawning sacct/squeue */
    runner?: CommandRunner;
    clock?: () => Date;
}

/** Global options of one invocation. The rule document is read on first use. */
class RunContext {
    private loaded?: RuleConfig | null;

    constructor(
        private readonly configPath: string | undefined,
        private readonly checkpointOverride: string | undefined,
        private readonly dbOverride: string | undefined
    ) {}

    get config(): RuleConfig | null {
        if (this.loaded === undefined) {
            this.loaded = this.configPath ? loadRuleConfig(this.configPath) : null;
        }
        return this.loaded;
    }

    get checkpointDir(): string {
        return resolveCheckpointDir(this.config, this.checkpointOverride);
    }

    get dbPath(): string | undefined {
        if (this.dbOverride !== undefined) return this.dbOverride;
        const config = this.config;
        return config?.logging.enabled !== false ? config?.logging.dbPath : undefined;
    }
}

interface ChainRef {
    chainId: string;
    dir: string;
}

/* -------------------------------------------------------------------------- */
/* Argument helpers                                                           */
/* -------------------------------------------------------------------------- */

function takeFlag(args: string[], name: string): boolean {
    const index = args.indexOf(name);
    if (index < 0) return false;
    args.splice(index, 1);
    return true;
}

function takeOption(args: string[], name: string): string | undefined {
    const index = args.indexOf(name);
    if (index < 0) return undefined;
    const value = args[index + 1];
    if (value === undefined) throw ErrorFactory.invalidArgument(`${name} needs a value`);
    args.splice(index, 2);
    return value;
}

function requireArg(args: readonly string[], index: number, name: string): string {
    const value = args[index];
    if (value === undefined) throw ErrorFactory.invalidArgument(`Missing argument <${name}>`);
    return value;
}

function parseInteger(value: string, name: string): number {
    if (!/^-?\d+$/.test(value.trim())) {
        throw ErrorFactory.invalidArgument(`<${name}> must be an integer, got ${JSON.stringify(value)}`);
    }
    return parseInt(value.trim(), 10);
}

function optionalInteger(value: string | undefined, name: string): number | undefined {
    return value === undefined ? undefined : parseInteger(value, name);
}

/** `4711` or `4711,4712` for batched submissions */
function parseJobIds(value: string, name: string): number[] {
    const ids = value
        .split(',')
        .map((s) => s.trim())
        .filter((s) => s.length > 0)
        .map((s) => parseInteger(s, name));
    if (ids.length === 0) throw ErrorFactory.invalidArgument(`<${name}> needs at least one job id`);
    return ids;
}

/** Canonical compressed form of an index list or spec; '' stays ''. */
function normalizeSpec(value: string): string {
    return compressIndices(expandIndexSpec(value));
}

/* -------------------------------------------------------------------------- */
/* CLI                                                                        */
/* -------------------------------------------------------------------------- */

class EscalateCLI {
    private readonly out: (text: string) => void;
    private readonly err: (text: string) => void;
    private readonly runner?: CommandRunner;
    private readonly clock: () => Date;
    private readonly openAudits: AuditStore[] = [];

    constructor(opts: EscalateCLIOptions = {}) {
        this.out = opts.stdout ?? ((text) => process.stdout.write(text));
        this.err = opts.stderr ?? ((text) => process.stderr.write(text));
        this.runner = opts.runner;
        this.clock = opts.clock ?? (() => new Date());
    }

    /** `argv` without the node binary and script path. Returns the exit code. */
    run(argv: readonly string[]): number {
        const args = [...argv];
        const command = args.shift() ?? 'help';

        if (command === 'help' || command === '--help' || command === '-h') {
            this.showHelp(this.out);
            return 0;
        }

        setCorrelation({ command });
        try {
            const ctx = this.loadContext(args);
            return this.dispatch(command, args, ctx);
        } catch (e) {
            return this.fail(e);
        } finally {
            for (const audit of this.openAudits.splice(0)) audit.close();
            clearCorrelation();
        }
    }

    private dispatch(command: string, args: string[], ctx: RunContext): number {
        switch (command) {
            case 'compress-indices':
                return this.runCompress(args);
            case 'expand-indices':
                return this.runExpand(args);
            case 'load-config':
                return this.runLoadConfig(args, ctx);
            case 'create-chain':
                return this.runCreateChain(args, ctx);
            case 'load-checkpoint':
                return this.runLoadCheckpoint(args, ctx);
            case 'list-checkpoints':
                return this.runListCheckpoints(ctx);
            case 'show-status':
                return this.runShowStatus(args, ctx);
            case 'get-chain-state':
                return this.runGetChainState(args, ctx);
            case 'generate-report':
                return this.runGenerateReport(args, ctx);
            case 'analyze-job':
                return this.runAnalyzeJob(args, ctx);
            case 'record-round':
                return this.runRecordRound(args, ctx);
            case 'update-escalation':
                return this.runUpdateEscalation(args, ctx);
            case 'mark-completed':
                return this.runMarkCompleted(args, ctx);
            case 'mark-failed':
                return this.runMarkFailed(args, ctx);
            case 'log-action':
                return this.runLogAction(args, ctx);
            case 'save-tasks':
                return this.runSaveTasks(args, ctx);
            default:
                this.err(`Unknown command: ${command}\n\n`);
                this.showHelp(this.err);
                return 2;
        }
    }

    private fail(e: unknown): number {
        if (isEscalationError(e)) {
            this.err(`Error [${e.code}]: ${e.message}\n`);
            return e.code === ERRORS.INVALID_ARGUMENT || e.code === ERRORS.CODEC_INPUT_ERROR ? 2 : 1;
        }
        log.error('Unexpected failure', { error: describeError(e) });
        this.err(`Error: ${describeError(e)}\n`);
        return 1;
    }

    /* ---------------------------------------------------------------------- */
    /* Context                                                                */
    /* ---------------------------------------------------------------------- */

    /** Takes the global options off `args`, leaving anything after `--` alone. */
    private loadContext(args: string[]): RunContext {
        const separator = args.indexOf('--');
        const trailing = separator >= 0 ? args.splice(separator) : [];

        const configPath = takeOption(args, '--config') ?? (DEFAULT_CONFIG_PATH || undefined);
        const checkpointOverride = takeOption(args, '--checkpoint-dir');
        const dbOverride = takeOption(args, '--db');

        args.push(...trailing);
        return new RunContext(configPath, checkpointOverride, dbOverride);
    }

    /** A chain id, or a checkpoint file path whose directory then wins. */
    private chainRef(ctx: RunContext, value: string): ChainRef {
        if (value.endsWith(CHECKPOINT_FILE_SUFFIX)) {
            return {
                chainId: path.basename(value).slice(0, -CHECKPOINT_FILE_SUFFIX.length),
                dir: path.dirname(value),
            };
        }
        return { chainId: value, dir: ctx.checkpointDir };
    }

    private openAudit(ctx: RunContext): AuditStore | null {
        if (!ctx.dbPath) return null;
        const audit = AuditStore.tryOpen(ctx.dbPath, { clock: this.clock });
        if (audit) this.openAudits.push(audit);
        return audit;
    }

    private openEngine(ctx: RunContext, dir: string, roundExtras?: RoundExtras): { engine: EscalationEngine; store: FileCheckpointStore } {
        const store = new FileCheckpointStore(dir);
        const engine = new EscalationEngine(store, { clock: this.clock });
        const audit = this.openAudit(ctx);
        if (audit) attachAuditTrail(engine, audit, { configText: ctx.config?.text, roundExtras });
        return { engine, store };
    }

    private scheduler(): SchedulerClient {
        return new SchedulerClient({ runner: this.runner });
    }

    private print(vars: ShellVars): void {
        this.out(vars.render());
    }

    private reportMutation(command: string, chainId: string, record: ChainRecord | null): number {
        if (!record) {
            this.err(`Warning: ${command} skipped for chain ${chainId}\n`);
            return 0;
        }
        this.print(new ShellVars().set('CHAIN_STATUS', record.state.status));
        return 0;
    }

    /* ---------------------------------------------------------------------- */
    /* Index specs                                                            */
    /* ---------------------------------------------------------------------- */

    private runCompress(args: string[]): number {
        const raw = args[0] ?? '';
        this.out((raw.trim() ? normalizeSpec(raw) : '') + '\n');
        return 0;
    }

    private runExpand(args: string[]): number {
        this.out(expandIndexSpec(args[0] ?? '').join(',') + '\n');
        return 0;
    }

    /* ---------------------------------------------------------------------- */
    /* Configuration and checkpoints                                          */
    /* ---------------------------------------------------------------------- */

    private runLoadConfig(args: string[], ctx: RunContext): number {
        const config = args[0] !== undefined ? loadRuleConfig(args[0]) : ctx.config;
        if (!config) throw ErrorFactory.invalidArgument('load-config needs a config file (argument or --config)');
        this.print(renderConfigShellVars(config));
        return 0;
    }

    private runCreateChain(args: string[], ctx: RunContext): number {
        const separator = args.indexOf('--');
        const trailing = separator >= 0 ? args.splice(separator).slice(1) : [];

        const arraySpec = takeOption(args, '--array') ?? '';
        const totalOption = optionalInteger(takeOption(args, '--total-tasks'), 'total-tasks');
        const rejectExisting = takeFlag(args, '--no-overwrite');

        const config = ctx.config;
        if (!config) throw ErrorFactory.invalidArgument('create-chain needs --config for the resource ladder');
        const ref = this.chainRef(ctx, requireArg(args, 0, 'chain_id'));
        const script = requireArg(args, 1, 'script');

        const indices = expandIndexSpec(arraySpec);
        const def: ChainDefinition = {
            chain_id: ref.chainId,
            script,
            script_args: [...args.slice(2), ...trailing],
            total_tasks: totalOption ?? (indices.length > 0 ? indices[indices.length - 1] + 1 : 0),
            original_array_spec: arraySpec,
            levels: config.levels,
        };

        setCorrelation({ chainId: ref.chainId });
        const { engine, store } = this.openEngine(ctx, ref.dir);
        const record = engine.createChain(def, { rejectExisting });
        this.print(renderResumeVars(record, store.pathFor(record.chain_id)));
        return 0;
    }

    private runLoadCheckpoint(args: string[], ctx: RunContext): number {
        const ref = this.chainRef(ctx, requireArg(args, 0, 'chain_id'));
        setCorrelation({ chainId: ref.chainId });
        const { engine, store } = this.openEngine(ctx, ref.dir);
        const record = engine.getChain(ref.chainId);
        this.print(renderResumeVars(record, store.pathFor(ref.chainId)));
        return 0;
    }

    private runListCheckpoints(ctx: RunContext): number {
        const { engine } = this.openEngine(ctx, ctx.checkpointDir);
        this.out(renderCheckpointList(engine.listChains()));
        return 0;
    }

    private runShowStatus(args: string[], ctx: RunContext): number {
        const offline = takeFlag(args, '--offline');
        const ref = this.chainRef(ctx, requireArg(args, 0, 'chain_id'));
        setCorrelation({ chainId: ref.chainId });

        const { engine } = this.openEngine(ctx, ref.dir);
        const record = engine.getChain(ref.chainId);
        this.out(
            renderStatus(record, {
                scheduler: offline ? undefined : this.scheduler(),
                trackerDir: ctx.config?.tracker.baseDir,
            })
        );
        return 0;
    }

    private runGetChainState(args: string[], ctx: RunContext): number {
        const ref = this.chainRef(ctx, requireArg(args, 0, 'chain_id'));
        const { engine } = this.openEngine(ctx, ref.dir);
        try {
            this.out(engine.getChain(ref.chainId).state.status + '\n');
            return 0;
        } catch (e) {
            if (!isEscalationError(e)) throw e;
            this.out('UNKNOWN\n');
            this.err(`Error [${e.code}]: ${e.message}\n`);
            return 1;
        }
    }

    private runGenerateReport(args: string[], ctx: RunContext): number {
        const all = takeFlag(args, '--all');
        const detailed = takeFlag(args, '--detailed');

        let listings: ChainListing[];
        if (all) {
            const dir = args[0] !== undefined ? args[0] : ctx.checkpointDir;
            listings = this.openEngine(ctx, dir).engine.listChains();
        } else {
            const ref = this.chainRef(ctx, requireArg(args, 0, 'chain_id'));
            const record = this.openEngine(ctx, ref.dir).engine.getChain(ref.chainId);
            listings = [{ chainId: ref.chainId, record }];
        }

        const audit = this.openAudit(ctx);
        this.out(renderMarkdownReport(listings, audit, { detailed, generatedAt: this.clock() }));
        return 0;
    }

    /* ---------------------------------------------------------------------- */
    /* Round analysis                                                         */
    /* ---------------------------------------------------------------------- */

    private runAnalyzeJob(args: string[], ctx: RunContext): number {
        const chainArg = takeOption(args, '--chain');
        const jobIds = parseJobIds(requireArg(args, 0, 'job_id'), 'job_id');

        const records = this.scheduler().queryAccounting(jobIds);
        if (records === null) {
            throw ErrorFactory.schedulerQuery(`sacct -j ${jobIds.join(',')}`, 'no accounting data, refusing to analyze');
        }

        const c = classifyOutcomes(toRawTaskResults(records), ctx.config?.rules ?? DEFAULT_RULES);
        const vars = new ShellVars()
            .set('TOTAL_COUNT', c.total)
            .set('COMPLETED_COUNT', c.completed.length)
            .set('OOM_COUNT', c.oom_count)
            .set('TIMEOUT_COUNT', c.timeout_count)
            .set('OTHER_FAILED_COUNT', c.no_retry.length)
            .set('ESCALATE_COUNT', c.escalate.length)
            .set('NO_RETRY_COUNT', c.no_retry.length)
            .set('OOM_INDICES', c.oom.join(','))
            .set('TIMEOUT_INDICES', c.timeout.join(','))
            .set('OTHER_FAILED_INDICES', c.no_retry.join(','))
            .set('ESCALATE_INDICES', c.escalate.join(','))
            .set('NO_RETRY_INDICES', c.no_retry.join(','));

        if (chainArg !== undefined) {
            const ref = this.chainRef(ctx, chainArg);
            setCorrelation({ chainId: ref.chainId });
            const record = this.openEngine(ctx, ref.dir).engine.getChain(ref.chainId);
            const plan = planNextStep(record, c, { maxSpecLength: ctx.config?.maxArraySpecLen });
            renderPlanShellVars(plan, vars);
        }

        this.print(vars);
        return 0;
    }

    /* ---------------------------------------------------------------------- */
    /* Transitions                                                            */
    /* ---------------------------------------------------------------------- */

    private runRecordRound(args: string[], ctx: RunContext): number {
        const extras: RoundExtras = {
            outputPattern: takeOption(args, '--output-pattern'),
            errorPattern: takeOption(args, '--error-pattern'),
        };
        const ref = this.chainRef(ctx, requireArg(args, 0, 'chain_id'));
        setCorrelation({ chainId: ref.chainId });

        const { engine } = this.openEngine(ctx, ref.dir, extras);
        const record = engine.recordRound(ref.chainId, {
            jobIds: parseJobIds(requireArg(args, 1, 'job_ids'), 'job_ids'),
            handlerId: parseInteger(requireArg(args, 2, 'handler_id'), 'handler_id'),
            arraySpec: requireArg(args, 3, 'array_spec'),
            level: parseInteger(requireArg(args, 4, 'level'), 'level'),
            memory: requireArg(args, 5, 'memory'),
        });
        return this.reportMutation('record-round', ref.chainId, record);
    }

    private runUpdateEscalation(args: string[], ctx: RunContext): number {
        const oomCount = optionalInteger(takeOption(args, '--oom-count'), 'oom-count') ?? 0;
        const timeoutCount = optionalInteger(takeOption(args, '--timeout-count'), 'timeout-count') ?? 0;
        const failedCount = optionalInteger(takeOption(args, '--failed-count'), 'failed-count') ?? 0;
        const ref = this.chainRef(ctx, requireArg(args, 0, 'chain_id'));
        setCorrelation({ chainId: ref.chainId });

        const { engine } = this.openEngine(ctx, ref.dir);
        const record = engine.escalate(ref.chainId, {
            nextLevel: parseInteger(requireArg(args, 1, 'next_level'), 'next_level'),
            nextMemory: requireArg(args, 2, 'next_mem'),
            escalateSpec: normalizeSpec(requireArg(args, 3, 'escalate_indices')),
            retryJobIds: parseJobIds(requireArg(args, 4, 'retry_jobs'), 'retry_jobs'),
            handlerId: parseInteger(requireArg(args, 5, 'handler_id'), 'handler_id'),
            completedCount: parseInteger(requireArg(args, 6, 'completed_count'), 'completed_count'),
            escalateCount: parseInteger(requireArg(args, 7, 'escalate_count'), 'escalate_count'),
            oomCount,
            timeoutCount,
            failedCount,
        });
        return this.reportMutation('update-escalation', ref.chainId, record);
    }

    private runMarkCompleted(args: string[], ctx: RunContext): number {
        const ref = this.chainRef(ctx, requireArg(args, 0, 'chain_id'));
        setCorrelation({ chainId: ref.chainId });

        const { engine } = this.openEngine(ctx, ref.dir);
        const record = engine.markCompleted(
            ref.chainId,
            parseInteger(requireArg(args, 1, 'job_id'), 'job_id'),
            parseInteger(requireArg(args, 2, 'completed_count'), 'completed_count')
        );
        return this.reportMutation('mark-completed', ref.chainId, record);
    }

    private runMarkFailed(args: string[], ctx: RunContext): number {
        const ref = this.chainRef(ctx, requireArg(args, 0, 'chain_id'));
        const failedSpec = normalizeSpec(requireArg(args, 1, 'failed_indices'));
        const reason = args[2] ?? 'LEVEL';
        if (!isFailureReason(reason)) {
            throw ErrorFactory.invalidArgument(`<reason> must be MEMORY, TIME or LEVEL, got ${JSON.stringify(reason)}`);
        }
        setCorrelation({ chainId: ref.chainId });

        const { engine } = this.openEngine(ctx, ref.dir);
        return this.reportMutation('mark-failed', ref.chainId, engine.markFailed(ref.chainId, failedSpec, reason));
    }

    /* ---------------------------------------------------------------------- */
    /* Audit                                                                  */
    /* ---------------------------------------------------------------------- */

    private requireAudit(ctx: RunContext, command: string): AuditStore | null {
        if (!ctx.dbPath) throw ErrorFactory.invalidArgument(`${command} needs --db or logging.db_path in the config`);
        const audit = this.openAudit(ctx);
        if (!audit) this.err(`Warning: audit database ${ctx.dbPath} unavailable, ${command} skipped\n`);
        return audit;
    }

    private runLogAction(args: string[], ctx: RunContext): number {
        const jobId = takeOption(args, '--job-id');
        const memoryLevel = optionalInteger(takeOption(args, '--memory-level'), 'memory-level');
        const timeLevel = optionalInteger(takeOption(args, '--time-level'), 'time-level');
        const indices = takeOption(args, '--indices');
        const details = takeOption(args, '--details');
        const chainId = requireArg(args, 0, 'chain_id');
        const actionType = requireArg(args, 1, 'action_type');

        const audit = this.requireAudit(ctx, 'log-action');
        audit?.logAction({ chainId, actionType, jobId, memoryLevel, timeLevel, indices, details });
        return 0;
    }

    private runSaveTasks(args: string[], ctx: RunContext): number {
        const chainId = requireArg(args, 0, 'chain_id');
        const jobId = parseInteger(requireArg(args, 1, 'job_id'), 'job_id');

        const audit = this.requireAudit(ctx, 'save-tasks');
        if (!audit) return 0;

        const records = this.scheduler().queryAccounting([jobId]);
        if (records === null) throw ErrorFactory.schedulerQuery(`sacct -j ${jobId}`, 'no accounting data, nothing saved');
        this.print(new ShellVars().set('SAVED_TASKS', audit.saveTasks(chainId, jobId, records)));
        return 0;
    }

    /* ---------------------------------------------------------------------- */
    /* Help                                                                   */
    /* ---------------------------------------------------------------------- */

    private showHelp(write: (text: string) => void): void {
        write(`
escalate - resource escalation ladder for Slurm jobs

Usage:
  escalate <command> [args] [--config <file>] [--checkpoint-dir <dir>] [--db <file>]

Index specs:
  compress-indices <indices>            Print the compressed array spec
  expand-indices <spec>                 Print the comma-separated indices

Configuration and checkpoints:
  load-config [file]                    Print the ladder as shell variables
  create-chain <chain_id> <script> [args...] [--array <spec>] [--total-tasks <n>] [--no-overwrite]
  load-checkpoint <chain_id>            Print the resume variables
  list-checkpoints                      List every checkpoint in the directory
  show-status <chain_id> [--offline]    Chain status, with live queue state unless --offline
  get-chain-state <chain_id>            Print the chain status word
  generate-report <chain_id> | --all [dir] [--detailed]

Rounds:
  analyze-job <job_ids> [--chain <chain_id>]
  record-round <chain_id> <job_ids> <handler_id> <array_spec> <level> <memory>
               [--output-pattern <p>] [--error-pattern <p>]
  update-escalation <chain_id> <next_level> <next_mem> <escalate_indices> <retry_jobs>
                    <handler_id> <completed_count> <escalate_count>
                    [--oom-count <n>] [--timeout-count <n>] [--failed-count <n>]
  mark-completed <chain_id> <job_id> <completed_count>
  mark-failed <chain_id> <failed_indices> [MEMORY|TIME|LEVEL]

Audit database:
  log-action <chain_id> <action_type> [--job-id <id>] [--memory-level <n>] [--time-level <n>]
             [--indices <spec>] [--details <json>]
  save-tasks <chain_id> <job_id>

A <chain_id> may also be a path to a *${CHECKPOINT_FILE_SUFFIX} file.
`);
    }
}

// Run CLI
if (require.main === module) {
    const cli = new EscalateCLI();
    process.exitCode = cli.run(process.argv.slice(2));
}

export { EscalateCLI };
