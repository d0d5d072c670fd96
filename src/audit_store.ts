// src/audit_store.ts
//
// SQLite audit trail for escalation chains. Not authoritative: the checkpoint
// file is the source of truth, and every write here is fire-and-forget.
// A failed write is logged as AUDIT_WRITE_ERROR and never reaches the caller.

import Database from 'better-sqlite3';
import * as fs from 'fs';
import * as path from 'path';
import type { ChainRecord, RoundRecord, RoundStatus } from './chain_types';
import { AUDIT } from './config';
import type { EscalationEngine, TransitionEvent } from './escalation_engine';
import { createLogger, type Logger } from './logger';
import type { TaskRecord } from './scheduler_client';
import { ErrorFactory } from './structured_error';

/* -------------------------------------------------------------------------- */
/* Types                                                                      */
/* -------------------------------------------------------------------------- */

export interface ActionEntry {
  chainId: string;
  /** SUBMIT, ESCALATE, COMPLETE, FAIL, or a driver-defined type */
  actionType: string;
  jobId?: string | null;
  memoryLevel?: number | null;
  timeLevel?: number | null;
  indices?: string | null;
  details?: string | null;
}

export interface ActionRow {
  id: number;
  timestamp: string;
  chain_id: string;
  action_type: string;
  job_id: string | null;
  memory_level: number | null;
  time_level: number | null;
  indices: string | null;
  details: string | null;
}

export interface RoundOutcome {
  oomCount?: number;
  timeoutCount?: number;
  failedCount?: number;
  completedCount?: number;
  escalateIndices?: string | null;
}

export interface RoundExtras {
  outputPattern?: string | null;
  errorPattern?: string | null;
}

export interface TaskSummary {
  total: number;
  completed: number;
  oom: number;
  timeout: number;
  failed: number;
}

export interface StatusCount {
  status: string;
  count: number;
}

export interface NodeCount {
  node: string;
  count: number;
}

export interface RuntimeRange {
  total: number;
  min: string | null;
  max: string | null;
}

export interface FailedTaskRow {
  task_id: number;
  status: string;
  exit_code: number | null;
  node: string | null;
  elapsed: string | null;
}

export interface AuditStoreOptions {
  logger?: Logger;
  clock?: () => Date;
}

/* -------------------------------------------------------------------------- */
/* Audit Store                                                                */
/* -------------------------------------------------------------------------- */

export class AuditStore {
  private readonly db: Database.Database;
  private readonly log: Logger;
  private readonly clock: () => Date;

  constructor(readonly dbPath: string, opts: AuditStoreOptions = {}) {
    this.log = opts.logger ?? createLogger('audit');
    this.clock = opts.clock ?? (() => new Date());

    fs.mkdirSync(path.dirname(dbPath), { recursive: true });
    this.db = new Database(dbPath);
    this.configureDatabase();
    this.runMigrations();
  }

  /**
   * Opens the store, or logs AUDIT_WRITE_ERROR and returns null. Callers that
   * only write use this so an unusable database never blocks the ladder.
   */
  static tryOpen(dbPath: string, opts: AuditStoreOptions = {}): AuditStore | null {
    try {
      return new AuditStore(dbPath, opts);
    } catch (e) {
      const err = ErrorFactory.auditWrite('open', e);
      (opts.logger ?? createLogger('audit')).warn(err.message, { code: err.code, db_path: dbPath });
      return null;
    }
  }

  close(): void {
    this.db.close();
  }

  private now(): string {
    return this.clock().toISOString();
  }

  /* ------------------------------------------------------------------------ */
  /* SQLite Configuration                                                     */
  /* ------------------------------------------------------------------------ */

  private configureDatabase(): void {
    this.db.pragma('journal_mode = WAL');
    this.db.pragma('foreign_keys = ON');
    this.db.pragma('synchronous = NORMAL');
    this.db.pragma(`busy_timeout = ${AUDIT.BUSY_TIMEOUT_MS}`);
  }

  /* ------------------------------------------------------------------------ */
  /* Migrations                                                               */
  /* ------------------------------------------------------------------------ */

  private runMigrations(): void {
    const tx = this.db.transaction(() => {
      this.db.exec(`
        CREATE TABLE IF NOT EXISTS schema_version (
          version INTEGER PRIMARY KEY,
          applied_at TEXT DEFAULT CURRENT_TIMESTAMP
        ) STRICT
      `);

      const row = this.db
        .prepare(`SELECT version FROM schema_version ORDER BY version DESC LIMIT 1`)
        .get() as { version: number } | undefined;

      const current = row?.version ?? 0;

      if (current < 1) {
        this.db.exec(`
          CREATE TABLE IF NOT EXISTS chains (
            chain_id TEXT PRIMARY KEY,
            mode TEXT NOT NULL,
            partition TEXT,
            script TEXT NOT NULL,
            script_args TEXT,
            original_array_spec TEXT,
            total_tasks INTEGER,
            created_at TEXT NOT NULL,
            updated_at TEXT NOT NULL,
            status TEXT NOT NULL,
            current_level INTEGER DEFAULT 0,
            current_memory TEXT,
            time_limit TEXT,
            last_escalation_reason TEXT,
            pending_indices TEXT,
            failed_indices TEXT,
            completed_count INTEGER DEFAULT 0
          ) STRICT;

          CREATE TABLE IF NOT EXISTS rounds (
            id INTEGER PRIMARY KEY AUTOINCREMENT,
            chain_id TEXT NOT NULL REFERENCES chains(chain_id),
            round_num INTEGER NOT NULL,
            job_id INTEGER NOT NULL,
            job_ids TEXT NOT NULL,
            handler_id INTEGER,
            array_spec TEXT,
            level INTEGER NOT NULL,
            memory TEXT NOT NULL,
            time TEXT,
            partition TEXT,
            status TEXT NOT NULL,
            submitted_at TEXT NOT NULL,
            completed_at TEXT,
            completed_count INTEGER DEFAULT 0,
            oom_count INTEGER DEFAULT 0,
            timeout_count INTEGER DEFAULT 0,
            failed_count INTEGER DEFAULT 0,
            escalate_indices TEXT,
            output_pattern TEXT,
            error_pattern TEXT
          ) STRICT;

          CREATE TABLE IF NOT EXISTS tasks (
            id INTEGER PRIMARY KEY AUTOINCREMENT,
            chain_id TEXT NOT NULL REFERENCES chains(chain_id),
            round_id INTEGER NOT NULL REFERENCES rounds(id),
            job_id INTEGER NOT NULL,
            task_id INTEGER NOT NULL,
            status TEXT,
            exit_code INTEGER,
            signal INTEGER,
            max_rss TEXT,
            elapsed TEXT,
            timelimit TEXT,
            node TEXT,
            submit_time TEXT,
            start_time TEXT,
            end_time TEXT,
            output_path TEXT,
            error_path TEXT,
            UNIQUE(chain_id, job_id, task_id)
          ) STRICT;

          CREATE TABLE IF NOT EXISTS actions (
            id INTEGER PRIMARY KEY AUTOINCREMENT,
            timestamp TEXT NOT NULL,
            chain_id TEXT NOT NULL,
            action_type TEXT NOT NULL,
            job_id TEXT,
            memory_level INTEGER,
            time_level INTEGER,
            indices TEXT,
            details TEXT
          ) STRICT;

          CREATE TABLE IF NOT EXISTS configs (
            chain_id TEXT PRIMARY KEY REFERENCES chains(chain_id),
            config_yaml TEXT NOT NULL,
            levels_json TEXT
          ) STRICT;

          CREATE INDEX IF NOT EXISTS idx_rounds_chain ON rounds(chain_id);
          CREATE INDEX IF NOT EXISTS idx_rounds_job ON rounds(job_id);
          CREATE INDEX IF NOT EXISTS idx_tasks_chain ON tasks(chain_id);
          CREATE INDEX IF NOT EXISTS idx_tasks_job ON tasks(job_id);
          CREATE INDEX IF NOT EXISTS idx_tasks_status ON tasks(status);
          CREATE INDEX IF NOT EXISTS idx_actions_chain ON actions(chain_id);
        `);

        this.db.prepare(`INSERT INTO schema_version (version) VALUES (1)`).run();
      }
    });

    tx();
  }

  schemaVersion(): number {
    const row = this.db
      .prepare(`SELECT MAX(version) AS version FROM schema_version`)
      .get() as { version: number | null } | undefined;
    return row?.version ?? 0;
  }

  /* ------------------------------------------------------------------------ */
  /* Writes (fire-and-forget)                                                 */
  /* ------------------------------------------------------------------------ */

  private safely<T>(operation: string, fallback: T, fn: () => T): T {
    try {
      return fn();
    } catch (e) {
      const err = ErrorFactory.auditWrite(operation, e);
      this.log.warn(err.message, { code: err.code, db_path: this.dbPath });
      return fallback;
    }
  }

  logAction(entry: ActionEntry): boolean {
    return this.safely('log-action', false, () => {
      this.db.prepare(`
        INSERT INTO actions (timestamp, chain_id, action_type, job_id, memory_level, time_level, indices, details)
        VALUES (?, ?, ?, ?, ?, ?, ?, ?)
      `).run(
        this.now(),
        entry.chainId,
        entry.actionType,
        entry.jobId ?? null,
        entry.memoryLevel ?? null,
        entry.timeLevel ?? null,
        entry.indices ?? null,
        entry.details ?? null
      );
      return true;
    });
  }

  private upsertChain(record: ChainRecord): void {
    this.db.prepare(`
      INSERT INTO chains (
        chain_id, mode, partition, script, script_args, original_array_spec, total_tasks,
        created_at, updated_at, status, current_level, current_memory, time_limit,
        last_escalation_reason, pending_indices, failed_indices, completed_count
      ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
      ON CONFLICT(chain_id) DO UPDATE SET
        mode = excluded.mode,
        partition = excluded.partition,
        script = excluded.script,
        script_args = excluded.script_args,
        original_array_spec = excluded.original_array_spec,
        total_tasks = excluded.total_tasks,
        created_at = excluded.created_at,
        updated_at = excluded.updated_at,
        status = excluded.status,
        current_level = excluded.current_level,
        current_memory = excluded.current_memory,
        time_limit = excluded.time_limit,
        last_escalation_reason = excluded.last_escalation_reason,
        pending_indices = excluded.pending_indices,
        failed_indices = excluded.failed_indices,
        completed_count = excluded.completed_count
    `).run(
      record.chain_id,
      record.mode,
      record.partition,
      record.script,
      JSON.stringify(record.script_args),
      record.original_array_spec,
      record.total_tasks,
      record.created,
      record.updated,
      record.state.status,
      record.state.current_level,
      record.state.current_memory,
      record.state.current_time,
      record.state.last_escalation_reason,
      record.state.pending_indices,
      record.state.failed_indices,
      record.state.completed_count
    );
  }

  /**
   * Inserts or refreshes the chain row. `configText` (the rule document as
   * written) is snapshotted alongside the ladder on first sight.
   */
  recordChain(record: ChainRecord, configText?: string): boolean {
    return this.safely('record-chain', false, () => {
      this.db.transaction(() => {
        this.upsertChain(record);
        if (configText !== undefined) {
          this.db.prepare(`
            INSERT INTO configs (chain_id, config_yaml, levels_json) VALUES (?, ?, ?)
            ON CONFLICT(chain_id) DO UPDATE SET config_yaml = excluded.config_yaml, levels_json = excluded.levels_json
          `).run(record.chain_id, configText, JSON.stringify(record.levels));
        }
      })();
      return true;
    });
  }

  /** Returns the round row id, or null when the write failed. */
  recordRound(record: ChainRecord, round: RoundRecord, extras: RoundExtras = {}): number | null {
    return this.safely<number | null>('record-round', null, () =>
      this.db.transaction(() => {
        this.upsertChain(record);
        const info = this.db.prepare(`
          INSERT INTO rounds (
            chain_id, round_num, job_id, job_ids, handler_id, array_spec, level, memory, time,
            partition, status, submitted_at, output_pattern, error_pattern
          ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
        `).run(
          record.chain_id,
          round.round,
          round.job_ids[0] ?? 0,
          JSON.stringify(round.job_ids),
          round.handler_id,
          round.array_spec,
          round.level,
          round.memory,
          round.time,
          record.levels[round.level]?.partition ?? record.partition,
          round.status,
          round.submitted,
          extras.outputPattern ?? null,
          extras.errorPattern ?? null
        );
        return Number(info.lastInsertRowid);
      })()
    );
  }

  private findRoundId(chainId: string, jobId: number): number | null {
    const row = this.db.prepare(`
      SELECT id FROM rounds
      WHERE chain_id = ?
        AND (job_id = ? OR EXISTS (SELECT 1 FROM json_each(rounds.job_ids) WHERE json_each.value = ?))
      ORDER BY id DESC
      LIMIT 1
    `).get(chainId, jobId, jobId) as { id: number } | undefined;
    return row?.id ?? null;
  }

  /** Matches the round by any of its job ids. Returns false when nothing matched. */
  updateRoundStatus(chainId: string, jobId: number, status: RoundStatus, outcome: RoundOutcome = {}): boolean {
    return this.safely('update-round-status', false, () => {
      const roundId = this.findRoundId(chainId, jobId);
      if (roundId === null) return false;

      this.db.prepare(`
        UPDATE rounds SET
          status = ?,
          completed_at = ?,
          completed_count = COALESCE(?, completed_count),
          oom_count = COALESCE(?, oom_count),
          timeout_count = COALESCE(?, timeout_count),
          failed_count = COALESCE(?, failed_count),
          escalate_indices = COALESCE(?, escalate_indices)
        WHERE id = ?
      `).run(
        status,
        this.now(),
        outcome.completedCount ?? null,
        outcome.oomCount ?? null,
        outcome.timeoutCount ?? null,
        outcome.failedCount ?? null,
        outcome.escalateIndices ?? null,
        roundId
      );
      return true;
    });
  }

  completeChain(chainId: string, completedCount: number): boolean {
    return this.safely('complete-chain', false, () => {
      const info = this.db.prepare(`
        UPDATE chains SET updated_at = ?, status = 'COMPLETED', completed_count = ?, pending_indices = ''
        WHERE chain_id = ?
      `).run(this.now(), completedCount, chainId);
      return info.changes > 0;
    });
  }

  /**
   * Stores per-task accounting for one job of a recorded round. Output paths
   * are expanded from the round's `%A`/`%a` patterns. Returns rows written.
   */
  saveTasks(chainId: string, jobId: number, tasks: readonly TaskRecord[]): number {
    return this.safely('save-tasks', 0, () => {
      if (tasks.length === 0) return 0;

      const round = this.db.prepare(`
        SELECT id, output_pattern, error_pattern FROM rounds WHERE id = ?
      `).get(this.findRoundId(chainId, jobId)) as
        | { id: number; output_pattern: string | null; error_pattern: string | null }
        | undefined;
      if (!round) {
        this.log.warn('No recorded round for job, tasks not saved', { chain_id: chainId, job_id: jobId });
        return 0;
      }

      const expand = (pattern: string | null, taskId: number): string =>
        (pattern ?? '').replace(/%A/g, String(jobId)).replace(/%a/g, String(taskId));

      const insert = this.db.prepare(`
        INSERT INTO tasks (
          chain_id, round_id, job_id, task_id, status, exit_code, signal, max_rss, elapsed, timelimit,
          node, submit_time, start_time, end_time, output_path, error_path
        ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
        ON CONFLICT(chain_id, job_id, task_id) DO UPDATE SET
          round_id = excluded.round_id,
          status = excluded.status,
          exit_code = excluded.exit_code,
          signal = excluded.signal,
          max_rss = excluded.max_rss,
          elapsed = excluded.elapsed,
          timelimit = excluded.timelimit,
          node = excluded.node,
          submit_time = excluded.submit_time,
          start_time = excluded.start_time,
          end_time = excluded.end_time,
          output_path = excluded.output_path,
          error_path = excluded.error_path
      `);

      return this.db.transaction(() => {
        for (const t of tasks) {
          insert.run(
            chainId, round.id, jobId, t.task_id, t.state, t.exit_code, t.signal, t.max_rss, t.elapsed,
            t.timelimit, t.node_list, t.submit, t.start, t.end,
            expand(round.output_pattern, t.task_id), expand(round.error_pattern, t.task_id)
          );
        }
        return tasks.length;
      })();
    });
  }

  /* ------------------------------------------------------------------------ */
  /* Reporting reads                                                          */
  /* ------------------------------------------------------------------------ */

  taskSummary(chainId: string): TaskSummary {
    const row = this.db.prepare(`
      SELECT COUNT(*) AS total,
             COALESCE(SUM(CASE WHEN status = 'COMPLETED' THEN 1 ELSE 0 END), 0) AS completed,
             COALESCE(SUM(CASE WHEN status = 'OUT_OF_MEMORY' THEN 1 ELSE 0 END), 0) AS oom,
             COALESCE(SUM(CASE WHEN status = 'TIMEOUT' THEN 1 ELSE 0 END), 0) AS timeout,
             COALESCE(SUM(CASE WHEN status = 'FAILED' THEN 1 ELSE 0 END), 0) AS failed
      FROM tasks WHERE chain_id = ?
    `).get(chainId) as TaskSummary | undefined;
    return row ?? { total: 0, completed: 0, oom: 0, timeout: 0, failed: 0 };
  }

  statusDistribution(chainId: string, jobIds: readonly number[]): StatusCount[] {
    if (jobIds.length === 0) return [];
    const placeholders = jobIds.map(() => '?').join(',');
    return this.db.prepare(`
      SELECT status, COUNT(*) AS count FROM tasks
      WHERE chain_id = ? AND job_id IN (${placeholders})
      GROUP BY status
      ORDER BY count DESC, status ASC
    `).all(chainId, ...jobIds) as StatusCount[];
  }

  runtimeRange(chainId: string, jobIds: readonly number[]): RuntimeRange {
    if (jobIds.length === 0) return { total: 0, min: null, max: null };
    const placeholders = jobIds.map(() => '?').join(',');
    const row = this.db.prepare(`
      SELECT COUNT(*) AS total, MIN(elapsed) AS min, MAX(elapsed) AS max FROM tasks
      WHERE chain_id = ? AND job_id IN (${placeholders})
    `).get(chainId, ...jobIds) as RuntimeRange | undefined;
    return row ?? { total: 0, min: null, max: null };
  }

  nodeDistribution(chainId: string, jobIds: readonly number[], limit: number): NodeCount[] {
    if (jobIds.length === 0) return [];
    const placeholders = jobIds.map(() => '?').join(',');
    return this.db.prepare(`
      SELECT node, COUNT(*) AS count FROM tasks
      WHERE chain_id = ? AND job_id IN (${placeholders}) AND node IS NOT NULL AND node != ''
      GROUP BY node
      ORDER BY count DESC, node ASC
      LIMIT ?
    `).all(chainId, ...jobIds, limit) as NodeCount[];
  }

  failedTasks(chainId: string, limit: number): FailedTaskRow[] {
    return this.db.prepare(`
      SELECT task_id, status, exit_code, node, elapsed FROM tasks
      WHERE chain_id = ? AND (status = 'FAILED' OR status LIKE '%CANCEL%')
      ORDER BY task_id
      LIMIT ?
    `).all(chainId, limit) as FailedTaskRow[];
  }

  actions(chainId: string): ActionRow[] {
    return this.db.prepare(`
      SELECT id, timestamp, chain_id, action_type, job_id, memory_level, time_level, indices, details
      FROM actions WHERE chain_id = ? ORDER BY id
    `).all(chainId) as ActionRow[];
  }
}

/* -------------------------------------------------------------------------- */
/* Engine subscription                                                        */
/* -------------------------------------------------------------------------- */

export interface AuditTrailOptions {
  /** rule document text, snapshotted when a chain is created */
  configText?: string;
  /** log file patterns (`%A`, `%a`) of the rounds recorded while attached */
  roundExtras?: RoundExtras;
}

function joinJobIds(ids: readonly number[]): string {
  return ids.join(',');
}

function writeTransition(store: AuditStore, event: TransitionEvent, opts: AuditTrailOptions): void {
  const { record } = event;
  const chainId = record.chain_id;

  switch (event.kind) {
    case 'created':
      store.recordChain(record, opts.configText);
      return;

    case 'round_recorded':
      store.recordRound(record, event.round, opts.roundExtras);
      store.logAction({
        chainId,
        actionType: 'SUBMIT',
        jobId: joinJobIds(event.round.job_ids),
        memoryLevel: event.round.level,
        indices: event.round.array_spec,
      });
      return;

    case 'escalated': {
      const { outcome, retry, input } = event;
      const outcomeJob = outcome?.job_ids[0];
      if (outcome && outcomeJob !== undefined) {
        store.updateRoundStatus(chainId, outcomeJob, 'ESCALATING', {
          completedCount: input.completedCount,
          oomCount: input.oomCount,
          timeoutCount: input.timeoutCount,
          failedCount: input.failedCount,
          escalateIndices: input.escalateSpec,
        });
      }
      store.recordRound(record, retry, opts.roundExtras);
      store.logAction({
        chainId,
        actionType: 'ESCALATE',
        jobId: joinJobIds(retry.job_ids),
        memoryLevel: input.nextLevel,
        indices: input.escalateSpec,
        details: JSON.stringify({
          reason: record.state.last_escalation_reason,
          memory: input.nextMemory,
          oom_count: input.oomCount,
          timeout_count: input.timeoutCount,
          failed_count: input.failedCount,
        }),
      });
      return;
    }

    case 'completed':
      store.completeChain(chainId, event.completedCount);
      store.updateRoundStatus(chainId, event.jobId, 'COMPLETED', { completedCount: event.completedCount });
      store.logAction({
        chainId,
        actionType: 'COMPLETE',
        jobId: String(event.jobId),
        memoryLevel: record.state.current_level,
      });
      return;

    case 'failed':
      store.recordChain(record);
      store.logAction({
        chainId,
        actionType: 'FAIL',
        memoryLevel: record.state.current_level,
        indices: event.failedIndices,
        details: JSON.stringify({ reason: event.reason, status: record.state.status }),
      });
      return;
  }
}

/** Mirrors engine transitions into the audit store. Returns a detach function. */
export function attachAuditTrail(
  engine: EscalationEngine,
  store: AuditStore,
  opts: AuditTrailOptions = {}
): () => void {
  const listener = (event: TransitionEvent): void => writeTransition(store, event, opts);
  engine.on('transition', listener);
  return () => {
    engine.off('transition', listener);
  };
}
