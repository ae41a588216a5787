import type Database from 'better-sqlite3';
import { z } from 'zod';
import { InvalidTransitionError, JobNotFoundError } from '../shared/errors.js';
import type { JobPhase, JobRecord, Report } from '../shared/types.js';
import { canTransition, isTerminal, statusForPhase, toPhase } from './state-machine.js';

interface JobRow {
  job_id: string;
  account_id: string;
  input_ref: string;
  check_sets: string;
  status: string;
  phase: string;
  progress_pct: number;
  created_at: string;
  started_at: string | null;
  finished_at: string | null;
  estimated_cost: number;
  actual_cost: number | null;
  error_code: string | null;
  error_message: string | null;
  fingerprint: string;
  declared_duration_s: number | null;
  cached: number;
}

export interface NewJob {
  job_id: string;
  account_id: string;
  input_ref: string;
  check_sets: string[];
  estimated_cost: number;
  fingerprint: string;
  declared_duration_s: number | null;
}

export interface TransitionPatch {
  actual_cost?: number;
  error_code?: string;
  error_message?: string;
  cached?: boolean;
}

const checkSetsSchema = z.array(z.string());

const COLUMNS = `job_id, account_id, input_ref, check_sets, status, phase, progress_pct, created_at,
  started_at, finished_at, estimated_cost, actual_cost, error_code, error_message, fingerprint,
  declared_duration_s, cached`;

function rowToRecord(row: JobRow): JobRecord {
  const phase = toPhase(row.phase);
  return {
    ...row,
    check_sets: checkSetsSchema.parse(JSON.parse(row.check_sets)),
    phase,
    status: statusForPhase(phase),
    cached: row.cached === 1,
  };
}

export class JobStore {
  private readonly transitionTx: Database.Transaction<
    (jobId: string, to: JobPhase, patch: TransitionPatch) => JobRecord
  >;

  constructor(private readonly db: Database.Database) {
    this.transitionTx = db.transaction((jobId: string, to: JobPhase, patch: TransitionPatch) =>
      this.transitionUnsafe(jobId, to, patch),
    );
  }

  insert(job: NewJob): JobRecord {
    this.db
      .prepare(
        `INSERT INTO jobs
          (job_id, account_id, input_ref, check_sets, status, phase, progress_pct, created_at,
           estimated_cost, fingerprint, declared_duration_s, cached)
         VALUES
          (@job_id, @account_id, @input_ref, @check_sets, 'queued', 'queued', 0, @created_at,
           @estimated_cost, @fingerprint, @declared_duration_s, 0)`,
      )
      .run({
        ...job,
        check_sets: JSON.stringify(job.check_sets),
        created_at: new Date().toISOString(),
      });
    return this.require(job.job_id);
  }

  findById(jobId: string): JobRecord | null {
    const row = this.db.prepare<[string], JobRow>(`SELECT ${COLUMNS} FROM jobs WHERE job_id = ?`).get(jobId);
    return row ? rowToRecord(row) : null;
  }

  require(jobId: string): JobRecord {
    const job = this.findById(jobId);
    if (!job) throw new JobNotFoundError(jobId);
    return job;
  }

  listByAccount(accountId: string, limit = 50): JobRecord[] {
    return this.db
      .prepare<[string, number], JobRow>(
        `SELECT ${COLUMNS} FROM jobs WHERE account_id = ? ORDER BY created_at DESC, rowid DESC LIMIT ?`,
      )
      .all(accountId, limit)
      .map(rowToRecord);
  }

  /**
   * Moves a job to a new phase. Leaving `queued` stamps started_at; reaching
   * a terminal phase stamps finished_at and pins progress to 100 on success.
   */
  transition(jobId: string, to: JobPhase, patch: TransitionPatch = {}): JobRecord {
    return this.transitionTx.immediate(jobId, to, patch);
  }

  /** Progress only moves forward; a lower value is ignored. */
  updateProgress(jobId: string, pct: number): void {
    this.db
      .prepare('UPDATE jobs SET progress_pct = MAX(progress_pct, ?) WHERE job_id = ?')
      .run(Math.min(100, Math.max(0, Math.round(pct))), jobId);
  }

  saveReport(jobId: string, report: Report): void {
    const result = this.db
      .prepare('UPDATE jobs SET report_json = ? WHERE job_id = ?')
      .run(JSON.stringify(report), jobId);
    if (result.changes === 0) throw new JobNotFoundError(jobId);
  }

  findReport(jobId: string): Report | null {
    const row = this.db
      .prepare<[string], { report_json: string | null }>('SELECT report_json FROM jobs WHERE job_id = ?')
      .get(jobId);
    if (!row?.report_json) return null;
    const report: Report = JSON.parse(row.report_json);
    return report;
  }

  /** Non-terminal jobs whose last start (or creation) is older than the cutoff. */
  findStale(cutoffIso: string): JobRecord[] {
    return this.db
      .prepare<[string], JobRow>(
        `SELECT ${COLUMNS} FROM jobs
         WHERE phase NOT IN ('succeeded', 'failed', 'canceled')
           AND COALESCE(started_at, created_at) < ?
         ORDER BY created_at`,
      )
      .all(cutoffIso)
      .map(rowToRecord);
  }

  private transitionUnsafe(jobId: string, to: JobPhase, patch: TransitionPatch): JobRecord {
    const current = this.require(jobId);
    if (!canTransition(current.phase, to)) {
      throw new InvalidTransitionError(jobId, current.phase, to);
    }

    const now = new Date().toISOString();
    this.db
      .prepare(
        `UPDATE jobs SET
           phase = @phase,
           status = @status,
           started_at = @started_at,
           finished_at = @finished_at,
           progress_pct = @progress_pct,
           actual_cost = @actual_cost,
           error_code = @error_code,
           error_message = @error_message,
           cached = @cached
         WHERE job_id = @job_id`,
      )
      .run({
        job_id: jobId,
        phase: to,
        status: statusForPhase(to),
        started_at: current.started_at ?? now,
        finished_at: isTerminal(to) ? now : null,
        progress_pct: to === 'succeeded' ? 100 : current.progress_pct,
        actual_cost: patch.actual_cost ?? current.actual_cost,
        error_code: patch.error_code ?? current.error_code,
        error_message: patch.error_message ?? current.error_message,
        cached: (patch.cached ?? current.cached) ? 1 : 0,
      });
    return this.require(jobId);
  }
}
