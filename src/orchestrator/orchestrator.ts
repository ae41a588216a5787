import { setImmediate } from 'node:timers/promises';
import pLimit from 'p-limit';
import { v4 as uuidv4 } from 'uuid';
import { withSlot, type AdmissionController, type JobSlot } from '../admission/admission-controller.js';
import { computeFingerprint, normalizeCheckSets, type FingerprintCache } from '../cache/fingerprint-cache.js';
import { callCollaborator } from '../collaborators/call-collaborator.js';
import type {
  AnalyticsRow,
  AnalyticsSink,
  AnnotationFeatures,
  AnnotationService,
  ChatNotifier,
  CollaboratorResult,
  ContentUnderstandingService,
  MediaHandle,
  MediaProcessor,
  ObjectStorage,
} from '../collaborators/types.js';
import { combineHybrid, finalizeVerdict, verdictFromAnnotations } from '../collaborators/verdicts.js';
import type { JobStore } from '../jobs/job-store.js';
import { isTerminal } from '../jobs/state-machine.js';
import type { CreditLedger, LedgerResult } from '../ledger/ledger.js';
import { actualCost, estimateCost } from '../ledger/pricing.js';
import type { ProgressHub } from '../progress/progress-hub.js';
import {
  needsLeadingTrim,
  resolveCheckSets,
  unknownCheckSets,
  type CheckDefinition,
  type ResolvedCheckSet,
  type Rubric,
} from '../rubric/rubric.js';
import {
  InvalidTransitionError,
  JobAbortedError,
  JobFailedError,
  ValidationError,
  errorMessage,
} from '../shared/errors.js';
import type {
  CheckSetSection,
  CheckVerdict,
  JobPhase,
  JobRecord,
  MediaDescription,
  Report,
  Thumbnail,
} from '../shared/types.js';
import { spawnDetached } from './background.js';
import { assembleReport, okSection } from './report.js';

/** Analysis fan-out is sized to the number of check-sets, capped here. */
export const MAX_ANALYSIS_WORKERS = 3;
export const POST_PROCESSING_WORKERS = 4;
/** Length of the opening window cut for FIRST_5_SECS checks. */
export const LEADING_WINDOW_SECONDS = 5;

const UNKNOWN_DESCRIPTION: MediaDescription = {
  brand: { brand_name: 'Unknown', brand_variations: [], branded_products: [], branded_call_to_actions: [] },
  scenes: [],
};

export interface OrchestratorDeps {
  jobs: JobStore;
  ledger: CreditLedger;
  admission: AdmissionController;
  cache: FingerprintCache;
  hub: ProgressHub;
  rubric: Rubric;
  content: ContentUnderstandingService;
  annotation: AnnotationService;
  storage: ObjectStorage;
  media: MediaProcessor;
  analytics: AnalyticsSink;
  notifier: ChatNotifier;
}

export interface OrchestratorOptions {
  jobTimeoutMs: number;
  collaboratorTimeoutMs: number;
  collaboratorRetries: number;
  staleJobThresholdMs: number;
  /** Base for links in notifications; relative links when absent. */
  publicBaseUrl?: string;
  /** Retry backoff for collaborator calls (default: 500) */
  collaboratorBackoffMs?: number;
}

export interface SubmitRequest {
  accountId: string;
  inputRef: string;
  checkSets: string[];
  durationSeconds?: number | null;
}

export interface SubmitResult {
  jobId: string;
  estimatedCost: number;
}

interface ActiveJob {
  controller: AbortController;
  done: Promise<JobRecord>;
}

type Terminal = Extract<JobPhase, 'failed' | 'canceled'>;

function describeFailure(err: unknown): { phase: Terminal; code: string; message: string } {
  if (err instanceof JobAbortedError) {
    return { phase: err.code === 'CANCELED' ? 'canceled' : 'failed', code: err.code, message: err.message };
  }
  if (err instanceof JobFailedError) return { phase: 'failed', code: err.code, message: err.message };
  return { phase: 'failed', code: 'INTERNAL_ERROR', message: errorMessage(err) };
}

export function analyticsRows(job: JobRecord, report: Report): AnalyticsRow[] {
  const rows: AnalyticsRow[] = [];
  for (const [checkSet, section] of Object.entries(report.check_sets)) {
    if (section.status !== 'ok') continue;
    for (const v of section.verdicts) {
      rows.push({
        job_id: job.job_id,
        account_id: job.account_id,
        check_set: checkSet,
        check_id: v.check_id,
        detected: v.detected,
        confidence: v.confidence,
        overall_score: report.predictions.overall_score,
        generated_at: report.generated_at,
      });
    }
  }
  return rows;
}

/**
 * Drives each admitted job through preprocessing, analysis, post-processing
 * and finalizing. One instance per process; it owns the in-flight abort
 * controllers, everything else is injected.
 */
export class EvaluationOrchestrator {
  private readonly active = new Map<string, ActiveJob>();
  private readonly background = new Set<Promise<void>>();

  constructor(
    private readonly deps: OrchestratorDeps,
    private readonly opts: OrchestratorOptions,
  ) {}

  // ---------------------------------------------------------------------------
  // Public API
  // ---------------------------------------------------------------------------

  /**
   * Validates and admits a job, then starts it without waiting. Admission
   * failures surface here, before anything is charged.
   */
  submit(req: SubmitRequest): SubmitResult {
    const checkSets = normalizeCheckSets(req.checkSets);
    if (checkSets.length === 0) {
      throw new ValidationError('At least one check-set is required');
    }
    const unknown = unknownCheckSets(this.deps.rubric, checkSets);
    if (unknown.length > 0) {
      throw new ValidationError(`Unknown check-set(s): ${unknown.join(', ')}`, { unknown_check_sets: unknown });
    }

    const jobId = uuidv4();
    const estimatedCost = estimateCost(req.durationSeconds);
    const slot = this.deps.admission.tryAdmit(req.accountId, estimatedCost, jobId);

    let job: JobRecord;
    try {
      job = this.deps.jobs.insert({
        job_id: jobId,
        account_id: req.accountId,
        input_ref: req.inputRef.trim(),
        check_sets: checkSets,
        estimated_cost: estimatedCost,
        fingerprint: computeFingerprint(req.inputRef, checkSets),
        declared_duration_s: req.durationSeconds ?? null,
      });
    } catch (err) {
      this.deps.ledger.refund(req.accountId, estimatedCost, 'job_compensation', jobId, `job:${jobId}:compensate`);
      slot.release();
      throw err;
    }

    const controller = new AbortController();
    const done = this.track(job, slot, controller);
    this.active.set(jobId, { controller, done });
    // Callers of waitFor still see the rejection; this only keeps it from going unhandled.
    done.catch((err: unknown) => {
      // eslint-disable-next-line no-console
      console.error(`[orchestrator] Job ${jobId} could not be closed: ${errorMessage(err)}`);
    });

    // eslint-disable-next-line no-console
    console.log(`[orchestrator] Job ${jobId} admitted for ${req.accountId} (estimate ${estimatedCost}, sets ${checkSets.join(',')})`);
    return { jobId, estimatedCost };
  }

  getJob(jobId: string): JobRecord {
    return this.deps.jobs.require(jobId);
  }

  getReport(jobId: string): Report | null {
    return this.deps.jobs.findReport(jobId);
  }

  isActive(jobId: string): boolean {
    return this.active.has(jobId);
  }

  /** Resolves with the job record once the run started in this process ends. */
  async waitFor(jobId: string): Promise<JobRecord> {
    const active = this.active.get(jobId);
    return active ? active.done : this.deps.jobs.require(jobId);
  }

  /**
   * Aborts a job at its next suspension point. A job left over from another
   * process (nothing running here) is canceled directly.
   */
  async cancel(jobId: string): Promise<JobRecord> {
    const job = this.deps.jobs.require(jobId);
    if (isTerminal(job.phase)) {
      throw new InvalidTransitionError(jobId, job.phase, 'canceled');
    }

    const active = this.active.get(jobId);
    if (!active) {
      return this.abandon(jobId, 'canceled', 'CANCELED', 'Job canceled by an administrator');
    }
    active.controller.abort(new JobAbortedError('CANCELED', 'Job canceled by an administrator'));
    return active.done;
  }

  /** Returns a succeeded job's charge to the account. Repeat calls replay. */
  adminRefund(jobId: string): LedgerResult {
    const job = this.deps.jobs.require(jobId);
    if (job.status !== 'succeeded') {
      throw new InvalidTransitionError(jobId, job.phase, 'refunded');
    }
    return this.deps.ledger.refund(
      job.account_id,
      job.actual_cost ?? job.estimated_cost,
      'admin_refund',
      jobId,
      `admin-refund:${jobId}`,
    );
  }

  /**
   * Fails jobs that a previous process left mid-flight. Jobs running in this
   * process are left to their own timeout.
   */
  reapStaleJobs(now: number = Date.now()): string[] {
    const cutoff = new Date(now - this.opts.staleJobThresholdMs).toISOString();
    const reaped: string[] = [];
    for (const job of this.deps.jobs.findStale(cutoff)) {
      if (this.active.has(job.job_id)) continue;
      try {
        this.abandon(job.job_id, 'failed', 'STALE_TIMEOUT', 'Job did not finish before the stale threshold');
        reaped.push(job.job_id);
      } catch (err) {
        // Left non-terminal; the next sweep retries it.
        // eslint-disable-next-line no-console
        console.error(`[orchestrator] Could not reap job ${job.job_id}: ${errorMessage(err)}`);
      }
    }
    if (reaped.length > 0) {
      // eslint-disable-next-line no-console
      console.warn(`[orchestrator] Reaped ${reaped.length} stale job(s): ${reaped.join(', ')}`);
    }
    return reaped;
  }

  /** Waits for detached side effects started so far. */
  async settleBackground(): Promise<void> {
    await Promise.all([...this.background]);
  }

  // ---------------------------------------------------------------------------
  // Run lifecycle
  // ---------------------------------------------------------------------------

  private async track(job: JobRecord, slot: JobSlot, controller: AbortController): Promise<JobRecord> {
    try {
      return await withSlot(slot, () => this.execute(job, controller));
    } finally {
      this.active.delete(job.job_id);
    }
  }

  private async execute(job: JobRecord, controller: AbortController): Promise<JobRecord> {
    const timer = setTimeout(() => {
      controller.abort(new JobAbortedError('JOB_TIMEOUT', `Job exceeded ${this.opts.jobTimeoutMs} ms`));
    }, this.opts.jobTimeoutMs);

    try {
      // Let the submitter subscribe before the first milestone.
      await setImmediate();
      controller.signal.throwIfAborted();
      const cached = this.deps.cache.lookup(job.fingerprint);
      if (cached) return this.serveCached(job, cached);
      return await this.runPipeline(job, controller.signal);
    } catch (err) {
      const { phase, code, message } = describeFailure(err);
      return this.abandon(job.job_id, phase, code, message);
    } finally {
      clearTimeout(timer);
    }
  }

  private serveCached(job: JobRecord, cached: Report): JobRecord {
    const jobId = job.job_id;
    this.deps.jobs.transition(jobId, 'finalizing', { cached: true });
    this.progress(jobId, 'cache', 100, 'Served from a previous evaluation');

    // Priced from the media's length, not from what the earlier job was charged.
    const actual = actualCost(cached.duration_s ?? job.declared_duration_s, job.estimated_cost);
    if (actual > job.estimated_cost) {
      throw new JobFailedError('COST_MISMATCH', `Cached cost ${actual} exceeds the estimate ${job.estimated_cost}`);
    }

    const report: Report = {
      ...cached,
      job_id: jobId,
      input_ref: job.input_ref,
      estimated_cost: job.estimated_cost,
      actual_cost: actual,
      generated_at: new Date().toISOString(),
    };
    return this.finish(job, report, actual, false);
  }

  private async runPipeline(job: JobRecord, signal: AbortSignal): Promise<JobRecord> {
    const jobId = job.job_id;
    const sets = resolveCheckSets(this.deps.rubric, job.check_sets);
    const allChecks = sets.flatMap((s) => s.checks);
    const handles: MediaHandle[] = [];

    try {
      // -- preprocessing --------------------------------------------------------
      this.deps.jobs.transition(jobId, 'preprocessing');
      this.progress(jobId, 'preprocess', 5, 'Preparing media');

      const describing = this.call('content.describe', (s) => this.deps.content.describe(job.input_ref, s), signal);
      const fetching = this.call('storage.fetch', (s) => this.deps.storage.fetch(job.input_ref, s), signal);
      this.progress(jobId, 'metadata', 8, 'Extracting brand and scene metadata');

      const fetched = await fetching;
      signal.throwIfAborted();

      let media: MediaHandle | null = null;
      if (fetched.ok) {
        media = await this.optional(jobId, 'media.open', () => this.deps.media.open(fetched.value));
        if (media) handles.push(media);
      }

      let trimmedRef: string | null = null;
      const source = media;
      if (source && needsLeadingTrim(allChecks)) {
        trimmedRef = await this.optional(jobId, 'media.trim', async () => {
          const leading = await this.deps.media.trimLeading(source, LEADING_WINDOW_SECONDS, signal);
          handles.push(leading);
          return this.deps.storage.store(`store://trimmed/${jobId}.mp4`, await leading.read());
        });
      }
      signal.throwIfAborted();

      // -- analyzing ------------------------------------------------------------
      this.deps.jobs.transition(jobId, 'analyzing');
      const described = await describing;
      signal.throwIfAborted();
      const description = described.ok ? described.value : UNKNOWN_DESCRIPTION;
      this.progress(jobId, 'metadata_done', 18, 'Metadata ready', {
        brand_name: description.brand.brand_name,
        scene_count: description.scenes.length,
      });

      this.progress(jobId, 'evaluating', 20, `Evaluating ${sets.length} check-set(s)`);
      const durationHint = description.duration_s ?? job.declared_duration_s;
      const sections = await this.evaluateBranches(job, sets, trimmedRef, durationHint, signal);
      signal.throwIfAborted();

      const failed = Object.entries(sections).filter(([, s]) => s.status === 'error');
      if (failed.length === sets.length) {
        throw new JobFailedError('ALL_BRANCHES_FAILED', `Every check-set failed: ${failed.map(([n]) => n).join(', ')}`);
      }

      // -- postprocessing -------------------------------------------------------
      this.deps.jobs.transition(jobId, 'postprocessing');
      this.progress(jobId, 'post', 65, 'Generating derived artifacts');

      const scenes = description.scenes;
      const limit = pLimit(POST_PROCESSING_WORKERS);
      const taskCount = 4;
      let completed = 0;
      const task = <T>(name: string, fn: () => Promise<T | null>): Promise<T | null> =>
        limit(async () => {
          const value = await this.optional(jobId, name, fn);
          completed += 1;
          this.progress(
            jobId,
            `${name}_done`,
            65 + (28 * completed) / taskCount,
            value === null ? `${name} unavailable` : `${name} ready`,
          );
          return value;
        });

      const [thumbnails, audioLevels, brandProfile, technicalMetadata] = await Promise.all([
        task('thumbnails', async () => {
          if (!source || scenes.length === 0) return null;
          const images = await this.deps.media.extractThumbnails(source, scenes, signal);
          const stored: Thumbnail[] = [];
          for (const image of images) {
            const locator = await this.deps.storage.store(
              `store://thumbnails/${jobId}/${image.scene_index}.jpg`,
              image.bytes,
            );
            stored.push({ scene_index: image.scene_index, locator });
          }
          return stored;
        }),
        task('audio', async () => {
          if (!source || scenes.length === 0) return null;
          return this.deps.media.analyzeAudioLevels(source, scenes, signal);
        }),
        task('profile', async () => {
          const result = await this.call(
            'content.profile',
            (s) => this.deps.content.profile(job.input_ref, description.brand.brand_name, s),
            signal,
          );
          return result.ok ? result.value : null;
        }),
        task('probe', async () => (source ? this.deps.media.probe(source, signal) : null)),
      ]);
      signal.throwIfAborted();

      // -- finalizing -----------------------------------------------------------
      this.deps.jobs.transition(jobId, 'finalizing');
      this.progress(jobId, 'formatting', 95, 'Scoring and assembling the report');

      const durationS = technicalMetadata?.duration_s ?? description.duration_s ?? job.declared_duration_s ?? null;
      const actual = actualCost(durationS, job.estimated_cost);
      if (actual > job.estimated_cost) {
        throw new JobFailedError('COST_MISMATCH', `Actual cost ${actual} exceeds the estimate ${job.estimated_cost}`);
      }

      const report = assembleReport({
        job,
        brandName: description.brand.brand_name,
        sections,
        scenes,
        thumbnails,
        audioLevels,
        brandProfile,
        technicalMetadata,
        durationS,
        actualCost: actual,
      });
      this.deps.cache.store(job.fingerprint, report);
      return this.finish(job, report, actual, true);
    } finally {
      await Promise.all(
        handles.map((h) =>
          h.dispose().catch((err: unknown) => {
            // eslint-disable-next-line no-console
            console.error(`[orchestrator] Could not clean up ${h.path}: ${errorMessage(err)}`);
          }),
        ),
      );
    }
  }

  /** Settles the charge, stores the report and closes the job as succeeded. */
  private finish(job: JobRecord, report: Report, actual: number, sideEffects: boolean): JobRecord {
    const jobId = job.job_id;
    const unused = job.estimated_cost - actual;
    if (unused > 0) {
      this.deps.ledger.refund(job.account_id, unused, 'settle_actual_usage', jobId, `job:${jobId}:settle`);
    }
    this.deps.jobs.saveReport(jobId, report);
    const finished = this.deps.jobs.transition(jobId, 'succeeded', { actual_cost: actual });
    this.deps.hub.complete(jobId, report);

    // eslint-disable-next-line no-console
    console.log(`[orchestrator] Job ${jobId} succeeded (charged ${actual} of ${job.estimated_cost})`);
    if (sideEffects) this.spawnSideEffects(finished, report);
    return finished;
  }

  /**
   * Closes a job as failed or canceled and returns whatever is still charged
   * for it. Already-terminal jobs are returned unchanged. When the refund
   * cannot be written the job stays open for the reaper and the error is
   * rethrown.
   */
  private abandon(jobId: string, phase: Terminal, code: string, message: string): JobRecord {
    const job = this.deps.jobs.require(jobId);
    if (isTerminal(job.phase)) return job;

    const owed = this.deps.ledger.netChargedForJob(jobId);
    if (owed > 0) {
      try {
        this.deps.ledger.refund(job.account_id, owed, 'job_compensation', jobId, `job:${jobId}:compensate`);
      } catch (err) {
        // eslint-disable-next-line no-console
        console.error(`[orchestrator] Compensation for job ${jobId} failed, leaving it open: ${errorMessage(err)}`);
        throw err;
      }
    }

    const closed = this.deps.jobs.transition(jobId, phase, { error_code: code, error_message: message });
    this.deps.hub.fail(jobId, code, message);
    // eslint-disable-next-line no-console
    console.warn(`[orchestrator] Job ${jobId} ${phase}: ${code} ${message}`);
    return closed;
  }

  // ---------------------------------------------------------------------------
  // Analysis branches
  // ---------------------------------------------------------------------------

  private async evaluateBranches(
    job: JobRecord,
    sets: ResolvedCheckSet[],
    trimmedRef: string | null,
    durationS: number | null,
    signal: AbortSignal,
  ): Promise<Record<string, CheckSetSection>> {
    const features = [
      ...new Set(sets.flatMap((s) => s.checks.flatMap((c) => (c.method !== 'llm' && c.annotation ? [c.annotation.feature] : [])))),
    ];
    const annotating =
      features.length > 0
        ? this.call('annotation.annotate', (s) => this.deps.annotation.annotate(job.input_ref, features, s), signal)
        : null;

    const limit = pLimit(Math.max(1, Math.min(sets.length, MAX_ANALYSIS_WORKERS)));
    let completed = 0;
    const entries = await Promise.all(
      sets.map((set) =>
        limit(async () => {
          const section = await this.evaluateCheckSet(job, set, trimmedRef, annotating, durationS, signal);
          completed += 1;
          const pct = 20 + (40 * completed) / sets.length;
          if (section.status === 'ok') {
            this.progress(job.job_id, `${set.name}_done`, pct, `${set.name}: ${section.passed}/${section.total} passed`);
          } else {
            this.progress(job.job_id, `${set.name}_failed`, pct, `${set.name} failed: ${section.error.message}`);
          }
          return [set.name, section] as const;
        }),
      ),
    );
    return Object.fromEntries(entries);
  }

  private async evaluateCheckSet(
    job: JobRecord,
    set: ResolvedCheckSet,
    trimmedRef: string | null,
    annotating: Promise<CollaboratorResult<AnnotationFeatures>> | null,
    durationS: number | null,
    signal: AbortSignal,
  ): Promise<CheckSetSection> {
    const modelChecks = set.checks.filter((c) => c.method !== 'annotation');
    const groups: Array<{ ref: string; checks: CheckDefinition[] }> = trimmedRef
      ? [
          { ref: job.input_ref, checks: modelChecks.filter((c) => c.segment !== 'FIRST_5_SECS') },
          { ref: trimmedRef, checks: modelChecks.filter((c) => c.segment === 'FIRST_5_SECS') },
        ]
      : [{ ref: job.input_ref, checks: modelChecks }];

    const results = await Promise.all(
      groups
        .filter((g) => g.checks.length > 0)
        .map((g) =>
          this.call(`content.evaluate[${set.name}]`, (s) => this.deps.content.evaluate(g.ref, g.checks, s), signal),
        ),
    );

    const modelVerdicts = new Map<string, CheckVerdict>();
    for (const result of results) {
      if (!result.ok) return { status: 'error', error: result.error };
      for (const v of result.value) modelVerdicts.set(v.check_id, v);
    }

    let features: AnnotationFeatures | null = null;
    if (annotating && set.checks.some((c) => c.method !== 'llm')) {
      const annotated = await annotating;
      if (annotated.ok) {
        features = annotated.value;
      } else if (set.checks.some((c) => c.method === 'annotation')) {
        return { status: 'error', error: annotated.error };
      }
    }

    const verdicts = set.checks.map((check) => {
      const fromModel = modelVerdicts.get(check.id) ?? null;
      const fromAnnotation =
        check.annotation && features ? verdictFromAnnotations(check, check.annotation, features, durationS) : null;
      const verdict =
        check.method === 'llm' ? fromModel : check.method === 'annotation' ? fromAnnotation : combineHybrid(fromModel, fromAnnotation);
      return finalizeVerdict(
        check,
        verdict ?? {
          check_id: check.id,
          name: check.name,
          sub_category: check.sub_category,
          detected: false,
          confidence: 0,
          rationale: 'No verdict returned',
          evidence: '',
        },
      );
    });
    return okSection(verdicts);
  }

  // ---------------------------------------------------------------------------
  // Helpers
  // ---------------------------------------------------------------------------

  private call<T>(
    name: string,
    fn: (signal: AbortSignal) => Promise<T>,
    signal: AbortSignal,
  ): Promise<CollaboratorResult<T>> {
    return callCollaborator(name, fn, {
      timeoutMs: this.opts.collaboratorTimeoutMs,
      retries: this.opts.collaboratorRetries,
      signal,
      backoffMs: this.opts.collaboratorBackoffMs,
    });
  }

  /** Runs an optional step; failure is logged and reads as null. */
  private async optional<T>(jobId: string, name: string, fn: () => Promise<T | null>): Promise<T | null> {
    try {
      return await fn();
    } catch (err) {
      // eslint-disable-next-line no-console
      console.error(`[orchestrator] ${name} for job ${jobId} failed: ${errorMessage(err)}`);
      return null;
    }
  }

  private progress(
    jobId: string,
    milestone: string,
    pct: number,
    message: string,
    partial?: Record<string, unknown>,
  ): void {
    const event = this.deps.hub.publish(jobId, milestone, pct, message, partial);
    if (event.type === 'progress') this.deps.jobs.updateProgress(jobId, event.pct);
  }

  private spawnSideEffects(job: JobRecord, report: Report): void {
    const jobId = job.job_id;
    const base = this.opts.publicBaseUrl?.replace(/\/+$/, '') ?? '';
    const reportUrl = `${base}/jobs/${jobId}/report`;

    const effects: Array<[string, () => Promise<unknown>]> = [
      [`report copy for ${jobId}`, () => this.deps.storage.store(`store://reports/${jobId}.json`, JSON.stringify(report))],
    ];
    if (this.deps.analytics.enabled) {
      effects.push([`analytics rows for ${jobId}`, () => this.deps.analytics.appendRows(analyticsRows(job, report))]);
    }
    if (this.deps.notifier.enabled) {
      effects.push([`chat notification for ${jobId}`, () => this.deps.notifier.notify(report, reportUrl)]);
    }

    for (const [name, run] of effects) {
      const pending: Promise<void> = spawnDetached(name, run).finally(() => this.background.delete(pending));
      this.background.add(pending);
    }
  }
}
