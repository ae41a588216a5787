import { Router, type Response } from 'express';
import { z } from 'zod';
import { principalOf, type AccountPrincipal } from '../shared/auth.js';
import { JobNotFoundError } from '../shared/errors.js';
import type { JobRecord, ProgressEvent } from '../shared/types.js';
import type { JobStore } from '../jobs/job-store.js';
import type { EvaluationOrchestrator } from '../orchestrator/orchestrator.js';
import type { ProgressHub } from '../progress/progress-hub.js';
import { parseInput } from './http-errors.js';

export interface JobRoutesDeps {
  orchestrator: EvaluationOrchestrator;
  jobs: JobStore;
  hub: ProgressHub;
}

const submitSchema = z.object({
  input_ref: z.string().trim().min(1),
  check_sets: z.array(z.string().min(1)).min(1),
  duration_seconds: z.number().positive().nullable().optional(),
});

const listQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(200).default(50),
});

/** Other accounts' jobs look exactly like missing ones. */
function ownedJob(orchestrator: EvaluationOrchestrator, jobId: string, principal: AccountPrincipal): JobRecord {
  const job = orchestrator.getJob(jobId);
  if (job.account_id !== principal.accountId && !principal.admin) {
    throw new JobNotFoundError(jobId);
  }
  return job;
}

function isTerminalEvent(event: ProgressEvent): boolean {
  return event.type === 'complete' || event.type === 'error';
}

/** The event a subscriber gets for a job that has already ended. */
function terminalEventFor(orchestrator: EvaluationOrchestrator, job: JobRecord): ProgressEvent | null {
  if (job.status === 'succeeded') {
    const report = orchestrator.getReport(job.job_id);
    if (report) {
      return { type: 'complete', job_id: job.job_id, seq: 0, milestone: 'complete', pct: 100, report };
    }
    return {
      type: 'error',
      job_id: job.job_id,
      seq: 0,
      milestone: 'error',
      code: 'REPORT_MISSING',
      message: `Report for job ${job.job_id} is missing`,
    };
  }
  if (job.status === 'failed' || job.status === 'canceled') {
    return {
      type: 'error',
      job_id: job.job_id,
      seq: 0,
      milestone: 'error',
      code: job.error_code ?? job.status.toUpperCase(),
      message: job.error_message ?? `Job ${job.status}`,
    };
  }
  return null;
}

function writeEvent(res: Response, event: ProgressEvent): boolean {
  return res.write(`data: ${JSON.stringify(event)}\n\n`);
}

export function createJobRoutes(deps: JobRoutesDeps): Router {
  const router = Router();
  const { orchestrator, jobs, hub } = deps;

  // POST /jobs: admit and start an evaluation
  router.post('/', (req, res) => {
    const body = parseInput(submitSchema, req.body);
    const { jobId, estimatedCost } = orchestrator.submit({
      accountId: principalOf(res).accountId,
      inputRef: body.input_ref,
      checkSets: body.check_sets,
      durationSeconds: body.duration_seconds ?? null,
    });
    res.status(202).json({ job_id: jobId, estimated_cost: estimatedCost });
  });

  // GET /jobs: caller's most recent jobs
  router.get('/', (req, res) => {
    const { limit } = parseInput(listQuerySchema, req.query);
    res.json(jobs.listByAccount(principalOf(res).accountId, limit));
  });

  // GET /jobs/:id
  router.get('/:id', (req, res) => {
    res.json(ownedJob(orchestrator, req.params.id, principalOf(res)));
  });

  // GET /jobs/:id/report: 409 until the job has succeeded
  router.get('/:id/report', (req, res) => {
    const job = ownedJob(orchestrator, req.params.id, principalOf(res));
    const report = job.status === 'succeeded' ? orchestrator.getReport(job.job_id) : null;
    if (!report) {
      res.status(409).json({
        error: 'REPORT_NOT_READY',
        message: `Job ${job.job_id} is ${job.status}`,
        status: job.status,
        progress_pct: job.progress_pct,
      });
      return;
    }
    res.json(report);
  });

  // GET /jobs/:id/events: server-sent progress stream
  router.get('/:id/events', (req, res) => {
    const job = ownedJob(orchestrator, req.params.id, principalOf(res));

    res.writeHead(200, {
      'Content-Type': 'text/event-stream',
      'Cache-Control': 'no-cache',
      Connection: 'keep-alive',
    });
    res.flushHeaders();

    const finished = terminalEventFor(orchestrator, job);
    if (finished) {
      writeEvent(res, finished);
      res.end();
      return;
    }

    // While the socket buffer is full, progress events are dropped; terminal ones are always written.
    let draining = false;
    res.on('drain', () => {
      draining = false;
    });

    const unsubscribe = hub.subscribe(job.job_id, (event) => {
      const terminal = isTerminalEvent(event);
      if (draining && !terminal) return;
      if (!writeEvent(res, event)) draining = true;
      if (terminal) res.end();
    });
    res.on('close', unsubscribe);
  });

  return router;
}
