import { Router } from 'express';
import { z } from 'zod';
import type { CreditLedger } from '../ledger/ledger.js';
import type { EvaluationOrchestrator } from '../orchestrator/orchestrator.js';
import { principalOf, requireAdmin } from '../shared/auth.js';
import { parseInput } from './http-errors.js';

export interface AdminRoutesDeps {
  orchestrator: EvaluationOrchestrator;
  ledger: CreditLedger;
}

const grantSchema = z.object({
  account_id: z.string().min(1),
  amount: z.number().int().positive(),
  reason: z.string().min(1).default('admin_grant'),
  idempotency_key: z.string().min(1),
});

export function createAdminRoutes(deps: AdminRoutesDeps): Router {
  const router = Router();
  router.use(requireAdmin());

  // POST /admin/jobs/:id/cancel: resolves once the job has stopped
  router.post('/jobs/:id/cancel', async (req, res) => {
    const job = await deps.orchestrator.cancel(req.params.id);
    // eslint-disable-next-line no-console
    console.log(`[admin] ${principalOf(res).accountId} canceled job ${job.job_id}`);
    res.json(job);
  });

  // POST /admin/jobs/:id/refund: returns a succeeded job's charge, once
  router.post('/jobs/:id/refund', (req, res) => {
    const result = deps.orchestrator.adminRefund(req.params.id);
    if (!result.replayed) {
      // eslint-disable-next-line no-console
      console.log(`[admin] ${principalOf(res).accountId} refunded job ${req.params.id} (${result.transaction.amount})`);
    }
    res.json(result);
  });

  // POST /admin/grants
  router.post('/grants', (req, res) => {
    const body = parseInput(grantSchema, req.body);
    const result = deps.ledger.grant(body.account_id, body.amount, body.reason, body.idempotency_key);
    res.status(result.replayed ? 200 : 201).json(result);
  });

  return router;
}
