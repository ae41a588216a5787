import express from 'express';
import type { StripeBilling } from '../billing/checkout.js';
import type { JobStore } from '../jobs/job-store.js';
import type { CreditLedger } from '../ledger/ledger.js';
import type { PackKey, TokenPack } from '../ledger/pricing.js';
import type { EvaluationOrchestrator } from '../orchestrator/orchestrator.js';
import type { ProgressHub } from '../progress/progress-hub.js';
import { verifyAccountToken } from '../shared/auth.js';
import type { HealthResponse } from '../shared/types.js';
import { createAdminRoutes } from './admin-routes.js';
import { createBillingRoutes, createWebhookRoutes } from './billing-routes.js';
import { errorHandler } from './http-errors.js';
import { createJobRoutes } from './job-routes.js';

export interface AppDeps {
  orchestrator: EvaluationOrchestrator;
  jobs: JobStore;
  ledger: CreditLedger;
  hub: ProgressHub;
  packs: Record<PackKey, TokenPack>;
  billing: StripeBilling | null;
  authSecret: string;
}

export function createApp(deps: AppDeps): express.Express {
  const app = express();
  const startTime = Date.now();

  app.get('/health', (_req, res) => {
    const body: HealthResponse = { status: 'ok', uptime_s: Math.floor((Date.now() - startTime) / 1000) };
    res.json(body);
  });

  // Raw body; must come before express.json()
  app.use('/webhooks', createWebhookRoutes(deps.billing));

  app.use(express.json());
  app.use(verifyAccountToken(deps.authSecret));

  app.use('/jobs', createJobRoutes(deps));
  app.use('/admin', createAdminRoutes(deps));
  app.use(createBillingRoutes(deps));

  app.use(errorHandler());
  return app;
}
