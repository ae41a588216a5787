import express, { Router } from 'express';
import { z } from 'zod';
import type { StripeBilling } from '../billing/checkout.js';
import type { CreditLedger } from '../ledger/ledger.js';
import { packOffers, type PackKey, type TokenPack } from '../ledger/pricing.js';
import { principalOf } from '../shared/auth.js';
import { ConfigError } from '../shared/errors.js';
import { parseInput } from './http-errors.js';

export interface BillingRoutesDeps {
  ledger: CreditLedger;
  packs: Record<PackKey, TokenPack>;
  /** Null when payments are not configured. */
  billing: StripeBilling | null;
}

const checkoutSchema = z.object({ pack: z.string().min(1) });

const historyQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(500).default(100),
});

function requireBilling(billing: StripeBilling | null): StripeBilling {
  if (!billing) {
    throw new ConfigError('Payments are not configured', ['STRIPE_SECRET_KEY', 'STRIPE_WEBHOOK_SECRET']);
  }
  return billing;
}

/** Authenticated account routes: balance, packs and checkout. */
export function createBillingRoutes(deps: BillingRoutesDeps): Router {
  const router = Router();

  // GET /credits: balance plus recent ledger entries
  router.get('/credits', (req, res) => {
    const { limit } = parseInput(historyQuerySchema, req.query);
    const accountId = principalOf(res).accountId;
    res.json({ balance: deps.ledger.balance(accountId), history: deps.ledger.history(accountId, limit) });
  });

  // GET /billing/packs
  router.get('/billing/packs', (_req, res) => {
    res.json(packOffers(deps.packs));
  });

  // POST /billing/checkout: hosted checkout URL for one pack
  router.post('/billing/checkout', async (req, res) => {
    const { pack } = parseInput(checkoutSchema, req.body);
    const url = await requireBilling(deps.billing).createCheckout(principalOf(res).accountId, pack);
    res.json({ url });
  });

  return router;
}

/**
 * Payment processor callbacks. Mounted before the JSON parser and the token
 * check: the signature covers the raw body and stands in for auth.
 */
export function createWebhookRoutes(billing: StripeBilling | null): Router {
  const router = Router();

  router.post('/stripe', express.raw({ type: 'application/json' }), (req, res) => {
    const payload: unknown = req.body;
    const outcome = requireBilling(billing).handleWebhook(
      Buffer.isBuffer(payload) ? payload : '',
      req.get('stripe-signature'),
    );
    res.json({ received: true, status: outcome.status });
  });

  return router;
}
