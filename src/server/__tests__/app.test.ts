import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import Stripe from 'stripe';
import { StripeBilling, type CheckoutSessionsApi } from '../../billing/checkout.js';
import { BillingSettlement } from '../../billing/settlement.js';
import { tokenPacks } from '../../ledger/pricing.js';
import { signAccountToken } from '../../shared/auth.js';
import { createApp } from '../app.js';
import { createHarness, VIDEO, type Harness } from '../../../tests/fixtures/harness.js';
import { listen, parseEventStream, requestJson, type TestServer } from '../../../tests/fixtures/http.js';

const SECRET = 'test-secret-for-tokens';
const WEBHOOK_SECRET = 'whsec_test_secret';
const user = signAccountToken(SECRET, 'acct-1');
const stranger = signAccountToken(SECRET, 'acct-2');
const admin = signAccountToken(SECRET, 'ops', { admin: true });

function stringField(body: Record<string, unknown>, key: string): string {
  const value = body[key];
  if (typeof value !== 'string') throw new Error(`Expected string field ${key}, got ${String(value)}`);
  return value;
}

describe('HTTP surface', () => {
  let h: Harness;
  let srv: TestServer;
  const submitted: string[] = [];

  async function start(withPayments: boolean): Promise<void> {
    const packs = tokenPacks({ price1000: 'price_1000' });
    const sessions: CheckoutSessionsApi = {
      create: async () => ({ id: 'cs_test_1', url: 'https://checkout.stripe.test/c/pay/cs_test_1' }),
    };
    const billing = withPayments
      ? new StripeBilling(
          {
            secretKey: 'sk_test_placeholder',
            webhookSecret: WEBHOOK_SECRET,
            packs,
            publicBaseUrl: 'https://reelgrade.example.test',
            sessions,
          },
          new BillingSettlement(h.db, h.ledger),
        )
      : null;
    srv = await listen(
      createApp({ orchestrator: h.orchestrator, jobs: h.jobs, ledger: h.ledger, hub: h.hub, packs, billing, authSecret: SECRET }),
    );
  }

  async function submit(token = user): Promise<string> {
    const res = await requestJson(srv.baseUrl, 'POST', '/jobs', {
      token,
      body: { input_ref: VIDEO, check_sets: ['abcd', 'persuasion'] },
    });
    expect(res.status).toBe(202);
    const jobId = stringField(res.body, 'job_id');
    submitted.push(jobId);
    return jobId;
  }

  beforeEach(async () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    h = createHarness();
    h.ledger.grant('acct-1', 1000, 'seed', 'seed:acct-1');
    submitted.length = 0;
    await start(true);
  });

  afterEach(async () => {
    await srv.close();
    await Promise.all(submitted.map((id) => h.orchestrator.waitFor(id)));
    await h.orchestrator.settleBackground();
    h.db.close();
    vi.restoreAllMocks();
  });

  describe('health and auth', () => {
    it('should answer health checks without a token', async () => {
      const res = await requestJson(srv.baseUrl, 'GET', '/health');
      expect(res.status).toBe(200);
      expect(res.body.status).toBe('ok');
    });

    it('should reject missing and invalid tokens', async () => {
      const missing = await requestJson(srv.baseUrl, 'GET', '/credits');
      expect(missing).toEqual({
        status: 401,
        body: { error: 'UNAUTHORIZED', message: 'Missing authorization header' },
      });

      const forged = await requestJson(srv.baseUrl, 'GET', '/credits', {
        token: signAccountToken('some-other-secret', 'acct-1'),
      });
      expect(forged.status).toBe(401);
      expect(forged.body.message).toBe('Invalid token');
    });

    it('should reject malformed JSON bodies', async () => {
      const response = await fetch(`${srv.baseUrl}/jobs`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json', Authorization: `Bearer ${user}` },
        body: '{"input_ref":',
      });
      expect(response.status).toBe(400);
      const body: unknown = await response.json();
      expect(body).toMatchObject({ error: 'INVALID_JSON' });
    });
  });

  describe('jobs', () => {
    it('should accept a job and serve its record and report once it succeeds', async () => {
      const res = await requestJson(srv.baseUrl, 'POST', '/jobs', {
        token: user,
        body: { input_ref: VIDEO, check_sets: ['abcd', 'persuasion'] },
      });
      expect(res.status).toBe(202);
      expect(res.body.estimated_cost).toBe(600);
      const jobId = stringField(res.body, 'job_id');
      submitted.push(jobId);

      await h.orchestrator.waitFor(jobId);

      const job = await requestJson(srv.baseUrl, 'GET', `/jobs/${jobId}`, { token: user });
      expect(job.status).toBe(200);
      expect(job.body).toMatchObject({ job_id: jobId, status: 'succeeded', actual_cost: 300, progress_pct: 100 });

      const report = await requestJson(srv.baseUrl, 'GET', `/jobs/${jobId}/report`, { token: user });
      expect(report.status).toBe(200);
      expect(report.body).toMatchObject({ job_id: jobId, brand_name: 'Acme', actual_cost: 300 });

      const credits = await requestJson(srv.baseUrl, 'GET', '/credits', { token: user });
      expect(credits.body.balance).toBe(700);

      const list = await requestJson(srv.baseUrl, 'GET', '/jobs?limit=5', { token: user });
      expect(list.body.items).toHaveLength(1);
    });

    it('should list validation problems for a bad submission', async () => {
      const res = await requestJson(srv.baseUrl, 'POST', '/jobs', { token: user, body: { check_sets: [] } });

      expect(res.status).toBe(400);
      expect(res.body.error).toBe('VALIDATION_ERROR');
      expect(res.body.message).toContain('input_ref: Required');
      expect(res.body.message).toContain('check_sets:');
    });

    it('should name unknown check-sets', async () => {
      const res = await requestJson(srv.baseUrl, 'POST', '/jobs', {
        token: user,
        body: { input_ref: VIDEO, check_sets: ['abcd', 'nope'] },
      });

      expect(res).toEqual({
        status: 400,
        body: { error: 'VALIDATION_ERROR', message: 'Unknown check-set(s): nope', unknown_check_sets: ['nope'] },
      });
    });

    it('should answer 402 with pack offers when credits are short', async () => {
      const res = await requestJson(srv.baseUrl, 'POST', '/jobs', {
        token: stranger,
        body: { input_ref: VIDEO, check_sets: ['abcd'] },
      });

      expect(res.status).toBe(402);
      expect(res.body).toMatchObject({ error: 'INSUFFICIENT_CREDITS', balance: 0, required: 600 });
      expect(res.body.offers).toEqual([
        { pack: 'TOKENS_1000', usd: 10, tokens: 1000 },
        { pack: 'TOKENS_3000', usd: 25, tokens: 3000 },
      ]);
    });

    it('should answer 429 while the account has a job in flight, and 409 for its report', async () => {
      h.ledger.grant('acct-1', 1000, 'seed', 'seed:acct-1:more');
      h.content.evaluateBehavior = () => 'hang';
      const first = await submit();

      const second = await requestJson(srv.baseUrl, 'POST', '/jobs', {
        token: user,
        body: { input_ref: VIDEO, check_sets: ['abcd'] },
      });
      expect(second.status).toBe(429);
      expect(second.body).toMatchObject({ error: 'CONCURRENCY_LIMIT_EXCEEDED', active_job_id: first });

      const report = await requestJson(srv.baseUrl, 'GET', `/jobs/${first}/report`, { token: user });
      expect(report.status).toBe(409);
      expect(report.body.error).toBe('REPORT_NOT_READY');

      const canceled = await requestJson(srv.baseUrl, 'POST', `/admin/jobs/${first}/cancel`, { token: admin });
      expect(canceled.status).toBe(200);
      expect(canceled.body).toMatchObject({ status: 'canceled', error_code: 'CANCELED' });
      expect(h.ledger.balance('acct-1')).toBe(2000);
    });

    it("should hide other accounts' jobs but show them to admins", async () => {
      const jobId = await submit();
      await h.orchestrator.waitFor(jobId);

      const hidden = await requestJson(srv.baseUrl, 'GET', `/jobs/${jobId}`, { token: stranger });
      expect(hidden).toEqual({ status: 404, body: { error: 'JOB_NOT_FOUND', message: `Job ${jobId} not found` } });

      const seen = await requestJson(srv.baseUrl, 'GET', `/jobs/${jobId}`, { token: admin });
      expect(seen.status).toBe(200);
    });
  });

  describe('progress stream', () => {
    it('should stream events in order and end with the report', async () => {
      const jobId = await submit();

      const response = await fetch(`${srv.baseUrl}/jobs/${jobId}/events`, { headers: { Authorization: `Bearer ${user}` } });
      expect(response.headers.get('content-type')).toBe('text/event-stream');
      const events = parseEventStream(await response.text());

      const last = events[events.length - 1];
      expect(last).toMatchObject({ type: 'complete', job_id: jobId, pct: 100 });
      const pcts = events.map((e) => e.pct);
      expect(pcts).toEqual([...pcts].sort((a, b) => Number(a) - Number(b)));
    });

    it('should send the terminal event at once for a finished job', async () => {
      h.content.evaluateBehavior = () => 'hang';
      const jobId = await submit();
      await h.orchestrator.cancel(jobId);

      const response = await fetch(`${srv.baseUrl}/jobs/${jobId}/events`, { headers: { Authorization: `Bearer ${user}` } });
      expect(parseEventStream(await response.text())).toEqual([
        {
          type: 'error',
          job_id: jobId,
          seq: 0,
          milestone: 'error',
          code: 'CANCELED',
          message: 'Job canceled by an administrator',
        },
      ]);
    });
  });

  describe('admin', () => {
    it('should refuse admin routes to plain accounts', async () => {
      const res = await requestJson(srv.baseUrl, 'POST', '/admin/grants', {
        token: user,
        body: { account_id: 'acct-1', amount: 50, idempotency_key: 'g-1' },
      });
      expect(res).toEqual({ status: 403, body: { error: 'FORBIDDEN', message: 'Admin access required' } });
    });

    it('should grant credits once per idempotency key', async () => {
      const body = { account_id: 'acct-2', amount: 50, idempotency_key: 'g-1' };

      const first = await requestJson(srv.baseUrl, 'POST', '/admin/grants', { token: admin, body });
      const second = await requestJson(srv.baseUrl, 'POST', '/admin/grants', { token: admin, body });

      expect(first.status).toBe(201);
      expect(first.body).toMatchObject({ replayed: false, balance: 50 });
      expect(second.status).toBe(200);
      expect(second.body).toMatchObject({ replayed: true, balance: 50 });
    });

    it('should reject a grant reusing a key for another amount', async () => {
      await requestJson(srv.baseUrl, 'POST', '/admin/grants', {
        token: admin,
        body: { account_id: 'acct-2', amount: 50, idempotency_key: 'g-1' },
      });
      const clash = await requestJson(srv.baseUrl, 'POST', '/admin/grants', {
        token: admin,
        body: { account_id: 'acct-2', amount: 70, idempotency_key: 'g-1' },
      });

      expect(clash.status).toBe(409);
      expect(clash.body).toMatchObject({ error: 'LEDGER_INVARIANT', reason: 'idempotency_key_mismatch' });
    });

    it('should refund a succeeded job exactly once', async () => {
      const jobId = await submit();
      await h.orchestrator.waitFor(jobId);

      const first = await requestJson(srv.baseUrl, 'POST', `/admin/jobs/${jobId}/refund`, { token: admin });
      const second = await requestJson(srv.baseUrl, 'POST', `/admin/jobs/${jobId}/refund`, { token: admin });

      expect(first.body).toMatchObject({ replayed: false, transaction: { kind: 'refund', amount: 300 } });
      expect(second.body).toMatchObject({ replayed: true });
      expect(h.ledger.balance('acct-1')).toBe(1000);
    });

    it('should answer 409 when canceling a finished job', async () => {
      const jobId = await submit();
      await h.orchestrator.waitFor(jobId);

      const res = await requestJson(srv.baseUrl, 'POST', `/admin/jobs/${jobId}/cancel`, { token: admin });
      expect(res.status).toBe(409);
      expect(res.body).toMatchObject({ error: 'INVALID_TRANSITION', from: 'succeeded' });
    });
  });

  describe('billing', () => {
    it('should list packs and open a checkout', async () => {
      const packs = await requestJson(srv.baseUrl, 'GET', '/billing/packs', { token: user });
      expect(packs.body.items).toEqual([
        { pack: 'TOKENS_1000', usd: 10, tokens: 1000 },
        { pack: 'TOKENS_3000', usd: 25, tokens: 3000 },
      ]);

      const checkout = await requestJson(srv.baseUrl, 'POST', '/billing/checkout', {
        token: user,
        body: { pack: 'TOKENS_1000' },
      });
      expect(checkout).toEqual({ status: 200, body: { url: 'https://checkout.stripe.test/c/pay/cs_test_1' } });
    });

    it('should settle a signed webhook once and reject a bad signature', async () => {
      const payload = JSON.stringify({
        id: 'evt_1',
        object: 'event',
        type: 'checkout.session.completed',
        data: {
          object: {
            id: 'cs_test_1',
            payment_status: 'paid',
            metadata: { account_id: 'acct-2', token_amount: '1000', pack: 'TOKENS_1000' },
          },
        },
      });
      const signature = new Stripe('sk_test_placeholder').webhooks.generateTestHeaderString({
        payload,
        secret: WEBHOOK_SECRET,
      });
      const post = (sig: string) =>
        fetch(`${srv.baseUrl}/webhooks/stripe`, {
          method: 'POST',
          headers: { 'Content-Type': 'application/json', 'stripe-signature': sig },
          body: payload,
        });

      const first = await post(signature);
      const second = await post(signature);
      const forged = await post('t=1,v1=deadbeef');

      expect(await first.json()).toEqual({ received: true, status: 'credited' });
      expect(await second.json()).toEqual({ received: true, status: 'already_processed' });
      expect(forged.status).toBe(400);
      expect(h.ledger.balance('acct-2')).toBe(1000);
    });

    it('should answer 503 for checkout when payments are off', async () => {
      await srv.close();
      await start(false);

      const res = await requestJson(srv.baseUrl, 'POST', '/billing/checkout', {
        token: user,
        body: { pack: 'TOKENS_1000' },
      });
      expect(res.status).toBe(503);
      expect(res.body.error).toBe('INVALID_CONFIG');
    });
  });
});
