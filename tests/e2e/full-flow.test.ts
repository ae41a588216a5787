import { describe, it, expect, vi, afterEach } from 'vitest';
import Stripe from 'stripe';
import { StripeBilling } from '../../src/billing/checkout.js';
import { BillingSettlement } from '../../src/billing/settlement.js';
import type { OrchestratorOptions } from '../../src/orchestrator/orchestrator.js';
import { tokenPacks } from '../../src/ledger/pricing.js';
import { createApp } from '../../src/server/app.js';
import { signAccountToken } from '../../src/shared/auth.js';
import { createHarness, VIDEO, type Harness } from '../fixtures/harness.js';
import { listen, parseEventStream, requestJson, type TestServer } from '../fixtures/http.js';

const SECRET = 'test-secret-for-tokens';
const WEBHOOK_SECRET = 'whsec_test_secret';
const token = signAccountToken(SECRET, 'acct-1');

describe('evaluation service end to end', () => {
  let h: Harness;
  let srv: TestServer;

  async function boot(opts: Partial<OrchestratorOptions> = {}): Promise<void> {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    h = createHarness(opts);
    const packs = tokenPacks({ price1000: 'price_1000' });
    const billing = new StripeBilling(
      {
        secretKey: 'sk_test_placeholder',
        webhookSecret: WEBHOOK_SECRET,
        packs,
        publicBaseUrl: 'https://reelgrade.example.test',
        sessions: { create: async () => ({ id: 'cs_test_1', url: 'https://checkout.stripe.test/c/pay/cs_test_1' }) },
      },
      new BillingSettlement(h.db, h.ledger),
    );
    srv = await listen(
      createApp({ orchestrator: h.orchestrator, jobs: h.jobs, ledger: h.ledger, hub: h.hub, packs, billing, authSecret: SECRET }),
    );
  }

  async function submitAndWait(body: Record<string, unknown>): Promise<string> {
    const res = await requestJson(srv.baseUrl, 'POST', '/jobs', { token, body });
    expect(res.status).toBe(202);
    const jobId = res.body.job_id;
    if (typeof jobId !== 'string') throw new Error('job_id missing from 202 response');
    await h.orchestrator.waitFor(jobId);
    await h.orchestrator.settleBackground();
    return jobId;
  }

  afterEach(async () => {
    await srv.close();
    h.db.close();
    vi.restoreAllMocks();
  });

  it('charges the estimate up front and refunds the unused part on success', async () => {
    await boot();
    h.ledger.grant('acct-1', 1000, 'seed', 'seed:acct-1');

    const jobId = await submitAndWait({ input_ref: VIDEO, check_sets: ['abcd'], duration_seconds: 60 });

    const job = await requestJson(srv.baseUrl, 'GET', `/jobs/${jobId}`, { token });
    expect(job.body).toMatchObject({ status: 'succeeded', estimated_cost: 600, actual_cost: 300 });
    const credits = await requestJson(srv.baseUrl, 'GET', '/credits', { token });
    expect(credits.body.balance).toBe(700);
    expect(h.ledger.findByKey(`job:${jobId}:settle`)?.amount).toBe(300);
  });

  it('rejects a submission the balance cannot cover and leaves the balance alone', async () => {
    await boot();
    h.ledger.grant('acct-1', 50, 'seed', 'seed:acct-1');

    const res = await requestJson(srv.baseUrl, 'POST', '/jobs', {
      token,
      body: { input_ref: VIDEO, check_sets: ['abcd'] },
    });

    expect(res.status).toBe(402);
    expect(res.body.error).toBe('INSUFFICIENT_CREDITS');
    expect(h.ledger.balance('acct-1')).toBe(50);
    expect(h.jobs.listByAccount('acct-1')).toEqual([]);
  });

  it('reports a timed-out check-set as a gap and still succeeds', async () => {
    await boot({ collaboratorTimeoutMs: 50 });
    vi.spyOn(console, 'error').mockImplementation(() => {});
    h.ledger.grant('acct-1', 1000, 'seed', 'seed:acct-1');
    h.content.evaluateBehavior = (_ref, checks) => (checks.some((c) => c.id === 'p_social_proof') ? 'hang' : 'ok');

    const jobId = await submitAndWait({ input_ref: VIDEO, check_sets: ['abcd', 'persuasion'] });

    const report = await requestJson(srv.baseUrl, 'GET', `/jobs/${jobId}/report`, { token });
    expect(report.status).toBe(200);
    expect(report.body.check_sets).toMatchObject({
      abcd: { status: 'ok', total: 3 },
      persuasion: { status: 'error', error: { kind: 'timeout', message: 'Call timed out' } },
    });
    const job = await requestJson(srv.baseUrl, 'GET', `/jobs/${jobId}`, { token });
    expect(job.body.status).toBe('succeeded');
  });

  it('credits a redelivered payment event once', async () => {
    await boot();
    const payload = JSON.stringify({
      id: 'evt_1',
      object: 'event',
      type: 'checkout.session.completed',
      data: {
        object: {
          id: 'cs_test_1',
          payment_status: 'paid',
          metadata: { account_id: 'acct-1', token_amount: '1000', pack: 'TOKENS_1000' },
        },
      },
    });
    const signature = new Stripe('sk_test_placeholder').webhooks.generateTestHeaderString({
      payload,
      secret: WEBHOOK_SECRET,
    });

    for (let delivery = 0; delivery < 2; delivery++) {
      const res = await fetch(`${srv.baseUrl}/webhooks/stripe`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json', 'stripe-signature': signature },
        body: payload,
      });
      expect(res.status).toBe(200);
    }

    const credits = await requestJson(srv.baseUrl, 'GET', '/credits', { token });
    expect(credits.body.balance).toBe(1000);
  });

  it('serves a repeat submission from the cache without calling collaborators', async () => {
    await boot();
    h.ledger.grant('acct-1', 1000, 'seed', 'seed:acct-1');
    const first = await submitAndWait({ input_ref: VIDEO, check_sets: ['abcd'] });
    const calls = {
      evaluate: h.content.evaluateCalls.length,
      describe: h.content.describeCalls,
      annotate: h.annotation.calls.length,
    };

    const second = await submitAndWait({ input_ref: VIDEO, check_sets: ['abcd'] });

    expect(second).not.toBe(first);
    expect({
      evaluate: h.content.evaluateCalls.length,
      describe: h.content.describeCalls,
      annotate: h.annotation.calls.length,
    }).toEqual(calls);
    const job = await requestJson(srv.baseUrl, 'GET', `/jobs/${second}`, { token });
    expect(job.body).toMatchObject({ status: 'succeeded', cached: true, actual_cost: 300 });
    expect(h.ledger.balance('acct-1')).toBe(400);

    const response = await fetch(`${srv.baseUrl}/jobs/${second}/events`, { headers: { Authorization: `Bearer ${token}` } });
    const [event] = parseEventStream(await response.text());
    expect(event).toMatchObject({ type: 'complete', job_id: second });
  });
});
