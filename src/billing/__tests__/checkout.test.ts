import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import Database from 'better-sqlite3';
import Stripe from 'stripe';
import { initSchema } from '../../db/schema.js';
import { CreditLedger } from '../../ledger/ledger.js';
import { tokenPacks } from '../../ledger/pricing.js';
import { SettlementError, ValidationError } from '../../shared/errors.js';
import { StripeBilling, type CheckoutSessionsApi } from '../checkout.js';
import { BillingSettlement } from '../settlement.js';

const WEBHOOK_SECRET = 'whsec_test_secret';
const signer = new Stripe('sk_test_placeholder');

function completedEvent(
  id: string,
  session: Record<string, unknown>,
  type = 'checkout.session.completed',
): string {
  return JSON.stringify({
    id,
    object: 'event',
    type,
    data: {
      object: {
        id: 'cs_test_1',
        object: 'checkout.session',
        payment_status: 'paid',
        metadata: { account_id: 'acct-1', token_amount: '1000', pack: 'TOKENS_1000' },
        ...session,
      },
    },
  });
}

function sign(payload: string, secret = WEBHOOK_SECRET): string {
  return signer.webhooks.generateTestHeaderString({ payload, secret });
}

describe('StripeBilling', () => {
  let db: Database.Database;
  let ledger: CreditLedger;
  let created: Stripe.Checkout.SessionCreateParams[];
  let sessionUrl: string | null;
  let billing: StripeBilling;

  beforeEach(() => {
    db = new Database(':memory:');
    initSchema(db);
    ledger = new CreditLedger(db);
    created = [];
    sessionUrl = 'https://checkout.stripe.test/c/pay/cs_test_1';
    const sessions: CheckoutSessionsApi = {
      create: async (params) => {
        created.push(params);
        return { id: 'cs_test_1', url: sessionUrl };
      },
    };
    billing = new StripeBilling(
      {
        secretKey: 'sk_test_placeholder',
        webhookSecret: WEBHOOK_SECRET,
        packs: tokenPacks({ price1000: 'price_1000', price3000: undefined }),
        publicBaseUrl: 'https://reelgrade.example.test/',
        sessions,
      },
      new BillingSettlement(db, ledger),
    );
    vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    db.close();
    vi.restoreAllMocks();
  });

  describe('createCheckout', () => {
    it('should open a payment session carrying the pack metadata', async () => {
      const url = await billing.createCheckout('acct-1', 'TOKENS_1000');

      expect(url).toBe('https://checkout.stripe.test/c/pay/cs_test_1');
      expect(created).toEqual([
        {
          mode: 'payment',
          line_items: [{ price: 'price_1000', quantity: 1 }],
          client_reference_id: 'acct-1',
          metadata: { account_id: 'acct-1', token_amount: '1000', pack: 'TOKENS_1000' },
          success_url: 'https://reelgrade.example.test/billing/success?session_id={CHECKOUT_SESSION_ID}',
          cancel_url: 'https://reelgrade.example.test/billing/cancel',
        },
      ]);
    });

    it('should reject unknown packs and packs without a price', async () => {
      await expect(billing.createCheckout('acct-1', 'TOKENS_9000')).rejects.toThrow(ValidationError);
      await expect(billing.createCheckout('acct-1', 'TOKENS_3000')).rejects.toThrow('Pack TOKENS_3000 is not for sale');
      expect(created).toHaveLength(0);
    });

    it('should fail when the session has no redirect URL', async () => {
      sessionUrl = null;
      await expect(billing.createCheckout('acct-1', 'TOKENS_1000')).rejects.toThrow(
        'Checkout session cs_test_1 has no redirect URL',
      );
    });
  });

  describe('handleWebhook', () => {
    it('should credit a completed checkout once across redeliveries', () => {
      const payload = completedEvent('evt_1', {});

      const first = billing.handleWebhook(payload, sign(payload));
      const second = billing.handleWebhook(payload, sign(payload));

      expect(first.status).toBe('credited');
      expect(second).toEqual({ status: 'already_processed' });
      expect(ledger.balance('acct-1')).toBe(1000);
      expect(ledger.findByKey('payment:evt_1')?.reason).toBe('purchase_TOKENS_1000');
    });

    it('should accept the raw body as a Buffer', () => {
      const payload = completedEvent('evt_2', {});
      expect(billing.handleWebhook(Buffer.from(payload), sign(payload)).status).toBe('credited');
    });

    it('should settle delayed payments when they succeed', () => {
      const pending = completedEvent('evt_3', { payment_status: 'unpaid' });
      expect(billing.handleWebhook(pending, sign(pending))).toEqual({
        status: 'awaiting_payment',
        sessionId: 'cs_test_1',
      });
      expect(ledger.balance('acct-1')).toBe(0);

      const succeeded = completedEvent('evt_4', {}, 'checkout.session.async_payment_succeeded');
      expect(billing.handleWebhook(succeeded, sign(succeeded)).status).toBe('credited');
      expect(ledger.balance('acct-1')).toBe(1000);
    });

    it('should acknowledge other event types without crediting', () => {
      const payload = JSON.stringify({ id: 'evt_5', object: 'event', type: 'customer.created', data: { object: {} } });

      expect(billing.handleWebhook(payload, sign(payload))).toEqual({ status: 'ignored', eventType: 'customer.created' });
      expect(ledger.balance('acct-1')).toBe(0);
    });

    it('should reject a bad or missing signature', () => {
      const payload = completedEvent('evt_6', {});

      expect(() => billing.handleWebhook(payload, undefined)).toThrow('Missing stripe-signature header');
      expect(() => billing.handleWebhook(payload, sign(payload, 'whsec_other'))).toThrow(SettlementError);
      expect(ledger.balance('acct-1')).toBe(0);
    });

    it('should reject a session without usable metadata', () => {
      const payload = completedEvent('evt_7', { metadata: { account_id: 'acct-1' } });

      expect(() => billing.handleWebhook(payload, sign(payload))).toThrow(
        'Event evt_7 carries an unusable checkout session',
      );
    });
  });
});
