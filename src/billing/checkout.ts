import Stripe from 'stripe';
import { z } from 'zod';
import { isPackKey, type PackKey, type TokenPack } from '../ledger/pricing.js';
import { SettlementError, ValidationError, errorMessage } from '../shared/errors.js';
import type { BillingSettlement, SettlementResult } from './settlement.js';

/** The slice of `stripe.checkout.sessions` used here. */
export interface CheckoutSessionsApi {
  create(params: Stripe.Checkout.SessionCreateParams): Promise<{ id: string; url: string | null }>;
}

export interface StripeBillingOptions {
  secretKey: string;
  webhookSecret: string;
  packs: Record<PackKey, TokenPack>;
  publicBaseUrl: string;
  /** Defaults to the SDK's checkout sessions resource. */
  sessions?: CheckoutSessionsApi;
}

export type WebhookOutcome =
  | SettlementResult
  | { status: 'ignored'; eventType: string }
  | { status: 'awaiting_payment'; sessionId: string };

const SETTLING_EVENTS = new Set<string>([
  'checkout.session.completed',
  'checkout.session.async_payment_succeeded',
]);

const paidSessionSchema = z.object({
  id: z.string().min(1),
  payment_status: z.enum(['paid', 'unpaid', 'no_payment_required']),
  metadata: z.object({
    account_id: z.string().min(1),
    token_amount: z.coerce.number().int().positive(),
    pack: z.string().min(1),
  }),
});

export class StripeBilling {
  private readonly stripe: Stripe;
  private readonly sessions: CheckoutSessionsApi;

  constructor(
    private readonly opts: StripeBillingOptions,
    private readonly settlement: BillingSettlement,
  ) {
    this.stripe = new Stripe(opts.secretKey);
    this.sessions = opts.sessions ?? this.stripe.checkout.sessions;
  }

  /** Opens a hosted checkout for one token pack and returns its redirect URL. */
  async createCheckout(accountId: string, pack: string): Promise<string> {
    if (!isPackKey(pack)) {
      throw new ValidationError(`Unknown pack: ${pack}`, { pack });
    }
    const def = this.opts.packs[pack];
    if (!def.priceId) {
      throw new ValidationError(`Pack ${pack} is not for sale`, { pack });
    }

    const base = this.opts.publicBaseUrl.replace(/\/+$/, '');
    const session = await this.sessions.create({
      mode: 'payment',
      line_items: [{ price: def.priceId, quantity: 1 }],
      client_reference_id: accountId,
      metadata: { account_id: accountId, token_amount: String(def.tokens), pack },
      success_url: `${base}/billing/success?session_id={CHECKOUT_SESSION_ID}`,
      cancel_url: `${base}/billing/cancel`,
    });

    if (!session.url) {
      throw new Error(`Checkout session ${session.id} has no redirect URL`);
    }
    // eslint-disable-next-line no-console
    console.log(`[billing] Checkout ${session.id} opened for ${accountId} (${pack})`);
    return session.url;
  }

  /** Verifies and settles one webhook delivery. `payload` must be the raw request body. */
  handleWebhook(payload: Buffer | string, signature: string | undefined): WebhookOutcome {
    if (!signature) {
      throw new SettlementError('Missing stripe-signature header');
    }

    let event: Stripe.Event;
    try {
      event = this.stripe.webhooks.constructEvent(payload, signature, this.opts.webhookSecret);
    } catch (err) {
      throw new SettlementError(`Webhook signature verification failed: ${errorMessage(err)}`);
    }

    if (!SETTLING_EVENTS.has(event.type)) {
      // eslint-disable-next-line no-console
      console.log(`[billing] Unhandled event type: ${event.type}`);
      return { status: 'ignored', eventType: event.type };
    }

    const parsed = paidSessionSchema.safeParse(event.data.object);
    if (!parsed.success) {
      throw new SettlementError(`Event ${event.id} carries an unusable checkout session`);
    }
    const session = parsed.data;
    if (session.payment_status === 'unpaid') {
      return { status: 'awaiting_payment', sessionId: session.id };
    }

    return this.settlement.onExternalPaymentConfirmed({
      eventId: event.id,
      sessionId: session.id,
      accountId: session.metadata.account_id,
      amount: session.metadata.token_amount,
      pack: session.metadata.pack,
    });
  }
}
