import type Database from 'better-sqlite3';
import type { CreditLedger } from '../ledger/ledger.js';
import { SettlementError } from '../shared/errors.js';
import type { CreditTransaction } from '../shared/types.js';

export interface ExternalPayment {
  eventId: string;
  sessionId: string;
  accountId: string;
  amount: number;
  pack: string;
}

export type SettlementResult =
  | { status: 'credited'; transaction: CreditTransaction }
  | { status: 'already_processed' };

/**
 * Turns confirmed payment events into ledger grants. The processor delivers
 * events at least once; the `processed_external_events` insert is the guard
 * that collapses duplicates, and it commits together with the grant.
 */
export class BillingSettlement {
  private readonly settleTx: Database.Transaction<(payment: ExternalPayment) => SettlementResult>;

  constructor(
    private readonly db: Database.Database,
    private readonly ledger: CreditLedger,
  ) {
    this.settleTx = db.transaction((payment: ExternalPayment) => this.settleUnsafe(payment));
  }

  onExternalPaymentConfirmed(payment: ExternalPayment): SettlementResult {
    if (!payment.eventId) {
      throw new SettlementError('Payment event has no id');
    }
    if (!payment.accountId) {
      throw new SettlementError(`Payment event ${payment.eventId} has no account`);
    }
    if (!Number.isInteger(payment.amount) || payment.amount <= 0) {
      throw new SettlementError(`Payment event ${payment.eventId} has invalid amount ${payment.amount}`);
    }
    return this.settleTx.immediate(payment);
  }

  isProcessed(eventId: string): boolean {
    const row = this.db
      .prepare<[string], { event_id: string }>('SELECT event_id FROM processed_external_events WHERE event_id = ?')
      .get(eventId);
    return row !== undefined;
  }

  private settleUnsafe(payment: ExternalPayment): SettlementResult {
    const inserted = this.db
      .prepare<[string, string, string, number, string]>(
        `INSERT OR IGNORE INTO processed_external_events
         (event_id, session_id, account_id, amount, processed_at)
         VALUES (?, ?, ?, ?, ?)`,
      )
      .run(payment.eventId, payment.sessionId, payment.accountId, payment.amount, new Date().toISOString());

    if (inserted.changes === 0) {
      // eslint-disable-next-line no-console
      console.log(`[billing] Event ${payment.eventId} already processed`);
      return { status: 'already_processed' };
    }

    // Nested inside settleTx, so the grant runs under a savepoint of the same transaction.
    const { transaction } = this.ledger.grant(
      payment.accountId,
      payment.amount,
      `purchase_${payment.pack}`,
      `payment:${payment.eventId}`,
    );
    // eslint-disable-next-line no-console
    console.log(`[billing] Credited ${payment.amount} to ${payment.accountId} (${payment.pack}, event ${payment.eventId})`);
    return { status: 'credited', transaction };
  }
}
