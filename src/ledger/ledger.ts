import type Database from 'better-sqlite3';
import { v4 as uuidv4 } from 'uuid';
import { InsufficientBalanceError, LedgerInvariantError } from '../shared/errors.js';
import type { CreditKind, CreditTransaction } from '../shared/types.js';

interface CreditRow {
  id: string;
  account_id: string;
  kind: string;
  amount: number;
  reason: string;
  job_id: string | null;
  idempotency_key: string;
  created_at: string;
}

interface PendingEntry {
  accountId: string;
  kind: CreditKind;
  amount: number;
  reason: string;
  jobId: string | null;
  idempotencyKey: string;
}

export interface LedgerResult {
  transaction: CreditTransaction;
  /** True when the idempotency key had already been committed. */
  replayed: boolean;
  balance: number;
}

const KINDS: readonly CreditKind[] = ['grant', 'debit', 'refund'];

function toKind(value: string): CreditKind {
  const kind = KINDS.find((k) => k === value);
  if (!kind) throw new Error(`Unknown credit transaction kind: ${value}`);
  return kind;
}

function rowToTransaction(row: CreditRow): CreditTransaction {
  return { ...row, kind: toKind(row.kind) };
}

function signed(kind: CreditKind, amount: number): number {
  return kind === 'debit' ? -amount : amount;
}

/**
 * Append-only credit ledger. The balance is always the signed sum of the
 * account's transactions; nothing else stores it.
 *
 * Every mutation is one BEGIN IMMEDIATE transaction, so the balance read that
 * guards a debit and the insert that follows it cannot interleave with another
 * writer on the same database.
 */
export class CreditLedger {
  private readonly applyTx: Database.Transaction<(entry: PendingEntry) => LedgerResult>;

  constructor(private readonly db: Database.Database) {
    this.applyTx = db.transaction((entry: PendingEntry) => this.applyUnsafe(entry));
  }

  balance(accountId: string): number {
    const row = this.db
      .prepare<[string], { balance: number }>(
        'SELECT COALESCE(SUM(amount), 0) AS balance FROM credit_transactions WHERE account_id = ?',
      )
      .get(accountId);
    return row?.balance ?? 0;
  }

  grant(
    accountId: string,
    amount: number,
    reason: string,
    idempotencyKey: string,
    jobId: string | null = null,
  ): LedgerResult {
    return this.applyTx.immediate({ accountId, kind: 'grant', amount, reason, jobId, idempotencyKey });
  }

  debit(
    accountId: string,
    amount: number,
    reason: string,
    jobId: string | null,
    idempotencyKey: string,
  ): LedgerResult {
    return this.applyTx.immediate({ accountId, kind: 'debit', amount, reason, jobId, idempotencyKey });
  }

  refund(
    accountId: string,
    amount: number,
    reason: string,
    jobId: string | null,
    idempotencyKey: string,
  ): LedgerResult {
    return this.applyTx.immediate({ accountId, kind: 'refund', amount, reason, jobId, idempotencyKey });
  }

  /** Debited minus refunded for one job; what a further refund may return. */
  netChargedForJob(jobId: string): number {
    const row = this.db
      .prepare<[string], { net: number }>(
        `SELECT COALESCE(SUM(amount), 0) AS net FROM credit_transactions
         WHERE job_id = ? AND kind IN ('debit', 'refund')`,
      )
      .get(jobId);
    return -(row?.net ?? 0);
  }

  findByKey(idempotencyKey: string): CreditTransaction | null {
    const row = this.db
      .prepare<[string], CreditRow>('SELECT * FROM credit_transactions WHERE idempotency_key = ?')
      .get(idempotencyKey);
    return row ? rowToTransaction(row) : null;
  }

  history(accountId: string, limit = 100): CreditTransaction[] {
    return this.db
      .prepare<[string, number], CreditRow>(
        `SELECT * FROM credit_transactions WHERE account_id = ?
         ORDER BY created_at DESC, rowid DESC LIMIT ?`,
      )
      .all(accountId, limit)
      .map(rowToTransaction);
  }

  private applyUnsafe(entry: PendingEntry): LedgerResult {
    if (!Number.isInteger(entry.amount) || entry.amount <= 0) {
      throw new LedgerInvariantError(
        'non_positive_amount',
        `${entry.kind} amount must be a positive integer, got ${entry.amount}`,
      );
    }

    const existing = this.findByKey(entry.idempotencyKey);
    if (existing) {
      const sameEffect =
        existing.account_id === entry.accountId &&
        existing.kind === entry.kind &&
        existing.amount === signed(entry.kind, entry.amount);
      if (!sameEffect) {
        throw new LedgerInvariantError(
          'idempotency_key_mismatch',
          `Idempotency key ${entry.idempotencyKey} was already used for a different ${existing.kind} of ${Math.abs(existing.amount)}`,
        );
      }
      return { transaction: existing, replayed: true, balance: this.balance(entry.accountId) };
    }

    const balance = this.balance(entry.accountId);
    if (entry.kind === 'debit' && balance - entry.amount < 0) {
      throw new InsufficientBalanceError(entry.accountId, balance, entry.amount);
    }
    if (entry.kind === 'refund' && entry.jobId) {
      const refundable = this.netChargedForJob(entry.jobId);
      if (entry.amount > refundable) {
        throw new LedgerInvariantError(
          'refund_exceeds_debit',
          `Refund of ${entry.amount} exceeds the ${refundable} still charged for job ${entry.jobId}`,
        );
      }
    }

    const transaction: CreditTransaction = {
      id: uuidv4(),
      account_id: entry.accountId,
      kind: entry.kind,
      amount: signed(entry.kind, entry.amount),
      reason: entry.reason,
      job_id: entry.jobId,
      idempotency_key: entry.idempotencyKey,
      created_at: new Date().toISOString(),
    };

    this.db
      .prepare(
        `INSERT INTO credit_transactions
          (id, account_id, kind, amount, reason, job_id, idempotency_key, created_at)
         VALUES
          (@id, @account_id, @kind, @amount, @reason, @job_id, @idempotency_key, @created_at)`,
      )
      .run(transaction);

    return { transaction, replayed: false, balance: balance + transaction.amount };
  }
}
