/**
 * Domain error classes. Every error carries a readonly `code` discriminant so
 * the HTTP layer and callers can branch on it without string matching.
 */

export interface PackOffer {
  pack: string;
  usd: number;
  tokens: number;
}

export class InsufficientCreditsError extends Error {
  public readonly code = 'INSUFFICIENT_CREDITS' as const;
  constructor(
    public readonly accountId: string,
    public readonly balance: number,
    public readonly required: number,
    public readonly offers: PackOffer[] = [],
  ) {
    super(`Need at least ${required} credits but only have ${balance}`);
    this.name = 'InsufficientCreditsError';
  }
}

export class ConcurrencyLimitExceededError extends Error {
  public readonly code = 'CONCURRENCY_LIMIT_EXCEEDED' as const;
  constructor(
    public readonly accountId: string,
    public readonly activeJobId: string | null,
  ) {
    super('You already have a video being processed. Please wait.');
    this.name = 'ConcurrencyLimitExceededError';
  }
}

export class InsufficientBalanceError extends Error {
  public readonly code = 'INSUFFICIENT_BALANCE' as const;
  constructor(
    public readonly accountId: string,
    public readonly balance: number,
    public readonly amount: number,
  ) {
    super(`Debit of ${amount} would take account ${accountId} below zero (balance ${balance})`);
    this.name = 'InsufficientBalanceError';
  }
}

export class LedgerInvariantError extends Error {
  public readonly code = 'LEDGER_INVARIANT' as const;
  constructor(
    public readonly reason:
      | 'idempotency_key_mismatch'
      | 'non_positive_amount'
      | 'refund_exceeds_debit',
    message: string,
  ) {
    super(message);
    this.name = 'LedgerInvariantError';
  }
}

export class JobNotFoundError extends Error {
  public readonly code = 'JOB_NOT_FOUND' as const;
  constructor(public readonly jobId: string) {
    super(`Job ${jobId} not found`);
    this.name = 'JobNotFoundError';
  }
}

export class InvalidTransitionError extends Error {
  public readonly code = 'INVALID_TRANSITION' as const;
  constructor(
    public readonly jobId: string,
    public readonly from: string,
    public readonly to: string,
  ) {
    super(`Invalid state transition for job ${jobId}: ${from} -> ${to}`);
    this.name = 'InvalidTransitionError';
  }
}

export type AbortCode = 'JOB_TIMEOUT' | 'CANCELED';

export class JobAbortedError extends Error {
  constructor(public readonly code: AbortCode, message: string) {
    super(message);
    this.name = 'JobAbortedError';
  }
}

export class SettlementError extends Error {
  public readonly code = 'INVALID_PAYMENT_EVENT' as const;
  constructor(message: string) {
    super(message);
    this.name = 'SettlementError';
  }
}

export class ConfigError extends Error {
  public readonly code = 'INVALID_CONFIG' as const;
  constructor(
    message: string,
    public readonly keys: string[] = [],
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export class ValidationError extends Error {
  public readonly code = 'VALIDATION_ERROR' as const;
  constructor(
    message: string,
    public readonly details: Record<string, unknown> = {},
  ) {
    super(message);
    this.name = 'ValidationError';
  }
}

export type JobFailureCode = 'ALL_BRANCHES_FAILED' | 'COST_MISMATCH' | 'STALE_TIMEOUT';

export class JobFailedError extends Error {
  constructor(
    public readonly code: JobFailureCode,
    message: string,
  ) {
    super(message);
    this.name = 'JobFailedError';
  }
}
