import type { CreditLedger } from '../ledger/ledger.js';
import { packOffers } from '../ledger/pricing.js';
import { ConcurrencyLimitExceededError, InsufficientCreditsError, type PackOffer } from '../shared/errors.js';
import type { SlotTable } from './slot-table.js';

export interface JobSlot {
  readonly accountId: string;
  readonly jobId: string;
  readonly estimatedCost: number;
  readonly estimateKey: string;
  /** Frees the account's slot. Safe to call more than once. */
  release(): boolean;
  readonly released: boolean;
}

export function estimateKeyFor(jobId: string): string {
  return `job:${jobId}:estimate`;
}

class HeldSlot implements JobSlot {
  private done = false;

  constructor(
    private readonly slots: SlotTable,
    readonly accountId: string,
    readonly jobId: string,
    readonly estimatedCost: number,
  ) {}

  get estimateKey(): string {
    return estimateKeyFor(this.jobId);
  }

  get released(): boolean {
    return this.done;
  }

  release(): boolean {
    if (this.done) return false;
    this.done = true;
    return this.slots.release(this.accountId, this.jobId);
  }
}

/**
 * Gates new jobs on balance and on the per-account slot. The whole check and
 * acquire runs synchronously, so no other admission for the same account can
 * interleave with it.
 */
export class AdmissionController {
  constructor(
    private readonly ledger: CreditLedger,
    private readonly slots: SlotTable,
    private readonly offers: PackOffer[] = packOffers(),
  ) {}

  tryAdmit(accountId: string, estimatedCost: number, jobId: string): JobSlot {
    const balance = this.ledger.balance(accountId);
    if (balance < estimatedCost) {
      throw new InsufficientCreditsError(accountId, balance, estimatedCost, this.offers);
    }

    if (!this.slots.tryAcquire(accountId, jobId)) {
      throw new ConcurrencyLimitExceededError(accountId, this.slots.holder(accountId));
    }

    const slot = new HeldSlot(this.slots, accountId, jobId, estimatedCost);
    try {
      this.ledger.debit(accountId, estimatedCost, 'video_evaluation', jobId, slot.estimateKey);
    } catch (err) {
      slot.release();
      throw err;
    }
    return slot;
  }
}

export async function withSlot<T>(slot: JobSlot, fn: () => Promise<T>): Promise<T> {
  try {
    return await fn();
  } finally {
    slot.release();
  }
}
