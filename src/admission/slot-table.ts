/**
 * One in-flight job per account. Constructed once per process and injected;
 * state lives only in memory.
 */
export class SlotTable {
  private holders = new Map<string, string>();

  tryAcquire(accountId: string, jobId: string): boolean {
    if (this.holders.has(accountId)) return false;
    this.holders.set(accountId, jobId);
    return true;
  }

  isHeld(accountId: string): boolean {
    return this.holders.has(accountId);
  }

  holder(accountId: string): string | null {
    return this.holders.get(accountId) ?? null;
  }

  /** Only the job that holds the slot can free it. */
  release(accountId: string, jobId: string): boolean {
    if (this.holders.get(accountId) !== jobId) return false;
    this.holders.delete(accountId);
    return true;
  }

  activeCount(): number {
    return this.holders.size;
  }
}
