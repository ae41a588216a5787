import { createHash } from 'node:crypto';
import type { Report } from '../shared/types.js';

export function canonicalInputRef(inputRef: string): string {
  const trimmed = inputRef.trim();
  try {
    const url = new URL(trimmed);
    url.hash = '';
    // URL already lowercases scheme and host for special schemes; other
    // schemes (store://, gs://) keep their host as written.
    return `${url.protocol.toLowerCase()}//${url.host.toLowerCase()}${url.pathname}${url.search}`;
  } catch {
    return trimmed;
  }
}

export function normalizeCheckSets(checkSets: readonly string[]): string[] {
  return [...new Set(checkSets)].sort();
}

export function computeFingerprint(inputRef: string, checkSets: readonly string[]): string {
  return createHash('sha256')
    .update(`${canonicalInputRef(inputRef)}|${normalizeCheckSets(checkSets).join(',')}`)
    .digest('hex');
}

interface CacheEntry {
  report: Report;
  expiresAt: number;
}

export interface FingerprintCacheOptions {
  maxEntries: number;
  ttlMs: number;
}

/**
 * Bounded LRU with TTL, keyed by fingerprint. Process-local; concurrent
 * misses for the same fingerprint may both do the work and the last store
 * wins.
 */
export class FingerprintCache {
  private entries = new Map<string, CacheEntry>();

  constructor(private readonly opts: FingerprintCacheOptions) {}

  lookup(fingerprint: string): Report | null {
    const entry = this.entries.get(fingerprint);
    if (!entry) return null;
    if (entry.expiresAt <= Date.now()) {
      this.entries.delete(fingerprint);
      return null;
    }
    // Re-insert to mark as most recently used
    this.entries.delete(fingerprint);
    this.entries.set(fingerprint, entry);
    return entry.report;
  }

  store(fingerprint: string, report: Report): void {
    this.entries.delete(fingerprint);
    this.entries.set(fingerprint, { report, expiresAt: Date.now() + this.opts.ttlMs });
    while (this.entries.size > this.opts.maxEntries) {
      const oldest = this.entries.keys().next();
      if (oldest.done) break;
      this.entries.delete(oldest.value);
    }
  }

  size(): number {
    return this.entries.size;
  }

  clear(): void {
    this.entries.clear();
  }
}
