import type { PackOffer } from '../shared/errors.js';

export const TOKENS_PER_SECOND = 10;
export const MAX_MEDIA_SECONDS = 60;
export const MAX_TOKENS_PER_JOB = TOKENS_PER_SECOND * MAX_MEDIA_SECONDS; // 600

export type PackKey = 'TOKENS_1000' | 'TOKENS_3000';

export interface TokenPack {
  usd: number;
  tokens: number;
  priceId: string | undefined;
}

export function tokenPacks(prices: { price1000?: string; price3000?: string } = {}): Record<PackKey, TokenPack> {
  return {
    TOKENS_1000: { usd: 10, tokens: 1000, priceId: prices.price1000 },
    TOKENS_3000: { usd: 25, tokens: 3000, priceId: prices.price3000 },
  };
}

export function packOffers(packs: Record<PackKey, TokenPack> = tokenPacks()): PackOffer[] {
  return Object.entries(packs).map(([pack, def]) => ({ pack, usd: def.usd, tokens: def.tokens }));
}

export function isPackKey(value: string): value is PackKey {
  return value === 'TOKENS_1000' || value === 'TOKENS_3000';
}

function isKnownDuration(seconds: number | null | undefined): seconds is number {
  return typeof seconds === 'number' && Number.isFinite(seconds) && seconds > 0;
}

/** Upfront charge. Unknown durations pay the maximum. */
export function estimateCost(durationSeconds: number | null | undefined): number {
  if (!isKnownDuration(durationSeconds)) return MAX_TOKENS_PER_JOB;
  return Math.ceil(Math.min(durationSeconds, MAX_MEDIA_SECONDS)) * TOKENS_PER_SECOND;
}

export function actualCost(durationSeconds: number | null | undefined, estimate: number): number {
  if (!isKnownDuration(durationSeconds)) return estimate;
  return Math.ceil(Math.min(durationSeconds, MAX_MEDIA_SECONDS)) * TOKENS_PER_SECOND;
}
