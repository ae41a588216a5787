import type { CheckVerdict, SubCategory } from '../shared/types.js';

/**
 * Deterministic per-platform fit scores (0-100) with up to three tips each.
 * Signals come from detected checks, the media's geometry and its pacing;
 * the same inputs always give the same output.
 */

export const PLATFORMS = ['youtube', 'meta_feed', 'meta_reels', 'tiktok', 'ctv'] as const;

export type Platform = (typeof PLATFORMS)[number];

export interface PlatformFit {
  score: number;
  tips: string[];
}

export type PlatformFitReport = Record<Platform, PlatformFit>;

export interface PlatformFitInputs {
  verdicts: readonly CheckVerdict[];
  durationS: number | null;
  width: number | null;
  height: number | null;
  sceneCount: number;
}

export interface PlatformSignals {
  durationS: number;
  aspectRatio: number | null;
  hookFast: boolean;
  hasCta: boolean;
  hasBrandEarly: boolean;
  hasCaptions: boolean;
  audioIndependent: boolean;
  textReadable: boolean;
  pacingFast: boolean;
  structureArchetype: string;
}

const MAX_TIPS = 3;
/** More than one scene per this many seconds counts as fast pacing. */
const FAST_PACING_WINDOW_S = 5;

const ABCD: readonly SubCategory[] = ['ATTRACT', 'BRAND', 'CONNECT', 'DIRECT'];

const KEYWORDS = {
  hook: ['dynamic start', 'hook', 'supers'],
  cta: ['call to action', 'offer', 'text', 'url'],
  brand: ['brand', 'logo'],
  captions: ['captions', 'subtitles'],
  audioIndependent: ['audio independence'],
  textReadable: ['text contrast', 'readability'],
} as const;

function anyDetected(verdicts: readonly CheckVerdict[], keywords: readonly string[]): boolean {
  return verdicts.some((v) => v.detected && keywords.some((k) => v.name.toLowerCase().includes(k)));
}

function aspectRatio(width: number | null, height: number | null): number | null {
  if (!width || !height || width <= 0 || height <= 0) return null;
  return width / height;
}

export function platformSignals(inputs: PlatformFitInputs): PlatformSignals {
  const durationS = inputs.durationS !== null && inputs.durationS > 0 ? inputs.durationS : 0;
  const abcd = inputs.verdicts.filter((v) => ABCD.includes(v.sub_category));
  const accessibility = inputs.verdicts.filter((v) => v.sub_category === 'ACCESSIBILITY');
  const structure = inputs.verdicts.find((v) => v.sub_category === 'STRUCTURE');

  return {
    durationS,
    aspectRatio: aspectRatio(inputs.width, inputs.height),
    hookFast: anyDetected(abcd, KEYWORDS.hook),
    hasCta: anyDetected(abcd, KEYWORDS.cta),
    hasBrandEarly: anyDetected(abcd, KEYWORDS.brand),
    hasCaptions: anyDetected(accessibility, KEYWORDS.captions),
    audioIndependent: anyDetected(accessibility, KEYWORDS.audioIndependent),
    textReadable: anyDetected(accessibility, KEYWORDS.textReadable),
    pacingFast: durationS > 0 && (inputs.sceneCount / Math.max(durationS, 1)) * FAST_PACING_WINDOW_S > 1,
    structureArchetype: structure?.evidence ?? '',
  };
}

function fit(score: number, tips: string[]): PlatformFit {
  return { score: Math.max(0, Math.min(100, score)), tips: tips.slice(0, MAX_TIPS) };
}

function scoreYoutube(s: PlatformSignals): PlatformFit {
  let score = 70;
  const tips: string[] = [];

  if (s.durationS < 6) {
    score -= 15;
    tips.push('Video is very short for YouTube pre-roll. Aim for 15-60 seconds.');
  } else if (s.durationS < 15) {
    score -= 5;
    tips.push('Consider extending to at least 15 seconds for full pre-roll impact.');
  } else if (s.durationS > 180) {
    score -= 10;
    tips.push('Long-form (>3 min) may lose viewers. Consider a :30-:60 cutdown.');
  }

  const ar = s.aspectRatio;
  if (ar !== null) {
    if (ar >= 1.6 && ar <= 1.9) {
      score += 10;
    } else if (ar >= 0.9 && ar <= 1.1) {
      tips.push('Square (1:1) works but 16:9 is optimal for YouTube.');
    } else if (ar < 0.7) {
      score -= 5;
      tips.push('Vertical video loses impact on YouTube. Use 16:9 landscape.');
    }
  }

  if (s.hookFast) score += 5;
  else tips.push('Add a strong hook in the first 5 seconds. Viewers can skip after 5s.');

  if (s.hasCta) score += 5;
  else tips.push('Include a clear CTA (end card, overlay, or verbal) to drive action.');

  if (s.hasBrandEarly) score += 5;
  else tips.push('Show your brand or logo in the first 5 seconds for skippable ads.');

  if (s.hasCaptions) score += 5;

  return fit(score, tips);
}

function scoreMetaFeed(s: PlatformSignals): PlatformFit {
  let score = 65;
  const tips: string[] = [];

  if (s.durationS > 60) {
    score -= 10;
    tips.push('Trim to 15-30 seconds for Feed. Shorter videos get higher completion rates.');
  } else if (s.durationS > 30) {
    score -= 5;
    tips.push('Consider a :15-:30 edit for better Feed performance.');
  }

  const ar = s.aspectRatio;
  if (ar !== null) {
    if (ar >= 0.75 && ar <= 1.1) {
      score += 10;
    } else if (ar < 0.65) {
      score += 5;
    } else if (ar > 1.5) {
      score -= 10;
      tips.push('Use square (1:1) or 4:5 vertical for Feed. Landscape loses real estate.');
    }
  }

  if (s.audioIndependent) {
    score += 10;
  } else {
    score -= 10;
    tips.push('Most Feed viewers watch with sound off. Add text overlays and ensure the message works visually.');
  }

  if (s.hasCaptions) {
    score += 10;
  } else {
    score -= 5;
    tips.push('Add captions. Feed autoplay is muted.');
  }

  if (s.hookFast) score += 5;
  else tips.push('Hook viewers in the first 3 seconds. Feed scrolling is fast.');

  if (s.hasCta) score += 5;

  return fit(score, tips);
}

function scoreMetaReels(s: PlatformSignals): PlatformFit {
  let score = 60;
  const tips: string[] = [];

  if (s.durationS > 60) {
    score -= 15;
    tips.push('Reels perform best at 15-30 seconds. Trim aggressively.');
  } else if (s.durationS > 30) {
    score -= 5;
  }

  const ar = s.aspectRatio;
  if (ar !== null) {
    if (ar < 0.65) {
      score += 15;
    } else if (ar >= 0.75 && ar <= 1.1) {
      tips.push('Reels are 9:16 vertical. Crop to vertical for maximum screen coverage.');
    } else if (ar > 1.3) {
      score -= 15;
      tips.push('Landscape video is heavily penalized on Reels. Re-crop to 9:16.');
    }
  }

  if (s.pacingFast) score += 5;
  else tips.push('Increase pacing. Reels reward quick cuts and dynamic movement.');

  const archetype = s.structureArchetype.toLowerCase();
  if (archetype.includes('ugc')) score += 10;
  else if (archetype.includes('demo')) score += 5;

  if (s.hasCaptions) score += 5;

  if (s.hookFast) score += 5;
  else tips.push('Open with motion, text, or a face in the first 1-2 seconds.');

  if (s.audioIndependent) score += 5;

  return fit(score, tips);
}

function scoreTiktok(s: PlatformSignals): PlatformFit {
  let score = 55;
  const tips: string[] = [];

  if (s.durationS <= 15) {
    score += 10;
  } else if (s.durationS <= 30) {
    score += 5;
  } else if (s.durationS > 60) {
    score -= 15;
    tips.push('TikTok ads perform best at 9-15 seconds. Cut to a :15 version.');
  } else {
    score -= 5;
    tips.push('Trim to under 30 seconds for better TikTok completion rates.');
  }

  const ar = s.aspectRatio;
  if (ar !== null) {
    if (ar < 0.65) {
      score += 15;
    } else if (ar >= 0.75 && ar <= 1.1) {
      tips.push('Re-crop to 9:16 vertical. TikTok is a vertical-first platform.');
    } else if (ar > 1.3) {
      score -= 15;
      tips.push('Landscape format does not work on TikTok. Convert to 9:16.');
    }
  }

  if (s.hookFast) {
    score += 10;
  } else {
    score -= 5;
    tips.push('Open with a hook in the first second: text, a question, or an unexpected visual.');
  }

  if (s.pacingFast) score += 5;

  const archetype = s.structureArchetype.toLowerCase();
  if (archetype.includes('ugc')) {
    score += 10;
  } else if (['demo', 'problem-solution', 'before-after'].some((k) => archetype.includes(k))) {
    score += 5;
  }

  if (s.hasCaptions) score += 5;

  return fit(score, tips);
}

function scoreCtv(s: PlatformSignals): PlatformFit {
  let score = 70;
  const tips: string[] = [];

  if (s.durationS >= 13 && s.durationS <= 32) {
    score += 10;
  } else if (s.durationS < 10) {
    score -= 10;
    tips.push('CTV slots are typically :15 or :30. Extend your creative.');
  } else if (s.durationS > 60) {
    score -= 10;
    tips.push('CTV ads should be :15 or :30. Create a broadcast-length cutdown.');
  }

  const ar = s.aspectRatio;
  if (ar !== null) {
    if (ar >= 1.6 && ar <= 1.9) {
      score += 10;
    } else {
      score -= 15;
      tips.push('CTV requires 16:9 landscape. Re-crop from vertical or square.');
    }
  }

  if (s.hasBrandEarly) score += 5;
  else tips.push("CTV viewers can't skip, but brand recall still needs early logo placement.");

  if (s.hasCta) score += 5;

  // Lean-back viewing.
  if (s.pacingFast) {
    score -= 5;
    tips.push('Slow pacing slightly for CTV. Viewers are in lean-back mode, not scrolling.');
  }

  if (s.textReadable) score += 5;
  else tips.push('Ensure text is large and high-contrast for viewing from 10+ feet on TV screens.');

  return fit(score, tips);
}

export function computePlatformFit(inputs: PlatformFitInputs): PlatformFitReport {
  const signals = platformSignals(inputs);
  return {
    youtube: scoreYoutube(signals),
    meta_feed: scoreMetaFeed(signals),
    meta_reels: scoreMetaReels(signals),
    tiktok: scoreTiktok(signals),
    ctv: scoreCtv(signals),
  };
}
