import type { FlagKey, FunnelStage, SectionKey, SectionScores } from './types.js';

export const MODEL_VERSION = 'deterministic-rules.v1';

export const SECTION_MAXES: SectionScores = {
  hook_attention: 15,
  brand_visibility: 10,
  social_proof_trust: 15,
  product_clarity_benefits: 15,
  funnel_alignment: 10,
  cta: 10,
  creative_diversity_readiness: 10,
  measurement_compatibility: 10,
  data_audience_leverage: 5,
};

export const SECTION_LABELS: Record<SectionKey, string> = {
  hook_attention: 'Hook & Attention',
  brand_visibility: 'Brand Visibility',
  social_proof_trust: 'Social Proof & Trust',
  product_clarity_benefits: 'Product Clarity',
  funnel_alignment: 'Funnel Alignment',
  cta: 'Call to Action',
  creative_diversity_readiness: 'Creative Diversity',
  measurement_compatibility: 'Measurement Readiness',
  data_audience_leverage: 'Audience Leverage',
};

// Derived sections
export const DIVERSITY_STRUCTURE_WEIGHT = 0.6;
export const DIVERSITY_COVERAGE_POINTS = 4;
export const MEASUREMENT_CTA_MAX = 7;
export const MEASUREMENT_TRACKABLE_BONUS = 3;

// Keyword rules, matched case-insensitively as substrings
export const PRODUCT_KEYWORDS = ['product'];
export const PEOPLE_KEYWORDS = ['people', 'face', 'person', 'presence'];
export const MEASUREMENT_EVIDENCE_KEYWORDS = ['url', 'qr', 'link', 'code', 'shop', 'visit'];
export const TRACKABLE_ANCHOR_KEYWORDS = ['url', 'qr', 'link', 'code', 'shop', 'offer'];
export const HOOK_KEYWORDS = ['dynamic start'];
export const TESTIMONIAL_KEYWORDS = ['testimonial', 'ugc', 'user-generated', 'review', 'creator'];
export const PRODUCT_DEMO_KEYWORDS = ['product visuals'];
export const END_CARD_KEYWORDS = ['text', 'call to action'];
export const BRAND_MENTIONS_THRESHOLD = 3;

type Weights = Partial<Record<SectionKey, number>>;

export const CRI_WEIGHTS: Weights = {
  hook_attention: 0.22,
  product_clarity_benefits: 0.18,
  cta: 0.18,
  social_proof_trust: 0.14,
  brand_visibility: 0.12,
  funnel_alignment: 0.1,
  measurement_compatibility: 0.06,
};

/** Subtracted from CRI when the flag is absent. */
export const CRI_MISSING_FLAG_PENALTIES: Array<{ flag: FlagKey; penalty: number }> = [
  { flag: 'hook_within_3s', penalty: 0.1 },
  { flag: 'has_trackable_anchor', penalty: 0.1 },
  { flag: 'product_demo_present', penalty: 0.07 },
  { flag: 'has_testimonial_or_ugc', penalty: 0.05 },
];

export const REI_WEIGHTS: Weights = {
  product_clarity_benefits: 0.24,
  social_proof_trust: 0.18,
  brand_visibility: 0.14,
  funnel_alignment: 0.12,
  hook_attention: 0.12,
  cta: 0.1,
  creative_diversity_readiness: 0.1,
};

/** Added to REI when the flag is present. */
export const REI_FLAG_BOOSTS: Array<{ flag: FlagKey; boost: number }> = [
  { flag: 'has_trackable_anchor', boost: 0.05 },
  { flag: 'brand_mentions_3x', boost: 0.03 },
  { flag: 'end_card_present', boost: 0.02 },
];

/** Subtracted from REI when the normalized section is below the floor. */
export const REI_SECTION_PENALTIES: Array<{ section: SectionKey; below: number; penalty: number }> = [
  { section: 'product_clarity_benefits', below: 0.45, penalty: 0.07 },
  { section: 'social_proof_trust', below: 0.4, penalty: 0.05 },
];

export const RFI_WEIGHTS: Weights = {
  creative_diversity_readiness: 0.55,
  hook_attention: 0.25,
  measurement_compatibility: 0.2,
};

export const TOF_STORY_WEIGHT = 0.2;
export const FUNNEL_WEIGHTS: Record<FunnelStage, Weights> = {
  TOF: { hook_attention: 0.35, brand_visibility: 0.25, social_proof_trust: 0.2 },
  MOF: {
    social_proof_trust: 0.25,
    product_clarity_benefits: 0.25,
    brand_visibility: 0.2,
    hook_attention: 0.15,
    cta: 0.15,
  },
  BOF: {
    cta: 0.3,
    product_clarity_benefits: 0.25,
    social_proof_trust: 0.2,
    measurement_compatibility: 0.15,
    funnel_alignment: 0.1,
  },
};

/** Top two funnel stages closer than this are reported as a hybrid. */
export const HYBRID_FUNNEL_MARGIN = 0.05;

export const CPA_RISK_THRESHOLDS = { low: 0.72, medium: 0.52 } as const;
export const ROAS_TIER_THRESHOLDS = { high: 0.7, moderate: 0.5 } as const;
export const FATIGUE_RISK_THRESHOLDS = { low: 0.7, medium: 0.5 } as const;

export const DRIVER_COUNT = 3;
export const DRIVER_SPLIT = 0.5;
