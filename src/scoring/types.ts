export const SECTION_KEYS = [
  'hook_attention',
  'brand_visibility',
  'social_proof_trust',
  'product_clarity_benefits',
  'funnel_alignment',
  'cta',
  'creative_diversity_readiness',
  'measurement_compatibility',
  'data_audience_leverage',
] as const;

export type SectionKey = (typeof SECTION_KEYS)[number];

export type SectionScores = Record<SectionKey, number>;

export interface ScoringFlags {
  hook_within_3s: boolean;
  brand_mentions_3x: boolean;
  has_trackable_anchor: boolean;
  has_testimonial_or_ugc: boolean;
  product_demo_present: boolean;
  end_card_present: boolean;
}

export type FlagKey = keyof ScoringFlags;

export type AdjustedIndex = 'conversion_readiness' | 'revenue_efficiency';

export interface AppliedAdjustment {
  index: AdjustedIndex;
  kind: 'boost' | 'penalty';
  key: string;
  /** Signed: boosts positive, penalties negative. */
  delta: number;
}

export interface Driver {
  section: SectionKey;
  label: string;
  score: number;
}

export type FunnelStage = 'TOF' | 'MOF' | 'BOF';

export interface FunnelStrength {
  tof: number;
  mof: number;
  bof: number;
  winner: FunnelStage;
  hybrid: string | null;
}

export type CpaRisk = 'Low' | 'Medium' | 'High';
export type RoasTier = 'High' | 'Moderate' | 'Low';
export type FatigueRisk = 'Low' | 'Medium' | 'High';

export interface ScoringSnapshot {
  model_version: string;
  overall_score: number;
  section_scores: SectionScores;
  section_maxes: SectionScores;
  normalized: SectionScores;
  indices: {
    conversion_readiness_index: number;
    revenue_efficiency_index: number;
    refreshability_index: number;
    funnel_strength: FunnelStrength;
  };
  labels: {
    predicted_cpa_risk: CpaRisk;
    predicted_roas_tier: RoasTier;
    creative_fatigue_risk: FatigueRisk;
    expected_funnel_strength: string;
  };
  flags: ScoringFlags;
  drivers: {
    top_positive: Driver[];
    top_negative: Driver[];
    applied_adjustments: AppliedAdjustment[];
  };
}
