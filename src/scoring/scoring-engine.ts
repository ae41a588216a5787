import type { CheckVerdict, SubCategory } from '../shared/types.js';
import {
  BRAND_MENTIONS_THRESHOLD,
  CPA_RISK_THRESHOLDS,
  CRI_MISSING_FLAG_PENALTIES,
  CRI_WEIGHTS,
  DIVERSITY_COVERAGE_POINTS,
  DIVERSITY_STRUCTURE_WEIGHT,
  DRIVER_COUNT,
  DRIVER_SPLIT,
  END_CARD_KEYWORDS,
  FATIGUE_RISK_THRESHOLDS,
  FUNNEL_WEIGHTS,
  HOOK_KEYWORDS,
  HYBRID_FUNNEL_MARGIN,
  MEASUREMENT_CTA_MAX,
  MEASUREMENT_EVIDENCE_KEYWORDS,
  MEASUREMENT_TRACKABLE_BONUS,
  MODEL_VERSION,
  PEOPLE_KEYWORDS,
  PRODUCT_DEMO_KEYWORDS,
  PRODUCT_KEYWORDS,
  REI_FLAG_BOOSTS,
  REI_SECTION_PENALTIES,
  REI_WEIGHTS,
  RFI_WEIGHTS,
  ROAS_TIER_THRESHOLDS,
  SECTION_LABELS,
  SECTION_MAXES,
  TESTIMONIAL_KEYWORDS,
  TOF_STORY_WEIGHT,
  TRACKABLE_ANCHOR_KEYWORDS,
} from './constants.js';
import {
  SECTION_KEYS,
  type AppliedAdjustment,
  type CpaRisk,
  type Driver,
  type FatigueRisk,
  type FunnelStage,
  type FunnelStrength,
  type RoasTier,
  type ScoringFlags,
  type ScoringSnapshot,
  type SectionKey,
  type SectionScores,
} from './types.js';

export function roundTo(value: number, digits: number): number {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}

function clamp01(value: number): number {
  return Math.max(0, Math.min(1, value));
}

/** A detected check with no usable confidence counts as a coin flip. */
function confidenceOf(verdict: CheckVerdict): number {
  return Number.isFinite(verdict.confidence) && verdict.confidence > 0 ? clamp01(verdict.confidence) : 0.5;
}

/** Each detected check contributes confidence × max / n, capped at max. */
export function sectionScore(verdicts: readonly CheckVerdict[], max: number): number {
  if (verdicts.length === 0) return 0;
  const perCheck = max / verdicts.length;
  let total = 0;
  for (const v of verdicts) {
    if (v.detected) total += confidenceOf(v) * perCheck;
  }
  return roundTo(Math.min(total, max), 2);
}

type TextField = 'name' | 'evidence' | 'rationale';

function detectedWithKeyword(
  verdicts: readonly CheckVerdict[],
  keywords: readonly string[],
  field: TextField = 'name',
): boolean {
  return verdicts.some((v) => {
    if (!v.detected) return false;
    const text = v[field].toLowerCase();
    return keywords.some((k) => text.includes(k));
  });
}

function nameMatches(verdict: CheckVerdict, keywords: readonly string[]): boolean {
  const name = verdict.name.toLowerCase();
  return keywords.some((k) => name.includes(k));
}

function bySub(verdicts: readonly CheckVerdict[], sub: SubCategory): CheckVerdict[] {
  return verdicts.filter((v) => v.sub_category === sub);
}

function weighted(norm: SectionScores, weights: Partial<Record<SectionKey, number>>): number {
  let sum = 0;
  for (const key of SECTION_KEYS) {
    const w = weights[key];
    if (w !== undefined) sum += w * norm[key];
  }
  return sum;
}

function mapSections(fn: (key: SectionKey) => number): SectionScores {
  return {
    hook_attention: fn('hook_attention'),
    brand_visibility: fn('brand_visibility'),
    social_proof_trust: fn('social_proof_trust'),
    product_clarity_benefits: fn('product_clarity_benefits'),
    funnel_alignment: fn('funnel_alignment'),
    cta: fn('cta'),
    creative_diversity_readiness: fn('creative_diversity_readiness'),
    measurement_compatibility: fn('measurement_compatibility'),
    data_audience_leverage: fn('data_audience_leverage'),
  };
}

function dedupeByCheckId(verdicts: readonly CheckVerdict[]): CheckVerdict[] {
  const seen = new Set<string>();
  const out: CheckVerdict[] = [];
  for (const v of verdicts) {
    if (seen.has(v.check_id)) continue;
    seen.add(v.check_id);
    out.push(v);
  }
  return out;
}

export function cpaRiskLabel(cri: number): CpaRisk {
  if (cri >= CPA_RISK_THRESHOLDS.low) return 'Low';
  if (cri >= CPA_RISK_THRESHOLDS.medium) return 'Medium';
  return 'High';
}

export function roasTierLabel(rei: number): RoasTier {
  if (rei >= ROAS_TIER_THRESHOLDS.high) return 'High';
  if (rei >= ROAS_TIER_THRESHOLDS.moderate) return 'Moderate';
  return 'Low';
}

export function fatigueRiskLabel(rfi: number): FatigueRisk {
  if (rfi >= FATIGUE_RISK_THRESHOLDS.low) return 'Low';
  if (rfi >= FATIGUE_RISK_THRESHOLDS.medium) return 'Medium';
  return 'High';
}

/**
 * Picks the strongest funnel stage. When the runner-up is within
 * HYBRID_FUNNEL_MARGIN the label names both, strongest first.
 */
export function funnelStrength(scores: Record<FunnelStage, number>): FunnelStrength {
  const stages: FunnelStage[] = ['TOF', 'MOF', 'BOF'];
  const ranked = [...stages].sort((a, b) => scores[b] - scores[a]);
  const [first, second] = ranked;
  const hybrid = Math.abs(scores[first] - scores[second]) < HYBRID_FUNNEL_MARGIN ? `${first}/${second}` : null;
  return {
    tof: roundTo(scores.TOF, 3),
    mof: roundTo(scores.MOF, 3),
    bof: roundTo(scores.BOF, 3),
    winner: first,
    hybrid,
  };
}

function drivers(norm: SectionScores): { top_positive: Driver[]; top_negative: Driver[] } {
  const toDriver = (section: SectionKey): Driver => ({
    section,
    label: SECTION_LABELS[section],
    score: roundTo(norm[section], 2),
  });
  const descending = [...SECTION_KEYS].sort((a, b) => norm[b] - norm[a]);
  const ascending = [...SECTION_KEYS].sort((a, b) => norm[a] - norm[b]);
  return {
    top_positive: descending.filter((k) => norm[k] > DRIVER_SPLIT).slice(0, DRIVER_COUNT).map(toDriver),
    top_negative: ascending.filter((k) => norm[k] < DRIVER_SPLIT).slice(0, DRIVER_COUNT).map(toDriver),
  };
}

/**
 * Pure and synchronous: the same verdicts always produce an identical
 * snapshot. A check id that appears more than once is scored once, first
 * occurrence wins. ACCESSIBILITY verdicts do not contribute.
 */
export function computePredictions(input: readonly CheckVerdict[]): ScoringSnapshot {
  const verdicts = dedupeByCheckId(input);

  const attract = bySub(verdicts, 'ATTRACT');
  const brand = bySub(verdicts, 'BRAND');
  const connect = bySub(verdicts, 'CONNECT');
  const direct = bySub(verdicts, 'DIRECT');
  const persuasion = bySub(verdicts, 'PERSUASION');
  const structure = bySub(verdicts, 'STRUCTURE');
  const abcd = [...attract, ...brand, ...connect, ...direct];

  const product = connect.filter((v) => nameMatches(v, PRODUCT_KEYWORDS));
  const people = connect.filter((v) => nameMatches(v, PEOPLE_KEYWORDS));

  const coverage = abcd.filter((v) => v.detected).length / Math.max(abcd.length, 1);
  const trackableEvidence = detectedWithKeyword([...direct, ...abcd], MEASUREMENT_EVIDENCE_KEYWORDS, 'evidence');

  const scores: SectionScores = {
    hook_attention: sectionScore(attract, SECTION_MAXES.hook_attention),
    brand_visibility: sectionScore(brand, SECTION_MAXES.brand_visibility),
    social_proof_trust: sectionScore([...people, ...persuasion], SECTION_MAXES.social_proof_trust),
    product_clarity_benefits: sectionScore(product, SECTION_MAXES.product_clarity_benefits),
    funnel_alignment: sectionScore(structure, SECTION_MAXES.funnel_alignment),
    cta: sectionScore(direct, SECTION_MAXES.cta),
    creative_diversity_readiness: roundTo(
      Math.min(
        sectionScore([...structure, ...persuasion], SECTION_MAXES.creative_diversity_readiness) *
          DIVERSITY_STRUCTURE_WEIGHT +
          coverage * DIVERSITY_COVERAGE_POINTS,
        SECTION_MAXES.creative_diversity_readiness,
      ),
      2,
    ),
    measurement_compatibility: roundTo(
      Math.min(
        sectionScore(direct, MEASUREMENT_CTA_MAX) + (trackableEvidence ? MEASUREMENT_TRACKABLE_BONUS : 0),
        SECTION_MAXES.measurement_compatibility,
      ),
      2,
    ),
    data_audience_leverage: sectionScore(brand, SECTION_MAXES.data_audience_leverage),
  };

  const norm = mapSections((key) => roundTo(scores[key] / SECTION_MAXES[key], 4));

  const flags: ScoringFlags = {
    hook_within_3s: detectedWithKeyword(attract, HOOK_KEYWORDS),
    brand_mentions_3x: brand.filter((v) => v.detected).length >= BRAND_MENTIONS_THRESHOLD,
    has_trackable_anchor:
      detectedWithKeyword([...direct, ...abcd], TRACKABLE_ANCHOR_KEYWORDS, 'evidence') ||
      detectedWithKeyword(direct, TRACKABLE_ANCHOR_KEYWORDS, 'rationale'),
    has_testimonial_or_ugc: detectedWithKeyword([...persuasion, ...people], TESTIMONIAL_KEYWORDS),
    product_demo_present: detectedWithKeyword(product, PRODUCT_DEMO_KEYWORDS),
    end_card_present: detectedWithKeyword(direct, END_CARD_KEYWORDS),
  };

  const adjustments: AppliedAdjustment[] = [];

  let reiBoost = 0;
  for (const { flag, boost } of REI_FLAG_BOOSTS) {
    if (flags[flag]) {
      reiBoost += boost;
      adjustments.push({ index: 'revenue_efficiency', kind: 'boost', key: flag, delta: boost });
    }
  }

  let criPenalty = 0;
  for (const { flag, penalty } of CRI_MISSING_FLAG_PENALTIES) {
    if (!flags[flag]) {
      criPenalty += penalty;
      adjustments.push({ index: 'conversion_readiness', kind: 'penalty', key: flag, delta: -penalty });
    }
  }

  let reiPenalty = 0;
  for (const rule of REI_SECTION_PENALTIES) {
    if (norm[rule.section] < rule.below) {
      reiPenalty += rule.penalty;
      adjustments.push({ index: 'revenue_efficiency', kind: 'penalty', key: rule.section, delta: -rule.penalty });
    }
  }

  const cri = clamp01(weighted(norm, CRI_WEIGHTS) - criPenalty);
  const rei = clamp01(weighted(norm, REI_WEIGHTS) + reiBoost - reiPenalty);
  const rfi = clamp01(weighted(norm, RFI_WEIGHTS));

  const story = (norm.funnel_alignment + norm.product_clarity_benefits) / 2;
  const funnel = funnelStrength({
    TOF: weighted(norm, FUNNEL_WEIGHTS.TOF) + TOF_STORY_WEIGHT * story,
    MOF: weighted(norm, FUNNEL_WEIGHTS.MOF),
    BOF: weighted(norm, FUNNEL_WEIGHTS.BOF),
  });

  let overall = 0;
  for (const key of SECTION_KEYS) overall += scores[key];

  return {
    model_version: MODEL_VERSION,
    overall_score: roundTo(overall, 1),
    section_scores: scores,
    section_maxes: { ...SECTION_MAXES },
    normalized: norm,
    indices: {
      conversion_readiness_index: roundTo(cri, 3),
      revenue_efficiency_index: roundTo(rei, 3),
      refreshability_index: roundTo(rfi, 3),
      funnel_strength: funnel,
    },
    labels: {
      predicted_cpa_risk: cpaRiskLabel(cri),
      predicted_roas_tier: roasTierLabel(rei),
      creative_fatigue_risk: fatigueRiskLabel(rfi),
      expected_funnel_strength: funnel.hybrid ?? funnel.winner,
    },
    flags,
    drivers: { ...drivers(norm), applied_adjustments: adjustments },
  };
}
