import type { AnnotationRule, CheckDefinition } from '../rubric/rubric.js';
import type { CheckVerdict } from '../shared/types.js';
import type { AnnotationFeatures, AnnotationOccurrence } from './types.js';

/** Confidence multiplier when only one of the two hybrid sources detects. */
export const HYBRID_DISAGREEMENT_FACTOR = 0.8;
/** Confidence that a feature is absent when the annotator saw none of it. */
export const ANNOTATION_ABSENT_CONFIDENCE = 0.8;
const WINDOW_SECONDS = 5;

function clampConfidence(value: number): number {
  if (!Number.isFinite(value)) return 0.5;
  return Math.max(0, Math.min(1, value));
}

function round(value: number): number {
  return Math.round(value * 1000) / 1000;
}

function inWindow(
  rule: AnnotationRule,
  occurrences: readonly AnnotationOccurrence[],
  durationS: number | null,
): AnnotationOccurrence[] {
  switch (rule.window) {
    case 'FULL_VIDEO':
      return [...occurrences];
    case 'FIRST_5_SECS':
      return occurrences.filter((o) => o.start_s < WINDOW_SECONDS);
    case 'LAST_5_SECS': {
      const end = durationS ?? Math.max(0, ...occurrences.map((o) => o.end_s));
      return occurrences.filter((o) => o.end_s > end - WINDOW_SECONDS);
    }
  }
}

function formatTime(seconds: number): string {
  const m = Math.floor(seconds / 60);
  const s = Math.floor(seconds % 60);
  return `${m}:${String(s).padStart(2, '0')}`;
}

export function verdictFromAnnotations(
  check: CheckDefinition,
  rule: AnnotationRule,
  features: AnnotationFeatures,
  durationS: number | null,
): CheckVerdict {
  const matches = inWindow(rule, features[rule.feature] ?? [], durationS);
  const detected = matches.length >= rule.min_count;
  const meanConfidence =
    matches.length > 0 ? matches.reduce((sum, o) => sum + o.confidence, 0) / matches.length : null;

  return {
    check_id: check.id,
    name: check.name,
    sub_category: check.sub_category,
    detected,
    confidence: round(
      detected ? (meanConfidence ?? 0) : meanConfidence === null ? ANNOTATION_ABSENT_CONFIDENCE : 1 - meanConfidence,
    ),
    rationale: `${matches.length} ${rule.feature} occurrence(s) in ${rule.window}, ${rule.min_count} required`,
    evidence: matches
      .slice(0, 5)
      .map((o) => `${rule.feature}${o.label ? ` (${o.label})` : ''} at ${formatTime(o.start_s)}`)
      .join('; '),
  };
}

/**
 * Merges the two sources for a hybrid check. Detected when either source
 * detects; agreeing sources average their confidence, a lone detector keeps
 * its confidence scaled by HYBRID_DISAGREEMENT_FACTOR.
 */
export function combineHybrid(llm: CheckVerdict | null, annotation: CheckVerdict | null): CheckVerdict | null {
  if (!llm || !annotation) return llm ?? annotation;

  const detected = llm.detected || annotation.detected;
  let confidence: number;
  if (llm.detected && annotation.detected) {
    confidence = (llm.confidence + annotation.confidence) / 2;
  } else if (llm.detected) {
    confidence = llm.confidence * HYBRID_DISAGREEMENT_FACTOR;
  } else if (annotation.detected) {
    confidence = annotation.confidence * HYBRID_DISAGREEMENT_FACTOR;
  } else {
    confidence = (llm.confidence + annotation.confidence) / 2;
  }

  return {
    ...llm,
    detected,
    confidence: round(confidence),
    evidence: [llm.evidence, annotation.evidence].filter((e) => e !== '').join('; '),
  };
}

/**
 * Pins a verdict to its rubric definition: name and sub-category come from
 * the rubric, confidence is clamped to [0,1], and undetected checks pick up
 * the rubric's recommendation, remediation and priority when the source gave
 * none.
 */
export function finalizeVerdict(check: CheckDefinition, verdict: CheckVerdict): CheckVerdict {
  const out: CheckVerdict = {
    check_id: check.id,
    name: check.name,
    sub_category: check.sub_category,
    detected: verdict.detected,
    confidence: clampConfidence(verdict.confidence),
    rationale: verdict.rationale,
    evidence: verdict.evidence,
  };

  const recommendation = verdict.recommendation ?? (verdict.detected ? undefined : check.recommendation);
  if (recommendation) {
    out.recommendation = recommendation;
    out.priority = verdict.priority ?? check.priority;
  }

  if (check.sub_category === 'ACCESSIBILITY') {
    const remediation = verdict.remediation ?? (verdict.detected ? undefined : check.remediation);
    if (remediation) out.remediation = remediation;
  }
  return out;
}
