import { computePlatformFit } from '../scoring/platform-fit.js';
import { computePredictions, roundTo } from '../scoring/scoring-engine.js';
import type {
  AccessibilitySummary,
  ActionPlanItem,
  AudioLevel,
  BrandProfile,
  CheckSetSection,
  CheckVerdict,
  EmotionalCoherence,
  EmotionalShift,
  JobRecord,
  PersuasionSummary,
  RecommendationPriority,
  Report,
  Scene,
  SpeechRateFlag,
  SubCategory,
  TechnicalMetadata,
  Thumbnail,
} from '../shared/types.js';

const ABCD_SUB_CATEGORIES: readonly SubCategory[] = ['ATTRACT', 'BRAND', 'CONNECT', 'DIRECT'];

export const ABCD_EXCELLENT_THRESHOLD = 80;
export const ABCD_MIGHT_IMPROVE_THRESHOLD = 65;

const PRIORITY_RANK: Record<RecommendationPriority, number> = { high: 0, medium: 1, low: 2 };

/** Sentiment jumps larger than this between adjacent scenes are flagged. */
export const ABRUPT_SHIFT_DELTA = 0.5;

export const SPEECH_RATE_CHECK_ID = 'acc_speech_rate';
export const SPEECH_RATE_MIN_WPM = 100;
export const SPEECH_RATE_MAX_WPM = 180;
/** Floor on a scene's length so zero-length scenes still count. */
const MIN_SCENE_SECONDS = 0.1;

const SPEECH_RATE_ADVICE: Record<Exclude<SpeechRateFlag, 'no_speech'>, string> = {
  too_fast: 'Slow down narration to 180 WPM or less, or add pauses between key points.',
  too_slow: 'Consider a more natural pacing (120-170 WPM) to maintain engagement.',
  ok: 'Speech rate is within the comfortable range (100-180 WPM).',
};

function percent(passed: number, total: number): number {
  return total === 0 ? 0 : roundTo((passed / total) * 100, 1);
}

export function okSection(verdicts: CheckVerdict[]): CheckSetSection {
  const passed = verdicts.filter((v) => v.detected).length;
  return { status: 'ok', verdicts, passed, total: verdicts.length, score: percent(passed, verdicts.length) };
}

/** Every verdict from the sections that completed, first occurrence of each check id wins. */
export function collectVerdicts(sections: Record<string, CheckSetSection>): CheckVerdict[] {
  const seen = new Map<string, CheckVerdict>();
  for (const section of Object.values(sections)) {
    if (section.status !== 'ok') continue;
    for (const verdict of section.verdicts) {
      if (!seen.has(verdict.check_id)) seen.set(verdict.check_id, verdict);
    }
  }
  return [...seen.values()];
}

export function abcdLabel(score: number): string {
  if (score >= ABCD_EXCELLENT_THRESHOLD) return 'Excellent';
  if (score >= ABCD_MIGHT_IMPROVE_THRESHOLD) return 'Might Improve';
  return 'Needs Review';
}

export function abcdSummary(verdicts: readonly CheckVerdict[]): Report['abcd'] {
  const abcd = verdicts.filter((v) => ABCD_SUB_CATEGORIES.includes(v.sub_category));
  if (abcd.length === 0) return null;
  const passed = abcd.filter((v) => v.detected).length;
  const score = percent(passed, abcd.length);
  return { score, result: abcdLabel(score), passed, total: abcd.length };
}

export function buildActionPlan(verdicts: readonly CheckVerdict[]): ActionPlanItem[] {
  const items: ActionPlanItem[] = [];
  for (const v of verdicts) {
    if (!v.recommendation) continue;
    items.push({
      check_id: v.check_id,
      name: v.name,
      detected: v.detected,
      recommendation: v.recommendation,
      priority: v.priority ?? 'medium',
    });
  }
  // Array.prototype.sort is stable, so equal priorities keep rubric order.
  return items.sort((a, b) => PRIORITY_RANK[a.priority] - PRIORITY_RANK[b.priority]);
}

export function persuasionSummary(verdicts: readonly CheckVerdict[]): PersuasionSummary | null {
  const checks = verdicts.filter((v) => v.sub_category === 'PERSUASION');
  if (checks.length === 0) return null;
  const detected = checks.filter((v) => v.detected).length;
  return { density: percent(detected, checks.length), detected, total: checks.length };
}

/** Words per minute of speech across scenes that carry a transcript. */
export function speechRate(scenes: readonly Scene[]): { wpm: number; flag: SpeechRateFlag } {
  let words = 0;
  let speechSeconds = 0;
  for (const scene of scenes) {
    const transcript = scene.transcript?.trim() ?? '';
    const ratio = scene.speech_ratio ?? 0;
    if (!transcript || ratio <= 0) continue;
    words += transcript.split(/\s+/).length;
    speechSeconds += Math.max(scene.end_s - scene.start_s, MIN_SCENE_SECONDS) * ratio;
  }
  if (speechSeconds <= 0) return { wpm: 0, flag: 'no_speech' };

  const wpm = roundTo(words / (speechSeconds / 60), 1);
  if (wpm > SPEECH_RATE_MAX_WPM) return { wpm, flag: 'too_fast' };
  if (wpm < SPEECH_RATE_MIN_WPM) return { wpm, flag: 'too_slow' };
  return { wpm, flag: 'ok' };
}

/**
 * Pass rate over ACCESSIBILITY checks plus remediation notes for misses. A
 * measured speech rate overrides the speech-rate check's verdict.
 */
export function accessibilitySummary(
  verdicts: readonly CheckVerdict[],
  scenes: readonly Scene[] = [],
): AccessibilitySummary | null {
  const checks = verdicts.filter((v) => v.sub_category === 'ACCESSIBILITY');
  if (checks.length === 0) return null;

  const rate = speechRate(scenes);
  const enriched = checks.map((v) => {
    if (v.check_id !== SPEECH_RATE_CHECK_ID || rate.flag === 'no_speech') return v;
    return {
      ...v,
      detected: rate.flag === 'ok',
      remediation: `Speech rate is ${rate.wpm.toFixed(0)} WPM. ${SPEECH_RATE_ADVICE[rate.flag]}`,
    };
  });

  const passed = enriched.filter((v) => v.detected).length;
  return {
    passed,
    total: enriched.length,
    score: percent(passed, enriched.length),
    remediations: enriched.flatMap((v) =>
      !v.detected && v.remediation ? [{ check_id: v.check_id, name: v.name, note: v.remediation }] : [],
    ),
    speech_rate_wpm: rate.wpm,
    speech_rate_flag: rate.flag,
  };
}

/**
 * 100 when sentiment flows smoothly from scene to scene, falling to 0 as the
 * mean jump between neighbours approaches 1. Scenes without a sentiment count
 * as neutral.
 */
export function emotionalCoherence(scenes: readonly Scene[]): EmotionalCoherence {
  if (scenes.length < 2) return { score: 100, flagged_shifts: [] };

  let totalDelta = 0;
  const flagged: EmotionalShift[] = [];
  for (let i = 1; i < scenes.length; i++) {
    const prev = scenes[i - 1];
    const curr = scenes[i];
    if (!prev || !curr) continue;
    const delta = Math.abs((curr.sentiment_score ?? 0) - (prev.sentiment_score ?? 0));
    totalDelta += delta;
    if (delta > ABRUPT_SHIFT_DELTA) {
      flagged.push({
        from_scene: prev.index,
        to_scene: curr.index,
        delta: roundTo(delta, 2),
        from_emotion: prev.emotion ?? '',
        to_emotion: curr.emotion ?? '',
      });
    }
  }

  const meanDelta = totalDelta / (scenes.length - 1);
  return { score: roundTo(Math.max(0, Math.min(100, (1 - meanDelta) * 100)), 1), flagged_shifts: flagged };
}

export interface ReportInputs {
  job: JobRecord;
  brandName: string;
  sections: Record<string, CheckSetSection>;
  scenes: Scene[];
  thumbnails: Thumbnail[] | null;
  audioLevels: AudioLevel[] | null;
  brandProfile: BrandProfile | null;
  technicalMetadata: TechnicalMetadata | null;
  durationS: number | null;
  actualCost: number;
}

export function assembleReport(inputs: ReportInputs): Report {
  const verdicts = collectVerdicts(inputs.sections);
  return {
    job_id: inputs.job.job_id,
    input_ref: inputs.job.input_ref,
    brand_name: inputs.brandName,
    check_sets: inputs.sections,
    abcd: abcdSummary(verdicts),
    persuasion: persuasionSummary(verdicts),
    predictions: computePredictions(verdicts),
    platform_fit: computePlatformFit({
      verdicts,
      durationS: inputs.durationS,
      width: inputs.technicalMetadata?.width ?? null,
      height: inputs.technicalMetadata?.height ?? null,
      sceneCount: inputs.scenes.length,
    }),
    emotional_coherence: emotionalCoherence(inputs.scenes),
    scenes: inputs.scenes,
    thumbnails: inputs.thumbnails,
    audio_levels: inputs.audioLevels,
    brand_profile: inputs.brandProfile,
    technical_metadata: inputs.technicalMetadata,
    action_plan: buildActionPlan(verdicts),
    accessibility: accessibilitySummary(verdicts, inputs.scenes),
    duration_s: inputs.durationS,
    estimated_cost: inputs.job.estimated_cost,
    actual_cost: inputs.actualCost,
    generated_at: new Date().toISOString(),
  };
}
