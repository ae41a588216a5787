import type { PlatformFitReport } from '../scoring/platform-fit.js';
import type { ScoringSnapshot } from '../scoring/types.js';

export type JobStatus = 'queued' | 'running' | 'succeeded' | 'failed' | 'canceled';

export type JobPhase =
  | 'queued'
  | 'preprocessing'
  | 'analyzing'
  | 'postprocessing'
  | 'finalizing'
  | 'succeeded'
  | 'failed'
  | 'canceled';

export type SubCategory =
  | 'ATTRACT'
  | 'BRAND'
  | 'CONNECT'
  | 'DIRECT'
  | 'PERSUASION'
  | 'STRUCTURE'
  | 'ACCESSIBILITY';

export type RecommendationPriority = 'high' | 'medium' | 'low';

export interface JobRecord {
  job_id: string;
  account_id: string;
  input_ref: string;
  check_sets: string[];
  status: JobStatus;
  phase: JobPhase;
  progress_pct: number;
  created_at: string;
  started_at: string | null;
  finished_at: string | null;
  estimated_cost: number;
  actual_cost: number | null;
  error_code: string | null;
  error_message: string | null;
  fingerprint: string;
  declared_duration_s: number | null;
  cached: boolean;
}

export interface CheckVerdict {
  check_id: string;
  name: string;
  sub_category: SubCategory;
  detected: boolean;
  confidence: number;
  rationale: string;
  evidence: string;
  remediation?: string;
  recommendation?: string;
  priority?: RecommendationPriority;
}

export type CreditKind = 'grant' | 'debit' | 'refund';

export interface CreditTransaction {
  id: string;
  account_id: string;
  kind: CreditKind;
  amount: number;
  reason: string;
  job_id: string | null;
  idempotency_key: string;
  created_at: string;
}

export interface Scene {
  index: number;
  start_s: number;
  end_s: number;
  description: string;
  /** -1 (negative) to 1 (positive). */
  sentiment_score?: number;
  emotion?: string;
  transcript?: string;
  /** Share of the scene with speech, 0-1. */
  speech_ratio?: number;
}

export interface BrandInfo {
  brand_name: string;
  brand_variations: string[];
  branded_products: string[];
  branded_call_to_actions: string[];
}

export interface MediaDescription {
  brand: BrandInfo;
  scenes: Scene[];
  duration_s?: number;
}

export interface BrandProfile {
  product_service: string;
  target_audience: string;
  positioning: string;
}

export interface TechnicalMetadata {
  duration_s: number | null;
  width: number | null;
  height: number | null;
  codec: string | null;
  frame_rate: number | null;
  file_size_bytes: number | null;
}

export interface AudioLevel {
  scene_index: number;
  mean_volume_db: number | null;
  max_volume_db: number | null;
}

export interface Thumbnail {
  scene_index: number;
  locator: string;
}

export type CollaboratorErrorKind =
  | 'timeout'
  | 'quota'
  | 'malformed_response'
  | 'unavailable'
  | 'canceled';

export interface CheckSetGap {
  kind: CollaboratorErrorKind;
  message: string;
}

export type CheckSetSection =
  | {
      status: 'ok';
      verdicts: CheckVerdict[];
      passed: number;
      total: number;
      score: number;
    }
  | {
      status: 'error';
      error: CheckSetGap;
    };

export interface ActionPlanItem {
  check_id: string;
  name: string;
  detected: boolean;
  recommendation: string;
  priority: RecommendationPriority;
}

export type SpeechRateFlag = 'ok' | 'too_fast' | 'too_slow' | 'no_speech';

export interface AccessibilitySummary {
  passed: number;
  total: number;
  score: number;
  remediations: Array<{ check_id: string; name: string; note: string }>;
  speech_rate_wpm: number;
  speech_rate_flag: SpeechRateFlag;
}

export interface PersuasionSummary {
  density: number;
  detected: number;
  total: number;
}

export interface EmotionalShift {
  from_scene: number;
  to_scene: number;
  delta: number;
  from_emotion: string;
  to_emotion: string;
}

export interface EmotionalCoherence {
  score: number;
  flagged_shifts: EmotionalShift[];
}

export interface Report {
  job_id: string;
  input_ref: string;
  brand_name: string;
  check_sets: Record<string, CheckSetSection>;
  abcd: { score: number; result: string; passed: number; total: number } | null;
  persuasion: PersuasionSummary | null;
  predictions: ScoringSnapshot;
  platform_fit: PlatformFitReport;
  emotional_coherence: EmotionalCoherence;
  scenes: Scene[];
  thumbnails: Thumbnail[] | null;
  audio_levels: AudioLevel[] | null;
  brand_profile: BrandProfile | null;
  technical_metadata: TechnicalMetadata | null;
  action_plan: ActionPlanItem[];
  accessibility: AccessibilitySummary | null;
  duration_s: number | null;
  estimated_cost: number;
  actual_cost: number;
  generated_at: string;
}

export type ProgressEvent =
  | {
      type: 'progress';
      job_id: string;
      seq: number;
      milestone: string;
      message: string;
      pct: number;
      partial?: Record<string, unknown>;
    }
  | {
      type: 'complete';
      job_id: string;
      seq: number;
      milestone: 'complete';
      pct: 100;
      report: Report;
    }
  | {
      type: 'error';
      job_id: string;
      seq: number;
      milestone: 'error';
      code: string;
      message: string;
    };

export interface HealthResponse {
  status: 'ok';
  uptime_s: number;
}
