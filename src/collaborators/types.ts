import type { AnnotationFeature, CheckDefinition } from '../rubric/rubric.js';
import type {
  AudioLevel,
  BrandProfile,
  CheckVerdict,
  CollaboratorErrorKind,
  MediaDescription,
  Report,
  Scene,
  TechnicalMetadata,
} from '../shared/types.js';

export interface CollaboratorError {
  kind: CollaboratorErrorKind;
  message: string;
}

export type CollaboratorResult<T> = { ok: true; value: T } | { ok: false; error: CollaboratorError };

// ---------------------------------------------------------------------------
// Analysis services
// ---------------------------------------------------------------------------

export interface ContentUnderstandingService {
  evaluate(mediaRef: string, checks: readonly CheckDefinition[], signal: AbortSignal): Promise<CheckVerdict[]>;
  describe(mediaRef: string, signal: AbortSignal): Promise<MediaDescription>;
  profile(mediaRef: string, brandName: string, signal: AbortSignal): Promise<BrandProfile>;
}

export interface AnnotationOccurrence {
  start_s: number;
  end_s: number;
  confidence: number;
  label?: string;
}

export type AnnotationFeatures = Partial<Record<AnnotationFeature, AnnotationOccurrence[]>>;

export interface AnnotationService {
  annotate(mediaRef: string, features: readonly AnnotationFeature[], signal: AbortSignal): Promise<AnnotationFeatures>;
}

// ---------------------------------------------------------------------------
// Storage, analytics, notifications
// ---------------------------------------------------------------------------

export interface ObjectStorage {
  fetch(locator: string, signal: AbortSignal): Promise<Buffer>;
  /** Returns the locator the bytes were written under. */
  store(locator: string, bytes: Buffer | string): Promise<string>;
}

export type AnalyticsRow = Record<string, string | number | boolean | null>;

export interface AnalyticsSink {
  readonly enabled: boolean;
  appendRows(rows: AnalyticsRow[]): Promise<void>;
}

export interface ChatNotifier {
  readonly enabled: boolean;
  notify(report: Report, reportUrl: string): Promise<void>;
}

// ---------------------------------------------------------------------------
// Local media processing
// ---------------------------------------------------------------------------

export interface MediaHandle {
  readonly path: string;
  read(): Promise<Buffer>;
  dispose(): Promise<void>;
}

export interface ThumbnailImage {
  scene_index: number;
  bytes: Buffer;
}

export interface MediaProcessor {
  open(bytes: Buffer): Promise<MediaHandle>;
  trimLeading(media: MediaHandle, seconds: number, signal: AbortSignal): Promise<MediaHandle>;
  probe(media: MediaHandle, signal: AbortSignal): Promise<TechnicalMetadata>;
  extractThumbnails(media: MediaHandle, scenes: readonly Scene[], signal: AbortSignal): Promise<ThumbnailImage[]>;
  analyzeAudioLevels(media: MediaHandle, scenes: readonly Scene[], signal: AbortSignal): Promise<AudioLevel[]>;
}
