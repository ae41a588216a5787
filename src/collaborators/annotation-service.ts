import { z } from 'zod';
import { ANNOTATION_FEATURES, type AnnotationFeature } from '../rubric/rubric.js';
import { postJson, type HttpServiceConfig } from './http-client.js';
import type { AnnotationFeatures, AnnotationService } from './types.js';

const occurrence = z.object({
  start_s: z.number().min(0),
  end_s: z.number().min(0),
  confidence: z.number().min(0).max(1),
  label: z.string().optional(),
});

const annotateResponse = z.object({
  features: z.record(z.array(occurrence)),
});

function isFeature(key: string): key is AnnotationFeature {
  return ANNOTATION_FEATURES.some((f) => f === key);
}

export class HttpAnnotationService implements AnnotationService {
  constructor(private readonly config: HttpServiceConfig) {}

  async annotate(
    mediaRef: string,
    features: readonly AnnotationFeature[],
    signal: AbortSignal,
  ): Promise<AnnotationFeatures> {
    const data = await postJson(this.config, '/annotate', { media_ref: mediaRef, features }, annotateResponse, signal);
    const out: AnnotationFeatures = {};
    for (const [key, list] of Object.entries(data.features)) {
      // Features we did not ask for are dropped
      if (isFeature(key) && features.includes(key)) out[key] = list;
    }
    return out;
  }
}
