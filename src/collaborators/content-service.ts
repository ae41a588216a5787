import { z } from 'zod';
import type { CheckDefinition } from '../rubric/rubric.js';
import type { BrandProfile, CheckVerdict, MediaDescription } from '../shared/types.js';
import { postJson, type HttpServiceConfig } from './http-client.js';
import type { ContentUnderstandingService } from './types.js';

const priority = z.enum(['high', 'medium', 'low']);

const evaluateResponse = z.object({
  verdicts: z.array(
    z.object({
      check_id: z.string(),
      detected: z.boolean(),
      confidence: z.number(),
      rationale: z.string().default(''),
      evidence: z.string().default(''),
      remediation: z.string().optional(),
      recommendation: z.string().optional(),
      priority: priority.optional(),
    }),
  ),
});

const describeResponse = z.object({
  brand: z.object({
    brand_name: z.string().default('Unknown'),
    brand_variations: z.array(z.string()).default([]),
    branded_products: z.array(z.string()).default([]),
    branded_call_to_actions: z.array(z.string()).default([]),
  }),
  scenes: z
    .array(
      z.object({
        start_s: z.number().min(0),
        end_s: z.number().min(0),
        description: z.string().default(''),
        sentiment_score: z.number().optional(),
        emotion: z.string().optional(),
        transcript: z.string().optional(),
        speech_ratio: z.number().min(0).optional(),
      }),
    )
    .default([]),
  duration_s: z.number().positive().optional(),
});

const profileResponse = z.object({
  product_service: z.string(),
  target_audience: z.string(),
  positioning: z.string(),
});

/**
 * Client for the multimodal content-understanding service. Verdicts it does
 * not return for a requested check come back as undetected with zero
 * confidence so every requested check is accounted for.
 */
export class HttpContentService implements ContentUnderstandingService {
  constructor(private readonly config: HttpServiceConfig) {}

  async evaluate(mediaRef: string, checks: readonly CheckDefinition[], signal: AbortSignal): Promise<CheckVerdict[]> {
    const body = {
      media_ref: mediaRef,
      checks: checks.map((c) => ({ id: c.id, name: c.name, criteria: c.criteria, segment: c.segment })),
    };
    const { verdicts } = await postJson(this.config, '/evaluate', body, evaluateResponse, signal);
    const byId = new Map(verdicts.map((v) => [v.check_id, v]));

    return checks.map((check) => {
      const v = byId.get(check.id);
      if (!v) {
        return {
          check_id: check.id,
          name: check.name,
          sub_category: check.sub_category,
          detected: false,
          confidence: 0,
          rationale: 'No verdict returned',
          evidence: '',
        };
      }
      return { ...v, name: check.name, sub_category: check.sub_category };
    });
  }

  async describe(mediaRef: string, signal: AbortSignal): Promise<MediaDescription> {
    const data = await postJson(this.config, '/describe', { media_ref: mediaRef }, describeResponse, signal);
    return {
      brand: data.brand,
      scenes: data.scenes.map((s, index) => ({ index, ...s })),
      ...(data.duration_s !== undefined ? { duration_s: data.duration_s } : {}),
    };
  }

  async profile(mediaRef: string, brandName: string, signal: AbortSignal): Promise<BrandProfile> {
    return postJson(this.config, '/profile', { media_ref: mediaRef, brand_name: brandName }, profileResponse, signal);
  }
}
