import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { ConfigError } from '../shared/errors.js';

export const SEGMENTS = ['FULL_VIDEO', 'FIRST_5_SECS', 'LAST_5_SECS'] as const;
export type Segment = (typeof SEGMENTS)[number];

export const ANNOTATION_FEATURES = ['shot_change', 'face', 'person', 'logo', 'text', 'speech', 'object'] as const;
export type AnnotationFeature = (typeof ANNOTATION_FEATURES)[number];

const annotationRuleSchema = z.object({
  feature: z.enum(ANNOTATION_FEATURES),
  window: z.enum(SEGMENTS),
  min_count: z.number().int().positive(),
});

export type AnnotationRule = z.infer<typeof annotationRuleSchema>;

const checkSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  sub_category: z.enum(['ATTRACT', 'BRAND', 'CONNECT', 'DIRECT', 'PERSUASION', 'STRUCTURE', 'ACCESSIBILITY']),
  segment: z.enum(SEGMENTS),
  method: z.enum(['llm', 'annotation', 'hybrid']),
  criteria: z.string().min(1),
  annotation: annotationRuleSchema.optional(),
  recommendation: z.string().optional(),
  remediation: z.string().optional(),
  priority: z.enum(['high', 'medium', 'low']).default('medium'),
});

export type CheckDefinition = z.infer<typeof checkSchema>;

const rubricSchema = z.object({
  checks: z.array(checkSchema).min(1),
  check_sets: z.record(z.array(z.string().min(1)).min(1)),
});

export interface Rubric {
  checks: Map<string, CheckDefinition>;
  checkSets: Map<string, CheckDefinition[]>;
}

export interface ResolvedCheckSet {
  name: string;
  checks: CheckDefinition[];
}

export function parseRubric(raw: unknown): Rubric {
  const parsed = rubricSchema.safeParse(raw);
  if (!parsed.success) {
    const keys = [...new Set(parsed.error.issues.map((i) => i.path.join('.')))];
    throw new ConfigError(`Invalid rubric: ${keys.join(', ')}`, keys);
  }

  const checks = new Map<string, CheckDefinition>();
  for (const check of parsed.data.checks) {
    if (checks.has(check.id)) {
      throw new ConfigError(`Duplicate check id in rubric: ${check.id}`, [check.id]);
    }
    if (check.method !== 'llm' && !check.annotation) {
      throw new ConfigError(`Check ${check.id} uses ${check.method} but has no annotation rule`, [check.id]);
    }
    checks.set(check.id, check);
  }

  const checkSets = new Map<string, CheckDefinition[]>();
  for (const [name, ids] of Object.entries(parsed.data.check_sets)) {
    const missing = ids.filter((id) => !checks.has(id));
    if (missing.length > 0) {
      throw new ConfigError(`Check-set ${name} references unknown checks: ${missing.join(', ')}`, missing);
    }
    checkSets.set(
      name,
      ids.flatMap((id) => {
        const def = checks.get(id);
        return def ? [def] : [];
      }),
    );
  }

  return { checks, checkSets };
}

export function loadRubric(filePath: string): Rubric {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(filePath, 'utf-8'));
  } catch (err) {
    throw new ConfigError(`Cannot read rubric at ${filePath}: ${err instanceof Error ? err.message : String(err)}`, [
      'RUBRIC_PATH',
    ]);
  }
  return parseRubric(raw);
}

export function unknownCheckSets(rubric: Rubric, names: readonly string[]): string[] {
  return names.filter((n) => !rubric.checkSets.has(n));
}

/** Names must already be validated; unknown names are skipped. */
export function resolveCheckSets(rubric: Rubric, names: readonly string[]): ResolvedCheckSet[] {
  return names.flatMap((name) => {
    const checks = rubric.checkSets.get(name);
    return checks ? [{ name, checks }] : [];
  });
}

export function needsLeadingTrim(checks: readonly CheckDefinition[]): boolean {
  return checks.some((c) => c.segment === 'FIRST_5_SECS');
}
