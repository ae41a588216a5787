import { describe, it, expect } from 'vitest';
import { combineHybrid, finalizeVerdict, verdictFromAnnotations } from '../verdicts.js';
import type { CheckDefinition } from '../../rubric/rubric.js';
import type { CheckVerdict } from '../../shared/types.js';

const DYNAMIC_START: CheckDefinition = {
  id: 'a_dynamic_start',
  name: 'Dynamic Start',
  sub_category: 'ATTRACT',
  segment: 'FIRST_5_SECS',
  method: 'hybrid',
  criteria: 'Cut inside 3 seconds',
  annotation: { feature: 'shot_change', window: 'FIRST_5_SECS', min_count: 1 },
  recommendation: 'Open on motion.',
  priority: 'high',
};

function llmVerdict(detected: boolean, confidence: number, evidence = ''): CheckVerdict {
  return {
    check_id: 'a_dynamic_start',
    name: 'Dynamic Start',
    sub_category: 'ATTRACT',
    detected,
    confidence,
    rationale: 'model says so',
    evidence,
  };
}

describe('verdictFromAnnotations', () => {
  it('should count only occurrences inside the opening window', () => {
    const rule = { feature: 'shot_change', window: 'FIRST_5_SECS', min_count: 2 } as const;
    const verdict = verdictFromAnnotations(
      DYNAMIC_START,
      rule,
      {
        shot_change: [
          { start_s: 1, end_s: 1.1, confidence: 0.9 },
          { start_s: 7, end_s: 7.1, confidence: 0.9 },
        ],
      },
      30,
    );
    expect(verdict.detected).toBe(false);
    expect(verdict.confidence).toBe(0.1);
    expect(verdict.rationale).toBe('1 shot_change occurrence(s) in FIRST_5_SECS, 2 required');
    expect(verdict.evidence).toBe('shot_change at 0:01');
  });

  it('should detect and average confidence when enough occurrences match', () => {
    const verdict = verdictFromAnnotations(
      DYNAMIC_START,
      { feature: 'shot_change', window: 'FIRST_5_SECS', min_count: 1 },
      {
        shot_change: [
          { start_s: 0.5, end_s: 0.6, confidence: 0.8 },
          { start_s: 2, end_s: 2.1, confidence: 0.6, label: 'hard cut' },
        ],
      },
      30,
    );
    expect(verdict.detected).toBe(true);
    expect(verdict.confidence).toBe(0.7);
    expect(verdict.evidence).toBe('shot_change at 0:00; shot_change (hard cut) at 0:02');
  });

  it('should use the closing window against the media duration', () => {
    const verdict = verdictFromAnnotations(
      DYNAMIC_START,
      { feature: 'logo', window: 'LAST_5_SECS', min_count: 1 },
      { logo: [{ start_s: 27, end_s: 29, confidence: 0.95 }] },
      30,
    );
    expect(verdict.detected).toBe(true);
  });

  it('should report absence with the default confidence when nothing was seen', () => {
    const verdict = verdictFromAnnotations(
      DYNAMIC_START,
      { feature: 'shot_change', window: 'FULL_VIDEO', min_count: 1 },
      {},
      null,
    );
    expect(verdict.detected).toBe(false);
    expect(verdict.confidence).toBe(0.8);
    expect(verdict.evidence).toBe('');
  });
});

describe('combineHybrid', () => {
  it('should average confidence when both sources detect', () => {
    const combined = combineHybrid(llmVerdict(true, 0.9, 'cut at 0:01'), llmVerdict(true, 0.7, 'shot_change at 0:01'));
    expect(combined?.detected).toBe(true);
    expect(combined?.confidence).toBe(0.8);
    expect(combined?.evidence).toBe('cut at 0:01; shot_change at 0:01');
  });

  it('should discount a lone detector', () => {
    expect(combineHybrid(llmVerdict(true, 0.9), llmVerdict(false, 0.6))?.confidence).toBe(0.72);
    const annotationOnly = combineHybrid(llmVerdict(false, 0.6), llmVerdict(true, 0.5));
    expect(annotationOnly?.detected).toBe(true);
    expect(annotationOnly?.confidence).toBe(0.4);
  });

  it('should average when neither source detects', () => {
    const combined = combineHybrid(llmVerdict(false, 0.9), llmVerdict(false, 0.7));
    expect(combined?.detected).toBe(false);
    expect(combined?.confidence).toBe(0.8);
  });

  it('should fall back to whichever source is present', () => {
    const llm = llmVerdict(true, 0.9);
    expect(combineHybrid(llm, null)).toBe(llm);
    expect(combineHybrid(null, null)).toBeNull();
  });
});

describe('finalizeVerdict', () => {
  it('should attach the rubric recommendation to an undetected check', () => {
    const verdict = finalizeVerdict(DYNAMIC_START, { ...llmVerdict(false, 1.4), name: 'whatever' });
    expect(verdict.name).toBe('Dynamic Start');
    expect(verdict.confidence).toBe(1);
    expect(verdict.recommendation).toBe('Open on motion.');
    expect(verdict.priority).toBe('high');
  });

  it('should not recommend anything for a detected check without advice', () => {
    const verdict = finalizeVerdict(DYNAMIC_START, llmVerdict(true, 0.9));
    expect(verdict.recommendation).toBeUndefined();
    expect(verdict.priority).toBeUndefined();
  });

  it('should keep remediation notes for accessibility checks only', () => {
    const captions: CheckDefinition = {
      ...DYNAMIC_START,
      id: 'acc_captions_present',
      name: 'Captions / Subtitles Present',
      sub_category: 'ACCESSIBILITY',
      remediation: 'Burn in captions.',
    };
    expect(finalizeVerdict(captions, llmVerdict(false, 0.9)).remediation).toBe('Burn in captions.');
    expect(finalizeVerdict(DYNAMIC_START, { ...llmVerdict(false, 0.9), remediation: 'x' }).remediation).toBeUndefined();
  });
});
