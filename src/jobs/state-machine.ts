import type { JobPhase, JobStatus } from '../shared/types.js';

export const JOB_PHASES: readonly JobPhase[] = [
  'queued',
  'preprocessing',
  'analyzing',
  'postprocessing',
  'finalizing',
  'succeeded',
  'failed',
  'canceled',
];

const VALID_TRANSITIONS: Record<JobPhase, JobPhase[]> = {
  // queued -> finalizing is the cache-hit shortcut
  queued: ['preprocessing', 'finalizing', 'failed', 'canceled'],
  preprocessing: ['analyzing', 'failed', 'canceled'],
  analyzing: ['postprocessing', 'failed', 'canceled'],
  postprocessing: ['finalizing', 'failed', 'canceled'],
  finalizing: ['succeeded', 'failed', 'canceled'],
  // Terminal states: succeeded, failed, canceled
  succeeded: [],
  failed: [],
  canceled: [],
};

export function canTransition(from: JobPhase, to: JobPhase): boolean {
  return VALID_TRANSITIONS[from].includes(to);
}

export function isTerminal(phase: JobPhase): boolean {
  return VALID_TRANSITIONS[phase].length === 0;
}

export function statusForPhase(phase: JobPhase): JobStatus {
  switch (phase) {
    case 'queued':
    case 'succeeded':
    case 'failed':
    case 'canceled':
      return phase;
    default:
      return 'running';
  }
}

export function toPhase(value: string): JobPhase {
  const phase = JOB_PHASES.find((p) => p === value);
  if (!phase) throw new Error(`Unknown job phase: ${value}`);
  return phase;
}
