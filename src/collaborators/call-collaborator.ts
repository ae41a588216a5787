import { setTimeout as sleep } from 'node:timers/promises';
import { ZodError } from 'zod';
import { errorMessage } from '../shared/errors.js';
import type { CollaboratorErrorKind } from '../shared/types.js';
import type { CollaboratorError, CollaboratorResult } from './types.js';

export class CollaboratorCallError extends Error {
  constructor(
    public readonly kind: CollaboratorErrorKind,
    message: string,
  ) {
    super(message);
    this.name = 'CollaboratorCallError';
  }
}

export interface CallOptions {
  timeoutMs: number;
  retries: number;
  /** Job-level abort; resolves the call as canceled as soon as it fires. */
  signal?: AbortSignal;
  backoffMs?: number;
}

const RETRYABLE = new Set<CollaboratorErrorKind>(['timeout', 'unavailable']);
const DEFAULT_BACKOFF_MS = 500;

function raceAbort<T>(promise: Promise<T>, signal: AbortSignal): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    if (signal.aborted) {
      reject(signal.reason);
      return;
    }
    const onAbort = () => reject(signal.reason);
    signal.addEventListener('abort', onAbort, { once: true });
    promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (err: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(err);
      },
    );
  });
}

function classify(err: unknown, jobSignal: AbortSignal | undefined, timeout: AbortSignal): CollaboratorError {
  if (jobSignal?.aborted) return { kind: 'canceled', message: 'Job was aborted' };
  if (timeout.aborted) return { kind: 'timeout', message: 'Call timed out' };
  if (err instanceof CollaboratorCallError) return { kind: err.kind, message: err.message };
  if (err instanceof ZodError || err instanceof SyntaxError) {
    return { kind: 'malformed_response', message: errorMessage(err) };
  }
  return { kind: 'unavailable', message: errorMessage(err) };
}

/**
 * Runs one collaborator call under its own per-attempt timeout and turns
 * every failure into a tagged result. Timeouts and unavailability are
 * retried with exponential backoff; everything else fails immediately.
 */
export async function callCollaborator<T>(
  name: string,
  fn: (signal: AbortSignal) => Promise<T>,
  opts: CallOptions,
): Promise<CollaboratorResult<T>> {
  const attempts = opts.retries + 1;
  const backoffMs = opts.backoffMs ?? DEFAULT_BACKOFF_MS;

  for (let attempt = 1; ; attempt++) {
    if (opts.signal?.aborted) {
      return { ok: false, error: { kind: 'canceled', message: 'Job was aborted' } };
    }

    const timeout = AbortSignal.timeout(opts.timeoutMs);
    const signal = opts.signal ? AbortSignal.any([opts.signal, timeout]) : timeout;

    let error: CollaboratorError;
    try {
      return { ok: true, value: await raceAbort(fn(signal), signal) };
    } catch (err) {
      error = classify(err, opts.signal, timeout);
    }

    if (!RETRYABLE.has(error.kind) || attempt >= attempts) {
      if (error.kind !== 'canceled') {
        // eslint-disable-next-line no-console
        console.error(`[collaborator] ${name} failed (${error.kind}) after ${attempt} attempt(s): ${error.message}`);
      }
      return { ok: false, error };
    }

    // eslint-disable-next-line no-console
    console.warn(`[collaborator] ${name} ${error.kind}, retrying (attempt ${attempt + 1}/${attempts})`);
    try {
      await sleep(backoffMs * 2 ** (attempt - 1), undefined, { signal: opts.signal });
    } catch {
      return { ok: false, error: { kind: 'canceled', message: 'Job was aborted' } };
    }
  }
}
