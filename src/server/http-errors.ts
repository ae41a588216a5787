import type { NextFunction, Request, Response } from 'express';
import { z } from 'zod';
import {
  ConcurrencyLimitExceededError,
  ConfigError,
  InsufficientBalanceError,
  InsufficientCreditsError,
  InvalidTransitionError,
  JobNotFoundError,
  LedgerInvariantError,
  SettlementError,
  ValidationError,
} from '../shared/errors.js';

export interface HttpErrorBody {
  error: string;
  message: string;
  [detail: string]: unknown;
}

/** Parses request input, turning zod issues into one 400-mapped error. */
export function parseInput<S extends z.ZodTypeAny>(schema: S, input: unknown): z.infer<S> {
  const parsed = schema.safeParse(input ?? {});
  if (!parsed.success) {
    const message = parsed.error.issues
      .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
      .join('; ');
    throw new ValidationError(message);
  }
  return parsed.data;
}

export function toHttpError(err: unknown): { status: number; body: HttpErrorBody } {
  if (err instanceof InsufficientCreditsError) {
    return {
      status: 402,
      body: { error: err.code, message: err.message, balance: err.balance, required: err.required, offers: err.offers },
    };
  }
  if (err instanceof InsufficientBalanceError) {
    return { status: 402, body: { error: err.code, message: err.message, balance: err.balance } };
  }
  if (err instanceof ConcurrencyLimitExceededError) {
    return { status: 429, body: { error: err.code, message: err.message, active_job_id: err.activeJobId } };
  }
  if (err instanceof JobNotFoundError) {
    return { status: 404, body: { error: err.code, message: err.message } };
  }
  if (err instanceof InvalidTransitionError) {
    return { status: 409, body: { error: err.code, message: err.message, from: err.from } };
  }
  if (err instanceof LedgerInvariantError) {
    return { status: 409, body: { error: err.code, message: err.message, reason: err.reason } };
  }
  if (err instanceof ValidationError) {
    return { status: 400, body: { ...err.details, error: err.code, message: err.message } };
  }
  if (err instanceof SettlementError) {
    return { status: 400, body: { error: err.code, message: err.message } };
  }
  if (err instanceof ConfigError) {
    return { status: 503, body: { error: err.code, message: err.message } };
  }
  // body-parser rejects malformed JSON with a SyntaxError carrying status 400
  if (err instanceof SyntaxError) {
    return { status: 400, body: { error: 'INVALID_JSON', message: err.message } };
  }
  return { status: 500, body: { error: 'INTERNAL_ERROR', message: 'Internal server error' } };
}

export function errorHandler() {
  return (err: unknown, req: Request, res: Response, _next: NextFunction): void => {
    const { status, body } = toHttpError(err);
    if (status >= 500) {
      // eslint-disable-next-line no-console
      console.error(`[http] ${req.method} ${req.path} failed:`, err);
    }
    if (res.headersSent) {
      res.end();
      return;
    }
    res.status(status).json(body);
  };
}
