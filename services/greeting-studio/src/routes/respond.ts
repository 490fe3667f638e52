import type { Response } from 'express';
import { describeFailure, failureHttpStatus } from '../core/failures.js';

export function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function sendError(res: Response, status: number, code: string, message: string): void {
  res.status(status).json({
    error: {
      code,
      message,
    },
  });
}

export function sendFailure(res: Response, error: unknown, context: string): void {
  const failure = describeFailure(error);
  const status = failureHttpStatus(error);
  if (status >= 500) {
    console.error(`[greeting-studio] ${context} failed kind=${failure.kind} code=${failure.code} error=${failure.message}`);
  }
  res.status(status).json({ error: failure });
}
