import { Response } from 'express';
import { ZodError } from 'zod';
import { OutcomeFailure } from '../utils/outcome';

export function sendValidationError(res: Response, error: ZodError): void {
  res.status(400).json({
    error: error.issues[0]?.message ?? 'Invalid request',
    details: error.issues.map(issue => ({ path: issue.path.join('.'), message: issue.message })),
  });
}

// Backend unreachable is temporary; bad data is the caller's to fix
export function sendFailure(res: Response, failure: OutcomeFailure): void {
  res.status(failure.status === 'connectivityError' ? 503 : 422).json({
    error: failure.error,
    status: failure.status,
  });
}
