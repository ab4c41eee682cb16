import { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import { errorMessage } from '../../../application/errors.js';
import { toValidationIssues, ValidationIssue } from './validate.js';

/**
 * Error body shared by every failing endpoint.
 */
export interface ErrorResponse {
  detail: string | ValidationIssue[];
}

/**
 * 4xx status carried by body-parser and http-errors style errors
 * (malformed JSON, oversized or unsupported bodies).
 */
function clientErrorStatus(err: unknown): number | undefined {
  if (typeof err !== 'object' || err === null) {
    return undefined;
  }
  const status =
    'status' in err ? err.status : 'statusCode' in err ? err.statusCode : undefined;
  if (typeof status === 'number' && status >= 400 && status < 500) {
    return status;
  }
  return undefined;
}

export function errorHandler(
  err: unknown,
  _req: Request,
  res: Response,
  _next: NextFunction
): void {
  console.error('Error:', err);

  if (err instanceof ZodError) {
    const response: ErrorResponse = { detail: toValidationIssues(err) };
    res.status(422).json(response);
    return;
  }

  const clientStatus = clientErrorStatus(err);
  if (clientStatus !== undefined) {
    const response: ErrorResponse = { detail: errorMessage(err) };
    res.status(clientStatus).json(response);
    return;
  }

  // Store failures and anything else: no retry, the message goes back as-is
  const response: ErrorResponse = { detail: errorMessage(err) };
  res.status(500).json(response);
}
