import type { Response } from 'express';
import type { ZodError } from 'zod';
import { fromError } from 'zod-validation-error';
import { isWorkflowError } from '../engine/errors.js';

export function getParamId(params: Record<string, string | string[]>, key: string): string {
  const value = params[key];
  return Array.isArray(value) ? value[0] : value;
}

export function sendValidationError(res: Response, error: ZodError): void {
  res.status(400).json({
    error: fromError(error).toString(),
    code: 'VALIDATION_ERROR',
  });
}

/**
 * Domain errors carry their own status and body; anything else is a 500
 */
export function sendError(res: Response, error: unknown, source: string): void {
  if (isWorkflowError(error)) {
    res.status(error.statusCode).json(error.toResponse());
    return;
  }

  console.error(`[${source}] Unexpected error:`, error);
  res.status(500).json({
    error: error instanceof Error ? error.message : 'Internal server error',
    code: 'INTERNAL_ERROR',
  });
}
