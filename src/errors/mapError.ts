import { ZodError } from 'zod';
import { HttpError } from './httpError';

export interface MappedError {
  status: number;
  error: string;
  code: string;
  issues?: Array<{ path: string; message: string }>;
}

// Errors raised by express.json() (malformed JSON, oversized body) carry a numeric status.
function hasStatus(err: unknown): err is Error & { status: number } {
  return err instanceof Error && 'status' in err && typeof err.status === 'number';
}

// Normalizes thrown errors into an HTTP response shape.
export function mapError(err: unknown): MappedError {
  if (err instanceof ZodError) {
    return {
      status: 422,
      error: 'Request validation failed',
      code: 'VALIDATION_FAILED',
      issues: err.issues.map(issue => ({ path: issue.path.join('.'), message: issue.message })),
    };
  }

  if (err instanceof HttpError) {
    return { status: err.status, error: err.message, code: err.code };
  }

  if (hasStatus(err) && err.status >= 400 && err.status < 500) {
    return { status: err.status, error: err.message, code: 'BAD_REQUEST' };
  }

  return { status: 500, error: 'Internal Server Error', code: 'INTERNAL_FAILURE' };
}
