import type { ErrorRequestHandler } from 'express';
import multer from 'multer';
import type { ZodError } from 'zod';

/**
 * An error that maps directly onto an HTTP response: `{detail}` with `status`.
 */
export class HttpError extends Error {
  constructor(readonly status: number, readonly detail: unknown) {
    super(typeof detail === 'string' ? detail : `HTTP ${status}`);
    this.name = 'HttpError';
  }
}

export interface ValidationIssue {
  loc: (string | number)[];
  msg: string;
  type: string;
}

export function formatValidationIssues(error: ZodError): ValidationIssue[] {
  return error.issues.map(issue => ({
    loc: ['body', ...issue.path],
    msg: issue.message,
    type: issue.code,
  }));
}

/** Errors raised by express' own middleware (body parser, static files) carry a status */
function statusOf(error: unknown): number | null {
  if (error instanceof Error && 'status' in error && typeof error.status === 'number') {
    return error.status;
  }
  return null;
}

export function createErrorHandler(options: { exposeErrorDetails: boolean }): ErrorRequestHandler {
  return (error: unknown, _req, res, next) => {
    if (res.headersSent) {
      next(error);
      return;
    }

    if (error instanceof HttpError) {
      res.status(error.status).json({ detail: error.detail });
      return;
    }

    if (error instanceof multer.MulterError) {
      const status = error.code === 'LIMIT_FILE_SIZE' ? 413 : 400;
      res.status(status).json({ detail: error.message });
      return;
    }

    const status = statusOf(error);
    if (status !== null && status >= 400 && status < 500) {
      const message = error instanceof Error ? error.message : 'Bad Request';
      res.status(status).json({ detail: status === 404 ? 'File not found' : message });
      return;
    }

    console.error('[Gateway] Unhandled error:', error);
    const detail = options.exposeErrorDetails && error instanceof Error
      ? error.message
      : 'Internal Server Error';
    res.status(500).json({ detail });
  };
}
