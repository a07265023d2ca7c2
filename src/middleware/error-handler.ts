/**
 * Error handler middleware.
 * Maps AppError subclasses to their status code and a structured JSON body;
 * anything else becomes a 500 that does not leak internals.
 */

import { AppError } from '../errors.js';
import type { Handler } from './pipeline.js';
import type { ApiErrorResponse } from '../types/api.js';
import { jsonResponse } from '../api/responses.js';

export function errorHandler(next: Handler): Handler {
  return async (req, ctx) => {
    try {
      return await next(req, ctx);
    } catch (err) {
      if (err instanceof AppError) {
        const body: ApiErrorResponse = {
          error: {
            code: err.code,
            message: err.message,
            ...(err.details && { details: err.details }),
          },
        };
        const headers: Record<string, string> = {};
        if (err.statusCode === 503) headers['Retry-After'] = '30';
        return jsonResponse(body, err.statusCode, headers);
      }

      const body: ApiErrorResponse = {
        error: {
          code: 'INTERNAL_ERROR',
          message: 'An unexpected error occurred',
        },
      };
      return jsonResponse(body, 500);
    }
  };
}
