/**
 * Body validation middleware.
 * Parses the JSON body and validates it against a schema.
 * Returns 400 with field-level errors if validation fails.
 */

import type { BodySchema, FieldSchema } from '../types/common.js';
import type { ApiErrorResponse } from '../types/api.js';
import { jsonResponse } from '../api/responses.js';
import type { Handler, Middleware } from './pipeline.js';

export function validateBody(schema: BodySchema): Middleware {
  return (next: Handler): Handler => {
    return async (req, ctx) => {
      let body: unknown;

      try {
        body = await req.json();
      } catch {
        return errorResponse('Request body must be valid JSON');
      }

      if (typeof body !== 'object' || body === null || Array.isArray(body)) {
        return errorResponse('Request body must be a JSON object');
      }

      const errors = validateFields(Object.fromEntries(Object.entries(body)), schema);

      if (errors.length > 0) {
        return errorResponse(errors.join('; '), { fields: errors });
      }

      // Re-create request with the consumed body so the handler can read it again
      const newReq = new Request(req.url, {
        method: req.method,
        headers: req.headers,
        body: JSON.stringify(body),
      });

      return next(newReq, ctx);
    };
  };
}

export function validateFields(
  body: Record<string, unknown>,
  schema: BodySchema
): string[] {
  const errors: string[] = [];

  for (const [field, fieldSchema] of Object.entries(schema)) {
    const value = body[field];

    if (value === undefined || value === null) {
      if (fieldSchema.required) errors.push(`${field} is required`);
      continue;
    }

    const typeError = checkType(field, value, fieldSchema);
    if (typeError) {
      errors.push(typeError);
      continue;
    }

    errors.push(...checkConstraints(field, value, fieldSchema));
  }

  return errors;
}

function checkType(field: string, value: unknown, schema: FieldSchema): string | null {
  switch (schema.type) {
    case 'string':
      if (typeof value !== 'string') return `${field} must be a string`;
      break;
    case 'number':
      if (typeof value !== 'number' || !Number.isFinite(value))
        return `${field} must be a number`;
      break;
    case 'boolean':
      if (typeof value !== 'boolean') return `${field} must be a boolean`;
      break;
    case 'array':
      if (!Array.isArray(value)) return `${field} must be an array`;
      break;
    case 'object':
      if (typeof value !== 'object' || Array.isArray(value))
        return `${field} must be an object`;
      break;
  }
  return null;
}

function checkConstraints(field: string, value: unknown, schema: FieldSchema): string[] {
  const errors: string[] = [];

  if (typeof value === 'string') {
    if (schema.nonEmpty && value.trim().length === 0) {
      errors.push(`${field} must not be empty`);
    }
    if (schema.maxLength !== undefined && value.length > schema.maxLength) {
      errors.push(`${field} must be ${schema.maxLength} characters or less`);
    }
    if (schema.enum && !schema.enum.includes(value)) {
      errors.push(`${field} must be one of: ${schema.enum.join(', ')}`);
    }
  }

  if (typeof value === 'number') {
    if (schema.integer && !Number.isInteger(value)) {
      errors.push(`${field} must be an integer`);
    }
    if (schema.min !== undefined && value < schema.min) {
      errors.push(`${field} must be at least ${schema.min}`);
    }
    if (schema.max !== undefined && value > schema.max) {
      errors.push(`${field} must be at most ${schema.max}`);
    }
  }

  if (Array.isArray(value)) {
    if (schema.maxItems !== undefined && value.length > schema.maxItems) {
      errors.push(`${field} must have at most ${schema.maxItems} items`);
    }
    if (schema.items === 'string' && !value.every((v) => typeof v === 'string')) {
      errors.push(`${field} must contain only strings`);
    }
    if (
      schema.items === 'object' &&
      !value.every((v) => typeof v === 'object' && v !== null && !Array.isArray(v))
    ) {
      errors.push(`${field} must contain only objects`);
    }
  }

  return errors;
}

function errorResponse(message: string, details?: Record<string, unknown>): Response {
  const body: ApiErrorResponse = {
    error: {
      code: 'INVALID_INPUT',
      message,
      ...(details && { details }),
    },
  };
  return jsonResponse(body, 400);
}
