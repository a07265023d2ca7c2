/**
 * Request body schema used by the validateBody middleware.
 */

export type FieldType = 'string' | 'number' | 'boolean' | 'array' | 'object';

export interface FieldSchema {
  type: FieldType;
  required?: boolean;
  /** Strings: maximum length. */
  maxLength?: number;
  /** Strings: reject empty or whitespace-only values. */
  nonEmpty?: boolean;
  enum?: string[];
  /** Numbers: bounds and integrality. */
  min?: number;
  max?: number;
  integer?: boolean;
  /** Arrays: element type and maximum length. */
  items?: 'string' | 'object';
  maxItems?: number;
}

export type BodySchema = Record<string, FieldSchema>;
