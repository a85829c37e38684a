/**
 * Shared utility types used across layers.
 */

export interface PaginationOptions {
  limit: number;
  offset: number;
}

export interface PaginatedResult<T> {
  data: T[];
  total: number;
  limit: number;
  offset: number;
}

export type FieldType = 'string' | 'number' | 'boolean' | 'array' | 'object';

export interface FieldSchema {
  type: FieldType;
  required?: boolean;
  minLength?: number;
  maxLength?: number;
  min?: number;
  max?: number;
  /** Allowed values for string fields. */
  enum?: readonly string[];
  /** Element type for array fields. */
  items?: 'string' | 'number';
  maxItems?: number;
}

export type BodySchema = Record<string, FieldSchema>;
