/**
 * Shared types for request validation.
 */

export type FieldType = 'string' | 'number' | 'boolean' | 'array' | 'object';

export interface FieldSchema {
  type: FieldType;
  required?: boolean;
  maxLength?: number;
  enum?: string[];
  min?: number;
  max?: number;
  /** Nested fields, for `object`. */
  properties?: BodySchema;
}

export type BodySchema = Record<string, FieldSchema>;
