/**
 * Parameter schemas: declarative field rules checked before a tool runs.
 */

export type FieldType = 'string' | 'number' | 'boolean' | 'array' | 'object';

export interface FieldSchema {
  type: FieldType;
  required?: boolean;
  description?: string;
  maxLength?: number;
  enum?: string[];
  min?: number;
  max?: number;
  /** Element type for arrays. */
  items?: Exclude<FieldType, 'array' | 'object'>;
}

export type ParameterSchema = Record<string, FieldSchema>;
