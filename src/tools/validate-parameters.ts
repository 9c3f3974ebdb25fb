/**
 * Parameter validation against a tool's declared field schema.
 * Returns one message per failing field; an empty list means valid.
 */

import type { FieldSchema, ParameterSchema } from '../types/common.js';

export function validateParameters(
  params: Record<string, unknown>,
  schema: ParameterSchema
): string[] {
  const errors: string[] = [];

  for (const [field, fieldSchema] of Object.entries(schema)) {
    const value = params[field];

    if (fieldSchema.required && (value === undefined || value === null)) {
      errors.push(`${field} is required`);
      continue;
    }

    if (value === undefined || value === null) {
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
      if (typeof value !== 'number' || Number.isNaN(value)) return `${field} must be a number`;
      break;
    case 'boolean':
      if (typeof value !== 'boolean') return `${field} must be a boolean`;
      break;
    case 'array':
      if (!Array.isArray(value)) return `${field} must be an array`;
      if (schema.items) {
        const itemType = schema.items;
        if (!value.every((item) => typeof item === itemType)) {
          return `${field} must be an array of ${itemType}s`;
        }
      }
      break;
    case 'object':
      if (typeof value !== 'object' || Array.isArray(value)) return `${field} must be an object`;
      break;
  }
  return null;
}

function checkConstraints(field: string, value: unknown, schema: FieldSchema): string[] {
  const errors: string[] = [];

  if (typeof value === 'string') {
    if (schema.maxLength !== undefined && value.length > schema.maxLength) {
      errors.push(`${field} must be ${schema.maxLength} characters or less`);
    }
    if (schema.enum && !schema.enum.includes(value)) {
      errors.push(`${field} must be one of: ${schema.enum.join(', ')}`);
    }
  }

  if (typeof value === 'number') {
    if (schema.min !== undefined && value < schema.min) {
      errors.push(`${field} must be at least ${schema.min}`);
    }
    if (schema.max !== undefined && value > schema.max) {
      errors.push(`${field} must be at most ${schema.max}`);
    }
  }

  if (Array.isArray(value) && schema.maxLength !== undefined && value.length > schema.maxLength) {
    errors.push(`${field} must have ${schema.maxLength} items or fewer`);
  }

  return errors;
}

// ── Typed readers for already-validated parameters ──

export function readString(params: Record<string, unknown>, field: string): string | undefined {
  const value = params[field];
  return typeof value === 'string' ? value : undefined;
}

export function readStringArray(
  params: Record<string, unknown>,
  field: string
): string[] | undefined {
  const value = params[field];
  if (!Array.isArray(value)) return undefined;
  return value.filter((item): item is string => typeof item === 'string');
}
