import { ValidationError } from '../errors.js';
import type { FieldSpec, FieldType, InferInput, ToolSchema } from './interface.js';

/** Plain JSON object check (arrays and null excluded). */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Accepted types of a field as a list. */
export function fieldTypes(spec: FieldSpec): readonly FieldType[] {
  return typeof spec.type === 'string' ? [spec.type] : spec.type;
}

/** Human-readable accepted types, e.g. `integer or string`. */
export function describeFieldType(spec: FieldSpec): string {
  return fieldTypes(spec).join(' or ');
}

/** JSON-level name of a runtime value, used in type mismatch messages. */
export function describeValue(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  if (typeof value === 'number') return Number.isInteger(value) ? 'integer' : 'number';
  return typeof value;
}

function matchesType(value: unknown, type: FieldType): boolean {
  switch (type) {
    case 'string':
      return typeof value === 'string';
    case 'integer':
      return typeof value === 'number' && Number.isInteger(value);
    case 'number':
      return typeof value === 'number' && Number.isFinite(value);
    case 'boolean':
      return typeof value === 'boolean';
    case 'array':
      return Array.isArray(value);
    case 'object':
      return isRecord(value);
  }
}

function isPresent(input: Record<string, unknown>, name: string): boolean {
  return Object.hasOwn(input, name) && input[name] !== undefined && input[name] !== null;
}

/**
 * Check `input` against `schema` and fail on the first violation.
 *
 * Required fields are checked across the whole schema before any type, and
 * types before bounds. Unknown keys pass through untouched; the input is
 * never modified.
 */
export function validateInput<S extends ToolSchema>(
  input: Record<string, unknown>,
  schema: S,
): asserts input is Record<string, unknown> & InferInput<S> {
  const fields = Object.entries(schema);

  for (const [name, spec] of fields) {
    if (spec.required && !isPresent(input, name)) {
      throw new ValidationError(`Missing required field: ${name}`);
    }
  }

  for (const [name, spec] of fields) {
    if (!isPresent(input, name)) continue;
    const value = input[name];
    if (!fieldTypes(spec).some((type) => matchesType(value, type))) {
      throw new ValidationError(
        `Invalid type for field: ${name} (expected ${describeFieldType(spec)}, received ${describeValue(value)})`,
      );
    }
  }

  for (const [name, spec] of fields) {
    const value = input[name];
    if (!isPresent(input, name) || typeof value !== 'number') continue;
    if (spec.min !== undefined && value < spec.min) {
      throw new ValidationError(`Value for field ${name} is below minimum ${spec.min}`);
    }
    if (spec.max !== undefined && value > spec.max) {
      throw new ValidationError(`Value for field ${name} is above maximum ${spec.max}`);
    }
  }
}
