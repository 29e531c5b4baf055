import type { FieldSpec, ToolSchema } from './interface.js';
import { fieldTypes } from './validator.js';

export interface JsonSchemaProperty {
  type: string | string[];
  description?: string;
  minimum?: number;
  maximum?: number;
  items?: Record<string, never>;
}

/** JSON Schema object accepted by function-calling hosts. */
export interface JsonSchemaObject {
  type: 'object';
  properties: Record<string, JsonSchemaProperty>;
  required: string[];
  additionalProperties: boolean;
}

function toProperty(spec: FieldSpec): JsonSchemaProperty {
  const types = fieldTypes(spec);
  const property: JsonSchemaProperty = { type: types.length === 1 ? types[0] : [...types] };
  if (spec.description) property.description = spec.description;
  if (spec.min !== undefined) property.minimum = spec.min;
  if (spec.max !== undefined) property.maximum = spec.max;
  if (types.includes('array')) property.items = {};
  return property;
}

/**
 * Render a tool schema as JSON Schema. Extra keys stay allowed, matching the
 * validator, which ignores them.
 */
export function toJsonSchema(schema: ToolSchema): JsonSchemaObject {
  const properties: Record<string, JsonSchemaProperty> = {};
  const required: string[] = [];
  for (const [name, spec] of Object.entries(schema)) {
    properties[name] = toProperty(spec);
    if (spec.required) required.push(name);
  }
  return { type: 'object', properties, required, additionalProperties: true };
}
