export type { FieldSpec, FieldType, InferInput, ToolSchema } from './interface.js';
export { validateInput, isRecord, fieldTypes, describeFieldType, describeValue } from './validator.js';
export { toJsonSchema, type JsonSchemaObject, type JsonSchemaProperty } from './json-schema.js';
