/**
 * Declarative input schemas for tools.
 *
 * A schema is plain data declared once per tool. {@link InferInput} derives
 * the static type of a validated payload from it, so tool code reads its
 * arguments without casts.
 */

// ---------------------------------------------------------------------------
// Field descriptors
// ---------------------------------------------------------------------------

export type FieldType = 'string' | 'integer' | 'number' | 'boolean' | 'array' | 'object';

/** Rules for one field of a payload. */
export interface FieldSpec {
  /** Accepted type, or a list of accepted types. */
  readonly type: FieldType | readonly FieldType[];
  readonly required?: boolean;
  /** Inclusive lower bound for numeric values. */
  readonly min?: number;
  /** Inclusive upper bound for numeric values. */
  readonly max?: number;
  /** Shown in JSON Schema exports and `soltools describe`. */
  readonly description?: string;
}

/** Field name -> rules. Keys not listed here are ignored by validation. */
export type ToolSchema = Readonly<Record<string, FieldSpec>>;

// ---------------------------------------------------------------------------
// Static input types
// ---------------------------------------------------------------------------

interface FieldValues {
  string: string;
  integer: number;
  number: number;
  boolean: boolean;
  array: unknown[];
  object: Record<string, unknown>;
}

type TypeValue<T> = T extends readonly FieldType[]
  ? FieldValues[T[number]]
  : T extends FieldType
    ? FieldValues[T]
    : never;

type FieldValue<F> = F extends { readonly type: infer T } ? TypeValue<T> : never;

type RequiredKeys<S> = {
  [K in keyof S]: S[K] extends { readonly required: true } ? K : never;
}[keyof S];

/**
 * The payload type a schema admits once validated. Optional fields may be
 * absent or `null`.
 */
export type InferInput<S extends ToolSchema> = {
  [K in RequiredKeys<S>]: FieldValue<S[K]>;
} & {
  [K in Exclude<keyof S, RequiredKeys<S>>]?: FieldValue<S[K]> | null;
};
