/**
 * Argument transformations applied after validation and before the kit call.
 */

import { PublicKey } from '@solana/web3.js';
import { ToolError } from '../errors.js';

/** Parse a base58 address into a {@link PublicKey}. */
export function parsePublicKey(field: string, value: string): PublicKey {
  try {
    return new PublicKey(value);
  } catch {
    throw new ToolError(`Invalid public key for field: ${field}`, 'INVALID_ADDRESS');
  }
}

/** Parse an optional address; absent values stay absent. */
export function parseOptionalPublicKey(field: string, value: string | null | undefined): PublicKey | undefined {
  return value == null ? undefined : parsePublicKey(field, value);
}

/**
 * Map an enumerated token onto the value the kit expects.
 *
 * `choices` is keyed by the accepted token; the error lists the tokens in
 * declaration order.
 */
export function parseChoice<T>(field: string, value: string, choices: Readonly<Record<string, T>>): T {
  if (Object.hasOwn(choices, value)) return choices[value];
  throw new ToolError(
    `Invalid ${field}. Valid options are: ${Object.keys(choices).join(', ')}.`,
    'INVALID_ARGUMENT',
  );
}

/** Narrow a token to one of a fixed set of literals. */
export function parseLiteral<const T extends string>(field: string, value: string, options: readonly T[]): T {
  const match = options.find((option) => option === value);
  if (match !== undefined) return match;
  throw new ToolError(`Invalid ${field}. Valid options are: ${options.join(', ')}.`, 'INVALID_ARGUMENT');
}

/** Require every element of an array to be a string. */
export function parseStringList(field: string, value: readonly unknown[]): string[] {
  const strings: string[] = [];
  for (const item of value) {
    if (typeof item !== 'string') {
      throw new ToolError(`Invalid ${field}. Expected a list of strings.`, 'INVALID_ARGUMENT');
    }
    strings.push(item);
  }
  return strings;
}

/** Parse an optional list of strings; absent values stay absent. */
export function parseOptionalStringList(
  field: string,
  value: readonly unknown[] | null | undefined,
): string[] | undefined {
  return value == null ? undefined : parseStringList(field, value);
}

/** Collapse `null` to `undefined` for optional kit parameters. */
export function optional<T>(value: T | null | undefined): T | undefined {
  return value ?? undefined;
}
