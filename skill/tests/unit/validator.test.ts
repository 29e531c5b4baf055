import { describe, expect, it } from 'vitest';
import { ValidationError } from '../../src/errors.js';
import type { ToolSchema } from '../../src/schema/interface.js';
import { describeValue, validateInput } from '../../src/schema/validator.js';

const schema = {
  recipient: { type: 'string', required: true },
  amount: { type: 'integer', required: true, min: 1, max: 100 },
  price: { type: 'number' },
  top_coins: { type: ['integer', 'string'] },
  tags: { type: 'array' },
} as const satisfies ToolSchema;

function messageOf(input: Record<string, unknown>): string | undefined {
  try {
    validateInput(input, schema);
    return undefined;
  } catch (err) {
    expect(err).toBeInstanceOf(ValidationError);
    return err instanceof Error ? err.message : String(err);
  }
}

describe('validateInput', () => {
  it('accepts a valid payload and leaves it untouched', () => {
    const input = { recipient: 'abc', amount: 5, extra: true };
    validateInput(input, schema);
    expect(input).toEqual({ recipient: 'abc', amount: 5, extra: true });
  });

  it('reports the first missing required field', () => {
    expect(messageOf({})).toBe('Missing required field: recipient');
    expect(messageOf({ recipient: 'abc' })).toBe('Missing required field: amount');
  });

  it('treats null as absent', () => {
    expect(messageOf({ recipient: null, amount: 5 })).toBe('Missing required field: recipient');
    expect(messageOf({ recipient: 'abc', amount: 5, price: null })).toBeUndefined();
  });

  it('checks every required field before any type', () => {
    expect(messageOf({ recipient: 42 })).toBe('Missing required field: amount');
  });

  it('rejects values of the wrong type', () => {
    expect(messageOf({ recipient: 'abc', amount: '5' })).toBe(
      'Invalid type for field: amount (expected integer, received string)',
    );
    expect(messageOf({ recipient: 'abc', amount: 1.5 })).toBe(
      'Invalid type for field: amount (expected integer, received number)',
    );
    expect(messageOf({ recipient: 'abc', amount: 5, tags: 'x' })).toBe(
      'Invalid type for field: tags (expected array, received string)',
    );
  });

  it('accepts integers for number fields', () => {
    expect(messageOf({ recipient: 'abc', amount: 5, price: 3 })).toBeUndefined();
  });

  it('accepts any member of a type union', () => {
    expect(messageOf({ recipient: 'abc', amount: 5, top_coins: 300 })).toBeUndefined();
    expect(messageOf({ recipient: 'abc', amount: 5, top_coins: 'all' })).toBeUndefined();
    expect(messageOf({ recipient: 'abc', amount: 5, top_coins: false })).toBe(
      'Invalid type for field: top_coins (expected integer or string, received boolean)',
    );
  });

  it('enforces inclusive bounds', () => {
    expect(messageOf({ recipient: 'abc', amount: 1 })).toBeUndefined();
    expect(messageOf({ recipient: 'abc', amount: 100 })).toBeUndefined();
    expect(messageOf({ recipient: 'abc', amount: 0 })).toBe('Value for field amount is below minimum 1');
    expect(messageOf({ recipient: 'abc', amount: 101 })).toBe('Value for field amount is above maximum 100');
  });

  it('accepts any object against an empty schema', () => {
    expect(() => {
      validateInput({}, {});
    }).not.toThrow();
    expect(() => {
      validateInput({ x: 1 }, {});
    }).not.toThrow();
  });

  it('reports the same error for the same input every time', () => {
    const input = { recipient: 'abc', amount: 0 };
    const first = messageOf(input);
    expect(first).toBe('Value for field amount is below minimum 1');
    expect(messageOf(input)).toBe(first);
    expect(input).toEqual({ recipient: 'abc', amount: 0 });
  });
});

describe('describeValue', () => {
  it('names JSON value kinds', () => {
    expect(describeValue(null)).toBe('null');
    expect(describeValue([])).toBe('array');
    expect(describeValue(2)).toBe('integer');
    expect(describeValue(2.5)).toBe('number');
    expect(describeValue({})).toBe('object');
  });
});
