import { describe, expect, it } from 'vitest';
import { toJsonSchema } from '../../src/schema/json-schema.js';
import { getTpsTool, stakeTool, transferTool } from '../../src/tools/wallet.js';

describe('toJsonSchema', () => {
  it('renders types, bounds and required fields', () => {
    expect(
      toJsonSchema({
        amount: { type: 'integer', required: true, min: 1, max: 10, description: 'How many' },
        top_coins: { type: ['integer', 'string'] },
      }),
    ).toEqual({
      type: 'object',
      properties: {
        amount: { type: 'integer', minimum: 1, maximum: 10, description: 'How many' },
        top_coins: { type: ['integer', 'string'] },
      },
      required: ['amount'],
      additionalProperties: true,
    });
  });

  it('gives array fields an items schema', () => {
    expect(toJsonSchema({ recipients: { type: 'array', required: true } }).properties).toEqual({
      recipients: { type: 'array', items: {} },
    });
  });

  it('is exposed on each definition', () => {
    expect(transferTool.parameters).toEqual({
      type: 'object',
      properties: {
        to: { type: 'string' },
        amount: { type: 'integer', minimum: 1 },
        mint: { type: 'string' },
      },
      required: ['to', 'amount'],
      additionalProperties: true,
    });
  });

  it('gives text tools a single input string', () => {
    expect(stakeTool.parameters.properties).toEqual({ input: { type: 'string' } });
    expect(stakeTool.parameters.required).toEqual(['input']);
  });

  it('gives input-less tools an empty object', () => {
    expect(getTpsTool.parameters).toEqual({
      type: 'object',
      properties: {},
      required: [],
      additionalProperties: true,
    });
  });
});
