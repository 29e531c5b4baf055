import { describe, expect, it, vi } from 'vitest';
import { PublicKey } from '@solana/web3.js';
import { UnsupportedOperationError } from '../../src/errors.js';
import { parseOptionalPublicKey, parsePublicKey } from '../../src/kit/arguments.js';
import { logger } from '../../src/logger.js';
import { SolanaTool, checkInput, defineTool } from '../../src/tools/tool.js';

const echoTool = defineTool({
  name: 'echo_balance',
  description: 'Echo the balance of a token.',
  schema: {
    token: { type: 'string', required: true },
    amount: { type: 'integer', required: true, min: 1 },
  },
  delegate: 'getBalance',
  successMessage: (data) => `Balance is ${String(data.balance)}`,
  async run(kit, args) {
    const balance = await kit.getBalance();
    return { token: args.token, amount: args.amount, balance };
  },
});

const RECIPIENT = '11111111111111111111111111111111';

const sendTool = defineTool({
  name: 'send',
  description: 'Send SOL or a token.',
  schema: {
    to: { type: 'string', required: true },
    amount: { type: 'integer', required: true, min: 1 },
    mint: { type: 'string' },
  },
  delegate: 'transfer',
  async run(kit, args) {
    const transaction = await kit.transfer(
      parsePublicKey('to', args.to),
      args.amount,
      parseOptionalPublicKey('mint', args.mint),
    );
    return { recipient: args.to, amount: args.amount, token: args.mint ?? 'SOL', transaction };
  },
});

describe('defineTool', () => {
  it('forwards an absent optional field as undefined and echoes its default', async () => {
    const kit = { transfer: vi.fn().mockResolvedValue('sig-1') };
    const result = await sendTool.execute(kit, `{"to":"${RECIPIENT}","amount":5}`);
    expect(result).toEqual({
      status: 'success',
      message: 'Success',
      data: { recipient: RECIPIENT, amount: 5, token: 'SOL', transaction: 'sig-1' },
    });
    expect(kit.transfer).toHaveBeenCalledTimes(1);
    expect(kit.transfer).toHaveBeenCalledWith(new PublicKey(RECIPIENT), 5, undefined);
  });

  it('freezes the schema it was given', () => {
    expect(Object.isFrozen(sendTool.schema)).toBe(true);
    expect(Object.isFrozen(sendTool.schema.amount)).toBe(true);
    expect(() => {
      Object.assign(sendTool.schema.amount, { min: 10 });
    }).toThrow(TypeError);
  });

  it('wraps a successful call in a success envelope', async () => {
    const kit = { getBalance: vi.fn().mockResolvedValue(12) };
    const result = await echoTool.execute(kit, '{"token":"SOL","amount":3}');
    expect(result).toEqual({
      status: 'success',
      message: 'Balance is 12',
      data: { token: 'SOL', amount: 3, balance: 12 },
    });
    expect(kit.getBalance).toHaveBeenCalledTimes(1);
  });

  it('uses Success as the default message', async () => {
    const tool = defineTool({
      name: 'tps',
      description: 'TPS.',
      input: 'none',
      schema: {},
      delegate: 'getTps',
      async run(kit) {
        return { tps: await kit.getTps() };
      },
    });
    const result = await tool.execute({ getTps: vi.fn().mockResolvedValue(4000) }, 'ignored');
    expect(result).toEqual({ status: 'success', message: 'Success', data: { tps: 4000 } });
  });

  it('rejects out-of-range values without calling the kit', async () => {
    const kit = { getBalance: vi.fn() };
    const result = await echoTool.execute(kit, '{"token":"SOL","amount":0}');
    expect(result).toEqual({
      status: 'error',
      message: 'Value for field amount is below minimum 1',
      code: 'INVALID_INPUT',
    });
    expect(kit.getBalance).not.toHaveBeenCalled();
  });

  it('reports malformed JSON', async () => {
    const result = await echoTool.execute({ getBalance: vi.fn() }, '{"token":');
    expect(result.status).toBe('error');
    if (result.status === 'error') {
      expect(result.code).toBe('INVALID_JSON');
      expect(result.message).toMatch(/^Invalid JSON input: /);
    }
  });

  it('rejects JSON that is not an object', async () => {
    const result = await echoTool.execute({ getBalance: vi.fn() }, '[1,2]');
    expect(result).toEqual({ status: 'error', message: 'Input must be a JSON object', code: 'INVALID_JSON' });
  });

  it('treats an empty payload as an empty object', async () => {
    const result = await echoTool.execute({ getBalance: vi.fn() }, '   ');
    expect(result).toEqual({ status: 'error', message: 'Missing required field: token', code: 'INVALID_INPUT' });
  });

  it('keeps the code a kit error carries', async () => {
    const limited = Object.assign(new Error('slow down'), { code: 'RATE_LIMITED' });
    const kit = { getBalance: vi.fn().mockRejectedValue(limited) };
    const result = await echoTool.execute(kit, '{"token":"SOL","amount":1}');
    expect(result).toEqual({ status: 'error', message: 'slow down', code: 'RATE_LIMITED' });
  });

  it('falls back to UNKNOWN_ERROR for plain errors', async () => {
    const kit = { getBalance: vi.fn().mockRejectedValue(new Error('boom')) };
    const result = await echoTool.execute(kit, '{"token":"SOL","amount":1}');
    expect(result).toEqual({ status: 'error', message: 'boom', code: 'UNKNOWN_ERROR' });
  });

  it('logs failures as warnings', async () => {
    const warn = vi.spyOn(logger, 'warn');
    await echoTool.execute({ getBalance: vi.fn() }, '{}');
    expect(warn).toHaveBeenCalledWith('echo_balance failed [INVALID_INPUT]: Missing required field: token');
    warn.mockRestore();
  });

  it('reports a kit without the delegate method', async () => {
    const kit = { getBalance: vi.fn() };
    Reflect.deleteProperty(kit, 'getBalance');
    const result = await echoTool.execute(kit, '{"token":"SOL","amount":1}');
    expect(result).toEqual({
      status: 'error',
      message: 'Agent kit does not implement getBalance',
      code: 'NOT_SUPPORTED',
    });
  });

  it('returns a frozen definition', () => {
    expect(Object.isFrozen(echoTool)).toBe(true);
    expect(echoTool.input).toBe('json');
    expect(echoTool.delegate).toBe('getBalance');
  });
});

describe('checkInput', () => {
  it('returns the parsed payload when valid', () => {
    expect(checkInput(echoTool, '{"token":"SOL","amount":2}')).toEqual({
      ok: true,
      input: { token: 'SOL', amount: 2 },
    });
  });

  it('returns the failure otherwise', () => {
    expect(checkInput(echoTool, '{"token":"SOL"}')).toEqual({
      ok: false,
      message: 'Missing required field: amount',
      code: 'INVALID_INPUT',
    });
  });
});

describe('SolanaTool', () => {
  it('exposes the definition and invokes it with the bound kit', async () => {
    const kit = { getBalance: vi.fn().mockResolvedValue(1) };
    const tool = new SolanaTool(echoTool, kit);
    expect(tool.name).toBe('echo_balance');
    expect(tool.description).toBe('Echo the balance of a token.');
    expect(tool.parameters.required).toEqual(['token', 'amount']);
    const result = await tool.invoke('{"token":"USDC","amount":1}');
    expect(result.status).toBe('success');
  });

  it('throws on synchronous invocation', () => {
    const kit = { getBalance: vi.fn() };
    const tool = new SolanaTool(echoTool, kit);
    expect(() => tool.invokeSync('{}')).toThrow(UnsupportedOperationError);
    expect(() => tool.invokeSync()).toThrow(
      'This tool only supports async execution. Please use the async interface.',
    );
    expect(kit.getBalance).not.toHaveBeenCalled();
  });
});
