import { PublicKey } from '@solana/web3.js';
import { describe, expect, it, vi } from 'vitest';
import {
  balanceTool,
  burnAndCloseMultipleAccountsTool,
  createImageTool,
  deployTokenTool,
  getTpsTool,
  stakeTool,
  tradeTool,
  transferTool,
} from '../../src/tools/wallet.js';

const SYSTEM_PROGRAM = '11111111111111111111111111111111';
const WRAPPED_SOL = 'So11111111111111111111111111111111111111112';

describe('solana_balance', () => {
  it('returns the SOL balance for an empty payload', async () => {
    const kit = { getBalance: vi.fn().mockResolvedValue(1.25) };
    const result = await balanceTool.execute(kit, '');
    expect(result).toEqual({ status: 'success', message: 'Success', data: { balance: 1.25, token: 'SOL' } });
    expect(kit.getBalance).toHaveBeenCalledWith(undefined);
  });

  it('reads a trimmed mint address from plain text', async () => {
    const kit = { getBalance: vi.fn().mockResolvedValue(40) };
    const result = await balanceTool.execute(kit, `  ${WRAPPED_SOL}\n`);
    expect(result).toEqual({ status: 'success', message: 'Success', data: { balance: 40, token: WRAPPED_SOL } });
    const [mint] = kit.getBalance.mock.calls[0] ?? [];
    expect(mint).toBeInstanceOf(PublicKey);
    expect(mint.toBase58()).toBe(WRAPPED_SOL);
  });

  it('rejects an invalid address', async () => {
    const kit = { getBalance: vi.fn() };
    const result = await balanceTool.execute(kit, 'not-a-key');
    expect(result).toEqual({ status: 'error', message: 'Invalid public key for field: input', code: 'INVALID_ADDRESS' });
    expect(kit.getBalance).not.toHaveBeenCalled();
  });
});

describe('solana_transfer', () => {
  it('transfers SOL when no mint is given', async () => {
    const kit = { transfer: vi.fn().mockResolvedValue('sig-1') };
    const result = await transferTool.execute(kit, JSON.stringify({ to: SYSTEM_PROGRAM, amount: 5 }));
    expect(result).toEqual({
      status: 'success',
      message: 'Transfer completed successfully',
      data: { amount: 5, recipient: SYSTEM_PROGRAM, token: 'SOL', transaction: 'sig-1' },
    });
    expect(kit.transfer).toHaveBeenCalledWith(expect.any(PublicKey), 5, undefined);
  });

  it('passes the mint as a public key', async () => {
    const kit = { transfer: vi.fn().mockResolvedValue('sig-2') };
    const result = await transferTool.execute(
      kit,
      JSON.stringify({ to: SYSTEM_PROGRAM, amount: 2, mint: WRAPPED_SOL }),
    );
    expect(result.status).toBe('success');
    const [, , mint] = kit.transfer.mock.calls[0] ?? [];
    expect(mint.toBase58()).toBe(WRAPPED_SOL);
  });

  it('rejects a zero amount', async () => {
    const kit = { transfer: vi.fn() };
    const result = await transferTool.execute(kit, JSON.stringify({ to: SYSTEM_PROGRAM, amount: 0 }));
    expect(result).toEqual({ status: 'error', message: 'Value for field amount is below minimum 1', code: 'INVALID_INPUT' });
    expect(kit.transfer).not.toHaveBeenCalled();
  });
});

describe('solana_deploy_token', () => {
  it('returns the new mint', async () => {
    const kit = { deployToken: vi.fn().mockResolvedValue({ mint: 'mint-1' }) };
    const result = await deployTokenTool.execute(kit, '{"decimals":6,"initialSupply":1000}');
    expect(result).toEqual({
      status: 'success',
      message: 'Token deployed successfully',
      data: { mintAddress: 'mint-1', decimals: 6 },
    });
    expect(kit.deployToken).toHaveBeenCalledWith({ decimals: 6, initialSupply: 1000 });
  });

  it('caps decimals at 9', async () => {
    const result = await deployTokenTool.execute({ deployToken: vi.fn() }, '{"decimals":10,"initialSupply":1}');
    expect(result).toEqual({ status: 'error', message: 'Value for field decimals is above maximum 9', code: 'INVALID_INPUT' });
  });
});

describe('solana_trade', () => {
  it('defaults slippage to 100 bps', async () => {
    const kit = { trade: vi.fn().mockResolvedValue('sig-3') };
    const result = await tradeTool.execute(kit, JSON.stringify({ output_mint: WRAPPED_SOL, input_amount: 10 }));
    expect(result).toEqual({ status: 'success', message: 'Trade executed successfully', data: { transaction: 'sig-3' } });
    expect(kit.trade).toHaveBeenCalledWith({
      outputMint: expect.any(PublicKey),
      inputAmount: 10,
      inputMint: undefined,
      slippageBps: 100,
    });
  });
});

describe('solana_stake', () => {
  it('parses the amount from plain text', async () => {
    const kit = { stake: vi.fn().mockResolvedValue('sig-4') };
    const result = await stakeTool.execute(kit, ' 1.5 ');
    expect(result).toEqual({ status: 'success', message: 'Assets staked successfully', data: { result: 'sig-4' } });
    expect(kit.stake).toHaveBeenCalledWith(1.5);
  });

  it('rejects a non-numeric amount', async () => {
    const result = await stakeTool.execute({ stake: vi.fn() }, 'lots');
    expect(result).toEqual({
      status: 'error',
      message: 'Stake amount must be a positive number',
      code: 'INVALID_ARGUMENT',
    });
  });

  it.each(['0x10', '1e3', '0b11', '-1', '0', '.5'])('rejects %s as an amount', async (payload) => {
    const kit = { stake: vi.fn() };
    const result = await stakeTool.execute(kit, payload);
    expect(result).toEqual({
      status: 'error',
      message: 'Stake amount must be a positive number',
      code: 'INVALID_ARGUMENT',
    });
    expect(kit.stake).not.toHaveBeenCalled();
  });

  it('requires an amount', async () => {
    const result = await stakeTool.execute({ stake: vi.fn() }, '');
    expect(result).toEqual({ status: 'error', message: 'Missing required field: input', code: 'INVALID_INPUT' });
  });
});

describe('solana_create_image', () => {
  it('applies the size and count defaults', async () => {
    const kit = { createImage: vi.fn().mockResolvedValue({ images: ['https://img.test/1.png'] }) };
    const result = await createImageTool.execute(kit, '{"prompt":"a lighthouse"}');
    expect(result).toEqual({
      status: 'success',
      message: 'Image created successfully',
      data: { images: ['https://img.test/1.png'] },
    });
    expect(kit.createImage).toHaveBeenCalledWith('a lighthouse', '1024x1024', 1);
  });

  it('rejects a blank prompt', async () => {
    const result = await createImageTool.execute({ createImage: vi.fn() }, '{"prompt":"   "}');
    expect(result).toEqual({ status: 'error', message: 'Prompt must be a non-empty string.', code: 'INVALID_ARGUMENT' });
  });
});

describe('solana_get_tps', () => {
  it('puts the rate in the message', async () => {
    const result = await getTpsTool.execute({ getTps: vi.fn().mockResolvedValue(2500) }, '');
    expect(result).toEqual({
      status: 'success',
      message: 'Solana (mainnet-beta) current transactions per second: 2500',
      data: { tps: 2500 },
    });
  });
});

describe('solana_burn_and_close_multiple_accounts', () => {
  it('requires a list of strings', async () => {
    const kit = { multipleBurnAndCloseAccounts: vi.fn() };
    const result = await burnAndCloseMultipleAccountsTool.execute(kit, '{"token_accounts":["a",2]}');
    expect(result).toEqual({
      status: 'error',
      message: 'Invalid token_accounts. Expected a list of strings.',
      code: 'INVALID_ARGUMENT',
    });
  });

  it('forwards the accounts', async () => {
    const kit = { multipleBurnAndCloseAccounts: vi.fn().mockResolvedValue(['sig-a', 'sig-b']) };
    const result = await burnAndCloseMultipleAccountsTool.execute(kit, '{"token_accounts":["a","b"]}');
    expect(result).toEqual({
      status: 'success',
      message: 'Token accounts burned and closed successfully.',
      data: { result: ['sig-a', 'sig-b'] },
    });
    expect(kit.multipleBurnAndCloseAccounts).toHaveBeenCalledWith(['a', 'b']);
  });
});
