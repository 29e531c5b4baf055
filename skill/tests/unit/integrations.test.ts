import { describe, expect, it, vi } from 'vitest';
import { createMeteoraDlmmPoolTool, raydiumBuyTool, raydiumSellTool } from '../../src/tools/amm.js';
import { backpackGetFillHistoryTool, backpackRequestWithdrawalTool } from '../../src/tools/backpack.js';
import { snsResolveTool } from '../../src/tools/domains.js';
import { getDriftPerpMarketFundingRateTool, tradeUsingDriftPerpAccountTool } from '../../src/tools/drift.js';
import { heliusCreateWebhookTool } from '../../src/tools/helius.js';
import { coingeckoTopGainersTool } from '../../src/tools/market-data.js';
import { manifestPlaceBatchOrdersTool, openbookCreateMarketTool } from '../../src/tools/orderbook.js';

const METEORA_POOL = {
  bin_step: 5,
  token_a_mint: 'mint-a',
  token_b_mint: 'mint-b',
  initial_price: 1.5,
  price_rounding_up: true,
  fee_bps: 30,
  activation_type: 'Timestamp',
  has_alpha_vault: false,
};

describe('solana_create_meteora_dlmm_pool', () => {
  it('maps the activation type onto the enum', async () => {
    const kit = { createMeteoraDlmmPool: vi.fn().mockResolvedValue('sig-pool') };
    const result = await createMeteoraDlmmPoolTool.execute(kit, JSON.stringify(METEORA_POOL));
    expect(result).toEqual({
      status: 'success',
      message: 'Meteora DLMM pool created successfully',
      data: { result: 'sig-pool' },
    });
    expect(kit.createMeteoraDlmmPool).toHaveBeenCalledWith({
      binStep: 5,
      tokenAMint: 'mint-a',
      tokenBMint: 'mint-b',
      initialPrice: 1.5,
      priceRoundingUp: true,
      feeBps: 30,
      activationType: 1,
      hasAlphaVault: false,
      activationPoint: undefined,
    });
  });

  it('lists the valid activation types on a bad one', async () => {
    const kit = { createMeteoraDlmmPool: vi.fn() };
    const result = await createMeteoraDlmmPoolTool.execute(
      kit,
      JSON.stringify({ ...METEORA_POOL, activation_type: 'Block' }),
    );
    expect(result).toEqual({
      status: 'error',
      message: 'Invalid activation_type. Valid options are: Slot, Timestamp.',
      code: 'INVALID_ARGUMENT',
    });
    expect(kit.createMeteoraDlmmPool).not.toHaveBeenCalled();
  });
});

describe('raydium', () => {
  it('applies the buy defaults', async () => {
    const kit = { buyWithRaydium: vi.fn().mockResolvedValue('sig-buy') };
    const result = await raydiumBuyTool.execute(kit, '{"pair_address":"pair-1"}');
    expect(result).toEqual({
      status: 'success',
      message: 'Buy transaction completed successfully',
      data: { pair_address: 'pair-1', sol_in: 0.01, slippage: 5, transaction: 'sig-buy' },
    });
    expect(kit.buyWithRaydium).toHaveBeenCalledWith('pair-1', 0.01, 5);
  });

  it('refuses to spend zero SOL', async () => {
    const result = await raydiumBuyTool.execute({ buyWithRaydium: vi.fn() }, '{"pair_address":"p","sol_in":0}');
    expect(result).toEqual({ status: 'error', message: 'sol_in must be a positive number', code: 'INVALID_ARGUMENT' });
  });

  it('sells everything by default', async () => {
    const kit = { sellWithRaydium: vi.fn().mockResolvedValue('sig-sell') };
    const result = await raydiumSellTool.execute(kit, '{"pair_address":"pair-1","slippage":10}');
    expect(result.status).toBe('success');
    expect(kit.sellWithRaydium).toHaveBeenCalledWith('pair-1', 100, 10);
  });

  it('bounds slippage', async () => {
    const result = await raydiumSellTool.execute({ sellWithRaydium: vi.fn() }, '{"pair_address":"p","slippage":101}');
    expect(result).toEqual({ status: 'error', message: 'Value for field slippage is above maximum 100', code: 'INVALID_INPUT' });
  });
});

describe('drift', () => {
  it('narrows the trade direction and order type', async () => {
    const kit = { tradeUsingDriftPerpAccount: vi.fn().mockResolvedValue({ tx: 'sig-drift' }) };
    const payload = { amount: 10, symbol: 'SOL-PERP', action: 'short', trade_type: 'limit', price: 150 };
    const result = await tradeUsingDriftPerpAccountTool.execute(kit, JSON.stringify(payload));
    expect(result).toEqual({ status: 'success', message: 'Success', data: { transaction: { tx: 'sig-drift' } } });
    expect(kit.tradeUsingDriftPerpAccount).toHaveBeenCalledWith({
      amount: 10,
      symbol: 'SOL-PERP',
      action: 'short',
      tradeType: 'limit',
      price: 150,
    });
  });

  it('rejects an unknown action', async () => {
    const payload = { amount: 10, symbol: 'SOL-PERP', action: 'sideways', trade_type: 'market' };
    const result = await tradeUsingDriftPerpAccountTool.execute(
      { tradeUsingDriftPerpAccount: vi.fn() },
      JSON.stringify(payload),
    );
    expect(result).toEqual({
      status: 'error',
      message: 'Invalid action. Valid options are: long, short.',
      code: 'INVALID_ARGUMENT',
    });
  });

  it('defaults the funding period to a year', async () => {
    const kit = { getDriftPerpMarketFundingRate: vi.fn().mockResolvedValue({ rate: 0.1 }) };
    await getDriftPerpMarketFundingRateTool.execute(kit, '{"symbol":"SOL-PERP"}');
    expect(kit.getDriftPerpMarketFundingRate).toHaveBeenCalledWith('SOL-PERP', 'year');
  });
});

describe('coingecko_get_top_gainers', () => {
  it('defaults to all coins over 24h', async () => {
    const kit = { getTopGainers: vi.fn().mockResolvedValue([]) };
    const result = await coingeckoTopGainersTool.execute(kit, '');
    expect(result).toEqual({ status: 'success', message: 'Success', data: { top_gainers: [] } });
    expect(kit.getTopGainers).toHaveBeenCalledWith('24h', 'all');
  });

  it('accepts an integer coin count', async () => {
    const kit = { getTopGainers: vi.fn().mockResolvedValue([]) };
    await coingeckoTopGainersTool.execute(kit, '{"duration":"1h","top_coins":300}');
    expect(kit.getTopGainers).toHaveBeenCalledWith('1h', 300);
  });

  it('rejects other types', async () => {
    const result = await coingeckoTopGainersTool.execute({ getTopGainers: vi.fn() }, '{"top_coins":true}');
    expect(result).toEqual({
      status: 'error',
      message: 'Invalid type for field: top_coins (expected integer or string, received boolean)',
      code: 'INVALID_INPUT',
    });
  });
});

describe('solana_helius_create_webhook', () => {
  const webhook = {
    webhook_url: 'https://hooks.test/solana',
    transaction_types: ['TRANSFER'],
    account_addresses: ['account-1'],
    webhook_type: 'enhanced',
  };

  it('defaults the transaction status to all', async () => {
    const kit = { createWebhook: vi.fn().mockResolvedValue({ webhookID: 'wh-1' }) };
    const result = await heliusCreateWebhookTool.execute(kit, JSON.stringify(webhook));
    expect(result).toEqual({ status: 'success', message: 'Success', data: { webhook: { webhookID: 'wh-1' } } });
    expect(kit.createWebhook).toHaveBeenCalledWith({
      webhookUrl: 'https://hooks.test/solana',
      transactionTypes: ['TRANSFER'],
      accountAddresses: ['account-1'],
      webhookType: 'enhanced',
      txnStatus: 'all',
      authHeader: undefined,
    });
  });

  it('requires string lists', async () => {
    const result = await heliusCreateWebhookTool.execute(
      { createWebhook: vi.fn() },
      JSON.stringify({ ...webhook, transaction_types: [1] }),
    );
    expect(result).toEqual({
      status: 'error',
      message: 'Invalid transaction_types. Expected a list of strings.',
      code: 'INVALID_ARGUMENT',
    });
  });
});

describe('backpack', () => {
  it('forwards only declared history fields', async () => {
    const kit = { getFillHistory: vi.fn().mockResolvedValue([]) };
    await backpackGetFillHistoryTool.execute(kit, '{"symbol":"SOL_USDC","limit":50,"unexpected":true}');
    expect(kit.getFillHistory).toHaveBeenCalledWith({
      symbol: 'SOL_USDC',
      orderId: undefined,
      from: undefined,
      to: undefined,
      limit: 50,
      offset: undefined,
    });
  });

  it('passes additional withdrawal parameters through', async () => {
    const kit = { requestWithdrawal: vi.fn().mockResolvedValue({ id: 'w-1' }) };
    const payload = {
      address: 'dest',
      blockchain: 'Solana',
      quantity: '1.5',
      symbol: 'SOL',
      additional_params: { twoFactorToken: 'test-secret' },
    };
    const result = await backpackRequestWithdrawalTool.execute(kit, JSON.stringify(payload));
    expect(result).toEqual({ status: 'success', message: 'Success', data: { result: { id: 'w-1' } } });
    expect(kit.requestWithdrawal).toHaveBeenCalledWith({
      address: 'dest',
      blockchain: 'Solana',
      quantity: '1.5',
      symbol: 'SOL',
      extra: { twoFactorToken: 'test-secret' },
    });
  });
});

describe('order books', () => {
  it('validates each batch order', async () => {
    const kit = { placeBatchOrders: vi.fn() };
    const payload = {
      market_id: 'market-1',
      orders: [
        { quantity: 1, side: 'buy', price: 149 },
        { quantity: 1, side: 'sell' },
      ],
    };
    const result = await manifestPlaceBatchOrdersTool.execute(kit, JSON.stringify(payload));
    expect(result).toEqual({
      status: 'error',
      message: 'Invalid order at index 1: expected { quantity: number, side: string, price: number }',
      code: 'INVALID_ARGUMENT',
    });
    expect(kit.placeBatchOrders).not.toHaveBeenCalled();
  });

  it('applies the OpenBook lot and tick defaults', async () => {
    const kit = { createOpenbookMarket: vi.fn().mockResolvedValue(['sig-ob']) };
    await openbookCreateMarketTool.execute(kit, '{"base_mint":"base","quote_mint":"quote"}');
    expect(kit.createOpenbookMarket).toHaveBeenCalledWith({
      baseMint: 'base',
      quoteMint: 'quote',
      lotSize: 1,
      tickSize: 0.01,
    });
  });
});

describe('solana_sns_resolve', () => {
  it('reports an unknown domain', async () => {
    const result = await snsResolveTool.execute({ resolveNameToAddress: vi.fn().mockResolvedValue(null) }, '{"domain":"nobody.sol"}');
    expect(result).toEqual({ status: 'success', message: 'Domain not found.', data: { address: 'Not Found' } });
  });

  it('returns the resolved address', async () => {
    const result = await snsResolveTool.execute(
      { resolveNameToAddress: vi.fn().mockResolvedValue('owner-1') },
      '{"domain":"someone.sol"}',
    );
    expect(result).toEqual({ status: 'success', message: 'Success', data: { address: 'owner-1' } });
  });
});
