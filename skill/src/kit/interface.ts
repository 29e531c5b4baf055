/**
 * Contract of the Solana agent kit the tools delegate to.
 *
 * The kit owns wallets, signing, RPC access and every remote integration; the
 * tool layer only ever calls these methods. Results the tools pass through
 * untouched are typed `unknown`. Methods taking more than three values take a
 * single parameter object.
 */

import type { PublicKey } from '@solana/web3.js';

// ---------------------------------------------------------------------------
// Shared parameter shapes
// ---------------------------------------------------------------------------

export interface DeployTokenParams {
  decimals: number;
  initialSupply: number;
}

export interface DeployedToken {
  mint: string;
}

export interface TradeParams {
  outputMint: PublicKey;
  inputAmount: number;
  inputMint?: PublicKey;
  slippageBps: number;
}

export interface GeneratedImages {
  images: string[];
}

export interface PumpFunTokenParams {
  tokenName: string;
  tokenTicker: string;
  description: string;
  imageUrl: string;
  options?: Record<string, unknown>;
}

/** Meteora DLMM activation modes. */
export enum ActivationType {
  Slot = 0,
  Timestamp = 1,
}

export interface MeteoraDlmmPoolParams {
  binStep: number;
  tokenAMint: string;
  tokenBMint: string;
  initialPrice: number;
  priceRoundingUp: boolean;
  feeBps: number;
  activationType: ActivationType;
  hasAlphaVault: boolean;
  activationPoint?: string;
}

export interface GibworkTaskParams {
  title: string;
  content: string;
  requirements: string;
  tags: string[];
  tokenMintAddress: PublicKey;
  tokenAmount: number;
}

export interface PumpTradeParams {
  mint: PublicKey;
  bondingCurve: PublicKey;
  associatedBondingCurve: PublicKey;
  amount: number;
  slippage: number;
  maxRetries: number;
}

// Helius

export interface TimeRange {
  startSlot?: number;
  endSlot?: number;
  startTime?: number;
  endTime?: number;
}

export interface Pagination {
  limit?: number;
  paginationToken?: string;
}

export interface NftEventsQuery extends TimeRange, Pagination {
  accounts: string[];
  types?: string[];
  sources?: string[];
  firstVerifiedCreator?: string[];
  verifiedCollectionAddress?: string[];
  sortOrder?: string;
}

export interface MintlistsQuery extends Pagination {
  firstVerifiedCreators: string[];
  verifiedCollectionAddresses?: string[];
}

export interface ActiveListingsQuery extends MintlistsQuery {
  marketplaces?: string[];
}

export interface RawTransactionsQuery extends TimeRange, Pagination {
  signatures: string[];
  sortOrder?: string;
}

export interface TransactionHistoryQuery {
  address: string;
  before: string;
  until: string;
  commitment: string;
  source: string;
  type: string;
}

export interface WebhookParams {
  webhookUrl: string;
  transactionTypes: string[];
  accountAddresses: string[];
  webhookType: string;
  txnStatus: string;
  authHeader?: string;
}

// SNS

export interface DomainRegistrationParams {
  domain: string;
  buyer: string;
  buyerTokenAccount: string;
  space: number;
  mint?: string;
  referrerKey?: string;
}

// Metaplex

export interface CollectionParams {
  name: string;
  uri: string;
  royaltyBasisPoints: number;
  creatorAddress: string;
}

export interface AssetQuery {
  sortBy?: string;
  sortDirection?: string;
  limit?: number;
  page?: number;
}

export interface AssetsByCreatorQuery extends AssetQuery {
  creator: string;
  onlyVerified: boolean;
}

export interface AssetsByAuthorityQuery extends AssetQuery {
  authority: string;
}

export interface CoreNftParams {
  collectionMint: string;
  name: string;
  uri: string;
  sellerFeeBasisPoints: number;
  address: string;
  share: string;
  recipient: string;
}

// deBridge

export interface BridgeOrderParams {
  srcChainId: string;
  srcChainTokenIn: string;
  srcChainTokenInAmount: string;
  dstChainId: string;
  dstChainTokenOut: string;
  dstChainTokenOutRecipient: string;
  srcChainOrderAuthorityAddress: string;
  dstChainOrderAuthorityAddress: string;
  affiliateFeePercent: string;
  affiliateFeeRecipient: string;
  prependOperatingExpenses: boolean;
  dstChainTokenOutAmount: string;
}

// Cybers

export interface CybersCoinParams {
  name: string;
  symbol: string;
  imagePath: string;
  tweetAuthorId: string;
  tweetAuthorUsername: string;
}

// Backpack

export type BorrowLendSide = 'borrow' | 'lend';
export type OrderSide = 'Bid' | 'Ask';
export type OrderType = 'Limit' | 'Market';

export interface BackpackWithdrawalParams {
  address: string;
  blockchain: string;
  quantity: string;
  symbol: string;
  /** Extra request fields forwarded verbatim. */
  extra: Record<string, unknown>;
}

export interface BackpackAccountSettings {
  autoBorrowSettlements?: boolean;
  autoLend?: boolean;
  autoRepayBorrows?: boolean;
  leverageLimit?: string;
}

/** Filters shared by the Backpack history endpoints. */
export interface BackpackHistoryQuery {
  symbol?: string;
  orderId?: string;
  from?: number;
  to?: number;
  limit?: number;
  offset?: number;
}

export interface BackpackOrderRef {
  symbol: string;
  orderId?: string;
  clientId?: number;
}

export interface BackpackOrder {
  symbol: string;
  side: OrderSide;
  orderType: OrderType;
  quantity?: string;
  quoteQuantity?: string;
  price?: string;
  timeInForce?: string;
  clientId?: number;
  postOnly?: boolean;
}

export interface KlinesQuery {
  symbol: string;
  interval: string;
  startTime: number;
  endTime?: number;
}

export interface MarketPage {
  symbol: string;
  limit: number;
  offset: number;
}

// Adrena

export interface ClosePerpTradeParams {
  price: number;
  tradeMint: string;
}

export interface OpenPerpTradeParams {
  price: number;
  collateralAmount: number;
  collateralMint?: string;
  leverage?: number;
  tradeMint?: string;
  slippage?: number;
}

// 3Land

export interface LandCollectionParams {
  collectionSymbol: string;
  collectionName: string;
  collectionDescription: string;
  mainImageUrl?: string;
  coverImageUrl?: string;
  isDevnet: boolean;
}

export interface LandNftParams {
  itemName: string;
  sellerFee: number;
  itemAmount: number;
  itemSymbol: string;
  itemDescription: string;
  traits: string;
  price?: number;
  mainImageUrl?: string;
  coverImageUrl?: string;
  splHash?: string;
  poolName?: string;
  isDevnet: boolean;
  withPool: boolean;
}

// Drift

export type PerpAction = 'long' | 'short';
export type PerpOrderType = 'market' | 'limit';
export type FundingRatePeriod = 'year' | 'hour';

export interface DriftPerpTradeParams {
  amount: number;
  symbol: string;
  action: PerpAction;
  tradeType: PerpOrderType;
  price?: number;
}

export interface DriftSwapParams {
  fromSymbol: string;
  toSymbol: string;
  slippage?: number;
  toAmount?: number;
  fromAmount?: number;
}

export interface DriftVaultParams {
  name: string;
  marketName: string;
  redeemPeriod: number;
  maxTokens: number;
  minDepositAmount: number;
  managementFee: number;
  profitShare: number;
  hurdleRate?: number;
  permissioned?: boolean;
}

// Flash

export type FlashSide = 'buy' | 'sell';

export interface FlashTradeParams {
  token: string;
  side: FlashSide;
  collateralUsd: number;
  leverage: number;
}

// Light Protocol

export interface CompressedAirdropParams {
  mintAddress: string;
  amount: number;
  decimals: number;
  recipients: string[];
  priorityFeeInLamports: number;
  shouldLog: boolean;
}

// Manifest / OpenBook

export type BookSide = 'buy' | 'sell';

export interface BookOrder {
  quantity: number;
  side: BookSide;
  price: number;
}

export interface LimitOrderParams extends BookOrder {
  marketId: string;
}

export interface OpenbookMarketParams {
  baseMint: string;
  quoteMint: string;
  lotSize: number;
  tickSize: number;
}

// Orca

export interface ClmmParams {
  mintDeploy: string;
  mintPair: string;
  initialPrice: number;
  feeTier: string;
}

export interface LiquidityPoolParams {
  depositTokenAmount: number;
  depositTokenMint: string;
  otherTokenMint: string;
  initialPrice: number;
  maxPrice: number;
  feeTier: string;
}

export interface CenteredPositionParams {
  whirlpoolAddress: string;
  priceOffsetBps: number;
  inputTokenMint: string;
  inputAmount: number;
}

export interface SingleSidedPositionParams {
  whirlpoolAddress: string;
  distanceFromCurrentPriceBps: number;
  widthBps: number;
  inputTokenMint: string;
  inputAmount: number;
}

// Elfa AI

export interface TickerMentionsQuery {
  ticker: string;
  timeWindow: string;
  page: number;
  pageSize: number;
  includeAccountDetails: boolean;
}

export interface KeywordMentionsQuery {
  keywords: string;
  fromTimestamp: number;
  toTimestamp: number;
  limit: number;
  cursor?: string;
}

export interface TrendingTokensQuery {
  timeWindow: string;
  page: number;
  pageSize: number;
  minMentions: number;
}

// FluxBeam

export interface FluxBeamPoolParams {
  tokenA: PublicKey;
  tokenAAmount: number;
  tokenB: PublicKey;
  tokenBAmount: number;
}

// ---------------------------------------------------------------------------
// Kit contract
// ---------------------------------------------------------------------------

export interface SolanaAgentKit {
  // --- Wallet & core -------------------------------------------------------
  /** SOL balance, or the balance of an SPL token when `tokenAddress` is given. */
  getBalance(tokenAddress?: PublicKey): Promise<number>;
  transfer(to: PublicKey, amount: number, mint?: PublicKey): Promise<string>;
  deployToken(params: DeployTokenParams): Promise<DeployedToken>;
  trade(params: TradeParams): Promise<string>;
  requestFaucetFunds(): Promise<string>;
  stake(amount: number): Promise<string>;
  getWalletAddress(): Promise<string>;
  createImage(prompt: string, size: string, n: number): Promise<GeneratedImages>;
  getTps(): Promise<number>;
  burnAndCloseAccounts(tokenAccount: string): Promise<unknown>;
  multipleBurnAndCloseAccounts(tokenAccounts: string[]): Promise<unknown>;
  sendCompressedAirdrop(params: CompressedAirdropParams): Promise<string[]>;

  // --- Token data & prices -------------------------------------------------
  fetchPrice(tokenId: string): Promise<string>;
  getTokenDataByAddress(mintAddress: string): Promise<unknown>;
  getTokenDataByTicker(ticker: string): Promise<unknown>;
  pythFetchPrice(mintAddress: string): Promise<unknown>;
  storkFetchPrice(assetId: string): Promise<unknown>;
  fetchTokenReportSummary(mint: string): Promise<unknown>;
  fetchTokenDetailedReport(mint: string): Promise<unknown>;

  // --- Pump.fun & launchpads -----------------------------------------------
  launchPumpFunToken(params: PumpFunTokenParams): Promise<unknown>;
  getPumpCurveState(conn: string, curveAddress: PublicKey): Promise<unknown>;
  calculatePumpCurvePrice(curveState: string): Promise<number>;
  buyToken(params: PumpTradeParams): Promise<unknown>;
  sellToken(params: PumpTradeParams): Promise<unknown>;
  buyUsingMoonshot(mint: string, collateralAmount: number, slippageBps: number): Promise<unknown>;
  sellUsingMoonshot(mint: string, tokenBalance: number, slippageBps: number): Promise<unknown>;

  // --- AMMs ----------------------------------------------------------------
  createMeteoraDlmmPool(params: MeteoraDlmmPoolParams): Promise<unknown>;
  buyWithRaydium(pairAddress: string, solIn: number, slippage: number): Promise<unknown>;
  sellWithRaydium(pairAddress: string, percentage: number, slippage: number): Promise<unknown>;
  fluxbeamCreatePool(params: FluxBeamPoolParams): Promise<string>;
  closePosition(positionMintAddress: string): Promise<unknown>;
  createClmm(params: ClmmParams): Promise<unknown>;
  createLiquidityPool(params: LiquidityPoolParams): Promise<unknown>;
  fetchPositions(): Promise<unknown>;
  openCenteredPosition(params: CenteredPositionParams): Promise<unknown>;
  openSingleSidedPosition(params: SingleSidedPositionParams): Promise<unknown>;

  // --- Order books ---------------------------------------------------------
  createManifestMarket(baseMint: string, quoteMint: string): Promise<unknown>;
  placeLimitOrder(params: LimitOrderParams): Promise<unknown>;
  placeBatchOrders(marketId: string, orders: BookOrder[]): Promise<unknown>;
  cancelAllOrders(marketId: string): Promise<unknown>;
  withdrawAll(marketId: string): Promise<unknown>;
  createOpenbookMarket(params: OpenbookMarketParams): Promise<unknown>;

  // --- Social & tasks ------------------------------------------------------
  createGibworkTask(params: GibworkTaskParams): Promise<unknown>;
  cybersCreateCoin(params: CybersCoinParams): Promise<string>;

  // --- Helius --------------------------------------------------------------
  getBalances(address: string): Promise<unknown>;
  getAddressName(address: string): Promise<unknown>;
  getNftEvents(query: NftEventsQuery): Promise<unknown>;
  getMintlists(query: MintlistsQuery): Promise<unknown>;
  getNftFingerprint(mints: string[]): Promise<unknown>;
  getActiveListings(query: ActiveListingsQuery): Promise<unknown>;
  getNftMetadata(mintAddresses: string[]): Promise<unknown>;
  getRawTransactions(query: RawTransactionsQuery): Promise<unknown>;
  getParsedTransactions(signatures: string[], commitment?: string): Promise<unknown>;
  getParsedTransactionHistory(query: TransactionHistoryQuery): Promise<unknown>;
  createWebhook(params: WebhookParams): Promise<unknown>;
  getAllWebhooks(): Promise<unknown>;
  getWebhook(webhookId: string): Promise<unknown>;
  editWebhook(webhookId: string, params: WebhookParams): Promise<unknown>;
  deleteWebhook(webhookId: string): Promise<unknown>;

  // --- Domains -------------------------------------------------------------
  resolveNameToAddress(domain: string): Promise<string | null>;
  getRegistrationTransaction(params: DomainRegistrationParams): Promise<string>;
  getFavouriteDomain(owner: string): Promise<string | null>;
  getAllDomainsForOwner(owner: string): Promise<string[]>;
  resolveAllDomains(domain: string): Promise<string | null>;
  getOwnedDomainsForTld(tld: string): Promise<string[]>;
  getAllDomainsTlds(): Promise<string[]>;
  getOwnedAllDomains(owner: string): Promise<string[]>;

  // --- NFTs ----------------------------------------------------------------
  deployCollection(params: CollectionParams): Promise<unknown>;
  getMetaplexAsset(assetId: string): Promise<unknown>;
  getMetaplexAssetsByCreator(query: AssetsByCreatorQuery): Promise<unknown>;
  getMetaplexAssetsByAuthority(query: AssetsByAuthorityQuery): Promise<unknown>;
  mintMetaplexCoreNft(params: CoreNftParams): Promise<unknown>;
  create3LandCollection(params: LandCollectionParams): Promise<unknown>;
  create3LandNft(params: LandNftParams): Promise<unknown>;

  // --- Bridging ------------------------------------------------------------
  createDebridgeTransaction(params: BridgeOrderParams): Promise<unknown>;
  executeDebridgeTransaction(transactionData: Record<string, unknown>): Promise<unknown>;
  checkTransactionStatus(txHash: string): Promise<unknown>;

  // --- Jito ----------------------------------------------------------------
  getTipAccounts(): Promise<string[]>;
  getRandomTipAccount(): Promise<string>;
  getBundleStatuses(bundleUuids: string[]): Promise<unknown>;
  sendBundle(txnSignatures: string[]): Promise<unknown>;
  getInflightBundleStatuses(bundleUuids: string[]): Promise<unknown>;
  sendTxn(txnSignature: string, bundleOnly: boolean): Promise<unknown>;

  // --- Backpack ------------------------------------------------------------
  getAccountBalances(): Promise<unknown>;
  requestWithdrawal(params: BackpackWithdrawalParams): Promise<unknown>;
  getAccountSettings(): Promise<unknown>;
  updateAccountSettings(settings: BackpackAccountSettings): Promise<unknown>;
  getBorrowLendPositions(): Promise<unknown>;
  executeBorrowLend(quantity: string, side: BorrowLendSide, symbol: string): Promise<unknown>;
  getFillHistory(query: BackpackHistoryQuery): Promise<unknown>;
  getBorrowPositionHistory(query: BackpackHistoryQuery): Promise<unknown>;
  getFundingPayments(query: BackpackHistoryQuery): Promise<unknown>;
  getOrderHistory(query: BackpackHistoryQuery): Promise<unknown>;
  getPnlHistory(query: BackpackHistoryQuery): Promise<unknown>;
  getSettlementHistory(query: BackpackHistoryQuery): Promise<unknown>;
  getBorrowHistory(query: BackpackHistoryQuery): Promise<unknown>;
  getInterestHistory(query: BackpackHistoryQuery): Promise<unknown>;
  getUsersOpenOrders(ref: BackpackOrderRef): Promise<unknown>;
  executeOrder(order: BackpackOrder): Promise<unknown>;
  cancelOpenOrder(ref: BackpackOrderRef): Promise<unknown>;
  getOpenOrders(symbol: string): Promise<unknown>;
  cancelOpenOrders(symbol: string): Promise<unknown>;
  getSupportedAssets(): Promise<unknown>;
  getTickerInformation(symbol: string): Promise<unknown>;
  getMarkets(): Promise<unknown>;
  getMarket(symbol: string): Promise<unknown>;
  getTickers(): Promise<unknown>;
  getDepth(symbol: string): Promise<unknown>;
  getKlines(query: KlinesQuery): Promise<unknown>;
  getMarkPrice(symbol: string): Promise<unknown>;
  getOpenInterest(symbol: string): Promise<unknown>;
  getFundingIntervalRates(page: MarketPage): Promise<unknown>;
  getStatus(): Promise<unknown>;
  sendPing(): Promise<string>;
  getSystemTime(): Promise<string>;
  getRecentTrades(symbol: string, limit: number): Promise<unknown>;
  getHistoricalTrades(page: MarketPage): Promise<unknown>;
  getCollateralInfo(subAccountId?: number): Promise<unknown>;
  getAccountDeposits(subAccountId?: number): Promise<unknown>;
  getOpenPositions(): Promise<unknown>;

  // --- Adrena & Flash perpetuals -------------------------------------------
  openPerpTradeLong(params: OpenPerpTradeParams): Promise<unknown>;
  openPerpTradeShort(params: OpenPerpTradeParams): Promise<unknown>;
  closePerpTradeLong(params: ClosePerpTradeParams): Promise<unknown>;
  closePerpTradeShort(params: ClosePerpTradeParams): Promise<unknown>;
  flashOpenTrade(params: FlashTradeParams): Promise<unknown>;
  flashCloseTrade(token: string, side: FlashSide): Promise<unknown>;

  // --- Drift ---------------------------------------------------------------
  createDriftUserAccount(depositAmount: number, depositSymbol: string): Promise<unknown>;
  depositToDriftUserAccount(amount: number, symbol: string, isRepayment?: boolean): Promise<unknown>;
  withdrawFromDriftUserAccount(amount: number, symbol: string, isBorrow?: boolean): Promise<unknown>;
  tradeUsingDriftPerpAccount(params: DriftPerpTradeParams): Promise<unknown>;
  checkIfDriftAccountExists(): Promise<boolean>;
  driftUserAccountInfo(): Promise<unknown>;
  getAvailableDriftMarkets(): Promise<unknown>;
  stakeToDriftInsuranceFund(amount: number, symbol: string): Promise<unknown>;
  requestUnstakeFromDriftInsuranceFund(amount: number, symbol: string): Promise<unknown>;
  unstakeFromDriftInsuranceFund(symbol: string): Promise<unknown>;
  driftSwapSpotToken(params: DriftSwapParams): Promise<unknown>;
  getDriftPerpMarketFundingRate(symbol: string, period: FundingRatePeriod): Promise<unknown>;
  getDriftEntryQuoteOfPerpTrade(amount: number, symbol: string, action: PerpAction): Promise<unknown>;
  getDriftLendBorrowApy(symbol: string): Promise<unknown>;
  createDriftVault(params: DriftVaultParams): Promise<unknown>;
  updateDriftVaultDelegate(vault: string, delegateAddress: string): Promise<unknown>;
  updateDriftVault(vaultAddress: string, params: DriftVaultParams): Promise<unknown>;
  getDriftVaultInfo(vaultName: string): Promise<unknown>;
  depositIntoDriftVault(amount: number, vault: string): Promise<unknown>;
  requestWithdrawalFromDriftVault(amount: number, vault: string): Promise<unknown>;
  withdrawFromDriftVault(vault: string): Promise<unknown>;
  deriveDriftVaultAddress(name: string): Promise<string>;
  tradeUsingDelegatedDriftVault(vault: string, params: DriftPerpTradeParams): Promise<unknown>;

  // --- Lending -------------------------------------------------------------
  luloLend(mintAddress: PublicKey, amount: number): Promise<string>;
  luloWithdraw(mintAddress: PublicKey, amount: number): Promise<string>;

  // --- Market data ---------------------------------------------------------
  getTrendingTokens(): Promise<unknown>;
  getTrendingPools(duration: string): Promise<unknown>;
  getTopGainers(duration: string, topCoins: number | string): Promise<unknown>;
  getTokenPriceData(tokenAddresses: string[]): Promise<unknown>;
  getTokenInfo(tokenAddress: string): Promise<unknown>;
  getLatestPools(): Promise<unknown>;
  pingElfaAiApi(): Promise<unknown>;
  getElfaAiApiKeyStatus(): Promise<unknown>;
  getSmartMentions(limit: number, offset: number): Promise<unknown>;
  getTopMentionsByTicker(query: TickerMentionsQuery): Promise<unknown>;
  searchMentionsByKeywords(query: KeywordMentionsQuery): Promise<unknown>;
  getTrendingTokensUsingElfaAi(query: TrendingTokensQuery): Promise<unknown>;
  getSmartTwitterAccountStats(username: string): Promise<unknown>;
}

/** Name of a kit operation. */
export type KitMethod = keyof SolanaAgentKit;
