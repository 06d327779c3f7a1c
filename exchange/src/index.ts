/**
 * Bondline: Exchange
 *
 * @module @bondline/exchange
 *
 * Architecture:
 *
 *   ┌──────────────────────────────────────────────────────────┐
 *   │                     TradeEngine                          │
 *   │  (buy / sell / harvest: fee → guarded unlock → payout)   │
 *   └───────┬──────────────────┬───────────────────┬───────────┘
 *           │                  │                   │
 *   ┌───────▼───────┐  ┌───────▼────────┐  ┌───────▼─────────┐
 *   │ FeeWaterfall  │  │SettlementGuard │  │ BurnAccumulator │
 *   │ (split, pay,  │  │ (single-flight │  │ (buffer, flush  │
 *   │  redirect)    │  │  callbacks)    │  │  to the sink)   │
 *   └───────────────┘  └───────┬────────┘  └───────┬─────────┘
 *                              │                   │
 *                       ┌──────▼───────────────────▼──┐
 *                       │ SettlementVenue (unlock →   │
 *                       │ callback → swap / settle)   │
 *                       └─────────────────────────────┘
 */

// Core types
export {
    BPS_DENOMINATOR,
    PRICE_SCALING,
    Q96,
    Q128,
    FEE_PIPS_DENOMINATOR,
    ZERO_ADDRESS,
    NATIVE_CURRENCY,
    DEFAULT_BURN_SINK,
    isUnlockCallback,
} from './types.js';
export type {
    PoolKey,
    BalanceDelta,
    SwapParams,
    ModifyLiquidityParams,
    ModifyLiquidityResult,
    Slot0,
    QuoteExactInputParams,
    QuoteResult,
    SettlementVenue,
    VenueQuoter,
    UnlockCallback,
    SettlementKind,
    SettlementContext,
    FeeShareName,
    FeeSplit,
    TokenState,
    TradeSide,
    BuyParams,
    SellParams,
    BuyQuote,
    SellQuote,
    HarvestResult,
    TradeSettledEvent,
    FeeRedirectedEvent,
    SecondaryRewardsHarvestedEvent,
    TokenInitializedEvent,
    TokensBurnedEvent,
    BurnDepositEvent,
    BurnFlushedEvent,
    BurnFlushFailedEvent,
    ExchangeEvent,
    ExchangeEventType,
} from './types.js';

// Errors
export {
    ExchangeError,
    ValidationError,
    SlippageError,
    FeeRecipientError,
    AccumulatorError,
    VenueError,
    GuardViolationError,
    ConfigError,
    LedgerError,
    isExchangeError,
    describeError,
} from './errors.js';
export type {
    ErrorCategory,
    ValidationCode,
    SlippageCode,
    FeeRecipientCode,
    AccumulatorCode,
    VenueCode,
    GuardCode,
    ConfigCode,
    LedgerCode,
} from './errors.js';

// Math
export {
    ceilDiv,
    mulDiv,
    mulDivRoundingUp,
    applyBps,
    applySlippage,
    calculatePrice,
    toRaw,
    fromRaw,
} from './math.js';

// Pool math
export {
    MIN_TICK,
    MAX_TICK,
    MIN_SQRT_PRICE,
    MAX_SQRT_PRICE,
    getSqrtPriceAtTick,
    getAmount0Delta,
    getAmount1Delta,
    getNextSqrtPriceFromInput,
    computeSwapStep,
    computeExactInputSwap,
    defaultPriceLimit,
    getLiquidityForAmount1,
    getAmountsForLiquidity,
} from './pool-math.js';
export type { BandState, SwapStep, SwapComputation } from './pool-math.js';

// Logging and configuration
export { createLogger, resolveLogLevel, isLogLevel } from './logger.js';
export type { Logger, LogLevel } from './logger.js';
export {
    ConfigStore,
    DEFAULT_FEE_CONFIG,
    DEFAULT_MARKET_CONFIG,
    validateFeeConfig,
    validateMarketConfig,
    loadConfigFromEnv,
} from './config.js';
export type { FeeConfig, MarketConfig, ExchangeConfig, ExchangeConfigReader } from './config.js';

// Execution substrate
export { SettlementRuntime } from './runtime.js';
export type { Journaled, CallFrame, CallRequest, CallOutcome } from './runtime.js';
export { Ledger } from './ledger.js';
export type { LedgerSnapshot } from './ledger.js';
export { EventLog } from './event-log.js';
export { MemoryVenue, poolId } from './memory-venue.js';
export type { PoolState, PositionState } from './memory-venue.js';

// Settlement
export {
    encodeSettlementContext,
    decodeSettlementContext,
    encodeSwapOutcome,
    decodeSwapOutcome,
    encodeAmountsOutcome,
    decodeAmountsOutcome,
} from './settlement-codec.js';
export type { SwapOutcome, AmountsOutcome } from './settlement-codec.js';
export { SettlementGuard } from './settlement-guard.js';
export type { GuardState } from './settlement-guard.js';

// Fees
export {
    computeTradeFee,
    splitFee,
    validateFeeShares,
    runPayoutWaterfall,
    HARVEST_SHARES,
} from './fee-waterfall.js';
export type { FeeShares, TradeFee, PayoutStep, FinalPayout, PayoutAttempt, PayoutReport, FeeRedirect } from './fee-waterfall.js';

// Trade engine and burn accumulator
export { TradeEngine } from './trade-engine.js';
export type { TradeEngineOptions, InitializeParams, TradeWithHarvest, BurnDepositTarget } from './trade-engine.js';
export { BurnAccumulator, validateAccumulatorConfig } from './burn-accumulator.js';
export type { BurnAccumulatorConfig, BurnAccumulatorOptions } from './burn-accumulator.js';

// History
export { TradeHistory } from './trade-history.js';
export type { TradeRecord, TraderStats, FeeTotals, BurnTotals, HarvestTotals, TradeFilter } from './trade-history.js';
