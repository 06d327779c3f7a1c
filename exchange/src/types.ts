/**
 * Bondline: Shared Types
 *
 * Core interfaces used across the trade engine, the burn accumulator,
 * the settlement runtime and the venue they settle against.
 */

import { normalizeSuiAddress } from '@mysten/sui/utils';

// ============================================================
// Scaling
// ============================================================

/** Basis-point denominator: 10_000 bps = 100% */
export const BPS_DENOMINATOR = 10_000n;

/** Scaling factor for reported effective prices (funding per token): 1e18 */
export const PRICE_SCALING = 1_000_000_000_000_000_000n;

/** Fixed-point base for sqrt prices: Q64.96 */
export const Q96 = 1n << 96n;

/** Fixed-point base for fee growth accumulators: Q128 */
export const Q128 = 1n << 128n;

/** LP fee denominator (fee pips): 1_000_000 = 100% */
export const FEE_PIPS_DENOMINATOR = 1_000_000n;

// ============================================================
// Addresses
// ============================================================

/** The zero address. Used as "no referrer" and as the native asset id. */
export const ZERO_ADDRESS = normalizeSuiAddress('0x0');

/** Funding asset (native currency) identifier */
export const NATIVE_CURRENCY = ZERO_ADDRESS;

/** Default burn sink. Nothing holds a key for it. */
export const DEFAULT_BURN_SINK = normalizeSuiAddress('0xdead');

// ============================================================
// Venue
// ============================================================

/**
 * Identifies one pool on the venue. `currency0` always sorts before
 * `currency1`, so the native asset is always `currency0`.
 */
export interface PoolKey {
    currency0: string;
    currency1: string;

    /** LP fee in pips (3000 = 0.3%) */
    fee: number;

    tickSpacing: number;
}

/** Signed amounts from the caller's perspective: negative = owed to the venue */
export interface BalanceDelta {
    amount0: bigint;
    amount1: bigint;
}

export interface SwapParams {
    zeroForOne: boolean;

    /** Exact input only: must be negative (amount the caller pays in) */
    amountSpecified: bigint;

    sqrtPriceLimitX96: bigint;
}

export interface ModifyLiquidityParams {
    tickLower: number;
    tickUpper: number;
    liquidityDelta: bigint;
}

export interface ModifyLiquidityResult {
    /** Principal plus collected fees, signed from the caller's side */
    callerDelta: BalanceDelta;

    /** Fees collected by this call (never negative) */
    feesAccrued: BalanceDelta;
}

export interface Slot0 {
    sqrtPriceX96: bigint;
}

export interface QuoteExactInputParams {
    key: PoolKey;
    zeroForOne: boolean;
    exactAmount: bigint;
    sqrtPriceLimitX96?: bigint;
}

export interface QuoteResult {
    /** Input actually consumed (fee included) */
    amountIn: bigint;
    amountOut: bigint;
    sqrtPriceX96After: bigint;
}

/**
 * External market-making venue. Swaps and liquidity changes are only
 * possible inside `unlock`, which calls `unlockCallback` on the caller
 * before returning and then requires every currency delta to be settled.
 */
export interface SettlementVenue {
    readonly address: string;

    initialize(key: PoolKey, sqrtPriceX96: bigint): void;
    isInitialized(key: PoolKey): boolean;
    getSlot0(key: PoolKey): Slot0;

    unlock(payload: Uint8Array): Uint8Array;

    swap(key: PoolKey, params: SwapParams): BalanceDelta;
    modifyLiquidity(key: PoolKey, params: ModifyLiquidityParams): ModifyLiquidityResult;

    /** Pay `amount` of `currency` from the caller into the venue */
    settle(currency: string, amount: bigint): void;

    /** Withdraw `amount` of `currency` owed to the caller, delivered to `to` */
    take(currency: string, to: string, amount: bigint): void;
}

/** Read-only price simulation, usable outside the locked region */
export interface VenueQuoter {
    quoteExactInputSingle(params: QuoteExactInputParams): QuoteResult;
}

/** Implemented by every contract that opens an unlock on the venue */
export interface UnlockCallback {
    readonly address: string;
    unlockCallback(payload: Uint8Array): Uint8Array;
}

export function isUnlockCallback(value: unknown): value is UnlockCallback {
    return (
        typeof value === 'object' &&
        value !== null &&
        'unlockCallback' in value &&
        typeof value.unlockCallback === 'function'
    );
}

// ============================================================
// Settlement Context
// ============================================================

export type SettlementKind = 'seed' | 'buy' | 'sell' | 'harvest' | 'flush';

/**
 * Everything the unlock callback needs to re-derive and validate
 * the operation it is settling. Lives only while one venue
 * interaction is in flight.
 */
export interface SettlementContext {
    kind: SettlementKind;

    /** Exact input for swaps, liquidity for seeding, 0 for harvest */
    amount: bigint;

    /** 0n means "no limit" */
    sqrtPriceLimitX96: bigint;

    /** Output floor enforced inside the callback, 0n for none */
    minAmountOut: bigint;

    /** Address that started the operation */
    requester: string;

    /** Address the output is meant for */
    recipient: string;
}

// ============================================================
// Fees
// ============================================================

export type FeeShareName = 'creator' | 'burn' | 'protocol' | 'referrer';

export interface FeeSplit {
    creatorFee: bigint;
    burnFee: bigint;
    protocolFee: bigint;
    referrerFee: bigint;
}

// ============================================================
// Token State
// ============================================================

export interface TokenState {
    name: string;
    symbol: string;

    /** Token creator, receives the creator allocation and creator fees */
    creator: string;

    /** Supply minted at initialization. Trading never mints beyond it. */
    initialSupply: bigint;

    creatorAllocation: bigint;
    liquiditySeed: bigint;

    /** Liquidity placed in the venue position at initialization */
    positionLiquidity: bigint;

    poolKey: PoolKey;
    tickLower: number;
    tickUpper: number;
}

// ============================================================
// Trades
// ============================================================

export type TradeSide = 'buy' | 'sell';

export interface BuyParams {
    recipient: string;

    /** ZERO_ADDRESS for no referrer */
    referrer?: string;

    /** Minimum tokens the buyer accepts */
    minOutput?: bigint;

    /** Venue price limit, omitted for none */
    sqrtPriceLimitX96?: bigint;
}

export interface SellParams {
    amount: bigint;
    recipient: string;
    referrer?: string;

    /** Minimum funding-asset payout, checked after the fee */
    minPayout?: bigint;

    sqrtPriceLimitX96?: bigint;
}

export interface BuyQuote {
    feeBps: number;
    fee: bigint;
    net: bigint;
    estimatedOutput: bigint;
    estimatedPostPrice: bigint;
}

export interface SellQuote {
    feeBps: number;
    fee: bigint;
    tokenIn: bigint;
    estimatedPayout: bigint;
    estimatedPostPrice: bigint;
}

export interface HarvestResult {
    /** Funding asset collected from the position */
    fees0: bigint;

    /** Traded asset collected from the position */
    fees1: bigint;

    creatorFunding: bigint;
    protocolFunding: bigint;
    creatorTokens: bigint;
    protocolTokens: bigint;
}

// ============================================================
// Events
// ============================================================

export interface TradeSettledEvent {
    type: 'TradeSettled';
    emitter: string;
    side: TradeSide;
    trader: string;
    recipient: string;
    referrer: string;

    /** Funding in (buy) or swap proceeds (sell) */
    gross: bigint;
    fee: bigint;

    /** Funding swapped (buy) or payout after fee (sell) */
    net: bigint;

    /** What the recipient received: tokens (buy) or funding (sell) */
    output: bigint;

    /** Tokens out (buy) or in (sell) */
    tokenAmount: bigint;

    fees: FeeSplit;
    burnDeposited: boolean;

    /** Fee moved to the protocol because a recipient was unreachable */
    redirectedToProtocol: bigint;

    sqrtPriceBeforeX96: bigint;
    sqrtPriceAfterX96: bigint;

    /** Funding per token, PRICE_SCALING scaled */
    effectivePrice: bigint;
}

export interface FeeRedirectedEvent {
    type: 'FeeRedirected';
    emitter: string;
    share: FeeShareName;
    intendedRecipient: string;
    amount: bigint;
}

export interface SecondaryRewardsHarvestedEvent extends HarvestResult {
    type: 'SecondaryRewardsHarvested';
    emitter: string;
}

export interface TokenInitializedEvent {
    type: 'TokenInitialized';
    emitter: string;
    creator: string;
    initialSupply: bigint;
    creatorAllocation: bigint;
    liquiditySeed: bigint;
    positionLiquidity: bigint;
    sqrtPriceX96: bigint;
}

export interface TokensBurnedEvent {
    type: 'TokensBurned';
    emitter: string;
    from: string;
    amount: bigint;
}

export interface BurnDepositEvent {
    type: 'BurnDeposit';
    emitter: string;
    from: string;
    amount: bigint;
    accepted: boolean;
    pendingAfter: bigint;
}

export interface BurnFlushedEvent {
    type: 'BurnFlushed';
    emitter: string;
    caller: string;
    amountIn: bigint;
    amountOut: bigint;
    minAmountOut: bigint;
    targetAsset: string;
    sink: string;
}

export interface BurnFlushFailedEvent {
    type: 'BurnFlushFailed';
    emitter: string;
    pending: bigint;
    reason: string;
}

export type ExchangeEvent =
    | TradeSettledEvent
    | FeeRedirectedEvent
    | SecondaryRewardsHarvestedEvent
    | TokenInitializedEvent
    | TokensBurnedEvent
    | BurnDepositEvent
    | BurnFlushedEvent
    | BurnFlushFailedEvent;

export type ExchangeEventType = ExchangeEvent['type'];
