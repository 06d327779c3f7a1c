/**
 * Bondline: In-Process Venue
 *
 * A concentrated-liquidity venue that runs inside the settlement runtime.
 * Same surface as the external venue the exchange settles against:
 *
 *   unlock → caller.unlockCallback → swap / modifyLiquidity / settle / take
 *
 * Every currency delta opened inside the unlock must be settled before
 * unlock returns, otherwise the whole call frame reverts.
 *
 * Each pool carries a single liquidity band. Positions accrue LP fees
 * through per-pool fee growth and collect them with a zero-delta
 * modifyLiquidity.
 */

import { normalizeSuiAddress } from '@mysten/sui/utils';
import { VenueError } from './errors.js';
import { mulDiv } from './math.js';
import {
    computeExactInputSwap,
    defaultPriceLimit,
    getAmountsForLiquidity,
    getSqrtPriceAtTick,
    MAX_SQRT_PRICE,
    MIN_SQRT_PRICE,
    validateBand,
} from './pool-math.js';
import type { BandState } from './pool-math.js';
import type { Journaled, SettlementRuntime } from './runtime.js';
import {
    FEE_PIPS_DENOMINATOR,
    isUnlockCallback,
    NATIVE_CURRENCY,
    Q128,
} from './types.js';
import type {
    BalanceDelta,
    ModifyLiquidityParams,
    ModifyLiquidityResult,
    PoolKey,
    QuoteExactInputParams,
    QuoteResult,
    SettlementVenue,
    Slot0,
    SwapParams,
    VenueQuoter,
} from './types.js';

// ============================================================
// State
// ============================================================

export interface PoolState {
    key: PoolKey;
    sqrtPriceX96: bigint;

    /** Liquidity of the band, active whenever the price is inside it */
    liquidity: bigint;

    tickLower?: number;
    tickUpper?: number;
    sqrtLowerX96?: bigint;
    sqrtUpperX96?: bigint;

    feeGrowthGlobal0X128: bigint;
    feeGrowthGlobal1X128: bigint;
}

export interface PositionState {
    owner: string;
    liquidity: bigint;
    feeGrowthInside0LastX128: bigint;
    feeGrowthInside1LastX128: bigint;
}

interface VenueSnapshot {
    pools: Map<string, PoolState>;
    positions: Map<string, PositionState>;
    locker: string | null;
    deltas: Map<string, bigint>;
}

/** Stable identifier for a pool key */
export function poolId(key: PoolKey): string {
    return [
        normalizeSuiAddress(key.currency0),
        normalizeSuiAddress(key.currency1),
        key.fee,
        key.tickSpacing,
    ].join(':');
}

function bandOf(pool: PoolState): BandState {
    return {
        sqrtPriceX96: pool.sqrtPriceX96,
        liquidity: pool.liquidity,
        sqrtLowerX96: pool.sqrtLowerX96,
        sqrtUpperX96: pool.sqrtUpperX96,
        feePips: pool.key.fee,
    };
}

function positionId(key: PoolKey, owner: string, tickLower: number, tickUpper: number): string {
    return `${poolId(key)}:${normalizeSuiAddress(owner)}:${tickLower}:${tickUpper}`;
}

// ============================================================
// Venue
// ============================================================

export class MemoryVenue implements SettlementVenue, VenueQuoter, Journaled<VenueSnapshot> {
    readonly address: string;

    private runtime: SettlementRuntime;
    private pools: Map<string, PoolState> = new Map();
    private positions: Map<string, PositionState> = new Map();

    /** Address holding the current unlock, null while locked */
    private locker: string | null = null;

    /** Per-currency balance owed to (+) or by (−) the locker */
    private deltas: Map<string, bigint> = new Map();

    constructor(runtime: SettlementRuntime, address: string = runtime.nextAddress()) {
        this.runtime = runtime;
        this.address = normalizeSuiAddress(address);
        runtime.register(this);
        runtime.track(this);
    }

    // --------------------------------------------------------
    // Pools
    // --------------------------------------------------------

    initialize(key: PoolKey, sqrtPriceX96: bigint): void {
        const id = poolId(key);
        if (this.pools.has(id)) {
            throw new VenueError('POOL_ALREADY_INITIALIZED', `Pool ${id} already initialized`);
        }
        if (sqrtPriceX96 < MIN_SQRT_PRICE || sqrtPriceX96 >= MAX_SQRT_PRICE) {
            throw new VenueError('PRICE_LIMIT_OUT_OF_BOUNDS', `Initial price ${sqrtPriceX96} out of bounds`);
        }
        if (!Number.isInteger(key.fee) || key.fee < 0 || BigInt(key.fee) >= FEE_PIPS_DENOMINATOR) {
            throw new VenueError('INVALID_RANGE', `LP fee ${key.fee} out of range`);
        }

        this.pools.set(id, {
            key: { ...key },
            sqrtPriceX96,
            liquidity: 0n,
            feeGrowthGlobal0X128: 0n,
            feeGrowthGlobal1X128: 0n,
        });
    }

    isInitialized(key: PoolKey): boolean {
        return this.pools.has(poolId(key));
    }

    getSlot0(key: PoolKey): Slot0 {
        return { sqrtPriceX96: this.requirePool(key).sqrtPriceX96 };
    }

    // --------------------------------------------------------
    // Unlock
    // --------------------------------------------------------

    /**
     * Hand control to the caller's unlockCallback, then require that
     * every delta it opened has been settled.
     */
    unlock(payload: Uint8Array): Uint8Array {
        const { sender } = this.runtime.msg();
        if (this.locker !== null) {
            throw new VenueError('ALREADY_UNLOCKED', `Venue already unlocked by ${this.locker}`);
        }

        const target = this.runtime.resolve(sender);
        if (!isUnlockCallback(target)) {
            throw new VenueError('INVALID_CALLBACK_TARGET', `${sender} cannot receive unlock callbacks`);
        }

        this.locker = sender;
        this.deltas = new Map();
        try {
            const result = this.runtime.call(
                { from: this.address, to: sender },
                () => target.unlockCallback(payload),
            );

            for (const [currency, delta] of this.deltas) {
                if (delta !== 0n) {
                    throw new VenueError('CURRENCY_NOT_SETTLED', `Delta of ${delta} left open on ${currency}`);
                }
            }
            return result;
        } finally {
            this.locker = null;
            this.deltas = new Map();
        }
    }

    // --------------------------------------------------------
    // Swaps
    // --------------------------------------------------------

    /** Exact-input swap. Negative `amountSpecified` is the amount paid in. */
    swap(key: PoolKey, params: SwapParams): BalanceDelta {
        this.requireLocker();
        const pool = this.requirePool(key);

        if (params.amountSpecified >= 0n) {
            throw new VenueError('INVALID_AMOUNT', 'Only exact-input swaps are supported');
        }

        const result = computeExactInputSwap(
            bandOf(pool),
            params.zeroForOne,
            -params.amountSpecified,
            params.sqrtPriceLimitX96,
        );

        pool.sqrtPriceX96 = result.sqrtPriceX96After;
        if (result.feeAmount > 0n && pool.liquidity > 0n) {
            const growth = mulDiv(result.feeAmount, Q128, pool.liquidity);
            if (params.zeroForOne) pool.feeGrowthGlobal0X128 += growth;
            else pool.feeGrowthGlobal1X128 += growth;
        }

        const delta: BalanceDelta = params.zeroForOne
            ? { amount0: -result.amountIn, amount1: result.amountOut }
            : { amount0: result.amountOut, amount1: -result.amountIn };

        this.accountDelta(pool.key, delta);
        return delta;
    }

    quoteExactInputSingle(params: QuoteExactInputParams): QuoteResult {
        const pool = this.requirePool(params.key);
        const limit = params.sqrtPriceLimitX96 ?? defaultPriceLimit(params.zeroForOne);
        const result = computeExactInputSwap(bandOf(pool), params.zeroForOne, params.exactAmount, limit);
        return {
            amountIn: result.amountIn,
            amountOut: result.amountOut,
            sqrtPriceX96After: result.sqrtPriceX96After,
        };
    }

    // --------------------------------------------------------
    // Liquidity
    // --------------------------------------------------------

    /**
     * Add or remove band liquidity for the locker. A zero delta only
     * collects accrued fees.
     */
    modifyLiquidity(key: PoolKey, params: ModifyLiquidityParams): ModifyLiquidityResult {
        const owner = this.requireLocker();
        const pool = this.requirePool(key);
        const { tickLower, tickUpper, liquidityDelta } = params;

        validateBand(tickLower, tickUpper, key.tickSpacing);
        this.bindBand(pool, tickLower, tickUpper);

        const id = positionId(key, owner, tickLower, tickUpper);
        const position: PositionState = this.positions.get(id) ?? {
            owner,
            liquidity: 0n,
            feeGrowthInside0LastX128: pool.feeGrowthGlobal0X128,
            feeGrowthInside1LastX128: pool.feeGrowthGlobal1X128,
        };

        const nextLiquidity = position.liquidity + liquidityDelta;
        if (nextLiquidity < 0n) {
            throw new VenueError('INSUFFICIENT_LIQUIDITY', `Position holds ${position.liquidity}, cannot remove ${-liquidityDelta}`);
        }

        // Collect fees on the liquidity held before this change
        const feesAccrued: BalanceDelta = {
            amount0: mulDiv(pool.feeGrowthGlobal0X128 - position.feeGrowthInside0LastX128, position.liquidity, Q128),
            amount1: mulDiv(pool.feeGrowthGlobal1X128 - position.feeGrowthInside1LastX128, position.liquidity, Q128),
        };
        position.feeGrowthInside0LastX128 = pool.feeGrowthGlobal0X128;
        position.feeGrowthInside1LastX128 = pool.feeGrowthGlobal1X128;

        let principal: BalanceDelta = { amount0: 0n, amount1: 0n };
        if (liquidityDelta !== 0n && pool.sqrtLowerX96 !== undefined && pool.sqrtUpperX96 !== undefined) {
            const adding = liquidityDelta > 0n;
            const amounts = getAmountsForLiquidity(
                pool.sqrtPriceX96,
                pool.sqrtLowerX96,
                pool.sqrtUpperX96,
                adding ? liquidityDelta : -liquidityDelta,
                adding,
            );
            principal = adding
                ? { amount0: -amounts.amount0, amount1: -amounts.amount1 }
                : { amount0: amounts.amount0, amount1: amounts.amount1 };
        }

        position.liquidity = nextLiquidity;
        pool.liquidity += liquidityDelta;
        this.positions.set(id, position);

        const callerDelta: BalanceDelta = {
            amount0: principal.amount0 + feesAccrued.amount0,
            amount1: principal.amount1 + feesAccrued.amount1,
        };
        this.accountDelta(pool.key, callerDelta);

        return { callerDelta, feesAccrued };
    }

    // --------------------------------------------------------
    // Settlement
    // --------------------------------------------------------

    /**
     * Pay into the venue. The native asset arrives as the call's value;
     * other currencies are pulled from the caller.
     */
    settle(currency: string, amount: bigint): void {
        const locker = this.requireLocker();
        const frame = this.runtime.msg();
        const asset = normalizeSuiAddress(currency);

        if (amount <= 0n) {
            throw new VenueError('INVALID_AMOUNT', `Settle amount must be positive, got ${amount}`);
        }

        if (asset === NATIVE_CURRENCY) {
            if (frame.value !== amount) {
                throw new VenueError('INVALID_AMOUNT', `Sent ${frame.value} native, settling ${amount}`);
            }
        } else {
            this.runtime.ledger.transfer(asset, locker, this.address, amount);
        }

        this.addDelta(asset, amount);
    }

    /** Withdraw what the venue owes the locker, delivered to `to` */
    take(currency: string, to: string, amount: bigint): void {
        this.requireLocker();
        const asset = normalizeSuiAddress(currency);

        if (amount <= 0n) {
            throw new VenueError('INVALID_AMOUNT', `Take amount must be positive, got ${amount}`);
        }

        this.addDelta(asset, -amount);
        this.runtime.ledger.transfer(asset, this.address, to, amount);
    }

    // --------------------------------------------------------
    // Journaling
    // --------------------------------------------------------

    snapshot(): VenueSnapshot {
        const pools = new Map<string, PoolState>();
        for (const [id, pool] of this.pools) pools.set(id, { ...pool, key: { ...pool.key } });

        const positions = new Map<string, PositionState>();
        for (const [id, position] of this.positions) positions.set(id, { ...position });

        return { pools, positions, locker: this.locker, deltas: new Map(this.deltas) };
    }

    restore(snapshot: VenueSnapshot): void {
        this.pools = snapshot.pools;
        this.positions = snapshot.positions;
        this.locker = snapshot.locker;
        this.deltas = snapshot.deltas;
    }

    // --------------------------------------------------------
    // Internals
    // --------------------------------------------------------

    private requirePool(key: PoolKey): PoolState {
        const pool = this.pools.get(poolId(key));
        if (!pool) {
            throw new VenueError('POOL_NOT_INITIALIZED', `Pool ${poolId(key)} is not initialized`);
        }
        return pool;
    }

    /** Returns the locker; only it may act while unlocked */
    private requireLocker(): string {
        if (this.locker === null) {
            throw new VenueError('NOT_UNLOCKED', 'Venue is locked');
        }
        const { sender } = this.runtime.msg();
        if (sender !== this.locker) {
            throw new VenueError('NOT_LOCKER', `${sender} is not the current locker`);
        }
        return this.locker;
    }

    private bindBand(pool: PoolState, tickLower: number, tickUpper: number): void {
        if (pool.tickLower === undefined || pool.tickUpper === undefined) {
            pool.tickLower = tickLower;
            pool.tickUpper = tickUpper;
            pool.sqrtLowerX96 = getSqrtPriceAtTick(tickLower);
            pool.sqrtUpperX96 = getSqrtPriceAtTick(tickUpper);
            return;
        }
        if (pool.tickLower !== tickLower || pool.tickUpper !== tickUpper) {
            throw new VenueError(
                'UNSUPPORTED_RANGE',
                `Pool band is [${pool.tickLower}, ${pool.tickUpper}], got [${tickLower}, ${tickUpper}]`,
            );
        }
    }

    private accountDelta(key: PoolKey, delta: BalanceDelta): void {
        if (delta.amount0 !== 0n) this.addDelta(normalizeSuiAddress(key.currency0), delta.amount0);
        if (delta.amount1 !== 0n) this.addDelta(normalizeSuiAddress(key.currency1), delta.amount1);
    }

    /** Caller-side delta: settle adds, take subtracts, swap output adds */
    private addDelta(currency: string, amount: bigint): void {
        this.deltas.set(currency, (this.deltas.get(currency) ?? 0n) + amount);
    }
}
