/**
 * Bondline: Pool Math
 *
 * Concentrated-liquidity arithmetic in Q64.96, matching the venue's
 * integer semantics so quotes reproduce execution exactly.
 *
 * Price representation: sqrt(currency1 per currency0) * 2^96.
 * Rounding: amounts owed to the pool round UP, amounts paid out round DOWN.
 *
 * A pool here holds a single liquidity band [sqrtLower, sqrtUpper].
 * Outside the band there is no liquidity and the price moves freely.
 */

import { VenueError } from './errors.js';
import { ceilDiv, mulDiv, mulDivRoundingUp } from './math.js';
import { FEE_PIPS_DENOMINATOR, Q96 } from './types.js';

// ============================================================
// Constants
// ============================================================

export const MIN_TICK = -887272;
export const MAX_TICK = 887272;

/** getSqrtPriceAtTick(MIN_TICK) */
export const MIN_SQRT_PRICE = 4295128739n;

/** getSqrtPriceAtTick(MAX_TICK) */
export const MAX_SQRT_PRICE = 1461446703485210103287273052203988822378723970342n;

const MAX_UINT256 = (1n << 256n) - 1n;

/** Per-bit multipliers of 1/sqrt(1.0001)^(2^i), Q128 */
const TICK_MULTIPLIERS: ReadonlyArray<readonly [bigint, bigint]> = [
    [0x2n, 0xfff97272373d413259a46990580e213an],
    [0x4n, 0xfff2e50f5f656932ef12357cf3c7fdccn],
    [0x8n, 0xffe5caca7e10e4e61c3624eaa0941cd0n],
    [0x10n, 0xffcb9843d60f6159c9db58835c926644n],
    [0x20n, 0xff973b41fa98c081472e6896dfb254c0n],
    [0x40n, 0xff2ea16466c96a3843ec78b326b52861n],
    [0x80n, 0xfe5dee046a99a2a811c461f1969c3053n],
    [0x100n, 0xfcbe86c7900a88aedcffc83b479aa3a4n],
    [0x200n, 0xf987a7253ac413176f2b074cf7815e54n],
    [0x400n, 0xf3392b0822b70005940c7a398e4b70f3n],
    [0x800n, 0xe7159475a2c29b7443b29c7fa6e889d9n],
    [0x1000n, 0xd097f3bdfd2022b8845ad8f792aa5825n],
    [0x2000n, 0xa9f746462d870fdf8a65dc1f90e061e5n],
    [0x4000n, 0x70d869a156d2a1b890bb3df62baf32f7n],
    [0x8000n, 0x31be135f97d08fd981231505542fcfa6n],
    [0x10000n, 0x9aa508b5b7a84e1c677de54f3e99bc9n],
    [0x20000n, 0x5d6af8dedb81196699c329225ee604n],
    [0x40000n, 0x2216e584f5fa1ea926041bedfe98n],
    [0x80000n, 0x48a170391f7dc42444e8fa2n],
];

// ============================================================
// Ticks
// ============================================================

/** sqrt(1.0001^tick) * 2^96, rounded up */
export function getSqrtPriceAtTick(tick: number): bigint {
    if (!Number.isInteger(tick) || tick < MIN_TICK || tick > MAX_TICK) {
        throw new VenueError('INVALID_RANGE', `Tick ${tick} outside [${MIN_TICK}, ${MAX_TICK}]`);
    }

    const absTick = BigInt(Math.abs(tick));
    let ratio = (absTick & 0x1n) !== 0n
        ? 0xfffcb933bd6fad37aa2d162d1a594001n
        : 0x100000000000000000000000000000000n;

    for (const [bit, multiplier] of TICK_MULTIPLIERS) {
        if ((absTick & bit) !== 0n) ratio = (ratio * multiplier) >> 128n;
    }

    if (tick > 0) ratio = MAX_UINT256 / ratio;

    // Q128 → Q96, rounding up
    return (ratio >> 32n) + (ratio % (1n << 32n) === 0n ? 0n : 1n);
}

/** Band ticks must be ordered, in range and on the tick spacing */
export function validateBand(tickLower: number, tickUpper: number, tickSpacing: number): void {
    if (!Number.isInteger(tickSpacing) || tickSpacing <= 0) {
        throw new VenueError('INVALID_RANGE', `Tick spacing must be a positive integer, got ${tickSpacing}`);
    }
    if (tickLower >= tickUpper) {
        throw new VenueError('INVALID_RANGE', `tickLower ${tickLower} must be below tickUpper ${tickUpper}`);
    }
    if (tickLower < MIN_TICK || tickUpper > MAX_TICK) {
        throw new VenueError('INVALID_RANGE', `Band [${tickLower}, ${tickUpper}] outside the tick range`);
    }
    if (tickLower % tickSpacing !== 0 || tickUpper % tickSpacing !== 0) {
        throw new VenueError('INVALID_RANGE', `Band [${tickLower}, ${tickUpper}] not aligned to spacing ${tickSpacing}`);
    }
}

// ============================================================
// Amount Deltas
// ============================================================

/** currency0 between two prices for `liquidity`: L * (sqrtB - sqrtA) / (sqrtA * sqrtB) */
export function getAmount0Delta(
    sqrtA: bigint,
    sqrtB: bigint,
    liquidity: bigint,
    roundUp: boolean,
): bigint {
    const [lower, upper] = sqrtA <= sqrtB ? [sqrtA, sqrtB] : [sqrtB, sqrtA];
    if (lower <= 0n) throw new VenueError('INVALID_RANGE', 'Sqrt price must be positive');

    const numerator1 = liquidity << 96n;
    const numerator2 = upper - lower;

    return roundUp
        ? ceilDiv(mulDivRoundingUp(numerator1, numerator2, upper), lower)
        : mulDiv(numerator1, numerator2, upper) / lower;
}

/** currency1 between two prices for `liquidity`: L * (sqrtB - sqrtA) */
export function getAmount1Delta(
    sqrtA: bigint,
    sqrtB: bigint,
    liquidity: bigint,
    roundUp: boolean,
): bigint {
    const [lower, upper] = sqrtA <= sqrtB ? [sqrtA, sqrtB] : [sqrtB, sqrtA];
    return roundUp
        ? mulDivRoundingUp(liquidity, upper - lower, Q96)
        : mulDiv(liquidity, upper - lower, Q96);
}

// ============================================================
// Next Price
// ============================================================

/**
 * Price after adding `amountIn` to the pool.
 * Rounds so the price never moves further than the input pays for.
 */
export function getNextSqrtPriceFromInput(
    sqrtPriceX96: bigint,
    liquidity: bigint,
    amountIn: bigint,
    zeroForOne: boolean,
): bigint {
    if (sqrtPriceX96 <= 0n || liquidity <= 0n) {
        throw new VenueError('INSUFFICIENT_LIQUIDITY', 'Price and liquidity must be positive');
    }
    if (amountIn === 0n) return sqrtPriceX96;

    if (zeroForOne) {
        // currency0 in: sqrtP' = L * sqrtP / (L + amount * sqrtP), rounded up
        const numerator1 = liquidity << 96n;
        return mulDivRoundingUp(numerator1, sqrtPriceX96, numerator1 + amountIn * sqrtPriceX96);
    }

    // currency1 in: sqrtP' = sqrtP + amount / L, rounded down
    return sqrtPriceX96 + (amountIn << 96n) / liquidity;
}

// ============================================================
// Swap Step
// ============================================================

export interface SwapStep {
    sqrtPriceNextX96: bigint;
    amountIn: bigint;
    amountOut: bigint;
    feeAmount: bigint;
}

/**
 * One exact-input step inside a region of constant liquidity.
 *
 * If the whole remaining input does not carry the price past `target`,
 * all of it is consumed; otherwise the step stops exactly at `target`.
 * `amountIn + feeAmount` never exceeds `amountRemaining`.
 */
export function computeSwapStep(
    sqrtCurrentX96: bigint,
    sqrtTargetX96: bigint,
    liquidity: bigint,
    amountRemaining: bigint,
    feePips: number,
): SwapStep {
    const zeroForOne = sqrtCurrentX96 >= sqrtTargetX96;
    const fee = BigInt(feePips);
    const amountRemainingLessFee = mulDiv(amountRemaining, FEE_PIPS_DENOMINATOR - fee, FEE_PIPS_DENOMINATOR);

    const sqrtFullX96 = getNextSqrtPriceFromInput(sqrtCurrentX96, liquidity, amountRemainingLessFee, zeroForOne);
    const crosses = zeroForOne ? sqrtFullX96 < sqrtTargetX96 : sqrtFullX96 > sqrtTargetX96;

    let sqrtPriceNextX96: bigint;
    let amountIn: bigint;
    let feeAmount: bigint;

    if (!crosses) {
        sqrtPriceNextX96 = sqrtFullX96;
        amountIn = amountRemainingLessFee;
        feeAmount = amountRemaining - amountIn;
    } else {
        sqrtPriceNextX96 = sqrtTargetX96;
        amountIn = zeroForOne
            ? getAmount0Delta(sqrtTargetX96, sqrtCurrentX96, liquidity, true)
            : getAmount1Delta(sqrtCurrentX96, sqrtTargetX96, liquidity, true);
        if (amountIn > amountRemainingLessFee) amountIn = amountRemainingLessFee;

        feeAmount = fee === 0n ? 0n : mulDivRoundingUp(amountIn, fee, FEE_PIPS_DENOMINATOR - fee);
        if (amountIn + feeAmount > amountRemaining) feeAmount = amountRemaining - amountIn;
    }

    const amountOut = zeroForOne
        ? getAmount1Delta(sqrtPriceNextX96, sqrtCurrentX96, liquidity, false)
        : getAmount0Delta(sqrtCurrentX96, sqrtPriceNextX96, liquidity, false);

    return { sqrtPriceNextX96, amountIn, amountOut, feeAmount };
}

// ============================================================
// Exact-Input Swap
// ============================================================

export interface BandState {
    sqrtPriceX96: bigint;
    liquidity: bigint;

    /** Unset until the first position is opened */
    sqrtLowerX96?: bigint;
    sqrtUpperX96?: bigint;

    feePips: number;
}

export interface SwapComputation {
    /** Input consumed, LP fee included */
    amountIn: bigint;
    amountOut: bigint;

    /** LP fee charged on the input side */
    feeAmount: bigint;

    /** Input left unfilled because the price limit or the band ran out */
    amountRemaining: bigint;

    /** True when input is left over and the price sits on the limit */
    stoppedAtLimit: boolean;

    sqrtPriceX96After: bigint;
}

/** The limit a swap uses when the caller sets none */
export function defaultPriceLimit(zeroForOne: boolean): bigint {
    return zeroForOne ? MIN_SQRT_PRICE + 1n : MAX_SQRT_PRICE - 1n;
}

export function validatePriceLimit(sqrtPriceX96: bigint, sqrtPriceLimitX96: bigint, zeroForOne: boolean): void {
    if (zeroForOne) {
        if (sqrtPriceLimitX96 >= sqrtPriceX96) {
            throw new VenueError('PRICE_LIMIT_ALREADY_EXCEEDED', `Limit ${sqrtPriceLimitX96} is not below price ${sqrtPriceX96}`);
        }
        if (sqrtPriceLimitX96 <= MIN_SQRT_PRICE) {
            throw new VenueError('PRICE_LIMIT_OUT_OF_BOUNDS', `Limit ${sqrtPriceLimitX96} at or below the minimum price`);
        }
    } else {
        if (sqrtPriceLimitX96 <= sqrtPriceX96) {
            throw new VenueError('PRICE_LIMIT_ALREADY_EXCEEDED', `Limit ${sqrtPriceLimitX96} is not above price ${sqrtPriceX96}`);
        }
        if (sqrtPriceLimitX96 >= MAX_SQRT_PRICE) {
            throw new VenueError('PRICE_LIMIT_OUT_OF_BOUNDS', `Limit ${sqrtPriceLimitX96} at or above the maximum price`);
        }
    }
}

/**
 * Simulate an exact-input swap against a single-band pool.
 * Pure: the caller decides whether to commit the result.
 */
export function computeExactInputSwap(
    pool: BandState,
    zeroForOne: boolean,
    exactAmountIn: bigint,
    sqrtPriceLimitX96: bigint,
): SwapComputation {
    if (exactAmountIn <= 0n) {
        throw new VenueError('INVALID_AMOUNT', `Swap input must be positive, got ${exactAmountIn}`);
    }
    validatePriceLimit(pool.sqrtPriceX96, sqrtPriceLimitX96, zeroForOne);

    let price = pool.sqrtPriceX96;
    let remaining = exactAmountIn;
    let amountIn = 0n;
    let amountOut = 0n;
    let feeAmount = 0n;

    while (remaining > 0n && price !== sqrtPriceLimitX96) {
        const { target, liquidity } = nextSegment(pool, price, sqrtPriceLimitX96, zeroForOne);

        if (liquidity === 0n) {
            price = target;
            continue;
        }

        const step = computeSwapStep(price, target, liquidity, remaining, pool.feePips);
        price = step.sqrtPriceNextX96;
        remaining -= step.amountIn + step.feeAmount;
        amountIn += step.amountIn + step.feeAmount;
        amountOut += step.amountOut;
        feeAmount += step.feeAmount;
    }

    return {
        amountIn,
        amountOut,
        feeAmount,
        amountRemaining: remaining,
        stoppedAtLimit: remaining > 0n && price === sqrtPriceLimitX96,
        sqrtPriceX96After: price,
    };
}

/** Next price boundary in the swap direction and the liquidity up to it */
function nextSegment(
    pool: BandState,
    price: bigint,
    limit: bigint,
    zeroForOne: boolean,
): { target: bigint; liquidity: bigint } {
    const { sqrtLowerX96: lower, sqrtUpperX96: upper } = pool;
    if (lower === undefined || upper === undefined || pool.liquidity === 0n) {
        return { target: limit, liquidity: 0n };
    }

    if (zeroForOne) {
        if (price > upper) return { target: upper > limit ? upper : limit, liquidity: 0n };
        if (price > lower) return { target: lower > limit ? lower : limit, liquidity: pool.liquidity };
        return { target: limit, liquidity: 0n };
    }

    if (price < lower) return { target: lower < limit ? lower : limit, liquidity: 0n };
    if (price < upper) return { target: upper < limit ? upper : limit, liquidity: pool.liquidity };
    return { target: limit, liquidity: 0n };
}

// ============================================================
// Liquidity
// ============================================================

/** Liquidity a single-sided currency1 deposit buys across [sqrtA, sqrtB] */
export function getLiquidityForAmount1(sqrtA: bigint, sqrtB: bigint, amount1: bigint): bigint {
    const [lower, upper] = sqrtA <= sqrtB ? [sqrtA, sqrtB] : [sqrtB, sqrtA];
    return mulDiv(amount1, Q96, upper - lower);
}

/**
 * Token amounts backing `liquidity` across [sqrtLower, sqrtUpper] at the
 * current price. Round up for deposits, down for withdrawals.
 */
export function getAmountsForLiquidity(
    sqrtPriceX96: bigint,
    sqrtLowerX96: bigint,
    sqrtUpperX96: bigint,
    liquidity: bigint,
    roundUp: boolean,
): { amount0: bigint; amount1: bigint } {
    if (sqrtPriceX96 <= sqrtLowerX96) {
        return { amount0: getAmount0Delta(sqrtLowerX96, sqrtUpperX96, liquidity, roundUp), amount1: 0n };
    }
    if (sqrtPriceX96 < sqrtUpperX96) {
        return {
            amount0: getAmount0Delta(sqrtPriceX96, sqrtUpperX96, liquidity, roundUp),
            amount1: getAmount1Delta(sqrtLowerX96, sqrtPriceX96, liquidity, roundUp),
        };
    }
    return { amount0: 0n, amount1: getAmount1Delta(sqrtLowerX96, sqrtUpperX96, liquidity, roundUp) };
}
