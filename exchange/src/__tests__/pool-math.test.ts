import { describe, it, expect } from 'vitest';
import { VenueError } from '../errors.js';
import {
    computeExactInputSwap,
    getAmountsForLiquidity,
    getSqrtPriceAtTick,
    MAX_TICK,
    validatePriceLimit,
} from '../pool-math.js';
import type { BandState } from '../pool-math.js';
import { Q96 } from '../types.js';
import { catchError } from './helpers.js';

const LOWER = getSqrtPriceAtTick(-600);
const UPPER = getSqrtPriceAtTick(600);

const BAND: BandState = {
    sqrtPriceX96: Q96,
    liquidity: 1_000_000_000_000_000_000_000n,
    sqrtLowerX96: LOWER,
    sqrtUpperX96: UPPER,
    feePips: 3_000,
};

describe('getSqrtPriceAtTick', () => {
    it('returns exactly Q96 at tick 0', () => {
        expect(getSqrtPriceAtTick(0)).toBe(Q96);
    });

    it('tracks sqrt(1.0001^tick)', () => {
        for (const tick of [1, -1, 100, -50_000, 69_000, 184_200]) {
            const actual = Number(getSqrtPriceAtTick(tick)) / 2 ** 96;
            const expected = Math.pow(1.0001, tick / 2);
            expect(Math.abs(actual / expected - 1)).toBeLessThan(1e-9);
        }
    });

    it('increases with the tick', () => {
        let previous = getSqrtPriceAtTick(-1_000);
        for (let tick = -999; tick <= 1_000; tick += 37) {
            const current = getSqrtPriceAtTick(tick);
            expect(current).toBeGreaterThan(previous);
            previous = current;
        }
    });

    it('rejects ticks outside the supported range', () => {
        const err = catchError(() => getSqrtPriceAtTick(MAX_TICK + 1));
        expect(err).toBeInstanceOf(VenueError);
        expect(err).toMatchObject({ code: 'INVALID_RANGE' });
    });
});

describe('computeExactInputSwap', () => {
    const AMOUNT = 1_000_000_000_000_000_000n;

    it('consumes the whole input inside the band', () => {
        const result = computeExactInputSwap(BAND, true, AMOUNT, LOWER);

        expect(result.amountRemaining).toBe(0n);
        expect(result.amountIn).toBe(AMOUNT);
        expect(result.feeAmount).toBe(3_000_000_000_000_000n);
        expect(result.stoppedAtLimit).toBe(false);
        expect(result.sqrtPriceX96After).toBeLessThan(Q96);
        expect(result.amountOut).toBeGreaterThan(0n);
    });

    it('fills completely when the limit equals the simulated post price', () => {
        const free = computeExactInputSwap(BAND, true, AMOUNT, LOWER);
        const limited = computeExactInputSwap(BAND, true, AMOUNT, free.sqrtPriceX96After);

        expect(limited.amountRemaining).toBe(0n);
        expect(limited.amountOut).toBe(free.amountOut);
        expect(limited.sqrtPriceX96After).toBe(free.sqrtPriceX96After);
        expect(limited.stoppedAtLimit).toBe(false);
    });

    it('stops on a tighter limit with input left over', () => {
        const free = computeExactInputSwap(BAND, true, AMOUNT, LOWER);
        const limit = free.sqrtPriceX96After + (Q96 - free.sqrtPriceX96After) / 2n;
        const limited = computeExactInputSwap(BAND, true, AMOUNT, limit);

        expect(limited.amountRemaining).toBeGreaterThan(0n);
        expect(limited.amountIn + limited.amountRemaining).toBe(AMOUNT);
        expect(limited.stoppedAtLimit).toBe(true);
        expect(limited.sqrtPriceX96After).toBe(limit);
    });

    it('leaves input over once the band is exhausted', () => {
        const thin: BandState = { ...BAND, liquidity: 1_000_000n };
        const limit = getSqrtPriceAtTick(-6_000);
        const result = computeExactInputSwap(thin, true, AMOUNT, limit);

        expect(result.amountRemaining).toBeGreaterThan(0n);
        expect(result.sqrtPriceX96After).toBe(limit);
    });

    it('rejects a limit on the wrong side of the price', () => {
        expect(catchError(() => validatePriceLimit(Q96, Q96, true))).toMatchObject({
            code: 'PRICE_LIMIT_ALREADY_EXCEEDED',
        });
        expect(catchError(() => computeExactInputSwap(BAND, false, AMOUNT, LOWER))).toMatchObject({
            code: 'PRICE_LIMIT_ALREADY_EXCEEDED',
        });
    });

    it('rejects a non-positive amount', () => {
        expect(catchError(() => computeExactInputSwap(BAND, true, 0n, LOWER))).toMatchObject({
            code: 'INVALID_AMOUNT',
        });
    });
});

describe('getAmountsForLiquidity', () => {
    it('is all currency1 at the upper edge and all currency0 at the lower edge', () => {
        const atUpper = getAmountsForLiquidity(UPPER, LOWER, UPPER, BAND.liquidity, false);
        expect(atUpper.amount0).toBe(0n);
        expect(atUpper.amount1).toBeGreaterThan(0n);

        const atLower = getAmountsForLiquidity(LOWER, LOWER, UPPER, BAND.liquidity, false);
        expect(atLower.amount1).toBe(0n);
        expect(atLower.amount0).toBeGreaterThan(0n);
    });
});
