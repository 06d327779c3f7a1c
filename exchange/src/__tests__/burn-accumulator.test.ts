import { describe, it, expect, beforeEach } from 'vitest';
import { AccumulatorError, GuardViolationError, SlippageError, VenueError } from '../errors.js';
import { applySlippage } from '../math.js';
import { encodeSettlementContext } from '../settlement-codec.js';
import { DEFAULT_BURN_SINK, NATIVE_CURRENCY } from '../types.js';
import type { VenueQuoter } from '../types.js';
import type { BurnAccumulator } from '../burn-accumulator.js';
import {
    ALICE,
    ATTACKER,
    BOB,
    buy,
    catchError,
    configureAccumulator,
    createFixture,
    nativeBalance,
    ONE,
    requireAccumulator,
} from './helpers.js';
import type { Fixture } from './helpers.js';

describe('BurnAccumulator', () => {
    let f: Fixture;
    let accumulator: BurnAccumulator;

    const deposit = (from: string, value: bigint) =>
        f.runtime.call({ from, to: accumulator.address, value }, () => accumulator.deposit());

    const flush = (from: string = BOB) =>
        f.runtime.call({ from, to: accumulator.address }, () => accumulator.flush());

    const sinkBalance = () => f.runtime.ledger.balanceOf(f.targetAsset, DEFAULT_BURN_SINK);

    /** Quotes twice what the pool will actually give */
    const inflatedQuoter = (): VenueQuoter => ({
        quoteExactInputSingle: (params) => {
            const quote = f.venue.quoteExactInputSingle(params);
            return { ...quote, amountOut: quote.amountOut * 2n };
        },
    });

    beforeEach(() => {
        f = createFixture();
        accumulator = requireAccumulator(f);
    });

    // --------------------------------------------------------
    // Deposits
    // --------------------------------------------------------

    describe('deposit', () => {
        it('adds the call value to the pending balance', () => {
            expect(deposit(ALICE, ONE)).toBe(true);
            expect(deposit(BOB, 2n * ONE)).toBe(true);

            expect(accumulator.pendingBalance()).toBe(3n * ONE);
            expect(nativeBalance(f, accumulator.address)).toBe(3n * ONE);
            expect(f.runtime.events.last('BurnDeposit')).toMatchObject({
                from: BOB,
                amount: 2n * ONE,
                accepted: true,
                pendingAfter: 3n * ONE,
            });
        });

        it('refunds and reports false while disabled', () => {
            configureAccumulator(f, { enabled: false });

            expect(deposit(ALICE, ONE)).toBe(false);
            expect(nativeBalance(f, ALICE)).toBe(1_000n * ONE);
            expect(accumulator.pendingBalance()).toBe(0n);
            expect(f.runtime.events.last('BurnDeposit')).toMatchObject({ accepted: false, amount: ONE });
        });

        it('rejects an empty deposit', () => {
            expect(catchError(() => deposit(ALICE, 0n))).toMatchObject({ code: 'ZERO_AMOUNT' });
        });
    });

    // --------------------------------------------------------
    // Flush
    // --------------------------------------------------------

    describe('flush', () => {
        it('is a no-op with nothing pending', () => {
            expect(flush()).toBe(0n);
            expect(f.runtime.events.ofType('BurnFlushed')).toEqual([]);
        });

        it('is a no-op while disabled', () => {
            deposit(ALICE, ONE);
            configureAccumulator(f, { enabled: false });

            expect(flush()).toBe(0n);
            expect(accumulator.pendingBalance()).toBe(ONE);
            expect(sinkBalance()).toBe(0n);
        });

        it('swaps everything pending and sends it to the sink', () => {
            deposit(ALICE, ONE);
            const quote = f.venue.quoteExactInputSingle({ key: f.targetKey, zeroForOne: true, exactAmount: ONE });

            const out = flush();

            expect(out).toBe(quote.amountOut);
            expect(sinkBalance()).toBe(quote.amountOut);
            expect(accumulator.pendingBalance()).toBe(0n);
            expect(nativeBalance(f, accumulator.address)).toBe(0n);
            expect(f.runtime.events.last('BurnFlushed')).toEqual({
                type: 'BurnFlushed',
                emitter: accumulator.address,
                caller: BOB,
                amountIn: ONE,
                amountOut: quote.amountOut,
                minAmountOut: applySlippage(quote.amountOut, 100),
                targetAsset: f.targetAsset,
                sink: DEFAULT_BURN_SINK,
            });
        });

        it('leaves the pending balance untouched when the output is short', () => {
            deposit(ALICE, ONE);
            configureAccumulator(f, { quoter: inflatedQuoter() });

            const err = catchError(() => flush());

            expect(err).toBeInstanceOf(SlippageError);
            expect(err).toMatchObject({ code: 'MIN_OUTPUT' });
            expect(accumulator.pendingBalance()).toBe(ONE);
            expect(nativeBalance(f, accumulator.address)).toBe(ONE);
            expect(sinkBalance()).toBe(0n);
        });

        it('reports a failed quote', () => {
            deposit(ALICE, ONE);
            configureAccumulator(f, { poolKey: { ...f.targetKey, fee: 500 } });

            const err = catchError(() => flush());

            expect(err).toBeInstanceOf(AccumulatorError);
            expect(err).toMatchObject({ code: 'QUOTE_FAILED' });
            expect(accumulator.pendingBalance()).toBe(ONE);
        });

        it('fails without a quoter when the pool does not exist', () => {
            deposit(ALICE, ONE);
            configureAccumulator(f, { poolKey: { ...f.targetKey, fee: 500 }, quoter: undefined });

            const err = catchError(() => flush());

            expect(err).toBeInstanceOf(VenueError);
            expect(err).toMatchObject({ code: 'POOL_NOT_INITIALIZED' });
            expect(accumulator.pendingBalance()).toBe(ONE);
            expect(nativeBalance(f, accumulator.address)).toBe(ONE);
            expect(sinkBalance()).toBe(0n);
        });
    });

    // --------------------------------------------------------
    // Auto-flush from trades
    // --------------------------------------------------------

    describe('auto-flush', () => {
        it('flushes once the threshold is reached', () => {
            configureAccumulator(f, { autoFlushThreshold: 1n });
            buy(f, ALICE, ONE);

            expect(accumulator.pendingBalance()).toBe(0n);
            expect(f.runtime.events.last('BurnFlushed')).toMatchObject({ amountIn: 1_000_000_000_000_000n });
            expect(sinkBalance()).toBeGreaterThan(0n);
        });

        it('never fails the trade that triggered it', () => {
            configureAccumulator(f, { autoFlushThreshold: 1n, quoter: inflatedQuoter() });
            const output = buy(f, ALICE, ONE);

            expect(output).toBeGreaterThan(0n);
            expect(accumulator.pendingBalance()).toBe(1_000_000_000_000_000n);
            expect(f.runtime.events.last('BurnFlushFailed')).toMatchObject({
                emitter: accumulator.address,
                pending: 1_000_000_000_000_000n,
            });
            expect(f.runtime.events.last('TradeSettled')).toMatchObject({ burnDeposited: true });
        });
    });

    // --------------------------------------------------------
    // Access
    // --------------------------------------------------------

    describe('access', () => {
        it('lets only the owner reconfigure', () => {
            const err = catchError(() => f.runtime.call(
                { from: ATTACKER, to: accumulator.address },
                () => accumulator.configure({ enabled: false }),
            ));

            expect(err).toBeInstanceOf(AccumulatorError);
            expect(err).toMatchObject({ code: 'NOT_OWNER' });
            expect(accumulator.isEnabled()).toBe(true);
        });

        it('validates configuration changes', () => {
            expect(catchError(() => configureAccumulator(f, { maxSlippageBps: 10_001 }))).toMatchObject({
                code: 'INVALID_BPS',
            });
            expect(accumulator.getConfig().maxSlippageBps).toBe(100);
        });

        it('rejects callbacks it did not ask for', () => {
            const payload = encodeSettlementContext({
                kind: 'flush',
                amount: ONE,
                sqrtPriceLimitX96: 0n,
                minAmountOut: 0n,
                requester: ATTACKER,
                recipient: ATTACKER,
            });

            const fromAttacker = catchError(() => f.runtime.call(
                { from: ATTACKER, to: accumulator.address },
                () => accumulator.unlockCallback(payload),
            ));
            const fromVenue = catchError(() => f.runtime.call(
                { from: f.venue.address, to: accumulator.address },
                () => accumulator.unlockCallback(payload),
            ));

            expect(fromAttacker).toBeInstanceOf(GuardViolationError);
            expect(fromAttacker).toMatchObject({ code: 'UNAUTHORIZED_CALLER' });
            expect(fromVenue).toMatchObject({ code: 'NOT_ARMED' });
            expect(f.runtime.ledger.balanceOf(NATIVE_CURRENCY, ATTACKER)).toBe(0n);
        });
    });
});
