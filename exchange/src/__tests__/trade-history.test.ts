import { describe, it, expect, beforeEach } from 'vitest';
import { TradeHistory } from '../trade-history.js';
import {
    ALICE,
    BOB,
    buy,
    catchError,
    createFixture,
    harvest,
    ONE,
    sell,
} from './helpers.js';
import type { Fixture } from './helpers.js';

describe('TradeHistory', () => {
    let f: Fixture;
    let history: TradeHistory;

    beforeEach(() => {
        f = createFixture();
        history = new TradeHistory({ events: f.runtime.events });
        history.start();
    });

    it('records committed trades with their fee split', () => {
        const output = buy(f, ALICE, ONE);

        expect(history.getTrades()).toEqual([expect.objectContaining({
            sequence: 0,
            engine: f.engine.address,
            side: 'buy',
            trader: ALICE,
            gross: ONE,
            output,
            tokenAmount: output,
        })]);
        expect(history.getFeeTotals()).toEqual({
            creator: 5_000_000_000_000_000n,
            burn: 1_000_000_000_000_000n,
            protocol: 4_000_000_000_000_000n,
            referrer: 0n,
            redirected: 0n,
        });
        expect(history.getBurnTotals()).toMatchObject({ deposited: 1_000_000_000_000_000n, flushes: 0 });
    });

    it('hands out copies of its records', () => {
        buy(f, ALICE, ONE);
        const [first] = history.getTrades();
        first.gross = 0n;
        first.fees.creatorFee = 0n;

        expect(history.getTrades()[0]).toMatchObject({
            gross: ONE,
            fees: { creatorFee: 5_000_000_000_000_000n },
        });
    });

    it('ignores trades that reverted', () => {
        buy(f, ALICE, ONE);
        catchError(() => buy(f, ALICE, ONE, { minOutput: 1n << 200n }));

        expect(history.tradeCount).toBe(1);
    });

    it('aggregates per-trader stats', () => {
        const bought = buy(f, ALICE, ONE);
        const payout = sell(f, ALICE, bought / 2n);

        expect(history.getTrades({ side: 'sell' })).toHaveLength(1);
        expect(history.getTrades({ trader: ALICE })).toHaveLength(2);
        expect(history.getTraderStats(ALICE)).toMatchObject({
            buys: 1,
            sells: 1,
            fundingIn: ONE,
            fundingOut: payout,
            tokensBought: bought,
            tokensSold: bought / 2n,
        });
    });

    it('ranks traders by funding volume', () => {
        buy(f, ALICE, ONE);
        buy(f, BOB, 3n * ONE);

        expect(history.getTopTraders().map((s) => s.trader)).toEqual([BOB, ALICE]);
        expect(history.traderCount).toBe(2);
    });

    it('counts harvests', () => {
        buy(f, ALICE, ONE);
        const result = harvest(f);

        expect(history.getHarvestTotals()).toEqual({ harvests: 1, fees0: result.fees0, fees1: 0n });
    });

    it('stops recording once stopped', () => {
        history.stop();
        buy(f, ALICE, ONE);

        expect(history.isRunning).toBe(false);
        expect(history.tradeCount).toBe(0);
    });

    it('keeps only the newest records past the cap', () => {
        const capped = new TradeHistory({ events: f.runtime.events, maxRecords: 1 });
        capped.start();
        buy(f, ALICE, ONE);
        buy(f, BOB, ONE);

        expect(capped.getTrades().map((t) => [t.sequence, t.trader])).toEqual([[1, BOB]]);
        expect(capped.traderCount).toBe(2);
    });
});
