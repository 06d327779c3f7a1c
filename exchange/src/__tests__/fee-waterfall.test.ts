import { describe, it, expect, vi } from 'vitest';
import { ConfigError, FeeRecipientError } from '../errors.js';
import {
    computeTradeFee,
    HARVEST_SHARES,
    runPayoutWaterfall,
    splitFee,
    validateFeeShares,
} from '../fee-waterfall.js';
import type { FeeShares, PayoutStep } from '../fee-waterfall.js';
import { catchError } from './helpers.js';

const DEFAULT_SHARES: FeeShares = {
    creatorShareBps: 5_000,
    burnShareBps: 2_000,
    protocolShareBps: 5_000,
    referrerShareBps: 3_000,
};

const ok = () => ({ ok: true as const });
const fail = (reason: string) => () => ({ ok: false as const, reason });

function step(share: PayoutStep['share'], amount: bigint, attempt: PayoutStep['attempt']): PayoutStep {
    return { share, recipient: `0x${share}`, amount, attempt };
}

describe('computeTradeFee', () => {
    it('floors the fee and leaves the rest as net', () => {
        expect(computeTradeFee(1_000_000_000_000_000_000n, 100)).toEqual({
            fee: 10_000_000_000_000_000n,
            net: 990_000_000_000_000_000n,
        });
        expect(computeTradeFee(199n, 100)).toEqual({ fee: 1n, net: 198n });
        expect(computeTradeFee(99n, 100)).toEqual({ fee: 0n, net: 99n });
    });

    it('rejects a fee rate above 100%', () => {
        const err = catchError(() => computeTradeFee(1_000n, 10_001));
        expect(err).toBeInstanceOf(ConfigError);
        expect(err).toMatchObject({ code: 'INVALID_BPS' });
    });
});

describe('splitFee', () => {
    it('gives protocol the referrer share when there is no referrer', () => {
        const split = splitFee(10_000_000_000_000_000n, {
            creatorShareBps: 5_000,
            burnShareBps: 0,
            protocolShareBps: 5_000,
            referrerShareBps: 5_000,
        }, false);

        expect(split).toEqual({
            creatorFee: 5_000_000_000_000_000n,
            burnFee: 0n,
            protocolFee: 5_000_000_000_000_000n,
            referrerFee: 0n,
        });
    });

    it('pays the referrer out of the remainder when present', () => {
        const split = splitFee(10_000_000_000_000_000n, DEFAULT_SHARES, true);

        expect(split).toEqual({
            creatorFee: 5_000_000_000_000_000n,
            burnFee: 1_000_000_000_000_000n,
            protocolFee: 2_500_000_000_000_000n,
            referrerFee: 1_500_000_000_000_000n,
        });
    });

    it('puts rounding dust on the protocol share', () => {
        const split = splitFee(7n, {
            creatorShareBps: 3_333,
            burnShareBps: 3_333,
            protocolShareBps: 3_334,
            referrerShareBps: 3_333,
        }, true);

        expect(split).toEqual({ creatorFee: 2n, burnFee: 1n, protocolFee: 3n, referrerFee: 1n });
    });

    it('sends a one-unit fee entirely to protocol', () => {
        expect(splitFee(1n, DEFAULT_SHARES, true)).toEqual({
            creatorFee: 0n,
            burnFee: 0n,
            protocolFee: 1n,
            referrerFee: 0n,
        });
    });

    it('always sums to the gross fee', () => {
        const fees = [0n, 1n, 3n, 99n, 10_001n, 123_456_789n, 1_000_000_000_000_000_007n];
        const shares: FeeShares[] = [
            DEFAULT_SHARES,
            { creatorShareBps: 10_000, burnShareBps: 10_000, protocolShareBps: 0, referrerShareBps: 0 },
            { creatorShareBps: 1, burnShareBps: 9_999, protocolShareBps: 0, referrerShareBps: 1 },
        ];

        for (const fee of fees) {
            for (const s of shares) {
                for (const referrer of [true, false]) {
                    const split = splitFee(fee, s, referrer);
                    expect(split.creatorFee + split.burnFee + split.protocolFee + split.referrerFee).toBe(fee);
                    expect(split.protocolFee).toBeGreaterThanOrEqual(0n);
                }
            }
        }
    });

    it('splits harvested fees in half, odd unit to protocol', () => {
        expect(splitFee(11n, HARVEST_SHARES, false)).toEqual({
            creatorFee: 5n,
            burnFee: 0n,
            protocolFee: 6n,
            referrerFee: 0n,
        });
    });

    it('rejects shares whose remainder does not add up to 100%', () => {
        const bad = { ...DEFAULT_SHARES, protocolShareBps: 4_999 };

        expect(() => validateFeeShares(bad)).toThrow(ConfigError);
        expect(catchError(() => splitFee(1_000n, bad, false))).toMatchObject({ code: 'INVALID_SHARES' });
    });

    it('rejects a share above 100%', () => {
        const err = catchError(() => validateFeeShares({ ...DEFAULT_SHARES, creatorShareBps: 10_001 }));
        expect(err).toMatchObject({ code: 'INVALID_BPS' });
    });
});

describe('runPayoutWaterfall', () => {
    it('pays every step and then protocol', () => {
        const pay = vi.fn(ok);
        const report = runPayoutWaterfall(
            [step('creator', 50n, ok), step('referrer', 15n, ok), step('burn', 10n, ok)],
            { recipient: '0xprotocol', amount: 25n, pay },
        );

        expect(report.paid).toEqual({ creatorFee: 50n, burnFee: 10n, protocolFee: 25n, referrerFee: 15n });
        expect(report.redirects).toEqual([]);
        expect(report.redirected).toBe(0n);
        expect(pay).toHaveBeenCalledWith(25n);
    });

    it('redirects a failed share to protocol', () => {
        const pay = vi.fn(ok);
        const report = runPayoutWaterfall(
            [step('creator', 50n, ok), step('referrer', 15n, fail('rejected')), step('burn', 10n, ok)],
            { recipient: '0xprotocol', amount: 25n, pay },
        );

        expect(report.paid).toEqual({ creatorFee: 50n, burnFee: 10n, protocolFee: 40n, referrerFee: 0n });
        expect(report.redirects).toEqual([
            { share: 'referrer', intendedRecipient: '0xreferrer', amount: 15n, reason: 'rejected' },
        ]);
        expect(report.redirected).toBe(15n);
        expect(pay).toHaveBeenCalledWith(40n);
    });

    it('skips zero-amount steps without attempting them', () => {
        const attempt = vi.fn(ok);
        const pay = vi.fn(ok);
        runPayoutWaterfall([step('referrer', 0n, attempt)], { recipient: '0xprotocol', amount: 0n, pay });

        expect(attempt).not.toHaveBeenCalled();
        expect(pay).not.toHaveBeenCalled();
    });

    it('fails the whole payout when protocol cannot be paid', () => {
        const err = catchError(() => runPayoutWaterfall(
            [step('creator', 50n, fail('rejected'))],
            { recipient: '0xprotocol', amount: 50n, pay: fail('also rejected') },
        ));

        expect(err).toBeInstanceOf(FeeRecipientError);
        expect(err).toMatchObject({ code: 'PROTOCOL_UNREACHABLE' });
    });
});
