/**
 * Bondline: Fee Waterfall
 *
 * Fee computation and distribution for every settlement.
 *
 *   gross fee ─┬─ creator   floor(fee × creatorShare)
 *              └─ remainder ─┬─ burn      floor(rem × burnShare)
 *                            ├─ referrer  floor(rem × referrerShare), 0 without a referrer
 *                            └─ protocol  rem − burn − referrer
 *
 * Protocol takes the remainder after the floored shares, so the four
 * parts always add up to the gross fee exactly.
 *
 * Payouts run in order. A recipient that cannot be paid has its share
 * moved onto the protocol payout, which runs last and must succeed.
 */

import { ConfigError, FeeRecipientError } from './errors.js';
import { applyBps } from './math.js';
import { BPS_DENOMINATOR } from './types.js';
import type { FeeShareName, FeeSplit } from './types.js';

// ============================================================
// Types
// ============================================================

/** Fee shares in bps. burn + protocol + referrer must be exactly 10_000. */
export interface FeeShares {
    /** Creator's cut of the gross fee */
    creatorShareBps: number;

    /** Cuts of the remainder after the creator */
    burnShareBps: number;
    protocolShareBps: number;
    referrerShareBps: number;
}

export interface TradeFee {
    fee: bigint;
    net: bigint;
}

export type PayoutAttempt = { ok: true } | { ok: false; reason: string };

export interface PayoutStep {
    share: Exclude<FeeShareName, 'protocol'>;
    recipient: string;
    amount: bigint;
    attempt: () => PayoutAttempt;
}

export interface FinalPayout {
    recipient: string;

    /** Protocol's own share before redirects */
    amount: bigint;

    pay: (amount: bigint) => PayoutAttempt;
}

export interface FeeRedirect {
    share: Exclude<FeeShareName, 'protocol'>;
    intendedRecipient: string;
    amount: bigint;
    reason: string;
}

export interface PayoutReport {
    /** What each share actually delivered (protocol includes redirects) */
    paid: FeeSplit;

    redirects: FeeRedirect[];

    /** Sum of all redirected amounts */
    redirected: bigint;
}

/** Harvested LP fees: half to the creator, half to the protocol */
export const HARVEST_SHARES: Readonly<FeeShares> = {
    creatorShareBps: 5_000,
    burnShareBps: 0,
    protocolShareBps: 10_000,
    referrerShareBps: 0,
};

// ============================================================
// Computation
// ============================================================

/** fee = floor(amount × totalFeeBps / 10_000), net = amount − fee */
export function computeTradeFee(amount: bigint, totalFeeBps: number): TradeFee {
    if (amount < 0n) throw new RangeError(`Amount must not be negative, got ${amount}`);
    requireBps('totalFeeBps', totalFeeBps);
    const fee = applyBps(amount, totalFeeBps);
    return { fee, net: amount - fee };
}

/**
 * Rejects shares that are out of range or whose remainder split does
 * not add up to 100%.
 */
export function validateFeeShares(shares: FeeShares): void {
    requireBps('creatorShareBps', shares.creatorShareBps);
    requireBps('burnShareBps', shares.burnShareBps);
    requireBps('protocolShareBps', shares.protocolShareBps);
    requireBps('referrerShareBps', shares.referrerShareBps);

    const sum = BigInt(shares.burnShareBps + shares.protocolShareBps + shares.referrerShareBps);
    if (sum !== BPS_DENOMINATOR) {
        throw new ConfigError(
            'INVALID_SHARES',
            `burn + protocol + referrer shares must equal ${BPS_DENOMINATOR} bps, got ${sum}`,
        );
    }
}

/**
 * Split a gross fee four ways. Without a referrer the referrer share
 * stays with protocol.
 *
 * @example
 * splitFee(10_000_000_000_000_000n, { creatorShareBps: 5000, burnShareBps: 0,
 *     protocolShareBps: 5000, referrerShareBps: 5000 }, false)
 * // { creatorFee: 5e15, burnFee: 0n, protocolFee: 5e15, referrerFee: 0n }
 */
export function splitFee(grossFee: bigint, shares: FeeShares, referrerPresent: boolean): FeeSplit {
    if (grossFee < 0n) throw new RangeError(`Fee must not be negative, got ${grossFee}`);
    validateFeeShares(shares);

    const creatorFee = applyBps(grossFee, shares.creatorShareBps);
    const remainder = grossFee - creatorFee;
    const burnFee = applyBps(remainder, shares.burnShareBps);
    const referrerFee = referrerPresent ? applyBps(remainder, shares.referrerShareBps) : 0n;
    const protocolFee = remainder - burnFee - referrerFee;

    return { creatorFee, burnFee, protocolFee, referrerFee };
}

function requireBps(field: string, value: number): void {
    if (!Number.isInteger(value) || value < 0 || BigInt(value) > BPS_DENOMINATOR) {
        throw new ConfigError('INVALID_BPS', `${field} must be an integer in [0, ${BPS_DENOMINATOR}], got ${value}`);
    }
}

// ============================================================
// Distribution
// ============================================================

/**
 * Attempt each step in order, then pay protocol its share plus whatever
 * the failed steps could not deliver. Zero-amount steps are skipped.
 *
 * @throws FeeRecipientError PROTOCOL_UNREACHABLE when the final payout fails
 */
export function runPayoutWaterfall(steps: PayoutStep[], final: FinalPayout): PayoutReport {
    const paid: FeeSplit = { creatorFee: 0n, burnFee: 0n, protocolFee: 0n, referrerFee: 0n };
    const redirects: FeeRedirect[] = [];
    let redirected = 0n;

    for (const step of steps) {
        if (step.amount === 0n) continue;

        const outcome = step.attempt();
        if (outcome.ok) {
            paid[shareKey(step.share)] += step.amount;
            continue;
        }

        redirects.push({
            share: step.share,
            intendedRecipient: step.recipient,
            amount: step.amount,
            reason: outcome.reason,
        });
        redirected += step.amount;
    }

    const protocolTotal = final.amount + redirected;
    if (protocolTotal > 0n) {
        const outcome = final.pay(protocolTotal);
        if (!outcome.ok) {
            throw new FeeRecipientError(
                'PROTOCOL_UNREACHABLE',
                `Protocol recipient ${final.recipient} rejected ${protocolTotal}: ${outcome.reason}`,
            );
        }
    }
    paid.protocolFee = protocolTotal;

    return { paid, redirects, redirected };
}

function shareKey(share: Exclude<FeeShareName, 'protocol'>): keyof FeeSplit {
    switch (share) {
        case 'creator':
            return 'creatorFee';
        case 'burn':
            return 'burnFee';
        case 'referrer':
            return 'referrerFee';
    }
}
