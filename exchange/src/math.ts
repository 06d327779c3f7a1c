/**
 * Bondline: Math Module
 *
 * Integer helpers shared by the fee waterfall, the trade engine and
 * the pool math. Everything is bigint; nothing here rounds implicitly.
 *
 * Rounding conventions:
 *   FLOOR on amounts paid out (fees, outputs, minimums)
 *   CEILING only where an amount owed must never be under-counted
 */

import { BPS_DENOMINATOR, PRICE_SCALING } from './types.js';

// ============================================================
// Division
// ============================================================

/** Ceiling division for non-negative bigints: ceil(a / b) */
export function ceilDiv(a: bigint, b: bigint): bigint {
    if (b === 0n) throw new RangeError('Division by zero');
    if (a === 0n) return 0n;
    return (a + b - 1n) / b;
}

/** floor(a * b / denominator) */
export function mulDiv(a: bigint, b: bigint, denominator: bigint): bigint {
    if (denominator === 0n) throw new RangeError('Division by zero');
    return (a * b) / denominator;
}

/** ceil(a * b / denominator) */
export function mulDivRoundingUp(a: bigint, b: bigint, denominator: bigint): bigint {
    return ceilDiv(a * b, denominator);
}

// ============================================================
// Basis Points
// ============================================================

/** floor(amount * bps / 10_000) */
export function applyBps(amount: bigint, bps: number | bigint): bigint {
    return mulDiv(amount, BigInt(bps), BPS_DENOMINATOR);
}

/**
 * Minimum acceptable output for a quoted amount and a slippage tolerance.
 *
 * Formula: floor(quoted * (10_000 - slippageBps) / 10_000)
 */
export function applySlippage(quoted: bigint, slippageBps: number): bigint {
    if (!Number.isInteger(slippageBps) || slippageBps < 0 || slippageBps > 10_000) {
        throw new RangeError(`Slippage must be an integer between 0 and 10000 bps, got ${slippageBps}`);
    }
    return mulDiv(quoted, BPS_DENOMINATOR - BigInt(slippageBps), BPS_DENOMINATOR);
}

// ============================================================
// Prices
// ============================================================

/**
 * Effective price of a fill: funding paid per token received,
 * scaled by PRICE_SCALING. Uses integer division (floor).
 */
export function calculatePrice(tokenAmount: bigint, fundingAmount: bigint): bigint {
    if (tokenAmount === 0n) return 0n;
    return (fundingAmount * PRICE_SCALING) / tokenAmount;
}

// ============================================================
// Utilities
// ============================================================

/** Convert a decimal string ("1.25") to raw units without float rounding */
export function toRaw(amount: string, decimals: number): bigint {
    const match = /^(\d+)(?:\.(\d+))?$/.exec(amount.trim());
    if (!match) throw new RangeError(`Not a decimal amount: "${amount}"`);
    const whole = match[1];
    const fraction = (match[2] ?? '').slice(0, decimals).padEnd(decimals, '0');
    return BigInt(whole + fraction);
}

/** Convert raw units to a decimal string, trailing zeros trimmed */
export function fromRaw(amount: bigint, decimals: number): string {
    const negative = amount < 0n;
    const abs = negative ? -amount : amount;
    const base = 10n ** BigInt(decimals);
    const whole = abs / base;
    const fraction = (abs % base).toString().padStart(decimals, '0').replace(/0+$/, '');
    const text = fraction.length > 0 ? `${whole}.${fraction}` : whole.toString();
    return negative ? `-${text}` : text;
}
