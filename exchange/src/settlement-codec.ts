/**
 * Bondline: Settlement Codec
 *
 * BCS layout of the opaque payloads that cross the venue boundary:
 * the settlement context handed to `unlock`, and the outcome the
 * callback hands back.
 */

import { bcs } from '@mysten/sui/bcs';
import type { SettlementContext, SettlementKind } from './types.js';

// ============================================================
// Layouts
// ============================================================

const SETTLEMENT_KINDS: readonly SettlementKind[] = ['seed', 'buy', 'sell', 'harvest', 'flush'];

export const SettlementContextBcs = bcs.struct('SettlementContext', {
    kind: bcs.u8(),
    amount: bcs.u256(),
    sqrtPriceLimitX96: bcs.u256(),
    minAmountOut: bcs.u256(),
    requester: bcs.Address,
    recipient: bcs.Address,
});

export const SwapOutcomeBcs = bcs.struct('SwapOutcome', {
    amountIn: bcs.u256(),
    amountOut: bcs.u256(),
    sqrtPriceX96After: bcs.u256(),
});

export const AmountsOutcomeBcs = bcs.struct('AmountsOutcome', {
    amount0: bcs.u256(),
    amount1: bcs.u256(),
});

/** Result of a swap settled inside the callback */
export interface SwapOutcome {
    /** Input the venue consumed */
    amountIn: bigint;

    /** Output taken from the venue */
    amountOut: bigint;

    sqrtPriceX96After: bigint;
}

/** Per-currency amounts moved by a liquidity call (seeding, fee collection) */
export interface AmountsOutcome {
    amount0: bigint;
    amount1: bigint;
}

// ============================================================
// Context
// ============================================================

export function encodeSettlementContext(context: SettlementContext): Uint8Array {
    return SettlementContextBcs.serialize({
        kind: SETTLEMENT_KINDS.indexOf(context.kind),
        amount: context.amount,
        sqrtPriceLimitX96: context.sqrtPriceLimitX96,
        minAmountOut: context.minAmountOut,
        requester: context.requester,
        recipient: context.recipient,
    }).toBytes();
}

export function decodeSettlementContext(payload: Uint8Array): SettlementContext {
    const raw = SettlementContextBcs.parse(payload);
    const kind = SETTLEMENT_KINDS[raw.kind];
    if (kind === undefined) {
        throw new RangeError(`Unknown settlement kind ${raw.kind}`);
    }
    return {
        kind,
        amount: BigInt(raw.amount),
        sqrtPriceLimitX96: BigInt(raw.sqrtPriceLimitX96),
        minAmountOut: BigInt(raw.minAmountOut),
        requester: raw.requester,
        recipient: raw.recipient,
    };
}

// ============================================================
// Outcomes
// ============================================================

export function encodeSwapOutcome(outcome: SwapOutcome): Uint8Array {
    return SwapOutcomeBcs.serialize(outcome).toBytes();
}

export function decodeSwapOutcome(payload: Uint8Array): SwapOutcome {
    const raw = SwapOutcomeBcs.parse(payload);
    return {
        amountIn: BigInt(raw.amountIn),
        amountOut: BigInt(raw.amountOut),
        sqrtPriceX96After: BigInt(raw.sqrtPriceX96After),
    };
}

export function encodeAmountsOutcome(outcome: AmountsOutcome): Uint8Array {
    return AmountsOutcomeBcs.serialize(outcome).toBytes();
}

export function decodeAmountsOutcome(payload: Uint8Array): AmountsOutcome {
    const raw = AmountsOutcomeBcs.parse(payload);
    return { amount0: BigInt(raw.amount0), amount1: BigInt(raw.amount1) };
}

// ============================================================
// Helpers
// ============================================================

export function payloadsEqual(a: Uint8Array, b: Uint8Array): boolean {
    if (a.length !== b.length) return false;
    for (let i = 0; i < a.length; i++) {
        if (a[i] !== b[i]) return false;
    }
    return true;
}
