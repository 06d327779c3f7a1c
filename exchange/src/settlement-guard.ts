/**
 * Bondline: Settlement Guard
 *
 * Single-flight context for one venue interaction at a time.
 *
 *   Idle ──arm──▶ Armed(context) ──consume (venue only)──▶ Idle
 *                      │
 *                      └──── clear (always, after unlock returns) ───▶ Idle
 *
 * A callback is accepted only from the configured venue and only while
 * armed with the exact payload that was handed to `unlock`. Anything
 * else is rejected without touching state.
 */

import { normalizeSuiAddress } from '@mysten/sui/utils';
import { GuardViolationError } from './errors.js';
import { encodeSettlementContext, payloadsEqual } from './settlement-codec.js';
import type { SettlementContext } from './types.js';
import type { Journaled } from './runtime.js';

export type GuardState =
    | { status: 'idle' }
    | { status: 'armed'; context: SettlementContext; payload: Uint8Array };

export class SettlementGuard implements Journaled<GuardState> {
    private state: GuardState = { status: 'idle' };
    private readonly venue: string;

    constructor(venueAddress: string) {
        this.venue = normalizeSuiAddress(venueAddress);
    }

    get isArmed(): boolean {
        return this.state.status === 'armed';
    }

    get venueAddress(): string {
        return this.venue;
    }

    /**
     * Idle → Armed. Arming twice means the guard was re-entered.
     * @returns the opaque payload to pass to the venue
     */
    arm(context: SettlementContext): Uint8Array {
        if (this.state.status === 'armed') {
            throw new GuardViolationError(
                'ALREADY_ARMED',
                `Guard already armed for a ${this.state.context.kind} settlement`,
            );
        }
        const payload = encodeSettlementContext(context);
        this.state = { status: 'armed', context: { ...context }, payload };
        return payload;
    }

    /** Armed → Idle, for the venue's callback only */
    consume(caller: string, payload: Uint8Array): SettlementContext {
        const sender = normalizeSuiAddress(caller);
        if (sender !== this.venue) {
            throw new GuardViolationError('UNAUTHORIZED_CALLER', `Callback from ${sender}, expected venue ${this.venue}`);
        }
        if (this.state.status !== 'armed') {
            throw new GuardViolationError('NOT_ARMED', 'Callback received with no settlement in flight');
        }
        if (!payloadsEqual(this.state.payload, payload)) {
            throw new GuardViolationError('CONTEXT_MISMATCH', 'Callback payload does not match the armed context');
        }

        const { context } = this.state;
        this.state = { status: 'idle' };
        return context;
    }

    /** Back to Idle, whatever the current state */
    clear(): void {
        this.state = { status: 'idle' };
    }

    /** Arm, run the venue interaction, and clear no matter how it ends */
    run<T>(context: SettlementContext, fn: (payload: Uint8Array) => T): T {
        const payload = this.arm(context);
        try {
            return fn(payload);
        } finally {
            this.clear();
        }
    }

    snapshot(): GuardState {
        return this.state;
    }

    restore(state: GuardState): void {
        this.state = state;
    }
}
