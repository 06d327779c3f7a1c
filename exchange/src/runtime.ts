/**
 * Bondline: Settlement Runtime
 *
 * The execution substrate every contract runs on. It gives each
 * state-changing operation what a chain would:
 *
 *   - a caller identity (msg.sender) that the callee cannot forge
 *   - native value attached to the call
 *   - all-or-nothing execution: a throw anywhere inside a call frame
 *     restores every journaled participant to its state at frame entry
 *
 * Execution is single-threaded and synchronous. The only reentry point
 * is a venue calling back into the contract that unlocked it, and that
 * callback arrives as a nested frame whose sender is the venue.
 */

import { normalizeSuiAddress } from '@mysten/sui/utils';
import { LedgerError } from './errors.js';
import { EventLog } from './event-log.js';
import { Ledger } from './ledger.js';
import { NATIVE_CURRENCY, ZERO_ADDRESS } from './types.js';

// ============================================================
// Types
// ============================================================

/** State that must roll back with a failed call frame */
export interface Journaled<S> {
    snapshot(): S;
    restore(snapshot: S): void;
}

export interface CallFrame {
    /** msg.sender */
    sender: string;

    /** Contract being called */
    to: string;

    /** Native value moved sender → to on entry */
    value: bigint;
}

export interface CallRequest {
    from: string;
    to: string;
    value?: bigint;
}

export type CallOutcome<T> =
    | { ok: true; value: T }
    | { ok: false; error: unknown };

interface CheckpointEntry {
    participant: Journaled<unknown>;
    state: unknown;
}

// ============================================================
// Runtime
// ============================================================

export class SettlementRuntime {
    readonly ledger: Ledger;
    readonly events: EventLog;

    private participants: Journaled<unknown>[] = [];
    private frames: CallFrame[] = [];
    private contracts: Map<string, object> = new Map();
    private addressCounter = 0x1000n;

    constructor() {
        this.ledger = new Ledger();
        this.events = new EventLog();
        this.track(this.ledger);
        this.track(this.events);
    }

    // --------------------------------------------------------
    // Registry
    // --------------------------------------------------------

    /** Fresh contract address, deterministic per runtime */
    nextAddress(): string {
        this.addressCounter++;
        return normalizeSuiAddress(`0x${this.addressCounter.toString(16)}`);
    }

    /** Make a contract reachable by address (venues call back through this) */
    register(contract: { readonly address: string }): void {
        this.contracts.set(normalizeSuiAddress(contract.address), contract);
    }

    resolve(address: string): object | undefined {
        return this.contracts.get(normalizeSuiAddress(address));
    }

    /** Include a participant in every future checkpoint */
    track<S>(participant: Journaled<S>): void {
        this.participants.push(participant);
    }

    // --------------------------------------------------------
    // Call Frames
    // --------------------------------------------------------

    /** msg.sender of the current frame, the zero address outside any frame */
    get sender(): string {
        return this.frames[this.frames.length - 1]?.sender ?? ZERO_ADDRESS;
    }

    get depth(): number {
        return this.frames.length;
    }

    /** Current frame. Throws outside a call. */
    msg(): CallFrame {
        const frame = this.frames[this.frames.length - 1];
        if (!frame) {
            throw new LedgerError('NO_CALL_FRAME', 'State-changing operations must run inside runtime.call()');
        }
        return frame;
    }

    /**
     * Run `fn` as `request.from` calling `request.to`, moving `value` first.
     * On any throw, every journaled participant is restored and the error
     * is rethrown unchanged.
     */
    call<T>(request: CallRequest, fn: () => T): T {
        const value = request.value ?? 0n;
        if (value < 0n) {
            throw new LedgerError('INVALID_AMOUNT', `Call value must not be negative, got ${value}`);
        }

        const frame: CallFrame = {
            sender: normalizeSuiAddress(request.from),
            to: normalizeSuiAddress(request.to),
            value,
        };

        const checkpoint = this.checkpoint();
        this.frames.push(frame);

        let result: T;
        try {
            if (value > 0n) {
                this.ledger.transfer(NATIVE_CURRENCY, frame.sender, frame.to, value);
            }
            result = fn();
        } catch (err) {
            this.frames.pop();
            this.revert(checkpoint);
            throw err;
        }

        this.frames.pop();
        if (this.frames.length === 0) {
            this.events.publish();
        }
        return result;
    }

    /** Like `call`, but a failure is returned instead of thrown */
    tryCall<T>(request: CallRequest, fn: () => T): CallOutcome<T> {
        try {
            return { ok: true, value: this.call(request, fn) };
        } catch (error) {
            return { ok: false, error };
        }
    }

    /** Plain native transfer as its own frame (recipient may reject it) */
    send(from: string, to: string, value: bigint): CallOutcome<void> {
        return this.tryCall({ from, to, value }, () => undefined);
    }

    // --------------------------------------------------------
    // Journaling
    // --------------------------------------------------------

    private checkpoint(): CheckpointEntry[] {
        return this.participants.map((participant) => ({
            participant,
            state: participant.snapshot(),
        }));
    }

    private revert(checkpoint: CheckpointEntry[]): void {
        for (const { participant, state } of checkpoint) {
            participant.restore(state);
        }
    }
}
