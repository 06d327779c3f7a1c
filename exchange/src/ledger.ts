/**
 * Bondline: Ledger
 *
 * In-memory balances for every asset the exchange touches: the native
 * funding asset, the traded tokens and any burn target. Journaled so a
 * failed call frame can put every balance back.
 *
 * Native transfers to an address flagged with `setAcceptsNative(addr, false)`
 * are rejected, which is how an unreachable fee recipient looks.
 */

import { normalizeSuiAddress } from '@mysten/sui/utils';
import { LedgerError } from './errors.js';
import { NATIVE_CURRENCY } from './types.js';
import type { Journaled } from './runtime.js';

export interface LedgerSnapshot {
    balances: Map<string, Map<string, bigint>>;
    supplies: Map<string, bigint>;
    rejectsNative: Set<string>;
}

export class Ledger implements Journaled<LedgerSnapshot> {
    private balances: Map<string, Map<string, bigint>> = new Map();
    private supplies: Map<string, bigint> = new Map();
    private rejectsNative: Set<string> = new Set();

    // --------------------------------------------------------
    // Reads
    // --------------------------------------------------------

    balanceOf(asset: string, holder: string): bigint {
        return this.balances.get(normalizeSuiAddress(asset))?.get(normalizeSuiAddress(holder)) ?? 0n;
    }

    totalSupply(asset: string): bigint {
        return this.supplies.get(normalizeSuiAddress(asset)) ?? 0n;
    }

    acceptsNative(holder: string): boolean {
        return !this.rejectsNative.has(normalizeSuiAddress(holder));
    }

    // --------------------------------------------------------
    // Writes
    // --------------------------------------------------------

    setAcceptsNative(holder: string, accepts: boolean): void {
        const key = normalizeSuiAddress(holder);
        if (accepts) this.rejectsNative.delete(key);
        else this.rejectsNative.add(key);
    }

    mint(asset: string, to: string, amount: bigint): void {
        this.requirePositive(amount);
        const key = normalizeSuiAddress(asset);
        this.credit(key, normalizeSuiAddress(to), amount);
        this.supplies.set(key, this.totalSupply(key) + amount);
    }

    burn(asset: string, from: string, amount: bigint): void {
        this.requirePositive(amount);
        const key = normalizeSuiAddress(asset);
        this.debit(key, normalizeSuiAddress(from), amount);
        this.supplies.set(key, this.totalSupply(key) - amount);
    }

    transfer(asset: string, from: string, to: string, amount: bigint): void {
        this.requirePositive(amount);
        const key = normalizeSuiAddress(asset);
        const sender = normalizeSuiAddress(from);
        const receiver = normalizeSuiAddress(to);

        if (key === NATIVE_CURRENCY && this.rejectsNative.has(receiver)) {
            throw new LedgerError('TRANSFER_REJECTED', `${receiver} does not accept the native asset`);
        }

        this.debit(key, sender, amount);
        this.credit(key, receiver, amount);
    }

    // --------------------------------------------------------
    // Journaling
    // --------------------------------------------------------

    snapshot(): LedgerSnapshot {
        const balances = new Map<string, Map<string, bigint>>();
        for (const [asset, holders] of this.balances) {
            balances.set(asset, new Map(holders));
        }
        return {
            balances,
            supplies: new Map(this.supplies),
            rejectsNative: new Set(this.rejectsNative),
        };
    }

    restore(snapshot: LedgerSnapshot): void {
        this.balances = snapshot.balances;
        this.supplies = snapshot.supplies;
        this.rejectsNative = snapshot.rejectsNative;
    }

    // --------------------------------------------------------
    // Internals
    // --------------------------------------------------------

    private requirePositive(amount: bigint): void {
        if (amount <= 0n) {
            throw new LedgerError('INVALID_AMOUNT', `Amount must be positive, got ${amount}`);
        }
    }

    private credit(asset: string, holder: string, amount: bigint): void {
        let holders = this.balances.get(asset);
        if (!holders) {
            holders = new Map();
            this.balances.set(asset, holders);
        }
        holders.set(holder, (holders.get(holder) ?? 0n) + amount);
    }

    private debit(asset: string, holder: string, amount: bigint): void {
        const balance = this.balanceOf(asset, holder);
        if (balance < amount) {
            throw new LedgerError(
                'INSUFFICIENT_FUNDS',
                `${holder} holds ${balance} of ${asset}, needs ${amount}`,
            );
        }
        const holders = this.balances.get(asset);
        if (holders) holders.set(holder, balance - amount);
    }
}
