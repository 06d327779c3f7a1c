/**
 * Bondline: Burn Accumulator
 *
 * Buffers the burn share of trading fees (native asset) and converts it
 * into the target asset on demand, sending the output straight to an
 * unrecoverable sink.
 *
 *   deposit()  payable, fire-and-forget from the engine's point of view
 *   flush()    permissionless, swaps the whole pending balance
 *
 * A failed flush leaves the pending balance exactly as it was. An
 * implicit flush (auto-flush on deposit) never fails the deposit.
 */

import { isValidSuiAddress, normalizeSuiAddress } from '@mysten/sui/utils';
import {
    AccumulatorError,
    ConfigError,
    describeError,
    GuardViolationError,
    SlippageError,
    ValidationError,
} from './errors.js';
import { createLogger } from './logger.js';
import type { Logger } from './logger.js';
import { applySlippage } from './math.js';
import { defaultPriceLimit } from './pool-math.js';
import type { CallFrame, Journaled, SettlementRuntime } from './runtime.js';
import { decodeSwapOutcome, encodeSwapOutcome } from './settlement-codec.js';
import type { SwapOutcome } from './settlement-codec.js';
import { SettlementGuard } from './settlement-guard.js';
import { NATIVE_CURRENCY, ZERO_ADDRESS } from './types.js';
import type {
    PoolKey,
    SettlementContext,
    SettlementVenue,
    UnlockCallback,
    VenueQuoter,
} from './types.js';

// ============================================================
// Types
// ============================================================

export interface BurnAccumulatorConfig {
    /** Asset bought with the buffered funds and destroyed */
    targetAsset: string;

    /** Venue pool trading the native asset (currency0) for the target (currency1) */
    poolKey: PoolKey;

    /** Output destination; nothing can move funds out of it */
    sink: string;

    enabled: boolean;

    /** Tolerance below the quote before a flush aborts */
    maxSlippageBps: number;

    /** Without a quoter the flush has no output floor */
    quoter?: VenueQuoter;

    /** Flush automatically once pending reaches this amount */
    autoFlushThreshold?: bigint;
}

export interface BurnAccumulatorOptions {
    runtime: SettlementRuntime;
    venue: SettlementVenue;

    /** May reconfigure the accumulator */
    owner: string;

    config: BurnAccumulatorConfig;
    address?: string;
    logger?: Logger;
}

interface AccumulatorSnapshot {
    pending: bigint;
    config: BurnAccumulatorConfig;
}

// ============================================================
// Accumulator
// ============================================================

export class BurnAccumulator implements UnlockCallback, Journaled<AccumulatorSnapshot> {
    readonly address: string;
    readonly owner: string;

    private runtime: SettlementRuntime;
    private venue: SettlementVenue;
    private guard: SettlementGuard;
    private log: Logger;

    private pending = 0n;
    private config: BurnAccumulatorConfig;

    constructor(options: BurnAccumulatorOptions) {
        validateAccumulatorConfig(options.config);

        this.runtime = options.runtime;
        this.venue = options.venue;
        this.owner = normalizeSuiAddress(options.owner);
        this.address = normalizeSuiAddress(options.address ?? options.runtime.nextAddress());
        this.config = normalizeConfig(options.config);
        this.guard = new SettlementGuard(options.venue.address);
        this.log = options.logger ?? createLogger('Burner');

        this.runtime.register(this);
        this.runtime.track(this);
        this.runtime.track(this.guard);
    }

    // --------------------------------------------------------
    // Deposits
    // --------------------------------------------------------

    /**
     * Credit the call's native value to the pending balance. A disabled
     * accumulator refunds the caller and returns false.
     */
    deposit(): boolean {
        const frame = this.enter(true);
        const amount = frame.value;
        if (amount === 0n) {
            throw new ValidationError('ZERO_AMOUNT', 'Deposit requires a non-zero native value');
        }

        if (!this.config.enabled) {
            this.runtime.ledger.transfer(NATIVE_CURRENCY, this.address, frame.sender, amount);
            this.emitDeposit(frame.sender, amount, false);
            this.log.warn('Deposit refused while disabled', { from: frame.sender, amount });
            return false;
        }

        this.pending += amount;
        this.emitDeposit(frame.sender, amount, true);
        this.log.debug('Deposit accepted', { from: frame.sender, amount, pending: this.pending });

        const threshold = this.config.autoFlushThreshold;
        if (threshold !== undefined && this.pending >= threshold) {
            this.tryAutoFlush(frame.sender);
        }
        return true;
    }

    // --------------------------------------------------------
    // Flush
    // --------------------------------------------------------

    /**
     * Swap the whole pending balance into the target asset and send it
     * to the sink. No-op (returns 0) when disabled or empty.
     *
     * @returns target asset sent to the sink
     */
    flush(): bigint {
        const frame = this.enter(false);
        return this.executeFlush(frame.sender);
    }

    /** Entry point for the venue only, while a flush is armed */
    unlockCallback(payload: Uint8Array): Uint8Array {
        const context = this.guard.consume(this.runtime.sender, payload);
        if (context.kind !== 'flush') {
            throw new GuardViolationError('CONTEXT_MISMATCH', `Accumulator cannot settle a ${context.kind}`);
        }
        return encodeSwapOutcome(this.settleFlush(context));
    }

    // --------------------------------------------------------
    // Configuration
    // --------------------------------------------------------

    /** Owner only. The merged config is validated before it applies. */
    configure(patch: Partial<BurnAccumulatorConfig>): void {
        const frame = this.enter(false);
        if (frame.sender !== this.owner) {
            throw new AccumulatorError('NOT_OWNER', `${frame.sender} is not the accumulator owner`);
        }

        const next = { ...this.config, ...patch };
        validateAccumulatorConfig(next);
        this.config = normalizeConfig(next);
        this.log.info('Configuration updated', {
            enabled: this.config.enabled,
            maxSlippageBps: this.config.maxSlippageBps,
            autoFlushThreshold: this.config.autoFlushThreshold,
        });
    }

    // --------------------------------------------------------
    // Views
    // --------------------------------------------------------

    pendingBalance(): bigint {
        return this.pending;
    }

    getConfig(): Readonly<BurnAccumulatorConfig> {
        return { ...this.config, poolKey: { ...this.config.poolKey } };
    }

    isEnabled(): boolean {
        return this.config.enabled;
    }

    // --------------------------------------------------------
    // Journaling
    // --------------------------------------------------------

    snapshot(): AccumulatorSnapshot {
        return { pending: this.pending, config: this.config };
    }

    restore(snapshot: AccumulatorSnapshot): void {
        this.pending = snapshot.pending;
        this.config = snapshot.config;
    }

    // --------------------------------------------------------
    // Internals
    // --------------------------------------------------------

    private executeFlush(caller: string): bigint {
        const config = this.config;
        if (!config.enabled || this.pending === 0n) return 0n;

        const amountIn = this.pending;
        const minAmountOut = this.slippageFloor(config, amountIn);

        const payload = this.guard.run(
            {
                kind: 'flush',
                amount: amountIn,
                sqrtPriceLimitX96: 0n,
                minAmountOut,
                requester: caller,
                recipient: config.sink,
            },
            (armed) => {
                const result = this.runtime.call(
                    { from: this.address, to: this.venue.address },
                    () => this.venue.unlock(armed),
                );
                if (this.guard.isArmed) {
                    throw new GuardViolationError('CONTEXT_MISMATCH', 'Venue returned without settling the flush');
                }
                return result;
            },
        );
        const outcome = decodeSwapOutcome(payload);

        this.pending = 0n;
        this.runtime.events.emit({
            type: 'BurnFlushed',
            emitter: this.address,
            caller,
            amountIn,
            amountOut: outcome.amountOut,
            minAmountOut,
            targetAsset: config.targetAsset,
            sink: config.sink,
        });
        this.log.info('Flushed to sink', { amountIn, amountOut: outcome.amountOut, minAmountOut });

        return outcome.amountOut;
    }

    /** floor(quote × (1 − maxSlippage)), or 0 without a quoter */
    private slippageFloor(config: BurnAccumulatorConfig, amountIn: bigint): bigint {
        if (!config.quoter) return 0n;

        let quotedOut: bigint;
        try {
            quotedOut = config.quoter.quoteExactInputSingle({
                key: config.poolKey,
                zeroForOne: true,
                exactAmount: amountIn,
            }).amountOut;
        } catch (err) {
            throw new AccumulatorError('QUOTE_FAILED', `Quote for ${amountIn} failed: ${describeError(err)}`);
        }
        return applySlippage(quotedOut, config.maxSlippageBps);
    }

    private settleFlush(context: SettlementContext): SwapOutcome {
        const config = this.config;
        const key = config.poolKey;

        const delta = this.callVenue((venue) => venue.swap(key, {
            zeroForOne: true,
            amountSpecified: -context.amount,
            sqrtPriceLimitX96: defaultPriceLimit(true),
        }));

        const consumed = -delta.amount0;
        const received = delta.amount1;
        if (consumed !== context.amount) {
            throw new SlippageError('PARTIAL_FILL', `Venue filled ${consumed} of ${context.amount}`);
        }
        if (received === 0n || received < context.minAmountOut) {
            throw new SlippageError('MIN_OUTPUT', `Flush output ${received} is below the floor of ${context.minAmountOut}`);
        }

        this.callVenue((venue) => venue.settle(NATIVE_CURRENCY, consumed), consumed);
        this.callVenue((venue) => venue.take(config.targetAsset, context.recipient, received));

        return {
            amountIn: consumed,
            amountOut: received,
            sqrtPriceX96After: this.venue.getSlot0(key).sqrtPriceX96,
        };
    }

    /** Best-effort flush in its own frame; failure is reported, never thrown */
    private tryAutoFlush(caller: string): void {
        const outcome = this.runtime.tryCall(
            { from: this.address, to: this.address },
            () => this.executeFlush(caller),
        );
        if (outcome.ok) return;

        const reason = describeError(outcome.error);
        this.runtime.events.emit({
            type: 'BurnFlushFailed',
            emitter: this.address,
            pending: this.pending,
            reason,
        });
        this.log.warn('Automatic flush failed, balance stays pending', { pending: this.pending, reason });
    }

    private emitDeposit(from: string, amount: bigint, accepted: boolean): void {
        this.runtime.events.emit({
            type: 'BurnDeposit',
            emitter: this.address,
            from,
            amount,
            accepted,
            pendingAfter: this.pending,
        });
    }

    private enter(payable: boolean): CallFrame {
        const frame = this.runtime.msg();
        if (frame.to !== this.address) {
            throw new ValidationError('WRONG_TARGET', `Call addressed to ${frame.to}, not the accumulator ${this.address}`);
        }
        if (!payable && frame.value > 0n) {
            throw new ValidationError('UNEXPECTED_VALUE', `Operation does not accept native value (${frame.value} sent)`);
        }
        return frame;
    }

    private callVenue<T>(fn: (venue: SettlementVenue) => T, value: bigint = 0n): T {
        return this.runtime.call({ from: this.address, to: this.venue.address, value }, () => fn(this.venue));
    }
}

// ============================================================
// Validation
// ============================================================

export function validateAccumulatorConfig(config: BurnAccumulatorConfig): void {
    if (!Number.isInteger(config.maxSlippageBps) || config.maxSlippageBps < 0 || config.maxSlippageBps > 10_000) {
        throw new ConfigError('INVALID_BPS', `maxSlippageBps must be an integer in [0, 10000], got ${config.maxSlippageBps}`);
    }
    if (!isValidSuiAddress(config.sink) || normalizeSuiAddress(config.sink) === ZERO_ADDRESS) {
        throw new ConfigError('INVALID_ADDRESS', `Invalid burn sink: ${config.sink}`);
    }
    if (!isValidSuiAddress(config.targetAsset) || normalizeSuiAddress(config.targetAsset) === NATIVE_CURRENCY) {
        throw new ConfigError('INVALID_ADDRESS', `Invalid target asset: ${config.targetAsset}`);
    }
    if (
        normalizeSuiAddress(config.poolKey.currency0) !== NATIVE_CURRENCY ||
        normalizeSuiAddress(config.poolKey.currency1) !== normalizeSuiAddress(config.targetAsset)
    ) {
        throw new ConfigError('INVALID_ADDRESS', 'Pool must trade the native asset (currency0) for the target asset (currency1)');
    }
    if (config.autoFlushThreshold !== undefined && config.autoFlushThreshold <= 0n) {
        throw new ConfigError('INVALID_AMOUNT', `autoFlushThreshold must be positive, got ${config.autoFlushThreshold}`);
    }
}

function normalizeConfig(config: BurnAccumulatorConfig): BurnAccumulatorConfig {
    return {
        ...config,
        targetAsset: normalizeSuiAddress(config.targetAsset),
        sink: normalizeSuiAddress(config.sink),
        poolKey: {
            ...config.poolKey,
            currency0: normalizeSuiAddress(config.poolKey.currency0),
            currency1: normalizeSuiAddress(config.poolKey.currency1),
        },
    };
}
