/**
 * Bondline: Trade Engine
 *
 * One bonding-curve token and the settlement of every trade in it.
 * Pricing comes entirely from the venue position seeded at
 * initialization; the engine only moves funds in and out of it.
 *
 * Buy:
 * 1. Validate: non-zero, at least the minimum order
 * 2. fee = floor(input × totalFeeBps), net = input − fee
 * 3. Arm the guard, unlock the venue, swap exactly `net` in the callback
 * 4. Reject anything but a full fill, then the buyer's output floor
 * 5. Run the fee waterfall (burn share is only deposited, never swapped)
 * 6. Deliver tokens, emit TradeSettled
 *
 * Sell mirrors it with the fee taken from the proceeds. The payout
 * floor is checked after the fee.
 *
 * Every public operation runs inside a runtime call frame addressed to
 * the engine. Any throw reverts the whole frame.
 */

import { isValidSuiAddress, normalizeSuiAddress } from '@mysten/sui/utils';
import type { ExchangeConfigReader, FeeConfig } from './config.js';
import {
    describeError,
    GuardViolationError,
    SlippageError,
    ValidationError,
    VenueError,
} from './errors.js';
import {
    computeTradeFee,
    HARVEST_SHARES,
    runPayoutWaterfall,
    splitFee,
} from './fee-waterfall.js';
import type { PayoutAttempt, PayoutReport, PayoutStep } from './fee-waterfall.js';
import { createLogger } from './logger.js';
import type { Logger } from './logger.js';
import { calculatePrice } from './math.js';
import {
    defaultPriceLimit,
    getAmountsForLiquidity,
    getLiquidityForAmount1,
    getSqrtPriceAtTick,
} from './pool-math.js';
import type { CallFrame, Journaled, SettlementRuntime } from './runtime.js';
import {
    decodeAmountsOutcome,
    decodeSwapOutcome,
    encodeAmountsOutcome,
    encodeSwapOutcome,
} from './settlement-codec.js';
import type { AmountsOutcome, SwapOutcome } from './settlement-codec.js';
import { SettlementGuard } from './settlement-guard.js';
import { NATIVE_CURRENCY, ZERO_ADDRESS } from './types.js';
import type {
    BalanceDelta,
    BuyParams,
    BuyQuote,
    FeeSplit,
    HarvestResult,
    PoolKey,
    SellParams,
    SellQuote,
    SettlementContext,
    SettlementVenue,
    TokenState,
    TradeSide,
    UnlockCallback,
    VenueQuoter,
} from './types.js';

// ============================================================
// Types
// ============================================================

/** Where the burn share of every fee is deposited */
export interface BurnDepositTarget {
    readonly address: string;

    /** Payable. Returns false when the deposit was refunded. */
    deposit(): boolean;
}

export interface TradeEngineOptions {
    runtime: SettlementRuntime;
    venue: SettlementVenue;

    /** Read-only pricing for quotes */
    quoter: VenueQuoter;

    config: ExchangeConfigReader;

    /** Omit to send every burn share to the protocol */
    burnAccumulator?: BurnDepositTarget;

    address?: string;
    logger?: Logger;
}

export interface InitializeParams {
    name: string;
    symbol: string;
    totalSupply: bigint;

    /** Paid to the creator (the caller); the rest seeds the venue position */
    creatorAllocation: bigint;
}

export interface TradeWithHarvest {
    /** Tokens out (buy) or funding out (sell) */
    output: bigint;
    harvest: HarvestResult;
}

interface SettledSwap {
    outcome: SwapOutcome;
    sqrtPriceBeforeX96: bigint;
}

// ============================================================
// Engine
// ============================================================

export class TradeEngine implements UnlockCallback, Journaled<TokenState | null> {
    readonly address: string;

    private runtime: SettlementRuntime;
    private venue: SettlementVenue;
    private quoter: VenueQuoter;
    private config: ExchangeConfigReader;
    private burnAccumulator: BurnDepositTarget | undefined;
    private guard: SettlementGuard;
    private log: Logger;

    private state: TokenState | null = null;

    constructor(options: TradeEngineOptions) {
        this.runtime = options.runtime;
        this.venue = options.venue;
        this.quoter = options.quoter;
        this.config = options.config;
        this.burnAccumulator = options.burnAccumulator;
        this.address = normalizeSuiAddress(options.address ?? options.runtime.nextAddress());
        this.guard = new SettlementGuard(options.venue.address);
        this.log = options.logger ?? createLogger('Engine');

        this.runtime.register(this);
        this.runtime.track(this);
        this.runtime.track(this.guard);
    }

    // --------------------------------------------------------
    // Lifecycle
    // --------------------------------------------------------

    /**
     * Mint the fixed supply, pay the creator allocation and seed the
     * single-sided venue position with the rest. Once only.
     */
    initialize(params: InitializeParams): TokenState {
        const frame = this.enter(false);
        if (this.state) {
            throw new ValidationError('ALREADY_INITIALIZED', `${this.state.symbol} is already initialized`);
        }
        if (params.totalSupply <= 0n) {
            throw new ValidationError('INVALID_SUPPLY', `Total supply must be positive, got ${params.totalSupply}`);
        }
        if (params.creatorAllocation < 0n || params.creatorAllocation >= params.totalSupply) {
            throw new ValidationError(
                'INVALID_SUPPLY',
                `Creator allocation ${params.creatorAllocation} must be in [0, ${params.totalSupply})`,
            );
        }

        const market = this.config.getMarketConfig();
        const creator = frame.sender;
        const poolKey: PoolKey = {
            currency0: NATIVE_CURRENCY,
            currency1: this.address,
            fee: market.lpFeePips,
            tickSpacing: market.tickSpacing,
        };
        const liquiditySeed = params.totalSupply - params.creatorAllocation;
        const sqrtLowerX96 = getSqrtPriceAtTick(market.tickLower);
        const sqrtUpperX96 = getSqrtPriceAtTick(market.tickUpper);
        const positionLiquidity = getLiquidityForAmount1(sqrtLowerX96, sqrtUpperX96, liquiditySeed);
        if (positionLiquidity === 0n) {
            throw new ValidationError('INVALID_SUPPLY', `Seed of ${liquiditySeed} is too small to provide liquidity`);
        }

        this.runtime.ledger.mint(this.address, this.address, params.totalSupply);
        if (params.creatorAllocation > 0n) {
            this.runtime.ledger.transfer(this.address, this.address, creator, params.creatorAllocation);
        }

        // The position starts entirely in tokens: price sits at the band's upper edge
        this.callVenue((venue) => venue.initialize(poolKey, sqrtUpperX96));

        this.state = {
            name: params.name,
            symbol: params.symbol,
            creator,
            initialSupply: params.totalSupply,
            creatorAllocation: params.creatorAllocation,
            liquiditySeed,
            positionLiquidity,
            poolKey,
            tickLower: market.tickLower,
            tickUpper: market.tickUpper,
        };

        const seeded = decodeAmountsOutcome(this.unlockWith({
            kind: 'seed',
            amount: positionLiquidity,
            sqrtPriceLimitX96: 0n,
            minAmountOut: 0n,
            requester: creator,
            recipient: this.address,
        }));

        const dust = liquiditySeed - seeded.amount1;
        if (dust > 0n) {
            this.runtime.ledger.burn(this.address, this.address, dust);
        }

        this.runtime.events.emit({
            type: 'TokenInitialized',
            emitter: this.address,
            creator,
            initialSupply: params.totalSupply,
            creatorAllocation: params.creatorAllocation,
            liquiditySeed,
            positionLiquidity,
            sqrtPriceX96: sqrtUpperX96,
        });

        this.log.info(`Initialized ${params.symbol}`, {
            supply: params.totalSupply,
            positionLiquidity,
            seeded: seeded.amount1,
            dustBurned: dust,
        });

        return { ...this.state };
    }

    // --------------------------------------------------------
    // Trading
    // --------------------------------------------------------

    /** Buy with the call's native value. Returns tokens delivered. */
    buy(params: BuyParams): bigint {
        const frame = this.enter(true);
        return this.executeBuy(frame, params);
    }

    /** Sell `params.amount` tokens. Returns the funding paid out after fees. */
    sell(params: SellParams): bigint {
        const frame = this.enter(false);
        return this.executeSell(frame, params);
    }

    /** Collect LP fees the position has accrued and split them 50/50 */
    harvest(): HarvestResult {
        const frame = this.enter(false);
        return this.executeHarvest(frame);
    }

    /** Buy, then harvest, as one unit */
    buyAndHarvest(params: BuyParams): TradeWithHarvest {
        const frame = this.enter(true);
        const output = this.executeBuy(frame, params);
        return { output, harvest: this.executeHarvest(frame) };
    }

    /** Sell, then harvest, as one unit */
    sellAndHarvest(params: SellParams): TradeWithHarvest {
        const frame = this.enter(false);
        const output = this.executeSell(frame, params);
        return { output, harvest: this.executeHarvest(frame) };
    }

    /** Destroy the caller's own tokens */
    burn(amount: bigint): void {
        const frame = this.enter(false);
        this.requireState();
        if (amount <= 0n) {
            throw new ValidationError('ZERO_AMOUNT', 'Burn amount must be positive');
        }
        const balance = this.balanceOf(frame.sender);
        if (balance < amount) {
            throw new ValidationError('INSUFFICIENT_BALANCE', `${frame.sender} holds ${balance}, cannot burn ${amount}`);
        }

        this.runtime.ledger.burn(this.address, frame.sender, amount);
        this.runtime.events.emit({
            type: 'TokensBurned',
            emitter: this.address,
            from: frame.sender,
            amount,
        });
    }

    // --------------------------------------------------------
    // Quotes
    // --------------------------------------------------------

    /**
     * Same fee math as `buy`, then the venue's simulation of `net`.
     * Throws PARTIAL_FILL when the band cannot absorb all of it.
     */
    quoteBuy(input: bigint): BuyQuote {
        const state = this.requireState();
        const { totalFeeBps } = this.config.getFeeConfig();
        const { fee, net } = computeTradeFee(input, totalFeeBps);

        if (net === 0n) {
            return { feeBps: totalFeeBps, fee, net, estimatedOutput: 0n, estimatedPostPrice: this.currentSqrtPriceX96() };
        }

        const quote = this.quoter.quoteExactInputSingle({
            key: state.poolKey,
            zeroForOne: true,
            exactAmount: net,
        });
        requireFullQuote(quote.amountIn, net);

        return {
            feeBps: totalFeeBps,
            fee,
            net,
            estimatedOutput: quote.amountOut,
            estimatedPostPrice: quote.sqrtPriceX96After,
        };
    }

    /** The venue's simulation of `amount` in, then the fee on the proceeds. Throws PARTIAL_FILL like `quoteBuy`. */
    quoteSell(amount: bigint): SellQuote {
        const state = this.requireState();
        const { totalFeeBps } = this.config.getFeeConfig();

        if (amount === 0n) {
            return { feeBps: totalFeeBps, fee: 0n, tokenIn: 0n, estimatedPayout: 0n, estimatedPostPrice: this.currentSqrtPriceX96() };
        }

        const quote = this.quoter.quoteExactInputSingle({
            key: state.poolKey,
            zeroForOne: false,
            exactAmount: amount,
        });
        requireFullQuote(quote.amountIn, amount);
        const { fee, net } = computeTradeFee(quote.amountOut, totalFeeBps);

        return {
            feeBps: totalFeeBps,
            fee,
            tokenIn: amount,
            estimatedPayout: net,
            estimatedPostPrice: quote.sqrtPriceX96After,
        };
    }

    // --------------------------------------------------------
    // Venue Callback
    // --------------------------------------------------------

    /** Entry point for the venue only, while a settlement is armed */
    unlockCallback(payload: Uint8Array): Uint8Array {
        const context = this.guard.consume(this.runtime.sender, payload);

        switch (context.kind) {
            case 'seed':
                return encodeAmountsOutcome(this.settleSeed(context));
            case 'buy':
                return encodeSwapOutcome(this.settleSwap(context, true));
            case 'sell':
                return encodeSwapOutcome(this.settleSwap(context, false));
            case 'harvest':
                return encodeAmountsOutcome(this.settleHarvest());
            case 'flush':
                throw new GuardViolationError('CONTEXT_MISMATCH', 'Engine does not settle flushes');
        }
    }

    // --------------------------------------------------------
    // Views
    // --------------------------------------------------------

    getTokenState(): TokenState | null {
        return this.state ? { ...this.state } : null;
    }

    isInitialized(): boolean {
        return this.state !== null;
    }

    currentSqrtPriceX96(): bigint {
        return this.venue.getSlot0(this.requireState().poolKey).sqrtPriceX96;
    }

    balanceOf(holder: string): bigint {
        return this.runtime.ledger.balanceOf(this.address, holder);
    }

    totalSupply(): bigint {
        return this.runtime.ledger.totalSupply(this.address);
    }

    /** Tokens and funding the position would return if fully withdrawn now */
    positionValue(): { funding: bigint; tokens: bigint } {
        const state = this.requireState();
        const { amount0, amount1 } = getAmountsForLiquidity(
            this.currentSqrtPriceX96(),
            getSqrtPriceAtTick(state.tickLower),
            getSqrtPriceAtTick(state.tickUpper),
            state.positionLiquidity,
            false,
        );
        return { funding: amount0, tokens: amount1 };
    }

    // --------------------------------------------------------
    // Journaling
    // --------------------------------------------------------

    snapshot(): TokenState | null {
        return this.state;
    }

    restore(state: TokenState | null): void {
        this.state = state;
    }

    // --------------------------------------------------------
    // Buy / Sell
    // --------------------------------------------------------

    private executeBuy(frame: CallFrame, params: BuyParams): bigint {
        const state = this.requireState();
        const fees = this.config.getFeeConfig();
        const market = this.config.getMarketConfig();
        const trader = frame.sender;
        const input = frame.value;
        const recipient = this.requireRecipient(params.recipient);
        const referrer = this.normalizeReferrer(params.referrer);

        if (input === 0n) {
            throw new ValidationError('ZERO_AMOUNT', 'Buy requires a non-zero native value');
        }
        if (input < market.minOrderSize) {
            throw new ValidationError('ORDER_TOO_SMALL', `Buy of ${input} is below the minimum of ${market.minOrderSize}`);
        }

        const { fee, net } = computeTradeFee(input, fees.totalFeeBps);
        if (net === 0n) {
            throw new ValidationError('ORDER_TOO_SMALL', `Nothing left to swap after a fee of ${fee}`);
        }
        const split = splitFee(fee, fees, referrer !== ZERO_ADDRESS);

        const { outcome, sqrtPriceBeforeX96 } = this.swapThroughVenue({
            kind: 'buy',
            amount: net,
            sqrtPriceLimitX96: params.sqrtPriceLimitX96 ?? 0n,
            minAmountOut: params.minOutput ?? 0n,
            requester: trader,
            recipient,
        });

        const report = this.distributeFees(split, fees, state.creator, referrer);
        this.runtime.ledger.transfer(this.address, this.address, recipient, outcome.amountOut);

        this.emitTrade('buy', {
            trader,
            recipient,
            referrer,
            gross: input,
            fee,
            net,
            output: outcome.amountOut,
            tokenAmount: outcome.amountOut,
            report,
            sqrtPriceBeforeX96,
            sqrtPriceAfterX96: outcome.sqrtPriceX96After,
            effectivePrice: calculatePrice(outcome.amountOut, input),
        });

        return outcome.amountOut;
    }

    private executeSell(frame: CallFrame, params: SellParams): bigint {
        const state = this.requireState();
        const fees = this.config.getFeeConfig();
        const market = this.config.getMarketConfig();
        const trader = frame.sender;
        const recipient = this.requireRecipient(params.recipient);
        const referrer = this.normalizeReferrer(params.referrer);

        if (params.amount <= 0n) {
            throw new ValidationError('ZERO_AMOUNT', 'Sell amount must be positive');
        }
        const balance = this.balanceOf(trader);
        if (balance < params.amount) {
            throw new ValidationError('INSUFFICIENT_BALANCE', `${trader} holds ${balance}, cannot sell ${params.amount}`);
        }

        this.runtime.ledger.transfer(this.address, trader, this.address, params.amount);

        const { outcome, sqrtPriceBeforeX96 } = this.swapThroughVenue({
            kind: 'sell',
            amount: params.amount,
            sqrtPriceLimitX96: params.sqrtPriceLimitX96 ?? 0n,
            minAmountOut: 0n,
            requester: trader,
            recipient,
        });

        const proceeds = outcome.amountOut;
        if (proceeds < market.minOrderSize) {
            throw new ValidationError('ORDER_TOO_SMALL', `Sell proceeds ${proceeds} are below the minimum of ${market.minOrderSize}`);
        }

        const { fee, net: payout } = computeTradeFee(proceeds, fees.totalFeeBps);
        const minPayout = params.minPayout ?? 0n;
        if (payout < minPayout) {
            throw new SlippageError('MIN_PAYOUT', `Payout ${payout} after a fee of ${fee} is below the minimum of ${minPayout}`);
        }

        const split = splitFee(fee, fees, referrer !== ZERO_ADDRESS);
        const report = this.distributeFees(split, fees, state.creator, referrer);
        if (payout > 0n) {
            this.runtime.ledger.transfer(NATIVE_CURRENCY, this.address, recipient, payout);
        }

        this.emitTrade('sell', {
            trader,
            recipient,
            referrer,
            gross: proceeds,
            fee,
            net: payout,
            output: payout,
            tokenAmount: params.amount,
            report,
            sqrtPriceBeforeX96,
            sqrtPriceAfterX96: outcome.sqrtPriceX96After,
            effectivePrice: calculatePrice(params.amount, payout),
        });

        return payout;
    }

    private swapThroughVenue(context: SettlementContext): SettledSwap {
        const sqrtPriceBeforeX96 = this.currentSqrtPriceX96();
        const outcome = decodeSwapOutcome(this.unlockWith(context));
        return { outcome, sqrtPriceBeforeX96 };
    }

    // --------------------------------------------------------
    // Harvest
    // --------------------------------------------------------

    private executeHarvest(frame: CallFrame): HarvestResult {
        const state = this.requireState();
        const fees = this.config.getFeeConfig();

        const collected = decodeAmountsOutcome(this.unlockWith({
            kind: 'harvest',
            amount: 0n,
            sqrtPriceLimitX96: 0n,
            minAmountOut: 0n,
            requester: frame.sender,
            recipient: this.address,
        }));

        const fundingSplit = splitFee(collected.amount0, HARVEST_SHARES, false);
        const tokenSplit = splitFee(collected.amount1, HARVEST_SHARES, false);

        const report = runPayoutWaterfall(
            [this.nativeStep('creator', state.creator, fundingSplit.creatorFee)],
            {
                recipient: fees.protocolFeeRecipient,
                amount: fundingSplit.protocolFee,
                pay: (amount) => this.sendNative(fees.protocolFeeRecipient, amount),
            },
        );
        this.emitRedirects(report);

        if (tokenSplit.creatorFee > 0n) {
            this.runtime.ledger.transfer(this.address, this.address, state.creator, tokenSplit.creatorFee);
        }
        if (tokenSplit.protocolFee > 0n) {
            this.runtime.ledger.transfer(this.address, this.address, fees.protocolFeeRecipient, tokenSplit.protocolFee);
        }

        const result: HarvestResult = {
            fees0: collected.amount0,
            fees1: collected.amount1,
            creatorFunding: report.paid.creatorFee,
            protocolFunding: report.paid.protocolFee,
            creatorTokens: tokenSplit.creatorFee,
            protocolTokens: tokenSplit.protocolFee,
        };

        this.runtime.events.emit({ type: 'SecondaryRewardsHarvested', emitter: this.address, ...result });
        if (result.fees0 > 0n || result.fees1 > 0n) {
            this.log.info('Harvested LP fees', result);
        }

        return result;
    }

    // --------------------------------------------------------
    // Settlement (inside the venue callback)
    // --------------------------------------------------------

    private settleSeed(context: SettlementContext): AmountsOutcome {
        const state = this.requireState();
        const { callerDelta } = this.callVenue((venue) => venue.modifyLiquidity(state.poolKey, {
            tickLower: state.tickLower,
            tickUpper: state.tickUpper,
            liquidityDelta: context.amount,
        }));

        const owed0 = -callerDelta.amount0;
        const owed1 = -callerDelta.amount1;
        if (owed0 > 0n) {
            throw new VenueError('INVALID_RANGE', `Seeding must be single-sided, venue asked for ${owed0} funding`);
        }
        if (owed1 > 0n) {
            this.callVenue((venue) => venue.settle(this.address, owed1));
        }
        return { amount0: 0n, amount1: owed1 };
    }

    /** Exact-input swap of `context.amount`; only a full fill settles */
    private settleSwap(context: SettlementContext, zeroForOne: boolean): SwapOutcome {
        const state = this.requireState();
        const key = state.poolKey;
        const limit = context.sqrtPriceLimitX96 === 0n ? defaultPriceLimit(zeroForOne) : context.sqrtPriceLimitX96;

        let delta: BalanceDelta;
        try {
            delta = this.callVenue((venue) => venue.swap(key, {
                zeroForOne,
                amountSpecified: -context.amount,
                sqrtPriceLimitX96: limit,
            }));
        } catch (err) {
            if (err instanceof VenueError && err.code === 'PRICE_LIMIT_ALREADY_EXCEEDED') {
                throw new SlippageError('PRICE_LIMIT', `Price already past the limit ${context.sqrtPriceLimitX96}`);
            }
            throw err;
        }

        const consumed = zeroForOne ? -delta.amount0 : -delta.amount1;
        const received = zeroForOne ? delta.amount1 : delta.amount0;
        const sqrtPriceX96After = this.venue.getSlot0(key).sqrtPriceX96;

        if (consumed !== context.amount) {
            if (context.sqrtPriceLimitX96 !== 0n && sqrtPriceX96After === context.sqrtPriceLimitX96) {
                throw new SlippageError(
                    'PRICE_LIMIT',
                    `Price limit reached after ${consumed} of ${context.amount}`,
                );
            }
            throw new SlippageError('PARTIAL_FILL', `Venue filled ${consumed} of ${context.amount}`);
        }

        const floorCode = zeroForOne ? 'MIN_OUTPUT' : 'MIN_PAYOUT';
        if (received === 0n) {
            throw new SlippageError(floorCode, `Swap of ${consumed} produced no output`);
        }
        if (received < context.minAmountOut) {
            throw new SlippageError(floorCode, `Output ${received} is below the minimum of ${context.minAmountOut}`);
        }

        if (zeroForOne) {
            this.callVenue((venue) => venue.settle(NATIVE_CURRENCY, consumed), consumed);
            this.callVenue((venue) => venue.take(this.address, this.address, received));
        } else {
            this.callVenue((venue) => venue.settle(this.address, consumed));
            this.callVenue((venue) => venue.take(NATIVE_CURRENCY, this.address, received));
        }

        return { amountIn: consumed, amountOut: received, sqrtPriceX96After };
    }

    private settleHarvest(): AmountsOutcome {
        const state = this.requireState();
        const { feesAccrued } = this.callVenue((venue) => venue.modifyLiquidity(state.poolKey, {
            tickLower: state.tickLower,
            tickUpper: state.tickUpper,
            liquidityDelta: 0n,
        }));

        if (feesAccrued.amount0 > 0n) {
            this.callVenue((venue) => venue.take(NATIVE_CURRENCY, this.address, feesAccrued.amount0));
        }
        if (feesAccrued.amount1 > 0n) {
            this.callVenue((venue) => venue.take(this.address, this.address, feesAccrued.amount1));
        }
        return { amount0: feesAccrued.amount0, amount1: feesAccrued.amount1 };
    }

    // --------------------------------------------------------
    // Fees
    // --------------------------------------------------------

    /** creator → referrer → burn deposit, then protocol with everything that failed */
    private distributeFees(split: FeeSplit, fees: FeeConfig, creator: string, referrer: string): PayoutReport {
        const accumulator = this.burnAccumulator;
        const steps: PayoutStep[] = [
            this.nativeStep('creator', creator, split.creatorFee),
            this.nativeStep('referrer', referrer, split.referrerFee),
            {
                share: 'burn',
                recipient: accumulator?.address ?? ZERO_ADDRESS,
                amount: split.burnFee,
                attempt: () => this.depositBurn(split.burnFee),
            },
        ];

        const report = runPayoutWaterfall(steps, {
            recipient: fees.protocolFeeRecipient,
            amount: split.protocolFee,
            pay: (amount) => this.sendNative(fees.protocolFeeRecipient, amount),
        });

        this.emitRedirects(report);
        return report;
    }

    private nativeStep(share: 'creator' | 'referrer', recipient: string, amount: bigint): PayoutStep {
        return { share, recipient, amount, attempt: () => this.sendNative(recipient, amount) };
    }

    private sendNative(to: string, amount: bigint): PayoutAttempt {
        const outcome = this.runtime.send(this.address, to, amount);
        return outcome.ok ? { ok: true } : { ok: false, reason: describeError(outcome.error) };
    }

    /** Fire-and-forget: a failed or refused deposit never fails the trade */
    private depositBurn(amount: bigint): PayoutAttempt {
        const accumulator = this.burnAccumulator;
        if (!accumulator) {
            return { ok: false, reason: 'No burn accumulator configured' };
        }

        const outcome = this.runtime.tryCall(
            { from: this.address, to: accumulator.address, value: amount },
            () => accumulator.deposit(),
        );
        if (!outcome.ok) return { ok: false, reason: describeError(outcome.error) };
        return outcome.value ? { ok: true } : { ok: false, reason: 'Burn accumulator refused the deposit' };
    }

    private emitRedirects(report: PayoutReport): void {
        for (const redirect of report.redirects) {
            this.runtime.events.emit({
                type: 'FeeRedirected',
                emitter: this.address,
                share: redirect.share,
                intendedRecipient: redirect.intendedRecipient,
                amount: redirect.amount,
            });
            this.log.warn(`Redirected ${redirect.share} fee to protocol`, {
                recipient: redirect.intendedRecipient,
                amount: redirect.amount,
                reason: redirect.reason,
            });
        }
    }

    private emitTrade(side: TradeSide, record: {
        trader: string;
        recipient: string;
        referrer: string;
        gross: bigint;
        fee: bigint;
        net: bigint;
        output: bigint;
        tokenAmount: bigint;
        report: PayoutReport;
        sqrtPriceBeforeX96: bigint;
        sqrtPriceAfterX96: bigint;
        effectivePrice: bigint;
    }): void {
        const { report, ...fields } = record;
        this.runtime.events.emit({
            type: 'TradeSettled',
            emitter: this.address,
            side,
            ...fields,
            fees: report.paid,
            burnDeposited: report.paid.burnFee > 0n,
            redirectedToProtocol: report.redirected,
        });

        this.log.info(`${side === 'buy' ? 'Buy' : 'Sell'} settled`, {
            trader: record.trader,
            gross: record.gross,
            fee: record.fee,
            output: record.output,
            redirected: report.redirected,
        });
    }

    // --------------------------------------------------------
    // Internals
    // --------------------------------------------------------

    /** Current frame, which must be addressed to this engine */
    private enter(payable: boolean): CallFrame {
        const frame = this.runtime.msg();
        if (frame.to !== this.address) {
            throw new ValidationError('WRONG_TARGET', `Call addressed to ${frame.to}, not the engine ${this.address}`);
        }
        if (!payable && frame.value > 0n) {
            throw new ValidationError('UNEXPECTED_VALUE', `Operation does not accept native value (${frame.value} sent)`);
        }
        return frame;
    }

    private requireState(): TokenState {
        if (!this.state) {
            throw new ValidationError('NOT_INITIALIZED', 'Token has not been initialized');
        }
        return this.state;
    }

    private requireRecipient(recipient: string): string {
        if (!isValidSuiAddress(recipient)) {
            throw new ValidationError('INVALID_ADDRESS', `Invalid recipient: ${recipient}`);
        }
        const normalized = normalizeSuiAddress(recipient);
        if (normalized === ZERO_ADDRESS) {
            throw new ValidationError('ZERO_ADDRESS', 'Recipient must not be the zero address');
        }
        return normalized;
    }

    private normalizeReferrer(referrer: string | undefined): string {
        if (referrer === undefined) return ZERO_ADDRESS;
        if (!isValidSuiAddress(referrer)) {
            throw new ValidationError('INVALID_ADDRESS', `Invalid referrer: ${referrer}`);
        }
        return normalizeSuiAddress(referrer);
    }

    /** Call into the venue as this engine */
    private callVenue<T>(fn: (venue: SettlementVenue) => T, value: bigint = 0n): T {
        return this.runtime.call({ from: this.address, to: this.venue.address, value }, () => fn(this.venue));
    }

    /** Arm, unlock, clear. The venue must have called back before returning. */
    private unlockWith(context: SettlementContext): Uint8Array {
        return this.guard.run(context, (payload) => {
            const result = this.callVenue((venue) => venue.unlock(payload));
            if (this.guard.isArmed) {
                throw new GuardViolationError('CONTEXT_MISMATCH', `Venue returned without settling the ${context.kind}`);
            }
            return result;
        });
    }
}

/** A quote for less than the whole input describes a trade that would revert */
function requireFullQuote(consumed: bigint, requested: bigint): void {
    if (consumed !== requested) {
        throw new SlippageError('PARTIAL_FILL', `Venue would fill ${consumed} of ${requested}`);
    }
}
