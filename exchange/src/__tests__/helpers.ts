import { normalizeSuiAddress } from '@mysten/sui/utils';
import { BurnAccumulator } from '../burn-accumulator.js';
import type { BurnAccumulatorConfig } from '../burn-accumulator.js';
import { ConfigStore } from '../config.js';
import type { FeeConfig, MarketConfig } from '../config.js';
import { createLogger } from '../logger.js';
import { MemoryVenue } from '../memory-venue.js';
import { getLiquidityForAmount1, getSqrtPriceAtTick } from '../pool-math.js';
import { SettlementRuntime } from '../runtime.js';
import { TradeEngine } from '../trade-engine.js';
import { DEFAULT_BURN_SINK, NATIVE_CURRENCY } from '../types.js';
import type {
    BuyParams,
    HarvestResult,
    PoolKey,
    SellParams,
    UnlockCallback,
} from '../types.js';

// ============================================================
// Constants
// ============================================================

export const ONE = 1_000_000_000_000_000_000n;
export const TOTAL_SUPPLY = 1_000_000_000n * ONE;
export const CREATOR_ALLOCATION = 100_000_000n * ONE;

export const CREATOR = normalizeSuiAddress('0xc0ffee');
export const PROTOCOL = normalizeSuiAddress('0x9a07');
export const OWNER = normalizeSuiAddress('0x0a11');
export const ALICE = normalizeSuiAddress('0xa11ce');
export const BOB = normalizeSuiAddress('0xb0b');
export const REFERRER = normalizeSuiAddress('0x4ef');
export const ATTACKER = normalizeSuiAddress('0xbad');

export const TEST_FEES: FeeConfig = {
    totalFeeBps: 100,
    creatorShareBps: 5_000,
    burnShareBps: 2_000,
    protocolShareBps: 5_000,
    referrerShareBps: 3_000,
    protocolFeeRecipient: PROTOCOL,
};

export const TEST_MARKET: MarketConfig = {
    minOrderSize: 1_000n,
    lpFeePips: 3_000,
    tickSpacing: 200,
    tickLower: 69_000,
    tickUpper: 184_200,
};

export const silentLogger = createLogger('Test', 'silent');

// ============================================================
// Venue Participants
// ============================================================

/** Seeds a single-sided currency1 band on a fresh pool */
export class LiquidityProvider implements UnlockCallback {
    readonly address: string;

    private runtime: SettlementRuntime;
    private venue: MemoryVenue;
    private pending: { key: PoolKey; tickLower: number; tickUpper: number; liquidity: bigint } | null = null;

    constructor(runtime: SettlementRuntime, venue: MemoryVenue) {
        this.runtime = runtime;
        this.venue = venue;
        this.address = runtime.nextAddress();
        runtime.register(this);
    }

    seed(key: PoolKey, tickLower: number, tickUpper: number, amount1: bigint): void {
        const sqrtLower = getSqrtPriceAtTick(tickLower);
        const sqrtUpper = getSqrtPriceAtTick(tickUpper);

        this.runtime.ledger.mint(key.currency1, this.address, amount1);
        this.venue.initialize(key, sqrtUpper);
        this.pending = { key, tickLower, tickUpper, liquidity: getLiquidityForAmount1(sqrtLower, sqrtUpper, amount1) };
        try {
            this.runtime.call({ from: this.address, to: this.venue.address }, () => this.venue.unlock(new Uint8Array()));
        } finally {
            this.pending = null;
        }
    }

    unlockCallback(): Uint8Array {
        const pending = this.pending;
        if (!pending) throw new Error('No liquidity change pending');

        const { callerDelta } = this.runtime.call(
            { from: this.address, to: this.venue.address },
            () => this.venue.modifyLiquidity(pending.key, {
                tickLower: pending.tickLower,
                tickUpper: pending.tickUpper,
                liquidityDelta: pending.liquidity,
            }),
        );

        const owed = -callerDelta.amount1;
        if (owed > 0n) {
            this.runtime.call(
                { from: this.address, to: this.venue.address },
                () => this.venue.settle(pending.key.currency1, owed),
            );
        }
        return new Uint8Array();
    }
}

/** Runs a hook (once) before handling the next unlock */
export class ReentrantVenue extends MemoryVenue {
    onUnlock: (() => void) | null = null;

    override unlock(payload: Uint8Array): Uint8Array {
        const hook = this.onUnlock;
        if (hook) {
            this.onUnlock = null;
            hook();
        }
        return super.unlock(payload);
    }
}

/** Venue that can be told to return from `unlock` without calling back */
export class SilentVenue extends MemoryVenue {
    silent = false;

    override unlock(payload: Uint8Array): Uint8Array {
        return this.silent ? new Uint8Array() : super.unlock(payload);
    }
}

// ============================================================
// Fixture
// ============================================================

export interface FixtureOptions {
    fees?: Partial<FeeConfig>;
    market?: Partial<MarketConfig>;

    /** false builds the engine without an accumulator */
    accumulator?: Partial<BurnAccumulatorConfig> | false;

    venue?: (runtime: SettlementRuntime) => MemoryVenue;

    /** Native minted to ALICE and BOB */
    fund?: bigint;
}

export interface Fixture {
    runtime: SettlementRuntime;
    venue: MemoryVenue;
    config: ConfigStore;
    engine: TradeEngine;
    accumulator: BurnAccumulator | undefined;
    targetAsset: string;
    targetKey: PoolKey;
}

export function createFixture(options: FixtureOptions = {}): Fixture {
    const runtime = new SettlementRuntime();
    const venue = options.venue ? options.venue(runtime) : new MemoryVenue(runtime);
    const config = new ConfigStore({
        fees: { ...TEST_FEES, ...options.fees },
        market: { ...TEST_MARKET, ...options.market },
    });

    // Burn target: a second token with its own native pool
    const provider = new LiquidityProvider(runtime, venue);
    const targetAsset = runtime.nextAddress();
    const targetKey: PoolKey = { currency0: NATIVE_CURRENCY, currency1: targetAsset, fee: 3_000, tickSpacing: 200 };
    provider.seed(targetKey, 69_000, 184_200, TOTAL_SUPPLY);

    const accumulator = options.accumulator === false
        ? undefined
        : new BurnAccumulator({
            runtime,
            venue,
            owner: OWNER,
            config: {
                targetAsset,
                poolKey: targetKey,
                sink: DEFAULT_BURN_SINK,
                enabled: true,
                maxSlippageBps: 100,
                quoter: venue,
                ...options.accumulator,
            },
            logger: silentLogger,
        });

    const engine = new TradeEngine({
        runtime,
        venue,
        quoter: venue,
        config,
        burnAccumulator: accumulator,
        logger: silentLogger,
    });

    const fund = options.fund ?? 1_000n * ONE;
    runtime.ledger.mint(NATIVE_CURRENCY, ALICE, fund);
    runtime.ledger.mint(NATIVE_CURRENCY, BOB, fund);

    runtime.call({ from: CREATOR, to: engine.address }, () => engine.initialize({
        name: 'Test Token',
        symbol: 'TEST',
        totalSupply: TOTAL_SUPPLY,
        creatorAllocation: CREATOR_ALLOCATION,
    }));

    return { runtime, venue, config, engine, accumulator, targetAsset, targetKey };
}

// ============================================================
// Calls
// ============================================================

export function buy(f: Fixture, from: string, value: bigint, params: Partial<BuyParams> = {}): bigint {
    return f.runtime.call(
        { from, to: f.engine.address, value },
        () => f.engine.buy({ recipient: from, ...params }),
    );
}

export function sell(
    f: Fixture,
    from: string,
    amount: bigint,
    params: Partial<Omit<SellParams, 'amount'>> = {},
): bigint {
    return f.runtime.call(
        { from, to: f.engine.address },
        () => f.engine.sell({ recipient: from, ...params, amount }),
    );
}

export function harvest(f: Fixture, from: string = BOB): HarvestResult {
    return f.runtime.call({ from, to: f.engine.address }, () => f.engine.harvest());
}

export function requireAccumulator(f: Fixture): BurnAccumulator {
    if (!f.accumulator) throw new Error('Fixture was built without an accumulator');
    return f.accumulator;
}

export function configureAccumulator(f: Fixture, patch: Partial<BurnAccumulatorConfig>): void {
    const accumulator = requireAccumulator(f);
    f.runtime.call({ from: OWNER, to: accumulator.address }, () => accumulator.configure(patch));
}

export function nativeBalance(f: Fixture, holder: string): bigint {
    return f.runtime.ledger.balanceOf(NATIVE_CURRENCY, holder);
}

export function tokenBalance(f: Fixture, holder: string): bigint {
    return f.engine.balanceOf(holder);
}

/** Run `fn` and return what it threw */
export function catchError(fn: () => unknown): unknown {
    try {
        fn();
    } catch (err) {
        return err;
    }
    throw new Error('Expected the call to throw');
}
