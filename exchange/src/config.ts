/**
 * Bondline: Configuration
 *
 * Fee and market parameters live in a ConfigStore. Engines hold only a
 * reader and call it on every operation, so a write applies to the very
 * next trade. Writes are validated before they land: a reader never sees
 * an inconsistent fee split.
 */

import { isValidSuiAddress, normalizeSuiAddress } from '@mysten/sui/utils';
import { ConfigError } from './errors.js';
import { validateFeeShares } from './fee-waterfall.js';
import type { FeeShares } from './fee-waterfall.js';
import { FEE_PIPS_DENOMINATOR, ZERO_ADDRESS } from './types.js';
import { MAX_TICK, MIN_TICK } from './pool-math.js';

// ============================================================
// Types
// ============================================================

export interface FeeConfig extends FeeShares {
    /** Total trading fee in bps (100 = 1%) */
    totalFeeBps: number;

    /** Receives protocol fees and every redirected share */
    protocolFeeRecipient: string;
}

export interface MarketConfig {
    /** Smallest accepted order, funding units for buys and proceeds for sells */
    minOrderSize: bigint;

    /** Venue LP fee in pips (3000 = 0.3%) */
    lpFeePips: number;

    tickSpacing: number;
    tickLower: number;
    tickUpper: number;
}

export interface ExchangeConfig {
    fees: FeeConfig;
    market: MarketConfig;
}

/** Live read access. Implementations must not cache. */
export interface ExchangeConfigReader {
    getFeeConfig(): Readonly<FeeConfig>;
    getMarketConfig(): Readonly<MarketConfig>;
}

export type ConfigListener = (config: Readonly<ExchangeConfig>) => void;

// ============================================================
// Defaults
// ============================================================

export const DEFAULT_FEE_CONFIG: Omit<FeeConfig, 'protocolFeeRecipient'> = {
    totalFeeBps: 100,
    creatorShareBps: 5_000,
    burnShareBps: 2_000,
    protocolShareBps: 5_000,
    referrerShareBps: 3_000,
};

export const DEFAULT_MARKET_CONFIG: Required<MarketConfig> = {
    minOrderSize: 1_000_000_000_000n,
    lpFeePips: 3_000,
    tickSpacing: 200,
    tickLower: 69_000,
    tickUpper: 184_200,
};

// ============================================================
// Validation
// ============================================================

export function validateFeeConfig(config: FeeConfig): void {
    if (!Number.isInteger(config.totalFeeBps) || config.totalFeeBps < 0 || config.totalFeeBps > 10_000) {
        throw new ConfigError('INVALID_BPS', `totalFeeBps must be an integer in [0, 10000], got ${config.totalFeeBps}`);
    }
    validateFeeShares(config);

    if (!isValidSuiAddress(config.protocolFeeRecipient) || normalizeSuiAddress(config.protocolFeeRecipient) === ZERO_ADDRESS) {
        throw new ConfigError('INVALID_ADDRESS', `Invalid protocol fee recipient: ${config.protocolFeeRecipient}`);
    }
}

export function validateMarketConfig(config: MarketConfig): void {
    if (config.minOrderSize < 0n) {
        throw new ConfigError('INVALID_AMOUNT', `minOrderSize must not be negative, got ${config.minOrderSize}`);
    }
    if (!Number.isInteger(config.lpFeePips) || config.lpFeePips < 0 || BigInt(config.lpFeePips) >= FEE_PIPS_DENOMINATOR) {
        throw new ConfigError('INVALID_BPS', `lpFeePips must be an integer in [0, ${FEE_PIPS_DENOMINATOR}), got ${config.lpFeePips}`);
    }

    const { tickSpacing, tickLower, tickUpper } = config;
    if (!Number.isInteger(tickSpacing) || tickSpacing <= 0) {
        throw new ConfigError('INVALID_TICKS', `tickSpacing must be a positive integer, got ${tickSpacing}`);
    }
    if (!Number.isInteger(tickLower) || !Number.isInteger(tickUpper) || tickLower >= tickUpper) {
        throw new ConfigError('INVALID_TICKS', `Need integer ticks with tickLower < tickUpper, got [${tickLower}, ${tickUpper}]`);
    }
    if (tickLower < MIN_TICK || tickUpper > MAX_TICK) {
        throw new ConfigError('INVALID_TICKS', `Band [${tickLower}, ${tickUpper}] outside [${MIN_TICK}, ${MAX_TICK}]`);
    }
    if (tickLower % tickSpacing !== 0 || tickUpper % tickSpacing !== 0) {
        throw new ConfigError('INVALID_TICKS', `Band [${tickLower}, ${tickUpper}] not aligned to spacing ${tickSpacing}`);
    }
}

// ============================================================
// Store
// ============================================================

export class ConfigStore implements ExchangeConfigReader {
    private fees: FeeConfig;
    private market: MarketConfig;
    private listeners: Set<ConfigListener> = new Set();

    constructor(config: ExchangeConfig) {
        validateFeeConfig(config.fees);
        validateMarketConfig(config.market);
        this.fees = normalizeFees(config.fees);
        this.market = { ...config.market };
    }

    getFeeConfig(): Readonly<FeeConfig> {
        return { ...this.fees };
    }

    getMarketConfig(): Readonly<MarketConfig> {
        return { ...this.market };
    }

    /** Validate the merged result, then apply it. Nothing changes on failure. */
    updateFees(patch: Partial<FeeConfig>): void {
        const next = { ...this.fees, ...patch };
        validateFeeConfig(next);
        this.fees = normalizeFees(next);
        this.notify();
    }

    updateMarket(patch: Partial<MarketConfig>): void {
        const next = { ...this.market, ...patch };
        validateMarketConfig(next);
        this.market = next;
        this.notify();
    }

    /** @returns unsubscribe function */
    onChange(listener: ConfigListener): () => void {
        this.listeners.add(listener);
        return () => {
            this.listeners.delete(listener);
        };
    }

    private notify(): void {
        const snapshot = { fees: this.getFeeConfig(), market: this.getMarketConfig() };
        for (const listener of this.listeners) {
            listener(snapshot);
        }
    }
}

function normalizeFees(config: FeeConfig): FeeConfig {
    return { ...config, protocolFeeRecipient: normalizeSuiAddress(config.protocolFeeRecipient) };
}

// ============================================================
// Environment
// ============================================================

/**
 * Build a config from BONDLINE_* variables over the defaults.
 *
 *   BONDLINE_PROTOCOL_RECIPIENT   required
 *   BONDLINE_TOTAL_FEE_BPS        BONDLINE_CREATOR_SHARE_BPS
 *   BONDLINE_BURN_SHARE_BPS       BONDLINE_PROTOCOL_SHARE_BPS
 *   BONDLINE_REFERRER_SHARE_BPS   BONDLINE_MIN_ORDER_SIZE
 *   BONDLINE_LP_FEE_PIPS          BONDLINE_TICK_SPACING
 *   BONDLINE_TICK_LOWER           BONDLINE_TICK_UPPER
 */
export function loadConfigFromEnv(env: NodeJS.ProcessEnv = process.env): ExchangeConfig {
    const recipient = env.BONDLINE_PROTOCOL_RECIPIENT;
    if (!recipient) {
        throw new ConfigError('INVALID_ENV', 'BONDLINE_PROTOCOL_RECIPIENT is required');
    }

    const fees: FeeConfig = {
        totalFeeBps: readInt(env, 'BONDLINE_TOTAL_FEE_BPS', DEFAULT_FEE_CONFIG.totalFeeBps),
        creatorShareBps: readInt(env, 'BONDLINE_CREATOR_SHARE_BPS', DEFAULT_FEE_CONFIG.creatorShareBps),
        burnShareBps: readInt(env, 'BONDLINE_BURN_SHARE_BPS', DEFAULT_FEE_CONFIG.burnShareBps),
        protocolShareBps: readInt(env, 'BONDLINE_PROTOCOL_SHARE_BPS', DEFAULT_FEE_CONFIG.protocolShareBps),
        referrerShareBps: readInt(env, 'BONDLINE_REFERRER_SHARE_BPS', DEFAULT_FEE_CONFIG.referrerShareBps),
        protocolFeeRecipient: recipient,
    };

    const market: MarketConfig = {
        minOrderSize: readBigInt(env, 'BONDLINE_MIN_ORDER_SIZE', DEFAULT_MARKET_CONFIG.minOrderSize),
        lpFeePips: readInt(env, 'BONDLINE_LP_FEE_PIPS', DEFAULT_MARKET_CONFIG.lpFeePips),
        tickSpacing: readInt(env, 'BONDLINE_TICK_SPACING', DEFAULT_MARKET_CONFIG.tickSpacing),
        tickLower: readInt(env, 'BONDLINE_TICK_LOWER', DEFAULT_MARKET_CONFIG.tickLower),
        tickUpper: readInt(env, 'BONDLINE_TICK_UPPER', DEFAULT_MARKET_CONFIG.tickUpper),
    };

    validateFeeConfig(fees);
    validateMarketConfig(market);
    return { fees, market };
}

function readInt(env: NodeJS.ProcessEnv, name: string, fallback: number): number {
    const raw = env[name];
    if (raw === undefined || raw === '') return fallback;
    if (!/^-?\d+$/.test(raw.trim())) {
        throw new ConfigError('INVALID_ENV', `${name} must be an integer, got "${raw}"`);
    }
    return Number.parseInt(raw, 10);
}

function readBigInt(env: NodeJS.ProcessEnv, name: string, fallback: bigint): bigint {
    const raw = env[name];
    if (raw === undefined || raw === '') return fallback;
    if (!/^\d+$/.test(raw.trim())) {
        throw new ConfigError('INVALID_ENV', `${name} must be a non-negative integer, got "${raw}"`);
    }
    return BigInt(raw.trim());
}
