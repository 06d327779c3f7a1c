/**
 * Bondline: Trade History
 *
 * Event-driven in-memory view of committed settlements. Subscribes to
 * the runtime's event log, so reverted operations never show up here.
 *
 * Event types consumed:
 *   TradeSettled, FeeRedirected, SecondaryRewardsHarvested,
 *   BurnDeposit, BurnFlushed, BurnFlushFailed
 */

import { normalizeSuiAddress } from '@mysten/sui/utils';
import type { EventLog } from './event-log.js';
import type {
    ExchangeEvent,
    FeeSplit,
    TradeSettledEvent,
    TradeSide,
} from './types.js';

// ============================================================
// Types
// ============================================================

export interface TradeRecord {
    /** Position in this history, starting at 0 */
    sequence: number;
    engine: string;
    side: TradeSide;
    trader: string;
    recipient: string;
    referrer: string;
    gross: bigint;
    fee: bigint;
    output: bigint;
    tokenAmount: bigint;
    fees: FeeSplit;
    redirectedToProtocol: bigint;
    effectivePrice: bigint;
}

export interface TraderStats {
    trader: string;
    buys: number;
    sells: number;

    /** Funding paid in on buys */
    fundingIn: bigint;

    /** Funding received on sells, after fees */
    fundingOut: bigint;

    tokensBought: bigint;
    tokensSold: bigint;
    feesPaid: bigint;
}

export interface FeeTotals {
    creator: bigint;
    burn: bigint;
    protocol: bigint;
    referrer: bigint;
    redirected: bigint;
}

export interface BurnTotals {
    deposited: bigint;
    refused: bigint;
    flushedIn: bigint;
    flushedOut: bigint;
    flushes: number;
    failedFlushes: number;
}

export interface HarvestTotals {
    harvests: number;
    fees0: bigint;
    fees1: bigint;
}

export interface TradeFilter {
    engine?: string;
    trader?: string;
    side?: TradeSide;
}

// ============================================================
// History
// ============================================================

export class TradeHistory {
    private trades: TradeRecord[] = [];
    private nextSequence = 0;
    private traders: Map<string, TraderStats> = new Map();
    private feeTotals: FeeTotals = emptyFeeTotals();
    private burnTotals: BurnTotals = emptyBurnTotals();
    private harvestTotals: HarvestTotals = { harvests: 0, fees0: 0n, fees1: 0n };
    private events: EventLog;
    private maxRecords: number;
    private unsubscribe: (() => void) | null = null;

    constructor(config: {
        events: EventLog;

        /** Oldest trade records are dropped past this many (stats are kept) */
        maxRecords?: number;
    }) {
        this.events = config.events;
        this.maxRecords = config.maxRecords ?? 10_000;
    }

    // --------------------------------------------------------
    // Lifecycle
    // --------------------------------------------------------

    start(): void {
        if (this.unsubscribe) return;
        this.unsubscribe = this.events.subscribe((event) => this.processEvent(event));
    }

    stop(): void {
        if (!this.unsubscribe) return;
        this.unsubscribe();
        this.unsubscribe = null;
    }

    get isRunning(): boolean {
        return this.unsubscribe !== null;
    }

    // --------------------------------------------------------
    // Event Processing
    // --------------------------------------------------------

    processEvent(event: ExchangeEvent): void {
        switch (event.type) {
            case 'TradeSettled':
                this.recordTrade(event);
                break;

            case 'FeeRedirected':
                this.feeTotals.redirected += event.amount;
                break;

            case 'SecondaryRewardsHarvested':
                this.harvestTotals.harvests++;
                this.harvestTotals.fees0 += event.fees0;
                this.harvestTotals.fees1 += event.fees1;
                break;

            case 'BurnDeposit':
                if (event.accepted) this.burnTotals.deposited += event.amount;
                else this.burnTotals.refused += event.amount;
                break;

            case 'BurnFlushed':
                this.burnTotals.flushes++;
                this.burnTotals.flushedIn += event.amountIn;
                this.burnTotals.flushedOut += event.amountOut;
                break;

            case 'BurnFlushFailed':
                this.burnTotals.failedFlushes++;
                break;
        }
    }

    private recordTrade(event: TradeSettledEvent): void {
        const record: TradeRecord = {
            sequence: this.nextSequence++,
            engine: event.emitter,
            side: event.side,
            trader: event.trader,
            recipient: event.recipient,
            referrer: event.referrer,
            gross: event.gross,
            fee: event.fee,
            output: event.output,
            tokenAmount: event.tokenAmount,
            fees: { ...event.fees },
            redirectedToProtocol: event.redirectedToProtocol,
            effectivePrice: event.effectivePrice,
        };
        this.trades.push(record);
        if (this.trades.length > this.maxRecords) {
            this.trades.shift();
        }

        this.feeTotals.creator += event.fees.creatorFee;
        this.feeTotals.burn += event.fees.burnFee;
        this.feeTotals.protocol += event.fees.protocolFee;
        this.feeTotals.referrer += event.fees.referrerFee;

        const stats = this.statsFor(event.trader);
        stats.feesPaid += event.fee;
        if (event.side === 'buy') {
            stats.buys++;
            stats.fundingIn += event.gross;
            stats.tokensBought += event.tokenAmount;
        } else {
            stats.sells++;
            stats.fundingOut += event.output;
            stats.tokensSold += event.tokenAmount;
        }
    }

    private statsFor(trader: string): TraderStats {
        let stats = this.traders.get(trader);
        if (!stats) {
            stats = {
                trader,
                buys: 0,
                sells: 0,
                fundingIn: 0n,
                fundingOut: 0n,
                tokensBought: 0n,
                tokensSold: 0n,
                feesPaid: 0n,
            };
            this.traders.set(trader, stats);
        }
        return stats;
    }

    // --------------------------------------------------------
    // Queries
    // --------------------------------------------------------

    /** Trades in settlement order, optionally filtered */
    getTrades(filter: TradeFilter = {}): TradeRecord[] {
        const engine = filter.engine !== undefined ? normalizeSuiAddress(filter.engine) : undefined;
        const trader = filter.trader !== undefined ? normalizeSuiAddress(filter.trader) : undefined;

        return this.trades
            .filter(
                (t) =>
                    (engine === undefined || t.engine === engine) &&
                    (trader === undefined || t.trader === trader) &&
                    (filter.side === undefined || t.side === filter.side),
            )
            .map((t) => ({ ...t, fees: { ...t.fees } }));
    }

    getTraderStats(trader: string): TraderStats | undefined {
        const stats = this.traders.get(normalizeSuiAddress(trader));
        return stats ? { ...stats } : undefined;
    }

    /** Traders ranked by funding volume (in + out), largest first */
    getTopTraders(limit: number = 10): TraderStats[] {
        return [...this.traders.values()]
            .sort((a, b) => {
                const volumeA = a.fundingIn + a.fundingOut;
                const volumeB = b.fundingIn + b.fundingOut;
                if (volumeA > volumeB) return -1;
                if (volumeA < volumeB) return 1;
                return 0;
            })
            .slice(0, limit)
            .map((s) => ({ ...s }));
    }

    getFeeTotals(): FeeTotals {
        return { ...this.feeTotals };
    }

    getBurnTotals(): BurnTotals {
        return { ...this.burnTotals };
    }

    getHarvestTotals(): HarvestTotals {
        return { ...this.harvestTotals };
    }

    // --------------------------------------------------------
    // Stats
    // --------------------------------------------------------

    get tradeCount(): number {
        return this.trades.length;
    }

    get traderCount(): number {
        return this.traders.size;
    }

    clear(): void {
        this.trades = [];
        this.nextSequence = 0;
        this.traders.clear();
        this.feeTotals = emptyFeeTotals();
        this.burnTotals = emptyBurnTotals();
        this.harvestTotals = { harvests: 0, fees0: 0n, fees1: 0n };
    }
}

function emptyFeeTotals(): FeeTotals {
    return { creator: 0n, burn: 0n, protocol: 0n, referrer: 0n, redirected: 0n };
}

function emptyBurnTotals(): BurnTotals {
    return { deposited: 0n, refused: 0n, flushedIn: 0n, flushedOut: 0n, flushes: 0, failedFlushes: 0 };
}
