/**
 * Bondline: Errors
 *
 * Every failure the exchange reports carries a machine-readable `code`
 * and a `category` matching the error taxonomy:
 *
 *   validation      bad input, nothing happened
 *   slippage        output/price bounds or partial fill, whole operation aborted
 *   fee-recipient   the protocol recipient itself is unreachable
 *   accumulator     burn accumulator problems (never fatal to a trade)
 *   venue           the external venue refused or is unavailable
 *   guard           hostile or duplicate callback, always fatal
 *   config          configuration rejected at write time
 *   ledger          balance and transfer failures
 */

export type ErrorCategory =
    | 'validation'
    | 'slippage'
    | 'fee-recipient'
    | 'accumulator'
    | 'venue'
    | 'guard'
    | 'config'
    | 'ledger';

export abstract class ExchangeError<Code extends string = string> extends Error {
    abstract readonly category: ErrorCategory;
    readonly code: Code;

    constructor(code: Code, message: string) {
        super(message);
        this.name = new.target.name;
        this.code = code;
    }
}

// ============================================================
// Categories
// ============================================================

export type ValidationCode =
    | 'ZERO_AMOUNT'
    | 'ORDER_TOO_SMALL'
    | 'ZERO_ADDRESS'
    | 'INVALID_ADDRESS'
    | 'INSUFFICIENT_BALANCE'
    | 'NOT_INITIALIZED'
    | 'ALREADY_INITIALIZED'
    | 'UNAUTHORIZED'
    | 'WRONG_TARGET'
    | 'UNEXPECTED_VALUE'
    | 'INVALID_SUPPLY';

export class ValidationError extends ExchangeError<ValidationCode> {
    readonly category = 'validation' as const;
}

export type SlippageCode = 'MIN_OUTPUT' | 'MIN_PAYOUT' | 'PRICE_LIMIT' | 'PARTIAL_FILL';

export class SlippageError extends ExchangeError<SlippageCode> {
    readonly category = 'slippage' as const;
}

export type FeeRecipientCode = 'PROTOCOL_UNREACHABLE';

export class FeeRecipientError extends ExchangeError<FeeRecipientCode> {
    readonly category = 'fee-recipient' as const;
}

export type AccumulatorCode = 'QUOTE_FAILED' | 'NOT_OWNER';

export class AccumulatorError extends ExchangeError<AccumulatorCode> {
    readonly category = 'accumulator' as const;
}

export type VenueCode =
    | 'POOL_NOT_INITIALIZED'
    | 'POOL_ALREADY_INITIALIZED'
    | 'ALREADY_UNLOCKED'
    | 'NOT_UNLOCKED'
    | 'NOT_LOCKER'
    | 'CURRENCY_NOT_SETTLED'
    | 'PRICE_LIMIT_ALREADY_EXCEEDED'
    | 'PRICE_LIMIT_OUT_OF_BOUNDS'
    | 'INVALID_RANGE'
    | 'UNSUPPORTED_RANGE'
    | 'INSUFFICIENT_LIQUIDITY'
    | 'INVALID_CALLBACK_TARGET'
    | 'INVALID_AMOUNT';

export class VenueError extends ExchangeError<VenueCode> {
    readonly category = 'venue' as const;
}

export type GuardCode = 'UNAUTHORIZED_CALLER' | 'NOT_ARMED' | 'ALREADY_ARMED' | 'CONTEXT_MISMATCH';

export class GuardViolationError extends ExchangeError<GuardCode> {
    readonly category = 'guard' as const;
}

export type ConfigCode =
    | 'INVALID_SHARES'
    | 'INVALID_BPS'
    | 'INVALID_TICKS'
    | 'INVALID_ADDRESS'
    | 'INVALID_AMOUNT'
    | 'INVALID_ENV';

export class ConfigError extends ExchangeError<ConfigCode> {
    readonly category = 'config' as const;
}

export type LedgerCode = 'INSUFFICIENT_FUNDS' | 'TRANSFER_REJECTED' | 'INVALID_AMOUNT' | 'NO_CALL_FRAME';

export class LedgerError extends ExchangeError<LedgerCode> {
    readonly category = 'ledger' as const;
}

// ============================================================
// Helpers
// ============================================================

export function isExchangeError(err: unknown): err is ExchangeError {
    return err instanceof ExchangeError;
}

/** One-line description for logs: "SlippageError[MIN_OUTPUT]: ..." */
export function describeError(err: unknown): string {
    if (isExchangeError(err)) return `${err.name}[${err.code}]: ${err.message}`;
    if (err instanceof Error) return `${err.name}: ${err.message}`;
    return String(err);
}
