import type { Transaction } from '../types/index.js';

/**
 * Typed failures of the balance fold. Both are recoverable by the caller.
 */
export type WalletError =
    | { kind: 'InvalidAmount'; amount: bigint }
    | { kind: 'InsufficientFunds'; requested: bigint; available: bigint };

export type BalanceResult =
    | { ok: true; balance: bigint }
    | { ok: false; error: WalletError };

/**
 * One row of a wallet's history: the record and the running balance after it.
 */
export interface HistoryEntry {
    transaction: Transaction;
    runningBalance: bigint;
}

export type LedgerEventLevel = 'info' | 'error';

/**
 * Observability event emitted by the core. The core never formats or
 * persists these; the caller decides where they go.
 */
export interface LedgerEvent {
    level: LedgerEventLevel;
    message: string;
}

export type LedgerSink = (event: LedgerEvent) => void;
