/**
 * Ledger module: transaction records, balance fold and history rendering.
 */

export { createTransaction, formatTransaction } from './transaction.js';
export { computeBalance, describeWalletError } from './balance.js';
export { renderHistory } from './history.js';
export type {
    WalletError,
    BalanceResult,
    HistoryEntry,
    LedgerEvent,
    LedgerEventLevel,
    LedgerSink,
} from './types.js';
