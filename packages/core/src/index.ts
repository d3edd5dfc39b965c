// Types (re-exported from shared)
export type {
    TransactionKind,
    Transaction,
} from './types/index.js';

export {
    TransactionKindSchema,
    TransactionSchema,
    TRANSACTION_KINDS,
} from './types/index.js';

// Ledger
export {
    createTransaction,
    formatTransaction,
    computeBalance,
    describeWalletError,
    renderHistory,
} from './ledger/index.js';
export type {
    WalletError,
    BalanceResult,
    HistoryEntry,
    LedgerEvent,
    LedgerEventLevel,
    LedgerSink,
} from './ledger/index.js';
