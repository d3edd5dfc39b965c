/**
 * Re-export all types from shared package.
 * Core package uses these types but doesn't define them.
 */
export type {
    TransactionKind,
    Transaction,
} from '@wallet-ledger/shared';

export {
    TransactionKindSchema,
    TransactionSchema,
    TRANSACTION_KINDS,
} from '@wallet-ledger/shared';
