import { TransactionSchema } from '../types/index.js';
import type { Transaction, TransactionKind } from '../types/index.js';

/**
 * Build an immutable transaction record.
 *
 * Shape is validated (kind, string wallet id, bigint amount) but the
 * sign of the amount is not: a negative amount is reported by computeBalance
 * when the record is read.
 *
 * @throws ZodError if the shape is invalid
 */
export function createTransaction(kind: TransactionKind, walletId: string, amount: bigint): Transaction {
    const record = TransactionSchema.parse({ kind, wallet_id: walletId, amount });
    return Object.freeze(record);
}

/**
 * Display form: "<Kind> of <amount> to <wallet_id>".
 * Withdrawals also read "to"; history lines depend on this exact text.
 */
export function formatTransaction(transaction: Transaction): string {
    return `${transaction.kind} of ${transaction.amount} to ${transaction.wallet_id}`;
}
