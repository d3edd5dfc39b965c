import type { Transaction } from '../types/index.js';
import type { HistoryEntry } from './types.js';

/**
 * A wallet's transactions paired with the running balance after each one.
 *
 * NOTE: this does not apply computeBalance's checks. Deposits add and
 * withdrawals subtract unconditionally, so an overdraft shows up as a
 * negative running balance and a negative amount is applied as-is. History
 * is display-only; computeBalance is authoritative. Keep the two paths
 * separate: merging them changes what users see.
 *
 * The result is lazy and restartable. Each iteration walks the ledger from
 * the start with a fresh balance.
 */
export function renderHistory(transactions: readonly Transaction[], walletId: string): Iterable<HistoryEntry> {
    return {
        *[Symbol.iterator]() {
            let runningBalance = 0n;
            for (const transaction of transactions) {
                if (transaction.wallet_id !== walletId) continue;
                runningBalance += transaction.kind === 'Deposit' ? transaction.amount : -transaction.amount;
                yield { transaction, runningBalance };
            }
        },
    };
}
