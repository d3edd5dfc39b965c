import type { Transaction } from '../types/index.js';
import type { BalanceResult, LedgerSink, WalletError } from './types.js';
import { formatTransaction } from './transaction.js';

const noopSink: LedgerSink = () => {};

/**
 * Compute a wallet's balance by replaying its transactions in insertion order.
 *
 * Only records whose wallet_id equals walletId take part. The fold starts at 0
 * and stops at the first violation:
 * - a negative amount fails with InvalidAmount
 * - a withdrawal larger than the running balance so far fails with
 *   InsufficientFunds (a later deposit does not rescue an earlier withdrawal)
 *
 * The partial balance is discarded on failure. Zero amounts are valid.
 * A wallet with no records has balance 0.
 *
 * @param transactions - Full ledger, any number of wallets
 * @param walletId - Wallet to fold
 * @param sink - Receives one event per processed record, per failure, and the final balance
 */
export function computeBalance(
    transactions: readonly Transaction[],
    walletId: string,
    sink: LedgerSink = noopSink
): BalanceResult {
    let balance = 0n;

    for (const tx of transactions) {
        if (tx.wallet_id !== walletId) continue;

        if (tx.amount < 0n) {
            sink({
                level: 'error',
                message: `Invalid transaction amount: ${tx.amount} in transaction ${formatTransaction(tx)}`,
            });
            return { ok: false, error: { kind: 'InvalidAmount', amount: tx.amount } };
        }

        switch (tx.kind) {
            case 'Deposit':
                sink({ level: 'info', message: `Deposit of ${tx.amount} to ${tx.wallet_id}` });
                balance += tx.amount;
                break;
            case 'Withdrawal':
                if (tx.amount > balance) {
                    sink({
                        level: 'error',
                        message: `Insufficient funds for withdrawal of ${tx.amount} from ${tx.wallet_id}. Available balance: ${balance}`,
                    });
                    return {
                        ok: false,
                        error: { kind: 'InsufficientFunds', requested: tx.amount, available: balance },
                    };
                }
                sink({ level: 'info', message: `Withdrawal of ${tx.amount} from ${tx.wallet_id}` });
                balance -= tx.amount;
                break;
        }
    }

    sink({ level: 'info', message: `Final balance for wallet ${walletId}: ${balance}` });
    return { ok: true, balance };
}

/**
 * User-facing message for a balance failure.
 */
export function describeWalletError(error: WalletError): string {
    switch (error.kind) {
        case 'InvalidAmount':
            return `Invalid transaction amount: ${error.amount}`;
        case 'InsufficientFunds':
            return `Insufficient funds for withdrawal of ${error.requested}. Available balance: ${error.available}`;
    }
}
