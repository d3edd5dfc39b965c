import type { Transaction } from '@wallet-ledger/core';

/**
 * The session's transaction sequence. Append-only; lives as long as the session.
 */
export class SessionLedger {
    private readonly records: Transaction[] = [];

    append(transaction: Transaction): void {
        this.records.push(transaction);
    }

    get transactions(): readonly Transaction[] {
        return this.records;
    }
}
