import {
    computeBalance,
    createTransaction,
    describeWalletError,
    formatTransaction,
    renderHistory,
    type Transaction,
} from '@wallet-ledger/core';
import { SessionLedger } from './ledger.js';
import { parseAmount } from './input.js';
import type { SessionLogger } from '../logging/session-logger.js';
import type { TerminalIO } from '../types.js';
import { errorMessage } from '../utils/console.js';

const MENU = [
    '',
    'Please select an option:',
    '1. Check Balance',
    '2. Deposit',
    '3. Withdraw',
    '4. View Transaction History',
    '5. Exit',
];

/**
 * Raised when stdin closes in the middle of a prompt.
 */
export class InputClosedError extends Error {
    constructor() {
        super('Input closed');
        this.name = 'InputClosedError';
    }
}

/**
 * Interactive menu over an in-memory ledger.
 *
 * Owns the session's transactions and all user-facing text. Balance and
 * history come from the core; this class only parses, appends and prints.
 */
export class WalletTerminal {
    private readonly ledger = new SessionLedger();

    constructor(
        private readonly io: TerminalIO,
        private readonly logger: SessionLogger
    ) {
        this.logger.info('Initializing new WalletTerminal instance');
    }

    get transactions(): readonly Transaction[] {
        return this.ledger.transactions;
    }

    /**
     * Runs the menu until the user exits or input ends.
     */
    async run(): Promise<void> {
        this.logger.info('Starting wallet terminal session');
        this.io.print('Welcome to the Wallet Terminal!');

        while (true) {
            let shouldExit: boolean;
            try {
                shouldExit = await this.showMenu();
            } catch (err) {
                if (!(err instanceof InputClosedError)) {
                    this.logger.error(`Menu error: ${errorMessage(err)}`);
                    this.io.print(`Error: ${errorMessage(err)}`);
                    continue;
                }
                this.logger.info('Input closed');
                shouldExit = true;
            }

            if (shouldExit) {
                this.logger.info('Terminating wallet terminal session');
                this.io.print('Thank you for using the Wallet Terminal!');
                return;
            }
        }
    }

    /**
     * Shows the menu and handles one choice.
     *
     * @returns true when the session should end
     */
    private async showMenu(): Promise<boolean> {
        for (const line of MENU) {
            this.io.print(line);
        }

        const choice = await this.io.ask('\nEnter your choice (1-5): ');
        if (choice === null) {
            throw new InputClosedError();
        }

        switch (choice.trim()) {
            case '1':
                this.logger.info('Selected: Check Balance');
                await this.checkBalance();
                break;
            case '2':
                this.logger.info('Selected: Deposit');
                await this.deposit();
                break;
            case '3':
                this.logger.info('Selected: Withdraw');
                await this.withdraw();
                break;
            case '4':
                this.logger.info('Selected: View History');
                await this.viewHistory();
                break;
            case '5':
                this.logger.info('Selected: Exit');
                return true;
            default:
                this.logger.error(`Invalid menu choice entered: ${choice.trim()}`);
                this.io.print('Invalid choice. Please try again.');
        }

        return false;
    }

    private async readLine(question: string): Promise<string> {
        const answer = await this.io.ask(question);
        if (answer === null) {
            throw new InputClosedError();
        }
        return answer.trim();
    }

    private async readWalletId(): Promise<string> {
        const walletId = await this.readLine('Enter wallet address: ');
        this.logger.info(`Wallet address entered: ${walletId}`);
        return walletId;
    }

    /**
     * Unparseable input becomes 0 after a notice.
     */
    private async readAmount(): Promise<bigint> {
        const raw = await this.readLine('Enter amount: ');
        const parsed = parseAmount(raw);
        if (!parsed.valid) {
            this.logger.error(`Invalid amount entered: ${raw}`);
            this.io.print('Invalid amount. Please enter a valid number.');
            return 0n;
        }
        this.logger.info(`Amount entered: ${parsed.amount}`);
        return parsed.amount;
    }

    private async checkBalance(): Promise<void> {
        const walletId = await this.readWalletId();
        const result = computeBalance(this.ledger.transactions, walletId, this.logger.sink);

        if (result.ok) {
            this.logger.info(`Balance check successful for ${walletId}: ${result.balance}`);
            this.io.print(`Balance for wallet ${walletId}: ${result.balance}`);
        } else {
            const message = describeWalletError(result.error);
            this.logger.error(`Balance check failed for ${walletId}: ${message}`);
            this.io.print(`Error checking balance: ${message}`);
        }
    }

    private async deposit(): Promise<void> {
        const walletId = await this.readWalletId();
        const amount = await this.readAmount();

        if (amount <= 0n) {
            this.logger.error(`Invalid deposit amount attempted: ${amount}`);
            this.io.print('Amount must be positive');
            return;
        }

        this.ledger.append(createTransaction('Deposit', walletId, amount));
        this.logger.info(`Successful deposit of ${amount} to wallet ${walletId}`);
        this.io.print(`Successfully deposited ${amount} to the wallet`);
    }

    private async withdraw(): Promise<void> {
        const walletId = await this.readWalletId();
        const amount = await this.readAmount();

        if (amount <= 0n) {
            this.logger.error(`Invalid withdrawal amount attempted: ${amount}`);
            this.io.print('Amount must be positive');
            return;
        }

        const result = computeBalance(this.ledger.transactions, walletId, this.logger.sink);
        if (!result.ok) {
            const message = describeWalletError(result.error);
            this.logger.error(`Withdrawal error for wallet ${walletId}: ${message}`);
            this.io.print(`Error: ${message}`);
            return;
        }

        if (result.balance < amount) {
            this.logger.error(`Insufficient funds for withdrawal: requested ${amount}, available ${result.balance}`);
            this.io.print(`Insufficient funds. Available balance: ${result.balance}`);
            return;
        }

        this.ledger.append(createTransaction('Withdrawal', walletId, amount));
        this.logger.info(`Successful withdrawal of ${amount} from wallet ${walletId}`);
        this.io.print(`Successfully withdrew ${amount} from the wallet`);
    }

    private async viewHistory(): Promise<void> {
        const walletId = await this.readWalletId();
        this.logger.info(`Viewing transaction history for wallet ${walletId}`);

        this.io.print(`Transaction history for wallet ${walletId}:`);
        for (const entry of renderHistory(this.ledger.transactions, walletId)) {
            this.io.print(`${formatTransaction(entry.transaction)} | Running balance: ${entry.runningBalance}`);
        }
    }
}
