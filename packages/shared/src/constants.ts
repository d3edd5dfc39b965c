/**
 * Constants for Wallet Ledger.
 */

/**
 * Transaction kinds, in display form.
 */
export const TRANSACTION_KINDS = ['Deposit', 'Withdrawal'] as const;

/**
 * Session log levels, lowest first.
 */
export const LOG_LEVELS = ['info', 'error'] as const;

/**
 * Defaults for the session shell when config/wallet.yaml leaves a field out.
 */
export const TERMINAL_DEFAULTS = {
    CONFIG_PATH: 'config/wallet.yaml',
    LOG_DIR: 'logs/src',
    LOG_LEVEL: 'info',
    FILE_LOGGING: true,
} as const;
