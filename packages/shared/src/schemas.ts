/**
 * Zod schemas for Wallet Ledger data structures.
 *
 * Amounts and balances are whole integer units held as bigint, so running
 * totals never round. There is no currency or rounding model.
 */

import { z } from 'zod';
import { LOG_LEVELS, TERMINAL_DEFAULTS, TRANSACTION_KINDS } from './constants.js';

// ============================================================================
// Transaction Schema
// ============================================================================

/**
 * Closed set of transaction kinds. Adding a kind is a core change.
 */
export const TransactionKindSchema = z.enum(TRANSACTION_KINDS);

export type TransactionKind = z.infer<typeof TransactionKindSchema>;

/**
 * A single ledger record.
 *
 * wallet_id is opaque: any string is accepted as-is, including the empty string.
 * amount is signed. A negative amount is not rejected here; the balance
 * function detects it when the record is read.
 */
export const TransactionSchema = z.object({
    kind: TransactionKindSchema,
    wallet_id: z.string(),
    amount: z.bigint(),
});

export type Transaction = Readonly<z.infer<typeof TransactionSchema>>;

// ============================================================================
// Terminal Configuration Schema
// ============================================================================

export const LogLevelSchema = z.enum(LOG_LEVELS);

export type LogLevel = z.infer<typeof LogLevelSchema>;

/**
 * Session shell configuration (config/wallet.yaml).
 * Every field is optional in the file; defaults fill the rest.
 */
export const TerminalConfigSchema = z.object({
    log_dir: z.string().min(1).default(TERMINAL_DEFAULTS.LOG_DIR),
    log_level: LogLevelSchema.default(TERMINAL_DEFAULTS.LOG_LEVEL),
    file_logging: z.boolean().default(TERMINAL_DEFAULTS.FILE_LOGGING),
}).strict();

export type TerminalConfig = z.infer<typeof TerminalConfigSchema>;
