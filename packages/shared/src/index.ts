// Schemas
export {
    TransactionKindSchema,
    TransactionSchema,
    LogLevelSchema,
    TerminalConfigSchema,
} from './schemas.js';

// Types
export type {
    TransactionKind,
    Transaction,
    LogLevel,
    TerminalConfig,
} from './schemas.js';

// Constants
export {
    TRANSACTION_KINDS,
    LOG_LEVELS,
    TERMINAL_DEFAULTS,
} from './constants.js';
