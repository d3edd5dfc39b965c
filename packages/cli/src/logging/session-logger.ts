import { join } from 'node:path';
import pino, { type DestinationStream, type Logger } from 'pino';
import type { LogLevel, TerminalConfig } from '@wallet-ledger/shared';
import type { LedgerSink } from '@wallet-ledger/core';
import { formatFileStamp } from './timestamp.js';
import { errorMessage } from '../utils/console.js';

/**
 * Session event log.
 *
 * Without a logger every call is dropped, which is how a session runs with
 * file logging off or after setup failed.
 */
export class SessionLogger {
    constructor(private readonly logger: Logger | null) {}

    /**
     * Forwards core ledger events into this log.
     */
    readonly sink: LedgerSink = (event) => {
        this.logger?.[event.level](event.message);
    };

    info(message: string): void {
        this.logger?.info(message);
    }

    error(message: string): void {
        this.logger?.error(message);
    }
}

/**
 * Builds a session logger writing JSON lines to `destination`.
 */
export function createSessionLogger(destination: DestinationStream, level: LogLevel): SessionLogger {
    const logger = pino(
        {
            level,
            base: { component: 'Terminal' },
            timestamp: pino.stdTimeFunctions.isoTime,
            formatters: {
                level: (label) => ({ level: label }),
            },
        },
        destination
    );
    return new SessionLogger(logger);
}

/**
 * Returns the log file path for a session started at `startedAt`.
 */
export function getSessionLogPath(logDir: string, startedAt: Date): string {
    return join(logDir, `terminal_${formatFileStamp(startedAt)}.log`);
}

/**
 * Opens a session log as configured.
 *
 * The file is opened here, synchronously. If the directory or the file cannot
 * be opened the session continues without a log, after a warning on stderr.
 */
export function openSessionLogger(config: TerminalConfig, startedAt: Date = new Date()): SessionLogger {
    if (!config.file_logging) {
        return new SessionLogger(null);
    }

    const path = getSessionLogPath(config.log_dir, startedAt);
    let destination: DestinationStream;
    try {
        destination = pino.destination({ dest: path, mkdir: true, sync: true });
    } catch (err) {
        console.error(`Warning: Failed to initialize logging: ${errorMessage(err)}`);
        return new SessionLogger(null);
    }

    return createSessionLogger(destination, config.log_level);
}
