import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdirSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import {
    SessionLogger,
    createSessionLogger,
    getSessionLogPath,
    openSessionLogger,
} from '../src/logging/session-logger.js';
import { formatFileStamp } from '../src/logging/timestamp.js';
import { WalletTerminal } from '../src/terminal/session.js';

const startedAt = new Date(2026, 0, 5, 9, 3, 7);

function memoryDestination() {
    const records: unknown[] = [];
    return {
        records,
        write(line: string) {
            records.push(JSON.parse(line));
        },
    };
}

function readRecords(path: string): unknown[] {
    return readFileSync(path, 'utf8')
        .trim()
        .split('\n')
        .map((line): unknown => JSON.parse(line));
}

describe('formatFileStamp', () => {
    it('formats file name stamps', () => {
        expect(formatFileStamp(startedAt)).toBe('20260105_090307');
    });
});

describe('SessionLogger', () => {
    it('writes JSON lines tagged with the terminal component', () => {
        const destination = memoryDestination();
        const logger = createSessionLogger(destination, 'info');

        logger.info('hello');
        logger.error('boom');

        expect(destination.records).toEqual([
            { level: 'info', time: expect.any(String), component: 'Terminal', msg: 'hello' },
            { level: 'error', time: expect.any(String), component: 'Terminal', msg: 'boom' },
        ]);
    });

    it('drops info lines at error level', () => {
        const destination = memoryDestination();
        const logger = createSessionLogger(destination, 'error');

        logger.info('quiet');
        logger.error('loud');

        expect(destination.records).toHaveLength(1);
        expect(destination.records[0]).toMatchObject({ level: 'error', msg: 'loud' });
    });

    it('forwards core events through its sink at their level', () => {
        const destination = memoryDestination();
        const logger = createSessionLogger(destination, 'info');

        logger.sink({ level: 'info', message: 'Deposit of 5 to W' });
        logger.sink({ level: 'error', message: 'from core' });

        expect(destination.records).toMatchObject([
            { level: 'info', msg: 'Deposit of 5 to W' },
            { level: 'error', msg: 'from core' },
        ]);
    });

    it('does nothing without a logger', () => {
        const logger = new SessionLogger(null);
        expect(() => logger.info('ignored')).not.toThrow();
        expect(() => logger.sink({ level: 'error', message: 'ignored' })).not.toThrow();
    });
});

describe('openSessionLogger', () => {
    let dir: string;

    beforeEach(() => {
        dir = mkdtempSync(join(tmpdir(), 'wallet-ledger-'));
        vi.spyOn(console, 'error').mockImplementation(() => {});
    });

    afterEach(() => {
        vi.restoreAllMocks();
        rmSync(dir, { recursive: true, force: true });
    });

    it('names the file after the session start', () => {
        expect(getSessionLogPath('logs/src', startedAt)).toBe(join('logs/src', 'terminal_20260105_090307.log'));
    });

    it('creates the directory and writes to the session file', () => {
        const logDir = join(dir, 'nested', 'logs');
        const logger = openSessionLogger({ log_dir: logDir, log_level: 'info', file_logging: true }, startedAt);

        logger.info('started');
        logger.error('failed');

        expect(readRecords(getSessionLogPath(logDir, startedAt))).toMatchObject([
            { level: 'info', component: 'Terminal', msg: 'started' },
            { level: 'error', component: 'Terminal', msg: 'failed' },
        ]);
        expect(vi.mocked(console.error)).not.toHaveBeenCalled();
    });

    it('applies the configured level to the file', () => {
        const logger = openSessionLogger({ log_dir: dir, log_level: 'error', file_logging: true }, startedAt);

        logger.info('quiet');
        logger.error('loud');

        expect(readRecords(getSessionLogPath(dir, startedAt))).toMatchObject([{ level: 'error', msg: 'loud' }]);
    });

    it('skips the file when logging is off', () => {
        const logDir = join(dir, 'unused');
        const logger = openSessionLogger({ log_dir: logDir, log_level: 'info', file_logging: false }, startedAt);
        logger.info('started');

        expect(() => readFileSync(getSessionLogPath(logDir, startedAt))).toThrow();
        expect(vi.mocked(console.error)).not.toHaveBeenCalled();
    });

    it('warns and continues without a file when the directory cannot be created', () => {
        const blocker = join(dir, 'blocker');
        writeFileSync(blocker, '');

        const logger = openSessionLogger({ log_dir: join(blocker, 'logs'), log_level: 'info', file_logging: true }, startedAt);

        expect(vi.mocked(console.error)).toHaveBeenCalledTimes(1);
        expect(vi.mocked(console.error).mock.calls[0][0]).toMatch(/^Warning: Failed to initialize logging: /);
        expect(() => logger.info('started')).not.toThrow();
    });

    it('warns and continues without a file when the file cannot be opened', async () => {
        // A directory sitting where the log file belongs makes the open fail.
        mkdirSync(getSessionLogPath(dir, startedAt));

        const logger = openSessionLogger({ log_dir: dir, log_level: 'info', file_logging: true }, startedAt);

        expect(vi.mocked(console.error)).toHaveBeenCalledTimes(1);
        expect(vi.mocked(console.error).mock.calls[0][0]).toMatch(/^Warning: Failed to initialize logging: EISDIR/);

        const printed: string[] = [];
        const io = {
            async ask() {
                return '5';
            },
            print(line: string) {
                printed.push(line);
            },
        };
        await new WalletTerminal(io, logger).run();
        expect(printed.at(-1)).toBe('Thank you for using the Wallet Terminal!');
    });
});
