#!/usr/bin/env -S node --import tsx
/**
 * Wallet Ledger CLI
 *
 * The shell owns all I/O: stdin prompts, console output and the session log.
 * The core receives typed transactions and returns results; it never prints.
 */

import { parseCliArgs, USAGE } from './args.js';
import { loadTerminalConfig, applyCliOverrides } from './workspace/config.js';
import { openSessionLogger } from './logging/session-logger.js';
import { WalletTerminal } from './terminal/session.js';
import { createReadlineIO } from './utils/prompt.js';
import { log, fail, errorMessage } from './utils/console.js';
import type { CliOptions } from './types.js';
import type { TerminalConfig } from '@wallet-ledger/shared';

async function main() {
    let options: CliOptions;
    try {
        options = parseCliArgs(process.argv.slice(2));
    } catch (err) {
        fail(errorMessage(err));
        log(USAGE.join('\n'));
        process.exit(1);
    }

    if (options.help) {
        log(USAGE.join('\n'));
        return;
    }

    let config: TerminalConfig;
    try {
        config = applyCliOverrides(loadTerminalConfig(options.configPath), options);
    } catch (err) {
        fail(`Failed to load configuration. ${errorMessage(err)}`);
        process.exit(1);
    }

    const logger = openSessionLogger(config);
    const io = createReadlineIO();
    try {
        await new WalletTerminal(io, logger).run();
    } finally {
        io.close();
    }
}

main().catch((err: unknown) => {
    console.error('Unexpected error:', errorMessage(err));
    process.exit(1);
});
