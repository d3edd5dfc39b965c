import { readFileSync, existsSync } from 'node:fs';
import { resolve } from 'node:path';
import { parse } from 'yaml';
import {
    TerminalConfigSchema,
    TERMINAL_DEFAULTS,
    type TerminalConfig,
} from '@wallet-ledger/shared';
import type { CliOptions } from '../types.js';

/**
 * Loads the terminal configuration (config/wallet.yaml).
 *
 * With no explicit path a missing file means defaults. An explicit path that
 * does not exist is an error.
 */
export function loadTerminalConfig(configPath?: string, cwd: string = process.cwd()): TerminalConfig {
    const path = resolve(cwd, configPath ?? TERMINAL_DEFAULTS.CONFIG_PATH);
    if (!existsSync(path)) {
        if (configPath !== undefined) {
            throw new Error(`Config file not found: ${path}`);
        }
        return TerminalConfigSchema.parse({});
    }
    const content = readFileSync(path, 'utf-8');
    const data: unknown = parse(content);
    return TerminalConfigSchema.parse(data ?? {});
}

/**
 * Command-line flags win over the file.
 */
export function applyCliOverrides(config: TerminalConfig, options: CliOptions): TerminalConfig {
    return {
        ...config,
        log_dir: options.logDir ?? config.log_dir,
        file_logging: options.noLog ? false : config.file_logging,
    };
}
