/**
 * Wallet Ledger CLI - Core Types
 */

export interface CliOptions {
    help: boolean;
    noLog: boolean;
    configPath?: string;
    logDir?: string;
}

/**
 * Line-oriented terminal I/O used by the session shell.
 * ask() resolves to null once input is closed.
 */
export interface TerminalIO {
    ask(question: string): Promise<string | null>;
    print(line: string): void;
}
