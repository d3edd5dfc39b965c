import { createInterface } from 'node:readline';
import type { TerminalIO } from '../types.js';

export interface ReadlineIO extends TerminalIO {
    close(): void;
}

/**
 * Terminal I/O over node:readline.
 * Prompts are written without a trailing newline; the answer is the next
 * input line. Lines typed ahead of a prompt are buffered.
 */
export function createReadlineIO(
    input: NodeJS.ReadableStream = process.stdin,
    output: NodeJS.WritableStream = process.stdout
): ReadlineIO {
    const rl = createInterface({ input, terminal: false });
    const lines = rl[Symbol.asyncIterator]();

    return {
        async ask(question: string): Promise<string | null> {
            output.write(question);
            const next = await lines.next();
            return next.done ? null : next.value;
        },
        print(line: string): void {
            output.write(`${line}\n`);
        },
        close(): void {
            rl.close();
        },
    };
}
