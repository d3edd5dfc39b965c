/**
 * Formatted console output helpers
 */

export function log(message: string): void {
    console.log(message);
}

export function fail(message: string): void {
    console.error(`\n✖ Error: ${message}`);
}

export function errorMessage(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}
