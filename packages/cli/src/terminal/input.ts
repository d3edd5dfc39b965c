export interface ParsedAmount {
    amount: bigint;
    valid: boolean;
}

const INTEGER_PATTERN = /^[+-]?\d+$/;

// Signed 64-bit range
const MIN_AMOUNT = -(2n ** 63n);
const MAX_AMOUNT = 2n ** 63n - 1n;

/**
 * Parse a typed amount leniently.
 *
 * Anything that is not an optionally signed base-10 integer within the signed
 * 64-bit range becomes 0 with valid=false. Callers report the bad input and
 * carry on with 0, which the positivity check then rejects.
 */
export function parseAmount(raw: string): ParsedAmount {
    const text = raw.trim();
    if (!INTEGER_PATTERN.test(text)) {
        return { amount: 0n, valid: false };
    }
    const amount = BigInt(text);
    if (amount < MIN_AMOUNT || amount > MAX_AMOUNT) {
        return { amount: 0n, valid: false };
    }
    return { amount, valid: true };
}
