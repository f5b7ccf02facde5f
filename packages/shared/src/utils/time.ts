/**
 * Time Utilities
 */

export const TIME_CONSTANTS = {
    MAX_CLOCK_SKEW_MS: 5000, // Allow 5s future skew on market quotes
};

export function nowISO(): string {
    return new Date().toISOString();
}

export function sleep(ms: number): Promise<void> {
    return new Promise(resolve => setTimeout(resolve, ms));
}

/**
 * A quote is stale once it is older than `maxAgeMs`. Quotes stamped in the
 * future beyond the skew tolerance are treated as stale too.
 */
export function isStale(
    observedAt: string | number,
    maxAgeMs: number,
    now: number = Date.now()
): boolean {
    const ts = typeof observedAt === 'number' ? observedAt : new Date(observedAt).getTime();
    if (!Number.isFinite(ts)) return true;
    if (ts > now + TIME_CONSTANTS.MAX_CLOCK_SKEW_MS) return true;
    return now - ts > maxAgeMs;
}
