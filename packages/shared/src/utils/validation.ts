/**
 * Probability Validation Utilities
 */

export const PROBABILITY_BOUNDS = {
    /** A live game never reaches certainty */
    MIN_LIVE: 0.02,
    MAX_LIVE: 0.98,

    /** Confidence-interval bounds */
    MIN_INTERVAL: 0.01,
    MAX_INTERVAL: 0.99,

    /** Log-odds input clamp */
    MIN_LOG_ODDS_INPUT: 0.001,
    MAX_LOG_ODDS_INPUT: 0.999,
} as const;

export function clamp(value: number, min: number, max: number): number {
    return Math.max(min, Math.min(max, value));
}

/** Clamp to the live-game range; NaN collapses to a coin flip */
export function clampProbability(p: number): number {
    if (Number.isNaN(p)) return 0.5;
    return clamp(p, PROBABILITY_BOUNDS.MIN_LIVE, PROBABILITY_BOUNDS.MAX_LIVE);
}

/** Clamp to [0, 1]; NaN collapses to a coin flip */
export function clampUnit(p: number): number {
    if (Number.isNaN(p)) return 0.5;
    return clamp(p, 0, 1);
}

export function isOpenUnitInterval(p: number): boolean {
    return Number.isFinite(p) && p > 0 && p < 1;
}

export function probabilityToLogOdds(p: number): number {
    const safe = clamp(
        Number.isNaN(p) ? 0.5 : p,
        PROBABILITY_BOUNDS.MIN_LOG_ODDS_INPUT,
        PROBABILITY_BOUNDS.MAX_LOG_ODDS_INPUT
    );
    return Math.log(safe / (1 - safe));
}

/** Saturates instead of overflowing: very large |x| maps onto 0 or 1 */
export function logOddsToProbability(x: number): number {
    if (Number.isNaN(x)) return 0.5;
    if (x >= 0) {
        return 1 / (1 + Math.exp(-x));
    }
    const e = Math.exp(x);
    return e / (1 + e);
}

export function eloToProbability(ratingDiff: number): number {
    return 1 / (1 + Math.pow(10, -ratingDiff / 400));
}

export function round(value: number, decimals: number): number {
    const multiplier = Math.pow(10, decimals);
    return Math.round(value * multiplier) / multiplier;
}
