import type { GamePhase, GameTitle } from '@winline/shared';

/** [minute, multiplier] pairs, strictly increasing in both columns */
type Breakpoints = ReadonlyArray<readonly [number, number]>;

// Early events move the needle less: gold compounds and mid-game fights decide games.
// Dota caps lower than LoL late on because buybacks soften single fights.
const TIME_CURVES: Record<GameTitle, Breakpoints> = {
    lol: [
        [0, 0.5],
        [10, 0.7],
        [25, 1.1],
        [40, 1.4],
        [60, 1.5],
    ],
    dota2: [
        [0, 0.4],
        [12, 0.6],
        [30, 1.0],
        [50, 1.2],
    ],
};

const PHASE_BOUNDARIES: Record<GameTitle, ReadonlyArray<readonly [number, GamePhase]>> = {
    lol: [
        [6, 'early_lane'],
        [14, 'mid_lane'],
        [20, 'early_mid'],
        [28, 'mid_game'],
        [35, 'late_mid'],
        [45, 'late_game'],
    ],
    dota2: [
        [10, 'early_lane'],
        [18, 'mid_lane'],
        [28, 'mid_game'],
        [40, 'late_mid'],
        [55, 'late_game'],
    ],
};

/**
 * Event-weight multiplier for a game clock in minutes. Piecewise linear,
 * continuous, non-decreasing, flat outside the breakpoint range.
 */
export function timeMultiplier(title: GameTitle, minutes: number): number {
    const curve = TIME_CURVES[title];
    const t = Number.isFinite(minutes) ? minutes : 0;

    let prev = curve[0];
    if (!prev) return 1;
    if (t <= prev[0]) return prev[1];

    for (const point of curve) {
        if (t <= point[0]) {
            const span = point[0] - prev[0];
            const ratio = span > 0 ? (t - prev[0]) / span : 1;
            return prev[1] + ratio * (point[1] - prev[1]);
        }
        prev = point;
    }

    return prev[1];
}

export function gamePhase(title: GameTitle, minutes: number): GamePhase {
    const t = Number.isFinite(minutes) ? minutes : 0;
    for (const [end, phase] of PHASE_BOUNDARIES[title]) {
        if (t < end) return phase;
    }
    return 'ultra_late';
}
