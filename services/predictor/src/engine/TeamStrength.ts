import { clamp, eloToProbability } from '@winline/shared';
import type { TeamStrength } from './types';

const FORM_WEIGHT = 0.1;
const STABILITY_WEIGHT = 0.03;

/** Pre-game P(team 1 wins): Elo base nudged by recent form and roster stability */
export function strengthPrior(team1: TeamStrength, team2: TeamStrength): number {
    const base = eloToProbability(team1.rating - team2.rating);
    const formAdj = ((team1.recent_form ?? 0.5) - (team2.recent_form ?? 0.5)) * FORM_WEIGHT;
    const stabilityAdj = ((team1.roster_stability ?? 1) - (team2.roster_stability ?? 1)) * STABILITY_WEIGHT;

    const p = base + formAdj + stabilityAdj;
    return Number.isFinite(p) ? clamp(p, 0.1, 0.9) : 0.5;
}
