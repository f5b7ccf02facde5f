/**
 * Series State
 *
 * Best-of-N bookkeeping and exact composition of a single-game probability
 * into a series probability.
 */

import type { SeriesFormat, SeriesScore, SeriesSummary, TeamSide } from '@winline/shared';
import { clampUnit } from '@winline/shared';

export function winsNeededFor(format: SeriesFormat): number {
    return Math.ceil(format / 2);
}

/**
 * P(team 1 takes the series) from a score, assuming every remaining game
 * is won with probability `p`. Exact: walks the full remaining game tree.
 */
export function seriesProbabilityFrom(
    team1Wins: number,
    team2Wins: number,
    winsNeeded: number,
    p: number,
    memo: Map<string, number> = new Map()
): number {
    if (team1Wins >= winsNeeded) return 1;
    if (team2Wins >= winsNeeded) return 0;

    const key = `${team1Wins}:${team2Wins}`;
    const cached = memo.get(key);
    if (cached !== undefined) return cached;

    const value =
        p * seriesProbabilityFrom(team1Wins + 1, team2Wins, winsNeeded, p, memo) +
        (1 - p) * seriesProbabilityFrom(team1Wins, team2Wins + 1, winsNeeded, p, memo);

    memo.set(key, value);
    return value;
}

export class SeriesState {
    readonly format: SeriesFormat;
    readonly winsNeeded: number;
    private wins: Record<TeamSide, number>;

    constructor(score: SeriesScore) {
        this.format = score.format;
        this.winsNeeded = winsNeededFor(score.format);

        for (const wins of [score.team1_wins, score.team2_wins]) {
            if (!Number.isInteger(wins) || wins < 0 || wins > this.winsNeeded) {
                throw new Error(`Invalid series score ${score.team1_wins}-${score.team2_wins} for Bo${score.format}`);
            }
        }
        if (score.team1_wins >= this.winsNeeded && score.team2_wins >= this.winsNeeded) {
            throw new Error(`Invalid series score ${score.team1_wins}-${score.team2_wins}: both teams cannot have won`);
        }

        this.wins = { 1: score.team1_wins, 2: score.team2_wins };
    }

    get team1Wins(): number {
        return this.wins[1];
    }

    get team2Wins(): number {
        return this.wins[2];
    }

    get isOver(): boolean {
        return this.winner !== null;
    }

    get winner(): TeamSide | null {
        if (this.wins[1] >= this.winsNeeded) return 1;
        if (this.wins[2] >= this.winsNeeded) return 2;
        return null;
    }

    /** 1-based number of the game being played (or the last one, once decided) */
    get currentGameNumber(): number {
        const played = this.wins[1] + this.wins[2];
        return this.isOver ? played : played + 1;
    }

    isMatchPointFor(team: TeamSide): boolean {
        return !this.isOver && this.wins[team] === this.winsNeeded - 1;
    }

    /** Both sides on match point: the next game decides the series */
    get isEliminationGame(): boolean {
        return this.isMatchPointFor(1) && this.isMatchPointFor(2);
    }

    /** NaN counts as a coin flip; values outside [0, 1] are clamped */
    seriesProbability(p: number): number {
        return seriesProbabilityFrom(this.wins[1], this.wins[2], this.winsNeeded, clampUnit(p));
    }

    /** Throws once the series is decided */
    recordGameWin(team: TeamSide): void {
        if (this.isOver) {
            throw new Error(
                `Series already decided (${this.wins[1]}-${this.wins[2]}), cannot record a win for team ${team}`
            );
        }
        this.wins[team]++;
    }

    summary(gameProbability: number): SeriesSummary {
        return {
            format: this.format,
            team1_wins: this.wins[1],
            team2_wins: this.wins[2],
            wins_needed: this.winsNeeded,
            game_number: this.currentGameNumber,
            is_over: this.isOver,
            winner: this.winner,
            match_point_team1: this.isMatchPointFor(1),
            match_point_team2: this.isMatchPointFor(2),
            elimination_game: this.isEliminationGame,
            series_prob: this.seriesProbability(gameProbability),
        };
    }
}
