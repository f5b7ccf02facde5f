import { describe, it } from 'node:test';
import * as assert from 'node:assert/strict';

import { SeriesState, seriesProbabilityFrom, winsNeededFor } from './SeriesState';

describe('SeriesState', () => {
    it('needs a majority of the format to win', () => {
        assert.equal(winsNeededFor(1), 1);
        assert.equal(winsNeededFor(3), 2);
        assert.equal(winsNeededFor(5), 3);
    });

    it('composes a best-of-5 at 2-1 exactly through the recursion', () => {
        const series = new SeriesState({ format: 5, team1_wins: 2, team2_wins: 1 });
        const p = 0.55;

        const expected = p * 1 + (1 - p) * (p * 1 + (1 - p) * 0);
        assert.equal(series.seriesProbability(p), expected);
        assert.ok(Math.abs(series.seriesProbability(p) - 0.7975) < 1e-12);
    });

    it('matches the closed form for a fresh best-of-3', () => {
        const series = new SeriesState({ format: 3, team1_wins: 0, team2_wins: 0 });
        assert.ok(Math.abs(series.seriesProbability(0.6) - 0.36 * (3 - 1.2)) < 1e-12);
    });

    it('passes the game probability through for a best-of-1', () => {
        const series = new SeriesState({ format: 1, team1_wins: 0, team2_wins: 0 });
        assert.equal(series.seriesProbability(0.37), 0.37);
    });

    it('returns exactly 1 or 0 once a side has won', () => {
        for (const p of [0, 0.3, 0.99, 1]) {
            assert.equal(new SeriesState({ format: 3, team1_wins: 2, team2_wins: 1 }).seriesProbability(p), 1);
            assert.equal(new SeriesState({ format: 3, team1_wins: 0, team2_wins: 2 }).seriesProbability(p), 0);
            assert.equal(seriesProbabilityFrom(3, 0, 3, p), 1);
            assert.equal(seriesProbabilityFrom(1, 3, 3, p), 0);
        }
    });

    it('increases with the single-game probability for an unfinished score', () => {
        for (const [t1, t2] of [[0, 0], [1, 2], [2, 0], [2, 2]]) {
            const series = new SeriesState({ format: 5, team1_wins: t1 ?? 0, team2_wins: t2 ?? 0 });
            let previous = series.seriesProbability(0);
            for (let p = 0.05; p <= 1.0001; p += 0.05) {
                const value = series.seriesProbability(p);
                assert.ok(value > previous, `not increasing at ${t1}-${t2}, p=${p}`);
                previous = value;
            }
        }
    });

    it('treats NaN as a coin flip and clamps out-of-range input', () => {
        const series = new SeriesState({ format: 3, team1_wins: 1, team2_wins: 1 });
        assert.equal(series.seriesProbability(Number.NaN), 0.5);
        assert.equal(series.seriesProbability(1.4), 1);
        assert.equal(series.seriesProbability(-0.2), 0);
    });

    it('tracks match points, elimination games and the game number', () => {
        const series = new SeriesState({ format: 5, team1_wins: 2, team2_wins: 1 });
        assert.equal(series.isMatchPointFor(1), true);
        assert.equal(series.isMatchPointFor(2), false);
        assert.equal(series.isEliminationGame, false);
        assert.equal(series.currentGameNumber, 4);

        series.recordGameWin(2);
        assert.equal(series.isEliminationGame, true);
        assert.equal(series.currentGameNumber, 5);
    });

    it('records wins until the series is decided, then rejects further wins', () => {
        const series = new SeriesState({ format: 3, team1_wins: 0, team2_wins: 0 });
        series.recordGameWin(1);
        assert.equal(series.isOver, false);
        series.recordGameWin(1);

        assert.equal(series.isOver, true);
        assert.equal(series.winner, 1);
        assert.equal(series.currentGameNumber, 2);
        assert.equal(series.isMatchPointFor(1), false);
        assert.throws(() => series.recordGameWin(2), /Series already decided \(2-0\)/);
        assert.equal(series.team2Wins, 0);
    });

    it('rejects impossible starting scores', () => {
        assert.throws(() => new SeriesState({ format: 3, team1_wins: 3, team2_wins: 0 }), /Invalid series score/);
        assert.throws(() => new SeriesState({ format: 3, team1_wins: 2, team2_wins: 2 }), /both teams/);
        assert.throws(() => new SeriesState({ format: 5, team1_wins: -1, team2_wins: 0 }), /Invalid series score/);
        assert.throws(() => new SeriesState({ format: 5, team1_wins: 1.5, team2_wins: 0 }), /Invalid series score/);
    });

    it('summarises the series for a game probability', () => {
        const series = new SeriesState({ format: 5, team1_wins: 2, team2_wins: 2 });
        assert.deepEqual(series.summary(0.6), {
            format: 5,
            team1_wins: 2,
            team2_wins: 2,
            wins_needed: 3,
            game_number: 5,
            is_over: false,
            winner: null,
            match_point_team1: true,
            match_point_team2: true,
            elimination_game: true,
            series_prob: 0.6,
        });
    });
});
