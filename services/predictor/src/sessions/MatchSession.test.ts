import { describe, it } from 'node:test';
import * as assert from 'node:assert/strict';

import type { CreateMatchRequest, EdgeRequest } from '@winline/shared';
import { CreateMatchSchema } from '@winline/shared';
import { DEFAULT_MODEL_CONFIG } from '../engine/types';
import { EdgeCalculator } from '../trading/EdgeCalculator';
import { DEFAULT_TRADING_CONFIG } from '../trading/types';
import { RecordingLogger, gameEvent } from '../testing/fakes';
import { MatchConflictError } from './errors';
import { MatchSession } from './MatchSession';

const close = (actual: number, expected: number) =>
    assert.ok(Math.abs(actual - expected) < 1e-9, `expected ${expected}, got ${actual}`);

function session(overrides: Partial<CreateMatchRequest> = {}, logger = new RecordingLogger()): MatchSession {
    const request = CreateMatchSchema.parse({ match_id: 'm-1', title: 'lol', market_prior: 0.56, ...overrides });
    return new MatchSession(request, {
        modelConfig: DEFAULT_MODEL_CONFIG,
        edgeCalculator: new EdgeCalculator(DEFAULT_TRADING_CONFIG),
        logger,
    });
}

const quote = (overrides: Partial<EdgeRequest> = {}): EdgeRequest => ({
    market_price: 0.5,
    team: 1,
    scope: 'game',
    current_position: 0,
    ...overrides,
});

describe('MatchSession', () => {
    it('starts primed from the market prior', () => {
        const match = session({ team1_name: 'Blue' });
        const prediction = match.prediction();

        assert.equal(match.lifecycle, 'primed');
        assert.deepEqual(match.teamNames, { 1: 'Blue', 2: 'Team 2' });
        assert.equal(prediction.game_number, 1);
        assert.equal(prediction.snapshot.team1_prob, 0.56);
        assert.equal(prediction.snapshot.source, 'prior');
        assert.equal(prediction.series.format, 1);
        assert.equal(prediction.series.series_prob, 0.56);
    });

    it('widens uncertainty at match point but not at an open score', () => {
        const open = session({ format: 5, team1_wins: 0, team2_wins: 0 });
        close(open.prediction().snapshot.std_dev, 0.15);

        const decider = session({ format: 5, team1_wins: 2, team2_wins: 2 });
        close(decider.prediction().snapshot.std_dev, 0.18);
        assert.equal(decider.prediction().series.elimination_game, true);
    });

    it('carries the series context into the next game', () => {
        const match = session({ format: 3 });
        close(match.prediction().snapshot.std_dev, 0.15);

        const next = match.endGame(1);
        assert.equal(next.series.match_point_team1, true);
        close(next.snapshot.std_dev, 0.18);
    });

    it('prefers the market prior over ratings', () => {
        const match = session({ team1_rating: 1800, team2_rating: 1500 });
        assert.equal(match.prediction().snapshot.prior_prob, 0.56);
    });

    it('binds the match id to its log lines', () => {
        const logger = new RecordingLogger();
        session({}, logger);

        const created = logger.at('info').find((entry) => entry.message === 'Match session created');
        assert.equal(created?.context.match_id, 'm-1');
        assert.equal(created?.context.score, '0-0');
    });

    it('applies events to the current game', () => {
        const match = session();
        const snapshot = match.applyEvent(gameEvent('tower', 1, 14));

        assert.equal(match.lifecycle, 'live');
        assert.equal(snapshot.events_processed, 1);
        assert.ok(snapshot.team1_prob > 0.56);
        assert.equal(match.history().length, 2);
        assert.equal(match.history(1)[0], snapshot);
    });

    describe('series', () => {
        it('starts the next game with the same prior after a win', () => {
            const match = session({ format: 3 });
            match.applyEvent(gameEvent('kill', 1, 5));

            const prediction = match.endGame(1);

            assert.equal(match.lifecycle, 'primed');
            assert.equal(prediction.game_number, 2);
            assert.equal(prediction.series.team1_wins, 1);
            assert.equal(prediction.series.match_point_team1, true);
            assert.equal(prediction.snapshot.team1_prob, 0.56);
            assert.equal(prediction.snapshot.events_processed, 0);
        });

        it('goes terminal once decided and refuses further results', () => {
            const match = session({ format: 3 });
            match.endGame(2);
            const prediction = match.endGame(2);

            assert.equal(match.lifecycle, 'terminal');
            assert.equal(prediction.series.is_over, true);
            assert.equal(prediction.series.winner, 2);
            assert.equal(prediction.series.series_prob, 0);
            assert.equal(prediction.game_number, 2);
            assert.throws(() => match.endGame(1), MatchConflictError);
        });

        it('opens an already decided series as terminal', () => {
            const match = session({ format: 3, team1_wins: 2 });
            assert.equal(match.lifecycle, 'terminal');
            assert.equal(match.prediction().series.winner, 1);
        });

        it('rejects an impossible starting score', () => {
            assert.throws(
                () => session({ format: 3, team1_wins: 3 }),
                (error: unknown) => error instanceof MatchConflictError && /Invalid series score 3-0/.test(error.message)
            );
        });
    });

    describe('evaluateEdge', () => {
        it('prices team 1 on the current game', () => {
            const match = session();
            const result = match.evaluateEdge(quote());

            // confidence is still 0.5 before any game data
            close(result.fair_price, 0.56);
            close(result.adjusted_edge, 0.03);
            assert.equal(result.action, 'BUY');
            close(result.recommended_size, 15);
            close(result.recommended_shares, 30);
            assert.equal(result.match_id, 'm-1');
            assert.equal(result.scope, 'game');
            assert.equal(match.lastEdge, result);
        });

        it('prices team 2 as the complement', () => {
            const result = session().evaluateEdge(quote({ team: 2 }));

            close(result.fair_price, 0.44);
            assert.equal(result.action, 'SELL');
            assert.equal(result.side, 'SELL');
            assert.equal(result.team, 2);
        });

        it('prices the whole series on series scope', () => {
            const result = session({ format: 3 }).evaluateEdge(quote({ scope: 'series' }));

            // 0.56^2 + 2 * 0.56^2 * 0.44
            close(result.fair_price, 0.589568);
            close(result.adjusted_edge, 0.044784);
            assert.equal(result.action, 'BUY');
        });

        it('forgets the last edge when a game ends', () => {
            const match = session({ format: 3 });
            match.evaluateEdge(quote());
            match.endGame(1);
            assert.equal(match.lastEdge, null);
        });

        it('holds on a stale quote', () => {
            const now = Date.parse('2026-03-01T12:00:00.000Z');
            const result = session().evaluateEdge(quote({ observed_at: '2026-03-01T11:59:00.000Z' }), now);

            assert.equal(result.action, 'HOLD');
            assert.equal(result.rejected, 'stale_market_price');
        });
    });
});
