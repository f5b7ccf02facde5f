import { describe, it } from 'node:test';
import * as assert from 'node:assert/strict';

import {
    CreateMatchSchema,
    EdgeRequestSchema,
    EventsRequestSchema,
    GameEventSchema,
    GameStateSchema,
    HistoryQuerySchema,
    PAYLOAD_LIMITS,
} from './events';

describe('GameEventSchema', () => {
    it('defaults the context and keeps unknown event types', () => {
        const event = GameEventSchema.parse({ time: 12.5, type: 'ward', team: 2 });
        assert.deepEqual(event, { time: 12.5, type: 'ward', team: 2, context: 'default' });
    });

    it('rejects a team other than 1 or 2', () => {
        assert.equal(GameEventSchema.safeParse({ time: 1, type: 'kill', team: 3 }).success, false);
    });

    it('rejects a non-finite clock', () => {
        assert.equal(GameEventSchema.safeParse({ time: Number.POSITIVE_INFINITY, type: 'kill', team: 1 }).success, false);
    });
});

describe('EventsRequestSchema', () => {
    it('wraps a single event into a batch', () => {
        const request = EventsRequestSchema.parse({ time: 3, type: 'kill', team: 1 });
        assert.equal(request.events.length, 1);
        assert.equal(request.events[0]?.type, 'kill');
    });

    it('caps the batch size', () => {
        const events = Array.from({ length: PAYLOAD_LIMITS.MAX_BATCH_SIZE + 1 }, (_, i) => ({
            time: i,
            type: 'kill',
            team: 1,
        }));
        assert.equal(EventsRequestSchema.safeParse({ events }).success, false);
    });
});

describe('GameStateSchema', () => {
    it('fills missing counters with zeros', () => {
        const state = GameStateSchema.parse({ title: 'dota2', game_time: 25, team1: { barracks: 2 } });

        assert.equal(state.team1.barracks, 2);
        assert.equal(state.team1.has_aegis, false);
        assert.equal(state.team2.kills, 0);
    });

    it('rejects negative counters', () => {
        assert.equal(
            GameStateSchema.safeParse({ title: 'lol', game_time: 10, team1: { towers: -1 } }).success,
            false
        );
    });
});

describe('CreateMatchSchema', () => {
    it('defaults to a fresh best-of-one', () => {
        const request = CreateMatchSchema.parse({ match_id: 'm-1', title: 'lol' });
        assert.equal(request.format, 1);
        assert.equal(request.team1_wins, 0);
        assert.equal(request.team2_wins, 0);
    });

    it('rejects a best-of-two and a certain market prior', () => {
        assert.equal(CreateMatchSchema.safeParse({ match_id: 'm', title: 'lol', format: 2 }).success, false);
        assert.equal(CreateMatchSchema.safeParse({ match_id: 'm', title: 'lol', market_prior: 1 }).success, false);
    });
});

describe('EdgeRequestSchema', () => {
    it('leaves out-of-range prices for the edge layer', () => {
        const request = EdgeRequestSchema.parse({ market_price: 1.4 });
        assert.deepEqual(request, { market_price: 1.4, team: 1, scope: 'game', current_position: 0 });
    });
});

describe('HistoryQuerySchema', () => {
    it('coerces the limit from the query string', () => {
        assert.equal(HistoryQuerySchema.parse({ limit: '20' }).limit, 20);
        assert.equal(HistoryQuerySchema.parse({}).limit, 50);
        assert.equal(HistoryQuerySchema.safeParse({ limit: '501' }).success, false);
    });
});
