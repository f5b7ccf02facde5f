import { describe, it } from 'node:test';
import * as assert from 'node:assert/strict';

import type { GameEvent } from '@winline/shared';
import { PROBABILITY_BOUNDS } from '@winline/shared';
import { ProbabilityEngine } from '../engine/ProbabilityEngine';
import { SimulatedFeed, simulateGame } from './SimulatedFeed';

describe('simulateGame', () => {
    it('is reproducible from its seed', () => {
        const a = simulateGame({ title: 'lol', seed: 7 });
        const b = simulateGame({ title: 'lol', seed: 7 });
        const c = simulateGame({ title: 'lol', seed: 8 });

        assert.deepEqual(a, b);
        assert.notDeepEqual(a, c);
    });

    it('emits time-ordered events inside the game length', () => {
        const events = simulateGame({ title: 'dota2', seed: 3, duration: 30 });

        assert.ok(events.length > 10);
        for (let i = 1; i < events.length; i++) {
            const previous = events[i - 1];
            const current = events[i];
            assert.ok(previous && current && current.time > previous.time);
        }
        assert.ok(events.every((event) => event.time > 0 && event.time <= 30));
    });

    it('keeps objectives to their windows', () => {
        const events = simulateGame({ title: 'lol', seed: 11, duration: 40 });

        assert.ok(events.filter((e) => e.type === 'baron').every((e) => e.time >= 20));
        assert.ok(events.filter((e) => e.type === 'herald').every((e) => e.time >= 8 && e.time < 20));
        assert.ok(events.filter((e) => e.type === 'teamfight').every((e) => (e.deaths ?? 0) < (e.kills ?? 0)));
    });

    it('gives a one-sided game to the stronger team', () => {
        const events = simulateGame({ title: 'lol', seed: 5, team1Strength: 1 });
        assert.ok(events.every((event) => event.team === 1));
    });

    it('only uses events the impact tables know', () => {
        for (const title of ['lol', 'dota2'] as const) {
            const engine = new ProbabilityEngine({ title });
            for (const event of simulateGame({ title, seed: 21, team1Strength: 0.8 })) {
                const snapshot = engine.updateFromEvent(event);
                assert.equal(snapshot.impact_resolution, 'exact', `${title} ${event.type}/${event.context}`);
                assert.ok(snapshot.team1_prob >= PROBABILITY_BOUNDS.MIN_LIVE);
                assert.ok(snapshot.team1_prob <= PROBABILITY_BOUNDS.MAX_LIVE);
            }
        }
    });
});

describe('SimulatedFeed', () => {
    it('delivers the simulated events to every handler in order', async () => {
        const feed = new SimulatedFeed({ title: 'dota2', seed: 9 });
        const first: GameEvent[] = [];
        const second: string[] = [];
        feed.onEvent((event) => {
            first.push(event);
        });
        feed.onEvent((event) => {
            second.push(event.event_id ?? '');
        });

        await feed.start();

        assert.deepEqual(first, simulateGame({ title: 'dota2', seed: 9 }));
        assert.deepEqual(second, first.map((event) => event.event_id));
    });

    it('stops between events', async () => {
        const feed = new SimulatedFeed({ title: 'lol', seed: 4 });
        const received: GameEvent[] = [];
        feed.onEvent(async (event) => {
            received.push(event);
            if (received.length === 3) {
                await feed.stop();
            }
        });

        await feed.start();
        assert.equal(received.length, 3);
    });

    it('stops calling a handler once unsubscribed', async () => {
        const feed = new SimulatedFeed({ title: 'lol', seed: 4, duration: 10 });
        let calls = 0;
        const unsubscribe = feed.onEvent(() => {
            calls++;
        });
        unsubscribe();

        await feed.start();
        assert.equal(calls, 0);
    });
});
