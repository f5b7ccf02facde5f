import { describe, it } from 'node:test';
import * as assert from 'node:assert/strict';

import { MAX_MOMENTUM_ADJUSTMENT, MomentumTracker } from './MomentumTracker';

describe('MomentumTracker', () => {
    it('scores recent impact signed by team', () => {
        const tracker = new MomentumTracker();
        tracker.addEvent(10, 1, 0.04);

        assert.equal(tracker.score(), 0.04);
        assert.equal(tracker.adjustment(), 0.02);
        assert.equal(tracker.state(), 'slight_team1');

        tracker.addEvent(10, 2, 0.1);
        assert.ok(Math.abs(tracker.score() - -0.06) < 1e-12);
        assert.equal(tracker.state(), 'strong_team2');
    });

    it('decays a contribution strictly towards zero without flipping sign', () => {
        const tracker = new MomentumTracker({ decay: 3 });
        tracker.addEvent(10, 1, 0.05);

        let previous = tracker.score(10);
        for (let now = 10.5; now <= 40; now += 0.5) {
            const value = tracker.score(now);
            assert.ok(value < previous, `score did not decay at ${now}`);
            assert.ok(value > 0, `score flipped sign at ${now}`);
            previous = value;
        }
        assert.ok(Math.abs(tracker.score(13) - 0.05 * Math.exp(-1)) < 1e-15);
    });

    it('caps the probability adjustment', () => {
        const tracker = new MomentumTracker();
        tracker.addEvent(5, 1, 0.2);
        assert.equal(tracker.adjustment(), MAX_MOMENTUM_ADJUSTMENT);

        tracker.addEvent(5, 2, 0.6);
        assert.equal(tracker.adjustment(), -MAX_MOMENTUM_ADJUSTMENT);
    });

    it('prunes entries older than twice the decay', () => {
        const tracker = new MomentumTracker({ decay: 3 });
        tracker.addEvent(0, 1, 0.1);
        tracker.addEvent(7, 2, 0.01);

        assert.equal(tracker.size, 1);
        assert.equal(tracker.score(), -0.01);

        tracker.advance(20);
        assert.equal(tracker.size, 0);
        assert.equal(tracker.state(), 'neutral');
    });

    it('evicts the oldest entry past capacity', () => {
        const tracker = new MomentumTracker({ capacity: 3 });
        for (let i = 0; i < 5; i++) {
            tracker.addEvent(1, i % 2 === 0 ? 1 : 2, 0.01);
        }
        assert.equal(tracker.size, 3);
    });

    it('clamps late arrivals to the tracker clock', () => {
        const tracker = new MomentumTracker();
        tracker.addEvent(10, 1, 0.01);
        tracker.addEvent(8, 2, 0.01);

        assert.equal(tracker.currentTime, 10);
        assert.equal(tracker.score(), 0);
    });

    it('counts the trailing streak of one side', () => {
        const tracker = new MomentumTracker();
        tracker.addEvent(1, 1, 0.01);
        tracker.addEvent(2, 2, 0.01);
        tracker.addEvent(3, 2, 0.01);
        tracker.addEvent(4, 2, 0.01);

        assert.equal(tracker.streak(2), 3);
        assert.equal(tracker.streak(1), 0);
    });

    it('rejects a non-positive decay', () => {
        assert.throws(() => new MomentumTracker({ decay: 0 }), /decay must be positive/);
    });
});
