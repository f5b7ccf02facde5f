import { describe, it } from 'node:test';
import * as assert from 'node:assert/strict';

import {
    FACTOR_MAX,
    FACTOR_MIN,
    comebackFactor,
    contestedFactor,
    contextMultiplier,
    desperationFactor,
    pressureFactor,
    soulPointFactor,
    stealFactor,
    victimValueFactor,
} from './ContextMultiplier';
import type { ContextInput } from './ContextMultiplier';

const neutral: ContextInput = {
    title: 'lol',
    event_type: 'kill',
    context: 'default',
    game_time: 15,
    team_gold_diff: 0,
    enemy_structures_down: 0,
    own_towers_remaining: 11,
    dragons: 0,
};

describe('context factors', () => {
    it('rewards trailing teams and damps runaway leads', () => {
        assert.equal(comebackFactor(-6000), 1.25);
        assert.equal(comebackFactor(-3000), 1.12);
        assert.equal(comebackFactor(0), 1);
        assert.equal(comebackFactor(5000), 0.88);
        assert.equal(comebackFactor(9000), 0.75);
    });

    it('values kills by victim gold against the expected curve', () => {
        // expected gold at 10 min: 300 + 4000 = 4300
        assert.equal(victimValueFactor('kill', 10000, 10), 1.2);
        assert.equal(victimValueFactor('kill', 6000, 10), 1.1);
        assert.equal(victimValueFactor('kill', 4300, 10), 1);
        assert.equal(victimValueFactor('kill', 1000, 10), 0.85);
        assert.equal(victimValueFactor('kill', undefined, 10), 1);
        assert.equal(victimValueFactor('tower', 10000, 10), 1);
    });

    it('boosts epic objectives only while the enemy base is open', () => {
        assert.equal(pressureFactor('lol', 'baron', 1), 1.15);
        assert.equal(pressureFactor('lol', 'dragon', 2), 1.15);
        assert.equal(pressureFactor('lol', 'kill', 1), 1);
        assert.equal(pressureFactor('lol', 'baron', 0), 1);

        const elder = contextMultiplier({ ...neutral, event_type: 'dragon', context: 'elder', enemy_structures_down: 1 });
        assert.deepEqual(elder.factors, { pressure: 1.15 });
        assert.equal(pressureFactor('dota2', 'roshan', 1), 1.15);
        assert.equal(pressureFactor('dota2', 'baron', 1), 1);
    });

    it('applies desperation at three towers or fewer', () => {
        assert.equal(desperationFactor(3), 1.1);
        assert.equal(desperationFactor(4), 1);
    });

    it('detects the drake that puts a team on soul point', () => {
        assert.equal(soulPointFactor('lol', 'dragon', 'infernal', 2), 1.3);
        assert.equal(soulPointFactor('lol', 'dragon', 'infernal', 1), 1);
        assert.equal(soulPointFactor('lol', 'dragon', 'elder', 2), 1);
        assert.equal(soulPointFactor('dota2', 'dragon', 'default', 2), 1);
    });

    it('recognises contested objectives and steals', () => {
        assert.equal(contestedFactor('contested'), 1.15);
        assert.equal(contestedFactor('default', true), 1.15);
        assert.equal(contestedFactor('default', false), 1);
        assert.equal(stealFactor('steal'), 1.35);
        assert.equal(stealFactor('secure'), 1);
    });
});

describe('contextMultiplier', () => {
    it('is exactly 1 in a neutral situation', () => {
        assert.deepEqual(contextMultiplier(neutral), { multiplier: 1, factors: {} });
    });

    it('multiplies the factors that apply and reports them', () => {
        const result = contextMultiplier({
            ...neutral,
            event_type: 'baron',
            context: 'steal',
            contested: true,
        });

        assert.ok(Math.abs(result.multiplier - 1.15 * 1.35) < 1e-12);
        assert.deepEqual(result.factors, { contested: 1.15, steal: 1.35 });
    });

    it('keeps every individual factor within bounds', () => {
        const result = contextMultiplier({
            ...neutral,
            event_type: 'dragon',
            context: 'steal',
            team_gold_diff: -9000,
            enemy_structures_down: 1,
            own_towers_remaining: 2,
            dragons: 2,
            contested: true,
        });

        for (const value of Object.values(result.factors)) {
            assert.ok(value !== undefined && value >= FACTOR_MIN && value <= FACTOR_MAX);
        }
        assert.equal(Object.keys(result.factors).length, 6);
    });
});
