/**
 * Context Multiplier
 *
 * Situational scaling of an event's base impact. Each factor is an
 * independent pure function bounded to [FACTOR_MIN, FACTOR_MAX]; the
 * combined multiplier is their product.
 */

import type { GameTitle } from '@winline/shared';
import { LOL, clamp } from '@winline/shared';

export const FACTOR_MIN = 0.65;
export const FACTOR_MAX = 1.35;

export type ContextFactorName =
    | 'comeback'
    | 'victim_value'
    | 'pressure'
    | 'desperation'
    | 'soul_point'
    | 'contested'
    | 'steal';

export interface ContextInput {
    title: GameTitle;
    event_type: string;
    context: string;

    /** Minutes */
    game_time: number;

    /** Gold difference from the acting team's point of view */
    team_gold_diff: number;

    /** Kills only */
    victim_gold?: number;

    /** Enemy inhibitors (LoL) or barracks (Dota 2) the acting team has destroyed */
    enemy_structures_down: number;

    /** Towers the acting team still stands on */
    own_towers_remaining: number;

    /** Dragons the acting team held before this event */
    dragons: number;

    contested?: boolean;
}

export interface ContextResult {
    multiplier: number;

    /** Only the factors that moved away from 1 */
    factors: Partial<Record<ContextFactorName, number>>;
}

function bounded(value: number): number {
    return clamp(value, FACTOR_MIN, FACTOR_MAX);
}

// ============================================
// Factors
// ============================================

/** Trailing teams gain more from an event, runaway leads gain less */
export function comebackFactor(teamGoldDiff: number): number {
    if (teamGoldDiff < -5000) return bounded(1.25);
    if (teamGoldDiff < -2000) return bounded(1.12);
    if (teamGoldDiff > 8000) return bounded(0.75);
    if (teamGoldDiff > 4000) return bounded(0.88);
    return 1;
}

/** Victim gold against a rough expected-gold curve of 300 + 400/min */
export function victimValueFactor(eventType: string, victimGold: number | undefined, minutes: number): number {
    if (eventType !== 'kill' || victimGold === undefined || victimGold <= 0) return 1;

    const expected = Math.max(300 + 400 * Math.max(0, minutes), 1);
    const ratio = victimGold / expected;

    if (ratio > 1.5) return bounded(1.2);
    if (ratio > 1.2) return bounded(1.1);
    if (ratio < 0.7) return bounded(0.85);
    return 1;
}

/** Elder arrives as a dragon with the `elder` context */
const PRESSURE_OBJECTIVES: Record<GameTitle, readonly string[]> = {
    lol: ['baron', 'dragon'],
    dota2: ['roshan'],
};

/** Epic objectives weigh more while the enemy base is already open */
export function pressureFactor(title: GameTitle, eventType: string, enemyStructuresDown: number): number {
    if (enemyStructuresDown <= 0) return 1;
    return PRESSURE_OBJECTIVES[title].includes(eventType) ? bounded(1.15) : 1;
}

export function desperationFactor(ownTowersRemaining: number): number {
    return ownTowersRemaining <= 3 ? bounded(1.1) : 1;
}

/** The drake that puts a team one away from soul */
export function soulPointFactor(title: GameTitle, eventType: string, context: string, dragons: number): number {
    if (title !== 'lol' || eventType !== 'dragon') return 1;
    if (context === 'soul' || context === 'elder') return 1;
    return dragons === LOL.DRAGONS_FOR_SOUL - 2 ? bounded(1.3) : 1;
}

export function contestedFactor(context: string, contested?: boolean): number {
    return context === 'contested' || contested === true ? bounded(1.15) : 1;
}

export function stealFactor(context: string): number {
    return context === 'steal' ? bounded(1.35) : 1;
}

// ============================================
// Combined
// ============================================

export function contextMultiplier(input: ContextInput): ContextResult {
    const values: Array<[ContextFactorName, number]> = [
        ['comeback', comebackFactor(input.team_gold_diff)],
        ['victim_value', victimValueFactor(input.event_type, input.victim_gold, input.game_time)],
        ['pressure', pressureFactor(input.title, input.event_type, input.enemy_structures_down)],
        ['desperation', desperationFactor(input.own_towers_remaining)],
        ['soul_point', soulPointFactor(input.title, input.event_type, input.context, input.dragons)],
        ['contested', contestedFactor(input.context, input.contested)],
        ['steal', stealFactor(input.context)],
    ];

    const factors: ContextResult['factors'] = {};
    let multiplier = 1;

    for (const [name, value] of values) {
        multiplier *= value;
        if (value !== 1) factors[name] = value;
    }

    return { multiplier, factors };
}
