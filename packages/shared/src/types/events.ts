/**
 * Game Event & State Types
 * Normalized shapes emitted by feed connectors for LoL and Dota 2
 */

// ============================================
// Titles & Sides
// ============================================

export const GAME_TITLES = ['lol', 'dota2'] as const;
export type GameTitle = typeof GAME_TITLES[number];

/** Team 1 is the side every probability is quoted for */
export type TeamSide = 1 | 2;

export function otherSide(team: TeamSide): TeamSide {
    return team === 1 ? 2 : 1;
}

// ============================================
// Event Types (as they appear in type field)
// ============================================

export const GAME_EVENT_TYPES = [
    'kill',
    'tower',
    'dragon',
    'baron',
    'herald',
    'inhibitor',
    'roshan',
    'barracks',
    'teamfight',
] as const;
export type GameEventType = typeof GAME_EVENT_TYPES[number];

export function isGameEventType(value: string): value is GameEventType {
    return (GAME_EVENT_TYPES as readonly string[]).includes(value);
}

/** Context qualifiers; which ones exist depends on event type and title */
export const IMPACT_CONTEXTS = [
    'default',
    // kills
    'solo', 'first_blood', 'shutdown', 'pickoff',
    // towers
    'first', 'outer', 'inner', 'inhibitor_tower', 'nexus_tower',
    'tier1', 'tier2', 'tier3', 'tier4',
    // dragons
    'infernal', 'mountain', 'ocean', 'cloud', 'hextech', 'chemtech', 'soul', 'elder',
    // epic objectives
    'secure', 'steal', 'contested', 'second', 'third',
    // barracks
    'melee', 'ranged', 'mega',
    // fights
    'won_small', 'won_big', 'ace', 'wipe',
] as const;
export type ImpactContext = typeof IMPACT_CONTEXTS[number];

export function isImpactContext(value: string): value is ImpactContext {
    return (IMPACT_CONTEXTS as readonly string[]).includes(value);
}

// ============================================
// Game Event
// ============================================

/**
 * One normalized in-game event. Immutable once created and consumed once
 * by the engine's incremental path.
 *
 * `type` and `context` stay plain strings on the wire: anything the impact
 * table does not know degrades to a default impact instead of failing.
 */
export interface GameEvent {
    /** Provider id, if the feed has one */
    readonly event_id?: string;

    /** Game clock in minutes */
    readonly time: number;

    readonly type: string;

    /** Side that achieved the event */
    readonly team: TeamSide;

    readonly context: string;

    /** Kills: gold held by the victim */
    readonly victim_gold?: number;

    /** Kills: the victim's kill streak (shutdown bonus from 3) */
    readonly victim_streak?: number;

    /** Teamfights: kills scored and deaths suffered by `team` */
    readonly kills?: number;
    readonly deaths?: number;

    /** 50/50 objective fight */
    readonly contested?: boolean;
}

// ============================================
// Game State
// ============================================

/** Cumulative per-team counters. Counters only grow within a game. */
export interface TeamCounters {
    kills: number;
    deaths: number;

    /** Gold (LoL) or net worth (Dota 2) */
    gold: number;

    /** Enemy towers destroyed */
    towers: number;

    // League of Legends
    dragons: number;
    barons: number;
    heralds: number;
    /** Enemy inhibitors destroyed */
    inhibitors: number;
    has_soul: boolean;
    has_elder: boolean;
    has_baron_buff: boolean;

    // Dota 2
    roshans: number;
    /** Enemy barracks destroyed */
    barracks: number;
    has_aegis: boolean;
}

export interface GameState {
    title: GameTitle;

    /** Elapsed game clock in minutes */
    game_time: number;

    team1: TeamCounters;
    team2: TeamCounters;
}

export function createTeamCounters(): TeamCounters {
    return {
        kills: 0,
        deaths: 0,
        gold: 0,
        towers: 0,
        dragons: 0,
        barons: 0,
        heralds: 0,
        inhibitors: 0,
        has_soul: false,
        has_elder: false,
        has_baron_buff: false,
        roshans: 0,
        barracks: 0,
        has_aegis: false,
    };
}

export function createGameState(title: GameTitle): GameState {
    return {
        title,
        game_time: 0,
        team1: createTeamCounters(),
        team2: createTeamCounters(),
    };
}

export function cloneGameState(state: GameState): GameState {
    return {
        title: state.title,
        game_time: state.game_time,
        team1: { ...state.team1 },
        team2: { ...state.team2 },
    };
}

export function teamCounters(state: GameState, team: TeamSide): TeamCounters {
    return team === 1 ? state.team1 : state.team2;
}
