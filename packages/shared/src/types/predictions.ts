/**
 * Prediction Types
 * Probability snapshots, series composition and edge results
 */

import type { GameTitle, TeamSide } from './events';

// ============================================
// Game Phase & Momentum
// ============================================

export type GamePhase =
    | 'early_lane'
    | 'mid_lane'
    | 'early_mid'
    | 'mid_game'
    | 'late_mid'
    | 'late_game'
    | 'ultra_late';

/** How an event's (type, context) pair was resolved against the impact table */
export type ImpactResolution = 'exact' | 'default_context' | 'unknown_event';

export type MomentumState =
    | 'strong_team1'
    | 'slight_team1'
    | 'neutral'
    | 'slight_team2'
    | 'strong_team2';

// ============================================
// Probability Snapshot
// ============================================

/** Log-odds contributions of the full recompute; momentum is a probability nudge on the event path */
export interface ProbabilityComponents {
    gold: number;
    kills: number;
    towers: number;
    objectives: number;
    momentum: number;
}

export interface ProbabilitySnapshot {
    /** Game clock (minutes) the snapshot refers to */
    game_time: number;

    /** Probability team 1 wins the current game, always within [0.02, 0.98] */
    team1_prob: number;
    team2_prob: number;

    /** 0-1 */
    confidence: number;

    std_dev: number;

    /** 90% interval */
    lower_bound: number;
    upper_bound: number;

    prior_prob: number;
    components: ProbabilityComponents;

    game_phase: GamePhase;
    events_processed: number;

    /** Which path produced the snapshot */
    source: 'prior' | 'state' | 'event';

    /** Event path: signed shift applied to team1_prob before clamping */
    impact?: number;
    trigger_event_type?: string;
    impact_resolution?: ImpactResolution;
}

// ============================================
// Series
// ============================================

export type SeriesFormat = 1 | 3 | 5;

export interface SeriesScore {
    format: SeriesFormat;
    team1_wins: number;
    team2_wins: number;
}

export interface SeriesSummary extends SeriesScore {
    wins_needed: number;
    game_number: number;
    is_over: boolean;
    winner: TeamSide | null;
    match_point_team1: boolean;
    match_point_team2: boolean;
    elimination_game: boolean;

    /** Probability team 1 takes the series given the current game's estimate */
    series_prob: number;
}

// ============================================
// Edge & Sizing
// ============================================

export type TradeSide = 'BUY' | 'SELL';

export type TradeAction =
    | 'STRONG_BUY'
    | 'BUY'
    | 'SLIGHT_BUY'
    | 'HOLD'
    | 'SLIGHT_SELL'
    | 'SELL'
    | 'STRONG_SELL';

export type EdgeQuality = 'none' | 'marginal' | 'decent' | 'good' | 'great' | 'exceptional';

export type TradeUrgency = 'IMMEDIATE' | 'HIGH' | 'MEDIUM' | 'LOW';

export type EdgeRejection = 'invalid_market_price' | 'stale_market_price' | 'invalid_fair_price';

export interface PositionSize {
    size_dollars: number;
    size_shares: number;
    /** Fraction of bankroll actually committed */
    size_percent: number;
    /** Full Kelly before the fractional multiplier and caps */
    kelly_fraction: number;
    is_valid: boolean;
    reason: string;
}

/** Stateless output handed to the order layer; never persisted by the core */
export interface EdgeResult {
    fair_price: number;
    market_price: number;

    /** fair - market */
    edge: number;

    /** edge scaled by engine confidence */
    adjusted_edge: number;
    confidence: number;

    side: TradeSide | null;
    action: TradeAction;
    quality: EdgeQuality;
    urgency: TradeUrgency;

    kelly_fraction: number;
    recommended_size: number;
    recommended_shares: number;

    /** Effective edge clears the minimum and a size was produced */
    actionable: boolean;
    rejected?: EdgeRejection;
    reason: string;
}

// ============================================
// Match Prediction (service output)
// ============================================

export interface MatchPrediction {
    match_id: string;
    title: GameTitle;
    game_number: number;
    ts_calc: string;
    model_version: string;

    snapshot: ProbabilitySnapshot;
    series: SeriesSummary;
    momentum_state: MomentumState;
}
