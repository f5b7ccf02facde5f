import type { ImpactResolution } from '@winline/shared';
import { PROCESSING } from '@winline/shared';

// ============================================
// Model Configuration
// ============================================

/**
 * Explicit model settings, built once from the environment by
 * `buildModelConfig()` and handed to each engine at construction.
 */
export interface ModelConfig {
    version: string;

    /** Momentum half-life-ish constant (minutes); entries older than 2x are pruned */
    momentumDecayMinutes: number;
    momentumCapacity: number;

    /** Snapshots retained per game */
    historyCapacity: number;

    /** Uncertainty at game start and the floor it decays towards */
    initialStdDev: number;
    minStdDev: number;
}

export const DEFAULT_MODEL_CONFIG: ModelConfig = {
    version: 'v2.0.0-impact',
    momentumDecayMinutes: 3,
    momentumCapacity: PROCESSING.MOMENTUM_WINDOW_CAPACITY,
    historyCapacity: PROCESSING.SNAPSHOT_HISTORY_CAPACITY,
    initialStdDev: 0.15,
    minStdDev: 0.03,
};

// ============================================
// Impact Lookup
// ============================================

export interface ImpactLookup {
    base_impact: number;
    label: string;
    resolution: ImpactResolution;
}

// ============================================
// Priors
// ============================================

export interface TeamStrength {
    /** Elo-like rating */
    rating: number;

    /** Win rate over the last ten games, 0-1 (default 0.5) */
    recent_form?: number;

    /** 0-1, where 1 is an unchanged roster (default 1) */
    roster_stability?: number;
}

// ============================================
// Engine Lifecycle
// ============================================

/**
 * uninitialized: no prior set and nothing processed
 * primed: a prior is set, no game data yet
 * live: at least one state or event processed
 * terminal: game ended, further events are ignored
 */
export type EngineLifecycle = 'uninitialized' | 'primed' | 'live' | 'terminal';
