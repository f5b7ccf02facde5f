/**
 * Shared Constants
 */

// ============================================
// Redis Keys
// ============================================

export const REDIS_KEYS = {
    // Latest prediction: prediction:{match_id}
    latestPrediction: (matchId: string) => `prediction:${matchId}`,

    // Capped snapshot history: prediction:history:{match_id}
    predictionHistory: (matchId: string) => `prediction:history:${matchId}`,

    // Latest edge evaluation: edge:{match_id}
    latestEdge: (matchId: string) => `edge:${matchId}`,

    // Pub/Sub channels
    predictionUpdates: (matchId: string) => `updates:prediction:${matchId}`,
    edgeUpdates: (matchId: string) => `updates:edge:${matchId}`,
} as const;

// ============================================
// Map Constants
// ============================================

export const LOL = {
    TOWERS_PER_SIDE: 11,
    DRAGONS_FOR_SOUL: 4,
} as const;

export const DOTA2 = {
    TOWERS_PER_SIDE: 11,
    BARRACKS_PER_SIDE: 6,
} as const;

// ============================================
// Event Processing
// ============================================

export const PROCESSING = {
    // Snapshots kept per game (oldest evicted first)
    SNAPSHOT_HISTORY_CAPACITY: 2000,

    // Snapshots kept in Redis per match
    REDIS_HISTORY_LENGTH: 500,

    // Momentum window hard cap (entries)
    MOMENTUM_WINDOW_CAPACITY: 256,
} as const;

// ============================================
// API
// ============================================

export const API = {
    DEFAULT_HISTORY_LIMIT: 50,
    MAX_HISTORY_LIMIT: 500,
} as const;
