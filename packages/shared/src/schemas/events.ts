/**
 * Request Schemas
 *
 * Zod schemas for everything that crosses the predictor's HTTP boundary.
 * Event `type`/`context` are free strings on purpose: the impact table
 * resolves unknown values to a default impact instead of rejecting them.
 */

import { z } from 'zod';
import { API } from '../constants';
import { GAME_TITLES } from '../types/events';

// ============================================
// Payload Size Limits
// ============================================

export const PAYLOAD_LIMITS = {
    /** Maximum request body size in bytes */
    MAX_BODY_BYTES: 16 * 1024,

    /** Maximum events accepted in one batch */
    MAX_BATCH_SIZE: 100,
} as const;

// ============================================
// Primitives
// ============================================

export const TeamSideSchema = z.union([z.literal(1), z.literal(2)]);

export const GameTitleSchema = z.enum(GAME_TITLES);

export const SeriesFormatSchema = z.union([z.literal(1), z.literal(3), z.literal(5)]);

const counter = z.number().int().min(0).default(0);
const buff = z.boolean().default(false);

// ============================================
// Game Event
// ============================================

export const GameEventSchema = z.object({
    event_id: z.string().min(1).max(100).optional(),
    time: z.number().finite(),
    type: z.string().min(1).max(50),
    team: TeamSideSchema,
    context: z.string().min(1).max(50).default('default'),
    victim_gold: z.number().finite().min(0).optional(),
    victim_streak: z.number().int().min(0).optional(),
    kills: z.number().int().min(0).max(10).optional(),
    deaths: z.number().int().min(0).max(10).optional(),
    contested: z.boolean().optional(),
});

export const GameEventBatchSchema = z.object({
    events: z.array(GameEventSchema).min(1).max(PAYLOAD_LIMITS.MAX_BATCH_SIZE),
});

/** A single event or a batch; both come out as a batch */
export const EventsRequestSchema = z.union([
    GameEventBatchSchema,
    GameEventSchema.transform((event) => ({ events: [event] })),
]);

// ============================================
// Game State
// ============================================

export const TeamCountersSchema = z.object({
    kills: counter,
    deaths: counter,
    gold: z.number().finite().min(0).default(0),
    towers: counter,
    dragons: counter,
    barons: counter,
    heralds: counter,
    inhibitors: counter,
    has_soul: buff,
    has_elder: buff,
    has_baron_buff: buff,
    roshans: counter,
    barracks: counter,
    has_aegis: buff,
});

export const GameStateSchema = z.object({
    title: GameTitleSchema,
    game_time: z.number().finite().min(0),
    team1: TeamCountersSchema.default({}),
    team2: TeamCountersSchema.default({}),
});

// ============================================
// Match Lifecycle
// ============================================

export const CreateMatchSchema = z.object({
    match_id: z.string().min(1).max(100),
    title: GameTitleSchema,
    format: SeriesFormatSchema.default(1),
    team1_wins: z.number().int().min(0).default(0),
    team2_wins: z.number().int().min(0).default(0),
    team1_name: z.string().max(100).optional(),
    team2_name: z.string().max(100).optional(),

    /** Elo-like ratings seed the prior... */
    team1_rating: z.number().finite().optional(),
    team2_rating: z.number().finite().optional(),

    /** ...or the pre-game market price for team 1 does */
    market_prior: z.number().gt(0).lt(1).optional(),
});

export type CreateMatchRequest = z.output<typeof CreateMatchSchema>;

export const GameEndSchema = z.object({
    winner: TeamSideSchema,
});

// ============================================
// Edge Evaluation
// ============================================

export const EdgeRequestSchema = z.object({
    /** Left unchecked here: the edge layer flags out-of-range prices itself */
    market_price: z.number(),
    team: TeamSideSchema.default(1),

    /** Whether the market settles on the current game or the whole series */
    scope: z.enum(['game', 'series']).default('game'),

    /** When the quote was observed (ISO 8601) */
    observed_at: z.string().datetime().optional(),

    /** Shares already held on this side */
    current_position: z.number().finite().min(0).default(0),
});

export type EdgeRequest = z.output<typeof EdgeRequestSchema>;

export const HistoryQuerySchema = z.object({
    limit: z.coerce.number().int().min(1).max(API.MAX_HISTORY_LIMIT).default(API.DEFAULT_HISTORY_LIMIT),
});
