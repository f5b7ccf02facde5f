/**
 * Predictor Service Configuration
 */

import { isLogLevel } from '@winline/shared';
import type { ModelConfig } from './engine/types';
import type { TradingConfig } from './trading/types';

const envLogLevel = process.env.LOG_LEVEL;

export const config = {
    // Server
    port: parseInt(process.env.PORT ?? '8083', 10),
    host: process.env.HOST ?? '0.0.0.0',

    // Redis
    redis: {
        enabled: process.env.REDIS_ENABLED !== 'false',
        url: process.env.REDIS_URL ?? 'redis://localhost:6379',
    },

    // Model
    model: {
        version: process.env.MODEL_VERSION ?? 'v2.0.0-impact',
        momentumDecayMinutes: parseFloat(process.env.MOMENTUM_DECAY_MINUTES ?? '3'),
        momentumCapacity: parseInt(process.env.MOMENTUM_CAPACITY ?? '256', 10),
        historyCapacity: parseInt(process.env.SNAPSHOT_HISTORY_CAPACITY ?? '2000', 10),
        initialStdDev: parseFloat(process.env.INITIAL_STD_DEV ?? '0.15'),
        minStdDev: parseFloat(process.env.MIN_STD_DEV ?? '0.03'),
    },

    // Trading
    trading: {
        bankroll: parseFloat(process.env.BANKROLL ?? '1000'),
        kellyMultiplier: parseFloat(process.env.KELLY_FRACTION ?? '0.25'),
        maxStakePercent: parseFloat(process.env.MAX_STAKE_PERCENT ?? '0.05'),
        maxTradeDollars: parseFloat(process.env.MAX_TRADE_DOLLARS ?? '50'),
        minTradeSize: parseFloat(process.env.MIN_TRADE_SIZE ?? '5'),
        maxPosition: parseFloat(process.env.MAX_POSITION ?? '100'),
        minEdge: parseFloat(process.env.MIN_EDGE ?? '0.015'),
        slippageBuffer: parseFloat(process.env.SLIPPAGE_BUFFER ?? '0.005'),
        maxPriceAgeMs: parseInt(process.env.MAX_PRICE_AGE_MS ?? '10000', 10),
    },

    // Cache
    cache: {
        ttlSeconds: parseInt(process.env.CACHE_TTL ?? '3600', 10),
        historyLength: parseInt(process.env.REDIS_HISTORY_LENGTH ?? '500', 10),
    },

    // Shutdown
    shutdownGraceMs: parseInt(process.env.SHUTDOWN_GRACE_MS ?? '1000', 10),

    // Logging
    logLevel: isLogLevel(envLogLevel) ? envLogLevel : 'info',
} as const;

function assertFinite(section: string, values: Readonly<Record<string, unknown>>): void {
    for (const [key, value] of Object.entries(values)) {
        if (typeof value === 'number' && !Number.isFinite(value)) {
            throw new Error(`Invalid ${section} setting ${key}: ${String(value)}`);
        }
    }
}

export function buildModelConfig(source: typeof config.model = config.model): ModelConfig {
    assertFinite('model', source);
    if (source.momentumDecayMinutes <= 0) {
        throw new Error(`MOMENTUM_DECAY_MINUTES must be positive, got ${source.momentumDecayMinutes}`);
    }
    if (source.minStdDev <= 0 || source.minStdDev > source.initialStdDev) {
        throw new Error(`MIN_STD_DEV must lie in (0, INITIAL_STD_DEV], got ${source.minStdDev}`);
    }
    return { ...source };
}

export function buildTradingConfig(source: typeof config.trading = config.trading): TradingConfig {
    assertFinite('trading', source);
    if (source.bankroll < 0) {
        throw new Error(`BANKROLL must not be negative, got ${source.bankroll}`);
    }
    if (source.kellyMultiplier <= 0 || source.kellyMultiplier > 1) {
        throw new Error(`KELLY_FRACTION must lie in (0, 1], got ${source.kellyMultiplier}`);
    }
    return { ...source };
}
