/**
 * Predictor Service
 *
 * Live win probabilities for LoL and Dota 2 matches.
 *
 * Features:
 * - Impact-table event engine with momentum and series composition
 * - Edge detection and fractional Kelly sizing against market quotes
 * - Latest prediction cached in Redis, updates over Pub/Sub
 * - Health checks (/healthz, /readyz) and Prometheus metrics
 * - Graceful shutdown
 */

import { serve } from '@hono/node-server';
import Redis from 'ioredis';
import { createLogger, createProductionMetrics, sleep } from '@winline/shared';
import { createApp } from './app';
import { buildModelConfig, buildTradingConfig, config } from './config';
import { MatchRegistry } from './sessions/MatchRegistry';
import type { SnapshotStorage } from './storage';
import { InMemorySnapshotStorage, createRedisSnapshotStorage } from './storage';
import { EdgeCalculator } from './trading/EdgeCalculator';

const logger = createLogger('predictor', config.logLevel);
const metrics = createProductionMetrics('predictor');
const SERVICE_VERSION = '2.0.0';

// Shutdown state
let isShuttingDown = false;

async function main() {
    const modelConfig = buildModelConfig();
    const tradingConfig = buildTradingConfig();

    logger.info('Starting Predictor Service', {
        version: SERVICE_VERSION,
        model_version: modelConfig.version,
        port: config.port,
    });

    let redis: Redis | null = null;
    let storage: SnapshotStorage;

    if (config.redis.enabled) {
        const client = new Redis(config.redis.url, {
            lazyConnect: true,
        });

        client.on('error', (err) => {
            logger.error('Redis connection error', { error: String(err) });
        });

        await client.connect();
        logger.info('Connected to Redis');

        redis = client;
        storage = createRedisSnapshotStorage(client, config.cache);
    } else {
        logger.warn('Redis disabled, predictions are kept in memory only');
        storage = new InMemorySnapshotStorage(config.cache.historyLength);
    }

    const registry = new MatchRegistry({
        modelConfig,
        edgeCalculator: new EdgeCalculator(tradingConfig, { logger: logger.child({ component: 'edge' }) }),
        logger,
    });

    const app = createApp({
        registry,
        storage,
        metrics,
        logger,
        version: SERVICE_VERSION,
        modelVersion: modelConfig.version,
        isShuttingDown: () => isShuttingDown,
    });

    // =====================================
    // Start Server
    // =====================================

    const server = serve({
        fetch: app.fetch,
        port: config.port,
        hostname: config.host,
    });

    logger.info(`Predictor Service listening on ${config.host}:${config.port}`, {
        model_version: modelConfig.version,
        endpoints: ['/matches', '/matches/:id/events', '/matches/:id/edge', '/health', '/healthz', '/readyz', '/metrics'],
    });

    // =====================================
    // Graceful Shutdown
    // =====================================

    const shutdown = async (signal: string) => {
        if (isShuttingDown) return;
        isShuttingDown = true;

        logger.info('Graceful shutdown started', { signal, active_matches: registry.size });

        await new Promise<void>((resolve, reject) => {
            server.close((err) => (err ? reject(err) : resolve()));
        });
        await Promise.all(registry.ids().map((id) => registry.remove(id)));
        await sleep(config.shutdownGraceMs);
        if (redis) {
            await redis.quit();
        }

        logger.info('Shutdown complete');
        process.exit(0);
    };

    const onSignal = (signal: string) => {
        shutdown(signal).catch((error) => {
            logger.error('Shutdown failed', { error: String(error) });
            process.exit(1);
        });
    };

    process.on('SIGTERM', () => onSignal('SIGTERM'));
    process.on('SIGINT', () => onSignal('SIGINT'));
}

main().catch((error) => {
    logger.error('Failed to start service', { error: String(error) });
    process.exit(1);
});
