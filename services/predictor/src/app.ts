/**
 * Predictor HTTP API
 *
 * Built as a factory so the service entry point and the tests share one
 * route table. Every mutation of a match runs through its session queue.
 */

import { Hono } from 'hono';
import type { Context, ValidationTargets } from 'hono';
import { bodyLimit } from 'hono/body-limit';
import { cors } from 'hono/cors';
import { HTTPException } from 'hono/http-exception';
import { zValidator } from '@hono/zod-validator';
import type { ZodSchema } from 'zod';
import type {
    ApiErrorCode,
    ApiFailure,
    ApiSuccess,
    HistoryPayload,
    LoggerLike,
    MatchPrediction,
    ProductionMetrics,
} from '@winline/shared';
import {
    CreateMatchSchema,
    EdgeRequestSchema,
    EventsRequestSchema,
    GameEndSchema,
    GameStateSchema,
    HistoryQuerySchema,
    PAYLOAD_LIMITS,
    createHealthChecks,
    nowISO,
} from '@winline/shared';
import { MatchConflictError, MatchNotFoundError } from './sessions/errors';
import type { MatchRegistry } from './sessions/MatchRegistry';
import type { SnapshotStorage } from './storage';

export interface AppDeps {
    registry: MatchRegistry;
    storage: SnapshotStorage;
    metrics: ProductionMetrics;
    logger: LoggerLike;
    version: string;
    modelVersion: string;
    isShuttingDown?: () => boolean;
}

function ok<T>(data: T): ApiSuccess<T> {
    return { success: true, data, meta: { timestamp: nowISO() } };
}

function failure(code: ApiErrorCode, message: string, details?: Record<string, unknown>): ApiFailure {
    return { success: false, error: { code, message, details } };
}

function validate<Target extends keyof ValidationTargets, T extends ZodSchema>(target: Target, schema: T) {
    return zValidator(target, schema, (result, c) => {
        if (!result.success) {
            const issues = result.error.issues.map((issue) => ({
                path: issue.path.join('.'),
                message: issue.message,
            }));
            return c.json(failure('VALIDATION_ERROR', `Invalid ${target}`, { issues }), 400);
        }
    });
}

/** First path segment keeps the label set small */
function pathLabel(c: Context): string {
    return c.req.path.split('/').slice(0, 2).join('/') || '/';
}

export function createApp(deps: AppDeps) {
    const { registry, storage, metrics, logger } = deps;
    const isShuttingDown = deps.isShuttingDown ?? (() => false);

    const health = createHealthChecks(deps.version, [
        { name: 'storage', check: () => storage.ping() },
    ]);

    /** Storage is a cache: a failed write is counted and logged, the update stands */
    async function persist(prediction: MatchPrediction): Promise<void> {
        const start = performance.now();
        try {
            await Promise.all([storage.save(prediction), storage.publish(prediction)]);
        } catch (error) {
            metrics.errors.inc({ type: 'storage' });
            logger.error('Failed to persist prediction', {
                match_id: prediction.match_id,
                error: String(error),
            });
        }
        metrics.recordStage('publish', performance.now() - start);
    }

    const app = new Hono();
    app.use('*', cors());

    app.use('*', async (c, next) => {
        if (isShuttingDown()) {
            return c.json(failure('SHUTTING_DOWN', 'Service is shutting down'), 503);
        }

        const start = performance.now();
        await next();
        const latency = performance.now() - start;

        const path = pathLabel(c);
        metrics.requests.inc({ method: c.req.method, path, status: String(c.res.status) });
        metrics.requestLatency.observe(latency, { method: c.req.method, path });
    });

    app.use('/matches/*', bodyLimit({
        maxSize: PAYLOAD_LIMITS.MAX_BODY_BYTES,
        onError: (c) => c.json(failure('VALIDATION_ERROR', 'Request body too large'), 413),
    }));

    app.onError((error, c) => {
        metrics.errors.inc({ type: error.name });

        if (error instanceof MatchNotFoundError) {
            return c.json(failure('NOT_FOUND', error.message), 404);
        }
        if (error instanceof MatchConflictError) {
            return c.json(failure('CONFLICT', error.message), 409);
        }
        if (error instanceof HTTPException && error.status === 400) {
            return c.json(failure('VALIDATION_ERROR', error.message), 400);
        }
        if (error instanceof HTTPException) {
            return error.getResponse();
        }

        logger.error('Request failed', { path: c.req.path, error: String(error) });
        return c.json(failure('INTERNAL_ERROR', 'Internal server error'), 500);
    });

    // =====================================
    // Health & Metrics
    // =====================================

    app.get('/healthz', async (c) => {
        const result = await health.healthz();
        return c.json(result.body, result.status);
    });

    app.get('/readyz', async (c) => {
        const result = await health.readyz();
        return c.json(result.body, result.status);
    });

    app.get('/health', async (c) => {
        const result = await health.health();
        return c.json({
            ...result.body,
            model_version: deps.modelVersion,
            active_matches: registry.size,
        }, result.status);
    });

    app.get('/metrics', (c) => {
        c.header('Content-Type', 'text/plain; version=0.0.4');
        return c.text(metrics.registry.render());
    });

    // =====================================
    // Match Lifecycle
    // =====================================

    app.post('/matches', validate('json', CreateMatchSchema), async (c) => {
        const request = c.req.valid('json');
        const session = registry.create(request);
        metrics.activeMatches.set(registry.size);

        const prediction = await registry.run(session.matchId, async (s) => {
            const current = s.prediction();
            await persist(current);
            return current;
        });
        return c.json(ok(prediction), 201);
    });

    app.get('/matches', (c) => {
        const matches = registry.ids().map((id) => {
            const session = registry.get(id);
            return {
                match_id: id,
                title: session.title,
                lifecycle: session.lifecycle,
                created_at: session.createdAt,
            };
        });
        return c.json(ok(matches));
    });

    app.get('/matches/:id', async (c) => {
        const matchId = c.req.param('id');
        const session = registry.find(matchId);
        if (session) {
            return c.json(ok(session.prediction()));
        }

        const cached = await storage.getLatest(matchId);
        if (!cached) {
            throw new MatchNotFoundError(matchId);
        }
        return c.json(ok(cached));
    });

    app.delete('/matches/:id', async (c) => {
        const matchId = c.req.param('id');
        if (!(await registry.remove(matchId))) {
            throw new MatchNotFoundError(matchId);
        }
        await storage.remove(matchId);
        metrics.activeMatches.set(registry.size);
        return c.json(ok({ match_id: matchId, removed: true }));
    });

    // =====================================
    // Updates
    // =====================================

    app.post('/matches/:id/events', validate('json', EventsRequestSchema), async (c) => {
        const matchId = c.req.param('id');
        const { events } = c.req.valid('json');

        const result = await registry.run(matchId, async (session) => {
            const stopTimer = metrics.predictorLatency.startTimer({ path: 'event' });
            const snapshots = events.map((event) => session.applyEvent(event));
            metrics.recordStage('update', stopTimer());
            for (const [i, snapshot] of snapshots.entries()) {
                const type = events[i]?.type ?? 'unknown';
                metrics.eventsProcessed.inc({ title: session.title, type });
                if (snapshot.impact_resolution && snapshot.impact_resolution !== 'exact') {
                    metrics.eventAnomalies.inc({ resolution: snapshot.impact_resolution });
                }
            }

            const prediction = session.prediction();
            await persist(prediction);
            return { prediction, applied: snapshots.length };
        });

        logger.debug('Events applied', {
            match_id: matchId,
            applied: result.applied,
            team1_prob: result.prediction.snapshot.team1_prob,
        });
        return c.json(ok({ ...result.prediction, applied: result.applied }));
    });

    app.post('/matches/:id/state', validate('json', GameStateSchema), async (c) => {
        const matchId = c.req.param('id');
        const state = c.req.valid('json');

        const prediction = await registry.run(matchId, async (session) => {
            const stopTimer = metrics.predictorLatency.startTimer({ path: 'state' });
            session.applyState(state);
            stopTimer();

            const current = session.prediction();
            await persist(current);
            return current;
        });
        return c.json(ok(prediction));
    });

    app.post('/matches/:id/games/end', validate('json', GameEndSchema), async (c) => {
        const matchId = c.req.param('id');
        const { winner } = c.req.valid('json');

        const prediction = await registry.run(matchId, async (session) => {
            const start = performance.now();
            const next = session.endGame(winner);
            metrics.recordStage('series', performance.now() - start);
            await persist(next);
            return next;
        });
        return c.json(ok(prediction));
    });

    // =====================================
    // Edge
    // =====================================

    app.post('/matches/:id/edge', validate('json', EdgeRequestSchema), async (c) => {
        const matchId = c.req.param('id');
        const request = c.req.valid('json');

        const edge = await registry.run(matchId, async (session) => {
            const result = session.evaluateEdge(request);
            metrics.edgeSignals.inc({ action: result.action });
            try {
                await storage.saveEdge(result);
            } catch (error) {
                metrics.errors.inc({ type: 'storage' });
                logger.error('Failed to persist edge', { match_id: matchId, error: String(error) });
            }
            return result;
        });
        return c.json(ok(edge));
    });

    // =====================================
    // History
    // =====================================

    app.get('/matches/:id/history', validate('query', HistoryQuerySchema), (c) => {
        const matchId = c.req.param('id');
        const { limit } = c.req.valid('query');
        const session = registry.get(matchId);

        const snapshots = session.history(limit);
        const payload: HistoryPayload = {
            match_id: matchId,
            game_number: session.prediction().game_number,
            count: snapshots.length,
            snapshots,
        };
        return c.json(ok(payload));
    });

    return app;
}
