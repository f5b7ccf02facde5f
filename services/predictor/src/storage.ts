/**
 * Snapshot Storage
 * Caches the latest prediction and edge per match in Redis, keeps a capped
 * snapshot list and publishes updates for subscribers.
 */

import type { Redis } from 'ioredis';
import type { MatchPrediction } from '@winline/shared';
import { PROCESSING, REDIS_KEYS } from '@winline/shared';
import type { EdgeEvaluation } from './sessions/MatchSession';

export interface SnapshotStorage {
    save(prediction: MatchPrediction): Promise<void>;
    saveEdge(edge: EdgeEvaluation): Promise<void>;
    getLatest(matchId: string): Promise<MatchPrediction | null>;
    publish(prediction: MatchPrediction): Promise<void>;
    remove(matchId: string): Promise<void>;
    ping(): Promise<boolean>;
}

export interface StorageOptions {
    ttlSeconds: number;
    historyLength: number;
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null;
}

/** Enough of the shape to trust a cached entry written by `save` */
export function isMatchPrediction(value: unknown): value is MatchPrediction {
    return (
        isRecord(value) &&
        typeof value.match_id === 'string' &&
        typeof value.game_number === 'number' &&
        isRecord(value.snapshot) &&
        typeof value.snapshot.team1_prob === 'number' &&
        isRecord(value.series)
    );
}

function updateMessage(prediction: MatchPrediction): string {
    const { snapshot } = prediction;
    return JSON.stringify({
        type: 'prediction',
        match_id: prediction.match_id,
        timestamp: prediction.ts_calc,
        data: {
            game_number: prediction.game_number,
            game_time: snapshot.game_time,
            team1_prob: snapshot.team1_prob,
            team2_prob: snapshot.team2_prob,
            confidence: snapshot.confidence,
            series_prob: prediction.series.series_prob,
            momentum_state: prediction.momentum_state,
            trigger_event_type: snapshot.trigger_event_type,
        },
    });
}

export function createRedisSnapshotStorage(redis: Redis, options: StorageOptions): SnapshotStorage {
    return {
        async save(prediction: MatchPrediction): Promise<void> {
            const latestKey = REDIS_KEYS.latestPrediction(prediction.match_id);
            const historyKey = REDIS_KEYS.predictionHistory(prediction.match_id);

            const results = await redis
                .multi()
                .set(latestKey, JSON.stringify(prediction), 'EX', options.ttlSeconds)
                .lpush(historyKey, JSON.stringify(prediction.snapshot))
                .ltrim(historyKey, 0, options.historyLength - 1)
                .expire(historyKey, options.ttlSeconds)
                .exec();

            const failed = results?.find(([error]) => error !== null);
            if (failed?.[0]) {
                throw failed[0];
            }
        },

        async saveEdge(edge: EdgeEvaluation): Promise<void> {
            const payload = JSON.stringify(edge);
            await redis.set(REDIS_KEYS.latestEdge(edge.match_id), payload, 'EX', options.ttlSeconds);
            await redis.publish(REDIS_KEYS.edgeUpdates(edge.match_id), JSON.stringify({
                type: 'edge',
                match_id: edge.match_id,
                timestamp: new Date().toISOString(),
                data: edge,
            }));
        },

        async getLatest(matchId: string): Promise<MatchPrediction | null> {
            const data = await redis.get(REDIS_KEYS.latestPrediction(matchId));
            if (!data) {
                return null;
            }

            const parsed: unknown = JSON.parse(data);
            return isMatchPrediction(parsed) ? parsed : null;
        },

        async publish(prediction: MatchPrediction): Promise<void> {
            await redis.publish(REDIS_KEYS.predictionUpdates(prediction.match_id), updateMessage(prediction));
        },

        async remove(matchId: string): Promise<void> {
            await redis.del(
                REDIS_KEYS.latestPrediction(matchId),
                REDIS_KEYS.predictionHistory(matchId),
                REDIS_KEYS.latestEdge(matchId)
            );
        },

        async ping(): Promise<boolean> {
            return (await redis.ping()) === 'PONG';
        },
    };
}

export interface PublishedMessage {
    channel: string;
    message: string;
}

/** Process-local storage; used by tests and when Redis is disabled */
export class InMemorySnapshotStorage implements SnapshotStorage {
    readonly latest = new Map<string, MatchPrediction>();
    readonly edges = new Map<string, EdgeEvaluation>();
    readonly published: PublishedMessage[] = [];
    private readonly histories = new Map<string, MatchPrediction['snapshot'][]>();

    constructor(private readonly historyLength: number = PROCESSING.REDIS_HISTORY_LENGTH) { }

    async save(prediction: MatchPrediction): Promise<void> {
        this.latest.set(prediction.match_id, prediction);
        const history = this.histories.get(prediction.match_id) ?? [];
        history.unshift(prediction.snapshot);
        this.histories.set(prediction.match_id, history.slice(0, this.historyLength));
    }

    async saveEdge(edge: EdgeEvaluation): Promise<void> {
        this.edges.set(edge.match_id, edge);
        this.published.push({ channel: REDIS_KEYS.edgeUpdates(edge.match_id), message: JSON.stringify(edge) });
    }

    async getLatest(matchId: string): Promise<MatchPrediction | null> {
        return this.latest.get(matchId) ?? null;
    }

    async publish(prediction: MatchPrediction): Promise<void> {
        this.published.push({
            channel: REDIS_KEYS.predictionUpdates(prediction.match_id),
            message: updateMessage(prediction),
        });
    }

    async remove(matchId: string): Promise<void> {
        this.latest.delete(matchId);
        this.edges.delete(matchId);
        this.histories.delete(matchId);
    }

    async ping(): Promise<boolean> {
        return true;
    }

    /** Newest first, as the Redis list is */
    history(matchId: string): MatchPrediction['snapshot'][] {
        return this.histories.get(matchId) ?? [];
    }
}
