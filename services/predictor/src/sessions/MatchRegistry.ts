import type { CreateMatchRequest, LoggerLike } from '@winline/shared';
import type { ModelConfig } from '../engine/types';
import type { EdgeCalculator } from '../trading/EdgeCalculator';
import { MatchConflictError, MatchNotFoundError } from './errors';
import { MatchSession } from './MatchSession';

export interface MatchRegistryDeps {
    modelConfig: ModelConfig;
    edgeCalculator: EdgeCalculator;
    logger: LoggerLike;
}

/**
 * Live sessions by match id. Work for one match is serialized through that
 * session's queue; different matches never wait on each other.
 */
export class MatchRegistry {
    private readonly sessions = new Map<string, MatchSession>();

    constructor(private readonly deps: MatchRegistryDeps) { }

    get size(): number {
        return this.sessions.size;
    }

    ids(): string[] {
        return [...this.sessions.keys()];
    }

    create(request: CreateMatchRequest): MatchSession {
        if (this.sessions.has(request.match_id)) {
            throw new MatchConflictError(`Match ${request.match_id} already exists`);
        }
        const session = new MatchSession(request, this.deps);
        this.sessions.set(request.match_id, session);
        return session;
    }

    find(matchId: string): MatchSession | undefined {
        return this.sessions.get(matchId);
    }

    get(matchId: string): MatchSession {
        const session = this.sessions.get(matchId);
        if (!session) {
            throw new MatchNotFoundError(matchId);
        }
        return session;
    }

    /** Runs `task` after everything already queued for this match */
    async run<T>(matchId: string, task: (session: MatchSession) => T | Promise<T>): Promise<T> {
        const session = this.get(matchId);
        return session.queue.run(() => task(session));
    }

    async remove(matchId: string): Promise<boolean> {
        const session = this.sessions.get(matchId);
        if (!session) return false;

        this.sessions.delete(matchId);
        await session.queue.idle();
        this.deps.logger.info('Match session removed', { match_id: matchId });
        return true;
    }
}
