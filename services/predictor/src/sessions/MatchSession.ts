/**
 * Match Session
 *
 * One live match: the current game's engine, the series score and the
 * last edge evaluation. Nothing here is shared with other matches.
 */

import type {
    CreateMatchRequest,
    EdgeRequest,
    EdgeResult,
    GameEvent,
    GameState,
    GameTitle,
    LoggerLike,
    MatchPrediction,
    ProbabilitySnapshot,
    TeamSide,
} from '@winline/shared';
import { nowISO } from '@winline/shared';
import { ProbabilityEngine } from '../engine/ProbabilityEngine';
import type { SeriesContext } from '../engine/ProbabilityEngine';
import { SeriesState } from '../engine/SeriesState';
import type { ModelConfig } from '../engine/types';
import type { EdgeCalculator } from '../trading/EdgeCalculator';
import { MatchConflictError } from './errors';
import { SerialQueue } from './SerialQueue';

export interface MatchSessionDeps {
    modelConfig: ModelConfig;
    edgeCalculator: EdgeCalculator;
    logger: LoggerLike;
}

export interface EdgeEvaluation extends EdgeResult {
    match_id: string;
    team: TeamSide;
    scope: EdgeRequest['scope'];
}

function createSeries(request: CreateMatchRequest): SeriesState {
    try {
        return new SeriesState({
            format: request.format,
            team1_wins: request.team1_wins,
            team2_wins: request.team2_wins,
        });
    } catch (error) {
        throw new MatchConflictError(error instanceof Error ? error.message : String(error));
    }
}

export class MatchSession {
    readonly matchId: string;
    readonly title: GameTitle;
    readonly teamNames: Record<TeamSide, string>;
    readonly createdAt = nowISO();

    /** Every mutation of this session goes through here */
    readonly queue = new SerialQueue();

    private readonly engine: ProbabilityEngine;
    private readonly series: SeriesState;
    private readonly edgeCalculator: EdgeCalculator;
    private readonly logger: LoggerLike;
    private readonly modelVersion: string;
    private lastEdgeResult: EdgeEvaluation | null = null;

    constructor(request: CreateMatchRequest, deps: MatchSessionDeps) {
        this.matchId = request.match_id;
        this.title = request.title;
        this.teamNames = {
            1: request.team1_name ?? 'Team 1',
            2: request.team2_name ?? 'Team 2',
        };
        this.logger = deps.logger.child({ match_id: request.match_id });
        this.edgeCalculator = deps.edgeCalculator;
        this.modelVersion = deps.modelConfig.version;

        this.series = createSeries(request);

        this.engine = new ProbabilityEngine({
            title: request.title,
            config: deps.modelConfig,
            logger: this.logger,
        });
        this.engine.setSeriesContext(this.seriesContext());

        if (request.market_prior !== undefined) {
            this.engine.setMarketPrior(request.market_prior);
        } else if (request.team1_rating !== undefined && request.team2_rating !== undefined) {
            this.engine.setTeamPrior(request.team1_rating, request.team2_rating);
        }

        const decided = this.series.winner;
        if (decided !== null) {
            this.engine.endGame(decided);
        }

        this.logger.info('Match session created', {
            title: this.title,
            format: request.format,
            score: `${request.team1_wins}-${request.team2_wins}`,
            prior: this.engine.priorProbability,
        });
    }

    get lifecycle(): ProbabilityEngine['lifecycle'] {
        return this.engine.lifecycle;
    }

    get lastEdge(): EdgeEvaluation | null {
        return this.lastEdgeResult;
    }

    prediction(): MatchPrediction {
        const snapshot = this.engine.current;
        return {
            match_id: this.matchId,
            title: this.title,
            game_number: this.series.currentGameNumber,
            ts_calc: nowISO(),
            model_version: this.modelVersion,
            snapshot,
            series: this.series.summary(snapshot.team1_prob),
            momentum_state: this.engine.momentumState,
        };
    }

    applyEvent(event: GameEvent): ProbabilitySnapshot {
        return this.engine.updateFromEvent(event);
    }

    applyState(state: GameState): ProbabilitySnapshot {
        return this.engine.calculateFromState(state);
    }

    history(limit?: number): ProbabilitySnapshot[] {
        return this.engine.getHistory(limit);
    }

    /**
     * Records the game result on the series and starts the next game with
     * the same prior. A decided series keeps its engine terminal.
     */
    endGame(winner: TeamSide): MatchPrediction {
        if (this.series.isOver) {
            throw new MatchConflictError(
                `Series ${this.matchId} already decided (${this.series.team1Wins}-${this.series.team2Wins})`
            );
        }

        this.engine.endGame(winner);
        this.series.recordGameWin(winner);
        this.lastEdgeResult = null;

        if (!this.series.isOver) {
            this.engine.setSeriesContext(this.seriesContext());
            this.engine.reset({ keepPriors: true });
        }

        this.logger.info('Game recorded', {
            winner,
            score: `${this.series.team1Wins}-${this.series.team2Wins}`,
            series_over: this.series.isOver,
        });

        return this.prediction();
    }

    private seriesContext(): SeriesContext {
        return {
            match_point_team1: this.series.isMatchPointFor(1),
            match_point_team2: this.series.isMatchPointFor(2),
        };
    }

    /** Game scope prices the current game, series scope the whole match */
    evaluateEdge(request: EdgeRequest, now?: number): EdgeEvaluation {
        const snapshot = this.engine.current;
        const team1Fair = request.scope === 'series'
            ? this.series.seriesProbability(snapshot.team1_prob)
            : snapshot.team1_prob;

        const result = this.edgeCalculator.evaluate({
            fairPrice: request.team === 1 ? team1Fair : 1 - team1Fair,
            marketPrice: request.market_price,
            confidence: snapshot.confidence,
            observedAt: request.observed_at,
            now,
            currentPosition: request.current_position,
        });

        this.lastEdgeResult = {
            ...result,
            match_id: this.matchId,
            team: request.team,
            scope: request.scope,
        };
        return this.lastEdgeResult;
    }
}
