/**
 * Probability Engine
 *
 * Live P(team 1 wins the current game) for one game of one match.
 *
 * Two update paths:
 * - calculateFromState(): full recompute from a GameState snapshot in
 *   log-odds space (prior + gold + kills + towers + objectives + momentum).
 *   Pure for an unchanged state.
 * - updateFromEvent(): incremental shift by the event's impact, damped as
 *   the probability moves towards either extreme.
 *
 * Single writer: callers serialize access per match (see SerialQueue).
 */

import type {
    GameEvent,
    GameState,
    GameTitle,
    ImpactResolution,
    LoggerLike,
    MomentumState,
    ProbabilityComponents,
    ProbabilitySnapshot,
    SeriesSummary,
    TeamCounters,
    TeamSide,
} from '@winline/shared';
import {
    DOTA2,
    LOL,
    PROBABILITY_BOUNDS,
    RingBuffer,
    clamp,
    clampProbability,
    cloneGameState,
    createGameState,
    eloToProbability,
    isOpenUnitInterval,
    logOddsToProbability,
    otherSide,
    probabilityToLogOdds,
    teamCounters,
} from '@winline/shared';
import { contextMultiplier } from './ContextMultiplier';
import { ImpactTable } from './ImpactTable';
import { MomentumTracker } from './MomentumTracker';
import { strengthPrior } from './TeamStrength';
import { gamePhase, timeMultiplier } from './TimeCurve';
import type { EngineLifecycle, ModelConfig, TeamStrength } from './types';
import { DEFAULT_MODEL_CONFIG } from './types';

// ============================================
// State model coefficients (log-odds)
// ============================================

interface StateModel {
    goldMax: number;
    goldScale: number;
    kill: number;
    tower: number;
    objectives(team1: TeamCounters, team2: TeamCounters): number;
}

function towersPerSide(title: GameTitle): number {
    return title === 'lol' ? LOL.TOWERS_PER_SIDE : DOTA2.TOWERS_PER_SIDE;
}

function buffDiff(a: boolean, b: boolean): number {
    return (a ? 1 : 0) - (b ? 1 : 0);
}

const STATE_MODELS: Record<GameTitle, StateModel> = {
    lol: {
        goldMax: 2.0,
        goldScale: 8000,
        kill: 0.025,
        tower: 0.065,
        objectives: (t1, t2) =>
            (t1.dragons - t2.dragons) * 0.055 +
            buffDiff(t1.has_soul, t2.has_soul) * 0.35 +
            buffDiff(t1.has_elder, t2.has_elder) * 0.5 +
            buffDiff(t1.has_baron_buff, t2.has_baron_buff) * 0.18 +
            (t1.barons - t2.barons) * 0.08 +
            (t1.inhibitors - t2.inhibitors) * 0.22 +
            (t1.heralds - t2.heralds) * 0.04,
    },
    dota2: {
        goldMax: 1.6,
        goldScale: 12000,
        kill: 0.018,
        tower: 0.055,
        objectives: (t1, t2) =>
            (t1.barracks - t2.barracks) * 0.2 +
            buffDiff(t1.barracks >= DOTA2.BARRACKS_PER_SIDE, t2.barracks >= DOTA2.BARRACKS_PER_SIDE) * 0.55 +
            (t1.roshans - t2.roshans) * 0.1 +
            buffDiff(t1.has_aegis, t2.has_aegis) * 0.12,
    },
};

const Z_90 = 1.645;
const EVENT_STD_DECAY = 0.98;
const SHUTDOWN_MIN_STREAK = 3;
const SHUTDOWN_PER_STREAK = 0.003;
const SHUTDOWN_MAX_STREAK = 7;
const FIGHT_MOMENTUM_WEIGHT = 1.5;
const MATCH_POINT_STD_SCALE = 1.2;

/** Non-finite state fields contribute nothing */
function finiteOrZero(value: number): number {
    return Number.isFinite(value) ? value : 0;
}

// ============================================
// State folding
// ============================================

/** Folds one event into cumulative counters; unknown types leave the state untouched */
export function applyEventToState(state: GameState, event: GameEvent): void {
    const own = teamCounters(state, event.team);
    const enemy = teamCounters(state, otherSide(event.team));

    switch (event.type) {
        case 'kill':
            own.kills++;
            enemy.deaths++;
            break;
        case 'tower':
            own.towers = Math.min(own.towers + 1, towersPerSide(state.title));
            break;
        case 'dragon':
            if (event.context === 'elder') {
                own.has_elder = true;
                enemy.has_elder = false;
            } else {
                own.dragons++;
                if (event.context === 'soul' || own.dragons >= LOL.DRAGONS_FOR_SOUL) {
                    own.has_soul = true;
                }
            }
            break;
        case 'baron':
            own.barons++;
            own.has_baron_buff = true;
            enemy.has_baron_buff = false;
            break;
        case 'herald':
            own.heralds++;
            break;
        case 'inhibitor':
            own.inhibitors++;
            break;
        case 'roshan':
            own.roshans++;
            own.has_aegis = true;
            enemy.has_aegis = false;
            break;
        case 'barracks':
            own.barracks = event.context === 'mega'
                ? DOTA2.BARRACKS_PER_SIDE
                : Math.min(own.barracks + 1, DOTA2.BARRACKS_PER_SIDE);
            break;
        case 'teamfight': {
            const kills = event.kills ?? 0;
            const deaths = event.deaths ?? 0;
            own.kills += kills;
            own.deaths += deaths;
            enemy.kills += deaths;
            enemy.deaths += kills;
            break;
        }
        default:
            break;
    }
}

// ============================================
// Engine
// ============================================

export interface ProbabilityEngineOptions {
    title: GameTitle;
    config?: ModelConfig;
    logger?: LoggerLike;
    impactTable?: ImpactTable;
}

export type SeriesContext = Pick<SeriesSummary, 'match_point_team1' | 'match_point_team2'>;

export interface ResetOptions {
    /** Keep the configured prior for the next game (default true) */
    keepPriors?: boolean;
}

export class ProbabilityEngine {
    readonly title: GameTitle;
    readonly config: ModelConfig;

    private readonly table: ImpactTable;
    private readonly momentum: MomentumTracker;
    private readonly history: RingBuffer<ProbabilitySnapshot>;
    private readonly logger?: LoggerLike;

    private state: GameState;
    private prior = 0.5;
    private hasPrior = false;
    private hasData = false;
    private ended = false;
    private winnerSide: TeamSide | null = null;

    private probability = 0.5;
    private confidence = 0.5;
    private stdDev: number;
    private stdScale = 1;
    private eventsProcessed = 0;
    private components: ProbabilityComponents = { gold: 0, kills: 0, towers: 0, objectives: 0, momentum: 0 };
    private latest: ProbabilitySnapshot;

    constructor(options: ProbabilityEngineOptions) {
        this.title = options.title;
        this.config = options.config ?? DEFAULT_MODEL_CONFIG;
        this.logger = options.logger;
        this.table = options.impactTable ?? new ImpactTable(this.title, { logger: options.logger });
        this.momentum = new MomentumTracker({
            decay: this.config.momentumDecayMinutes,
            capacity: this.config.momentumCapacity,
        });
        this.history = new RingBuffer(this.config.historyCapacity);
        this.state = createGameState(this.title);
        this.stdDev = this.config.initialStdDev;
        this.latest = this.buildSnapshot('prior');
    }

    // ------------------------------------------
    // Accessors
    // ------------------------------------------

    get lifecycle(): EngineLifecycle {
        if (this.ended) return 'terminal';
        if (this.hasData) return 'live';
        if (this.hasPrior) return 'primed';
        return 'uninitialized';
    }

    get current(): ProbabilitySnapshot {
        return this.latest;
    }

    get priorProbability(): number {
        return this.prior;
    }

    get winner(): TeamSide | null {
        return this.winnerSide;
    }

    get momentumState(): MomentumState {
        return this.momentum.state();
    }

    get momentumTracker(): MomentumTracker {
        return this.momentum;
    }

    get gameState(): GameState {
        return cloneGameState(this.state);
    }

    /** Most recent `limit` snapshots of the current game, oldest first */
    getHistory(limit?: number): ProbabilitySnapshot[] {
        const all = this.history.toArray();
        return limit === undefined ? all : all.slice(Math.max(0, all.length - limit));
    }

    /** Starting uncertainty for a game, wider when either side is on match point */
    private get baseStdDev(): number {
        return this.config.initialStdDev * this.stdScale;
    }

    // ------------------------------------------
    // Series context
    // ------------------------------------------

    /**
     * A side facing elimination makes the game less predictable. Takes effect
     * at once before the game starts, otherwise from the next reset.
     */
    setSeriesContext(context: SeriesContext): void {
        this.stdScale = context.match_point_team1 || context.match_point_team2 ? MATCH_POINT_STD_SCALE : 1;

        if (!this.hasData && !this.ended) {
            this.stdDev = this.baseStdDev;
            this.latest = this.buildSnapshot(this.latest.source);
        }
        this.logger?.debug('Series context set', { ...context, std_scale: this.stdScale });
    }

    // ------------------------------------------
    // Priors
    // ------------------------------------------

    setTeamPrior(team1Rating: number, team2Rating: number): ProbabilitySnapshot {
        return this.applyPrior(eloToProbability(team1Rating - team2Rating), 'elo');
    }

    setStrengthPrior(team1: TeamStrength, team2: TeamStrength): ProbabilitySnapshot {
        return this.applyPrior(strengthPrior(team1, team2), 'strength');
    }

    /** Pre-game market price for team 1 */
    setMarketPrior(price: number): ProbabilitySnapshot {
        if (!isOpenUnitInterval(price)) {
            throw new Error(`Market prior must lie in (0, 1), got ${price}`);
        }
        return this.applyPrior(price, 'market');
    }

    private applyPrior(p: number, kind: string): ProbabilitySnapshot {
        this.prior = clamp(
            Number.isFinite(p) ? p : 0.5,
            PROBABILITY_BOUNDS.MIN_LOG_ODDS_INPUT,
            PROBABILITY_BOUNDS.MAX_LOG_ODDS_INPUT
        );
        this.hasPrior = true;

        // Once the game is running the prior only feeds later recomputes
        if (this.hasData || this.ended) {
            this.logger?.info('Prior updated mid-game', { kind, prior: this.prior });
            return this.latest;
        }

        this.probability = clampProbability(this.prior);
        this.logger?.debug('Prior set', { kind, prior: this.prior });
        return this.record(this.buildSnapshot('prior'));
    }

    // ------------------------------------------
    // Full recompute
    // ------------------------------------------

    calculateFromState(input: GameState): ProbabilitySnapshot {
        if (this.ended) {
            this.logger?.warn('State update after game end ignored', { game_time: input.game_time });
            return this.latest;
        }
        if (input.title !== this.title) {
            this.logger?.warn('State title does not match engine', { engine: this.title, state: input.title });
        }

        this.state = cloneGameState(input);
        this.state.title = this.title;
        this.state.game_time = Number.isFinite(input.game_time) ? Math.max(0, input.game_time) : 0;
        this.hasData = true;

        const t = this.state.game_time;
        this.momentum.advance(t);

        const model = STATE_MODELS[this.title];
        const timeMult = timeMultiplier(this.title, t);
        const { team1, team2 } = this.state;

        const gold = finiteOrZero(model.goldMax * Math.tanh((team1.gold - team2.gold) / model.goldScale));
        const kills = finiteOrZero((team1.kills - team2.kills) * model.kill * timeMult);
        const towers = finiteOrZero((team1.towers - team2.towers) * model.tower * timeMult);
        const objectives = finiteOrZero(model.objectives(team1, team2) * timeMult);
        const momentum = this.momentum.adjustment();

        const logOdds = probabilityToLogOdds(this.prior) + gold + kills + towers + objectives + momentum;
        this.probability = clampProbability(logOddsToProbability(logOdds));
        this.components = { gold, kills, towers, objectives, momentum };

        const signal = Math.abs(gold) + Math.abs(kills) + Math.abs(towers) + Math.abs(objectives);
        const timeConf = Math.min(0.5 + t * 0.012, 0.85);
        const leadConf = Math.min(0.5 + signal * 0.8, 0.9);
        const eventConf = Math.min(0.5 + this.eventsProcessed * 0.01, 0.85);
        this.confidence = (timeConf + leadConf + eventConf) / 3;

        const target = Math.max(
            this.config.minStdDev,
            this.baseStdDev - Math.min(t * 0.003, 0.08) - Math.min(this.eventsProcessed * 0.002, 0.04)
        );
        this.stdDev = Math.min(this.stdDev, target);

        return this.record(this.buildSnapshot('state'));
    }

    // ------------------------------------------
    // Incremental update
    // ------------------------------------------

    updateFromEvent(event: GameEvent): ProbabilitySnapshot {
        if (this.ended) {
            this.logger?.warn('Event after game end ignored', { type: event.type, team: event.team });
            return this.latest;
        }

        const requested = Number.isFinite(event.time) ? event.time : this.state.game_time;
        if (requested < this.state.game_time) {
            this.logger?.debug('Out-of-order event clamped to game clock', {
                event_time: event.time,
                game_time: this.state.game_time,
            });
        }
        const t = Math.max(0, requested, this.state.game_time);

        const own = teamCounters(this.state, event.team);
        const enemy = teamCounters(this.state, otherSide(event.team));
        const ownGoldDiff = own.gold - enemy.gold;
        const ownTowersRemaining = towersPerSide(this.title) - enemy.towers;

        // Signed from the acting team's view: a lost fight comes out negative
        let base: number;
        let resolution: ImpactResolution;
        if (event.type === 'teamfight' && (event.kills !== undefined || event.deaths !== undefined)) {
            base = this.table.fightImpact(event.kills ?? 0, event.deaths ?? 0);
            resolution = 'exact';
        } else {
            const lookup = this.table.lookup(event.type, event.context);
            base = lookup.base_impact;
            resolution = lookup.resolution;
        }

        const timeMult = timeMultiplier(this.title, t);
        const ctx = contextMultiplier({
            title: this.title,
            event_type: event.type,
            context: event.context,
            game_time: t,
            team_gold_diff: ownGoldDiff,
            victim_gold: event.victim_gold,
            enemy_structures_down: this.title === 'lol' ? own.inhibitors : own.barracks,
            own_towers_remaining: ownTowersRemaining,
            dragons: own.dragons,
            contested: event.contested,
        });

        const streak = event.victim_streak ?? 0;
        const shutdown = event.type === 'kill' && streak >= SHUTDOWN_MIN_STREAK
            ? SHUTDOWN_PER_STREAK * Math.min(streak, SHUTDOWN_MAX_STREAK)
            : 0;

        const magnitude = base * timeMult * ctx.multiplier + shutdown;
        const impact = magnitude === 0 ? 0 : event.team === 1 ? magnitude : -magnitude;

        const extremity = this.probability - 0.5;
        const scale = Math.max(0.4, 1 - 2 * extremity * extremity);
        this.probability = clampProbability(this.probability + impact * scale);

        if (impact !== 0) {
            const weight = event.type === 'teamfight' ? FIGHT_MOMENTUM_WEIGHT : 1;
            this.momentum.addEvent(t, impact > 0 ? 1 : 2, Math.abs(impact) * weight);
        } else {
            this.momentum.advance(t);
        }

        let eventConf = 0.7;
        if (ownGoldDiff !== 0) eventConf += 0.05;
        if (t > 10) eventConf += 0.05;
        if ((event.victim_gold ?? 0) > 0) eventConf += 0.05;
        if (ownTowersRemaining < towersPerSide(this.title)) eventConf += 0.03;
        this.confidence = 0.7 * this.confidence + 0.3 * Math.min(eventConf, 0.95);
        this.stdDev = Math.max(this.config.minStdDev, this.stdDev * EVENT_STD_DECAY);

        applyEventToState(this.state, event);
        this.state.game_time = t;
        this.eventsProcessed++;
        this.hasData = true;
        this.components = { ...this.components, momentum: this.momentum.adjustment() };

        this.logger?.debug('Event applied', {
            type: event.type,
            context: event.context,
            team: event.team,
            game_time: t,
            impact,
            factors: ctx.factors,
            team1_prob: this.probability,
        });

        return this.record(this.buildSnapshot('event', {
            impact,
            trigger_event_type: event.type,
            impact_resolution: resolution,
        }));
    }

    // ------------------------------------------
    // Lifecycle
    // ------------------------------------------

    endGame(winner: TeamSide): void {
        if (this.ended) {
            this.logger?.warn('Game already ended', { winner: this.winnerSide, requested: winner });
            return;
        }
        this.ended = true;
        this.winnerSide = winner;
        this.logger?.info('Game ended', {
            winner,
            final_team1_prob: this.probability,
            events_processed: this.eventsProcessed,
        });
    }

    /** Start the next game: fresh state, momentum and history */
    reset(options: ResetOptions = {}): ProbabilitySnapshot {
        if (options.keepPriors === false) {
            this.prior = 0.5;
            this.hasPrior = false;
        }

        this.state = createGameState(this.title);
        this.momentum.reset();
        this.history.clear();
        this.ended = false;
        this.winnerSide = null;
        this.hasData = false;
        this.eventsProcessed = 0;
        this.probability = clampProbability(this.prior);
        this.confidence = 0.5;
        this.stdDev = this.baseStdDev;
        this.components = { gold: 0, kills: 0, towers: 0, objectives: 0, momentum: 0 };

        const snapshot = this.buildSnapshot('prior');
        if (this.hasPrior) {
            return this.record(snapshot);
        }
        this.latest = snapshot;
        return snapshot;
    }

    // ------------------------------------------
    // Snapshots
    // ------------------------------------------

    private buildSnapshot(
        source: ProbabilitySnapshot['source'],
        extra: Pick<ProbabilitySnapshot, 'impact' | 'trigger_event_type' | 'impact_resolution'> = {}
    ): ProbabilitySnapshot {
        const p = this.probability;
        const margin = Z_90 * this.stdDev;

        return {
            game_time: this.state.game_time,
            team1_prob: p,
            team2_prob: 1 - p,
            confidence: clamp(this.confidence, 0, 1),
            std_dev: this.stdDev,
            lower_bound: clamp(p - margin, PROBABILITY_BOUNDS.MIN_INTERVAL, PROBABILITY_BOUNDS.MAX_INTERVAL),
            upper_bound: clamp(p + margin, PROBABILITY_BOUNDS.MIN_INTERVAL, PROBABILITY_BOUNDS.MAX_INTERVAL),
            prior_prob: this.prior,
            components: { ...this.components },
            game_phase: gamePhase(this.title, this.state.game_time),
            events_processed: this.eventsProcessed,
            source,
            ...extra,
        };
    }

    private record(snapshot: ProbabilitySnapshot): ProbabilitySnapshot {
        this.history.push(snapshot);
        this.latest = snapshot;
        return snapshot;
    }
}
