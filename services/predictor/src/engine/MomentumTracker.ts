import type { MomentumState, TeamSide } from '@winline/shared';
import { RingBuffer, clamp } from '@winline/shared';

interface MomentumEntry {
    time: number;
    team: TeamSide;
    /** Unsigned; direction comes from `team` */
    impact: number;
}

export interface MomentumOptions {
    /** Minutes */
    decay?: number;
    capacity?: number;
}

/** Largest probability nudge momentum can apply either way */
export const MAX_MOMENTUM_ADJUSTMENT = 0.03;

const STRONG_THRESHOLD = 0.05;
const SLIGHT_THRESHOLD = 0.02;

/**
 * Exponentially decaying sum of recent event impacts.
 *
 * Window: entries older than 2 x decay are pruned on every insert and
 * advance; past `capacity` entries the oldest is evicted. Entries stay
 * time ordered because late arrivals are clamped to the tracker clock.
 */
export class MomentumTracker {
    readonly decay: number;
    private readonly window: RingBuffer<MomentumEntry>;
    private clock = 0;

    constructor(options: MomentumOptions = {}) {
        this.decay = options.decay ?? 3;
        if (!(this.decay > 0)) {
            throw new Error(`Momentum decay must be positive, got ${this.decay}`);
        }
        this.window = new RingBuffer(options.capacity ?? 256);
    }

    get size(): number {
        return this.window.length;
    }

    get currentTime(): number {
        return this.clock;
    }

    addEvent(time: number, team: TeamSide, impact: number): void {
        const at = Number.isFinite(time) ? Math.max(time, this.clock) : this.clock;
        this.clock = at;
        this.window.push({ time: at, team, impact: Math.abs(impact) });
        this.prune();
    }

    /** Move the clock forward without recording anything */
    advance(time: number): void {
        if (Number.isFinite(time) && time > this.clock) {
            this.clock = time;
        }
        this.prune();
    }

    /** Positive favours team 1 */
    score(now: number = this.clock): number {
        let total = 0;
        for (const entry of this.window) {
            const age = Math.max(0, now - entry.time);
            const sign = entry.team === 1 ? 1 : -1;
            total += entry.impact * Math.exp(-age / this.decay) * sign;
        }
        return total;
    }

    adjustment(now: number = this.clock): number {
        return clamp(this.score(now) * 0.5, -MAX_MOMENTUM_ADJUSTMENT, MAX_MOMENTUM_ADJUSTMENT);
    }

    state(now: number = this.clock): MomentumState {
        const s = this.score(now);
        if (s > STRONG_THRESHOLD) return 'strong_team1';
        if (s > SLIGHT_THRESHOLD) return 'slight_team1';
        if (s < -STRONG_THRESHOLD) return 'strong_team2';
        if (s < -SLIGHT_THRESHOLD) return 'slight_team2';
        return 'neutral';
    }

    /** Consecutive most-recent entries credited to `team` */
    streak(team: TeamSide): number {
        let count = 0;
        for (let i = this.window.length - 1; i >= 0; i--) {
            const entry = this.window.at(i);
            if (!entry || entry.team !== team) break;
            count++;
        }
        return count;
    }

    reset(): void {
        this.window.clear();
        this.clock = 0;
    }

    private prune(): void {
        const cutoff = this.clock - 2 * this.decay;
        this.window.dropWhile((entry) => entry.time <= cutoff);
    }
}
