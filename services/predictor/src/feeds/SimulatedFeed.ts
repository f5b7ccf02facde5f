/**
 * Simulated Feed
 *
 * Seeded event stream for demos and load tests. The same seed always yields
 * the same match; `team1Strength` skews who wins each exchange.
 */

import type { GameEvent, GameTitle, RandomSource, TeamSide } from '@winline/shared';
import { createRandom, pickWeighted, randomInt, round, sleep } from '@winline/shared';
import type { FeedConnector, FeedEventHandler } from './FeedConnector';

export interface SimulatedFeedOptions {
    title: GameTitle;
    seed: number;
    /** Game length in minutes */
    duration?: number;
    /** Probability that team 1 takes any given event */
    team1Strength?: number;
    /** Wall-clock pause between events */
    intervalMs?: number;
}

interface EventTemplate {
    type: string;
    weight: number;
    /** Earliest game minute the event can happen */
    from: number;
    until?: number;
    contexts: readonly string[];
}

const TEMPLATES: Record<GameTitle, readonly EventTemplate[]> = {
    lol: [
        { type: 'kill', weight: 10, from: 0, contexts: ['default', 'solo'] },
        { type: 'tower', weight: 3, from: 8, contexts: ['outer', 'inner', 'inhibitor_tower'] },
        { type: 'dragon', weight: 2, from: 5, contexts: ['infernal', 'mountain', 'ocean', 'cloud'] },
        { type: 'herald', weight: 1, from: 8, until: 20, contexts: ['default'] },
        { type: 'baron', weight: 1, from: 20, contexts: ['secure'] },
        { type: 'inhibitor', weight: 1, from: 24, contexts: ['default'] },
        { type: 'teamfight', weight: 2, from: 12, contexts: ['default'] },
    ],
    dota2: [
        { type: 'kill', weight: 10, from: 0, contexts: ['default', 'solo', 'pickoff'] },
        { type: 'tower', weight: 3, from: 6, contexts: ['tier1', 'tier2', 'tier3'] },
        { type: 'roshan', weight: 1, from: 15, contexts: ['default'] },
        { type: 'barracks', weight: 1, from: 28, contexts: ['melee', 'ranged'] },
        { type: 'teamfight', weight: 2, from: 10, contexts: ['default'] },
    ],
};

const DEFAULT_DURATION: Record<GameTitle, number> = { lol: 32, dota2: 40 };

/** Generates the full event list for one simulated game */
export function simulateGame(options: SimulatedFeedOptions): GameEvent[] {
    const random = createRandom(options.seed);
    const duration = options.duration ?? DEFAULT_DURATION[options.title];
    const strength = options.team1Strength ?? 0.5;
    const templates = TEMPLATES[options.title];

    const events: GameEvent[] = [];
    let time = 0;

    for (;;) {
        time = round(time + 0.3 + random() * 1.7, 2);
        if (time > duration) break;

        const available = templates.filter((t) => time >= t.from && (t.until === undefined || time < t.until));
        const template = pickWeighted(random, available.map((t) => [t, t.weight] as const));
        const team: TeamSide = random() < strength ? 1 : 2;

        events.push(buildEvent(random, template, team, time, `sim-${options.seed}-${events.length + 1}`));
    }

    return events;
}

function buildEvent(random: RandomSource, template: EventTemplate, team: TeamSide, time: number, id: string): GameEvent {
    const context = pickWeighted(random, template.contexts.map((c) => [c, 1] as const));
    const base = { event_id: id, time, type: template.type, team, context };

    switch (template.type) {
        case 'kill':
            return { ...base, victim_gold: randomInt(random, 300, 1500), victim_streak: randomInt(random, 0, 4) };
        case 'teamfight': {
            const kills = randomInt(random, 1, 5);
            return { ...base, kills, deaths: randomInt(random, 0, kills - 1) };
        }
        case 'baron':
        case 'roshan':
            return { ...base, contested: random() < 0.3 };
        default:
            return base;
    }
}

export class SimulatedFeed implements FeedConnector {
    readonly name = 'simulated';
    private readonly handlers = new Set<FeedEventHandler>();
    private running = false;

    constructor(private readonly options: SimulatedFeedOptions) { }

    onEvent(handler: FeedEventHandler): () => void {
        this.handlers.add(handler);
        return () => {
            this.handlers.delete(handler);
        };
    }

    async start(): Promise<void> {
        if (this.running) {
            throw new Error('Simulated feed already running');
        }
        this.running = true;

        const interval = this.options.intervalMs ?? 0;
        try {
            for (const event of simulateGame(this.options)) {
                if (!this.running) break;
                for (const handler of this.handlers) {
                    await handler(event);
                }
                if (interval > 0) {
                    await sleep(interval);
                }
            }
        } finally {
            this.running = false;
        }
    }

    async stop(): Promise<void> {
        this.running = false;
    }
}
