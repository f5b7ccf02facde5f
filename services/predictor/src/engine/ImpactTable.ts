/**
 * Impact Table
 *
 * Base win-probability shift for every (event type, context) pair, per title.
 * Data lives in impact-tables.json and is validated once on first load.
 *
 * Resolution order: exact context -> the event type's `default` context ->
 * the unknown-event impact. Lookups never throw.
 */

import { z } from 'zod';
import type { GameTitle, LoggerLike } from '@winline/shared';
import {
    GAME_EVENT_TYPES,
    IMPACT_CONTEXTS,
    isGameEventType,
    isImpactContext,
} from '@winline/shared';
import type { ImpactLookup } from './types';
import rawTables from './impact-tables.json';

// ============================================
// Schema
// ============================================

const ImpactEntrySchema = z.object({
    impact: z.number().gt(0).lt(0.5),
    label: z.string().min(1),
});

const FightParamsSchema = z.object({
    base: z.number().positive(),
    per_kill: z.number().positive(),
    ace_bonus: z.number().min(0),
    /** Kills by the winning side that count as an ace / wipe */
    ace_kills: z.number().int().positive(),
    /** ...or this many kills in a fight with at least `trade_total` deaths overall */
    trade_kills: z.number().int().positive(),
    trade_total: z.number().int().positive(),
});

const TitleTableSchema = z.object({
    events: z
        .record(z.enum(GAME_EVENT_TYPES), z.record(z.enum(IMPACT_CONTEXTS), ImpactEntrySchema))
        .refine(
            (events) => Object.values(events).every((contexts) => contexts?.default !== undefined),
            { message: 'every event type needs a default context' }
        ),
    fight: FightParamsSchema,
});

export const ImpactTablesSchema = z.object({
    unknown_event_impact: z.number().gt(0).lt(0.5),
    titles: z.object({
        lol: TitleTableSchema,
        dota2: TitleTableSchema,
    }),
});

export type ImpactTablesData = z.infer<typeof ImpactTablesSchema>;
type TitleTable = z.infer<typeof TitleTableSchema>;

let bundledTables: ImpactTablesData | undefined;

/** Parses the bundled tables (cached after the first call) */
export function loadImpactTables(): ImpactTablesData {
    if (!bundledTables) {
        bundledTables = ImpactTablesSchema.parse(rawTables);
    }
    return bundledTables;
}

// ============================================
// Table
// ============================================

export interface ImpactTableOptions {
    logger?: LoggerLike;
    tables?: ImpactTablesData;
}

export class ImpactTable {
    private readonly table: TitleTable;
    private readonly unknownImpact: number;
    private readonly logger?: LoggerLike;

    constructor(readonly title: GameTitle, options: ImpactTableOptions = {}) {
        const tables = options.tables ?? loadImpactTables();
        this.table = tables.titles[title];
        this.unknownImpact = tables.unknown_event_impact;
        this.logger = options.logger;
    }

    lookup(eventType: string, context = 'default'): ImpactLookup {
        const contexts = isGameEventType(eventType) ? this.table.events[eventType] : undefined;

        if (!contexts) {
            this.logger?.warn('Unknown event type, using default impact', {
                title: this.title,
                event_type: eventType,
                context,
                impact: this.unknownImpact,
            });
            return {
                base_impact: this.unknownImpact,
                label: `Unknown event (${eventType})`,
                resolution: 'unknown_event',
            };
        }

        const exact = isImpactContext(context) ? contexts[context] : undefined;
        if (exact) {
            return { base_impact: exact.impact, label: exact.label, resolution: 'exact' };
        }

        const fallback = contexts.default;
        if (fallback) {
            this.logger?.debug('Context not in table, using default context', {
                title: this.title,
                event_type: eventType,
                context,
            });
            return { base_impact: fallback.impact, label: fallback.label, resolution: 'default_context' };
        }

        return {
            base_impact: this.unknownImpact,
            label: `Unknown event (${eventType})`,
            resolution: 'unknown_event',
        };
    }

    /**
     * Signed base impact of a fight from the perspective of the side that
     * scored `kills` and suffered `deaths`. Even trades are worth nothing.
     */
    fightImpact(kills: number, deaths: number): number {
        const net = kills - deaths;
        if (net === 0) return 0;

        const fight = this.table.fight;
        const winnerKills = Math.max(kills, deaths);
        const total = kills + deaths;

        let base = fight.base + (Math.abs(net) - 1) * fight.per_kill;
        if (
            winnerKills >= fight.ace_kills ||
            (winnerKills >= fight.trade_kills && total >= fight.trade_total)
        ) {
            base += fight.ace_bonus;
        }

        return net > 0 ? base : -base;
    }
}
