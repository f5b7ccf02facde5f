import { describe, it } from 'node:test';
import * as assert from 'node:assert/strict';

import { ImpactTable, ImpactTablesSchema, loadImpactTables } from './ImpactTable';
import { RecordingLogger } from '../testing/fakes';

const close = (actual: number, expected: number) =>
    assert.ok(Math.abs(actual - expected) < 1e-12, `expected ${expected}, got ${actual}`);

describe('ImpactTable', () => {
    it('resolves an exact (type, context) pair', () => {
        const table = new ImpactTable('lol');
        assert.deepEqual(table.lookup('baron', 'secure'), {
            base_impact: 0.1,
            label: 'Baron Nashor',
            resolution: 'exact',
        });
        assert.equal(table.lookup('dragon', 'elder').base_impact, 0.18);
    });

    it('falls back to the default context and logs at debug', () => {
        const logger = new RecordingLogger();
        const table = new ImpactTable('lol', { logger });

        const result = table.lookup('dragon', 'steal');

        assert.equal(result.base_impact, 0.016);
        assert.equal(result.resolution, 'default_context');
        assert.equal(logger.at('debug').length, 1);
        assert.equal(logger.at('warn').length, 0);
    });

    it('degrades unknown event types to the unknown-event impact and warns', () => {
        const logger = new RecordingLogger();
        const table = new ImpactTable('lol', { logger });

        const ward = table.lookup('ward', 'default');
        assert.equal(ward.base_impact, 0.005);
        assert.equal(ward.resolution, 'unknown_event');

        // Roshan exists only in the Dota 2 table
        assert.equal(table.lookup('roshan', 'first').resolution, 'unknown_event');
        assert.equal(logger.at('warn').length, 2);
    });

    it('keeps per-title tables apart', () => {
        assert.equal(new ImpactTable('dota2').lookup('roshan', 'second').base_impact, 0.08);
        assert.equal(new ImpactTable('dota2').lookup('tower', 'tier3').base_impact, 0.035);
        assert.equal(new ImpactTable('dota2').lookup('kill', 'default').base_impact, 0.005);
    });

    it('keeps every bundled impact inside (0, 0.5)', () => {
        const tables = loadImpactTables();
        for (const title of [tables.titles.lol, tables.titles.dota2]) {
            for (const contexts of Object.values(title.events)) {
                for (const entry of Object.values(contexts ?? {})) {
                    assert.ok(entry !== undefined && entry.impact > 0 && entry.impact < 0.5);
                }
            }
        }
    });

    it('rejects tables without a default context', () => {
        const result = ImpactTablesSchema.safeParse({
            unknown_event_impact: 0.005,
            titles: {
                lol: {
                    events: { kill: { solo: { impact: 0.008, label: 'Solo kill' } } },
                    fight: { base: 0.015, per_kill: 0.012, ace_bonus: 0.04, ace_kills: 5, trade_kills: 4, trade_total: 7 },
                },
                dota2: {
                    events: {},
                    fight: { base: 0.012, per_kill: 0.01, ace_bonus: 0.035, ace_kills: 5, trade_kills: 4, trade_total: 7 },
                },
            },
        });
        assert.equal(result.success, false);
    });

    describe('fightImpact', () => {
        const table = new ImpactTable('lol');

        it('is worth nothing on an even trade', () => {
            assert.equal(table.fightImpact(2, 2), 0);
        });

        it('adds per-kill advantage beyond the first and an ace bonus', () => {
            close(table.fightImpact(5, 0), 0.015 + 4 * 0.012 + 0.04);
            close(table.fightImpact(3, 1), 0.015 + 0.012);
        });

        it('counts a 4-for-3 brawl as an ace', () => {
            close(table.fightImpact(4, 3), 0.015 + 0.04);
        });

        it('is negative for a lost fight', () => {
            close(table.fightImpact(1, 3), -(0.015 + 0.012));
            close(table.fightImpact(0, 5), -(0.015 + 4 * 0.012 + 0.04));
        });
    });
});
