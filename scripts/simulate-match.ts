/**
 * Match Simulator
 * Drives a running predictor with a seeded simulated game and prints the
 * probability after every event.
 *
 * Usage: PREDICTOR_URL=http://localhost:8083 TITLE=lol SEED=42 npx tsx scripts/simulate-match.ts
 */

import type { GameEvent, GameTitle } from '@winline/shared';
import { GameTitleSchema } from '@winline/shared';
import { SimulatedFeed } from '../services/predictor/src/feeds/SimulatedFeed';

const PREDICTOR_URL = process.env.PREDICTOR_URL || 'http://localhost:8083';
const TITLE: GameTitle = GameTitleSchema.parse(process.env.TITLE || 'lol');
const SEED = parseInt(process.env.SEED || '42', 10);
const MATCH_ID = process.env.MATCH_ID || `sim-${TITLE}-${SEED}`;
const INTERVAL_MS = parseInt(process.env.INTERVAL_MS || '250', 10);

async function post(path: string, body: unknown): Promise<unknown> {
    const res = await fetch(`${PREDICTOR_URL}${path}`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(body),
    });
    if (!res.ok) {
        throw new Error(`HTTP ${res.status} on ${path}: ${await res.text()}`);
    }
    const parsed: unknown = await res.json();
    return parsed;
}

function team1Prob(body: unknown): string {
    if (typeof body !== 'object' || body === null || !('data' in body)) return '?';
    const { data } = body;
    if (typeof data !== 'object' || data === null || !('snapshot' in data)) return '?';
    const { snapshot } = data;
    if (typeof snapshot !== 'object' || snapshot === null || !('team1_prob' in snapshot)) return '?';
    return typeof snapshot.team1_prob === 'number' ? snapshot.team1_prob.toFixed(3) : '?';
}

async function run() {
    console.log(`🚀 Simulating ${TITLE} match ${MATCH_ID} (seed ${SEED}) against ${PREDICTOR_URL}`);

    await post('/matches', { match_id: MATCH_ID, title: TITLE, team1_rating: 1550, team2_rating: 1500 });

    const feed = new SimulatedFeed({ title: TITLE, seed: SEED, team1Strength: 0.55, intervalMs: INTERVAL_MS });
    feed.onEvent(async (event: GameEvent) => {
        const body = await post(`/matches/${MATCH_ID}/events`, event);
        console.log(`[${event.time.toFixed(2)}] team ${event.team} ${event.type}/${event.context} -> p1=${team1Prob(body)}`);
    });

    process.on('SIGINT', () => {
        feed.stop().catch((error) => console.error('Failed to stop feed:', error));
    });

    await feed.start();

    const edge = await post(`/matches/${MATCH_ID}/edge`, { market_price: 0.5 });
    console.log('📈 Edge at even money:', JSON.stringify(edge));
    console.log('✅ Simulation Complete');
}

run().catch((error) => {
    console.error('❌ Simulation failed:', error);
    process.exit(1);
});
