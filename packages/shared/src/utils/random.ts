/**
 * Seeded PRNG (mulberry32) for reproducible simulations.
 */

export type RandomSource = () => number;

export function createRandom(seed: number): RandomSource {
    let state = seed >>> 0;
    return () => {
        state = (state + 0x6d2b79f5) >>> 0;
        let t = state;
        t = Math.imul(t ^ (t >>> 15), t | 1);
        t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
        return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
    };
}

export function randomInt(random: RandomSource, minInclusive: number, maxInclusive: number): number {
    return minInclusive + Math.floor(random() * (maxInclusive - minInclusive + 1));
}

export function pickWeighted<T>(random: RandomSource, options: ReadonlyArray<readonly [T, number]>): T {
    const total = options.reduce((sum, [, weight]) => sum + weight, 0);
    let roll = random() * total;
    for (const [value, weight] of options) {
        roll -= weight;
        if (roll < 0) return value;
    }
    const last = options[options.length - 1];
    if (!last) {
        throw new Error('pickWeighted needs at least one option');
    }
    return last[0];
}
