/**
 * Source of uniform random numbers in [0, 1), same contract as `Math.random`.
 * Injected into every phase that samples so a search can be replayed.
 */
export type RandomSource = () => number;

export const defaultRandom: RandomSource = Math.random;

export function pickRandom<T>(items: readonly T[], random: RandomSource): T {
    if (items.length === 0) {
        throw new Error('pickRandom called with empty array');
    }
    return items[Math.floor(random() * items.length)];
}

/**
 * Deterministic generator (mulberry32) for reproducible searches.
 */
export function createSeededRandom(seed: number): RandomSource {
    let state = seed >>> 0;
    return () => {
        state = (state + 0x6D2B79F5) >>> 0;
        let t = state;
        t = Math.imul(t ^ (t >>> 15), t | 1);
        t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
        return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
    };
}
