/**
 * A source of uniformly distributed numbers in [0, 1), with the same contract as `Math.random`.
 */
export type RandomSource = () => number;

/**
 * Create a seeded random source for reproducible searches.
 * Uses Park and Miller's "minimal standard" LCG, which never yields 0 or 1.
 */
export function createSeededRng(seed: number): RandomSource {
    const a = 16807;
    const m = 2147483647; // 2^31 - 1

    // the generator is stuck at 0 unless the state is in [1, m - 1]
    let state = Math.abs(Math.floor(seed)) % m || 1;

    return () => {
        state = (a * state) % m;
        return state / m;
    };
}

/**
 * Pick one element uniformly at random.
 *
 * @returns the chosen element, or undefined for an empty list
 */
export function pickRandom<T>(items: readonly T[], random: RandomSource = Math.random): T | undefined {
    if (items.length === 0) {
        return undefined;
    }
    // guard against sources that may return exactly 1
    const index = Math.min(Math.floor(random() * items.length), items.length - 1);
    return items[index];
}
