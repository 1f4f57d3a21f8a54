/** Returns a float in [0, 1). */
export type RandomSource = () => number;

/**
 * Seeded linear congruential generator, so a fixed seed replays the same
 * sequence of picks. Without a seed, falls back to Math.random.
 */
export function createRandom(seed?: number): RandomSource {
    if (seed === undefined) return Math.random;

    let state = seed & 0x7fffffff;
    return () => {
        state = (Math.imul(state, 1103515245) + 12345) & 0x7fffffff;
        return state / 0x80000000;
    };
}

export function pickOne<T>(items: readonly T[], random: RandomSource): T {
    const index = Math.min(Math.floor(random() * items.length), items.length - 1);
    return items[index];
}
