// edge-twin-allocator/src/utils/random.ts

/** Random source returning a float in [0, 1). */
export type PRNG = () => number;

/** Create a seedable PRNG using the mulberry32 algorithm. */
export function createPRNG(seed: number): PRNG {
    return () => {
        seed |= 0;
        seed = (seed + 0x6d2b79f5) | 0;
        let t = Math.imul(seed ^ (seed >>> 15), 1 | seed);
        t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
        return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
    };
}

/** Seeded PRNG when a seed is given, Math.random otherwise. */
export function resolvePRNG(seed?: number): PRNG {
    return seed === undefined ? Math.random : createPRNG(seed);
}

export function uniform(random: PRNG, min: number, max: number): number {
    return min + random() * (max - min);
}

/** Integer in [min, max). */
export function randomInt(random: PRNG, min: number, max: number): number {
    return min + Math.floor(random() * (max - min));
}

export function randomChoice<T>(random: PRNG, items: readonly T[]): T {
    if (items.length === 0) {
        throw new Error('Cannot choose from an empty list');
    }
    return items[Math.floor(random() * items.length)];
}

/** Pick `count` distinct indices from [0, size). */
export function sampleIndices(random: PRNG, size: number, count: number): number[] {
    const pool = Array.from({ length: size }, (_, i) => i);
    const picked: number[] = [];
    for (let i = 0; i < Math.min(count, size); i++) {
        const j = i + Math.floor(random() * (size - i));
        [pool[i], pool[j]] = [pool[j], pool[i]];
        picked.push(pool[i]);
    }
    return picked;
}

export function round(value: number, decimals: number): number {
    const factor = 10 ** decimals;
    return Math.round(value * factor) / factor;
}
