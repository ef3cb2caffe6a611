/**
 * Seeded pseudo-random numbers (mulberry32). Every stochastic step in the
 * pipeline draws from one of these so that a fixed seed reproduces a run.
 */
export type Random = () => number;

export function mulberry32(seed: number): Random {
    let state = seed >>> 0;
    return () => {
        state = (state + 0x6d2b79f5) >>> 0;
        let t = state;
        t = Math.imul(t ^ (t >>> 15), t | 1);
        t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
        return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
    };
}

/**
 * Combine integers into one 32-bit seed.
 */
export function deriveSeed(...parts: number[]): number {
    let h = 0x811c9dc5;
    for (const part of parts) {
        h = Math.imul(h ^ (part >>> 0), 0x01000193) >>> 0;
        h = Math.imul(h ^ (h >>> 13), 0x5bd1e995) >>> 0;
    }
    return h >>> 0;
}

/** Integer in [min, max], both inclusive. */
export function randomInt(random: Random, min: number, max: number): number {
    return min + Math.floor(random() * (max - min + 1));
}

export function pick<T>(random: Random, items: readonly T[]): T {
    const item = items[Math.floor(random() * items.length)];
    if (item === undefined) throw new Error('pick() from an empty list');
    return item;
}

/** Standard normal draw (Box–Muller). */
export function gaussian(random: Random, mean = 0, std = 1): number {
    const u = Math.max(random(), Number.EPSILON);
    const v = random();
    return mean + std * Math.sqrt(-2 * Math.log(u)) * Math.cos(2 * Math.PI * v);
}

/**
 * Fisher–Yates shuffle into a new array.
 */
export function shuffled<T>(random: Random, items: readonly T[]): T[] {
    const out = [...items];
    for (let i = out.length - 1; i > 0; i--) {
        const j = Math.floor(random() * (i + 1));
        const a = out[i];
        const b = out[j];
        if (a === undefined || b === undefined) continue;
        out[i] = b;
        out[j] = a;
    }
    return out;
}
