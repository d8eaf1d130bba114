/**
 * Hashes a `--seed` value so the same text always samples the same suggestions.
 */
export function seedFromString(seed: string): number {
    let hash = 5381;
    for (const ch of seed) {
        hash = ((hash << 5) + hash) ^ ch.charCodeAt(0);
    }
    return hash >>> 0;
}

/** Seeded generator of floats in [0, 1), used when suggestions must be reproducible */
export function mulberry32(seed: number): () => number {
    let state = seed >>> 0;
    return () => {
        state = (state + 0x6d2b79f5) >>> 0;
        let t = state;
        t = Math.imul(t ^ (t >>> 15), t | 1);
        t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
        return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
    };
}

/** Random source for display sampling; unseeded falls back to Math.random */
export function createRandom(seed?: string): () => number {
    return seed === undefined ? Math.random : mulberry32(seedFromString(seed));
}

// Partial Fisher-Yates shuffle: the first `count` slots end up a uniform pick
function pickPositions(length: number, count: number, random: () => number): number[] {
    const positions = Array.from({ length }, (_, i) => i);
    for (let i = 0; i < count; i++) {
        const j = i + Math.floor(random() * (length - i));
        [positions[i], positions[j]] = [positions[j], positions[i]];
    }
    return positions.slice(0, count);
}

/**
 * Picks `count` words uniformly without replacement, keeping their relative order.
 * Returns a copy of every word when there are no more than `count` of them.
 */
export function sampleWords(words: readonly string[], count: number, random: () => number): string[] {
    if (count >= words.length) {
        return [...words];
    }
    if (count <= 0) {
        return [];
    }
    return pickPositions(words.length, count, random)
        .sort((a, b) => a - b)
        .map((idx) => words[idx]);
}
