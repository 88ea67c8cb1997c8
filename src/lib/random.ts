import type { RandomSource } from "@/types";

export const defaultRandom: RandomSource = () => Math.random();

/** Seedable generator (mulberry32) so dispatches can be replayed. */
export function seededRandom(seed: number): RandomSource {
    let a = seed >>> 0;
    return () => {
        a = (a + 0x6d2b79f5) >>> 0;
        let t = a;
        t = Math.imul(t ^ (t >>> 15), t | 1);
        t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
        return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
    };
}

export function randomInt(random: RandomSource, min: number, max: number): number {
    return min + Math.floor(random() * (max - min + 1));
}

export function randomChoice<T>(random: RandomSource, items: readonly T[]): T {
    if (items.length === 0) throw new Error("randomChoice: empty list");
    const i = Math.min(items.length - 1, Math.floor(random() * items.length));
    return items[i];
}
