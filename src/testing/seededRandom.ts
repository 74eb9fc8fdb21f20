import type { RandomSource } from '../distributions';

/** mulberry32: small deterministic generator so statistical tests do not flake. */
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
