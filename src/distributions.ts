export type RandomSource = () => number;

const assertCount = (n: number): void => {
    if (!Number.isInteger(n) || n < 0) {
        throw new RangeError(`Sample count must be a non-negative integer, got ${n}`);
    }
};

// Uniform draw on (0, 1]; log(0) would blow up Box-Muller.
const openUnit = (rng: RandomSource): number => 1 - rng();

/**
 * Standard normal draws via the Box-Muller transform. Each pair of uniforms
 * yields two independent normals.
 */
export function normalSamples(n: number, rng: RandomSource = Math.random): number[] {
    assertCount(n);
    const out: number[] = [];
    while (out.length < n) {
        const radius = Math.sqrt(-2.0 * Math.log(openUnit(rng)));
        const theta = 2.0 * Math.PI * rng();
        out.push(radius * Math.cos(theta));
        if (out.length < n) {
            out.push(radius * Math.sin(theta));
        }
    }
    return out;
}

/**
 * Poisson draws using Knuth's multiplication method, fine for the small rates
 * this app plots.
 */
export function poissonSamples(n: number, lambda: number, rng: RandomSource = Math.random): number[] {
    assertCount(n);
    if (!Number.isFinite(lambda) || lambda <= 0) {
        throw new RangeError(`Poisson rate must be a positive finite number, got ${lambda}`);
    }
    const limit = Math.exp(-lambda);
    return Array.from({ length: n }, () => {
        let k = 0;
        let p = 1;
        do {
            k++;
            p *= rng();
        } while (p > limit);
        return k - 1;
    });
}
