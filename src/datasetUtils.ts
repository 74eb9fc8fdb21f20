import type { Dataset, DatasetSummary } from './types';

/** Sturges' bin count, the classic histogram default. */
export function sturgesBins(count: number): number {
    if (count <= 1) return 1;
    return Math.ceil(Math.log2(count)) + 1;
}

export function summarize(values: Dataset): DatasetSummary | null {
    if (values.length === 0) {
        return null;
    }
    let min = Infinity;
    let max = -Infinity;
    let sum = 0;
    for (const v of values) {
        sum += v;
        if (v < min) min = v;
        if (v > max) max = v;
    }
    const mean = sum / values.length;
    // Sample standard deviation; zero for a single value.
    const sd = values.length > 1
        ? Math.sqrt(values.reduce((acc, v) => acc + (v - mean) ** 2, 0) / (values.length - 1))
        : 0;
    return { count: values.length, mean, sd, min, max };
}

export function formatStat(value: number): string {
    return Number.isInteger(value) ? value.toString() : value.toFixed(3);
}
