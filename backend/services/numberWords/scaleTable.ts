// backend/services/numberWords/scaleTable.ts

export type ScaleUnit = {
    divisor: bigint;
    name: string;
};

// Largest first. Each tier is exactly 1000x the next, so a quotient against
// its tier is always below 1000.
export const SCALE_UNITS: readonly ScaleUnit[] = Object.freeze([
    { divisor: 1_000_000_000_000_000_000n, name: "Sextillion" },
    { divisor: 1_000_000_000_000_000n, name: "Quintillion" },
    { divisor: 1_000_000_000_000n, name: "Quadrillion" },
    { divisor: 1_000_000_000n, name: "Trillion" },
    { divisor: 1_000_000n, name: "Billion" },
    { divisor: 1_000n, name: "Million" },
]);

/** First (largest) tier whose divisor fits into `value`. */
export function findScale<T extends { divisor: bigint }>(value: bigint, scales: readonly T[]): T | null {
    return scales.find((s) => value >= s.divisor) ?? null;
}
