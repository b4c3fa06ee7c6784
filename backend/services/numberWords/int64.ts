// backend/services/numberWords/int64.ts
import type { ConversionResult } from "./errors.js";
import { fail, invalidInput, ok, valueTooLarge } from "./errors.js";

export type IntegerInput = bigint | number;

export const INT64_MAX = 9_223_372_036_854_775_807n;
export const INT64_MIN = -9_223_372_036_854_775_808n;

// Magnitudes at or above this are rejected before any scale arithmetic.
export const HALF_INT64 = INT64_MAX / 2n;

export function toInt64(n: IntegerInput): ConversionResult<bigint> {
    if (typeof n === "number") {
        if (!Number.isInteger(n)) {
            return fail(invalidInput(`Expected an integer, got ${n}`));
        }
        n = BigInt(n);
    }

    if (n > INT64_MAX || n < INT64_MIN) {
        return fail(invalidInput(`${n} is outside the signed 64-bit range`));
    }
    return ok(n);
}

export type Magnitude = { negative: boolean; abs: bigint };

/**
 * Splits a 64-bit value into sign and absolute value, applying the overflow
 * guard shared by every converter.
 */
export function magnitudeOf(n: IntegerInput): ConversionResult<Magnitude> {
    const parsed = toInt64(n);
    if (!parsed.ok) return parsed;

    const value = parsed.value;
    if (value === INT64_MIN) {
        return fail(invalidInput(`Cannot negate ${value} without overflow`));
    }

    const negative = value < 0n;
    const abs = negative ? -value : value;
    if (abs >= HALF_INT64) {
        return fail(valueTooLarge(abs));
    }
    return ok({ negative, abs });
}
