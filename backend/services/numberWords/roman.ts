// backend/services/numberWords/roman.ts
import type { ConversionResult } from "./errors.js";
import { fail, invalidInput, ok } from "./errors.js";
import type { IntegerInput } from "./int64.js";
import { toInt64 } from "./int64.js";

export const ROMAN_MAX = 3999n;

const NUMERALS: ReadonlyArray<readonly [bigint, string]> = [
    [1000n, "M"],
    [900n, "CM"],
    [500n, "D"],
    [400n, "CD"],
    [100n, "C"],
    [90n, "XC"],
    [50n, "L"],
    [40n, "XL"],
    [10n, "X"],
    [9n, "IX"],
    [5n, "V"],
    [4n, "IV"],
    [1n, "I"],
];

export function toRoman(n: IntegerInput): ConversionResult<string> {
    const parsed = toInt64(n);
    if (!parsed.ok) return parsed;

    const value = parsed.value;
    if (value <= 0n || value > ROMAN_MAX) {
        return fail(invalidInput(`Roman numerals cover 1..${ROMAN_MAX}, got ${value}`));
    }

    let remaining = value;
    let result = "";

    for (const [arabic, roman] of NUMERALS) {
        while (remaining >= arabic) {
            result += roman;
            remaining -= arabic;
        }
    }

    return ok(result);
}
