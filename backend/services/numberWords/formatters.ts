// backend/services/numberWords/formatters.ts
import { numberToText } from "./englishConverter.js";
import type { ConversionResult } from "./errors.js";
import { fail, invalidInput, ok, valueTooLarge, wrapError } from "./errors.js";
import type { IntegerInput } from "./int64.js";
import { magnitudeOf } from "./int64.js";

export type OrdinalSuffix = "st" | "nd" | "rd" | "th";

export function ordinalSuffix(abs: bigint): OrdinalSuffix {
    const lastTwo = abs % 100n;
    if (lastTwo >= 11n && lastTwo <= 13n) return "th";

    switch (abs % 10n) {
        case 1n:
            return "st";
        case 2n:
            return "nd";
        case 3n:
            return "rd";
        default:
            return "th";
    }
}

export function toOrdinal(n: IntegerInput): ConversionResult<string> {
    const magnitude = magnitudeOf(n);
    if (!magnitude.ok) return magnitude;

    const words = numberToText(n);
    if (!words.ok) return fail(wrapError("Rendering ordinal", words.error));

    const { negative, abs } = magnitude.value;
    const suffix = ordinalSuffix(abs);
    return ok(`${words.value} (${negative ? "-" : ""}${abs}${suffix})`);
}

type Cents = { negative: boolean; whole: bigint; cents: number };

// Round half away from zero on the hundredths, then split.
function splitCents(x: number): ConversionResult<Cents> {
    if (!Number.isFinite(x)) {
        return fail(invalidInput(`Expected a finite number, got ${x}`));
    }

    const total = Math.round(Math.abs(x) * 100);
    if (!Number.isSafeInteger(total)) return fail(valueTooLarge(x));

    const big = BigInt(total);
    return ok({ negative: x < 0 && total > 0, whole: big / 100n, cents: Number(big % 100n) });
}

function plural(word: string, count: bigint | number): string {
    return BigInt(count) === 1n ? word : `${word}s`;
}

export function toCurrency(x: number): ConversionResult<string> {
    const split = splitCents(x);
    if (!split.ok) return split;

    const { negative, whole, cents } = split.value;

    const dollars = numberToText(whole);
    if (!dollars.ok) return fail(wrapError("Rendering dollars", dollars.error));

    const parts = [`${dollars.value} ${plural("Dollar", whole)}`];

    if (cents > 0) {
        const centWords = numberToText(cents);
        if (!centWords.ok) return fail(wrapError("Rendering cents", centWords.error));
        parts.push(`${centWords.value} ${plural("Cent", cents)}`);
    }

    const text = parts.join(" and ");
    return ok(negative ? `Minus ${text}` : text);
}

/**
 * Reads the value to two decimal places. The fraction is spoken as a
 * cardinal, so 3.05 and 3.5 read "Three point Five" and "Three point Fifty".
 */
export function decimalToText(x: number): ConversionResult<string> {
    const split = splitCents(x);
    if (!split.ok) return split;

    const { negative, whole, cents } = split.value;

    const integerPart = numberToText(whole);
    if (!integerPart.ok) return fail(wrapError("Rendering integer part", integerPart.error));

    const fractionPart = numberToText(cents);
    if (!fractionPart.ok) return fail(wrapError("Rendering fractional part", fractionPart.error));

    const text = `${integerPart.value} point ${fractionPart.value}`;
    return ok(negative ? `Minus ${text}` : text);
}
