// backend/services/numberWords/englishConverter.ts
import type { ConversionResult } from "./errors.js";
import { fail, invalidInput, ok, wrapError } from "./errors.js";
import type { IntegerInput } from "./int64.js";
import { magnitudeOf } from "./int64.js";
import { SCALE_UNITS, findScale } from "./scaleTable.js";

const BELOW_20 = [
    "Zero", "One", "Two", "Three", "Four", "Five", "Six", "Seven", "Eight", "Nine",
    "Ten", "Eleven", "Twelve", "Thirteen", "Fourteen", "Fifteen", "Sixteen",
    "Seventeen", "Eighteen", "Nineteen",
] as const;

const TENS = [
    "", "", "Twenty", "Thirty", "Forty", "Fifty", "Sixty", "Seventy", "Eighty", "Ninety",
] as const;

const HUNDRED = "Hundred";
const CONJUNCTION = "and";

/**
 * Renders 0..999 as word tokens. Zero renders as no tokens; callers decide
 * whether a bare zero needs a word.
 */
export function renderSmall(n: number): ConversionResult<string[]> {
    if (!Number.isInteger(n) || n < 0 || n >= 1000) {
        return fail(invalidInput(`renderSmall expects 0..999, got ${n}`));
    }

    const words: string[] = [];

    if (n >= 100) {
        words.push(BELOW_20[Math.floor(n / 100)], HUNDRED);
    }

    const remainder = n % 100;
    if (remainder > 0) {
        if (words.length > 0) words.push(CONJUNCTION);

        if (remainder < 20) {
            words.push(BELOW_20[remainder]);
        } else {
            words.push(TENS[Math.floor(remainder / 10)]);
            if (remainder % 10 > 0) words.push(BELOW_20[remainder % 10]);
        }
    }

    return ok(words);
}

function convert(value: bigint): ConversionResult<string[]> {
    const scale = findScale(value, SCALE_UNITS);
    if (!scale) return renderSmall(Number(value));

    const quotient = value / scale.divisor;
    const remainder = value % scale.divisor;

    const head = renderSmall(Number(quotient));
    if (!head.ok) return fail(wrapError(`Rendering ${scale.name} group`, head.error));

    const words = [...head.value, scale.name];

    if (remainder !== 0n) {
        const tail = convert(remainder);
        if (!tail.ok) return tail;
        words.push(...tail.value);
    }

    return ok(words);
}

export function numberToText(n: IntegerInput): ConversionResult<string> {
    const magnitude = magnitudeOf(n);
    if (!magnitude.ok) return magnitude;

    const { negative, abs } = magnitude.value;
    if (abs === 0n) return ok(BELOW_20[0]);

    const words = convert(abs);
    if (!words.ok) return words;

    return ok((negative ? ["Minus", ...words.value] : words.value).join(" "));
}
