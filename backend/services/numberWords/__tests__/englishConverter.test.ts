import { describe, expect, it } from "vitest";
import { numberToText, renderSmall } from "../englishConverter.js";
import { HALF_INT64, INT64_MAX, INT64_MIN } from "../int64.js";
import { SCALE_UNITS, findScale } from "../scaleTable.js";

function text(n: bigint | number): string {
    const result = numberToText(n);
    if (!result.ok) throw new Error(`expected success for ${n}, got ${result.error.kind}`);
    return result.value;
}

const ONES = [
    "One", "Two", "Three", "Four", "Five", "Six", "Seven", "Eight", "Nine", "Ten",
    "Eleven", "Twelve", "Thirteen", "Fourteen", "Fifteen", "Sixteen", "Seventeen",
    "Eighteen", "Nineteen",
];

describe("numberToText", () => {
    it("renders zero", () => {
        expect(text(0)).toBe("Zero");
    });

    it("renders 1..19 as single words", () => {
        ONES.forEach((word, i) => {
            expect(text(i + 1)).toBe(word);
        });
    });

    it("renders tens with and without units", () => {
        expect(text(20)).toBe("Twenty");
        expect(text(42)).toBe("Forty Two");
        expect(text(70)).toBe("Seventy");
        expect(text(99)).toBe("Ninety Nine");
    });

    it("puts 'and' between hundreds and the rest", () => {
        expect(text(100)).toBe("One Hundred");
        expect(text(101)).toBe("One Hundred and One");
        expect(text(110)).toBe("One Hundred and Ten");
        expect(text(999)).toBe("Nine Hundred and Ninety Nine");
    });

    it("names scale tiers by the scale table", () => {
        expect(text(1000)).toBe("One Million");
        expect(text(1_000_000)).toBe("One Billion");
        expect(text(1_000_001)).toBe("One Billion One");
        expect(text(1_234_567)).toBe(
            "One Billion Two Hundred and Thirty Four Million Five Hundred and Sixty Seven"
        );
    });

    it("accepts bigint and number alike", () => {
        expect(text(42n)).toBe(text(42));
    });

    it("prefixes Minus for negatives", () => {
        expect(text(-1)).toBe("Minus One");
        expect(text(-42)).toBe("Minus Forty Two");
        expect(text(-1234)).toBe("Minus One Million Two Hundred and Thirty Four");

        for (const n of [7, 19, 305, 1_000_000, 987_654_321]) {
            expect(text(-n)).toBe(`Minus ${text(n)}`);
        }
    });

    it("renders the largest eighteen-digit value", () => {
        const group = "Nine Hundred and Ninety Nine";
        const expected = ["Quintillion", "Quadrillion", "Trillion", "Billion", "Million"]
            .map((name) => `${group} ${name}`)
            .concat(group)
            .join(" ");

        expect(text(999_999_999_999_999_999n)).toBe(expected);
    });

    it("renders just below the overflow guard", () => {
        expect(text(HALF_INT64 - 1n)).toBe(
            "Four Sextillion Six Hundred and Eleven Quintillion Six Hundred and Eighty Six Quadrillion " +
                "Eighteen Trillion Four Hundred and Twenty Seven Billion Three Hundred and Eighty Seven Million " +
                "Nine Hundred and Two"
        );
    });

    it("rejects magnitudes at half of int64 max", () => {
        expect(numberToText(HALF_INT64)).toEqual({
            ok: false,
            error: { kind: "ValueTooLarge", value: "4611686018427387903" },
        });
        expect(numberToText(-HALF_INT64)).toEqual({
            ok: false,
            error: { kind: "ValueTooLarge", value: "4611686018427387903" },
        });
        expect(numberToText(INT64_MAX).ok).toBe(false);
    });

    it("rejects values it cannot negate or represent", () => {
        const min = numberToText(INT64_MIN);
        expect(min.ok).toBe(false);
        if (!min.ok) expect(min.error.kind).toBe("InvalidInput");

        const over = numberToText(INT64_MAX + 1n);
        expect(over.ok).toBe(false);
        if (!over.ok) expect(over.error.kind).toBe("InvalidInput");
    });

    it("rejects non-integer numbers", () => {
        const result = numberToText(1.5);
        expect(result).toEqual({
            ok: false,
            error: { kind: "InvalidInput", message: "Expected an integer, got 1.5" },
        });
    });
});

describe("renderSmall", () => {
    it("returns word tokens", () => {
        expect(renderSmall(305)).toEqual({ ok: true, value: ["Three", "Hundred", "and", "Five"] });
        expect(renderSmall(40)).toEqual({ ok: true, value: ["Forty"] });
    });

    it("renders zero as no tokens", () => {
        expect(renderSmall(0)).toEqual({ ok: true, value: [] });
    });

    it("rejects values outside 0..999", () => {
        expect(renderSmall(1000)).toEqual({
            ok: false,
            error: { kind: "InvalidInput", message: "renderSmall expects 0..999, got 1000" },
        });
        expect(renderSmall(-1).ok).toBe(false);
    });
});

describe("SCALE_UNITS", () => {
    it("steps down by exactly 1000x per tier", () => {
        for (let i = 1; i < SCALE_UNITS.length; i++) {
            expect(SCALE_UNITS[i - 1].divisor).toBe(SCALE_UNITS[i].divisor * 1000n);
        }
        expect(SCALE_UNITS[SCALE_UNITS.length - 1].divisor).toBe(1000n);
    });

    it("finds the largest fitting tier", () => {
        expect(findScale(999n, SCALE_UNITS)).toBeNull();
        expect(findScale(1000n, SCALE_UNITS)?.name).toBe("Million");
        expect(findScale(2_000_000_000n, SCALE_UNITS)?.name).toBe("Trillion");
    });
});
