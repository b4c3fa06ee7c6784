// backend/services/numberWords/convert.ts
import type { ConvertRequest } from "../../../shared/types/conversion.js";
import { numberToText } from "./englishConverter.js";
import type { ConversionResult } from "./errors.js";
import { fail, invalidInput, ok } from "./errors.js";
import { decimalToText, toCurrency, toOrdinal } from "./formatters.js";
import { numberToTextLang } from "./languageConverter.js";
import { toRoman } from "./roman.js";

export type NumericInput =
    | { kind: "integer"; value: bigint }
    | { kind: "decimal"; value: number };

const NUMERIC_RE = /^[+-]?(\d+(\.\d*)?|\.\d+)$/;

export function parseNumericInput(text: string): ConversionResult<NumericInput> {
    const trimmed = text.trim();
    if (!NUMERIC_RE.test(trimmed)) {
        return fail(invalidInput(`Not a number: ${text}`));
    }

    if (trimmed.includes(".")) {
        return ok({ kind: "decimal", value: Number(trimmed) });
    }
    return ok({ kind: "integer", value: BigInt(trimmed) });
}

function expectsInteger(mode: string): ConversionResult<string> {
    return fail(invalidInput(`${mode} mode expects an integer`));
}

export function convert(request: ConvertRequest): ConversionResult<string> {
    const parsed = parseNumericInput(request.value);
    if (!parsed.ok) return parsed;

    const input = parsed.value;

    switch (request.mode) {
        case "cardinal":
            return input.kind === "integer" ? numberToText(input.value) : decimalToText(input.value);
        case "currency":
            return toCurrency(Number(input.value));
        case "ordinal":
            return input.kind === "integer" ? toOrdinal(input.value) : expectsInteger(request.mode);
        case "roman":
            return input.kind === "integer" ? toRoman(input.value) : expectsInteger(request.mode);
        case "language":
            return input.kind === "integer" ? numberToTextLang(input.value, request.lang) : expectsInteger(request.mode);
    }
}
