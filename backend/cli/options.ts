// backend/cli/options.ts
import { parseArgs } from "node:util";
import type { ConversionMode } from "../../shared/types/conversion.js";
import type { ConversionResult } from "../services/numberWords/index.js";
import { convert, parseConvertRequest } from "../services/numberWords/index.js";
import type { RawConvertRequest } from "../services/numberWords/requestSchema.js";
import { fail, invalidInput, ok } from "../services/numberWords/errors.js";

export type CliOptions = {
    value?: string;
    mode: ConversionMode;
    lang?: string;
};

export const USAGE = "Usage: number-words [value] [--ordinal | --currency | --roman | --lang <code>]";

// "-42" would otherwise be read as a short flag.
const NUMBER_LIKE = /^[+-]?(\d|\.\d)/;

function errorMessage(e: unknown): string {
    return e instanceof Error ? e.message : String(e);
}

export function parseCliArgs(argv: readonly string[]): ConversionResult<CliOptions> {
    const numbers = argv.filter((a) => NUMBER_LIKE.test(a));
    const rest = argv.filter((a) => !NUMBER_LIKE.test(a));

    let parsed: ReturnType<typeof parseFlags>;
    try {
        parsed = parseFlags(rest);
    } catch (e) {
        return fail(invalidInput(`${errorMessage(e)}\n${USAGE}`));
    }

    const positionals = [...numbers, ...parsed.positionals];
    if (positionals.length > 1) {
        return fail(invalidInput(`Expected at most one value, got ${positionals.length}\n${USAGE}`));
    }

    const { ordinal, currency, roman, lang } = parsed.values;
    const modes: ConversionMode[] = [];
    if (ordinal) modes.push("ordinal");
    if (currency) modes.push("currency");
    if (roman) modes.push("roman");
    if (lang !== undefined) modes.push("language");

    if (modes.length > 1) {
        return fail(invalidInput(`Choose one of --ordinal, --currency, --roman, --lang\n${USAGE}`));
    }

    return ok({ value: positionals[0], mode: modes[0] ?? "cardinal", lang });
}

function parseFlags(args: string[]) {
    return parseArgs({
        args,
        allowPositionals: true,
        strict: true,
        options: {
            ordinal: { type: "boolean" },
            currency: { type: "boolean" },
            roman: { type: "boolean" },
            lang: { type: "string", short: "l" },
        },
    });
}

export function convertValue(value: string, options: CliOptions, defaultLanguage: string): ConversionResult<string> {
    const raw: RawConvertRequest = { value, mode: options.mode, lang: options.lang };
    const request = parseConvertRequest(raw, defaultLanguage);
    if (!request.ok) return request;
    return convert(request.value);
}
