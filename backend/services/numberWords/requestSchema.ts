// backend/services/numberWords/requestSchema.ts
import { z } from "zod";
import { CONVERSION_MODES } from "../../../shared/types/conversion.js";
import type { ConversionMode, ConvertRequest } from "../../../shared/types/conversion.js";
import type { ConversionResult } from "./errors.js";
import { fail, invalidInput, ok } from "./errors.js";

const valueSchema = z
    .union([z.string(), z.number()], {
        errorMap: () => ({ message: "value must be a string or number" }),
    })
    .transform((v) => String(v).trim())
    .pipe(z.string().min(1, "value must not be empty"));

export const convertRequestSchema = z.object({
    value: valueSchema,
    mode: z.enum(CONVERSION_MODES).optional(),
    lang: z.string().trim().min(1, "lang must not be empty").optional(),
});

export type RawConvertRequest = z.input<typeof convertRequestSchema>;

function formatIssue(issue: z.ZodIssue | undefined): string {
    if (!issue) return "malformed request";
    const where = issue.path.join(".") || "request";
    return `${where}: ${issue.message}`;
}

/**
 * Validates an untrusted request. Without a mode, a lang implies the
 * language mode; a language request without lang uses `defaultLanguage`.
 */
export function parseConvertRequest(raw: unknown, defaultLanguage: string): ConversionResult<ConvertRequest> {
    const parsed = convertRequestSchema.safeParse(raw);
    if (!parsed.success) {
        return fail(invalidInput(formatIssue(parsed.error.issues[0])));
    }

    const { value, lang } = parsed.data;
    const mode: ConversionMode = parsed.data.mode ?? (lang ? "language" : "cardinal");

    if (mode === "language") {
        return ok<ConvertRequest>({ value, mode, lang: lang ?? defaultLanguage });
    }
    if (lang) {
        return fail(invalidInput(`lang is only accepted in language mode, not ${mode}`));
    }
    return ok<ConvertRequest>({ value, mode });
}
