// backend/services/numberWords/languageTables.ts
import type { ConversionResult } from "./errors.js";
import { fail, ok, unsupportedLanguage } from "./errors.js";

export const LANGUAGE_CODES = ["en", "es", "ar"] as const;
export type LanguageCode = (typeof LANGUAGE_CODES)[number];

export type Grammar = "default" | "arabic";

export type LanguageScale = {
    divisor: bigint;
    singular: string;
    dual?: string;
    plural: string;
    pluralUpTo?: number; // counts above this take the singular again
};

export type HundredForms = {
    exact: string; // a bare 100 in its group
    withRemainder: string; // 1xx when tens/units follow
    two?: string; // languages with an atomic 200
    suffix: string;
    irregular: Readonly<Partial<Record<number, string>>>;
};

export type LanguageWordTable = {
    code: Exclude<LanguageCode, "en">;
    name: string;
    grammar: Grammar;
    units: readonly string[];
    tens: readonly string[];
    hundreds: HundredForms;
    scales: readonly LanguageScale[];
    zero: string;
    minus: string;
    conjunction: string;
};

export type LanguageInfo = {
    code: LanguageCode;
    name: string;
    aliases: readonly string[];
};

export const LANGUAGES: readonly LanguageInfo[] = Object.freeze([
    { code: "en", name: "English", aliases: ["en", "eng", "english"] },
    { code: "es", name: "Spanish", aliases: ["es", "spa", "spanish"] },
    { code: "ar", name: "Arabic", aliases: ["ar", "ara", "arabic"] },
]);

const SPANISH: LanguageWordTable = {
    code: "es",
    name: "Spanish",
    grammar: "default",
    units: [
        "Cero", "Uno", "Dos", "Tres", "Cuatro", "Cinco", "Seis", "Siete", "Ocho", "Nueve",
        "Diez", "Once", "Doce", "Trece", "Catorce", "Quince", "Dieciséis",
        "Diecisiete", "Dieciocho", "Diecinueve",
    ],
    tens: ["", "", "Veinte", "Treinta", "Cuarenta", "Cincuenta", "Sesenta", "Setenta", "Ochenta", "Noventa"],
    hundreds: {
        exact: "Cien",
        withRemainder: "Ciento",
        suffix: "cientos",
        irregular: { 5: "Quinientos", 7: "Setecientos", 9: "Novecientos" },
    },
    // Long scale. Counts of a thousand billones or more read through the
    // largest tier ("Mil Billones").
    scales: [
        { divisor: 1_000_000_000_000n, singular: "Un Billón", plural: "Billones" },
        { divisor: 1_000_000_000n, singular: "Mil Millones", plural: "Mil Millones" },
        { divisor: 1_000_000n, singular: "Un Millón", plural: "Millones" },
        { divisor: 1_000n, singular: "Mil", plural: "Mil" },
    ],
    zero: "Cero",
    minus: "Menos",
    conjunction: "y",
};

const ARABIC: LanguageWordTable = {
    code: "ar",
    name: "Arabic",
    grammar: "arabic",
    units: [
        "صفر", "واحد", "اثنان", "ثلاثة", "أربعة", "خمسة", "ستة", "سبعة", "ثمانية", "تسعة",
        "عشرة", "أحد عشر", "اثنا عشر", "ثلاثة عشر", "أربعة عشر", "خمسة عشر", "ستة عشر",
        "سبعة عشر", "ثمانية عشر", "تسعة عشر",
    ],
    tens: ["", "", "عشرون", "ثلاثون", "أربعون", "خمسون", "ستون", "سبعون", "ثمانون", "تسعون"],
    hundreds: {
        exact: "مائة",
        withRemainder: "مائة",
        two: "مئتان",
        suffix: "مائة",
        irregular: { 8: "ثمانمائة" },
    },
    // Counts above 999 مليار read through the largest tier (ألف مليار).
    scales: [
        { divisor: 1_000_000_000n, singular: "مليار", dual: "ملياران", plural: "مليارات", pluralUpTo: 10 },
        { divisor: 1_000_000n, singular: "مليون", dual: "مليونان", plural: "ملايين", pluralUpTo: 10 },
        { divisor: 1_000n, singular: "ألف", dual: "ألفان", plural: "آلاف", pluralUpTo: 10 },
    ],
    zero: "صفر",
    minus: "سالب",
    conjunction: "و",
};

export const WORD_TABLES: Readonly<Record<Exclude<LanguageCode, "en">, LanguageWordTable>> = Object.freeze({
    es: SPANISH,
    ar: ARABIC,
});

export function resolveLanguage(raw: string): ConversionResult<LanguageCode> {
    const v = raw.trim().toLowerCase();
    const hit = LANGUAGES.find((l) => l.aliases.includes(v));
    return hit ? ok(hit.code) : fail(unsupportedLanguage(raw));
}
