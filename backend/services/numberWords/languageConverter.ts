// backend/services/numberWords/languageConverter.ts
import { numberToText } from "./englishConverter.js";
import type { ConversionResult } from "./errors.js";
import { fail, ok, wrapError } from "./errors.js";
import type { IntegerInput } from "./int64.js";
import { magnitudeOf } from "./int64.js";
import type { LanguageWordTable } from "./languageTables.js";
import { WORD_TABLES, resolveLanguage } from "./languageTables.js";
import { findScale } from "./scaleTable.js";

function capitalize(word: string): string {
    return word.charAt(0).toUpperCase() + word.slice(1);
}

// Arabic links every group to the previous one; the default grammar only
// links tens and units.
function joinGroups(groups: string[][], conjunction: string): string[] {
    const out: string[] = [];
    for (const group of groups) {
        if (out.length > 0 && conjunction) out.push(conjunction);
        out.push(...group);
    }
    return out;
}

function groupConjunction(table: LanguageWordTable): string {
    return table.grammar === "arabic" ? table.conjunction : "";
}

function hundredsWord(hundreds: number, hasRemainder: boolean, table: LanguageWordTable): string {
    const forms = table.hundreds;
    if (hundreds === 1) return hasRemainder ? forms.withRemainder : forms.exact;
    if (hundreds === 2 && forms.two) return forms.two;

    const irregular = forms.irregular[hundreds];
    if (irregular) return irregular;

    const unit = table.units[hundreds];
    if (table.grammar === "arabic") {
        // ثلاثة -> ثلاثمائة
        return unit.replace(/ة$/, "") + forms.suffix;
    }
    return capitalize(unit.toLowerCase() + forms.suffix);
}

function tensAndUnits(value: number, table: LanguageWordTable): string[] {
    if (value === 0) return [];
    if (value < 20) return [table.units[value]];

    const tens = table.tens[Math.floor(value / 10)];
    const units = value % 10;
    if (units === 0) return [tens];

    const pair = table.grammar === "arabic" ? [[table.units[units]], [tens]] : [[tens], [table.units[units]]];
    return joinGroups(pair, table.conjunction);
}

function belowThousand(value: number, table: LanguageWordTable): string[][] {
    const groups: string[][] = [];
    const hundreds = Math.floor(value / 100);
    const rest = value % 100;

    if (hundreds > 0) groups.push([hundredsWord(hundreds, rest > 0, table)]);
    if (rest > 0) groups.push(tensAndUnits(rest, table));
    return groups;
}

function renderGroups(value: bigint, table: LanguageWordTable): ConversionResult<string[][]> {
    const scale = findScale(value, table.scales);
    if (!scale) return ok(belowThousand(Number(value), table));

    const quotient = value / scale.divisor;
    const remainder = value % scale.divisor;
    const groups: string[][] = [];

    if (quotient === 1n) {
        groups.push([scale.singular]);
    } else if (quotient === 2n && scale.dual) {
        groups.push([scale.dual]);
    } else {
        const head = renderWords(quotient, table);
        if (!head.ok) return fail(wrapError(`Rendering ${scale.singular} group`, head.error));
        const useSingular = scale.pluralUpTo !== undefined && quotient > BigInt(scale.pluralUpTo);
        groups.push([...head.value, useSingular ? scale.singular : scale.plural]);
    }

    if (remainder > 0n) {
        const tail = renderGroups(remainder, table);
        if (!tail.ok) return tail;
        groups.push(...tail.value);
    }

    return ok(groups);
}

function renderWords(value: bigint, table: LanguageWordTable): ConversionResult<string[]> {
    const groups = renderGroups(value, table);
    if (!groups.ok) return groups;
    return ok(joinGroups(groups.value, groupConjunction(table)));
}

export function numberToTextLang(n: IntegerInput, lang: string): ConversionResult<string> {
    const code = resolveLanguage(lang);
    if (!code.ok) return code;
    if (code.value === "en") return numberToText(n);

    const table = WORD_TABLES[code.value];

    const magnitude = magnitudeOf(n);
    if (!magnitude.ok) return magnitude;

    const { negative, abs } = magnitude.value;
    if (abs === 0n) return ok(table.zero);

    const words = renderWords(abs, table);
    if (!words.ok) return words;

    return ok((negative ? [table.minus, ...words.value] : words.value).join(" "));
}
