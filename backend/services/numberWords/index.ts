// backend/services/numberWords/index.ts
export type { ConversionError, ConversionErrorKind, ConversionResult } from "./errors.js";
export { describeError, rootCause } from "./errors.js";
export type { IntegerInput } from "./int64.js";
export { HALF_INT64, INT64_MAX, INT64_MIN } from "./int64.js";
export type { ScaleUnit } from "./scaleTable.js";
export { SCALE_UNITS } from "./scaleTable.js";
export { numberToText, renderSmall } from "./englishConverter.js";
export type { LanguageCode, LanguageInfo, LanguageWordTable } from "./languageTables.js";
export { LANGUAGES, WORD_TABLES, resolveLanguage } from "./languageTables.js";
export { numberToTextLang } from "./languageConverter.js";
export { decimalToText, ordinalSuffix, toCurrency, toOrdinal } from "./formatters.js";
export { toRoman } from "./roman.js";
export type { NumericInput } from "./convert.js";
export { convert, parseNumericInput } from "./convert.js";
export { convertRequestSchema, parseConvertRequest } from "./requestSchema.js";
