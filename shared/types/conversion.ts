// shared/types/conversion.ts

export const CONVERSION_MODES = ["cardinal", "ordinal", "currency", "roman", "language"] as const;

export type ConversionMode = (typeof CONVERSION_MODES)[number];

export type ConvertRequest =
    | { value: string; mode: Exclude<ConversionMode, "language"> }
    | { value: string; mode: "language"; lang: string };

export type ConvertErrorBody = {
    kind: "ValueTooLarge" | "InvalidInput" | "ConversionError";
    message: string;
};

export type ConvertResponse = { result: string } | { error: ConvertErrorBody };
