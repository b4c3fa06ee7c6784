// backend/services/numberWords/errors.ts

export type ConversionError =
    | { kind: "ValueTooLarge"; value: string }
    | { kind: "InvalidInput"; message: string }
    | { kind: "ConversionError"; context: string; cause: ConversionError };

export type ConversionErrorKind = ConversionError["kind"];

export type ConversionResult<T> =
    | { ok: true; value: T }
    | { ok: false; error: ConversionError };

export function ok<T>(value: T): ConversionResult<T> {
    return { ok: true, value };
}

export function fail<T>(error: ConversionError): ConversionResult<T> {
    return { ok: false, error };
}

export function valueTooLarge(value: bigint | number): ConversionError {
    return { kind: "ValueTooLarge", value: String(value) };
}

export function invalidInput(message: string): ConversionError {
    return { kind: "InvalidInput", message };
}

export function unsupportedLanguage(code: string): ConversionError {
    return invalidInput(`Unsupported language: ${code}`);
}

export function wrapError(context: string, cause: ConversionError): ConversionError {
    return { kind: "ConversionError", context, cause };
}

export function describeError(error: ConversionError): string {
    switch (error.kind) {
        case "ValueTooLarge":
            return `Value too large: ${error.value}`;
        case "InvalidInput":
            return `Invalid input: ${error.message}`;
        case "ConversionError":
            return `${error.context}: ${describeError(error.cause)}`;
    }
}

/** Innermost error of a wrapped chain. */
export function rootCause(error: ConversionError): ConversionError {
    return error.kind === "ConversionError" ? rootCause(error.cause) : error;
}
