// backend/cli/run.ts
import { appConfig } from "../config/appConfig.js";
import { describeError } from "../services/numberWords/index.js";
import { convertValue, parseCliArgs } from "./options.js";
import type { PromptIo } from "./prompt.js";
import { runPrompt } from "./prompt.js";

/**
 * One-shot conversion when argv carries a value, the line prompt otherwise.
 * Resolves to the process exit code: 0 ok, 1 conversion error, 2 usage error.
 */
export async function runCli(argv: readonly string[], io: PromptIo): Promise<number> {
    const options = parseCliArgs(argv);
    if (!options.ok) {
        io.errorOutput.write(`Error: ${describeError(options.error)}\n`);
        return 2;
    }

    const { value } = options.value;
    if (value === undefined) {
        await runPrompt(io, options.value);
        return 0;
    }

    const result = convertValue(value, options.value, appConfig.conversion.defaultLanguage);
    if (!result.ok) {
        io.errorOutput.write(`Error: ${describeError(result.error)}\n`);
        return 1;
    }

    io.output.write(`Result: ${result.value}\n`);
    return 0;
}
