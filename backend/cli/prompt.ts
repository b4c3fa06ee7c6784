// backend/cli/prompt.ts
import { createInterface } from "node:readline";
import { appConfig } from "../config/appConfig.js";
import { describeError } from "../services/numberWords/index.js";
import type { CliOptions } from "./options.js";
import { convertValue } from "./options.js";

export type PromptIo = {
    input: NodeJS.ReadableStream;
    output: NodeJS.WritableStream;
    errorOutput: NodeJS.WritableStream;
};

function writeLine(stream: NodeJS.WritableStream, text: string) {
    stream.write(`${text}\n`);
}

/**
 * Reads one number per line until the input ends. A conversion error is
 * reported and the loop waits for the next line without prompting again.
 */
export async function runPrompt(io: PromptIo, options: CliOptions): Promise<void> {
    const { banner, firstPrompt, nextPrompt } = appConfig.cli;

    for (const line of banner) writeLine(io.output, line);
    writeLine(io.output, firstPrompt);

    const rl = createInterface({ input: io.input, terminal: false });

    for await (const raw of rl) {
        const line = raw.trim();
        if (!line) continue;

        const result = convertValue(line, options, appConfig.conversion.defaultLanguage);
        if (!result.ok) {
            writeLine(io.errorOutput, `Error: ${describeError(result.error)}`);
            continue;
        }

        writeLine(io.output, `Result: ${result.value}`);
        writeLine(io.output, "");
        writeLine(io.output, nextPrompt);
    }
}
