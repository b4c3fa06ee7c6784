// backend/config/appConfig.ts
import { env } from "./env.js";

export const appConfig = Object.freeze({
    server: {
        port: env.PORT,
        corsOrigin: env.CORS_ORIGIN,
    },

    conversion: {
        defaultLanguage: env.DEFAULT_LANGUAGE,
    },

    cli: {
        banner: ["Number to Text Converter", "------------------------"],
        firstPrompt: "Enter a number to convert to text (press Ctrl+C to exit):",
        nextPrompt: "Enter another number (press Ctrl+C to exit):",
    },
});

export type AppConfig = typeof appConfig;
