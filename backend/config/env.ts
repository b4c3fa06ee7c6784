// backend/config/env.ts
import "dotenv/config";

function optionalEnv(name: string, fallback: string): string {
    return process.env[name] ?? fallback;
}

function optionalNumber(name: string, fallback: number): number {
    const v = process.env[name];
    if (!v) return fallback;
    const n = Number(v);
    if (!Number.isFinite(n)) {
        throw new Error(`Environment variable ${name} must be a number`);
    }
    return n;
}

export const env = Object.freeze({
    PORT: optionalNumber("PORT", 3002),
    CORS_ORIGIN: optionalEnv("CORS_ORIGIN", "http://localhost:5173"),
    DEFAULT_LANGUAGE: optionalEnv("DEFAULT_LANGUAGE", "en"),
});
