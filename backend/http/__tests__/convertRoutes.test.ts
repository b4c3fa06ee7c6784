import type { Server } from "node:http";
import { afterAll, beforeAll, describe, expect, it } from "vitest";
import { createApp } from "../app.js";

let server: Server;
let baseUrl = "";

beforeAll(async () => {
    const app = createApp({ corsOrigin: "http://localhost:5173", defaultLanguage: "es" });
    server = await new Promise<Server>((resolve) => {
        const s = app.listen(0, "127.0.0.1", () => resolve(s));
    });

    const address = server.address();
    if (!address || typeof address === "string") throw new Error("server has no port");
    baseUrl = `http://127.0.0.1:${address.port}`;
});

afterAll(async () => {
    await new Promise<void>((resolve, reject) => {
        server.close((err) => (err ? reject(err) : resolve()));
    });
});

async function getJson(path: string) {
    const res = await fetch(`${baseUrl}${path}`);
    const body: unknown = await res.json();
    return { status: res.status, body };
}

describe("GET /api/convert", () => {
    it("converts a cardinal by default", async () => {
        expect(await getJson("/api/convert?value=42")).toEqual({
            status: 200,
            body: { result: "Forty Two" },
        });
    });

    it("infers language mode from lang", async () => {
        expect(await getJson("/api/convert?value=21&lang=ar")).toEqual({
            status: 200,
            body: { result: "واحد و عشرون" },
        });
    });

    it("uses the configured default language", async () => {
        expect(await getJson("/api/convert?value=21&mode=language")).toEqual({
            status: 200,
            body: { result: "Veinte y Uno" },
        });
    });

    it("reports conversion errors as 400", async () => {
        expect(await getJson("/api/convert?value=0&mode=roman")).toEqual({
            status: 400,
            body: {
                error: { kind: "InvalidInput", message: "Invalid input: Roman numerals cover 1..3999, got 0" },
            },
        });
    });

    it("explains a repeated value parameter", async () => {
        expect(await getJson("/api/convert?value=1&value=2")).toEqual({
            status: 400,
            body: {
                error: { kind: "InvalidInput", message: "Invalid input: value: value must be a string or number" },
            },
        });
    });

    it("reports a missing value as 400", async () => {
        const { status, body } = await getJson("/api/convert");
        expect(status).toBe(400);
        expect(body).toMatchObject({ error: { kind: "InvalidInput" } });
    });
});

describe("POST /api/convert", () => {
    it("reads the JSON body", async () => {
        const res = await fetch(`${baseUrl}/api/convert`, {
            method: "POST",
            headers: { "Content-Type": "application/json" },
            body: JSON.stringify({ value: 2.45, mode: "currency" }),
        });

        expect(res.status).toBe(200);
        expect(await res.json()).toEqual({ result: "Two Dollars and Forty Five Cents" });
    });

    it("answers malformed JSON with the JSON error body", async () => {
        const res = await fetch(`${baseUrl}/api/convert`, {
            method: "POST",
            headers: { "Content-Type": "application/json" },
            body: "{ value: ",
        });

        expect(res.status).toBe(400);
        expect(res.headers.get("content-type")).toMatch(/^application\/json/);
        expect(await res.json()).toEqual({
            error: { kind: "InvalidInput", message: "Invalid input: request body is not valid JSON" },
        });
    });
});

describe("GET /api/languages", () => {
    it("lists the supported languages", async () => {
        const { status, body } = await getJson("/api/languages");
        expect(status).toBe(200);
        expect(body).toMatchObject({ languages: [{ code: "en" }, { code: "es" }, { code: "ar" }] });
    });
});
