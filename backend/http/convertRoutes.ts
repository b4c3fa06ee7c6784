// backend/http/convertRoutes.ts
import type { Application, Request, Response } from "express";
import type { ConvertErrorBody, ConvertResponse } from "../../shared/types/conversion.js";
import type { ConversionError } from "../services/numberWords/index.js";
import { LANGUAGES, convert, describeError, parseConvertRequest } from "../services/numberWords/index.js";

export type ConvertRouteOptions = {
    defaultLanguage: string;
};

function errorBody(error: ConversionError): ConvertErrorBody {
    return { kind: error.kind, message: describeError(error) };
}

function handleConvert(raw: unknown, options: ConvertRouteOptions): { status: number; body: ConvertResponse } {
    const request = parseConvertRequest(raw, options.defaultLanguage);
    if (!request.ok) return { status: 400, body: { error: errorBody(request.error) } };

    const result = convert(request.value);
    if (!result.ok) return { status: 400, body: { error: errorBody(result.error) } };

    return { status: 200, body: { result: result.value } };
}

export function registerConvertRoutes(app: Application, options: ConvertRouteOptions) {
    app.get("/api/convert", (req: Request, res: Response) => {
        try {
            const { status, body } = handleConvert(req.query, options);
            return res.status(status).json(body);
        } catch (e) {
            console.error("GET /api/convert failed:", e);
            return res.status(500).json({ error: "Failed to convert number" });
        }
    });

    app.post("/api/convert", (req: Request, res: Response) => {
        try {
            const { status, body } = handleConvert(req.body, options);
            return res.status(status).json(body);
        } catch (e) {
            console.error("POST /api/convert failed:", e);
            return res.status(500).json({ error: "Failed to convert number" });
        }
    });

    app.get("/api/languages", (_req: Request, res: Response) => {
        return res.json({ languages: LANGUAGES });
    });
}
