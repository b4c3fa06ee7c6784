// backend/http/app.ts
import express from "express";
import cors from "cors";
import bodyParser from "body-parser";
import type { Application, NextFunction, Request, Response } from "express";
import type { ConvertResponse } from "../../shared/types/conversion.js";
import { describeError } from "../services/numberWords/index.js";
import { invalidInput } from "../services/numberWords/errors.js";
import { registerConvertRoutes } from "./convertRoutes.js";

export type AppOptions = {
    corsOrigin: string;
    defaultLanguage: string;
};

// body-parser tags unreadable JSON bodies with this type.
function isBodyParseError(err: unknown): boolean {
    return typeof err === "object" && err !== null && "type" in err && err.type === "entity.parse.failed";
}

function handleAppError(err: unknown, req: Request, res: Response, _next: NextFunction) {
    if (isBodyParseError(err)) {
        const error = invalidInput("request body is not valid JSON");
        const body: ConvertResponse = { error: { kind: error.kind, message: describeError(error) } };
        return res.status(400).json(body);
    }

    console.error(`${req.method} ${req.path} failed:`, err);
    return res.status(500).json({ error: "Request failed" });
}

export function createApp(options: AppOptions): Application {
    const app = express();

    app.use(
        cors({
            origin: options.corsOrigin,
            methods: ["GET", "POST", "OPTIONS"],
            allowedHeaders: ["Content-Type"],
        })
    );

    app.use(bodyParser.json());

    registerConvertRoutes(app, { defaultLanguage: options.defaultLanguage });

    app.use(handleAppError);

    return app;
}
