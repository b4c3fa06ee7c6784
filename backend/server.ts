// backend/server.ts
import { createServer } from "node:http";
import { appConfig } from "./config/appConfig.js";
import { createApp } from "./http/app.js";

async function bootstrap() {
    const app = createApp({
        corsOrigin: appConfig.server.corsOrigin,
        defaultLanguage: appConfig.conversion.defaultLanguage,
    });

    const server = createServer(app);
    const port = appConfig.server.port;

    await new Promise<void>((resolve, reject) => {
        server.once("error", reject);
        server.listen(port, () => {
            console.log(`[http] listening on :${port}`);
            resolve();
        });
    });
}

bootstrap().catch((err) => {
    console.error("Server bootstrap failed:", err);
    process.exit(1);
});
