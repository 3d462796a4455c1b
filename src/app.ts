import express, { Express, Request, Response, NextFunction } from "express";
import { AppConfig } from "./config/app.config";
import { SourceReadError } from "./errors/source-read.error";
import { mergeRouter } from "./routes/merge.route";

function _clientStatus(err: unknown): number | undefined {
    if (typeof err !== "object" || err === null || !("status" in err)) return undefined;
    const { status } = err;
    return typeof status === "number" && status >= 400 && status < 500 ? status : undefined;
}

export function createApp(config: AppConfig): Express {
    const app = express();

    app.use(express.json({ limit: config.bodyLimit }));
    app.use(mergeRouter(config));

    app.get("/health", (_req, res) => res.json({ status: "ok" }));

    // Global error handler — MUST be last middleware
    app.use((err: Error, _req: Request, res: Response, _next: NextFunction) => {
        if (err instanceof SourceReadError) {
            console.warn("[ERROR]", err.message);
            res.status(err.status).json({ error: err.message });
            return;
        }

        // Body-parser failures (malformed JSON, payload too large) carry a 4xx status.
        const status = _clientStatus(err);
        if (status !== undefined) {
            res.status(status).json({ error: err.message });
            return;
        }

        console.error("[ERROR]", err.stack);
        res.status(500).json({ error: "Internal server error" });
    });

    return app;
}
