import express from "express";
import cors from "cors";
import { fileURLToPath } from "node:url";
import type { Express } from "express";
import type { LanguageDescriptor } from "./types/pipeline.js";
import { createLanguagesRouter } from "./routes/languages.js";
import { createRunRouter, type RunRouteOptions } from "./routes/run.js";

/** Browser page that renders the catalog and consumes `/api/run/stream`. */
export const PUBLIC_DIR = fileURLToPath(new URL("../public", import.meta.url));

export interface AppOptions extends RunRouteOptions {
  languages: readonly LanguageDescriptor[];
}

export function createApp(options: AppOptions): Express {
  const { languages, ...runOptions } = options;
  const app = express();

  app.use(cors());
  app.use(express.json({ limit: "16kb", strict: true }));

  app.use(express.static(PUBLIC_DIR));
  app.use(createLanguagesRouter(languages));
  app.use(createRunRouter(languages, runOptions));

  app.use((_req, res) => {
    res.status(404).json({ error: "Not found" });
  });

  app.use((err: unknown, _req: express.Request, res: express.Response, _next: express.NextFunction) => {
    // body-parser rejections (malformed JSON, oversized body) carry a 4xx status
    if (typeof err === "object" && err !== null && "status" in err && typeof err.status === "number" && err.status < 500) {
      res.status(err.status).json({ error: "Invalid request body" });
      return;
    }
    console.error("Unhandled error:", err);
    res.status(500).json({ error: "Internal server error" });
  });

  return app;
}

export function start(options: AppOptions, port: number): void {
  createApp(options).listen(port, () => {
    console.log(`Hello orchestrator listening on http://localhost:${port}`);
  });
}
