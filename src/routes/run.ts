import { Router, Request, Response } from "express";
import { z } from "zod";
import type { LanguageDescriptor, PipelineEvent } from "../types/pipeline.js";
import { LanguageCatalogError, selectLanguages } from "../services/languages.js";
import { runSession, type SessionOptions } from "../services/orchestrator.js";
import { WorkspaceError } from "../services/workspace.js";
import { toRecordView, toWireEvent, type WireEvent } from "../utils/responseFormatter.js";

const runRequestBodySchema = z.object({
  languages: z.array(z.string().min(1)).optional(),
});

const streamQuerySchema = z.object({
  languages: z
    .string()
    .optional()
    .transform((v) => (v ? v.split(",").map((s) => s.trim()).filter(Boolean) : undefined)),
});

export type RunRouteOptions = Omit<SessionOptions, "onEvent" | "beforeRun">;

/**
 * One pipeline run at a time: the workspace is shared, so a second request gets 409.
 */
export function createRunRouter(catalog: readonly LanguageDescriptor[], options: RunRouteOptions): Router {
  const router = Router();
  let running = false;

  function pick(names: string[] | undefined, res: Response): readonly LanguageDescriptor[] | null {
    try {
      return selectLanguages(catalog, names);
    } catch (err) {
      if (err instanceof LanguageCatalogError) {
        res.status(400).json({ error: err.message });
      } else {
        console.error("Language selection error:", err);
        res.status(500).json({ error: "Internal server error" });
      }
      return null;
    }
  }

  router.post("/api/run", async (req: Request, res: Response): Promise<void> => {
    const parsed = runRequestBodySchema.safeParse(req.body ?? {});
    if (!parsed.success) {
      res.status(400).json({ error: "Invalid request", details: parsed.error.flatten() });
      return;
    }
    const languages = pick(parsed.data.languages, res);
    if (!languages) return;

    if (running) {
      res.status(409).json({ error: "A run is already in progress" });
      return;
    }

    running = true;
    try {
      const session = await runSession(languages, options);
      res.json({
        records: session.records.map(toRecordView),
        summary: session.summary,
        elapsedSeconds: session.elapsedSeconds,
      });
    } catch (err) {
      if (err instanceof WorkspaceError) {
        console.error("Workspace error:", err.message);
        res.status(500).json({ error: err.message });
        return;
      }
      console.error("Run error:", err);
      res.status(500).json({ error: "Internal server error" });
    } finally {
      running = false;
    }
  });

  router.get("/api/run/stream", async (req: Request, res: Response): Promise<void> => {
    const parsed = streamQuerySchema.safeParse(req.query);
    if (!parsed.success) {
      res.status(400).json({ error: "Invalid request", details: parsed.error.flatten() });
      return;
    }
    const languages = pick(parsed.data.languages, res);
    if (!languages) return;

    if (running) {
      res.status(409).json({ error: "A run is already in progress" });
      return;
    }

    res.setHeader("Content-Type", "text/event-stream");
    res.setHeader("Cache-Control", "no-cache");
    res.setHeader("Connection", "keep-alive");
    res.setHeader("X-Accel-Buffering", "no");
    res.flushHeaders();

    // The pipeline has no cancellation; a client that leaves just stops receiving frames.
    const send = (event: WireEvent): void => {
      if (!res.writableEnded && !res.destroyed) {
        res.write(`data: ${JSON.stringify(event)}\n\n`);
      }
    };

    running = true;
    try {
      const session = await runSession(languages, {
        ...options,
        onEvent: (event: PipelineEvent) => send(toWireEvent(event)),
      });
      send({ type: "done", summary: session.summary });
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      console.error("Stream run failed:", message);
      if (!res.writableEnded && !res.destroyed) {
        res.write(`event: error\ndata: ${JSON.stringify({ error: message })}\n\n`);
      }
    } finally {
      running = false;
      res.end();
    }
  });

  return router;
}
