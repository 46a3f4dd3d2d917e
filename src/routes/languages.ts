import { Router, Request, Response } from "express";
import type { LanguageDescriptor } from "../types/pipeline.js";
import { sourceText } from "../services/languages.js";
import { formatCommand } from "../utils/format.js";

export function createLanguagesRouter(languages: readonly LanguageDescriptor[]): Router {
  const router = Router();

  router.get("/api/languages", (_req: Request, res: Response): void => {
    res.json(
      languages.map((lang) => ({
        name: lang.name,
        filename: lang.sourceFilename,
        syntax: lang.syntax,
        color: lang.color,
        source: sourceText(lang),
        compile: lang.compileSteps.map(formatCommand),
        run: formatCommand(lang.runCommand),
      }))
    );
  });

  return router;
}
