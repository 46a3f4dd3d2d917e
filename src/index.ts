#!/usr/bin/env node
/**
 * Hello Orchestrator
 *
 * Writes Hello World in four languages, compiles and runs each one, and reports how long every stage took.
 * A language that fails never stops the others; only a workspace that cannot be created ends the run early.
 */

import { realpathSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { config } from "./config.js";
import { CliUsageError, parseCliArgs, usage, type CliOptions } from "./cli.js";
import { LanguageCatalogError, loadLanguages, selectLanguages } from "./services/languages.js";
import { runSession } from "./services/orchestrator.js";
import { WorkspaceError } from "./services/workspace.js";
import { AnimatedReporter } from "./reporters/animated.js";
import { TextReporter } from "./reporters/text.js";
import { start } from "./app.js";
import type { LanguageDescriptor } from "./types/pipeline.js";

const VERSION = "1.0.0";

async function runText(languages: readonly LanguageDescriptor[], workDir: string, keep: boolean): Promise<void> {
  const reporter = new TextReporter();
  const session = await runSession(languages, {
    workDir,
    keepWorkspace: keep,
    beforeRun: (workspace) => reporter.header(workspace),
    onEvent: reporter.onEvent,
  });
  reporter.footer(session.summary, session.elapsedSeconds, session.workspace, session.cleanup);
}

async function runAnimated(languages: readonly LanguageDescriptor[], workDir: string, keep: boolean): Promise<void> {
  const reporter = new AnimatedReporter({
    revealDelayMs: config.REVEAL_DELAY_MS,
    stepDelayMs: config.STEP_DELAY_MS,
    previewChars: config.OUTPUT_PREVIEW_CHARS,
  });
  const session = await runSession(languages, {
    workDir,
    keepWorkspace: keep,
    beforeRun: () => reporter.revealSources(languages),
    onEvent: reporter.onEvent,
  });
  await reporter.showExecution(session.records);
  reporter.showMetrics(session.records, session.summary);
  console.log("");
  console.log(`Total elapsed time: ${session.elapsedSeconds.toFixed(3)}s`);
  if (session.cleanup === false) {
    console.log(`⚠️  Failed to delete workspace: ${session.workspace}`);
  }
}

export async function main(argv: readonly string[]): Promise<number> {
  let options: CliOptions;
  try {
    options = parseCliArgs(argv);
  } catch (err) {
    if (err instanceof CliUsageError) {
      console.error(err.message);
      console.error("Run with --help for usage.");
      return 2;
    }
    throw err;
  }

  if (options.help) {
    console.log(usage(VERSION));
    return 0;
  }
  if (options.version) {
    console.log(`Hello Orchestrator v${VERSION}`);
    return 0;
  }

  const workDir = options.workspace ?? config.WORK_DIR;
  const keep = options.keep || config.KEEP_WORKSPACE;

  try {
    const languages = selectLanguages(loadLanguages(config.LANGUAGES_FILE), options.only);

    switch (options.mode) {
      case "serve":
        start({ languages, workDir, keepWorkspace: keep }, config.PORT);
        return 0;
      case "text":
        await runText(languages, workDir, keep);
        return 0;
      case "animated":
        await runAnimated(languages, workDir, keep);
        return 0;
    }
  } catch (err) {
    if (err instanceof WorkspaceError || err instanceof LanguageCatalogError) {
      console.error(`Fatal: ${err.message}`);
      return 1;
    }
    throw err;
  }
}

const entry = process.argv[1];
if (entry && realpathSync(entry) === fileURLToPath(import.meta.url)) {
  main(process.argv.slice(2))
    .then((code) => {
      if (code !== 0) process.exit(code);
    })
    .catch((err: unknown) => {
      console.error("Fatal:", err);
      process.exit(1);
    });
}
