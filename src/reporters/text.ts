import type { ChalkInstance } from "chalk";
import type { LanguageDescriptor, PipelineEvent, PipelineSummary } from "../types/pipeline.js";
import { formatCommand, formatSeconds } from "../utils/format.js";
import { centerPad, createPalette, type LineWriter, type ReporterOptions } from "./palette.js";

const TITLE = "Multi-language Hello World Orchestrator";
const BANNER_WIDTH = 60;

/**
 * Plain sequential log: one banner per language, one line per stage, captured output indented below it.
 */
export class TextReporter {
  private readonly write: LineWriter;
  private readonly c: ChalkInstance;
  private current: LanguageDescriptor | undefined;

  constructor(options: ReporterOptions = {}) {
    this.write = options.write ?? ((line) => console.log(line));
    this.c = createPalette(options.color);
  }

  header(workspace: string): void {
    const underline = "=".repeat(TITLE.length);
    this.write(underline);
    this.write(this.c.bold(TITLE));
    this.write(underline);
    this.write(`Workspace: ${workspace}`);
  }

  readonly onEvent = (event: PipelineEvent): void => {
    switch (event.type) {
      case "language_start":
        this.current = event.descriptor;
        this.write("");
        this.write(centerPad(` ${event.language} `, BANNER_WIDTH, "-"));
        break;
      case "stage_start":
        if (event.stage === "run" && this.current?.compileSteps.length === 0) {
          this.write("  [compile] not required");
        }
        break;
      case "stage_done": {
        const { result } = event;
        const label = event.stage === "write" ? "create" : event.stage === "run" ? "run" : "compile";
        const what = event.stage === "write" ? result.command.slice(1).join(" ") : formatCommand(result.command);
        const tag = result.succeeded ? `[${label}]` : this.c.red(`[${label} FAILED]`);
        this.write(`  ${tag} ${what} (${formatSeconds(result.elapsedSeconds)})`);
        if (event.stage === "write") {
          if (!result.succeeded) this.write(`    error: ${result.stderr.trim()}`);
          break;
        }
        if (event.stage === "run" || result.stdout) this.stream("stdout", result.stdout);
        if (result.stderr) this.stream("stderr", result.stderr);
        break;
      }
      case "language_done": {
        const { record } = event;
        const compileFailed = record.compileResults.some((r) => !r.succeeded);
        if (compileFailed) this.write("  [run] skipped due to compilation failure");
        break;
      }
    }
  };

  footer(summary: PipelineSummary, elapsedSeconds: number, workspace: string, cleanup: boolean | "skipped"): void {
    const status = cleanup === "skipped" ? "kept" : cleanup ? "ok" : "failed";
    this.write("");
    this.write(`Succeeded: ${summary.succeeded}/${summary.total}`);
    this.write(`Total elapsed time: ${formatSeconds(elapsedSeconds)}`);
    this.write(`Workspace cleanup (${workspace}): ${status}`);
  }

  private stream(label: string, data: string): void {
    if (!data.trim()) {
      this.write(`    ${label}: <empty>`);
      return;
    }
    this.write(`    ${label}:`);
    for (const line of data.trimEnd().split("\n")) {
      this.write(`      ${line}`);
    }
  }
}
