import { setTimeout as delay } from "node:timers/promises";
import type { ChalkInstance } from "chalk";
import type {
  LanguageDescriptor,
  LanguageRunRecord,
  PipelineEvent,
  PipelineSummary,
  StageTimings,
} from "../types/pipeline.js";
import { formatCommand, formatSeconds, preview } from "../utils/format.js";
import { createPalette, type LineWriter, type ReporterOptions } from "./palette.js";

export interface AnimatedReporterOptions extends ReporterOptions {
  revealDelayMs: number;
  stepDelayMs: number;
  previewChars: number;
}

export const STEPS = [
  { title: "Step 1 • Code Walkthrough", caption: "Revealing each language line-by-line with helpful notes." },
  { title: "Step 2 • Compilation", caption: "Writing files and compiling each language." },
  { title: "Step 3 • Execution", caption: "Running each hello-world and capturing the output." },
  { title: "Step 4 • Performance Metrics", caption: "Time spent writing, compiling, and running each language." },
] as const;

type Cell = string;

/** Sum of the compile_N entries, or undefined when no compile step ran. */
export function compileSeconds(timings: StageTimings): number | undefined {
  let total: number | undefined;
  for (const [key, value] of Object.entries(timings)) {
    if (key.startsWith("compile_") && typeof value === "number") {
      total = (total ?? 0) + value;
    }
  }
  return total;
}

function cell(seconds: number | undefined): Cell {
  return seconds === undefined ? "-" : formatSeconds(seconds);
}

/**
 * Four-step terminal presentation. Steps 1 and 2 render live; execution results are
 * held back and replayed in step 3 so the steps stay in order on screen.
 */
export class AnimatedReporter {
  private readonly write: LineWriter;
  private readonly c: ChalkInstance;
  private readonly options: AnimatedReporterOptions;
  private current: LanguageDescriptor | undefined;

  constructor(options: AnimatedReporterOptions) {
    this.options = options;
    this.write = options.write ?? ((line) => console.log(line));
    this.c = createPalette(options.color);
  }

  private async pause(ms: number): Promise<void> {
    if (ms > 0) await delay(ms);
  }

  private step(n: 1 | 2 | 3 | 4): void {
    const { title, caption } = STEPS[n - 1];
    this.write("");
    this.write(this.c.bold.white.bgBlue(` ${title} `));
    this.write(this.c.dim(caption));
  }

  private label(descriptor: LanguageDescriptor): string {
    return this.c[descriptor.color].bold(descriptor.name);
  }

  async revealSources(descriptors: readonly LanguageDescriptor[]): Promise<void> {
    this.step(1);
    for (const descriptor of descriptors) {
      this.write("");
      this.write(`${this.label(descriptor)} ${this.c.dim(descriptor.sourceFilename)}`);
      const width = String(descriptor.sourceLines.length).length;
      for (const [i, line] of descriptor.sourceLines.entries()) {
        this.write(`${this.c.dim(`${String(i + 1).padStart(width)} │`)} ${line}`);
        await this.pause(this.options.revealDelayMs);
      }
      this.write(`  ✅ Source ready (${descriptor.sourceLines.length} lines)`);
    }
    await this.pause(this.options.stepDelayMs);
    this.step(2);
  }

  readonly onEvent = (event: PipelineEvent): void => {
    switch (event.type) {
      case "language_start":
        this.current = event.descriptor;
        this.write("");
        this.write(`📦 ${this.label(event.descriptor)}`);
        break;
      case "stage_start":
        if (event.stage.startsWith("compile_") && this.current) {
          const n = Number(event.stage.slice("compile_".length));
          const of = this.current.compileSteps.length;
          this.write(`  ⚙️  Compiling (${n}/${of}): ${formatCommand(event.command)}`);
        }
        break;
      case "stage_done": {
        const { result } = event;
        if (event.stage === "write") {
          this.write(
            result.succeeded
              ? `  🗂️  Source written (${formatSeconds(result.elapsedSeconds)})`
              : this.c.red(`  ❌ Write failed: ${preview(result.stderr, this.options.previewChars)}`)
          );
          if (result.succeeded && this.current?.compileSteps.length === 0) {
            this.write("  ✅ Ready to interpret");
          }
        } else if (event.stage !== "run") {
          if (!result.succeeded) {
            const message = preview(result.stderr || result.stdout, this.options.previewChars);
            this.write(this.c.red(`  ❌ Compilation error: ${message}`));
          }
        }
        break;
      }
      case "language_done": {
        const { record } = event;
        const attempted = record.compileResults.length;
        if (attempted > 0 && record.compileResults.every((r) => r.succeeded)) {
          this.write(`  ✅ Compilation complete (${cell(compileSeconds(record.timings))})`);
        }
        break;
      }
    }
  };

  async showExecution(records: readonly LanguageRunRecord[]): Promise<void> {
    await this.pause(this.options.stepDelayMs);
    this.step(3);
    for (const record of records) {
      const name = this.label(record.descriptor);
      const run = record.runResult;
      if (!run) {
        this.write(`${name}  ⛔ Skipped due to earlier error`);
        continue;
      }
      this.write(`${name}  🚀 ${formatCommand(run.command)}`);
      if (run.succeeded) {
        this.write(`  ✅ Execution succeeded (${formatSeconds(run.elapsedSeconds)})`);
        this.write(this.c.green(`  stdout: ${preview(run.stdout, this.options.previewChars) || "<no output>"}`));
      } else {
        const message = preview(run.stderr || run.stdout, this.options.previewChars) || "Execution failed";
        this.write(this.c.red(`  ❌ Execution error: ${message}`));
      }
      await this.pause(this.options.stepDelayMs);
    }
  }

  showMetrics(records: readonly LanguageRunRecord[], summary: PipelineSummary): void {
    this.step(4);
    const header: Cell[] = ["Language", "Write", "Compile", "Run", "Total", "Status"];
    const rows: Cell[][] = records.map((r) => [
      r.descriptor.name,
      cell(r.timings.write),
      cell(compileSeconds(r.timings)),
      cell(r.timings.run),
      formatSeconds(r.timings.total),
      r.failed ? "failed" : "ok",
    ]);
    const widths = header.map((h, i) => Math.max(h.length, ...rows.map((row) => row[i].length)));
    const line = (row: Cell[]): string => row.map((v, i) => v.padEnd(widths[i])).join("  ").trimEnd();

    this.write(this.c.bold(line(header)));
    this.write(widths.map((w) => "─".repeat(w)).join("  "));
    for (const row of rows) this.write(line(row));
    this.write("");
    this.write(`🏁 Done! Succeeded: ${summary.succeeded}/${summary.total}`);
  }
}
