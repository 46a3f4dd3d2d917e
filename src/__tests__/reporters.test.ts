/**
 * Reporter Tests
 *
 * Reporters are fed by a real pipeline run over scripted runners,
 * with colour off so lines can be compared exactly.
 */

import { describe, it, expect } from "vitest";
import { runPipeline, summarize, type PipelineOptions } from "../services/pipeline.js";
import { TextReporter } from "../reporters/text.js";
import { AnimatedReporter, compileSeconds } from "../reporters/animated.js";
import { centerPad } from "../reporters/palette.js";
import { ASSEMBLY, INTERPRETED, descriptor, okWriter, scriptedRunner } from "./mocks.js";

const LANGUAGES = [descriptor(), INTERPRETED, ASSEMBLY];

async function run(onEvent: PipelineOptions["onEvent"]) {
  return runPipeline(LANGUAGES, "/ws", {
    runner: scriptedRunner({ missing: ["nasm"], elapsed: 0.25 }),
    writer: okWriter(0.5),
    onEvent,
  });
}

describe("centerPad", () => {
  it("puts the odd fill character on the right", () => {
    expect(centerPad(" C ", 10, "-")).toBe("--- C ----");
    expect(centerPad("too long", 4, "-")).toBe("too long");
  });
});

describe("TextReporter", () => {
  it("logs every stage of every language", async () => {
    const lines: string[] = [];
    const reporter = new TextReporter({ write: (l) => lines.push(l), color: false });

    reporter.header("/ws");
    const records = await run(reporter.onEvent);
    reporter.footer(summarize(records), 1.5, "/ws", true);

    const rule = "=".repeat("Multi-language Hello World Orchestrator".length);
    expect(lines).toEqual([
      rule,
      "Multi-language Hello World Orchestrator",
      rule,
      "Workspace: /ws",
      "",
      `${"-".repeat(28)} C ${"-".repeat(29)}`,
      "  [create] hello.c (0.500s)",
      "  [compile] gcc hello.c -o hello_c (0.250s)",
      "  [run] ./hello_c (0.250s)",
      "    stdout:",
      "      Hello World",
      "",
      `${"-".repeat(27)} Ruby ${"-".repeat(27)}`,
      "  [create] hello.rb (0.500s)",
      "  [compile] not required",
      "  [run] ruby hello.rb (0.250s)",
      "    stdout:",
      "      Hello World",
      "",
      `${"-".repeat(25)} Assembly ${"-".repeat(25)}`,
      "  [create] hello.asm (0.500s)",
      "  [compile FAILED] nasm -f elf64 hello.asm -o hello.o (0.000s)",
      "    stderr:",
      "      command not found: nasm",
      "  [run] skipped due to compilation failure",
      "",
      "Succeeded: 2/3",
      "Total elapsed time: 1.500s",
      "Workspace cleanup (/ws): ok",
    ]);
  });

  it("marks an empty run output and a kept workspace", async () => {
    const lines: string[] = [];
    const reporter = new TextReporter({ write: (l) => lines.push(l), color: false });
    await runPipeline([INTERPRETED], "/ws", {
      runner: scriptedRunner({ failing: ["ruby"] }),
      writer: okWriter(),
      onEvent: reporter.onEvent,
    });
    reporter.footer({ succeeded: 0, failed: 1, total: 1, totalSeconds: 0.75 }, 0.75, "/ws", "skipped");

    expect(lines).toContain("  [run FAILED] ruby hello.rb (0.250s)");
    expect(lines).toContain("    stdout: <empty>");
    expect(lines).toContain("      ruby: error");
    expect(lines[lines.length - 1]).toBe("Workspace cleanup (/ws): kept");
  });
});

describe("AnimatedReporter", () => {
  const options = { color: false, revealDelayMs: 0, stepDelayMs: 0, previewChars: 200 };

  it("reveals sources with line numbers", async () => {
    const lines: string[] = [];
    const reporter = new AnimatedReporter({ ...options, write: (l) => lines.push(l) });
    await reporter.revealSources([INTERPRETED]);

    expect(lines).toEqual([
      "",
      " Step 1 • Code Walkthrough ",
      "Revealing each language line-by-line with helpful notes.",
      "",
      "Ruby hello.rb",
      '1 │ puts "Hello World"',
      "  ✅ Source ready (1 lines)",
      "",
      " Step 2 • Compilation ",
      "Writing files and compiling each language.",
    ]);
  });

  it("shows compile progress live and replays execution afterwards", async () => {
    const lines: string[] = [];
    const reporter = new AnimatedReporter({ ...options, write: (l) => lines.push(l) });
    const records = await run(reporter.onEvent);

    expect(lines).toEqual([
      "",
      "📦 C",
      "  🗂️  Source written (0.500s)",
      "  ⚙️  Compiling (1/1): gcc hello.c -o hello_c",
      "  ✅ Compilation complete (0.250s)",
      "",
      "📦 Ruby",
      "  🗂️  Source written (0.500s)",
      "  ✅ Ready to interpret",
      "",
      "📦 Assembly",
      "  🗂️  Source written (0.500s)",
      "  ⚙️  Compiling (1/2): nasm -f elf64 hello.asm -o hello.o",
      "  ❌ Compilation error: command not found: nasm",
    ]);

    lines.length = 0;
    await reporter.showExecution(records);
    expect(lines).toEqual([
      "",
      " Step 3 • Execution ",
      "Running each hello-world and capturing the output.",
      "C  🚀 ./hello_c",
      "  ✅ Execution succeeded (0.250s)",
      "  stdout: Hello World",
      "Ruby  🚀 ruby hello.rb",
      "  ✅ Execution succeeded (0.250s)",
      "  stdout: Hello World",
      "Assembly  ⛔ Skipped due to earlier error",
    ]);
  });

  it("tabulates timings with a dash for stages that never ran", async () => {
    const lines: string[] = [];
    const reporter = new AnimatedReporter({ ...options, write: (l) => lines.push(l) });
    const records = await run(undefined);
    reporter.showMetrics(records, summarize(records));

    const table = lines.slice(3, 8);
    expect(table[0]).toBe("Language  Write   Compile  Run     Total   Status");
    expect(table[1]).toBe([8, 6, 7, 6, 6, 6].map((w) => "─".repeat(w)).join("  "));
    expect(table.slice(2).map((row) => row.split(/\s+/))).toEqual([
      ["C", "0.500s", "0.250s", "0.250s", "1.000s", "ok"],
      ["Ruby", "0.500s", "-", "0.250s", "0.750s", "ok"],
      ["Assembly", "0.500s", "0.000s", "-", "0.500s", "failed"],
    ]);
    expect(lines[lines.length - 1]).toBe("🏁 Done! Succeeded: 2/3");
  });
});

describe("compileSeconds", () => {
  it("sums compile steps and is undefined when none ran", () => {
    expect(compileSeconds({ write: 0.5, compile_1: 0.25, compile_2: 0.5, run: 1, total: 2.25 })).toBe(0.75);
    expect(compileSeconds({ write: 0.5, run: 1, total: 1.5 })).toBeUndefined();
  });
});
