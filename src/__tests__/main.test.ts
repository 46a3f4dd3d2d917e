/**
 * Entry Point Tests
 *
 * Exit statuses of `main`: 0 whatever each language does, 1 when the
 * workspace or catalog is unusable, 2 for bad usage.
 */

import { describe, it, expect, beforeAll, afterAll, beforeEach, afterEach, vi, type MockInstance } from "vitest";
import fs from "fs";
import os from "os";
import path from "path";

type Main = (argv: readonly string[]) => Promise<number>;

const NODE = process.execPath;

async function loadMain(env: Record<string, string> = {}): Promise<Main> {
  for (const [key, value] of Object.entries(env)) {
    vi.stubEnv(key, value);
  }
  // config is parsed when the module loads
  vi.resetModules();
  const { main } = await import("../index.js");
  return main;
}

describe("main", () => {
  let root: string;
  let log: MockInstance<typeof console.log>;
  let error: MockInstance<typeof console.error>;

  beforeAll(() => {
    root = fs.mkdtempSync(path.join(os.tmpdir(), "hello-main-"));
    fs.writeFileSync(
      path.join(root, "languages.json"),
      JSON.stringify([
        {
          name: "Script",
          sourceFilename: "hello.js",
          sourceLines: ['console.log("Hello World");'],
          compileSteps: [],
          runCommand: [NODE, "hello.js"],
        },
        {
          name: "Broken",
          sourceFilename: "broken.js",
          sourceLines: ["process.exit(3);"],
          compileSteps: [[NODE, "-e", "process.exit(3)"]],
          runCommand: [NODE, "broken.js"],
        },
      ])
    );
    fs.writeFileSync(path.join(root, "broken.json"), "{ not json");
    fs.writeFileSync(path.join(root, "plain-file"), "");
  });

  afterAll(() => {
    fs.rmSync(root, { recursive: true, force: true });
  });

  beforeEach(() => {
    log = vi.spyOn(console, "log").mockImplementation(() => {});
    error = vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.unstubAllEnvs();
    vi.restoreAllMocks();
  });

  it("returns 0 after a text run even when a language fails", async () => {
    const main = await loadMain({ LANGUAGES_FILE: path.join(root, "languages.json") });
    const workspace = path.join(root, "ws-text");

    expect(await main(["--mode", "text", "--workspace", workspace])).toBe(0);
    const printed = log.mock.calls.map((call) => String(call[0]));
    expect(printed).toContain("Succeeded: 1/2");
    expect(fs.existsSync(workspace)).toBe(false);
  });

  it("returns 1 when the workspace cannot be created", async () => {
    const main = await loadMain({ LANGUAGES_FILE: path.join(root, "languages.json") });

    expect(await main(["--mode", "text", "--workspace", path.join(root, "plain-file", "ws")])).toBe(1);
    expect(String(error.mock.calls[0][0])).toMatch(/^Fatal: Cannot prepare workspace /);
  });

  it("returns 1 when the language catalog is invalid", async () => {
    const main = await loadMain({ LANGUAGES_FILE: path.join(root, "broken.json") });

    expect(await main(["--mode", "text", "--workspace", path.join(root, "ws-catalog")])).toBe(1);
    expect(String(error.mock.calls[0][0])).toMatch(/^Fatal: /);
  });

  it("returns 1 for an unknown language selection", async () => {
    const main = await loadMain({ LANGUAGES_FILE: path.join(root, "languages.json") });

    expect(await main(["--mode", "text", "--only", "go", "--workspace", path.join(root, "ws-only")])).toBe(1);
    expect(error.mock.calls[0][0]).toBe("Fatal: Unknown language(s): go. Available: Script, Broken");
  });

  it("returns 2 for bad usage", async () => {
    const main = await loadMain();

    expect(await main(["--fast"])).toBe(2);
    expect(error.mock.calls[0][0]).toBe("Unknown argument: --fast");
  });

  it("prints the version and exits 0", async () => {
    const main = await loadMain();

    expect(await main(["--version"])).toBe(0);
    expect(log.mock.calls[0][0]).toBe("Hello Orchestrator v1.0.0");
  });
});
