import { mkdir, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { performance } from "node:perf_hooks";
import type { ExecutionResult, LanguageDescriptor } from "../types/pipeline.js";
import { sourceText } from "./languages.js";

/**
 * Write a descriptor's source into `dir`, creating the directory if needed and overwriting any previous file.
 */
export async function writeSource(descriptor: LanguageDescriptor, dir: string): Promise<ExecutionResult> {
  const command = ["write", descriptor.sourceFilename];
  const started = performance.now();
  try {
    await mkdir(dir, { recursive: true });
    await writeFile(join(dir, descriptor.sourceFilename), sourceText(descriptor), "utf8");
    return {
      command,
      succeeded: true,
      exitCode: 0,
      elapsedSeconds: (performance.now() - started) / 1000,
      stdout: "",
      stderr: "",
    };
  } catch (err) {
    return {
      command,
      succeeded: false,
      exitCode: null,
      elapsedSeconds: (performance.now() - started) / 1000,
      stdout: "",
      stderr: err instanceof Error ? err.message : String(err),
    };
  }
}
