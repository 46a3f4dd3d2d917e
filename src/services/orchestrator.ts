import { performance } from "node:perf_hooks";
import type { LanguageDescriptor, LanguageRunRecord, PipelineSummary } from "../types/pipeline.js";
import { runPipeline, summarize, type PipelineOptions } from "./pipeline.js";
import { cleanupWorkspace, prepareWorkspace } from "./workspace.js";

export interface SessionOptions extends PipelineOptions {
  workDir: string;
  keepWorkspace?: boolean;
  /** Runs after the workspace exists and before the first language. */
  beforeRun?: (workspace: string) => void | Promise<void>;
}

export interface SessionResult {
  workspace: string;
  records: LanguageRunRecord[];
  summary: PipelineSummary;
  elapsedSeconds: number;
  cleanup: boolean | "skipped";
}

/**
 * Fresh workspace, every language in order, then cleanup.
 * Rejects only with WorkspaceError when the workspace cannot be created.
 */
export async function runSession(
  languages: readonly LanguageDescriptor[],
  options: SessionOptions
): Promise<SessionResult> {
  const started = performance.now();
  const workspace = await prepareWorkspace(options.workDir);

  let records: LanguageRunRecord[];
  let cleanup: boolean | "skipped" = "skipped";
  try {
    await options.beforeRun?.(workspace);
    records = await runPipeline(languages, workspace, options);
  } finally {
    if (!options.keepWorkspace) cleanup = await cleanupWorkspace(workspace);
  }

  return {
    workspace,
    records,
    summary: summarize(records),
    elapsedSeconds: (performance.now() - started) / 1000,
    cleanup,
  };
}
