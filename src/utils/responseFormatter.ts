import type {
  ExecutionResult,
  LanguageRunRecord,
  PipelineEvent,
  PipelineSummary,
  StageTimings,
} from "../types/pipeline.js";
import { formatCommand } from "./format.js";

export type RecordOutcome =
  | { kind: "write_error"; message: string }
  | { kind: "compiler_error"; message: string }
  | { kind: "program_error"; message: string }
  | { kind: "program_output"; output: string };

export interface StageView {
  command: string;
  succeeded: boolean;
  exitCode: number | null;
  elapsedSeconds: number;
  stdout: string;
  stderr: string;
}

export interface RecordView {
  name: string;
  failed: boolean;
  outcome: RecordOutcome;
  write: StageView | null;
  compile: StageView[];
  run: StageView | null;
  timings: StageTimings;
}

function combined(result: ExecutionResult): string {
  return [result.stderr.trim(), result.stdout.trim()].filter(Boolean).join("\n");
}

/**
 * The one thing a reader wants to know about a record: where it stopped and what it said.
 */
export function describeOutcome(record: LanguageRunRecord): RecordOutcome {
  const { writeResult, compileResults, runResult } = record;
  if (writeResult && !writeResult.succeeded) {
    return { kind: "write_error", message: writeResult.stderr.trim() || "Writing the source file failed." };
  }
  const failedCompile = compileResults.find((r) => !r.succeeded);
  if (failedCompile) {
    return { kind: "compiler_error", message: combined(failedCompile) || "Compilation failed." };
  }
  if (!runResult) {
    return { kind: "program_error", message: "Execution phase did not run." };
  }
  if (!runResult.succeeded) {
    const fallback = runResult.exitCode === null ? "Process did not exit normally." : `Process exited with code ${runResult.exitCode}.`;
    return { kind: "program_error", message: combined(runResult) || fallback };
  }
  return { kind: "program_output", output: runResult.stdout.trim() };
}

function toStageView(result: ExecutionResult): StageView {
  return {
    command: formatCommand(result.command),
    succeeded: result.succeeded,
    exitCode: result.exitCode,
    elapsedSeconds: result.elapsedSeconds,
    stdout: result.stdout,
    stderr: result.stderr,
  };
}

export function toRecordView(record: LanguageRunRecord): RecordView {
  return {
    name: record.descriptor.name,
    failed: record.failed,
    outcome: describeOutcome(record),
    write: record.writeResult ? toStageView(record.writeResult) : null,
    compile: record.compileResults.map(toStageView),
    run: record.runResult ? toStageView(record.runResult) : null,
    timings: { ...record.timings },
  };
}

export type WireEvent =
  | Exclude<PipelineEvent, { type: "language_done" }>
  | { type: "language_done"; index: number; language: string; record: RecordView }
  | { type: "done"; summary: PipelineSummary };

/** JSON-safe form of a pipeline event for the event stream. */
export function toWireEvent(event: PipelineEvent): WireEvent {
  if (event.type === "language_done") {
    return { ...event, record: toRecordView(event.record) };
  }
  return event;
}
