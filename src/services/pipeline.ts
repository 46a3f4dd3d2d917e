import type {
  CompileStageName,
  ExecutionResult,
  LanguageDescriptor,
  LanguageRunRecord,
  PipelineEventListener,
  PipelineSummary,
  ProcessRunner,
  SourceWriter,
  StageName,
  StageTimings,
} from "../types/pipeline.js";
import { runCommand } from "./processRunner.js";
import { writeSource } from "./sourceWriter.js";

export interface PipelineOptions {
  runner?: ProcessRunner;
  writer?: SourceWriter;
  onEvent?: PipelineEventListener;
}

export function compileStageName(step: number): CompileStageName {
  return `compile_${step}`;
}

/**
 * Stage timings from what the record actually holds. Skipped stages get no key.
 */
export function computeTimings(record: Pick<LanguageRunRecord, "writeResult" | "compileResults" | "runResult">): StageTimings {
  const timings: StageTimings = { total: 0 };
  const add = (stage: StageName, result: ExecutionResult): void => {
    timings[stage] = result.elapsedSeconds;
    timings.total += result.elapsedSeconds;
  };

  if (record.writeResult) add("write", record.writeResult);
  record.compileResults.forEach((result, i) => add(compileStageName(i + 1), result));
  if (record.runResult) add("run", record.runResult);
  return timings;
}

/**
 * Write, compile (stopping at the first failing step), then run.
 * Per-language failures end up in the record; this never rejects because a tool failed.
 */
export async function processLanguage(
  descriptor: LanguageDescriptor,
  dir: string,
  options: PipelineOptions = {},
  index = 0
): Promise<LanguageRunRecord> {
  const runner = options.runner ?? runCommand;
  const writer = options.writer ?? writeSource;
  const emit = options.onEvent ?? (() => {});
  const language = descriptor.name;

  const record: LanguageRunRecord = {
    descriptor,
    compileResults: [],
    failed: false,
    timings: { total: 0 },
  };

  const stage = async (
    name: StageName,
    command: readonly string[],
    exec: () => Promise<ExecutionResult>
  ): Promise<ExecutionResult> => {
    emit({ type: "stage_start", index, language, stage: name, command });
    const result = await exec();
    emit({ type: "stage_done", index, language, stage: name, result });
    return result;
  };

  emit({ type: "language_start", index, language, descriptor });

  record.writeResult = await stage("write", ["write", descriptor.sourceFilename], () => writer(descriptor, dir));
  if (!record.writeResult.succeeded) {
    record.failed = true;
  }

  if (!record.failed) {
    for (const [i, command] of descriptor.compileSteps.entries()) {
      const result = await stage(compileStageName(i + 1), command, () => runner(command, dir));
      record.compileResults.push(result);
      if (!result.succeeded) {
        record.failed = true;
        break;
      }
    }
  }

  if (!record.failed) {
    record.runResult = await stage("run", descriptor.runCommand, () => runner(descriptor.runCommand, dir));
    if (!record.runResult.succeeded) {
      record.failed = true;
    }
  }

  record.timings = computeTimings(record);
  emit({ type: "language_done", index, language, record });
  return record;
}

/**
 * Process every descriptor in order, one at a time. A failing language never stops the next one.
 */
export async function runPipeline(
  descriptors: readonly LanguageDescriptor[],
  dir: string,
  options: PipelineOptions = {}
): Promise<LanguageRunRecord[]> {
  const records: LanguageRunRecord[] = [];
  for (const [index, descriptor] of descriptors.entries()) {
    records.push(await processLanguage(descriptor, dir, options, index));
  }
  return records;
}

export function summarize(records: readonly LanguageRunRecord[]): PipelineSummary {
  const failed = records.filter((r) => r.failed).length;
  return {
    succeeded: records.length - failed,
    failed,
    total: records.length,
    totalSeconds: records.reduce((sum, r) => sum + r.timings.total, 0),
  };
}
