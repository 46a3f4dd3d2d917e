/**
 * Pipeline data model.
 * A record carries only the stages that were attempted; skipped stages are absent, not zero.
 */

export const TERMINAL_COLORS = [
  "cyan",
  "magenta",
  "yellow",
  "yellowBright",
  "green",
  "greenBright",
  "blue",
  "red",
  "white",
] as const;
export type TerminalColor = (typeof TERMINAL_COLORS)[number];

export interface LanguageDescriptor {
  readonly name: string;
  readonly sourceFilename: string;
  readonly sourceLines: readonly string[];
  readonly compileSteps: readonly (readonly string[])[];
  readonly runCommand: readonly string[];
  readonly syntax: string;
  readonly color: TerminalColor;
}

export interface ExecutionResult {
  readonly command: readonly string[];
  readonly succeeded: boolean;
  /** null when the process never started or was killed by a signal. */
  readonly exitCode: number | null;
  readonly elapsedSeconds: number;
  readonly stdout: string;
  readonly stderr: string;
}

export type CompileStageName = `compile_${number}`;
export type StageName = "write" | CompileStageName | "run";

export type StageTimings = { [K in StageName]?: number } & { total: number };

export interface LanguageRunRecord {
  readonly descriptor: LanguageDescriptor;
  writeResult?: ExecutionResult;
  compileResults: ExecutionResult[];
  runResult?: ExecutionResult;
  failed: boolean;
  timings: StageTimings;
}

export interface PipelineSummary {
  succeeded: number;
  failed: number;
  total: number;
  totalSeconds: number;
}

export type PipelineEvent =
  | { type: "language_start"; index: number; language: string; descriptor: LanguageDescriptor }
  | { type: "stage_start"; index: number; language: string; stage: StageName; command: readonly string[] }
  | { type: "stage_done"; index: number; language: string; stage: StageName; result: ExecutionResult }
  | { type: "language_done"; index: number; language: string; record: LanguageRunRecord };

export type PipelineEventListener = (event: PipelineEvent) => void;

export type ProcessRunner = (command: readonly string[], cwd: string) => Promise<ExecutionResult>;

export type SourceWriter = (descriptor: LanguageDescriptor, dir: string) => Promise<ExecutionResult>;
