import { z } from "zod";

export const MODES = ["text", "animated", "serve"] as const;

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CliUsageError";
  }
}

const cliSchema = z.object({
  mode: z.enum(MODES).default("animated"),
  workspace: z.string().min(1).optional(),
  only: z.array(z.string().min(1)).optional(),
  keep: z.boolean().default(false),
  help: z.boolean().default(false),
  version: z.boolean().default(false),
});

export type CliOptions = z.infer<typeof cliSchema>;

const VALUE_FLAGS: Record<string, "mode" | "workspace" | "only"> = {
  "--mode": "mode",
  "-m": "mode",
  "--workspace": "workspace",
  "-w": "workspace",
  "--only": "only",
  "-l": "only",
};

const BOOLEAN_FLAGS: Record<string, "keep" | "help" | "version"> = {
  "--keep": "keep",
  "--help": "help",
  "-h": "help",
  "--version": "version",
  "-v": "version",
};

/**
 * Accepts `--flag value` and `--flag=value`. `--only` takes a comma-separated list.
 */
export function parseCliArgs(argv: readonly string[]): CliOptions {
  const raw: Record<string, unknown> = {};

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    const eq = arg.indexOf("=");
    const name = arg.startsWith("--") && eq > 0 ? arg.slice(0, eq) : arg;

    const bool = BOOLEAN_FLAGS[name];
    if (bool) {
      raw[bool] = true;
      continue;
    }

    const key = VALUE_FLAGS[name];
    if (!key) {
      throw new CliUsageError(`Unknown argument: ${arg}`);
    }
    let value: string | undefined;
    if (name !== arg) {
      value = arg.slice(eq + 1);
    } else {
      value = argv[i + 1];
      i++;
    }
    if (value === undefined || value === "") {
      throw new CliUsageError(`Missing value for ${name}`);
    }
    raw[key] = key === "only" ? value.split(",").map((s) => s.trim()).filter(Boolean) : value;
  }

  const parsed = cliSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new CliUsageError(`Invalid --${issue.path.join(".")}: ${issue.message}`);
  }
  return parsed.data;
}

export function usage(version: string): string {
  return `
Hello Orchestrator v${version}
Writes, compiles and runs Hello World in C, C++, Rust and x86-64 Assembly.

Usage:
  hello-orchestrator [options]

Options:
  -m, --mode <mode>        text | animated | serve (default: animated)
  -w, --workspace <dir>    Working directory (default: $WORK_DIR or ./hello_workspace)
  -l, --only <names>       Comma-separated languages to run, e.g. C,Rust
      --keep               Keep the workspace after the run
  -v, --version            Show version
  -h, --help               Show this help

Environment:
  PORT                     HTTP port for --mode serve (default: 5050)
  REVEAL_DELAY_MS          Delay per revealed source line (default: 300)
  STEP_DELAY_MS            Pause between presentation steps (default: 500)
  LANGUAGES_FILE           Alternative language catalog (JSON)
`;
}
