import "dotenv/config";
import { z } from "zod";

const flag = z
  .string()
  .transform((v) => v === "true" || v === "1")
  .default("false");

export const envSchema = z.object({
  PORT: z.coerce.number().min(1).max(65535).default(5050),
  WORK_DIR: z.string().min(1).default("hello_workspace"),
  KEEP_WORKSPACE: flag,
  REVEAL_DELAY_MS: z.coerce.number().min(0).max(10_000).default(300),
  STEP_DELAY_MS: z.coerce.number().min(0).max(10_000).default(500),
  LANGUAGES_FILE: z.string().min(1).optional(),
  OUTPUT_PREVIEW_CHARS: z.coerce.number().min(16).max(100_000).default(200),
});

export type Config = z.infer<typeof envSchema>;

const parsed = envSchema.safeParse(process.env);
if (!parsed.success) {
  console.error("Invalid environment:", parsed.error.flatten());
  process.exit(1);
}

export const config: Config = parsed.data;
