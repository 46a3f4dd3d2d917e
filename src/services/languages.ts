import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { z } from "zod";
import { TERMINAL_COLORS, type LanguageDescriptor } from "../types/pipeline.js";

export const DEFAULT_LANGUAGES_FILE = fileURLToPath(
  new URL("../../config/languages.json", import.meta.url)
);

export class LanguageCatalogError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "LanguageCatalogError";
  }
}

const commandSchema = z
  .array(
    z
      .string()
      .min(1)
      .refine((token) => !token.includes("\0"), "must not contain NUL bytes")
  )
  .min(1);

const languageSchema = z.object({
  name: z.string().min(1),
  sourceFilename: z
    .string()
    .min(1)
    .regex(/^[^/\\]+$/, "must be a plain file name"),
  sourceLines: z.array(z.string()).min(1),
  compileSteps: z.array(commandSchema),
  runCommand: commandSchema,
  syntax: z.string().min(1).default("text"),
  color: z.enum(TERMINAL_COLORS).default("white"),
});

const catalogSchema = z
  .array(languageSchema)
  .min(1)
  .superRefine((languages, ctx) => {
    const names = new Set<string>();
    const files = new Set<string>();
    languages.forEach((lang, i) => {
      const key = lang.name.toLowerCase();
      if (names.has(key)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: [i, "name"], message: `duplicate language "${lang.name}"` });
      }
      if (files.has(lang.sourceFilename)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [i, "sourceFilename"],
          message: `duplicate source file "${lang.sourceFilename}"`,
        });
      }
      names.add(key);
      files.add(lang.sourceFilename);
    });
  });

function describeIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`).join("; ");
}

/**
 * Validate raw catalog data. Descriptors come back frozen, in file order.
 */
export function parseLanguages(raw: unknown): readonly LanguageDescriptor[] {
  const parsed = catalogSchema.safeParse(raw);
  if (!parsed.success) {
    throw new LanguageCatalogError(`Invalid language catalog: ${describeIssues(parsed.error)}`);
  }
  return Object.freeze(parsed.data.map((lang) => Object.freeze(lang)));
}

export function loadLanguages(file: string = DEFAULT_LANGUAGES_FILE): readonly LanguageDescriptor[] {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(file, "utf8"));
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new LanguageCatalogError(`Cannot read language catalog ${file}: ${reason}`);
  }
  return parseLanguages(raw);
}

/**
 * Pick languages by name (case-insensitive). Catalog order wins over the order of `names`.
 */
export function selectLanguages(
  all: readonly LanguageDescriptor[],
  names: readonly string[] | undefined
): readonly LanguageDescriptor[] {
  if (!names || names.length === 0) return all;

  const wanted = new Set(names.map((n) => n.trim().toLowerCase()));
  const unknown = [...wanted].filter((n) => !all.some((lang) => lang.name.toLowerCase() === n));
  if (unknown.length > 0) {
    const known = all.map((lang) => lang.name).join(", ");
    throw new LanguageCatalogError(`Unknown language(s): ${unknown.join(", ")}. Available: ${known}`);
  }
  return all.filter((lang) => wanted.has(lang.name.toLowerCase()));
}

export function sourceText(descriptor: LanguageDescriptor): string {
  return descriptor.sourceLines.join("\n") + "\n";
}
