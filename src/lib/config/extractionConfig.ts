import fs from "node:fs/promises";
import { z } from "zod";
import { ClauseExtractionError, describeError } from "@/lib/errors";

export type ExtractionConfig = Readonly<{
  fragmentGapThreshold: number;
  lineTopTolerance: number;
  paragraphGapThreshold: number;
  headingMinFontSize: number;
  headingMinBoldRatio: number;
  boldFontMarkers: readonly string[];
  fragmentMaxWords: number;
  boilerplatePatterns: readonly RegExp[];
}>;

export const CONFIG_PATH_ENV = "CLAUSE_EXTRACTION_CONFIG";

// Running headers, footers and licensing stamps of the supported document family.
export const DEFAULT_BOILERPLATE_SOURCES: readonly string[] = [
  "^copyright british standards institution",
  "^provided by accuris",
  "^licensee=",
  "^not for resale",
  "^no reproduction or networking permitted",
  "^bs en ",
  "^iec 61513",
  "^61513",
  "^raising standards worldwide",
  "^–\\s*\\d+\\s*–",
  "^--[`',.-]{5,}",
];

const compilePatterns = (sources: readonly string[]): readonly RegExp[] =>
  Object.freeze(sources.map((source) => new RegExp(source, "i")));

export const DEFAULT_EXTRACTION_CONFIG: ExtractionConfig = Object.freeze({
  fragmentGapThreshold: 1.5,
  lineTopTolerance: 1,
  paragraphGapThreshold: 18,
  headingMinFontSize: 14,
  headingMinBoldRatio: 0.5,
  boldFontMarkers: Object.freeze(["bold", "black", "heavy"]),
  fragmentMaxWords: 6,
  boilerplatePatterns: compilePatterns(DEFAULT_BOILERPLATE_SOURCES),
});

const measure = z.number().finite().nonnegative();

const compilablePattern = z.string().min(1).refine(
  (source) => {
    try {
      new RegExp(source, "i");
      return true;
    } catch {
      return false;
    }
  },
  { message: "Invalid regular expression" },
);

const configOverridesSchema = z
  .object({
    fragmentGapThreshold: measure,
    lineTopTolerance: measure,
    paragraphGapThreshold: measure,
    headingMinFontSize: measure,
    headingMinBoldRatio: z.number().min(0).max(1),
    boldFontMarkers: z.array(z.string().min(1)).min(1),
    fragmentMaxWords: z.number().int().min(2),
    boilerplatePatterns: z.array(compilablePattern),
  })
  .strict()
  .partial();

export type ExtractionConfigOverrides = z.infer<typeof configOverridesSchema>;

const formatIssues = (error: z.ZodError): string =>
  error.issues
    .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
    .join("; ");

export const resolveExtractionConfig = (
  overrides: unknown = {},
  base: ExtractionConfig = DEFAULT_EXTRACTION_CONFIG,
): ExtractionConfig => {
  const parsed = configOverridesSchema.safeParse(overrides);
  if (!parsed.success) {
    throw new ClauseExtractionError(
      "InvalidConfiguration",
      `Invalid extraction configuration: ${formatIssues(parsed.error)}`,
    );
  }

  const { boilerplatePatterns, boldFontMarkers, ...measures } = parsed.data;

  return Object.freeze({
    ...base,
    ...measures,
    boldFontMarkers: boldFontMarkers
      ? Object.freeze(boldFontMarkers.map((marker) => marker.toLowerCase()))
      : base.boldFontMarkers,
    boilerplatePatterns: boilerplatePatterns
      ? compilePatterns(boilerplatePatterns)
      : base.boilerplatePatterns,
  });
};

export const loadExtractionConfigFile = async (
  filePath: string,
): Promise<ExtractionConfig> => {
  let raw: string;
  try {
    raw = await fs.readFile(filePath, "utf8");
  } catch (error) {
    throw new ClauseExtractionError(
      "InvalidConfiguration",
      `Unable to read extraction configuration ${filePath}: ${describeError(error)}`,
      { cause: error },
    );
  }

  let overrides: unknown;
  try {
    overrides = JSON.parse(raw);
  } catch (error) {
    throw new ClauseExtractionError(
      "InvalidConfiguration",
      `Extraction configuration ${filePath} is not valid JSON.`,
      { cause: error },
    );
  }

  return resolveExtractionConfig(overrides);
};

export const loadExtractionConfigFromEnv = async (
  env: Partial<NodeJS.ProcessEnv> = process.env,
): Promise<ExtractionConfig> => {
  const configPath = env[CONFIG_PATH_ENV]?.trim();
  if (!configPath) {
    return DEFAULT_EXTRACTION_CONFIG;
  }

  return loadExtractionConfigFile(configPath);
};
