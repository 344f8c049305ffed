import path from "path";
import { z } from "zod";
import { ConfigError } from "./errors.js";
import type { LogLevel } from "./logger.js";
import type { PdfSource } from "./scan/scanner.js";

export const DEFAULT_KEYWORDS_FILE = "keywords.txt";
export const DEFAULT_JSON_NAME = "search_results.json";
export const DEFAULT_CSV_NAME = "search_results.csv";

const pathOption = (flag: string) =>
  z.string().min(1, `--${flag} needs a non-empty path`).optional();

// Keys are the CLI flag names, exactly as node:util parseArgs reports them
const optionsSchema = z
  .object({
    "pdf-file": pathOption("pdf-file"),
    "pdf-dir": pathOption("pdf-dir"),
    recursive: z.boolean().optional().default(false),
    "keywords-file": pathOption("keywords-file"),
    output: pathOption("output"),
    "output-csv": pathOption("output-csv"),
    "output-dir": pathOption("output-dir"),
    // An empty password is a valid password
    password: z.string().optional(),
    verbose: z.boolean().optional().default(false),
    quiet: z.boolean().optional().default(false),
    help: z.boolean().optional().default(false),
  })
  .strict()
  .superRefine((options, ctx) => {
    const fail = (message: string) =>
      ctx.addIssue({ code: z.ZodIssueCode.custom, message });

    if (options["pdf-file"] && options["pdf-dir"]) {
      fail("--pdf-file and --pdf-dir cannot be used together.");
    } else if (!options["pdf-file"] && !options["pdf-dir"]) {
      fail("Either --pdf-file or --pdf-dir must be provided.");
    }
    if (options.recursive && !options["pdf-dir"]) {
      fail("--recursive requires --pdf-dir.");
    }
    if (options["output-dir"] && (options.output || options["output-csv"])) {
      fail("--output-dir cannot be combined with --output or --output-csv.");
    }
    if (options.verbose && options.quiet) {
      fail("--verbose and --quiet cannot be used together.");
    }
  });

export type ScanConfig = {
  source: PdfSource;
  keywordsFile: string;
  outputJson: string;
  outputCsv?: string;
  password?: string;
  logLevel: LogLevel;
};

export const resolveScanConfig = (values: unknown): ScanConfig => {
  const parsed = optionsSchema.safeParse(values);
  if (!parsed.success) {
    const [issue] = parsed.error.issues;
    throw new ConfigError(issue ? describeIssue(issue) : "Invalid arguments.");
  }
  const options = parsed.data;

  const pdfDir = options["pdf-dir"];
  const pdfFile = options["pdf-file"];
  let source: PdfSource;
  if (pdfDir) {
    source = { kind: "dir", pdfDir, recursive: options.recursive };
  } else if (pdfFile) {
    source = { kind: "file", pdfFile };
  } else {
    throw new ConfigError("Either --pdf-file or --pdf-dir must be provided.");
  }

  const outputDir = options["output-dir"];
  return {
    source,
    keywordsFile: options["keywords-file"] ?? DEFAULT_KEYWORDS_FILE,
    outputJson: outputDir
      ? path.join(outputDir, DEFAULT_JSON_NAME)
      : options.output ?? DEFAULT_JSON_NAME,
    outputCsv: outputDir
      ? path.join(outputDir, DEFAULT_CSV_NAME)
      : options["output-csv"],
    password: options.password,
    logLevel: options.verbose ? "debug" : options.quiet ? "warn" : "info",
  };
};

const describeIssue = (issue: z.ZodIssue): string => {
  if (issue.code === z.ZodIssueCode.unrecognized_keys) {
    return `Unknown option: ${issue.keys.map((key) => `--${key}`).join(", ")}`;
  }
  if (issue.code === z.ZodIssueCode.invalid_type && issue.path.length > 0) {
    return `Invalid value for --${issue.path.join(".")}: expected ${issue.expected}`;
  }
  return issue.message;
};

/**
 * Report timestamp. A numeric SOURCE_DATE_EPOCH (seconds) pins it so that
 * repeated runs over the same inputs produce identical JSON.
 */
export const resolveGeneratedAt = (
  env: Record<string, string | undefined>,
  now: () => Date = () => new Date()
): Date => {
  const epoch = env.SOURCE_DATE_EPOCH?.trim();
  if (epoch && /^\d+$/.test(epoch)) {
    return new Date(Number(epoch) * 1000);
  }
  return now();
};
