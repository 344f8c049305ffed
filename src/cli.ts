import path from "path";
import { parseArgs, styleText } from "node:util";
import {
  DEFAULT_CSV_NAME,
  DEFAULT_JSON_NAME,
  DEFAULT_KEYWORDS_FILE,
  resolveGeneratedAt,
  resolveScanConfig,
  type ScanConfig,
} from "./config.js";
import {
  ConfigError,
  EXIT_FATAL,
  EXIT_OK,
  ScanError,
  describeError,
} from "./errors.js";
import { logger, setLogLevel } from "./logger.js";
import { PdfExtractor } from "./scan/extractors/PdfExtractor.js";
import type { TextExtractor } from "./scan/extractors/TextExtractor.js";
import { loadKeywords } from "./scan/keywords.js";
import {
  ReportBuilder,
  serializeCsv,
  serializeJson,
  writeReport,
} from "./scan/report.js";
import { Scanner, collectPdfPaths } from "./scan/scanner.js";

export const printSystemMessage = (message: string) => {
  logger.log(styleText("blue", message));
};

export const printResultMessage = (message: string) => {
  logger.log(styleText("green", message));
};

export const printWarningMessage = (message: string) => {
  logger.warn(styleText("yellow", message));
};

export const printErrorMessage = (message: string) => {
  logger.error(styleText("red", message));
};

type CliOption = {
  name: string;
  type: "string" | "boolean";
  short?: string;
  value?: string;
  description: string;
};

export const cliOptions: CliOption[] = [
  {
    name: "pdf-file",
    type: "string",
    value: "PATH",
    description: "Single PDF file to search",
  },
  {
    name: "pdf-dir",
    type: "string",
    value: "PATH",
    description: "Directory containing PDFs to search (direct children only)",
  },
  {
    name: "recursive",
    type: "boolean",
    description: "With --pdf-dir, also search subdirectories",
  },
  {
    name: "keywords-file",
    type: "string",
    value: "PATH",
    description: `Keywords file, one per line or comma-separated (default: ${DEFAULT_KEYWORDS_FILE})`,
  },
  {
    name: "output",
    type: "string",
    value: "PATH",
    description: `JSON output path (default: ./${DEFAULT_JSON_NAME})`,
  },
  {
    name: "output-csv",
    type: "string",
    value: "PATH",
    description: "Also write a CSV summary to this path",
  },
  {
    name: "output-dir",
    type: "string",
    value: "PATH",
    description: `Write ${DEFAULT_JSON_NAME} and ${DEFAULT_CSV_NAME} here (instead of --output / --output-csv)`,
  },
  {
    name: "password",
    type: "string",
    value: "VALUE",
    description: "Password to try on encrypted PDFs",
  },
  {
    name: "verbose",
    type: "boolean",
    description: "Print per-file extraction details",
  },
  {
    name: "quiet",
    type: "boolean",
    description: "Only print warnings and errors",
  },
  {
    name: "help",
    type: "boolean",
    short: "h",
    description: "Show this help",
  },
];

export const getHelpString = () => {
  const rows = cliOptions.map((option) => {
    const flag = `--${option.name}${option.value ? ` ${option.value}` : ""}`;
    const withShort = option.short ? `-${option.short}, ${flag}` : flag;
    return `  ${withShort.padEnd(24)} ${option.description}`;
  });
  return [
    "Usage: pdf-keyword-scan (--pdf-file PATH | --pdf-dir PATH) [options]",
    "",
    "Search PDFs for a preset list of keywords and write a JSON (and optional CSV) report.",
    "",
    "Options:",
    ...rows,
  ].join("\n");
};

export const parseCliArgs = (argv: string[]) => {
  const options = Object.fromEntries(
    cliOptions.map((option) => [
      option.name,
      option.short
        ? { type: option.type, short: option.short }
        : { type: option.type },
    ])
  );
  try {
    const { values } = parseArgs({
      args: argv,
      options,
      strict: true,
      allowPositionals: false,
    });
    return values;
  } catch (error) {
    throw new ConfigError(describeError(error), { cause: error });
  }
};

export type CliDeps = {
  extractor?: TextExtractor;
  cwd?: string;
  env?: Record<string, string | undefined>;
  now?: () => Date;
};

/**
 * Run one scan from command-line arguments and return the process exit code.
 * Never exits the process itself.
 */
export async function runCli(argv: string[], deps: CliDeps = {}): Promise<number> {
  setLogLevel("info");
  try {
    const values = parseCliArgs(argv);
    if (values.help === true) {
      console.log(getHelpString());
      return EXIT_OK;
    }
    const config = resolveScanConfig(values);
    setLogLevel(config.logLevel);
    return await runScan(config, deps);
  } catch (error) {
    return reportFailure(error);
  }
}

async function runScan(config: ScanConfig, deps: CliDeps): Promise<number> {
  const cwd = deps.cwd ?? process.cwd();

  const keywords = await loadKeywords(path.resolve(cwd, config.keywordsFile));
  const pdfPaths = await collectPdfPaths(config.source, cwd);
  if (pdfPaths.length === 0) {
    printWarningMessage("No PDF files found to search.");
    return EXIT_OK;
  }

  printSystemMessage(
    `Searching ${pdfPaths.length} PDF(s) for ${keywords.length} keyword(s)...`
  );
  logger.debug(`Keywords: ${keywords.map((k) => k.label).join(", ")}`);

  const builder = new ReportBuilder(keywords, config.keywordsFile);
  const scanner = new Scanner({
    extractor: deps.extractor ?? new PdfExtractor({ password: config.password }),
    keywords,
    cwd,
  });
  await scanner.scanAll(pdfPaths, builder);

  const run = builder.finalize(
    resolveGeneratedAt(deps.env ?? process.env, deps.now)
  );

  await writeReport(path.resolve(cwd, config.outputJson), serializeJson(run));
  printResultMessage(`JSON results written to: ${config.outputJson}`);

  if (config.outputCsv) {
    await writeReport(path.resolve(cwd, config.outputCsv), serializeCsv(run));
    printResultMessage(`CSV summary written to: ${config.outputCsv}`);
  }

  const failed = run.files.filter((file) => file.error !== undefined).length;
  const matchedFiles = run.files.filter((file) => file.matches.length > 0).length;
  const totalMatches = run.files.reduce(
    (sum, file) => sum + file.matches.reduce((acc, m) => acc + m.count, 0),
    0
  );
  printSystemMessage(
    `Found ${totalMatches} match(es) in ${matchedFiles} of ${run.files.length} file(s).`
  );
  if (failed > 0) {
    printWarningMessage(`${failed} file(s) could not be read; see the "error" field in the report.`);
  }
  return EXIT_OK;
}

const reportFailure = (error: unknown): number => {
  if (error instanceof ScanError) {
    printErrorMessage(`Error: ${error.message}`);
    if (error instanceof ConfigError) {
      logger.error("Run with --help to see the available options.");
    }
    return error.exitCode;
  }
  printErrorMessage(`Unexpected error: ${describeError(error)}`);
  return EXIT_FATAL;
};
