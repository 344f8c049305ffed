import { promises as fs } from "fs";
import path from "path";
import { ConfigError, describeError } from "../errors.js";
import { logger } from "../logger.js";
import type { TextExtractor } from "./extractors/TextExtractor.js";
import type { KeywordSet } from "./keywords.js";
import { matchPages, type PageMatch } from "./matcher.js";
import type { FileOutcome, ReportBuilder } from "./report.js";

export type PdfSource =
  | { kind: "file"; pdfFile: string }
  | { kind: "dir"; pdfDir: string; recursive: boolean };

export interface ScannerConfig {
  extractor: TextExtractor;
  keywords: KeywordSet;
  // Base for relative paths; report entries keep the paths as given
  cwd?: string;
}

const compareCodeUnits = (a: string, b: string) => (a < b ? -1 : a > b ? 1 : 0);

const statOrNull = async (target: string) => {
  try {
    return await fs.stat(target);
  } catch {
    return null;
  }
};

/**
 * Resolve the PDFs to scan. Directory listings keep only `.pdf` files (any case)
 * and are sorted so that reports come out in the same order on every run.
 */
export const collectPdfPaths = async (
  source: PdfSource,
  cwd: string = process.cwd()
): Promise<string[]> => {
  if (source.kind === "file") {
    const stat = await statOrNull(path.resolve(cwd, source.pdfFile));
    if (!stat?.isFile()) {
      throw new ConfigError(`PDF file not found: ${source.pdfFile}`);
    }
    return [source.pdfFile];
  }

  const dir = path.resolve(cwd, source.pdfDir);
  const stat = await statOrNull(dir);
  if (!stat?.isDirectory()) {
    throw new ConfigError(`PDF directory not found: ${source.pdfDir}`);
  }

  const entries = await fs.readdir(dir, { recursive: source.recursive });
  const pdfs: string[] = [];
  for (const entry of entries) {
    if (path.extname(entry).toLowerCase() !== ".pdf") continue;
    const entryStat = await statOrNull(path.join(dir, entry));
    if (entryStat?.isFile()) pdfs.push(entry);
  }

  return pdfs
    .sort(compareCodeUnits)
    .map((entry) => path.join(source.pdfDir, entry));
};

export class Scanner {
  private extractor: TextExtractor;
  private keywords: KeywordSet;
  private cwd: string;

  constructor(config: ScannerConfig) {
    this.extractor = config.extractor;
    this.keywords = config.keywords;
    this.cwd = config.cwd ?? process.cwd();
  }

  public async scanFile(filePath: string): Promise<FileOutcome> {
    if (!this.extractor.supports(filePath)) {
      return { ok: false, error: "unsupported file type" };
    }

    let pages: string[];
    try {
      pages = await this.extractor.extract(path.resolve(this.cwd, filePath));
    } catch (error) {
      return { ok: false, error: describeError(error) };
    }

    logger.debug(`  ${filePath}: ${pages.length} page(s) extracted`);
    return { ok: true, matches: matchPages(pages, this.keywords) };
  }

  // One file at a time; a failing file is recorded and the run moves on.
  public async scanAll(filePaths: readonly string[], builder: ReportBuilder) {
    for (const [index, filePath] of filePaths.entries()) {
      logger.log(`[${index + 1}/${filePaths.length}] ${filePath}`);
      const outcome = await this.scanFile(filePath);
      if (outcome.ok) {
        const total = outcome.matches.reduce((sum, m) => sum + m.count, 0);
        logger.debug(`  ${total} match(es) on ${countPages(outcome.matches)} page(s)`);
      } else {
        logger.warn(`  Skipped ${filePath}: ${outcome.error}`);
      }
      builder.addFile(filePath, outcome);
    }
  }
}

const countPages = (matches: readonly PageMatch[]) =>
  new Set(matches.map((m) => m.page)).size;
