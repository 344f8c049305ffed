import { promises as fs } from "fs";
import path from "path";
import { OutputWriteError } from "../errors.js";
import type { KeywordSet } from "./keywords.js";
import { totalsByKeyword, type PageMatch } from "./matcher.js";

export type FileOutcome =
  | { ok: true; matches: PageMatch[] }
  | { ok: false; error: string };

export type FileReport = {
  path: string;
  matches: PageMatch[];
  totals: Record<string, number>;
  error?: string;
};

export type RunReport = {
  generatedAt: Date;
  keywordSource: string;
  files: FileReport[];
};

// Shape written to disk. Key order here is the key order in the JSON file.
export type JsonRunReport = {
  generated_at: string;
  keyword_source: string;
  files: Array<{
    path: string;
    matches: Array<{ page: number; keyword: string; count: number }>;
    totals: Record<string, number>;
    error?: string;
  }>;
};

export const CSV_HEADER = ["file", "keyword", "page", "count"] as const;

export class ReportBuilder {
  private files: FileReport[] = [];
  private keywords: KeywordSet;
  private keywordSource: string;

  constructor(keywords: KeywordSet, keywordSource: string) {
    this.keywords = keywords;
    this.keywordSource = keywordSource;
  }

  public addFile(filePath: string, outcome: FileOutcome) {
    if (outcome.ok) {
      this.files.push({
        path: filePath,
        matches: outcome.matches,
        totals: totalsByKeyword(outcome.matches, this.keywords),
      });
      return;
    }
    this.files.push({
      path: filePath,
      matches: [],
      totals: {},
      error: outcome.error || "unknown error",
    });
  }

  public finalize(generatedAt: Date): RunReport {
    return {
      generatedAt,
      keywordSource: this.keywordSource,
      files: [...this.files],
    };
  }
}

export const toJsonReport = (run: RunReport): JsonRunReport => ({
  generated_at: run.generatedAt.toISOString(),
  keyword_source: run.keywordSource,
  files: run.files.map((file) => ({
    path: file.path,
    matches: file.matches.map((m) => ({
      page: m.page,
      keyword: m.keyword,
      count: m.count,
    })),
    totals: { ...file.totals },
    ...(file.error !== undefined ? { error: file.error } : {}),
  })),
});

export const serializeJson = (run: RunReport): string =>
  JSON.stringify(toJsonReport(run), null, 2) + "\n";

const escapeCsvField = (value: string | number): string => {
  const str = String(value);
  return /[",\r\n]/.test(str) ? `"${str.replace(/"/g, '""')}"` : str;
};

const toCsvRow = (fields: ReadonlyArray<string | number>) =>
  fields.map(escapeCsvField).join(",");

export const serializeCsv = (run: RunReport): string => {
  const lines = [toCsvRow(CSV_HEADER)];
  for (const file of run.files) {
    for (const match of file.matches) {
      lines.push(toCsvRow([file.path, match.keyword, match.page, match.count]));
    }
  }
  return lines.join("\n") + "\n";
};

export const writeReport = async (outputPath: string, contents: string) => {
  try {
    await fs.mkdir(path.dirname(outputPath), { recursive: true });
    await fs.writeFile(outputPath, contents, "utf8");
  } catch (error) {
    throw new OutputWriteError(outputPath, { cause: error });
  }
};
