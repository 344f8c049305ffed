import { describe, it, expect, beforeEach, afterEach } from "vitest";
import fs from "fs";
import path from "path";
import { ConfigError, UnreadableFileError } from "../src/errors.js";
import { setLogLevel } from "../src/logger.js";
import { parseKeywords } from "../src/scan/keywords.js";
import { ReportBuilder } from "../src/scan/report.js";
import { Scanner, collectPdfPaths } from "../src/scan/scanner.js";
import { FakeExtractor } from "./helpers/FakeExtractor.js";
import { makeTmpDir, removeTmpDir, writeFiles } from "./helpers/tmp.js";

describe("collectPdfPaths", () => {
  let cwd: string;

  beforeEach(() => {
    cwd = makeTmpDir();
    writeFiles(cwd, {
      "pdfs/b.pdf": "%PDF-",
      "pdfs/A.PDF": "%PDF-",
      "pdfs/notes.txt": "not a pdf",
      "pdfs/sub/c.pdf": "%PDF-",
    });
    // A directory whose name looks like a PDF
    fs.mkdirSync(path.join(cwd, "pdfs", "folder.pdf"));
  });

  afterEach(() => {
    removeTmpDir(cwd);
  });

  it("lists direct .pdf children only, sorted, relative to the given directory", async () => {
    const paths = await collectPdfPaths(
      { kind: "dir", pdfDir: "pdfs", recursive: false },
      cwd
    );
    expect(paths).toEqual([path.join("pdfs", "A.PDF"), path.join("pdfs", "b.pdf")]);
  });

  it("walks subdirectories when recursive", async () => {
    const paths = await collectPdfPaths(
      { kind: "dir", pdfDir: "pdfs", recursive: true },
      cwd
    );
    expect(paths).toEqual([
      path.join("pdfs", "A.PDF"),
      path.join("pdfs", "b.pdf"),
      path.join("pdfs", "sub", "c.pdf"),
    ]);
  });

  it("returns the single file as given", async () => {
    const paths = await collectPdfPaths({ kind: "file", pdfFile: "pdfs/b.pdf" }, cwd);
    expect(paths).toEqual(["pdfs/b.pdf"]);
  });

  it("throws ConfigError for a missing file or directory", async () => {
    await expect(
      collectPdfPaths({ kind: "file", pdfFile: "pdfs/missing.pdf" }, cwd)
    ).rejects.toThrow("PDF file not found: pdfs/missing.pdf");
    await expect(
      collectPdfPaths({ kind: "dir", pdfDir: "nope", recursive: false }, cwd)
    ).rejects.toBeInstanceOf(ConfigError);
  });

  it("rejects a directory passed as a single file", async () => {
    await expect(
      collectPdfPaths({ kind: "file", pdfFile: "pdfs/sub" }, cwd)
    ).rejects.toBeInstanceOf(ConfigError);
  });
});

describe("Scanner", () => {
  const keywords = parseKeywords("cat\ninvoice");

  beforeEach(() => {
    setLogLevel("silent");
  });

  afterEach(() => {
    setLogLevel("info");
  });

  it("matches every page of a readable file", async () => {
    const scanner = new Scanner({
      extractor: new FakeExtractor({ "a.pdf": ["Cat cat CATEGORY", "Invoice"] }),
      keywords,
      cwd: "/data",
    });
    expect(await scanner.scanFile("a.pdf")).toEqual({
      ok: true,
      matches: [
        { page: 1, keyword: "cat", count: 3 },
        { page: 2, keyword: "invoice", count: 1 },
      ],
    });
  });

  it("passes paths resolved against cwd to the extractor", async () => {
    const extractor = new FakeExtractor({ "a.pdf": [] });
    const scanner = new Scanner({ extractor, keywords, cwd: "/data" });
    await scanner.scanFile(path.join("pdfs", "a.pdf"));
    expect(extractor.calls).toEqual([path.resolve("/data", "pdfs", "a.pdf")]);
  });

  it("records an unsupported file type without extracting", async () => {
    const extractor = new FakeExtractor({});
    const scanner = new Scanner({ extractor, keywords });
    expect(await scanner.scanFile("notes.txt")).toEqual({
      ok: false,
      error: "unsupported file type",
    });
    expect(extractor.calls).toEqual([]);
  });

  it("keeps going when one of N files is corrupt", async () => {
    const extractor = new FakeExtractor({
      "1.pdf": ["a cat"],
      "2.pdf": new UnreadableFileError("2.pdf", "could not parse PDF: Invalid PDF structure."),
      "3.pdf": ["invoice", "cat invoice"],
      "4.pdf": [""],
    });
    const builder = new ReportBuilder(keywords, "keywords.txt");
    const scanner = new Scanner({ extractor, keywords, cwd: "/data" });

    await scanner.scanAll(["1.pdf", "2.pdf", "3.pdf", "4.pdf"], builder);
    const run = builder.finalize(new Date(0));

    expect(run.files).toHaveLength(4);
    const failed = run.files.filter((f) => f.error);
    expect(failed).toHaveLength(1);
    expect(failed[0]).toMatchObject({
      path: "2.pdf",
      matches: [],
      error: "could not parse PDF: Invalid PDF structure.",
    });
    expect(run.files[2].totals).toEqual({ cat: 1, invoice: 2 });
    expect(run.files[3].matches).toEqual([]);
  });

  it("turns unexpected extractor errors into file errors", async () => {
    const scanner = new Scanner({
      extractor: new FakeExtractor({ "x.pdf": new Error("boom") }),
      keywords,
    });
    expect(await scanner.scanFile("x.pdf")).toEqual({ ok: false, error: "boom" });
  });
});
