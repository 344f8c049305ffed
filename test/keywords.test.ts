import { describe, it, expect, beforeEach, afterEach } from "vitest";
import path from "path";
import { ConfigError } from "../src/errors.js";
import { loadKeywords, parseKeywords } from "../src/scan/keywords.js";
import { makeTmpDir, removeTmpDir, writeFiles } from "./helpers/tmp.js";

describe("parseKeywords", () => {
  it("splits on newlines and commas, trims and drops empty entries", () => {
    const keywords = parseKeywords("alpha\n beta , gamma\r\n\n,,delta  \n");
    expect(keywords.map((k) => k.label)).toEqual([
      "alpha",
      "beta",
      "gamma",
      "delta",
    ]);
  });

  it("deduplicates case-insensitively and keeps the first spelling", () => {
    const keywords = parseKeywords("Cat\ncat, DOG ,\n\n,dog\r\nBird,CAT");
    expect(keywords).toEqual([
      { term: "cat", label: "Cat" },
      { term: "dog", label: "DOG" },
      { term: "bird", label: "Bird" },
    ]);
    const terms = keywords.map((k) => k.term);
    expect(new Set(terms).size).toBe(terms.length);
  });

  it("returns a frozen set", () => {
    const keywords = parseKeywords("one,two");
    expect(Object.isFrozen(keywords)).toBe(true);
    expect(Object.isFrozen(keywords[0])).toBe(true);
  });

  it("returns no keywords for blank input", () => {
    expect(parseKeywords(" \n , \r\n")).toEqual([]);
  });
});

describe("loadKeywords", () => {
  let dir: string;

  beforeEach(() => {
    dir = makeTmpDir();
  });

  afterEach(() => {
    removeTmpDir(dir);
  });

  it("reads a UTF-8 keyword file and strips a byte order mark", async () => {
    writeFiles(dir, { "keywords.txt": "\uFEFFInvoice,refund\nTotal\n" });
    const keywords = await loadKeywords(path.join(dir, "keywords.txt"));
    expect(keywords.map((k) => k.label)).toEqual(["Invoice", "refund", "Total"]);
  });

  it("throws ConfigError when the file does not exist", async () => {
    await expect(loadKeywords(path.join(dir, "missing.txt"))).rejects.toBeInstanceOf(
      ConfigError
    );
  });

  it("throws ConfigError when the file has no usable keywords", async () => {
    const file = path.join(dir, "keywords.txt");
    writeFiles(dir, { "keywords.txt": "\n , \n" });
    await expect(loadKeywords(file)).rejects.toThrow(
      `No keywords found in the keywords file: ${file}`
    );
  });
});
