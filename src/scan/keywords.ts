import { promises as fs } from "fs";
import { ConfigError, describeError } from "../errors.js";

export type Keyword = {
  // Lower-cased form used for matching
  term: string;
  // Casing as first written in the keyword file, used in reports
  label: string;
};

export type KeywordSet = readonly Keyword[];

const SEPARATOR = /[\r\n,]+/;

/**
 * Split keyword file contents on newlines and commas (mixed freely), trim every
 * entry and keep the first spelling of each keyword compared case-insensitively.
 */
export const parseKeywords = (text: string): KeywordSet => {
  const seen = new Set<string>();
  const keywords: Keyword[] = [];

  for (const raw of text.split(SEPARATOR)) {
    const label = raw.trim();
    if (!label) continue;
    const term = label.toLowerCase();
    if (seen.has(term)) continue;
    seen.add(term);
    keywords.push(Object.freeze({ term, label }));
  }

  return Object.freeze(keywords);
};

export const loadKeywords = async (filePath: string): Promise<KeywordSet> => {
  let text: string;
  try {
    text = await fs.readFile(filePath, "utf8");
  } catch (error) {
    throw new ConfigError(
      `Keywords file not readable: ${filePath} (${describeError(error)})`,
      { cause: error }
    );
  }

  const keywords = parseKeywords(text.replace(/^\uFEFF/, ""));
  if (keywords.length === 0) {
    throw new ConfigError(`No keywords found in the keywords file: ${filePath}`);
  }
  return keywords;
};
