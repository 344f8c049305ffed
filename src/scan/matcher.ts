import type { KeywordSet } from "./keywords.js";

export type PageMatch = {
  // 1-based
  page: number;
  keyword: string;
  count: number;
};

/**
 * Count non-overlapping, case-insensitive occurrences of `term` in `text`.
 *
 * Matching is lexical: no tokenization and no word boundaries, so "cat" is
 * counted inside "category".
 */
export const countOccurrences = (text: string, term: string): number => {
  const needle = term.toLowerCase();
  if (!needle || !text) return 0;

  const haystack = text.toLowerCase();
  let count = 0;
  let from = haystack.indexOf(needle);
  while (from !== -1) {
    count++;
    from = haystack.indexOf(needle, from + needle.length);
  }
  return count;
};

export const matchPages = (
  pages: readonly string[],
  keywords: KeywordSet
): PageMatch[] => {
  const matches: PageMatch[] = [];
  pages.forEach((text, index) => {
    for (const keyword of keywords) {
      const count = countOccurrences(text, keyword.term);
      if (count > 0) {
        matches.push({ page: index + 1, keyword: keyword.label, count });
      }
    }
  });
  return matches;
};

export const totalsByKeyword = (
  matches: readonly PageMatch[],
  keywords: KeywordSet
): Record<string, number> => {
  // Own properties, so a keyword such as "__proto__" is kept
  const totals: Record<string, number> = Object.fromEntries(
    keywords.map((keyword) => [keyword.label, 0])
  );
  for (const match of matches) {
    totals[match.keyword] = (totals[match.keyword] ?? 0) + match.count;
  }
  return totals;
};
