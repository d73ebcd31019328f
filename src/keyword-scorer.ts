/**
 * Lexical matching helpers for the keyword pass of hybrid search:
 * query tokenization, document scoring, snippet location and highlighting.
 */

import stopwordList from "./data/stopwords.json";

const STOPWORDS: ReadonlySet<string> = new Set(stopwordList);

export interface Snippet {
  text: string;
  start: number;
  end: number;
  matchedKeywords: string[];
}

/**
 * Scores how well a document's text matches a keyword list, in [0, 1].
 */
export interface KeywordScorer {
  readonly name: string;
  score(content: string, keywords: string[]): number;
}

/**
 * Lowercased, stopword-filtered, de-duplicated query terms longer than one character.
 */
export function tokenizeQuery(
  query: string,
  stopwords: ReadonlySet<string> = STOPWORDS
): string[] {
  const words = query.toLowerCase().match(/[\p{L}\p{N}_]+/gu) ?? [];
  const seen = new Set<string>();
  for (const word of words) {
    if (word.length > 1 && !stopwords.has(word)) {
      seen.add(word);
    }
  }
  return [...seen];
}

/** Non-overlapping occurrences of `needle` in `haystack`. */
export function countOccurrences(haystack: string, needle: string): number {
  if (!needle) return 0;
  let count = 0;
  let position = haystack.indexOf(needle);
  while (position !== -1) {
    count++;
    position = haystack.indexOf(needle, position + needle.length);
  }
  return count;
}

/**
 * Σ (occurrences / wordCount) × (1 + keywordLength / 10), clamped to 1.
 * Longer keywords weigh more.
 */
export class TermFrequencyScorer implements KeywordScorer {
  readonly name = "term-frequency";

  score(content: string, keywords: string[]): number {
    if (!content || keywords.length === 0) return 0;

    const contentLower = content.toLowerCase();
    const wordCount = content.split(/\s+/).filter((w) => w.length > 0).length;
    if (wordCount === 0) return 0;

    let total = 0;
    for (const keyword of keywords) {
      const count = countOccurrences(contentLower, keyword.toLowerCase());
      if (count > 0) {
        total += (count / wordCount) * (1 + keyword.length / 10);
      }
    }
    return Math.min(total, 1);
  }
}

/**
 * Windows of `windowSize` characters centred on each keyword match.
 * Overlapping windows are merged into one snippet carrying every keyword
 * matched inside it, so returned snippets never overlap. Snippets with more
 * matched keywords come first, then by position.
 */
export function findSnippets(
  content: string,
  keywords: string[],
  windowSize: number = 200
): Snippet[] {
  const half = Math.floor(windowSize / 2);
  const contentLower = content.toLowerCase();
  const windows: Array<{ start: number; end: number; keyword: string }> = [];

  for (const keyword of keywords) {
    const keywordLower = keyword.toLowerCase();
    if (!keywordLower) continue;

    let position = contentLower.indexOf(keywordLower);
    while (position !== -1) {
      windows.push({
        start: Math.max(0, position - half),
        end: Math.min(content.length, position + keyword.length + half),
        keyword,
      });
      position = contentLower.indexOf(keywordLower, position + 1);
    }
  }
  windows.sort((a, b) => a.start - b.start);

  const snippets: Snippet[] = [];
  let current: Snippet | undefined;
  for (const window of windows) {
    if (current && window.start < current.end) {
      current.end = Math.max(current.end, window.end);
      if (!current.matchedKeywords.includes(window.keyword)) {
        current.matchedKeywords.push(window.keyword);
      }
      continue;
    }
    current = {
      text: "",
      start: window.start,
      end: window.end,
      matchedKeywords: [window.keyword],
    };
    snippets.push(current);
  }

  for (const snippet of snippets) {
    snippet.text = content.slice(snippet.start, snippet.end);
  }
  return snippets.sort((a, b) => b.matchedKeywords.length - a.matchedKeywords.length);
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * Wraps case-insensitive keyword matches in <mark> tags. Longer keywords are
 * tried first so "vector index" wins over "vector".
 */
export function highlight(text: string, keywords: string[]): string {
  const terms = [...new Set(keywords.filter((k) => k.length > 0))].sort(
    (a, b) => b.length - a.length
  );
  if (terms.length === 0) return text;

  const pattern = new RegExp(terms.map(escapeRegExp).join("|"), "gi");
  return text.replace(pattern, (match) => `<mark>${match}</mark>`);
}
