export const DEFAULT_ENGLISH_STOPWORDS = [
  "a",
  "an",
  "and",
  "are",
  "as",
  "at",
  "be",
  "but",
  "by",
  "do",
  "does",
  "for",
  "how",
  "i",
  "in",
  "is",
  "it",
  "of",
  "on",
  "or",
  "so",
  "that",
  "the",
  "they",
  "this",
  "to",
  "was",
  "we",
  "what",
  "which",
  "with",
  "you",
];

type ExtractTermOptions = {
  stopwords?: string[];
};

/**
 * Word tokens as counted for chunk sizing and context budgets. One token is
 * one run of letters/digits, optionally joined by apostrophes or hyphens.
 */
export function tokenizeWords(text: string): string[] {
  const tokens = text.match(/[\p{L}\p{N}][\p{L}\p{N}'-]*/gu);

  if (!tokens) {
    return [];
  }

  return tokens.map((token) => token.trim()).filter(Boolean);
}

export function countTokens(text: string): number {
  return tokenizeWords(text).length;
}

export function extractTerms(text: string, options: ExtractTermOptions = {}): string[] {
  const stopwordSet = new Set((options.stopwords ?? DEFAULT_ENGLISH_STOPWORDS).map((word) => normalizeToken(word)));

  const unique: string[] = [];
  const seen = new Set<string>();

  for (const token of tokenizeWords(text)) {
    const normalized = normalizeToken(token);

    if (!normalized || stopwordSet.has(normalized) || seen.has(normalized)) {
      continue;
    }

    seen.add(normalized);
    unique.push(normalized);
  }

  return unique;
}

export function normalizeToken(token: string): string {
  return token
    .trim()
    .toLowerCase()
    .replace(/'s$/u, "")
    .replace(/^[-']+|[-']+$/gu, "");
}

export function normalizeForMatch(input: string): string {
  return input
    .toLowerCase()
    .replace(/[^\p{L}\p{N}\s]/gu, " ")
    .replace(/\s+/g, " ")
    .trim();
}
