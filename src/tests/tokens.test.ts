import { describe, expect, it } from "vitest";
import { countTokens, extractTerms, normalizeForMatch, tokenizeWords } from "@/lib/pipeline/tokens";

describe("tokenizeWords", () => {
  it("keeps apostrophes and hyphens inside words and drops punctuation", () => {
    expect(tokenizeWords("Don't stop-believing, 2024 rocks!")).toEqual(["Don't", "stop-believing", "2024", "rocks"]);
  });

  it("counts nothing in blank text", () => {
    expect(countTokens("  ... ")).toBe(0);
  });
});

describe("extractTerms", () => {
  it("removes stopwords, folds case and deduplicates", () => {
    expect(extractTerms("What vector library do they use? Vector search's best")).toEqual([
      "vector",
      "library",
      "use",
      "search",
      "best",
    ]);
  });

  it("allows configurable stopwords", () => {
    expect(extractTerms("alpha beta gamma", { stopwords: ["beta"] })).toEqual(["alpha", "gamma"]);
  });
});

describe("normalizeForMatch", () => {
  it("replaces punctuation with single spaces", () => {
    expect(normalizeForMatch("Sentence-Transformers & FAISS!")).toBe("sentence transformers faiss");
  });
});
