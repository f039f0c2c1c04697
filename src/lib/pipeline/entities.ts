import { readFile } from "node:fs/promises";
import { fileURLToPath } from "node:url";
import { z } from "zod";
import { EntityExtractionError } from "@/lib/errors";
import { DEFAULT_ENGLISH_STOPWORDS, normalizeForMatch } from "@/lib/pipeline/tokens";

export const DEFAULT_VOCABULARY_PATH = fileURLToPath(new URL("../../../data/entity-vocabulary.json", import.meta.url));

const vocabularySchema = z.object({
  entities: z.array(
    z.object({
      canonical: z.string().min(1),
      aliases: z.array(z.string().min(1)).default([]),
    }),
  ),
});

export type EntityVocabulary = z.infer<typeof vocabularySchema>;

export type EntityRecognitionMode = "vocabulary" | "vocabulary+proper-nouns";

export interface EntityExtractor {
  readonly mode: EntityRecognitionMode;
  extract(text: string): Promise<string[]>;
  canonicalize(values: string[]): string[];
}

export async function loadEntityVocabulary(path = DEFAULT_VOCABULARY_PATH): Promise<EntityVocabulary> {
  const raw = await readFile(path, "utf8");
  const parsed = vocabularySchema.safeParse(JSON.parse(raw));

  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("; ");
    throw new Error(`Invalid entity vocabulary at ${path}: ${issues}`);
  }

  return parsed.data;
}

const PROPER_NOUN_PATTERN = /\b(?:[A-Z][\p{L}\p{N}]*(?:\s+[A-Z][\p{L}\p{N}]*)+|[A-Z][A-Z0-9]+)\b/gu;

export class VocabularyEntityExtractor implements EntityExtractor {
  private readonly aliasToCanonical = new Map<string, string>();
  private readonly aliases: string[];
  private readonly stopwords = new Set(DEFAULT_ENGLISH_STOPWORDS);

  constructor(
    vocabulary: EntityVocabulary,
    readonly mode: EntityRecognitionMode = "vocabulary",
  ) {
    for (const entry of vocabulary.entities) {
      const canonical = entry.canonical.trim().toLowerCase();

      for (const alias of [entry.canonical, ...entry.aliases]) {
        const normalized = normalizeForMatch(alias);
        if (normalized && !this.aliasToCanonical.has(normalized)) {
          this.aliasToCanonical.set(normalized, canonical);
        }
      }
    }

    this.aliases = Array.from(this.aliasToCanonical.keys());
  }

  async extract(text: string): Promise<string[]> {
    try {
      const found = new Set<string>();
      const padded = ` ${normalizeForMatch(text)} `;

      for (const alias of this.aliases) {
        if (padded.includes(` ${alias} `)) {
          found.add(this.resolve(alias));
        }
      }

      if (this.mode === "vocabulary+proper-nouns") {
        for (const candidate of this.findProperNouns(text)) {
          found.add(this.resolve(candidate));
        }
      }

      return sortEntities(found);
    } catch (error) {
      throw new EntityExtractionError(
        `Entity extraction failed: ${error instanceof Error ? error.message : "unknown error"}`,
        { cause: error },
      );
    }
  }

  canonicalize(values: string[]): string[] {
    const resolved = new Set<string>();

    for (const value of values) {
      const normalized = normalizeForMatch(value);
      if (normalized) {
        resolved.add(this.resolve(normalized));
      }
    }

    return sortEntities(resolved);
  }

  private resolve(normalized: string): string {
    return this.aliasToCanonical.get(normalized) ?? normalized;
  }

  private findProperNouns(text: string): string[] {
    const matches = text.match(PROPER_NOUN_PATTERN) ?? [];
    const results: string[] = [];

    for (const match of matches) {
      const words = normalizeForMatch(match).split(" ").filter(Boolean);

      while (words.length > 0 && this.stopwords.has(words[0])) {
        words.shift();
      }

      if (words.length > 0) {
        results.push(words.join(" "));
      }
    }

    return results;
  }
}

function sortEntities(values: Iterable<string>): string[] {
  return Array.from(values).sort((left, right) => left.localeCompare(right, "en"));
}
