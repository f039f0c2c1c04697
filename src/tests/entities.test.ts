import { writeFile } from "node:fs/promises";
import { join } from "node:path";
import { describe, expect, it } from "vitest";
import { VocabularyEntityExtractor, loadEntityVocabulary } from "@/lib/pipeline/entities";
import { makeTempDir } from "@/tests/helpers";

const vocabulary = {
  entities: [
    { canonical: "faiss", aliases: [] },
    { canonical: "sentence transformers", aliases: ["sentence-transformers", "sbert"] },
    { canonical: "openai", aliases: ["open ai"] },
    { canonical: "claude", aliases: [] },
    { canonical: "postgresql", aliases: ["postgres"] },
    { canonical: "retrieval augmented generation", aliases: ["rag"] },
  ],
};

describe("VocabularyEntityExtractor", () => {
  it("finds known entities and returns them sorted and canonical", async () => {
    const extractor = new VocabularyEntityExtractor(vocabulary);

    await expect(extractor.extract("We use FAISS and sentence-transformers with the OpenAI API")).resolves.toEqual([
      "faiss",
      "openai",
      "sentence transformers",
    ]);
  });

  it("maps aliases onto the canonical name", async () => {
    const extractor = new VocabularyEntityExtractor(vocabulary);

    await expect(extractor.extract("RAG pipelines on Postgres")).resolves.toEqual([
      "postgresql",
      "retrieval augmented generation",
    ]);
  });

  it("is idempotent over its own output", async () => {
    const extractor = new VocabularyEntityExtractor(vocabulary);
    const first = await extractor.extract("RAG pipelines on Postgres, again with rag");

    expect(extractor.canonicalize(first)).toEqual(first);
    await expect(extractor.extract(first.join(" "))).resolves.toEqual(first);
  });

  it("canonicalizes caller-supplied names", () => {
    const extractor = new VocabularyEntityExtractor(vocabulary);

    expect(extractor.canonicalize(["Postgres", "RAG", "Unknown Thing", "postgresql"])).toEqual([
      "postgresql",
      "retrieval augmented generation",
      "unknown thing",
    ]);
  });

  it("adds capitalized runs in proper-noun mode", async () => {
    const text = "we tried Model Context Protocol with Claude at The Vector Lab";
    const withNouns = new VocabularyEntityExtractor(vocabulary, "vocabulary+proper-nouns");
    const vocabularyOnly = new VocabularyEntityExtractor(vocabulary);

    await expect(withNouns.extract(text)).resolves.toEqual(["claude", "model context protocol", "vector lab"]);
    await expect(vocabularyOnly.extract(text)).resolves.toEqual(["claude"]);
  });
});

describe("loadEntityVocabulary", () => {
  it("loads the bundled vocabulary", async () => {
    const loaded = await loadEntityVocabulary();

    expect(loaded.entities.find((entity) => entity.canonical === "faiss")).toBeDefined();
  });

  it("rejects a vocabulary entry without a canonical name", async () => {
    const dir = await makeTempDir("vocabulary");
    const path = join(dir, "vocabulary.json");
    await writeFile(path, JSON.stringify({ entities: [{ aliases: ["x"] }] }), "utf8");

    await expect(loadEntityVocabulary(path)).rejects.toThrow(`Invalid entity vocabulary at ${path}`);
  });
});
