import { describe, expect, it } from "vitest";
import { MissingTranscriptError } from "@/lib/errors";
import { buildSemanticUnits, resolveChunkingOptions } from "@/lib/pipeline/chunker";
import type { CanonicalTranscriptSegment } from "@/lib/pipeline/types";

function segment(seq: number, startTime: number, endTime: number, text: string): CanonicalTranscriptSegment {
  return {
    videoId: "v1",
    seq,
    startTime,
    endTime,
    duration: endTime - startTime,
    text,
  };
}

describe("buildSemanticUnits", () => {
  it("splits the tools walkthrough into two units by caption duration", () => {
    const segments = [
      segment(0, 0, 5, "intro to tools"),
      segment(1, 5, 12, "we use FAISS for search"),
      segment(2, 12, 20, "and sentence transformers for embeddings"),
    ];

    const { units, gaps } = buildSemanticUnits("v1", segments, { minSize: 5, maxSize: 15, sizeUnit: "seconds" });

    expect(gaps).toEqual([]);
    expect(units).toHaveLength(2);
    expect(units[0]).toEqual({
      unitId: "v1:0",
      videoId: "v1",
      sequenceIndex: 0,
      startTime: 0,
      endTime: 12,
      text: "intro to tools we use FAISS for search",
      tokenCount: 8,
      captionSpans: [
        { startTime: 0, endTime: 5, charStart: 0, charEnd: 14 },
        { startTime: 5, endTime: 12, charStart: 15, charEnd: 38 },
      ],
    });
    expect(units[1]).toMatchObject({
      unitId: "v1:1",
      sequenceIndex: 1,
      startTime: 12,
      endTime: 20,
      text: "and sentence transformers for embeddings",
      tokenCount: 5,
    });
  });

  it("is deterministic for identical input", () => {
    const segments = [
      segment(0, 0, 2, "one two three."),
      segment(1, 2, 4, "four five six"),
      segment(2, 4, 6, "seven eight nine."),
    ];
    const options = { minSize: 3, maxSize: 6 };

    expect(buildSemanticUnits("v1", segments, options)).toEqual(buildSemanticUnits("v1", segments, options));
  });

  it("backtracks to the last sentence end when the head stays above the minimum", () => {
    const segments = [
      segment(0, 0, 1, "one two"),
      segment(1, 1, 2, "three four."),
      segment(2, 2, 3, "five six"),
      segment(3, 3, 4, "seven eight"),
      segment(4, 4, 5, "nine ten"),
    ];

    const { units } = buildSemanticUnits("v1", segments, { minSize: 4, maxSize: 8, backtrackSegments: 4 });

    expect(units.map((unit) => unit.text)).toEqual(["one two three four.", "five six seven eight nine ten"]);
    expect(units.map((unit) => unit.tokenCount)).toEqual([4, 6]);
    expect(units.map((unit) => [unit.startTime, unit.endTime])).toEqual([
      [0, 2],
      [2, 5],
    ]);
  });

  it("keeps absorbing captions while the unit is under the minimum", () => {
    const segments = [segment(0, 0, 1, "a b c"), segment(1, 1, 2, "d e f"), segment(2, 2, 3, "g")];

    const { units } = buildSemanticUnits("v1", segments, { minSize: 4, maxSize: 5 });

    expect(units.map((unit) => unit.text)).toEqual(["a b c d e f", "g"]);
  });

  it("closes a unit at a caption gap and records the gap", () => {
    const segments = [
      segment(0, 0, 2, "alpha beta"),
      segment(1, 2, 4, "gamma delta"),
      segment(2, 30, 32, "epsilon zeta"),
    ];

    const { units, gaps } = buildSemanticUnits("v1", segments, { minSize: 2, maxSize: 100, gapToleranceSec: 10 });

    expect(units.map((unit) => [unit.startTime, unit.endTime])).toEqual([
      [0, 4],
      [30, 32],
    ]);
    expect(gaps).toEqual([{ afterSequenceIndex: 0, startTime: 4, endTime: 30 }]);
  });

  it("covers every caption with exactly one unit span", () => {
    const segments = Array.from({ length: 40 }, (_, index) =>
      segment(index, index * 3, index * 3 + 3, index % 4 === 3 ? "closing words here." : "more words in here"),
    );

    const { units } = buildSemanticUnits("v1", segments, { minSize: 10, maxSize: 20 });

    for (const caption of segments) {
      const covering = units.filter((unit) => unit.startTime <= caption.startTime && unit.endTime >= caption.endTime);
      expect(covering).toHaveLength(1);
    }

    units.forEach((unit, index) => {
      expect(unit.sequenceIndex).toBe(index);
      expect(unit.tokenCount).toBeLessThanOrEqual(20);
    });
  });

  it("raises MissingTranscriptError for an empty transcript", () => {
    expect(() => buildSemanticUnits("v2", [])).toThrow(MissingTranscriptError);
  });
});

describe("resolveChunkingOptions", () => {
  it("rejects a minimum above the maximum", () => {
    expect(() => resolveChunkingOptions({ minSize: 10, maxSize: 5 })).toThrow("Invalid chunking min/max settings");
  });
});
