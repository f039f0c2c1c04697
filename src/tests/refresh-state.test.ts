import { readFile, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { describe, expect, it } from "vitest";
import {
  createInitialRefreshState,
  markRefreshed,
  nextRefreshAt,
  readRefreshState,
  setRefreshInterval,
  shouldRefresh,
  toggleRefreshMode,
  writeRefreshState,
} from "@/lib/pipeline/ingest/refresh-state";
import { makeTempDir } from "@/tests/helpers";

describe("refresh state", () => {
  it("starts in manual mode when nothing is persisted", async () => {
    const base = await makeTempDir("refresh");

    await expect(readRefreshState(join(base, "refresh-state.json"))).resolves.toEqual({
      mode: "manual",
      intervalDays: 7,
      lastRefreshAt: null,
      updatedAt: "1970-01-01T00:00:00.000Z",
    });
  });

  it("persists a toggled mode", async () => {
    const base = await makeTempDir("refresh");
    const path = join(base, "nested", "refresh-state.json");

    const written = await writeRefreshState(toggleRefreshMode(createInitialRefreshState()), path);
    const loaded = await readRefreshState(path);
    const raw = JSON.parse(await readFile(path, "utf8"));

    expect(loaded).toEqual(written);
    expect(loaded.mode).toBe("auto");
    expect(raw.updatedAt).not.toBe("1970-01-01T00:00:00.000Z");
  });

  it("falls back to defaults for unknown persisted values", async () => {
    const base = await makeTempDir("refresh");
    const path = join(base, "refresh-state.json");
    await writeFile(path, JSON.stringify({ mode: "sometimes", intervalDays: 0, lastRefreshAt: "later" }), "utf8");

    await expect(readRefreshState(path)).resolves.toMatchObject({
      mode: "manual",
      intervalDays: 7,
      lastRefreshAt: null,
    });
  });

  it("is due in auto mode once the interval has elapsed", () => {
    const auto = markRefreshed(
      setRefreshInterval(toggleRefreshMode(createInitialRefreshState()), 7),
      new Date("2024-01-01T00:00:00.000Z"),
    );

    expect(nextRefreshAt(auto)?.toISOString()).toBe("2024-01-08T00:00:00.000Z");
    expect(shouldRefresh(auto, new Date("2024-01-07T23:59:59.000Z"))).toBe(false);
    expect(shouldRefresh(auto, new Date("2024-01-08T00:00:00.000Z"))).toBe(true);
  });

  it("is due immediately in auto mode when it has never run", () => {
    expect(shouldRefresh(toggleRefreshMode(createInitialRefreshState()))).toBe(true);
  });

  it("is never due in manual mode", () => {
    const manual = markRefreshed(createInitialRefreshState(), new Date("2020-01-01T00:00:00.000Z"));

    expect(nextRefreshAt(manual)).toBeNull();
    expect(shouldRefresh(manual, new Date("2024-01-01T00:00:00.000Z"))).toBe(false);
  });

  it("rejects a non-positive interval", () => {
    expect(() => setRefreshInterval(createInitialRefreshState(), 0)).toThrow("Invalid refresh interval: 0");
  });
});
