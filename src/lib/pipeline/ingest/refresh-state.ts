import { mkdir, readFile, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import type { RefreshMode, RefreshState } from "@/lib/pipeline/types";

export const DEFAULT_REFRESH_STATE_FILE = "refresh-state.json";
const DAY_MS = 24 * 60 * 60 * 1000;

export async function readRefreshState(path: string): Promise<RefreshState> {
  let raw: string;

  try {
    raw = await readFile(path, "utf8");
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      return createInitialRefreshState();
    }

    throw error;
  }

  return normalizeRefreshState(JSON.parse(raw));
}

export async function writeRefreshState(state: RefreshState, path: string): Promise<RefreshState> {
  await mkdir(dirname(path), { recursive: true });
  const normalized = normalizeRefreshState({
    ...state,
    updatedAt: new Date().toISOString(),
  });

  await writeFile(path, JSON.stringify(normalized, null, 2), "utf8");
  return normalized;
}

export function setRefreshMode(state: RefreshState, mode: RefreshMode): RefreshState {
  return { ...state, mode };
}

export function toggleRefreshMode(state: RefreshState): RefreshState {
  return setRefreshMode(state, state.mode === "auto" ? "manual" : "auto");
}

export function setRefreshInterval(state: RefreshState, intervalDays: number): RefreshState {
  if (!Number.isInteger(intervalDays) || intervalDays < 1) {
    throw new Error(`Invalid refresh interval: ${intervalDays}`);
  }

  return { ...state, intervalDays };
}

export function markRefreshed(state: RefreshState, now = new Date()): RefreshState {
  return { ...state, lastRefreshAt: now.toISOString() };
}

export function nextRefreshAt(state: RefreshState): Date | null {
  if (state.mode === "manual") {
    return null;
  }

  if (!state.lastRefreshAt) {
    return new Date(0);
  }

  return new Date(Date.parse(state.lastRefreshAt) + state.intervalDays * DAY_MS);
}

/** Auto mode only: due once the interval has elapsed since the last refresh. */
export function shouldRefresh(state: RefreshState, now = new Date()): boolean {
  const next = nextRefreshAt(state);
  return next !== null && now.getTime() >= next.getTime();
}

export function createInitialRefreshState(): RefreshState {
  return {
    mode: "manual",
    intervalDays: 7,
    lastRefreshAt: null,
    updatedAt: new Date(0).toISOString(),
  };
}

function normalizeRefreshState(input: unknown): RefreshState {
  const initial = createInitialRefreshState();

  if (typeof input !== "object" || input === null) {
    return initial;
  }

  const record: Record<string, unknown> = { ...input };
  const mode = record.mode;
  const intervalDays = record.intervalDays;
  const lastRefreshAt = record.lastRefreshAt;

  return {
    mode: mode === "auto" || mode === "manual" ? mode : initial.mode,
    intervalDays:
      typeof intervalDays === "number" && Number.isInteger(intervalDays) && intervalDays >= 1
        ? intervalDays
        : initial.intervalDays,
    lastRefreshAt:
      typeof lastRefreshAt === "string" && !Number.isNaN(Date.parse(lastRefreshAt)) ? lastRefreshAt : null,
    updatedAt: typeof record.updatedAt === "string" ? record.updatedAt : initial.updatedAt,
  };
}
