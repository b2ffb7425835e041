// High score persistence: a single unsigned integer stored as text
// The engine only sees the HighScoreStore contract; failures never reach it.

import { readFileSync, writeFileSync } from "node:fs";

import { debugLog } from "../utils/debug";

export const HIGH_SCORE_FILE = "highscore.txt" as const;

export type HighScoreStore = {
  /** Stored score, or 0 when missing or unparseable */
  load(): number;
  /** Best effort; implementations swallow their own failures */
  save(score: number): void;
};

// Accept only plain unsigned integers, the way they are written by save()
export function parseHighScore(raw: string): number {
  const trimmed = raw.trim();
  if (!/^\d+$/.test(trimmed)) return 0;
  const value = Number(trimmed);
  return Number.isSafeInteger(value) ? value : 0;
}

function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function createFileHighScoreStore(
  path: string = HIGH_SCORE_FILE,
): HighScoreStore {
  return {
    load(): number {
      try {
        return parseHighScore(readFileSync(path, "utf8"));
      } catch (err) {
        debugLog("highscore", `load failed for ${path}`, describeError(err));
        return 0;
      }
    },
    save(score: number): void {
      try {
        writeFileSync(path, String(score));
      } catch (err) {
        debugLog("highscore", `save failed for ${path}`, describeError(err));
      }
    },
  };
}

export function createMemoryHighScoreStore(
  initial = 0,
): HighScoreStore & { readonly saved: ReadonlyArray<number> } {
  let stored = initial;
  const saved: Array<number> = [];
  return {
    load: (): number => stored,
    save: (score: number): void => {
      stored = score;
      saved.push(score);
    },
    saved,
  };
}
