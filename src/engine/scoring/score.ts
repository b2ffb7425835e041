// Base points per simultaneous clear, multiplied by the level before the clear
export const SCORE_SINGLE = 100;
export const SCORE_DOUBLE = 300;
export const SCORE_TRIPLE = 500;
export const SCORE_TETRIS = 800;

export const LINE_CLEAR_POINTS: Readonly<Record<number, number>> = {
  1: SCORE_SINGLE,
  2: SCORE_DOUBLE,
  3: SCORE_TRIPLE,
  4: SCORE_TETRIS,
};

export type ScoreState = Readonly<{
  score: number;
  linesCleared: number;
  level: number;
}>;

export function basePoints(lines: number): number {
  return LINE_CLEAR_POINTS[lines] ?? 0;
}

export function levelForLines(
  linesCleared: number,
  linesPerLevel: number,
): number {
  return Math.floor(linesCleared / linesPerLevel) + 1;
}

/**
 * Apply a clear of `lines` rows. `leveledUp` is set when the level rose,
 * however many thresholds the clear crossed; only the final level counts.
 */
export function applyLineClear(
  s: ScoreState,
  lines: number,
  linesPerLevel: number,
): { next: ScoreState; leveledUp: boolean } {
  const score = s.score + basePoints(lines) * s.level;
  const linesCleared = s.linesCleared + lines;
  const newLevel = levelForLines(linesCleared, linesPerLevel);
  const leveledUp = newLevel > s.level;

  return {
    leveledUp,
    next: {
      level: leveledUp ? newLevel : s.level,
      linesCleared,
      score,
    },
  };
}
