import type { EngineConfig } from "../config";

/**
 * Gravity interval for a level, in milliseconds. The driving loop owns the
 * clock; the engine only says how long to wait between ticks.
 *
 * max(minTickMs, baseTickMs - (level - 1) * speedIncreasePerLevel)
 */
export function tickDurationMs(
  level: number,
  cfg: Pick<EngineConfig, "baseTickMs" | "minTickMs" | "speedIncreasePerLevel">,
): number {
  const speedReduction = (level - 1) * cfg.speedIncreasePerLevel;
  return Math.max(cfg.minTickMs, cfg.baseTickMs - speedReduction);
}
