import { DEFAULT_BOARD_HEIGHT, DEFAULT_BOARD_WIDTH } from "./core/types";

export type EngineConfig = Readonly<{
  width: number;
  height: number;
  previewCount: number;
  linesPerLevel: number;
  baseTickMs: number;
  minTickMs: number;
  speedIncreasePerLevel: number;
}>;

export const DEFAULT_ENGINE_CONFIG: EngineConfig = {
  baseTickMs: 800,
  height: DEFAULT_BOARD_HEIGHT,
  linesPerLevel: 10,
  minTickMs: 100,
  previewCount: 4,
  speedIncreasePerLevel: 50,
  width: DEFAULT_BOARD_WIDTH,
};

// A flat I spans four columns from the spawn anchor at floor(width / 2) - 1
const MIN_BOARD_WIDTH = 5;
const MIN_BOARD_HEIGHT = 4;

function requireInteger(
  name: keyof EngineConfig,
  value: number,
  min: number,
): void {
  if (!Number.isInteger(value) || value < min) {
    throw new Error(
      `EngineConfig.${name} must be an integer >= ${String(min)}, got ${String(value)}`,
    );
  }
}

/**
 * Merge overrides onto the defaults and validate the result.
 * Throws naming the first offending field.
 */
export function createEngineConfig(
  overrides: Partial<EngineConfig> = {},
): EngineConfig {
  const cfg: EngineConfig = { ...DEFAULT_ENGINE_CONFIG, ...overrides };

  requireInteger("width", cfg.width, MIN_BOARD_WIDTH);
  requireInteger("height", cfg.height, MIN_BOARD_HEIGHT);
  requireInteger("previewCount", cfg.previewCount, 1);
  requireInteger("linesPerLevel", cfg.linesPerLevel, 1);
  requireInteger("minTickMs", cfg.minTickMs, 1);
  requireInteger("baseTickMs", cfg.baseTickMs, cfg.minTickMs);
  requireInteger("speedIncreasePerLevel", cfg.speedIncreasePerLevel, 0);

  return cfg;
}
