import { DEFAULT_ENGINE_CONFIG, createEngineConfig } from "@/engine/config";

describe("@/engine/config — createEngineConfig", () => {
  test("defaults", () => {
    expect(createEngineConfig()).toEqual({
      baseTickMs: 800,
      height: 20,
      linesPerLevel: 10,
      minTickMs: 100,
      previewCount: 4,
      speedIncreasePerLevel: 50,
      width: 10,
    });
    expect(createEngineConfig()).toEqual(DEFAULT_ENGINE_CONFIG);
  });

  test("overrides merge onto the defaults", () => {
    const cfg = createEngineConfig({ linesPerLevel: 5, width: 12 });
    expect(cfg.width).toBe(12);
    expect(cfg.linesPerLevel).toBe(5);
    expect(cfg.height).toBe(20);
  });

  test("accepts the smallest board", () => {
    const cfg = createEngineConfig({ height: 4, width: 5 });
    expect(cfg.width).toBe(5);
    expect(cfg.height).toBe(4);
  });

  test("rejects a board too narrow or too short", () => {
    expect(() => createEngineConfig({ width: 4 })).toThrow(
      "EngineConfig.width must be an integer >= 5, got 4",
    );
    expect(() => createEngineConfig({ height: 3 })).toThrow(
      "EngineConfig.height must be an integer >= 4, got 3",
    );
  });

  test("rejects non-integers and out-of-range counts", () => {
    expect(() => createEngineConfig({ linesPerLevel: 1.5 })).toThrow(
      "EngineConfig.linesPerLevel must be an integer >= 1, got 1.5",
    );
    expect(() => createEngineConfig({ previewCount: 0 })).toThrow(
      "EngineConfig.previewCount must be an integer >= 1, got 0",
    );
    expect(() => createEngineConfig({ speedIncreasePerLevel: -10 })).toThrow(
      "EngineConfig.speedIncreasePerLevel must be an integer >= 0, got -10",
    );
  });

  test("base tick may not be shorter than the minimum tick", () => {
    expect(() => createEngineConfig({ baseTickMs: 50 })).toThrow(
      "EngineConfig.baseTickMs must be an integer >= 100, got 50",
    );
  });
});
