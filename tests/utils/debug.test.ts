import { debugLog, isDebugEnabled } from "@/utils/debug";

describe("@/utils/debug", () => {
  const original = process.env["BLOCKFALL_DEBUG"];
  let warn: jest.SpyInstance;

  beforeEach(() => {
    warn = jest.spyOn(console, "warn").mockImplementation(() => undefined);
  });

  afterEach(() => {
    warn.mockRestore();
    if (original === undefined) {
      delete process.env["BLOCKFALL_DEBUG"];
    } else {
      process.env["BLOCKFALL_DEBUG"] = original;
    }
  });

  test("disabled when the variable is unset", () => {
    delete process.env["BLOCKFALL_DEBUG"];

    expect(isDebugEnabled()).toBe(false);
    expect(isDebugEnabled("lifecycle")).toBe(false);
    debugLog("lifecycle", "ignored");
    expect(warn).not.toHaveBeenCalled();
  });

  test("a truthy value enables every topic", () => {
    process.env["BLOCKFALL_DEBUG"] = "1";
    expect(isDebugEnabled("rotation")).toBe(true);

    process.env["BLOCKFALL_DEBUG"] = "TRUE";
    expect(isDebugEnabled("highscore")).toBe(true);
  });

  test("a comma list enables only the named topics", () => {
    process.env["BLOCKFALL_DEBUG"] = "lifecycle, highscore";

    expect(isDebugEnabled("lifecycle")).toBe(true);
    expect(isDebugEnabled("highscore")).toBe(true);
    expect(isDebugEnabled("rotation")).toBe(false);
  });

  test("debugLog prefixes the topic", () => {
    process.env["BLOCKFALL_DEBUG"] = "lifecycle";

    debugLog("lifecycle", "playing -> paused (TOGGLE_PAUSE)");
    debugLog("lifecycle", "game over", { score: 300 });
    debugLog("rotation", "kicked");

    expect(warn).toHaveBeenCalledTimes(2);
    expect(warn).toHaveBeenNthCalledWith(
      1,
      "[DBG:lifecycle] playing -> paused (TOGGLE_PAUSE)",
    );
    expect(warn).toHaveBeenNthCalledWith(2, "[DBG:lifecycle] game over", {
      score: 300,
    });
  });
});
