import { debugLog, isDebugEnabled } from "@/utils/debug";

describe("debug logging", () => {
  const original = process.env["BLOCKFALL_DEBUG"];
  let warn: jest.SpyInstance;

  beforeEach(() => {
    warn = jest.spyOn(console, "warn").mockImplementation(() => undefined);
  });

  afterEach(() => {
    warn.mockRestore();
    if (original === undefined) delete process.env["BLOCKFALL_DEBUG"];
    else process.env["BLOCKFALL_DEBUG"] = original;
  });

  it("is silent when the variable is unset", () => {
    delete process.env["BLOCKFALL_DEBUG"];
    debugLog("match", "hello");
    expect(isDebugEnabled()).toBe(false);
    expect(warn).not.toHaveBeenCalled();
  });

  it("enables every topic with a truthy flag", () => {
    process.env["BLOCKFALL_DEBUG"] = "On";
    expect(isDebugEnabled("loop")).toBe(true);
    debugLog("loop", "tick", { delta: 1 });
    expect(warn).toHaveBeenCalledWith("[DBG:loop] tick", { delta: 1 });
  });

  it("enables only the listed topics", () => {
    process.env["BLOCKFALL_DEBUG"] = "match, settings";
    expect(isDebugEnabled("settings")).toBe(true);
    expect(isDebugEnabled("loop")).toBe(false);

    debugLog("loop", "ignored");
    debugLog("match", "awaitingSpawn -> active");
    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn).toHaveBeenCalledWith("[DBG:match] awaitingSpawn -> active");
  });
});
