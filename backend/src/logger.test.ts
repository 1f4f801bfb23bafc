import { afterEach, describe, expect, it, vi } from "vitest";
import { createComponentLogger, isLogLevel, setLogLevel } from "./logger.js";

describe("createComponentLogger", () => {
  afterEach(() => {
    setLogLevel("info");
    vi.restoreAllMocks();
  });

  it("prefixes lines with time, level and component", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});
    createComponentLogger("AutoPlotter").info("Chart written", { bars: 3 });

    expect(log).toHaveBeenCalledTimes(1);
    const [line, data] = log.mock.calls[0];
    expect(line).toMatch(/^\[\d{4}-\d{2}-\d{2}T[\d:.]+Z\] \[INFO\] \[AutoPlotter\] Chart written$/);
    expect(data).toEqual({ bars: 3 });
  });

  it("drops messages below the current level", () => {
    const debug = vi.spyOn(console, "debug").mockImplementation(() => {});
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const logger = createComponentLogger("Test");

    logger.debug("hidden");
    setLogLevel("debug");
    logger.debug("shown");
    setLogLevel("silent");
    logger.warn("hidden too");

    expect(debug).toHaveBeenCalledTimes(1);
    expect(debug.mock.calls[0]).toHaveLength(1);
    expect(warn).not.toHaveBeenCalled();
  });

  it("recognises level names", () => {
    expect(isLogLevel("warn")).toBe(true);
    expect(isLogLevel("verbose")).toBe(false);
  });
});
