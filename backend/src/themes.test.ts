import { describe, expect, it } from "vitest";
import { UnknownThemeError } from "./errors.js";
import { DARK_THEME, LIGHT_THEME, resolveTheme } from "./themes.js";

describe("resolveTheme", () => {
  it("resolves the built-in names", () => {
    expect(resolveTheme("light")).toEqual(LIGHT_THEME);
    expect(resolveTheme("dark").backgroundColor).toBe("#1f1f1f");
    expect(resolveTheme("dark").upColor).toBe(LIGHT_THEME.upColor);
  });

  it("returns copies callers may change", () => {
    const theme = resolveTheme("dark");
    theme.palette = [];
    expect(resolveTheme("dark").palette).toEqual(DARK_THEME.palette);
  });

  it("inherits every unset custom field from light", () => {
    const theme = resolveTheme({ type: "custom", upColor: "#123456" });
    expect(theme).toEqual({ ...LIGHT_THEME, name: "custom", upColor: "#123456" });
  });

  it("merges series colors key by key", () => {
    const theme = resolveTheme({ type: "custom", seriesColors: { MA20: "#000001", RSI14: "#000002" } });
    expect(theme.seriesColors.MA20).toBe("#000001");
    expect(theme.seriesColors.RSI14).toBe("#000002");
    expect(theme.seriesColors.MA5).toBe("#FF6B6B");
  });

  it("fails on unknown names", () => {
    expect(() => resolveTheme("solarized")).toThrow(UnknownThemeError);
    expect(() => resolveTheme("solarized")).toThrow('Unknown theme "solarized" (supported: light, dark)');
  });
});
