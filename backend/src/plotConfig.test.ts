import { describe, expect, it } from "vitest";
import { UnknownRequestError, UnknownThemeError } from "./errors.js";
import { PlotConfigStore } from "./plotConfig.js";

describe("PlotConfigStore", () => {
  it("round-trips add then remove to an empty list", () => {
    const store = new PlotConfigStore().addIndicator("MA20", true, { period: 20 });
    store.removeIndicator("MA20");
    expect(store.listEnabled()).toEqual([]);
  });

  it("keeps the original position when a name is re-added", () => {
    const store = new PlotConfigStore()
      .addIndicator("MA20")
      .addIndicator("RSI", true, { period: 14 })
      .addIndicator("MACD")
      .addIndicator("RSI", true, { period: 7 });

    expect(store.listEnabled().map((request) => request.name)).toEqual(["MA20", "RSI", "MACD"]);
    expect(store.get("RSI")?.params).toEqual({ period: 7 });
  });

  it("treats names that differ only in case as one request", () => {
    const store = new PlotConfigStore().addIndicator("ma20").addIndicator("RSI").addIndicator("MA20", true, { period: 30 });

    expect(store.list().map((request) => [request.name, request.params])).toEqual([
      ["MA20", { period: 30 }],
      ["RSI", {}]
    ]);
    store.enableIndicator("rsi", false);
    expect(store.get("Rsi")?.enabled).toBe(false);
    store.removeIndicator("Ma20");
    expect(store.list().map((request) => request.name)).toEqual(["RSI"]);
  });

  it("filters disabled requests", () => {
    const store = new PlotConfigStore().addIndicator("MA20").addIndicator("KDJ", false).addIndicator("RSI");
    expect(store.listEnabled().map((request) => request.name)).toEqual(["MA20", "RSI"]);
    expect(store.list()).toHaveLength(3);
  });

  it("toggles without touching parameters", () => {
    const store = new PlotConfigStore().addIndicator("BOLL", true, { period: 10, std: 1 });
    store.enableIndicator("BOLL", false);
    expect(store.get("BOLL")).toEqual({ name: "BOLL", params: { period: 10, std: 1 }, enabled: false, style: undefined });
    store.enableIndicator("BOLL");
    expect(store.listEnabled()).toHaveLength(1);
  });

  it("tolerates removing a missing request but not toggling one", () => {
    const store = new PlotConfigStore();
    expect(() => store.removeIndicator("MA5")).not.toThrow();
    expect(() => store.enableIndicator("MA5")).toThrow(UnknownRequestError);
  });

  it("validates themes when they are configured", () => {
    const store = new PlotConfigStore().configureTheme("dark");
    expect(store.theme).toBe("dark");
    expect(() => store.configureTheme("neon")).toThrow(UnknownThemeError);
    expect(store.theme).toBe("dark");

    store.configureTheme({ type: "custom", upColor: "#111111" });
    expect(store.theme).toEqual({ type: "custom", upColor: "#111111" });
  });

  it("clears requests and theme", () => {
    const store = new PlotConfigStore().configureTheme("dark").addIndicator("MA20");
    store.clear();
    expect(store.list()).toEqual([]);
    expect(store.theme).toBeUndefined();
  });
});
