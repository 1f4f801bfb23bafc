import { describe, expect, it } from "vitest";
import {
  assertSecondResolution,
  barIndexAt,
  buildTradeMarkers,
  candlesOf,
  equityAnnotations
} from "./chartDocument.js";
import { InvalidPriceDataError } from "./errors.js";
import { silentLogger } from "./logger.js";
import { DARK_THEME } from "./themes.js";

describe("barIndexAt", () => {
  const timestamps = [100, 200, 300, 400];

  it("finds the bar containing a time", () => {
    expect(barIndexAt(timestamps, 100)).toBe(0);
    expect(barIndexAt(timestamps, 250)).toBe(1);
    expect(barIndexAt(timestamps, 300)).toBe(2);
    expect(barIndexAt(timestamps, 400)).toBe(3);
  });

  it("returns -1 outside the range", () => {
    expect(barIndexAt(timestamps, 99)).toBe(-1);
    expect(barIndexAt(timestamps, 401)).toBe(-1);
    expect(barIndexAt([], 100)).toBe(-1);
  });
});

describe("buildTradeMarkers", () => {
  it("orders markers by time and uses the theme's marker styling", () => {
    const markers = buildTradeMarkers(
      [100, 200, 300],
      [
        { direction: "short", entryTime: 250, entryPrice: 9.5, exitTime: 300, exitPrice: 8 },
        { direction: "long", entryTime: 100, entryPrice: 10 }
      ],
      DARK_THEME,
      silentLogger
    );

    expect(markers.map(({ time, side, text, color }) => [time, side, text, color])).toEqual([
      [100, "buy", "Buy @ 10.00", DARK_THEME.buyColor],
      [200, "sell", "Sell @ 9.50", DARK_THEME.sellColor],
      [300, "buy", "Buy @ 8.00", DARK_THEME.buyColor]
    ]);
  });
});

describe("equityAnnotations", () => {
  const curve = (...values: number[]) => values.map((value, i) => ({ timestamp: i * 1000, value }));

  it("marks the deepest drawdown from the running peak", () => {
    expect(equityAnnotations(curve(100, 120, 90, 130, 117)).map(({ kind, time, value, text }) => [kind, time, value, text])).toEqual([
      ["maxDrawdown", 2000, 90, "Max drawdown: -25.00%"],
      ["peak", 3000, 130, "Peak: 130.0%"],
      ["final", 4000, 117, "Final: 117.0%"]
    ]);
  });

  it("skips the drawdown mark on a curve that never falls", () => {
    expect(equityAnnotations(curve(100, 100, 105)).map((annotation) => annotation.kind)).toEqual(["peak", "final"]);
  });

  it("needs two points and a positive start", () => {
    expect(equityAnnotations(curve(100))).toEqual([]);
    expect(equityAnnotations(curve(0, 10))).toEqual([]);
  });
});

describe("assertSecondResolution", () => {
  it("accepts one point per second", () => {
    expect(() => assertSecondResolution([0, 1000, 5000], "bars")).not.toThrow();
  });

  it("rejects points that truncate to the same second", () => {
    expect(() => assertSecondResolution([1000, 1999], "bars")).toThrow(InvalidPriceDataError);
    expect(() => assertSecondResolution([1000, 1999], "bars")).toThrow("bars 0 and 1 share the second 1");
  });
});

describe("candlesOf", () => {
  it("zips columns into candles", () => {
    expect(candlesOf([1], [2], [4], [1], [3])).toEqual([{ time: 1, open: 2, high: 4, low: 1, close: 3 }]);
  });
});
