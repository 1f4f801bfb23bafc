import { afterEach, describe, expect, it, vi } from "vitest";
import { createPool, fetchBars, fetchPriceSeries, type Queryable } from "./db.js";
import { ConfigError } from "./errors.js";

const createFakeDb = (rows: unknown[]) => {
  const calls: { text: string; values: unknown[] }[] = [];
  const db: Queryable = {
    query: async (text, values) => {
      calls.push({ text, values });
      return { rows };
    }
  };
  return { db, calls };
};

const row = (timestamp: string, close: string, volume: string | null = "10") => ({
  symbol: "BTCUSDT",
  timeframe: "1h",
  timestamp,
  open: close,
  high: close,
  low: close,
  close,
  volume
});

describe("fetchBars", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("binds symbol, timeframe and limit", async () => {
    const { db, calls } = createFakeDb([]);
    await fetchBars(db, { symbol: "BTCUSDT", timeframe: "1h" });

    expect(calls[0].values).toEqual(["BTCUSDT", "1h", 5000]);
    expect(calls[0].text).toContain("WHERE symbol = $1 AND timeframe = $2");
    expect(calls[0].text).toContain("LIMIT $3");
  });

  it("numbers optional filters in order", async () => {
    const { db, calls } = createFakeDb([]);
    await fetchBars(db, { symbol: "ETHUSDT", timeframe: "1d", datasetId: "ds-1", from: 1000, to: 2000, limit: 10 });

    expect(calls[0].values).toEqual(["ds-1", "ETHUSDT", "1d", 1000, 2000, 10]);
    expect(calls[0].text).toContain(
      "WHERE dataset_id = $1 AND symbol = $2 AND timeframe = $3 AND timestamp >= to_timestamp($4 / 1000.0) AND timestamp <= to_timestamp($5 / 1000.0)"
    );
    expect(calls[0].text).toContain("LIMIT $6");
  });

  it("parses numeric strings and drops duplicate timestamps", async () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const { db } = createFakeDb([row("1704067200000.000", "100.5"), row("1704067200000", "101"), row("1704070800000", "102")]);
    const bars = await fetchBars(db, { symbol: "BTCUSDT", timeframe: "1h" });

    expect(bars).toEqual([
      { symbol: "BTCUSDT", timeframe: "1h", timestamp: 1704067200000, open: 100.5, high: 100.5, low: 100.5, close: 100.5, volume: 10 },
      { symbol: "BTCUSDT", timeframe: "1h", timestamp: 1704070800000, open: 102, high: 102, low: 102, close: 102, volume: 10 }
    ]);
    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn.mock.calls[0][0]).toMatch(/Dropped 1 duplicate candles for BTCUSDT 1h$/);
  });

  it("rejects rows that are not numeric", async () => {
    const { db } = createFakeDb([row("1704067200000", "n/a")]);
    await expect(fetchBars(db, { symbol: "BTCUSDT", timeframe: "1h" })).rejects.toThrow(
      'Invalid price data: candle row 0 has a non-numeric "open"'
    );
  });
});

describe("fetchPriceSeries", () => {
  it("keeps volume only when every bar has it", async () => {
    const { db } = createFakeDb([row("1704067200000", "1"), row("1704070800000", "2", null)]);
    const prices = await fetchPriceSeries(db, { symbol: "BTCUSDT", timeframe: "1h" });

    expect(prices.timestamps).toEqual([1704067200000, 1704070800000]);
    expect(prices.close).toEqual([1, 2]);
    expect(prices.volume).toBeUndefined();
  });
});

describe("createPool", () => {
  it("needs a database URL", () => {
    expect(() => createPool({})).toThrow(ConfigError);
    expect(() => createPool({})).toThrow("Invalid configuration DATABASE_URL: is required to read candles");
  });
});
