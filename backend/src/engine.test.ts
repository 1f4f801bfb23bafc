import { mkdtempSync, readFileSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import type { ChartConfig } from "./config.js";
import { BacktestEngine } from "./engine.js";
import { ChartError } from "./errors.js";
import { silentLogger } from "./logger.js";
import { createPriceSeries } from "./priceSeries.js";
import { EmaCrossStrategy } from "./strategies.js";
import { StrategyBase } from "./strategy.js";
import { makePrices, timestampAt } from "./testFixtures.js";

const closes = [10, 10, 12, 11, 11];
const prices = createPriceSeries({
  timestamps: closes.map((_, i) => timestampAt(i)),
  open: closes,
  high: closes.map((value) => value + 0.5),
  low: closes.map((value) => value - 0.5),
  close: closes
});

class ScriptedStrategy extends StrategyBase {
  override init(): void {
    this.addPlotIndicator("MA2").addPlotIndicator("RSI", false);
  }

  override next(i: number): void {
    if (i === 1) this.buy(i, 10);
    if (i === 3) this.closePosition(i);
  }
}

describe("StrategyBase", () => {
  it("fills at the close and tracks round trips", () => {
    const strategy = new ScriptedStrategy(prices, { cash: 1000, commission: 0 });
    closes.forEach((_, i) => strategy.step(i));

    expect(strategy.equityCurve.map((point) => point.value)).toEqual([1000, 1000, 1020, 1010, 1010]);
    expect(strategy.fills.map(({ side, price, size }) => [side, price, size])).toEqual([
      ["buy", 10, 10],
      ["sell", 11, 10]
    ]);
    expect(strategy.trades).toEqual([
      { direction: "long", entryTime: timestampAt(1), entryPrice: 10, size: 10, exitTime: timestampAt(3), exitPrice: 11 }
    ]);
  });

  it("charges commission and refuses unaffordable or oversized orders", () => {
    const strategy = new StrategyBase(prices, { cash: 100 });
    expect(strategy.buy(0, 10)).toBe(false);
    expect(strategy.buy(0, 5)).toBe(true);
    expect(strategy.cash).toBeCloseTo(100 - 50 * 1.002, 10);
    expect(strategy.sell(1, 6)).toBe(false);
    expect(strategy.trades).toEqual([{ direction: "long", entryTime: timestampAt(0), entryPrice: 10, size: 5 }]);
  });

  it("summarises the equity curve", () => {
    const strategy = new ScriptedStrategy(prices, { cash: 1000, commission: 0 });
    closes.forEach((_, i) => strategy.step(i));
    const metrics = strategy.metrics();

    expect(metrics.returnPct).toBeCloseTo(1, 10);
    expect(metrics.maxDrawdownPct).toBeCloseTo((1010 / 1020 - 1) * 100, 10);
    expect(metrics.tradeCount).toBe(2);
    expect(metrics.sharpeRatio).toBeGreaterThan(0);
  });
});

describe("BacktestEngine", () => {
  let dir: string;
  let config: ChartConfig;

  beforeEach(() => {
    dir = mkdtempSync(path.join(tmpdir(), "engine-"));
    config = { outputDir: dir, theme: "light", logLevel: "silent", scriptUrl: "https://example.test/lwc.js" };
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("refuses to plot before running", () => {
    const engine = new BacktestEngine(prices, ScriptedStrategy, { config, logger: silentLogger });
    expect(() => engine.plot()).toThrow(ChartError);
    expect(() => engine.plot()).toThrow("No equity curve to plot; run the backtest first");
  });

  it("plots the strategy's configured indicators by default", () => {
    const engine = new BacktestEngine(prices, ScriptedStrategy, { config, logger: silentLogger, cash: 1000, commission: 0 });
    expect(engine.run().tradeCount).toBe(2);

    const written = engine.plot();
    expect(written).toBe(path.join(dir, "ScriptedStrategy_backtest_result.html"));
    const html = readFileSync(written, "utf8");
    expect(html).toContain('"label":"MA2"');
    expect(html).toContain('"text":"Max drawdown: -0.98%"');
    expect(html).not.toContain('"label":"RSI14"');
  });

  it("takes the legacy path on request", () => {
    const engine = new BacktestEngine(prices, ScriptedStrategy, { config, logger: silentLogger, cash: 1000, commission: 0 });
    engine.run();
    const written = engine.plot({ useAutoPlotter: false, filename: path.join(dir, "legacy.html"), title: "Legacy" });

    const html = readFileSync(written, "utf8");
    expect(html).toContain("<title>Legacy</title>");
    expect(html).toContain(">Max drawdown: -0.98%</text>");
    expect(html).not.toContain("MA2");
  });

  it("runs the EMA cross example end to end", () => {
    const engine = new BacktestEngine(makePrices(120), EmaCrossStrategy, { config, logger: silentLogger });
    const metrics = engine.run();

    expect(engine.strategy.equityCurve).toHaveLength(120);
    expect(engine.strategy.plot.listEnabled().map((request) => request.name)).toEqual(["EMA12", "EMA26"]);
    expect(metrics.tradeCount).toBe(engine.strategy.fills.length);
    expect(engine.strategy.fills.every((fill, i) => fill.side === (i % 2 === 0 ? "buy" : "sell"))).toBe(true);
  });
});
