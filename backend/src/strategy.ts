import { InvalidPriceDataError } from "./errors.js";
import type { IndicatorStyle } from "./indicators.js";
import { PlotConfigStore, type IndicatorParams } from "./plotConfig.js";
import type { ThemeSpecifier } from "./themes.js";
import type { EquityPoint, PriceSeries, Trade } from "./types.js";

export interface StrategyOptions {
  cash?: number;
  /** Fraction of traded value charged on every fill. */
  commission?: number;
}

export interface Fill {
  index: number;
  timestamp: number;
  side: "buy" | "sell";
  price: number;
  size: number;
  cash: number;
}

export interface BacktestMetrics {
  returnPct: number;
  annualReturnPct: number;
  maxDrawdownPct: number;
  sharpeRatio: number;
  tradeCount: number;
}

const TRADING_DAYS = 252;

/**
 * Long-only strategy base. Subclasses set up state in `init()` and trade in `next(i)`;
 * fills execute at the bar's close.
 */
export class StrategyBase {
  readonly data: PriceSeries;
  readonly close: readonly number[];
  readonly commission: number;
  readonly plot = new PlotConfigStore();

  cash: number;
  position = 0;
  avgPrice = 0;
  readonly fills: Fill[] = [];
  readonly equityCurve: EquityPoint[] = [];

  private readonly closedTrades: Trade[] = [];
  private openTrade?: Trade;

  constructor(data: PriceSeries, options: StrategyOptions = {}) {
    if (!data.close) {
      throw new InvalidPriceDataError('backtests need a "close" column');
    }
    this.data = data;
    this.close = data.close;
    this.cash = options.cash ?? 10_000;
    this.commission = options.commission ?? 0.002;
  }

  init(): void {}

  next(_i: number): void {}

  /** Round trips so far; a position still open is last, without an exit. */
  get trades(): Trade[] {
    return this.openTrade ? [...this.closedTrades, { ...this.openTrade }] : [...this.closedTrades];
  }

  buy(i: number, size: number): boolean {
    if (size <= 0) return false;
    const price = this.close[i];
    const cost = price * size * (1 + this.commission);
    if (this.cash < cost) return false;

    this.avgPrice = (this.avgPrice * this.position + price * size) / (this.position + size);
    this.position += size;
    this.cash -= cost;
    this.record(i, "buy", price, size);

    const timestamp = this.data.timestamps[i];
    this.openTrade = this.openTrade
      ? { ...this.openTrade, entryPrice: this.avgPrice, size: this.position }
      : { entryTime: timestamp, entryPrice: price, direction: "long", size };
    return true;
  }

  sell(i: number, size: number): boolean {
    if (size <= 0 || this.position < size) return false;
    const price = this.close[i];
    this.position -= size;
    if (this.position === 0) this.avgPrice = 0;
    this.cash += price * size * (1 - this.commission);
    this.record(i, "sell", price, size);

    if (this.position === 0 && this.openTrade) {
      this.closedTrades.push({ ...this.openTrade, exitTime: this.data.timestamps[i], exitPrice: price });
      this.openTrade = undefined;
    }
    return true;
  }

  closePosition(i: number): boolean {
    return this.position > 0 && this.sell(i, this.position);
  }

  step(i: number): void {
    this.next(i);
    this.equityCurve.push({ timestamp: this.data.timestamps[i], value: this.cash + this.position * this.close[i] });
  }

  configurePlot(theme: ThemeSpecifier | string): this {
    this.plot.configureTheme(theme);
    return this;
  }

  addPlotIndicator(name: string, enabled = true, params: IndicatorParams = {}, style?: IndicatorStyle): this {
    this.plot.addIndicator(name, enabled, params, style);
    return this;
  }

  removePlotIndicator(name: string): this {
    this.plot.removeIndicator(name);
    return this;
  }

  enablePlotIndicator(name: string, enabled = true): this {
    this.plot.enableIndicator(name, enabled);
    return this;
  }

  metrics(): BacktestMetrics {
    const equity = this.equityCurve.map((point) => point.value);
    const n = equity.length;
    const returns = equity.map((value, i) => (i === 0 ? 0 : value / equity[i - 1] - 1));

    let peak = -Infinity;
    let maxDrawdown = 0;
    for (const value of equity) {
      peak = Math.max(peak, value);
      maxDrawdown = Math.min(maxDrawdown, (value / peak - 1) * 100);
    }

    const mean = n > 0 ? returns.reduce((sum, r) => sum + r, 0) / n : 0;
    const variance = n > 1 ? returns.reduce((sum, r) => sum + (r - mean) ** 2, 0) / (n - 1) : 0;

    return {
      returnPct: n > 1 ? (equity[n - 1] / equity[0] - 1) * 100 : 0,
      annualReturnPct: n > 0 ? ((1 + mean) ** TRADING_DAYS - 1) * 100 : 0,
      maxDrawdownPct: maxDrawdown,
      sharpeRatio: n > 1 ? (mean / (Math.sqrt(variance) + 1e-9)) * Math.sqrt(TRADING_DAYS) : 0,
      tradeCount: this.fills.length
    };
  }

  private record(index: number, side: Fill["side"], price: number, size: number) {
    this.fills.push({ index, timestamp: this.data.timestamps[index], side, price, size, cash: this.cash });
  }
}
