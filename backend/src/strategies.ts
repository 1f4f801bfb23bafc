import { IndicatorCalculator } from "./calculator.js";
import { StrategyBase } from "./strategy.js";
import type { SeriesValue } from "./types.js";

const crossedAbove = (a: readonly SeriesValue[], b: readonly SeriesValue[], i: number) => {
  const [a0, a1, b0, b1] = [a[i - 1], a[i], b[i - 1], b[i]];
  if (a0 === null || a1 === null || b0 === null || b1 === null) return false;
  return a0 <= b0 && a1 > b1;
};

/**
 * Buys with 30% of equity when the fast EMA crosses above the slow one and exits on
 * the opposite cross. Both averages are added to the chart.
 */
export class EmaCrossStrategy extends StrategyBase {
  fast = 12;
  slow = 26;
  allocation = 0.3;

  private fastLine: SeriesValue[] = [];
  private slowLine: SeriesValue[] = [];

  override init(): void {
    const calculator = new IndicatorCalculator();
    this.fastLine = calculator.compute(this.data, `EMA${this.fast}`).series[0].values;
    this.slowLine = calculator.compute(this.data, `EMA${this.slow}`).series[0].values;
    this.addPlotIndicator(`EMA${this.fast}`).addPlotIndicator(`EMA${this.slow}`);
  }

  override next(i: number): void {
    if (i === 0) return;
    if (crossedAbove(this.fastLine, this.slowLine, i)) {
      const equity = this.cash + this.position * this.close[i];
      const size = Math.floor((equity * this.allocation) / this.close[i]);
      this.buy(i, size);
    } else if (crossedAbove(this.slowLine, this.fastLine, i)) {
      this.closePosition(i);
    }
  }
}
