import { AutoPlotter } from "./autoPlotter.js";
import type { IndicatorCalculator } from "./calculator.js";
import { loadConfig, type ChartConfig } from "./config.js";
import { ChartError } from "./errors.js";
import { createComponentLogger, setLogLevel, type Logger } from "./logger.js";
import { AutoPlotRenderer, LegacyRenderer, type ChartRenderer } from "./renderers.js";
import type { BacktestMetrics, StrategyBase, StrategyOptions } from "./strategy.js";
import type { ThemeSpecifier } from "./themes.js";
import type { PriceSeries } from "./types.js";

export type StrategyClass<S extends StrategyBase> = new (data: PriceSeries, options: StrategyOptions) => S;

export interface BacktestEngineOptions extends StrategyOptions {
  /** Read from the environment when omitted. */
  config?: ChartConfig;
  calculator?: IndicatorCalculator;
  logger?: Logger;
}

export interface PlotOptions {
  filename?: string;
  title?: string;
  open?: boolean;
  theme?: ThemeSpecifier | string;
  /** `false` draws the fixed legacy chart instead of the configured indicators. */
  useAutoPlotter?: boolean;
}

export class BacktestEngine<S extends StrategyBase = StrategyBase> {
  readonly data: PriceSeries;
  readonly strategy: S;
  private readonly config: ChartConfig;
  private readonly calculator?: IndicatorCalculator;
  private readonly logger: Logger;
  private hasRun = false;

  constructor(data: PriceSeries, Strategy: StrategyClass<S>, options: BacktestEngineOptions = {}) {
    const { config, calculator, logger, ...strategyOptions } = options;
    if (config) {
      this.config = config;
    } else {
      this.config = loadConfig();
      setLogLevel(this.config.logLevel);
    }
    this.data = data;
    this.calculator = calculator;
    this.logger = logger ?? createComponentLogger("BacktestEngine");
    this.strategy = new Strategy(data, strategyOptions);
    this.strategy.init();
  }

  run(): BacktestMetrics {
    const bars = this.data.timestamps.length;
    for (let i = 0; i < bars; i++) {
      this.strategy.step(i);
    }
    this.hasRun = true;

    const metrics = this.strategy.metrics();
    this.logger.info(`Backtest finished over ${bars} bars`, metrics);
    return metrics;
  }

  plot(options: PlotOptions = {}): string {
    if (!this.hasRun || this.strategy.equityCurve.length === 0) {
      throw new ChartError("BACKTEST_NOT_RUN", "No equity curve to plot; run the backtest first");
    }

    const renderer = this.createRenderer(options.useAutoPlotter ?? true);
    this.logger.debug(`Rendering with the ${renderer.kind} renderer`);
    return renderer.render({
      prices: this.data,
      trades: this.strategy.trades,
      equity: this.strategy.equityCurve,
      title: options.title ?? this.strategy.constructor.name,
      filename: options.filename,
      open: options.open,
      theme: options.theme
    });
  }

  private createRenderer(useAutoPlotter: boolean): ChartRenderer {
    if (!useAutoPlotter) {
      return new LegacyRenderer({
        outputDir: this.config.outputDir,
        theme: this.strategy.plot.theme ?? this.config.theme,
        logger: this.logger
      });
    }
    return new AutoPlotRenderer(
      new AutoPlotter({
        store: this.strategy.plot,
        calculator: this.calculator,
        config: this.config,
        logger: this.logger
      })
    );
  }
}
