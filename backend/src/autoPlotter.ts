import path from "node:path";
import { defaultArtifactName, openInViewer, writeArtifact } from "./artifact.js";
import { IndicatorCalculator, type IndicatorSeries, type OutputSeries } from "./calculator.js";
import {
  assertSecondResolution,
  buildTradeMarkers,
  candlesOf,
  equityAnnotations,
  type Candle,
  type ChartBand,
  type ChartDocument,
  type ChartSeries,
  type SubPane,
  type EquityPane
} from "./chartDocument.js";
import type { ChartConfig } from "./config.js";
import {
  createCustomIndicator,
  prepareCustomIndicator,
  type CustomIndicator,
  type CustomIndicatorData
} from "./customIndicator.js";
import { InvalidPriceDataError } from "./errors.js";
import { renderChartHtml } from "./htmlRenderer.js";
import type { IndicatorStyle } from "./indicators.js";
import { createComponentLogger, type Logger } from "./logger.js";
import { PlotConfigStore } from "./plotConfig.js";
import { resolveTheme, type Theme, type ThemeSpecifier } from "./themes.js";
import type { EquityPoint, PriceSeries, Trade } from "./types.js";

export interface AutoPlotterOptions {
  calculator?: IndicatorCalculator;
  store?: PlotConfigStore;
  config?: Partial<Pick<ChartConfig, "outputDir" | "theme" | "scriptUrl">>;
  logger?: Logger;
}

export interface ComposeInput {
  prices: PriceSeries;
  trades?: readonly Trade[];
  equity?: readonly EquityPoint[];
  title?: string;
  /** Takes precedence over the store's theme. */
  theme?: ThemeSpecifier | string;
}

export interface RenderInput extends ComposeInput {
  /** Defaults to `<outputDir>/<title>_backtest_result.html`. */
  filename?: string;
  open?: boolean;
}

const DEFAULT_TITLE = "Backtest";
const DEFAULT_FILL_OPACITY = 0.2;

interface PendingData {
  descriptor: CustomIndicator;
  data: CustomIndicatorData;
}

interface StyleContext {
  theme: Theme;
  nextColor: () => string;
}

const palettePicker = (theme: Theme) => {
  let index = 0;
  return () => theme.palette[index++ % theme.palette.length] ?? theme.textColor;
};

/**
 * Request override, then the definition's per-output style, then the theme's color for
 * the label, then the next palette color.
 */
function styleSeries(
  indicator: string,
  output: OutputSeries,
  single: boolean,
  definition: IndicatorStyle,
  request: IndicatorStyle | undefined,
  { theme, nextColor }: StyleContext
): ChartSeries {
  const requestOutput = request?.outputs?.[output.key];
  const definitionOutput = definition.outputs?.[output.key];
  const requestBase = single ? request : undefined;
  const definitionBase = single ? definition : undefined;

  return {
    indicator,
    key: output.key,
    label: output.label,
    plot: requestOutput?.plot ?? output.plot,
    color:
      requestOutput?.color ??
      requestBase?.color ??
      definitionOutput?.color ??
      definitionBase?.color ??
      theme.seriesColors[output.label] ??
      nextColor(),
    lineWidth:
      requestOutput?.lineWidth ??
      request?.lineWidth ??
      definitionOutput?.lineWidth ??
      definition.lineWidth ??
      theme.lineWidth,
    lineStyle: requestOutput?.lineStyle ?? request?.lineStyle ?? definitionOutput?.lineStyle ?? definition.lineStyle ?? "solid",
    fillOpacity: requestOutput?.fillOpacity ?? request?.fillOpacity ?? definitionOutput?.fillOpacity ?? definition.fillOpacity,
    values: output.values
  };
}

const requireOhlc = (prices: PriceSeries) => {
  const { timestamps, open, high, low, close } = prices;
  if (timestamps.length === 0) {
    throw new InvalidPriceDataError("no bars to chart");
  }
  if (!open || !high || !low || !close) {
    throw new InvalidPriceDataError("charting needs open, high, low and close columns");
  }
  assertSecondResolution(timestamps, "bars");
  return candlesOf(timestamps, open, high, low, close);
};

/** A band fills between the first and last series of its indicator. */
const bandOf = (indicator: string, series: readonly ChartSeries[]): ChartBand[] => {
  if (series.length < 2) return [];
  const upper = series[0];
  const lower = series[series.length - 1];
  return [
    {
      indicator,
      upper: upper.label,
      lower: lower.label,
      color: upper.color,
      fillOpacity: upper.fillOpacity ?? DEFAULT_FILL_OPACITY
    }
  ];
};

const volumePane = (volume: readonly number[], candles: readonly Candle[], theme: Theme): SubPane => ({
  indicator: "Volume",
  label: "Volume",
  plot: "bar",
  series: [
    {
      indicator: "Volume",
      key: "value",
      label: "Volume",
      plot: "bar",
      color: theme.seriesColors.Volume ?? theme.upColor,
      lineWidth: theme.lineWidth,
      lineStyle: "solid",
      values: [...volume],
      pointColors: candles.map((candle) => (candle.close >= candle.open ? theme.upColor : theme.downColor))
    }
  ],
  bands: [],
  levels: []
});

/**
 * Builds chart documents from price data, a strategy's indicator requests and the
 * backtest results, and writes them as interactive HTML pages.
 */
export class AutoPlotter {
  readonly store: PlotConfigStore;
  readonly calculator: IndicatorCalculator;
  private readonly config: { outputDir: string; theme: ThemeSpecifier | string; scriptUrl?: string };
  private readonly logger: Logger;
  private pending: PendingData[] = [];

  constructor(options: AutoPlotterOptions = {}) {
    this.store = options.store ?? new PlotConfigStore();
    this.calculator = options.calculator ?? new IndicatorCalculator();
    this.logger = options.logger ?? createComponentLogger("AutoPlotter");
    this.config = {
      outputDir: options.config?.outputDir ?? ".",
      theme: options.config?.theme ?? "light",
      scriptUrl: options.config?.scriptUrl
    };
  }

  /** Adds precomputed data to the next render only. */
  addCustomIndicator(name: string, data: CustomIndicatorData, descriptor: CustomIndicator = createCustomIndicator(name)): this {
    this.pending.push({ descriptor: { ...descriptor, name }, data });
    return this;
  }

  compose(input: ComposeInput): ChartDocument {
    return this.buildDocument(input, this.pending);
  }

  /**
   * Composes, writes the HTML artifact and returns its absolute path. Custom indicators
   * are dropped once the page is written; a failed render keeps them queued.
   */
  render(input: RenderInput): string {
    const doc = this.buildDocument(input, this.pending);

    const html = renderChartHtml(doc, this.config.scriptUrl ? { url: this.config.scriptUrl } : undefined);
    const target = input.filename ?? path.join(this.config.outputDir, defaultArtifactName(doc.title));
    const written = writeArtifact(target, html);
    this.pending = [];
    this.logger.info(`Chart written to ${written}`, {
      overlays: doc.main.overlays.length,
      subPanes: doc.subPanes.length,
      markers: doc.main.markers.length
    });

    if (input.open) {
      openInViewer(written, this.logger);
    }
    return written;
  }

  private buildDocument(input: ComposeInput, pending: readonly PendingData[]): ChartDocument {
    const theme = resolveTheme(input.theme ?? this.store.theme ?? this.config.theme);
    const candles = requireOhlc(input.prices);
    const timestamps = [...input.prices.timestamps];
    const context: StyleContext = { theme, nextColor: palettePicker(theme) };

    const overlays: ChartSeries[] = [];
    const bands: ChartBand[] = [];
    const subPanes: SubPane[] = [];
    const volumeDefinition = this.calculator.registry.find("VOLUME");
    let volumeRequested = false;

    const place = (indicator: string, label: string, pane: "overlay" | "subplot", plot: SubPane["plot"], series: ChartSeries[], levels: readonly number[]) => {
      const paneBands = plot === "band" ? bandOf(indicator, series) : [];
      if (pane === "overlay") {
        overlays.push(...series);
        bands.push(...paneBands);
      } else {
        subPanes.push({ indicator, label, plot, series, bands: paneBands, levels: [...levels] });
      }
    };

    for (const request of this.store.listEnabled()) {
      let computed: IndicatorSeries;
      try {
        computed = this.calculator.compute(input.prices, request.name, request.params);
      } catch (error) {
        this.logger.error(`Indicator ${request.name} failed; aborting chart`, error);
        throw error;
      }
      const { definition } = computed;
      if (definition === volumeDefinition) volumeRequested = true;
      const single = computed.series.length === 1;
      const series = computed.series.map((output) =>
        styleSeries(request.name, output, single, definition.style, request.style, context)
      );
      place(request.name, definition.label, computed.pane, computed.plot, series, request.style?.levels ?? definition.style.levels ?? []);
      this.logger.debug(`Computed ${request.name} (${computed.pane})`, computed.params);
    }

    for (const custom of pending.map(({ descriptor, data }) => prepareCustomIndicator(descriptor, data, timestamps.length))) {
      const { descriptor } = custom;
      const single = custom.outputs.length === 1;
      const series = custom.outputs.map(({ key, values }) =>
        styleSeries(
          descriptor.name,
          { key, label: single ? descriptor.label : `${descriptor.label}_${key}`, plot: descriptor.plot, values },
          single,
          descriptor.style,
          undefined,
          context
        )
      );
      place(descriptor.name, descriptor.label, descriptor.pane, descriptor.plot, series, descriptor.style.levels ?? []);
    }

    if (input.prices.volume && !volumeRequested) {
      subPanes.push(volumePane(input.prices.volume, candles, theme));
    }

    const markers = buildTradeMarkers(timestamps, input.trades ?? [], theme, this.logger);

    let equity: EquityPane | undefined;
    if (input.equity && input.equity.length > 0) {
      const points = input.equity.map((point) => ({ ...point }));
      assertSecondResolution(points.map((point) => point.timestamp), "equity points");
      equity = {
        label: "Equity",
        color: theme.seriesColors.Equity ?? context.nextColor(),
        points,
        annotations: equityAnnotations(points)
      };
    }

    return {
      title: input.title ?? DEFAULT_TITLE,
      theme,
      timestamps,
      main: { candles, overlays, bands, markers },
      subPanes,
      equity
    };
  }
}
