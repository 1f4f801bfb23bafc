import type { LineStyle, PlotStyle } from "./indicators.js";
import type { Logger } from "./logger.js";
import type { MarkerShape, Theme } from "./themes.js";
import { InvalidPriceDataError } from "./errors.js";
import type { EquityPoint, SeriesValue, Trade, TradeDirection } from "./types.js";

export interface Candle {
  time: number;
  open: number;
  high: number;
  low: number;
  close: number;
}

export interface ChartSeries {
  /** Request the series belongs to, e.g. `MA20`. */
  indicator: string;
  key: string;
  label: string;
  plot: PlotStyle;
  color: string;
  lineWidth: number;
  lineStyle: LineStyle;
  fillOpacity?: number;
  values: SeriesValue[];
  /** Per-bar colors, e.g. volume bars following the candle direction. */
  pointColors?: string[];
}

/** Filled region between two series of the same indicator, by label. */
export interface ChartBand {
  indicator: string;
  upper: string;
  lower: string;
  color: string;
  fillOpacity: number;
}

export type TradeSide = "buy" | "sell";

export interface TradeMarker {
  /** Timestamp of the bar the fill happened on. */
  time: number;
  price: number;
  side: TradeSide;
  kind: "entry" | "exit";
  direction: TradeDirection;
  color: string;
  shape: MarkerShape;
  text: string;
}

export interface SubPane {
  indicator: string;
  label: string;
  plot: PlotStyle;
  series: ChartSeries[];
  bands: ChartBand[];
  levels: number[];
}

export type EquityAnnotationKind = "maxDrawdown" | "peak" | "final";

export interface EquityAnnotation {
  kind: EquityAnnotationKind;
  time: number;
  value: number;
  color: string;
  text: string;
}

export interface EquityPane {
  label: string;
  color: string;
  points: EquityPoint[];
  annotations: EquityAnnotation[];
}

export interface ChartDocument {
  title: string;
  theme: Theme;
  timestamps: number[];
  main: {
    candles: Candle[];
    overlays: ChartSeries[];
    bands: ChartBand[];
    markers: TradeMarker[];
  };
  subPanes: SubPane[];
  equity?: EquityPane;
}

/** Charts resolve time to whole UTC seconds. */
export const toUnixSeconds = (ms: number) => Math.floor(ms / 1000);

/** Throws unless `times` stay strictly increasing once truncated to seconds. */
export function assertSecondResolution(times: readonly number[], what: string): void {
  for (let i = 1; i < times.length; i++) {
    if (toUnixSeconds(times[i]) <= toUnixSeconds(times[i - 1])) {
      throw new InvalidPriceDataError(
        `${what} ${i - 1} and ${i} share the second ${toUnixSeconds(times[i])}; charts need one point per second at most`,
        { index: i, time: times[i] }
      );
    }
  }
}

/** Index of the last timestamp at or before `time`, or -1 when `time` is outside the range. */
export function barIndexAt(timestamps: readonly number[], time: number): number {
  const last = timestamps.length - 1;
  if (last < 0 || time < timestamps[0] || time > timestamps[last]) return -1;

  let lo = 0;
  let hi = last;
  while (lo < hi) {
    const mid = Math.ceil((lo + hi) / 2);
    if (timestamps[mid] <= time) lo = mid;
    else hi = mid - 1;
  }
  return lo;
}

const sideOf = (direction: TradeDirection, kind: TradeMarker["kind"]): TradeSide =>
  (direction === "long") === (kind === "entry") ? "buy" : "sell";

/**
 * Entry and exit markers for a trade list. A long entry or short exit is a buy; the
 * opposite fills are sells. Fills outside the price range are dropped with a warning.
 */
export function buildTradeMarkers(
  timestamps: readonly number[],
  trades: readonly Trade[],
  theme: Theme,
  logger: Logger
): TradeMarker[] {
  const markers: TradeMarker[] = [];

  const push = (trade: Trade, kind: TradeMarker["kind"], time: number, price: number) => {
    const index = barIndexAt(timestamps, time);
    if (index < 0) {
      logger.warn(`Skipping ${trade.direction} ${kind} at ${new Date(time).toISOString()}: outside the price range`);
      return;
    }
    const side = sideOf(trade.direction, kind);
    markers.push({
      time: timestamps[index],
      price,
      side,
      kind,
      direction: trade.direction,
      color: side === "buy" ? theme.buyColor : theme.sellColor,
      shape: side === "buy" ? theme.buyMarker : theme.sellMarker,
      text: `${side === "buy" ? "Buy" : "Sell"} @ ${price.toFixed(2)}`
    });
  };

  for (const trade of trades) {
    push(trade, "entry", trade.entryTime, trade.entryPrice);
    if (trade.exitTime !== undefined && trade.exitPrice !== undefined) {
      push(trade, "exit", trade.exitTime, trade.exitPrice);
    }
  }

  return markers.sort((a, b) => a.time - b.time);
}

export function candlesOf(
  timestamps: readonly number[],
  open: readonly number[],
  high: readonly number[],
  low: readonly number[],
  close: readonly number[]
): Candle[] {
  return timestamps.map((time, i) => ({ time, open: open[i], high: high[i], low: low[i], close: close[i] }));
}

export const EQUITY_ANNOTATION_COLORS: Record<EquityAnnotationKind, string> = {
  maxDrawdown: "#ff0000",
  peak: "#00bcd4",
  final: "#0000ff"
};

/**
 * Marks the deepest drawdown, the peak and the final value of an equity curve. Peak and
 * final are shown as a percentage of the starting equity. A curve that never falls gets
 * no drawdown mark.
 */
export function equityAnnotations(points: readonly EquityPoint[]): EquityAnnotation[] {
  if (points.length <= 1 || !(points[0].value > 0)) return [];
  const start = points[0].value;

  let runningPeak = -Infinity;
  let drawdownAt = 0;
  let drawdown = 0;
  let peakAt = 0;
  points.forEach((point, i) => {
    runningPeak = Math.max(runningPeak, point.value);
    const current = point.value / runningPeak - 1;
    if (current < drawdown) {
      drawdown = current;
      drawdownAt = i;
    }
    if (point.value > points[peakAt].value) peakAt = i;
  });

  const annotation = (kind: EquityAnnotationKind, index: number, text: string): EquityAnnotation => ({
    kind,
    time: points[index].timestamp,
    value: points[index].value,
    color: EQUITY_ANNOTATION_COLORS[kind],
    text
  });
  const last = points.length - 1;
  const ofStart = (value: number) => `${((value / start) * 100).toFixed(1)}%`;

  const annotations: EquityAnnotation[] = [];
  if (drawdown < 0) {
    annotations.push(annotation("maxDrawdown", drawdownAt, `Max drawdown: ${(drawdown * 100).toFixed(2)}%`));
  }
  annotations.push(
    annotation("peak", peakAt, `Peak: ${ofStart(points[peakAt].value)}`),
    annotation("final", last, `Final: ${ofStart(points[last].value)}`)
  );
  return annotations;
}
