import { existsSync, readFileSync } from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import {
  toUnixSeconds,
  type ChartBand,
  type ChartDocument,
  type ChartSeries,
  type EquityAnnotation,
  type TradeMarker
} from "./chartDocument.js";
import { ChartError } from "./errors.js";
import type { LineStyle } from "./indicators.js";
import type { SeriesValue } from "./types.js";

const BUNDLE = path.join("node_modules", "lightweight-charts", "dist", "lightweight-charts.standalone.production.js");

// LineStyle enum of lightweight-charts
const LINE_STYLES: Record<LineStyle, number> = { solid: 0, dotted: 1, dashed: 2 };

const SUB_PANE_HEIGHT = 160;

type ChartLibrary = { url: string } | { source: string };

type Point = { time: number; value?: number; color?: string };

interface PayloadMarker {
  time: number;
  position: "atPriceBottom" | "atPriceTop" | "atPriceMiddle";
  price: number;
  color: string;
  shape: string;
  text: string;
}

interface PayloadBand {
  color: string;
  fillOpacity: number;
  upper: Point[];
  lower: Point[];
}

interface PayloadSeries {
  label: string;
  plot: ChartSeries["plot"];
  color: string;
  lineWidth: number;
  lineStyle: number;
  fillOpacity: number;
  data: Point[];
}

export interface ChartPayload {
  title: string;
  theme: {
    upColor: string;
    downColor: string;
    backgroundColor: string;
    gridColor: string;
    textColor: string;
  };
  candles: { time: number; open: number; high: number; low: number; close: number }[];
  overlays: PayloadSeries[];
  bands: PayloadBand[];
  markers: PayloadMarker[];
  panes: { label: string; levels: number[]; series: PayloadSeries[]; bands: PayloadBand[] }[];
  equity?: { label: string; color: string; data: Point[]; markers: PayloadMarker[] };
}

const toPoints = (timestamps: readonly number[], values: readonly SeriesValue[], colors?: readonly string[]): Point[] =>
  timestamps.map((ms, i) => {
    const value = values[i];
    const time = toUnixSeconds(ms);
    // a point without a value is whitespace: the line breaks there
    if (value === null) return { time };
    const color = colors?.[i];
    return color === undefined ? { time, value } : { time, value, color };
  });

const toPayloadSeries = (timestamps: readonly number[], series: ChartSeries): PayloadSeries => ({
  label: series.label,
  plot: series.plot,
  color: series.color,
  lineWidth: series.lineWidth,
  lineStyle: LINE_STYLES[series.lineStyle],
  fillOpacity: series.fillOpacity ?? 0.2,
  data: toPoints(timestamps, series.values, series.pointColors)
});

const toPayloadBands = (timestamps: readonly number[], bands: readonly ChartBand[], series: readonly ChartSeries[]) =>
  bands.flatMap((band): PayloadBand[] => {
    const upper = series.find((s) => s.indicator === band.indicator && s.label === band.upper);
    const lower = series.find((s) => s.indicator === band.indicator && s.label === band.lower);
    if (!upper || !lower) return [];
    return [
      {
        color: band.color,
        fillOpacity: band.fillOpacity,
        upper: toPoints(timestamps, upper.values),
        lower: toPoints(timestamps, lower.values)
      }
    ];
  });

const toPayloadMarker = (marker: TradeMarker): PayloadMarker => ({
  time: toUnixSeconds(marker.time),
  position: marker.side === "buy" ? "atPriceBottom" : "atPriceTop",
  price: marker.price,
  color: marker.color,
  shape: marker.shape,
  text: marker.text
});

const toAnnotationMarker = (annotation: EquityAnnotation): PayloadMarker => ({
  time: toUnixSeconds(annotation.time),
  position: "atPriceMiddle",
  price: annotation.value,
  color: annotation.color,
  shape: "circle",
  text: annotation.text
});

export function toChartPayload(doc: ChartDocument): ChartPayload {
  const { timestamps, theme } = doc;
  return {
    title: doc.title,
    theme: {
      upColor: theme.upColor,
      downColor: theme.downColor,
      backgroundColor: theme.backgroundColor,
      gridColor: theme.gridColor,
      textColor: theme.textColor
    },
    candles: doc.main.candles.map((candle) => ({ ...candle, time: toUnixSeconds(candle.time) })),
    overlays: doc.main.overlays.map((series) => toPayloadSeries(timestamps, series)),
    bands: toPayloadBands(timestamps, doc.main.bands, doc.main.overlays),
    markers: doc.main.markers.map(toPayloadMarker),
    panes: doc.subPanes.map((pane) => ({
      label: pane.label,
      levels: pane.levels,
      series: pane.series.map((series) => toPayloadSeries(timestamps, series)),
      bands: toPayloadBands(timestamps, pane.bands, pane.series)
    })),
    equity: doc.equity && {
      label: doc.equity.label,
      color: doc.equity.color,
      data: doc.equity.points.map((point) => ({ time: toUnixSeconds(point.timestamp), value: point.value })),
      // series markers must be in time order
      markers: doc.equity.annotations.map(toAnnotationMarker).sort((a, b) => a.time - b.time)
    }
  };
}

let cachedBundle: string | undefined;

/** Reads the standalone lightweight-charts bundle from the nearest node_modules. */
export function loadChartLibrary(): string {
  if (cachedBundle !== undefined) return cachedBundle;

  let dir = path.dirname(fileURLToPath(import.meta.url));
  for (;;) {
    const candidate = path.join(dir, BUNDLE);
    if (existsSync(candidate)) {
      cachedBundle = readFileSync(candidate, "utf8");
      return cachedBundle;
    }
    const parent = path.dirname(dir);
    if (parent === dir) break;
    dir = parent;
  }
  throw new ChartError(
    "CHART_LIBRARY_MISSING",
    "lightweight-charts standalone bundle not found; install it or set CHART_SCRIPT_URL"
  );
}

const escapeHtml = (text: string) =>
  text.replace(/&/g, "&amp;").replace(/</g, "&lt;").replace(/>/g, "&gt;").replace(/"/g, "&quot;");

/** JSON that is safe inside a <script> element. */
const embedJson = (value: unknown) => JSON.stringify(value).replace(/</g, "\\u003c");

const libraryTag = (library: ChartLibrary) =>
  "url" in library
    ? `<script src="${escapeHtml(library.url)}"></script>`
    : `<script>${library.source.replace(/<\/script/gi, "<\\/script")}</script>`;

const CLIENT_SCRIPT = `
(function () {
  var data = JSON.parse(document.getElementById("chart-data").textContent);
  var LWC = LightweightCharts;
  var chart = LWC.createChart(document.getElementById("chart"), {
    autoSize: true,
    layout: {
      background: { type: "solid", color: data.theme.backgroundColor },
      textColor: data.theme.textColor,
      panes: { separatorColor: data.theme.gridColor }
    },
    grid: {
      vertLines: { color: data.theme.gridColor },
      horzLines: { color: data.theme.gridColor }
    },
    timeScale: { timeVisible: true, secondsVisible: false }
  });

  function alpha(hex, opacity) {
    var n = parseInt(hex.slice(1, 7), 16);
    return "rgba(" + ((n >> 16) & 255) + "," + ((n >> 8) & 255) + "," + (n & 255) + "," + opacity + ")";
  }

  // fills the area between two lines; attached to a series so it shares that price scale
  function bandPrimitive(band) {
    var host = null;
    var fill = alpha(band.color, band.fillOpacity);
    var renderer = {
      draw: function (target) {
        if (!host) return;
        var timeScale = chart.timeScale();
        target.useBitmapCoordinateSpace(function (scope) {
          var top = [];
          var bottom = [];
          band.upper.forEach(function (u, i) {
            var l = band.lower[i];
            if (u.value === undefined || l.value === undefined) return;
            var x = timeScale.timeToCoordinate(u.time);
            var yu = host.priceToCoordinate(u.value);
            var yl = host.priceToCoordinate(l.value);
            if (x === null || yu === null || yl === null) return;
            top.push([x * scope.horizontalPixelRatio, yu * scope.verticalPixelRatio]);
            bottom.push([x * scope.horizontalPixelRatio, yl * scope.verticalPixelRatio]);
          });
          if (top.length < 2) return;
          var ctx = scope.context;
          ctx.beginPath();
          ctx.moveTo(top[0][0], top[0][1]);
          top.forEach(function (p) { ctx.lineTo(p[0], p[1]); });
          bottom.reverse().forEach(function (p) { ctx.lineTo(p[0], p[1]); });
          ctx.closePath();
          ctx.fillStyle = fill;
          ctx.fill();
        });
      }
    };
    var view = {
      renderer: function () { return renderer; },
      zOrder: function () { return "bottom"; }
    };
    return {
      attached: function (param) { host = param.series; },
      detached: function () { host = null; },
      paneViews: function () { return [view]; },
      updateAllViews: function () {}
    };
  }

  function addSeries(s, pane) {
    var common = { title: s.label, lastValueVisible: false, priceLineVisible: false };
    var series;
    if (s.plot === "bar") {
      series = chart.addSeries(LWC.HistogramSeries, Object.assign(common, { color: s.color }), pane);
    } else if (s.plot === "area") {
      series = chart.addSeries(LWC.AreaSeries, Object.assign(common, {
        lineColor: s.color,
        lineWidth: s.lineWidth,
        topColor: alpha(s.color, s.fillOpacity),
        bottomColor: alpha(s.color, 0)
      }), pane);
    } else {
      series = chart.addSeries(LWC.LineSeries, Object.assign(common, {
        color: s.color,
        lineWidth: s.lineWidth,
        lineStyle: s.lineStyle
      }), pane);
    }
    series.setData(s.data);
    return series;
  }

  var candles = chart.addSeries(LWC.CandlestickSeries, {
    upColor: data.theme.upColor,
    downColor: data.theme.downColor,
    borderUpColor: data.theme.upColor,
    borderDownColor: data.theme.downColor,
    wickUpColor: data.theme.upColor,
    wickDownColor: data.theme.downColor
  }, 0);
  candles.setData(data.candles);
  LWC.createSeriesMarkers(candles, data.markers);

  data.overlays.forEach(function (s) { addSeries(s, 0); });
  data.bands.forEach(function (band) { candles.attachPrimitive(bandPrimitive(band)); });

  var pane = 0;
  data.panes.forEach(function (p) {
    pane += 1;
    var first = null;
    p.series.forEach(function (s) {
      var series = addSeries(s, pane);
      if (!first) first = series;
    });
    if (first) {
      p.bands.forEach(function (band) { first.attachPrimitive(bandPrimitive(band)); });
      p.levels.forEach(function (level) {
        first.createPriceLine({ price: level, color: data.theme.gridColor, lineStyle: 2, axisLabelVisible: true });
      });
    }
  });

  if (data.equity) {
    pane += 1;
    var equity = chart.addSeries(LWC.LineSeries, { title: data.equity.label, color: data.equity.color, lineWidth: 2 }, pane);
    equity.setData(data.equity.data);
    LWC.createSeriesMarkers(equity, data.equity.markers);
  }

  chart.panes().forEach(function (p, i) {
    if (i > 0) p.setHeight(${SUB_PANE_HEIGHT});
  });
  chart.timeScale().fitContent();
})();
`;

/**
 * Renders a composed chart as a self-contained HTML page driven by lightweight-charts.
 * The library is either inlined from node_modules or referenced by URL.
 */
export function renderChartHtml(doc: ChartDocument, library: ChartLibrary = { source: loadChartLibrary() }): string {
  const { theme } = doc;
  return `<!DOCTYPE html>
<html lang="en">
<head>
<meta charset="utf-8">
<title>${escapeHtml(doc.title)}</title>
<style>
  html, body { margin: 0; background: ${theme.backgroundColor}; color: ${theme.textColor}; font-family: sans-serif; }
  h1 { font-size: 16px; font-weight: 600; margin: 12px 16px; }
  #chart { width: ${theme.width}; height: ${theme.height}; }
</style>
</head>
<body>
<h1>${escapeHtml(doc.title)}</h1>
<div id="chart"></div>
<script type="application/json" id="chart-data">${embedJson(toChartPayload(doc))}</script>
${libraryTag(library)}
<script>${CLIENT_SCRIPT}</script>
</body>
</html>
`;
}
