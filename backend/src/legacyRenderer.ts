import { buildTradeMarkers, equityAnnotations, type TradeMarker } from "./chartDocument.js";
import { InvalidPriceDataError } from "./errors.js";
import type { Logger } from "./logger.js";
import type { Theme } from "./themes.js";
import type { EquityPoint, PriceSeries, Trade } from "./types.js";

export interface LegacyChartInput {
  prices: PriceSeries;
  trades: readonly Trade[];
  equity: readonly EquityPoint[];
  title: string;
  theme: Theme;
}

const CHART_WIDTH = 1200;
const PRICE_HEIGHT = 420;
const VOLUME_HEIGHT = 80;
const EQUITY_HEIGHT = 160;
const padding = { top: 20, right: 70, bottom: 30, left: 20 };

const fmt = (value: number) => value.toFixed(2);

const escapeXml = (text: string) =>
  text.replace(/&/g, "&amp;").replace(/</g, "&lt;").replace(/>/g, "&gt;").replace(/"/g, "&quot;");

const linearScale = (min: number, max: number, top: number, height: number) => {
  const range = max - min || 1;
  return (value: number) => top + (1 - (value - min) / range) * height;
};

function gridLines(theme: Theme, top: number, height: number, min: number, max: number): string[] {
  const out: string[] = [];
  for (const ratio of [0, 0.25, 0.5, 0.75, 1]) {
    const y = top + ratio * height;
    const value = max - ratio * (max - min);
    out.push(
      `<line x1="${padding.left}" y1="${fmt(y)}" x2="${CHART_WIDTH - padding.right}" y2="${fmt(y)}" stroke="${theme.gridColor}" stroke-width="1"/>`,
      `<text x="${CHART_WIDTH - padding.right + 8}" y="${fmt(y + 4)}" fill="${theme.textColor}" font-size="11" font-family="monospace">${fmt(value)}</text>`
    );
  }
  return out;
}

const triangle = (x: number, y: number, up: boolean, color: string) => {
  const size = 6;
  const points = up
    ? `${fmt(x)},${fmt(y)} ${fmt(x - size)},${fmt(y + size * 1.6)} ${fmt(x + size)},${fmt(y + size * 1.6)}`
    : `${fmt(x)},${fmt(y)} ${fmt(x - size)},${fmt(y - size * 1.6)} ${fmt(x + size)},${fmt(y - size * 1.6)}`;
  return `<polygon class="trade-marker" points="${points}" fill="${color}"/>`;
};

/**
 * Draws candles, volume, trade markers and the equity curve as one static SVG page.
 * Indicators are not drawn on this path.
 */
export function renderLegacyHtml(input: LegacyChartInput, logger: Logger): string {
  const { prices, theme } = input;
  const { timestamps, open, high, low, close, volume } = prices;
  if (timestamps.length === 0) {
    throw new InvalidPriceDataError("no bars to chart");
  }
  if (!open || !high || !low || !close) {
    throw new InvalidPriceDataError("charting needs open, high, low and close columns");
  }

  const plotWidth = CHART_WIDTH - padding.left - padding.right;
  const barWidth = plotWidth / timestamps.length;
  const centerX = (i: number) => padding.left + i * barWidth + barWidth / 2;

  const priceMin = Math.min(...low);
  const priceMax = Math.max(...high);
  const yPrice = linearScale(priceMin, priceMax, padding.top, PRICE_HEIGHT);
  const parts: string[] = gridLines(theme, padding.top, PRICE_HEIGHT, priceMin, priceMax);

  timestamps.forEach((_, i) => {
    const color = close[i] >= open[i] ? theme.upColor : theme.downColor;
    const bodyTop = Math.min(yPrice(open[i]), yPrice(close[i]));
    const bodyHeight = Math.max(Math.abs(yPrice(open[i]) - yPrice(close[i])), 1);
    parts.push(
      `<line x1="${fmt(centerX(i))}" y1="${fmt(yPrice(high[i]))}" x2="${fmt(centerX(i))}" y2="${fmt(yPrice(low[i]))}" stroke="${color}" stroke-width="1"/>`,
      `<rect class="candle" x="${fmt(padding.left + i * barWidth + barWidth * 0.2)}" y="${fmt(bodyTop)}" width="${fmt(barWidth * 0.6)}" height="${fmt(bodyHeight)}" fill="${color}"/>`
    );
  });

  let offset = padding.top + PRICE_HEIGHT + padding.bottom;

  if (volume) {
    const maxVolume = Math.max(...volume);
    timestamps.forEach((_, i) => {
      const height = maxVolume > 0 ? (volume[i] / maxVolume) * VOLUME_HEIGHT : 0;
      const color = close[i] >= open[i] ? theme.upColor : theme.downColor;
      parts.push(
        `<rect x="${fmt(padding.left + i * barWidth + barWidth * 0.2)}" y="${fmt(offset + VOLUME_HEIGHT - height)}" width="${fmt(barWidth * 0.6)}" height="${fmt(height)}" fill="${color}" opacity="0.3"/>`
      );
    });
    offset += VOLUME_HEIGHT + padding.bottom;
  }

  const markers: TradeMarker[] = buildTradeMarkers(timestamps, input.trades, theme, logger);
  const indexOf = new Map(timestamps.map((ts, i) => [ts, i]));
  for (const marker of markers) {
    const i = indexOf.get(marker.time);
    if (i === undefined) continue;
    const buy = marker.side === "buy";
    parts.push(triangle(centerX(i), yPrice(marker.price) + (buy ? 4 : -4), buy, marker.color));
  }

  const equity = input.equity.filter((point) => indexOf.has(point.timestamp));
  if (equity.length > 1) {
    const values = equity.map((point) => point.value);
    const min = Math.min(...values);
    const max = Math.max(...values);
    const yEquity = linearScale(min, max, offset, EQUITY_HEIGHT);
    parts.push(...gridLines(theme, offset, EQUITY_HEIGHT, min, max));
    const d = equity
      .map((point, n) => {
        const i = indexOf.get(point.timestamp) ?? 0;
        return `${n === 0 ? "M" : "L"} ${fmt(centerX(i))} ${fmt(yEquity(point.value))}`;
      })
      .join(" ");
    parts.push(`<path class="equity" d="${d}" fill="none" stroke="${theme.seriesColors.Equity ?? theme.textColor}" stroke-width="2"/>`);
    for (const annotation of equityAnnotations(equity)) {
      const x = centerX(indexOf.get(annotation.time) ?? 0);
      const y = yEquity(annotation.value);
      parts.push(
        `<circle class="equity-annotation" cx="${fmt(x)}" cy="${fmt(y)}" r="4" fill="${annotation.color}"/>`,
        `<text x="${fmt(x + 6)}" y="${fmt(y - 6)}" fill="${annotation.color}" font-size="11" font-family="sans-serif">${escapeXml(annotation.text)}</text>`
      );
    }
    offset += EQUITY_HEIGHT + padding.bottom;
  }

  const title = escapeXml(input.title);
  return `<!DOCTYPE html>
<html lang="en">
<head>
<meta charset="utf-8">
<title>${title}</title>
<style>
  html, body { margin: 0; background: ${theme.backgroundColor}; color: ${theme.textColor}; font-family: sans-serif; }
  h1 { font-size: 16px; font-weight: 600; margin: 12px 16px; }
  svg { width: ${theme.width}; height: ${theme.height}; }
</style>
</head>
<body>
<h1>${title}</h1>
<svg viewBox="0 0 ${CHART_WIDTH} ${offset}" preserveAspectRatio="none" xmlns="http://www.w3.org/2000/svg">
${parts.join("\n")}
</svg>
</body>
</html>
`;
}
