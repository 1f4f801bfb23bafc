import { describe, expect, it } from "vitest";
import { AutoPlotter } from "./autoPlotter.js";
import { renderChartHtml, toChartPayload } from "./htmlRenderer.js";
import { silentLogger } from "./logger.js";
import { PlotConfigStore } from "./plotConfig.js";
import { makePrices, timestampAt } from "./testFixtures.js";

const compose = (title = "Test") => {
  const store = new PlotConfigStore().addIndicator("MA3").addIndicator("RSI", true, { period: 2 });
  return new AutoPlotter({ store, logger: silentLogger }).compose({
    prices: makePrices(5),
    title,
    trades: [{ direction: "long", entryTime: timestampAt(1), entryPrice: 101.5, exitTime: timestampAt(3), exitPrice: 104 }],
    equity: [
      { timestamp: timestampAt(0), value: 1000 },
      { timestamp: timestampAt(4), value: 1010 }
    ]
  });
};

describe("toChartPayload", () => {
  it("converts times to UTC seconds and gaps to whitespace points", () => {
    const payload = toChartPayload(compose());
    const start = timestampAt(0) / 1000;

    expect(payload.candles[0].time).toBe(start);
    expect(payload.overlays[0].data.slice(0, 3)).toEqual([
      { time: start },
      { time: start + 86_400 },
      { time: start + 2 * 86_400, value: expect.any(Number) }
    ]);
    expect(payload.panes[0]).toMatchObject({ label: "Relative Strength Index", levels: [30, 70] });
    expect(payload.equity?.data).toEqual([
      { time: start, value: 1000 },
      { time: start + 4 * 86_400, value: 1010 }
    ]);
  });

  it("places buy markers under the price and sells above it", () => {
    expect(toChartPayload(compose()).markers).toEqual([
      { time: timestampAt(1) / 1000, position: "atPriceBottom", price: 101.5, color: "#00da3c", shape: "arrowUp", text: "Buy @ 101.50" },
      { time: timestampAt(3) / 1000, position: "atPriceTop", price: 104, color: "#ec0000", shape: "arrowDown", text: "Sell @ 104.00" }
    ]);
  });

  it("annotates the equity series and colors volume bars by candle direction", () => {
    const payload = toChartPayload(compose());
    const start = timestampAt(0) / 1000;

    expect(payload.equity?.markers).toEqual([
      { time: start + 4 * 86_400, position: "atPriceMiddle", price: 1010, color: "#00bcd4", shape: "circle", text: "Peak: 101.0%" },
      { time: start + 4 * 86_400, position: "atPriceMiddle", price: 1010, color: "#0000ff", shape: "circle", text: "Final: 101.0%" }
    ]);
    expect(payload.panes.map((pane) => pane.label)).toEqual(["Relative Strength Index", "Volume"]);
    expect(payload.panes[1].series[0].data[0]).toEqual({ time: start, value: 1000, color: "#ec0000" });
  });

  it("carries band outlines for the fill", () => {
    const store = new PlotConfigStore().addIndicator("BOLL", true, { period: 3 });
    const doc = new AutoPlotter({ store, logger: silentLogger }).compose({ prices: makePrices(5) });
    const [band] = toChartPayload(doc).bands;

    expect(band).toMatchObject({ color: "#DDA0DD", fillOpacity: 0.1 });
    expect(band.upper).toHaveLength(5);
    expect(band.upper[1]).toEqual({ time: timestampAt(1) / 1000 });
    expect(band.lower[2].value).toBeLessThan(band.upper[2].value ?? -Infinity);
  });

  it("maps line styles to the library's enum", () => {
    const store = new PlotConfigStore().addIndicator("MA2", true, {}, { lineStyle: "dashed" });
    const doc = new AutoPlotter({ store, logger: silentLogger }).compose({ prices: makePrices(5) });
    expect(toChartPayload(doc).overlays[0].lineStyle).toBe(2);
  });
});

describe("renderChartHtml", () => {
  it("references the library by URL when one is given", () => {
    const html = renderChartHtml(compose(), { url: "https://example.test/lwc.js" });
    expect(html).toContain('<script src="https://example.test/lwc.js"></script>');
    expect(html).toContain("LWC.createSeriesMarkers(candles, data.markers);");
    expect(html).toContain("LWC.createSeriesMarkers(equity, data.equity.markers);");
    expect(html).toContain("candles.attachPrimitive(bandPrimitive(band));");
  });

  it("inlines a supplied library source", () => {
    const html = renderChartHtml(compose(), { source: "window.LightweightCharts = {};</script>" });
    expect(html).toContain("<script>window.LightweightCharts = {};<\\/script></script>");
  });

  it("escapes the title in markup and embedded data", () => {
    const html = renderChartHtml(compose("</script><b>x</b>"), { url: "https://example.test/lwc.js" });
    expect(html).toContain("<title>&lt;/script&gt;&lt;b&gt;x&lt;/b&gt;</title>");
    expect(html).toContain('"title":"\\u003c/script>\\u003cb>x\\u003c/b>"');
  });
});
