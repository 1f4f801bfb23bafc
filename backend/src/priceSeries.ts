import { InvalidPriceDataError } from "./errors.js";
import { PRICE_COLUMNS, type BarEvent, type PriceSeries } from "./types.js";

export interface PriceSeriesInput {
  timestamps: readonly number[];
  open?: readonly number[];
  high?: readonly number[];
  low?: readonly number[];
  close?: readonly number[];
  volume?: readonly number[];
}

/**
 * Validates and freezes a columnar price table: timestamps strictly increasing and
 * every supplied column aligned with them.
 */
export function createPriceSeries(input: PriceSeriesInput): PriceSeries {
  const { timestamps } = input;
  for (let i = 0; i < timestamps.length; i++) {
    const ts = timestamps[i];
    if (!Number.isFinite(ts)) {
      throw new InvalidPriceDataError(`timestamp at index ${i} is not a finite number`, { index: i });
    }
    if (i > 0 && ts <= timestamps[i - 1]) {
      throw new InvalidPriceDataError(
        ts === timestamps[i - 1]
          ? `duplicate timestamp ${ts} at index ${i}`
          : `timestamps must be strictly increasing (index ${i})`,
        { index: i, timestamp: ts }
      );
    }
  }

  const series: { -readonly [K in keyof PriceSeries]: PriceSeries[K] } = {
    timestamps: Object.freeze([...timestamps])
  };
  for (const column of PRICE_COLUMNS) {
    const values = input[column];
    if (values === undefined) continue;
    if (values.length !== timestamps.length) {
      throw new InvalidPriceDataError(
        `column "${column}" has ${values.length} values for ${timestamps.length} timestamps`,
        { column }
      );
    }
    series[column] = Object.freeze([...values]);
  }
  return Object.freeze(series);
}

/** Builds a price series from bar rows, keeping the volume column only when every bar has one. */
export function priceSeriesFromBars(bars: readonly BarEvent[]): PriceSeries {
  const hasVolume = bars.length > 0 && bars.every((bar) => typeof bar.volume === "number");
  return createPriceSeries({
    timestamps: bars.map((bar) => bar.timestamp),
    open: bars.map((bar) => bar.open),
    high: bars.map((bar) => bar.high),
    low: bars.map((bar) => bar.low),
    close: bars.map((bar) => bar.close),
    volume: hasVolume ? bars.map((bar) => bar.volume ?? 0) : undefined
  });
}
