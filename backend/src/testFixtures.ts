import { createPriceSeries } from "./priceSeries.js";
import type { PriceSeries } from "./types.js";

export const DAY_MS = 86_400_000;
export const START_MS = Date.UTC(2024, 0, 1);

export const timestampAt = (i: number) => START_MS + i * DAY_MS;

/** Deterministic wave-shaped bars with volume. */
export function makePrices(count: number, options: { volume?: boolean } = {}): PriceSeries {
  const close = Array.from({ length: count }, (_, i) => 100 + 10 * Math.sin(i / 5) + i * 0.1);
  return createPriceSeries({
    timestamps: close.map((_, i) => timestampAt(i)),
    open: close.map((value, i) => (i === 0 ? value : close[i - 1])),
    high: close.map((value) => value + 1),
    low: close.map((value) => value - 1),
    close,
    volume: options.volume === false ? undefined : close.map((_, i) => 1000 + i)
  });
}

export function constantPrices(count: number, price: number): PriceSeries {
  const values = new Array<number>(count).fill(price);
  return createPriceSeries({
    timestamps: values.map((_, i) => timestampAt(i)),
    open: values,
    high: values,
    low: values,
    close: values
  });
}

export function closesOnly(close: readonly number[]): PriceSeries {
  return createPriceSeries({ timestamps: close.map((_, i) => timestampAt(i)), close });
}
