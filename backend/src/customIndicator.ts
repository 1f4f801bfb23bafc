import { InvalidPriceDataError } from "./errors.js";
import type { IndicatorPane, IndicatorStyle, PlotStyle } from "./indicators.js";
import type { SeriesValue } from "./types.js";

export interface CustomIndicator {
  name: string;
  label: string;
  pane: IndicatorPane;
  plot: PlotStyle;
  style: IndicatorStyle;
}

export interface CustomIndicatorOptions {
  label?: string;
  pane?: IndicatorPane;
  plot?: PlotStyle;
  style?: IndicatorStyle;
}

/** Describes precomputed data the caller hands to a single render. */
export function createCustomIndicator(name: string, options: CustomIndicatorOptions = {}): CustomIndicator {
  return Object.freeze({
    name,
    label: options.label ?? name,
    pane: options.pane ?? "overlay",
    plot: options.plot ?? "line",
    style: options.style ?? {}
  });
}

/** One array, or named arrays for an indicator with several outputs. */
export type CustomIndicatorData = readonly (number | null)[] | Readonly<Record<string, readonly (number | null)[]>>;

export interface PendingCustomIndicator {
  descriptor: CustomIndicator;
  outputs: { key: string; values: SeriesValue[] }[];
}

const isSeries = (data: CustomIndicatorData): data is readonly (number | null)[] => Array.isArray(data);

const clean = (value: number | null): SeriesValue => (value !== null && Number.isFinite(value) ? value : null);

export function prepareCustomIndicator(
  descriptor: CustomIndicator,
  data: CustomIndicatorData,
  length: number
): PendingCustomIndicator {
  const entries: [string, readonly (number | null)[]][] = isSeries(data) ? [["value", data]] : Object.entries(data);
  if (entries.length === 0) {
    throw new InvalidPriceDataError(`custom indicator "${descriptor.name}" has no data`, { indicator: descriptor.name });
  }
  return {
    descriptor,
    outputs: entries.map(([key, values]) => {
      if (values.length !== length) {
        throw new InvalidPriceDataError(
          `custom indicator "${descriptor.name}" has ${values.length} values for ${length} bars`,
          { indicator: descriptor.name, output: key }
        );
      }
      return { key, values: values.map(clean) };
    })
  };
}
