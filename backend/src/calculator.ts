import { createDefaultRegistry } from "./builtinIndicators.js";
import { ChartError, UnknownIndicatorError } from "./errors.js";
import {
  createIndicatorInput,
  resolveParams,
  type IndicatorDefinition,
  type IndicatorPane,
  type IndicatorRegistry,
  type ParamValues,
  type PlotStyle
} from "./indicators.js";
import type { PriceSeries, SeriesValue } from "./types.js";

export type RequestParams = Readonly<Record<string, unknown>>;

export interface OutputSeries {
  key: string;
  /** Display label; also the key looked up in a theme's `seriesColors`. */
  label: string;
  plot: PlotStyle;
  values: SeriesValue[];
}

export interface IndicatorSeries {
  /** The name as requested, e.g. `MA20`. */
  name: string;
  definition: IndicatorDefinition;
  params: ParamValues;
  pane: IndicatorPane;
  plot: PlotStyle;
  series: OutputSeries[];
}

export interface ResolvedIndicator {
  name: string;
  /** Name without an inline parameter, e.g. `MA` for `MA20`. */
  baseName: string;
  definition: IndicatorDefinition;
  params: ParamValues;
}

const INLINE_PARAM = /^(.*?[A-Za-z])[_-]?(\d+)$/;

const toSeriesValue = (value: number | undefined): SeriesValue =>
  value === undefined || !Number.isFinite(value) ? null : value;

/**
 * Computes indicator series from a price series. Stateless: every call resolves the
 * name, validates parameters and runs the definition from scratch.
 */
export class IndicatorCalculator {
  readonly registry: IndicatorRegistry;

  constructor(registry: IndicatorRegistry = createDefaultRegistry()) {
    this.registry = registry;
  }

  /**
   * Normalizes a requested name into a definition plus validated parameters. An exact
   * registry match wins; otherwise a trailing integer ("MA20") becomes the definition's
   * inline parameter unless `params` sets it explicitly.
   */
  resolve(name: string, params: RequestParams = {}): ResolvedIndicator {
    const requested = name.trim();
    const exact = this.registry.find(requested);
    if (exact) {
      return {
        name: requested,
        baseName: requested,
        definition: exact,
        params: resolveParams(requested, exact, params)
      };
    }

    const match = INLINE_PARAM.exec(requested);
    const definition = match ? this.registry.find(match[1]) : undefined;
    if (!match || !definition?.inlineParam) {
      throw new UnknownIndicatorError(requested);
    }

    const inlineValue = Number(match[2]);
    const merged = { [definition.inlineParam]: inlineValue, ...params };
    return {
      name: requested,
      baseName: match[1],
      definition,
      params: resolveParams(requested, definition, merged)
    };
  }

  compute(prices: PriceSeries, name: string, params: RequestParams = {}): IndicatorSeries {
    const resolved = this.resolve(name, params);
    const { definition } = resolved;

    const input = createIndicatorInput(resolved.name, definition, prices, prices.timestamps);
    const outputs = definition.prepare(resolved.name, resolved.params).compute(input);

    const label = seriesLabel(resolved);
    const series = definition.outputs.map((key): OutputSeries => {
      const values = outputs[key];
      if (values === undefined || values.length !== input.length) {
        throw new ChartError(
          "INVALID_INDICATOR_OUTPUT",
          `${resolved.name}: output "${key}" must have ${input.length} values`,
          { indicator: resolved.name, output: key }
        );
      }
      return {
        key,
        label: definition.outputs.length === 1 ? label : `${label}_${key}`,
        plot: definition.style.outputs?.[key]?.plot ?? definition.plot,
        values: Array.from(values, toSeriesValue)
      };
    });

    return {
      name: resolved.name,
      definition,
      params: resolved.params,
      pane: definition.pane,
      plot: definition.plot,
      series
    };
  }
}

/** `MA` with period 20 and `MA20` both label as `MA20`; other indicators keep the requested name. */
const seriesLabel = ({ name, baseName, definition, params }: ResolvedIndicator) => {
  if (!definition.inlineParam) return name;
  return `${baseName}${String(params[definition.inlineParam])}`;
};
