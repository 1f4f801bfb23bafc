import { InvalidParameterError, MissingInputColumnError, UnknownIndicatorError } from "./errors.js";
import type { PriceColumn } from "./types.js";

export type ParamValue = number | string;

export type ParamValues = Readonly<Record<string, ParamValue>>;

export interface IndicatorParamSchema {
  name: string;
  type: "number" | "string";
  label: string;
  description?: string;
  min?: number;
  max?: number;
  step?: number;
  integer?: boolean;
  options?: readonly string[];
  default?: ParamValue;
}

export type IndicatorPane = "overlay" | "subplot";

export type PlotStyle = "line" | "bar" | "area" | "band";

export type LineStyle = "solid" | "dashed" | "dotted";

export interface SeriesStyle {
  color?: string;
  lineWidth?: number;
  lineStyle?: LineStyle;
  fillOpacity?: number;
}

export interface OutputStyle extends SeriesStyle {
  /** Draws this output differently from the indicator's plot style (e.g. a MACD histogram). */
  plot?: PlotStyle;
}

export interface IndicatorStyle extends SeriesStyle {
  outputs?: Readonly<Record<string, OutputStyle>>;
  /** Horizontal reference levels drawn in the indicator's pane (e.g. RSI 30/70). */
  levels?: readonly number[];
}

/** Price columns handed to a computation; only declared inputs can be read. */
export interface IndicatorInput {
  readonly length: number;
  readonly timestamps: readonly number[];
  column(name: PriceColumn): readonly number[];
}

export type IndicatorOutputs = Readonly<Record<string, readonly number[]>>;

export interface ParamReader {
  number(name: string): number;
  string(name: string): string;
}

export interface PreparedIndicator {
  compute(input: IndicatorInput): IndicatorOutputs;
}

export interface IndicatorMeta {
  name: string;
  label: string;
  description?: string;
  pane: IndicatorPane;
  plot: PlotStyle;
  inputs: readonly PriceColumn[];
  outputs: readonly string[];
  params: readonly IndicatorParamSchema[];
  style: IndicatorStyle;
  /** Parameter that a trailing number in the requested name supplies, as in "MA20". */
  inlineParam?: string;
}

export interface IndicatorDefinition extends Readonly<IndicatorMeta> {
  /**
   * Binds validated parameter values to the computation. `indicator` is the name the
   * author requested and is what errors report.
   */
  prepare(indicator: string, values: ParamValues): PreparedIndicator;
}

export interface ParamProblem {
  parameter: string;
  reason: string;
}

export interface IndicatorSpec<P> extends IndicatorMeta {
  parse: (params: ParamReader) => P;
  validate?: (params: P) => ParamProblem | undefined;
  compute: (input: IndicatorInput, params: P) => IndicatorOutputs;
}

const createParamReader = (indicator: string, values: ParamValues): ParamReader => ({
  number(name) {
    const value = values[name];
    if (typeof value !== "number") {
      throw new InvalidParameterError(indicator, name, "expected a number");
    }
    return value;
  },
  string(name) {
    const value = values[name];
    if (typeof value !== "string") {
      throw new InvalidParameterError(indicator, name, "expected a string");
    }
    return value;
  }
});

/**
 * Turns a typed indicator spec into a registry definition. The spec's parameter type
 * stays private to the closure, so the registry holds every kind behind one interface.
 */
export function defineIndicator<P>(spec: IndicatorSpec<P>): IndicatorDefinition {
  const { parse, validate, compute, ...meta } = spec;
  return Object.freeze({
    ...meta,
    prepare(indicator: string, values: ParamValues): PreparedIndicator {
      const params = parse(createParamReader(indicator, values));
      const problem = validate?.(params);
      if (problem) {
        throw new InvalidParameterError(indicator, problem.parameter, problem.reason);
      }
      return { compute: (input) => compute(input, params) };
    }
  });
}

const checkValue = (indicator: string, schema: IndicatorParamSchema, value: unknown): ParamValue => {
  const { name } = schema;
  if (schema.type === "string") {
    if (typeof value !== "string") {
      throw new InvalidParameterError(indicator, name, `expected a string, got ${typeof value}`);
    }
    if (schema.options && !schema.options.includes(value)) {
      throw new InvalidParameterError(indicator, name, `expected one of ${schema.options.join(", ")}, got "${value}"`);
    }
    return value;
  }

  if (typeof value !== "number" || !Number.isFinite(value)) {
    throw new InvalidParameterError(indicator, name, `expected a finite number, got ${String(value)}`);
  }
  if (schema.integer && !Number.isInteger(value)) {
    throw new InvalidParameterError(indicator, name, `expected an integer, got ${value}`);
  }
  if (schema.min !== undefined && value < schema.min) {
    throw new InvalidParameterError(indicator, name, `must be >= ${schema.min}, got ${value}`);
  }
  if (schema.max !== undefined && value > schema.max) {
    throw new InvalidParameterError(indicator, name, `must be <= ${schema.max}, got ${value}`);
  }
  return value;
};

/**
 * Applies schema defaults under the supplied values and validates the result.
 * Keys the schema does not declare are rejected.
 */
export function resolveParams(
  indicator: string,
  definition: Pick<IndicatorMeta, "params">,
  supplied: Readonly<Record<string, unknown>>
): ParamValues {
  const known = new Set(definition.params.map((param) => param.name));
  for (const key of Object.keys(supplied)) {
    if (!known.has(key)) {
      throw new InvalidParameterError(indicator, key, "not a parameter of this indicator");
    }
  }

  const resolved: Record<string, ParamValue> = {};
  for (const schema of definition.params) {
    const value = supplied[schema.name] ?? schema.default;
    if (value === undefined) {
      throw new InvalidParameterError(indicator, schema.name, "is required");
    }
    resolved[schema.name] = checkValue(indicator, schema, value);
  }
  return Object.freeze(resolved);
}

export function createIndicatorInput(
  indicator: string,
  definition: Pick<IndicatorMeta, "inputs">,
  columns: Partial<Record<PriceColumn, readonly number[]>>,
  timestamps: readonly number[]
): IndicatorInput {
  for (const name of definition.inputs) {
    if (columns[name] === undefined) {
      throw new MissingInputColumnError(indicator, name);
    }
  }
  return {
    length: timestamps.length,
    timestamps,
    column(name) {
      const values = definition.inputs.includes(name) ? columns[name] : undefined;
      if (values === undefined) {
        throw new MissingInputColumnError(indicator, name);
      }
      return values;
    }
  };
}

interface RegistryEntry {
  name: string;
  definition: IndicatorDefinition;
}

/**
 * Name → definition table. Lookups are case-insensitive; registering an existing
 * name replaces its definition.
 */
export class IndicatorRegistry {
  private readonly entries = new Map<string, RegistryEntry>();

  register(name: string, definition: IndicatorDefinition): this {
    const trimmed = name.trim();
    if (!trimmed) {
      throw new InvalidParameterError(name, "name", "indicator name must not be empty");
    }
    this.entries.set(trimmed.toUpperCase(), { name: trimmed, definition });
    return this;
  }

  find(name: string): IndicatorDefinition | undefined {
    return this.entries.get(name.trim().toUpperCase())?.definition;
  }

  lookup(name: string): IndicatorDefinition {
    const definition = this.find(name);
    if (!definition) {
      throw new UnknownIndicatorError(name);
    }
    return definition;
  }

  has(name: string): boolean {
    return this.find(name) !== undefined;
  }

  listNames(): Set<string> {
    return new Set(Array.from(this.entries.values(), (entry) => entry.name));
  }
}
