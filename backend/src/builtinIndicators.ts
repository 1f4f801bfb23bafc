import {
  calculateATR,
  calculateBollingerBands,
  calculateEMA,
  calculateKDJ,
  calculateMACD,
  calculateRSI,
  calculateSMA,
  calculateStochastic,
  calculateWilliamsR
} from "./calculations.js";
import { defineIndicator, IndicatorRegistry, type IndicatorParamSchema } from "./indicators.js";

const periodParam = (defaultValue: number, description: string): IndicatorParamSchema => ({
  name: "period",
  type: "number",
  label: "Period",
  description,
  min: 1,
  max: 5000,
  step: 1,
  integer: true,
  default: defaultValue
});

const windowParam = (name: string, label: string, defaultValue: number): IndicatorParamSchema => ({
  name,
  type: "number",
  label,
  min: 1,
  max: 5000,
  step: 1,
  integer: true,
  default: defaultValue
});

export const movingAverage = defineIndicator({
  name: "MA",
  label: "Simple Moving Average",
  description: "Trailing mean of the close",
  pane: "overlay",
  plot: "line",
  inputs: ["close"],
  outputs: ["value"],
  params: [periodParam(20, "Number of bars to average")],
  style: {},
  inlineParam: "period",
  parse: (p) => ({ period: p.number("period") }),
  compute: (input, { period }) => ({ value: calculateSMA(input.column("close"), period) })
});

export const exponentialMovingAverage = defineIndicator({
  name: "EMA",
  label: "Exponential Moving Average",
  pane: "overlay",
  plot: "line",
  inputs: ["close"],
  outputs: ["value"],
  params: [periodParam(12, "Smoothing window")],
  style: {},
  inlineParam: "period",
  parse: (p) => ({ period: p.number("period") }),
  compute: (input, { period }) => ({ value: calculateEMA(input.column("close"), period) })
});

export const macd = defineIndicator({
  name: "MACD",
  label: "Moving Average Convergence Divergence",
  pane: "subplot",
  plot: "line",
  inputs: ["close"],
  outputs: ["macd", "signal", "histogram"],
  params: [windowParam("fast", "Fast period", 12), windowParam("slow", "Slow period", 26), windowParam("signal", "Signal period", 9)],
  style: {
    outputs: {
      macd: { color: "#FF6B6B" },
      signal: { color: "#4ECDC4" },
      histogram: { color: "#45B7D1", plot: "bar" }
    }
  },
  parse: (p) => ({ fast: p.number("fast"), slow: p.number("slow"), signal: p.number("signal") }),
  validate: ({ fast, slow }) =>
    fast < slow ? undefined : { parameter: "fast", reason: `fast (${fast}) must be less than slow (${slow})` },
  compute: (input, { fast, slow, signal }) => calculateMACD(input.column("close"), fast, slow, signal)
});

export const relativeStrength = defineIndicator({
  name: "RSI",
  label: "Relative Strength Index",
  pane: "subplot",
  plot: "line",
  inputs: ["close"],
  outputs: ["value"],
  params: [periodParam(14, "Wilder smoothing window")],
  style: { color: "#FF6B6B", lineWidth: 2, levels: [30, 70] },
  inlineParam: "period",
  parse: (p) => ({ period: p.number("period") }),
  compute: (input, { period }) => ({ value: calculateRSI(input.column("close"), period) })
});

export const bollingerBands = defineIndicator({
  name: "BOLL",
  label: "Bollinger Bands",
  pane: "overlay",
  plot: "band",
  inputs: ["close"],
  outputs: ["upper", "middle", "lower"],
  params: [
    periodParam(20, "Moving average window"),
    {
      name: "std",
      type: "number",
      label: "Std. deviations",
      description: "Band width in population standard deviations",
      min: 0,
      max: 10,
      step: 0.5,
      default: 2
    }
  ],
  style: {
    fillOpacity: 0.1,
    outputs: {
      upper: { color: "#DDA0DD" },
      middle: { color: "#98D8C8" },
      lower: { color: "#DDA0DD" }
    }
  },
  inlineParam: "period",
  parse: (p) => ({ period: p.number("period"), std: p.number("std") }),
  compute: (input, { period, std }) => calculateBollingerBands(input.column("close"), period, std)
});

export const kdj = defineIndicator({
  name: "KDJ",
  label: "KDJ Stochastic",
  pane: "subplot",
  plot: "line",
  inputs: ["high", "low", "close"],
  outputs: ["k", "d", "j"],
  params: [windowParam("n", "RSV window", 9), windowParam("m1", "K smoothing", 3), windowParam("m2", "D smoothing", 3)],
  style: {
    levels: [20, 80],
    outputs: {
      k: { color: "#FF6B6B" },
      d: { color: "#4ECDC4" },
      j: { color: "#45B7D1" }
    }
  },
  parse: (p) => ({ n: p.number("n"), m1: p.number("m1"), m2: p.number("m2") }),
  compute: (input, { n, m1, m2 }) =>
    calculateKDJ(input.column("high"), input.column("low"), input.column("close"), n, m1, m2)
});

export const stochastic = defineIndicator({
  name: "STOCH",
  label: "Stochastic Oscillator",
  pane: "subplot",
  plot: "line",
  inputs: ["high", "low", "close"],
  outputs: ["k", "d"],
  params: [windowParam("kPeriod", "%K period", 14), windowParam("dPeriod", "%D period", 3)],
  style: {
    levels: [20, 80],
    outputs: {
      k: { color: "#2196F3" },
      d: { color: "#FF9800" }
    }
  },
  parse: (p) => ({ kPeriod: p.number("kPeriod"), dPeriod: p.number("dPeriod") }),
  compute: (input, { kPeriod, dPeriod }) =>
    calculateStochastic(input.column("high"), input.column("low"), input.column("close"), kPeriod, dPeriod)
});

export const averageTrueRange = defineIndicator({
  name: "ATR",
  label: "Average True Range",
  pane: "subplot",
  plot: "line",
  inputs: ["high", "low", "close"],
  outputs: ["value"],
  params: [periodParam(14, "Wilder smoothing window")],
  style: { color: "#9C27B0" },
  inlineParam: "period",
  parse: (p) => ({ period: p.number("period") }),
  compute: (input, { period }) => ({
    value: calculateATR(input.column("high"), input.column("low"), input.column("close"), period)
  })
});

export const williamsR = defineIndicator({
  name: "WILLR",
  label: "Williams %R",
  pane: "subplot",
  plot: "line",
  inputs: ["high", "low", "close"],
  outputs: ["value"],
  params: [periodParam(14, "Lookback window")],
  style: { color: "#FF9800", levels: [-80, -20] },
  inlineParam: "period",
  parse: (p) => ({ period: p.number("period") }),
  compute: (input, { period }) => ({
    value: calculateWilliamsR(input.column("high"), input.column("low"), input.column("close"), period)
  })
});

export const volume = defineIndicator({
  name: "VOLUME",
  label: "Volume",
  pane: "subplot",
  plot: "bar",
  inputs: ["volume"],
  outputs: ["value"],
  params: [],
  style: { color: "#7f8c8d" },
  parse: () => ({}),
  compute: (input) => ({ value: [...input.column("volume")] })
});

/** Registers the built-in indicators, including the `SMA` and `BBANDS` aliases. */
export function registerBuiltinIndicators(registry: IndicatorRegistry): IndicatorRegistry {
  return registry
    .register("MA", movingAverage)
    .register("SMA", movingAverage)
    .register("EMA", exponentialMovingAverage)
    .register("MACD", macd)
    .register("RSI", relativeStrength)
    .register("BOLL", bollingerBands)
    .register("BBANDS", bollingerBands)
    .register("KDJ", kdj)
    .register("STOCH", stochastic)
    .register("ATR", averageTrueRange)
    .register("WILLR", williamsR)
    .register("VOLUME", volume);
}

export const createDefaultRegistry = () => registerBuiltinIndicators(new IndicatorRegistry());
