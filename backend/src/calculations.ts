/**
 * Technical indicator math. Every function returns an array aligned 1:1 with its
 * input; positions before the lookback window is filled hold NaN.
 */

type Values = readonly number[];

const filled = (length: number) => new Array<number>(length).fill(NaN);

/**
 * Simple moving average over a trailing window of exactly `period` values.
 */
export function calculateSMA(data: Values, period: number): number[] {
  const result = filled(data.length);
  for (let i = period - 1; i < data.length; i++) {
    let sum = 0;
    for (let j = i - period + 1; j <= i; j++) {
      sum += data[j];
    }
    result[i] = sum / period;
  }
  return result;
}

/**
 * Exponential moving average. Seeded with the simple mean of the first window of
 * `period` consecutive defined values, then `ema = v * k + prev * (1 - k)`.
 */
export function calculateEMA(data: Values, period: number): number[] {
  const result = filled(data.length);
  const k = 2 / (period + 1);

  let run = 0;
  let seedEnd = -1;
  for (let i = 0; i < data.length; i++) {
    run = Number.isNaN(data[i]) ? 0 : run + 1;
    if (run === period) {
      seedEnd = i;
      break;
    }
  }
  if (seedEnd < 0) return result;

  let ema = 0;
  for (let i = seedEnd - period + 1; i <= seedEnd; i++) {
    ema += data[i];
  }
  ema /= period;
  result[seedEnd] = ema;

  for (let i = seedEnd + 1; i < data.length; i++) {
    ema = data[i] * k + ema * (1 - k);
    result[i] = ema;
  }
  return result;
}

export function calculateMACD(
  data: Values,
  fastPeriod: number,
  slowPeriod: number,
  signalPeriod: number
): { macd: number[]; signal: number[]; histogram: number[] } {
  const fast = calculateEMA(data, fastPeriod);
  const slow = calculateEMA(data, slowPeriod);
  const macd = fast.map((value, i) => value - slow[i]);
  const signal = calculateEMA(macd, signalPeriod);
  const histogram = macd.map((value, i) => value - signal[i]);
  return { macd, signal, histogram };
}

/**
 * Relative strength index with Wilder smoothing. The first `period` values are NaN.
 */
export function calculateRSI(data: Values, period: number): number[] {
  const result = filled(data.length);
  if (data.length <= period) return result;

  let avgGain = 0;
  let avgLoss = 0;
  for (let i = 1; i <= period; i++) {
    const change = data[i] - data[i - 1];
    if (change > 0) avgGain += change;
    else avgLoss -= change;
  }
  avgGain /= period;
  avgLoss /= period;
  result[period] = rsiFrom(avgGain, avgLoss);

  for (let i = period + 1; i < data.length; i++) {
    const change = data[i] - data[i - 1];
    const gain = change > 0 ? change : 0;
    const loss = change < 0 ? -change : 0;
    avgGain = (avgGain * (period - 1) + gain) / period;
    avgLoss = (avgLoss * (period - 1) + loss) / period;
    result[i] = rsiFrom(avgGain, avgLoss);
  }
  return result;
}

const rsiFrom = (avgGain: number, avgLoss: number) => {
  if (avgLoss === 0) return avgGain === 0 ? 50 : 100;
  return 100 - 100 / (1 + avgGain / avgLoss);
};

/**
 * Bollinger bands: SMA ± `deviations` population standard deviations.
 */
export function calculateBollingerBands(
  data: Values,
  period: number,
  deviations: number
): { upper: number[]; middle: number[]; lower: number[] } {
  const middle = calculateSMA(data, period);
  const upper = filled(data.length);
  const lower = filled(data.length);

  for (let i = period - 1; i < data.length; i++) {
    let sum = 0;
    for (let j = i - period + 1; j <= i; j++) {
      const deviation = data[j] - middle[i];
      sum += deviation * deviation;
    }
    const spread = Math.sqrt(sum / period) * deviations;
    upper[i] = middle[i] + spread;
    lower[i] = middle[i] - spread;
  }
  return { upper, middle, lower };
}

const rollingExtremes = (high: Values, low: Values, i: number, period: number) => {
  let highest = -Infinity;
  let lowest = Infinity;
  for (let j = i - period + 1; j <= i; j++) {
    highest = Math.max(highest, high[j]);
    lowest = Math.min(lowest, low[j]);
  }
  return { highest, lowest };
};

/** Raw stochastic %K; a window with no range reads 50. */
export function calculateRawStochastic(high: Values, low: Values, close: Values, period: number): number[] {
  const result = filled(close.length);
  for (let i = period - 1; i < close.length; i++) {
    const { highest, lowest } = rollingExtremes(high, low, i, period);
    result[i] = highest === lowest ? 50 : (100 * (close[i] - lowest)) / (highest - lowest);
  }
  return result;
}

/** Recursive smoothing `s = alpha * v + (1 - alpha) * prev`, seeded with the first defined value. */
export function smoothWithAlpha(data: Values, alpha: number): number[] {
  const result = filled(data.length);
  let prev = NaN;
  for (let i = 0; i < data.length; i++) {
    const value = data[i];
    if (Number.isNaN(value)) continue;
    prev = Number.isNaN(prev) ? value : alpha * value + (1 - alpha) * prev;
    result[i] = prev;
  }
  return result;
}

export function calculateKDJ(
  high: Values,
  low: Values,
  close: Values,
  n: number,
  m1: number,
  m2: number
): { k: number[]; d: number[]; j: number[] } {
  const rsv = calculateRawStochastic(high, low, close, n);
  const k = smoothWithAlpha(rsv, 1 / m1);
  const d = smoothWithAlpha(k, 1 / m2);
  const j = k.map((value, i) => 3 * value - 2 * d[i]);
  return { k, d, j };
}

export function calculateStochastic(
  high: Values,
  low: Values,
  close: Values,
  kPeriod: number,
  dPeriod: number
): { k: number[]; d: number[] } {
  const k = calculateRawStochastic(high, low, close, kPeriod);
  const d = filled(close.length);
  for (let i = kPeriod - 1 + dPeriod - 1; i < close.length; i++) {
    let sum = 0;
    for (let j = i - dPeriod + 1; j <= i; j++) {
      sum += k[j];
    }
    d[i] = sum / dPeriod;
  }
  return { k, d };
}

/**
 * Average true range with Wilder smoothing. True range needs a previous close, so the
 * first ATR lands on index `period`.
 */
export function calculateATR(high: Values, low: Values, close: Values, period: number): number[] {
  const result = filled(close.length);
  if (close.length <= period) return result;

  const trueRange = (i: number) =>
    Math.max(high[i] - low[i], Math.abs(high[i] - close[i - 1]), Math.abs(low[i] - close[i - 1]));

  let atr = 0;
  for (let i = 1; i <= period; i++) {
    atr += trueRange(i);
  }
  atr /= period;
  result[period] = atr;

  for (let i = period + 1; i < close.length; i++) {
    atr = (atr * (period - 1) + trueRange(i)) / period;
    result[i] = atr;
  }
  return result;
}

/** Williams %R over `period`; a window with no range reads -50. */
export function calculateWilliamsR(high: Values, low: Values, close: Values, period: number): number[] {
  const result = filled(close.length);
  for (let i = period - 1; i < close.length; i++) {
    const { highest, lowest } = rollingExtremes(high, low, i, period);
    result[i] = highest === lowest ? -50 : (-100 * (highest - close[i])) / (highest - lowest);
  }
  return result;
}
