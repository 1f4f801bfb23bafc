export type PriceColumn = "open" | "high" | "low" | "close" | "volume";

export const PRICE_COLUMNS: readonly PriceColumn[] = ["open", "high", "low", "close", "volume"];

export interface BarEvent {
  symbol: string;
  timeframe: string;
  timestamp: number; // epoch ms UTC
  open: number;
  high: number;
  low: number;
  close: number;
  volume?: number;
}

/**
 * Columnar OHLCV table. Every present column has exactly one value per timestamp;
 * absent columns are simply missing.
 */
export interface PriceSeries {
  readonly timestamps: readonly number[];
  readonly open?: readonly number[];
  readonly high?: readonly number[];
  readonly low?: readonly number[];
  readonly close?: readonly number[];
  readonly volume?: readonly number[];
}

export type TradeDirection = "long" | "short";

export interface Trade {
  entryTime: number;
  entryPrice: number;
  exitTime?: number;
  exitPrice?: number;
  direction: TradeDirection;
  size?: number;
}

export interface EquityPoint {
  timestamp: number;
  value: number;
}

/** A series value that is `null` until the indicator's lookback window is filled. */
export type SeriesValue = number | null;
