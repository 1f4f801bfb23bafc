import { Pool } from "pg";
import type { ChartConfig } from "./config.js";
import { ConfigError, InvalidPriceDataError } from "./errors.js";
import { createComponentLogger } from "./logger.js";
import { priceSeriesFromBars } from "./priceSeries.js";
import type { BarEvent, PriceSeries } from "./types.js";

const logger = createComponentLogger("CandleStore");

/** The slice of a pg `Pool` or client the candle reader needs. */
export interface Queryable {
  query(text: string, values: unknown[]): Promise<{ rows: unknown[] }>;
}

export function createPool(config: Pick<ChartConfig, "databaseUrl">): Pool {
  if (!config.databaseUrl) {
    throw new ConfigError("DATABASE_URL", "is required to read candles");
  }
  return new Pool({ connectionString: config.databaseUrl });
}

export interface BarsQuery {
  symbol: string;
  timeframe: string;
  datasetId?: string;
  from?: number;
  to?: number;
  limit?: number;
}

const toBar = (row: unknown, index: number): BarEvent => {
  if (typeof row !== "object" || row === null) {
    throw new InvalidPriceDataError(`candle row ${index} is not an object`, { index });
  }
  const fields = new Map(Object.entries(row));
  const num = (key: string) => {
    const value = Number(fields.get(key));
    if (!Number.isFinite(value)) {
      throw new InvalidPriceDataError(`candle row ${index} has a non-numeric "${key}"`, { index, key });
    }
    return value;
  };
  const volume = fields.get("volume");
  return {
    symbol: String(fields.get("symbol")),
    timeframe: String(fields.get("timeframe")),
    // EXTRACT(EPOCH ...) comes back as a numeric string
    timestamp: Math.round(num("timestamp")),
    open: num("open"),
    high: num("high"),
    low: num("low"),
    close: num("close"),
    volume: volume === null || volume === undefined ? undefined : num("volume")
  };
};

export async function fetchBars(db: Queryable, params: BarsQuery): Promise<BarEvent[]> {
  const { symbol, timeframe, datasetId, from, to, limit = 5000 } = params;
  const values: unknown[] = [];
  const where: string[] = [];

  if (datasetId) {
    values.push(datasetId);
    where.push(`dataset_id = $${values.length}`);
  }

  values.push(symbol, timeframe);
  where.push(`symbol = $${values.length - 1}`, `timeframe = $${values.length}`);

  if (from !== undefined) {
    values.push(from);
    where.push(`timestamp >= to_timestamp($${values.length} / 1000.0)`);
  }
  if (to !== undefined) {
    values.push(to);
    where.push(`timestamp <= to_timestamp($${values.length} / 1000.0)`);
  }
  values.push(limit);

  const sql = `
    SELECT
      symbol,
      timeframe,
      EXTRACT(EPOCH FROM timestamp) * 1000 AS "timestamp",
      open,
      high,
      low,
      close,
      volume
    FROM candles
    WHERE ${where.join(" AND ")}
    ORDER BY timestamp ASC
    LIMIT $${values.length}
  `;

  const res = await db.query(sql, values);
  const seen = new Set<number>();
  const unique: BarEvent[] = [];
  res.rows.forEach((row, index) => {
    const bar = toBar(row, index);
    if (seen.has(bar.timestamp)) return;
    seen.add(bar.timestamp);
    unique.push(bar);
  });

  if (unique.length < res.rows.length) {
    logger.warn(`Dropped ${res.rows.length - unique.length} duplicate candles for ${symbol} ${timeframe}`);
  }
  return unique;
}

/** Reads candles into a price series ready for charting. */
export async function fetchPriceSeries(db: Queryable, params: BarsQuery): Promise<PriceSeries> {
  return priceSeriesFromBars(await fetchBars(db, params));
}
