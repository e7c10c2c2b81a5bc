import { isCalendarSpread, parseContractCode } from './futures-contracts'
import { chunk, valuesClause } from './sql-values'
import type { DailyBar, FuturesBar, IngestionStatus, Queryable } from './types'

export const SCHEMA_NAME = 'seasonality'
const INSERT_PAGE_SIZE = 1000

/** One row of seasonality.historical_data, in column order. */
export type HistoricalRow = [
  symbol: string,
  tradeDate: string,
  open: number,
  high: number,
  low: number,
  close: number,
  value: number,
  contract: string,
  instrumentId: number | null,
]

/** One row of seasonality.continuous_prices, in column order. */
export type ContinuousRow = [
  tradeDate: string,
  symbol: string,
  open: number,
  high: number,
  low: number,
  close: number,
]

export interface IngestionRunRecord {
  job: string
  status: IngestionStatus
  startedAt: Date
  rowsProcessed: number
  rowsInserted: number
  rowsFailed: number
  details: unknown
}

export async function ensureSeasonalityTables(db: Queryable): Promise<void> {
  await db.query(`CREATE SCHEMA IF NOT EXISTS ${SCHEMA_NAME}`)
  await db.query(`
    CREATE TABLE IF NOT EXISTS ${SCHEMA_NAME}.assets (
      id SERIAL PRIMARY KEY,
      symbol TEXT NOT NULL UNIQUE,
      name TEXT
    )`)
  await db.query(`
    CREATE TABLE IF NOT EXISTS ${SCHEMA_NAME}.historical_data (
      id BIGSERIAL PRIMARY KEY,
      symbol TEXT NOT NULL,
      trade_date DATE NOT NULL,
      open NUMERIC(18,6),
      high NUMERIC(18,6),
      low NUMERIC(18,6),
      close NUMERIC(18,6),
      value BIGINT,
      contract TEXT,
      instrument_id BIGINT,
      contract_norm TEXT GENERATED ALWAYS AS (upper(coalesce(contract, ''))) STORED,
      UNIQUE (symbol, trade_date, contract_norm)
    )`)
  await db.query(`
    CREATE TABLE IF NOT EXISTS ${SCHEMA_NAME}.continuous_prices (
      trade_date DATE NOT NULL,
      symbol TEXT NOT NULL,
      open NUMERIC(18,6),
      high NUMERIC(18,6),
      low NUMERIC(18,6),
      close NUMERIC(18,6),
      PRIMARY KEY (trade_date, symbol)
    )`)
  await db.query(`
    CREATE TABLE IF NOT EXISTS ${SCHEMA_NAME}.ingestion_runs (
      id BIGSERIAL PRIMARY KEY,
      job TEXT NOT NULL,
      status TEXT NOT NULL,
      started_at TIMESTAMPTZ NOT NULL,
      finished_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
      rows_processed INT NOT NULL DEFAULT 0,
      rows_inserted INT NOT NULL DEFAULT 0,
      rows_failed INT NOT NULL DEFAULT 0,
      details JSONB
    )`)
}

export async function ensureAssetsExist(
  db: Queryable,
  symbols: readonly string[],
  assetType: string
): Promise<void> {
  if (symbols.length === 0) return
  const unique = [...new Set(symbols)]
  const { sql, values } = valuesClause(unique.map((symbol) => [symbol, `${symbol} ${assetType}`]))
  await db.query(
    `INSERT INTO ${SCHEMA_NAME}.assets (symbol, name)
     VALUES ${sql}
     ON CONFLICT (symbol) DO NOTHING`,
    values
  )
}

/**
 * Futures bars → historical_data rows. Volume lands in `value`, which the
 * continuous-series builder uses to pick the roll.
 */
export function buildHistoricalRows(
  bars: readonly FuturesBar[],
  rootToDb: ReadonlyMap<string, string>
): HistoricalRow[] {
  // One statement cannot touch the same conflict key twice, so later bars win
  const rows = new Map<string, HistoricalRow>()
  for (const bar of bars) {
    const dbSymbol = rootToDb.get(bar.root)
    if (!dbSymbol) continue
    if (isCalendarSpread(bar.symbol) || !parseContractCode(bar.symbol)) continue
    if (!(bar.close > 0)) continue

    rows.set(`${dbSymbol}|${bar.tradeDate}|${bar.symbol.toUpperCase()}`, [
      dbSymbol,
      bar.tradeDate,
      bar.open,
      bar.high,
      bar.low,
      bar.close,
      bar.volume,
      bar.symbol,
      Number.isFinite(bar.instrumentId) ? bar.instrumentId : null,
    ])
  }
  return [...rows.values()]
}

export async function insertHistoricalData(db: Queryable, rows: readonly HistoricalRow[]): Promise<number> {
  let written = 0
  for (const page of chunk(rows, INSERT_PAGE_SIZE)) {
    const { sql, values } = valuesClause(page)
    const result = await db.query(
      `INSERT INTO ${SCHEMA_NAME}.historical_data
         (symbol, trade_date, open, high, low, close, value, contract, instrument_id)
       VALUES ${sql}
       ON CONFLICT (symbol, trade_date, contract_norm) DO UPDATE SET
         open = EXCLUDED.open,
         high = EXCLUDED.high,
         low = EXCLUDED.low,
         close = EXCLUDED.close,
         value = EXCLUDED.value`,
      values
    )
    written += result.rowCount ?? 0
  }
  return written
}

export function buildStockRows(bars: readonly DailyBar[], prefix: string): ContinuousRow[] {
  const rows = new Map<string, ContinuousRow>()
  for (const bar of bars) {
    if (!bar.symbol) continue
    if (!(bar.close > 0)) continue
    const symbol = `${prefix}${bar.symbol}`
    rows.set(`${bar.tradeDate}|${symbol}`, [bar.tradeDate, symbol, bar.open, bar.high, bar.low, bar.close])
  }
  return [...rows.values()]
}

export async function insertStockPrices(db: Queryable, rows: readonly ContinuousRow[]): Promise<number> {
  let written = 0
  for (const page of chunk(rows, INSERT_PAGE_SIZE)) {
    const { sql, values } = valuesClause(page)
    const result = await db.query(
      `INSERT INTO ${SCHEMA_NAME}.continuous_prices
         (trade_date, symbol, open, high, low, close)
       VALUES ${sql}
       ON CONFLICT (trade_date, symbol) DO UPDATE SET
         open = EXCLUDED.open,
         high = EXCLUDED.high,
         low = EXCLUDED.low,
         close = EXCLUDED.close`,
      values
    )
    written += result.rowCount ?? 0
  }
  return written
}

const INGESTION_RUN_CASTS = [null, null, 'timestamptz', null, null, null, 'jsonb']

export async function recordIngestionRun(db: Queryable, run: IngestionRunRecord): Promise<void> {
  const { sql, values } = valuesClause(
    [
      [
        run.job,
        run.status,
        run.startedAt.toISOString(),
        run.rowsProcessed,
        run.rowsInserted,
        run.rowsFailed,
        JSON.stringify(run.details),
      ],
    ],
    INGESTION_RUN_CASTS
  )
  await db.query(
    `INSERT INTO ${SCHEMA_NAME}.ingestion_runs
       (job, status, started_at, rows_processed, rows_inserted, rows_failed, details)
     VALUES ${sql}`,
    values
  )
}
