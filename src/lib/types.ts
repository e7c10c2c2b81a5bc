export interface DatabentoOhlcvRecord {
  hd: {
    ts_event: string
    rtype: number
    publisher_id: number
    instrument_id: number
  }
  open: number | string
  high: number | string
  low: number | string
  close: number | string
  volume: number | string
  /** Present when the request sets map_symbols=true */
  symbol?: string
}

export interface DailyBar {
  tradeDate: string // YYYY-MM-DD (UTC date of ts_event)
  symbol: string
  instrumentId: number
  open: number
  high: number
  low: number
  close: number
  volume: number
}

export interface FuturesBar extends DailyBar {
  /** Parent root the bar was requested under (e.g. ES for ESH5) */
  root: string
}

export interface DatasetRange {
  start: string
  end: string
}

export type FetchLike = (input: string | URL, init?: RequestInit) => Promise<Response>

export type DbRow = Record<string, unknown>

export interface QueryResultLike {
  rows: DbRow[]
  rowCount: number | null
}

/** The slice of pg's Pool / PoolClient the stores use. */
export interface Queryable {
  query(text: string, values?: unknown[]): Promise<QueryResultLike>
}

export type IngestionStatus = 'COMPLETED' | 'FAILED' | 'DRY_RUN'
