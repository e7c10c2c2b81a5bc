import { fetchOhlcv, toDailyBars, type DatabentoClientOptions } from './databento'
import { dateKeyUtc, shiftUtcDays, startOfUtcDay } from './dates'
import { getActiveContracts } from './futures-contracts'
import {
  buildHistoricalRows,
  buildStockRows,
  ensureAssetsExist,
  ensureSeasonalityTables,
  insertHistoricalData,
  insertStockPrices,
  recordIngestionRun,
} from './seasonality-store'
import {
  loadUniverse,
  parentSymbol,
  rootToDbSymbol,
  stockDbSymbol,
  type SeasonalityUniverse,
} from './seasonality-universe'
import type { DailyBar, FuturesBar, IngestionStatus, Queryable } from './types'

const JOB_NAME = 'databento-seasonality'
const DEFAULT_LOOKBACK_DAYS = 7
const STOCK_BATCH_SIZE = 50
const RULE = '='.repeat(60)

export interface DatabentoIngestOptions {
  start?: Date
  end?: Date
  dryRun?: boolean
  futuresOnly?: boolean
  stocksOnly?: boolean
}

export interface DatabentoIngestDeps {
  db: Queryable
  client?: DatabentoClientOptions
  universe?: SeasonalityUniverse
  now?: Date
}

export interface SegmentSummary {
  enabled: boolean
  requested: number
  recordsFetched: number
  rowsBuilt: number
  rowsWritten: number
  failed: Record<string, string>
}

export interface DatabentoIngestSummary {
  start: string
  end: string
  dryRun: boolean
  status: IngestionStatus
  futures: SegmentSummary
  stocks: SegmentSummary
}

function emptySegment(enabled: boolean, requested: number): SegmentSummary {
  return { enabled, requested, recordsFetched: 0, rowsBuilt: 0, rowsWritten: 0, failed: {} }
}

function errorText(error: unknown): string {
  const message = error instanceof Error ? error.message : String(error)
  return message.slice(0, 400)
}

export function resolveDateRange(options: DatabentoIngestOptions, now: Date): { start: Date; end: Date } {
  const end = startOfUtcDay(options.end ?? now)
  const start = startOfUtcDay(options.start ?? shiftUtcDays(end, -DEFAULT_LOOKBACK_DAYS))
  if (start > end) {
    throw new Error(`Start date ${dateKeyUtc(start)} is after end date ${dateKeyUtc(end)}`)
  }
  return { start, end }
}

async function fetchFuturesBars(
  universe: SeasonalityUniverse,
  start: string,
  end: string,
  client: DatabentoClientOptions | undefined,
  segment: SegmentSummary
): Promise<FuturesBar[]> {
  console.log(`[databento] fetching futures for roots: ${universe.futuresRoots.map((r) => r.root).join(', ')}`)
  console.log(`[databento]   date range: ${start} to ${end}`)

  const bars: FuturesBar[] = []
  for (const { root } of universe.futuresRoots) {
    try {
      const records = await fetchOhlcv(
        {
          dataset: universe.futuresDataset,
          symbols: [parentSymbol(root)],
          stypeIn: 'parent',
          schema: universe.schema,
          start,
          end,
        },
        client
      )
      segment.recordsFetched += records.length
      for (const bar of toDailyBars(records)) bars.push({ ...bar, root })
      if (records.length > 0) console.log(`[databento]   ${root}: ${records.length} records`)
    } catch (error) {
      segment.failed[root] = errorText(error)
      console.error(`[databento]   ${root}: error - ${segment.failed[root].slice(0, 60)}`)
    }
  }

  console.log(`[databento]   total futures records: ${segment.recordsFetched}`)
  return bars
}

async function fetchStockBars(
  universe: SeasonalityUniverse,
  start: string,
  end: string,
  client: DatabentoClientOptions | undefined,
  segment: SegmentSummary
): Promise<DailyBar[]> {
  const symbols = universe.stockSymbols
  console.log(`[databento] fetching stock data for ${symbols.length} symbols`)
  console.log(`[databento]   date range: ${start} to ${end}`)

  const bars: DailyBar[] = []
  for (let i = 0; i < symbols.length; i += STOCK_BATCH_SIZE) {
    const batch = symbols.slice(i, i + STOCK_BATCH_SIZE)
    const label = `batch ${i / STOCK_BATCH_SIZE + 1}`
    try {
      const records = await fetchOhlcv(
        { dataset: universe.stocksDataset, symbols: batch, schema: universe.schema, start, end },
        client
      )
      segment.recordsFetched += records.length
      for (const bar of toDailyBars(records)) bars.push(bar)
      if (records.length > 0) console.log(`[databento]   ${label}: ${records.length} records`)
    } catch (error) {
      segment.failed[label] = errorText(error)
      console.error(`[databento]   ${label} error: ${segment.failed[label].slice(0, 60)}`)
    }
  }

  console.log(`[databento]   total stock records: ${segment.recordsFetched}`)
  return bars
}

function logSample(kind: string, count: number, sample: unknown): void {
  console.log(`\n[DRY RUN] Would insert ${count} ${kind} records`)
  if (sample !== undefined) {
    console.log(`Sample ${kind} record:`)
    console.log(JSON.stringify(sample))
  }
}

function failedCount(summary: Pick<DatabentoIngestSummary, 'futures' | 'stocks'>): number {
  return Object.keys(summary.futures.failed).length + Object.keys(summary.stocks.failed).length
}

/**
 * Process exit code for a finished run. Per-root and per-batch failures are
 * recorded in the run but do not fail the job; only a run where every enabled
 * segment fetched nothing and reported failures exits 1.
 */
export function ingestExitCode(summary: Pick<DatabentoIngestSummary, 'futures' | 'stocks'>): number {
  const segments = [summary.futures, summary.stocks].filter((s) => s.enabled)
  const allFailed =
    segments.length > 0 &&
    segments.every((s) => s.recordsFetched === 0 && Object.keys(s.failed).length > 0)
  return allFailed ? 1 : 0
}

export async function runDatabentoIngest(
  options: DatabentoIngestOptions,
  deps: DatabentoIngestDeps
): Promise<DatabentoIngestSummary> {
  if (options.futuresOnly && options.stocksOnly) {
    throw new Error('--futures-only and --stocks-only cannot be combined')
  }

  const universe = deps.universe ?? loadUniverse()
  const now = deps.now ?? new Date()
  const startedAt = new Date()
  const { start, end } = resolveDateRange(options, now)
  const startKey = dateKeyUtc(start)
  const endKey = dateKeyUtc(end)
  const dryRun = options.dryRun ?? false
  const fetchFutures = !options.stocksOnly
  const fetchStocks = !options.futuresOnly && universe.stockSymbols.length > 0

  const summary: DatabentoIngestSummary = {
    start: startKey,
    end: endKey,
    dryRun,
    status: dryRun ? 'DRY_RUN' : 'COMPLETED',
    futures: emptySegment(fetchFutures, fetchFutures ? universe.futuresRoots.length : 0),
    stocks: emptySegment(fetchStocks, fetchStocks ? universe.stockSymbols.length : 0),
  }

  console.log(RULE)
  console.log('DATABENTO SEASONALITY DATA FETCHER')
  console.log(RULE)
  console.log(`Date range: ${startKey} to ${endKey}`)
  console.log(`Dry run: ${dryRun}`)
  console.log(`Fetch futures: ${fetchFutures} (${universe.futuresRoots.length} symbols)`)
  console.log(`Fetch stocks: ${fetchStocks} (${universe.stockSymbols.length} symbols)`)

  try {
    if (!dryRun) await ensureSeasonalityTables(deps.db)

    if (fetchFutures) {
      console.log(`\n${RULE}\nFUTURES → historical_data (for volume-based roll)\n${RULE}`)
      const front = universe.futuresRoots[0]
      if (front) {
        console.log(`[databento] front contracts at ${endKey}: ${getActiveContracts(front.root, end).join(', ')} …`)
      }

      if (!dryRun) {
        await ensureAssetsExist(deps.db, [...new Set(universe.futuresRoots.map((r) => r.dbSymbol))], 'Futures')
      }

      const bars = await fetchFuturesBars(universe, startKey, endKey, deps.client, summary.futures)
      const rows = buildHistoricalRows(bars, rootToDbSymbol(universe))
      summary.futures.rowsBuilt = rows.length

      if (dryRun) {
        logSample('futures', rows.length, rows[0])
      } else if (rows.length > 0) {
        summary.futures.rowsWritten = await insertHistoricalData(deps.db, rows)
        console.log(`\nInserted ${summary.futures.rowsWritten} records into historical_data`)
      }
    }

    if (fetchStocks) {
      console.log(`\n${RULE}\nSTOCKS → continuous_prices (no roll needed)\n${RULE}`)

      if (!dryRun) {
        await ensureAssetsExist(
          deps.db,
          universe.stockSymbols.map((ticker) => stockDbSymbol(universe, ticker)),
          'Stock'
        )
      }

      const bars = await fetchStockBars(universe, startKey, endKey, deps.client, summary.stocks)
      const rows = buildStockRows(bars, universe.stockPrefix)
      summary.stocks.rowsBuilt = rows.length

      if (dryRun) {
        logSample('stock', rows.length, rows[0])
      } else if (rows.length > 0) {
        summary.stocks.rowsWritten = await insertStockPrices(deps.db, rows)
        console.log(`\nInserted ${summary.stocks.rowsWritten} records into continuous_prices`)
      }
    }

    if (!dryRun) {
      summary.status = failedCount(summary) === 0 ? 'COMPLETED' : 'FAILED'
      await recordIngestionRun(deps.db, {
        job: JOB_NAME,
        status: summary.status,
        startedAt,
        rowsProcessed: summary.futures.rowsBuilt + summary.stocks.rowsBuilt,
        rowsInserted: summary.futures.rowsWritten + summary.stocks.rowsWritten,
        rowsFailed: failedCount(summary),
        details: summary,
      })
    }
  } catch (error) {
    summary.status = 'FAILED'
    if (!dryRun) {
      await recordIngestionRun(deps.db, {
        job: JOB_NAME,
        status: 'FAILED',
        startedAt,
        rowsProcessed: summary.futures.rowsBuilt + summary.stocks.rowsBuilt,
        rowsInserted: summary.futures.rowsWritten + summary.stocks.rowsWritten,
        rowsFailed: failedCount(summary) + 1,
        details: { error: errorText(error), summary },
      }).catch((recordError) => {
        console.error(`[databento] could not record failed run: ${errorText(recordError)}`)
      })
    }
    throw error
  }

  console.log(`\n${RULE}\nCOMPLETE\n${RULE}`)
  if (fetchFutures) {
    console.log('\nNext step: build the continuous series to roll futures contracts')
  }
  return summary
}
