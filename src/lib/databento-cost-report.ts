import { getCost, getDatasetRange, type DatabentoClientOptions, type RangeQuery } from './databento'
import { dateKeyUtc, shiftUtcDays } from './dates'
import { parentSymbol, type SeasonalityUniverse } from './seasonality-universe'
import type { DatasetRange } from './types'

const WEEKS_PER_YEAR = 52
const BACKFILL_YEARS = 5

export interface CostClient {
  getDatasetRange(dataset: string): Promise<DatasetRange>
  getCost(query: RangeQuery): Promise<number>
}

export function databentoCostClient(options?: DatabentoClientOptions): CostClient {
  return {
    getDatasetRange: (dataset) => getDatasetRange(dataset, options),
    getCost: (query) => getCost(query, options),
  }
}

export type CheckStatus = 'ok' | 'not-found' | 'error'

export interface SymbolCost {
  symbol: string
  name: string
  status: CheckStatus
  cost: number
  error?: string
}

export interface PeriodCost {
  start: string
  end: string
  cost: number | null
  /** Set when the request failed and the figure was extrapolated from the 7-day total */
  estimated: boolean
  error?: string
}

export interface CostReport {
  window: { start: string; end: string }
  futures: {
    dataset: string
    range: DatasetRange | null
    accessError?: string
    roots: SymbolCost[]
    availableRoots: string[]
    weekTotal: number
    fullYear: PeriodCost | null
    backfill: PeriodCost | null
  }
  stocks: {
    dataset: string
    range: DatasetRange | null
    accessError?: string
    symbols: SymbolCost[]
    availableSymbols: string[]
    weekTotal: number
  }
}

function errorText(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}

export function classifyCostError(message: string): CheckStatus {
  const lower = message.toLowerCase()
  return lower.includes('not found') || lower.includes('invalid') ? 'not-found' : 'error'
}

async function periodCost(
  client: CostClient,
  query: RangeQuery,
  fallback: number | null
): Promise<PeriodCost> {
  try {
    return { start: query.start, end: query.end, cost: await client.getCost(query), estimated: false }
  } catch (error) {
    return {
      start: query.start,
      end: query.end,
      cost: fallback,
      estimated: fallback !== null,
      error: errorText(error),
    }
  }
}

/**
 * Checks dataset access and prices the seasonality universe without pulling
 * any data: 7-day cost per root, previous calendar year, 5-year backfill, and
 * a sample of stocks.
 */
export async function runDatabentoCostReport(
  client: CostClient,
  universe: SeasonalityUniverse,
  now: Date = new Date()
): Promise<CostReport> {
  const window = { start: dateKeyUtc(shiftUtcDays(now, -7)), end: dateKeyUtc(now) }
  const report: CostReport = {
    window,
    futures: {
      dataset: universe.futuresDataset,
      range: null,
      roots: [],
      availableRoots: [],
      weekTotal: 0,
      fullYear: null,
      backfill: null,
    },
    stocks: {
      dataset: universe.stocksDataset,
      range: null,
      symbols: [],
      availableSymbols: [],
      weekTotal: 0,
    },
  }

  try {
    report.futures.range = await client.getDatasetRange(universe.futuresDataset)
  } catch (error) {
    // Nothing else is meaningful without futures access
    report.futures.accessError = errorText(error)
    return report
  }

  for (const { root, name } of universe.futuresRoots) {
    try {
      const cost = await client.getCost({
        dataset: universe.futuresDataset,
        symbols: [parentSymbol(root)],
        stypeIn: 'parent',
        schema: universe.schema,
        ...window,
      })
      report.futures.roots.push({ symbol: root, name, status: 'ok', cost })
      report.futures.availableRoots.push(root)
      report.futures.weekTotal += cost
    } catch (error) {
      const message = errorText(error)
      report.futures.roots.push({ symbol: root, name, status: classifyCostError(message), cost: 0, error: message })
    }
  }

  if (report.futures.availableRoots.length > 0) {
    const lastYear = now.getUTCFullYear() - 1
    const parentQuery = (start: string, end: string): RangeQuery => ({
      dataset: universe.futuresDataset,
      symbols: report.futures.availableRoots.map(parentSymbol),
      stypeIn: 'parent',
      schema: universe.schema,
      start,
      end,
    })

    report.futures.fullYear = await periodCost(
      client,
      parentQuery(`${lastYear}-01-01`, `${lastYear}-12-31`),
      report.futures.weekTotal * WEEKS_PER_YEAR
    )
    report.futures.backfill = await periodCost(
      client,
      parentQuery(`${lastYear - BACKFILL_YEARS + 1}-01-01`, `${lastYear}-12-31`),
      null
    )
  }

  try {
    report.stocks.range = await client.getDatasetRange(universe.stocksDataset)
  } catch (error) {
    report.stocks.accessError = errorText(error)
    return report
  }

  for (const ticker of universe.costCheckStocks) {
    try {
      const cost = await client.getCost({
        dataset: universe.stocksDataset,
        symbols: [ticker],
        schema: universe.schema,
        ...window,
      })
      report.stocks.symbols.push({ symbol: ticker, name: ticker, status: 'ok', cost })
      report.stocks.availableSymbols.push(ticker)
      report.stocks.weekTotal += cost
    } catch (error) {
      const message = errorText(error)
      report.stocks.symbols.push({ symbol: ticker, name: ticker, status: classifyCostError(message), cost: 0, error: message })
    }
  }

  return report
}

function statusMark(status: CheckStatus): string {
  if (status === 'ok') return 'OK  '
  if (status === 'not-found') return 'MISS'
  return 'ERR '
}

export function formatCostReport(report: CostReport): string[] {
  const lines: string[] = []
  const { futures, stocks } = report

  lines.push('1. DATASET ACCESS')
  if (!futures.range) {
    lines.push(`  MISS ${futures.dataset}: ${(futures.accessError ?? 'unavailable').slice(0, 60)}`)
    lines.push(`Cannot proceed without ${futures.dataset} access.`)
    return lines
  }
  lines.push(`  OK   ${futures.dataset} available ${futures.range.start} to ${futures.range.end}`)

  lines.push('', `2. FUTURES ROOTS, parent symbology, ${report.window.start} to ${report.window.end}`)
  for (const root of futures.roots) {
    const detail = root.status === 'ok' ? `$${root.cost.toFixed(4)}` : (root.error ?? '').slice(0, 40)
    lines.push(`  ${statusMark(root.status)} ${root.symbol.padEnd(4)} (${root.name}): ${detail}`)
  }
  lines.push(`  7-day total for ${futures.availableRoots.length} roots: $${futures.weekTotal.toFixed(2)}`)

  const period = (label: string, cost: PeriodCost | null): void => {
    if (!cost) return
    if (cost.cost === null) {
      lines.push(`  ${label}: error ${cost.error ?? ''}`)
    } else {
      lines.push(`  ${label} (${cost.start} to ${cost.end}): ${cost.estimated ? '~' : ''}$${cost.cost.toFixed(2)}`)
    }
  }
  lines.push('', '3. FULL YEAR COST')
  period(`All ${futures.availableRoots.length} roots`, futures.fullYear)
  lines.push('', '4. BACKFILL COST')
  period(`${BACKFILL_YEARS}-year backfill`, futures.backfill)

  lines.push('', `5. STOCK SYMBOLS (${stocks.dataset})`)
  if (!stocks.range) {
    lines.push(`  MISS ${stocks.dataset} not available: ${(stocks.accessError ?? '').slice(0, 50)}`)
  } else {
    lines.push(`  OK   ${stocks.dataset} available ${stocks.range.start} to ${stocks.range.end}`)
    for (const stock of stocks.symbols) {
      const detail = stock.status === 'ok' ? `$${stock.cost.toFixed(4)}` : (stock.error ?? '').slice(0, 40)
      lines.push(`  ${statusMark(stock.status)} ${stock.symbol}: ${detail}`)
    }
    lines.push(`  7-day total for ${stocks.availableSymbols.length} stocks: $${stocks.weekTotal.toFixed(4)}`)
  }

  lines.push('', 'NO DATA WAS FETCHED - only cost estimates above')
  return lines
}
