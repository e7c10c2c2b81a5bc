import { dateKeyFromNanos } from './dates'
import type { DailyBar, DatabentoOhlcvRecord, DatasetRange, FetchLike } from './types'

const DATABENTO_BASE = 'https://hist.databento.com/v0'
const FIXED_PRICE_SCALE = 1_000_000_000
const DATABENTO_REQUEST_TIMEOUT_MS = 90_000
const DATABENTO_MAX_ATTEMPTS = 4

export interface DatabentoClientOptions {
  apiKey?: string
  fetchImpl?: FetchLike
  timeoutMs?: number
  maxAttempts?: number
}

export interface RangeQuery {
  dataset: string
  symbols: string[]
  /** raw_symbol when omitted */
  stypeIn?: 'raw_symbol' | 'parent' | 'continuous' | 'instrument_id'
  schema?: string
  start: string
  end: string
}

function resolveApiKey(options?: DatabentoClientOptions): string {
  const apiKey = options?.apiKey ?? process.env.DATABENTO_API_KEY
  if (!apiKey) {
    throw new Error('DATABENTO_API_KEY environment variable is not set')
  }
  return apiKey
}

function authHeader(apiKey: string): string {
  return `Basic ${Buffer.from(`${apiKey}:`).toString('base64')}`
}

function positiveInt(value: number | undefined, fallback: number, min: number): number {
  return value !== undefined && Number.isFinite(value) && value > 0
    ? Math.max(min, Math.trunc(value))
    : fallback
}

function rangeForm(query: RangeQuery, end: string): URLSearchParams {
  return new URLSearchParams({
    dataset: query.dataset,
    symbols: query.symbols.join(','),
    schema: query.schema || 'ohlcv-1d',
    stype_in: query.stypeIn || 'raw_symbol',
    start: query.start,
    end,
  })
}

function availableEndFrom(errorText: string): string | null {
  try {
    const detail: unknown = JSON.parse(errorText)
    if (typeof detail !== 'object' || detail === null || !('detail' in detail)) return null
    const inner = detail.detail
    if (typeof inner !== 'object' || inner === null || !('payload' in inner)) return null
    const payload = inner.payload
    if (typeof payload !== 'object' || payload === null || !('available_end' in payload)) return null
    return typeof payload.available_end === 'string' ? payload.available_end : null
  } catch {
    return null
  }
}

export async function fetchOhlcv(
  query: RangeQuery,
  options?: DatabentoClientOptions
): Promise<DatabentoOhlcvRecord[]> {
  const apiKey = resolveApiKey(options)
  const fetchImpl = options?.fetchImpl ?? fetch
  const requestTimeoutMs = positiveInt(options?.timeoutMs, DATABENTO_REQUEST_TIMEOUT_MS, 5_000)
  const maxAttempts = positiveInt(options?.maxAttempts, DATABENTO_MAX_ATTEMPTS, 1)

  let queryEnd = query.end
  let lastErrorText = ''
  let lastStatus = 500
  let lastStatusText = 'Unknown'

  for (let attempt = 0; attempt < maxAttempts; attempt++) {
    const body = rangeForm(query, queryEnd)
    body.set('encoding', 'json')
    body.set('map_symbols', 'true')

    const controller = new AbortController()
    const timeout = setTimeout(() => controller.abort(), requestTimeoutMs)
    let response: Response
    try {
      response = await fetchImpl(`${DATABENTO_BASE}/timeseries.get_range`, {
        method: 'POST',
        headers: {
          Authorization: authHeader(apiKey),
          'Content-Type': 'application/x-www-form-urlencoded',
        },
        body: body.toString(),
        signal: controller.signal,
      })
    } catch (error) {
      clearTimeout(timeout)
      const message = error instanceof Error ? error.message : String(error)
      if (message.toLowerCase().includes('aborted')) {
        lastStatus = 408
        lastStatusText = 'Request Timeout'
        lastErrorText = `Databento request timed out after ${requestTimeoutMs}ms`
        continue
      }
      throw error
    }
    clearTimeout(timeout)

    if (response.ok) {
      return parseNdjson(await response.text())
    }

    lastStatus = response.status
    lastStatusText = response.statusText
    lastErrorText = await response.text().catch(() => '')

    if (response.status !== 422) break

    // 422 carries the dataset's available end when the requested end is too recent
    const availableEnd = availableEndFrom(lastErrorText)
    if (!availableEnd || availableEnd === queryEnd) break
    queryEnd = availableEnd
  }

  throw new Error(
    `Databento API error ${lastStatus}: ${lastStatusText}. ${lastErrorText.slice(0, 500)}`
  )
}

export function parseNdjson(text: string): DatabentoOhlcvRecord[] {
  if (!text.trim()) return []

  const records: DatabentoOhlcvRecord[] = []
  for (const line of text.trim().split('\n')) {
    if (!line.trim()) continue
    try {
      const parsed: unknown = JSON.parse(line)
      if (isOhlcvRecord(parsed)) records.push(parsed)
    } catch {
      // Skip malformed lines
    }
  }
  return records
}

function isOhlcvRecord(value: unknown): value is DatabentoOhlcvRecord {
  if (typeof value !== 'object' || value === null) return false
  if (!('hd' in value) || typeof value.hd !== 'object' || value.hd === null) return false
  return 'ts_event' in value.hd && typeof value.hd.ts_event === 'string' && 'close' in value
}

export function toDailyBars(records: DatabentoOhlcvRecord[]): DailyBar[] {
  return records.map((r) => ({
    tradeDate: dateKeyFromNanos(r.hd.ts_event),
    symbol: r.symbol ?? '',
    instrumentId: r.hd.instrument_id,
    // Prices arrive as strings or numbers
    open: Number(r.open) / FIXED_PRICE_SCALE,
    high: Number(r.high) / FIXED_PRICE_SCALE,
    low: Number(r.low) / FIXED_PRICE_SCALE,
    close: Number(r.close) / FIXED_PRICE_SCALE,
    volume: Math.max(0, Math.trunc(Number(r.volume) || 0)),
  }))
}

async function failOnError(response: Response, label: string): Promise<void> {
  if (response.ok) return
  const errorText = await response.text().catch(() => '')
  throw new Error(
    `Databento ${label} error ${response.status}: ${response.statusText}. ${errorText.slice(0, 500)}`
  )
}

export async function getDatasetRange(
  dataset: string,
  options?: DatabentoClientOptions
): Promise<DatasetRange> {
  const apiKey = resolveApiKey(options)
  const fetchImpl = options?.fetchImpl ?? fetch

  const url = new URL(`${DATABENTO_BASE}/metadata.get_dataset_range`)
  url.searchParams.set('dataset', dataset)
  const response = await fetchImpl(url, { headers: { Authorization: authHeader(apiKey) } })
  await failOnError(response, 'metadata.get_dataset_range')

  const data: unknown = await response.json()
  if (typeof data !== 'object' || data === null) {
    throw new Error(`Databento metadata.get_dataset_range returned an unexpected body for ${dataset}`)
  }
  // Older API revisions answer with start_date/end_date
  const start = 'start' in data ? data.start : 'start_date' in data ? data.start_date : undefined
  const end = 'end' in data ? data.end : 'end_date' in data ? data.end_date : undefined
  if (typeof start !== 'string' || typeof end !== 'string') {
    throw new Error(`Databento metadata.get_dataset_range returned no range for ${dataset}`)
  }
  return { start, end }
}

export async function getCost(query: RangeQuery, options?: DatabentoClientOptions): Promise<number> {
  const apiKey = resolveApiKey(options)
  const fetchImpl = options?.fetchImpl ?? fetch

  const response = await fetchImpl(`${DATABENTO_BASE}/metadata.get_cost`, {
    method: 'POST',
    headers: {
      Authorization: authHeader(apiKey),
      'Content-Type': 'application/x-www-form-urlencoded',
    },
    body: rangeForm(query, query.end).toString(),
  })
  await failOnError(response, 'metadata.get_cost')

  const cost = Number((await response.text()).trim())
  if (!Number.isFinite(cost)) {
    throw new Error(`Databento metadata.get_cost returned a non-numeric cost for ${query.symbols.join(',')}`)
  }
  return cost
}
