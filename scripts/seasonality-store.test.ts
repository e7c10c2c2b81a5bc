import test from 'node:test'
import assert from 'node:assert/strict'
import {
  buildHistoricalRows,
  buildStockRows,
  ensureAssetsExist,
  ensureSeasonalityTables,
  insertHistoricalData,
  insertStockPrices,
  recordIngestionRun,
} from '../src/lib/seasonality-store'
import type { DailyBar, FuturesBar } from '../src/lib/types'
import { FakeDb } from './test-fakes'

const ROOT_TO_DB = new Map([
  ['ES', 'ES'],
  ['ZM', 'SM'],
])

function futuresBar(root: string, symbol: string, close: number, tradeDate = '2024-01-02'): FuturesBar {
  return { root, symbol, tradeDate, instrumentId: 7, open: close - 1, high: close + 1, low: close - 2, close, volume: 100 }
}

function stockBar(symbol: string, close: number, tradeDate = '2024-01-02'): DailyBar {
  return { symbol, tradeDate, instrumentId: 9, open: close, high: close, low: close, close, volume: 10 }
}

test('ensureSeasonalityTables creates the schema before its tables', async () => {
  const db = new FakeDb()
  await ensureSeasonalityTables(db)

  assert.equal(db.queries[0].text, 'CREATE SCHEMA IF NOT EXISTS seasonality')
  assert.equal(db.matching(/CREATE TABLE IF NOT EXISTS seasonality\.\w+/).length, 4)
  assert.equal(db.matching(/UNIQUE \(symbol, trade_date, contract_norm\)/).length, 1)
})

test('ensureAssetsExist inserts each symbol once in a single statement', async () => {
  const db = new FakeDb()
  await ensureAssetsExist(db, ['ES', 'CL', 'ES'], 'futures')

  assert.equal(db.queries.length, 1)
  assert.match(db.queries[0].text, /VALUES \(\$1, \$2\), \(\$3, \$4\)\s+ON CONFLICT \(symbol\) DO NOTHING/)
  assert.deepEqual(db.queries[0].values, ['ES', 'ES futures', 'CL', 'CL futures'])
})

test('ensureAssetsExist skips the round trip for an empty list', async () => {
  const db = new FakeDb()
  await ensureAssetsExist(db, [], 'stock')
  assert.equal(db.queries.length, 0)
})

test('buildHistoricalRows maps roots and drops spreads, unknown roots and empty closes', () => {
  const rows = buildHistoricalRows(
    [
      futuresBar('ES', 'ESH4', 4775.75),
      futuresBar('ES', 'ESH4-ESM4', 12.5),
      futuresBar('ZM', 'ZMH4', 380.25),
      futuresBar('NQ', 'NQH4', 16800),
      futuresBar('ES', 'ESM4', 0),
      futuresBar('ES', 'ES', 4800),
    ],
    ROOT_TO_DB
  )

  assert.deepEqual(rows, [
    ['ES', '2024-01-02', 4774.75, 4776.75, 4773.75, 4775.75, 100, 'ESH4', 7],
    ['SM', '2024-01-02', 379.25, 381.25, 378.25, 380.25, 100, 'ZMH4', 7],
  ])
})

test('buildHistoricalRows keeps the later bar for a repeated contract day', () => {
  const rows = buildHistoricalRows(
    [futuresBar('ES', 'ESH4', 4700), futuresBar('ES', 'ESM4', 4750), futuresBar('ES', 'esh4', 4710)],
    ROOT_TO_DB
  )

  assert.equal(rows.length, 2)
  assert.equal(rows[0][5], 4710)
  assert.equal(rows[0][7], 'esh4')
  assert.equal(rows[1][7], 'ESM4')
})

test('insertHistoricalData pages rows and sums affected counts', async () => {
  const db = new FakeDb((_text, values) => ({ rows: [], rowCount: values.length / 9 }))
  const rows = buildHistoricalRows(
    Array.from({ length: 1001 }, (_, i) =>
      futuresBar('ES', 'ESH4', 4700 + i, new Date(Date.UTC(2020, 0, 1 + i)).toISOString().slice(0, 10))
    ),
    ROOT_TO_DB
  )

  const written = await insertHistoricalData(db, rows)

  assert.equal(written, 1001)
  assert.equal(db.queries.length, 2)
  assert.equal(db.queries[1].values.length, 9)
  assert.match(db.queries[0].text, /ON CONFLICT \(symbol, trade_date, contract_norm\) DO UPDATE SET/)
})

test('insertHistoricalData does nothing for no rows', async () => {
  const db = new FakeDb()
  assert.equal(await insertHistoricalData(db, []), 0)
  assert.equal(db.queries.length, 0)
})

test('buildStockRows prefixes tickers and skips blanks', () => {
  const rows = buildStockRows(
    [stockBar('AAPL', 185.64), stockBar('', 10), stockBar('MSFT', 0), stockBar('AAPL', 186)],
    'STK'
  )
  assert.deepEqual(rows, [['2024-01-02', 'STKAAPL', 186, 186, 186, 186]])
})

test('insertStockPrices upserts on trade date and symbol', async () => {
  const db = new FakeDb(() => ({ rows: [], rowCount: 1 }))
  const written = await insertStockPrices(db, [['2024-01-02', 'STKAAPL', 1, 2, 0.5, 1.5]])

  assert.equal(written, 1)
  assert.match(db.queries[0].text, /ON CONFLICT \(trade_date, symbol\) DO UPDATE SET/)
  assert.deepEqual(db.queries[0].values, ['2024-01-02', 'STKAAPL', 1, 2, 0.5, 1.5])
})

test('recordIngestionRun stores details as JSON', async () => {
  const db = new FakeDb()
  await recordIngestionRun(db, {
    job: 'databento-seasonality',
    status: 'FAILED',
    startedAt: new Date('2024-01-08T06:00:00Z'),
    rowsProcessed: 10,
    rowsInserted: 8,
    rowsFailed: 1,
    details: { failed: { ES: 'boom' } },
  })

  assert.match(db.queries[0].text, /VALUES \(\$1, \$2, \$3::timestamptz, \$4, \$5, \$6, \$7::jsonb\)$/)
  assert.deepEqual(db.queries[0].values, [
    'databento-seasonality',
    'FAILED',
    '2024-01-08T06:00:00.000Z',
    10,
    8,
    1,
    '{"failed":{"ES":"boom"}}',
  ])
})
