import test from 'node:test'
import assert from 'node:assert/strict'
import { withTransaction } from '../src/lib/db'
import {
  ensureMrciTables,
  getCheckpoint,
  insertMrciRows,
  loadAssetLookup,
  MRCI_DEFAULT_START,
  setSearchPath,
} from '../src/lib/mrci/store'
import type { MrciRow } from '../src/lib/mrci/types'
import { FakeDb, rows } from './test-fakes'

function checkpointDb(lastDate: unknown): FakeDb {
  return new FakeDb((text) => (text.startsWith('SELECT last_date') ? rows({ last_date: lastDate }) : undefined))
}

test('setSearchPath points the session at the seasonality schema', async () => {
  const db = new FakeDb()
  await setSearchPath(db)
  assert.deepEqual(db.queries, [{ text: 'SET search_path TO seasonality', values: [] }])
})

test('ensureMrciTables seeds the checkpoint row once', async () => {
  const db = new FakeDb()
  await ensureMrciTables(db)

  assert.equal(db.queries.length, 5)
  const [seed] = db.matching(/INSERT INTO scrape_log_mrci/)
  assert.match(seed.text, /ON CONFLICT \(id\) DO NOTHING/)
  assert.deepEqual(seed.values, [MRCI_DEFAULT_START])
  assert.equal(db.matching(/CREATE INDEX IF NOT EXISTS/).length, 2)
})

test('an explicit start overwrites the stored checkpoint', async () => {
  const db = checkpointDb('2020-01-01')
  assert.equal(await getCheckpoint(db, '2015-03-02'), '2015-03-02')
  assert.deepEqual(db.verbs(), ['UPDATE'])
  assert.deepEqual(db.queries[0].values, ['2015-03-02'])
})

test('getCheckpoint reads DATE values pg returns as local midnight', async () => {
  assert.equal(await getCheckpoint(checkpointDb(new Date(2023, 4, 17))), '2023-05-17')
})

test('getCheckpoint reads string dates', async () => {
  assert.equal(await getCheckpoint(checkpointDb('2023-05-17')), '2023-05-17')
})

test('getCheckpoint falls back to the default start', async () => {
  assert.equal(await getCheckpoint(new FakeDb()), MRCI_DEFAULT_START)
  assert.equal(await getCheckpoint(checkpointDb(null)), MRCI_DEFAULT_START)
})

test('loadAssetLookup keeps rows with an integer id and a symbol', async () => {
  const db = new FakeDb(() =>
    rows({ id: 1, symbol: 'SM' }, { id: '2', symbol: 'C' }, { id: 'x', symbol: 'W' }, { id: 4, symbol: null })
  )
  const lookup = await loadAssetLookup(db)
  assert.deepEqual([...lookup], [
    ['SM', 1],
    ['C', 2],
  ])
})

test('insertMrciRows leaves existing rows alone and counts new ones', async () => {
  const db = new FakeDb(() => ({ rows: [{ '?column?': 1 }], rowCount: 1 }))
  const batch: MrciRow[] = [
    [11, '2024-01-02', 380.5, 385, 379.25, 384.75, 12345, 67890, 'Jan24'],
    [11, '2024-01-02', null, 390, 388, 389.5, 1000, null, 'Mar24'],
  ]

  assert.equal(await insertMrciRows(db, batch), 1)
  assert.match(db.queries[0].text, /ON CONFLICT \(asset_id, trade_date, contract_code\) DO NOTHING/)
  assert.equal(db.queries[0].values.length, 18)
  assert.deepEqual(db.queries[0].values.slice(9), [11, '2024-01-02', null, 390, 388, 389.5, 1000, null, 'Mar24'])
})

test('withTransaction commits on success', async () => {
  const db = new FakeDb()
  const result = await withTransaction(db, async () => {
    await db.query('UPDATE scrape_log_mrci SET last_date = $1', ['2024-01-02'])
    return 'ok'
  })
  assert.equal(result, 'ok')
  assert.deepEqual(db.verbs(), ['BEGIN', 'UPDATE', 'COMMIT'])
})

test('withTransaction rolls back and rethrows', async () => {
  const db = new FakeDb()
  await assert.rejects(
    withTransaction(db, async () => {
      throw new Error('insert failed')
    }),
    /insert failed/
  )
  assert.deepEqual(db.verbs(), ['BEGIN', 'ROLLBACK'])
})
