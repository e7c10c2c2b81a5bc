import test from 'node:test'
import assert from 'node:assert/strict'
import { runMrciScrape } from '../src/lib/mrci/scrape'
import type { PageSource } from '../src/lib/mrci/types'
import { FakeDb, rows } from './test-fakes'

const SECTIONS = new Map([['Soybean Meal(CBOT)', 'SM']])

const DATA_PAGE = `<html><body><table class="strat">
  <tr><th class="note1">Soybean Meal(CBOT)</th></tr>
  <tr><td>Mar24</td><td>240102</td><td>380.50</td><td>385.00</td><td>379.25</td><td>384.75</td><td>+4.25</td><td>12,345</td><td>67,890</td></tr>
</table></body></html>`
const CHALLENGE_PAGE = '<html><head><title>Just a moment...</title></head><body></body></html>'
const EMPTY_PAGE = '<html><body>No report for this date</body></html>'

class FakeSource implements PageSource {
  readonly loads: string[] = []

  constructor(private readonly pages: Record<string, string | Error>) {}

  async load(url: string): Promise<string> {
    this.loads.push(url)
    const page = this.pages[url]
    if (page === undefined) throw new Error(`no page for ${url}`)
    if (page instanceof Error) throw page
    return page
  }

  async close(): Promise<void> {}
}

function scrapeDb(options: { assets?: boolean; lastDate?: string } = {}): FakeDb {
  return new FakeDb((text) => {
    if (text.startsWith('SELECT id, symbol FROM assets')) {
      return options.assets === false ? rows() : rows({ id: 11, symbol: 'SM' })
    }
    if (text.startsWith('SELECT last_date')) return rows({ last_date: options.lastDate ?? '2024-01-01' })
    if (text.includes('INSERT INTO mrci_contract_prices')) return { rows: [], rowCount: 1 }
    return undefined
  })
}

function checkpoints(db: FakeDb): unknown[] {
  return db.matching(/^UPDATE scrape_log_mrci/).map((q) => q.values[0])
}

test('each day advances the checkpoint, including blank and failing days', async () => {
  const db = scrapeDb()
  const source = new FakeSource({
    'https://www.mrci.com/ohlc/2024/': '<html></html>',
    'https://www.mrci.com/ohlc/2024/240101.php': '',
    'https://www.mrci.com/ohlc/2024/240102.php': DATA_PAGE,
    'https://www.mrci.com/ohlc/2024/240103.php': new Error('net::ERR_TIMED_OUT'),
  })
  const pauses: number[] = []

  const summary = await runMrciScrape(
    { start: '2024-01-01', end: '2024-01-03', throttleMs: 5 },
    { db, source, sections: SECTIONS, sleep: async (ms) => void pauses.push(ms) }
  )

  assert.deepEqual(summary, {
    start: '2024-01-01',
    end: '2024-01-03',
    daysVisited: 3,
    daysWithRows: 1,
    blankDays: 1,
    rowsParsed: 1,
    rowsInserted: 1,
    unknownSections: [],
    errors: { '2024-01-03': 'net::ERR_TIMED_OUT' },
    challengedAt: null,
  })
  assert.deepEqual(source.loads, [
    'https://www.mrci.com/ohlc/2024/',
    'https://www.mrci.com/ohlc/2024/240101.php',
    'https://www.mrci.com/ohlc/2024/240102.php',
    'https://www.mrci.com/ohlc/2024/240103.php',
  ])
  assert.deepEqual(checkpoints(db), ['2024-01-01', '2024-01-01', '2024-01-02', '2024-01-03'])
  assert.deepEqual(pauses, [5, 5])

  const [insert] = db.matching(/INSERT INTO mrci_contract_prices/)
  assert.deepEqual(insert.values, [11, '2024-01-02', 380.5, 385, 379.25, 384.75, 12345, 67890, 'Mar24'])
})

test('setup runs in one transaction on the same client', async () => {
  const db = scrapeDb()
  const source = new FakeSource({ 'https://www.mrci.com/ohlc/2024/': '', 'https://www.mrci.com/ohlc/2024/240101.php': '' })

  await runMrciScrape({ start: '2024-01-01', end: '2024-01-01' }, { db, source, sections: SECTIONS })

  assert.deepEqual(db.verbs().slice(0, 10), [
    'BEGIN',
    'SET',
    'CREATE',
    'CREATE',
    'INSERT',
    'CREATE',
    'CREATE',
    'SELECT',
    'UPDATE',
    'COMMIT',
  ])
})

test('a Cloudflare challenge stops the run without advancing past it', async () => {
  const db = scrapeDb()
  const source = new FakeSource({
    'https://www.mrci.com/ohlc/2024/': '<html></html>',
    'https://www.mrci.com/ohlc/2024/240101.php': DATA_PAGE,
    'https://www.mrci.com/ohlc/2024/240102.php': CHALLENGE_PAGE,
    'https://www.mrci.com/ohlc/2024/240103.php': DATA_PAGE,
  })
  const pauses: number[] = []

  const summary = await runMrciScrape(
    { start: '2024-01-01', end: '2024-01-03' },
    { db, source, sections: SECTIONS, sleep: async (ms) => void pauses.push(ms) }
  )

  assert.equal(summary.challengedAt, '2024-01-02')
  assert.equal(summary.daysVisited, 2)
  assert.equal(source.loads.length, 3)
  assert.deepEqual(checkpoints(db), ['2024-01-01', '2024-01-01'])
  assert.deepEqual(pauses, [400])
})

test('resumes from the stored checkpoint up to today', async () => {
  const db = scrapeDb({ lastDate: '2024-01-02' })
  const source = new FakeSource({
    'https://www.mrci.com/ohlc/2024/': new Error('warm-up timeout'),
    'https://www.mrci.com/ohlc/2024/240102.php': EMPTY_PAGE,
  })

  const summary = await runMrciScrape(
    {},
    { db, source, sections: SECTIONS, now: new Date('2024-01-02T22:00:00Z'), sleep: async () => {} }
  )

  assert.equal(summary.start, '2024-01-02')
  assert.equal(summary.end, '2024-01-02')
  assert.equal(summary.daysVisited, 1)
  assert.equal(summary.daysWithRows, 0)
  assert.equal(summary.blankDays, 0)
  assert.deepEqual(summary.errors, {})
  assert.equal(db.matching(/INSERT INTO mrci_contract_prices/).length, 0)
  assert.deepEqual(checkpoints(db), ['2024-01-02'])
})

test('an empty assets table aborts before any page is loaded', async () => {
  const db = scrapeDb({ assets: false })
  const source = new FakeSource({})

  await assert.rejects(
    runMrciScrape({ end: '2024-01-03' }, { db, source, sections: SECTIONS }),
    /assets table is empty/
  )
  assert.equal(source.loads.length, 0)
  assert.equal(db.verbs().at(-1), 'ROLLBACK')
})

test('a failed insert rolls the day back and still advances the checkpoint', async () => {
  const db = new FakeDb((text) => {
    if (text.startsWith('SELECT id, symbol FROM assets')) return rows({ id: 11, symbol: 'SM' })
    if (text.includes('INSERT INTO mrci_contract_prices')) throw new Error('deadlock detected')
    return undefined
  })
  const source = new FakeSource({
    'https://www.mrci.com/ohlc/2024/': '<html></html>',
    'https://www.mrci.com/ohlc/2024/240102.php': DATA_PAGE,
  })

  const summary = await runMrciScrape(
    { start: '2024-01-02', end: '2024-01-02' },
    { db, source, sections: SECTIONS }
  )

  assert.deepEqual(summary.errors, { '2024-01-02': 'deadlock detected' })
  assert.equal(summary.rowsInserted, 0)
  assert.equal(summary.daysWithRows, 0)
  assert.deepEqual(db.verbs().slice(-6), ['BEGIN', 'INSERT', 'ROLLBACK', 'BEGIN', 'UPDATE', 'COMMIT'])
  assert.deepEqual(checkpoints(db), ['2024-01-02', '2024-01-02'])
})
