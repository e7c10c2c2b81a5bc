import { dateKeyUtc } from '../dates'
import { chunk, valuesClause } from '../sql-values'
import type { Queryable } from '../types'
import type { MrciRow } from './types'

export const MRCI_SCHEMA = 'seasonality'
export const MRCI_DEFAULT_START = '2010-01-04'
const INSERT_PAGE_SIZE = 1000

export async function setSearchPath(db: Queryable): Promise<void> {
  await db.query(`SET search_path TO ${MRCI_SCHEMA}`)
}

export async function ensureMrciTables(db: Queryable): Promise<void> {
  await db.query(`
    CREATE TABLE IF NOT EXISTS mrci_contract_prices (
      id BIGSERIAL PRIMARY KEY,
      asset_id INT NOT NULL REFERENCES assets(id) ON DELETE CASCADE,
      trade_date DATE NOT NULL,
      open NUMERIC(18,6),
      high NUMERIC(18,6),
      low  NUMERIC(18,6),
      close NUMERIC(18,6),
      volume BIGINT,
      open_interest BIGINT,
      contract_code TEXT NOT NULL,
      UNIQUE (asset_id, trade_date, contract_code)
    )`)
  await db.query(`
    CREATE TABLE IF NOT EXISTS scrape_log_mrci (
      id SMALLINT PRIMARY KEY DEFAULT 1,
      last_date DATE NOT NULL,
      updated_at TIMESTAMP NOT NULL DEFAULT NOW()
    )`)
  await db.query(
    `INSERT INTO scrape_log_mrci (id, last_date)
     VALUES (1, $1)
     ON CONFLICT (id) DO NOTHING`,
    [MRCI_DEFAULT_START]
  )
  await db.query('CREATE INDEX IF NOT EXISTS idx_mrci_contract_base ON mrci_contract_prices (asset_id, trade_date)')
  await db.query(
    'CREATE INDEX IF NOT EXISTS idx_mrci_contract_oi ON mrci_contract_prices (asset_id, trade_date, open_interest DESC)'
  )
}

function toDateKey(value: unknown): string | null {
  if (value instanceof Date) {
    // pg parses DATE as local midnight
    const local = new Date(Date.UTC(value.getFullYear(), value.getMonth(), value.getDate()))
    return dateKeyUtc(local)
  }
  if (typeof value === 'string' && /^\d{4}-\d{2}-\d{2}/.test(value)) return value.slice(0, 10)
  return null
}

/**
 * Resume point for the scrape. An explicit start overwrites the stored
 * checkpoint so the next unattended run continues from there.
 */
export async function getCheckpoint(db: Queryable, explicitStart?: string): Promise<string> {
  if (explicitStart) {
    await updateCheckpoint(db, explicitStart)
    return explicitStart
  }
  const result = await db.query('SELECT last_date FROM scrape_log_mrci WHERE id = 1')
  const row = result.rows[0]
  return (row ? toDateKey(row.last_date) : null) ?? MRCI_DEFAULT_START
}

export async function updateCheckpoint(db: Queryable, dateKey: string): Promise<void> {
  await db.query('UPDATE scrape_log_mrci SET last_date = $1, updated_at = NOW() WHERE id = 1', [dateKey])
}

export async function loadAssetLookup(db: Queryable): Promise<Map<string, number>> {
  const result = await db.query('SELECT id, symbol FROM assets')
  const lookup = new Map<string, number>()
  for (const row of result.rows) {
    const id = Number(row.id)
    if (typeof row.symbol === 'string' && Number.isInteger(id)) lookup.set(row.symbol, id)
  }
  return lookup
}

/** Existing (asset, date, contract) rows are left alone; returns rows actually inserted. */
export async function insertMrciRows(db: Queryable, rows: readonly MrciRow[]): Promise<number> {
  let inserted = 0
  for (const page of chunk(rows, INSERT_PAGE_SIZE)) {
    const { sql, values } = valuesClause(page)
    const result = await db.query(
      `INSERT INTO mrci_contract_prices
         (asset_id, trade_date, open, high, low, close, volume, open_interest, contract_code)
       VALUES ${sql}
       ON CONFLICT (asset_id, trade_date, contract_code) DO NOTHING
       RETURNING 1`,
      values
    )
    inserted += result.rowCount ?? 0
  }
  return inserted
}
