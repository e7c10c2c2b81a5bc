import pg from 'pg'
import { logResolvedDbTarget, resolveDatabaseUrl, resolveSslMode } from './db-url'
import type { Queryable } from './types'

let pool: pg.Pool | null = null

export function getPool(scope = 'seasonality'): pg.Pool {
  if (!pool) {
    const target = resolveDatabaseUrl()
    logResolvedDbTarget(scope, target)
    const ssl = resolveSslMode(target) === 'require' ? { rejectUnauthorized: false } : false
    pool = new pg.Pool({ connectionString: target.url, max: 3, ssl })
    pool.on('error', (error) => {
      console.error(`[db] idle client error: ${error.message}`)
    })
  }
  return pool
}

export async function closePool(): Promise<void> {
  if (!pool) return
  const current = pool
  pool = null
  await current.end()
}

/** BEGIN/COMMIT around `fn`; `db` must be a single checked-out client, not the pool. */
export async function withTransaction<T>(db: Queryable, fn: () => Promise<T>): Promise<T> {
  await db.query('BEGIN')
  try {
    const result = await fn()
    await db.query('COMMIT')
    return result
  } catch (error) {
    await db.query('ROLLBACK')
    throw error
  }
}
