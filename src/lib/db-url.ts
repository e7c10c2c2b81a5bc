type DbSource = 'LOCAL_DATABASE_URL' | 'DATABASE_URL'
export type SslMode = 'require' | 'disable'

export interface ResolvedDbTarget {
  source: DbSource
  url: string
  protocol: string
  host: string
}

const LOCAL_HOSTS = new Set(['localhost', '127.0.0.1', '::1', '[::1]'])

const loggedTargets = new Set<string>()

function parseTarget(url: string): { protocol: string; host: string } {
  try {
    const parsed = new URL(url)
    return {
      protocol: parsed.protocol.replace(/:$/, ''),
      host: parsed.host || 'unknown',
    }
  } catch {
    return { protocol: 'unknown', host: 'unknown' }
  }
}

function buildTarget(source: DbSource, url: string): ResolvedDbTarget {
  return { source, url, ...parseTarget(url) }
}

export function resolveDatabaseUrl(): ResolvedDbTarget {
  const isProd = process.env.NODE_ENV === 'production'
  const forceLocal = process.env.PG_LOCAL === '1'
  const local = process.env.LOCAL_DATABASE_URL
  const database = process.env.DATABASE_URL

  if (forceLocal) {
    if (local) return buildTarget('LOCAL_DATABASE_URL', local)
    throw new Error('Database URL resolution failed: PG_LOCAL=1 requires LOCAL_DATABASE_URL.')
  }

  if (isProd) {
    if (database) return buildTarget('DATABASE_URL', database)
    throw new Error('Database URL resolution failed in production: DATABASE_URL is required.')
  }

  if (local) return buildTarget('LOCAL_DATABASE_URL', local)
  if (database) return buildTarget('DATABASE_URL', database)
  throw new Error(
    'Database URL resolution failed in non-production: set LOCAL_DATABASE_URL (or DATABASE_URL).'
  )
}

export function resolveSslMode(target: ResolvedDbTarget): SslMode {
  const explicit = process.env.PG_SSL?.trim().toLowerCase()
  if (explicit === 'require' || explicit === 'disable') return explicit
  if (explicit) {
    throw new Error(`PG_SSL must be 'require' or 'disable', got '${process.env.PG_SSL}'`)
  }

  const hostname = target.host.replace(/:\d+$/, '')
  return LOCAL_HOSTS.has(hostname) ? 'disable' : 'require'
}

export function describeDbTarget(target: ResolvedDbTarget): string {
  return JSON.stringify({
    source: target.source,
    protocol: target.protocol,
    host: target.host,
    mode: process.env.NODE_ENV || 'unknown',
  })
}

export function logResolvedDbTarget(scope: string, target: ResolvedDbTarget): void {
  const key = `${scope}:${target.source}:${target.host}`
  if (loggedTargets.has(key)) return
  loggedTargets.add(key)
  console.info(`[db-target] ${scope} ${describeDbTarget(target)}`)
}
