import fs from 'node:fs'

export interface FuturesRoot {
  /** Databento / CME root, e.g. ZM */
  root: string
  /** Symbol the seasonality schema stores it under, e.g. SM */
  dbSymbol: string
  name: string
}

export interface SeasonalityUniverse {
  futuresDataset: string
  stocksDataset: string
  schema: string
  stockPrefix: string
  futuresRoots: FuturesRoot[]
  stockSymbols: string[]
  costCheckStocks: string[]
}

const UNIVERSE_FILE = new URL('../data/seasonality-universe.json', import.meta.url)

function fail(message: string): never {
  throw new Error(`[seasonality-universe] ${message}`)
}

function requireString(source: Record<string, unknown>, key: string): string {
  const value = source[key]
  if (typeof value !== 'string' || !value) fail(`"${key}" must be a non-empty string`)
  return value
}

function requireStringList(source: Record<string, unknown>, key: string): string[] {
  const value = source[key]
  if (!Array.isArray(value)) fail(`"${key}" must be an array`)
  return value.map((entry, idx) => {
    if (typeof entry !== 'string' || !entry) fail(`"${key}[${idx}]" must be a non-empty string`)
    return entry
  })
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

export function parseUniverse(raw: unknown): SeasonalityUniverse {
  if (!isRecord(raw)) fail('catalog must be a JSON object')

  const rootsRaw = raw.futuresRoots
  if (!Array.isArray(rootsRaw)) fail('"futuresRoots" must be an array')
  const futuresRoots = rootsRaw.map((entry, idx): FuturesRoot => {
    if (!isRecord(entry)) fail(`"futuresRoots[${idx}]" must be an object`)
    return {
      root: requireString(entry, 'root'),
      dbSymbol: requireString(entry, 'dbSymbol'),
      name: requireString(entry, 'name'),
    }
  })

  const seen = new Set<string>()
  for (const { root } of futuresRoots) {
    if (seen.has(root)) fail(`duplicate futures root "${root}"`)
    seen.add(root)
  }

  return {
    futuresDataset: requireString(raw, 'futuresDataset'),
    stocksDataset: requireString(raw, 'stocksDataset'),
    schema: requireString(raw, 'schema'),
    stockPrefix: requireString(raw, 'stockPrefix'),
    futuresRoots,
    stockSymbols: requireStringList(raw, 'stockSymbols'),
    costCheckStocks: requireStringList(raw, 'costCheckStocks'),
  }
}

let cached: SeasonalityUniverse | null = null

export function loadUniverse(): SeasonalityUniverse {
  if (!cached) {
    cached = parseUniverse(JSON.parse(fs.readFileSync(UNIVERSE_FILE, 'utf8')))
  }
  return cached
}

export function rootToDbSymbol(universe: SeasonalityUniverse): Map<string, string> {
  return new Map(universe.futuresRoots.map((r) => [r.root, r.dbSymbol]))
}

export function stockDbSymbol(universe: SeasonalityUniverse, ticker: string): string {
  return `${universe.stockPrefix}${ticker}`
}

/** Databento parent symbology: all contracts (and spreads) under a root. */
export function parentSymbol(root: string): string {
  return `${root}.FUT`
}
