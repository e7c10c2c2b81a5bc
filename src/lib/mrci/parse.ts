import fs from 'node:fs'
import * as cheerio from 'cheerio'
import { dateKeyUtc, yymmddUtc } from '../dates'
import type { MrciPageKind, MrciParseResult, MrciParseStats, MrciRow } from './types'

const MRCI_BASE = 'https://www.mrci.com/ohlc'
const SECTIONS_FILE = new URL('../../data/mrci-sections.json', import.meta.url)
const MIN_DATA_CELLS = 8

let sectionRoots: ReadonlyMap<string, string> | null = null

/** MRCI section heading (e.g. "Soybean Meal(CBOT)") → root symbol in assets. */
export function loadSectionRoots(): ReadonlyMap<string, string> {
  if (!sectionRoots) {
    const raw: unknown = JSON.parse(fs.readFileSync(SECTIONS_FILE, 'utf8'))
    if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
      throw new Error('[mrci] mrci-sections.json must map section names to roots')
    }
    const entries = Object.entries(raw).map(([name, root]): [string, string] => {
      if (typeof root !== 'string' || !root) throw new Error(`[mrci] section "${name}" has no root`)
      return [name, root]
    })
    sectionRoots = new Map(entries)
  }
  return sectionRoots
}

export function mrciYearUrl(year: number): string {
  return `${MRCI_BASE}/${year}/`
}

export function mrciDailyUrl(date: Date): string {
  return `${MRCI_BASE}/${date.getUTCFullYear()}/${yymmddUtc(date)}.php`
}

export function classifyMrciPage(html: string): MrciPageKind {
  if (!html.toLowerCase().includes('<html')) return 'blank'
  if (html.includes('Just a moment')) return 'challenge'
  if (html.includes('class="strat"')) return 'data'
  return 'empty'
}

function normalizeWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim()
}

function cleanCell(raw: string): string | null {
  const value = raw.replace(/,/g, '').trim()
  return value === '' || value === '-' || value === '&nbsp;' ? null : value
}

function toFloat(raw: string): number | null {
  const value = cleanCell(raw)
  if (value === null) return null
  const parsed = Number(value)
  if (!Number.isFinite(parsed)) throw new Error(`not a number: ${value}`)
  return parsed
}

function toInt(raw: string): number | null {
  const value = cleanCell(raw)
  if (value === null) return null
  const parsed = Number(value)
  if (!Number.isInteger(parsed)) throw new Error(`not an integer: ${value}`)
  return parsed
}

/** YYMMDD → YYYY-MM-DD; 70-99 are 19xx. Null when not a real date. */
export function parseYymmdd(raw: string): string | null {
  const value = raw.trim()
  if (!/^\d{6}$/.test(value)) return null

  const yy = Number(value.slice(0, 2))
  const year = yy >= 70 ? 1900 + yy : 2000 + yy
  const month = Number(value.slice(2, 4))
  const day = Number(value.slice(4, 6))
  const date = new Date(Date.UTC(year, month - 1, day))
  if (date.getUTCFullYear() !== year || date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) {
    return null
  }
  return dateKeyUtc(date)
}

/**
 * Parses one MRCI daily OHLC page. Rows under an unmapped section heading, or
 * whose root has no asset id, are counted but not returned.
 */
export function parseMrciHtml(
  html: string,
  pageDate: Date,
  assetLookup: ReadonlyMap<string, number>,
  sections: ReadonlyMap<string, string> = loadSectionRoots()
): MrciParseResult {
  const $ = cheerio.load(html)
  const table = $('table.strat').first()

  const rows: MrciRow[] = []
  const unknownSections = new Set<string>()
  const stats: MrciParseStats = {
    hadTable: table.length > 0,
    linesScanned: 0,
    rowsParsed: 0,
    rowsUnknownRoot: 0,
    rowsBadFormat: 0,
    unknownSections: [],
  }

  if (!stats.hadTable) return { rows, stats }

  const pageDateKey = dateKeyUtc(pageDate)
  let currentRoot: string | null = null

  for (const tr of table.find('tr').toArray()) {
    const heading = $(tr).find('th.note1').first()
    if (heading.length > 0) {
      const name = normalizeWhitespace(heading.text())
      currentRoot = sections.get(name) ?? null
      if (!currentRoot) unknownSections.add(name)
      continue
    }

    const cells = $(tr)
      .find('td')
      .toArray()
      .map((td) => $(td).text())
    if (cells.length === 0) continue
    if (cells[0].trim().toLowerCase().startsWith('total volume')) continue
    if (cells.length < MIN_DATA_CELLS) continue

    stats.linesScanned += 1

    const assetId = currentRoot ? assetLookup.get(currentRoot) : undefined
    if (assetId === undefined) {
      stats.rowsUnknownRoot += 1
      continue
    }

    try {
      // month | date | open | high | low | close | change | volume | open interest
      const contractCode = cells[0].trim()
      const tradeDate = parseYymmdd(cells[1]) ?? pageDateKey
      rows.push([
        assetId,
        tradeDate,
        toFloat(cells[2]),
        toFloat(cells[3]),
        toFloat(cells[4]),
        toFloat(cells[5]),
        cells.length > 7 ? toInt(cells[7]) : null,
        cells.length > 8 ? toInt(cells[8]) : null,
        contractCode,
      ])
      stats.rowsParsed += 1
    } catch {
      stats.rowsBadFormat += 1
    }
  }

  stats.unknownSections = [...unknownSections].sort()
  return { rows, stats }
}
