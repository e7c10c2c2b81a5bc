import { withTransaction } from '../db'
import { dateKeyUtc, eachUtcDay } from '../dates'
import type { Queryable } from '../types'
import { classifyMrciPage, mrciDailyUrl, mrciYearUrl, parseMrciHtml } from './parse'
import {
  ensureMrciTables,
  getCheckpoint,
  insertMrciRows,
  loadAssetLookup,
  setSearchPath,
  updateCheckpoint,
} from './store'
import type { PageSource } from './types'

const THROTTLE_MS_DEFAULT = 400

export interface MrciScrapeOptions {
  /** YYYY-MM-DD; overrides and resets the stored checkpoint */
  start?: string
  /** YYYY-MM-DD, inclusive; defaults to today (UTC) */
  end?: string
  throttleMs?: number
}

export interface MrciScrapeDeps {
  /** A single client: every day is its own transaction */
  db: Queryable
  source: PageSource
  now?: Date
  sleep?: (ms: number) => Promise<void>
  sections?: ReadonlyMap<string, string>
}

export interface MrciScrapeSummary {
  start: string
  end: string
  daysVisited: number
  daysWithRows: number
  blankDays: number
  rowsParsed: number
  rowsInserted: number
  unknownSections: string[]
  errors: Record<string, string>
  /** Set when a Cloudflare challenge stopped the run; the checkpoint stays before this day */
  challengedAt: string | null
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms))
}

function errorText(error: unknown): string {
  const message = error instanceof Error ? error.message : String(error)
  return message.slice(0, 300)
}

export async function runMrciScrape(
  options: MrciScrapeOptions,
  deps: MrciScrapeDeps
): Promise<MrciScrapeSummary> {
  const { db, source } = deps
  const pause = deps.sleep ?? sleep
  const throttleMs = options.throttleMs ?? THROTTLE_MS_DEFAULT
  const end = options.end ?? dateKeyUtc(deps.now ?? new Date())

  const { lookup, checkpoint } = await withTransaction(db, async () => {
    await setSearchPath(db)
    await ensureMrciTables(db)
    const assets = await loadAssetLookup(db)
    if (assets.size === 0) {
      throw new Error('assets table is empty: seed roots (CL, NG, ZS, ...) first')
    }
    return { lookup: assets, checkpoint: await getCheckpoint(db, options.start) }
  })

  const summary: MrciScrapeSummary = {
    start: checkpoint,
    end,
    daysVisited: 0,
    daysWithRows: 0,
    blankDays: 0,
    rowsParsed: 0,
    rowsInserted: 0,
    unknownSections: [],
    errors: {},
    challengedAt: null,
  }
  const unknownSections = new Set<string>()
  const days = eachUtcDay(new Date(`${checkpoint}T00:00:00Z`), new Date(`${end}T00:00:00Z`))
  console.log(`[mrci] scraping ${days.length} day(s): ${checkpoint} → ${end}`)

  const firstDay = days[0]
  if (firstDay) {
    // Yearly index first, so daily pages carry a Referer
    try {
      await source.load(mrciYearUrl(firstDay.getUTCFullYear()))
    } catch (error) {
      console.warn(`[mrci] warm-up failed: ${errorText(error)}`)
    }
  }

  for (const [idx, day] of days.entries()) {
    const key = dateKeyUtc(day)
    const url = mrciDailyUrl(day)
    console.log(`[mrci] fetching ${url}`)
    summary.daysVisited += 1

    try {
      const html = await source.load(url)
      const kind = classifyMrciPage(html)

      if (kind === 'challenge') {
        summary.challengedAt = key
        console.error(`[mrci]   ${key}: Cloudflare challenge, checkpoint not advanced (re-run mrci:bootstrap-session)`)
        break
      }

      if (kind === 'blank') {
        await withTransaction(db, () => updateCheckpoint(db, key))
        summary.blankDays += 1
        console.warn(`[mrci]   ${key}: no data (blank page)`)
      } else {
        const { rows, stats } = parseMrciHtml(html, day, lookup, deps.sections)
        const inserted = await withTransaction(db, async () => {
          const count = await insertMrciRows(db, rows)
          await updateCheckpoint(db, key)
          return count
        })

        summary.rowsParsed += stats.rowsParsed
        summary.rowsInserted += inserted
        if (stats.rowsParsed > 0) summary.daysWithRows += 1
        for (const name of stats.unknownSections) unknownSections.add(name)

        console.log(
          `[mrci]   ${key}: table=${stats.hadTable} lines=${stats.linesScanned} parsed=${stats.rowsParsed} ` +
            `unknown_root=${stats.rowsUnknownRoot} bad=${stats.rowsBadFormat} inserted=${inserted} ` +
            `unknown_sections=${JSON.stringify(stats.unknownSections)} preview=${JSON.stringify(rows[0] ?? null)}`
        )
        if (inserted === 0 && stats.rowsParsed === 0) console.log(`[mrci]   ${key}: no data for this day`)
      }
    } catch (error) {
      summary.errors[key] = errorText(error)
      // Advance anyway: a failing day is not retried on the next run
      await withTransaction(db, () => updateCheckpoint(db, key))
      console.warn(`[mrci]   ${key}: error ${summary.errors[key]}`)
    }

    if (idx < days.length - 1) await pause(throttleMs)
  }

  summary.unknownSections = [...unknownSections].sort()
  return summary
}
