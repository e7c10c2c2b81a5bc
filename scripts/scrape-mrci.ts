/**
 * Fills seasonality.mrci_contract_prices from MRCI daily OHLC pages using a
 * persistent Chromium profile (keeps cookies and cf_clearance between runs).
 *
 *   npx tsx scripts/scrape-mrci.ts                          # resume from checkpoint
 *   npx tsx scripts/scrape-mrci.ts --start 2024-01-02 --end 2024-03-29
 */

import { closePool, getPool } from '../src/lib/db'
import { dateKeyUtc } from '../src/lib/dates'
import { headlessFromEnv, openMrciBrowser, resolveProfileDir } from '../src/lib/mrci/browser'
import { runMrciScrape } from '../src/lib/mrci/scrape'
import type { PageSource } from '../src/lib/mrci/types'
import { isMainModule, loadDotEnvFiles, optionalDateArg } from './ingest-utils'

async function run(): Promise<number> {
  loadDotEnvFiles()
  const start = optionalDateArg('start')
  const end = optionalDateArg('end')

  const client = await getPool('mrci').connect()
  let source: PageSource | null = null
  try {
    source = await openMrciBrowser({ profileDir: resolveProfileDir(), headless: headlessFromEnv() })
    const summary = await runMrciScrape(
      { start: start && dateKeyUtc(start), end: end && dateKeyUtc(end) },
      { db: client, source }
    )

    console.log('\n[mrci] summary')
    console.log(JSON.stringify(summary, null, 2))
    return summary.challengedAt ? 1 : 0
  } finally {
    if (source) await source.close()
    client.release()
  }
}

if (isMainModule(import.meta.url)) {
  run()
    .then((code) => {
      process.exitCode = code
    })
    .catch((error) => {
      console.error(`[mrci] fatal: ${error instanceof Error ? error.message : String(error)}`)
      process.exitCode = 1
    })
    .finally(async () => {
      await closePool()
    })
}
