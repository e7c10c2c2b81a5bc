/**
 * Databento seasonality fetch.
 *
 * Futures: individual contracts → seasonality.historical_data (volume-based roll happens downstream)
 * Stocks:  daily bars → seasonality.continuous_prices (no roll needed)
 *
 * Usage:
 *   npx tsx scripts/ingest-databento-seasonality.ts                      # last 7 days
 *   npx tsx scripts/ingest-databento-seasonality.ts --start 2024-01-01   # backfill from date
 *   npx tsx scripts/ingest-databento-seasonality.ts --start 2024-01-01 --end 2024-06-30
 *   npx tsx scripts/ingest-databento-seasonality.ts --dry-run            # fetch, no writes
 *   npx tsx scripts/ingest-databento-seasonality.ts --futures-only | --stocks-only
 */

import { closePool, getPool } from '../src/lib/db'
import { ingestExitCode, runDatabentoIngest } from '../src/lib/databento-ingest'
import { hasFlag, isMainModule, loadDotEnvFiles, optionalDateArg } from './ingest-utils'

async function run(): Promise<number> {
  loadDotEnvFiles()
  if (!process.env.DATABENTO_API_KEY) throw new Error('DATABENTO_API_KEY is required')

  const summary = await runDatabentoIngest(
    {
      start: optionalDateArg('start'),
      end: optionalDateArg('end'),
      dryRun: hasFlag('dry-run'),
      futuresOnly: hasFlag('futures-only'),
      stocksOnly: hasFlag('stocks-only'),
    },
    { db: getPool('databento') }
  )

  console.log('\n[databento] summary')
  console.log(JSON.stringify(summary, null, 2))
  const failed = [...Object.keys(summary.futures.failed), ...Object.keys(summary.stocks.failed)]
  if (failed.length > 0) console.warn(`[databento] failed: ${failed.join(', ')}`)
  return ingestExitCode(summary)
}

if (isMainModule(import.meta.url)) {
  run()
    .then((code) => {
      process.exitCode = code
    })
    .catch((error) => {
      console.error(`[databento] fatal: ${error instanceof Error ? error.message : String(error)}`)
      process.exitCode = 1
    })
    .finally(async () => {
      await closePool()
    })
}
