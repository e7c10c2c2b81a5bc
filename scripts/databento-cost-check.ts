/**
 * Checks Databento dataset access and prices the seasonality universe.
 * No market data is fetched, only metadata and cost estimates.
 *
 *   DATABENTO_API_KEY=... npx tsx scripts/databento-cost-check.ts
 */

import { databentoCostClient, formatCostReport, runDatabentoCostReport } from '../src/lib/databento-cost-report'
import { loadUniverse } from '../src/lib/seasonality-universe'
import { isMainModule, loadDotEnvFiles } from './ingest-utils'

async function run(): Promise<number> {
  loadDotEnvFiles()
  if (!process.env.DATABENTO_API_KEY) {
    console.error('[databento-cost] DATABENTO_API_KEY is required')
    return 1
  }

  console.log('='.repeat(60))
  console.log('DATABENTO API CHECK (NO DATA FETCHED)')
  console.log('='.repeat(60))

  const report = await runDatabentoCostReport(databentoCostClient(), loadUniverse())
  for (const line of formatCostReport(report)) console.log(line)

  console.log('\nAvailable futures roots:', report.futures.availableRoots.join(', ') || '(none)')
  console.log('Available stocks:', report.stocks.availableSymbols.join(', ') || '(none)')
  console.log('\nNext steps:')
  console.log('  npm run ingest:databento -- --dry-run')
  console.log('  npm run ingest:databento -- --start 2024-01-01')
  return report.futures.range ? 0 : 1
}

if (isMainModule(import.meta.url)) {
  run()
    .then((code) => {
      process.exitCode = code
    })
    .catch((error) => {
      console.error(`[databento-cost] fatal: ${error instanceof Error ? error.message : String(error)}`)
      process.exitCode = 1
    })
}
