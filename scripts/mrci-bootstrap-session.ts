/**
 * One-time Cloudflare pass for MRCI. Opens a headed browser on the persistent
 * profile; wait for the price table to render, then press Enter so the session
 * (cf_clearance) is saved for headless runs.
 *
 *   npx tsx scripts/mrci-bootstrap-session.ts
 */

import { createInterface } from 'node:readline/promises'
import { launchMrciContext, resolveProfileDir } from '../src/lib/mrci/browser'
import { classifyMrciPage } from '../src/lib/mrci/parse'
import { isMainModule, loadDotEnvFiles } from './ingest-utils'

const CHECK_URL = 'https://www.mrci.com/ohlc/2024/241220.php'

async function run(): Promise<number> {
  loadDotEnvFiles()
  console.log('[mrci-session] opening browser to pass the Cloudflare challenge...')
  console.log('[mrci-session] wait until commodity prices are visible, then come back here.')

  const context = await launchMrciContext({ profileDir: resolveProfileDir(), headless: false })
  const prompt = createInterface({ input: process.stdin, output: process.stdout })
  try {
    const page = await context.newPage()
    console.log(`[mrci-session] navigating to ${CHECK_URL}`)
    await page.goto(CHECK_URL, { waitUntil: 'domcontentloaded' })

    await prompt.question("\n>>> Press ENTER once the page shows commodity data (not 'Just a moment...') <<<\n")

    const kind = classifyMrciPage(await page.content())
    if (kind === 'challenge') {
      console.error('[mrci-session] still on the Cloudflare page; wait longer or solve the captcha and retry.')
      return 1
    }
    if (kind === 'data') {
      console.log('[mrci-session] Cloudflare passed and cookies saved. Headless scrapes can run now.')
      return 0
    }
    console.warn('[mrci-session] page loaded but no data table found; check the browser.')
    return 1
  } finally {
    prompt.close()
    await context.close()
  }
}

if (isMainModule(import.meta.url)) {
  run()
    .then((code) => {
      process.exitCode = code
    })
    .catch((error) => {
      console.error(`[mrci-session] fatal: ${error instanceof Error ? error.message : String(error)}`)
      process.exitCode = 1
    })
}
