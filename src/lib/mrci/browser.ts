import fs from 'node:fs'
import path from 'node:path'
import { chromium, type BrowserContext } from 'playwright'
import type { PageSource } from './types'

export const DEFAULT_PROFILE_DIR = './mrci_profile'
export const BROWSER_USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/138.0.0.0 Safari/537.36'
const DEFAULT_TIMEOUT_MS = 20_000

export interface MrciBrowserOptions {
  /** Cookies and cf_clearance persist here between runs */
  profileDir?: string
  headless?: boolean
  timeoutMs?: number
}

export function resolveProfileDir(raw = process.env.MRCI_PROFILE_DIR): string {
  return path.resolve(process.cwd(), raw || DEFAULT_PROFILE_DIR)
}

export function ensureProfileDir(dir: string): string {
  fs.mkdirSync(dir, { recursive: true })
  return dir
}

export function headlessFromEnv(raw = process.env.MRCI_HEADLESS): boolean {
  return raw?.trim().toLowerCase() !== 'false'
}

export async function launchMrciContext(options: MrciBrowserOptions = {}): Promise<BrowserContext> {
  const profileDir = ensureProfileDir(options.profileDir ?? resolveProfileDir())
  const context = await chromium.launchPersistentContext(profileDir, {
    headless: options.headless ?? true,
    viewport: { width: 1280, height: 900 },
    userAgent: BROWSER_USER_AGENT,
    args: ['--disable-blink-features=AutomationControlled'],
  })
  context.setDefaultTimeout(options.timeoutMs ?? DEFAULT_TIMEOUT_MS)
  return context
}

/** One reused tab on a persistent Chromium profile. */
export async function openMrciBrowser(options: MrciBrowserOptions = {}): Promise<PageSource> {
  const context = await launchMrciContext(options)
  const page = context.pages()[0] ?? (await context.newPage())

  return {
    async load(url: string): Promise<string> {
      await page.goto(url, { waitUntil: 'domcontentloaded' })
      return page.content()
    },
    async close(): Promise<void> {
      await context.close()
    },
  }
}
