import path from 'node:path'
import { config } from 'dotenv'

const DATE_ARG_RE = /^(\d{4})-(\d{2})-(\d{2})$/

export function loadDotEnvFiles(cwd: string = process.cwd()): void {
  // dotenv never overrides, so .env.local wins over .env and the shell wins over both
  for (const rel of ['.env.local', '.env']) {
    config({ path: path.resolve(cwd, rel) })
  }
}

export function parseArg(name: string, fallback: string, argv: string[] = process.argv.slice(2)): string {
  const prefixed = `--${name}=`
  for (const arg of argv) {
    if (arg.startsWith(prefixed)) return arg.slice(prefixed.length)
  }

  const idx = argv.indexOf(`--${name}`)
  if (idx >= 0 && argv[idx + 1] && !argv[idx + 1].startsWith('--')) return argv[idx + 1]
  return fallback
}

export function hasFlag(name: string, argv: string[] = process.argv.slice(2)): boolean {
  return argv.includes(`--${name}`) || argv.includes(`--${name}=true`) || argv.includes(`--${name}=1`)
}

export function parseDateArg(raw: string): Date {
  const match = DATE_ARG_RE.exec(raw.trim())
  if (!match) throw new Error(`Invalid date '${raw}' (expected YYYY-MM-DD)`)

  const [, y, m, d] = match
  const date = new Date(Date.UTC(Number(y), Number(m) - 1, Number(d)))
  // Date.UTC rolls 2024-02-30 into March; reject instead
  if (date.getUTCMonth() !== Number(m) - 1 || date.getUTCDate() !== Number(d)) {
    throw new Error(`Invalid date '${raw}' (expected YYYY-MM-DD)`)
  }
  return date
}

export function optionalDateArg(name: string, argv: string[] = process.argv.slice(2)): Date | undefined {
  const raw = parseArg(name, '', argv)
  return raw ? parseDateArg(raw) : undefined
}

export function isMainModule(metaUrl: string): boolean {
  return metaUrl === `file://${process.argv[1]}`
}
