export const MONTH_CODES = ['F', 'G', 'H', 'J', 'K', 'M', 'N', 'Q', 'U', 'V', 'X', 'Z'] as const

export type MonthCode = (typeof MONTH_CODES)[number]

export interface ContractCode {
  root: string
  monthCode: MonthCode
  /** 1-12 */
  month: number
  /** As written in the code: one digit on Globex (ESH5), two in the seasonality tables (ESH25) */
  yearDigits: string
}

const CONTRACT_RE = /^([A-Z0-9]{1,3}?)([FGHJKMNQUVXZ])(\d{1,2})$/

function isMonthCode(value: string): value is MonthCode {
  return (MONTH_CODES as readonly string[]).includes(value)
}

/**
 * Front four contract codes for a root, starting at the trade date's month.
 * Years are two digits and roll past December: ES on 2024-11-15 gives
 * ESX24, ESZ24, ESF25, ESG25.
 */
export function getActiveContracts(root: string, tradeDate: Date, count = 4): string[] {
  const currentMonth = tradeDate.getUTCMonth()
  const currentYear = tradeDate.getUTCFullYear() % 100
  const contracts: string[] = []

  for (let i = 0; i < count; i++) {
    const monthIdx = (currentMonth + i) % 12
    const year = (currentYear + Math.floor((currentMonth + i) / 12)) % 100
    contracts.push(`${root}${MONTH_CODES[monthIdx]}${String(year).padStart(2, '0')}`)
  }

  return contracts
}

export function isCalendarSpread(symbol: string): boolean {
  return symbol.includes('-')
}

export function parseContractCode(code: string): ContractCode | null {
  const match = CONTRACT_RE.exec(code.trim().toUpperCase())
  if (!match) return null
  const [, root, monthCode, yearDigits] = match
  if (!root || !isMonthCode(monthCode)) return null
  return {
    root,
    monthCode,
    month: MONTH_CODES.indexOf(monthCode) + 1,
    yearDigits,
  }
}
