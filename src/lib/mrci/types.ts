/** One row of mrci_contract_prices, in column order. */
export type MrciRow = [
  assetId: number,
  tradeDate: string,
  open: number | null,
  high: number | null,
  low: number | null,
  close: number | null,
  volume: number | null,
  openInterest: number | null,
  contractCode: string,
]

export interface MrciParseStats {
  hadTable: boolean
  linesScanned: number
  rowsParsed: number
  rowsUnknownRoot: number
  rowsBadFormat: number
  unknownSections: string[]
}

export interface MrciParseResult {
  rows: MrciRow[]
  stats: MrciParseStats
}

export type MrciPageKind = 'data' | 'challenge' | 'blank' | 'empty'

/** Where page HTML comes from: a browser in production, a fake in tests. */
export interface PageSource {
  load(url: string): Promise<string>
  close(): Promise<void>
}
