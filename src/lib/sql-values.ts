/**
 * Expands rows into a multi-row VALUES list: `($1, $2), ($3, $4)`.
 * `casts` optionally appends a cast per column (e.g. `::jsonb`).
 */
export function valuesClause(
  rows: ReadonlyArray<readonly unknown[]>,
  casts: ReadonlyArray<string | null> = []
): { sql: string; values: unknown[] } {
  const values: unknown[] = []
  const placeholders: string[] = []

  for (const row of rows) {
    const cells = row.map((cell, col) => {
      values.push(cell)
      const cast = casts[col]
      return `$${values.length}${cast ? `::${cast}` : ''}`
    })
    placeholders.push(`(${cells.join(', ')})`)
  }

  return { sql: placeholders.join(', '), values }
}

export function chunk<T>(items: readonly T[], size: number): T[][] {
  if (size <= 0) throw new Error(`chunk size must be positive, got ${size}`)
  const out: T[][] = []
  for (let i = 0; i < items.length; i += size) {
    out.push(items.slice(i, i + size))
  }
  return out
}
