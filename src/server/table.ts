/**
 * Lays out a plain text table:
 *
 * ```
 * #  | ID   | Title
 * ---+------+------
 * 1  | B001 | 1984
 * ```
 */
export function formatTable(headers: string[], rows: string[][]): string[] {
  const widths = headers.map((h, i) => Math.max(h.length, ...rows.map((row) => (row[i] || '').length)))
  const formatRow = (values: string[]) => values.map((value, i) => (value || '').padEnd(widths[i])).join(' | ')

  return [formatRow(headers), widths.map((w) => '-'.repeat(w)).join('-+-'), ...rows.map(formatRow)]
}
