/**
 * CSV Formatting
 *
 * Minimal quoting: a field is wrapped in double quotes only when it holds
 * a comma, a double quote, a carriage return or a line feed. Every row,
 * the last included, ends with CRLF.
 *
 * @module core/utils/csv
 */

export type CsvValue = string | number;

export const CSV_LINE_TERMINATOR = '\r\n';

/**
 * Escape a value for CSV output
 */
export function escapeCsv(value: CsvValue): string {
  const text = String(value);
  if (/[",\r\n]/.test(text)) {
    return `"${text.replace(/"/g, '""')}"`;
  }
  return text;
}

/**
 * Format a header row and data rows as CSV text
 */
export function formatCsv(
  header: readonly string[],
  rows: Iterable<readonly CsvValue[]>
): string {
  const lines = [header.map(escapeCsv).join(',')];
  for (const row of rows) {
    lines.push(row.map(escapeCsv).join(','));
  }
  return lines.map((line) => `${line}${CSV_LINE_TERMINATOR}`).join('');
}

/**
 * Format a ratio as a percentage with two decimals (0.8 -> "80.00%")
 *
 * An exact tie rounds to the even digit (1/800 -> "0.12%"); `toFixed`
 * alone would round it up.
 */
export function formatPercent(ratio: number): string {
  const percent = ratio * 100;
  // percent * 100 ends in exactly .5 only when percent * 8 is an odd integer
  const eighths = percent * 8;
  if (Number.isInteger(eighths) && Math.abs(eighths % 2) === 1) {
    const lower = Math.floor(percent * 100);
    const even = lower % 2 === 0 ? lower : lower + 1;
    return `${(even / 100).toFixed(2)}%`;
  }
  return `${percent.toFixed(2)}%`;
}
