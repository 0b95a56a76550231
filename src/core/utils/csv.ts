/**
 * Minimal RFC 4180 CSV serialisation
 */

export type CsvValue = string | number | null | undefined;

export function escapeCsvField(value: CsvValue): string {
  if (value === null || value === undefined) return "";
  const s = String(value);
  return /[",\r\n]/.test(s) ? `"${s.replace(/"/g, '""')}"` : s;
}

/**
 * Renders a header row and one row per record, keyed by the header names.
 * Lines end with CRLF like most spreadsheet exports.
 */
export function toCsv<K extends string>(
  header: readonly K[],
  rows: ReadonlyArray<Record<K, CsvValue>>,
): string {
  const lines = [header.map(escapeCsvField).join(",")];
  for (const row of rows) {
    lines.push(header.map((k) => escapeCsvField(row[k])).join(","));
  }
  return lines.join("\r\n") + "\r\n";
}
