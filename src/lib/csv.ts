/**
 * Guildhall — src/lib/csv.ts
 * WHAT: RFC 4180 CSV rendering for the /export attachments.
 * FLOWS:
 *  - toCsv(columns, rows) → header line + one line per row, "\n"-separated
 * DOCS:
 *  - RFC 4180 CSV: https://datatracker.ietf.org/doc/html/rfc4180
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

export type CsvValue = string | number | null | undefined;

/**
 * Quote a field when it holds a delimiter, a line break or a quote; inner quotes are doubled.
 * null and undefined become an empty field.
 */
export function escapeCsvField(value: CsvValue): string {
  if (value === null || value === undefined) {
    return "";
  }

  const str = String(value);
  if (/[",\r\n]/.test(str)) {
    return `"${str.replace(/"/g, '""')}"`;
  }
  return str;
}

/**
 * @example
 * toCsv(["id", "title"], [{ id: 1, title: "Rules, please" }]);
 * // 'id,title\n1,"Rules, please"'
 */
export function toCsv<K extends string>(columns: readonly K[], rows: ReadonlyArray<Record<K, CsvValue>>): string {
  const lines = [columns.map(escapeCsvField).join(",")];
  for (const row of rows) {
    lines.push(columns.map((column) => escapeCsvField(row[column])).join(","));
  }
  return lines.join("\n");
}
