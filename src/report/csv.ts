export type CsvCell = string | number | null;

export function escapeCSV(value: string): string {
  if (/[",\r\n]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

/** Renders a header and rows as comma-separated text with a trailing newline. */
export function toCsv(headers: readonly string[], rows: readonly CsvCell[][]): string {
  const lines = [headers, ...rows].map((row) =>
    row.map((cell) => (cell === null ? "" : escapeCSV(String(cell)))).join(",")
  );
  return `${lines.join("\n")}\n`;
}
