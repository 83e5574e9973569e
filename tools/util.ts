/**
 * Split one CSV line into fields. Double-quoted fields may contain commas,
 * and `""` inside quotes is a literal quote.
 */
export function splitCSVLine(line: string): string[] {
  const fields: string[] = [];
  let field = "";
  let quoted = false;

  for (let i = 0; i < line.length; i++) {
    const char = line[i];
    if (quoted) {
      if (char === '"' && line[i + 1] === '"') {
        field += '"';
        i++;
      } else if (char === '"') {
        quoted = false;
      } else {
        field += char;
      }
    } else if (char === '"') {
      quoted = true;
    } else if (char === ",") {
      fields.push(field);
      field = "";
    } else {
      field += char;
    }
  }
  fields.push(field);

  return fields.map((f) => f.trim());
}

/**
 * Parse a CSV file into one record per line, keyed by the header row.
 * Missing trailing fields become empty strings.
 */
export function parseCSV(content: string): Record<string, string>[] {
  const lines = content.trim().split(/[\r\n]+/);
  const headers = splitCSVLine(lines.shift() ?? "");

  return lines.map((line) => {
    const values = splitCSVLine(line);
    return Object.fromEntries(
      headers.map((header, index) => [header, values[index] ?? ""]),
    );
  });
}

function escapeCSV(value: string) {
  return /[",\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

/**
 * Render rows as CSV with the given columns, in order.
 */
export function toCSV<T>(
  rows: readonly T[],
  columns: Record<string, (row: T) => string | number | null | undefined>,
): string {
  const header = Object.keys(columns).map(escapeCSV).join(",");
  const body = rows.map((row) =>
    Object.values(columns)
      .map((get) => escapeCSV(String(get(row) ?? "")))
      .join(","),
  );
  return [header, ...body].join("\n") + "\n";
}
