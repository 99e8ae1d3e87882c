const NEEDS_QUOTING = /[",\r\n]/;

export function escapeCsvField(value: string): string {
  return NEEDS_QUOTING.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

export function serializeCsv(header: readonly string[], rows: readonly Record<string, string>[]): string {
  const lines = [header.map(escapeCsvField).join(",")];
  for (const row of rows) {
    lines.push(header.map((column) => escapeCsvField(row[column] ?? "")).join(","));
  }
  return `${lines.join("\n")}\n`;
}

/** Parses RFC 4180 CSV with a header line into records keyed by column name. */
export function parseCsv(text: string): Record<string, string>[] {
  const records: string[][] = [];
  let field = "";
  let row: string[] = [];
  let inQuotes = false;

  for (let i = 0; i < text.length; i += 1) {
    const ch = text[i];
    if (inQuotes) {
      if (ch === '"' && text[i + 1] === '"') {
        field += '"';
        i += 1;
      } else if (ch === '"') {
        inQuotes = false;
      } else {
        field += ch;
      }
      continue;
    }
    if (ch === '"') {
      inQuotes = true;
    } else if (ch === ",") {
      row.push(field);
      field = "";
    } else if (ch === "\n" || ch === "\r") {
      if (ch === "\r" && text[i + 1] === "\n") i += 1;
      row.push(field);
      records.push(row);
      row = [];
      field = "";
    } else {
      field += ch;
    }
  }
  if (field !== "" || row.length) {
    row.push(field);
    records.push(row);
  }

  const [header, ...body] = records.filter((record) => !(record.length === 1 && record[0] === ""));
  if (!header) return [];
  return body.map((values) => {
    const record: Record<string, string> = {};
    header.forEach((column, index) => {
      record[column] = values[index] ?? "";
    });
    return record;
  });
}
