/**
 * Minimal CSV reading for PUG REST tables (one record per line).
 */

export interface CsvTable {
  header: string[];
  rows: string[][];
}

export function splitCsvLine(line: string): string[] {
  const out: string[] = [];
  let current = '';
  let inQuotes = false;
  for (let i = 0; i < line.length; i += 1) {
    const ch = line[i];
    if (ch === '"') {
      // "" inside a quoted field is a literal quote
      if (inQuotes && line[i + 1] === '"') {
        current += '"';
        i += 1;
        continue;
      }
      inQuotes = !inQuotes;
      continue;
    }
    if (ch === ',' && !inQuotes) {
      out.push(current.trim());
      current = '';
      continue;
    }
    current += ch;
  }
  out.push(current.trim());
  return out;
}

/**
 * Split CSV text into a header row and data rows. Blank lines are skipped;
 * a header without data rows is a valid, empty table.
 */
export function parseCsvTable(content: string): CsvTable {
  const lines = content
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0);

  const firstLine = lines[0];
  if (firstLine === undefined) {
    return { header: [], rows: [] };
  }
  const header = splitCsvLine(firstLine);
  const rows: string[][] = [];
  for (let i = 1; i < lines.length; i += 1) {
    const line = lines[i];
    if (line === undefined) continue;
    rows.push(splitCsvLine(line));
  }
  return { header, rows };
}
