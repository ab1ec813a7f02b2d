import fs from "node:fs";
import path from "node:path";
import * as XLSX from "xlsx";
import { normalizeHeader } from "./cellParsers";

export type Cell = string | number | boolean | Date | null;

export function parseCsv(content: string): string[][] {
  const rows: string[][] = [];
  let current: string[] = [];
  let field = "";
  let inQuotes = false;

  for (let i = 0; i < content.length; i += 1) {
    const char = content[i];
    if (char === '"') {
      const next = content[i + 1];
      if (inQuotes && next === '"') {
        field += '"';
        i += 1;
      } else {
        inQuotes = !inQuotes;
      }
      continue;
    }

    if (char === "," && !inQuotes) {
      current.push(field);
      field = "";
      continue;
    }

    if ((char === "\n" || char === "\r") && !inQuotes) {
      if (char === "\r" && content[i + 1] === "\n") {
        i += 1;
      }
      current.push(field);
      field = "";
      if (current.length > 1 || current[0]?.trim()) {
        rows.push(current);
      }
      current = [];
      continue;
    }

    field += char;
  }

  if (field.length || current.length) {
    current.push(field);
    if (current.length > 1 || current[0]?.trim()) rows.push(current);
  }

  return rows;
}

function readXlsxRows(filePath: string): Cell[][] {
  const workbook = XLSX.readFile(filePath, { cellDates: true, dense: true });
  const sheetName = workbook.SheetNames[0];
  const sheet = sheetName ? workbook.Sheets[sheetName] : undefined;
  if (!sheet) {
    throw new Error(`Workbook has no sheets: ${filePath}`);
  }
  return XLSX.utils.sheet_to_json<Cell[]>(sheet, { header: 1, raw: true, defval: null });
}

/**
 * Reads a table from a .csv or .xlsx path, or treats the input as raw CSV
 * content when no such file exists.
 */
export function readTableRows(input: string): Cell[][] {
  if (fs.existsSync(input)) {
    if (path.extname(input).toLowerCase() === ".xlsx") {
      return readXlsxRows(input);
    }
    return parseCsv(fs.readFileSync(input, "utf8"));
  }
  return parseCsv(input);
}

export type HeaderMap = Map<string, number>;

export function mapHeaders<F extends string>(
  headers: Cell[],
  aliases: Record<F, string[]>
): HeaderMap {
  const normalized = headers.map((h) => normalizeHeader(String(h ?? "")));
  const indexMap: HeaderMap = new Map();
  for (const [field, candidates] of Object.entries<string[]>(aliases)) {
    for (let i = 0; i < normalized.length; i += 1) {
      if (candidates.includes(normalized[i])) {
        indexMap.set(field, i);
        break;
      }
    }
  }
  return indexMap;
}

export function ensureRequiredColumns<F extends string>(
  headerMap: HeaderMap,
  required: readonly F[],
  tableLabel: string
): void {
  const missing = required.filter((field) => !headerMap.has(field));
  if (missing.length) {
    throw new Error(`${tableLabel} missing required columns: ${missing.join(", ")}`);
  }
}

export function cellAt<F extends string>(row: Cell[], headerMap: HeaderMap, field: F): Cell {
  const index = headerMap.get(field);
  if (index === undefined) return null;
  return row[index] ?? null;
}
