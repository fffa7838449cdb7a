import fs from "node:fs";
import { parse } from "csv-parse/sync";
import { stringify } from "csv-stringify/sync";
import { z } from "zod";
import { writeFileAtomic } from "../io/atomic_write.js";

export type CsvRow = Record<string, string>;

const CsvRowsSchema = z.array(z.record(z.string()));

export function readCsv(filePath: string): { rows: CsvRow[]; header: string[] } {
  const raw = fs.readFileSync(filePath, "utf8");
  return parseCsv(raw);
}

export function parseCsv(raw: string): { rows: CsvRow[]; header: string[] } {
  const parsed: unknown = parse(raw, {
    bom: true,
    columns: true,
    skip_empty_lines: true,
    trim: true
  });
  const rows = CsvRowsSchema.parse(parsed);
  const header = rows.length ? Object.keys(rows[0]) : extractHeader(raw);
  return { rows, header };
}

export function formatCsv(header: string[], rows: CsvRow[]): string {
  return stringify(rows, {
    header: true,
    columns: header
  });
}

export async function writeCsv(filePath: string, header: string[], rows: CsvRow[]): Promise<void> {
  await writeFileAtomic(filePath, formatCsv(header, rows));
}

function extractHeader(raw: string): string[] {
  const firstLine = raw.replace(/^\uFEFF/, "").split(/\r?\n/)[0] || "";
  return firstLine
    .split(",")
    .map((value) => value.trim())
    .filter(Boolean);
}
