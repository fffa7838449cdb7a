import fs from "node:fs";
import { ConfigurationError } from "../errors.js";
import type { StepLogger } from "../logger.js";
import { logInfo } from "../logger.js";
import type { CaseRecord, CellValue } from "../types.js";
import { readCsv } from "./csv_io.js";
import type { CsvRow } from "./csv_io.js";

export type RecordColumns = {
  idColumn?: string;
  narrativeColumn?: string;
};

const ID_CANDIDATES = ["nuc", "caseid", "id", "folio", "numerounicocaso"];
const NARRATIVE_CANDIDATES = ["hechos", "narrativa", "narracion", "crimenarration", "narrative"];

export function normalizeColumnKey(name: string): string {
  return name
    .normalize("NFD")
    .replace(/[\u0300-\u036f]/g, "")
    .toLowerCase()
    .replace(/[^a-z0-9]/g, "");
}

export function detectColumn(header: string[], candidates: string[], label: string): string {
  const byKey = new Map<string, string>();
  for (const column of header) {
    const key = normalizeColumnKey(column);
    if (key && !byKey.has(key)) {
      byKey.set(key, column);
    }
  }
  for (const candidate of candidates) {
    const found = byKey.get(normalizeColumnKey(candidate));
    if (found) {
      return found;
    }
  }
  throw new ConfigurationError(`${label} column not found. Tried: ${candidates.join(", ")}. Headers: ${header.join(", ")}`);
}

export function loadRecords(csvPath: string, columns: RecordColumns = {}, logger?: StepLogger): CaseRecord[] {
  if (!fs.existsSync(csvPath)) {
    throw new ConfigurationError(`Records file not found: ${csvPath}`);
  }
  const { rows, header } = readCsv(csvPath);
  return toCaseRecords(rows, header, columns, logger);
}

export function toCaseRecords(
  rows: CsvRow[],
  header: string[],
  columns: RecordColumns = {},
  logger?: StepLogger
): CaseRecord[] {
  const idColumn = detectColumn(header, columns.idColumn ? [columns.idColumn] : ID_CANDIDATES, "Record id");
  const narrativeColumn = detectColumn(
    header,
    columns.narrativeColumn ? [columns.narrativeColumn] : NARRATIVE_CANDIDATES,
    "Narrative"
  );

  return rows.map((row, rowIndex) => {
    const fields: Record<string, CellValue> = {};
    for (const column of header) {
      const value = (row[column] ?? "").trim();
      fields[column] = value ? value : null;
    }
    let id = fields[idColumn] ?? "";
    if (!id) {
      id = `row_${rowIndex + 1}`;
      logInfo(logger, "record.missing_id", { row_index: rowIndex, fallback_id: id });
    }
    return {
      id,
      narrative: fields[narrativeColumn] ?? "",
      fields,
      rowIndex
    };
  });
}
