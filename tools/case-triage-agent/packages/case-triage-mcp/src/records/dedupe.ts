import type { StepLogger } from "../logger.js";
import { logInfo } from "../logger.js";
import type { CaseRecord } from "../types.js";

export type DuplicateRecordWarning = {
  kind: "duplicate_record";
  id: string;
  droppedRowIndex: number;
  keptRowIndex: number;
};

export type DedupeResult = {
  unique: CaseRecord[];
  duplicates: DuplicateRecordWarning[];
};

/** First occurrence of each id wins; input order is preserved. */
export function dedupeRecords(records: CaseRecord[], logger?: StepLogger): DedupeResult {
  const kept = new Map<string, CaseRecord>();
  const unique: CaseRecord[] = [];
  const duplicates: DuplicateRecordWarning[] = [];

  for (const record of records) {
    const first = kept.get(record.id);
    if (first) {
      const warning: DuplicateRecordWarning = {
        kind: "duplicate_record",
        id: record.id,
        droppedRowIndex: record.rowIndex,
        keptRowIndex: first.rowIndex
      };
      duplicates.push(warning);
      logInfo(logger, "record.duplicate", {
        id: warning.id,
        dropped_row_index: warning.droppedRowIndex,
        kept_row_index: warning.keptRowIndex
      });
      continue;
    }
    kept.set(record.id, record);
    unique.push(record);
  }

  return { unique, duplicates };
}
