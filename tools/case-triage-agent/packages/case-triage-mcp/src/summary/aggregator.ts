import { AggregationInputError } from "../errors.js";
import { artifactKey } from "../io/file_manifest.js";
import type { ResponseStore, StoreEntry } from "../io/response_store.js";
import type { StepLogger } from "../logger.js";
import { logInfo } from "../logger.js";
import { writeCsv } from "../records/csv_io.js";
import type { CsvRow } from "../records/csv_io.js";
import type { JsonValue, SummaryRow } from "../types.js";

export type AggregateOptions = {
  expectedIds?: string[];
  decisionKeys?: string[];
  excerptLength?: number;
};

export type SummaryResult = {
  summaryPath: string;
  rows: SummaryRow[];
  header: string[];
  flagged: number;
};

const FIXED_LEADING = ["id", "condition", "narrative_excerpt"];
const FIXED_TRAILING = ["status", "flagged", "attempts", "failure_reason"];
const DEFAULT_EXCERPT_LENGTH = 200;

export function aggregateResponses(entries: StoreEntry[], opts: AggregateOptions = {}): SummaryRow[] {
  const excerptLength = opts.excerptLength ?? DEFAULT_EXCERPT_LENGTH;
  const byId = new Map<string, SummaryRow>();
  const idByKey = new Map((opts.expectedIds ?? []).map((id) => [artifactKey(id), id]));

  for (const entry of entries) {
    if ("error" in entry) {
      // an unreadable file has no trustworthy id; fall back to its store key
      const id = idByKey.get(entry.key) ?? entry.key;
      if (!byId.has(id)) {
        byId.set(id, {
          id,
          condition: "",
          narrative_excerpt: "",
          decision: {},
          status: "MALFORMED",
          flagged: true,
          attempts: null,
          failure_reason: entry.error
        });
      }
      continue;
    }
    const { artifact } = entry;
    const valid = artifact.status === "valid";
    byId.set(artifact.id, {
      id: artifact.id,
      condition: artifact.condition,
      narrative_excerpt: truncate(artifact.narrative, excerptLength),
      decision: valid && artifact.decision ? artifact.decision : {},
      status: valid ? "VALID" : "INVALID",
      flagged: !valid,
      attempts: artifact.attempts,
      failure_reason: artifact.failure_reason ?? ""
    });
  }

  const rows: SummaryRow[] = [];
  const seen = new Set<string>();
  for (const id of opts.expectedIds ?? []) {
    if (seen.has(id)) {
      continue;
    }
    seen.add(id);
    rows.push(
      byId.get(id) ?? {
        id,
        condition: "",
        narrative_excerpt: "",
        decision: {},
        status: "MISSING",
        flagged: true,
        attempts: null,
        failure_reason: "no response persisted"
      }
    );
  }
  const extras = [...byId.keys()].filter((id) => !seen.has(id)).sort(compareIds);
  for (const id of extras) {
    const row = byId.get(id);
    if (row) {
      rows.push(row);
    }
  }
  return rows;
}

export function summaryHeader(rows: SummaryRow[], decisionKeys?: string[]): { header: string[]; columns: Map<string, string> } {
  const keys: string[] = decisionKeys ? [...decisionKeys] : [];
  if (!decisionKeys) {
    for (const row of rows) {
      for (const key of Object.keys(row.decision)) {
        if (!keys.includes(key)) {
          keys.push(key);
        }
      }
    }
  }
  const reserved = new Set([...FIXED_LEADING, ...FIXED_TRAILING]);
  const columns = new Map<string, string>();
  for (const key of keys) {
    columns.set(key, reserved.has(key) ? `decision_${key}` : key);
  }
  return { header: [...FIXED_LEADING, ...columns.values(), ...FIXED_TRAILING], columns };
}

export function toCsvRows(rows: SummaryRow[], columns: Map<string, string>): CsvRow[] {
  return rows.map((row) => {
    const out: CsvRow = {
      id: row.id,
      condition: row.condition,
      narrative_excerpt: row.narrative_excerpt
    };
    for (const [key, column] of columns) {
      out[column] = flattenValue(row.decision[key]);
    }
    out.status = row.status;
    out.flagged = row.flagged ? "yes" : "";
    out.attempts = row.attempts === null ? "" : String(row.attempts);
    out.failure_reason = row.failure_reason;
    return out;
  });
}

/**
 * Rebuilds the summary table from every persisted response. Never calls
 * the model; fails only when there is nothing at all to summarize.
 */
export async function createSummary(
  store: ResponseStore,
  summaryPath: string,
  opts: AggregateOptions = {},
  logger?: StepLogger
): Promise<SummaryResult> {
  const entries = await store.list();
  if (!entries.length) {
    throw new AggregationInputError("No response artifacts found; nothing to summarize");
  }
  const rows = aggregateResponses(entries, opts);
  const { header, columns } = summaryHeader(rows, opts.decisionKeys);
  await writeCsv(summaryPath, header, toCsvRows(rows, columns));
  const flagged = rows.filter((row) => row.flagged).length;
  logInfo(logger, "summary.written", { path: summaryPath, rows: rows.length, flagged });
  return { summaryPath, rows, header, flagged };
}

export function flattenValue(value: JsonValue | undefined): string {
  if (value === null || value === undefined) {
    return "";
  }
  if (typeof value === "string") {
    return value;
  }
  if (typeof value === "number" || typeof value === "boolean") {
    return String(value);
  }
  return JSON.stringify(value);
}

/** Cuts on code points, so a surrogate pair is never split. */
export function truncate(text: string, maxLen: number): string {
  const chars = Array.from(text.trim());
  if (chars.length <= maxLen) {
    return chars.join("");
  }
  return `${chars.slice(0, Math.max(0, maxLen - 3)).join("")}...`;
}

function compareIds(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}
