import path from "node:path";
import { writeFileAtomic } from "../io/atomic_write.js";
import type { FileManifestEntry } from "../io/file_manifest.js";
import type { ValidationStatus } from "../types.js";

export type RecordOutcome =
  | { id: string; kind: "invoked"; status: ValidationStatus; attempts: number; failureReason: string | null }
  | { id: string; kind: "skipped"; status: ValidationStatus }
  | { id: string; kind: "persistence_failed"; status: ValidationStatus; attempts: number; failureReason: string };

export type RetryStatistics = {
  total_attempts: number;
  average_attempts: number;
  max_attempts: number;
  records_with_retries: number;
  retry_rate: number;
};

export type RunReport = {
  generated_at: string;
  total: number;
  invoked: number;
  valid: number;
  invalid: number;
  skipped: number;
  persistence_failures: number;
  success_rate: number;
  retry_statistics: RetryStatistics;
  failed_records: { id: string; reason: string }[];
  input_manifest: FileManifestEntry[];
};

export function buildRunReport(outcomes: RecordOutcome[], manifest: FileManifestEntry[], now: Date = new Date()): RunReport {
  const attemptCounts: number[] = [];
  const failed: { id: string; reason: string }[] = [];
  let valid = 0;
  let invalid = 0;
  let skipped = 0;
  let persistenceFailures = 0;

  for (const outcome of outcomes) {
    if (outcome.kind === "skipped") {
      skipped += 1;
      continue;
    }
    attemptCounts.push(outcome.attempts);
    if (outcome.kind === "persistence_failed") {
      persistenceFailures += 1;
      failed.push({ id: outcome.id, reason: outcome.failureReason });
      continue;
    }
    if (outcome.status === "valid") {
      valid += 1;
    } else {
      invalid += 1;
      failed.push({ id: outcome.id, reason: outcome.failureReason ?? "unknown" });
    }
  }

  const invoked = attemptCounts.length;
  const totalAttempts = attemptCounts.reduce((sum, count) => sum + count, 0);
  const withRetries = attemptCounts.filter((count) => count > 1).length;

  return {
    generated_at: now.toISOString(),
    total: outcomes.length,
    invoked,
    valid,
    invalid,
    skipped,
    persistence_failures: persistenceFailures,
    success_rate: ratio(valid, invoked),
    retry_statistics: {
      total_attempts: totalAttempts,
      average_attempts: ratio(totalAttempts, invoked),
      max_attempts: invoked ? Math.max(...attemptCounts) : 0,
      records_with_retries: withRetries,
      retry_rate: ratio(withRetries, invoked)
    },
    failed_records: failed,
    input_manifest: manifest
  };
}

export async function writeRunReport(outputDir: string, report: RunReport): Promise<string> {
  const reportPath = path.join(outputDir, "run_report.json");
  await writeFileAtomic(reportPath, `${JSON.stringify(report, null, 2)}\n`);
  return reportPath;
}

function ratio(part: number, whole: number): number {
  return whole ? Math.round((part / whole) * 10_000) / 10_000 : 0;
}
