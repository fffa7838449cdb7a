import path from "node:path";

import {
  AggregationInputError,
  InvocationCancelledError,
  PersistenceError,
  TransientInvocationError,
  describeError
} from "../errors.js";
import { buildManifest } from "../io/file_manifest.js";
import { FileResponseStore } from "../io/response_store.js";
import type { ResponseStore } from "../io/response_store.js";
import { buildDecisionSpec, requestFormat } from "../llm/decision_schema.js";
import type { DecisionSpec } from "../llm/decision_schema.js";
import { LlmInvoker } from "../llm/invoker.js";
import type { ModelClient } from "../llm/ollama_client.js";
import type { StepLogger } from "../logger.js";
import { logInfo, withStep } from "../logger.js";
import { buildPrompts } from "../prompt/prompt_builder.js";
import { loadPromptConfig } from "../prompt/prompt_config.js";
import type { PromptConfig } from "../prompt/prompt_config.js";
import { writePromptArtifacts } from "../prompt/prompt_store.js";
import type { PromptWriteResult } from "../prompt/prompt_store.js";
import { dedupeRecords } from "../records/dedupe.js";
import type { DuplicateRecordWarning } from "../records/dedupe.js";
import { loadRecords } from "../records/sources.js";
import { createSummary } from "../summary/aggregator.js";
import type { SummaryResult } from "../summary/aggregator.js";
import { buildRunReport, writeRunReport } from "../summary/run_report.js";
import type { RecordOutcome, RunReport } from "../summary/run_report.js";
import type { CaseRecord, Prompt, ResponseArtifact } from "../types.js";
import type { RetryPolicy } from "../util/retry.js";
import { sleep } from "../util/retry.js";

export type OutputLayout = {
  outputDir: string;
  promptsDir: string;
  responsesDir: string;
  summaryPath: string;
};

export function outputLayout(outputDir: string): OutputLayout {
  return {
    outputDir,
    promptsDir: path.join(outputDir, "prompts"),
    responsesDir: path.join(outputDir, "responses"),
    summaryPath: path.join(outputDir, "summary", "results.csv")
  };
}

export type BatchInput = {
  configPath: string;
  recordsCsv: string;
  limit?: number;
};

export type PreparedBatch = {
  config: PromptConfig;
  records: CaseRecord[];
  duplicates: DuplicateRecordWarning[];
  prompts: Prompt[];
};

/**
 * Loads config and records, drops duplicate ids and renders every prompt.
 * A broken template or config fails here, before any model call.
 */
export async function prepareBatch(input: BatchInput, logger?: StepLogger): Promise<PreparedBatch> {
  const config = await withStep(logger, "loadConfig", async () => loadPromptConfig(input.configPath));
  const loaded = await withStep(logger, "loadRecords", async () =>
    loadRecords(input.recordsCsv, { idColumn: config.id_column, narrativeColumn: config.narrative_column }, logger)
  );
  const { unique, duplicates } = dedupeRecords(loaded, logger);
  const records = input.limit && input.limit > 0 ? unique.slice(0, input.limit) : unique;
  logInfo(logger, "records.loaded", {
    path: input.recordsCsv,
    rows: loaded.length,
    unique: unique.length,
    duplicates: duplicates.length,
    selected: records.length
  });
  const prompts = await withStep(logger, "buildPrompts", async () => buildPrompts(records, config));
  return { config, records, duplicates, prompts };
}

export type GenerateResult = PreparedBatch & { written: PromptWriteResult };

export async function generatePrompts(input: BatchInput, outputDir: string, logger?: StepLogger): Promise<GenerateResult> {
  const batch = await prepareBatch(input, logger);
  const written = await withStep(logger, "writePrompts", async () =>
    writePromptArtifacts(outputLayout(outputDir).promptsDir, batch.prompts, logger)
  );
  return { ...batch, written };
}

export type ProcessOptions = {
  invoker: LlmInvoker;
  store: ResponseStore;
  condition: string;
  concurrency?: number;
  requestDelayMs?: number;
  signal?: AbortSignal;
  logger?: StepLogger;
};

export type ProcessResult = {
  outcomes: RecordOutcome[];
  interrupted: boolean;
};

/**
 * Runs records through the invoker on a small worker pool sharing one cursor.
 * Records with a terminal artifact are skipped. A configuration failure stops
 * every worker and is rethrown; cancellation stops them without persisting
 * the records still in flight.
 */
export async function processRecords(records: CaseRecord[], prompts: Prompt[], opts: ProcessOptions): Promise<ProcessResult> {
  const { invoker, store, logger } = opts;
  const promptById = new Map(prompts.map((prompt) => [prompt.recordId, prompt]));
  const unprompted = records.filter((record) => !promptById.has(record.id));
  if (unprompted.length) {
    throw new Error(`No prompt built for record(s): ${unprompted.map((record) => record.id).join(", ")}`);
  }
  const outcomes: RecordOutcome[] = [];
  const stop = new AbortController();
  const onOuterAbort = () => stop.abort();
  opts.signal?.addEventListener("abort", onOuterAbort, { once: true });
  if (opts.signal?.aborted) {
    stop.abort();
  }
  let fatal: unknown = null;

  const total = records.length;
  let cursor = 0;
  const parallel = Math.max(1, Math.floor(opts.concurrency ?? 1));
  const requestDelayMs = Math.max(0, opts.requestDelayMs ?? 0);

  const workers = Array.from({ length: Math.min(parallel, Math.max(1, total)) }, () =>
    (async () => {
      let calledModel = false;
      while (!stop.signal.aborted) {
        const index = cursor;
        cursor += 1;
        if (index >= total) {
          break;
        }
        const record = records[index];
        const prompt = promptById.get(record.id);
        if (!prompt) {
          break;
        }
        try {
          const existing = await store.get(record.id);
          if (existing) {
            outcomes.push({ id: record.id, kind: "skipped", status: existing.status });
            logInfo(logger, "record.skip_terminal", { id: record.id, status: existing.status });
            if (existing.prompt_hash !== prompt.hash) {
              // stored decision was made against an older prompt
              logInfo(logger, "record.skip_stale_prompt", {
                id: record.id,
                stored_hash: existing.prompt_hash,
                current_hash: prompt.hash
              });
            }
            continue;
          }
          if (calledModel) {
            await sleep(requestDelayMs, stop.signal);
          }
          calledModel = true;
          const result = await invoker.invoke(prompt, stop.signal);
          const artifact: ResponseArtifact = {
            id: record.id,
            status: result.status,
            attempts: result.attempts,
            narrative: record.narrative,
            condition: opts.condition,
            model: invoker.model,
            prompt_hash: prompt.hash,
            raw_text: result.rawText,
            decision: result.decision,
            failure_reason: result.failureReason,
            attempt_log: result.attemptLog,
            completed_at: new Date().toISOString()
          };
          try {
            await store.put(artifact);
          } catch (err) {
            if (!(err instanceof PersistenceError)) {
              throw err;
            }
            outcomes.push({
              id: record.id,
              kind: "persistence_failed",
              status: result.status,
              attempts: result.attempts,
              failureReason: describeError(err)
            });
            logInfo(logger, "record.persist_failed", { id: record.id, error: describeError(err) });
            continue;
          }
          outcomes.push({
            id: record.id,
            kind: "invoked",
            status: result.status,
            attempts: result.attempts,
            failureReason: result.failureReason
          });
          logInfo(logger, "record.done", { id: record.id, status: result.status, attempts: result.attempts });
        } catch (err) {
          if (err instanceof InvocationCancelledError) {
            logInfo(logger, "record.cancelled", { id: record.id });
            break;
          }
          if (fatal === null) {
            fatal = err;
          }
          stop.abort();
          break;
        }
      }
    })()
  );

  try {
    await Promise.all(workers);
  } finally {
    opts.signal?.removeEventListener("abort", onOuterAbort);
  }
  if (fatal !== null) {
    throw fatal;
  }
  const interrupted = Boolean(opts.signal?.aborted);
  if (interrupted) {
    logInfo(logger, "batch.interrupted", { completed: outcomes.length, total });
  }
  return { outcomes, interrupted };
}

/**
 * Lists installed models once before the batch. An unknown model aborts the
 * run; an unreachable endpoint is left to the per-record retry policy.
 */
export async function preflightModel(client: ModelClient, model: string, logger?: StepLogger): Promise<void> {
  if (!client.ensureModel) {
    return;
  }
  try {
    await client.ensureModel(model);
  } catch (err) {
    if (err instanceof TransientInvocationError) {
      logInfo(logger, "model.preflight_unreachable", { model, error: err.message });
      return;
    }
    throw err;
  }
}

export type TriageOptions = BatchInput & {
  outputDir: string;
  model?: string;
  policy: RetryPolicy;
  concurrency?: number;
  requestDelayMs?: number;
  summarize?: boolean;
  signal?: AbortSignal;
  logger?: StepLogger;
};

export type TriageDeps = {
  client: ModelClient;
  store?: ResponseStore;
};

export type TriageResult = {
  layout: OutputLayout;
  model: string;
  duplicates: DuplicateRecordWarning[];
  prompts: PromptWriteResult;
  outcomes: RecordOutcome[];
  interrupted: boolean;
  report: RunReport;
  reportPath: string;
  summary: SummaryResult | null;
};

export async function runTriage(opts: TriageOptions, deps: TriageDeps): Promise<TriageResult> {
  const { logger } = opts;
  const layout = outputLayout(opts.outputDir);
  const generated = await generatePrompts(opts, opts.outputDir, logger);
  const { config, records, prompts } = generated;
  const model = opts.model || config.model;
  const spec: DecisionSpec = buildDecisionSpec(config.output_schema);

  await withStep(logger, "preflight", async () => preflightModel(deps.client, model, logger));

  const store = deps.store ?? new FileResponseStore(layout.responsesDir, logger);
  const invoker = new LlmInvoker(
    deps.client,
    {
      model,
      policy: opts.policy,
      spec,
      minConfidence: config.min_confidence,
      format: requestFormat(config.output_schema, config.use_json_format),
      modelOptions: config.ollama_options
    },
    logger
  );

  const processed = await withStep(logger, "processRecords", async () =>
    processRecords(records, prompts, {
      invoker,
      store,
      condition: config.condition,
      concurrency: opts.concurrency,
      requestDelayMs: opts.requestDelayMs,
      signal: opts.signal,
      logger
    })
  );

  const report = buildRunReport(processed.outcomes, buildManifest([opts.recordsCsv, opts.configPath]));
  const reportPath = await withStep(logger, "writeRunReport", async () => writeRunReport(layout.outputDir, report));

  let summary: SummaryResult | null = null;
  if (opts.summarize !== false && !processed.interrupted) {
    summary = await withStep(logger, "createSummary", async () =>
      summarizeIfAny(store, layout.summaryPath, records, spec, logger)
    );
  }

  return {
    layout,
    model,
    duplicates: generated.duplicates,
    prompts: generated.written,
    outcomes: processed.outcomes,
    interrupted: processed.interrupted,
    report,
    reportPath,
    summary
  };
}

async function summarizeIfAny(
  store: ResponseStore,
  summaryPath: string,
  records: CaseRecord[],
  spec: DecisionSpec,
  logger?: StepLogger
): Promise<SummaryResult | null> {
  try {
    return await createSummary(
      store,
      summaryPath,
      { expectedIds: records.map((record) => record.id), decisionKeys: spec.keys },
      logger
    );
  } catch (err) {
    if (err instanceof AggregationInputError) {
      logInfo(logger, "summary.skipped", { reason: err.message });
      return null;
    }
    throw err;
  }
}
