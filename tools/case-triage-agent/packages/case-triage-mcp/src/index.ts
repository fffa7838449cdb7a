import path from "node:path";
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { z } from "zod";

import { cfgFromEnv, resolvePath } from "./config.js";
import { normalizeError } from "./errors.js";
import { FileResponseStore } from "./io/response_store.js";
import { buildDecisionSpec } from "./llm/decision_schema.js";
import { OllamaModelClient } from "./llm/ollama_client.js";
import { StepLogger } from "./logger.js";
import { generatePrompts, outputLayout, runTriage } from "./pipeline/pipeline.js";
import type { TriageResult } from "./pipeline/pipeline.js";
import { loadPromptConfig, syncPromptConfig } from "./prompt/prompt_config.js";
import { dedupeRecords } from "./records/dedupe.js";
import { loadRecords } from "./records/sources.js";
import { createSummary } from "./summary/aggregator.js";
import { DEFAULT_RETRY_POLICY } from "./util/retry.js";
import type { RetryPolicy } from "./util/retry.js";

const cfg = cfgFromEnv();

const server = new McpServer({ name: "case-triage-mcp", version: "0.1.0" });

type TextContent = { type: "text"; text: string };
type ToolOutput = { headline: string; details: unknown };

async function runLogged(outputDir: string, fn: (logger: StepLogger) => Promise<ToolOutput>): Promise<{ content: TextContent[] }> {
  const logger = new StepLogger(outputDir);
  let error: unknown = null;
  let output: ToolOutput | null = null;
  try {
    output = await fn(logger);
  } catch (err) {
    error = err;
  }
  const meta = logger.finalize(error ? "error" : "success", error || undefined);

  if (error || !output) {
    const errMeta = normalizeError(error);
    return {
      content: [
        { type: "text", text: `Failed: ${errMeta.code}: ${errMeta.message}` },
        { type: "text", text: JSON.stringify(meta, null, 2) }
      ]
    };
  }
  return {
    content: [
      { type: "text", text: output.headline },
      { type: "text", text: JSON.stringify({ result: output.details, meta }, null, 2) }
    ]
  };
}

function retryPolicy(maxAttempts?: number): RetryPolicy {
  return {
    ...DEFAULT_RETRY_POLICY,
    maxAttempts: maxAttempts ?? cfg.maxAttempts,
    retryDelayMs: cfg.retryDelayMs
  };
}

function describeRun(result: TriageResult): Record<string, unknown> {
  return {
    model: result.model,
    output_dir: result.layout.outputDir,
    duplicates: result.duplicates,
    prompts_written: result.prompts.written.length,
    prompts_unchanged: result.prompts.unchanged.length,
    interrupted: result.interrupted,
    report_path: result.reportPath,
    report: result.report,
    summary_path: result.summary?.summaryPath ?? null,
    flagged: result.summary?.flagged ?? null
  };
}

const batchArgs = {
  recordsCsv: z.string().default(cfg.defaultRecordsCsv).describe("CSV of case records"),
  configPath: z.string().optional().describe("prompt_config.json; defaults to the agent's prompt/ folder"),
  outputDir: z.string().default(cfg.defaultOutputDir),
  limit: z.number().int().min(0).default(0).describe("0 processes every record")
};

const invokeArgs = {
  model: z.string().optional().describe("Overrides the model named in the prompt config"),
  maxAttempts: z.number().int().min(1).optional(),
  concurrency: z.number().int().min(1).max(8).optional()
};

server.tool(
  "sync_prompt_config",
  {
    referenceDir: z.string().optional().describe("Folder holding template.txt and condition.txt"),
    configPath: z.string().optional(),
    outputDir: z.string().default(cfg.defaultOutputDir)
  },
  async (args) => {
    const referenceDir = resolvePath(cfg.repoRoot, args.referenceDir || cfg.defaultReferenceDir);
    const configPath = resolvePath(cfg.repoRoot, args.configPath || cfg.defaultPromptConfig);
    return runLogged(resolvePath(cfg.repoRoot, args.outputDir), async (logger) => {
      const synced = await logger.step("syncPromptConfig", async () => syncPromptConfig(referenceDir, configPath));
      return {
        headline: `Prompt config ${synced.created ? "created" : "updated"}: ${synced.configPath}`,
        details: synced
      };
    });
  }
);

server.tool("generate_prompts", batchArgs, async (args) => {
  const outputDir = resolvePath(cfg.repoRoot, args.outputDir);
  return runLogged(outputDir, async (logger) => {
    const generated = await generatePrompts(
      {
        recordsCsv: resolvePath(cfg.repoRoot, args.recordsCsv),
        configPath: resolvePath(cfg.repoRoot, args.configPath || cfg.defaultPromptConfig),
        limit: args.limit
      },
      outputDir,
      logger
    );
    return {
      headline: `Prompts: ${generated.written.written.length} written, ${generated.written.unchanged.length} unchanged. Dir: ${generated.written.dir}`,
      details: {
        records: generated.records.length,
        duplicates: generated.duplicates,
        written: generated.written.written,
        unchanged: generated.written.unchanged
      }
    };
  });
});

server.tool("process_records", { ...batchArgs, ...invokeArgs }, async (args, extra) => {
  const outputDir = resolvePath(cfg.repoRoot, args.outputDir);
  return runLogged(outputDir, async (logger) => {
    const result = await runTriage(
      {
        recordsCsv: resolvePath(cfg.repoRoot, args.recordsCsv),
        configPath: resolvePath(cfg.repoRoot, args.configPath || cfg.defaultPromptConfig),
        limit: args.limit,
        outputDir,
        model: args.model || cfg.model,
        policy: retryPolicy(args.maxAttempts),
        concurrency: args.concurrency ?? cfg.concurrency,
        requestDelayMs: cfg.requestDelayMs,
        summarize: false,
        signal: extra.signal,
        logger
      },
      { client: new OllamaModelClient({ host: cfg.ollamaHost, timeoutMs: cfg.timeoutMs }) }
    );
    const { report } = result;
    return {
      headline: `${result.interrupted ? "Interrupted" : "Processed"}: ${report.valid} valid, ${report.invalid} invalid, ${report.skipped} skipped, ${report.persistence_failures} not persisted.`,
      details: describeRun(result)
    };
  });
});

server.tool(
  "create_summary",
  {
    outputDir: z.string().default(cfg.defaultOutputDir),
    recordsCsv: z.string().optional().describe("When given, every record id gets a row, missing ones flagged"),
    configPath: z.string().optional()
  },
  async (args) => {
    const outputDir = resolvePath(cfg.repoRoot, args.outputDir);
    const layout = outputLayout(outputDir);
    return runLogged(outputDir, async (logger) => {
      const config = loadPromptConfig(resolvePath(cfg.repoRoot, args.configPath || cfg.defaultPromptConfig));
      let expectedIds: string[] | undefined;
      if (args.recordsCsv) {
        const loaded = loadRecords(
          resolvePath(cfg.repoRoot, args.recordsCsv),
          { idColumn: config.id_column, narrativeColumn: config.narrative_column },
          logger
        );
        expectedIds = dedupeRecords(loaded, logger).unique.map((record) => record.id);
      }
      const summary = await logger.step("createSummary", async () =>
        createSummary(
          new FileResponseStore(layout.responsesDir, logger),
          layout.summaryPath,
          { expectedIds, decisionKeys: buildDecisionSpec(config.output_schema).keys },
          logger
        )
      );
      return {
        headline: `Summary: ${summary.rows.length} rows, ${summary.flagged} flagged. File: ${summary.summaryPath}`,
        details: { summary_path: summary.summaryPath, header: summary.header, rows: summary.rows.length, flagged: summary.flagged }
      };
    });
  }
);

server.tool("run_triage", { ...batchArgs, ...invokeArgs }, async (args, extra) => {
  const outputDir = resolvePath(cfg.repoRoot, args.outputDir);
  return runLogged(outputDir, async (logger) => {
    const result = await runTriage(
      {
        recordsCsv: resolvePath(cfg.repoRoot, args.recordsCsv),
        configPath: resolvePath(cfg.repoRoot, args.configPath || cfg.defaultPromptConfig),
        limit: args.limit,
        outputDir,
        model: args.model || cfg.model,
        policy: retryPolicy(args.maxAttempts),
        concurrency: args.concurrency ?? cfg.concurrency,
        requestDelayMs: cfg.requestDelayMs,
        signal: extra.signal,
        logger
      },
      { client: new OllamaModelClient({ host: cfg.ollamaHost, timeoutMs: cfg.timeoutMs }) }
    );
    const summaryNote = result.summary
      ? `Summary: ${path.relative(cfg.repoRoot, result.summary.summaryPath)} (${result.summary.flagged} flagged)`
      : "No summary written";
    return {
      headline: `Triage ${result.interrupted ? "interrupted" : "complete"}. ${result.report.valid}/${result.report.total} valid. ${summaryNote}.`,
      details: describeRun(result)
    };
  });
});

const transport = new StdioServerTransport();
await server.connect(transport);
