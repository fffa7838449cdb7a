import path from "node:path";
import { fileURLToPath } from "node:url";
import dotenv from "dotenv";
import { ConfigurationError } from "./errors.js";

export type AppConfig = {
  repoRoot: string;
  agentRoot: string;
  defaultPromptConfig: string;
  defaultReferenceDir: string;
  defaultRecordsCsv: string;
  defaultOutputDir: string;
  ollamaHost: string;
  model?: string;
  maxAttempts: number;
  retryDelayMs: number;
  requestDelayMs: number;
  timeoutMs: number;
  concurrency: number;
};

export function cfgFromEnv(env: NodeJS.ProcessEnv = process.env): AppConfig {
  dotenv.config();
  const repoRoot = env.CASE_TRIAGE_ROOT ? path.resolve(env.CASE_TRIAGE_ROOT) : resolveRepoRoot();
  const agentRoot = path.join(repoRoot, "tools", "case-triage-agent");

  return {
    repoRoot,
    agentRoot,
    defaultPromptConfig: path.join(agentRoot, "prompt", "prompt_config.json"),
    defaultReferenceDir: path.join(agentRoot, "prompt", "reference"),
    defaultRecordsCsv: "data/records.csv",
    defaultOutputDir: "data/outputs",
    ollamaHost: env.OLLAMA_HOST || "http://127.0.0.1:11434",
    model: env.CASE_TRIAGE_MODEL || undefined,
    maxAttempts: intFromEnv(env, "CASE_TRIAGE_MAX_ATTEMPTS", 3, 1),
    retryDelayMs: intFromEnv(env, "CASE_TRIAGE_RETRY_DELAY_MS", 2000, 0),
    requestDelayMs: intFromEnv(env, "CASE_TRIAGE_REQUEST_DELAY_MS", 1000, 0),
    timeoutMs: intFromEnv(env, "CASE_TRIAGE_TIMEOUT_MS", 120_000, 1),
    concurrency: intFromEnv(env, "CASE_TRIAGE_CONCURRENCY", 1, 1)
  };
}

export function resolveRepoRoot(): string {
  const here = path.dirname(fileURLToPath(import.meta.url));
  return path.resolve(here, "..", "..", "..", "..", "..");
}

export function resolvePath(repoRoot: string, maybeRelative: string): string {
  if (path.isAbsolute(maybeRelative)) {
    return maybeRelative;
  }
  return path.resolve(repoRoot, maybeRelative);
}

function intFromEnv(env: NodeJS.ProcessEnv, name: string, fallback: number, min: number): number {
  const raw = env[name];
  if (!raw || !raw.trim()) {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isInteger(value) || value < min) {
    throw new ConfigurationError(`${name} must be an integer >= ${min}, got '${raw}'`);
  }
  return value;
}
