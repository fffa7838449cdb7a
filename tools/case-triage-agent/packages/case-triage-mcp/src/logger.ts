import fs from "node:fs";
import path from "node:path";
import { normalizeError } from "./errors.js";

type StepPhase = "start" | "end" | "error" | "info";

export type StepRecord = {
  ts: string;
  step: string;
  phase: StepPhase;
  ms?: number;
  error_code?: string;
  error_message?: string;
  data?: Record<string, unknown>;
};

export type RunMeta = {
  status: "running" | "success" | "error";
  started_at: string;
  ended_at: string;
  duration_ms: number;
  output_dir: string;
  logs_dir: string;
  steps_log_path: string;
  error_code?: string;
  error_message?: string;
};

/**
 * Append-only JSONL step log for one run, plus a run_meta.json summary
 * written on finalize. Stdout stays untouched: the MCP stdio transport owns it.
 */
export class StepLogger {
  readonly outputDir: string;
  readonly logsDir: string;
  readonly stepsPath: string;
  readonly metaPath: string;
  private readonly startedAt: number;
  private readonly startedAtIso: string;
  private finalized = false;
  private lastMeta: RunMeta | null = null;

  constructor(outputDir: string, logDirName = "logs") {
    this.outputDir = outputDir;
    this.logsDir = path.join(outputDir, logDirName);
    this.stepsPath = path.join(this.logsDir, "steps.jsonl");
    this.metaPath = path.join(this.logsDir, "run_meta.json");
    fs.mkdirSync(this.logsDir, { recursive: true });
    fs.writeFileSync(this.stepsPath, "");
    this.startedAt = Date.now();
    this.startedAtIso = new Date(this.startedAt).toISOString();
    this.writeMeta(this.buildMeta("running", this.startedAt));
  }

  log(record: StepRecord): void {
    fs.appendFileSync(this.stepsPath, `${JSON.stringify(record)}\n`);
  }

  info(step: string, data: Record<string, unknown>): void {
    this.log({ ts: new Date().toISOString(), step, phase: "info", data });
  }

  async step<T>(name: string, fn: () => Promise<T>): Promise<T> {
    const started = Date.now();
    this.log({ ts: new Date(started).toISOString(), step: name, phase: "start" });
    try {
      const result = await fn();
      const ended = Date.now();
      this.log({ ts: new Date(ended).toISOString(), step: name, phase: "end", ms: ended - started });
      return result;
    } catch (err) {
      const ended = Date.now();
      const { code, message } = normalizeError(err);
      this.log({
        ts: new Date(ended).toISOString(),
        step: name,
        phase: "error",
        ms: ended - started,
        error_code: code,
        error_message: message
      });
      throw err;
    }
  }

  finalize(status: "success" | "error", err?: unknown): RunMeta {
    if (this.finalized && this.lastMeta) {
      return this.lastMeta;
    }
    const meta = this.buildMeta(status, Date.now());
    if (err) {
      const { code, message } = normalizeError(err);
      meta.error_code = code;
      meta.error_message = message;
    }
    this.writeMeta(meta);
    this.finalized = true;
    this.lastMeta = meta;
    return meta;
  }

  private buildMeta(status: RunMeta["status"], ended: number): RunMeta {
    return {
      status,
      started_at: this.startedAtIso,
      ended_at: new Date(ended).toISOString(),
      duration_ms: ended - this.startedAt,
      output_dir: this.outputDir,
      logs_dir: this.logsDir,
      steps_log_path: this.stepsPath
    };
  }

  private writeMeta(meta: RunMeta): void {
    fs.writeFileSync(this.metaPath, `${JSON.stringify(meta, null, 2)}\n`);
  }
}

export function logInfo(logger: StepLogger | undefined, step: string, data: Record<string, unknown>): void {
  logger?.info(step, data);
}

export async function withStep<T>(logger: StepLogger | undefined, name: string, fn: () => Promise<T>): Promise<T> {
  return logger ? logger.step(name, fn) : fn();
}
