import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import type { ChatRequest, ModelClient } from "../src/llm/ollama_client.js";
import type { CaseRecord, ResponseArtifact } from "../src/types.js";

const tempDirs: string[] = [];

export function makeTempDir(prefix = "case-triage-"): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), prefix));
  tempDirs.push(dir);
  return dir;
}

export function cleanupTempDirs(): void {
  for (const dir of tempDirs.splice(0)) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
}

export function makeRecord(id: string, narrative: string, rowIndex = 0): CaseRecord {
  return { id, narrative, fields: { id, narrative }, rowIndex };
}

export function makeArtifact(overrides: Partial<ResponseArtifact> = {}): ResponseArtifact {
  return {
    id: "A-1",
    status: "valid",
    attempts: 1,
    narrative: "Two men took the car at gunpoint.",
    condition: "vehicle taken by force",
    model: "test-model",
    prompt_hash: "abc123",
    raw_text: "{\"meets_condition\":true,\"confidence\":0.9,\"rationale_short\":\"armed\"}",
    decision: { meets_condition: true, confidence: 0.9, rationale_short: "armed" },
    failure_reason: null,
    attempt_log: [{ attempt: 1, outcome: "valid", duration_ms: 5 }],
    completed_at: "2026-01-01T00:00:00.000Z",
    ...overrides
  };
}

export const GOOD_REPLY = JSON.stringify({ meets_condition: true, confidence: 0.9, rationale_short: "armed" });

type Reply = string | Error;
type ReplyFn = (request: ChatRequest, call: number, signal?: AbortSignal) => Reply | Promise<Reply>;

/** In-process stand-in for the model endpoint. Records every request. */
export class ScriptedClient implements ModelClient {
  readonly requests: ChatRequest[] = [];
  readonly ensured: string[] = [];
  ensureError: Error | null = null;

  constructor(private readonly reply: ReplyFn) {}

  async chat(request: ChatRequest, signal?: AbortSignal): Promise<string> {
    this.requests.push(request);
    const result = await this.reply(request, this.requests.length, signal);
    if (result instanceof Error) {
      throw result;
    }
    return result;
  }

  async ensureModel(model: string): Promise<void> {
    this.ensured.push(model);
    if (this.ensureError) {
      throw this.ensureError;
    }
  }
}
