import fs from "node:fs";
import path from "node:path";
import { z } from "zod";
import { PersistenceError } from "../errors.js";
import { JsonValueSchema } from "../llm/decision_schema.js";
import type { StepLogger } from "../logger.js";
import { logInfo } from "../logger.js";
import type { ResponseArtifact } from "../types.js";
import { isTempFile, writeFileAtomic } from "./atomic_write.js";
import { artifactKey } from "./file_manifest.js";

const RESPONSE_SUFFIX = "_response.json";

export const ResponseArtifactSchema: z.ZodType<ResponseArtifact> = z.object({
  id: z.string().min(1),
  status: z.enum(["valid", "invalid"]),
  attempts: z.number().int().min(1),
  narrative: z.string(),
  condition: z.string(),
  model: z.string(),
  prompt_hash: z.string(),
  raw_text: z.string(),
  decision: z.record(JsonValueSchema).nullable(),
  failure_reason: z.string().nullable(),
  attempt_log: z.array(
    z.object({
      attempt: z.number().int(),
      outcome: z.enum(["valid", "invalid_reply", "transport_error"]),
      reason: z.string().optional(),
      duration_ms: z.number()
    })
  ),
  completed_at: z.string()
});

export type StoreEntry = { key: string; artifact: ResponseArtifact } | { key: string; error: string };

/** Key-value contract the pipeline and aggregator depend on. */
export interface ResponseStore {
  get(id: string): Promise<ResponseArtifact | null>;
  put(artifact: ResponseArtifact): Promise<void>;
  list(): Promise<StoreEntry[]>;
}

/**
 * One `<key>_response.json` per record id. Writes go through a temp file and
 * rename, so a reader never sees a partial artifact.
 */
export class FileResponseStore implements ResponseStore {
  constructor(
    readonly dir: string,
    private readonly logger?: StepLogger
  ) {}

  pathFor(id: string): string {
    return path.join(this.dir, `${artifactKey(id)}${RESPONSE_SUFFIX}`);
  }

  async get(id: string): Promise<ResponseArtifact | null> {
    const filePath = this.pathFor(id);
    const loaded = await this.read(filePath);
    if (!loaded.ok) {
      if (loaded.error !== "missing") {
        logInfo(this.logger, "store.malformed_artifact", { id, path: filePath, error: loaded.error });
      }
      return null;
    }
    if (loaded.artifact.id !== id) {
      logInfo(this.logger, "store.malformed_artifact", { id, path: filePath, error: `artifact id is '${loaded.artifact.id}'` });
      return null;
    }
    return loaded.artifact;
  }

  async put(artifact: ResponseArtifact): Promise<void> {
    const checked = ResponseArtifactSchema.safeParse(artifact);
    if (!checked.success) {
      throw new PersistenceError(artifact.id, `Refusing to persist invalid artifact: ${checked.error.issues[0]?.message ?? "unknown"}`);
    }
    const filePath = this.pathFor(artifact.id);
    try {
      await writeFileAtomic(filePath, `${JSON.stringify(checked.data, null, 2)}\n`);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      throw new PersistenceError(artifact.id, `Failed to persist response for ${artifact.id}: ${message}`, { cause: err });
    }
  }

  async list(): Promise<StoreEntry[]> {
    let names: string[];
    try {
      names = await fs.promises.readdir(this.dir);
    } catch (err) {
      if (isNotFound(err)) {
        return [];
      }
      throw err;
    }
    const entries: StoreEntry[] = [];
    for (const name of names.filter((item) => item.endsWith(RESPONSE_SUFFIX) && !isTempFile(item)).sort()) {
      const key = name.slice(0, -RESPONSE_SUFFIX.length);
      const loaded = await this.read(path.join(this.dir, name));
      if (loaded.ok) {
        entries.push({ key, artifact: loaded.artifact });
      } else if (loaded.error !== "missing") {
        entries.push({ key, error: loaded.error });
      }
    }
    return entries;
  }

  private async read(filePath: string): Promise<{ ok: true; artifact: ResponseArtifact } | { ok: false; error: string }> {
    let raw: string;
    try {
      raw = await fs.promises.readFile(filePath, "utf8");
    } catch (err) {
      if (isNotFound(err)) {
        return { ok: false, error: "missing" };
      }
      throw err;
    }
    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (err) {
      return { ok: false, error: `unparseable JSON: ${err instanceof Error ? err.message : String(err)}` };
    }
    const checked = ResponseArtifactSchema.safeParse(json);
    if (!checked.success) {
      const issues = checked.error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`);
      return { ok: false, error: `invalid artifact: ${issues.join("; ")}` };
    }
    return { ok: true, artifact: checked.data };
  }
}

function isNotFound(err: unknown): boolean {
  return Boolean(err && typeof err === "object" && "code" in err && err.code === "ENOENT");
}
