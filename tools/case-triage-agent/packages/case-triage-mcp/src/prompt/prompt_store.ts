import fs from "node:fs";
import path from "node:path";
import { writeFileAtomic } from "../io/atomic_write.js";
import { artifactKey, sha256Hex } from "../io/file_manifest.js";
import type { StepLogger } from "../logger.js";
import { logInfo } from "../logger.js";
import type { Prompt } from "../types.js";

export type PromptWriteResult = {
  dir: string;
  written: string[];
  unchanged: string[];
};

export function promptPathFor(dir: string, recordId: string): string {
  return path.join(dir, `prompt_${artifactKey(recordId)}.md`);
}

/**
 * One `prompt_<key>.md` per record. A file whose content already hashes to
 * the prompt's hash is left alone, mtime included.
 */
export async function writePromptArtifacts(dir: string, prompts: Prompt[], logger?: StepLogger): Promise<PromptWriteResult> {
  const written: string[] = [];
  const unchanged: string[] = [];
  for (const prompt of prompts) {
    const filePath = promptPathFor(dir, prompt.recordId);
    if (existingHash(filePath) === prompt.hash) {
      unchanged.push(prompt.recordId);
      continue;
    }
    await writeFileAtomic(filePath, prompt.text);
    written.push(prompt.recordId);
  }
  logInfo(logger, "prompts.written", { dir, written: written.length, unchanged: unchanged.length });
  return { dir, written, unchanged };
}

function existingHash(filePath: string): string | null {
  if (!fs.existsSync(filePath)) {
    return null;
  }
  return sha256Hex(fs.readFileSync(filePath, "utf8"));
}
