import fs from "node:fs";
import path from "node:path";
import { afterEach, describe, expect, it } from "vitest";
import { sha256Hex } from "../src/io/file_manifest.js";
import { promptPathFor, writePromptArtifacts } from "../src/prompt/prompt_store.js";
import type { Prompt } from "../src/types.js";
import { cleanupTempDirs, makeTempDir } from "./helpers.js";

function prompt(recordId: string, text: string): Prompt {
  return { recordId, text, hash: sha256Hex(text) };
}

afterEach(() => {
  cleanupTempDirs();
});

describe("writePromptArtifacts", () => {
  it("writes one file per record named after the id", async () => {
    const dir = path.join(makeTempDir(), "prompts");
    const result = await writePromptArtifacts(dir, [prompt("a-1", "alpha"), prompt("B 2", "beta")]);

    expect(result.written).toEqual(["a-1", "B 2"]);
    expect(result.unchanged).toEqual([]);
    expect(fs.readFileSync(path.join(dir, "prompt_a-1.md"), "utf8")).toBe("alpha");
    expect(fs.readFileSync(promptPathFor(dir, "B 2"), "utf8")).toBe("beta");
    expect(path.basename(promptPathFor(dir, "B 2"))).toBe(`prompt_B_2_${sha256Hex("B 2").slice(0, 8)}.md`);
  });

  it("gives ids that differ only in case their own prompt file", async () => {
    const dir = makeTempDir();
    await writePromptArtifacts(dir, [prompt("A1", "upper"), prompt("a1", "lower")]);

    expect(promptPathFor(dir, "A1").toLowerCase()).not.toBe(promptPathFor(dir, "a1").toLowerCase());
    expect(fs.readFileSync(promptPathFor(dir, "A1"), "utf8")).toBe("upper");
    expect(fs.readFileSync(promptPathFor(dir, "a1"), "utf8")).toBe("lower");
  });

  it("leaves files with an identical hash untouched on a rerun", async () => {
    const dir = makeTempDir();
    const prompts = [prompt("A", "alpha"), prompt("B", "beta")];
    await writePromptArtifacts(dir, prompts);
    const before = fs.statSync(promptPathFor(dir, "A")).mtimeMs;

    const rerun = await writePromptArtifacts(dir, prompts);

    expect(rerun.written).toEqual([]);
    expect(rerun.unchanged).toEqual(["A", "B"]);
    expect(fs.statSync(promptPathFor(dir, "A")).mtimeMs).toBe(before);
  });

  it("rewrites only the prompts whose content changed", async () => {
    const dir = makeTempDir();
    await writePromptArtifacts(dir, [prompt("A", "alpha"), prompt("B", "beta")]);

    const rerun = await writePromptArtifacts(dir, [prompt("A", "alpha"), prompt("B", "beta v2")]);

    expect(rerun.written).toEqual(["B"]);
    expect(rerun.unchanged).toEqual(["A"]);
    expect(fs.readFileSync(promptPathFor(dir, "B"), "utf8")).toBe("beta v2");
  });
});
