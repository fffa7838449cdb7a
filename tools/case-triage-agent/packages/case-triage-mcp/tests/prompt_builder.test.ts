import { describe, expect, it } from "vitest";
import { ConfigurationError } from "../src/errors.js";
import { sha256Hex } from "../src/io/file_manifest.js";
import { buildPrompt, buildPrompts, renderPrompt, validateTemplate } from "../src/prompt/prompt_builder.js";
import { parsePromptConfig } from "../src/prompt/prompt_config.js";
import { makeRecord } from "./helpers.js";

const TEMPLATE = "Condition: {{CONDITION}}\n```\n{{RECORD_JSON}}\n```\nReply as {{OUTPUT_SCHEMA}}";

describe("validateTemplate", () => {
  it("accepts a template with every marker", () => {
    expect(() => validateTemplate(TEMPLATE)).not.toThrow();
  });

  it("lists the missing markers", () => {
    try {
      validateTemplate("Only {{CONDITION}} here");
      expect.fail("expected validateTemplate to throw");
    } catch (err) {
      expect(err).toBeInstanceOf(ConfigurationError);
      if (err instanceof ConfigurationError) {
        expect(err.code).toBe("TEMPLATE_MARKER_MISSING");
        expect(err.message).toBe("Template is missing required marker(s): {{RECORD_JSON}}, {{OUTPUT_SCHEMA}}");
      }
    }
  });
});

describe("renderPrompt", () => {
  it("replaces a fenced record marker with a json fence and inlines the rest", () => {
    const text = renderPrompt(TEMPLATE, "car taken by force", { id: "A", narrative: null }, { ok: true });
    expect(text).toBe(
      [
        "Condition: car taken by force",
        "```json",
        "{",
        "  \"id\": \"A\",",
        "  \"narrative\": null",
        "}",
        "```",
        "Reply as ```json",
        "{",
        "  \"ok\": true",
        "}",
        "```"
      ].join("\n")
    );
  });

  it("does not expand markers or replacement patterns inside substituted values", () => {
    const text = renderPrompt("{{CONDITION}}|{{RECORD_JSON}}|{{OUTPUT_SCHEMA}}", "see {{RECORD_JSON}} and $& too", {}, {});
    expect(text).toBe("see {{RECORD_JSON}} and $& too|```json\n{}\n```|```json\n{}\n```");
  });

  it("keeps non-ASCII text as is", () => {
    const text = renderPrompt("{{CONDITION}} {{RECORD_JSON}} {{OUTPUT_SCHEMA}}", "robo", { hechos: "camión" }, {});
    expect(text).toContain("\"hechos\": \"camión\"");
  });
});

describe("buildPrompt", () => {
  const config = parsePromptConfig({ prompt_template: TEMPLATE, condition: "car taken" });

  it("is deterministic and hashes the rendered text", () => {
    const record = makeRecord("A-1", "Taken at gunpoint");
    const first = buildPrompt(record, config);
    const second = buildPrompt(record, config);
    expect(second).toEqual(first);
    expect(first.recordId).toBe("A-1");
    expect(first.hash).toBe(sha256Hex(first.text));
  });

  it("renders the default output schema when none is configured", () => {
    const prompt = buildPrompt(makeRecord("A-1", "x"), config);
    expect(prompt.text).toContain("\"meets_condition\": true");
    expect(prompt.text).toContain("\"rationale_short\": \"\"");
  });

  it("validates the template before rendering any record", () => {
    const broken = parsePromptConfig({ prompt_template: "{{CONDITION}}", condition: "car taken" });
    expect(() => buildPrompts([], broken)).toThrow(ConfigurationError);
  });

  it("renders one prompt per record", () => {
    const prompts = buildPrompts([makeRecord("A", "a"), makeRecord("B", "b")], config);
    expect(prompts.map((prompt) => prompt.recordId)).toEqual(["A", "B"]);
    expect(prompts[0].hash).not.toBe(prompts[1].hash);
  });
});
