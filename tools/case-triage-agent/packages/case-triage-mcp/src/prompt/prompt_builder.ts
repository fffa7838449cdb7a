import { ConfigurationError } from "../errors.js";
import { sha256Hex } from "../io/file_manifest.js";
import { resolveOutputSchema } from "../llm/decision_schema.js";
import type { CaseRecord, CellValue, JsonObject, Prompt } from "../types.js";
import type { PromptConfig } from "./prompt_config.js";

export const CONDITION_MARKER = "{{CONDITION}}";
export const RECORD_MARKER = "{{RECORD_JSON}}";
export const OUTPUT_SCHEMA_MARKER = "{{OUTPUT_SCHEMA}}";

const REQUIRED_MARKERS = [CONDITION_MARKER, RECORD_MARKER, OUTPUT_SCHEMA_MARKER];

// A code fence whose only content is a payload marker gets replaced whole,
// so the rendered block always carries the json language tag.
const SUBSTITUTION =
  /```[A-Za-z]*[ \t]*\r?\n[ \t]*(\{\{RECORD_JSON\}\}|\{\{OUTPUT_SCHEMA\}\})[ \t]*\r?\n[ \t]*```|\{\{CONDITION\}\}|\{\{RECORD_JSON\}\}|\{\{OUTPUT_SCHEMA\}\}/g;

export function validateTemplate(template: string): void {
  const missing = REQUIRED_MARKERS.filter((marker) => !template.includes(marker));
  if (missing.length) {
    throw new ConfigurationError(`Template is missing required marker(s): ${missing.join(", ")}`, "TEMPLATE_MARKER_MISSING");
  }
}

export function renderPrompt(
  template: string,
  condition: string,
  fields: Record<string, CellValue>,
  outputSchema: JsonObject
): string {
  const recordBlock = fenceJson(fields);
  const schemaBlock = fenceJson(outputSchema);
  return template.replace(SUBSTITUTION, (match: string, fencedMarker: string | undefined) => {
    const marker = fencedMarker ?? match;
    if (marker === RECORD_MARKER) {
      return recordBlock;
    }
    if (marker === OUTPUT_SCHEMA_MARKER) {
      return schemaBlock;
    }
    return condition;
  });
}

export function buildPrompt(record: CaseRecord, config: PromptConfig): Prompt {
  const text = renderPrompt(config.prompt_template, config.condition, record.fields, resolveOutputSchema(config.output_schema));
  return {
    recordId: record.id,
    text,
    hash: sha256Hex(text)
  };
}

/** Validates the template once, then renders one prompt per record. */
export function buildPrompts(records: CaseRecord[], config: PromptConfig): Prompt[] {
  validateTemplate(config.prompt_template);
  return records.map((record) => buildPrompt(record, config));
}

function fenceJson(value: unknown): string {
  return `\`\`\`json\n${JSON.stringify(value, null, 2)}\n\`\`\``;
}
