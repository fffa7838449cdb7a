import fs from "node:fs";
import path from "node:path";
import { z } from "zod";
import { ConfigurationError } from "../errors.js";
import { writeFileAtomic } from "../io/atomic_write.js";
import { JsonObjectSchema } from "../llm/decision_schema.js";
import { validateTemplate } from "./prompt_builder.js";

export const ModelOptionsSchema = z
  .object({
    temperature: z.number(),
    seed: z.number().int(),
    num_ctx: z.number().int().positive(),
    num_predict: z.number().int(),
    top_k: z.number().int(),
    top_p: z.number(),
    repeat_penalty: z.number(),
    stop: z.array(z.string())
  })
  .partial()
  .strict();

export type ModelOptions = z.infer<typeof ModelOptionsSchema>;

export const PromptConfigSchema = z
  .object({
    prompt_template: z.string().min(1, "prompt_template is empty"),
    condition: z
      .string()
      .transform((value) => value.trim())
      .pipe(z.string().min(1, "condition is empty")),
    output_schema: JsonObjectSchema.optional(),
    model: z.string().min(1).default("gpt-oss:latest"),
    use_json_format: z.boolean().default(false),
    min_confidence: z.number().min(0).max(1).default(0.7),
    id_column: z.string().min(1).optional(),
    narrative_column: z.string().min(1).optional(),
    ollama_options: ModelOptionsSchema.optional()
  })
  .passthrough();

export type PromptConfig = z.infer<typeof PromptConfigSchema>;

export function parsePromptConfig(raw: unknown, source = "prompt config"): PromptConfig {
  const parsed = PromptConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`);
    throw new ConfigurationError(`Invalid ${source}: ${issues.join("; ")}`);
  }
  return parsed.data;
}

export function loadPromptConfig(configPath: string): PromptConfig {
  return parsePromptConfig(readJsonFile(configPath), configPath);
}

function readJsonFile(configPath: string): unknown {
  let raw: string;
  try {
    raw = fs.readFileSync(configPath, "utf8");
  } catch (err) {
    throw new ConfigurationError(`Prompt config not readable: ${configPath}`, "CONFIGURATION_ERROR", { cause: err });
  }
  try {
    return JSON.parse(raw);
  } catch (err) {
    throw new ConfigurationError(`Prompt config is not valid JSON: ${configPath}`, "CONFIGURATION_ERROR", { cause: err });
  }
}

export type SyncResult = {
  configPath: string;
  created: boolean;
  templateChars: number;
  conditionChars: number;
};

/**
 * Copies reference/template.txt and reference/condition.txt into the config,
 * keeping every other key. The file is created when absent.
 */
export async function syncPromptConfig(referenceDir: string, configPath: string): Promise<SyncResult> {
  const template = readReference(path.join(referenceDir, "template.txt"), "Template");
  const condition = readReference(path.join(referenceDir, "condition.txt"), "Condition");
  if (!condition) {
    throw new ConfigurationError(`Condition file is empty: ${path.join(referenceDir, "condition.txt")}`);
  }

  let current: Record<string, unknown> = {};
  const created = !fs.existsSync(configPath);
  if (!created) {
    const existing = readJsonFile(configPath);
    if (!existing || typeof existing !== "object" || Array.isArray(existing)) {
      throw new ConfigurationError(`Prompt config must be a JSON object: ${configPath}`);
    }
    current = { ...existing };
  }

  const next = parsePromptConfig({ ...current, prompt_template: template, condition }, configPath);
  validateTemplate(next.prompt_template);

  const merged = { ...current, prompt_template: template, condition };
  await writeFileAtomic(configPath, `${JSON.stringify(merged, null, 2)}\n`);
  return {
    configPath,
    created,
    templateChars: template.length,
    conditionChars: condition.length
  };
}

function readReference(filePath: string, label: string): string {
  try {
    return fs.readFileSync(filePath, "utf8").trim();
  } catch (err) {
    throw new ConfigurationError(`${label} file not readable: ${filePath}`, "CONFIGURATION_ERROR", { cause: err });
  }
}
