import { z } from "zod";
import type { DecisionFields, JsonObject, JsonValue } from "../types.js";

export const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([z.string(), z.number(), z.boolean(), z.null(), z.array(JsonValueSchema), z.record(JsonValueSchema)])
);

export const JsonObjectSchema: z.ZodType<JsonObject> = z.record(JsonValueSchema);

const NonNullJsonSchema = z.union([z.string(), z.number(), z.boolean(), z.array(JsonValueSchema), z.record(JsonValueSchema)]);

export const DEFAULT_OUTPUT_SCHEMA: JsonObject = {
  meets_condition: true,
  confidence: 0.0,
  rationale_short: ""
};

export type DecisionSpec = {
  keys: string[];
  validator: z.ZodTypeAny;
  jsonSchema: boolean;
};

export type DecisionCheck = { ok: true; decision: DecisionFields } | { ok: false; reason: string };

export function resolveOutputSchema(outputSchema?: JsonObject): JsonObject {
  return outputSchema && Object.keys(outputSchema).length ? outputSchema : DEFAULT_OUTPUT_SCHEMA;
}

export function isJsonSchema(schema: JsonObject): boolean {
  const properties = schema.properties;
  return schema.type === "object" && isPlainObject(properties);
}

/**
 * Two schema forms are accepted: an example object whose values fix each
 * field's type (every key required, non-null), or a JSON Schema object with
 * `properties` and `required`.
 */
export function buildDecisionSpec(outputSchema?: JsonObject): DecisionSpec {
  const schema = resolveOutputSchema(outputSchema);
  if (isJsonSchema(schema)) {
    return fromJsonSchema(schema);
  }
  const shape: Record<string, z.ZodTypeAny> = {};
  for (const [key, example] of Object.entries(schema)) {
    shape[key] = zodForExample(example);
  }
  return { keys: Object.keys(shape), validator: z.object(shape), jsonSchema: false };
}

export function validateDecision(value: unknown, spec: DecisionSpec, minConfidence?: number): DecisionCheck {
  const asObject = JsonObjectSchema.safeParse(value);
  if (!asObject.success) {
    return { ok: false, reason: "reply is not a JSON object" };
  }
  const checked = spec.validator.safeParse(asObject.data);
  if (!checked.success) {
    const issues = checked.error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`);
    return { ok: false, reason: `schema mismatch: ${issues.join("; ")}` };
  }
  const decision: DecisionFields = {};
  for (const key of spec.keys) {
    if (Object.prototype.hasOwnProperty.call(asObject.data, key)) {
      decision[key] = asObject.data[key];
    }
  }
  const confidence = decision.confidence;
  if (minConfidence !== undefined && typeof confidence === "number" && confidence < minConfidence) {
    return { ok: false, reason: `confidence=${confidence.toFixed(2)}<${minConfidence}` };
  }
  return { ok: true, decision };
}

/** Value for the chat request's `format` field, if any. */
export function requestFormat(outputSchema: JsonObject | undefined, useJsonFormat: boolean): "json" | JsonObject | undefined {
  if (!useJsonFormat) {
    return undefined;
  }
  const schema = resolveOutputSchema(outputSchema);
  return isJsonSchema(schema) ? schema : "json";
}

function zodForExample(example: JsonValue): z.ZodTypeAny {
  if (typeof example === "boolean") {
    return z.boolean();
  }
  if (typeof example === "number") {
    return z.number();
  }
  if (typeof example === "string") {
    return z.string();
  }
  if (Array.isArray(example)) {
    return z.array(JsonValueSchema);
  }
  if (example === null) {
    return NonNullJsonSchema;
  }
  return z.record(JsonValueSchema);
}

function fromJsonSchema(schema: JsonObject): DecisionSpec {
  const properties = isPlainObject(schema.properties) ? schema.properties : {};
  const required = new Set(
    Array.isArray(schema.required) ? schema.required.filter((item): item is string => typeof item === "string") : []
  );
  const shape: Record<string, z.ZodTypeAny> = {};
  for (const [key, property] of Object.entries(properties)) {
    let field: z.ZodTypeAny = isPlainObject(property) ? zodForProperty(property) : NonNullJsonSchema;
    if (!required.has(key)) {
      field = field.optional();
    }
    shape[key] = field;
  }
  return { keys: Object.keys(shape), validator: z.object(shape), jsonSchema: true };
}

function zodForProperty(property: JsonObject): z.ZodTypeAny {
  const types = (Array.isArray(property.type) ? property.type : [property.type]).filter(
    (item): item is string => typeof item === "string"
  );
  const nullable = types.includes("null");
  const concrete = types.filter((item) => item !== "null");
  let field: z.ZodTypeAny;
  if (concrete.length === 1) {
    field = zodForTypeName(concrete[0]);
  } else if (concrete.length > 1) {
    const [first, second, ...rest] = concrete.map(zodForTypeName);
    field = z.union([first, second, ...rest]);
  } else {
    field = NonNullJsonSchema;
  }
  const allowed = property.enum;
  if (Array.isArray(allowed)) {
    field = field.refine((value: unknown) => allowed.some((option) => option === value), {
      message: `expected one of ${allowed.map((option) => JSON.stringify(option)).join(", ")}`
    });
  }
  return nullable ? field.nullable() : field;
}

function zodForTypeName(name: string): z.ZodTypeAny {
  switch (name) {
    case "boolean":
      return z.boolean();
    case "integer":
      return z.number().int();
    case "number":
      return z.number();
    case "string":
      return z.string();
    case "array":
      return z.array(JsonValueSchema);
    case "object":
      return z.record(JsonValueSchema);
    default:
      return NonNullJsonSchema;
  }
}

function isPlainObject(value: JsonValue | undefined): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
