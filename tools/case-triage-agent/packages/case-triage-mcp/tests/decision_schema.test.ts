import { describe, expect, it } from "vitest";
import { DEFAULT_OUTPUT_SCHEMA, buildDecisionSpec, requestFormat, validateDecision } from "../src/llm/decision_schema.js";

const JSON_SCHEMA = {
  type: "object",
  properties: {
    label: { type: "string", enum: ["robbery", "other"] },
    score: { type: ["number", "null"] }
  },
  required: ["label"]
};

describe("example-object schema", () => {
  const spec = buildDecisionSpec();

  it("uses the default decision fields when none are configured", () => {
    expect(spec.keys).toEqual(["meets_condition", "confidence", "rationale_short"]);
    expect(spec.jsonSchema).toBe(false);
  });

  it("accepts a conforming reply and drops extra keys", () => {
    const checked = validateDecision(
      { meets_condition: true, confidence: 0.9, rationale_short: "armed", chatter: "hi" },
      spec,
      0.7
    );
    expect(checked).toEqual({ ok: true, decision: { meets_condition: true, confidence: 0.9, rationale_short: "armed" } });
  });

  it("rejects a missing field", () => {
    expect(validateDecision({ meets_condition: true, confidence: 0.9 }, spec)).toEqual({
      ok: false,
      reason: "schema mismatch: rationale_short: Required"
    });
  });

  it("rejects a wrong type", () => {
    expect(validateDecision({ meets_condition: "yes", confidence: 0.9, rationale_short: "r" }, spec)).toEqual({
      ok: false,
      reason: "schema mismatch: meets_condition: Expected boolean, received string"
    });
  });

  it("rejects anything but an object", () => {
    expect(validateDecision([1, 2], spec)).toEqual({ ok: false, reason: "reply is not a JSON object" });
    expect(validateDecision(null, spec)).toEqual({ ok: false, reason: "reply is not a JSON object" });
  });

  it("rejects a confidence under the threshold", () => {
    expect(validateDecision({ meets_condition: false, confidence: 0.55, rationale_short: "r" }, spec, 0.7)).toEqual({
      ok: false,
      reason: "confidence=0.55<0.7"
    });
  });

  it("treats a null example as any non-null value", () => {
    const evidenceSpec = buildDecisionSpec({ evidence: null });
    expect(validateDecision({ evidence: ["a"] }, evidenceSpec).ok).toBe(true);
    expect(validateDecision({ evidence: null }, evidenceSpec).ok).toBe(false);
  });
});

describe("JSON Schema form", () => {
  const spec = buildDecisionSpec(JSON_SCHEMA);

  it("only requires the listed keys", () => {
    expect(spec.jsonSchema).toBe(true);
    expect(validateDecision({ label: "robbery" }, spec)).toEqual({ ok: true, decision: { label: "robbery" } });
    expect(validateDecision({ label: "other", score: null }, spec)).toEqual({
      ok: true,
      decision: { label: "other", score: null }
    });
  });

  it("enforces enums", () => {
    expect(validateDecision({ label: "theft" }, spec)).toEqual({
      ok: false,
      reason: "schema mismatch: label: expected one of \"robbery\", \"other\""
    });
  });
});

describe("requestFormat", () => {
  it("maps the json-format flag onto the request", () => {
    expect(requestFormat(undefined, false)).toBeUndefined();
    expect(requestFormat(DEFAULT_OUTPUT_SCHEMA, true)).toBe("json");
    expect(requestFormat(JSON_SCHEMA, true)).toEqual(JSON_SCHEMA);
  });
});
