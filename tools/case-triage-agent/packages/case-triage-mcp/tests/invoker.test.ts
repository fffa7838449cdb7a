import { describe, expect, it } from "vitest";
import { ConfigurationError, InvocationCancelledError, TransientInvocationError } from "../src/errors.js";
import { buildDecisionSpec } from "../src/llm/decision_schema.js";
import { LlmInvoker, transition } from "../src/llm/invoker.js";
import type { InvokerOptions } from "../src/llm/invoker.js";
import type { Prompt } from "../src/types.js";
import { GOOD_REPLY, ScriptedClient } from "./helpers.js";

const PROMPT: Prompt = { recordId: "A-1", text: "rendered prompt", hash: "h1" };

function options(overrides: Partial<InvokerOptions> = {}): InvokerOptions {
  return {
    model: "test-model",
    policy: { maxAttempts: 3, retryDelayMs: 0, backoffFactor: 1, maxDelayMs: 0 },
    spec: buildDecisionSpec(),
    minConfidence: 0.7,
    ...overrides
  };
}

describe("transition", () => {
  it("walks a first-try success", () => {
    let state = transition({ phase: "pending" }, { type: "prompt_ready", promptHash: "h" }, 3);
    state = transition(state, { type: "submit" }, 3);
    expect(state).toEqual({ phase: "submitted", attempt: 1 });
    expect(transition(state, { type: "reply_valid" }, 3)).toEqual({ phase: "validated", status: "valid", attempt: 1 });
  });

  it("marks the last allowed attempt as exhausted", () => {
    const state = transition({ phase: "submitted", attempt: 3 }, { type: "reply_failed", reason: "bad" }, 3);
    expect(state).toEqual({ phase: "retry_pending", attempt: 3, reason: "bad", exhausted: true });
    expect(transition(state, { type: "exhaust" }, 3)).toEqual({
      phase: "validated",
      status: "invalid",
      attempt: 3,
      reason: "bad"
    });
  });

  it("rejects illegal transitions", () => {
    expect(() => transition({ phase: "pending" }, { type: "submit" }, 3)).toThrow("Illegal transition: submit from pending");
    expect(() =>
      transition({ phase: "retry_pending", attempt: 3, reason: "bad", exhausted: true }, { type: "retry" }, 3)
    ).toThrow("Illegal transition: retry from retry_pending");
    expect(() => transition({ phase: "validated", status: "valid", attempt: 1 }, { type: "submit" }, 3)).toThrow();
  });
});

describe("LlmInvoker", () => {
  it("returns a valid decision on the first good reply", async () => {
    const client = new ScriptedClient(() => GOOD_REPLY);
    const result = await new LlmInvoker(client, options()).invoke(PROMPT);

    expect(result).toMatchObject({
      recordId: "A-1",
      status: "valid",
      attempts: 1,
      rawText: GOOD_REPLY,
      decision: { meets_condition: true, confidence: 0.9, rationale_short: "armed" },
      failureReason: null
    });
    expect(client.requests).toEqual([{ model: "test-model", prompt: "rendered prompt", format: undefined, options: undefined }]);
  });

  it("stops after maxAttempts and records the last reason", async () => {
    const client = new ScriptedClient(() => "not json");
    const result = await new LlmInvoker(client, options()).invoke(PROMPT);

    expect(client.requests).toHaveLength(3);
    expect(result.status).toBe("invalid");
    expect(result.attempts).toBe(3);
    expect(result.decision).toBeNull();
    expect(result.rawText).toBe("not json");
    expect(result.failureReason).toBe("SCHEMA_VALIDATION: no JSON found in reply");
    expect(result.attemptLog.map((entry) => entry.outcome)).toEqual(["invalid_reply", "invalid_reply", "invalid_reply"]);
  });

  it("retries a transient failure and then succeeds", async () => {
    const client = new ScriptedClient((_request, call) =>
      call === 1 ? new TransientInvocationError("Model endpoint unreachable: ECONNREFUSED") : GOOD_REPLY
    );
    const result = await new LlmInvoker(client, options()).invoke(PROMPT);

    expect(result.status).toBe("valid");
    expect(result.attempts).toBe(2);
    expect(result.attemptLog[0]).toMatchObject({
      attempt: 1,
      outcome: "transport_error",
      reason: "TRANSIENT_INVOCATION: Model endpoint unreachable: ECONNREFUSED"
    });
    expect(result.attemptLog[1]).toMatchObject({ attempt: 2, outcome: "valid" });
  });

  it("retries a low-confidence reply", async () => {
    const lowConfidence = JSON.stringify({ meets_condition: true, confidence: 0.5, rationale_short: "unsure" });
    const client = new ScriptedClient((_request, call) => (call === 1 ? lowConfidence : GOOD_REPLY));
    const result = await new LlmInvoker(client, options()).invoke(PROMPT);

    expect(result.status).toBe("valid");
    expect(result.attemptLog[0].reason).toBe("SCHEMA_VALIDATION: confidence=0.50<0.7");
  });

  it("makes a single attempt when maxAttempts is 1", async () => {
    const client = new ScriptedClient(() => "{}");
    const result = await new LlmInvoker(
      client,
      options({ policy: { maxAttempts: 1, retryDelayMs: 0, backoffFactor: 1, maxDelayMs: 0 } })
    ).invoke(PROMPT);

    expect(client.requests).toHaveLength(1);
    expect(result.status).toBe("invalid");
    expect(result.attempts).toBe(1);
  });

  it("propagates configuration errors without retrying", async () => {
    const client = new ScriptedClient(() => new ConfigurationError("model not found", "UNKNOWN_MODEL"));
    await expect(new LlmInvoker(client, options()).invoke(PROMPT)).rejects.toBeInstanceOf(ConfigurationError);
    expect(client.requests).toHaveLength(1);
  });

  it("passes format and model options through", async () => {
    const client = new ScriptedClient(() => GOOD_REPLY);
    await new LlmInvoker(client, options({ format: "json", modelOptions: { temperature: 0 } })).invoke(PROMPT);
    expect(client.requests[0]).toEqual({
      model: "test-model",
      prompt: "rendered prompt",
      format: "json",
      options: { temperature: 0 }
    });
  });

  it("does not submit once cancelled", async () => {
    const controller = new AbortController();
    controller.abort();
    const client = new ScriptedClient(() => GOOD_REPLY);

    await expect(new LlmInvoker(client, options()).invoke(PROMPT, controller.signal)).rejects.toBeInstanceOf(
      InvocationCancelledError
    );
    expect(client.requests).toHaveLength(0);
  });

  it("abandons the backoff wait when cancelled", async () => {
    const controller = new AbortController();
    const client = new ScriptedClient(() => {
      controller.abort();
      return "not json";
    });
    const invoker = new LlmInvoker(
      client,
      options({ policy: { maxAttempts: 3, retryDelayMs: 60_000, backoffFactor: 1, maxDelayMs: 60_000 } })
    );

    await expect(invoker.invoke(PROMPT, controller.signal)).rejects.toBeInstanceOf(InvocationCancelledError);
    expect(client.requests).toHaveLength(1);
  });
});
