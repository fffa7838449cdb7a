import { InvocationCancelledError, SchemaValidationError, TransientInvocationError, describeError, isRetryable } from "../errors.js";
import type { StepLogger } from "../logger.js";
import { logInfo } from "../logger.js";
import type { ModelOptions } from "../prompt/prompt_config.js";
import type { AttemptLogEntry, DecisionFields, JsonObject, Prompt, ValidationStatus } from "../types.js";
import type { RetryPolicy } from "../util/retry.js";
import { backoffDelay, sleep } from "../util/retry.js";
import type { DecisionSpec } from "./decision_schema.js";
import { validateDecision } from "./decision_schema.js";
import { parseModelReply } from "./json_guard.js";
import type { ModelClient } from "./ollama_client.js";

export type InvocationState =
  | { phase: "pending" }
  | { phase: "prompted"; promptHash: string }
  | { phase: "submitted"; attempt: number }
  | { phase: "retry_pending"; attempt: number; reason: string; exhausted: boolean }
  | { phase: "validated"; status: ValidationStatus; attempt: number; reason?: string };

export type InvocationEvent =
  | { type: "prompt_ready"; promptHash: string }
  | { type: "submit" }
  | { type: "reply_valid" }
  | { type: "reply_failed"; reason: string }
  | { type: "retry" }
  | { type: "exhaust" };

/**
 * Per-record lifecycle:
 * pending -> prompted -> submitted -> validated(valid) | retry_pending
 * retry_pending -> submitted (while attempts remain) | validated(invalid)
 */
export function transition(state: InvocationState, event: InvocationEvent, maxAttempts: number): InvocationState {
  switch (state.phase) {
    case "pending":
      if (event.type === "prompt_ready") {
        return { phase: "prompted", promptHash: event.promptHash };
      }
      break;
    case "prompted":
      if (event.type === "submit") {
        return { phase: "submitted", attempt: 1 };
      }
      break;
    case "submitted":
      if (event.type === "reply_valid") {
        return { phase: "validated", status: "valid", attempt: state.attempt };
      }
      if (event.type === "reply_failed") {
        return {
          phase: "retry_pending",
          attempt: state.attempt,
          reason: event.reason,
          exhausted: state.attempt >= maxAttempts
        };
      }
      break;
    case "retry_pending":
      if (event.type === "retry" && !state.exhausted) {
        return { phase: "submitted", attempt: state.attempt + 1 };
      }
      if (event.type === "exhaust" && state.exhausted) {
        return { phase: "validated", status: "invalid", attempt: state.attempt, reason: state.reason };
      }
      break;
    case "validated":
      break;
  }
  throw new Error(`Illegal transition: ${event.type} from ${state.phase}`);
}

export type InvokerOptions = {
  model: string;
  policy: RetryPolicy;
  spec: DecisionSpec;
  minConfidence?: number;
  format?: "json" | JsonObject;
  modelOptions?: ModelOptions;
};

export type InvocationResult = {
  recordId: string;
  status: ValidationStatus;
  attempts: number;
  rawText: string;
  decision: DecisionFields | null;
  failureReason: string | null;
  attemptLog: AttemptLogEntry[];
};

type AttemptOutcome =
  | { ok: true; rawText: string; decision: DecisionFields }
  | { ok: false; rawText: string; error: TransientInvocationError | SchemaValidationError };

export class LlmInvoker {
  constructor(
    private readonly client: ModelClient,
    private readonly opts: InvokerOptions,
    private readonly logger?: StepLogger
  ) {}

  get model(): string {
    return this.opts.model;
  }

  /**
   * Drives one prompt to a terminal state. Retryable failures re-send the
   * same prompt until the policy is exhausted; anything else propagates.
   */
  async invoke(prompt: Prompt, signal?: AbortSignal): Promise<InvocationResult> {
    const maxAttempts = Math.max(1, this.opts.policy.maxAttempts);
    const attemptLog: AttemptLogEntry[] = [];
    let lastRaw = "";
    let decision: DecisionFields | null = null;
    let state: InvocationState = transition({ phase: "pending" }, { type: "prompt_ready", promptHash: prompt.hash }, maxAttempts);
    state = transition(state, { type: "submit" }, maxAttempts);

    while (state.phase !== "validated") {
      if (state.phase === "submitted") {
        const attempt = state.attempt;
        const started = Date.now();
        const outcome = await this.attempt(prompt, signal);
        const durationMs = Date.now() - started;
        lastRaw = outcome.rawText || lastRaw;
        if (outcome.ok) {
          decision = outcome.decision;
          attemptLog.push({ attempt, outcome: "valid", duration_ms: durationMs });
          state = transition(state, { type: "reply_valid" }, maxAttempts);
          continue;
        }
        const reason = describeError(outcome.error);
        attemptLog.push({
          attempt,
          outcome: outcome.error instanceof TransientInvocationError ? "transport_error" : "invalid_reply",
          reason,
          duration_ms: durationMs
        });
        state = transition(state, { type: "reply_failed", reason }, maxAttempts);
        logInfo(this.logger, "invoke.attempt_failed", {
          id: prompt.recordId,
          attempt,
          max_attempts: maxAttempts,
          reason
        });
        continue;
      }
      if (state.phase === "retry_pending") {
        if (state.exhausted) {
          state = transition(state, { type: "exhaust" }, maxAttempts);
          continue;
        }
        await sleep(backoffDelay(this.opts.policy, state.attempt), signal);
        state = transition(state, { type: "retry" }, maxAttempts);
        continue;
      }
      throw new Error(`Unexpected invocation phase: ${state.phase}`);
    }

    return {
      recordId: prompt.recordId,
      status: state.status,
      attempts: state.attempt,
      rawText: lastRaw,
      decision: state.status === "valid" ? decision : null,
      failureReason: state.status === "invalid" ? state.reason ?? "unknown" : null,
      attemptLog
    };
  }

  private async attempt(prompt: Prompt, signal?: AbortSignal): Promise<AttemptOutcome> {
    if (signal?.aborted) {
      throw new InvocationCancelledError(`Cancelled before submitting ${prompt.recordId}`);
    }
    let rawText: string;
    try {
      rawText = await this.client.chat(
        {
          model: this.opts.model,
          prompt: prompt.text,
          format: this.opts.format,
          options: this.opts.modelOptions
        },
        signal
      );
    } catch (err) {
      if (isRetryable(err)) {
        return { ok: false, rawText: "", error: err };
      }
      throw err;
    }
    const parsed = parseModelReply(rawText);
    if (!parsed.ok) {
      return { ok: false, rawText, error: new SchemaValidationError(parsed.reason) };
    }
    const checked = validateDecision(parsed.value, this.opts.spec, this.opts.minConfidence);
    if (!checked.ok) {
      return { ok: false, rawText, error: new SchemaValidationError(checked.reason) };
    }
    return { ok: true, rawText, decision: checked.decision };
  }
}
