import { Ollama } from "ollama";
import { ConfigurationError, InvocationCancelledError, TransientInvocationError } from "../errors.js";
import type { ModelOptions } from "../prompt/prompt_config.js";
import type { JsonObject } from "../types.js";

export type ChatRequest = {
  model: string;
  prompt: string;
  format?: "json" | JsonObject;
  options?: ModelOptions;
};

/** Client-side contract for the model endpoint: one prompt in, one reply text out. */
export interface ModelClient {
  chat(request: ChatRequest, signal?: AbortSignal): Promise<string>;
  ensureModel?(model: string): Promise<void>;
}

export type OllamaClientOptions = {
  host: string;
  timeoutMs: number;
};

export class OllamaModelClient implements ModelClient {
  constructor(private readonly opts: OllamaClientOptions) {}

  async chat(request: ChatRequest, signal?: AbortSignal): Promise<string> {
    const controller = new AbortController();
    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.opts.timeoutMs);
    const onAbort = () => controller.abort();
    signal?.addEventListener("abort", onAbort, { once: true });

    const boundFetch: typeof fetch = (input, init) => fetch(input, { ...init, signal: controller.signal });
    const client = new Ollama({ host: this.opts.host, fetch: boundFetch });
    try {
      const response = await client.chat({
        model: request.model,
        messages: [{ role: "user", content: request.prompt }],
        stream: false,
        format: request.format,
        options: request.options
      });
      return response.message.content;
    } catch (err) {
      if (signal?.aborted) {
        throw new InvocationCancelledError("Model request cancelled", { cause: err });
      }
      if (timedOut) {
        throw new TransientInvocationError(`Model request timed out after ${this.opts.timeoutMs}ms`, undefined, { cause: err });
      }
      throw classifyInvocationError(err, request.model);
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener("abort", onAbort);
    }
  }

  async ensureModel(model: string): Promise<void> {
    const client = new Ollama({ host: this.opts.host });
    let installed: string[];
    try {
      const listed = await client.list();
      installed = listed.models.map((entry) => entry.name);
    } catch (err) {
      throw classifyInvocationError(err, model);
    }
    if (!hasModel(installed, model)) {
      throw new ConfigurationError(
        `Model '${model}' is not available on ${this.opts.host}. Installed: ${installed.join(", ") || "(none)"}`,
        "UNKNOWN_MODEL"
      );
    }
  }
}

export function hasModel(installed: string[], model: string): boolean {
  const wanted = model.includes(":") ? model : `${model}:latest`;
  return installed.some((name) => name === model || name === wanted);
}

/**
 * Maps endpoint failures onto the retry taxonomy: client-side 4xx replies
 * mean the request itself is wrong (unknown model, bad options) and abort
 * the batch; everything else is worth another attempt.
 */
export function classifyInvocationError(err: unknown, model: string): ConfigurationError | TransientInvocationError {
  if (err instanceof ConfigurationError || err instanceof TransientInvocationError) {
    return err;
  }
  const status = statusCodeOf(err);
  const message = err instanceof Error ? err.message : String(err);
  if (status !== undefined && status >= 400 && status < 500 && status !== 408 && status !== 429) {
    const code = status === 404 ? "UNKNOWN_MODEL" : "CONFIGURATION_ERROR";
    return new ConfigurationError(`Model endpoint rejected request for '${model}' (${status}): ${message}`, code, { cause: err });
  }
  return new TransientInvocationError(
    status !== undefined ? `Model endpoint error (${status}): ${message}` : `Model endpoint unreachable: ${message}`,
    status,
    { cause: err }
  );
}

function statusCodeOf(err: unknown): number | undefined {
  if (err && typeof err === "object" && "status_code" in err && typeof err.status_code === "number") {
    return err.status_code;
  }
  return undefined;
}
