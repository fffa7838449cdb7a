export type ReplyParse = { ok: true; value: unknown; source: "strict" | "fenced" | "embedded" } | { ok: false; reason: string };

export function tryParseJsonStrict(text: string): unknown {
  const trimmed = stripBom(text.trim());
  if (!trimmed.startsWith("{") && !trimmed.startsWith("[")) {
    throw new Error("Not JSON");
  }
  return JSON.parse(trimmed);
}

/** Body of the first ``` fenced block, language tag dropped. */
export function extractFencedBlock(text: string): string | null {
  const match = /```[A-Za-z0-9_-]*[ \t]*\r?\n([\s\S]*?)\r?\n?```/.exec(text);
  return match ? match[1].trim() : null;
}

export function extractJsonCandidate(text: string): string | null {
  const trimmed = stripBom(text.trim());
  if (!trimmed) {
    return null;
  }
  const startIdx = trimmed.search(/[\[{]/);
  if (startIdx === -1) {
    return null;
  }
  return extractBalancedJson(trimmed, startIdx);
}

/**
 * Model replies often wrap the JSON in markdown or prose. Tries the raw text,
 * then the first fenced block, then the first balanced object or array.
 */
export function parseModelReply(text: string): ReplyParse {
  if (!text.trim()) {
    return { ok: false, reason: "empty reply" };
  }
  const strict = attemptParse(text);
  if (strict.ok) {
    return { ok: true, value: strict.value, source: "strict" };
  }
  const fenced = extractFencedBlock(text);
  if (fenced) {
    const fromFence = attemptParse(fenced);
    if (fromFence.ok) {
      return { ok: true, value: fromFence.value, source: "fenced" };
    }
  }
  const candidate = extractJsonCandidate(text);
  if (!candidate) {
    return { ok: false, reason: "no JSON found in reply" };
  }
  const embedded = attemptParse(candidate);
  if (embedded.ok) {
    return { ok: true, value: embedded.value, source: "embedded" };
  }
  return { ok: false, reason: `invalid JSON: ${embedded.reason}` };
}

function attemptParse(text: string): { ok: true; value: unknown } | { ok: false; reason: string } {
  try {
    return { ok: true, value: tryParseJsonStrict(text) };
  } catch (err) {
    return { ok: false, reason: err instanceof Error ? err.message : String(err) };
  }
}

function stripBom(text: string): string {
  return text.replace(/^\uFEFF/, "");
}

function extractBalancedJson(text: string, startIdx: number): string | null {
  const stack: string[] = [];
  let inString = false;
  let escape = false;
  for (let i = startIdx; i < text.length; i += 1) {
    const ch = text[i];
    if (inString) {
      if (escape) {
        escape = false;
        continue;
      }
      if (ch === "\\") {
        escape = true;
        continue;
      }
      if (ch === "\"") {
        inString = false;
      }
      continue;
    }
    if (ch === "\"") {
      inString = true;
      continue;
    }
    if (ch === "{" || ch === "[") {
      stack.push(ch);
    } else if (ch === "}" || ch === "]") {
      if (!stack.length) {
        continue;
      }
      const open = stack.pop();
      if ((open === "{" && ch !== "}") || (open === "[" && ch !== "]")) {
        return null;
      }
      if (stack.length === 0) {
        return text.slice(startIdx, i + 1);
      }
    }
  }
  return null;
}
