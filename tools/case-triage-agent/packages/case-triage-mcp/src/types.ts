export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

export type JsonObject = { [key: string]: JsonValue };

export type CellValue = string | null;

/** One case as read from the source. Never mutated after loading. */
export type CaseRecord = {
  id: string;
  narrative: string;
  fields: Record<string, CellValue>;
  rowIndex: number;
};

export type Prompt = {
  recordId: string;
  text: string;
  hash: string;
};

export type ValidationStatus = "valid" | "invalid";

export type DecisionFields = Record<string, JsonValue>;

export type AttemptOutcome = "valid" | "invalid_reply" | "transport_error";

export type AttemptLogEntry = {
  attempt: number;
  outcome: AttemptOutcome;
  reason?: string;
  duration_ms: number;
};

export type ResponseArtifact = {
  id: string;
  status: ValidationStatus;
  attempts: number;
  narrative: string;
  condition: string;
  model: string;
  prompt_hash: string;
  raw_text: string;
  decision: DecisionFields | null;
  failure_reason: string | null;
  attempt_log: AttemptLogEntry[];
  completed_at: string;
};

export type SummaryStatus = "VALID" | "INVALID" | "MISSING" | "MALFORMED";

export type SummaryRow = {
  id: string;
  condition: string;
  narrative_excerpt: string;
  decision: DecisionFields;
  status: SummaryStatus;
  flagged: boolean;
  attempts: number | null;
  failure_reason: string;
};
