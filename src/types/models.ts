export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

export type JsonObject = { [key: string]: JsonValue };

export interface TableFragment {
  documentName: string;
  /** 0-based position among the document's significant tables. */
  index: number;
  html: string;
}

/** Whatever JSON object the model returned for a table. */
export type ExtractedRecord = JsonObject;

export type AcceptedRecord = ExtractedRecord & {
  validation_status: "passed";
  attempts_needed: number;
  input_truncated?: true;
};

export type FailureKind = "validation_exhausted" | "gateway_failure";

export interface FailedExtraction {
  error: string;
  error_kind: FailureKind;
  attempts_made: number;
  last_attempt: ExtractedRecord | null;
  last_validation_error?: string;
  input_truncated?: true;
}

export type TableOutcome = AcceptedRecord | FailedExtraction;

export interface FileRecord {
  filename: string;
  extracted_tables: TableOutcome[];
}

export function isAcceptedRecord(outcome: TableOutcome): outcome is AcceptedRecord {
  return "validation_status" in outcome && outcome.validation_status === "passed";
}

/** Narrows `JSON.parse` output; anything it returns is already a JsonValue. */
export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
