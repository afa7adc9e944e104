export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogFields {
  filename?: string;
  tableIndex?: number;
  attempt?: number;
  [key: string]: unknown;
}

export type MetricCounterName =
  | "files_processed"
  | "files_failed"
  | "tables_located"
  | "tables_passed"
  | "tables_exhausted"
  | "gateway_failures"
  | "validation_failures"
  | "attempts_total";

export type MetricTimerName = "gateway_call_ms" | "table_ms";
