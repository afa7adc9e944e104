import type { ExtractedRecord } from "../types";

export type InvalidKind = "coercion" | "math_mismatch" | "type_mismatch" | "missing_field";

export type ValidationOutcome = { valid: true } | { valid: false; kind: InvalidKind; reason: string };

export interface ValidatorOptions {
  /** Reject balance sheets that omit any of the three totals instead of reading them as zero. */
  requireFinancialFields?: boolean;
}

export interface FinancialRule {
  name: string;
  appliesTo(tableType: string): boolean;
  check(record: ExtractedRecord, options: ValidatorOptions): ValidationOutcome;
}
