import type { ExtractedRecord } from "../types";
import { balanceSheetRule } from "./balanceSheetRule";
import type { FinancialRule, ValidationOutcome, ValidatorOptions } from "./types";

// Checked in order; the first rule whose pattern matches decides.
// A schedule-of-investments summation rule would be added here.
export const FINANCIAL_RULES: readonly FinancialRule[] = [balanceSheetRule];

export function validateRecord(
  record: ExtractedRecord,
  options: ValidatorOptions = {},
  rules: readonly FinancialRule[] = FINANCIAL_RULES,
): ValidationOutcome {
  const tableType = record.table_type;
  if (tableType === undefined) {
    return { valid: true };
  }
  if (typeof tableType !== "string") {
    return {
      valid: false,
      kind: "type_mismatch",
      reason: `Validation Error: 'table_type' must be a string, got ${JSON.stringify(tableType)}.`,
    };
  }

  const rule = rules.find((candidate) => candidate.appliesTo(tableType));
  if (!rule) {
    return { valid: true };
  }

  try {
    return rule.check(record, options);
  } catch (error) {
    return {
      valid: false,
      kind: "type_mismatch",
      reason: `Validation Error: ${error instanceof Error ? error.message : String(error)}`,
    };
  }
}
