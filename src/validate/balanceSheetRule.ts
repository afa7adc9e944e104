import type { ExtractedRecord } from "../types";
import { formatAmount, parseAmount } from "./amounts";
import type { FinancialRule, ValidationOutcome, ValidatorOptions } from "./types";

export const BALANCE_TOLERANCE = 1.0;

const TYPE_PATTERNS = ["balance sheet", "assets and liabilities"] as const;

const FIELDS = ["total_assets", "total_liabilities", "net_assets"] as const;

type BalanceField = (typeof FIELDS)[number];

export const balanceSheetRule: FinancialRule = {
  name: "balance_sheet",

  appliesTo(tableType: string): boolean {
    const normalized = tableType.toLowerCase();
    return TYPE_PATTERNS.some((pattern) => normalized.includes(pattern));
  },

  check(record: ExtractedRecord, options: ValidatorOptions): ValidationOutcome {
    if (options.requireFinancialFields) {
      const missing = FIELDS.filter((field) => record[field] === undefined);
      if (missing.length > 0) {
        return {
          valid: false,
          kind: "missing_field",
          reason: `Validation Error: Missing required financial field(s): ${missing.join(", ")}.`,
        };
      }
    }

    const amounts: Record<BalanceField, number> = { total_assets: 0, total_liabilities: 0, net_assets: 0 };
    for (const field of FIELDS) {
      const raw = record[field];
      if (raw === undefined) {
        continue;
      }
      const parsed = parseAmount(raw);
      if (!parsed.ok) {
        return {
          valid: false,
          kind: "coercion",
          reason: `Validation Error: Could not convert financial field '${field}' (${JSON.stringify(raw)}) to a number.`,
        };
      }
      amounts[field] = parsed.value;
    }

    const assets = amounts.total_assets;
    const liabilities = amounts.total_liabilities;
    const netAssets = amounts.net_assets;
    const difference = Math.abs(assets - (liabilities + netAssets));
    if (difference > BALANCE_TOLERANCE) {
      return {
        valid: false,
        kind: "math_mismatch",
        reason:
          `Math Error: Total Assets (${formatAmount(assets)}) does not equal ` +
          `Liabilities (${formatAmount(liabilities)}) + Net Assets (${formatAmount(netAssets)}). ` +
          `Difference is ${formatAmount(difference)}.`,
      };
    }

    return { valid: true };
  },
};
