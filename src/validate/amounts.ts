import type { JsonValue } from "../types";

const DECIMAL_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

export type AmountParse = { ok: true; value: number } | { ok: false };

/**
 * Reads a reported amount. Strings may carry thousands-separator commas and
 * surrounding whitespace and must otherwise be plain decimal notation; hex,
 * binary and octal literals fail, as does anything that is not a finite number.
 */
export function parseAmount(raw: JsonValue): AmountParse {
  if (typeof raw === "number") {
    return Number.isFinite(raw) ? { ok: true, value: raw } : { ok: false };
  }

  if (typeof raw !== "string") {
    return { ok: false };
  }

  const cleaned = raw.replace(/,/g, "").trim();
  if (!DECIMAL_PATTERN.test(cleaned)) {
    return { ok: false };
  }

  const value = Number(cleaned);
  return Number.isFinite(value) ? { ok: true, value } : { ok: false };
}

/** Integral values keep one decimal place so feedback reads `100.0`, not `100`. */
export function formatAmount(value: number): string {
  return Number.isInteger(value) ? value.toFixed(1) : String(value);
}
