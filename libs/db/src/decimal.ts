import Decimal from "decimal.js";
import type { ValueTransformer } from "typeorm";

export { Decimal };

// Plain decimal notation only; decimal.js would also take 0x, 0b and 0o literals.
const DECIMAL_TEXT = /^[+-]?(\d+\.?\d*|\.\d+)(e[+-]?\d+)?$/i;

/**
 * Parses a cell or request value into a decimal.
 *
 * Numbers go through their shortest string form so that a float such as 0.28
 * becomes exactly 0.28. Strings are trimmed and a comma decimal separator is
 * accepted. Anything non-finite or non-numeric yields null.
 */
export function parseDecimal(value: unknown): Decimal | null {
  if (Decimal.isDecimal(value)) {
    return value.isFinite() ? value : null;
  }
  if (typeof value === "number") {
    if (!Number.isFinite(value)) return null;
    return new Decimal(String(value));
  }
  if (typeof value === "string") {
    const s = value.trim().replace(",", ".");
    if (!DECIMAL_TEXT.test(s)) return null;
    const d = new Decimal(s);
    return d.isFinite() ? d : null;
  }
  return null;
}

/**
 * Maps decimal columns to `Decimal` instances. Values are written in plain
 * notation; postgres hands numerics back as strings, and on sqlite the
 * columns hold text (see `createDataSource`).
 */
export const decimalTransformer: ValueTransformer = {
  to(value: unknown): string | null | undefined {
    if (value === null || value === undefined) return value;
    const d = parseDecimal(value);
    return d === null ? null : d.toFixed();
  },
  from(value: unknown): Decimal | null {
    if (value === null || value === undefined) return null;
    return parseDecimal(value);
  },
};
