export type ConstraintViolation = {
  property: string;
  value: unknown;
  constraints: string[];
  messages: string[];
};

/** A record failed its constraints right before being written. */
export class ValidationError extends Error {
  readonly name = "ValidationError";

  constructor(
    readonly entity: string,
    readonly violations: ConstraintViolation[],
  ) {
    super(
      `${entity} failed validation: ` +
        violations
          .map((v) => `${v.property}=${formatValue(v.value)} (${v.constraints.join(", ")})`)
          .join("; "),
    );
  }
}

export class PortfolioNotFoundError extends Error {
  readonly name = "PortfolioNotFoundError";

  constructor(readonly portfolio: string) {
    super(`Portfolio not found: ${portfolio}`);
  }
}

/** The portfolio lacks the initial value or date that derivation needs. */
export class PortfolioPreconditionError extends Error {
  readonly name = "PortfolioPreconditionError";

  constructor(
    readonly portfolio: string,
    readonly missing: Array<"initialValue" | "initialDate">,
  ) {
    super(`Portfolio ${portfolio} is missing ${missing.join(" and ")}`);
  }
}

export class DateParseError extends Error {
  readonly name = "DateParseError";

  constructor(
    readonly cell: string,
    readonly value: unknown,
  ) {
    super(`Cannot parse date ${formatValue(value)} in cell ${cell}`);
  }
}

export function formatValue(value: unknown): string {
  if (value === null || value === undefined) return String(value);
  if (value instanceof Date) return value.toISOString();
  if (typeof value === "string") return JSON.stringify(value);
  if (typeof value === "object") {
    const s = String(value);
    return s === "[object Object]" ? JSON.stringify(value) : s;
  }
  return String(value);
}
