import type { CellValue } from 'exceljs';
import { DateParseError, isoDateOf, parseDecimal, toIsoDate, type Decimal, type IsoDate } from '@folio/db';

/** An error cell such as `#N/A` or `#DIV/0!`. */
export class CellError {
  constructor(readonly code: string) {}

  toString() {
    return this.code;
  }
}

export type CellScalar = string | number | boolean | Date | CellError | null;

/** Reduces formula, rich-text and hyperlink cells to the value they show. */
export function unwrapCell(value: CellValue): CellScalar {
  if (value === null || value === undefined) return null;
  if (typeof value !== 'object' || value instanceof Date) return value;

  if ('error' in value) return new CellError(value.error);
  if ('richText' in value) return value.richText.map((r) => r.text).join('');
  if ('hyperlink' in value) return value.text;
  if ('formula' in value || 'sharedFormula' in value) {
    return value.result === undefined ? null : unwrapCell(value.result);
  }
  return null;
}

export function isBlank(value: CellScalar): boolean {
  return value === null || (typeof value === 'string' && !value.trim());
}

/** Text of a label cell; numbers are read as their digits. */
export function cellText(value: CellScalar): string | null {
  if (typeof value === 'string') return value.trim() || null;
  if (typeof value === 'number' && Number.isFinite(value)) return String(value);
  return null;
}

export function parseCellDecimal(value: CellScalar): Decimal | null {
  if (value instanceof CellError || value instanceof Date) return null;
  return parseDecimal(value);
}

const DAY_MONTH_YEAR = /^(\d{1,2})\/(\d{1,2})\/(\d{2}|\d{4})$/;
const YEAR_MONTH_DAY = /^(\d{4})-(\d{2})-(\d{2})$/;

function parseDateText(text: string): IsoDate | null {
  const s = text.trim();

  const dmy = DAY_MONTH_YEAR.exec(s);
  if (dmy) {
    let year = Number(dmy[3]);
    if (dmy[3].length === 2) year += 2000;
    return toIsoDate(year, Number(dmy[2]), Number(dmy[1]));
  }

  const ymd = YEAR_MONTH_DAY.exec(s);
  if (ymd) return toIsoDate(Number(ymd[1]), Number(ymd[2]), Number(ymd[3]));

  return null;
}

/**
 * Accepts, in order: a native date (time of day dropped), `DD/MM/YY` or
 * `DD/MM/YYYY` text, `YYYY-MM-DD` text. Any other value is read through its
 * string form against the same two patterns.
 *
 * @throws DateParseError naming `cell` when none of them match
 */
export function parseCellDate(value: CellScalar, cell: string): IsoDate {
  let date: IsoDate | null = null;

  if (value instanceof Date) date = isoDateOf(value);
  else if (value !== null) date = parseDateText(String(value));

  if (date === null) throw new DateParseError(cell, value);
  return date;
}
