import type { Worksheet } from 'exceljs';
import { DateParseError, isWithin, type Decimal, type IsoDate } from '@folio/db';
import { cellText, isBlank, parseCellDate, parseCellDecimal, unwrapCell } from './cells';
import {
  ASSET_NAME_COLUMN,
  PRICE_DATE_COLUMN,
  PRICE_FIRST_ASSET_COLUMN,
  PRICE_WINDOW,
  WEIGHT_COLUMNS,
} from './workbook.layout';

export type AssetRow = { name: string };

export type WeightRow = {
  assetName: string;
  portfolioLabel: string;
  weight: Decimal;
};

export type PriceRow = { assetName: string; date: IsoDate; price: Decimal };

export type ParsedRow<T> =
  | { ok: true; row: T }
  | { ok: false; reason: string; cell: string };

export type PriceParseOptions = { window?: { from: IsoDate; to: IsoDate } };

const fail = (cell: string, reason: string) => ({ ok: false, cell, reason }) as const;

const ok = <T>(row: T) => ({ ok: true, row }) as const;

function cellAt(sheet: Worksheet, row: number, column: number) {
  const cell = sheet.getCell(row, column);
  return { address: cell.address, value: unwrapCell(cell.value) };
}

/** Asset names down column B of the weights sheet, each once. */
export function* parseAssetRows(sheet: Worksheet): Generator<ParsedRow<AssetRow>> {
  const seen = new Set<string>();

  for (let r = 2; r <= sheet.rowCount; r++) {
    const { address, value } = cellAt(sheet, r, ASSET_NAME_COLUMN);
    if (isBlank(value)) continue;

    const name = cellText(value);
    if (name === null) {
      yield fail(address, `asset name ${String(value)} is not text`);
      continue;
    }
    if (seen.has(name)) continue;

    seen.add(name);
    yield ok({ name });
  }
}

/** One row per (asset, portfolio column) with a weight in [0, 1]. */
export function* parseWeightRows(
  sheet: Worksheet,
  knownAssets: ReadonlySet<string>,
): Generator<ParsedRow<WeightRow>> {
  for (let r = 2; r <= sheet.rowCount; r++) {
    const name = cellAt(sheet, r, ASSET_NAME_COLUMN);
    if (isBlank(name.value)) continue;

    const assetName = cellText(name.value);
    if (assetName === null || !knownAssets.has(assetName)) {
      yield fail(name.address, `asset ${String(name.value)} not found`);
      continue;
    }

    for (const { column, portfolio } of WEIGHT_COLUMNS) {
      const { address, value } = cellAt(sheet, r, column);
      if (isBlank(value)) continue;

      const weight = parseCellDecimal(value);
      if (weight === null) {
        yield fail(address, `invalid weight value ${String(value)} for ${assetName} in ${portfolio}`);
        continue;
      }
      if (weight.lt(0) || weight.gt(1)) {
        yield fail(address, `weight ${weight.toString()} for ${assetName} in ${portfolio} is outside [0, 1]`);
        continue;
      }

      yield ok({ assetName, portfolioLabel: portfolio, weight });
    }
  }
}

/**
 * Prices of the Precios sheet. A header naming an unknown asset drops its
 * whole column; a row whose date is unreadable or outside the window is
 * dropped as a whole.
 */
export function* parsePriceRows(
  sheet: Worksheet,
  knownAssets: ReadonlySet<string>,
  options: PriceParseOptions = {},
): Generator<ParsedRow<PriceRow>> {
  const window = options.window ?? PRICE_WINDOW;
  const columns: Array<{ column: number; assetName: string }> = [];

  for (let c = PRICE_FIRST_ASSET_COLUMN; c <= sheet.columnCount; c++) {
    const { address, value } = cellAt(sheet, 1, c);
    if (isBlank(value)) continue;

    const assetName = cellText(value);
    if (assetName === null || !knownAssets.has(assetName)) {
      yield fail(address, `asset ${String(value)} in header not found, skipping column`);
      continue;
    }
    columns.push({ column: c, assetName });
  }

  for (let r = 2; r <= sheet.rowCount; r++) {
    const dateCell = cellAt(sheet, r, PRICE_DATE_COLUMN);
    if (isBlank(dateCell.value)) continue;

    let date: IsoDate;
    try {
      date = parseCellDate(dateCell.value, dateCell.address);
    } catch (e: unknown) {
      if (!(e instanceof DateParseError)) throw e;
      yield fail(dateCell.address, e.message);
      continue;
    }

    if (!isWithin(date, window.from, window.to)) {
      yield fail(dateCell.address, `date ${date} outside ${window.from}..${window.to}`);
      continue;
    }

    for (const { column, assetName } of columns) {
      const { address, value } = cellAt(sheet, r, column);
      if (isBlank(value)) continue;

      const price = parseCellDecimal(value);
      if (price === null) {
        yield fail(address, `invalid price value ${String(value)} for ${assetName} on ${date}`);
        continue;
      }
      if (price.lte(0)) {
        yield fail(address, `price ${price.toString()} for ${assetName} on ${date} is not positive`);
        continue;
      }

      yield ok({ assetName, date, price });
    }
  }
}
