import type { IsoDate } from '@folio/db';

export const WEIGHTS_SHEET = 'weights';
export const PRICES_SHEET = 'Precios';

// weights: [date (ignored), asset, Portfolio 1 weight, Portfolio 2 weight]
export const ASSET_NAME_COLUMN = 2;
export const WEIGHT_COLUMNS: ReadonlyArray<{ column: number; portfolio: string }> = [
  { column: 3, portfolio: 'Portfolio 1' },
  { column: 4, portfolio: 'Portfolio 2' },
];

// Precios: dates down column A, asset names across row 1 from column B
export const PRICE_DATE_COLUMN = 1;
export const PRICE_FIRST_ASSET_COLUMN = 2;

export const PRICE_WINDOW: { from: IsoDate; to: IsoDate } = {
  from: '2022-02-15',
  to: '2023-02-16',
};
