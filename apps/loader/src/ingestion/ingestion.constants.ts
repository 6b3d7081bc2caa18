import { WEIGHT_COLUMNS } from '../workbook/workbook.layout';

export const DEFAULT_DATA_FILE = 'data/datos.xlsx';

export const EXPECTED_ASSET_COUNT = 17;

export const PORTFOLIO_NAMES = WEIGHT_COLUMNS.map((c) => c.portfolio);

// V₀ and t₀ shared by every portfolio loaded from the workbook
export const INITIAL_VALUE = '1000000000.00';
export const INITIAL_DATE = '2022-02-15';
