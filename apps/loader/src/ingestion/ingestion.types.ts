import type { ClearResult, DerivationFailure, StoreCounts } from '@folio/db';

export type IngestOptions = { clear?: boolean };

export type SkippedRow = {
  sheet: string;
  cell: string;
  reason: string;
};

export type IngestionReport = {
  cleared: ClearResult | null;
  loaded: {
    assets: number;
    portfolios: number;
    weights: number;
    prices: number;
    holdings: number;
  };
  skipped: SkippedRow[];
  derivationFailures: DerivationFailure[];
  counts: StoreCounts;
};
