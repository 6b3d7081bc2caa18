export type PortfolioView = {
  id: number;
  name: string;
  initialValue: string | null;
  initialDate: string | null;
};

export type WeightView = {
  asset: string;
  initialWeight: string;
};

export type HoldingView = {
  asset: string;
  date: string;
  quantity: string;
};

export type DerivationView = {
  portfolio: string;
  date: string;
  holdings: HoldingView[];
  skipped: Array<{ asset: string; reason: string; detail: string }>;
};
