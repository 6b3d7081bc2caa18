import Decimal from "decimal.js";

export const QUANTITY_SCALE = 8;

export type WeightedAsset = {
  assetName: string;
  weight: Decimal;
};

export type SkipReason = "missing-price" | "non-positive-price" | "non-positive-quantity";

export type SkippedAsset = {
  assetName: string;
  reason: SkipReason;
  detail: string;
};

export type InitialQuantity = {
  assetName: string;
  weight: Decimal;
  price: Decimal;
  quantity: Decimal;
};

export type InitialQuantitiesResult = {
  quantities: InitialQuantity[];
  skipped: SkippedAsset[];
};

// Wide enough that weight × V₀ / p only rounds once, at the column scale.
const D = Decimal.clone({ precision: 40, rounding: Decimal.ROUND_HALF_UP });

/**
 * c(i,0) = w(i,0) × V₀ / p(i,0) for every weighted asset. Each asset is
 * independent of the others; an asset without a usable price, or whose
 * quantity comes out non-positive, is reported and left out.
 */
export function calculateInitialQuantities(
  weights: WeightedAsset[],
  pricesByAsset: ReadonlyMap<string, Decimal>,
  initialValue: Decimal,
): InitialQuantitiesResult {
  const quantities: InitialQuantity[] = [];
  const skipped: SkippedAsset[] = [];
  const v0 = new D(initialValue);

  for (const w of weights) {
    const price = pricesByAsset.get(w.assetName);

    if (price == null) {
      skipped.push({
        assetName: w.assetName,
        reason: "missing-price",
        detail: `no price for ${w.assetName} on the initial date`,
      });
      continue;
    }

    if (price.lte(0)) {
      skipped.push({
        assetName: w.assetName,
        reason: "non-positive-price",
        detail: `price ${price.toString()} for ${w.assetName} is not positive`,
      });
      continue;
    }

    const quantity = new D(w.weight)
      .mul(v0)
      .div(new D(price))
      .toDecimalPlaces(QUANTITY_SCALE, Decimal.ROUND_HALF_UP);

    if (quantity.lte(0)) {
      skipped.push({
        assetName: w.assetName,
        reason: "non-positive-quantity",
        detail: `quantity ${quantity.toString()} for ${w.assetName} is not positive`,
      });
      continue;
    }

    quantities.push({
      assetName: w.assetName,
      weight: w.weight,
      price,
      quantity: new Decimal(quantity),
    });
  }

  return { quantities, skipped };
}
