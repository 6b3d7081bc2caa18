import { BadRequestException, Injectable, NotFoundException } from '@nestjs/common';
import { EntityStore, type DateRange } from '@folio/db';

@Injectable()
export class PricesService {
  constructor(private readonly store: EntityStore) {}

  async history(assetName: string, range: DateRange) {
    if (range.from && range.to && range.from > range.to) {
      throw new BadRequestException('from must not be after to');
    }

    const asset = await this.store.findAsset(assetName);
    if (!asset) throw new NotFoundException('Asset not found');

    const prices = await this.store.listPrices(asset, range);
    return {
      asset: asset.name,
      prices: prices.map((p) => ({ date: p.date, price: p.price.toString() })),
    };
  }
}
