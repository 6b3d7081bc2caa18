import { Injectable } from '@nestjs/common';
import { EntityStore } from '@folio/db';

@Injectable()
export class AssetsService {
  constructor(private readonly store: EntityStore) {}

  async list() {
    const assets = await this.store.listAssets();
    return assets.map((a) => ({ id: a.id, name: a.name, symbol: a.symbol }));
  }
}
