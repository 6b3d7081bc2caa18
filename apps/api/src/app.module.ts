import { Module } from '@nestjs/common';
import { DatabaseModule } from '@folio/database';
import { AssetsModule } from './assets/assets.module';
import { HealthModule } from './health/health.module';
import { PortfoliosModule } from './portfolios/portfolios.module';
import { PricesModule } from './prices/prices.module';

@Module({
  imports: [
    DatabaseModule,
    AssetsModule,
    PricesModule,
    PortfoliosModule,
    HealthModule,
  ],
})
export class AppModule {}
