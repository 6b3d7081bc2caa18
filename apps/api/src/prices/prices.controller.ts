import { Controller, Get, Param, Query } from '@nestjs/common';
import { PriceRangeDto } from './dto/price-range.dto';
import { PricesService } from './prices.service';

@Controller('prices')
export class PricesController {
  constructor(private readonly pricesService: PricesService) {}

  @Get(':asset')
  history(@Param('asset') asset: string, @Query() range: PriceRangeDto) {
    return this.pricesService.history(asset, { from: range.from, to: range.to });
  }
}
