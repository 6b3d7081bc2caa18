import { Controller, Get, HttpCode, Param, Post, Query } from '@nestjs/common';
import { HoldingsQueryDto } from './dto/holdings-query.dto';
import { PortfoliosService } from './portfolios.service';

@Controller('portfolios')
export class PortfoliosController {
  constructor(private readonly portfoliosService: PortfoliosService) {}

  @Get()
  list() {
    return this.portfoliosService.list();
  }

  @Get(':name/weights')
  weights(@Param('name') name: string) {
    return this.portfoliosService.weights(name);
  }

  @Get(':name/holdings')
  holdings(@Param('name') name: string, @Query() query: HoldingsQueryDto) {
    return this.portfoliosService.holdings(name, query.date);
  }

  @Post(':name/holdings/derive')
  @HttpCode(200)
  derive(@Param('name') name: string) {
    return this.portfoliosService.derive(name);
  }
}
