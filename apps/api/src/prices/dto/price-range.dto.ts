import { IsOptional } from 'class-validator';
import { IsIsoDate } from '@folio/db';

export class PriceRangeDto {
  @IsOptional()
  @IsIsoDate()
  from?: string;

  @IsOptional()
  @IsIsoDate()
  to?: string;
}
