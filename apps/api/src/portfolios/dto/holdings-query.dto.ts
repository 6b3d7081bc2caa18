import { IsOptional } from 'class-validator';
import { IsIsoDate } from '@folio/db';

export class HoldingsQueryDto {
  @IsOptional()
  @IsIsoDate()
  date?: string;
}
