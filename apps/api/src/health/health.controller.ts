import { Controller, Get } from '@nestjs/common';
import { DatabaseService } from '@folio/database';

@Controller()
export class HealthController {
  constructor(private readonly db: DatabaseService) {}

  @Get('/healthz')
  healthz() {
    return { status: 'ok' };
  }

  @Get('/readyz')
  async readyz() {
    await this.db.dataSource.query('SELECT 1');
    return { status: 'ready' };
  }
}
