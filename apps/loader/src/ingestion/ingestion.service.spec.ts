import { mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { Logger } from '@nestjs/common';
import { Test } from '@nestjs/testing';
import { Workbook } from 'exceljs';
import {
  EntityStore,
  HoldingsDeriver,
  UpsertService,
  createDataSource,
  type DatabaseConfig,
} from '@folio/db';
import type { DataSource } from 'typeorm';
import { AppModule } from '../app.module';
import { DATABASE_CONFIG } from '@folio/database';
import { IngestionError } from './ingestion.errors';
import { IngestionService } from './ingestion.service';

const memory: DatabaseConfig = { driver: 'sqljs', synchronize: true, logging: false };

const utc = (y: number, m: number, d: number) => new Date(Date.UTC(y, m - 1, d));

function buildWorkbook(opts: { withPrices?: boolean } = {}): Workbook {
  const wb = new Workbook();

  const weights = wb.addWorksheet('weights');
  weights.addRow(['Fecha', 'activos', 'portafolio 1', 'portafolio 2']);
  weights.addRow([utc(2022, 2, 15), 'EEUU', 0.28, 0.5]);
  weights.addRow([utc(2022, 2, 15), 'Europa', 0.72, 1.5]);
  weights.addRow([utc(2022, 2, 15), 'Oro', 0, 0.5]);

  if (opts.withPrices !== false) {
    const prices = wb.addWorksheet('Precios');
    prices.addRow(['Dates', 'EEUU', 'Europa', 'Oro', 'Marte']);
    prices.addRow([utc(2022, 2, 15), 100, 200, -1, 5]);
    prices.addRow(['16/02/22', 101, 'x', 20, 5]);
    prices.addRow([utc(2023, 2, 17), 102, 202, 21, 5]);
  }

  return wb;
}

describe('IngestionService', () => {
  let dataSource: DataSource;
  let store: EntityStore;
  let service: IngestionService;

  beforeAll(() => {
    Logger.overrideLogger(false);
  });

  afterAll(() => {
    Logger.overrideLogger(['log', 'error', 'warn', 'debug', 'verbose']);
  });

  beforeEach(async () => {
    dataSource = createDataSource(memory);
    await dataSource.initialize();
    store = new EntityStore(dataSource);
    const upserts = new UpsertService(dataSource);
    service = new IngestionService(store, upserts, new HoldingsDeriver(store, upserts));
  });

  afterEach(async () => {
    await dataSource.destroy();
  });

  it('loads the workbook and derives holdings', async () => {
    const report = await service.ingestWorkbook(buildWorkbook());

    expect(report.loaded).toEqual({
      assets: 3,
      portfolios: 2,
      weights: 5,
      prices: 4,
      holdings: 3,
    });
    expect(report.counts).toEqual({
      assets: 3,
      portfolios: 2,
      prices: 4,
      weights: 5,
      holdings: 3,
      transactions: 0,
    });
    expect(report.skipped).toEqual([
      {
        sheet: 'weights',
        cell: 'D3',
        reason: 'weight 1.5 for Europa in Portfolio 2 is outside [0, 1]',
      },
      {
        sheet: 'Precios',
        cell: 'E1',
        reason: 'asset Marte in header not found, skipping column',
      },
      {
        sheet: 'Precios',
        cell: 'D2',
        reason: 'price -1 for Oro on 2022-02-15 is not positive',
      },
      {
        sheet: 'Precios',
        cell: 'C3',
        reason: 'invalid price value x for Europa on 2022-02-16',
      },
      {
        sheet: 'Precios',
        cell: 'A4',
        reason: 'date 2023-02-17 outside 2022-02-15..2023-02-16',
      },
    ]);
    expect(report.derivationFailures).toEqual([]);

    const p1 = await store.findPortfolio('Portfolio 1');
    const eeuu = await store.findAsset('EEUU');
    const marte = await store.findAsset('Marte');
    expect(marte).toBeNull();
    if (!p1 || !eeuu) throw new Error('seed missing');

    expect(p1.initialValue?.toFixed(2)).toBe('1000000000.00');
    expect(p1.initialDate).toBe('2022-02-15');

    const holdings = await store.listHoldings(p1);
    expect(
      holdings.map((h) => [h.asset?.name, h.date, h.quantity.toFixed(8)]),
    ).toEqual([
      ['EEUU', '2022-02-15', '2800000.00000000'],
      ['Europa', '2022-02-15', '3600000.00000000'],
    ]);
  });

  it('gives the same store on a second run', async () => {
    const first = await service.ingestWorkbook(buildWorkbook());
    const second = await service.ingestWorkbook(buildWorkbook());

    expect(second.counts).toEqual(first.counts);
    expect(second.loaded).toEqual(first.loaded);

    const p2 = await store.findPortfolio('Portfolio 2');
    if (!p2) throw new Error('seed missing');
    const holdings = await store.listHoldings(p2, '2022-02-15');
    expect(holdings.map((h) => [h.asset?.name, h.quantity.toString()])).toEqual([
      ['EEUU', '5000000'],
    ]);
  });

  it('clears before loading when asked', async () => {
    await service.ingestWorkbook(buildWorkbook());
    const report = await service.ingestWorkbook(buildWorkbook(), { clear: true });

    expect(report.cleared).toEqual({
      prices: 4,
      weights: 5,
      holdings: 3,
      transactions: 0,
      portfolios: 2,
      assets: 3,
    });
    expect(report.counts.assets).toBe(3);
  });

  it('skips a record the store rejects and loads the rest', async () => {
    const longName = 'X'.repeat(101);
    const wb = new Workbook();
    const weights = wb.addWorksheet('weights');
    weights.addRow(['Fecha', 'activos', 'portafolio 1', 'portafolio 2']);
    weights.addRow([utc(2022, 2, 15), 'EEUU', 0.5, 0.5]);
    weights.addRow([utc(2022, 2, 15), longName, 0.5, 0.5]);
    const prices = wb.addWorksheet('Precios');
    prices.addRow(['Dates', 'EEUU']);
    prices.addRow([utc(2022, 2, 15), 100]);
    prices.addRow([utc(2022, 2, 16), 1e13]);

    const report = await service.ingestWorkbook(wb);

    expect(report.loaded).toEqual({
      assets: 1,
      portfolios: 2,
      weights: 2,
      prices: 1,
      holdings: 2,
    });
    expect(report.skipped).toEqual([
      {
        sheet: 'weights',
        cell: longName,
        reason: expect.stringMatching(/^Asset failed validation: name=.* \(maxLength\)$/),
      },
      { sheet: 'weights', cell: 'B3', reason: `asset ${longName} not found` },
      {
        sheet: 'Precios',
        cell: 'EEUU@2022-02-16',
        reason: expect.stringMatching(/^Price failed validation: price=.* \(hasDecimalDigits\)$/),
      },
    ]);
    expect(report.counts.prices).toBe(1);
  });

  it('fails before writing when a sheet is missing', async () => {
    await expect(
      service.ingestWorkbook(buildWorkbook({ withPrices: false })),
    ).rejects.toThrow(new IngestionError('Required sheet "Precios" not found in Excel file'));

    expect((await store.counts()).assets).toBe(0);
  });

  it('fails on a missing file', async () => {
    await expect(service.ingestFile('/nonexistent/datos.xlsx')).rejects.toThrow(
      'Excel file not found: /nonexistent/datos.xlsx',
    );
  });

  it('wraps an unexpected failure with its cause', async () => {
    await dataSource.destroy();

    const err = await service.ingestWorkbook(buildWorkbook()).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(IngestionError);
    if (!(err instanceof IngestionError)) return;
    expect(err.message.startsWith('Error loading data: ')).toBe(true);
    expect(err.cause).toBeInstanceOf(Error);

    dataSource = createDataSource(memory);
    await dataSource.initialize();
  });

  describe('from a file through the application context', () => {
    let dir: string;

    beforeEach(() => {
      dir = mkdtempSync(join(tmpdir(), 'folio-'));
    });

    afterEach(() => {
      rmSync(dir, { recursive: true, force: true });
    });

    it('reads an xlsx written to disk', async () => {
      const wb = new Workbook();
      const weights = wb.addWorksheet('weights');
      weights.addRow(['Fecha', 'activos', 'portafolio 1', 'portafolio 2']);
      weights.addRow(['15/02/22', 'EEUU', 0.28, 1]);
      const prices = wb.addWorksheet('Precios');
      prices.addRow(['Dates', 'EEUU']);
      prices.addRow(['15/02/22', 100]);
      const file = join(dir, 'datos.xlsx');
      await wb.xlsx.writeFile(file);

      const moduleRef = await Test.createTestingModule({ imports: [AppModule] })
        .overrideProvider(DATABASE_CONFIG)
        .useValue(memory)
        .compile();
      const app = await moduleRef.init();

      try {
        const report = await app.get(IngestionService).ingestFile(file);

        expect(report.counts).toEqual({
          assets: 1,
          portfolios: 2,
          prices: 1,
          weights: 2,
          holdings: 2,
          transactions: 0,
        });

        const entities = app.get(EntityStore);
        const p2 = await entities.findPortfolio('Portfolio 2');
        if (!p2) throw new Error('seed missing');
        const [holding] = await entities.listHoldings(p2);
        expect(holding.quantity.toFixed(8)).toBe('10000000.00000000');
      } finally {
        await app.close();
      }
    });
  });
});
