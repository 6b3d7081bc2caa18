import { existsSync } from 'node:fs';
import { Injectable, Logger } from '@nestjs/common';
import { Workbook, type Worksheet } from 'exceljs';
import {
  Decimal,
  EntityStore,
  HoldingsDeriver,
  UpsertService,
  ValidationError,
  type Asset,
  type ClearResult,
  type Portfolio,
} from '@folio/db';
import {
  parseAssetRows,
  parsePriceRows,
  parseWeightRows,
  type ParsedRow,
} from '../workbook/workbook.parser';
import { PRICES_SHEET, WEIGHTS_SHEET } from '../workbook/workbook.layout';
import {
  EXPECTED_ASSET_COUNT,
  INITIAL_DATE,
  INITIAL_VALUE,
  PORTFOLIO_NAMES,
} from './ingestion.constants';
import { IngestionError } from './ingestion.errors';
import type { IngestOptions, IngestionReport, SkippedRow } from './ingestion.types';

@Injectable()
export class IngestionService {
  private readonly logger = new Logger(IngestionService.name);

  constructor(
    private readonly store: EntityStore,
    private readonly upserts: UpsertService,
    private readonly deriver: HoldingsDeriver,
  ) {}

  async ingestFile(filePath: string, options: IngestOptions = {}): Promise<IngestionReport> {
    if (!existsSync(filePath)) {
      throw new IngestionError(`Excel file not found: ${filePath}`);
    }

    this.logger.log(`Loading Excel file: ${filePath}`);
    const workbook = new Workbook();
    try {
      await workbook.xlsx.readFile(filePath);
    } catch (e: unknown) {
      throw new IngestionError(`Cannot read workbook ${filePath}: ${messageOf(e)}`, { cause: e });
    }

    return this.ingestWorkbook(workbook, options);
  }

  /**
   * Loads assets, portfolios, weights and prices in that order, then derives
   * every portfolio's initial holdings. Bad rows are skipped and reported;
   * anything else aborts the run.
   */
  async ingestWorkbook(workbook: Workbook, options: IngestOptions = {}): Promise<IngestionReport> {
    const weightsSheet = requireSheet(workbook, WEIGHTS_SHEET);
    const pricesSheet = requireSheet(workbook, PRICES_SHEET);

    const skipped: SkippedRow[] = [];

    try {
      let cleared: ClearResult | null = null;
      if (options.clear) {
        this.logger.warn('Clearing existing data...');
        cleared = await this.upserts.clearAll();
        this.logger.log('Existing data cleared.');
      }

      const assets = await this.loadAssets(weightsSheet, skipped);
      const portfolios = await this.loadPortfolios();
      const weights = await this.loadWeights(weightsSheet, assets, portfolios, skipped);
      const prices = await this.loadPrices(pricesSheet, assets, skipped);

      this.logger.log('Deriving initial holdings...');
      const batch = await this.deriver.deriveAll();
      const holdings = batch.derived.reduce((n, d) => n + d.holdings.size, 0);

      return {
        cleared,
        loaded: {
          assets: assets.size,
          portfolios: portfolios.size,
          weights,
          prices,
          holdings,
        },
        skipped,
        derivationFailures: batch.failures,
        counts: await this.store.counts(),
      };
    } catch (e: unknown) {
      throw new IngestionError(`Error loading data: ${messageOf(e)}`, { cause: e });
    }
  }

  private async loadAssets(sheet: Worksheet, skipped: SkippedRow[]) {
    this.logger.log('Loading assets...');
    const assets = new Map<string, Asset>();

    for (const parsed of parseAssetRows(sheet)) {
      if (!this.accept(parsed, sheet.name, skipped)) continue;

      const asset = await this.rowLevel(
        () => this.upserts.upsertAsset({ name: parsed.row.name }),
        sheet.name,
        parsed.row.name,
        skipped,
      );
      if (asset) assets.set(asset.name, asset);
    }

    if (assets.size !== EXPECTED_ASSET_COUNT) {
      this.logger.warn(`Expected ${EXPECTED_ASSET_COUNT} assets, found ${assets.size}`);
    }
    this.logger.log(`Loaded ${assets.size} assets`);
    return assets;
  }

  private async loadPortfolios() {
    this.logger.log('Loading portfolios...');
    const portfolios = new Map<string, Portfolio>();

    for (const name of PORTFOLIO_NAMES) {
      const portfolio = await this.upserts.upsertPortfolio({
        name,
        initialValue: new Decimal(INITIAL_VALUE),
        initialDate: INITIAL_DATE,
      });
      portfolios.set(name, portfolio);
    }

    this.logger.log(`Loaded ${portfolios.size} portfolios`);
    return portfolios;
  }

  private async loadWeights(
    sheet: Worksheet,
    assets: Map<string, Asset>,
    portfolios: Map<string, Portfolio>,
    skipped: SkippedRow[],
  ) {
    this.logger.log('Loading weights...');
    let loaded = 0;

    for (const parsed of parseWeightRows(sheet, new Set(assets.keys()))) {
      if (!this.accept(parsed, sheet.name, skipped)) continue;

      const { assetName, portfolioLabel, weight } = parsed.row;
      const asset = assets.get(assetName);
      const portfolio = portfolios.get(portfolioLabel);
      if (!asset || !portfolio) continue;

      const saved = await this.rowLevel(
        () => this.upserts.upsertWeight({ portfolio, asset, initialWeight: weight }),
        sheet.name,
        `${assetName}/${portfolioLabel}`,
        skipped,
      );
      if (saved) loaded++;
    }

    this.logger.log(`Loaded ${loaded} weights`);
    return loaded;
  }

  private async loadPrices(sheet: Worksheet, assets: Map<string, Asset>, skipped: SkippedRow[]) {
    this.logger.log('Loading prices...');
    let loaded = 0;

    for (const parsed of parsePriceRows(sheet, new Set(assets.keys()))) {
      if (!this.accept(parsed, sheet.name, skipped)) continue;

      const { assetName, date, price } = parsed.row;
      const asset = assets.get(assetName);
      if (!asset) continue;

      const saved = await this.rowLevel(
        () => this.upserts.upsertPrice({ asset, date, price }),
        sheet.name,
        `${assetName}@${date}`,
        skipped,
      );
      if (saved) loaded++;
    }

    this.logger.log(`Loaded ${loaded} prices`);
    return loaded;
  }

  private accept<T>(
    parsed: ParsedRow<T>,
    sheet: string,
    skipped: SkippedRow[],
  ): parsed is { ok: true; row: T } {
    if (parsed.ok) return true;
    this.logger.warn(`${sheet}!${parsed.cell}: ${parsed.reason}, skipping`);
    skipped.push({ sheet, cell: parsed.cell, reason: parsed.reason });
    return false;
  }

  /** A constraint failure drops the record; everything else propagates. */
  private async rowLevel<T>(
    write: () => Promise<T>,
    sheet: string,
    key: string,
    skipped: SkippedRow[],
  ): Promise<T | null> {
    try {
      return await write();
    } catch (e: unknown) {
      if (!(e instanceof ValidationError)) throw e;
      this.logger.warn(`${sheet} ${key}: ${e.message}, skipping`);
      skipped.push({ sheet, cell: key, reason: e.message });
      return null;
    }
  }
}

function requireSheet(workbook: Workbook, name: string): Worksheet {
  const sheet = workbook.getWorksheet(name);
  if (!sheet) throw new IngestionError(`Required sheet "${name}" not found in Excel file`);
  return sheet;
}

function messageOf(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
