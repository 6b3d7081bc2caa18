#!/usr/bin/env node
import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';
import { IngestionService } from './ingestion/ingestion.service';
import type { IngestionReport } from './ingestion/ingestion.types';
import { USAGE, UsageError, parseLoadOptions } from './ingestion/load-options';

const logger = new Logger('Loader');

function printSummary(report: IngestionReport) {
  const line = '='.repeat(50);
  logger.log(line);
  logger.log('Data Summary:');
  logger.log(line);
  logger.log(`Assets: ${report.counts.assets}`);
  logger.log(`Portfolios: ${report.counts.portfolios}`);
  logger.log(`Weights: ${report.counts.weights}`);
  logger.log(`Prices: ${report.counts.prices}`);
  logger.log(`Holdings: ${report.counts.holdings}`);
  logger.log(`Skipped rows: ${report.skipped.length}`);
  logger.log(line);
}

async function bootstrap() {
  const options = parseLoadOptions(process.argv.slice(2));
  const app = await NestFactory.createApplicationContext(AppModule);

  try {
    const report = await app.get(IngestionService).ingestFile(options.file, {
      clear: options.clear,
    });
    logger.log('Data loading completed successfully!');
    printSummary(report);

    for (const f of report.derivationFailures) {
      logger.warn(`Holdings not derived for ${f.portfolio}: ${f.error.message}`);
    }
  } finally {
    await app.close();
  }
}

bootstrap().catch((e: unknown) => {
  if (e instanceof UsageError) {
    logger.error(e.message);
    logger.log(USAGE);
  } else {
    logger.error(e instanceof Error ? e.message : String(e), e instanceof Error ? e.stack : undefined);
  }
  process.exitCode = 1;
});
