#!/usr/bin/env node
import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { Command } from 'commander';
import { AppModule } from './app.module';
import { parseIdList } from './config/app.config';
import { getErrorMessage, ReconciliationFatalError } from './reconciliation/reconciliation.errors';
import { FileRunOptions, ReconciliationRunner } from './reconciliation/reconciliation.runner';

export type CliOptions = {
  orders: string;
  outDir: string;
  inventory?: string;
  snapshotOut?: string;
  snapshot: boolean;
  locationIds?: string;
};

export const EXIT_CODES = {
  ok: 0,
  failed: 1,
  NO_INVENTORY: 2,
  NO_ORDER_BATCH: 3,
} as const;

export function buildProgram(): Command {
  return new Command()
    .name('reconcile-orders')
    .description('Split an order label batch into fulfillable, unfulfillable and misc orders')
    .option('--orders <path>', 'orders CSV/XLSX with a custom_label column', 'merged_labels.csv')
    .option('--out-dir <dir>', 'directory for the output CSV files', '.')
    .option('--inventory <path>', 'use a saved inventory snapshot instead of the inventory API')
    .option('--snapshot-out <path>', 'where to save fetched inventory (default <out-dir>/full_items.json)')
    .option('--no-snapshot', 'do not save fetched inventory')
    .option('--location-ids <ids>', 'comma-separated location ids to fetch inventory for');
}

export function toRunOptions(options: CliOptions): FileRunOptions {
  return {
    ordersPath: options.orders,
    outDir: options.outDir,
    inventoryPath: options.inventory,
    snapshotOut: options.snapshot ? options.snapshotOut : false,
    locationIds: options.locationIds ? parseIdList(options.locationIds) : undefined,
  };
}

async function main(argv: string[]): Promise<number> {
  const program = buildProgram().parse(argv);
  const options = program.opts<CliOptions>();
  const logger = new Logger('Cli');

  const app = await NestFactory.createApplicationContext(AppModule, {
    logger: ['log', 'error', 'warn'],
  });

  try {
    const { result, files } = await app.get(ReconciliationRunner).runFiles(toRunOptions(options));

    logger.log('Processing complete');
    logger.log(`Fulfillable   -> ${files.fulfillable} (${result.summary.fulfillable} rows)`);
    logger.log(`Unfulfillable -> ${files.unfulfillable} (${result.summary.unfulfillable} rows)`);
    logger.log(`Misc          -> ${files.misc} (${result.summary.misc} rows)`);
    return EXIT_CODES.ok;
  } catch (error: unknown) {
    if (error instanceof ReconciliationFatalError) {
      logger.error(`${error.message}. No output written.`);
      return EXIT_CODES[error.code];
    }

    logger.error(`Reconciliation failed: ${getErrorMessage(error)}`);
    return EXIT_CODES.failed;
  } finally {
    await app.close();
  }
}

if (require.main === module) {
  main(process.argv)
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      new Logger('Cli').error(getErrorMessage(error));
      process.exitCode = EXIT_CODES.failed;
    });
}
