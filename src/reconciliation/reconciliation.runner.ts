import { Injectable, Logger } from '@nestjs/common';
import { mkdir, readFile, writeFile } from 'fs/promises';
import { join } from 'path';
import { InventoryLoaderService } from '../inventory/inventory-loader.service';
import { InventoryRecord } from '../inventory/inventory.types';
import { CsvService } from '../services/csv.service';
import { getErrorMessage, MissingOrderBatchError } from './reconciliation.errors';
import { ReconciliationService } from './reconciliation.service';
import { OrderBatch, ReconciliationResult } from './reconciliation.types';

export type OutcomeName = 'fulfillable' | 'unfulfillable' | 'misc';

export type OutcomeCsv = Record<OutcomeName, string>;

export interface UploadRunOptions {
  orders?: Buffer;
  inventory?: Buffer;
  locationIds?: string[];
}

export interface FileRunOptions {
  ordersPath: string;
  outDir: string;
  inventoryPath?: string;
  /** Where fetched inventory is saved; `false` skips saving. */
  snapshotOut?: string | false;
  locationIds?: string[];
}

export interface FileRunResult {
  result: ReconciliationResult;
  files: Record<OutcomeName, string>;
}

export const OUTPUT_FILE_NAMES: Record<OutcomeName, string> = {
  fulfillable: 'fulfillable.csv',
  unfulfillable: 'unfulfillable.csv',
  misc: 'misc.csv',
};

/** Wires inventory loading, order parsing and output rendering around the engine. */
@Injectable()
export class ReconciliationRunner {
  private readonly logger = new Logger(ReconciliationRunner.name);

  constructor(
    private readonly inventoryLoader: InventoryLoaderService,
    private readonly csvService: CsvService,
    private readonly reconciliationService: ReconciliationService,
  ) {}

  async runUpload(
    options: UploadRunOptions,
  ): Promise<{ result: ReconciliationResult; csv: OutcomeCsv }> {
    const inventory = options.inventory
      ? this.inventoryLoader.parseSnapshot(options.inventory)
      : await this.inventoryLoader.fetchFromApi(options.locationIds);

    if (!options.orders) {
      throw new MissingOrderBatchError('No orders file uploaded');
    }

    const result = this.reconciliationService.run({
      inventory,
      orders: this.csvService.parseOrderBatch(options.orders),
    });

    return { result, csv: this.renderCsv(result) };
  }

  async runFiles(options: FileRunOptions): Promise<FileRunResult> {
    const inventory = await this.loadInventory(options);
    const orders = await this.readOrders(options.ordersPath);
    const result = this.reconciliationService.run({ inventory, orders });

    await mkdir(options.outDir, { recursive: true });
    const csv = this.renderCsv(result);
    const files: Record<OutcomeName, string> = {
      fulfillable: join(options.outDir, OUTPUT_FILE_NAMES.fulfillable),
      unfulfillable: join(options.outDir, OUTPUT_FILE_NAMES.unfulfillable),
      misc: join(options.outDir, OUTPUT_FILE_NAMES.misc),
    };

    await writeFile(files.fulfillable, csv.fulfillable, 'utf-8');
    await writeFile(files.unfulfillable, csv.unfulfillable, 'utf-8');
    await writeFile(files.misc, csv.misc, 'utf-8');

    return { result, files };
  }

  renderCsv(result: ReconciliationResult): OutcomeCsv {
    return {
      fulfillable: this.csvService.toCsv(
        this.reconciliationService.outputHeaders(result.headers),
        result.fulfillable,
      ),
      unfulfillable: this.csvService.toCsv(result.headers, result.unfulfillable),
      misc: this.csvService.toCsv(result.headers, result.misc),
    };
  }

  private async loadInventory(options: FileRunOptions): Promise<InventoryRecord[]> {
    if (options.inventoryPath) {
      this.logger.log(`Loading inventory snapshot from ${options.inventoryPath}`);
      return this.inventoryLoader.loadSnapshot(options.inventoryPath);
    }

    const records = await this.inventoryLoader.fetchFromApi(options.locationIds);
    if (options.snapshotOut !== false) {
      await this.inventoryLoader.saveSnapshot(
        records,
        options.snapshotOut ?? join(options.outDir, 'full_items.json'),
      );
    }

    return records;
  }

  private async readOrders(path: string): Promise<OrderBatch> {
    let buffer: Buffer;
    try {
      buffer = await readFile(path);
    } catch (error: unknown) {
      throw new MissingOrderBatchError(`Order batch ${path} could not be read: ${getErrorMessage(error)}`);
    }

    return this.csvService.parseOrderBatch(buffer);
  }
}
