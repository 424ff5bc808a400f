import { Injectable, Logger } from '@nestjs/common';
import { mkdir, readFile, writeFile } from 'fs/promises';
import { dirname } from 'path';
import { BoxHeroService } from '../services/boxhero.service';
import { getErrorMessage, NoInventoryError } from '../reconciliation/reconciliation.errors';
import { InventoryRecord } from './inventory.types';

@Injectable()
export class InventoryLoaderService {
  private readonly logger = new Logger(InventoryLoaderService.name);

  constructor(private readonly boxHeroService: BoxHeroService) {}

  async fetchFromApi(locationIds?: string[]): Promise<InventoryRecord[]> {
    let records: InventoryRecord[];
    try {
      records = await this.boxHeroService.fetchAllItems(locationIds);
    } catch (error: unknown) {
      this.logger.error(`Inventory fetch failed: ${getErrorMessage(error)}`);
      throw new NoInventoryError(`Inventory fetch failed: ${getErrorMessage(error)}`);
    }

    if (!records.length) {
      throw new NoInventoryError('Inventory API returned no items');
    }

    return records;
  }

  async saveSnapshot(records: InventoryRecord[], path: string): Promise<void> {
    await mkdir(dirname(path), { recursive: true });
    await writeFile(path, JSON.stringify(records, null, 2), 'utf-8');
    this.logger.log(`Saved ${records.length} inventory items to ${path}`);
  }

  async loadSnapshot(path: string): Promise<InventoryRecord[]> {
    let buffer: Buffer;
    try {
      buffer = await readFile(path);
    } catch (error: unknown) {
      throw new NoInventoryError(`Inventory snapshot ${path} could not be read: ${getErrorMessage(error)}`);
    }

    return this.parseSnapshot(buffer);
  }

  parseSnapshot(buffer: Buffer): InventoryRecord[] {
    let document: unknown;
    try {
      document = JSON.parse(buffer.toString('utf-8'));
    } catch (error: unknown) {
      throw new NoInventoryError(`Inventory snapshot is not valid JSON: ${getErrorMessage(error)}`);
    }

    if (!Array.isArray(document)) {
      throw new NoInventoryError('Inventory snapshot must be a JSON array of items');
    }

    const records = document.filter(
      (item): item is InventoryRecord => typeof item === 'object' && item != null,
    );
    if (!records.length) {
      throw new NoInventoryError('Inventory snapshot contains no items');
    }

    return records;
  }
}
