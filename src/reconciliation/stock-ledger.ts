import { Logger } from '@nestjs/common';
import { InventoryRecord, LedgerEntry } from '../inventory/inventory.types';
import { LineItem } from './reconciliation.types';
import { NoInventoryError } from './reconciliation.errors';

/**
 * Remaining stock per barcode for a single reconciliation run.
 *
 * Quantities only ever decrease, and only through {@link reserve}, which
 * commits all line items of an order or none of them.
 */
export class StockLedger {
  private static readonly logger = new Logger(StockLedger.name);

  private constructor(private readonly entries: Map<string, LedgerEntry>) {}

  static fromInventory(records: InventoryRecord[]): StockLedger {
    const entries = new Map<string, LedgerEntry>();

    records.forEach((record, index) => {
      const barcode = this.normalizeBarcode(record.barcode);
      if (!barcode) {
        return;
      }

      const quantity = this.parseQuantity(record.quantity);
      if (quantity == null) {
        this.logger.warn(
          `Skipping inventory record ${index} (barcode ${barcode}): quantity "${String(
            record.quantity,
          )}" is not a number`,
        );
        return;
      }

      if (entries.has(barcode)) {
        this.logger.debug(`Barcode ${barcode} listed more than once; keeping the last record`);
      }

      entries.set(barcode, { quantity, sku: record.sku == null ? '' : String(record.sku) });
    });

    if (!entries.size) {
      throw new NoInventoryError('No usable inventory: no records with a barcode');
    }

    return new StockLedger(entries);
  }

  get size(): number {
    return this.entries.size;
  }

  quantityOf(barcode: string): number | undefined {
    return this.entries.get(barcode)?.quantity;
  }

  skuFor(barcode: string): string | undefined {
    return this.entries.get(barcode)?.sku;
  }

  canReserve(items: LineItem[]): boolean {
    for (const [barcode, demand] of this.totalDemand(items)) {
      const entry = this.entries.get(barcode);
      if (!entry || entry.quantity < demand) {
        return false;
      }
    }

    return true;
  }

  reserve(items: LineItem[]): boolean {
    if (!this.canReserve(items)) {
      return false;
    }

    for (const [barcode, demand] of this.totalDemand(items)) {
      const entry = this.entries.get(barcode);
      if (entry) {
        entry.quantity -= demand;
      }
    }

    return true;
  }

  snapshot(): Record<string, LedgerEntry> {
    const result: Record<string, LedgerEntry> = {};
    this.entries.forEach((entry, barcode) => {
      result[barcode] = { ...entry };
    });
    return result;
  }

  // The same barcode may appear in several tokens of one label.
  private totalDemand(items: LineItem[]): Map<string, number> {
    const demand = new Map<string, number>();
    items.forEach((item) => {
      demand.set(item.barcode, (demand.get(item.barcode) ?? 0) + item.quantity);
    });
    return demand;
  }

  private static normalizeBarcode(value: InventoryRecord['barcode']): string {
    if (typeof value === 'number') {
      return Number.isFinite(value) ? String(value) : '';
    }

    return typeof value === 'string' ? value : '';
  }

  private static parseQuantity(value: InventoryRecord['quantity']): number | null {
    if (value == null) {
      return 0;
    }

    const parsed = typeof value === 'number' ? value : Number(String(value).trim());
    if (!Number.isFinite(parsed) || (typeof value === 'string' && !value.trim())) {
      return null;
    }

    return Math.max(0, Math.trunc(parsed));
  }
}
