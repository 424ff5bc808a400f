import { Injectable, Logger } from '@nestjs/common';
import { isNonInventoryOrder, parseLabel } from './label-parser';
import { getErrorMessage, MissingOrderBatchError, NoInventoryError } from './reconciliation.errors';
import {
  LABEL_COLUMN,
  LineItem,
  OrderBatch,
  OrderRow,
  ReconciliationInput,
  ReconciliationResult,
  RowOutcome,
  SKU_QTY_COLUMN,
  UNKNOWN_SKU,
} from './reconciliation.types';
import { StockLedger } from './stock-ledger';

@Injectable()
export class ReconciliationService {
  private readonly logger = new Logger(ReconciliationService.name);

  /**
   * Builds a fresh ledger from the inventory and reconciles the order batch
   * against it. Fatal conditions are raised before any row is looked at.
   */
  run(input: ReconciliationInput): ReconciliationResult {
    if (!input.inventory || !input.inventory.length) {
      throw new NoInventoryError();
    }

    const ledger = StockLedger.fromInventory(input.inventory);
    this.logger.log(`Ledger ready with ${ledger.size} barcodes`);

    if (!input.orders) {
      throw new MissingOrderBatchError();
    }

    return this.reconcile(input.orders, ledger);
  }

  reconcile(batch: OrderBatch, ledger: StockLedger): ReconciliationResult {
    const result: ReconciliationResult = {
      headers: batch.headers,
      fulfillable: [],
      unfulfillable: [],
      misc: [],
      summary: { total: batch.rows.length, fulfillable: 0, unfulfillable: 0, misc: 0 },
    };

    batch.rows.forEach((row) => {
      const outcome = this.classifyRow(row, ledger);

      switch (outcome.bucket) {
        case 'fulfillable':
          result.fulfillable.push({ ...outcome.row, [SKU_QTY_COLUMN]: outcome.skuQty });
          break;
        case 'unfulfillable':
          result.unfulfillable.push({ ...outcome.row });
          break;
        case 'misc':
          result.misc.push({ ...outcome.row });
          break;
      }
    });

    result.summary.fulfillable = result.fulfillable.length;
    result.summary.unfulfillable = result.unfulfillable.length;
    result.summary.misc = result.misc.length;

    this.logger.log(
      `Reconciliation complete. Fulfillable=${result.summary.fulfillable}, Unfulfillable=${result.summary.unfulfillable}, Misc=${result.summary.misc}`,
    );

    return result;
  }

  /** Decides the bucket for one row, reserving stock when it is fulfillable. */
  classifyRow(row: OrderRow, ledger: StockLedger): RowOutcome {
    try {
      const items = parseLabel(row[LABEL_COLUMN]);
      if (!items.length) {
        return { bucket: 'misc', row, reason: 'unparseable_label' };
      }

      if (isNonInventoryOrder(items)) {
        return { bucket: 'misc', row, reason: 'non_inventory_barcode' };
      }

      // Sku lookup happens before the reservation commits, against the same ledger.
      const skuQty = this.buildSkuQty(items, ledger);
      if (!ledger.reserve(items)) {
        return { bucket: 'unfulfillable', row };
      }

      return { bucket: 'fulfillable', row, skuQty };
    } catch (error: unknown) {
      this.logger.warn(
        `Error processing row with label "${this.describeLabel(row)}": ${getErrorMessage(error)}`,
      );
      return { bucket: 'misc', row, reason: 'row_error' };
    }
  }

  outputHeaders(headers: string[]): string[] {
    return headers.includes(SKU_QTY_COLUMN) ? headers : [...headers, SKU_QTY_COLUMN];
  }

  private buildSkuQty(items: LineItem[], ledger: StockLedger): string {
    return items
      .map((item) => `${ledger.skuFor(item.barcode) ?? UNKNOWN_SKU}*${item.quantity}`)
      .join(', ');
  }

  private describeLabel(row: OrderRow): string {
    try {
      return String(row[LABEL_COLUMN] ?? '');
    } catch {
      return '<unreadable>';
    }
  }
}
